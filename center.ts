// @filename: center.ts
/**
 * @module BroadcastCenter
 */

import type {
  BroadcastFacility,
  BroadcastNotification,
  EventMap,
  EventName,
  NotificationObserver,
  ObserverHandle,
  SequenceOptions,
} from "./_types.ts";

import { SequenceError } from "./error.ts";
import { EventSequence } from "./sequence.ts";
import { Symbol } from "./symbol.ts";

/** One live `addObserver` registration. */
interface Registration<E extends EventMap> {
  readonly name: string;
  readonly source: object | null;
  readonly observer: NotificationObserver<E[EventName<E>]>;
}

/**
 * An in-process broadcast facility: observers register for an event name,
 * optionally scoped to a source object, and {@link post} delivers to every
 * match.
 *
 * Nothing is global. Create a center per scope and pass it to whatever
 * needs to post or observe, so tests get their own.
 *
 * - {@link post} delivers synchronously, in registration order.
 * - {@link close} completes every observer, which ends their sequences once
 *   drained, and refuses further registrations.
 * - Implements {@link Symbol.dispose} for `using` blocks.
 *
 * @typeParam E - Maps event names to payload types.
 *
 * @example
 * ```ts
 * import { BroadcastCenter } from './center.ts';
 *
 * interface DeviceEvents {
 *   orientation: { angle: number };
 *   battery: { level: number };
 * }
 *
 * const center = new BroadcastCenter<DeviceEvents>();
 *
 * // Observe with a callback
 * const handle = center.addObserver('battery', null, {
 *   next({ payload }) { console.log('battery', payload.level); }
 * });
 *
 * // ...or pull with for await
 * (async () => {
 *   for await (const { payload } of center.sequence('orientation')) {
 *     console.log('angle', payload.angle);
 *   }
 * })();
 *
 * center.post('orientation', { angle: 90 });
 * center.removeObserver(handle);
 * center.close();
 * ```
 */
export class BroadcastCenter<E extends EventMap = Record<string, unknown>>
  implements BroadcastFacility<E> {
  /** Live registrations, in registration order */
  #observers = new Map<ObserverHandle, Registration<E>>();
  /** Tracks whether the center has been closed */
  #closed = false;

  /** Whether {@link close} has been called. */
  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Registers `observer` for `name`. With a non-null `source`, only posts
   * from that exact object are delivered.
   *
   * @throws {SequenceError} If the center is closed.
   */
  addObserver<K extends EventName<E>>(
    name: K,
    source: object | null,
    observer: NotificationObserver<E[K]>
  ): ObserverHandle {
    if (this.#closed) {
      throw new SequenceError(
        [],
        `Cannot observe "${name}": the broadcast center is closed`,
        {
          operation: "center:addObserver",
          event: name,
          tip: "Create a new BroadcastCenter, or observe before calling close()",
        }
      );
    }

    const handle: ObserverHandle = Object.freeze({ name });
    this.#observers.set(handle, { name, source, observer });
    return handle;
  }

  /**
   * Removes a registration. Unknown or already removed handles are ignored.
   */
  removeObserver(handle: ObserverHandle): void {
    this.#observers.delete(handle);
  }

  /**
   * Delivers a notification to every observer of `name` whose source filter
   * is `null` or `source`.
   *
   * Observers registered while delivering wait for the next post; observers
   * removed while delivering are skipped. An observer that throws does not
   * stop delivery; its error is re-thrown on the microtask queue. Posting to
   * a closed center does nothing.
   *
   * @param name - The event name.
   * @param payload - The payload matching the event name.
   * @param source - The posting object, if any.
   */
  post<K extends EventName<E>>(name: K, payload: E[K], source: object | null = null): void {
    if (this.#closed) return;

    const notification: BroadcastNotification<E[K]> = Object.freeze({ name, source, payload });

    for (const [handle, registration] of Array.from(this.#observers)) {
      if (registration.name !== name) continue;
      if (registration.source !== null && registration.source !== source) continue;
      if (!this.#observers.has(handle)) continue;

      try {
        registration.observer.next(notification);
      } catch (err) {
        queueMicrotask(() => { throw err; });
      }
    }
  }

  /**
   * Number of live registrations, for one event name or in total.
   */
  observerCount(name?: EventName<E>): number {
    if (name === undefined) return this.#observers.size;

    let count = 0;
    for (const registration of this.#observers.values()) {
      if (registration.name === name) count++;
    }
    return count;
  }

  /**
   * An {@link EventSequence} over `name` on this center.
   *
   * @example
   * ```ts
   * for await (const { payload } of center.sequence('battery', { source: phone })) {
   *   if (payload.level < 0.1) warnLowBattery();
   * }
   * ```
   */
  sequence<K extends EventName<E>>(name: K, options?: SequenceOptions): EventSequence<E, K> {
    return new EventSequence<E, K>(this, name, options);
  }

  /**
   * Close the center: completes every observer, drops all registrations and
   * turns later posts into no-ops. Idempotent.
   */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;

    const registrations = Array.from(this.#observers.values());
    this.#observers.clear();

    for (const { observer } of registrations) {
      try {
        observer.complete?.();
      } catch (err) {
        queueMicrotask(() => { throw err; });
      }
    }
  }

  /**
   * Alias for {@link close}, for `using` blocks.
   */
  [Symbol.dispose](): void {
    this.close();
  }

  get [Symbol.toStringTag](): string {
    return "BroadcastCenter";
  }
}
