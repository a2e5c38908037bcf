// @filename: sequence.ts
/**
 * Turns a broadcast facility's named event into an async iterable.
 *
 * ```
 * facility ──observer.next──▶ AsyncBuffer ──iterator.next──▶ for await
 *     ▲                                                          │
 *     └──────────── removeObserver (drained, break, abort) ◀─────┘
 * ```
 *
 * Every iterator owns its own buffer and its own registration, made when the
 * iterator is created. Events posted before that are not observed. The
 * registration is removed exactly once: when the facility completes and the
 * buffer has been drained, when the consumer leaves the loop early, or when
 * the configured signal aborts.
 *
 * @example
 * ```ts
 * import type { BroadcastFacility } from './_types.ts';
 * import { BroadcastCenter } from './center.ts';
 * import { sequence } from './sequence.ts';
 *
 * const clock: BroadcastFacility<{ tick: { n: number } }> = new BroadcastCenter();
 *
 * for await (const { payload } of sequence(clock, 'tick')) {
 *   console.log('tick', payload.n);
 *   if (payload.n >= 3) break;  // unsubscribes
 * }
 * ```
 *
 * @module
 */

import type {
  BroadcastFacility,
  BroadcastNotification,
  EventMap,
  EventName,
  ObserverHandle,
  SequenceOptions,
} from "./_types.ts";

import { AsyncBuffer } from "./buffer.ts";
import { SequenceError } from "./error.ts";
import { Symbol } from "./symbol.ts";

/** Default teardown reporter. */
function warnTeardownError(error: SequenceError): void {
  console.warn(error.toString());
}

/**
 * A reusable, stateless description of "notifications named `name` from
 * `facility`". Iterate it as often as needed; each `for await` gets an
 * independent subscription.
 *
 * @typeParam E - Event map of the facility.
 * @typeParam K - The observed event name.
 */
export class EventSequence<
  E extends EventMap = Record<string, unknown>,
  K extends EventName<E> = EventName<E>,
> implements AsyncIterable<BroadcastNotification<E[K]>> {
  readonly #facility: BroadcastFacility<E>;
  readonly #name: K;
  readonly #options: SequenceOptions;

  /**
   * @param facility - Where to register observers.
   * @param name - The event to observe.
   * @param options - Source filter, abort signal, buffer sizing and teardown
   *   reporting.
   */
  constructor(facility: BroadcastFacility<E>, name: K, options: SequenceOptions = {}) {
    this.#facility = facility;
    this.#name = name;
    this.#options = options;
  }

  /** The observed event name. */
  get name(): K {
    return this.#name;
  }

  /**
   * Creates a buffer, registers an observer feeding it, and returns an
   * iterator over it.
   *
   * @throws {SequenceError} When the facility refuses the registration. The
   *   original error is kept as `cause`.
   */
  [Symbol.asyncIterator](): EventSequenceIterator<E, K> {
    return new EventSequenceIterator(this.#facility, this.#name, this.#options);
  }

  get [Symbol.toStringTag](): string {
    return "EventSequence";
  }
}

/**
 * A single-use cursor over one subscription.
 *
 * Ending it early (`break`, `return()`, `Symbol.dispose`,
 * `Symbol.asyncDispose`) removes the subscription and drops whatever was
 * still buffered.
 */
export class EventSequenceIterator<
  E extends EventMap = Record<string, unknown>,
  K extends EventName<E> = EventName<E>,
> implements AsyncIterableIterator<BroadcastNotification<E[K]>> {
  readonly #buffer: AsyncBuffer<BroadcastNotification<E[K]>>;
  readonly #facility: BroadcastFacility<E>;
  readonly #name: K;
  readonly #signal?: AbortSignal;
  readonly #onTeardownError: (error: SequenceError) => void;

  /** Cleared before removal so it is removed at most once. */
  #handle: ObserverHandle | null = null;

  constructor(
    facility: BroadcastFacility<E>,
    name: K,
    { source = null, signal, capacity, onTeardownError = warnTeardownError }: SequenceOptions = {}
  ) {
    this.#facility = facility;
    this.#name = name;
    this.#signal = signal;
    this.#onTeardownError = onTeardownError;

    const buffer = new AsyncBuffer<BroadcastNotification<E[K]>>(capacity);
    this.#buffer = buffer;

    if (signal?.aborted) {
      buffer.close();
      return;
    }

    try {
      this.#handle = facility.addObserver(name, source, {
        next: notification => buffer.push(notification),
        complete: () => buffer.close(),
      });
    } catch (err) {
      buffer.dispose();
      throw SequenceError.from(
        err,
        "sequence:subscribe",
        name,
        "The broadcast facility rejected the observer; check that it is still open"
      );
    }

    signal?.addEventListener("abort", this.#onAbort, { once: true });
  }

  /** Whether the subscription has been removed. */
  get closed(): boolean {
    return this.#handle === null;
  }

  /**
   * Resolves the next notification. Once the sequence has ended the
   * subscription is removed and every further call resolves `done`.
   */
  async next(): Promise<IteratorResult<BroadcastNotification<E[K]>, undefined>> {
    const result = await this.#buffer.next();
    if (result.done) this.#unsubscribe();
    return result;
  }

  /**
   * Abandons the iteration. Called by `for await` on `break`, `return` or a
   * thrown error.
   */
  return(): Promise<IteratorReturnResult<undefined>> {
    this[Symbol.dispose]();
    return Promise.resolve({ done: true, value: undefined });
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  /** Removes the subscription and drops buffered notifications. */
  [Symbol.dispose](): void {
    this.#unsubscribe();
    this.#buffer.dispose();
  }

  /** Same as {@link return}, for `await using` blocks. */
  async [Symbol.asyncDispose](): Promise<void> {
    await this.return();
  }

  get [Symbol.toStringTag](): string {
    return "EventSequenceIterator";
  }

  /** Stops further notifications; buffered ones still drain. */
  #onAbort = (): void => {
    this.#unsubscribe();
    this.#buffer.close();
  };

  #unsubscribe(): void {
    const handle = this.#handle;
    if (handle === null) return;
    this.#handle = null;

    this.#signal?.removeEventListener("abort", this.#onAbort);

    try {
      this.#facility.removeObserver(handle);
    } catch (err) {
      const error = SequenceError.from(err, "sequence:unsubscribe", this.#name);
      try { this.#onTeardownError(error); }
      catch (reportErr) { queueMicrotask(() => { throw reportErr; }); }
    }
  }
}

/**
 * Returns a fresh {@link EventSequence} for `name` on `facility`.
 *
 * @example
 * ```ts
 * const controller = new AbortController();
 * const ticks = sequence(center, 'tick', { source: clock, signal: controller.signal });
 *
 * for await (const { payload } of ticks) {
 *   render(payload);
 * }
 * ```
 */
export function sequence<
  E extends EventMap = Record<string, unknown>,
  K extends EventName<E> = EventName<E>,
>(
  facility: BroadcastFacility<E>,
  name: K,
  options?: SequenceOptions
): EventSequence<E, K> {
  return new EventSequence(facility, name, options);
}
