// @filename: event_target.ts
/**
 * Exposes an `EventTarget` (a `WebSocket`, an `AbortSignal`, a
 * `MessagePort`, any DOM node) as a {@link BroadcastFacility}, so its events
 * can be consumed with `for await`.
 *
 * @example
 * ```ts
 * import { eventTargetFacility } from './event_target.ts';
 * import { sequence } from './sequence.ts';
 *
 * const socket = new WebSocket('wss://example.com');
 * const facility = eventTargetFacility(socket, { completeOn: 'close' });
 *
 * for await (const { payload } of sequence(facility, 'message')) {
 *   console.log(payload);  // the MessageEvent
 * }
 * // loop ends once the socket closes and pending messages are drained
 * ```
 *
 * @module
 */

import type { BroadcastFacility, ObserverHandle } from "./_types.ts";

/** Every event name maps to the dispatched `Event`. */
export type EventTargetEvents = Record<string, Event>;

/**
 * Options for {@link eventTargetFacility}.
 */
export interface EventTargetFacilityOptions {
  /**
   * Event name that signals teardown of the target. When it fires, every
   * observer is completed.
   */
  completeOn?: string;
}

/** Listeners installed for one registration. */
interface Listeners {
  readonly name: string;
  /** Absent when the source filter excludes the target. */
  readonly listener?: (event: Event) => void;
  readonly onComplete?: () => void;
}

/**
 * Wraps `target` as a broadcast facility.
 *
 * Each registration installs one listener with `addEventListener`; each
 * dispatched event is delivered as `{ name: event.type, source: target,
 * payload: event }` as a frozen notification. The target is the only possible
 * source, so a source filter other than `null` or `target` never matches; such
 * an observer still receives `complete()` when `completeOn` fires.
 *
 * @param target - The event target to observe.
 * @param options - Optional teardown event name.
 */
export function eventTargetFacility(
  target: EventTarget,
  { completeOn }: EventTargetFacilityOptions = {}
): BroadcastFacility<EventTargetEvents> {
  const registrations = new WeakMap<ObserverHandle, Listeners>();

  function remove(handle: ObserverHandle): void {
    const entry = registrations.get(handle);
    if (!entry) return;
    registrations.delete(handle);

    if (entry.listener) target.removeEventListener(entry.name, entry.listener);
    if (completeOn !== undefined && entry.onComplete) {
      target.removeEventListener(completeOn, entry.onComplete);
    }
  }

  return {
    addObserver(name, source, observer) {
      const handle: ObserverHandle = Object.freeze({ name });

      let onComplete: (() => void) | undefined;
      if (completeOn !== undefined) {
        onComplete = () => {
          remove(handle);
          observer.complete?.();
        };
        target.addEventListener(completeOn, onComplete, { once: true });
      }

      let listener: ((event: Event) => void) | undefined;
      if (source === null || source === target) {
        listener = (event: Event) => {
          observer.next(Object.freeze({ name: event.type, source: target, payload: event }));
        };
        target.addEventListener(name, listener);
      }

      registrations.set(handle, { name, listener, onComplete });
      return handle;
    },

    removeObserver(handle) {
      remove(handle);
    },
  };
}
