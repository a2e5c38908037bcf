/**
 * Consume callback-driven events with `for await`.
 *
 * Event sources usually push: you hand them a callback and they call it
 * whenever something happens. That spreads logic across callbacks and makes
 * "handle events one at a time, in order, until done" awkward to write. This
 * package turns a named event into an async iterable:
 *
 * ```ts
 * import { BroadcastCenter } from 'broadcast-sequence';
 *
 * const center = new BroadcastCenter<{ tick: { n: number } }>();
 *
 * setInterval(() => center.post('tick', { n: Date.now() }), 1000);
 *
 * for await (const { payload } of center.sequence('tick')) {
 *   await handle(payload);  // ticks queue up meanwhile; none are lost
 * }
 * ```
 *
 * ## Pieces
 * - {@link AsyncBuffer}: unbounded FIFO with synchronous `push` and
 *   suspending `next`; the bridge between producer callbacks and the
 *   consumer.
 * - {@link EventSequence} / {@link sequence}: subscribes a fresh buffer to a
 *   {@link BroadcastFacility} per iteration and unsubscribes when the
 *   iteration ends, however it ends.
 * - {@link BroadcastCenter}: an in-process broadcast facility with event name
 *   and source filtering.
 * - {@link eventTargetFacility}: any `EventTarget` as a broadcast facility.
 *
 * ## Lifecycle
 * 1. Creating an iterator registers an observer. Events posted earlier are
 *    not seen.
 * 2. Each event is buffered until pulled, in posting order. Producers are
 *    never slowed down.
 * 3. The iteration ends when the facility completes and the buffer is
 *    drained, when the loop exits early (`break`, `return`, `throw`), or when
 *    the `signal` option aborts. The observer is removed exactly once in
 *    every case.
 *
 * ## Errors
 * A facility that refuses the registration makes iterator creation throw a
 * {@link SequenceError}. Failures while removing the observer are reported to
 * `onTeardownError` (default: `console.warn`) and never reach the loop.
 *
 * @module
 */

export type {
  BroadcastFacility,
  BroadcastNotification,
  EventMap,
  EventName,
  NotificationObserver,
  ObserverHandle,
  SequenceOptions,
} from "./_types.ts";
export type { EventTargetEvents, EventTargetFacilityOptions } from "./event_target.ts";

export { AsyncBuffer } from "./buffer.ts";
export { BroadcastCenter } from "./center.ts";
export { SequenceError, isSequenceError } from "./error.ts";
export { eventTargetFacility } from "./event_target.ts";
export { EventSequence, EventSequenceIterator, sequence } from "./sequence.ts";
export { Symbol } from "./symbol.ts";
