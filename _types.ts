// @filename: _types.ts
/**
 * The broadcast facility contract: what the adapter needs from a
 * publish/subscribe mechanism, and what it delivers to consumers.
 *
 * @module
 */

import type { SequenceError } from "./error.ts";

/**
 * A mapping from event names (keys) to their payload types (values).
 *
 * @example
 * ```ts
 * interface ClockEvents {
 *   tick: { n: number };
 *   reset: Record<string, never>;
 * }
 * ```
 */
export type EventMap = object;

/** The event names of an {@link EventMap}. */
export type EventName<E extends EventMap> = Extract<keyof E, string>;

/**
 * One occurrence of a broadcast event, as delivered to a consumer.
 *
 * Immutable once produced.
 *
 * @typeParam P - Payload type.
 */
export interface BroadcastNotification<P = unknown> {
  /** The event name the notification was posted under */
  readonly name: string;
  /** The object that posted it, or `null` for anonymous posts */
  readonly source: object | null;
  /** Event data */
  readonly payload: P;
}

/**
 * The callbacks a broadcast facility invokes for one registration.
 *
 * @typeParam P - Payload type.
 */
export interface NotificationObserver<P> {
  /**
   * Called for every matching notification, after registration and before
   * removal. Never called once `removeObserver` has returned.
   */
  next(notification: BroadcastNotification<P>): void;

  /**
   * Called when the facility tears down (the source object or the process is
   * going away). No `next` call follows it.
   */
  complete?(): void;
}

/**
 * Identifies one registration with a broadcast facility. Opaque; only its
 * identity matters.
 */
export type ObserverHandle = object;

/**
 * A publish/subscribe mechanism keyed by event name and an optional source
 * object.
 *
 * Implement this to make any callback API iterable with {@link sequence}.
 * {@link BroadcastCenter} is an in-process implementation and
 * {@link eventTargetFacility} bridges an `EventTarget`.
 *
 * @typeParam E - Event map of the facility.
 *
 * @example
 * ```ts
 * const facility: BroadcastFacility<{ data: Buffer }> = {
 *   addObserver(name, _source, observer) {
 *     const listener = (chunk: Buffer) => observer.next({ name, source: stream, payload: chunk });
 *     stream.on(name, listener);
 *     stream.once('close', () => observer.complete?.());
 *     return { listener };
 *   },
 *   removeObserver(handle) { ... },
 * };
 * ```
 */
export interface BroadcastFacility<E extends EventMap = Record<string, unknown>> {
  /**
   * Registers `observer` for notifications named `name`. When `source` is not
   * `null`, only notifications posted by that exact object are delivered.
   *
   * @throws When the registration cannot be made.
   */
  addObserver<K extends EventName<E>>(
    name: K,
    source: object | null,
    observer: NotificationObserver<E[K]>
  ): ObserverHandle;

  /**
   * Removes a registration. Once this returns, the observer receives nothing
   * further.
   */
  removeObserver(handle: ObserverHandle): void;
}

/**
 * Configuration for an {@link EventSequence}.
 */
export interface SequenceOptions {
  /**
   * Only observe notifications posted by this object.
   * @defaultValue null (any source)
   */
  source?: object | null;

  /**
   * Ends every iterator of the sequence when aborted. The subscription is
   * removed right away; elements already buffered are still delivered.
   */
  signal?: AbortSignal;

  /**
   * Initial slot count of each iterator's buffer. Buffers are unbounded
   * regardless.
   * @defaultValue 16
   */
  capacity?: number;

  /**
   * Receives failures of `removeObserver`. Teardown is best effort, so these
   * never reach the consumer.
   * @defaultValue reports through `console.warn`
   */
  onTeardownError?: (error: SequenceError) => void;
}
