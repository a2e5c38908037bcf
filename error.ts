// @filename: error.ts
/**
 * Error type for the few failures this library surfaces.
 *
 * Almost nothing here raises: an empty buffer suspends, a closed buffer ends
 * the sequence, and a late push is dropped. What does raise:
 *
 * - a broadcast facility refusing to register an observer (thrown from
 *   `sequence[Symbol.asyncIterator]()`, so `for await` fails up front);
 * - registering with a closed {@link BroadcastCenter}.
 *
 * Teardown failures are wrapped too, but are only ever handed to the
 * `onTeardownError` reporter, never thrown at the consumer.
 *
 * @module
 */

/**
 * An error raised while subscribing to, or unsubscribing from, a broadcast
 * facility. Aggregates the underlying error(s) and records which operation
 * failed on which event.
 */
export class SequenceError extends AggregateError {
  /** The operation that failed, e.g. `"sequence:subscribe"` */
  readonly operation?: string;

  /** Name of the observed event */
  readonly event?: string;

  /** Hint at a likely fix */
  readonly tip?: string;

  /**
   * @param errors - The error(s) that caused this error
   * @param message - The error message
   * @param options - Where it failed, plus the original `cause`
   */
  constructor(
    errors: unknown,
    message: string,
    options?: {
      operation?: string;
      event?: string;
      cause?: unknown;
      tip?: string;
    }
  ) {
    const errorArray: unknown[] = Array.isArray(errors) ? errors : [errors];
    const normalizedErrors = errorArray.map(err =>
      err instanceof Error ? err : new Error(String(err))
    );

    super(normalizedErrors, message, { cause: options?.cause });
    this.name = 'SequenceError';
    this.operation = options?.operation;
    this.event = options?.event;
    this.tip = options?.tip;
  }

  /**
   * One header line naming the operation and event, then one `caused by` line
   * per underlying error, then the tip.
   *
   * ```
   * SequenceError [sequence:unsubscribe "tick"]: observer already gone
   *   caused by: Error: observer already gone
   * ```
   */
  override toString(): string {
    const where = [this.operation, this.event === undefined ? undefined : JSON.stringify(this.event)]
      .filter(part => part !== undefined)
      .join(' ');

    const lines = [where ? `${this.name} [${where}]: ${this.message}` : `${this.name}: ${this.message}`];
    for (const err of this.errors) lines.push(`  caused by: ${err}`);
    if (this.tip) lines.push(`  tip: ${this.tip}`);

    return lines.join('\n');
  }

  /**
   * Wraps a value thrown by a facility. A `SequenceError` is passed through
   * untouched so the context it was raised with survives.
   *
   * @param error - What the facility threw
   * @param operation - The failing operation
   * @param event - The observed event name
   * @param tip - Hint at a likely fix
   */
  static from(error: unknown, operation: string, event?: string, tip?: string): SequenceError {
    if (error instanceof SequenceError) return error;

    return new SequenceError(
      error,
      error instanceof Error ? error.message : String(error),
      { operation, event, cause: error, tip }
    );
  }
}

/**
 * Type guard for {@link SequenceError}.
 */
export function isSequenceError(value: unknown): value is SequenceError {
  return value instanceof SequenceError;
}
