// @filename: error.ts
/**
 * Error types for faults raised by subscriber handlers.
 *
 * @module
 */

import type { SubscriberId } from "./identity.ts";

/**
 * A fault raised while a subscriber's handler was processing a value.
 *
 *
 * The bus never lets a failing handler take down the subscriber's delivery
 * queue: the fault is captured, wrapped in an `EventError` and handed to the
 * bus's `onError` callback, and the queue carries on with the next value. The
 * wrapper keeps the context a bare exception would lose:
 * - Which subscriber's handler failed
 * - The value it was handling
 * - The original error(s), as `errors` and `cause`
 *
 * @example
 * ```ts
 * const bus = new EventBus<number>({
 *   onError(err) {
 *     console.warn(String(err));
 *     // EventError: divide by zero
 *     //   in subscriber: 3
 *     //   processing value: 0
 *     //   with errors:
 *     //     1) RangeError: divide by zero
 *   }
 * });
 * ```
 */
export class EventError extends AggregateError {
  /** Identity of the subscriber whose handler failed */
  readonly subscriber?: SubscriberId;

  /** The value being handled when the error occurred */
  readonly value?: unknown;

  /**
   * Creates a new EventError.
   *
   * @param errors - The error(s) that caused this error
   * @param message - The error message
   * @param options - Additional error context
   */
  constructor(
    errors: unknown,
    message: string,
    options?: {
      subscriber?: SubscriberId;
      value?: unknown;
      cause?: unknown;
    }
  ) {
    // Normalize errors to an array of Error objects
    const errorArray: unknown[] = Array.isArray(errors) ? errors : [errors];
    const normalizedErrors = errorArray.map(err =>
      err instanceof Error ? err : new Error(String(err))
    );

    super(normalizedErrors, message, { cause: options?.cause });
    this.name = 'EventError';
    this.subscriber = options?.subscriber;
    this.value = options?.value;
  }

  /**
   * Returns a string representation of the error including the subscriber
   * and value context if available.
   */
  override toString(): string {
    let result = `${this.name}: ${this.message}`;

    if (this.subscriber !== undefined) {
      result += `\n  in subscriber: ${this.subscriber}`;
    }

    if (this.value !== undefined) {
      result += `\n  processing value: ${describeValue(this.value)}`;
    }

    if (this.errors.length > 0) {
      result += '\n  with errors:';
      this.errors.forEach((err, i) => {
        result += `\n    ${i + 1}) ${err}`;
      });
    }

    return result;
  }

  /**
   * Wraps anything a handler threw (or rejected with) in an `EventError`.
   * An existing `EventError` is returned as is, gaining the subscriber and
   * value context only if it had none.
   */
  static from(
    error: unknown,
    value?: unknown,
    subscriber?: SubscriberId
  ): EventError {
    if (error instanceof EventError) {
      if (error.subscriber === undefined && subscriber !== undefined) {
        return new EventError(
          error.errors,
          error.message,
          {
            subscriber,
            value: error.value ?? value,
            cause: error.cause
          }
        );
      }
      return error;
    }

    return new EventError(
      error,
      error instanceof Error ? error.message : String(error),
      { subscriber, value, cause: error }
    );
  }
}

/**
 * Renders a handled value for {@link EventError.toString}. Objects are shown
 * as JSON cut to 100 characters; anything JSON cannot render (cycles,
 * BigInts, functions) falls back to `String()`, and a value without a
 * `toString` to its object tag.
 */
function describeValue(value: unknown): string {
  const json = typeof value === 'object' && value !== null ? toJson(value) : undefined;
  if (json !== undefined) return json.slice(0, 100);

  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

function toJson(value: object): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined; // cyclic, or holds a BigInt
  }
}

/**
 * Checks if a value is an {@link EventError}.
 *
 * @example
 * ```ts
 * process.on('uncaughtException', err => {
 *   if (isEventError(err)) console.error(`subscriber ${err.subscriber} failed`);
 * });
 * ```
 */
export function isEventError(value: unknown): value is EventError {
  return value instanceof EventError;
}

/**
 * Surfaces an error to the host (Node's `uncaughtException`, a browser's
 * `error` event) after the current job, without interrupting the caller.
 */
export function reportError(err: unknown): void {
  queueMicrotask(() => { throw err; });
}
