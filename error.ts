// @filename: error.ts
/**
 * Error types raised by {@link EventSubject}.
 *
 * Every error carries the operation that raised it and, where there is an
 * obvious fix, a `tip`. All of them share {@link SubjectError} as a base so
 * callers can tell subject failures apart from errors that merely travel
 * through a subject.
 *
 * | Error | Raised when | Where it goes |
 * |---|---|---|
 * | {@link InvalidArgumentError} | null/undefined value or error, bad option | thrown to the caller |
 * | {@link AlreadyAttachedError} | a second consumer tries to attach | the rejected consumer's `error()` |
 * | {@link UndeliverableError} | an error has no consumer left to receive it | the undeliverable-error hook |
 *
 * @module
 */

/**
 * Base class for errors raised by a subject.
 *
 * It extends AggregateError so that an error wrapping other errors (see
 * {@link UndeliverableError}) keeps every original error object intact.
 */
export class SubjectError extends AggregateError {
  /** The subject operation where the error occurred */
  readonly operation?: string;

  /** Helpful potential fix for the error */
  readonly tip?: string;

  /**
   * Creates a new SubjectError.
   *
   * @param message - The error message
   * @param options - Additional error context
   */
  constructor(
    message: string,
    options?: {
      operation?: string;
      cause?: unknown;
      tip?: string;
      errors?: unknown[];
    }
  ) {
    // Normalize wrapped errors to Error objects
    const errors = (options?.errors ?? []).map(err =>
      err instanceof Error ? err : new Error(String(err))
    );

    super(errors, message, { cause: options?.cause });
    this.name = 'SubjectError';
    this.operation = options?.operation;
    this.tip = options?.tip;
  }

  /**
   * Returns a string representation of the error including the operation,
   * the wrapped errors and the tip if available.
   */
  override toString(): string {
    let result = `${this.name}: ${this.message}`;

    if (this.operation) {
      result += `\n  in operation: ${this.operation}`;
    }

    if (this.errors.length > 0) {
      result += '\n  with errors:';
      this.errors.forEach((err, i) => {
        result += `\n    ${i + 1}) ${err}`;
      });
    }

    if (this.tip) {
      result += `\n  tip: ${this.tip}`;
    }

    return result;
  }
}

/**
 * A value, error or option passed to a subject is not acceptable.
 *
 * Thrown synchronously to the caller; it never reaches a consumer.
 *
 * @example
 * ```ts
 * const subject = EventSubject.create<number>();
 * try {
 *   subject.next(null as unknown as number);
 * } catch (err) {
 *   console.log(err instanceof InvalidArgumentError); // true
 * }
 * ```
 */
export class InvalidArgumentError extends SubjectError {
  constructor(message: string, options?: { operation?: string; tip?: string }) {
    super(message, options);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * A consumer tried to attach while another one is still attached.
 *
 * Delivered to the rejected consumer's `error()` callback; the consumer that
 * is already attached never sees it.
 */
export class AlreadyAttachedError extends SubjectError {
  constructor(message = 'Only a single consumer may be attached at a time') {
    super(message, {
      operation: 'subscribe',
      tip: 'Dispose the current consumer handle before attaching another consumer',
    });
    this.name = 'AlreadyAttachedError';
  }
}

/**
 * An error that cannot be delivered to any consumer: an `error()` call after
 * the subject already terminated, or an exception thrown by a consumer
 * callback while the subject was delivering to it.
 *
 * The original error is both the `cause` and the single entry of `errors`.
 */
export class UndeliverableError extends SubjectError {
  constructor(error: unknown, operation?: string) {
    super(
      error instanceof Error ? error.message : String(error),
      { operation, cause: error, errors: [error] }
    );
    this.name = 'UndeliverableError';
  }

  /**
   * Wraps any error as an UndeliverableError; an UndeliverableError is
   * returned as it is.
   *
   * @param error - The original error
   * @param operation - The operation that could not deliver it
   */
  static from(error: unknown, operation?: string): UndeliverableError {
    if (error instanceof UndeliverableError) return error;
    return new UndeliverableError(error, operation);
  }
}

/**
 * Checks if a value is a {@link SubjectError} without throwing.
 *
 * @example
 * ```ts
 * subject.subscribe({
 *   error(err) {
 *     if (isSubjectError(err)) console.warn(err.tip);
 *   }
 * });
 * ```
 */
export function isSubjectError(value: unknown): value is SubjectError {
  return value instanceof SubjectError;
}
