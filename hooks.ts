/**
 * Process-wide sink for errors that no consumer can receive.
 *
 * A subject has exactly one terminal signal. An `error()` call that arrives
 * after it, or an exception thrown by a consumer callback in the middle of a
 * drain, has nowhere to go: throwing it into the producer's call stack would
 * break the "ingestion never throws" contract, and dropping it would hide bugs.
 * Such errors are wrapped in an {@link UndeliverableError} and handed to the
 * handler installed here.
 *
 * Without a handler (or when the handler itself throws) the error is reported
 * the way the host reports uncaught errors: re-thrown from a microtask, so
 * the host's own uncaught-exception reporting picks it up.
 *
 * @example
 * ```ts
 * import { setUndeliverableErrorHandler } from './hooks.ts';
 *
 * setUndeliverableErrorHandler(err => metrics.increment('subject.undeliverable', { op: err.operation }));
 * ```
 *
 * @module
 */

import { UndeliverableError } from "./error.ts";

/** Receives errors that could not be delivered to any consumer. */
export type UndeliverableErrorHandler = (error: UndeliverableError) => void;

let handler: UndeliverableErrorHandler | null = null;

/**
 * Installs the undeliverable-error handler, or removes it with `null`.
 *
 * @returns The previously installed handler
 */
export function setUndeliverableErrorHandler(
  next: UndeliverableErrorHandler | null
): UndeliverableErrorHandler | null {
  const previous = handler;
  handler = next;
  return previous;
}

/**
 * Returns the installed undeliverable-error handler, if any.
 */
export function getUndeliverableErrorHandler(): UndeliverableErrorHandler | null {
  return handler;
}

/**
 * Reports an error that cannot be delivered.
 *
 * @param error - The original error
 * @param operation - The operation that could not deliver it
 */
export function reportUndeliverable(error: unknown, operation: string): void {
  const wrapped = UndeliverableError.from(error, operation);
  const current = handler;

  if (current) {
    try {
      current(wrapped);
      return;
    } catch (err) {
      hostReportError(err);
      return;
    }
  }

  hostReportError(wrapped);
}

/**
 * HostReportErrors emulation: re-throw after the current job so the host
 * treats it as uncaught.
 * @internal
 */
function hostReportError(err: unknown): void {
  queueMicrotask(() => { throw err; });
}
