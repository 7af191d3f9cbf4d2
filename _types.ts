// @filename: _types.ts
import type { SpecSubscription, SpecObserver } from "./_spec.ts";
import { Symbol } from "./symbol.ts";

/**
 * How an attachment is drained.
 *
 * - `"push"`: the subject dequeues values and calls `observer.next(value)`.
 * - `"pull"` (fused): the subject only calls `observer.ready()`; the consumer
 *   dequeues on its own schedule through {@link ConsumerHandle.poll}.
 *
 * Chosen once per attachment, during `observer.start(handle)`.
 */
export type DrainMode = "push" | "pull";

/**
 * A consumer of an {@link EventSubject}.
 *
 * Extends the minimal SpecObserver with:
 * 1. A `start` that receives our {@link ConsumerHandle}
 * 2. A `ready` notification used by consumers that opt into pull mode
 *
 * @typeParam T - Type of values this observer can receive.
 *
 * @example Push mode
 * ```ts
 * subject.subscribe({
 *   next(value) { console.log('Got', value); },
 *   error(err)  { console.error(err); },
 *   complete()  { console.log('Done'); }
 * });
 * ```
 *
 * @example Pull (fused) mode
 * ```ts
 * let handle: ConsumerHandle<number> | undefined;
 * subject.subscribe({
 *   start(h) { handle = h; h.requestFusion(); },
 *   ready() {
 *     let v: number | undefined;
 *     while ((v = handle?.poll()) !== undefined) console.log('Pulled', v);
 *   }
 * });
 * ```
 */
export interface Observer<T> extends SpecObserver<T> {
  /**
   * Called once, before any other callback, with the handle of this
   * attachment. This is the only place where `handle.requestFusion()` may be
   * called.
   *
   * @param handle - The disposal and pull capability of this attachment
   */
  start?(handle: ConsumerHandle<T>): void;

  /**
   * Pull mode only: new values may be waiting in the subject's queue.
   * Called once per drain pass instead of `next`.
   */
  ready?(): void;
}

/**
 * The handle a consumer receives for its attachment.
 *
 * It is the consumer's disposal token (with `using` / `await using` support),
 * and, in pull mode, its window onto the subject's queue.
 *
 * @example
 * ```ts
 * {
 *   using handle = subject.subscribe(v => console.log(v));
 *   subject.next(1);
 * } // detached here; the next consumer may attach
 * ```
 */
export interface ConsumerHandle<T> extends SpecSubscription, Disposable, AsyncDisposable {
  /**
   * True once the consumer disposed the handle, received its terminal
   * signal, or was rejected at attach time.
   */
  readonly closed: boolean;

  /**
   * The drain mode of this attachment.
   */
  readonly mode: DrainMode;

  /**
   * Detaches the consumer. Idempotent. Same as {@link ConsumerHandle.unsubscribe}.
   */
  dispose(): void;

  /**
   * Whether {@link ConsumerHandle.dispose} has been called (or the attach was
   * rejected).
   */
  isDisposed(): boolean;

  /**
   * Asks to drain this attachment in pull mode.
   *
   * @returns `true` if pull mode is now on. Only honoured inside
   * `observer.start()` and only when the observer implements `ready()`.
   */
  requestFusion(): boolean;

  /**
   * Pull mode: removes and returns the oldest queued value, or `undefined`
   * when the queue is empty, the handle was disposed, or the attachment is
   * in push mode.
   */
  poll(): T | undefined;

  /**
   * Pull mode: whether {@link ConsumerHandle.poll} would return `undefined`.
   */
  isEmpty(): boolean;

  /**
   * Pull mode: drops every queued value.
   */
  clear(): void;

  [Symbol.dispose](): void;

  [Symbol.asyncDispose](): Promise<void>;

  readonly [Symbol.toStringTag]: "ConsumerHandle";
}

/**
 * Construction options of an {@link EventSubject}.
 */
export interface EventSubjectOptions {
  /**
   * Slots to preallocate in the internal queue. Not a limit: the queue is
   * unbounded. Must be a positive integer. Defaults to 16.
   */
  capacityHint?: number;

  /**
   * Called exactly once, the first time the subject terminates or its
   * consumer disposes, whichever happens first.
   */
  onTerminate?: (() => void) | null;

  /**
   * `true` (default): values queued before an error are delivered before it.
   * `false`: the error is delivered as soon as it is observed and the queued
   * values are dropped.
   */
  delayError?: boolean;
}

/**
 * Options accepted by `subscribe`.
 */
export interface SubscribeOptions {
  /** Disposes the handle when aborted */
  signal?: AbortSignal;
}

export type * from "./_spec.ts";
