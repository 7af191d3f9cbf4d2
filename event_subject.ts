// @filename: event_subject.ts
/**
 * A hot event relay with exactly one consumer at a time.
 *
 * Producers call `next()` from anywhere, as often as they like. While nobody
 * is listening the values are buffered; the moment a consumer attaches it gets
 * the backlog, in order, and from then on every value is relayed to it live.
 * When that consumer detaches the slot opens up for the next one. Unlike a
 * "latest value" store nothing is dropped, and unlike a plain event emitter
 * nothing is lost while nobody listens: every value reaches exactly one
 * consumer exactly once.
 *
 * ## Lifecycle
 * ```text
 *                 subscribe()                      dispose()
 *   [ empty ] ─────────────────► [ attached ] ──────────────────► [ empty ]
 *       ▲  next(): buffer           │  next(): relay        backlog dropped
 *       │                           │
 *       │     error()/complete()    ▼
 *       └──────────────────── terminal delivered, slot emptied
 * ```
 * A consumer attaching after termination receives whatever is still buffered
 * and then the same terminal signal.
 *
 * ## Error policy
 * - `delayError: true` (default): `error(e)` is delivered after every value
 *   that was queued before it.
 * - `delayError: false`: `error(e)` is delivered as soon as the drain sees
 *   it; still-queued values are dropped.
 * - A second `error()`, or an exception thrown by a consumer callback, goes
 *   to the undeliverable-error hook (see `hooks.ts`). Ingestion calls never
 *   throw except for invalid arguments.
 *
 * ## Re-entrancy
 * Consumer callbacks may push, dispose, attach a new consumer or terminate the
 * subject. All of that funnels through the work-in-progress counter: only one
 * drain runs at a time, and a request made during a drain makes the running
 * drain loop once more instead of recursing.
 *
 * @example
 * ```ts
 * const subject = EventSubject.create<number>();
 *
 * const a = subject.subscribe(v => console.log('A', v));
 * subject.subscribe({ error: e => console.log('B rejected:', e.name) });
 * // B rejected: AlreadyAttachedError
 *
 * subject.next(1);          // A 1
 * a.dispose();
 *
 * subject.next(2);          // buffered
 * subject.next(3);          // buffered
 *
 * subject.subscribe({
 *   next: v => console.log('C', v),      // C 2, C 3
 *   complete: () => console.log('C done'),
 * });
 * subject.complete();       // C done
 * ```
 *
 * @module
 */

import type {
  ConsumerHandle,
  DrainMode,
  EventSubjectOptions,
  ObservableProtocol,
  Observer,
  SpecObservable,
  SpecSubscription,
  SubscribeOptions,
} from "./_types.ts";

import { AlreadyAttachedError, InvalidArgumentError } from "./error.ts";
import { reportUndeliverable } from "./hooks.ts";
import { pull } from "./pull.ts";
import {
  DEFAULT_CAPACITY_HINT,
  clear,
  createQueue,
  dequeue,
  discard,
  enqueue,
  getSize,
  isEmpty,
  type Queue,
} from "./queue.ts";
import { Symbol } from "./symbol.ts";
import { arm, createWorkInProgress, enter, leave } from "./work_in_progress.ts";

/**
 * How a subject ended. The error travels inside the same object that marks
 * the subject as terminated, so it can never be observed half-written.
 */
export type Termination =
  | { readonly kind: "complete" }
  | { readonly kind: "error"; readonly error: unknown };

/**
 * The surface a handle needs from the subject that created it.
 * @internal
 */
interface HandleOwner<T> {
  detach(handle: EventSubjectHandle<T>): void;
  poll(): T | undefined;
  isEmpty(): boolean;
  clear(): void;
}

/**
 * The occupant of the consumer slot.
 * @internal
 */
interface Attachment<T> {
  readonly observer: Observer<T>;
  readonly handle: EventSubjectHandle<T>;
}

/**
 * The {@link ConsumerHandle} of one attachment.
 *
 * Beyond the public surface it tracks the fusion negotiation window (the
 * duration of `observer.start()`), and whether the attachment ended by
 * disposal or by receiving its terminal signal.
 */
export class EventSubjectHandle<T> implements ConsumerHandle<T> {
  readonly #owner: HandleOwner<T>;
  readonly #observer: Observer<T>;

  #disposed: boolean;
  #terminated = false;
  #negotiating = false;
  #mode: DrainMode = "push";
  #removeAbortHandler: (() => void) | null = null;

  /**
   * @param owner - The subject side of the attachment
   * @param observer - The consumer this handle belongs to
   * @param rejected - Creates a handle that is disposed from the start
   */
  constructor(owner: HandleOwner<T>, observer: Observer<T>, rejected = false) {
    this.#owner = owner;
    this.#observer = observer;
    this.#disposed = rejected;
  }

  get closed(): boolean {
    return this.#disposed || this.#terminated;
  }

  get mode(): DrainMode {
    return this.#mode;
  }

  /**
   * Whether `observer.start()` is still running. The drain engine skips an
   * attachment in this state; its mode is not settled yet.
   * @internal
   */
  get negotiating(): boolean {
    return this.#negotiating;
  }

  dispose(): void {
    if (this.#disposed) return;
    this.#disposed = true;
    this.#unwatch();
    this.#owner.detach(this);
  }

  unsubscribe(): void {
    this.dispose();
  }

  isDisposed(): boolean {
    return this.#disposed;
  }

  requestFusion(): boolean {
    if (!this.#negotiating || this.#disposed) return false;
    if (typeof this.#observer.ready !== "function") return false;
    this.#mode = "pull";
    return true;
  }

  poll(): T | undefined {
    if (this.#disposed || this.#mode !== "pull") return undefined;
    return this.#owner.poll();
  }

  isEmpty(): boolean {
    if (this.#disposed || this.#mode !== "pull") return true;
    return this.#owner.isEmpty();
  }

  clear(): void {
    if (this.#disposed || this.#mode !== "pull") return;
    this.#owner.clear();
  }

  /**
   * Runs `observer.start(handle)` with the fusion window open. A throwing
   * `start` is reported and the handle disposed.
   * @internal
   */
  open(): void {
    this.#negotiating = true;
    try {
      this.#observer.start?.(this);
    } catch (err) {
      this.#negotiating = false;
      reportUndeliverable(err, "start");
      this.dispose();
    } finally {
      this.#negotiating = false;
    }
  }

  /**
   * Disposes the handle when `signal` aborts.
   * @internal
   */
  watch(signal?: AbortSignal): void {
    if (!signal || this.closed) return;
    if (signal.aborted) {
      this.dispose();
      return;
    }

    const onAbort = () => this.dispose();
    signal.addEventListener("abort", onAbort, { once: true });
    this.#removeAbortHandler = () => signal.removeEventListener("abort", onAbort);
  }

  /**
   * Marks the attachment as having received its terminal signal.
   * @internal
   */
  terminate(): void {
    this.#terminated = true;
    this.#unwatch();
  }

  [Symbol.dispose](): void {
    this.dispose();
  }

  [Symbol.asyncDispose](): Promise<void> {
    return Promise.resolve(this.dispose());
  }

  get [Symbol.toStringTag](): "ConsumerHandle" { return "ConsumerHandle" as const; }

  #unwatch(): void {
    const remove = this.#removeAbortHandler;
    this.#removeAbortHandler = null;
    remove?.();
  }
}

/**
 * A subject that buffers while no consumer is attached, replays the backlog to
 * the next consumer, and relays live while one is attached.
 *
 * @typeParam T - Type of the values relayed. `null` and `undefined` are
 * rejected at runtime.
 */
export class EventSubject<T>
  implements Observer<T>, ObservableProtocol<T>, SpecObservable<T>, AsyncIterable<T>, Disposable, AsyncDisposable {
  /** Values waiting for a consumer */
  readonly #queue: Queue<T>;
  /** Serializes drain passes */
  readonly #wip = createWorkInProgress();
  /** Deliver queued values before an error */
  readonly #delayError: boolean;
  /** Single-shot termination callback, taken by whoever fires it first */
  #onTerminate: (() => void) | null;
  /** Set at most once */
  #termination: Termination | null = null;
  /** The consumer slot */
  #current: Attachment<T> | null = null;
  /** A detach waiting for the next drain pass to settle it */
  #detachPending = false;
  /** Backlog size when the pending detach happened */
  #discardCount = 0;

  readonly #owner: HandleOwner<T>;

  /**
   * Creates an empty subject with the default options.
   */
  static create<T>(): EventSubject<T>;
  /**
   * Creates an empty subject whose queue starts with `capacityHint` slots.
   *
   * @throws {InvalidArgumentError} If `capacityHint` is not a positive integer
   */
  static create<T>(capacityHint: number): EventSubject<T>;
  /**
   * Creates an empty subject with the given error policy.
   */
  static create<T>(delayError: boolean): EventSubject<T>;
  /**
   * Creates an empty subject with a termination callback, called exactly
   * once when the subject terminates or its consumer disposes.
   *
   * @throws {InvalidArgumentError} If `capacityHint` is not a positive
   * integer, or `onTerminate` is not a function
   */
  static create<T>(capacityHint: number, onTerminate: () => void, delayError?: boolean): EventSubject<T>;
  /**
   * Creates an empty subject from an options object.
   */
  static create<T>(options: EventSubjectOptions): EventSubject<T>;
  static create<T>(
    hintOrOptions?: number | boolean | EventSubjectOptions,
    onTerminate?: () => void,
    delayError?: boolean
  ): EventSubject<T> {
    if (typeof hintOrOptions === "boolean") {
      return new EventSubject<T>({ delayError: hintOrOptions });
    }

    if (typeof hintOrOptions === "number") {
      if (arguments.length > 1 && typeof onTerminate !== "function") {
        throw new InvalidArgumentError("onTerminate is required", {
          operation: "create",
          tip: "Pass a callback, or use create(capacityHint) when no callback is needed",
        });
      }
      return new EventSubject<T>({ capacityHint: hintOrOptions, onTerminate, delayError });
    }

    return new EventSubject<T>(hintOrOptions);
  }

  /**
   * @throws {InvalidArgumentError} If an option has an unusable value
   */
  constructor(options: EventSubjectOptions = {}) {
    const {
      capacityHint = DEFAULT_CAPACITY_HINT,
      onTerminate = null,
      delayError = true,
    } = options;

    if (!Number.isInteger(capacityHint) || capacityHint <= 0) {
      throw new InvalidArgumentError(`capacityHint > 0 required but it was ${capacityHint}`, {
        operation: "create",
        tip: "The hint only sizes the first allocation; the queue grows as needed",
      });
    }
    if (onTerminate !== null && typeof onTerminate !== "function") {
      throw new InvalidArgumentError("onTerminate must be a function", { operation: "create" });
    }
    if (typeof delayError !== "boolean") {
      throw new InvalidArgumentError("delayError must be a boolean", { operation: "create" });
    }

    this.#queue = createQueue<T>(capacityHint);
    this.#onTerminate = onTerminate;
    this.#delayError = delayError;
    this.#owner = {
      detach: handle => this.#detach(handle),
      poll: () => dequeue(this.#queue),
      isEmpty: () => isEmpty(this.#queue),
      clear: () => clear(this.#queue),
    };
  }

  //////////////////////////
  // Producer side        //
  //////////////////////////

  /**
   * Upstream hook: when the subject is subscribed to a source, a subscription
   * handed over after the subject terminated is cancelled right away.
   */
  start(subscription: SpecSubscription): void {
    if (this.#termination !== null) {
      subscription.unsubscribe();
    }
  }

  /**
   * Queues a value for the consumer. Ignored once the subject terminated.
   *
   * @throws {InvalidArgumentError} If `value` is null or undefined
   */
  next(value: T): void {
    if (value === null || value === undefined) {
      throw new InvalidArgumentError("next called with a null or undefined value", {
        operation: "next",
        tip: "Wrap optional payloads in an object instead of sending null",
      });
    }
    if (this.#termination !== null) return;

    enqueue(this.#queue, value);
    this.#drain();
  }

  /**
   * Terminates the subject with an error. After termination the error is
   * reported to the undeliverable-error hook instead.
   *
   * @throws {InvalidArgumentError} If `error` is null or undefined
   */
  error(error: unknown): void {
    if (error === null || error === undefined) {
      throw new InvalidArgumentError("error called with a null or undefined error", {
        operation: "error",
      });
    }
    if (this.#termination !== null) {
      reportUndeliverable(error, "error");
      return;
    }

    this.#termination = { kind: "error", error };
    this.#takeTerminate();
    this.#drain();
  }

  /**
   * Terminates the subject normally. Ignored once the subject terminated.
   */
  complete(): void {
    if (this.#termination !== null) return;

    this.#termination = { kind: "complete" };
    this.#takeTerminate();
    this.#drain();
  }

  //////////////////////////
  // Consumer side        //
  //////////////////////////

  /**
   * Attaches an observer as the single consumer.
   *
   * When another consumer is attached, this observer gets `start(handle)`
   * with a closed handle and then `error(AlreadyAttachedError)`; nothing is
   * thrown here.
   *
   * @throws {InvalidArgumentError} If the observer is not an object or one of
   * its callbacks is not a function
   */
  subscribe(observer: Observer<T>, opts?: SubscribeOptions): ConsumerHandle<T>;
  /**
   * Attaches callbacks as the single consumer.
   */
  subscribe(
    next: (value: T) => void,
    error?: (error: unknown) => void,
    complete?: () => void,
    opts?: SubscribeOptions
  ): ConsumerHandle<T>;
  subscribe(
    observerOrNext: Observer<T> | ((value: T) => void),
    errorOrOpts?: ((error: unknown) => void) | SubscribeOptions,
    complete?: () => void,
    _opts?: SubscribeOptions
  ): ConsumerHandle<T> {
    const observer: Observer<T> = typeof observerOrNext === "function"
      ? {
        next: observerOrNext,
        error: typeof errorOrOpts === "function" ? errorOrOpts : undefined,
        complete,
      }
      : observerOrNext;
    const opts = typeof observerOrNext === "function"
      ? _opts
      : typeof errorOrOpts === "function" ? undefined : errorOrOpts;

    validateObserver(observer);

    if (this.#current !== null) {
      return this.#reject(observer);
    }

    // The previous consumer's backlog must be gone before the new one can
    // poll; its drain loop stops at its closed handle
    this.#settleDetach();

    // Admission: the only place the slot goes from empty to occupied
    const handle = new EventSubjectHandle<T>(this.#owner, observer);
    this.#current = { observer, handle };
    arm(this.#wip);

    handle.open();
    handle.watch(opts?.signal);

    this.#drain();
    return handle;
  }

  /**
   * Iterates the subject in pull mode; see {@link pull}.
   */
  pull(opts?: SubscribeOptions): AsyncGenerator<T, void, undefined> {
    return pull(this, opts);
  }

  /**
   * Enables `for await ... of subject`.
   */
  async *[Symbol.asyncIterator](): AsyncIterator<T> { yield* pull(this); }

  /**
   * Returns this subject (Observable interop).
   */
  [Symbol.observable](): EventSubject<T> { return this; }

  //////////////////////////
  // Introspection        //
  //////////////////////////

  /** Whether a consumer is attached right now. */
  hasConsumer(): boolean {
    return this.#current !== null;
  }

  /** Whether the subject terminated with an error. */
  hasError(): boolean {
    return this.#termination?.kind === "error";
  }

  /** Whether the subject completed normally. */
  hasComplete(): boolean {
    return this.#termination?.kind === "complete";
  }

  /** The terminal error, or `undefined` if there is none (yet). */
  getError(): unknown {
    const termination = this.#termination;
    return termination?.kind === "error" ? termination.error : undefined;
  }

  /**
   * Synchronous disposal (for `using`): completes the subject.
   */
  [Symbol.dispose](): void {
    this.complete();
  }

  /**
   * Asynchronous disposal (for `await using`): completes the subject.
   */
  async [Symbol.asyncDispose](): Promise<void> {
    return await this.complete();
  }

  get [Symbol.toStringTag](): "EventSubject" { return "EventSubject" as const; }

  //////////////////////////
  // Drain engine         //
  //////////////////////////

  /**
   * Requests a drain pass and runs it if nobody else is.
   */
  #drain(): void {
    if (!enter(this.#wip)) return;

    let missed = 1;
    for (;;) {
      this.#settleDetach();

      const attachment = this.#current;
      if (attachment !== null && !attachment.handle.negotiating) {
        if (attachment.handle.mode === "pull") {
          this.#drainPull(attachment);
        } else {
          this.#drainPush(attachment);
        }
      }

      missed = leave(this.#wip, missed);
      if (missed === 0) return;
    }
  }

  /**
   * Dequeues and delivers values until the queue is empty, the consumer goes
   * away, or a terminal signal is delivered.
   */
  #drainPush(attachment: Attachment<T>): void {
    const { observer, handle } = attachment;
    const failFast = !this.#delayError;
    let canBeError = true;

    for (;;) {
      // disposed from a callback; its own drain request settles it
      if (handle.closed) return;

      const termination = this.#termination;
      if (termination !== null && failFast && canBeError) {
        if (termination.kind === "error") {
          this.#failFast(attachment, termination);
          return;
        }
        canBeError = false;
      }

      const value = dequeue(this.#queue);
      if (value === undefined) {
        if (termination !== null) {
          this.#deliverTerminal(attachment, termination);
        }
        return;
      }

      try {
        observer.next?.(value);
      } catch (err) {
        reportUndeliverable(err, "next");
      }
    }
  }

  /**
   * Wakes a pull-mode consumer; it dequeues through its handle.
   */
  #drainPull(attachment: Attachment<T>): void {
    const { observer, handle } = attachment;

    const termination = this.#termination;
    if (termination !== null && !this.#delayError && termination.kind === "error") {
      this.#failFast(attachment, termination);
      return;
    }

    try {
      observer.ready?.();
    } catch (err) {
      reportUndeliverable(err, "ready");
    }

    if (termination !== null && !handle.closed) {
      this.#deliverTerminal(attachment, termination);
    }
  }

  /**
   * Drops the backlog and delivers the error ahead of it.
   */
  #failFast(attachment: Attachment<T>, termination: Termination): void {
    clear(this.#queue);
    this.#deliverTerminal(attachment, termination);
  }

  /**
   * Empties the slot and delivers the terminal signal. The attachment gets it
   * at most once: its handle is closed before the callback runs.
   */
  #deliverTerminal(attachment: Attachment<T>, termination: Termination): void {
    const { observer, handle } = attachment;
    if (this.#current === attachment) this.#current = null;
    handle.terminate();

    if (termination.kind === "error") {
      if (typeof observer.error !== "function") {
        reportUndeliverable(termination.error, "error");
        return;
      }
      try {
        observer.error(termination.error);
      } catch (err) {
        reportUndeliverable(err, "error");
      }
      return;
    }

    try {
      observer.complete?.();
    } catch (err) {
      reportUndeliverable(err, "complete");
    }
  }

  /**
   * Applies a detach recorded by {@link EventSubject.#detach}: drops the
   * backlog the consumer left behind and fires the termination callback.
   * Runs at the start of every drain pass and before every admission.
   */
  #settleDetach(): void {
    if (!this.#detachPending) return;
    this.#detachPending = false;

    discard(this.#queue, this.#discardCount);
    this.#discardCount = 0;
    this.#takeTerminate();
  }

  /**
   * Called by a handle on its first `dispose()`. Only the current attachment
   * can detach; a rejected or already-terminated handle is ignored.
   */
  #detach(handle: EventSubjectHandle<T>): void {
    const current = this.#current;
    if (current === null || current.handle !== handle) return;

    this.#current = null;
    this.#discardCount = getSize(this.#queue);
    this.#detachPending = true;
    this.#drain();
  }

  /**
   * Hands a closed handle and an AlreadyAttachedError to a consumer that
   * cannot be admitted.
   */
  #reject(observer: Observer<T>): ConsumerHandle<T> {
    const handle = new EventSubjectHandle<T>(this.#owner, observer, true);
    try {
      observer.start?.(handle);
    } catch (err) {
      reportUndeliverable(err, "start");
    }

    const error = new AlreadyAttachedError();
    if (typeof observer.error !== "function") {
      reportUndeliverable(error, "subscribe");
      return handle;
    }

    try {
      observer.error(error);
    } catch (err) {
      reportUndeliverable(err, "error");
    }
    return handle;
  }

  /**
   * Runs the termination callback if nobody has yet.
   */
  #takeTerminate(): void {
    const onTerminate = this.#onTerminate;
    if (onTerminate === null) return;
    this.#onTerminate = null;

    try {
      onTerminate();
    } catch (err) {
      reportUndeliverable(err, "onTerminate");
    }
  }
}

/**
 * Creates an {@link EventSubject}; shorthand for `new EventSubject(options)`.
 *
 * @example
 * ```ts
 * const clicks = createEventSubject<MouseEvent>({ delayError: false });
 * ```
 */
export function createEventSubject<T>(options?: EventSubjectOptions): EventSubject<T> {
  return new EventSubject<T>(options);
}

/**
 * Observer callbacks should be functions if they exist.
 * @internal
 */
function validateObserver<T>(observer: Observer<T>): void {
  if (observer === null || typeof observer !== "object") {
    throw new InvalidArgumentError("Observer must be an object", { operation: "subscribe" });
  }

  for (const key of ["start", "next", "error", "complete", "ready"] as const) {
    const callback = observer[key];
    if (callback !== undefined && typeof callback !== "function") {
      throw new InvalidArgumentError(`Observer.${key} must be a function`, { operation: "subscribe" });
    }
  }
}
