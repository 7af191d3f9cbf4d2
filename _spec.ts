// @filename: _spec.ts
import { Symbol } from "./symbol.ts";

/**
 * The minimal contract of anything a consumer can subscribe to.
 *
 * @remarks
 * This is the TC39 Observable protocol: the object returned by
 * `[Symbol.observable]()` that consumers call `.subscribe()` on. An
 * {@link EventSubject} implements it, and it can in turn subscribe itself to
 * any other implementation of it, which makes subjects interoperable with
 * other Observable libraries in both directions.
 *
 * @typeParam T - Type of values delivered to subscribers.
 *
 * @example
 * ```ts
 * const source: ObservableProtocol<number> = {
 *   subscribe(observer) {
 *     observer.next?.(1);
 *     observer.next?.(2);
 *     observer.complete?.();
 *     return { unsubscribe() {} };
 *   }
 * };
 *
 * // Relay the source into a subject
 * source.subscribe(subject);
 * ```
 */
export interface ObservableProtocol<T> {
  /**
   * Subscribes with an observer object.
   *
   * @param observer - Object with callback methods to handle notifications
   * @returns A subscription object for cancellation
   */
  subscribe(observer: SpecObserver<T>): SpecSubscription;

  /**
   * Subscribes with individual callback functions.
   *
   * @param next - Function to handle each value
   * @param error - Optional function to handle the terminal error
   * @param complete - Optional function to handle completion
   * @returns A subscription object for cancellation
   */
  subscribe(
    next: (value: T) => void,
    error?: (error: unknown) => void,
    complete?: () => void
  ): SpecSubscription;
}

/**
 * A cancellable connection between a producer and a consumer.
 *
 * @example
 * ```ts
 * const subscription = source.subscribe({ next: value => console.log(value) });
 *
 * // Later, to cancel:
 * subscription.unsubscribe();
 * ```
 */
export interface SpecSubscription {
  /**
   * Cancels the subscription. Calling it again is a no-op.
   */
  unsubscribe(): void;
}

/**
 * A consumer of notifications.
 *
 * @remarks
 * - `start`: called once, before anything else, with the subscription
 * - `next`: called zero or more times, once per value
 * - `error`: terminal; called at most once
 * - `complete`: terminal; called at most once
 *
 * All methods are optional. An {@link EventSubject} is itself a
 * `SpecObserver`: subscribing it to a source relays everything the source
 * produces into the subject.
 *
 * @typeParam T - Type of values this observer can receive.
 */
export interface SpecObserver<T> {
  /**
   * Called immediately after the subscription is established.
   *
   * @param subscription - The subscription created by this subscribe call
   */
  start?(subscription: SpecSubscription): void;

  /**
   * Receives the next value in the sequence.
   */
  next?(value: T): void;

  /**
   * Receives the terminal error.
   */
  error?(error: unknown): void;

  /**
   * Receives successful completion.
   */
  complete?(): void;
}

/**
 * Anything that can be converted to an Observable through
 * `[Symbol.observable]()`.
 *
 * @typeParam T - Type of values the resulting Observable will emit.
 *
 * @see https://tc39.es/proposal-observable/#observable-interface
 */
export interface SpecObservable<T> {
  /**
   * Returns an object that conforms to the {@link ObservableProtocol}.
   */
  [Symbol.observable](): ObservableProtocol<T>;
}
