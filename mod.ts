/**
 * A single-consumer event relay for TypeScript.
 *
 * Hot streams with at most one active subscriber show up everywhere in UI and
 * state-management code: navigation commands, one-shot toasts, "show this
 * dialog" events. The usual tools get them subtly wrong:
 *
 * - A **latest-value** store (a BehaviorSubject, a signal) drops every event
 *   but the last one.
 * - A **fire-and-forget** emitter loses every event sent while the screen is
 *   being rebuilt and nobody is listening.
 *
 * {@link EventSubject} does neither. It buffers while nobody listens, replays
 * the backlog to the next consumer that attaches, relays live while one is
 * attached, and admits exactly one consumer at a time. Every event reaches
 * exactly one consumer exactly once.
 *
 * ```ts
 * import { EventSubject } from "relay-subject";
 *
 * const navigation = EventSubject.create<string>();
 *
 * navigation.next("/settings");            // nobody listening yet: buffered
 *
 * const handle = navigation.subscribe(route => router.push(route));
 * // router.push("/settings") runs right away
 *
 * handle.dispose();                         // screen torn down
 * navigation.next("/home");                 // buffered again
 * navigation.subscribe(route => router.push(route));
 * // router.push("/home")
 * ```
 *
 * ## What's in the box
 * - {@link EventSubject}: the relay itself; also an observer, so it can be
 *   subscribed to any TC39-style observable source.
 * - {@link pull}: `for await` consumption, backed by the subject's own queue.
 * - {@link setUndeliverableErrorHandler}: where errors with no consumer go.
 * - Error classes: {@link InvalidArgumentError},
 *   {@link AlreadyAttachedError}, {@link UndeliverableError}.
 *
 * **Implementation Notes:**
 * - Fully synchronous delivery; no scheduler, no timers
 * - Re-entrancy safe: consumer callbacks may push, detach, attach or terminate
 * - Unbounded buffer; there is no back-pressure towards producers
 *
 * @module
 */
export * from "./event_subject.ts";
export * from "./pull.ts";
export * from "./error.ts";
export * from "./hooks.ts";

export type * from "./_types.ts";
