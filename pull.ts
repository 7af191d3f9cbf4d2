// @filename: pull.ts
/**
 * Pull-based consumption of an {@link EventSubject}.
 *
 * `pull()` attaches to the subject as its single consumer in **pull (fused)
 * mode**: instead of the subject calling `next()` for every value, the drain
 * engine only signals `ready()`, and the iterator takes values straight out
 * of the subject's queue when the loop body asks for the next one. No second
 * buffer sits between producer and consumer, so values the loop has not
 * reached yet stay in the subject: if the loop breaks early they are the
 * backlog the subject drops on detach.
 *
 * @module
 */

import type { SubscribeOptions } from "./_types.ts";
import type { EventSubject, Termination } from "./event_subject.ts";

/**
 * Iteration state shared with the observer callbacks.
 * @internal
 */
interface PullState {
  termination: Termination | null;
  wake: (() => void) | null;
}

/**
 * Turns a subject into an async generator.
 *
 * The generator attaches on its first `next()` call. It yields the backlog
 * first, then values as they arrive; it returns when the subject completes
 * and throws the subject's error when it fails (after the pending values
 * unless the subject was created with `delayError: false`). Breaking out of
 * the loop, calling `return()`, or aborting `opts.signal` detaches it.
 *
 * @throws {AlreadyAttachedError} If another consumer is attached
 *
 * @example
 * ```ts
 * const jobs = EventSubject.create<Job>();
 *
 * (async () => {
 *   for await (const job of pull(jobs)) {
 *     await run(job);              // slow consumer: jobs wait in the subject
 *   }
 * })();
 *
 * jobs.next(job1);
 * jobs.next(job2);
 * jobs.complete();
 * ```
 */
export async function* pull<T>(
  subject: EventSubject<T>,
  opts?: SubscribeOptions
): AsyncGenerator<T, void, undefined> {
  const state: PullState = { termination: null, wake: null };
  const wakeUp = () => {
    const wake = state.wake;
    state.wake = null;
    wake?.();
  };

  const handle = subject.subscribe({
    start(h) { h.requestFusion(); },
    ready: wakeUp,
    error(error) {
      state.termination = { kind: "error", error };
      wakeUp();
    },
    complete() {
      state.termination = { kind: "complete" };
      wakeUp();
    },
  }, opts);

  const signal = opts?.signal;
  signal?.addEventListener("abort", wakeUp, { once: true });

  try {
    for (;;) {
      const value = handle.poll();
      if (value !== undefined) {
        yield value;
        continue;
      }

      const termination = state.termination;
      if (termination !== null) {
        if (termination.kind === "error") throw termination.error;
        return;
      }

      if (handle.isDisposed()) return;

      await new Promise<void>(resolve => { state.wake = resolve; });
    }
  } finally {
    signal?.removeEventListener("abort", wakeUp);
    handle.dispose();
  }
}
