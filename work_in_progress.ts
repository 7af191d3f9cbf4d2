/**
 * The work-in-progress counter that serializes drain passes.
 *
 * Anyone who needs the consumer side to run calls {@link enter}. Only the
 * caller that moves the counter from `0` to `1` owns the drain and runs it;
 * everyone else has merely recorded "there is more work" and returns at once.
 * When the owner finishes a pass it calls {@link leave} with the number of
 * requests it has accounted for. A non-zero remainder means more requests
 * arrived while it was busy, so it runs another pass instead of returning.
 *
 * ```text
 *   enter() ── count was 0 ──► owner ──► pass ──► leave(missed)
 *      │                                   ▲            │
 *      └─ count was > 0: return            └── != 0 ────┘
 *                                                 == 0 ──► released
 * ```
 *
 * No request is ever lost and no two passes overlap, even when a pass
 * re-enters the subject from inside a consumer callback.
 *
 * @module
 */

/**
 * Sentinel for a counter that has not been armed yet; {@link enter} always
 * refuses ownership in this state.
 */
export const UNARMED = -1;

/**
 * A drain counter. `count` is {@link UNARMED} until {@link arm} is called, and
 * a non-negative number of outstanding drain requests afterwards.
 */
export interface WorkInProgress {
  count: number;
}

/**
 * Creates an unarmed counter.
 */
export function createWorkInProgress(): WorkInProgress {
  return { count: UNARMED };
}

/**
 * Allows drains to run from now on. Arming an armed counter does nothing.
 */
export function arm(wip: WorkInProgress): void {
  if (wip.count === UNARMED) wip.count = 0;
}

/**
 * Whether {@link arm} has been called.
 */
export function isArmed(wip: WorkInProgress): boolean {
  return wip.count !== UNARMED;
}

/**
 * Records a drain request.
 *
 * @returns `true` when the caller now owns the drain and must run it
 * @throws {RangeError} If the counter cannot represent another request
 */
export function enter(wip: WorkInProgress): boolean {
  if (wip.count === UNARMED) return false;
  if (wip.count >= Number.MAX_SAFE_INTEGER) {
    throw new RangeError("Drain counter overflow");
  }
  return wip.count++ === 0;
}

/**
 * Accounts for `missed` requests handled by the pass that just ran.
 *
 * @returns The requests still outstanding; `0` means ownership is released
 */
export function leave(wip: WorkInProgress, missed: number): number {
  wip.count -= missed;
  return wip.count;
}
