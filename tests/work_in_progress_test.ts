import { test, expect } from "vitest";

import {
  UNARMED,
  arm,
  createWorkInProgress,
  enter,
  isArmed,
  leave,
} from "../work_in_progress.ts";

test("an unarmed counter never grants ownership", () => {
  const wip = createWorkInProgress();

  expect(isArmed(wip)).toBe(false);
  expect(enter(wip)).toBe(false);
  expect(enter(wip)).toBe(false);
  expect(wip.count).toBe(UNARMED);
});

test("only the first request after idle owns the drain", () => {
  const wip = createWorkInProgress();
  arm(wip);

  expect(enter(wip)).toBe(true);
  expect(enter(wip)).toBe(false);
  expect(enter(wip)).toBe(false);
  expect(wip.count).toBe(3);
});

test("leave reports requests that arrived during the pass", () => {
  const wip = createWorkInProgress();
  arm(wip);

  expect(enter(wip)).toBe(true);
  enter(wip);
  enter(wip);

  let missed = leave(wip, 1);
  expect(missed).toBe(2);

  missed = leave(wip, missed);
  expect(missed).toBe(0);
  expect(enter(wip)).toBe(true);
});

test("arming an armed counter keeps its outstanding requests", () => {
  const wip = createWorkInProgress();
  arm(wip);
  enter(wip);

  arm(wip);
  expect(wip.count).toBe(1);
  expect(isArmed(wip)).toBe(true);
});

test("counter overflow is a hard failure", () => {
  const wip = createWorkInProgress();
  arm(wip);
  wip.count = Number.MAX_SAFE_INTEGER;

  expect(() => enter(wip)).toThrow(RangeError);
});
