import { test, expect, vi, afterEach } from "vitest";

import {
  AlreadyAttachedError,
  InvalidArgumentError,
  SubjectError,
  UndeliverableError,
  isSubjectError,
} from "../error.ts";
import {
  getUndeliverableErrorHandler,
  reportUndeliverable,
  setUndeliverableErrorHandler,
} from "../hooks.ts";

afterEach(() => {
  setUndeliverableErrorHandler(null);
});

// -----------------------------------------------------------------------------
// Error classes
// -----------------------------------------------------------------------------

test("AlreadyAttachedError names the operation and how to fix it", () => {
  const err = new AlreadyAttachedError();

  expect(err).toBeInstanceOf(SubjectError);
  expect(err).toBeInstanceOf(AggregateError);
  expect(err.name).toBe("AlreadyAttachedError");
  expect(err.errors).toEqual([]);
  expect(err.toString()).toBe(
    "AlreadyAttachedError: Only a single consumer may be attached at a time\n" +
    "  in operation: subscribe\n" +
    "  tip: Dispose the current consumer handle before attaching another consumer"
  );
});

test("UndeliverableError keeps the original error as cause and entry", () => {
  const original = new Error("late");
  const err = new UndeliverableError(original, "error");

  expect(err.name).toBe("UndeliverableError");
  expect(err.message).toBe("late");
  expect(err.operation).toBe("error");
  expect(err.cause).toBe(original);
  expect(err.errors).toEqual([original]);
  expect(err.toString()).toBe(
    "UndeliverableError: late\n" +
    "  in operation: error\n" +
    "  with errors:\n" +
    "    1) Error: late"
  );
});

test("UndeliverableError.from wraps non-errors and passes wrapped ones through", () => {
  const wrapped = UndeliverableError.from("text", "next");
  expect(wrapped.message).toBe("text");
  expect(wrapped.cause).toBe("text");
  expect(wrapped.errors[0]).toBeInstanceOf(Error);
  expect(wrapped.errors[0].message).toBe("text");

  expect(UndeliverableError.from(wrapped, "complete")).toBe(wrapped);
});

test("InvalidArgumentError carries its operation", () => {
  const err = new InvalidArgumentError("bad value", { operation: "next" });

  expect(err.name).toBe("InvalidArgumentError");
  expect(err.operation).toBe("next");
  expect(err.tip).toBeUndefined();
  expect(err.toString()).toBe("InvalidArgumentError: bad value\n  in operation: next");
});

test("isSubjectError only accepts subject errors", () => {
  expect(isSubjectError(new AlreadyAttachedError())).toBe(true);
  expect(isSubjectError(new UndeliverableError(new Error("x")))).toBe(true);
  expect(isSubjectError(new Error("x"))).toBe(false);
  expect(isSubjectError("x")).toBe(false);
});

// -----------------------------------------------------------------------------
// Undeliverable-error hook
// -----------------------------------------------------------------------------

test("installing a handler returns the previous one", () => {
  const first = vi.fn();
  const second = vi.fn();

  expect(setUndeliverableErrorHandler(first)).toBeNull();
  expect(setUndeliverableErrorHandler(second)).toBe(first);
  expect(getUndeliverableErrorHandler()).toBe(second);
});

test("reported errors reach the handler wrapped", () => {
  const handler = vi.fn<(err: UndeliverableError) => void>();
  setUndeliverableErrorHandler(handler);
  const original = new Error("lost");

  reportUndeliverable(original, "next");

  expect(handler).toHaveBeenCalledTimes(1);
  const [wrapped] = handler.mock.calls[0];
  expect(wrapped).toBeInstanceOf(UndeliverableError);
  expect(wrapped.operation).toBe("next");
  expect(wrapped.cause).toBe(original);
});

test("without a handler the error is re-thrown from a microtask and not logged", () => {
  const queued = vi.spyOn(globalThis, "queueMicrotask").mockImplementation(() => undefined);
  const logged = vi.spyOn(console, "error").mockImplementation(() => undefined);

  try {
    reportUndeliverable(new Error("lost"), "error");
    expect(queued).toHaveBeenCalledTimes(1);
    const task = queued.mock.calls[0][0];

    expect(() => task()).toThrow(UndeliverableError);
    expect(logged).not.toHaveBeenCalled();
  } finally {
    queued.mockRestore();
    logged.mockRestore();
  }
});

test("a throwing handler has its own error reported to the host", () => {
  const queued = vi.spyOn(globalThis, "queueMicrotask").mockImplementation(() => undefined);
  const logged = vi.spyOn(console, "error").mockImplementation(() => undefined);
  const broken = new Error("handler broke");
  setUndeliverableErrorHandler(() => { throw broken; });

  try {
    reportUndeliverable(new Error("lost"), "next");
    const task = queued.mock.calls[0][0];

    expect(() => task()).toThrow(broken);
    expect(logged).not.toHaveBeenCalled();
  } finally {
    queued.mockRestore();
    logged.mockRestore();
  }
});
