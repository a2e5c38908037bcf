import { test, expect, vi } from "vitest";

import type { BroadcastNotification } from "../_types.ts";

import { BroadcastCenter } from "../center.ts";
import { SequenceError } from "../error.ts";
import { Symbol } from "../symbol.ts";

interface ClockEvents {
  tick: { n: number };
  reset: { reason: string };
}

/**
 * Observer that records every notification it receives.
 */
function createRecorder<P>() {
  const calls: BroadcastNotification<P>[] = [];
  const complete = vi.fn();
  const observer = {
    next(notification: BroadcastNotification<P>) { calls.push(notification); },
    complete,
  };
  return { observer, calls, complete };
}

// -----------------------------------------------------------------------------
// Delivery
// -----------------------------------------------------------------------------

test("post delivers to observers of the same name only", () => {
  const center = new BroadcastCenter<ClockEvents>();
  const ticks = createRecorder<{ n: number }>();
  const resets = createRecorder<{ reason: string }>();

  center.addObserver("tick", null, ticks.observer);
  center.addObserver("reset", null, resets.observer);

  center.post("tick", { n: 1 });

  expect(ticks.calls).toEqual([{ name: "tick", source: null, payload: { n: 1 } }]);
  expect(resets.calls).toEqual([]);
});

test("observers are invoked in registration order", () => {
  const center = new BroadcastCenter<ClockEvents>();
  const order: string[] = [];

  center.addObserver("tick", null, { next: () => order.push("first") });
  center.addObserver("tick", null, { next: () => order.push("second") });
  center.addObserver("tick", null, { next: () => order.push("third") });

  center.post("tick", { n: 1 });

  expect(order).toEqual(["first", "second", "third"]);
});

test("a source filter only matches posts from that exact object", () => {
  const center = new BroadcastCenter<ClockEvents>();
  const kitchen = { room: "kitchen" };
  const hall = { room: "hall" };

  const kitchenOnly = createRecorder<{ n: number }>();
  const anySource = createRecorder<{ n: number }>();
  center.addObserver("tick", kitchen, kitchenOnly.observer);
  center.addObserver("tick", null, anySource.observer);

  center.post("tick", { n: 1 }, hall);
  center.post("tick", { n: 2 }, kitchen);
  center.post("tick", { n: 3 });

  expect(kitchenOnly.calls.map(c => c.payload.n)).toEqual([2]);
  expect(kitchenOnly.calls[0]?.source).toBe(kitchen);
  expect(anySource.calls.map(c => c.payload.n)).toEqual([1, 2, 3]);
});

test("notifications are frozen", () => {
  const center = new BroadcastCenter<ClockEvents>();
  const recorder = createRecorder<{ n: number }>();
  center.addObserver("tick", null, recorder.observer);

  center.post("tick", { n: 1 });

  expect(Object.isFrozen(recorder.calls[0])).toBe(true);
});

// -----------------------------------------------------------------------------
// Removal
// -----------------------------------------------------------------------------

test("removeObserver stops delivery and is idempotent", () => {
  const center = new BroadcastCenter<ClockEvents>();
  const recorder = createRecorder<{ n: number }>();
  const handle = center.addObserver("tick", null, recorder.observer);

  center.post("tick", { n: 1 });
  center.removeObserver(handle);
  center.removeObserver(handle);
  center.post("tick", { n: 2 });

  expect(recorder.calls.map(c => c.payload.n)).toEqual([1]);
  expect(center.observerCount()).toBe(0);
});

test("an observer removed during delivery is not invoked", () => {
  const center = new BroadcastCenter<ClockEvents>();
  const second = createRecorder<{ n: number }>();

  center.addObserver("tick", null, { next: () => center.removeObserver(secondHandle) });
  const secondHandle = center.addObserver("tick", null, second.observer);

  center.post("tick", { n: 1 });

  expect(second.calls).toEqual([]);
});

test("an observer added during delivery waits for the next post", () => {
  const center = new BroadcastCenter<ClockEvents>();
  const late = createRecorder<{ n: number }>();

  center.addObserver("tick", null, {
    next: ({ payload }) => {
      if (payload.n === 1) center.addObserver("tick", null, late.observer);
    },
  });

  center.post("tick", { n: 1 });
  center.post("tick", { n: 2 });

  expect(late.calls.map(c => c.payload.n)).toEqual([2]);
});

test("observerCount counts all or per event name", () => {
  const center = new BroadcastCenter<ClockEvents>();
  center.addObserver("tick", null, { next() {} });
  center.addObserver("tick", null, { next() {} });
  center.addObserver("reset", null, { next() {} });

  expect(center.observerCount()).toBe(3);
  expect(center.observerCount("tick")).toBe(2);
  expect(center.observerCount("reset")).toBe(1);
});

test("a throwing observer is reported without stopping delivery", () => {
  const queued: Array<() => void> = [];
  const spy = vi.spyOn(globalThis, "queueMicrotask").mockImplementation(callback => {
    queued.push(callback);
  });

  try {
    const center = new BroadcastCenter<ClockEvents>();
    const after = createRecorder<{ n: number }>();
    center.addObserver("tick", null, { next: () => { throw new Error("observer failed"); } });
    center.addObserver("tick", null, after.observer);

    center.post("tick", { n: 1 });

    expect(after.calls.map(c => c.payload.n)).toEqual([1]);
    expect(queued).toHaveLength(1);
    expect(() => queued[0]?.()).toThrow("observer failed");
  } finally {
    spy.mockRestore();
  }
});

// -----------------------------------------------------------------------------
// Closing
// -----------------------------------------------------------------------------

test("close completes every observer once and drops registrations", () => {
  const center = new BroadcastCenter<ClockEvents>();
  const ticks = createRecorder<{ n: number }>();
  const resets = createRecorder<{ reason: string }>();
  center.addObserver("tick", null, ticks.observer);
  center.addObserver("reset", null, resets.observer);

  center.close();
  center.close();

  expect(center.closed).toBe(true);
  expect(ticks.complete).toHaveBeenCalledTimes(1);
  expect(resets.complete).toHaveBeenCalledTimes(1);
  expect(center.observerCount()).toBe(0);
});

test("posting to a closed center does nothing", () => {
  const center = new BroadcastCenter<ClockEvents>();
  const recorder = createRecorder<{ n: number }>();
  center.addObserver("tick", null, recorder.observer);

  center.close();
  center.post("tick", { n: 1 });

  expect(recorder.calls).toEqual([]);
});

test("observing a closed center throws a SequenceError", () => {
  const center = new BroadcastCenter<ClockEvents>();
  center.close();

  let caught: unknown;
  try {
    center.addObserver("tick", null, { next() {} });
  } catch (err) {
    caught = err;
  }

  expect(caught).toBeInstanceOf(SequenceError);
  if (!(caught instanceof SequenceError)) return;
  expect(caught.message).toBe('Cannot observe "tick": the broadcast center is closed');
  expect(caught.operation).toBe("center:addObserver");
  expect(caught.event).toBe("tick");
});

test("Symbol.dispose closes the center", () => {
  const center = new BroadcastCenter<ClockEvents>();
  const recorder = createRecorder<{ n: number }>();
  center.addObserver("tick", null, recorder.observer);

  center[Symbol.dispose]();

  expect(center.closed).toBe(true);
  expect(recorder.complete).toHaveBeenCalledTimes(1);
});

test("center reports its string tag", () => {
  expect(Object.prototype.toString.call(new BroadcastCenter())).toBe("[object BroadcastCenter]");
});
