import { describe, it, expect, vi, afterEach } from "vitest";
import { ExperimentScheduler, startTicking, type SchedulerConfig } from "./experiment-scheduler.js";
import type { SchedulerEvent } from "./types.js";

const SHORT: SchedulerConfig = { readingSeconds: 1, performingSeconds: 2, gesturesPerSet: 2, breakSeconds: 3 };

describe("ExperimentScheduler", () => {
  it("starts by reading the first gesture", () => {
    const scheduler = new ExperimentScheduler(["wave", "point", "clap"], SHORT);
    expect(scheduler.phase).toBe("idle");
    expect(scheduler.start()).toEqual([{ type: "phase_changed", phase: "reading", gestureIndex: 1, remainingSeconds: 1 }]);
    expect(scheduler.gestureIndex).toBe(1);
    expect(scheduler.remainingSeconds).toBe(1);
    expect(scheduler.totalSets).toBe(2);
  });

  it("walks reading, performing and breaks on the session clock", () => {
    const scheduler = new ExperimentScheduler(["wave", "point", "clap"], SHORT);
    scheduler.start();

    expect(scheduler.tick(1)).toEqual([
      { type: "phase_changed", phase: "performing", gestureIndex: 1, remainingSeconds: 2 },
      { type: "gesture_onset", gestureIndex: 1, gestureName: "wave", elapsedSeconds: 1 },
    ]);

    // Overshoot carries into the next phase
    expect(scheduler.tick(2.5)).toEqual([{ type: "phase_changed", phase: "reading", gestureIndex: 2, remainingSeconds: 1 }]);
    expect(scheduler.remainingSeconds).toBe(0.5);

    expect(scheduler.tick(0.5)).toEqual([
      { type: "phase_changed", phase: "performing", gestureIndex: 2, remainingSeconds: 2 },
      { type: "gesture_onset", gestureIndex: 2, gestureName: "point", elapsedSeconds: 4 },
    ]);

    expect(scheduler.tick(2)).toEqual([
      { type: "phase_changed", phase: "break", gestureIndex: null, remainingSeconds: 3 },
      { type: "break_started", completedSets: 1, totalSets: 2 },
    ]);
    expect(scheduler.gestureIndex).toBeNull();

    expect(scheduler.tick(3)).toEqual([{ type: "phase_changed", phase: "reading", gestureIndex: 3, remainingSeconds: 1 }]);
  });

  it("processes every phase that ends within one long tick", () => {
    const scheduler = new ExperimentScheduler(["wave"], SHORT);
    scheduler.start();
    expect(scheduler.tick(100)).toEqual([
      { type: "phase_changed", phase: "performing", gestureIndex: 1, remainingSeconds: 2 },
      { type: "gesture_onset", gestureIndex: 1, gestureName: "wave", elapsedSeconds: 1 },
      { type: "phase_changed", phase: "complete", gestureIndex: null, remainingSeconds: 0 },
      { type: "completed", gestureCount: 1 },
    ]);
    expect(scheduler.phase).toBe("complete");
    expect(scheduler.tick(1)).toEqual([]);
  });

  it("runs zero-length phases straight through", () => {
    const scheduler = new ExperimentScheduler(["wave", "point"], {
      readingSeconds: 0,
      performingSeconds: 0,
      gesturesPerSet: 1,
      breakSeconds: 0,
    });
    const events = scheduler.start();
    expect(events.map((e) => (e.type === "phase_changed" ? e.phase : e.type))).toEqual([
      "reading",
      "performing",
      "gesture_onset",
      "break",
      "break_started",
      "reading",
      "performing",
      "gesture_onset",
      "complete",
      "completed",
    ]);
  });

  it("completes immediately without gestures", () => {
    const scheduler = new ExperimentScheduler([], SHORT);
    expect(scheduler.start()).toEqual([
      { type: "phase_changed", phase: "complete", gestureIndex: null, remainingSeconds: 0 },
      { type: "completed", gestureCount: 0 },
    ]);
  });

  it("numbers gestures from the given first index", () => {
    const scheduler = new ExperimentScheduler(["wave", "point"], SHORT, 5);
    expect(scheduler.start()).toEqual([{ type: "phase_changed", phase: "reading", gestureIndex: 5, remainingSeconds: 1 }]);
    expect(scheduler.tick(1)[1]).toEqual({ type: "gesture_onset", gestureIndex: 5, gestureName: "wave", elapsedSeconds: 1 });
    expect(scheduler.tick(2)).toEqual([{ type: "phase_changed", phase: "reading", gestureIndex: 6, remainingSeconds: 1 }]);
    expect(scheduler.gestureIndex).toBe(6);
    expect(scheduler.tick(1)[1]).toEqual({ type: "gesture_onset", gestureIndex: 6, gestureName: "point", elapsedSeconds: 4 });
  });

  it("rejects bad input", () => {
    expect(() => new ExperimentScheduler(["wave"], { ...SHORT, gesturesPerSet: 0 })).toThrow(RangeError);
    expect(() => new ExperimentScheduler(["wave"], { ...SHORT, breakSeconds: -1 })).toThrow(RangeError);
    expect(() => new ExperimentScheduler(["wave"], SHORT, 0)).toThrow(RangeError);
    const scheduler = new ExperimentScheduler(["wave"], SHORT);
    scheduler.start();
    expect(() => scheduler.start()).toThrow("Scheduler already started");
    expect(() => scheduler.tick(-1)).toThrow(RangeError);
  });
});

describe("startTicking", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("ticks on an interval and stops once complete", () => {
    vi.useFakeTimers();
    const scheduler = new ExperimentScheduler(["wave"], { ...SHORT, performingSeconds: 1 });
    scheduler.start();
    const batches: SchedulerEvent[][] = [];
    startTicking(scheduler, 500, (events) => batches.push(events));

    vi.advanceTimersByTime(1000);
    expect(batches).toHaveLength(1);
    expect(batches[0][1]).toEqual({ type: "gesture_onset", gestureIndex: 1, gestureName: "wave", elapsedSeconds: 1 });

    vi.advanceTimersByTime(1000);
    expect(batches).toHaveLength(2);
    expect(scheduler.phase).toBe("complete");
    expect(vi.getTimerCount()).toBe(0);
  });

  it("can be stopped early", () => {
    vi.useFakeTimers();
    const scheduler = new ExperimentScheduler(["wave"], SHORT);
    scheduler.start();
    const onEvents = vi.fn();
    const stop = startTicking(scheduler, 500, onEvents);
    stop();
    stop();
    vi.advanceTimersByTime(5000);
    expect(onEvents).not.toHaveBeenCalled();
    expect(scheduler.phase).toBe("reading");
  });
});
