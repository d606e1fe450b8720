/**
 * ExperimentScheduler: Drives a recording session through its gesture schedule.
 *
 * Per gesture: `reading` (the participant reads the prompt) then `performing`,
 * with a `gesture_onset` event at the start of `performing`. After every full
 * set of gestures, except at the very end, the session takes a `break`.
 *
 * The scheduler owns no timers. Time only moves when `tick(seconds)` is
 * called, so a session can be suspended or cancelled only between ticks and
 * tests can drive it deterministically. `startTicking` attaches a wall-clock
 * interval for live sessions.
 *
 * Gesture indices in events start at `firstGestureIndex`, so a participant's
 * later session can continue the numbering of an earlier one.
 */

import type { ExperimentPhase, SchedulerEvent } from "./types.js";

export interface SchedulerConfig {
  readingSeconds: number;
  performingSeconds: number;
  gesturesPerSet: number;
  breakSeconds: number;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  readingSeconds: 5,
  performingSeconds: 15,
  gesturesPerSet: 25,
  breakSeconds: 120,
};

/** Remaining time at or below this is treated as elapsed. */
const TIME_EPSILON = 1e-9;

export class ExperimentScheduler {
  readonly gestures: readonly string[];
  private readonly config: SchedulerConfig;
  private readonly indexOffset: number;
  private currentPhase: ExperimentPhase = "idle";
  /** 1-based position in `gestures` of the current or most recently finished gesture; 0 before the first. */
  private index = 0;
  private elapsed = 0;
  private remaining = 0;

  constructor(
    gestures: readonly string[],
    config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
    firstGestureIndex: number = 1,
  ) {
    if (!Number.isInteger(config.gesturesPerSet) || config.gesturesPerSet < 1) {
      throw new RangeError("gesturesPerSet must be a positive integer");
    }
    for (const key of ["readingSeconds", "performingSeconds", "breakSeconds"] as const) {
      if (!(config[key] >= 0)) throw new RangeError(`${key} must be 0 or greater`);
    }
    if (!Number.isInteger(firstGestureIndex) || firstGestureIndex < 1) {
      throw new RangeError("firstGestureIndex must be a positive integer");
    }
    this.gestures = [...gestures];
    this.config = config;
    this.indexOffset = firstGestureIndex - 1;
  }

  get phase(): ExperimentPhase {
    return this.currentPhase;
  }

  /** Gesture index while reading or performing, otherwise null. */
  get gestureIndex(): number | null {
    return this.currentPhase === "reading" || this.currentPhase === "performing" ? this.index + this.indexOffset : null;
  }

  get elapsedSeconds(): number {
    return this.elapsed;
  }

  get remainingSeconds(): number {
    return this.isRunning() ? Math.max(0, this.remaining) : 0;
  }

  get totalSets(): number {
    return Math.ceil(this.gestures.length / this.config.gesturesPerSet);
  }

  /** @throws Error if the session was already started. */
  start(): SchedulerEvent[] {
    if (this.currentPhase !== "idle") {
      throw new Error(`Scheduler already started (phase "${this.currentPhase}")`);
    }
    const events: SchedulerEvent[] = [];
    if (this.gestures.length === 0) {
      this.complete(events);
      return events;
    }
    this.index = 1;
    this.enter("reading", 0, events);
    this.settle(events);
    return events;
  }

  /** Advance the clock. Phases that end within the step are all processed, in order. */
  tick(seconds: number): SchedulerEvent[] {
    if (!(seconds >= 0)) throw new RangeError("tick() needs a non-negative step");
    if (!this.isRunning()) return [];
    const events: SchedulerEvent[] = [];
    this.elapsed += seconds;
    this.remaining -= seconds;
    this.settle(events);
    return events;
  }

  private isRunning(): boolean {
    return this.currentPhase === "reading" || this.currentPhase === "performing" || this.currentPhase === "break";
  }

  private settle(events: SchedulerEvent[]): void {
    while (this.isRunning() && this.remaining <= TIME_EPSILON) {
      // Phase boundary on the session clock; the overshoot carries into the next phase
      const boundary = this.elapsed + this.remaining;
      this.advance(boundary, events);
    }
  }

  private advance(boundary: number, events: SchedulerEvent[]): void {
    switch (this.currentPhase) {
      case "reading":
        this.enter("performing", boundary, events);
        events.push({
          type: "gesture_onset",
          gestureIndex: this.index + this.indexOffset,
          gestureName: this.gestures[this.index - 1],
          elapsedSeconds: boundary,
        });
        return;
      case "performing":
        if (this.index >= this.gestures.length) {
          this.complete(events);
        } else if (this.index % this.config.gesturesPerSet === 0) {
          this.enter("break", boundary, events);
          events.push({
            type: "break_started",
            completedSets: this.index / this.config.gesturesPerSet,
            totalSets: this.totalSets,
          });
        } else {
          this.index++;
          this.enter("reading", boundary, events);
        }
        return;
      case "break":
        this.index++;
        this.enter("reading", boundary, events);
        return;
      default:
        return;
    }
  }

  private enter(phase: "reading" | "performing" | "break", boundary: number, events: SchedulerEvent[]): void {
    const duration =
      phase === "reading"
        ? this.config.readingSeconds
        : phase === "performing"
          ? this.config.performingSeconds
          : this.config.breakSeconds;
    this.currentPhase = phase;
    this.remaining = duration - (this.elapsed - boundary);
    events.push({
      type: "phase_changed",
      phase,
      gestureIndex: phase === "break" ? null : this.index + this.indexOffset,
      remainingSeconds: duration,
    });
  }

  private complete(events: SchedulerEvent[]): void {
    this.currentPhase = "complete";
    this.remaining = 0;
    events.push({ type: "phase_changed", phase: "complete", gestureIndex: null, remainingSeconds: 0 });
    events.push({ type: "completed", gestureCount: this.gestures.length });
  }
}

/**
 * Drive a scheduler from a wall-clock interval until it completes.
 * @returns A function that stops the interval (idempotent).
 */
export function startTicking(
  scheduler: ExperimentScheduler,
  intervalMs: number,
  onEvents: (events: SchedulerEvent[]) => void,
): () => void {
  let timer: ReturnType<typeof setInterval> | null = null;
  const stop = () => {
    if (timer !== null) {
      clearInterval(timer);
      timer = null;
    }
  };

  timer = setInterval(() => {
    const events = scheduler.tick(intervalMs / 1000);
    if (events.length > 0) onEvents(events);
    if (scheduler.phase === "complete") stop();
  }, intervalMs);

  return stop;
}
