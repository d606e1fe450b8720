/**
 * SegmentPlanner: Turns gesture onsets into training windows.
 *
 * Each window starts after the reading time and runs for the segment
 * duration, unless the next gesture's onset comes first: the later onset
 * always owns the boundary, so consecutive windows never overlap and every
 * camera shares the same window for a gesture. Windows that end up shorter
 * than the minimum are rejected for all cameras. A rejected later gesture
 * never extends an earlier window.
 */

import type { GestureEvent, PipelineConfig, PlannedSegment, SegmentWindow } from "./types.js";

export type PlannerConfig = Pick<
  PipelineConfig,
  "segmentDurationSeconds" | "readingCutoffSeconds" | "minSegmentDurationSeconds"
>;

/**
 * Slack applied to the minimum-duration comparison. Onsets are absolute epoch
 * seconds, where float spacing is ~2e-7 s, so an exact 3.000 s window can come
 * out as 2.9999998 after subtraction. Logs carry at most microsecond precision.
 */
export const DURATION_EPSILON_SECONDS = 1e-6;

export class SegmentPlanner {
  private readonly config: PlannerConfig;

  constructor(config: PlannerConfig) {
    this.config = config;
  }

  /**
   * Plan one window per event. `events` must already be in onset order
   * (as returned by the gesture log parser).
   */
  plan(events: readonly GestureEvent[]): PlannedSegment[] {
    return events.map((event, i) => ({
      event,
      window: this.planWindow(event, i + 1 < events.length ? events[i + 1] : null),
    }));
  }

  planWindow(event: GestureEvent, next: GestureEvent | null): SegmentWindow {
    const { segmentDurationSeconds, readingCutoffSeconds, minSegmentDurationSeconds } = this.config;

    const requestedStart = event.onsetTimestamp + readingCutoffSeconds;
    const requestedEnd = requestedStart + segmentDurationSeconds;

    let effectiveEnd = requestedEnd;
    let truncated = false;
    if (next !== null && next.onsetTimestamp < requestedEnd) {
      effectiveEnd = Math.min(requestedEnd, next.onsetTimestamp);
      truncated = true;
    }
    const effectiveStart = requestedStart;

    const duration = effectiveEnd - effectiveStart;
    const accepted = duration >= minSegmentDurationSeconds - DURATION_EPSILON_SECONDS;

    return {
      gestureIndex: event.gestureIndex,
      requestedStart,
      requestedEnd,
      effectiveStart,
      effectiveEnd,
      truncated,
      accepted,
    };
  }
}

/** Effective length of a window, never negative. */
export function windowDuration(window: SegmentWindow): number {
  return Math.max(0, window.effectiveEnd - window.effectiveStart);
}
