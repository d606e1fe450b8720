// Labels every kept frame of a camera log with the gesture in progress at
// its timestamp: the latest gesture whose onset is at or before the frame.

import { formatCsv } from "./csv.js";
import type { TimestampIndex } from "./timestamp-index.js";
import type { GestureEvent } from "./types.js";
import { formatIsoTimestamp } from "./utils.js";

export const NO_GESTURE_LABEL = "none";

export interface LabeledFrame {
  frameIndex: number;
  timestamp: number;
  gestureIndex: number | null;
  gestureName: string;
}

/** `events` must be in onset order. Frames before the first onset get `none`. */
export function labelFrames(index: TimestampIndex, events: readonly GestureEvent[]): LabeledFrame[] {
  const labeled: LabeledFrame[] = [];
  let current = -1;

  for (let position = 0; position < index.size; position++) {
    const frame = index.frameAt(position);
    if (!frame) break;

    while (current + 1 < events.length && events[current + 1].onsetTimestamp <= frame.timestamp) {
      current++;
    }
    const event = current >= 0 ? events[current] : null;
    labeled.push({
      frameIndex: frame.frameIndex,
      timestamp: frame.timestamp,
      gestureIndex: event ? event.gestureIndex : null,
      gestureName: event ? event.gestureName : NO_GESTURE_LABEL,
    });
  }
  return labeled;
}

export function formatLabeledFrames(frames: readonly LabeledFrame[]): string {
  return formatCsv(
    ["frame_index", "timestamp", "gesture_index", "gesture_name"],
    frames.map((f) => [
      f.frameIndex,
      formatIsoTimestamp(f.timestamp),
      f.gestureIndex === null ? "" : f.gestureIndex,
      f.gestureName,
    ]),
  );
}
