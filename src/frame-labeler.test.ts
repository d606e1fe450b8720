import { describe, it, expect } from "vitest";
import { formatLabeledFrames, labelFrames } from "./frame-labeler.js";
import { TimestampIndex } from "./timestamp-index.js";
import type { GestureEvent } from "./types.js";

const index = TimestampIndex.fromRows(
  "1",
  ["99", "100", "104.5", "110", "111"].map((timestamp, i) => ({ frameIndex: String(i), timestamp })),
);

const events: GestureEvent[] = [
  { participantId: "7", gestureIndex: 1, gestureName: "wave", onsetTimestamp: 100, rowNumber: 1 },
  { participantId: "7", gestureIndex: 2, gestureName: "point", onsetTimestamp: 110, rowNumber: 2 },
];

describe("labelFrames", () => {
  it("labels each frame with the latest onset at or before it", () => {
    expect(labelFrames(index, events).map((f) => [f.frameIndex, f.gestureIndex, f.gestureName])).toEqual([
      [0, null, "none"],
      [1, 1, "wave"],
      [2, 1, "wave"],
      [3, 2, "point"],
      [4, 2, "point"],
    ]);
  });

  it("labels everything none without gestures", () => {
    expect(labelFrames(index, []).every((f) => f.gestureName === "none")).toBe(true);
  });
});

describe("formatLabeledFrames", () => {
  it("renders ISO timestamps and leaves the index empty before the first gesture", () => {
    const csv = formatLabeledFrames(labelFrames(index, events).slice(0, 2));
    expect(csv).toBe(
      "frame_index,timestamp,gesture_index,gesture_name\n" +
        "0,1970-01-01T00:01:39.000Z,,none\n" +
        "1,1970-01-01T00:01:40.000Z,1,wave\n",
    );
  });
});
