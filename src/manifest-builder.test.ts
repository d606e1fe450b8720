import { describe, it, expect } from "vitest";
import {
  ManifestBuilder,
  SUMMARY_COLUMNS,
  acceptedRecord,
  formatTrainingSummary,
  rejectedRecord,
  type RecordContext,
} from "./manifest-builder.js";
import type { GestureEvent, SegmentWindow } from "./types.js";

function context(cameraId: string, gestureIndex: number, onset: number, end: number, name = "wave"): RecordContext {
  const event: GestureEvent = { participantId: "7", gestureIndex, gestureName: name, onsetTimestamp: onset, rowNumber: gestureIndex };
  const window: SegmentWindow = {
    gestureIndex,
    requestedStart: onset + 5,
    requestedEnd: onset + 20,
    effectiveStart: onset + 5,
    effectiveEnd: end,
    truncated: end < onset + 20,
    accepted: end - (onset + 5) >= 3,
  };
  return { participantId: "7", cameraId, event, window, readingTimeExcluded: true };
}

const clip = (filename: string) => ({ filename, filepath: `out/${filename}`, frameCount: 450 });

describe("records", () => {
  it("builds an accepted record from the clip name", () => {
    const record = acceptedRecord(context("1", 1, 100, 120), clip("p7_cam1_seg000_wave.mp4"));
    expect(record).toMatchObject({
      segmentId: "p7_cam1_seg000_wave",
      startTime: 105,
      endTime: 120,
      duration: 15,
      trainingDuration: 15,
      trainingReady: true,
      state: "accepted",
      rejectionReason: null,
    });
  });

  it("keeps the window length on a rejected record but no training time", () => {
    const record = rejectedRecord(context("1", 2, 100, 107), "too_short");
    expect(record).toMatchObject({
      segmentId: "p7_cam1_g2_rejected",
      duration: 2,
      trainingDuration: 0,
      trainingReady: false,
      filename: "",
      filepath: "",
      rejectionReason: "too_short",
    });
  });

  it("clamps an inverted window to zero duration", () => {
    expect(rejectedRecord(context("1", 2, 100, 103), "too_short").duration).toBe(0);
  });
});

describe("ManifestBuilder", () => {
  function sampleManifest(): ManifestBuilder {
    const manifest = new ManifestBuilder("7");
    manifest.append(acceptedRecord(context("1", 1, 100, 120), clip("p7_cam1_seg000_wave.mp4")));
    manifest.append(rejectedRecord(context("1", 2, 120, 127, "point"), "too_short"));
    manifest.append(acceptedRecord(context("2", 1, 100, 120), clip("p7_cam2_seg000_wave.mp4")));
    manifest.append(rejectedRecord(context("2", 2, 120, 127, "point"), "no_frames"));
    return manifest;
  }

  it("freezes appended records", () => {
    const manifest = sampleManifest();
    expect(manifest.size).toBe(4);
    expect(Object.isFrozen(manifest.records[0])).toBe(true);
  });

  it("rejects a second record for the same camera and gesture", () => {
    const manifest = sampleManifest();
    expect(() => manifest.append(rejectedRecord(context("1", 1, 100, 120), "encode_failed"))).toThrow(
      "already has a record for camera 1, gesture 1",
    );
  });

  it("summarises counts, reasons, cameras and training time", () => {
    expect(sampleManifest().statistics()).toEqual({
      totalSegments: 4,
      acceptedSegments: 2,
      rejectedSegments: 2,
      rejectedByReason: { too_short: 1, no_frames: 1, encode_failed: 0 },
      perCamera: { "1": { accepted: 1, rejected: 1 }, "2": { accepted: 1, rejected: 1 } },
      gestureDistribution: { wave: 2 },
      totalTrainingMinutes: 0.5,
    });
  });

  it("renders training_summary.csv in column order", () => {
    const lines = sampleManifest().toCsv().trimEnd().split("\n");
    expect(lines[0]).toBe(SUMMARY_COLUMNS.join(","));
    expect(lines[1]).toBe(
      "7,1,p7_cam1_seg000_wave,p7_cam1_seg000_wave.mp4,out/p7_cam1_seg000_wave.mp4," +
        "1970-01-01T00:01:45.000Z,1970-01-01T00:02:00.000Z,wave,1,1970-01-01T00:01:40.000Z," +
        "15.000,15.000,true,true",
    );
    expect(lines[2]).toBe(
      "7,1,p7_cam1_g2_rejected,,," +
        "1970-01-01T00:02:05.000Z,1970-01-01T00:02:07.000Z,point,2,1970-01-01T00:02:00.000Z," +
        "2.000,0.000,true,false",
    );
    expect(lines).toHaveLength(5);
  });

  it("renders identical text for identical records", () => {
    expect(sampleManifest().toCsv()).toBe(formatTrainingSummary(sampleManifest().records));
  });
});
