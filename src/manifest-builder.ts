/**
 * ManifestBuilder: The per-participant table of produced and rejected segments.
 *
 * Append-only: one frozen record per (camera, gesture) pair, appended by a
 * single writer. Text is rendered only when the summary is exported, so a
 * retried export always starts from the complete record list.
 */

import { formatCsv } from "./csv.js";
import { formatIsoTimestamp, formatSeconds, roundMetric } from "./utils.js";
import {
  SegmentState,
  type ManifestStatistics,
  type RejectionReason,
  type SegmentRecord,
  type SegmentWindow,
  type GestureEvent,
} from "./types.js";

export const SUMMARY_COLUMNS = [
  "participant_id",
  "camera_id",
  "segment_id",
  "filename",
  "filepath",
  "start_time",
  "end_time",
  "gesture_name",
  "gesture_index",
  "gesture_time",
  "duration_seconds",
  "training_duration",
  "reading_time_excluded",
  "training_ready",
] as const;

export interface RecordContext {
  participantId: string;
  cameraId: string;
  event: GestureEvent;
  window: SegmentWindow;
  readingTimeExcluded: boolean;
}

function baseRecord(ctx: RecordContext) {
  const duration = Math.max(0, ctx.window.effectiveEnd - ctx.window.effectiveStart);
  return {
    participantId: ctx.participantId,
    cameraId: ctx.cameraId,
    gestureName: ctx.event.gestureName,
    gestureIndex: ctx.event.gestureIndex,
    gestureTime: ctx.event.onsetTimestamp,
    startTime: ctx.window.effectiveStart,
    endTime: ctx.window.effectiveEnd,
    duration,
    readingTimeExcluded: ctx.readingTimeExcluded,
  };
}

export function acceptedRecord(
  ctx: RecordContext,
  clip: { filename: string; filepath: string; frameCount: number },
): SegmentRecord {
  const base = baseRecord(ctx);
  return {
    ...base,
    segmentId: clip.filename.replace(/\.[^.]+$/, ""),
    trainingDuration: base.duration,
    trainingReady: true,
    filename: clip.filename,
    filepath: clip.filepath,
    state: SegmentState.ACCEPTED,
    rejectionReason: null,
    frameCount: clip.frameCount,
  };
}

/**
 * A rejected segment keeps its window length in `duration` so the reason is
 * legible; it contributes nothing to training time.
 */
export function rejectedRecord(ctx: RecordContext, reason: RejectionReason): SegmentRecord {
  return {
    ...baseRecord(ctx),
    segmentId: `p${ctx.participantId}_cam${ctx.cameraId}_g${ctx.event.gestureIndex}_rejected`,
    trainingDuration: 0,
    trainingReady: false,
    filename: "",
    filepath: "",
    state: SegmentState.REJECTED,
    rejectionReason: reason,
    frameCount: 0,
  };
}

export class ManifestBuilder {
  readonly participantId: string;
  private readonly entries: SegmentRecord[] = [];
  private readonly keys = new Set<string>();

  constructor(participantId: string) {
    this.participantId = participantId;
  }

  /** @throws Error when the (camera, gesture) pair already has a record. */
  append(record: SegmentRecord): void {
    const key = `${record.cameraId}\u0000${record.gestureIndex}`;
    if (this.keys.has(key)) {
      throw new Error(
        `Manifest already has a record for camera ${record.cameraId}, gesture ${record.gestureIndex}`,
      );
    }
    this.keys.add(key);
    this.entries.push(Object.freeze({ ...record }));
  }

  get records(): readonly SegmentRecord[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  statistics(): ManifestStatistics {
    const rejectedByReason: Record<RejectionReason, number> = {
      too_short: 0,
      no_frames: 0,
      encode_failed: 0,
    };
    const perCamera: ManifestStatistics["perCamera"] = {};
    const gestureDistribution: Record<string, number> = {};
    let accepted = 0;
    let trainingSeconds = 0;

    for (const r of this.entries) {
      const cam = (perCamera[r.cameraId] ??= { accepted: 0, rejected: 0 });
      if (r.trainingReady) {
        accepted++;
        cam.accepted++;
        trainingSeconds += r.trainingDuration;
        gestureDistribution[r.gestureName] = (gestureDistribution[r.gestureName] ?? 0) + 1;
      } else {
        cam.rejected++;
        if (r.rejectionReason) rejectedByReason[r.rejectionReason]++;
      }
    }

    return {
      totalSegments: this.entries.length,
      acceptedSegments: accepted,
      rejectedSegments: this.entries.length - accepted,
      rejectedByReason,
      perCamera,
      gestureDistribution,
      totalTrainingMinutes: roundMetric(trainingSeconds / 60),
    };
  }

  /** Render `training_summary.csv`. */
  toCsv(): string {
    return formatTrainingSummary(this.entries);
  }
}

export function formatTrainingSummary(records: readonly SegmentRecord[]): string {
  return formatCsv(
    SUMMARY_COLUMNS,
    records.map((r) => [
      r.participantId,
      r.cameraId,
      r.segmentId,
      r.filename,
      r.filepath,
      formatIsoTimestamp(r.startTime),
      formatIsoTimestamp(r.endTime),
      r.gestureName,
      r.gestureIndex,
      formatIsoTimestamp(r.gestureTime),
      formatSeconds(r.duration),
      formatSeconds(r.trainingDuration),
      r.readingTimeExcluded,
      r.trainingReady,
    ]),
  );
}
