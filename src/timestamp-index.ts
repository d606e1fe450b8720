/**
 * Per-camera index from frame position to capture timestamp.
 *
 * Rows that break monotonicity are dropped while the index is built and kept
 * only as diagnostics; the cleaned arrays are strictly increasing in both frame
 * index and timestamp, which is what the window lookups rely on.
 */

import { parseCsv, findColumn } from "./csv.js";
import { MalformedLogError } from "./errors.js";
import { parseTimestamp } from "./utils.js";
import type {
  CameraId,
  CorruptFrameReason,
  CorruptFrameRecord,
  FrameRange,
  FrameRecord,
  RawFrameRow,
} from "./types.js";

export interface TimestampIndexOptions {
  /** A timestamp within this many seconds of the previous kept one counts as a duplicate. */
  duplicateToleranceSeconds?: number;
}

const FRAME_INDEX_COLUMNS = ["frame_index", "frame", "frame_number"];
const TIMESTAMP_COLUMNS = ["timestamp", "time"];

function parseFrameIndex(text: string): number | null {
  const value = text.trim();
  if (!/^\d+$/.test(value)) return null;
  const n = Number(value);
  return Number.isSafeInteger(n) ? n : null;
}

export class TimestampIndex {
  readonly cameraId: CameraId;
  private readonly frameIndices: number[];
  private readonly timestamps: number[];
  private readonly corrupted: CorruptFrameRecord[];

  private constructor(
    cameraId: CameraId,
    frameIndices: number[],
    timestamps: number[],
    corrupted: CorruptFrameRecord[],
  ) {
    this.cameraId = cameraId;
    this.frameIndices = frameIndices;
    this.timestamps = timestamps;
    this.corrupted = corrupted;
  }

  /**
   * Build an index from raw rows. Never throws: every rejected row is
   * recorded with its reason. When a row has no frame index, its 0-based row
   * position is used.
   */
  static fromRows(
    cameraId: CameraId,
    rows: readonly RawFrameRow[],
    options: TimestampIndexOptions = {},
  ): TimestampIndex {
    const tolerance = options.duplicateToleranceSeconds ?? 0;
    const frameIndices: number[] = [];
    const timestamps: number[] = [];
    const corrupted: CorruptFrameRecord[] = [];

    rows.forEach((row, position) => {
      const rowNumber = position + 1;
      const frameIndex = row.frameIndex === null ? position : parseFrameIndex(row.frameIndex);
      const timestamp = parseTimestamp(row.timestamp);

      if (frameIndex === null || timestamp === null) {
        corrupted.push({ rowNumber, reason: "unparsable" });
        return;
      }

      const last = timestamps.length - 1;
      if (last >= 0) {
        if (frameIndex <= frameIndices[last]) {
          corrupted.push({ rowNumber, reason: "non_increasing_index" });
          return;
        }
        const delta = timestamp - timestamps[last];
        if (delta < 0) {
          corrupted.push({ rowNumber, reason: "out_of_order" });
          return;
        }
        if (delta <= tolerance) {
          corrupted.push({ rowNumber, reason: "duplicate_timestamp" });
          return;
        }
      }

      frameIndices.push(frameIndex);
      timestamps.push(timestamp);
    });

    return new TimestampIndex(cameraId, frameIndices, timestamps, corrupted);
  }

  /**
   * Build an index from a frame log's CSV text.
   * @throws MalformedLogError when the header lacks a timestamp column or no row survives cleaning.
   */
  static fromCsv(
    cameraId: CameraId,
    text: string,
    options: TimestampIndexOptions = {},
    logPath: string | null = null,
  ): TimestampIndex {
    const table = parseCsv(text);
    if (!table) {
      throw new MalformedLogError(`Frame log for camera ${cameraId} is empty`, logPath);
    }

    const tsCol = findColumn(table.header, TIMESTAMP_COLUMNS);
    if (tsCol < 0) {
      throw new MalformedLogError(`Frame log for camera ${cameraId} has no timestamp column`, logPath);
    }
    const idxCol = findColumn(table.header, FRAME_INDEX_COLUMNS);

    const rows: RawFrameRow[] = table.rows.map((fields) => ({
      frameIndex: idxCol >= 0 ? fields[idxCol] ?? "" : null,
      timestamp: fields[tsCol] ?? "",
    }));

    const index = TimestampIndex.fromRows(cameraId, rows, options);
    if (index.size === 0) {
      throw new MalformedLogError(`Frame log for camera ${cameraId} has no valid rows`, logPath);
    }
    return index;
  }

  /** Number of kept frames. */
  get size(): number {
    return this.timestamps.length;
  }

  get firstTimestamp(): number | null {
    return this.timestamps.length > 0 ? this.timestamps[0] : null;
  }

  get lastTimestamp(): number | null {
    return this.timestamps.length > 0 ? this.timestamps[this.timestamps.length - 1] : null;
  }

  get corruptedFrames(): readonly CorruptFrameRecord[] {
    return this.corrupted;
  }

  get corruptedFrameCount(): number {
    return this.corrupted.length;
  }

  corruptedByReason(): Record<CorruptFrameReason, number> {
    const counts: Record<CorruptFrameReason, number> = {
      unparsable: 0,
      non_increasing_index: 0,
      out_of_order: 0,
      duplicate_timestamp: 0,
    };
    for (const c of this.corrupted) counts[c.reason]++;
    return counts;
  }

  frameAt(position: number): FrameRecord | null {
    if (position < 0 || position >= this.timestamps.length) return null;
    return {
      cameraId: this.cameraId,
      frameIndex: this.frameIndices[position],
      timestamp: this.timestamps[position],
    };
  }

  /**
   * Kept frames whose timestamps lie in `[start, end]` (both inclusive).
   * An empty range is a normal result, not an error.
   */
  frameRangeForWindow(start: number, end: number): FrameRange {
    if (end < start) {
      return { frameIndices: [], firstTimestamp: null, lastTimestamp: null };
    }
    const lo = this.lowerBound(start);
    const hi = this.upperBound(end); // exclusive
    if (lo >= hi) {
      return { frameIndices: [], firstTimestamp: null, lastTimestamp: null };
    }
    return {
      frameIndices: this.frameIndices.slice(lo, hi),
      firstTimestamp: this.timestamps[lo],
      lastTimestamp: this.timestamps[hi - 1],
    };
  }

  /** Kept frame with this container index, or null when it was dropped or never logged. */
  frameByIndex(frameIndex: number): FrameRecord | null {
    let lo = 0;
    let hi = this.frameIndices.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.frameIndices[mid] < frameIndex) lo = mid + 1;
      else hi = mid;
    }
    return this.frameIndices[lo] === frameIndex ? this.frameAt(lo) : null;
  }

  /** Kept frame with the timestamp closest to `t`; ties go to the earlier frame. */
  nearestFrame(t: number): FrameRecord | null {
    if (this.timestamps.length === 0) return null;
    const i = this.lowerBound(t);
    if (i === 0) return this.frameAt(0);
    if (i === this.timestamps.length) return this.frameAt(i - 1);
    const before = t - this.timestamps[i - 1];
    const after = this.timestamps[i] - t;
    return this.frameAt(after < before ? i : i - 1);
  }

  /** Average capture rate over the whole log (0 with fewer than two frames). */
  estimatedFrameRate(): number {
    const n = this.timestamps.length;
    if (n < 2) return 0;
    const span = this.timestamps[n - 1] - this.timestamps[0];
    return span > 0 ? (n - 1) / span : 0;
  }

  /** First position whose timestamp is >= t. */
  private lowerBound(t: number): number {
    let lo = 0;
    let hi = this.timestamps.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.timestamps[mid] < t) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  /** First position whose timestamp is > t. */
  private upperBound(t: number): number {
    let lo = 0;
    let hi = this.timestamps.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.timestamps[mid] <= t) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
