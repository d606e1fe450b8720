/**
 * Frame export: every frame of each accepted clip as an image, plus two tables.
 *
 *   frame_timestamps.csv   one row per written image, camera by camera
 *   training_aligned.csv   one row per output slot, one column per camera
 *
 * Output frame j of a clip sits at `startTime + j / targetFrameRate`. Every
 * camera shares the window and the frame count, so the same slot lines up
 * across cameras. The source time of each image comes from the camera's
 * TimestampIndex.
 */

import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { formatCsv } from "./csv.js";
import { MODALITY_DECODE_PARAMS, type MediaCodec } from "./media-codec.js";
import type { CameraId, CameraModality, FrameRecord, SegmentRecord } from "./types.js";
import { formatIsoTimestamp } from "./utils.js";

export const FRAME_IMAGE_EXTENSION = "jpg";

export const FRAME_TIMESTAMP_COLUMNS = [
  "filename",
  "participant_id",
  "camera_id",
  "timestamp",
  "gesture_label",
  "segment",
  "frame_number",
  "source_frame_index",
  "source_timestamp",
] as const;

/** An accepted clip and the kept source frame behind each of its output frames. */
export interface ClipFrames {
  record: SegmentRecord;
  modality: CameraModality;
  sources: readonly FrameRecord[];
}

export interface ExportedFrame {
  filename: string;
  filepath: string;
  participantId: string;
  cameraId: CameraId;
  segmentId: string;
  gestureName: string;
  frameNumber: number;
  timestamp: number;
  sourceFrameIndex: number;
  sourceTimestamp: number;
}

/** `{segmentId}_frame_{NNNNNN}.jpg` */
export function frameFilename(segmentId: string, frameNumber: number): string {
  return `${segmentId}_frame_${String(frameNumber).padStart(6, "0")}.${FRAME_IMAGE_EXTENSION}`;
}

export function planClipFrames(clip: ClipFrames, outputDir: string, targetFrameRate: number): ExportedFrame[] {
  const { record } = clip;
  return clip.sources.map((source, frameNumber) => {
    const filename = frameFilename(record.segmentId, frameNumber);
    return {
      filename,
      filepath: join(outputDir, filename),
      participantId: record.participantId,
      cameraId: record.cameraId,
      segmentId: record.segmentId,
      gestureName: record.gestureName,
      frameNumber,
      timestamp: record.startTime + frameNumber / targetFrameRate,
      sourceFrameIndex: source.frameIndex,
      sourceTimestamp: source.timestamp,
    };
  });
}

export function formatFrameTimestamps(frames: readonly ExportedFrame[]): string {
  return formatCsv(
    FRAME_TIMESTAMP_COLUMNS,
    frames.map((f) => [
      f.filename,
      f.participantId,
      f.cameraId,
      formatIsoTimestamp(f.timestamp),
      f.gestureName,
      f.segmentId,
      f.frameNumber,
      f.sourceFrameIndex,
      formatIsoTimestamp(f.sourceTimestamp),
    ]),
  );
}

/**
 * One row per distinct slot time (millisecond text), in time order. A camera
 * with no frame in a slot gets an empty cell.
 */
export function formatTrainingAligned(frames: readonly ExportedFrame[], cameraIds: readonly CameraId[]): string {
  const slots = new Map<string, { first: ExportedFrame; byCamera: Map<CameraId, string> }>();
  for (const frame of frames) {
    const key = formatIsoTimestamp(frame.timestamp);
    let slot = slots.get(key);
    if (!slot) {
      slot = { first: frame, byCamera: new Map() };
      slots.set(key, slot);
    }
    if (!slot.byCamera.has(frame.cameraId)) {
      slot.byCamera.set(frame.cameraId, frame.filepath);
    }
  }

  const keys = [...slots.keys()].sort();
  const rows: string[][] = [];
  for (const key of keys) {
    const slot = slots.get(key);
    if (!slot) continue;
    rows.push([
      key,
      slot.first.participantId,
      slot.first.gestureName,
      ...cameraIds.map((id) => slot.byCamera.get(id) ?? ""),
    ]);
  }
  return formatCsv(["timestamp", "participant_id", "gesture_label", ...cameraIds.map((id) => `camera_${id}`)], rows);
}

export class FrameExporter {
  private readonly codec: MediaCodec;
  private readonly targetFrameRate: number;

  constructor(codec: MediaCodec, targetFrameRate: number) {
    this.codec = codec;
    this.targetFrameRate = targetFrameRate;
  }

  /**
   * Decode the clip and write one image per frame into `outputDir`.
   * On failure the images written so far are removed and the error rethrown.
   */
  async exportClip(clip: ClipFrames, outputDir: string): Promise<ExportedFrame[]> {
    const frames = planClipFrames(clip, outputDir, this.targetFrameRate);
    if (frames.length === 0) return [];

    const clipPath = clip.record.filepath;
    const decode = MODALITY_DECODE_PARAMS[clip.modality];
    await mkdir(outputDir, { recursive: true });

    const written: string[] = [];
    try {
      // Clips are padded to even dimensions, so the source size may not match.
      const { resolution } = await this.codec.probe(clipPath);
      const reader = await this.codec.openReader(clipPath, resolution, decode, 0);
      try {
        for (const frame of frames) {
          const image = await reader.readFrame(frame.frameNumber);
          await this.codec.writeImage(frame.filepath, image, { resolution, pixelFormat: decode.pixelFormat });
          written.push(frame.filepath);
        }
      } finally {
        await reader.close();
      }
    } catch (err) {
      await Promise.all(written.map((path) => rm(path, { force: true })));
      throw err;
    }
    return frames;
  }
}
