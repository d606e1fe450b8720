/**
 * SegmentEncoder: Materialises one camera's frame range as a clip.
 *
 * Output names are deterministic: the segment index is the camera's
 * zero-based count of accepted segments so far, not the gesture index.
 */

import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { FrameResampler, type ResamplePlan } from "./frame-resampler.js";
import type { FrameExtraction } from "./frame-extractor.js";
import type { FrameReader, FrameWriter, MediaCodec } from "./media-codec.js";
import { sanitizeGestureName } from "./utils.js";
import type { Resolution } from "./types.js";

export const CLIP_EXTENSION = "mp4";

export interface EncodeRequest {
  participantId: string;
  segmentIndex: number;
  gestureName: string;
  extraction: FrameExtraction;
  durationSeconds: number;
  outputDir: string;
}

export interface EncodedSegment {
  filename: string;
  filepath: string;
  frameCount: number;
  sourceFrameCount: number;
  droppedFrames: number;
  duplicatedFrames: number;
}

/** `p{participant}_cam{camera}_seg{NNN}_{gesture}.mp4` */
export function segmentFilename(
  participantId: string,
  cameraId: string,
  segmentIndex: number,
  gestureName: string,
): string {
  const seg = String(segmentIndex).padStart(3, "0");
  return `p${participantId}_cam${cameraId}_seg${seg}_${sanitizeGestureName(gestureName)}.${CLIP_EXTENSION}`;
}

export class SegmentEncoder {
  private readonly resampler: FrameResampler;
  private readonly codec: MediaCodec | null;

  constructor(targetFrameRate: number, codec: MediaCodec | null) {
    this.resampler = new FrameResampler(targetFrameRate);
    this.codec = codec;
  }

  /** Name, location and frame accounting for a segment, without touching media. */
  plan(request: EncodeRequest): { segment: EncodedSegment; resample: ResamplePlan } {
    const { participantId, segmentIndex, gestureName, extraction, durationSeconds, outputDir } = request;
    const filename = segmentFilename(participantId, extraction.cameraId, segmentIndex, gestureName);
    const resample = this.resampler.plan(extraction.range.frameIndices, durationSeconds);
    return {
      resample,
      segment: {
        filename,
        filepath: join(outputDir, filename),
        frameCount: resample.sourceFrames.length,
        sourceFrameCount: extraction.range.frameIndices.length,
        droppedFrames: resample.droppedFrames,
        duplicatedFrames: resample.duplicatedFrames,
      },
    };
  }

  /**
   * Decode the planned source frames and write the clip.
   * On failure the partial output file is removed and the error rethrown.
   */
  async encode(request: EncodeRequest, mediaPath: string, resolution: Resolution): Promise<EncodedSegment> {
    if (!this.codec) {
      throw new Error("SegmentEncoder.encode() requires a media codec");
    }
    const { segment, resample } = this.plan(request);
    if (resample.sourceFrames.length === 0) {
      throw new Error(`No source frames to encode for ${segment.filename}`);
    }

    await mkdir(request.outputDir, { recursive: true });

    const { decode } = request.extraction;
    let reader: FrameReader | null = null;
    let writer: FrameWriter | null = null;
    try {
      reader = await this.codec.openReader(mediaPath, resolution, decode, resample.sourceFrames[0]);
      writer = await this.codec.openWriter(segment.filepath, {
        resolution,
        pixelFormat: decode.pixelFormat,
        frameRate: this.resampler.rate,
      });
      for (const frameIndex of resample.sourceFrames) {
        await writer.writeFrame(await reader.readFrame(frameIndex));
      }
      await writer.finish();
      writer = null;
      return segment;
    } catch (err) {
      if (writer) await writer.abort();
      await rm(segment.filepath, { force: true });
      throw err;
    } finally {
      if (reader) await reader.close();
    }
  }
}
