/**
 * FrameExtractor: Maps an accepted window onto each camera's frames.
 *
 * Cameras are independent: an empty range rejects only that camera's
 * segment. The Azure modalities share one TimestampIndex, so they always get
 * the same range; only their decode parameters differ.
 */

import { MODALITY_DECODE_PARAMS, type DecodeParams } from "./media-codec.js";
import type { TimestampIndex } from "./timestamp-index.js";
import type { CameraModality, CameraStream, FrameRange, SegmentWindow } from "./types.js";

export interface CameraTimeline {
  stream: CameraStream;
  index: TimestampIndex;
}

export interface FrameExtraction {
  cameraId: string;
  modality: CameraModality;
  decode: DecodeParams;
  window: SegmentWindow;
  range: FrameRange;
}

export class FrameExtractor {
  extract(window: SegmentWindow, timeline: CameraTimeline): FrameExtraction {
    const { stream, index } = timeline;
    return {
      cameraId: stream.cameraId,
      modality: stream.modality,
      decode: MODALITY_DECODE_PARAMS[stream.modality],
      window,
      range: index.frameRangeForWindow(window.effectiveStart, window.effectiveEnd),
    };
  }
}

export function isEmptyExtraction(extraction: FrameExtraction): boolean {
  return extraction.range.frameIndices.length === 0;
}
