// Container/codec primitives the encoder is written against.
// The ffmpeg-backed implementation lives in ffmpeg-codec.ts; tests use in-process fakes.

import type { CameraModality, Resolution } from "./types.js";

export type PixelFormat = "rgb24" | "gray";

export interface DecodeParams {
  pixelFormat: PixelFormat;
  bytesPerPixel: number;
}

/**
 * Decode parameters per modality. Depth and IR recordings are single-channel;
 * the three Azure modalities differ only here, never in their time window.
 */
export const MODALITY_DECODE_PARAMS: Readonly<Record<CameraModality, DecodeParams>> = {
  webcam: { pixelFormat: "rgb24", bytesPerPixel: 3 },
  azure_color: { pixelFormat: "rgb24", bytesPerPixel: 3 },
  azure_depth: { pixelFormat: "gray", bytesPerPixel: 1 },
  azure_ir: { pixelFormat: "gray", bytesPerPixel: 1 },
};

export interface MediaInfo {
  resolution: Resolution;
  frameRate: number;
}

export interface EncodeParams {
  resolution: Resolution;
  pixelFormat: PixelFormat;
  frameRate: number;
}

export interface ImageParams {
  resolution: Resolution;
  pixelFormat: PixelFormat;
}

/**
 * Sequential decoder. `readFrame` accepts non-decreasing container frame
 * indices; asking for the same index twice returns the same frame.
 */
export interface FrameReader {
  readFrame(frameIndex: number): Promise<Buffer>;
  close(): Promise<void>;
}

export interface FrameWriter {
  writeFrame(frame: Buffer): Promise<void>;
  /** Flush and close the output; rejects if the output could not be written. */
  finish(): Promise<void>;
  /** Stop writing; the partial output is left for the caller to discard. */
  abort(): Promise<void>;
}

export interface MediaCodec {
  probe(mediaPath: string): Promise<MediaInfo>;
  openReader(
    mediaPath: string,
    resolution: Resolution,
    decode: DecodeParams,
    startFrame: number,
  ): Promise<FrameReader>;
  openWriter(outputPath: string, params: EncodeParams): Promise<FrameWriter>;
  /** Write one decoded frame as a still image (JPEG). */
  writeImage(outputPath: string, frame: Buffer, params: ImageParams): Promise<void>;
}
