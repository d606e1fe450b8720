import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { FrameExtraction } from "./frame-extractor.js";
import { MODALITY_DECODE_PARAMS } from "./media-codec.js";
import { SegmentEncoder, segmentFilename, type EncodeRequest } from "./segment-encoder.js";
import { FakeCodec } from "./testing/fake-codec.js";

function extraction(frameIndices: number[], modality: FrameExtraction["modality"] = "webcam"): FrameExtraction {
  return {
    cameraId: modality === "webcam" ? "3" : modality,
    modality,
    decode: MODALITY_DECODE_PARAMS[modality],
    window: {
      gestureIndex: 4,
      requestedStart: 105,
      requestedEnd: 120,
      effectiveStart: 105,
      effectiveEnd: 105.5,
      truncated: true,
      accepted: true,
    },
    range: {
      frameIndices,
      firstTimestamp: frameIndices.length > 0 ? 105 : null,
      lastTimestamp: frameIndices.length > 0 ? 105.5 : null,
    },
  };
}

describe("segmentFilename", () => {
  it("pads the segment index and sanitises the gesture", () => {
    expect(segmentFilename("7", "3", 0, "Wave Hand")).toBe("p7_cam3_seg000_wave_hand.mp4");
    expect(segmentFilename("7", "azure_depth", 12, "point")).toBe("p7_camazure_depth_seg012_point.mp4");
  });
});

describe("SegmentEncoder", () => {
  let outputDir: string;
  let request: EncodeRequest;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), "segment-encoder-"));
    request = {
      participantId: "7",
      segmentIndex: 2,
      gestureName: "Wave",
      extraction: extraction([10, 11, 12, 13, 14, 15, 16, 17, 18, 19]),
      durationSeconds: 0.5,
      outputDir,
    };
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it("plans name, path and frame accounting without a codec", () => {
    const { segment } = new SegmentEncoder(30, null).plan(request);
    expect(segment).toEqual({
      filename: "p7_cam3_seg002_wave.mp4",
      filepath: join(outputDir, "p7_cam3_seg002_wave.mp4"),
      frameCount: 15,
      sourceFrameCount: 10,
      droppedFrames: 0,
      duplicatedFrames: 5,
    });
  });

  it("writes the resampled frames through the codec", async () => {
    const codec = new FakeCodec();
    const segment = await new SegmentEncoder(30, codec).encode(request, "in/webcam_3.mp4", codec.resolution);

    expect(codec.opened).toEqual([
      { mediaPath: "in/webcam_3.mp4", decode: { pixelFormat: "rgb24", bytesPerPixel: 3 }, startFrame: 10 },
    ]);
    expect(codec.written).toHaveLength(1);
    expect(codec.written[0].params).toEqual({ resolution: { width: 4, height: 2 }, pixelFormat: "rgb24", frameRate: 30 });
    expect(codec.written[0].sourceFrames).toEqual([10, 10, 11, 12, 12, 13, 14, 14, 15, 16, 16, 17, 18, 18, 19]);
    expect(JSON.parse(await readFile(segment.filepath, "utf-8"))).toHaveLength(15);
  });

  it("decodes depth as single-channel gray", async () => {
    const codec = new FakeCodec();
    await new SegmentEncoder(30, codec).encode(
      { ...request, extraction: extraction([0, 1, 2], "azure_depth") },
      "in/depth.mp4",
      codec.resolution,
    );
    expect(codec.opened[0].decode).toEqual({ pixelFormat: "gray", bytesPerPixel: 1 });
    expect(codec.written[0].params.pixelFormat).toBe("gray");
  });

  it("aborts and removes the output when encoding fails", async () => {
    const codec = new FakeCodec();
    codec.failOutput = () => true;
    const encoder = new SegmentEncoder(30, codec);

    await expect(encoder.encode(request, "in/webcam_3.mp4", codec.resolution)).rejects.toThrow("encoder crashed");
    const expectedPath = join(outputDir, "p7_cam3_seg002_wave.mp4");
    expect(codec.aborted).toEqual([expectedPath]);
    await expect(stat(expectedPath)).rejects.toThrow();
  });

  it("refuses to encode without a codec or without frames", async () => {
    await expect(new SegmentEncoder(30, null).encode(request, "in.mp4", { width: 2, height: 2 })).rejects.toThrow(
      "requires a media codec",
    );
    await expect(
      new SegmentEncoder(30, new FakeCodec()).encode({ ...request, extraction: extraction([]) }, "in.mp4", {
        width: 2,
        height: 2,
      }),
    ).rejects.toThrow("No source frames");
  });
});
