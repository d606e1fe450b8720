import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { pathExists } from "./camera-discovery.js";
import {
  FrameExporter,
  formatFrameTimestamps,
  formatTrainingAligned,
  frameFilename,
  planClipFrames,
  type ClipFrames,
} from "./frame-export.js";
import { acceptedRecord } from "./manifest-builder.js";
import { FakeCodec } from "./testing/fake-codec.js";
import type { CameraModality, GestureEvent } from "./types.js";

function clipFrames(cameraId: string, filepath: string, sourceFrames: number[], modality: CameraModality = "webcam"): ClipFrames {
  const event: GestureEvent = { participantId: "7", gestureIndex: 1, gestureName: "wave", onsetTimestamp: 100, rowNumber: 1 };
  const record = acceptedRecord(
    {
      participantId: "7",
      cameraId,
      event,
      window: {
        gestureIndex: 1,
        requestedStart: 101,
        requestedEnd: 103,
        effectiveStart: 101,
        effectiveEnd: 103,
        truncated: false,
        accepted: true,
      },
      readingTimeExcluded: true,
    },
    { filename: `p7_cam${cameraId}_seg000_wave.mp4`, filepath, frameCount: sourceFrames.length },
  );
  return {
    record,
    modality,
    sources: sourceFrames.map((frameIndex) => ({ cameraId, frameIndex, timestamp: 100 + frameIndex * 0.5 })),
  };
}

describe("frameFilename", () => {
  it("numbers frames within their segment", () => {
    expect(frameFilename("p7_cam1_seg000_wave", 12)).toBe("p7_cam1_seg000_wave_frame_000012.jpg");
  });
});

describe("planClipFrames", () => {
  it("places output frames on the clip's grid and keeps the source times", () => {
    const frames = planClipFrames(clipFrames("1", "clip.mp4", [2, 2, 3]), "out", 4);
    expect(frames.map((f) => [f.frameNumber, f.timestamp, f.sourceFrameIndex, f.sourceTimestamp])).toEqual([
      [0, 101, 2, 101],
      [1, 101.25, 2, 101],
      [2, 101.5, 3, 101.5],
    ]);
    expect(frames[1].filepath).toBe(join("out", "p7_cam1_seg000_wave_frame_000001.jpg"));
  });
});

describe("frame tables", () => {
  it("renders one row per image", () => {
    const csv = formatFrameTimestamps(planClipFrames(clipFrames("1", "clip.mp4", [2]), "out", 2));
    expect(csv.split("\n")[1]).toBe(
      "p7_cam1_seg000_wave_frame_000000.jpg,7,1,1970-01-01T00:01:41.000Z,wave,p7_cam1_seg000_wave,0,2,1970-01-01T00:01:41.000Z",
    );
  });

  it("aligns cameras by slot and leaves gaps empty", () => {
    const frames = [
      ...planClipFrames(clipFrames("1", "a.mp4", [2, 3]), "c1", 2),
      ...planClipFrames(clipFrames("2", "b.mp4", [2]), "c2", 2),
    ];
    expect(formatTrainingAligned(frames, ["1", "2", "3"])).toBe(
      "timestamp,participant_id,gesture_label,camera_1,camera_2,camera_3\n" +
        `1970-01-01T00:01:41.000Z,7,wave,${join("c1", "p7_cam1_seg000_wave_frame_000000.jpg")},` +
        `${join("c2", "p7_cam2_seg000_wave_frame_000000.jpg")},\n` +
        `1970-01-01T00:01:41.500Z,7,wave,${join("c1", "p7_cam1_seg000_wave_frame_000001.jpg")},,\n`,
    );
  });
});

describe("FrameExporter", () => {
  let dir: string;
  let codec: FakeCodec;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "frame-export-"));
    codec = new FakeCodec();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeClip(path: string, sourceFrames: number[]): Promise<void> {
    const writer = await codec.openWriter(path, {
      resolution: codec.resolution,
      pixelFormat: "gray",
      frameRate: 2,
    });
    for (const frameIndex of sourceFrames) {
      const frame = Buffer.alloc(4);
      frame.writeUInt32LE(frameIndex, 0);
      await writer.writeFrame(frame);
    }
    await writer.finish();
  }

  it("writes every clip frame as an image decoded for its modality", async () => {
    const clipPath = join(dir, "depth.mp4");
    await writeClip(clipPath, [4, 5]);
    const out = join(dir, "frames");

    const frames = await new FrameExporter(codec, 2).exportClip(clipFrames("azure_depth", clipPath, [4, 5], "azure_depth"), out);

    expect(frames).toHaveLength(2);
    expect(codec.opened).toEqual([{ mediaPath: clipPath, decode: { pixelFormat: "gray", bytesPerPixel: 1 }, startFrame: 0 }]);
    expect(codec.images.map((i) => [i.outputPath, i.sourceFrame])).toEqual([
      [frames[0].filepath, 4],
      [frames[1].filepath, 5],
    ]);
    expect(await readFile(frames[1].filepath, "utf-8")).toBe("5");
  });

  it("removes the images of a clip that fails part way", async () => {
    const clipPath = join(dir, "short.mp4");
    await writeClip(clipPath, [4, 5]);
    const out = join(dir, "frames");
    const clip = clipFrames("1", clipPath, [4, 5, 6]);

    await expect(new FrameExporter(codec, 2).exportClip(clip, out)).rejects.toThrow(`${clipPath} has no frame 2`);
    expect(codec.images).toHaveLength(2);
    expect(await pathExists(join(out, "p7_cam1_seg000_wave_frame_000000.jpg"))).toBe(false);
    expect(await pathExists(join(out, "p7_cam1_seg000_wave_frame_000001.jpg"))).toBe(false);
  });
});
