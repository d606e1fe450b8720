import { describe, it, expect } from "vitest";
import {
  buildDecodeArgs,
  buildEncodeArgs,
  buildImageArgs,
  buildProbeArgs,
  parseFrameRate,
  parseProbeOutput,
} from "./ffmpeg-codec.js";
import { MODALITY_DECODE_PARAMS } from "./media-codec.js";

describe("argument builders", () => {
  it("asks ffprobe for the first video stream as JSON", () => {
    expect(buildProbeArgs("in.mp4")).toEqual([
      "-v", "error",
      "-select_streams", "v:0",
      "-show_entries", "stream=width,height,avg_frame_rate,r_frame_rate",
      "-of", "json",
      "in.mp4",
    ]);
  });

  it("decodes from the first frame without a select filter", () => {
    expect(buildDecodeArgs("in.mp4", MODALITY_DECODE_PARAMS.webcam, 0)).toEqual([
      "-v", "error", "-i", "in.mp4", "-an",
      "-fps_mode", "passthrough",
      "-f", "rawvideo",
      "-pix_fmt", "rgb24",
      "pipe:1",
    ]);
  });

  it("skips to a start frame and decodes depth as gray", () => {
    const args = buildDecodeArgs("depth.mp4", MODALITY_DECODE_PARAMS.azure_depth, 120);
    expect(args.slice(5, 7)).toEqual(["-vf", "select=gte(n\\,120)"]);
    expect(args[args.indexOf("-pix_fmt") + 1]).toBe("gray");
  });

  it("writes one raw depth frame as a JPEG", () => {
    expect(buildImageArgs("f.jpg", { resolution: { width: 320, height: 288 }, pixelFormat: "gray" })).toEqual([
      "-y", "-v", "error",
      "-f", "rawvideo",
      "-pix_fmt", "gray",
      "-s", "320x288",
      "-i", "pipe:0",
      "-frames:v", "1",
      "-c:v", "mjpeg",
      "-pix_fmt", "yuvj420p",
      "-q:v", "2",
      "f.jpg",
    ]);
  });

  it("encodes raw frames from stdin to H.264", () => {
    expect(
      buildEncodeArgs("out.mp4", { resolution: { width: 640, height: 480 }, pixelFormat: "rgb24", frameRate: 30 }),
    ).toEqual([
      "-y", "-v", "error",
      "-f", "rawvideo",
      "-pix_fmt", "rgb24",
      "-s", "640x480",
      "-r", "30",
      "-i", "pipe:0",
      "-an",
      "-vf", "pad=ceil(iw/2)*2:ceil(ih/2)*2",
      "-c:v", "libx264",
      "-pix_fmt", "yuv420p",
      "out.mp4",
    ]);
  });
});

describe("parseFrameRate", () => {
  it("reads fractions and plain numbers", () => {
    expect(parseFrameRate("30000/1001")).toBeCloseTo(29.97, 2);
    expect(parseFrameRate("25")).toBe(25);
    expect(parseFrameRate(" 15/1 ")).toBe(15);
  });

  it("returns null for unknown rates", () => {
    expect(parseFrameRate("0/0")).toBeNull();
    expect(parseFrameRate("N/A")).toBeNull();
    expect(parseFrameRate("")).toBeNull();
  });
});

describe("parseProbeOutput", () => {
  it("reads dimensions and the average frame rate", () => {
    const json = JSON.stringify({ streams: [{ width: 1280, height: 720, avg_frame_rate: "30/1", r_frame_rate: "60/1" }] });
    expect(parseProbeOutput(json)).toEqual({ resolution: { width: 1280, height: 720 }, frameRate: 30 });
  });

  it("falls back to the real frame rate, then to zero", () => {
    const fallback = JSON.stringify({ streams: [{ width: 640, height: 576, avg_frame_rate: "0/0", r_frame_rate: "30/1" }] });
    expect(parseProbeOutput(fallback).frameRate).toBe(30);
    const none = JSON.stringify({ streams: [{ width: 640, height: 576 }] });
    expect(parseProbeOutput(none).frameRate).toBe(0);
  });

  it("rejects output without a usable stream", () => {
    expect(() => parseProbeOutput("not json")).toThrow("ffprobe returned invalid JSON");
    expect(() => parseProbeOutput(JSON.stringify({ streams: [] }))).toThrow("ffprobe found no video stream");
    expect(() => parseProbeOutput(JSON.stringify({ streams: [{ width: 0, height: 480 }] }))).toThrow(
      "ffprobe reported no frame dimensions",
    );
  });
});
