// Gesture Segmenter - ffmpeg-backed MediaCodec
//
// Decoding pipes raw frames out of `ffmpeg` (starting at a frame number via the
// select filter) and encoding pipes raw frames into an H.264 writer. Probing
// uses `ffprobe`'s JSON output. All argument lists are built by pure functions
// so they can be checked without the binaries installed.

import { spawn, type ChildProcess } from "node:child_process";
import { once } from "node:events";
import type {
  DecodeParams,
  EncodeParams,
  FrameReader,
  FrameWriter,
  ImageParams,
  MediaCodec,
  MediaInfo,
} from "./media-codec.js";
import type { Resolution } from "./types.js";

export interface FfmpegCodecOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
}

// ─── Argument builders ──────────────────────────────────────────────────────────

export function buildProbeArgs(mediaPath: string): string[] {
  return [
    "-v", "error",
    "-select_streams", "v:0",
    "-show_entries", "stream=width,height,avg_frame_rate,r_frame_rate",
    "-of", "json",
    mediaPath,
  ];
}

export function buildDecodeArgs(mediaPath: string, decode: DecodeParams, startFrame: number): string[] {
  const args = ["-v", "error", "-i", mediaPath, "-an"];
  if (startFrame > 0) {
    args.push("-vf", `select=gte(n\\,${startFrame})`);
  }
  args.push(
    "-fps_mode", "passthrough",
    "-f", "rawvideo",
    "-pix_fmt", decode.pixelFormat,
    "pipe:1",
  );
  return args;
}

export function buildEncodeArgs(outputPath: string, params: EncodeParams): string[] {
  const { resolution, pixelFormat, frameRate } = params;
  return [
    "-y", "-v", "error",
    "-f", "rawvideo",
    "-pix_fmt", pixelFormat,
    "-s", `${resolution.width}x${resolution.height}`,
    "-r", String(frameRate),
    "-i", "pipe:0",
    "-an",
    // libx264 with yuv420p needs even dimensions
    "-vf", "pad=ceil(iw/2)*2:ceil(ih/2)*2",
    "-c:v", "libx264",
    "-pix_fmt", "yuv420p",
    outputPath,
  ];
}

export function buildImageArgs(outputPath: string, params: ImageParams): string[] {
  const { resolution, pixelFormat } = params;
  return [
    "-y", "-v", "error",
    "-f", "rawvideo",
    "-pix_fmt", pixelFormat,
    "-s", `${resolution.width}x${resolution.height}`,
    "-i", "pipe:0",
    "-frames:v", "1",
    "-c:v", "mjpeg",
    "-pix_fmt", "yuvj420p",
    "-q:v", "2",
    outputPath,
  ];
}

// ─── Probe parsing ──────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** `"30000/1001"` → 29.97…, `"25"` → 25; null for `"0/0"` or garbage. */
export function parseFrameRate(text: string): number | null {
  const match = /^\s*(\d+(?:\.\d+)?)(?:\/(\d+(?:\.\d+)?))?\s*$/.exec(text);
  if (!match) return null;
  const num = Number(match[1]);
  const den = match[2] === undefined ? 1 : Number(match[2]);
  if (den === 0 || num === 0) return null;
  return num / den;
}

/** @throws Error when the output has no video stream with usable dimensions. */
export function parseProbeOutput(json: string): MediaInfo {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new Error(`ffprobe returned invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const streams = isRecord(parsed) ? parsed.streams : undefined;
  const stream = Array.isArray(streams) ? streams[0] : undefined;
  if (!isRecord(stream)) {
    throw new Error("ffprobe found no video stream");
  }

  const { width, height } = stream;
  if (typeof width !== "number" || typeof height !== "number" || width <= 0 || height <= 0) {
    throw new Error("ffprobe reported no frame dimensions");
  }

  const rates = [stream.avg_frame_rate, stream.r_frame_rate]
    .map((r) => (typeof r === "string" ? parseFrameRate(r) : null))
    .filter((r): r is number => r !== null);

  return { resolution: { width, height }, frameRate: rates[0] ?? 0 };
}

// ─── Process plumbing ───────────────────────────────────────────────────────────

interface ProcessExit {
  code: number | null;
  stderr: string;
  spawnError: Error | null;
}

/** Collects stderr and resolves once the process is gone; never rejects. */
function trackExit(child: ChildProcess): Promise<ProcessExit> {
  return new Promise((resolve) => {
    let stderr = "";
    let spawnError: Error | null = null;
    child.stderr?.on("data", (d: Buffer) => (stderr += d.toString()));
    child.on("error", (err) => {
      spawnError = err;
    });
    child.on("close", (code) => resolve({ code, stderr: stderr.trim(), spawnError }));
  });
}

function describeExit(tool: string, exit: ProcessExit): string {
  if (exit.spawnError) return `${tool} could not be started: ${exit.spawnError.message}`;
  return `${tool} exited with code ${exit.code}${exit.stderr ? `: ${exit.stderr}` : ""}`;
}

function collectStdout(child: ChildProcess): Promise<Buffer> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    child.stdout?.on("data", (d: Buffer) => chunks.push(Buffer.from(d)));
    child.stdout?.on("end", () => resolve(Buffer.concat(chunks)));
    child.on("close", () => resolve(Buffer.concat(chunks)));
  });
}

// ─── Reader ─────────────────────────────────────────────────────────────────────

class FfmpegFrameReader implements FrameReader {
  private readonly child: ChildProcess;
  private readonly exit: Promise<ProcessExit>;
  private readonly chunks: AsyncIterator<unknown>;
  private readonly frameSize: number;
  private pending: Buffer = Buffer.alloc(0);
  /** Container index of the next frame the pipe will yield. */
  private position: number;
  private last: { frameIndex: number; frame: Buffer } | null = null;

  constructor(child: ChildProcess, resolution: Resolution, decode: DecodeParams, startFrame: number) {
    if (!child.stdout) throw new Error("ffmpeg decoder has no stdout pipe");
    this.child = child;
    this.exit = trackExit(child);
    this.chunks = child.stdout[Symbol.asyncIterator]();
    this.frameSize = resolution.width * resolution.height * decode.bytesPerPixel;
    this.position = startFrame;
  }

  async readFrame(frameIndex: number): Promise<Buffer> {
    if (this.last && this.last.frameIndex === frameIndex) return this.last.frame;
    if (frameIndex < this.position) {
      throw new Error(`Frame ${frameIndex} requested after frame ${this.position - 1}; reads must not go backwards`);
    }

    while (this.position <= frameIndex) {
      const frame = await this.nextFrame();
      if (!frame) {
        throw new Error(
          `Decoder ended before frame ${frameIndex}: ${describeExit("ffmpeg", await this.exit)}`,
        );
      }
      this.last = { frameIndex: this.position, frame };
      this.position++;
    }
    return this.last?.frame ?? Buffer.alloc(0);
  }

  private async nextFrame(): Promise<Buffer | null> {
    while (this.pending.length < this.frameSize) {
      const next = await this.chunks.next();
      if (next.done) return null;
      if (Buffer.isBuffer(next.value)) {
        this.pending = Buffer.concat([this.pending, next.value]);
      }
    }
    const frame = this.pending.subarray(0, this.frameSize);
    this.pending = this.pending.subarray(this.frameSize);
    return Buffer.from(frame);
  }

  async close(): Promise<void> {
    if (this.child.exitCode === null && this.child.signalCode === null) {
      this.child.kill("SIGKILL");
    }
    await this.exit;
  }
}

// ─── Writer ─────────────────────────────────────────────────────────────────────

class FfmpegFrameWriter implements FrameWriter {
  private readonly child: ChildProcess;
  private readonly exit: Promise<ProcessExit>;
  private exited: ProcessExit | null = null;
  private pipeError: Error | null = null;

  constructor(child: ChildProcess) {
    this.child = child;
    this.exit = trackExit(child);
    void this.exit.then((exit) => {
      this.exited = exit;
    });
    child.stdin?.on("error", (err) => {
      this.pipeError = err;
    });
  }

  async writeFrame(frame: Buffer): Promise<void> {
    const stdin = this.child.stdin;
    if (!stdin) throw new Error("ffmpeg encoder has no stdin pipe");
    if (this.exited) throw new Error(`Encoder stopped early: ${describeExit("ffmpeg", this.exited)}`);
    if (this.pipeError) throw this.pipeError;

    if (!stdin.write(frame)) {
      await Promise.race([once(stdin, "drain"), this.exit]);
    }
  }

  async finish(): Promise<void> {
    this.child.stdin?.end();
    const exit = await this.exit;
    if (exit.code !== 0 || exit.spawnError) {
      throw new Error(describeExit("ffmpeg", exit));
    }
  }

  async abort(): Promise<void> {
    if (this.child.exitCode === null && this.child.signalCode === null) {
      this.child.kill("SIGKILL");
    }
    await this.exit;
  }
}

// ─── Codec ──────────────────────────────────────────────────────────────────────

export class FfmpegCodec implements MediaCodec {
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;

  constructor(options: FfmpegCodecOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
    this.ffprobePath = options.ffprobePath ?? "ffprobe";
  }

  async probe(mediaPath: string): Promise<MediaInfo> {
    const child = spawn(this.ffprobePath, buildProbeArgs(mediaPath), {
      stdio: ["ignore", "pipe", "pipe"],
    });
    const [stdout, exit] = await Promise.all([collectStdout(child), trackExit(child)]);
    if (exit.code !== 0 || exit.spawnError) {
      throw new Error(`Probing ${mediaPath} failed: ${describeExit("ffprobe", exit)}`);
    }
    return parseProbeOutput(stdout.toString("utf-8"));
  }

  async openReader(
    mediaPath: string,
    resolution: Resolution,
    decode: DecodeParams,
    startFrame: number,
  ): Promise<FrameReader> {
    const child = spawn(this.ffmpegPath, buildDecodeArgs(mediaPath, decode, startFrame), {
      stdio: ["ignore", "pipe", "pipe"],
    });
    return new FfmpegFrameReader(child, resolution, decode, startFrame);
  }

  async openWriter(outputPath: string, params: EncodeParams): Promise<FrameWriter> {
    const child = spawn(this.ffmpegPath, buildEncodeArgs(outputPath, params), {
      stdio: ["pipe", "ignore", "pipe"],
    });
    return new FfmpegFrameWriter(child);
  }

  async writeImage(outputPath: string, frame: Buffer, params: ImageParams): Promise<void> {
    const child = spawn(this.ffmpegPath, buildImageArgs(outputPath, params), {
      stdio: ["pipe", "ignore", "pipe"],
    });
    const writer = new FfmpegFrameWriter(child);
    await writer.writeFrame(frame);
    await writer.finish();
  }
}
