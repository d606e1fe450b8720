// Gesture Segmenter - Configuration
//
// Built once at startup from the environment (.env is loaded by the entry
// point) and passed explicitly to every component afterwards.

import { createHash } from "node:crypto";
import { ConfigError } from "./errors.js";
import type { AppConfig, PipelineConfig } from "./types.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  segmentDurationSeconds: 15,
  readingCutoffSeconds: 5,
  minSegmentDurationSeconds: 3,
  targetFrameRate: 30,
  basePath: "dataset",
  statsOnly: false,
  duplicateToleranceSeconds: 0,
  cameraConcurrency: 2,
  excludedCameras: [],
  labelFrames: false,
  extractFrames: false,
};

export const DEFAULT_APP_CONFIG: AppConfig = {
  pipeline: DEFAULT_PIPELINE_CONFIG,
  ffmpegPath: "ffmpeg",
  ffprobePath: "ffprobe",
  port: 3000,
  schedulesDir: "schedules",
};

// ─── Environment readers ────────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(key, `"${raw}" is not a number`);
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  throw new ConfigError(key, `"${raw}" is not a boolean`);
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key];
  return raw === undefined || raw.trim() === "" ? fallback : raw.trim();
}

function readList(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "");
}

// ─── Loading & validation ───────────────────────────────────────────────────────

/**
 * Read the configuration from environment variables, falling back to the
 * defaults. @throws ConfigError on any unparsable or out-of-range value.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const d = DEFAULT_PIPELINE_CONFIG;
  const pipeline = validatePipelineConfig({
    segmentDurationSeconds: readNumber(env, "SEGMENT_DURATION", d.segmentDurationSeconds),
    readingCutoffSeconds: readNumber(env, "READING_CUTOFF", d.readingCutoffSeconds),
    minSegmentDurationSeconds: readNumber(env, "MIN_DURATION", d.minSegmentDurationSeconds),
    targetFrameRate: readNumber(env, "TARGET_FPS", d.targetFrameRate),
    basePath: readString(env, "BASE_PATH", d.basePath),
    statsOnly: readBoolean(env, "STATS_ONLY", d.statsOnly),
    duplicateToleranceSeconds: readNumber(env, "DUPLICATE_TOLERANCE", d.duplicateToleranceSeconds),
    cameraConcurrency: readNumber(env, "CAMERA_CONCURRENCY", d.cameraConcurrency),
    excludedCameras: readList(env, "EXCLUDED_CAMERAS", d.excludedCameras),
    labelFrames: readBoolean(env, "LABEL_FRAMES", d.labelFrames),
    extractFrames: readBoolean(env, "EXTRACT_FRAMES", d.extractFrames),
  });

  const port = readNumber(env, "PORT", DEFAULT_APP_CONFIG.port);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError("PORT", `${port} is not a valid port`);
  }

  return {
    pipeline,
    ffmpegPath: readString(env, "FFMPEG_PATH", DEFAULT_APP_CONFIG.ffmpegPath),
    ffprobePath: readString(env, "FFPROBE_PATH", DEFAULT_APP_CONFIG.ffprobePath),
    port,
    schedulesDir: readString(env, "SCHEDULES_DIR", DEFAULT_APP_CONFIG.schedulesDir),
  };
}

/** @throws ConfigError naming the first invalid field. */
export function validatePipelineConfig(config: PipelineConfig): PipelineConfig {
  if (!(config.segmentDurationSeconds > 0)) {
    throw new ConfigError("segmentDurationSeconds", "must be greater than 0");
  }
  if (!(config.readingCutoffSeconds >= 0)) {
    throw new ConfigError("readingCutoffSeconds", "must be 0 or greater");
  }
  if (!(config.minSegmentDurationSeconds >= 0)) {
    throw new ConfigError("minSegmentDurationSeconds", "must be 0 or greater");
  }
  if (config.minSegmentDurationSeconds > config.segmentDurationSeconds) {
    throw new ConfigError("minSegmentDurationSeconds", "must not exceed segmentDurationSeconds");
  }
  if (!(config.targetFrameRate > 0)) {
    throw new ConfigError("targetFrameRate", "must be greater than 0");
  }
  if (config.basePath.trim() === "") {
    throw new ConfigError("basePath", "must not be empty");
  }
  if (!(config.duplicateToleranceSeconds >= 0)) {
    throw new ConfigError("duplicateToleranceSeconds", "must be 0 or greater");
  }
  if (!Number.isInteger(config.cameraConcurrency) || config.cameraConcurrency < 1) {
    throw new ConfigError("cameraConcurrency", "must be a positive integer");
  }
  return config;
}

/** Short SHA-256 of the pipeline config, logged with every run for reproducibility. */
export function computeConfigHash(config: PipelineConfig): string {
  const json = JSON.stringify(config, Object.keys(config).sort());
  return createHash("sha256").update(json).digest("hex").slice(0, 16);
}
