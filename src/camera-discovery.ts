/**
 * Dataset layout and camera discovery.
 *
 *   {base}/images/{pid}/{cam}/webcam_{cam}.mp4
 *   {base}/images/{pid}/azure/webcam_azure_kinect_{color|depth|ir}.mp4
 *   {base}/logs/{pid}/webcam_{cam}.csv
 *   {base}/logs/{pid}/webcam_azure_kinect.csv        (shared by all Azure modalities)
 *   {base}/logs/auto_labels_{pid}.csv                (gesture log)
 *   {base}/post-processed/{pid}/camera_{cam}/        (clips)
 *   {base}/frames/{pid}/camera_{cam}/                (per-frame images)
 *
 * A camera is discovered when either its frame log or its media exists;
 * whether both are present is checked later, per camera, by the pipeline.
 */

import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import type { CameraId, CameraModality, DiscoveredCamera } from "./types.js";

const AZURE_MODALITIES = ["color", "depth", "ir"] as const;
type AzureSuffix = (typeof AZURE_MODALITIES)[number];

const WEBCAM_LOG_PATTERN = /^webcam_(\d+)\.csv$/;

export class DatasetLayout {
  readonly basePath: string;
  readonly participantId: string;

  constructor(basePath: string, participantId: string) {
    this.basePath = basePath;
    this.participantId = participantId;
  }

  get imagesDir(): string {
    return join(this.basePath, "images", this.participantId);
  }

  get logsDir(): string {
    return join(this.basePath, "logs", this.participantId);
  }

  get outputDir(): string {
    return join(this.basePath, "post-processed", this.participantId);
  }

  get gestureLogPath(): string {
    return join(this.basePath, "logs", `auto_labels_${this.participantId}.csv`);
  }

  get summaryPath(): string {
    return join(this.outputDir, "training_summary.csv");
  }

  get reportPath(): string {
    return join(this.outputDir, "run_report.json");
  }

  get framesDir(): string {
    return join(this.basePath, "frames", this.participantId);
  }

  get frameTimestampsPath(): string {
    return join(this.framesDir, "frame_timestamps.csv");
  }

  get trainingAlignedPath(): string {
    return join(this.framesDir, "training_aligned.csv");
  }

  /** Manual label entries recorded through the labelling session. */
  get labelLogPath(): string {
    return join(this.logsDir, `manual_labels_${this.participantId}.csv`);
  }

  get azureLogPath(): string {
    return join(this.logsDir, "webcam_azure_kinect.csv");
  }

  webcamLogPath(cameraId: CameraId): string {
    return join(this.logsDir, `webcam_${cameraId}.csv`);
  }

  webcamMediaPath(cameraId: CameraId): string {
    return join(this.imagesDir, cameraId, `webcam_${cameraId}.mp4`);
  }

  azureMediaPath(suffix: AzureSuffix): string {
    return join(this.imagesDir, "azure", `webcam_azure_kinect_${suffix}.mp4`);
  }

  cameraOutputDir(cameraId: CameraId): string {
    return join(this.outputDir, `camera_${cameraId}`);
  }

  cameraFramesDir(cameraId: CameraId): string {
    return join(this.framesDir, `camera_${cameraId}`);
  }

  /** `webcam_3.csv` → `webcam_3_labeled.csv`, beside the source log. */
  labeledLogPath(frameLogPath: string): string {
    return frameLogPath.replace(/\.csv$/, "_labeled.csv");
  }
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

async function listDir(path: string): Promise<string[]> {
  try {
    return await readdir(path);
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Numeric camera ids first (numerically), then named ones alphabetically. */
export function compareCameraIds(a: CameraId, b: CameraId): number {
  const an = /^\d+$/.test(a);
  const bn = /^\d+$/.test(b);
  if (an && bn) return Number(a) - Number(b);
  if (an) return -1;
  if (bn) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

export async function discoverCameras(
  layout: DatasetLayout,
  excludedCameras: readonly CameraId[] = [],
): Promise<DiscoveredCamera[]> {
  const webcamIds = new Set<CameraId>();

  for (const name of await listDir(layout.logsDir)) {
    const match = WEBCAM_LOG_PATTERN.exec(name);
    if (match) webcamIds.add(match[1]);
  }
  for (const name of await listDir(layout.imagesDir)) {
    if (/^\d+$/.test(name) && (await pathExists(layout.webcamMediaPath(name)))) {
      webcamIds.add(name);
    }
  }

  const cameras: DiscoveredCamera[] = [...webcamIds].map((cameraId): DiscoveredCamera => ({
    cameraId,
    modality: "webcam",
    mediaPath: layout.webcamMediaPath(cameraId),
    frameLogPath: layout.webcamLogPath(cameraId),
  }));

  const azureLogPresent = await pathExists(layout.azureLogPath);
  for (const suffix of AZURE_MODALITIES) {
    const mediaPath = layout.azureMediaPath(suffix);
    if (azureLogPresent || (await pathExists(mediaPath))) {
      const modality: CameraModality = `azure_${suffix}`;
      cameras.push({ cameraId: modality, modality, mediaPath, frameLogPath: layout.azureLogPath });
    }
  }

  const excluded = new Set(excludedCameras);
  return cameras
    .filter((c) => !excluded.has(c.cameraId))
    .sort((a, b) => compareCameraIds(a.cameraId, b.cameraId));
}

