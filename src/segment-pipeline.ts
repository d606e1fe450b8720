// Gesture Segmenter - Segment Pipeline
// Central orchestrator for one participant's segmentation run:
//
//   gesture log → plan windows → discover cameras → per-camera extraction and
//   encoding (bounded pool) → single-writer manifest → summary + run report
//   → optional per-frame export of the accepted clips
//
// Only a missing or malformed gesture log aborts a run. Camera-level problems
// skip the camera; segment-level problems reject the segment. Both end up in
// the run report and the manifest, never as thrown errors.

import { readFile } from "node:fs/promises";
import { v4 as uuidv4 } from "uuid";
import { discoverCameras, isNotFound, pathExists, type DatasetLayout } from "./camera-discovery.js";
import { computeConfigHash } from "./config.js";
import { ConfigError, MalformedLogError, MissingMediaError, errorMessage } from "./errors.js";
import {
  FrameExporter,
  formatFrameTimestamps,
  formatTrainingAligned,
  type ClipFrames,
  type ExportedFrame,
} from "./frame-export.js";
import { FilePersistence } from "./file-persistence.js";
import { FrameExtractor, isEmptyExtraction, type CameraTimeline } from "./frame-extractor.js";
import { labelFrames } from "./frame-labeler.js";
import { parseGestureEventLog, type GestureEventLog } from "./gesture-event-log.js";
import { createLogger, type Logger } from "./logger.js";
import { ManifestBuilder, acceptedRecord, rejectedRecord, type RecordContext } from "./manifest-builder.js";
import type { MediaCodec } from "./media-codec.js";
import { SegmentEncoder, type EncodedSegment, type EncodeRequest } from "./segment-encoder.js";
import { SegmentLifecycle } from "./segment-lifecycle.js";
import { SegmentPlanner, windowDuration } from "./segment-planner.js";
import { TimestampIndex } from "./timestamp-index.js";
import { roundMetric, runWithConcurrency } from "./utils.js";
import {
  SegmentState,
  type CameraDiagnostics,
  type CameraSkipReason,
  type DiscoveredCamera,
  type FrameExportSummary,
  type FrameRecord,
  type PipelineConfig,
  type PlannedSegment,
  type Resolution,
  type RunReport,
  type RunResult,
  type SegmentProgressEvent,
  type SegmentRecord,
  type SkippedCamera,
} from "./types.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SegmentPipelineDeps {
  /** Required unless the pipeline runs in stats-only mode. */
  codec?: MediaCodec | null;
  persistence?: FilePersistence;
  logger?: Logger;
}

export interface RunOptions {
  /** Identifies the run in logs and progress events; generated when omitted. */
  runId?: string;
  /** Checked between gestures; clips already written are kept. */
  signal?: AbortSignal;
  onProgress?: (event: SegmentProgressEvent) => void;
}

interface PreparedCamera {
  camera: DiscoveredCamera;
  timeline: CameraTimeline;
  diagnostics: CameraDiagnostics;
}

type FrameLogResult =
  | { ok: true; index: TimestampIndex }
  | { ok: false; reason: CameraSkipReason; message: string };

interface CameraOutcome {
  records: SegmentRecord[];
  /** Accepted clips kept for frame export; empty unless it is enabled. */
  clips: ClipFrames[];
  aborted: boolean;
}

export class SegmentPipeline {
  private readonly config: PipelineConfig;
  private readonly codec: MediaCodec | null;
  private readonly persistence: FilePersistence;
  private readonly logger: Logger;
  private readonly planner: SegmentPlanner;
  private readonly extractor = new FrameExtractor();
  private readonly encoder: SegmentEncoder;

  constructor(config: PipelineConfig, deps: SegmentPipelineDeps = {}) {
    this.config = config;
    this.codec = deps.codec ?? null;
    if (!config.statsOnly && !this.codec) {
      throw new ConfigError("codec", "a media codec is required unless statsOnly is set");
    }
    this.persistence = deps.persistence ?? new FilePersistence(config.basePath);
    this.logger = deps.logger ?? createLogger("SegmentPipeline");
    this.planner = new SegmentPlanner(config);
    this.encoder = new SegmentEncoder(config.targetFrameRate, this.codec);
  }

  /**
   * Segment every discovered camera for one participant and write
   * `training_summary.csv` and `run_report.json`.
   *
   * @throws MalformedLogError when the gesture log is missing, empty or malformed.
   */
  async run(participantId: string, options: RunOptions = {}): Promise<RunResult> {
    const runId = options.runId ?? uuidv4();
    const configHash = computeConfigHash(this.config);
    const layout = this.persistence.layoutFor(participantId);

    this.logger.info(
      `Run ${runId} for participant ${participantId} (config ${configHash}${this.config.statsOnly ? ", stats only" : ""})`,
    );

    const gestureLog = await this.readGestureLog(layout);
    for (const warning of gestureLog.warnings) {
      if (warning.kind === "row_order_mismatch") {
        this.logger.warn(
          `Gesture ${warning.gestureIndex} (row ${warning.rowNumber}) is earlier than a preceding row; using timestamp order`,
        );
      } else {
        this.logger.warn(`Row ${warning.rowNumber} names participant "${warning.found}"`);
      }
    }

    const plan = this.planner.plan(gestureLog.events);
    const rejectedWindows = plan.filter((p) => !p.window.accepted).length;
    this.logger.info(
      `Planned ${plan.length} window(s), ${rejectedWindows} below ${this.config.minSegmentDurationSeconds}s`,
    );

    const discovered = await discoverCameras(layout, this.config.excludedCameras);
    const { prepared, skipped } = await this.prepareCameras(discovered);
    this.logger.info(
      `Cameras: ${prepared.map((p) => p.camera.cameraId).join(", ") || "none"}` +
        (skipped.length > 0 ? ` (skipped ${skipped.map((s) => s.cameraId).join(", ")})` : ""),
    );

    const outcomes = await runWithConcurrency(prepared, this.config.cameraConcurrency, (camera) =>
      this.processCamera(participantId, layout, camera, plan, options),
    );

    // Single writer: camera order, then gesture order within each camera.
    const manifest = new ManifestBuilder(participantId);
    for (const outcome of outcomes) {
      for (const record of outcome.records) manifest.append(record);
    }
    const aborted = outcomes.some((o) => o.aborted) || options.signal?.aborted === true;

    if (this.config.labelFrames && !aborted) {
      await this.writeLabeledFrames(layout, prepared, gestureLog);
    }

    let frameExport: FrameExportSummary | null = null;
    if (this.config.extractFrames) {
      if (this.config.statsOnly || !this.codec) {
        this.logger.info("Frame export skipped: stats-only runs write no clips");
      } else if (aborted) {
        this.logger.warn("Frame export skipped: run aborted");
      } else {
        frameExport = await this.exportFrames(this.codec, layout, prepared, outcomes);
      }
    }

    const statistics = manifest.statistics();
    const report: RunReport = {
      participantId,
      configHash,
      aborted,
      gestureCount: gestureLog.events.length,
      gestureLogWarnings: [...gestureLog.warnings],
      cameras: prepared.map((p) => p.diagnostics),
      skippedCameras: skipped,
      statistics,
    };

    const { summaryPath, reportPath } = await this.persistence.saveRunOutputs(
      participantId,
      manifest.toCsv(),
      report,
    );

    if (aborted) {
      this.logger.warn(`Run ${runId} aborted; partial manifest written to ${summaryPath}`);
    }
    this.logger.info(
      `Run ${runId} done: ${statistics.acceptedSegments}/${statistics.totalSegments} segment(s) training-ready, ` +
        `${statistics.totalTrainingMinutes} training minute(s)`,
    );
    const reasons = Object.entries(statistics.rejectedByReason)
      .filter(([, count]) => count > 0)
      .map(([reason, count]) => `${reason}=${count}`);
    if (reasons.length > 0) {
      this.logger.info(`Rejected: ${reasons.join(", ")}`);
    }

    return { runId, report, records: manifest.records, summaryPath, reportPath, frameExport };
  }

  // ─── Inputs ───────────────────────────────────────────────────────────────────

  private async readGestureLog(layout: DatasetLayout): Promise<GestureEventLog> {
    const path = layout.gestureLogPath;
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) throw new MalformedLogError("Gesture log not found", path);
      throw err;
    }
    return parseGestureEventLog(text, layout.participantId, path);
  }

  private async readFrameLog(camera: DiscoveredCamera): Promise<FrameLogResult> {
    let text: string;
    try {
      text = await readFile(camera.frameLogPath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        return { ok: false, reason: "missing_frame_log", message: `Frame log not found: ${camera.frameLogPath}` };
      }
      throw err;
    }
    try {
      const index = TimestampIndex.fromCsv(
        camera.cameraId,
        text,
        { duplicateToleranceSeconds: this.config.duplicateToleranceSeconds },
        camera.frameLogPath,
      );
      return { ok: true, index };
    } catch (err) {
      if (err instanceof MalformedLogError) {
        return { ok: false, reason: "malformed_frame_log", message: err.message };
      }
      throw err;
    }
  }

  /**
   * Load each camera's timestamp index and check its media. The Azure
   * modalities share one frame log, which is read and indexed once.
   */
  private async prepareCameras(
    cameras: readonly DiscoveredCamera[],
  ): Promise<{ prepared: PreparedCamera[]; skipped: SkippedCamera[] }> {
    const prepared: PreparedCamera[] = [];
    const skipped: SkippedCamera[] = [];
    const logs = new Map<string, FrameLogResult>();

    const skip = (cameraId: string, reason: CameraSkipReason, message: string) => {
      this.logger.warn(`Skipping camera ${cameraId}: ${message}`);
      skipped.push({ cameraId, reason, message });
    };

    for (const camera of cameras) {
      if (!(await pathExists(camera.mediaPath))) {
        skip(camera.cameraId, "missing_media", new MissingMediaError(camera.cameraId, camera.mediaPath).message);
        continue;
      }

      let log = logs.get(camera.frameLogPath);
      if (!log) {
        log = await this.readFrameLog(camera);
        logs.set(camera.frameLogPath, log);
      }
      if (!log.ok) {
        skip(camera.cameraId, log.reason, log.message);
        continue;
      }

      let resolution: Resolution | null = null;
      if (!this.config.statsOnly && this.codec) {
        try {
          resolution = (await this.codec.probe(camera.mediaPath)).resolution;
        } catch (err) {
          skip(camera.cameraId, "unreadable_media", errorMessage(err));
          continue;
        }
      }

      const { index } = log;
      const nativeFrameRate = roundMetric(index.estimatedFrameRate(), 3);
      if (index.corruptedFrameCount > 0) {
        this.logger.warn(`Camera ${camera.cameraId}: dropped ${index.corruptedFrameCount} corrupt frame row(s)`);
      }

      prepared.push({
        camera,
        timeline: {
          stream: { cameraId: camera.cameraId, modality: camera.modality, nativeFrameRate, resolution },
          index,
        },
        diagnostics: {
          cameraId: camera.cameraId,
          modality: camera.modality,
          keptFrames: index.size,
          corruptedFrames: index.corruptedFrameCount,
          corruptedByReason: index.corruptedByReason(),
          nativeFrameRate,
        },
      });
    }

    return { prepared, skipped };
  }

  // ─── Per-camera worker ────────────────────────────────────────────────────────

  /**
   * Gestures are handled strictly in onset order so the segment index follows
   * acceptance order. Returns records instead of touching the manifest.
   */
  private async processCamera(
    participantId: string,
    layout: DatasetLayout,
    prepared: PreparedCamera,
    plan: readonly PlannedSegment[],
    options: RunOptions,
  ): Promise<CameraOutcome> {
    const { camera, timeline } = prepared;
    const records: SegmentRecord[] = [];
    const clips: ClipFrames[] = [];
    const keepClips = this.config.extractFrames && !this.config.statsOnly;
    let segmentIndex = 0;

    for (const { event, window } of plan) {
      if (options.signal?.aborted) {
        return { records, clips, aborted: true };
      }

      const lifecycle = new SegmentLifecycle((state) =>
        options.onProgress?.({ cameraId: camera.cameraId, gestureIndex: event.gestureIndex, state }),
      );
      const ctx: RecordContext = {
        participantId,
        cameraId: camera.cameraId,
        event,
        window,
        readingTimeExcluded: this.config.readingCutoffSeconds > 0,
      };

      if (!window.accepted) {
        lifecycle.transition(SegmentState.TOO_SHORT);
        lifecycle.transition(SegmentState.REJECTED);
        records.push(rejectedRecord(ctx, "too_short"));
        continue;
      }

      const extraction = this.extractor.extract(window, timeline);
      if (isEmptyExtraction(extraction)) {
        this.logger.warn(`Camera ${camera.cameraId}: no frames for gesture ${event.gestureIndex}`);
        lifecycle.transition(SegmentState.NO_FRAMES);
        lifecycle.transition(SegmentState.REJECTED);
        records.push(rejectedRecord(ctx, "no_frames"));
        continue;
      }
      lifecycle.transition(SegmentState.FRAMES_FOUND);

      const request: EncodeRequest = {
        participantId,
        segmentIndex,
        gestureName: event.gestureName,
        extraction,
        durationSeconds: windowDuration(window),
        outputDir: layout.cameraOutputDir(camera.cameraId),
      };

      let segment: EncodedSegment;
      try {
        segment = await this.materialize(request, prepared);
      } catch (err) {
        this.logger.error(
          `Camera ${camera.cameraId}: encoding gesture ${event.gestureIndex} failed: ${errorMessage(err)}`,
        );
        lifecycle.transition(SegmentState.REJECTED);
        records.push(rejectedRecord(ctx, "encode_failed"));
        continue;
      }

      lifecycle.transition(SegmentState.ENCODED);
      lifecycle.transition(SegmentState.ACCEPTED);
      segmentIndex++;
      const record = acceptedRecord(ctx, segment);
      records.push(record);
      if (keepClips) {
        clips.push({ record, modality: camera.modality, sources: this.sourceFrames(request, timeline.index) });
      }
      this.logger.debug(
        `Camera ${camera.cameraId}: ${segment.filename} (${segment.frameCount} frames, ` +
          `${segment.droppedFrames} dropped, ${segment.duplicatedFrames} duplicated)`,
      );
    }

    return { records, clips, aborted: false };
  }

  /** Kept source frame behind each output frame of an encoded clip. */
  private sourceFrames(request: EncodeRequest, index: TimestampIndex): FrameRecord[] {
    const sources: FrameRecord[] = [];
    for (const frameIndex of this.encoder.plan(request).resample.sourceFrames) {
      const frame = index.frameByIndex(frameIndex);
      if (frame) sources.push(frame);
    }
    return sources;
  }

  private async materialize(
    request: EncodeRequest,
    prepared: PreparedCamera,
  ): Promise<EncodedSegment> {
    if (this.config.statsOnly) {
      return this.encoder.plan(request).segment;
    }
    const { resolution } = prepared.timeline.stream;
    if (!resolution) {
      throw new Error(`Camera ${prepared.camera.cameraId} has no probed resolution`);
    }
    return this.encoder.encode(request, prepared.camera.mediaPath, resolution);
  }

  // ─── Frame labelling ──────────────────────────────────────────────────────────

  private async writeLabeledFrames(
    layout: DatasetLayout,
    prepared: readonly PreparedCamera[],
    gestureLog: GestureEventLog,
  ): Promise<void> {
    const written = new Set<string>();
    for (const { camera, timeline } of prepared) {
      if (written.has(camera.frameLogPath)) continue;
      written.add(camera.frameLogPath);
      const path = await this.persistence.saveLabeledFrames(
        layout.labeledLogPath(camera.frameLogPath),
        labelFrames(timeline.index, gestureLog.events),
      );
      this.logger.info(`Labelled ${timeline.index.size} frame(s) → ${path}`);
    }
  }

  // ─── Frame export ─────────────────────────────────────────────────────────────

  /**
   * Write every frame of every accepted clip as an image, then the two frame
   * tables. A clip that cannot be read is logged and left out of both tables.
   */
  private async exportFrames(
    codec: MediaCodec,
    layout: DatasetLayout,
    prepared: readonly PreparedCamera[],
    outcomes: readonly CameraOutcome[],
  ): Promise<FrameExportSummary> {
    const exporter = new FrameExporter(codec, this.config.targetFrameRate);
    let failedClips = 0;

    const perCamera = await runWithConcurrency(outcomes, this.config.cameraConcurrency, async (outcome) => {
      const frames: ExportedFrame[] = [];
      for (const clip of outcome.clips) {
        try {
          frames.push(...(await exporter.exportClip(clip, layout.cameraFramesDir(clip.record.cameraId))));
        } catch (err) {
          failedClips++;
          this.logger.error(`Frame export for ${clip.record.filename} failed: ${errorMessage(err)}`);
        }
      }
      return frames;
    });

    const frames = perCamera.flat();
    const { timestampsPath, alignedPath } = await this.persistence.saveFrameTables(
      layout.participantId,
      formatFrameTimestamps(frames),
      formatTrainingAligned(frames, prepared.map((p) => p.camera.cameraId)),
    );
    this.logger.info(`Exported ${frames.length} frame(s) → ${layout.framesDir}`);
    return { extractedFrames: frames.length, failedClips, timestampsPath, alignedPath };
  }
}
