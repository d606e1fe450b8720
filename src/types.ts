// Gesture Segmenter - Shared TypeScript interfaces and types
//
// All times are seconds since the Unix epoch (floating point) unless a field
// name says otherwise. Text rendering happens only at export time.

// ─── Cameras ────────────────────────────────────────────────────────────────────

export type CameraModality = "webcam" | "azure_color" | "azure_depth" | "azure_ir";

export type CameraId = string;

export interface Resolution {
  width: number;
  height: number;
}

export interface CameraStream {
  cameraId: CameraId;
  modality: CameraModality;
  /** Estimated from the cleaned timestamp index (frames per second). */
  nativeFrameRate: number;
  /** Null until the media container has been probed (never probed in stats-only runs). */
  resolution: Resolution | null;
}

/** A camera found in the dataset layout, before its logs are read. */
export interface DiscoveredCamera {
  cameraId: CameraId;
  modality: CameraModality;
  mediaPath: string;
  frameLogPath: string;
}

// ─── Frame Timestamps ───────────────────────────────────────────────────────────

export interface FrameRecord {
  cameraId: CameraId;
  frameIndex: number;
  timestamp: number;
}

export interface RawFrameRow {
  /** Null when the log carries no frame index column (row position is used). */
  frameIndex: string | null;
  timestamp: string;
}

export type CorruptFrameReason =
  | "unparsable"
  | "non_increasing_index"
  | "out_of_order"
  | "duplicate_timestamp";

export interface CorruptFrameRecord {
  rowNumber: number; // 1-based data row, header excluded
  reason: CorruptFrameReason;
}

export interface FrameRange {
  /** Frame indices (container positions) of every kept frame inside the window, ascending. */
  frameIndices: number[];
  firstTimestamp: number | null;
  lastTimestamp: number | null;
}

// ─── Gesture Events ─────────────────────────────────────────────────────────────

export interface GestureEvent {
  participantId: string;
  gestureIndex: number;
  gestureName: string;
  onsetTimestamp: number;
  rowNumber: number; // 1-based data row in the source log
}

export type GestureLogWarning =
  | { kind: "row_order_mismatch"; rowNumber: number; gestureIndex: number }
  | { kind: "participant_mismatch"; rowNumber: number; found: string };

// ─── Segment Planning ───────────────────────────────────────────────────────────

export interface SegmentWindow {
  gestureIndex: number;
  requestedStart: number;
  requestedEnd: number;
  effectiveStart: number;
  effectiveEnd: number;
  /** True when the next gesture's onset cut the window short. */
  truncated: boolean;
  /** False when the window fell below the minimum duration. */
  accepted: boolean;
}

export interface PlannedSegment {
  event: GestureEvent;
  window: SegmentWindow;
}

// ─── Segment Lifecycle ──────────────────────────────────────────────────────────

export enum SegmentState {
  PLANNED = "planned",
  FRAMES_FOUND = "frames_found",
  ENCODED = "encoded",
  ACCEPTED = "accepted",
  NO_FRAMES = "no_frames",
  TOO_SHORT = "too_short",
  REJECTED = "rejected",
}

export type RejectionReason = "too_short" | "no_frames" | "encode_failed";

// ─── Manifest ───────────────────────────────────────────────────────────────────

export interface SegmentRecord {
  participantId: string;
  cameraId: CameraId;
  segmentId: string;
  gestureName: string;
  gestureIndex: number;
  gestureTime: number;
  startTime: number;
  endTime: number;
  duration: number;
  trainingDuration: number;
  readingTimeExcluded: boolean;
  trainingReady: boolean;
  filename: string; // "" when rejected
  filepath: string; // "" when rejected
  state: SegmentState.ACCEPTED | SegmentState.REJECTED;
  rejectionReason: RejectionReason | null;
  frameCount: number;
}

export interface CameraSegmentCounts {
  accepted: number;
  rejected: number;
}

export interface ManifestStatistics {
  totalSegments: number;
  acceptedSegments: number;
  rejectedSegments: number;
  rejectedByReason: Record<RejectionReason, number>;
  perCamera: Record<CameraId, CameraSegmentCounts>;
  gestureDistribution: Record<string, number>;
  totalTrainingMinutes: number;
}

// ─── Configuration ──────────────────────────────────────────────────────────────

export interface PipelineConfig {
  segmentDurationSeconds: number;
  readingCutoffSeconds: number;
  minSegmentDurationSeconds: number;
  targetFrameRate: number;
  basePath: string;
  statsOnly: boolean;
  duplicateToleranceSeconds: number;
  cameraConcurrency: number;
  excludedCameras: CameraId[];
  labelFrames: boolean;
  /** Write every frame of each accepted clip as an image plus the frame tables. */
  extractFrames: boolean;
}

export interface AppConfig {
  pipeline: PipelineConfig;
  ffmpegPath: string;
  ffprobePath: string;
  port: number;
  schedulesDir: string;
}

// ─── Run Results ────────────────────────────────────────────────────────────────

export type CameraSkipReason =
  | "missing_media"
  | "unreadable_media"
  | "missing_frame_log"
  | "malformed_frame_log";

export interface SkippedCamera {
  cameraId: CameraId;
  reason: CameraSkipReason;
  message: string;
}

export interface CameraDiagnostics {
  cameraId: CameraId;
  modality: CameraModality;
  keptFrames: number;
  corruptedFrames: number;
  corruptedByReason: Record<CorruptFrameReason, number>;
  nativeFrameRate: number;
}

export interface RunReport {
  participantId: string;
  configHash: string;
  aborted: boolean;
  gestureCount: number;
  gestureLogWarnings: GestureLogWarning[];
  cameras: CameraDiagnostics[];
  skippedCameras: SkippedCamera[];
  statistics: ManifestStatistics;
}

export interface FrameExportSummary {
  extractedFrames: number;
  failedClips: number;
  timestampsPath: string;
  alignedPath: string;
}

export interface RunResult {
  runId: string;
  report: RunReport;
  records: readonly SegmentRecord[];
  summaryPath: string;
  reportPath: string;
  /** Null when frame extraction was off, skipped or the run aborted. */
  frameExport: FrameExportSummary | null;
}

export interface SegmentProgressEvent {
  cameraId: CameraId;
  gestureIndex: number;
  state: SegmentState;
}

// ─── Experiment Sessions ────────────────────────────────────────────────────────

export type ExperimentPhase = "idle" | "reading" | "performing" | "break" | "complete";

export type SchedulerEvent =
  | { type: "phase_changed"; phase: ExperimentPhase; gestureIndex: number | null; remainingSeconds: number }
  | { type: "gesture_onset"; gestureIndex: number; gestureName: string; elapsedSeconds: number }
  | { type: "break_started"; completedSets: number; totalSets: number }
  | { type: "completed"; gestureCount: number };

export interface GestureLogEntry {
  participantId: string;
  gestureIndex: number;
  gestureName: string;
  timestamp: string; // as received (ISO)
}

export type LabelSelection = { kind: "none" } | { kind: "selected"; label: string };

export interface LabelEntry {
  timestamp: string;
  label: string; // "none" when the selection is cleared
}

// ─── WebSocket Messages ─────────────────────────────────────────────────────────

export type ServerMessage =
  | { type: "session_event"; participantId: string; sessionId: string; event: SchedulerEvent }
  | { type: "segment_progress"; runId: string; participantId: string; progress: SegmentProgressEvent }
  | { type: "run_complete"; runId: string; participantId: string; statistics: ManifestStatistics; aborted: boolean }
  | { type: "run_failed"; runId: string; participantId: string; message: string }
  | { type: "error"; message: string; recoverable: boolean };
