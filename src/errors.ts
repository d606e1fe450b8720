// Gesture Segmenter - Error taxonomy
//
// Only MalformedLogError on the gesture log and ConfigError at startup abort
// a run. Everything else is recovered per camera or per segment and surfaces
// as manifest flags or run-report diagnostics.

export type SegmenterErrorCode =
  | "MALFORMED_LOG"
  | "MISSING_MEDIA"
  | "CONFIG"
  | "INVALID_TRANSITION"
  | "VALIDATION";

export class SegmenterError extends Error {
  readonly code: SegmenterErrorCode;

  constructor(code: SegmenterErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Gesture or frame log that cannot be parsed, or that has no usable rows. */
export class MalformedLogError extends SegmenterError {
  readonly logPath: string | null;

  constructor(message: string, logPath: string | null = null) {
    super("MALFORMED_LOG", logPath ? `${message} (${logPath})` : message);
    this.logPath = logPath;
  }
}

/** Expected video container is absent for a camera. */
export class MissingMediaError extends SegmenterError {
  readonly cameraId: string;
  readonly mediaPath: string;

  constructor(cameraId: string, mediaPath: string) {
    super("MISSING_MEDIA", `Media not found for camera ${cameraId}: ${mediaPath}`);
    this.cameraId = cameraId;
    this.mediaPath = mediaPath;
  }
}

export class ConfigError extends SegmenterError {
  readonly key: string;

  constructor(key: string, message: string) {
    super("CONFIG", `Invalid configuration for ${key}: ${message}`);
    this.key = key;
  }
}

export class InvalidTransitionError extends SegmenterError {
  constructor(from: string, to: string) {
    super("INVALID_TRANSITION", `Invalid segment state transition: "${from}" → "${to}"`);
  }
}

/** A request or recorded value that does not have the expected shape. */
export class ValidationError extends SegmenterError {
  constructor(message: string) {
    super("VALIDATION", message);
  }
}

/** Normalise an unknown thrown value to a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
