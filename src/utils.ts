// Shared utilities for the Gesture Segmenter.
//
// Deterministic helpers used by the log parsers, the planner and the manifest
// renderer, so every component reads and writes times the same way.

// ─── Timestamp parsing ──────────────────────────────────────────────────────────

const EPOCH_PATTERN = /^[+-]?\d+(?:\.\d+)?$/;

/**
 * `YYYY-MM-DD[ T]HH:MM:SS[.fraction][Z|±HH[:MM]]`
 * Groups: year, month, day, hour, minute, second, fraction, zone.
 */
const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:[.,](\d{1,9}))?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/**
 * Parse a log timestamp into seconds since the Unix epoch.
 *
 * Accepts epoch seconds (`1718000000.25`) or ISO-like text. ISO text without a
 * zone designator is read as UTC. Returns null when the text is not a valid
 * timestamp.
 */
export function parseTimestamp(text: string): number | null {
  const value = text.trim();
  if (value === "") return null;

  if (EPOCH_PATTERN.test(value)) {
    const seconds = Number(value);
    return Number.isFinite(seconds) ? seconds : null;
  }

  const match = ISO_PATTERN.exec(value);
  if (!match) return null;

  const [, y, mo, d, h, mi, s, fraction, zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const ms = Date.UTC(year, month - 1, day, hour, minute, second);
  // Reject rolled-over dates such as 2024-02-31
  if (new Date(ms).getUTCDate() !== day) return null;

  const fractionalSeconds = fraction ? Number(`0.${fraction}`) : 0;
  return ms / 1000 + fractionalSeconds - parseZoneOffset(zone);
}

/** Offset of a zone designator in seconds east of UTC. */
function parseZoneOffset(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 3600 + minutes * 60);
}

// ─── Rendering ──────────────────────────────────────────────────────────────────

/** ISO-8601 UTC with milliseconds, e.g. `1970-01-01T00:01:45.000Z`. */
export function formatIsoTimestamp(seconds: number): string {
  return new Date(Math.round(seconds * 1000)).toISOString();
}

/** Fixed three-decimal seconds. Negative values and -0 render as `0.000`. */
export function formatSeconds(seconds: number): string {
  const clamped = seconds > 0 ? seconds : 0;
  return clamped.toFixed(3);
}

/** Round a metric value to the specified number of decimal places. */
export function roundMetric(value: number, precision: number = 4): number {
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
}

// ─── Names ──────────────────────────────────────────────────────────────────────

/**
 * Make a gesture name safe for filenames: lower-cased, runs of anything
 * outside `[a-z0-9-]` collapsed to `_`, no leading or trailing `_`.
 */
export function sanitizeGestureName(name: string): string {
  const cleaned = name
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return cleaned === "" ? "gesture" : cleaned;
}

// ─── Concurrency ────────────────────────────────────────────────────────────────

/**
 * Run `worker` over `items` with at most `limit` in flight.
 * Results keep the input order regardless of completion order.
 * After the first rejection no new item starts; the call rejects with that
 * error once the items already running have settled.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  const lane = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await worker(items[index], index);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };

  const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => lane());
  const settled = await Promise.allSettled(lanes);
  for (const outcome of settled) {
    if (outcome.status === "rejected") throw outcome.reason;
  }
  return results;
}
