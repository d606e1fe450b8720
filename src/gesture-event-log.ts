/**
 * Gesture event log parsing.
 *
 * Accepts the `gesture_index, gesture_name, timestamp` layout as well as the
 * recorder's own `Timestamp, Gesture, Gesture_Index, Participant_ID` header.
 * Events come back sorted by onset; when row order and timestamp order
 * disagree, timestamp order wins and each offending row is reported as a
 * warning instead of being reordered silently.
 */

import { parseCsv, findColumn } from "./csv.js";
import { MalformedLogError } from "./errors.js";
import { parseTimestamp } from "./utils.js";
import type { GestureEvent, GestureLogWarning } from "./types.js";

export interface GestureEventLog {
  participantId: string;
  events: readonly GestureEvent[];
  warnings: readonly GestureLogWarning[];
}

const INDEX_COLUMNS = ["gesture_index", "index"];
const NAME_COLUMNS = ["gesture_name", "gesture", "label"];
const TIMESTAMP_COLUMNS = ["timestamp", "onset", "time"];
const PARTICIPANT_COLUMNS = ["participant_id", "pid"];

/**
 * @throws MalformedLogError on a missing header or column, an unparsable
 *   timestamp or gesture index, a repeated gesture index, or zero rows.
 */
export function parseGestureEventLog(
  text: string,
  participantId: string,
  logPath: string | null = null,
): GestureEventLog {
  const table = parseCsv(text);
  if (!table) {
    throw new MalformedLogError("Gesture log is empty", logPath);
  }

  const idxCol = findColumn(table.header, INDEX_COLUMNS);
  const nameCol = findColumn(table.header, NAME_COLUMNS);
  const tsCol = findColumn(table.header, TIMESTAMP_COLUMNS);
  const pidCol = findColumn(table.header, PARTICIPANT_COLUMNS);

  const missing = [
    idxCol < 0 ? "gesture_index" : null,
    nameCol < 0 ? "gesture_name" : null,
    tsCol < 0 ? "timestamp" : null,
  ].filter((c): c is string => c !== null);
  if (missing.length > 0) {
    throw new MalformedLogError(`Gesture log is missing column(s): ${missing.join(", ")}`, logPath);
  }

  if (table.rows.length === 0) {
    throw new MalformedLogError("Gesture log has no rows", logPath);
  }

  const warnings: GestureLogWarning[] = [];
  const seen = new Set<number>();
  const events: GestureEvent[] = [];
  let latestOnset = -Infinity;

  table.rows.forEach((fields, i) => {
    const rowNumber = i + 1;
    const rawIndex = (fields[idxCol] ?? "").trim();
    const rawTimestamp = fields[tsCol] ?? "";

    if (!/^-?\d+$/.test(rawIndex)) {
      throw new MalformedLogError(`Row ${rowNumber}: gesture_index "${rawIndex}" is not an integer`, logPath);
    }
    const gestureIndex = Number(rawIndex);
    if (seen.has(gestureIndex)) {
      throw new MalformedLogError(`Row ${rowNumber}: duplicate gesture_index ${gestureIndex}`, logPath);
    }
    seen.add(gestureIndex);

    const onsetTimestamp = parseTimestamp(rawTimestamp);
    if (onsetTimestamp === null) {
      throw new MalformedLogError(`Row ${rowNumber}: unparsable timestamp "${rawTimestamp}"`, logPath);
    }

    if (onsetTimestamp < latestOnset) {
      warnings.push({ kind: "row_order_mismatch", rowNumber, gestureIndex });
    }
    latestOnset = Math.max(latestOnset, onsetTimestamp);

    if (pidCol >= 0) {
      const found = (fields[pidCol] ?? "").trim();
      if (found !== "" && found !== participantId) {
        warnings.push({ kind: "participant_mismatch", rowNumber, found });
      }
    }

    events.push(
      Object.freeze({
        participantId,
        gestureIndex,
        gestureName: (fields[nameCol] ?? "").trim(),
        onsetTimestamp,
        rowNumber,
      }),
    );
  });

  // Stable: equal onsets keep their row order
  events.sort((a, b) => a.onsetTimestamp - b.onsetTimestamp || a.rowNumber - b.rowNumber);

  return {
    participantId,
    events: Object.freeze(events),
    warnings: Object.freeze(warnings),
  };
}
