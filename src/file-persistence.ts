// Gesture Segmenter - File Persistence
// Writes run outputs and recorded logs into the dataset layout.
//
// Every file is rendered in full from in-memory records and rewritten, never
// appended to, so retrying an export after a failure cannot leave a half
// written or duplicated row behind.

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { DatasetLayout, isNotFound } from "./camera-discovery.js";
import { findColumn, formatCsv, parseCsv } from "./csv.js";
import { formatLabeledFrames, type LabeledFrame } from "./frame-labeler.js";
import type { GestureLogEntry, RunReport } from "./types.js";

export const GESTURE_LOG_COLUMNS = ["Timestamp", "Gesture", "Gesture_Index", "Participant_ID"] as const;

/** Serializes a RunReport to a pretty-printed JSON string. */
export function formatRunReport(report: RunReport): string {
  return JSON.stringify(report, null, 2) + "\n";
}

/**
 * Renders recorded onsets in the recorder's CSV layout:
 *   Timestamp,Gesture,Gesture_Index,Participant_ID
 */
export function formatGestureLog(entries: readonly GestureLogEntry[]): string {
  return formatCsv(
    GESTURE_LOG_COLUMNS,
    entries.map((e) => [e.timestamp, e.gestureName, e.gestureIndex, e.participantId]),
  );
}

/**
 * Reads back a file written by formatGestureLog. Rows that do not carry an
 * integer gesture index are skipped; the segmentation pipeline re-validates
 * the file strictly when it parses it as a gesture log.
 */
export function parseGestureLogEntries(text: string, participantId: string): GestureLogEntry[] {
  const table = parseCsv(text);
  if (!table) return [];

  const tsCol = findColumn(table.header, ["timestamp"]);
  const nameCol = findColumn(table.header, ["gesture", "gesture_name"]);
  const idxCol = findColumn(table.header, ["gesture_index"]);
  const pidCol = findColumn(table.header, ["participant_id"]);
  if (tsCol < 0 || nameCol < 0 || idxCol < 0) return [];

  const entries: GestureLogEntry[] = [];
  for (const fields of table.rows) {
    const rawIndex = (fields[idxCol] ?? "").trim();
    if (!/^\d+$/.test(rawIndex)) continue;
    entries.push({
      participantId: pidCol >= 0 ? (fields[pidCol] ?? "").trim() || participantId : participantId,
      gestureIndex: Number(rawIndex),
      gestureName: (fields[nameCol] ?? "").trim(),
      timestamp: (fields[tsCol] ?? "").trim(),
    });
  }
  return entries;
}

async function writeText(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf-8");
}

/**
 * FilePersistence maps a participant onto the dataset layout:
 *   {basePath}/logs/auto_labels_{pid}.csv
 *   {basePath}/logs/{pid}/manual_labels_{pid}.csv
 *   {basePath}/logs/{pid}/webcam_{cam}_labeled.csv
 *   {basePath}/post-processed/{pid}/training_summary.csv
 *   {basePath}/post-processed/{pid}/run_report.json
 *   {basePath}/frames/{pid}/frame_timestamps.csv
 *   {basePath}/frames/{pid}/training_aligned.csv
 */
export class FilePersistence {
  readonly basePath: string;

  constructor(basePath: string = "dataset") {
    this.basePath = basePath;
  }

  layoutFor(participantId: string): DatasetLayout {
    return new DatasetLayout(this.basePath, participantId);
  }

  /**
   * Writes the training summary and the run report.
   * @returns The two paths that were written.
   */
  async saveRunOutputs(
    participantId: string,
    summaryCsv: string,
    report: RunReport,
  ): Promise<{ summaryPath: string; reportPath: string }> {
    const layout = this.layoutFor(participantId);
    await writeText(layout.summaryPath, summaryCsv);
    await writeText(layout.reportPath, formatRunReport(report));
    return { summaryPath: layout.summaryPath, reportPath: layout.reportPath };
  }

  async saveFrameTables(
    participantId: string,
    timestampsCsv: string,
    alignedCsv: string,
  ): Promise<{ timestampsPath: string; alignedPath: string }> {
    const layout = this.layoutFor(participantId);
    await writeText(layout.frameTimestampsPath, timestampsCsv);
    await writeText(layout.trainingAlignedPath, alignedCsv);
    return { timestampsPath: layout.frameTimestampsPath, alignedPath: layout.trainingAlignedPath };
  }

  async saveLabeledFrames(outputPath: string, frames: readonly LabeledFrame[]): Promise<string> {
    await writeText(outputPath, formatLabeledFrames(frames));
    return outputPath;
  }

  async saveGestureLog(participantId: string, entries: readonly GestureLogEntry[]): Promise<string> {
    const path = this.layoutFor(participantId).gestureLogPath;
    await writeText(path, formatGestureLog(entries));
    return path;
  }

  /** Previously recorded onsets, or an empty list when the log does not exist yet. */
  async loadGestureLog(participantId: string): Promise<GestureLogEntry[]> {
    const path = this.layoutFor(participantId).gestureLogPath;
    try {
      return parseGestureLogEntries(await readFile(path, "utf-8"), participantId);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
  }

  async saveLabelLog(participantId: string, csv: string): Promise<string> {
    const path = this.layoutFor(participantId).labelLogPath;
    await writeText(path, csv);
    return path;
  }
}
