/**
 * GestureRecorder: Append-only gesture onsets per participant.
 *
 * Onsets arrive from `POST /log_gesture` and from scheduler sessions. After
 * every new onset the participant's whole gesture log is re-rendered and
 * rewritten, so the file on disk always matches the in-memory records.
 */

import { ValidationError } from "./errors.js";
import type { FilePersistence } from "./file-persistence.js";
import type { GestureLogEntry } from "./types.js";
import { parseTimestamp } from "./utils.js";

export const PARTICIPANT_ID_PATTERN = /^[\w-]+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a `/log_gesture` body: `{ pid, gesture, gesture_index, timestamp }`.
 * `gesture_index` may be a number or a numeric string.
 * @throws ValidationError naming the offending field.
 */
export function parseGestureLogRequest(body: unknown): GestureLogEntry {
  if (!isRecord(body)) throw new ValidationError("Expected a JSON object");

  const { pid, gesture, gesture_index: rawIndex, timestamp } = body;
  const participantId = typeof pid === "number" ? String(pid) : pid;

  if (typeof participantId !== "string" || !PARTICIPANT_ID_PATTERN.test(participantId)) {
    throw new ValidationError("pid must be letters, digits, '_' or '-'");
  }
  if (typeof gesture !== "string" || gesture.trim() === "") {
    throw new ValidationError("gesture must be a non-empty string");
  }
  const gestureIndex = typeof rawIndex === "string" && /^\d+$/.test(rawIndex.trim()) ? Number(rawIndex) : rawIndex;
  if (typeof gestureIndex !== "number" || !Number.isInteger(gestureIndex) || gestureIndex < 1) {
    throw new ValidationError("gesture_index must be a positive integer");
  }
  if (typeof timestamp !== "string" || parseTimestamp(timestamp) === null) {
    throw new ValidationError("timestamp must be an ISO-8601 or epoch-seconds string");
  }

  return { participantId, gestureIndex, gestureName: gesture.trim(), timestamp: timestamp.trim() };
}

export class GestureRecorder {
  private readonly persistence: FilePersistence | null;
  private readonly byParticipant = new Map<string, GestureLogEntry[]>();
  private readonly loaded = new Set<string>();
  private readonly queues = new Map<string, Promise<unknown>>();

  constructor(persistence: FilePersistence | null = null) {
    this.persistence = persistence;
  }

  /**
   * Append an onset in memory. Re-sending an identical onset is a no-op;
   * a different onset under an already used gesture index is rejected.
   * @returns The stored entry.
   */
  record(entry: GestureLogEntry): GestureLogEntry {
    const entries = this.byParticipant.get(entry.participantId) ?? [];
    const existing = entries.find((e) => e.gestureIndex === entry.gestureIndex);
    if (existing) {
      if (existing.gestureName === entry.gestureName && existing.timestamp === entry.timestamp) {
        return existing;
      }
      throw new ValidationError(
        `Participant ${entry.participantId} already has gesture ${entry.gestureIndex} ("${existing.gestureName}")`,
      );
    }
    const stored = Object.freeze({ ...entry });
    entries.push(stored);
    this.byParticipant.set(entry.participantId, entries);
    return stored;
  }

  /**
   * Load previously persisted onsets, then record and persist the new one.
   * Calls for the same participant run one at a time.
   */
  async log(entry: GestureLogEntry): Promise<GestureLogEntry> {
    return this.enqueue(entry.participantId, () => this.logNow(entry));
  }

  /**
   * One past the highest gesture index recorded for the participant, counting
   * the persisted log and any onsets still queued. 1 when there are none.
   */
  async nextGestureIndex(participantId: string): Promise<number> {
    return this.enqueue(participantId, async () => {
      await this.ensureLoaded(participantId);
      return this.entriesFor(participantId).reduce((max, e) => Math.max(max, e.gestureIndex), 0) + 1;
    });
  }

  entriesFor(participantId: string): readonly GestureLogEntry[] {
    return this.byParticipant.get(participantId) ?? [];
  }

  participants(): string[] {
    return [...this.byParticipant.keys()].sort();
  }

  private enqueue<T>(participantId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(participantId) ?? Promise.resolve();
    const next = previous.then(task);
    // The queue only orders calls; each caller still sees its own failure
    this.queues.set(
      participantId,
      next.then(
        () => undefined,
        () => undefined,
      ),
    );
    return next;
  }

  private async ensureLoaded(pid: string): Promise<void> {
    if (!this.persistence || this.loaded.has(pid)) return;
    for (const saved of await this.persistence.loadGestureLog(pid)) {
      this.record(saved);
    }
    this.loaded.add(pid);
  }

  private async logNow(entry: GestureLogEntry): Promise<GestureLogEntry> {
    const pid = entry.participantId;
    await this.ensureLoaded(pid);
    const stored = this.record(entry);
    if (this.persistence) {
      await this.persistence.saveGestureLog(pid, this.entriesFor(pid));
    }
    return stored;
  }
}
