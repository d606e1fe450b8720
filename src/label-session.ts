// Manual labelling: one explicit current selection per participant, and an
// append-only list of selection changes rendered to CSV on export.

import { formatCsv } from "./csv.js";
import { ValidationError } from "./errors.js";
import type { LabelEntry, LabelSelection } from "./types.js";

export const CLEARED_LABEL = "none";

export class LabelSession {
  readonly participantId: string;
  private readonly clock: () => Date;
  private current: LabelSelection = { kind: "none" };
  private readonly log: LabelEntry[] = [];

  constructor(participantId: string, clock: () => Date = () => new Date()) {
    this.participantId = participantId;
    this.clock = clock;
  }

  get selection(): LabelSelection {
    return this.current;
  }

  get entries(): readonly LabelEntry[] {
    return this.log;
  }

  /**
   * Selecting the active label clears it; selecting any other label
   * replaces the selection.
   * @throws ValidationError for an empty label or the reserved `none`.
   */
  toggle(label: string): LabelSelection {
    const name = label.trim();
    if (name === "" || name === CLEARED_LABEL) {
      throw new ValidationError(`"${label}" is not a selectable label`);
    }
    if (this.current.kind === "selected" && this.current.label === name) {
      return this.clear();
    }
    this.current = { kind: "selected", label: name };
    this.append(name);
    return this.current;
  }

  /** No entry is appended when nothing is selected. */
  clear(): LabelSelection {
    if (this.current.kind === "none") return this.current;
    this.current = { kind: "none" };
    this.append(CLEARED_LABEL);
    return this.current;
  }

  toCsv(): string {
    return formatCsv(
      ["timestamp", "label", "participant_id"],
      this.log.map((e) => [e.timestamp, e.label, this.participantId]),
    );
  }

  private append(label: string): void {
    this.log.push(Object.freeze({ timestamp: this.clock().toISOString(), label }));
  }
}
