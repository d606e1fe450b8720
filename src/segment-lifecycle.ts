// Per (camera, gesture) segment state machine.

import { InvalidTransitionError } from "./errors.js";
import { SegmentState } from "./types.js";

/**
 * Valid state transitions.
 *
 * PLANNED → FRAMES_FOUND → ENCODED → ACCEPTED
 * PLANNED → NO_FRAMES → REJECTED
 * PLANNED → TOO_SHORT → REJECTED
 * FRAMES_FOUND → REJECTED            (encode failure)
 */
const VALID_TRANSITIONS: ReadonlyMap<SegmentState, readonly SegmentState[]> = new Map([
  [SegmentState.PLANNED, [SegmentState.FRAMES_FOUND, SegmentState.NO_FRAMES, SegmentState.TOO_SHORT]],
  [SegmentState.FRAMES_FOUND, [SegmentState.ENCODED, SegmentState.REJECTED]],
  [SegmentState.ENCODED, [SegmentState.ACCEPTED]],
  [SegmentState.NO_FRAMES, [SegmentState.REJECTED]],
  [SegmentState.TOO_SHORT, [SegmentState.REJECTED]],
  [SegmentState.ACCEPTED, []],
  [SegmentState.REJECTED, []],
]);

export class SegmentLifecycle {
  private current: SegmentState = SegmentState.PLANNED;
  private readonly onTransition: ((state: SegmentState) => void) | null;

  constructor(onTransition: ((state: SegmentState) => void) | null = null) {
    this.onTransition = onTransition;
  }

  get state(): SegmentState {
    return this.current;
  }

  /** @throws InvalidTransitionError */
  transition(target: SegmentState): void {
    const allowed = VALID_TRANSITIONS.get(this.current) ?? [];
    if (!allowed.includes(target)) {
      throw new InvalidTransitionError(this.current, target);
    }
    this.current = target;
    this.onTransition?.(target);
  }
}
