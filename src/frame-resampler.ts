/**
 * Frame resampler that normalises a clip to the target frame rate.
 * Output frame j takes source frame floor(j * n / m), so surplus frames are
 * dropped and missing ones duplicated at an even stride.
 */

export interface ResamplePlan {
  /** Source frame index for every output frame, non-decreasing. */
  sourceFrames: number[];
  droppedFrames: number;
  duplicatedFrames: number;
}

export class FrameResampler {
  private readonly targetFrameRate: number;

  constructor(targetFrameRate: number) {
    this.targetFrameRate = targetFrameRate;
  }

  /** Frames in a clip of this duration; never less than one. */
  outputFrameCount(durationSeconds: number): number {
    return Math.max(1, Math.round(durationSeconds * this.targetFrameRate));
  }

  plan(sourceFrames: readonly number[], durationSeconds: number): ResamplePlan {
    const n = sourceFrames.length;
    if (n === 0) {
      return { sourceFrames: [], droppedFrames: 0, duplicatedFrames: 0 };
    }

    const m = this.outputFrameCount(durationSeconds);
    const mapped: number[] = new Array<number>(m);
    let distinct = 0;
    let previous = -1;
    for (let j = 0; j < m; j++) {
      const position = Math.floor((j * n) / m);
      mapped[j] = sourceFrames[position];
      if (position !== previous) distinct++;
      previous = position;
    }

    return {
      sourceFrames: mapped,
      droppedFrames: n - distinct,
      duplicatedFrames: m - distinct,
    };
  }

  get rate(): number {
    return this.targetFrameRate;
  }
}
