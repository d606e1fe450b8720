// Property-Based Test: cleaned timestamp indices are strictly monotonic and
// window lookups return exactly the frames inside the window.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { TimestampIndex } from "./timestamp-index.js";
import type { RawFrameRow } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

/** Arbitrary frame log rows: mostly valid, with shuffles, repeats and junk mixed in. */
const arbitraryRows = (): fc.Arbitrary<RawFrameRow[]> =>
  fc.array(
    fc.oneof(
      { weight: 8, arbitrary: fc.tuple(fc.integer({ min: 0, max: 500 }), fc.integer({ min: 0, max: 5000 })) },
      { weight: 1, arbitrary: fc.constant(null) },
    ),
    { maxLength: 120 },
  ).map((entries) =>
    entries.map((entry) =>
      entry === null
        ? { frameIndex: "x", timestamp: "not-a-time" }
        : { frameIndex: String(entry[0]), timestamp: String(entry[1] / 100) },
    ),
  );

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("TimestampIndex properties", () => {
  it("kept frames are strictly increasing in index and timestamp", () => {
    fc.assert(
      fc.property(arbitraryRows(), (rows) => {
        const index = TimestampIndex.fromRows("1", rows);
        for (let i = 1; i < index.size; i++) {
          const prev = index.frameAt(i - 1);
          const cur = index.frameAt(i);
          expect(prev).not.toBeNull();
          expect(cur).not.toBeNull();
          expect(cur!.frameIndex).toBeGreaterThan(prev!.frameIndex);
          expect(cur!.timestamp).toBeGreaterThan(prev!.timestamp);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("every row is either kept or recorded as corrupt", () => {
    fc.assert(
      fc.property(arbitraryRows(), (rows) => {
        const index = TimestampIndex.fromRows("1", rows);
        expect(index.size + index.corruptedFrameCount).toBe(rows.length);
      }),
      { numRuns: 200 },
    );
  });

  it("window lookups match a linear scan", () => {
    fc.assert(
      fc.property(
        arbitraryRows(),
        fc.integer({ min: 0, max: 5000 }),
        fc.integer({ min: 0, max: 2000 }),
        (rows, startHundredths, lengthHundredths) => {
          const index = TimestampIndex.fromRows("1", rows);
          const start = startHundredths / 100;
          const end = (startHundredths + lengthHundredths) / 100;

          const expected: number[] = [];
          for (let i = 0; i < index.size; i++) {
            const frame = index.frameAt(i)!;
            if (frame.timestamp >= start && frame.timestamp <= end) expected.push(frame.frameIndex);
          }
          expect(index.frameRangeForWindow(start, end).frameIndices).toEqual(expected);
        },
      ),
      { numRuns: 200 },
    );
  });
});
