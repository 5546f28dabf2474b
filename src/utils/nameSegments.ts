import type { TimedSegment } from "../types/cutList";

/**
 * Label surviving segments "segment 1", "segment 2", … in output order.
 * Skipped ranges never reach this point, so they take no number.
 */
export function nameSegments(
  segments: readonly TimedSegment[],
  addSegmentNumber: boolean,
): TimedSegment[] {
  if (!addSegmentNumber) return segments.map(({ start, end }) => ({ start, end }));
  let n = 0;
  return segments.map(({ start, end }) => {
    n += 1;
    return { start, end, name: `segment ${n}` };
  });
}
