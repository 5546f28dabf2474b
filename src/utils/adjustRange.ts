import type { AdjustedRange, RawRange, SkippedSegmentWarning } from "../types/cutList";

export type AdjustOutcome =
  | { ok: true; range: AdjustedRange }
  | { ok: false; startFrame: number; endFrame: number };

/**
 * Pad or trim one range. Positive offsets always add frames (the start moves
 * earlier, the end later); negative offsets remove them. The start never
 * goes below frame 0.
 */
export function adjustRange(
  raw: RawRange,
  extraFramesStart: number,
  extraFramesEnd: number,
): AdjustOutcome {
  const startFrame = Math.max(0, raw.startFrame - extraFramesStart);
  const endFrame = raw.endFrame + extraFramesEnd;
  if (endFrame <= startFrame) return { ok: false, startFrame, endFrame };
  return { ok: true, range: { startFrame, endFrame } };
}

export interface AdjustedRanges {
  /** Surviving ranges with their 1-based position in the input list */
  entries: { index: number; range: AdjustedRange }[];
  warnings: SkippedSegmentWarning[];
}

export function skippedSegmentWarning(
  index: number,
  startFrame: number,
  endFrame: number,
  reason = "has non-positive duration after adjusting frames",
): SkippedSegmentWarning {
  return {
    kind: "skipped-segment",
    index,
    startFrame,
    endFrame,
    message: `Segment ${index} ${reason} (start ${startFrame}, end ${endFrame}); skipped`,
  };
}

export function adjustRanges(
  raws: readonly RawRange[],
  extraFramesStart: number,
  extraFramesEnd: number,
): AdjustedRanges {
  const entries: AdjustedRanges["entries"] = [];
  const warnings: SkippedSegmentWarning[] = [];

  raws.forEach((raw, i) => {
    const outcome = adjustRange(raw, extraFramesStart, extraFramesEnd);
    if (outcome.ok) {
      entries.push({ index: i + 1, range: outcome.range });
    } else {
      warnings.push(skippedSegmentWarning(i + 1, outcome.startFrame, outcome.endFrame));
    }
  });

  return { entries, warnings };
}
