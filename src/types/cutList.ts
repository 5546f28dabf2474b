/** A `VirtualDub.subset.AddRange` entry resolved to an end-exclusive frame span. */
export interface RawRange {
  startFrame: number;
  endFrame: number;
  /** 1-based line in the source script, when parsed from text */
  line?: number;
}

export interface AdjustedRange {
  startFrame: number;
  endFrame: number;
}

export interface TimedSegment {
  start: number;
  end: number;
  name?: string;
}

export interface ParsedVdscript {
  ranges: RawRange[];
  /** Path from `VirtualDub.Open(U"...")`, if the script opens a file */
  sourceFile?: string;
}

export interface SkippedSegmentWarning {
  kind: "skipped-segment";
  /** 1-based position of the range in the source list */
  index: number;
  startFrame: number;
  endFrame: number;
  message: string;
}

export interface LlcCutSegment {
  start: number;
  end: number;
  name: string;
}

/** LosslessCut project file (.llc), as written by LosslessCut 3.6x. */
export interface LlcDocument {
  version: number;
  mediaFileName: string;
  cutSegments: LlcCutSegment[];
}

export interface ConversionResult {
  segments: TimedSegment[];
  warnings: SkippedSegmentWarning[];
}

export interface ConversionReport {
  emitted: number;
  skipped: number;
  warnings: SkippedSegmentWarning[];
  written: boolean;
  destinationPath: string;
  document: LlcDocument;
}
