import * as fs from "fs";
import type {
  ConversionReport,
  ConversionResult,
  LlcDocument,
  RawRange,
  SkippedSegmentWarning,
  TimedSegment,
} from "./types/cutList";
import type { SegmentOptions } from "./types/convertConfig";
import { adjustRanges, skippedSegmentWarning } from "./utils/adjustRange";
import { ConfigError } from "./utils/errors";
import { framesToSeconds } from "./utils/formatTime";
import { buildLlcDocument, serializeLlcDocument } from "./utils/llcDocument";
import { nameSegments } from "./utils/nameSegments";
import { parseConvertConfig, parseSegmentOptions } from "./utils/parseConvertConfig";
import { parseVdscript, validateRawRanges } from "./utils/parseVdscript";
import { writeFileAtomic } from "./utils/writeFileAtomic";

/**
 * Validate → adjust → convert → name. Ranges that end up empty are dropped
 * and reported as warnings, never thrown.
 */
export function convertRanges(
  ranges: readonly RawRange[],
  options: SegmentOptions,
): ConversionResult {
  const { fps, extraFramesStart, extraFramesEnd, addSegmentNumber, decimals } =
    parseSegmentOptions(options);
  validateRawRanges(ranges);

  const adjusted = adjustRanges(ranges, extraFramesStart, extraFramesEnd);
  const warnings: SkippedSegmentWarning[] = [...adjusted.warnings];
  const timed: TimedSegment[] = [];

  for (const { index, range } of adjusted.entries) {
    const start = framesToSeconds(range.startFrame, fps, decimals);
    const end = framesToSeconds(range.endFrame, fps, decimals);
    if (end <= start) {
      warnings.push(
        skippedSegmentWarning(
          index,
          range.startFrame,
          range.endFrame,
          `collapses to zero length at ${decimals} decimal places`,
        ),
      );
      continue;
    }
    timed.push({ start, end });
  }

  warnings.sort((a, b) => a.index - b.index);
  return { segments: nameSegments(timed, addSegmentNumber), warnings };
}

export function convertVdscript(
  text: string,
  mediaFileName: string,
  options: SegmentOptions,
): ConversionResult & { document: LlcDocument } {
  const { ranges } = parseVdscript(text);
  const result = convertRanges(ranges, options);
  return { ...result, document: buildLlcDocument(mediaFileName, result.segments) };
}

/**
 * Read, convert and write in one blocking call. Any thrown error leaves the
 * destination untouched.
 */
export function convertVdscriptFile(input: unknown): ConversionReport {
  const config = parseConvertConfig(input);

  let text: string;
  try {
    text = fs.readFileSync(config.sourcePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read source script ${config.sourcePath}`, { cause: err });
  }

  const { segments, warnings, document } = convertVdscript(text, config.mediaFileName, config);

  const written = segments.length > 0;
  if (written) {
    writeFileAtomic(config.destinationPath, serializeLlcDocument(document), {
      overwrite: config.overwrite,
    });
  }

  return {
    emitted: segments.length,
    skipped: warnings.length,
    warnings,
    written,
    destinationPath: config.destinationPath,
    document,
  };
}
