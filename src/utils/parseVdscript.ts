/**
 * Reader for the frame subset section of VirtualDub / VirtualDub2 processing
 * scripts (.vdscript), as saved by VirtualDub2 build 44282:
 *
 *   VirtualDub.Open(U"C:\\capture\\proxy.mp4");
 *   VirtualDub.subset.Clear();
 *   VirtualDub.subset.AddRange(412,208);
 *
 * `AddRange(start, count)` keeps `count` frames from `start`, so the parsed
 * range is end-exclusive: [start, start + count).
 */
import type { ParsedVdscript, RawRange } from "../types/cutList";
import { ParseError } from "./errors";

const SUBSET_PREFIX = "VirtualDub.subset.";
const ADD_RANGE_RE =
  /^VirtualDub\.subset\.AddRange\(\s*([+-]?\d+)\s*,\s*([+-]?\d+)\s*\)\s*;?$/;
const NO_RANGE_RE = /^VirtualDub\.subset\.(?:Clear|Delete)\(\s*\)\s*;?$/;
const OPEN_RE = /^VirtualDub\.Open\(\s*U?"((?:[^"\\]|\\.)*)"/;
const TRAILING_COMMENT_RE = /\s*\/\/.*$/;

function parseFrameNumber(token: string, what: string, line: number): number {
  const n = Number.parseInt(token, 10);
  if (!Number.isSafeInteger(n)) {
    throw new ParseError(`${what} "${token}" is not a valid frame number`, { line });
  }
  return n;
}

export function parseVdscript(text: string): ParsedVdscript {
  const lines = text.replace(/^\uFEFF/, "").split(/\r\n|\r|\n/);
  const ranges: RawRange[] = [];
  let sourceFile: string | undefined;

  lines.forEach((rawLine, i) => {
    const lineNo = i + 1;
    const line = rawLine.trim();

    if (sourceFile === undefined) {
      const open = OPEN_RE.exec(line);
      if (open) {
        sourceFile = open[1].replace(/\\(.)/g, "$1");
        return;
      }
    }

    if (!line.startsWith(SUBSET_PREFIX)) return;

    const statement = line.replace(TRAILING_COMMENT_RE, "");
    if (NO_RANGE_RE.test(statement)) return;

    if (!statement.startsWith(`${SUBSET_PREFIX}AddRange`)) {
      throw new ParseError(`Unsupported subset statement: ${statement}`, { line: lineNo });
    }

    const match = ADD_RANGE_RE.exec(statement);
    const entry = ranges.length + 1;
    if (!match) {
      throw new ParseError(`Malformed AddRange entry: ${statement}`, { line: lineNo, entry });
    }

    const startFrame = parseFrameNumber(match[1], "start", lineNo);
    const count = parseFrameNumber(match[2], "frame count", lineNo);
    ranges.push({ startFrame, endFrame: startFrame + count, line: lineNo });
  });

  if (ranges.length === 0) {
    throw new ParseError("No VirtualDub.subset.AddRange entries found");
  }

  validateRawRanges(ranges);
  return sourceFile === undefined ? { ranges } : { ranges, sourceFile };
}

/** Throws a ParseError on the first range breaking `0 <= startFrame <= endFrame`. */
export function validateRawRanges(ranges: readonly RawRange[]): void {
  ranges.forEach((range, i) => {
    const position = { line: range.line, entry: i + 1 };
    if (!Number.isSafeInteger(range.startFrame) || !Number.isSafeInteger(range.endFrame)) {
      throw new ParseError(
        `Range bounds must be integers, got ${range.startFrame}..${range.endFrame}`,
        position,
      );
    }
    if (range.startFrame < 0) {
      throw new ParseError(`Start frame ${range.startFrame} is negative`, position);
    }
    if (range.endFrame < range.startFrame) {
      throw new ParseError(
        `End frame ${range.endFrame} precedes start frame ${range.startFrame}`,
        position,
      );
    }
  });
}
