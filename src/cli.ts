import * as fs from "fs";
import * as path from "path";
import { convertVdscriptFile } from "./convert";
import type { ConvertConfigInput } from "./types/convertConfig";
import { ConfigError, CutListError, type CutListErrorKind } from "./utils/errors";
import { formatTimecode } from "./utils/formatTime";
import { parseVdscript } from "./utils/parseVdscript";

export type Logger = Pick<Console, "log" | "warn" | "error">;

const TAG = "[vdscript-to-llc]";

export const USAGE = `Usage: npx tsx scripts/vdscript-to-llc.ts <input.vdscript> --fps <n> [options]

Options:
  -o, --output <path>    .llc file to write (default: input name with .llc)
  -m, --media <name>     media filename stored in the project
                         (default: file opened by the script)
      --fps <n>          frame rate of the video, e.g. 25 or 23.976
      --extra-start <n>  frames to add (or remove, if negative) before each cut
      --extra-end <n>    frames to add (or remove, if negative) after each cut
      --number           name segments "segment 1", "segment 2", ...
      --decimals <n>     round timestamps to n decimal places
      --no-overwrite     fail if the output file already exists
  -h, --help             show this message`;

export const EXIT_CODES: Record<CutListErrorKind | "ok" | "usage", number> = {
  ok: 0,
  usage: 1,
  config: 1,
  parse: 2,
  io: 3,
};

class UsageError extends Error {}

interface CliArgs {
  help: boolean;
  input?: string;
  output?: string;
  media?: string;
  fps?: string;
  extraStart?: string;
  extraEnd?: string;
  decimals?: string;
  number: boolean;
  overwrite: boolean;
}

type ValueKey = "output" | "media" | "fps" | "extraStart" | "extraEnd" | "decimals";

const VALUE_FLAGS = new Map<string, ValueKey>([
  ["-o", "output"],
  ["--output", "output"],
  ["-m", "media"],
  ["--media", "media"],
  ["--fps", "fps"],
  ["--extra-start", "extraStart"],
  ["--extra-end", "extraEnd"],
  ["--decimals", "decimals"],
]);

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { help: false, number: false, overwrite: true };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const key = VALUE_FLAGS.get(arg);
    if (key) {
      const value = argv[i + 1];
      if (value === undefined) throw new UsageError(`Missing value for ${arg}`);
      args[key] = value;
      i++;
    } else if (arg === "-h" || arg === "--help") {
      args.help = true;
    } else if (arg === "--number") {
      args.number = true;
    } else if (arg === "--no-overwrite") {
      args.overwrite = false;
    } else if (arg.startsWith("-") && arg !== "-") {
      throw new UsageError(`Unknown option ${arg}`);
    } else if (args.input === undefined) {
      args.input = arg;
    } else {
      throw new UsageError(`Unexpected argument ${arg}`);
    }
  }

  return args;
}

// Number("") is 0; an empty flag value must fail validation instead
function toNumber(value: string): number {
  return value.trim() === "" ? Number.NaN : Number(value);
}

/** Base name of the file the script opens, for either path separator. */
function mediaFromScript(sourcePath: string): string | undefined {
  let text: string;
  try {
    text = fs.readFileSync(sourcePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read source script ${sourcePath}`, { cause: err });
  }
  const { sourceFile } = parseVdscript(text);
  return sourceFile === undefined ? undefined : path.win32.basename(sourceFile);
}

function buildConfig(args: CliArgs): ConvertConfigInput {
  const input = args.input;
  if (input === undefined) throw new UsageError("Missing input .vdscript path");
  if (args.fps === undefined) throw new UsageError("--fps is required");

  const media = args.media ?? mediaFromScript(input);
  if (media === undefined) {
    throw new UsageError("--media is required: the script does not open a media file");
  }

  const parsed = path.parse(input);
  return {
    sourcePath: input,
    destinationPath: args.output ?? path.join(parsed.dir, `${parsed.name}.llc`),
    mediaFileName: media,
    fps: toNumber(args.fps),
    extraFramesStart: args.extraStart === undefined ? 0 : toNumber(args.extraStart),
    extraFramesEnd: args.extraEnd === undefined ? 0 : toNumber(args.extraEnd),
    addSegmentNumber: args.number,
    decimals: args.decimals === undefined ? undefined : toNumber(args.decimals),
    overwrite: args.overwrite,
  };
}

export function runCli(argv: readonly string[], logger: Logger = console): number {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      logger.log(USAGE);
      return EXIT_CODES.ok;
    }

    const report = convertVdscriptFile(buildConfig(args));

    for (const warning of report.warnings) {
      logger.warn(`${TAG} Warning: ${warning.message}`);
    }

    if (!report.written) {
      logger.warn(`${TAG} No valid segments to write; ${report.destinationPath} was not created`);
      return EXIT_CODES.ok;
    }

    report.document.cutSegments.forEach((seg, i) => {
      const label = seg.name || `#${i + 1}`;
      logger.log(`  ${label}: ${formatTimecode(seg.start)} → ${formatTimecode(seg.end)}`);
    });
    logger.log(
      `${TAG} Saved ${report.emitted} segment(s), skipped ${report.skipped}: ${report.destinationPath}`,
    );
    return EXIT_CODES.ok;
  } catch (err) {
    if (err instanceof UsageError) {
      logger.error(`${TAG} ${err.message}\n\n${USAGE}`);
      return EXIT_CODES.usage;
    }
    if (err instanceof CutListError) {
      logger.error(`${TAG} ${err.name}: ${err.message}`);
      return EXIT_CODES[err.kind];
    }
    throw err;
  }
}
