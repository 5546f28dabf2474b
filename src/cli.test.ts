import * as fs from "fs";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { EXIT_CODES, USAGE, parseCliArgs, runCli } from "./cli";
import { createMockLogger, type MockLogger } from "./test/helpers/createMockLogger";
import { createTempDir, FIXTURE_VDSCRIPT, type TempDir } from "./test/helpers/createTempDir";

describe("parseCliArgs", () => {
  it("reads flags, values and the input path", () => {
    expect(
      parseCliArgs([
        "cuts.vdscript",
        "--fps",
        "23.976",
        "--extra-start",
        "-4",
        "-o",
        "out.llc",
        "--number",
        "--no-overwrite",
      ]),
    ).toEqual({
      help: false,
      input: "cuts.vdscript",
      fps: "23.976",
      extraStart: "-4",
      output: "out.llc",
      number: true,
      overwrite: false,
    });
  });

  it("rejects unknown options", () => {
    expect(() => parseCliArgs(["--fast"])).toThrow("Unknown option --fast");
  });

  it("rejects a flag without its value", () => {
    expect(() => parseCliArgs(["cuts.vdscript", "--fps"])).toThrow("Missing value for --fps");
  });

  it("rejects a second positional argument", () => {
    expect(() => parseCliArgs(["a.vdscript", "b.vdscript"])).toThrow(
      "Unexpected argument b.vdscript",
    );
  });
});

describe("runCli", () => {
  let tmp: TempDir;
  let logger: MockLogger;
  let script: string;

  beforeEach(() => {
    tmp = createTempDir();
    logger = createMockLogger();
    script = tmp.write("proxy-cuts.vdscript", fs.readFileSync(FIXTURE_VDSCRIPT, "utf8"));
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it("prints usage for --help", () => {
    expect(runCli(["--help"], logger)).toBe(EXIT_CODES.ok);
    expect(logger.log).toHaveBeenCalledWith(USAGE);
  });

  it("converts next to the input using the media file the script opens", () => {
    expect(runCli([script, "--fps", "25", "--number"], logger)).toBe(0);

    const doc = JSON.parse(fs.readFileSync(tmp.file("proxy-cuts.llc"), "utf8"));
    expect(doc.mediaFileName).toBe("proxy_clip.mp4");
    expect(doc.cutSegments).toEqual([
      { start: 4, end: 8, name: "segment 1" },
      { start: 16.48, end: 24.8, name: "segment 2" },
      { start: 40, end: 40.2, name: "segment 3" },
    ]);
    expect(logger._lines).toEqual([
      "  segment 1: 0:00:04.000 → 0:00:08.000",
      "  segment 2: 0:00:16.480 → 0:00:24.800",
      "  segment 3: 0:00:40.000 → 0:00:40.200",
      `[vdscript-to-llc] Saved 3 segment(s), skipped 0: ${tmp.file("proxy-cuts.llc")}`,
    ]);
  });

  it("honours --output and --media", () => {
    const out = tmp.file("final.llc");
    expect(runCli([script, "--fps", "25", "-o", out, "-m", "master.mov"], logger)).toBe(0);
    const doc = JSON.parse(fs.readFileSync(out, "utf8"));
    expect(doc.mediaFileName).toBe("master.mov");
    expect(doc.cutSegments[0]).toEqual({ start: 4, end: 8, name: "" });
    expect(logger.log).toHaveBeenCalledWith("  #1: 0:00:04.000 → 0:00:08.000");
  });

  it("prints a warning for each skipped segment", () => {
    expect(runCli([script, "--fps", "25", "--extra-start", "-150"], logger)).toBe(0);
    expect(logger.warn.mock.calls).toEqual([
      [
        "[vdscript-to-llc] Warning: Segment 1 has non-positive duration after adjusting frames (start 250, end 200); skipped",
      ],
      [
        "[vdscript-to-llc] Warning: Segment 3 has non-positive duration after adjusting frames (start 1150, end 1005); skipped",
      ],
    ]);
    expect(logger.log).toHaveBeenLastCalledWith(
      `[vdscript-to-llc] Saved 1 segment(s), skipped 2: ${tmp.file("proxy-cuts.llc")}`,
    );
  });

  it("writes nothing when no segment survives", () => {
    expect(runCli([script, "--fps", "25", "--extra-end", "-1000"], logger)).toBe(0);
    expect(logger.warn).toHaveBeenLastCalledWith(
      `[vdscript-to-llc] No valid segments to write; ${tmp.file("proxy-cuts.llc")} was not created`,
    );
    expect(fs.existsSync(tmp.file("proxy-cuts.llc"))).toBe(false);
  });

  it("requires --fps", () => {
    expect(runCli([script], logger)).toBe(EXIT_CODES.usage);
    expect(logger.error).toHaveBeenCalledWith(`[vdscript-to-llc] --fps is required\n\n${USAGE}`);
  });

  it("reports an invalid frame rate as a configuration error", () => {
    expect(runCli([script, "--fps", "0"], logger)).toBe(EXIT_CODES.config);
    expect(logger.error).toHaveBeenCalledWith(
      "[vdscript-to-llc] ConfigError: Invalid configuration: fps: Number must be greater than 0",
    );
  });

  it("reports an unreadable input as a configuration error", () => {
    expect(runCli([tmp.file("missing.vdscript"), "--fps", "25"], logger)).toBe(
      EXIT_CODES.config,
    );
  });

  it("requires --media when the script opens no file", () => {
    const bare = tmp.write("bare.vdscript", "VirtualDub.subset.AddRange(0,25);\n");
    expect(runCli([bare, "--fps", "25"], logger)).toBe(EXIT_CODES.usage);
    expect(runCli([bare, "--fps", "25", "-m", "clip.mp4"], logger)).toBe(EXIT_CODES.ok);
  });

  it("exits with the parse code for a malformed script", () => {
    const bad = tmp.write("bad.vdscript", "VirtualDub.subset.AddRange(0,ten);\n");
    expect(runCli([bad, "--fps", "25", "-m", "clip.mp4"], logger)).toBe(EXIT_CODES.parse);
    expect(logger.error).toHaveBeenCalledWith(
      "[vdscript-to-llc] ParseError: Malformed AddRange entry: VirtualDub.subset.AddRange(0,ten); (line 1, entry 1)",
    );
  });

  it("exits with the I/O code when --no-overwrite meets an existing file", () => {
    tmp.write("proxy-cuts.llc", "keep");
    expect(runCli([script, "--fps", "25", "--no-overwrite"], logger)).toBe(EXIT_CODES.io);
    expect(fs.readFileSync(tmp.file("proxy-cuts.llc"), "utf8")).toBe("keep");
  });
});
