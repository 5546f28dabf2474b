import * as fs from "fs";
import * as path from "path";
import { IOError } from "./errors";

export interface WriteFileAtomicOptions {
  /** Replace an existing file at `filePath` (default true) */
  overwrite?: boolean;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Write `data` to a temporary sibling and rename it into place, so readers
 * see either the previous file or the complete new one.
 */
export function writeFileAtomic(
  filePath: string,
  data: string,
  { overwrite = true }: WriteFileAtomicOptions = {},
): void {
  if (!overwrite && fs.existsSync(filePath)) {
    throw new IOError(`${filePath} already exists; choose another name or remove it`, filePath);
  }

  const tmpPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`,
  );

  try {
    fs.writeFileSync(tmpPath, data, { encoding: "utf8", flag: "wx" });
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw new IOError(`Failed to write ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
  }
}
