/**
 * Convert a VirtualDub .vdscript cut list into a LosslessCut .llc project.
 *
 * Usage:
 *   npx tsx scripts/vdscript-to-llc.ts cuts.vdscript --fps 25 --extra-start -4 --number
 */

import { runCli } from "../src/cli";

process.exitCode = runCli(process.argv.slice(2));
