import type { ZodError } from "zod";
import {
  convertConfigSchema,
  segmentOptionsSchema,
  type ConvertConfig,
  type SegmentOptions,
} from "../types/convertConfig";
import { ConfigError } from "./errors";

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    .join("; ");
}

export function parseConvertConfig(input: unknown): ConvertConfig {
  const result = convertConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return Object.freeze(result.data);
}

export function parseSegmentOptions(input: unknown): SegmentOptions {
  const result = segmentOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid segment options: ${formatIssues(result.error)}`);
  }
  return Object.freeze(result.data);
}
