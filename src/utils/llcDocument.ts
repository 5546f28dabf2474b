import type { LlcDocument, TimedSegment } from "../types/cutList";

export const LLC_VERSION = 1;

export function buildLlcDocument(
  mediaFileName: string,
  segments: readonly TimedSegment[],
): LlcDocument {
  return {
    version: LLC_VERSION,
    mediaFileName,
    // LosslessCut treats an empty name as an unnamed segment
    cutSegments: segments.map(({ start, end, name }) => ({ start, end, name: name ?? "" })),
  };
}

export function serializeLlcDocument(doc: LlcDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}
