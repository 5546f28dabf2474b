/**
 * Frame index → seconds. Full floating-point precision unless `decimals`
 * is given.
 */
export function framesToSeconds(frame: number, fps: number, decimals?: number): number {
  const seconds = frame / fps;
  if (decimals === undefined) return seconds;
  const factor = 10 ** decimals;
  return Math.round(seconds * factor) / factor;
}

/** Nearest frame index for a timestamp; inverse of framesToSeconds. */
export function secondsToFrames(seconds: number, fps: number): number {
  return Math.round(seconds * fps);
}

/** `H:MM:SS.mmm` */
export function formatTimecode(seconds: number): string {
  // Work in integer milliseconds to avoid floating-point carry issues
  // (e.g. 2.9999... would otherwise decompose as 2s + 1000ms → "02.000")
  const totalMs = Math.round(seconds * 1000);
  const h = Math.floor(totalMs / 3600000);
  const m = Math.floor((totalMs % 3600000) / 60000);
  const s = Math.floor((totalMs % 60000) / 1000);
  const ms = totalMs % 1000;
  return `${h}:${String(m).padStart(2, "0")}:${String(s).padStart(2, "0")}.${String(ms).padStart(3, "0")}`;
}
