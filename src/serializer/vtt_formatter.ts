import { formatVttTiming } from "../utils/time_utils.js";
import type { Cue } from "../types.js";

export const VTT_FILE_MARKER = "WEBVTT";

/**
 * Formats a single cue as a WebVTT block, trailing blank line included.
 * A cue without text still gets its number and timing line.
 *
 * @param cue The cue to render.
 * @param cueNumber 1-based number written above the timing line.
 */
export function formatCueBlock(cue: Cue, cueNumber: number): string {
  const timingLine = formatVttTiming(cue.startTimeMs, cue.endTimeMs);
  const textLines = cue.lines.map((line) => `${line}\n`).join("");
  return `${cueNumber}\n${timingLine}\n${textLines}\n`;
}
