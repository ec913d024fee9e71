import type { Track } from "../types.js";
import { formatCueBlock, VTT_FILE_MARKER } from "./vtt_formatter.js";

/**
 * Renders a track as WebVTT text. Cue numbers are regenerated from 1 and the
 * output depends only on the cues, so equal tracks give identical text.
 */
export function serializeTrack(track: Track): string {
  const blocks = track.cues.map((cue, index) => formatCueBlock(cue, index + 1));
  return `${VTT_FILE_MARKER}\n\n${blocks.join("")}`;
}

export { formatCueBlock, VTT_FILE_MARKER };
