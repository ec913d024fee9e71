import type { ProcessingIssue, Track } from "../types.js";
import * as logger from "../utils/logger.js";

export type SyncResult =
  | { ok: true; track: Track }
  | { ok: false; issue: ProcessingIssue };

/**
 * Re-stamps the target track with the reference track's timings, cue by cue.
 *
 * Cue N of the target takes the start and end of cue N of the reference and
 * keeps its own text. Both tracks must hold the same number of cues; when they
 * don't, no track is produced and the mismatch is returned as an error issue.
 * Neither input is modified.
 */
export function synchronizeTracks(reference: Track, target: Track): SyncResult {
  const referenceCount = reference.cues.length;
  const targetCount = target.cues.length;

  if (referenceCount !== targetCount) {
    const firstUnpaired = Math.min(referenceCount, targetCount);
    const longer =
      referenceCount > targetCount ? reference.language : target.language;
    const message =
      `Cue count mismatch: ${reference.language} has ${referenceCount} cues, ` +
      `${target.language} has ${targetCount}. ` +
      `${longer} cue ${firstUnpaired} has no partner.`;
    logger.error(`[Synchronizer] ${message}`);
    return {
      ok: false,
      issue: {
        type: "CueCountMismatch",
        severity: "error",
        message,
        language: longer,
        cueIndex: firstUnpaired,
        context: `${reference.language}=${referenceCount}, ${target.language}=${targetCount}`,
      },
    };
  }

  const cues = target.cues.map((cue, index) => {
    const { startTimeMs, endTimeMs } = reference.cues[index];
    return { startTimeMs, endTimeMs, lines: [...cue.lines] };
  });

  logger.debug(
    `[Synchronizer] Applied ${reference.language} timings to ${cues.length} ${target.language} cues`
  );
  return { ok: true, track: { language: target.language, cues } };
}
