import type { CleaningProfile, Cue, Track } from "../types.js";
import * as logger from "../utils/logger.js";
import {
  compileRules,
  correctTypos,
  isMetadataLine,
  normalizeWhitespace,
  removeBracketed,
  removeMarkup,
  removeNoise,
  type CompiledRules,
} from "./rules.js";

export interface LineCleanResult {
  text: string; // Empty when the line should be dropped
  corrected: boolean; // A typo correction was applied
}

// Runs the removal steps until nothing changes, since one step can expose
// work for another (e.g. "<#i>" becomes a tag once "#" is gone)
function stripLine(line: string, rules: CompiledRules): string {
  let current = line;
  for (;;) {
    const next = normalizeWhitespace(
      removeNoise(removeBracketed(removeMarkup(current), rules), rules)
    );
    if (next === current) return current;
    current = next;
  }
}

function cleanLineWithRules(line: string, rules: CompiledRules): LineCleanResult {
  if (isMetadataLine(line, rules)) {
    return { text: "", corrected: false };
  }

  const stripped = stripLine(line, rules);
  const corrected = correctTypos(stripped, rules);
  const text = normalizeWhitespace(corrected);

  // Stripping symbols can reveal a credit line, e.g. "*Director:*"
  if (isMetadataLine(text, rules)) {
    return { text: "", corrected: false };
  }
  return { text, corrected: corrected !== stripped };
}

/**
 * Cleans one subtitle line: credit lines are dropped, markup tags, bracketed
 * annotations and noise characters removed, known typos corrected and
 * whitespace collapsed.
 * @returns The cleaned line, or "" when nothing of it remains
 */
export function cleanLine(line: string, profile: CleaningProfile): string {
  return cleanLineWithRules(line, compileRules(profile)).text;
}

/** Cleans every line of a cue, dropping lines left empty. */
export function cleanLines(lines: string[], profile: CleaningProfile): string[] {
  const rules = compileRules(profile);
  return lines
    .map((line) => cleanLineWithRules(line, rules).text)
    .filter((line) => line.length > 0);
}

/**
 * Returns a copy of the cue with cleaned text. The timing is untouched and
 * the cue is kept even when no text survives.
 */
export function cleanCue(cue: Cue, profile: CleaningProfile): Cue {
  return { ...cue, lines: cleanLines(cue.lines, profile) };
}

export interface TrackCleanResult {
  track: Track;
  emptiedCues: number; // Cues that had text before cleaning and none after
  correctedLines: number;
}

export function cleanTrack(
  track: Track,
  profile: CleaningProfile
): TrackCleanResult {
  const rules = compileRules(profile);
  let emptiedCues = 0;
  let correctedLines = 0;

  const cues = track.cues.map((cue, index) => {
    const results = cue.lines.map((line) => cleanLineWithRules(line, rules));
    const lines = results
      .filter((result) => result.text.length > 0)
      .map((result) => result.text);
    correctedLines += results.filter((result) => result.corrected).length;

    if (cue.lines.length > 0 && lines.length === 0) {
      emptiedCues++;
      logger.debug(
        `[Cleaner] ${track.language} cue ${index} has no dialogue left: ${cue.lines.join(" / ")}`
      );
    }
    return { ...cue, lines };
  });

  logger.debug(
    `[Cleaner] ${track.language}: ${cues.length} cues, ${emptiedCues} emptied, ${correctedLines} lines corrected`
  );
  return {
    track: { language: track.language, cues },
    emptiedCues,
    correctedLines,
  };
}
