import type {
  CleaningProfiles,
  Language,
  PairSummary,
  ProcessingIssue,
  TrackSummary,
} from "../types.js";
import { DEFAULT_CLEANING_PROFILES } from "../config/cleaning.js";
import { parseCues } from "../parser/index.js";
import { cleanTrack, type TrackCleanResult } from "../cleaner/index.js";
import { synchronizeTracks } from "../synchronizer/index.js";
import { serializeTrack } from "../serializer/index.js";
import * as logger from "../utils/logger.js";

export interface AlignOptions {
  profiles?: CleaningProfiles;
  englishPath?: string; // Labels for issues and log lines
  koreanPath?: string;
}

export type AlignResult =
  | {
      status: "aligned";
      english: string;
      korean: string;
      summary: PairSummary;
      issues: ProcessingIssue[];
    }
  | { status: "failed"; issues: ProcessingIssue[] };

interface PreparedTrack {
  cleaned: TrackCleanResult;
  summary: TrackSummary;
  issues: ProcessingIssue[];
}

function prepareTrack(
  content: string,
  language: Language,
  profiles: CleaningProfiles,
  filePath: string | undefined
): PreparedTrack {
  const parsed = parseCues(content, { filePath, language });
  const cleaned = cleanTrack(
    { language, cues: parsed.cues },
    profiles[language]
  );
  return {
    cleaned,
    summary: {
      parsedCues: parsed.cues.length,
      skippedBlocks: parsed.skippedBlocks,
      emptiedCues: cleaned.emptiedCues,
      correctedLines: cleaned.correctedLines,
    },
    issues: parsed.issues,
  };
}

/**
 * Cleans an English/Korean subtitle pair and gives the Korean cues the
 * English timings. Works on text only; reading and writing files is left to
 * the caller.
 */
export function alignSubtitlePair(
  englishText: string,
  koreanText: string,
  options: AlignOptions = {}
): AlignResult {
  const profiles = options.profiles ?? DEFAULT_CLEANING_PROFILES;

  const english = prepareTrack(
    englishText,
    "english",
    profiles,
    options.englishPath
  );
  const korean = prepareTrack(koreanText, "korean", profiles, options.koreanPath);
  const issues = [...english.issues, ...korean.issues];

  logger.info(
    `Found ${english.summary.parsedCues} English cues and ${korean.summary.parsedCues} Korean cues`
  );

  const synced = synchronizeTracks(english.cleaned.track, korean.cleaned.track);
  if (!synced.ok) {
    issues.push({
      ...synced.issue,
      filePath:
        synced.issue.language === "english"
          ? options.englishPath
          : options.koreanPath,
    });
    return { status: "failed", issues };
  }

  return {
    status: "aligned",
    english: serializeTrack(english.cleaned.track),
    korean: serializeTrack(synced.track),
    summary: {
      cueCount: synced.track.cues.length,
      english: english.summary,
      korean: korean.summary,
    },
    issues,
  };
}
