// Common types shared across the subtitle pair pipeline

export type Language = "english" | "korean";

// One subtitle entry. Identity within a track is its position.
export interface Cue {
  startTimeMs: number;
  endTimeMs: number;
  lines: string[]; // May be empty after cleaning
}

// Ordered cues of one language's file. The file header is never kept.
export interface Track {
  language: Language;
  cues: Cue[];
}

export interface BracketStyle {
  open: string;
  close: string;
}

// Cleaning rules for one language
export interface CleaningProfile {
  noiseCharacters: string[]; // Stripped wherever they occur, longest first
  typoMap: Record<string, string>; // wrong form -> correct form
  bracketStyles: BracketStyle[];
  metadataKeywords: string[]; // Lines containing any of these are dropped
}

export type CleaningProfiles = Record<Language, CleaningProfile>;

// File naming around a base name, e.g. "movie" -> movie_en.vtt / movie_en_FINAL.vtt
export interface PairNaming {
  englishSuffix: string;
  koreanSuffix: string;
  outputSuffix: string;
  extension: string;
}

export type IssueType =
  | "MalformedBlock"
  | "InvalidTimingValue"
  | "OutOfOrderCue"
  | "CueCountMismatch"
  | "InputReadError"
  | "OutputWriteError"
  | "UnpairedFile"
  | "ConfigError";

// Issue found during processing
export interface ProcessingIssue {
  type: IssueType;
  severity: "error" | "warning" | "info";
  message: string;
  filePath?: string;
  language?: Language;
  cueIndex?: number; // 0-based position in the track
  blockNumber?: number; // 1-based position of the block in the source text
  context?: string; // Snippet or relevant data
}

/** Per-language numbers reported after a pair is processed */
export interface TrackSummary {
  parsedCues: number;
  skippedBlocks: number;
  emptiedCues: number;
  correctedLines: number;
}

export interface PairSummary {
  cueCount: number;
  english: TrackSummary;
  korean: TrackSummary;
}
