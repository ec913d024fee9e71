export type * from "./types.js";
export { parseCues, type ParseOptions, type ParseResult } from "./parser/index.js";
export {
  cleanLine,
  cleanLines,
  cleanCue,
  cleanTrack,
  type TrackCleanResult,
} from "./cleaner/index.js";
export { synchronizeTracks, type SyncResult } from "./synchronizer/index.js";
export { serializeTrack, formatCueBlock } from "./serializer/index.js";
export {
  alignSubtitlePair,
  type AlignOptions,
  type AlignResult,
} from "./pipeline/index.js";
export {
  runPair,
  discoverPairs,
  resolvePairPaths,
  writePairOutputs,
  type RunPairOptions,
  type RunPairResult,
  type PairPaths,
  type PairOutputs,
} from "./pipeline/runner.js";
export {
  DEFAULT_CLEANING_PROFILES,
  DEFAULT_PAIR_NAMING,
  resolveCleaningProfiles,
} from "./config/cleaning.js";
export { configureLogger, flushLogs } from "./utils/logger.js";
