import type {
  CleaningProfiles,
  PairNaming,
  PairSummary,
  ProcessingIssue,
} from "../types.js";
import { DEFAULT_PAIR_NAMING } from "../config/cleaning.js";
import {
  buildFilePath,
  listFiles,
  readFromFile,
  writeToFile,
} from "../utils/file_utils.js";
import * as logger from "../utils/logger.js";
import { alignSubtitlePair } from "./index.js";

export interface PairPaths {
  englishInput: string;
  koreanInput: string;
  englishOutput: string;
  koreanOutput: string;
}

export interface PairOutputs {
  english: string;
  korean: string;
}

export interface RunPairOptions {
  baseName: string;
  inputDir: string;
  outputDir: string;
  naming?: PairNaming;
  profiles?: CleaningProfiles;
  dryRun?: boolean;
}

export type RunPairResult =
  | {
      status: "failed";
      baseName: string;
      paths: PairPaths;
      issues: ProcessingIssue[];
    }
  | {
      // "write-failed" keeps the rendered outputs so they can be written elsewhere
      status: "written" | "dry-run" | "write-failed";
      baseName: string;
      paths: PairPaths;
      outputs: PairOutputs;
      summary: PairSummary;
      issues: ProcessingIssue[];
    };

export function resolvePairPaths(
  baseName: string,
  inputDir: string,
  outputDir: string,
  naming: PairNaming = DEFAULT_PAIR_NAMING
): PairPaths {
  const { englishSuffix, koreanSuffix, outputSuffix, extension } = naming;
  return {
    englishInput: buildFilePath(inputDir, baseName, englishSuffix, extension),
    koreanInput: buildFilePath(inputDir, baseName, koreanSuffix, extension),
    englishOutput: buildFilePath(
      outputDir,
      baseName,
      `${englishSuffix}${outputSuffix}`,
      extension
    ),
    koreanOutput: buildFilePath(
      outputDir,
      baseName,
      `${koreanSuffix}${outputSuffix}`,
      extension
    ),
  };
}

/**
 * Writes both rendered files. Returns one issue per file that couldn't be written.
 */
export async function writePairOutputs(
  paths: Pick<PairPaths, "englishOutput" | "koreanOutput">,
  outputs: PairOutputs
): Promise<ProcessingIssue[]> {
  const targets = [
    {
      language: "english",
      filePath: paths.englishOutput,
      content: outputs.english,
    },
    {
      language: "korean",
      filePath: paths.koreanOutput,
      content: outputs.korean,
    },
  ] as const;

  const issues: ProcessingIssue[] = [];
  for (const target of targets) {
    const ok = await writeToFile(target.filePath, target.content);
    if (!ok) {
      issues.push({
        type: "OutputWriteError",
        severity: "error",
        message: `Could not write ${target.language} output`,
        filePath: target.filePath,
        language: target.language,
      });
    }
  }
  return issues;
}

/**
 * Processes one base name: reads both inputs, aligns them in memory and
 * writes the two _FINAL files. Inputs are read before any processing starts;
 * outputs are written only once both files have been produced.
 */
export async function runPair(options: RunPairOptions): Promise<RunPairResult> {
  const { baseName, inputDir, outputDir, profiles, dryRun = false } = options;
  const naming = options.naming ?? DEFAULT_PAIR_NAMING;
  const paths = resolvePairPaths(baseName, inputDir, outputDir, naming);

  logger.info(`Processing "${baseName}"`);
  const [englishText, koreanText] = await Promise.all([
    readFromFile(paths.englishInput),
    readFromFile(paths.koreanInput),
  ]);

  const readIssues: ProcessingIssue[] = [];
  if (englishText === null) {
    readIssues.push({
      type: "InputReadError",
      severity: "error",
      message: "English subtitle file is missing or unreadable",
      filePath: paths.englishInput,
      language: "english",
    });
  }
  if (koreanText === null) {
    readIssues.push({
      type: "InputReadError",
      severity: "error",
      message: "Korean subtitle file is missing or unreadable",
      filePath: paths.koreanInput,
      language: "korean",
    });
  }
  if (englishText === null || koreanText === null) {
    readIssues.forEach((issue) =>
      logger.error(`${issue.message}: ${issue.filePath}`)
    );
    return { status: "failed", baseName, paths, issues: readIssues };
  }

  const aligned = alignSubtitlePair(englishText, koreanText, {
    profiles,
    englishPath: paths.englishInput,
    koreanPath: paths.koreanInput,
  });
  if (aligned.status === "failed") {
    return { status: "failed", baseName, paths, issues: aligned.issues };
  }

  const outputs: PairOutputs = {
    english: aligned.english,
    korean: aligned.korean,
  };
  if (dryRun) {
    logger.info(
      `Dry run: ${aligned.summary.cueCount} aligned cues for "${baseName}" not written`
    );
    return {
      status: "dry-run",
      baseName,
      paths,
      outputs,
      summary: aligned.summary,
      issues: aligned.issues,
    };
  }

  const writeIssues = await writePairOutputs(paths, outputs);
  if (writeIssues.length > 0) {
    return {
      status: "write-failed",
      baseName,
      paths,
      outputs,
      summary: aligned.summary,
      issues: [...aligned.issues, ...writeIssues],
    };
  }

  logger.success(
    `Wrote ${aligned.summary.cueCount} aligned cues: ${paths.englishOutput}, ${paths.koreanOutput}`
  );
  return {
    status: "written",
    baseName,
    paths,
    outputs,
    summary: aligned.summary,
    issues: aligned.issues,
  };
}

/**
 * Finds every base name in a directory that has both an English and a Korean file.
 */
export async function discoverPairs(
  inputDir: string,
  naming: PairNaming = DEFAULT_PAIR_NAMING
): Promise<{ baseNames: string[]; issues: ProcessingIssue[] }> {
  const files = await listFiles(inputDir);
  if (files === null) {
    return {
      baseNames: [],
      issues: [
        {
          type: "InputReadError",
          severity: "error",
          message: "Input directory is missing or unreadable",
          filePath: inputDir,
        },
      ],
    };
  }

  const englishEnding = `${naming.englishSuffix}${naming.extension}`;
  const koreanEnding = `${naming.koreanSuffix}${naming.extension}`;
  const fileSet = new Set(files);
  const baseNames: string[] = [];
  const issues: ProcessingIssue[] = [];

  for (const file of files) {
    if (!file.endsWith(englishEnding) || file.length === englishEnding.length) {
      continue;
    }
    const baseName = file.slice(0, -englishEnding.length);
    if (fileSet.has(`${baseName}${koreanEnding}`)) {
      baseNames.push(baseName);
    } else {
      logger.warn(`No Korean file for "${file}" in ${inputDir}`);
      issues.push({
        type: "UnpairedFile",
        severity: "warning",
        message: `English file has no Korean partner (${baseName}${koreanEnding})`,
        filePath: buildFilePath(
          inputDir,
          baseName,
          naming.englishSuffix,
          naming.extension
        ),
        language: "english",
      });
    }
  }

  logger.debug(`Discovered ${baseNames.length} pairs in ${inputDir}`);
  return { baseNames, issues };
}
