#!/usr/bin/env node

import { Command } from "commander";
import { realpathSync } from "fs";
import { join } from "path";
import { pathToFileURL } from "url";
import chalk from "chalk";
import boxen from "boxen";
import cliProgress from "cli-progress";
import type { CleaningProfiles, PairNaming, ProcessingIssue } from "./types.js";
import * as logger from "./utils/logger.js";
import { readJsonFromFile } from "./utils/file_utils.js";
import {
  DEFAULT_CLEANING_PROFILES,
  DEFAULT_PAIR_NAMING,
  resolveCleaningProfiles,
} from "./config/cleaning.js";
import {
  discoverPairs,
  resolvePairPaths,
  runPair,
  writePairOutputs,
  type RunPairResult,
} from "./pipeline/runner.js";

type CliOptions = {
  input: string;
  output: string;
  all: boolean;
  config?: string;
  enSuffix: string;
  krSuffix: string;
  outputSuffix: string;
  fallbackOutput?: string;
  dryRun: boolean;
  logFile?: string;
  logLevel: string;
};

async function loadProfiles(configPath?: string): Promise<CleaningProfiles> {
  if (!configPath) return DEFAULT_CLEANING_PROFILES;

  const raw = await readJsonFromFile(configPath);
  if (raw === null) {
    throw new Error(`Cleaning config could not be read: ${configPath}`);
  }
  const resolved = resolveCleaningProfiles(raw);
  if (!resolved.ok) {
    throw new Error(`Invalid cleaning config ${configPath}: ${resolved.message}`);
  }
  logger.info(`Loaded cleaning config from ${configPath}`);
  return resolved.profiles;
}

/**
 * Retries writing outputs that couldn't be saved into the fallback directory.
 */
async function writeToFallback(
  result: RunPairResult,
  fallbackDir: string,
  naming: PairNaming
): Promise<RunPairResult> {
  if (result.status !== "write-failed") return result;

  const paths = resolvePairPaths(result.baseName, "", fallbackDir, naming);
  logger.warn(`Retrying "${result.baseName}" outputs in ${fallbackDir}`);
  const retryIssues = await writePairOutputs(paths, result.outputs);
  if (retryIssues.length > 0) {
    return { ...result, issues: [...result.issues, ...retryIssues] };
  }
  logger.success(
    `Wrote "${result.baseName}" outputs to fallback: ${paths.englishOutput}, ${paths.koreanOutput}`
  );
  return {
    ...result,
    status: "written",
    paths: {
      ...result.paths,
      englishOutput: paths.englishOutput,
      koreanOutput: paths.koreanOutput,
    },
  };
}

function describeIssue(issue: ProcessingIssue): string {
  const where = [
    issue.filePath,
    issue.cueIndex !== undefined ? `cue ${issue.cueIndex}` : undefined,
  ]
    .filter((part) => part !== undefined)
    .join(" ");
  return where ? `${issue.message} (${where})` : issue.message;
}

/**
 * Builds the text of the end-of-run summary panel.
 */
export function formatRunSummary(results: RunPairResult[]): string {
  const lines = results.map((result): string => {
    const warnings = result.issues.filter((i) => i.severity === "warning").length;
    const warningNote = warnings > 0 ? `, ${warnings} warning(s)` : "";
    switch (result.status) {
      case "written":
        return `✔ ${result.baseName}: ${result.summary.cueCount} cues written${warningNote}`;
      case "dry-run":
        return `✔ ${result.baseName}: ${result.summary.cueCount} cues (dry run)${warningNote}`;
      case "write-failed":
      case "failed": {
        const firstError = result.issues.find((i) => i.severity === "error");
        const reason = firstError ? describeIssue(firstError) : "unknown error";
        return `✖ ${result.baseName}: ${reason}`;
      }
    }
  });

  const failed = results.filter(
    (r) => r.status === "failed" || r.status === "write-failed"
  ).length;
  lines.push("");
  lines.push(`Pairs: ${results.length - failed} succeeded, ${failed} failed`);
  return lines.join("\n");
}

async function processPairs(
  baseNames: string[],
  opts: CliOptions,
  naming: PairNaming,
  profiles: CleaningProfiles
): Promise<RunPairResult[]> {
  const multibar =
    baseNames.length > 1
      ? new cliProgress.MultiBar(
          {
            clearOnComplete: false,
            hideCursor: true,
            format: " {bar} | {value}/{total} pairs | {baseName}",
          },
          cliProgress.Presets.shades_classic
        )
      : null;
  const bar = multibar?.create(baseNames.length, 0, { baseName: "" }) ?? null;
  logger.setActiveMultibar(multibar);

  const results: RunPairResult[] = [];
  try {
    for (const baseName of baseNames) {
      bar?.update({ baseName });
      let result = await runPair({
        baseName,
        inputDir: opts.input,
        outputDir: opts.output,
        naming,
        profiles,
        dryRun: opts.dryRun,
      });
      if (opts.fallbackOutput) {
        result = await writeToFallback(result, opts.fallbackOutput, naming);
      }
      results.push(result);
      bar?.increment();
    }
  } finally {
    multibar?.stop();
    logger.setActiveMultibar(null);
  }
  return results;
}

/**
 * CLI entry point
 */
async function main(argv: string[] = process.argv): Promise<number> {
  const program = new Command();

  program
    .name("subpair")
    .description(
      "Clean paired English/Korean WebVTT subtitles and align the Korean cue timings to the English track"
    )
    .version("1.0.0")
    .argument(
      "[baseNames...]",
      "Base names of the pairs to process (e.g. movie for movie_en.vtt + movie_kr.vtt)"
    )
    .option(
      "-i, --input <dir>",
      "Directory holding the input subtitle files",
      "./Input_vtt"
    )
    .option(
      "-o, --output <dir>",
      "Directory for the aligned _FINAL files",
      "./Output_vtt"
    )
    .option(
      "-a, --all",
      "Process every pair found in the input directory",
      false
    )
    .option("-c, --config <path>", "JSON file with cleaning profile overrides")
    .option(
      "--en-suffix <suffix>",
      "English file suffix",
      DEFAULT_PAIR_NAMING.englishSuffix
    )
    .option(
      "--kr-suffix <suffix>",
      "Korean file suffix",
      DEFAULT_PAIR_NAMING.koreanSuffix
    )
    .option(
      "--output-suffix <suffix>",
      "Suffix added to output files",
      DEFAULT_PAIR_NAMING.outputSuffix
    )
    .option(
      "--fallback-output <dir>",
      "Directory to write outputs to when the output directory can't be written"
    )
    .option("--dry-run", "Process without writing output files", false)
    .option(
      "--log-file <path>",
      "Path to log file (defaults to {output}/subpair.log)"
    )
    .option("--log-level <level>", "Log level (debug, info, warn, error)", "info")
    .addHelpText(
      "after",
      `
Examples:
  # Align Input_vtt/movie_en.vtt with Input_vtt/movie_kr.vtt
  subpair movie

  # Every pair in a directory, with a custom typo list
  subpair --all -i ./subs -o ./aligned --config ./cleaning.json

  # Files named movie_en_1.vtt / movie_kr_1.vtt
  subpair movie --en-suffix _en_1 --kr-suffix _kr_1
    `
    )
    .parse(argv);

  const opts = program.opts<CliOptions>();
  const requested = program.args;

  const consoleLogLevel = logger.isLogLevel(opts.logLevel) ? opts.logLevel : "info";
  logger.configureLogger({
    logToFile: !opts.dryRun || opts.logFile !== undefined,
    logFilePath: opts.logFile ?? join(opts.output, "subpair.log"),
    consoleLogLevel,
    fileLogLevel: "debug",
  });
  if (consoleLogLevel !== opts.logLevel) {
    logger.warn(`Unknown log level "${opts.logLevel}", using info`);
  }

  try {
    const naming: PairNaming = {
      englishSuffix: opts.enSuffix,
      koreanSuffix: opts.krSuffix,
      outputSuffix: opts.outputSuffix,
      extension: DEFAULT_PAIR_NAMING.extension,
    };
    const profiles = await loadProfiles(opts.config);

    const baseNames = [...requested];
    if (opts.all) {
      const discovered = await discoverPairs(opts.input, naming);
      discovered.issues
        .filter((issue) => issue.severity === "error")
        .forEach((issue) => logger.error(describeIssue(issue)));
      for (const baseName of discovered.baseNames) {
        if (!baseNames.includes(baseName)) baseNames.push(baseName);
      }
    }
    if (baseNames.length === 0) {
      logger.error("No subtitle pairs to process. Pass base names or use --all.");
      return 1;
    }

    logger.info(chalk.blueBright(`--- Aligning ${baseNames.length} pair(s) ---`));
    const results = await processPairs(baseNames, opts, naming, profiles);

    const failed = results.some(
      (r) => r.status === "failed" || r.status === "write-failed"
    );
    console.log(
      boxen(formatRunSummary(results), {
        padding: 1,
        margin: 1,
        borderColor: failed ? "red" : "green",
        title: failed ? "Finished With Failures" : "Alignment Summary",
      })
    );
    return failed ? 1 : 0;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    const stack = err instanceof Error ? err.stack : undefined;
    logger.error(`Fatal error: ${message}`, stack);
    console.error(
      boxen(chalk.red(`Fatal Error: ${message}`), {
        padding: 1,
        margin: 1,
        borderColor: "red",
      })
    );
    return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main()
    .then(async (exitCode) => {
      await logger.flushLogs();
      process.exit(exitCode);
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
}

export { main };
