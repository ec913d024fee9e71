import type { Cue, Language, ProcessingIssue } from "../types.js";
import { parseVttTiming } from "../utils/time_utils.js";
import * as logger from "../utils/logger.js";

// Blocks that carry file-level metadata rather than cues
const METADATA_BLOCK_KEYWORDS = ["WEBVTT", "NOTE", "STYLE", "REGION"];

const TIMESTAMP_START = /^\d{2,}:\d{2}/;

export interface ParseOptions {
  filePath?: string; // Used only to label issues and log lines
  language?: Language;
}

export interface ParseResult {
  cues: Cue[];
  skippedBlocks: number;
  issues: ProcessingIssue[];
}

interface Block {
  number: number; // 1-based position among the non-blank blocks
  lines: string[];
}

/** Splits text into runs of non-blank lines. */
function splitBlocks(content: string): Block[] {
  const withoutBom =
    content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const lines = withoutBom.replace(/\r\n?/g, "\n").split("\n");

  const blocks: Block[] = [];
  let current: string[] = [];
  for (const line of lines) {
    if (line.trim().length === 0) {
      if (current.length > 0) {
        blocks.push({ number: blocks.length + 1, lines: current });
        current = [];
      }
      continue;
    }
    current.push(line);
  }
  if (current.length > 0) {
    blocks.push({ number: blocks.length + 1, lines: current });
  }
  return blocks;
}

function isMetadataBlock(firstLine: string): boolean {
  const trimmed = firstLine.trim();
  return METADATA_BLOCK_KEYWORDS.some((keyword) => {
    if (!trimmed.startsWith(keyword)) return false;
    const rest = trimmed.slice(keyword.length);
    return rest.length === 0 || /^\s/.test(rest);
  });
}

// A cue number followed by more lines, or a line that starts like a timestamp
function hasCueShape(lines: string[]): boolean {
  const [first = "", second = ""] = lines.map((line) => line.trim());
  if (/^\d+$/.test(first) && lines.length > 1) return true;
  return TIMESTAMP_START.test(first) || TIMESTAMP_START.test(second);
}

/**
 * Parse WebVTT-style subtitle text into an ordered list of cues.
 *
 * Header text before the first cue is dropped. Blocks with a broken timing
 * line are skipped and reported, including one that comes before any cue;
 * parsing carries on with the next block.
 */
export function parseCues(
  content: string,
  options: ParseOptions = {}
): ParseResult {
  const { filePath, language } = options;
  const label = filePath ?? language ?? "input";
  const cues: Cue[] = [];
  const issues: ProcessingIssue[] = [];
  let skippedBlocks = 0;

  const skip = (
    block: Block,
    type: ProcessingIssue["type"],
    message: string
  ): void => {
    skippedBlocks++;
    const firstLine = block.lines[0]?.trim() ?? "";
    logger.warn(
      `[VTT Parser] ${label}: block ${block.number} skipped (${message}): ${firstLine}`
    );
    issues.push({
      type,
      severity: "warning",
      message: `Block ${block.number} skipped: ${message}`,
      filePath,
      language,
      blockNumber: block.number,
      context: block.lines.join("\n"),
    });
  };

  for (const block of splitBlocks(content)) {
    const timingIndex = block.lines.findIndex((line) => line.includes("-->"));

    if (timingIndex === -1) {
      const firstLine = block.lines[0] ?? "";
      const isHeader = cues.length === 0 && !hasCueShape(block.lines);
      if (isHeader || isMetadataBlock(firstLine)) {
        logger.debug(
          `[VTT Parser] ${label}: discarded metadata block ${block.number}`
        );
        continue;
      }
      skip(block, "MalformedBlock", "no timing line");
      continue;
    }

    // At most one identifier line (normally the cue number) may precede the timing
    if (timingIndex > 1) {
      skip(block, "MalformedBlock", "text before timing line");
      continue;
    }

    const timingLine = block.lines[timingIndex] ?? "";
    const timing = parseVttTiming(timingLine);
    if (!timing) {
      skip(block, "MalformedBlock", `invalid timing "${timingLine.trim()}"`);
      continue;
    }
    if (timing.endTimeMs <= timing.startTimeMs) {
      skip(
        block,
        "InvalidTimingValue",
        `end is not after start "${timingLine.trim()}"`
      );
      continue;
    }

    const previous = cues[cues.length - 1];
    if (previous && timing.startTimeMs < previous.startTimeMs) {
      logger.warn(
        `[VTT Parser] ${label}: cue ${cues.length} starts before the cue preceding it`
      );
      issues.push({
        type: "OutOfOrderCue",
        severity: "warning",
        message: `Cue ${cues.length} starts before cue ${cues.length - 1}; order kept as in the file`,
        filePath,
        language,
        cueIndex: cues.length,
        blockNumber: block.number,
      });
    }

    cues.push({
      startTimeMs: timing.startTimeMs,
      endTimeMs: timing.endTimeMs,
      lines: block.lines.slice(timingIndex + 1).map((line) => line.trimEnd()),
    });
  }

  logger.debug(
    `[VTT Parser] ${label}: parsed ${cues.length} cues, skipped ${skippedBlocks} blocks`
  );
  return { cues, skippedBlocks, issues };
}
