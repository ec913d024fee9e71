import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import * as logger from "./logger.js";

let workDir = "";

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), "subpair-log-"));
});

afterEach(async () => {
  logger.resetLogger();
  await rm(workDir, { recursive: true, force: true });
});

describe("logger", () => {
  it("writes lines at or above the file level, with context, in call order", async () => {
    const logFilePath = join(workDir, "logs", "run.log");
    logger.configureLogger({
      logToConsole: false,
      logToFile: true,
      logFilePath,
      fileLogLevel: "info",
    });

    logger.debug("not written");
    logger.info("first", "some context");
    logger.error("second");
    await logger.flushLogs();

    const lines = (await readFile(logFilePath, "utf-8")).split("\n");
    expect(lines).toHaveLength(4);
    expect(lines[0]).toMatch(/^\[.+\] \[INFO\] first$/);
    expect(lines[1]).toBe("  Context: some context");
    expect(lines[2]).toMatch(/^\[.+\] \[ERROR\] second$/);
    expect(lines[3]).toBe("");
  });

  it("recognises log level names", () => {
    expect(logger.isLogLevel("warn")).toBe(true);
    expect(logger.isLogLevel("verbose")).toBe(false);
  });
});
