import { existsSync, mkdirSync } from "fs";
import { writeFile, readFile, readdir } from "fs/promises";
import { dirname, join } from "path";
import * as logger from "./logger.js";

/**
 * Ensure a directory exists, creating it if necessary
 * @returns True if successful, false otherwise
 */
export function ensureDir(dirPath: string): boolean {
  try {
    if (!existsSync(dirPath)) {
      mkdirSync(dirPath, { recursive: true });
      logger.debug(`Created directory: ${dirPath}`);
    }
    return true;
  } catch (error) {
    logger.error(`Failed to create directory ${dirPath}: ${error}`);
    return false;
  }
}

/**
 * Write text to a file, ensuring its directory exists
 * @returns Promise that resolves to true if successful
 */
export async function writeToFile(
  filePath: string,
  content: string
): Promise<boolean> {
  try {
    if (!ensureDir(dirname(filePath))) {
      return false;
    }
    await writeFile(filePath, content, "utf-8");
    logger.debug(`Wrote to file: ${filePath}`);
    return true;
  } catch (error) {
    logger.error(`Failed to write to file ${filePath}: ${error}`);
    return false;
  }
}

/**
 * Read a UTF-8 text file
 * @returns Promise that resolves to the file contents or null if error
 */
export async function readFromFile(filePath: string): Promise<string | null> {
  try {
    if (!existsSync(filePath)) {
      logger.warn(`File does not exist: ${filePath}`);
      return null;
    }

    const content = await readFile(filePath, "utf-8");
    logger.debug(`Read from file: ${filePath}`);
    return content;
  } catch (error) {
    logger.error(`Failed to read from file ${filePath}: ${error}`);
    return null;
  }
}

/**
 * Read and parse a JSON file. The value comes back unvalidated.
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  const content = await readFromFile(filePath);
  if (content === null) return null;

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    logger.error(`Failed to parse JSON from file ${filePath}: ${error}`);
    return null;
  }
}

/**
 * List the file names in a directory
 * @returns Sorted file names, or null if the directory can't be read
 */
export async function listFiles(dirPath: string): Promise<string[] | null> {
  try {
    const entries = await readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    logger.error(`Failed to list directory ${dirPath}: ${error}`);
    return null;
  }
}

/**
 * Build the path of a file named after a base name: {dir}/{base}{suffix}{extension}
 */
export function buildFilePath(
  dir: string,
  baseName: string,
  suffix: string,
  extension: string
): string {
  return join(dir, `${baseName}${suffix}${extension}`);
}
