import { existsSync, mkdirSync } from "fs";
import { appendFile, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import * as logger from "./logger.js";

/**
 * Ensure a directory exists, creating it if necessary
 * @param dirPath Path to the directory
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
    logger.error(
      `Failed to create directory ${dirPath}: ${logger.describeError(error)}`
    );
    return false;
  }
}

/**
 * Write data to a file, ensuring its directory exists
 * @param data String, or object to be stringified
 * @returns Promise that resolves to true if successful
 */
export async function writeToFile(
  filePath: string,
  data: string | object
): Promise<boolean> {
  try {
    ensureDir(dirname(filePath));

    const content =
      typeof data === "string" ? data : JSON.stringify(data, null, 2);
    await writeFile(filePath, content, "utf-8");
    logger.debug(`Wrote to file: ${filePath}`);
    return true;
  } catch (error) {
    logger.error(
      `Failed to write to file ${filePath}: ${logger.describeError(error)}`
    );
    return false;
  }
}

/**
 * Append text to a file. Unlike writeToFile this rejects on failure, since a
 * lost append would silently drop translated output.
 */
export async function appendToFile(
  filePath: string,
  text: string
): Promise<void> {
  await appendFile(filePath, text, "utf-8");
}

/**
 * Read data from a file
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
    logger.error(
      `Failed to read from file ${filePath}: ${logger.describeError(error)}`
    );
    return null;
  }
}

/**
 * Read and parse a JSON file
 * @returns Promise that resolves to the parsed value or null if error
 */
export async function readJsonFromFile(
  filePath: string
): Promise<unknown | null> {
  try {
    const content = await readFromFile(filePath);
    if (content === null) return null;

    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    logger.error(
      `Failed to parse JSON from file ${filePath}: ${logger.describeError(error)}`
    );
    return null;
  }
}
