import type { Chunk, PlannedLine } from "../types.js";
import * as logger from "../utils/logger.js";
import { readFromFile } from "../utils/file_utils.js";
import { SetupError } from "../translator/errors.js";
import type { TokenCounting } from "./token_counter.js";
import { planChunks, summarizePlan, toPlannedLines } from "./chunk_planner.js";

export interface SplitterOptions {
  inputPath: string;
  maxTokenLength: number;
  counter: TokenCounting;
}

export interface SplitResult {
  lines: PlannedLine[];
  chunks: Chunk[];
  totalTokens: number;
}

/**
 * Plans chunks for already-loaded text.
 */
export function splitText(
  text: string,
  counter: TokenCounting,
  maxTokenLength: number
): SplitResult {
  const lines = toPlannedLines(text, counter);
  const chunks = [...planChunks(lines, maxTokenLength)];
  const summary = summarizePlan(chunks);
  return { lines, chunks, totalTokens: summary.totalTokens };
}

/**
 * Reads the input file and plans its chunks. Any failure here happens before
 * translation starts and is raised as a SetupError.
 */
export async function split(options: SplitterOptions): Promise<SplitResult> {
  const { inputPath, maxTokenLength, counter } = options;

  const text = await readFromFile(inputPath);
  if (text === null) {
    throw new SetupError(`Input file could not be read: ${inputPath}`);
  }

  const result = splitText(text, counter, maxTokenLength);
  if (result.chunks.length === 0) {
    logger.warn(`Input file is empty: ${inputPath}`);
    return result;
  }

  const summary = summarizePlan(result.chunks);
  logger.info(
    `Planned ${summary.chunkCount} chunk(s) from ${result.lines.length} lines (${summary.totalTokens} tokens, max ${maxTokenLength} per chunk).`
  );
  if (summary.largestChunkTokens > maxTokenLength) {
    logger.warn(
      `A single line of ${summary.largestChunkTokens} tokens exceeds the ${maxTokenLength} token limit and will be sent on its own.`
    );
  }
  for (const chunk of result.chunks) {
    logger.debug(
      `[Chunk ${chunk.index}] ${chunk.lines.length} lines, ${chunk.tokenCount} tokens`
    );
  }
  return result;
}
