import type { Chunk, PlannedLine } from "../types.js";
import type { TokenCounting } from "./token_counter.js";
import { SetupError } from "../translator/errors.js";

// A trailing chunk below this share of the target is folded into its predecessor
export const MERGE_THRESHOLD_RATIO = 0.7;

export interface PlanSummary {
  totalTokens: number;
  chunkCount: number;
  largestChunkTokens: number;
}

interface LineGroup {
  lines: PlannedLine[];
  tokenCount: number;
}

/**
 * Splits text into lines, keeping each line's terminator so chunk text is an
 * exact concatenation of its lines, and counts each line's tokens.
 */
export function toPlannedLines(
  text: string,
  counter: TokenCounting
): PlannedLine[] {
  const rawLines = text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
  return rawLines.map((line) => ({ text: line, tokenCount: counter.count(line) }));
}

export function sumTokens(lines: readonly PlannedLine[]): number {
  return lines.reduce((sum, line) => sum + line.tokenCount, 0);
}

function toChunk(index: number, group: LineGroup): Chunk {
  const lines = Object.freeze([...group.lines]);
  return Object.freeze({
    index,
    lines,
    text: lines.map((line) => line.text).join(""),
    tokenCount: group.tokenCount,
  });
}

/**
 * Walks the lines, closing a group once it reaches the target size. A line
 * larger than the limit always becomes its own group, and a line that would
 * push an open group past the limit starts the next one.
 */
function* distribute(
  lines: readonly PlannedLine[],
  maxTokenLength: number,
  targetChunkSize: number
): Generator<LineGroup> {
  let current: LineGroup = { lines: [], tokenCount: 0 };

  for (const line of lines) {
    if (line.tokenCount > maxTokenLength) {
      if (current.lines.length > 0) yield current;
      yield { lines: [line], tokenCount: line.tokenCount };
      current = { lines: [], tokenCount: 0 };
      continue;
    }

    if (
      current.lines.length > 0 &&
      current.tokenCount + line.tokenCount > maxTokenLength
    ) {
      yield current;
      current = { lines: [], tokenCount: 0 };
    }

    current.lines.push(line);
    current.tokenCount += line.tokenCount;

    if (current.tokenCount >= targetChunkSize) {
      yield current;
      current = { lines: [], tokenCount: 0 };
    }
  }

  if (current.lines.length > 0) yield current;
}

/**
 * Plans balanced, token-bounded chunks.
 *
 * When everything fits under `maxTokenLength` the input is a single chunk.
 * Otherwise the input is cut into roughly `ceil(total / max)` chunks of about
 * `total / numChunks` tokens each, at line boundaries. A small trailing chunk
 * (under 70% of the target) is merged into the one before it when the merge
 * stays within the limit.
 *
 * The returned generator is single-use.
 */
export function* planChunks(
  lines: readonly PlannedLine[],
  maxTokenLength: number
): Generator<Chunk> {
  if (!Number.isInteger(maxTokenLength) || maxTokenLength <= 0) {
    throw new SetupError(
      `maxTokenLength must be a positive integer, got ${maxTokenLength}`
    );
  }
  if (lines.length === 0) return;

  const totalTokens = sumTokens(lines);
  if (totalTokens <= maxTokenLength) {
    yield toChunk(0, { lines: [...lines], tokenCount: totalTokens });
    return;
  }

  const numChunks = Math.ceil(totalTokens / maxTokenLength);
  const targetChunkSize = totalTokens / numChunks;

  // Hold back two groups so the last one can still be merged
  let index = 0;
  let previous: LineGroup | undefined;
  let last: LineGroup | undefined;
  for (const group of distribute(lines, maxTokenLength, targetChunkSize)) {
    if (previous) yield toChunk(index++, previous);
    previous = last;
    last = group;
  }

  if (
    previous &&
    last &&
    last.tokenCount < targetChunkSize * MERGE_THRESHOLD_RATIO &&
    previous.tokenCount + last.tokenCount <= maxTokenLength
  ) {
    yield toChunk(index, {
      lines: [...previous.lines, ...last.lines],
      tokenCount: previous.tokenCount + last.tokenCount,
    });
    return;
  }

  if (previous) yield toChunk(index++, previous);
  if (last) yield toChunk(index, last);
}

export function summarizePlan(chunks: readonly Chunk[]): PlanSummary {
  return {
    totalTokens: chunks.reduce((sum, chunk) => sum + chunk.tokenCount, 0),
    chunkCount: chunks.length,
    largestChunkTokens: chunks.reduce(
      (max, chunk) => Math.max(max, chunk.tokenCount),
      0
    ),
  };
}
