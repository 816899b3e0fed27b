import type {
  Chunk,
  ChunkOutcome,
  TranslationCapability,
} from "../types.js";
import * as logger from "../utils/logger.js";
import { silentReporter, type ProgressReporter } from "../utils/progress.js";
import { toTranslationFailure } from "./errors.js";

export const MIN_WORKERS = 1;
export const MAX_WORKERS = 10;
export const DEFAULT_MAX_WORKERS = 3;
export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_RETRY_BACKOFF_SECONDS = 0;

export interface ExecutorOptions {
  maxWorkers: number;
  maxRetries: number;
  retryBackoffSeconds: number;
  model: string;
  temperature: number;
  glossary: string;
}

export interface ExecutorHooks {
  reporter?: ProgressReporter;
  /** Called once per chunk, in completion order. */
  onOutcome?: (outcome: ChunkOutcome) => void;
}

const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Worker count bounded to [1, 10]; non-numbers fall back to the default. */
export function clampWorkers(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_MAX_WORKERS;
  return Math.max(MIN_WORKERS, Math.min(MAX_WORKERS, Math.trunc(value)));
}

/**
 * Translates one chunk, retrying transient failures. Never rejects: every
 * path ends in a success or failed outcome.
 */
export async function processChunk(
  chunk: Chunk,
  translateChunk: TranslationCapability,
  options: ExecutorOptions,
  reporter: ProgressReporter = silentReporter
): Promise<ChunkOutcome> {
  const maxRetries = Math.max(0, options.maxRetries);
  const totalAttempts = maxRetries + 1;

  for (let attempt = 1; ; attempt++) {
    reporter.update(chunk.index, "running");
    logger.debug(
      `[Chunk ${chunk.index}] Translation attempt ${attempt}/${totalAttempts} (${chunk.tokenCount} tokens)`
    );

    try {
      const result = await translateChunk({
        chunkIndex: chunk.index,
        chunkText: chunk.text,
        glossary: options.glossary,
        model: options.model,
        temperature: options.temperature,
      });
      reporter.update(chunk.index, "success");
      logger.debug(
        `[Chunk ${chunk.index}] Translated on attempt ${attempt} (Length: ${result.text.length}).`
      );
      return {
        status: "success",
        index: chunk.index,
        attempts: attempt,
        text: result.text,
        usage: result.usage,
      };
    } catch (err) {
      const failure = toTranslationFailure(err);

      if (!failure.retryable) {
        logger.error(
          `[Chunk ${chunk.index}] Permanent failure on attempt ${attempt}: ${failure.message}`
        );
        reporter.update(chunk.index, "failed");
        return {
          status: "failed",
          index: chunk.index,
          attempts: attempt,
          failure: { kind: failure.kind, message: failure.message },
        };
      }

      if (attempt > maxRetries) {
        logger.error(
          `[Chunk ${chunk.index}] Translation failed after ${attempt} attempts: ${failure.message}`
        );
        reporter.update(chunk.index, "failed");
        return {
          status: "failed",
          index: chunk.index,
          attempts: attempt,
          failure: { kind: failure.kind, message: failure.message },
        };
      }

      logger.warn(
        `[Chunk ${chunk.index}] Transient failure on attempt ${attempt}: ${failure.message}. Retrying in ${options.retryBackoffSeconds}s...`
      );
      reporter.update(
        chunk.index,
        "retrying",
        `attempt ${attempt + 1}/${totalAttempts}`
      );
      if (options.retryBackoffSeconds > 0) {
        await delay(options.retryBackoffSeconds * 1000);
      }
    }
  }
}

/**
 * Drives every chunk to a terminal outcome with at most `maxWorkers` in
 * flight. Chunks start in index order; a freed slot picks up the next
 * pending chunk straight away. If `onOutcome` throws, no further chunks are
 * started and the error is rethrown once the in-flight ones finish.
 *
 * @returns Outcomes ordered by chunk index.
 */
export async function executeChunks(
  chunks: readonly Chunk[],
  translateChunk: TranslationCapability,
  options: ExecutorOptions,
  hooks: ExecutorHooks = {}
): Promise<ChunkOutcome[]> {
  const reporter = hooks.reporter ?? silentReporter;
  const maxWorkers = clampWorkers(options.maxWorkers);
  const outcomes = new Map<number, ChunkOutcome>();

  for (const chunk of chunks) reporter.update(chunk.index, "pending");
  logger.info(
    `Translating ${chunks.length} chunk(s) with ${maxWorkers} worker(s) using ${options.model}...`
  );

  const queue = [...chunks];
  const activePromises = new Set<Promise<void>>();
  // Set when onOutcome throws; no new chunks start after that
  const hook: { failure?: { error: unknown } } = {};

  // Function to start the next task from the queue
  const startNextTask = () => {
    if (hook.failure) return;
    const chunk = queue.shift();
    if (!chunk) return;

    const taskPromise: Promise<void> = processChunk(
      chunk,
      translateChunk,
      options,
      reporter
    )
      .then((outcome) => {
        outcomes.set(outcome.index, outcome);
        try {
          hooks.onOutcome?.(outcome);
        } catch (error) {
          if (!hook.failure) hook.failure = { error };
        }
      })
      .finally(() => {
        activePromises.delete(taskPromise);
        if (activePromises.size < maxWorkers) startNextTask();
      });
    activePromises.add(taskPromise);
  };

  while (activePromises.size > 0 || (queue.length > 0 && !hook.failure)) {
    while (
      activePromises.size < maxWorkers &&
      queue.length > 0 &&
      !hook.failure
    ) {
      startNextTask();
    }
    if (activePromises.size > 0) {
      await Promise.race(activePromises);
    }
  }

  // In-flight chunks have settled; surface the hook's error
  if (hook.failure) throw hook.failure.error;

  return chunks.flatMap((chunk) => {
    const outcome = outcomes.get(chunk.index);
    return outcome ? [outcome] : [];
  });
}
