import type {
  Chunk,
  ChunkOutcome,
  RunMetrics,
  TranslationCapability,
} from "../types.js";
import * as logger from "../utils/logger.js";
import { silentReporter, type ProgressReporter } from "../utils/progress.js";
import { ResultAggregator } from "../finalizer/aggregator.js";
import { executeChunks, type ExecutorOptions } from "./executor.js";

export interface TranslationRun {
  aggregator: ResultAggregator;
  output: string;
  metrics: RunMetrics;
  outcomes: ChunkOutcome[]; // Ordered by chunk index
}

/**
 * Main orchestrator function for the translation step: runs the executor,
 * feeds outcomes to the aggregator as they complete and returns the assembled
 * output with its metrics.
 */
export async function translateChunks(
  chunks: readonly Chunk[],
  translateChunk: TranslationCapability,
  options: ExecutorOptions,
  reporter: ProgressReporter = silentReporter,
  clock: () => number = Date.now
): Promise<TranslationRun> {
  const aggregator = new ResultAggregator(chunks.length, clock);

  if (chunks.length === 0) {
    logger.info("No chunks to translate.");
    return {
      aggregator,
      output: "",
      metrics: aggregator.metrics(),
      outcomes: [],
    };
  }

  aggregator.start();
  reporter.start(chunks.length);
  try {
    await executeChunks(chunks, translateChunk, options, {
      reporter,
      onOutcome: (outcome) => aggregator.record(outcome),
    });
  } finally {
    reporter.stop();
  }

  const metrics = aggregator.metrics();
  logger.info(
    `Translation step complete: ${metrics.successes} / ${chunks.length} chunks translated successfully in ${metrics.durationSeconds.toFixed(2)}s.`
  );
  if (metrics.failures > 0) {
    logger.warn(
      `${metrics.failures} chunk(s) failed and were left out of the output.`
    );
  }

  return {
    aggregator,
    output: aggregator.assemble(),
    metrics,
    outcomes: aggregator.orderedOutcomes(),
  };
}
