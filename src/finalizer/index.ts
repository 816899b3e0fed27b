import type { Config } from "../types.js";
import * as logger from "../utils/logger.js";
import type { OutputSink, ResultAggregator } from "./aggregator.js";
import { formatOutputFile } from "./output_formatter.js";

/**
 * Writes the assembled translation to the sink in chunk order and, when
 * enabled, re-indents the output file.
 */
export async function finalize(
  aggregator: ResultAggregator,
  sink: OutputSink,
  config: Pick<Config, "outputPath" | "formatOutput">
): Promise<void> {
  const texts = aggregator.successfulTexts();
  await aggregator.writeTo(sink);
  logger.info(
    `Wrote ${texts.length} translated chunk(s) to ${config.outputPath}`
  );

  if (config.formatOutput) {
    await formatOutputFile(config.outputPath);
  }
}
