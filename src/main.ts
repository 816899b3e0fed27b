#!/usr/bin/env node

import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { Command } from "commander";
import chalk from "chalk";
import boxen from "boxen";
import type {
  Config,
  RunMetrics,
  RunReport,
  TranslationCapability,
} from "./types.js";
import * as logger from "./utils/logger.js";
import {
  createProgressReporter,
  silentReporter,
  type ProgressReporter,
} from "./utils/progress.js";
import {
  DEFAULT_ENV_FILE,
  loadConfig,
  loadEnvFile,
  redactConfig,
  type ConfigSource,
} from "./config/env.js";
import { estimateRunCost } from "./config/models.js";
import { split } from "./splitter/index.js";
import { TokenCounter, type TokenCounting } from "./splitter/token_counter.js";
import { SetupError } from "./translator/errors.js";
import { loadGlossary } from "./translator/glossary.js";
import { loadPromptTemplate } from "./translator/prompt_generator.js";
import { createTranslationCapability } from "./translator/capability.js";
import { translateChunks } from "./translator/index.js";
import { finalize } from "./finalizer/index.js";
import { FileSink } from "./finalizer/output_sink.js";

export const EXIT_SUCCESS = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL_FAILURE = 2;

export interface RunDependencies {
  capability?: TranslationCapability;
  counter?: TokenCounting;
  reporter?: ProgressReporter;
}

/** 0 when every chunk made it, 2 when some were dropped. */
export function exitCodeFor(metrics: RunMetrics): number {
  return metrics.failures > 0 ? EXIT_PARTIAL_FAILURE : EXIT_SUCCESS;
}

/**
 * Runs the whole pipeline: setup, chunk planning, concurrent translation,
 * output writing. Only SetupError escapes; chunk failures end up in the
 * metrics.
 */
export async function runTranslation(
  config: Config,
  deps: RunDependencies = {}
): Promise<RunReport> {
  // --- Setup ---
  const glossary = await loadGlossary(config.glossaryPath);
  const template = await loadPromptTemplate(config.promptTemplatePath);
  const translateChunk =
    deps.capability ?? createTranslationCapability(config, template);
  const counter = deps.counter ?? new TokenCounter();

  // --- Step 1: Plan chunks ---
  logger.info(chalk.blueBright("--- Step 1: Planning Chunks ---"));
  const { chunks, totalTokens } = await split({
    inputPath: config.inputPath,
    maxTokenLength: config.maxTokenLength,
    counter,
  });

  const sink = new FileSink(config.outputPath);
  try {
    await sink.open();
  } catch (error) {
    throw new SetupError(
      `Output file could not be prepared: ${logger.describeError(error)}`,
      { cause: error }
    );
  }

  // --- Step 2: Translate ---
  logger.info(chalk.blueBright("--- Step 2: Translating Chunks ---"));
  const run = await translateChunks(
    chunks,
    translateChunk,
    {
      maxWorkers: config.maxWorkers,
      maxRetries: config.maxRetries,
      retryBackoffSeconds: config.retryBackoffSeconds,
      model: config.translationModel,
      temperature: config.temperature,
      glossary,
    },
    deps.reporter ?? silentReporter
  );

  // --- Step 3: Write output ---
  logger.info(chalk.blueBright("--- Step 3: Writing Output ---"));
  await finalize(run.aggregator, sink, config);

  return {
    metrics: run.metrics,
    chunkCount: chunks.length,
    totalTokens,
    outcomes: run.outcomes,
    cost: estimateRunCost(config.translationModel, run.outcomes),
    outputPath: config.outputPath,
  };
}

export function formatSummary(report: RunReport): string {
  const { metrics, cost } = report;
  let reportContent = "";
  reportContent += `${chalk.green("Successful Chunks:")} ${metrics.successes} / ${report.chunkCount}\n`;
  reportContent += `${chalk.red("Failed Chunks:")}     ${metrics.failures} / ${report.chunkCount}\n`;
  reportContent += `- Duration: ${metrics.durationSeconds.toFixed(2)}s\n`;
  reportContent += `- Source Tokens: ${report.totalTokens}\n`;
  reportContent += `- Output: ${report.outputPath}\n`;
  reportContent += `\n--- Estimated Cost ---\n`;
  reportContent += `- Total: $${cost.totalCost.toFixed(4)} (Model: ${cost.model})\n`;
  reportContent += `- Tokens: ${cost.inputTokens} in / ${cost.outputTokens} out`;
  if (cost.warnings.length > 0) {
    reportContent += `\n- Cost Warnings:`;
    for (const warning of cost.warnings) {
      reportContent += `\n    - ${warning}`;
    }
  }
  return reportContent;
}

export type CliOptions = {
  input?: string;
  output?: string;
  glossary?: string;
  promptTemplate?: string;
  model?: string;
  temperature?: string;
  maxTokens?: string;
  workers?: string;
  retries?: string;
  backoff?: string;
  targetLanguage?: string;
  openaiApiKey?: string;
  anthropicApiKey?: string;
  geminiApiKey?: string;
  envFile: string;
  format: boolean;
  logFile?: string;
  logLevel: string;
  quiet: boolean;
};

/** Maps CLI flags onto the environment variable names they override. */
export function cliOverrides(opts: CliOptions): ConfigSource {
  return {
    INPUT_FILE: opts.input,
    OUTPUT_FILE: opts.output,
    GLOSSARY_FILE: opts.glossary,
    PROMPT_TEMPLATE_FILE: opts.promptTemplate,
    TRANSLATION_MODEL: opts.model,
    TEMPERATURE: opts.temperature,
    MAX_TOKEN_LENGTH: opts.maxTokens,
    TRANSLATION_MAX_WORKERS: opts.workers,
    TRANSLATION_MAX_RETRIES: opts.retries,
    TRANSLATION_RETRY_BACKOFF_SECONDS: opts.backoff,
    TARGET_LANGUAGE: opts.targetLanguage,
    OPENAI_API_KEY: opts.openaiApiKey,
    ANTHROPIC_API_KEY: opts.anthropicApiKey,
    GEMINI_API_KEY: opts.geminiApiKey,
    FORMAT_OUTPUT: opts.format ? undefined : "false",
  };
}

/**
 * Chunked translator main entry point
 */
async function main(argv: string[] = process.argv): Promise<number> {
  const program = new Command();

  program
    .name("chunked-translator")
    .description(
      "Translate a large text file in balanced, token-bounded chunks using concurrent LLM calls"
    )
    .version("1.0.0")
    .option("-i, --input <path>", "Input text file (or INPUT_FILE env var)")
    .option("-o, --output <path>", "Output file (or OUTPUT_FILE env var)")
    .option(
      "-g, --glossary <path>",
      "Glossary JSON file of {term, translation} entries (or GLOSSARY_FILE env var)"
    )
    .option(
      "--prompt-template <path>",
      "Custom prompt template with {text}, {glossary} and {target_language} placeholders"
    )
    .option(
      "-m, --model <name>",
      "Translation model, e.g. gpt-4.1-mini, claude-sonnet-4-5, gemini-2.5-pro"
    )
    .option("-t, --temperature <number>", "Sampling temperature (0-2)")
    .option("--max-tokens <number>", "Maximum tokens per chunk")
    .option("-w, --workers <number>", "Concurrent chunk translations (1-10)")
    .option(
      "-r, --retries <number>",
      "Additional attempts after a transient failure"
    )
    .option("--backoff <seconds>", "Delay between retry attempts")
    .option("-l, --target-language <lang>", "Target language name")
    .option(
      "--openai-api-key <key>",
      "OpenAI API Key (or use OPENAI_API_KEY env var)"
    )
    .option(
      "--anthropic-api-key <key>",
      "Anthropic API Key (or use ANTHROPIC_API_KEY env var)"
    )
    .option(
      "--gemini-api-key <key>",
      "Google Gemini API Key (or use GEMINI_API_KEY env var)"
    )
    .option(
      "--env-file <path>",
      "Dotenv file for settings not already in the environment",
      DEFAULT_ENV_FILE
    )
    .option("--no-format", "Skip indenting the output file")
    .option("--log-file <path>", "Path to log file")
    .option("--log-level <level>", "Log level (debug, info, warn, error)", "info")
    .option("-q, --quiet", "Hide the progress bar", false)
    .addHelpText(
      "after",
      `
Exit codes:
  0  every chunk was translated
  1  setup failed (input, glossary, template, configuration or API key)
  2  the run finished but some chunks failed and were left out

Examples:
  # Translate with four workers into Korean
  chunked-translator -i paper.txt -o paper_ko.txt -w 4

  # Use Claude with a glossary and a two-second retry backoff
  chunked-translator -i paper.txt -m claude-sonnet-4-5 -g glossary.json --backoff 2
    `
    )
    .parse(argv);

  const opts = program.opts<CliOptions>();

  const consoleLogLevel = logger.isLogLevel(opts.logLevel)
    ? opts.logLevel
    : "info";
  logger.configureLogger({
    logToFile: Boolean(opts.logFile),
    logFilePath: opts.logFile,
    consoleLogLevel,
    fileLogLevel: "debug",
  });

  try {
    const fromEnvFile = await loadEnvFile(opts.envFile);
    if (fromEnvFile.length > 0) {
      logger.debug(
        `Loaded ${fromEnvFile.join(", ")} from ${opts.envFile}`
      );
    }
    const config = loadConfig(process.env, cliOverrides(opts));
    logger.debug(
      `Configuration: ${JSON.stringify(redactConfig(config), null, 2)}`
    );

    const reporter = opts.quiet ? silentReporter : createProgressReporter();
    const report = await runTranslation(config, { reporter });

    const exitCode = exitCodeFor(report.metrics);
    console.log(
      boxen(formatSummary(report), {
        title: "Translation Summary",
        padding: 1,
        margin: 1,
        borderStyle: "round",
        borderColor: exitCode === EXIT_SUCCESS ? "green" : "yellow",
      })
    );
    if (exitCode === EXIT_SUCCESS) {
      logger.success("All chunks translated successfully!");
    } else {
      logger.warn(
        "Some translation chunks failed. Check the logs and consider re-running."
      );
    }
    return exitCode;
  } catch (err) {
    const stack = err instanceof Error ? err.stack : undefined;
    const label = err instanceof SetupError ? "Setup error" : "Fatal error";
    logger.error(`${label}: ${logger.describeError(err)}`, stack);
    console.error(
      boxen(chalk.red(`${label}: ${logger.describeError(err)}`), {
        padding: 1,
        margin: 1,
        borderColor: "red",
      })
    );
    return EXIT_FATAL;
  }
}

function isEntryPoint(): boolean {
  const invokedPath = process.argv[1];
  if (!invokedPath) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(invokedPath)).href;
  } catch {
    return false;
  }
}

// Run if this is the main module
if (isEntryPoint()) {
  main()
    .then(async (exitCode) => {
      await logger.flushLogs();
      process.exit(exitCode);
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exit(EXIT_FATAL);
    });
}

export { main };
