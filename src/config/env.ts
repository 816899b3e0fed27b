import { existsSync } from "fs";
import dotenv from "dotenv";
import { z } from "zod";
import type { Config } from "../types.js";
import { readFromFile } from "../utils/file_utils.js";
import { SetupError } from "../translator/errors.js";
import {
  clampWorkers,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_WORKERS,
  DEFAULT_RETRY_BACKOFF_SECONDS,
} from "../translator/executor.js";

const optionalString = z.string().min(1).optional();

const envSchema = z.object({
  TRANSLATION_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  MAX_TOKEN_LENGTH: z.coerce.number().int().positive().default(4000),
  INPUT_FILE: z.string().min(1).default("_trimmed_text.txt"),
  OUTPUT_FILE: z.string().min(1).default("_result_text_ko.txt"),
  GLOSSARY_FILE: optionalString,
  PROMPT_TEMPLATE_FILE: optionalString,
  TARGET_LANGUAGE: z.string().min(1).default("Korean"),
  TRANSLATION_MAX_RETRIES: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_MAX_RETRIES),
  TRANSLATION_RETRY_BACKOFF_SECONDS: z.coerce
    .number()
    .min(0)
    .default(DEFAULT_RETRY_BACKOFF_SECONDS),
  TRANSLATION_MAX_WORKERS: z.coerce
    .number()
    .int()
    .default(DEFAULT_MAX_WORKERS)
    .transform(clampWorkers),
  FORMAT_OUTPUT: z
    .enum(["true", "false", "1", "0"])
    .default("true")
    .transform((value) => value === "true" || value === "1"),
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
});

export type EnvKey = keyof z.input<typeof envSchema>;

/** Raw string settings keyed by environment variable name. */
export type ConfigSource = Partial<Record<EnvKey, string | undefined>>;

export const ENV_KEYS: readonly EnvKey[] = envSchema.keyof().options;

export const DEFAULT_ENV_FILE = ".env";

/**
 * Copies variables from a dotenv file into `target`. Variables that are
 * already set win, and a missing file is skipped.
 *
 * @returns Names of the variables taken from the file.
 */
export async function loadEnvFile(
  envFilePath: string = DEFAULT_ENV_FILE,
  target: Record<string, string | undefined> = process.env
): Promise<string[]> {
  if (!existsSync(envFilePath)) return [];

  const content = await readFromFile(envFilePath);
  if (content === null) {
    throw new SetupError(`Env file could not be read: ${envFilePath}`);
  }

  const applied: string[] = [];
  for (const [key, value] of Object.entries(dotenv.parse(content))) {
    if (target[key] !== undefined) continue;
    target[key] = value;
    applied.push(key);
  }
  return applied;
}

/**
 * Builds the run configuration. CLI overrides win over the environment, which
 * wins over the defaults. Blank values count as unset.
 *
 * @throws SetupError naming every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigSource = {}
): Config {
  const raw: ConfigSource = {};
  for (const key of ENV_KEYS) {
    const value = overrides[key] ?? env[key];
    if (value !== undefined && value.trim() !== "") {
      raw[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new SetupError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    inputPath: values.INPUT_FILE,
    outputPath: values.OUTPUT_FILE,
    glossaryPath: values.GLOSSARY_FILE,
    promptTemplatePath: values.PROMPT_TEMPLATE_FILE,
    targetLanguage: values.TARGET_LANGUAGE,
    translationModel: values.TRANSLATION_MODEL,
    temperature: values.TEMPERATURE,
    maxTokenLength: values.MAX_TOKEN_LENGTH,
    maxWorkers: values.TRANSLATION_MAX_WORKERS,
    maxRetries: values.TRANSLATION_MAX_RETRIES,
    retryBackoffSeconds: values.TRANSLATION_RETRY_BACKOFF_SECONDS,
    formatOutput: values.FORMAT_OUTPUT,
    apiKeys: {
      openai: values.OPENAI_API_KEY,
      anthropic: values.ANTHROPIC_API_KEY,
      gemini: values.GEMINI_API_KEY,
    },
  };
}

/** Config with API keys masked, for debug logging. */
export function redactConfig(config: Config): Config {
  const mask = (key?: string) => (key ? "***" : undefined);
  return {
    ...config,
    apiKeys: {
      openai: mask(config.apiKeys.openai),
      anthropic: mask(config.apiKeys.anthropic),
      gemini: mask(config.apiKeys.gemini),
    },
  };
}
