import type { Config, Provider, TranslationCapability } from "../types.js";
import { detectProvider } from "../config/models.js";
import { SetupError } from "./errors.js";
import { createClaudeTranslator } from "./claude_translator.js";
import { createGeminiTranslator } from "./gemini_translator.js";
import { createOpenAITranslator } from "./openai_translator.js";

const API_KEY_NAMES: Record<Provider, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  gemini: "GEMINI_API_KEY",
};

/**
 * Returns the API key for the configured model's provider.
 * @throws SetupError if the key is missing
 */
export function requireApiKey(config: Config): string {
  const provider = detectProvider(config.translationModel);
  const apiKey = config.apiKeys[provider];
  if (!apiKey) {
    throw new SetupError(
      `${API_KEY_NAMES[provider]} is required for model ${config.translationModel}.`
    );
  }
  return apiKey;
}

/**
 * Builds the translation capability for the configured model.
 */
export function createTranslationCapability(
  config: Config,
  template: string
): TranslationCapability {
  const options = {
    apiKey: requireApiKey(config),
    template,
    targetLanguage: config.targetLanguage,
  };

  switch (detectProvider(config.translationModel)) {
    case "anthropic":
      return createClaudeTranslator(options);
    case "gemini":
      return createGeminiTranslator(options);
    case "openai":
      return createOpenAITranslator(options);
  }
}
