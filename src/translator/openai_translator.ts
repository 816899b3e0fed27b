import OpenAI from "openai";
import type { TranslationCapability } from "../types.js";
import * as logger from "../utils/logger.js";
import { TranslationFailure, toTranslationFailure } from "./errors.js";
import { renderPrompt } from "./prompt_generator.js";

export interface ProviderOptions {
  apiKey: string;
  template: string;
  targetLanguage: string;
}

/**
 * Translation capability backed by OpenAI chat completions. The SDK's own
 * retries are disabled; the executor owns the retry policy.
 */
export function createOpenAITranslator(
  options: ProviderOptions
): TranslationCapability {
  const client = new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });

  return async (request) => {
    const prompt = renderPrompt(options.template, {
      text: request.chunkText,
      glossary: request.glossary,
      targetLanguage: options.targetLanguage,
    });
    logger.debug(
      `[Chunk ${request.chunkIndex}] Calling OpenAI model: ${request.model}...`
    );

    try {
      const completion = await client.chat.completions.create({
        model: request.model,
        messages: [{ role: "user", content: prompt }],
        temperature: request.temperature,
      });

      const text = completion.choices[0]?.message?.content ?? "";
      const inputTokens = completion.usage?.prompt_tokens;
      const outputTokens = completion.usage?.completion_tokens;
      logger.debug(
        `[Chunk ${request.chunkIndex}] OpenAI Tokens - Input: ${
          inputTokens ?? "N/A"
        }, Output: ${outputTokens ?? "N/A"}`
      );

      if (text.trim().length === 0) {
        throw TranslationFailure.permanent("OpenAI response was empty");
      }
      return { text, usage: { inputTokens, outputTokens } };
    } catch (error) {
      throw toTranslationFailure(error);
    }
  };
}
