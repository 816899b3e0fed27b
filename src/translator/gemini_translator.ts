import { GoogleGenAI } from "@google/genai";
import type { TranslationCapability } from "../types.js";
import * as logger from "../utils/logger.js";
import { TranslationFailure, toTranslationFailure } from "./errors.js";
import { renderPrompt } from "./prompt_generator.js";
import type { ProviderOptions } from "./openai_translator.js";

/**
 * Translation capability backed by a Gemini model via generateContent.
 */
export function createGeminiTranslator(
  options: ProviderOptions
): TranslationCapability {
  const genAI = new GoogleGenAI({ apiKey: options.apiKey });

  return async (request) => {
    const prompt = renderPrompt(options.template, {
      text: request.chunkText,
      glossary: request.glossary,
      targetLanguage: options.targetLanguage,
    });
    logger.debug(
      `[Chunk ${request.chunkIndex}] Calling Gemini model: ${request.model}...`
    );

    try {
      const result = await genAI.models.generateContent({
        model: request.model,
        contents: [{ role: "user", parts: [{ text: prompt }] }],
        config: { temperature: request.temperature },
      });

      const candidate = result.candidates?.[0];
      const text = (candidate?.content?.parts ?? [])
        .map((part) => part.text ?? "")
        .join("");

      const usageMetadata = result.usageMetadata;
      const inputTokens = usageMetadata?.promptTokenCount;
      const outputTokens = usageMetadata?.candidatesTokenCount;
      logger.debug(
        `[Chunk ${request.chunkIndex}] Gemini Tokens - Input: ${
          inputTokens ?? "N/A"
        }, Output: ${outputTokens ?? "N/A"}, Total: ${
          usageMetadata?.totalTokenCount ?? "N/A"
        }`
      );

      if (text.trim().length === 0) {
        const reason = candidate?.finishReason
          ? ` (finishReason=${candidate.finishReason})`
          : "";
        throw TranslationFailure.permanent(`Gemini response was empty${reason}`);
      }
      return { text, usage: { inputTokens, outputTokens } };
    } catch (error) {
      throw toTranslationFailure(error);
    }
  };
}
