import { Anthropic } from "@anthropic-ai/sdk";
import type { TranslationCapability } from "../types.js";
import * as logger from "../utils/logger.js";
import { TranslationFailure, toTranslationFailure } from "./errors.js";
import { renderPrompt } from "./prompt_generator.js";
import type { ProviderOptions } from "./openai_translator.js";

const MAX_OUTPUT_TOKENS = 16000;

/**
 * Translation capability backed by a Claude model, streaming the response and
 * collecting the text deltas.
 */
export function createClaudeTranslator(
  options: ProviderOptions
): TranslationCapability {
  const client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });

  return async (request) => {
    const prompt = renderPrompt(options.template, {
      text: request.chunkText,
      glossary: request.glossary,
      targetLanguage: options.targetLanguage,
    });
    logger.debug(
      `[Chunk ${request.chunkIndex}] Calling Claude model (stream): ${request.model}...`
    );

    let responseText = "";
    try {
      const stream = client.messages.stream({
        model: request.model,
        max_tokens: MAX_OUTPUT_TOKENS,
        temperature: request.temperature,
        messages: [{ role: "user", content: prompt }],
      });

      stream.on("text", (textDelta) => {
        responseText += textDelta;
      });

      stream.on("error", (error) => {
        logger.debug(
          `[Chunk ${request.chunkIndex}] Claude stream error event: ${error.message}`
        );
      });

      // Rejects with the stream's error, if any
      const finalMessage = await stream.finalMessage();
      const inputTokens = finalMessage.usage.input_tokens;
      const outputTokens = finalMessage.usage.output_tokens;
      logger.debug(
        `[Chunk ${request.chunkIndex}] Claude Final Tokens - Input: ${inputTokens}, Output: ${outputTokens}`
      );

      if (responseText.trim().length === 0) {
        throw TranslationFailure.permanent("Claude stream response was empty");
      }
      return { text: responseText, usage: { inputTokens, outputTokens } };
    } catch (error) {
      throw toTranslationFailure(error);
    }
  };
}
