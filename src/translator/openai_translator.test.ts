import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import * as logger from "../utils/logger.js";
import { TranslationFailure } from "./errors.js";
import { createOpenAITranslator } from "./openai_translator.js";

const { createCompletion } = vi.hoisted(() => ({ createCompletion: vi.fn() }));

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create: createCompletion } };
  },
}));

const request = {
  chunkIndex: 0,
  chunkText: "Hello",
  glossary: "",
  model: "gpt-4.1-mini",
  temperature: 0.3,
};

describe("createOpenAITranslator", () => {
  const translate = createOpenAITranslator({
    apiKey: "test-secret",
    template: "T:{target_language}|G:{glossary}|X:{text}",
    targetLanguage: "Korean",
  });

  beforeEach(() => {
    logger.configureLogger({ logToConsole: false });
    createCompletion.mockReset();
  });

  afterEach(() => {
    logger.resetLogger();
  });

  it("sends the rendered prompt and returns text with usage", async () => {
    createCompletion.mockResolvedValue({
      choices: [{ message: { content: "안녕하세요" } }],
      usage: { prompt_tokens: 10, completion_tokens: 5 },
    });

    const result = await translate(request);
    expect(result).toEqual({
      text: "안녕하세요",
      usage: { inputTokens: 10, outputTokens: 5 },
    });
    expect(createCompletion).toHaveBeenCalledWith({
      model: "gpt-4.1-mini",
      messages: [
        { role: "user", content: "T:Korean|G:(no glossary provided)|X:Hello" },
      ],
      temperature: 0.3,
    });
  });

  it("fails permanently on an empty response", async () => {
    createCompletion.mockResolvedValue({ choices: [{ message: { content: "" } }] });

    const failure = await translate(request).catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(TranslationFailure);
    expect(failure).toMatchObject({ kind: "permanent" });
  });

  it("tags rate limit errors as transient", async () => {
    createCompletion.mockRejectedValue(
      Object.assign(new Error("Rate limit reached"), { status: 429 })
    );

    await expect(translate(request)).rejects.toMatchObject({
      kind: "transient",
      status: 429,
    });
  });
});
