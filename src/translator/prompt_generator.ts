import { fileURLToPath } from "url";
import * as logger from "../utils/logger.js";
import { readFromFile } from "../utils/file_utils.js";
import { SetupError } from "./errors.js";

export const DEFAULT_TEMPLATE_PATH = fileURLToPath(
  new URL("../../prompts/translation_prompt.template", import.meta.url)
);

export interface PromptValues {
  text: string;
  glossary: string;
  targetLanguage: string;
}

const PLACEHOLDER_PATTERN = /\{(text|glossary|target_language)\}/g;

/**
 * Loads the prompt template content.
 * @param templatePath Optional path to the template file.
 */
export async function loadPromptTemplate(
  templatePath?: string
): Promise<string> {
  const path = templatePath || DEFAULT_TEMPLATE_PATH;
  const template = await readFromFile(path);
  if (template === null) {
    throw new SetupError(`Prompt template could not be read: ${path}`);
  }
  if (!template.includes("{text}")) {
    throw new SetupError(
      `Prompt template ${path} has no {text} placeholder for the chunk`
    );
  }
  logger.debug(`Loaded prompt template from: ${path}`);
  return template;
}

/**
 * Fills the template in a single pass, so placeholder-like text inside the
 * chunk or glossary is left alone.
 */
export function renderPrompt(template: string, values: PromptValues): string {
  return template.replace(PLACEHOLDER_PATTERN, (_match, key: string) => {
    switch (key) {
      case "text":
        return values.text;
      case "glossary":
        return values.glossary || "(no glossary provided)";
      default:
        return values.targetLanguage;
    }
  });
}
