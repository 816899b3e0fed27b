import { z } from "zod";
import * as logger from "../utils/logger.js";
import { readJsonFromFile } from "../utils/file_utils.js";
import { SetupError } from "./errors.js";

const glossarySchema = z.array(
  z.object({
    term: z.string().min(1),
    translation: z.string(),
  })
);

export type GlossaryEntry = z.infer<typeof glossarySchema>[number];

/** One `- term > translation` line per entry. */
export function renderGlossary(entries: readonly GlossaryEntry[]): string {
  return entries
    .map((entry) => `- ${entry.term} > ${entry.translation}`)
    .join("\n")
    .trim();
}

/**
 * Loads and renders the glossary file. No path means no glossary.
 */
export async function loadGlossary(glossaryPath?: string): Promise<string> {
  if (!glossaryPath) return "";

  const data = await readJsonFromFile(glossaryPath);
  if (data === null) {
    throw new SetupError(`Glossary file could not be read: ${glossaryPath}`);
  }

  const parsed = glossarySchema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SetupError(`Glossary file ${glossaryPath} is invalid: ${details}`);
  }

  logger.info(`Loaded ${parsed.data.length} glossary entries from ${glossaryPath}`);
  return renderGlossary(parsed.data);
}
