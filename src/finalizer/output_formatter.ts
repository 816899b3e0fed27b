import { readFile, writeFile } from "fs/promises";
import * as logger from "../utils/logger.js";

const INDENT = "  ";

/**
 * Indents every non-blank line that isn't indented already. Blank lines are
 * kept as they are.
 */
export function indentLines(text: string): string {
  return text
    .split("\n")
    .map((line) => {
      if (line.trim() === "") return line;
      if (line.startsWith(INDENT)) return line;
      return INDENT + line;
    })
    .join("\n");
}

export async function formatOutputFile(filePath: string): Promise<void> {
  const content = await readFile(filePath, "utf-8");
  await writeFile(filePath, indentLines(content), "utf-8");
  logger.info(`Output formatting completed for ${filePath}`);
}
