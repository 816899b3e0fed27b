import { dirname } from "path";
import { appendToFile, ensureDir, writeToFile } from "../utils/file_utils.js";
import type { OutputSink } from "./aggregator.js";

/**
 * File sink: `open` truncates the file, each `write` appends to it.
 */
export class FileSink implements OutputSink {
  constructor(readonly filePath: string) {}

  async open(): Promise<void> {
    if (!ensureDir(dirname(this.filePath))) {
      throw new Error(`Cannot create directory for ${this.filePath}`);
    }
    const truncated = await writeToFile(this.filePath, "");
    if (!truncated) {
      throw new Error(`Cannot write output file ${this.filePath}`);
    }
  }

  async write(text: string): Promise<void> {
    await appendToFile(this.filePath, text);
  }
}

/** Keeps everything written in memory. */
export class MemorySink implements OutputSink {
  private readonly parts: string[] = [];

  async write(text: string): Promise<void> {
    this.parts.push(text);
  }

  get content(): string {
    return this.parts.join("");
  }
}
