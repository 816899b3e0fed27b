import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import * as logger from "../utils/logger.js";
import { FileSink } from "./output_sink.js";

describe("FileSink", () => {
  let dir: string;

  beforeEach(async () => {
    logger.configureLogger({ logToConsole: false });
    dir = await mkdtemp(join(tmpdir(), "sink-"));
  });

  afterEach(async () => {
    logger.resetLogger();
    await rm(dir, { recursive: true, force: true });
  });

  it("truncates on open and appends each write", async () => {
    const path = join(dir, "out.txt");
    await writeFile(path, "stale output", "utf-8");

    const sink = new FileSink(path);
    await sink.open();
    await sink.write("A\n\n");
    await sink.write("B\n\n");

    expect(await readFile(path, "utf-8")).toBe("A\n\nB\n\n");
  });

  it("creates missing parent directories", async () => {
    const path = join(dir, "nested", "deeper", "out.txt");
    const sink = new FileSink(path);
    await sink.open();
    await sink.write("A");
    expect(await readFile(path, "utf-8")).toBe("A");
  });
});
