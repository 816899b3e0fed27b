import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import * as logger from "../utils/logger.js";
import { SetupError } from "../translator/errors.js";
import { split, splitText } from "./index.js";

const charCounter = { count: (text: string) => text.length };

describe("splitText", () => {
  it("plans chunks for loaded text", () => {
    const result = splitText("alpha\nbeta\ngamma\n", charCounter, 10);
    expect(result.lines).toHaveLength(3);
    expect(result.totalTokens).toBe(17);
    expect(result.chunks.map((chunk) => chunk.text)).toEqual([
      "alpha\n",
      "beta\n",
      "gamma\n",
    ]);
  });
});

describe("split", () => {
  let dir: string;

  beforeEach(async () => {
    logger.configureLogger({ logToConsole: false });
    dir = await mkdtemp(join(tmpdir(), "splitter-"));
  });

  afterEach(async () => {
    logger.resetLogger();
    await rm(dir, { recursive: true, force: true });
  });

  it("reads the input file and plans its chunks", async () => {
    const inputPath = join(dir, "input.txt");
    await writeFile(inputPath, "one\ntwo\n", "utf-8");

    const result = await split({ inputPath, maxTokenLength: 100, counter: charCounter });
    expect(result.chunks).toHaveLength(1);
    expect(result.chunks[0]?.text).toBe("one\ntwo\n");
  });

  it("returns no chunks for an empty file", async () => {
    const inputPath = join(dir, "empty.txt");
    await writeFile(inputPath, "", "utf-8");

    const result = await split({ inputPath, maxTokenLength: 100, counter: charCounter });
    expect(result.chunks).toEqual([]);
    expect(result.totalTokens).toBe(0);
  });

  it("raises a SetupError for a missing file", async () => {
    await expect(
      split({
        inputPath: join(dir, "missing.txt"),
        maxTokenLength: 100,
        counter: charCounter,
      })
    ).rejects.toThrow(SetupError);
  });
});
