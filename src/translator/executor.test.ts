import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type {
  Chunk,
  ChunkState,
  TranslationCapability,
  TranslationRequest,
} from "../types.js";
import * as logger from "../utils/logger.js";
import type { ProgressReporter } from "../utils/progress.js";
import {
  clampWorkers,
  executeChunks,
  processChunk,
  type ExecutorOptions,
} from "./executor.js";
import { TranslationFailure } from "./errors.js";

const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

function makeChunks(count: number): Chunk[] {
  return Array.from({ length: count }, (_, index) => ({
    index,
    lines: [{ text: `source ${index}`, tokenCount: 2 }],
    text: `source ${index}`,
    tokenCount: 2,
  }));
}

function options(overrides: Partial<ExecutorOptions> = {}): ExecutorOptions {
  return {
    maxWorkers: 3,
    maxRetries: 2,
    retryBackoffSeconds: 0,
    model: "test-model",
    temperature: 0.3,
    glossary: "",
    ...overrides,
  };
}

const echo: TranslationCapability = async (request) => ({
  text: `translated ${request.chunkIndex}`,
});

function rateLimited(): Error {
  return Object.assign(new Error("Rate limit reached"), { status: 429 });
}

function recordingReporter() {
  const updates: Array<[number, ChunkState]> = [];
  const reporter: ProgressReporter = {
    kind: "silent",
    start: () => {},
    update: (index, state) => {
      updates.push([index, state]);
    },
    stop: () => {},
  };
  return { reporter, updates };
}

beforeEach(() => {
  logger.configureLogger({ logToConsole: false });
});

afterEach(() => {
  logger.resetLogger();
});

describe("clampWorkers", () => {
  it("keeps the worker count within 1..10", () => {
    expect(clampWorkers(0)).toBe(1);
    expect(clampWorkers(-4)).toBe(1);
    expect(clampWorkers(4)).toBe(4);
    expect(clampWorkers(25)).toBe(10);
    expect(clampWorkers(2.7)).toBe(2);
    expect(clampWorkers(Number.NaN)).toBe(3);
  });
});

describe("processChunk", () => {
  const [chunk] = makeChunks(1);

  it("passes the chunk, glossary and model settings to the capability", async () => {
    const translate = vi.fn<TranslationCapability>(echo);
    await processChunk(chunk, translate, options({ glossary: "- a > b" }));

    const expected: TranslationRequest = {
      chunkIndex: 0,
      chunkText: "source 0",
      glossary: "- a > b",
      model: "test-model",
      temperature: 0.3,
    };
    expect(translate).toHaveBeenCalledWith(expected);
  });

  it("retries transient failures until one succeeds", async () => {
    const translate = vi
      .fn<TranslationCapability>()
      .mockRejectedValueOnce(rateLimited())
      .mockResolvedValueOnce({ text: "done", usage: { inputTokens: 3 } });

    const outcome = await processChunk(chunk, translate, options());
    expect(outcome).toEqual({
      status: "success",
      index: 0,
      attempts: 2,
      text: "done",
      usage: { inputTokens: 3 },
    });
  });

  it("gives up after maxRetries additional attempts", async () => {
    const translate = vi
      .fn<TranslationCapability>()
      .mockRejectedValue(rateLimited());

    const outcome = await processChunk(chunk, translate, options({ maxRetries: 2 }));
    expect(translate).toHaveBeenCalledTimes(3);
    expect(outcome).toEqual({
      status: "failed",
      index: 0,
      attempts: 3,
      failure: { kind: "transient", message: "Rate limit reached" },
    });
  });

  it("does not retry permanent failures", async () => {
    const translate = vi
      .fn<TranslationCapability>()
      .mockRejectedValue(
        Object.assign(new Error("Invalid API key"), { status: 401 })
      );

    const outcome = await processChunk(chunk, translate, options());
    expect(translate).toHaveBeenCalledTimes(1);
    expect(outcome.status).toBe("failed");
    expect(outcome.attempts).toBe(1);
  });

  it("makes a single attempt when maxRetries is 0", async () => {
    const translate = vi
      .fn<TranslationCapability>()
      .mockRejectedValue(TranslationFailure.transient("overloaded"));

    const outcome = await processChunk(chunk, translate, options({ maxRetries: 0 }));
    expect(translate).toHaveBeenCalledTimes(1);
    expect(outcome.status).toBe("failed");
  });

  it("waits the backoff between attempts", async () => {
    const translate = vi
      .fn<TranslationCapability>()
      .mockRejectedValueOnce(rateLimited())
      .mockResolvedValueOnce({ text: "done" });

    const startedAt = Date.now();
    await processChunk(chunk, translate, options({ retryBackoffSeconds: 0.05 }));
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(45);
  });

  it("reports each state transition", async () => {
    const translate = vi
      .fn<TranslationCapability>()
      .mockRejectedValueOnce(rateLimited())
      .mockResolvedValueOnce({ text: "done" });
    const { reporter, updates } = recordingReporter();

    await processChunk(chunk, translate, options(), reporter);
    expect(updates).toEqual([
      [0, "running"],
      [0, "retrying"],
      [0, "running"],
      [0, "success"],
    ]);
  });
});

describe("executeChunks", () => {
  it("returns outcomes in chunk order whatever the completion order", async () => {
    const completed: number[] = [];
    const translate: TranslationCapability = async (request) => {
      await delay(30 - request.chunkIndex * 10);
      return { text: `translated ${request.chunkIndex}` };
    };

    const outcomes = await executeChunks(makeChunks(3), translate, options(), {
      onOutcome: (outcome) => completed.push(outcome.index),
    });

    expect(completed).toEqual([2, 1, 0]);
    expect(outcomes.map((outcome) => outcome.index)).toEqual([0, 1, 2]);
  });

  it("never has more than maxWorkers translations in flight", async () => {
    let active = 0;
    let peak = 0;
    const translate: TranslationCapability = async (request) => {
      active++;
      peak = Math.max(peak, active);
      await delay(10);
      active--;
      return { text: `translated ${request.chunkIndex}` };
    };

    await executeChunks(makeChunks(7), translate, options({ maxWorkers: 2 }));
    expect(peak).toBe(2);
  });

  it("processes chunks one at a time in order with a single worker", async () => {
    const started: number[] = [];
    const translate: TranslationCapability = async (request) => {
      started.push(request.chunkIndex);
      await delay(1);
      return { text: "ok" };
    };

    await executeChunks(makeChunks(4), translate, options({ maxWorkers: 1 }));
    expect(started).toEqual([0, 1, 2, 3]);
  });

  it("runs faster with more workers", async () => {
    const slow: TranslationCapability = async () => {
      await delay(40);
      return { text: "ok" };
    };

    let startedAt = Date.now();
    await executeChunks(makeChunks(4), slow, options({ maxWorkers: 1 }));
    const sequential = Date.now() - startedAt;

    startedAt = Date.now();
    await executeChunks(makeChunks(4), slow, options({ maxWorkers: 4 }));
    const parallel = Date.now() - startedAt;

    expect(parallel).toBeLessThan(sequential);
  });

  it("keeps going when one chunk fails", async () => {
    const translate: TranslationCapability = async (request) => {
      if (request.chunkIndex === 4) {
        throw Object.assign(new Error("Bad request"), { status: 400 });
      }
      return { text: `translated ${request.chunkIndex}` };
    };

    const outcomes = await executeChunks(makeChunks(6), translate, options());
    expect(outcomes).toHaveLength(6);
    expect(outcomes.filter((o) => o.status === "success")).toHaveLength(5);
    expect(outcomes.filter((o) => o.status === "failed").map((o) => o.index)).toEqual([4]);
  });

  it("marks every chunk pending before starting", async () => {
    const { reporter, updates } = recordingReporter();
    await executeChunks(makeChunks(3), echo, options({ maxWorkers: 1 }), {
      reporter,
    });
    expect(updates.slice(0, 3)).toEqual([
      [0, "pending"],
      [1, "pending"],
      [2, "pending"],
    ]);
  });

  it("returns nothing for no chunks", async () => {
    const translate = vi.fn<TranslationCapability>(echo);
    expect(await executeChunks([], translate, options())).toEqual([]);
    expect(translate).not.toHaveBeenCalled();
  });

  it("starts the next chunk as soon as a slot frees up", async () => {
    const events: string[] = [];
    const translate: TranslationCapability = async (request) => {
      events.push(`start ${request.chunkIndex}`);
      await delay(request.chunkIndex === 0 ? 60 : 5);
      events.push(`finish ${request.chunkIndex}`);
      return { text: "ok" };
    };

    await executeChunks(makeChunks(4), translate, options({ maxWorkers: 2 }));

    const finishedSlowChunk = events.indexOf("finish 0");
    expect(events.indexOf("start 2")).toBeLessThan(finishedSlowChunk);
    expect(events.indexOf("start 3")).toBeLessThan(finishedSlowChunk);
    expect(events.at(-1)).toBe("finish 0");
  });

  it("stops starting chunks once onOutcome throws", async () => {
    const translate = vi.fn<TranslationCapability>(echo);

    await expect(
      executeChunks(makeChunks(4), translate, options({ maxWorkers: 2 }), {
        onOutcome: () => {
          throw new Error("Chunk 0 already has an outcome");
        },
      })
    ).rejects.toThrow("Chunk 0 already has an outcome");

    // Only the two chunks already in flight reached the provider
    expect(translate).toHaveBeenCalledTimes(2);
  });
});
