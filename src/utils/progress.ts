import chalk from "chalk";
import cliProgress from "cli-progress";
import type { MultiBar, SingleBar } from "cli-progress";
import type { ChunkState } from "../types.js";
import * as logger from "./logger.js";

/**
 * Receives chunk state transitions from the executor. The silent variant
 * ignores them, so callers never have to check for a missing reporter.
 */
export interface ProgressReporter {
  readonly kind: "reporting" | "silent";
  start(total: number): void;
  update(index: number, state: ChunkState, detail?: string): void;
  stop(): void;
}

export const silentReporter: ProgressReporter = {
  kind: "silent",
  start: () => {},
  update: () => {},
  stop: () => {},
};

function describeState(index: number, state: ChunkState, detail?: string): string {
  switch (state) {
    case "pending":
      return `Chunk ${index} queued`;
    case "running":
      return `Chunk ${index} translating...`;
    case "retrying":
      return `Chunk ${index} retrying${detail ? ` (${detail})` : ""}`;
    case "success":
      return `Chunk ${index} done.`;
    case "failed":
      return `Chunk ${index} failed!`;
  }
}

/**
 * Progress bar on the terminal. While active, logger output is routed through
 * the bar so log lines don't tear it.
 */
export function createProgressReporter(): ProgressReporter {
  let multibar: MultiBar | null = null;
  let bar: SingleBar | null = null;
  let intervalId: NodeJS.Timeout | null = null;
  let completed = 0;

  return {
    kind: "reporting",

    start(total: number) {
      const startTime = Date.now();
      completed = 0;
      multibar = new cliProgress.MultiBar(
        {
          clearOnComplete: false,
          hideCursor: true,
          format: `${chalk.cyan(
            "{bar}"
          )} | {percentage}% | {value}/{total} Chunks | ETA: {eta_formatted} | Elapsed: {elapsed}s | ${chalk.gray(
            "{task}"
          )}`,
        },
        cliProgress.Presets.shades_classic
      );
      const activeBar = multibar.create(total, 0, {
        task: "Starting translation...",
        elapsed: "0.0",
      });
      bar = activeBar;
      logger.setActiveMultibar(multibar);

      intervalId = setInterval(() => {
        const elapsedSeconds = ((Date.now() - startTime) / 1000).toFixed(1);
        activeBar.update({ elapsed: elapsedSeconds });
      }, 100);
    },

    update(index: number, state: ChunkState, detail?: string) {
      if (!bar) return;
      if (state === "success" || state === "failed") completed++;
      bar.update(completed, { task: describeState(index, state, detail) });
    },

    stop() {
      if (intervalId) clearInterval(intervalId);
      intervalId = null;
      bar?.stop();
      multibar?.stop();
      bar = null;
      multibar = null;
      logger.setActiveMultibar(null);
    },
  };
}
