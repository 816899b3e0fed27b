import type { ChunkOutcome, RunMetrics } from "../types.js";

/** Destination for assembled output. */
export interface OutputSink {
  write(text: string): Promise<void>;
}

// One blank line between chunk texts
export const CHUNK_SEPARATOR = "\n\n";

/**
 * Collects outcomes in whatever order they complete and assembles them back
 * in chunk order. Failed chunks are left out of the output without a
 * placeholder.
 *
 * `record` does all of its bookkeeping synchronously, so concurrent workers
 * resolving on the event loop cannot interleave inside it.
 */
export class ResultAggregator {
  private readonly outcomes = new Map<number, ChunkOutcome>();
  private successes = 0;
  private failures = 0;
  private startedAt: number;
  private lastOutcomeAt: number;

  constructor(
    readonly totalChunks: number,
    private readonly clock: () => number = Date.now
  ) {
    this.startedAt = clock();
    this.lastOutcomeAt = this.startedAt;
  }

  /** Marks the start of the run; duration is measured from here. */
  start(): void {
    this.startedAt = this.clock();
    this.lastOutcomeAt = this.startedAt;
  }

  record(outcome: ChunkOutcome): void {
    if (
      !Number.isInteger(outcome.index) ||
      outcome.index < 0 ||
      outcome.index >= this.totalChunks
    ) {
      throw new RangeError(
        `Chunk index ${outcome.index} is outside 0..${this.totalChunks - 1}`
      );
    }
    if (this.outcomes.has(outcome.index)) {
      throw new Error(`Chunk ${outcome.index} already has an outcome`);
    }

    this.outcomes.set(outcome.index, outcome);
    if (outcome.status === "success") this.successes++;
    else this.failures++;
    this.lastOutcomeAt = this.clock();
  }

  get isComplete(): boolean {
    return this.outcomes.size === this.totalChunks;
  }

  /** Outcomes in chunk order. */
  orderedOutcomes(): ChunkOutcome[] {
    this.assertComplete();
    const ordered: ChunkOutcome[] = [];
    for (let index = 0; index < this.totalChunks; index++) {
      const outcome = this.outcomes.get(index);
      if (outcome) ordered.push(outcome);
    }
    return ordered;
  }

  /** Successful chunk texts in chunk order. */
  successfulTexts(): string[] {
    return this.orderedOutcomes().flatMap((outcome) =>
      outcome.status === "success" ? [outcome.text] : []
    );
  }

  assemble(): string {
    return this.successfulTexts().join(CHUNK_SEPARATOR);
  }

  metrics(): RunMetrics {
    return {
      successes: this.successes,
      failures: this.failures,
      durationSeconds: (this.lastOutcomeAt - this.startedAt) / 1000,
    };
  }

  /** Writes each successful chunk followed by a blank line, in chunk order. */
  async writeTo(sink: OutputSink): Promise<void> {
    for (const text of this.successfulTexts()) {
      await sink.write(text + CHUNK_SEPARATOR);
    }
  }

  private assertComplete(): void {
    if (!this.isComplete) {
      throw new Error(
        `Only ${this.outcomes.size} of ${this.totalChunks} chunks have finished`
      );
    }
  }
}
