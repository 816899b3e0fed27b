// Common types shared across the translation pipeline

// Configuration options
export interface Config {
  inputPath: string;
  outputPath: string;
  glossaryPath?: string; // Optional JSON glossary of { term, translation }
  promptTemplatePath?: string; // Uses prompts/translation_prompt.template when unset
  targetLanguage: string; // e.g., 'Korean'
  translationModel: string;
  temperature: number;
  maxTokenLength: number; // Token budget per chunk
  maxWorkers: number; // Clamped to [1, 10]
  maxRetries: number; // Additional attempts after a transient failure
  retryBackoffSeconds: number;
  formatOutput: boolean; // Indent the output file after the run
  apiKeys: {
    openai?: string;
    anthropic?: string;
    gemini?: string;
  };
}

export type Provider = "openai" | "anthropic" | "gemini";

/** A source line with its token count. The line keeps its terminator. */
export interface PlannedLine {
  readonly text: string;
  readonly tokenCount: number;
}

/** Contiguous run of lines translated as one unit */
export interface Chunk {
  readonly index: number; // Zero-based, contiguous across a plan
  readonly lines: readonly PlannedLine[];
  readonly text: string;
  readonly tokenCount: number;
}

export type ChunkState = "pending" | "running" | "retrying" | "success" | "failed";

export type FailureKind = "transient" | "permanent";

/** Token usage reported by a provider for one call */
export interface TranslationUsage {
  inputTokens?: number;
  outputTokens?: number;
}

export interface ChunkSuccess {
  status: "success";
  index: number;
  attempts: number;
  text: string;
  usage?: TranslationUsage;
}

export interface ChunkFailure {
  status: "failed";
  index: number;
  attempts: number;
  failure: {
    kind: FailureKind;
    message: string;
  };
}

export type ChunkOutcome = ChunkSuccess | ChunkFailure;

/** Aggregate snapshot produced once per run */
export interface RunMetrics {
  successes: number;
  failures: number;
  durationSeconds: number; // Wall clock, not the sum of chunk durations
}

/** Structure for cost breakdown */
export interface CostBreakdown {
  model: string;
  inputTokens: number;
  outputTokens: number;
  totalCost: number;
  warnings: string[]; // e.g., "Cost data not found for model X"
}

/** Everything a completed run hands back to the CLI */
export interface RunReport {
  metrics: RunMetrics;
  chunkCount: number;
  totalTokens: number;
  outcomes: ChunkOutcome[]; // Ordered by chunk index
  cost: CostBreakdown;
  outputPath: string;
}

/** One call to the translation capability */
export interface TranslationRequest {
  chunkIndex: number;
  chunkText: string;
  glossary: string; // Rendered glossary, may be empty
  model: string;
  temperature: number;
}

export interface TranslationResult {
  text: string;
  usage?: TranslationUsage;
}

/**
 * Translates one chunk. Failures are thrown; a TranslationFailure carries its
 * kind, anything else is classified by status and message.
 */
export type TranslationCapability = (
  request: TranslationRequest
) => Promise<TranslationResult>;
