import type { ChunkOutcome, CostBreakdown, Provider } from "../types.js";

/**
 * Defines cost structure for LLM models.
 * Costs are per million tokens.
 */
export interface ModelCost {
  inputCostPerMillionTokens: number;
  outputCostPerMillionTokens: number;
}

/**
 * Known model costs (USD per 1 million tokens).
 * Model names match the identifiers passed to the provider APIs.
 */
export const MODEL_COSTS: Record<string, ModelCost> = {
  // OpenAI
  "gpt-4.1": {
    inputCostPerMillionTokens: 2,
    outputCostPerMillionTokens: 8,
  },
  "gpt-4.1-mini": {
    inputCostPerMillionTokens: 0.4,
    outputCostPerMillionTokens: 1.6,
  },
  "gpt-4o": {
    inputCostPerMillionTokens: 2.5,
    outputCostPerMillionTokens: 10,
  },
  "gpt-4o-mini": {
    inputCostPerMillionTokens: 0.15,
    outputCostPerMillionTokens: 0.6,
  },

  // Claude
  "claude-sonnet-4-5": {
    inputCostPerMillionTokens: 3,
    outputCostPerMillionTokens: 15,
  },
  "claude-3-5-sonnet-20240620": {
    inputCostPerMillionTokens: 3,
    outputCostPerMillionTokens: 15,
  },
  "claude-3-haiku-20240307": {
    inputCostPerMillionTokens: 0.25,
    outputCostPerMillionTokens: 1.25,
  },

  // Gemini
  "gemini-2.5-pro": {
    inputCostPerMillionTokens: 1.25,
    outputCostPerMillionTokens: 10.0,
  },
  "gemini-2.0-flash": {
    inputCostPerMillionTokens: 0.1,
    outputCostPerMillionTokens: 0.4,
  },
};

/** Picks the provider from the model identifier. */
export function detectProvider(modelName: string): Provider {
  const model = modelName.toLowerCase();
  if (model.includes("claude")) return "anthropic";
  if (model.includes("gemini")) return "gemini";
  return "openai";
}

/**
 * Calculates the cost of an LLM call.
 * @returns The cost in USD, or 0 if the model or token counts are unknown.
 */
export function calculateCost(
  modelName: string,
  inputTokens?: number,
  outputTokens?: number
): number {
  const costs = MODEL_COSTS[modelName];
  if (!costs || inputTokens === undefined || outputTokens === undefined) {
    return 0;
  }

  const inputCost = (inputTokens / 1_000_000) * costs.inputCostPerMillionTokens;
  const outputCost =
    (outputTokens / 1_000_000) * costs.outputCostPerMillionTokens;

  return inputCost + outputCost;
}

/**
 * Sums provider usage over the successful outcomes and prices it.
 */
export function estimateRunCost(
  modelName: string,
  outcomes: readonly ChunkOutcome[]
): CostBreakdown {
  const breakdown: CostBreakdown = {
    model: modelName,
    inputTokens: 0,
    outputTokens: 0,
    totalCost: 0,
    warnings: [],
  };

  let missingUsage = 0;
  for (const outcome of outcomes) {
    if (outcome.status !== "success") continue;
    const inputTokens = outcome.usage?.inputTokens;
    const outputTokens = outcome.usage?.outputTokens;
    if (inputTokens === undefined || outputTokens === undefined) {
      missingUsage++;
      continue;
    }
    breakdown.inputTokens += inputTokens;
    breakdown.outputTokens += outputTokens;
  }

  if (!MODEL_COSTS[modelName]) {
    breakdown.warnings.push(`Cost data not found for model: ${modelName}`);
  } else {
    breakdown.totalCost = calculateCost(
      modelName,
      breakdown.inputTokens,
      breakdown.outputTokens
    );
  }
  if (missingUsage > 0) {
    breakdown.warnings.push(
      `Token usage unavailable for ${missingUsage} chunk(s)`
    );
  }
  return breakdown;
}
