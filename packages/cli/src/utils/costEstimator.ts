import prompts from "prompts";
import type { PromptUnit } from "@changedoc/common";
import { renderPrompt } from "@changedoc/pipeline";

// Model pricing data ($ per 1M tokens)
interface ModelPricing {
  input: number;
  output: number;
}

const MODEL_PRICING: Record<string, ModelPricing> = {
  // OpenAI
  "openai/gpt-4o": { input: 2.50, output: 10.00 },
  "openai/gpt-4o-mini": { input: 0.15, output: 0.60 },
  "openai/gpt-4.1": { input: 2.00, output: 8.00 },
  "openai/gpt-4.1-mini": { input: 0.40, output: 1.60 },

  // Anthropic
  "anthropic/claude-3-5-sonnet-latest": { input: 3.00, output: 15.00 },
  "anthropic/claude-3-5-haiku-latest": { input: 0.80, output: 4.00 },

  // Google
  "google/gemini-1.5-pro": { input: 1.25, output: 5.00 },
  "google/gemini-1.5-flash": { input: 0.075, output: 0.30 },
};

const DEFAULT_PRICING: ModelPricing = { input: 1.0, output: 3.0 };

/** Rough chars-per-token ratio for source code and English prose. */
export const CHARS_PER_TOKEN = 4;
const SYSTEM_PROMPT_TOKENS = 120;
const AVG_OUTPUT_TOKENS = 800;

export interface SubmissionCostEstimate {
  model: string;
  unitCount: number;
  inputTokens: number;
  outputTokens: number;
  cost: number;
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Estimate the cost of analysing every prompt unit once (retries excluded).
 */
export function estimateSubmissionCost(units: readonly PromptUnit[], model: string): SubmissionCostEstimate {
  const total = units.length;
  const inputTokens = units.reduce(
    (sum, unit) => sum + estimateTokens(renderPrompt(unit, total)) + SYSTEM_PROMPT_TOKENS,
    0,
  );
  const outputTokens = total * AVG_OUTPUT_TOKENS;
  const pricing = MODEL_PRICING[model] ?? DEFAULT_PRICING;

  return {
    model,
    unitCount: total,
    inputTokens,
    outputTokens,
    cost: (inputTokens / 1_000_000) * pricing.input + (outputTokens / 1_000_000) * pricing.output,
  };
}

/**
 * Format cost estimate for display
 */
export function formatCostEstimate(estimate: SubmissionCostEstimate): string {
  const lines = [
    `Cost Estimate for ${estimate.unitCount} section(s) (${estimate.model}):`,
    `   Input:  ${estimate.inputTokens.toLocaleString()} tokens`,
    `   Output: ${estimate.outputTokens.toLocaleString()} tokens`,
    `   Cost:   $${estimate.cost.toFixed(4)}`,
  ];

  return lines.join("\n");
}

/**
 * Prompt user for cost confirmation
 */
export async function promptCostConfirmation(
  estimate: SubmissionCostEstimate,
  threshold: number = 0.5,
): Promise<boolean> {
  if (estimate.cost <= threshold) {
    return true; // Auto-approve under threshold
  }

  console.log(formatCostEstimate(estimate));
  console.log(`\nEstimated cost ($${estimate.cost.toFixed(4)}) exceeds threshold ($${threshold.toFixed(2)})`);

  const answer = await prompts({
    type: "confirm",
    name: "proceed",
    message: "Do you want to proceed?",
    initial: false,
  });
  return answer.proceed === true;
}
