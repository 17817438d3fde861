export interface AIUsage {
  model: string;
  inputTokens: number;
  outputTokens: number;
}

// Pricing per million tokens (USD), Gemini API paid tier
const AI_MODEL_PRICING: Record<string, { input: number; output: number }> = {
  "gemini-2.0-flash-lite": { input: 0.075, output: 0.3 },
  "gemini-2.0-flash": { input: 0.1, output: 0.4 },
  "gemini-2.5-flash-lite": { input: 0.1, output: 0.4 },
  "gemini-2.5-flash": { input: 0.3, output: 2.5 },
  "gemini-2.5-pro": { input: 1.25, output: 10.0 },
};

const FALLBACK_PRICING_MODEL = "gemini-2.5-flash";

/**
 * Calculate estimated cost based on model pricing.
 * Unknown models are priced like the default model.
 */
export function calculateAICost(model: string, inputTokens: number, outputTokens: number): number {
  const pricing = Object.hasOwn(AI_MODEL_PRICING, model)
    ? AI_MODEL_PRICING[model]
    : AI_MODEL_PRICING[FALLBACK_PRICING_MODEL];
  return (inputTokens * pricing.input + outputTokens * pricing.output) / 1_000_000;
}

export function logAIUsage(usage: AIUsage, metadata?: { fileName?: string }): void {
  const cost = calculateAICost(usage.model, usage.inputTokens, usage.outputTokens);
  console.error("[AI Usage] extraction", {
    model: usage.model,
    inputTokens: usage.inputTokens,
    outputTokens: usage.outputTokens,
    estimatedCost: `$${cost.toFixed(4)}`,
    ...(metadata?.fileName ? { fileName: metadata.fileName } : {}),
  });
}
