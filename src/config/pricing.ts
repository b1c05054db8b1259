// ── Model pricing (USD per 1M tokens) ────────────────────────

export interface ModelPricing {
  input: number;
  output: number;
}

export const MODEL_PRICING: ReadonlyMap<string, ModelPricing> = new Map([
  ['anthropic/claude-3.5-haiku', { input: 0.8, output: 4.0 }],
  ['anthropic/claude-3.5-sonnet', { input: 3.0, output: 15.0 }],
  ['claude-3-5-haiku-20241022', { input: 0.8, output: 4.0 }],
  ['claude-sonnet-4-5-20250929', { input: 3.0, output: 15.0 }],
  ['openai/gpt-4o-mini', { input: 0.15, output: 0.6 }],
  ['gpt-4o-mini', { input: 0.15, output: 0.6 }],
  ['openai/gpt-4o', { input: 2.5, output: 10.0 }],
  ['gpt-4o', { input: 2.5, output: 10.0 }],
]);

// Used when neither the model nor the fallback model has a price.
const CONSERVATIVE_PRICING: ModelPricing = { input: 3.0, output: 15.0 };

export function pricingFor(model: string, fallbackModel?: string): ModelPricing {
  return (
    MODEL_PRICING.get(model) ??
    (fallbackModel !== undefined ? MODEL_PRICING.get(fallbackModel) : undefined) ??
    CONSERVATIVE_PRICING
  );
}

export function tokenCost(
  model: string,
  inputTokens: number,
  outputTokens: number,
  fallbackModel?: string,
): number {
  const pricing = pricingFor(model, fallbackModel);
  return (
    (inputTokens / 1_000_000) * pricing.input +
    (outputTokens / 1_000_000) * pricing.output
  );
}
