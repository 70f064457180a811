import type { CostEstimator, ProviderSpec } from "./types.js";

export interface ModelPricing {
  readonly inputPerMillion: number;
  readonly outputPerMillion: number;
}

/** Price per 1M tokens by model name. `default` covers unlisted models. */
export const DEFAULT_MODEL_PRICING: Readonly<Record<string, ModelPricing>> = {
  "gpt-4-turbo-preview": { inputPerMillion: 10, outputPerMillion: 30 },
  "gpt-4": { inputPerMillion: 30, outputPerMillion: 60 },
  "gpt-3.5-turbo": { inputPerMillion: 0.5, outputPerMillion: 1.5 },
  "claude-3-opus-20240229": { inputPerMillion: 15, outputPerMillion: 75 },
  "claude-3-sonnet-20240229": { inputPerMillion: 3, outputPerMillion: 15 },
  "claude-3-haiku-20240307": { inputPerMillion: 0.25, outputPerMillion: 1.25 },
  "gemini-pro": { inputPerMillion: 0.5, outputPerMillion: 1.5 },
  "gemini-pro-vision": { inputPerMillion: 0.5, outputPerMillion: 1.5 },
  "grok-1": { inputPerMillion: 20, outputPerMillion: 60 },
  default: { inputPerMillion: 10, outputPerMillion: 30 },
};

const FALLBACK_PRICING: ModelPricing = { inputPerMillion: 10, outputPerMillion: 30 };

/**
 * Static per-model price list implementing {@link CostEstimator}.
 * Models missing from the table are priced at its `default` row.
 */
export class PricingTable implements CostEstimator {
  private readonly pricing: Readonly<Record<string, ModelPricing>>;

  constructor(pricing: Readonly<Record<string, ModelPricing>> = DEFAULT_MODEL_PRICING) {
    this.pricing = pricing;
  }

  pricingFor(model: string): ModelPricing {
    return this.pricing[model] ?? this.pricing.default ?? FALLBACK_PRICING;
  }

  estimateCost(spec: ProviderSpec, inputTokens: number, outputTokens: number): number {
    const pricing = this.pricingFor(spec.model);
    return (
      (pricing.inputPerMillion * inputTokens) / 1_000_000 +
      (pricing.outputPerMillion * outputTokens) / 1_000_000
    );
  }

  unitPrice(spec: ProviderSpec): number {
    const pricing = this.pricingFor(spec.model);
    return (pricing.inputPerMillion + pricing.outputPerMillion) / 2;
  }
}
