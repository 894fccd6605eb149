import fs from 'fs';
import { z } from 'zod';
import { CostBreakdown, ProviderCost, TokenUsage } from '../types/index.js';
import { parseYamlMapping } from '../utils/yaml-files.js';

const modelPricingSchema = z.object({
  input_per_1m: z.number().nonnegative(),
  output_per_1m: z.number().nonnegative(),
  source: z.string().optional(),
});

const pricingFileSchema = z.object({
  models: z.record(modelPricingSchema).default({}),
});

export type ModelPricing = z.infer<typeof modelPricingSchema>;

const TOKENS_PER_UNIT = 1_000_000;

function roundCost(value: number): number {
  return Math.round(value * 1e8) / 1e8;
}

/**
 * Turns token usage into USD. Provider-reported cost wins; otherwise the
 * per-million rates from fallback_pricing.yaml; otherwise zero.
 */
export class CostCalculator {
  private readonly pricing: Map<string, ModelPricing>;

  constructor(pricing: Record<string, ModelPricing> = {}) {
    this.pricing = new Map(Object.entries(pricing));
  }

  static fromFile(filePath: string): CostCalculator {
    if (!fs.existsSync(filePath)) {
      console.warn(`[cost] Fallback pricing file ${filePath} not found; unreported costs will be zero`);
      return new CostCalculator();
    }
    const parsed = pricingFileSchema.safeParse(parseYamlMapping(fs.readFileSync(filePath, 'utf-8'), filePath));
    if (!parsed.success) {
      console.error(`[cost] Invalid fallback pricing in ${filePath}:`, parsed.error.message);
      return new CostCalculator();
    }
    console.log(`[cost] Loaded fallback pricing for ${Object.keys(parsed.data.models).length} model(s)`);
    return new CostCalculator(parsed.data.models);
  }

  /** Exact model id first, then the id without its `provider/` prefix. */
  getPricing(model: string): ModelPricing | null {
    const exact = this.pricing.get(model);
    if (exact) return exact;

    const slash = model.indexOf('/');
    if (slash >= 0) {
      return this.pricing.get(model.slice(slash + 1)) ?? null;
    }
    return null;
  }

  calculate(model: string, usage: TokenUsage, providerCost?: ProviderCost | null): CostBreakdown {
    if (providerCost && Number.isFinite(providerCost.totalCost) && providerCost.totalCost >= 0) {
      return {
        promptCost: roundCost(providerCost.promptCost ?? 0),
        completionCost: roundCost(providerCost.completionCost ?? 0),
        totalCost: roundCost(providerCost.totalCost),
        method: 'provider',
      };
    }

    const pricing = this.getPricing(model);
    if (pricing) {
      const promptCost = roundCost((usage.promptTokens / TOKENS_PER_UNIT) * pricing.input_per_1m);
      const completionCost = roundCost((usage.completionTokens / TOKENS_PER_UNIT) * pricing.output_per_1m);
      return {
        promptCost,
        completionCost,
        totalCost: roundCost(promptCost + completionCost),
        method: 'fallback_pricing',
      };
    }

    console.warn(`[cost] No pricing for model ${model}; recording zero cost`);
    return { promptCost: 0, completionCost: 0, totalCost: 0, method: 'unpriced' };
  }
}
