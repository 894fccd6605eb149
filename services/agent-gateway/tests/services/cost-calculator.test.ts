import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { describe, expect, it } from 'vitest';
import { CostCalculator } from '../../src/services/cost-calculator.js';
import { FIXTURES_DIR } from '../helpers.js';

const usage = { promptTokens: 1000, completionTokens: 500, totalTokens: 1500 };

describe('CostCalculator', () => {
  const calculator = new CostCalculator({
    'openai/gpt-4o': { input_per_1m: 2.5, output_per_1m: 10 },
    'mistral-small': { input_per_1m: 0.2, output_per_1m: 0.6 },
  });

  describe('calculate', () => {
    it('uses the provider-reported cost first', () => {
      const cost = calculator.calculate('openai/gpt-4o', usage, {
        totalCost: 0.0123456789,
        promptCost: 0.001,
        completionCost: 0.0113456789,
      });

      expect(cost).toEqual({
        promptCost: 0.001,
        completionCost: 0.01134568,
        totalCost: 0.01234568,
        method: 'provider',
      });
    });

    it('accepts a reported cost of zero', () => {
      expect(calculator.calculate('openai/gpt-4o', usage, { totalCost: 0 })).toEqual({
        promptCost: 0,
        completionCost: 0,
        totalCost: 0,
        method: 'provider',
      });
    });

    it('falls back to per-million pricing', () => {
      const cost = calculator.calculate('openai/gpt-4o', usage, null);

      expect(cost.method).toBe('fallback_pricing');
      expect(cost.promptCost).toBeCloseTo(0.0025, 10);
      expect(cost.completionCost).toBeCloseTo(0.005, 10);
      expect(cost.totalCost).toBeCloseTo(0.0075, 10);
    });

    it('ignores a reported cost that is not a finite non-negative number', () => {
      expect(calculator.calculate('openai/gpt-4o', usage, { totalCost: Number.NaN }).method).toBe('fallback_pricing');
      expect(calculator.calculate('openai/gpt-4o', usage, { totalCost: -1 }).method).toBe('fallback_pricing');
    });

    it('records zero cost for unpriced models', () => {
      expect(calculator.calculate('unknown/model', usage)).toEqual({
        promptCost: 0,
        completionCost: 0,
        totalCost: 0,
        method: 'unpriced',
      });
    });
  });

  describe('getPricing', () => {
    it('matches exactly, then without the provider prefix', () => {
      expect(calculator.getPricing('openai/gpt-4o')).toEqual({ input_per_1m: 2.5, output_per_1m: 10 });
      expect(calculator.getPricing('mistralai/mistral-small')).toEqual({ input_per_1m: 0.2, output_per_1m: 0.6 });
      expect(calculator.getPricing('gpt-4o')).toBeNull();
    });
  });

  describe('fromFile', () => {
    it('loads the models table', () => {
      const loaded = CostCalculator.fromFile(path.join(FIXTURES_DIR, 'fallback_pricing.yaml'));

      expect(loaded.getPricing('acme/support-model')).toEqual({ input_per_1m: 2, output_per_1m: 6, source: 'fixture' });
      expect(loaded.getPricing('fixture/global-model')?.input_per_1m).toBe(1);
    });

    it('reads the shipped pricing file, quoted keys included', () => {
      const shipped = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../config/fallback_pricing.yaml');
      const loaded = CostCalculator.fromFile(shipped);

      expect(loaded.getPricing('openai/gpt-oss-20b:free')).toMatchObject({ input_per_1m: 0, output_per_1m: 0 });
      expect(loaded.getPricing('openai/gpt-4o-mini')).toMatchObject({ input_per_1m: 0.15, output_per_1m: 0.6 });
    });

    it('prices nothing when the file is missing or invalid', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pricing-'));
      try {
        const invalid = path.join(dir, 'pricing.yaml');
        fs.writeFileSync(invalid, 'models:\n  bad:\n    input_per_1m: -1\n    output_per_1m: 1\n');

        expect(CostCalculator.fromFile(invalid).getPricing('bad')).toBeNull();
        expect(CostCalculator.fromFile(path.join(dir, 'missing.yaml')).getPricing('bad')).toBeNull();
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
