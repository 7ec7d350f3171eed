import { describe, expect, it } from 'vitest';
import * as api from '../src/index.js';

/**
 * Public API surface test.
 * Verifies that every function, class and enum exported from index.ts
 * is actually accessible at runtime.
 */
describe('Public API (@dealdesk/engine-core)', () => {
  describe('function exports', () => {
    it.each([
      'resolveTier',
      'pricingKey',
      'defaultPricingConfig',
      'resolveVolumeDiscount',
      'nextBreakpoint',
      'cosineSimilarity',
      'validatePricingConfig',
      'validateThresholds',
      'validateProduct',
      'assertPricingConfig',
      'assertThresholds',
      'assertEmbedding',
      'clamp',
      'roundTo',
    ] as const)('exports %s', (name) => {
      expect(typeof api[name]).toBe('function');
    });
  });

  describe('class exports', () => {
    it('exports engines and errors', () => {
      expect(typeof api.TieredPricingEngine).toBe('function');
      expect(typeof api.EmbeddingCoverageValidator).toBe('function');
      expect(new api.DimensionMismatchError(256, 512)).toBeInstanceOf(Error);
      expect(new api.InvalidCapabilityWeightError('sports', 0).code).toBe(api.EngineError.INVALID_CAPABILITY_WEIGHT);
    });
  });

  describe('enum exports', () => {
    it('exports EngineError with all members', () => {
      expect(api.EngineError.INVALID_TIER_DISCOUNT).toBe('INVALID_TIER_DISCOUNT');
      expect(api.EngineError.INVALID_BREAKPOINTS).toBe('INVALID_BREAKPOINTS');
      expect(api.EngineError.INVALID_THRESHOLDS).toBe('INVALID_THRESHOLDS');
      expect(api.EngineError.DIMENSION_MISMATCH).toBe('DIMENSION_MISMATCH');
      expect(api.EngineError.INVALID_ENVIRONMENT).toBe('INVALID_ENVIRONMENT');
      expect(api.EngineError.INVALID_PRICING_FILE).toBe('INVALID_PRICING_FILE');
    });
  });

  describe('end-to-end through public API', () => {
    it('prices and validates a proposal', () => {
      const engine = new api.TieredPricingEngine(api.defaultPricingConfig());
      const buyer: api.BuyerContext = {
        identity: { agencyId: 'ag-1', advertiserId: 'adv-1' },
        isAuthenticated: true,
      };
      const price = engine.calculatePrice({ productId: 'p', basePrice: 20, buyerContext: buyer, volume: 10_000_000 });
      expect(price.finalPrice).toBe(15.3);

      const vector = new Array<number>(api.MIN_EMBEDDING_DIMENSION).fill(0);
      vector[0] = 1;
      const embedding: api.AudienceEmbedding = { embeddingType: 'context', dimension: vector.length, vector };
      const coverage = new api.EmbeddingCoverageValidator().validate(
        { embedding, capabilities: [{ tag: 'sports' }] },
        { supportedTags: ['sports'], embeddings: [{ tag: 'sports', embedding }] },
      );
      expect(coverage.validationStatus).toBe('valid');
    });
  });
});
