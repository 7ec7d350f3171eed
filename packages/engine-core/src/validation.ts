import type { Product } from './types.js';
import { EngineError } from './types.js';
import type { PricingRule, PricingTierConfig, TierSettings, VolumeBreakpoint } from './pricing/types.js';
import type { AudienceEmbedding, CoverageThresholds } from './coverage/types.js';
import { MAX_EMBEDDING_DIMENSION, MIN_EMBEDDING_DIMENSION } from './coverage/types.js';
import { ConfigurationError, InvalidEmbeddingError } from './errors.js';

function isFraction(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value < 1;
}

export function validateTierSettings(tier: TierSettings): EngineError | null {
  if (!isFraction(tier.discount)) {
    return EngineError.INVALID_TIER_DISCOUNT;
  }
  if (!isFraction(tier.rangeSpread)) {
    return EngineError.INVALID_RANGE_SPREAD;
  }
  return null;
}

/** Breakpoints must be strictly increasing with non-decreasing discounts in [0, 1). */
export function validateBreakpoints(breakpoints: VolumeBreakpoint[]): EngineError | null {
  let prev: VolumeBreakpoint | undefined;
  for (const bp of breakpoints) {
    if (!Number.isInteger(bp.minImpressions) || bp.minImpressions < 0 || !isFraction(bp.discount)) {
      return EngineError.INVALID_BREAKPOINTS;
    }
    if (prev && (bp.minImpressions <= prev.minImpressions || bp.discount < prev.discount)) {
      return EngineError.INVALID_BREAKPOINTS;
    }
    prev = bp;
  }
  return null;
}

export function validateRule(rule: PricingRule): EngineError | null {
  if (!rule.id || !isFraction(rule.discount)) {
    return EngineError.INVALID_RULE;
  }
  return null;
}

/** Validate the full pricing table. Returns first error found, or null. */
export function validatePricingConfig(
  config: PricingTierConfig,
): { error: EngineError; detail?: string } | null {
  for (const [tier, settings] of Object.entries(config.tiers)) {
    const err = validateTierSettings(settings);
    if (err) return { error: err, detail: `tier=${tier}` };
  }

  const bpErr = validateBreakpoints(config.volumeBreakpoints);
  if (bpErr) return { error: bpErr };

  for (const rule of config.rules) {
    const err = validateRule(rule);
    if (err) return { error: err, detail: `rule=${rule.id || '<missing id>'}` };
  }

  if (!Number.isFinite(config.globalFloorCpm) || config.globalFloorCpm < 0) {
    return { error: EngineError.INVALID_FLOOR, detail: `floor=${config.globalFloorCpm}` };
  }

  if (config.globalCeilingCpm !== undefined && !(config.globalCeilingCpm >= config.globalFloorCpm)) {
    return { error: EngineError.INVALID_CEILING, detail: `ceiling=${config.globalCeilingCpm}` };
  }

  return null;
}

export function validateThresholds(t: CoverageThresholds): EngineError | null {
  const inUnit = [t.validThreshold, t.partialThreshold, t.tagMatchThreshold, t.alternativeThreshold].every(
    (v) => Number.isFinite(v) && v >= 0 && v <= 1,
  );
  if (!inUnit || t.partialThreshold > t.validThreshold) {
    return EngineError.INVALID_THRESHOLDS;
  }
  if (!Number.isInteger(t.maxAlternativesPerGap) || t.maxAlternativesPerGap < 0) {
    return EngineError.INVALID_THRESHOLDS;
  }
  return null;
}

export function validateProduct(p: Product): EngineError | null {
  if (!p.id || !(p.baseCpm > 0) || !(p.floorCpm >= 0) || p.floorCpm > p.baseCpm) {
    return EngineError.INVALID_PRODUCT;
  }
  return null;
}

/** Throws ConfigurationError when the pricing table is unusable. */
export function assertPricingConfig(config: PricingTierConfig): void {
  const result = validatePricingConfig(config);
  if (result) {
    const suffix = result.detail ? ` (${result.detail})` : '';
    throw new ConfigurationError(result.error, `Invalid pricing configuration: ${result.error}${suffix}`);
  }
}

/** Throws ConfigurationError when coverage thresholds are unusable. */
export function assertThresholds(thresholds: CoverageThresholds): void {
  const err = validateThresholds(thresholds);
  if (err) {
    throw new ConfigurationError(err, `Invalid coverage thresholds: ${JSON.stringify(thresholds)}`);
  }
}

/** Throws InvalidEmbeddingError unless the embedding honours its declared dimension. */
export function assertEmbedding(embedding: AudienceEmbedding): void {
  const { dimension, vector } = embedding;
  if (!Number.isInteger(dimension) || dimension < MIN_EMBEDDING_DIMENSION || dimension > MAX_EMBEDDING_DIMENSION) {
    throw new InvalidEmbeddingError(
      `dimension ${dimension} outside [${MIN_EMBEDDING_DIMENSION}, ${MAX_EMBEDDING_DIMENSION}]`,
    );
  }
  if (vector.length !== dimension) {
    throw new InvalidEmbeddingError(`vector length ${vector.length} does not match dimension ${dimension}`);
  }
  const bad = vector.findIndex((x) => !Number.isFinite(x));
  if (bad !== -1) {
    throw new InvalidEmbeddingError(`vector component ${bad} is not a finite number`);
  }
}
