// Types
export type {
  AccessTier,
  InventoryType,
  BuyerIdentity,
  BuyerContext,
  Product,
} from './types.js';
export { EngineError } from './types.js';

// Errors
export {
  ConfigurationError,
  DimensionMismatchError,
  InvalidEmbeddingError,
  InvalidCapabilityWeightError,
} from './errors.js';

// Pricing types
export type {
  TierSettings,
  VolumeBreakpoint,
  PricingRule,
  PricingTierConfig,
  PriceRequest,
  PricingResult,
  PriceDisplay,
  OfferEvaluation,
  PricingEngine,
} from './pricing/types.js';

// Coverage types
export type {
  EmbeddingType,
  AudienceEmbedding,
  CapabilityEmbedding,
  RequestedCapability,
  CoverageRequest,
  ProductCapabilities,
  CoverageThresholds,
  ValidationStatus,
  CoverageResult,
  CoverageValidator,
} from './coverage/types.js';
export { MIN_EMBEDDING_DIMENSION, MAX_EMBEDDING_DIMENSION } from './coverage/types.js';

// Identity
export { resolveTier, pricingKey } from './identity/resolver.js';

// Pricing
export { TieredPricingEngine } from './pricing/engine.js';
export { defaultPricingConfig, DEFAULT_RANGE_SPREAD } from './pricing/defaults.js';
export { resolveVolumeDiscount, nextBreakpoint } from './pricing/volume.js';

// Coverage
export { EmbeddingCoverageValidator, DEFAULT_COVERAGE_THRESHOLDS } from './coverage/validator.js';
export { cosineSimilarity } from './coverage/similarity.js';

// Validation
export {
  validatePricingConfig,
  validateThresholds,
  validateProduct,
  assertPricingConfig,
  assertThresholds,
  assertEmbedding,
} from './validation.js';

// Utils
export { clamp, roundTo } from './utils.js';
