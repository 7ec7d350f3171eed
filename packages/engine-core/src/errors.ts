import { EngineError } from './types.js';

/**
 * Malformed tier, breakpoint, rule or threshold configuration.
 * Raised while components are constructed, never while a request is served.
 */
export class ConfigurationError extends Error {
  constructor(
    public readonly code: EngineError,
    message: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Buyer and seller embeddings live in spaces of different sizes. */
export class DimensionMismatchError extends Error {
  public readonly code = EngineError.DIMENSION_MISMATCH;

  constructor(
    public readonly buyerDimension: number,
    public readonly sellerDimension: number,
  ) {
    super(`Dimension mismatch: buyer ${buyerDimension} vs seller ${sellerDimension}`);
    this.name = 'DimensionMismatchError';
  }
}

/** Embedding whose vector does not match its declared dimension, or is out of range. */
export class InvalidEmbeddingError extends Error {
  public readonly code = EngineError.INVALID_EMBEDDING;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidEmbeddingError';
  }
}

/** Requested capability weight that is not a positive finite number. */
export class InvalidCapabilityWeightError extends Error {
  public readonly code = EngineError.INVALID_CAPABILITY_WEIGHT;

  constructor(
    public readonly tag: string,
    public readonly weight: number,
  ) {
    super(`Capability ${tag} has weight ${weight}; weights must be positive`);
    this.name = 'InvalidCapabilityWeightError';
  }
}
