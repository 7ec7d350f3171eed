export type EmbeddingType = 'context' | 'creative' | 'user_intent' | 'inventory' | 'query';

export const MIN_EMBEDDING_DIMENSION = 256;
export const MAX_EMBEDDING_DIMENSION = 1024;

/** Embedding vector. Invariant: vector.length === dimension, dimension in [256, 1024]. */
export interface AudienceEmbedding {
  readonly embeddingType: EmbeddingType;
  readonly dimension: number;
  readonly vector: readonly number[];
}

/** Seller-published representative embedding for one capability tag. */
export interface CapabilityEmbedding {
  tag: string;
  embedding: AudienceEmbedding;
}

/** A capability the buyer asks for. Weight defaults to 1. */
export interface RequestedCapability {
  tag: string;
  weight?: number;
}

/** Buyer side of a validation call. */
export interface CoverageRequest {
  embedding: AudienceEmbedding;
  capabilities: RequestedCapability[];
}

/** Seller side of a validation call, as supplied by the catalog. */
export interface ProductCapabilities {
  supportedTags: readonly string[];
  embeddings: readonly CapabilityEmbedding[];
}

export interface CoverageThresholds {
  /** Best-match similarity needed for `valid`. */
  validThreshold: number;
  /** Below this best-match similarity the request is `no_match`. */
  partialThreshold: number;
  /** Similarity a tag's own embedding needs for the tag to count as satisfied. */
  tagMatchThreshold: number;
  /** Similarity a neighbour needs to be suggested as an alternative. */
  alternativeThreshold: number;
  maxAlternativesPerGap: number;
}

export type ValidationStatus = 'valid' | 'partial_match' | 'no_match';

export interface CoverageResult {
  readonly validationStatus: ValidationStatus;
  /** Share of requested capability weight the seller can serve, 0–100. */
  readonly coveragePercentage: number;
  /** Best cosine similarity across seller capability embeddings, 0–1. */
  readonly similarityScore: number;
  readonly matchedCapabilities: readonly string[];
  readonly gaps: readonly string[];
  readonly alternatives: readonly string[];
  readonly notes: readonly string[];
}

/** Closed set of coverage operations. */
export interface CoverageValidator {
  validate(request: CoverageRequest, capabilities: ProductCapabilities): CoverageResult;
}
