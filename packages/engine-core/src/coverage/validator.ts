import { DimensionMismatchError, InvalidCapabilityWeightError } from '../errors.js';
import { assertEmbedding, assertThresholds } from '../validation.js';
import { clamp } from '../utils.js';
import { cosineSimilarity } from './similarity.js';
import type {
  AudienceEmbedding,
  CapabilityEmbedding,
  CoverageRequest,
  CoverageResult,
  CoverageThresholds,
  CoverageValidator,
  ProductCapabilities,
  ValidationStatus,
} from './types.js';

export const DEFAULT_COVERAGE_THRESHOLDS: CoverageThresholds = {
  validThreshold: 0.5,
  partialThreshold: 0.3,
  tagMatchThreshold: 0.3,
  alternativeThreshold: 0.3,
  maxAlternativesPerGap: 3,
};

/**
 * Scores a buyer's targeting request against what a product can serve.
 *
 * Two independent measures:
 * - similarityScore: best cosine match between the buyer embedding and any
 *   seller capability embedding (max, not average).
 * - coveragePercentage: weighted share of requested capability tags the
 *   seller supports.
 *
 * No I/O: embeddings and capability catalogs come from the caller.
 */
export class EmbeddingCoverageValidator implements CoverageValidator {
  private readonly thresholds: CoverageThresholds;

  constructor(thresholds: Partial<CoverageThresholds> = {}) {
    const merged = { ...DEFAULT_COVERAGE_THRESHOLDS, ...thresholds };
    assertThresholds(merged);
    this.thresholds = merged;
  }

  validate(request: CoverageRequest, capabilities: ProductCapabilities): CoverageResult {
    const buyer = request.embedding;
    assertEmbedding(buyer);
    for (const cap of capabilities.embeddings) {
      if (cap.embedding.dimension !== buyer.dimension) {
        throw new DimensionMismatchError(buyer.dimension, cap.embedding.dimension);
      }
      assertEmbedding(cap.embedding);
    }

    const tagSimilarity = similarityByTag(buyer, capabilities.embeddings);
    let similarityScore = 0;
    for (const score of tagSimilarity.values()) {
      similarityScore = Math.max(similarityScore, score);
    }

    const supported = new Set(capabilities.supportedTags);
    const requested = dedupeRequested(request.capabilities);
    const isSatisfied = (tag: string): boolean => {
      if (!supported.has(tag)) return false;
      const score = tagSimilarity.get(tag);
      return score === undefined || score >= this.thresholds.tagMatchThreshold;
    };

    const matched: string[] = [];
    const gaps: string[] = [];
    let totalWeight = 0;
    let matchedWeight = 0;
    for (const { tag, weight } of requested) {
      totalWeight += weight;
      if (isSatisfied(tag)) {
        matched.push(tag);
        matchedWeight += weight;
      } else {
        gaps.push(tag);
      }
    }

    const coveragePercentage = totalWeight > 0 ? clamp((matchedWeight / totalWeight) * 100, 0, 100) : 100;
    const validationStatus = this.classify(similarityScore, requested.length, matched.length, gaps.length);

    const excluded = new Set([...matched, ...gaps]);
    const alternatives = this.findAlternatives(buyer, gaps, capabilities, supported, excluded);

    return Object.freeze({
      validationStatus,
      coveragePercentage,
      similarityScore,
      matchedCapabilities: Object.freeze(matched),
      gaps: Object.freeze(gaps),
      alternatives: Object.freeze(alternatives),
      notes: Object.freeze([
        `UCP similarity: ${similarityScore.toFixed(2)}`,
        `Coverage: ${coveragePercentage.toFixed(1)}%`,
        `Matched ${matched.length} of ${requested.length} requested capabilities`,
      ]),
    });
  }

  private classify(
    similarity: number,
    requestedCount: number,
    matchedCount: number,
    gapCount: number,
  ): ValidationStatus {
    const { validThreshold, partialThreshold } = this.thresholds;
    if (similarity < partialThreshold) return 'no_match';
    if (requestedCount > 0 && matchedCount === 0) return 'no_match';
    if (similarity >= validThreshold && gapCount === 0) return 'valid';
    return 'partial_match';
  }

  /**
   * Nearest supported capabilities for each gap, ranked by similarity to the
   * gap's own seller embedding (or the buyer embedding when the seller has none).
   */
  private findAlternatives(
    buyer: AudienceEmbedding,
    gaps: readonly string[],
    capabilities: ProductCapabilities,
    supported: ReadonlySet<string>,
    excluded: ReadonlySet<string>,
  ): string[] {
    const { alternativeThreshold, maxAlternativesPerGap } = this.thresholds;
    const candidates = capabilities.embeddings.filter((c) => supported.has(c.tag) && !excluded.has(c.tag));
    const seen = new Set<string>();
    const result: string[] = [];

    for (const gap of gaps) {
      const anchor = capabilities.embeddings.find((c) => c.tag === gap)?.embedding ?? buyer;
      const ranked = [...similarityByTag(anchor, candidates)]
        .filter(([, score]) => score >= alternativeThreshold)
        .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));

      let taken = 0;
      for (const [tag] of ranked) {
        if (taken >= maxAlternativesPerGap) break;
        if (seen.has(tag)) continue;
        seen.add(tag);
        result.push(tag);
        taken++;
      }
    }
    return result;
  }
}

/** Best similarity per tag, in first-seen tag order. */
function similarityByTag(anchor: AudienceEmbedding, embeddings: readonly CapabilityEmbedding[]): Map<string, number> {
  const scores = new Map<string, number>();
  for (const { tag, embedding } of embeddings) {
    const score = cosineSimilarity(anchor.vector, embedding.vector);
    scores.set(tag, Math.max(scores.get(tag) ?? 0, score));
  }
  return scores;
}

/** First occurrence of each tag wins. Throws on a non-positive weight. */
function dedupeRequested(requested: readonly { tag: string; weight?: number }[]): { tag: string; weight: number }[] {
  const seen = new Set<string>();
  const result: { tag: string; weight: number }[] = [];
  for (const r of requested) {
    const weight = r.weight ?? 1;
    if (!Number.isFinite(weight) || weight <= 0) {
      throw new InvalidCapabilityWeightError(r.tag, weight);
    }
    if (seen.has(r.tag)) continue;
    seen.add(r.tag);
    result.push({ tag: r.tag, weight });
  }
  return result;
}
