import { describe, expect, it } from 'vitest';
import { EmbeddingCoverageValidator } from '../src/coverage/validator.js';
import { cosineSimilarity } from '../src/coverage/similarity.js';
import {
  ConfigurationError,
  DimensionMismatchError,
  InvalidCapabilityWeightError,
  InvalidEmbeddingError,
} from '../src/errors.js';
import type { AudienceEmbedding, CapabilityEmbedding, ProductCapabilities } from '../src/coverage/types.js';

const DIM = 256;

/** Sparse vector of DIM entries from index → value pairs. */
function vec(entries: Record<number, number>, dimension = DIM): number[] {
  const v = new Array<number>(dimension).fill(0);
  for (const [i, value] of Object.entries(entries)) v[Number(i)] = value;
  return v;
}

function emb(entries: Record<number, number>, dimension = DIM): AudienceEmbedding {
  return { embeddingType: 'user_intent', dimension, vector: vec(entries, dimension) };
}

function cap(tag: string, entries: Record<number, number>): CapabilityEmbedding {
  return { tag, embedding: { ...emb(entries), embeddingType: 'inventory' } };
}

const buyer = emb({ 0: 1 });

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity(vec({ 0: 2 }), vec({ 0: 5 }))).toBeCloseTo(1, 10);
    expect(cosineSimilarity(vec({ 0: 1 }), vec({ 1: 1 }))).toBe(0);
  });

  it('stays finite for components whose squares overflow', () => {
    expect(cosineSimilarity(vec({ 0: 1e200 }), vec({ 0: 3e200 }))).toBeCloseTo(1, 10);
    expect(cosineSimilarity(vec({ 0: 1e200, 1: 1e200 }), vec({ 0: 1e-200 }))).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it('clamps opposed vectors to 0', () => {
    expect(cosineSimilarity(vec({ 0: 1 }), vec({ 0: -1 }))).toBe(0);
  });

  it('treats a zero vector as matching nothing', () => {
    expect(cosineSimilarity(vec({}), vec({ 0: 1 }))).toBe(0);
  });
});

describe('EmbeddingCoverageValidator', () => {
  const validator = new EmbeddingCoverageValidator();

  it('is valid when every requested tag is served and similarity is high', () => {
    const seller: ProductCapabilities = {
      supportedTags: ['sports', 'news'],
      embeddings: [cap('sports', { 0: 1 }), cap('news', { 0: 0.6, 1: 0.8 })],
    };
    const result = validator.validate(
      { embedding: buyer, capabilities: [{ tag: 'sports' }, { tag: 'news' }] },
      seller,
    );
    expect(result.validationStatus).toBe('valid');
    expect(result.similarityScore).toBeCloseTo(1, 10);
    expect(result.coveragePercentage).toBe(100);
    expect(result.matchedCapabilities).toEqual(['sports', 'news']);
    expect(result.gaps).toEqual([]);
    expect(result.alternatives).toEqual([]);
    expect(result.notes).toEqual([
      'UCP similarity: 1.00',
      'Coverage: 100.0%',
      'Matched 2 of 2 requested capabilities',
    ]);
  });

  it('reports gaps and nearby alternatives on a partial match', () => {
    const seller: ProductCapabilities = {
      supportedTags: ['sports', 'outdoor', 'news'],
      embeddings: [cap('sports', { 0: 1 }), cap('outdoor', { 0: 0.6, 3: 0.8 }), cap('news', { 5: 1 })],
    };
    const result = validator.validate(
      { embedding: buyer, capabilities: [{ tag: 'sports', weight: 3 }, { tag: 'finance', weight: 1 }] },
      seller,
    );
    expect(result.validationStatus).toBe('partial_match');
    expect(result.coveragePercentage).toBe(75);
    expect(result.matchedCapabilities).toEqual(['sports']);
    expect(result.gaps).toEqual(['finance']);
    expect(result.alternatives).toEqual(['outdoor']);
    expect(result.notes[1]).toBe('Coverage: 75.0%');
  });

  it('counts a supported tag without its own embedding as served', () => {
    const seller: ProductCapabilities = {
      supportedTags: ['sports', 'weather'],
      embeddings: [cap('sports', { 0: 1 })],
    };
    const result = validator.validate({ embedding: buyer, capabilities: [{ tag: 'weather' }] }, seller);
    expect(result.validationStatus).toBe('valid');
    expect(result.matchedCapabilities).toEqual(['weather']);
  });

  it('is no_match when nothing requested is served, with alternatives', () => {
    const seller: ProductCapabilities = {
      supportedTags: ['sports', 'outdoor'],
      embeddings: [cap('sports', { 0: 1 }), cap('outdoor', { 0: 0.6, 3: 0.8 })],
    };
    const result = validator.validate({ embedding: buyer, capabilities: [{ tag: 'finance' }] }, seller);
    expect(result.validationStatus).toBe('no_match');
    expect(result.coveragePercentage).toBe(0);
    expect(result.gaps).toEqual(['finance']);
    expect(result.alternatives).toEqual(['sports', 'outdoor']);
  });

  it('caps alternatives per gap', () => {
    const narrow = new EmbeddingCoverageValidator({ maxAlternativesPerGap: 1 });
    const seller: ProductCapabilities = {
      supportedTags: ['sports', 'outdoor'],
      embeddings: [cap('sports', { 0: 1 }), cap('outdoor', { 0: 0.6, 3: 0.8 })],
    };
    const result = narrow.validate({ embedding: buyer, capabilities: [{ tag: 'finance' }] }, seller);
    expect(result.alternatives).toEqual(['sports']);
  });

  it('is no_match with no alternatives when similarity is below the partial threshold', () => {
    const seller: ProductCapabilities = {
      supportedTags: ['sports'],
      embeddings: [cap('sports', { 1: 1 })],
    };
    const result = validator.validate({ embedding: buyer, capabilities: [{ tag: 'sports' }] }, seller);
    expect(result.validationStatus).toBe('no_match');
    expect(result.similarityScore).toBe(0);
    expect(result.gaps).toEqual(['sports']);
    expect(result.alternatives).toEqual([]);
  });

  it('treats an empty request as fully covered', () => {
    const seller: ProductCapabilities = { supportedTags: ['sports'], embeddings: [cap('sports', { 0: 1 })] };
    const result = validator.validate({ embedding: buyer, capabilities: [] }, seller);
    expect(result.coveragePercentage).toBe(100);
    expect(result.validationStatus).toBe('valid');
    expect(result.notes[2]).toBe('Matched 0 of 0 requested capabilities');
  });

  it('counts duplicate requested tags once', () => {
    const seller: ProductCapabilities = { supportedTags: ['sports'], embeddings: [cap('sports', { 0: 1 })] };
    const result = validator.validate(
      { embedding: buyer, capabilities: [{ tag: 'sports' }, { tag: 'sports' }, { tag: 'finance' }] },
      seller,
    );
    expect(result.coveragePercentage).toBe(50);
    expect(result.matchedCapabilities).toEqual(['sports']);
  });

  it('keeps coverage within 0..100 and similarity within 0..1', () => {
    const seller: ProductCapabilities = {
      supportedTags: ['a', 'b'],
      embeddings: [cap('a', { 0: -1 }), cap('b', { 0: 0.3, 7: 0.9 })],
    };
    const result = validator.validate(
      { embedding: buyer, capabilities: [{ tag: 'a', weight: 0.5 }, { tag: 'b', weight: 2 }, { tag: 'c' }] },
      seller,
    );
    expect(result.coveragePercentage).toBeGreaterThanOrEqual(0);
    expect(result.coveragePercentage).toBeLessThanOrEqual(100);
    expect(result.similarityScore).toBeGreaterThanOrEqual(0);
    expect(result.similarityScore).toBeLessThanOrEqual(1);
  });

  it('refuses to compare embeddings of different dimensions', () => {
    const seller: ProductCapabilities = {
      supportedTags: ['sports'],
      embeddings: [{ tag: 'sports', embedding: emb({ 0: 1 }, 512) }],
    };
    const request = { embedding: emb({ 0: 1 }, 300), capabilities: [{ tag: 'sports' }] };
    expect(() => validator.validate(request, seller)).toThrow(DimensionMismatchError);
    expect(() => validator.validate(request, seller)).toThrow('Dimension mismatch: buyer 300 vs seller 512');
  });

  it('rejects a vector that does not match its declared dimension', () => {
    const malformed: AudienceEmbedding = { embeddingType: 'query', dimension: DIM, vector: [1, 0, 0] };
    expect(() =>
      validator.validate({ embedding: malformed, capabilities: [] }, { supportedTags: [], embeddings: [] }),
    ).toThrow(InvalidEmbeddingError);
  });

  it('rejects a dimension outside the supported range', () => {
    expect(() =>
      validator.validate({ embedding: emb({ 0: 1 }, 128), capabilities: [] }, { supportedTags: [], embeddings: [] }),
    ).toThrow(InvalidEmbeddingError);
  });

  it('scores huge aligned vectors as a full match', () => {
    const huge = emb({ 0: 1e200 });
    const result = validator.validate(
      { embedding: huge, capabilities: [{ tag: 'sports' }] },
      { supportedTags: ['sports'], embeddings: [{ tag: 'sports', embedding: huge }] },
    );
    expect(result.similarityScore).toBeCloseTo(1, 10);
    expect(result.validationStatus).toBe('valid');
  });

  it.each([
    ['NaN', Number.NaN],
    ['Infinity', Number.POSITIVE_INFINITY],
  ])('rejects a seller vector containing %s', (_label, bad) => {
    const vector = vec({ 0: 1 });
    vector[3] = bad;
    const seller: ProductCapabilities = {
      supportedTags: ['sports'],
      embeddings: [{ tag: 'sports', embedding: { embeddingType: 'inventory', dimension: DIM, vector } }],
    };
    expect(() => validator.validate({ embedding: buyer, capabilities: [{ tag: 'sports' }] }, seller)).toThrow(
      'vector component 3 is not a finite number',
    );
  });

  it.each([
    ['zero', 0],
    ['negative', -1],
    ['NaN', Number.NaN],
    ['infinite', Number.POSITIVE_INFINITY],
  ])('rejects a %s capability weight', (_label, weight) => {
    const seller: ProductCapabilities = { supportedTags: ['sports'], embeddings: [cap('sports', { 0: 1 })] };
    expect(() =>
      validator.validate({ embedding: buyer, capabilities: [{ tag: 'sports', weight }] }, seller),
    ).toThrow(InvalidCapabilityWeightError);
  });

  it('rejects a bad weight on a repeated tag', () => {
    const seller: ProductCapabilities = { supportedTags: ['sports'], embeddings: [cap('sports', { 0: 1 })] };
    expect(() =>
      validator.validate(
        { embedding: buyer, capabilities: [{ tag: 'sports' }, { tag: 'sports', weight: 0 }] },
        seller,
      ),
    ).toThrow('Capability sports has weight 0; weights must be positive');
  });

  it('returns a frozen result', () => {
    const result = validator.validate(
      { embedding: buyer, capabilities: [{ tag: 'sports' }] },
      { supportedTags: ['sports'], embeddings: [cap('sports', { 0: 1 })] },
    );
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.gaps)).toBe(true);
  });

  it('rejects a partial threshold above the valid threshold', () => {
    expect(() => new EmbeddingCoverageValidator({ partialThreshold: 0.6, validThreshold: 0.5 })).toThrow(
      ConfigurationError,
    );
  });
});
