import { z } from 'zod';
import {
  InvalidEmbeddingError,
  MAX_EMBEDDING_DIMENSION,
  MIN_EMBEDDING_DIMENSION,
  type AudienceEmbedding,
} from '@dealdesk/engine-core';

// ─── Wire schemas ──────────────────────────────────────────

export const EmbeddingTypeSchema = z.enum(['context', 'creative', 'user_intent', 'inventory', 'query']);

export const SignalTypeSchema = z.enum(['identity', 'contextual', 'reinforcement']);

export const ModelDescriptorSchema = z.object({
  id: z.string().min(1),
  version: z.string().min(1),
  metric: z.enum(['cosine', 'dot', 'l2']).default('cosine'),
});

/**
 * UCP embedding as exchanged between buyer and seller agents.
 * Only `embeddingType`, `dimension` and `vector` feed the coverage validator;
 * the remaining fields are checked for shape and otherwise passed over.
 */
export const UcpEmbeddingSchema = z
  .object({
    embeddingType: EmbeddingTypeSchema,
    signalType: SignalTypeSchema.optional(),
    dimension: z.number().int().min(MIN_EMBEDDING_DIMENSION).max(MAX_EMBEDDING_DIMENSION),
    vector: z.array(z.number().finite()),
    modelDescriptor: ModelDescriptorSchema.optional(),
    ttlSeconds: z.number().int().nonnegative().optional(),
  })
  .refine((e) => e.vector.length === e.dimension, {
    message: 'vector length must equal dimension',
    path: ['vector'],
  });

export type UcpEmbedding = z.infer<typeof UcpEmbeddingSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** Decode a UCP wire embedding. Throws InvalidEmbeddingError on any shape violation. */
export function parseUcpEmbedding(raw: unknown): AudienceEmbedding {
  const parsed = UcpEmbeddingSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidEmbeddingError(formatIssues(parsed.error).join('; '));
  }
  const { embeddingType, dimension, vector } = parsed.data;
  return Object.freeze({ embeddingType, dimension, vector: Object.freeze([...vector]) });
}
