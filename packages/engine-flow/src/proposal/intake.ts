import { z } from 'zod';
import type { BuyerContext, CoverageRequest } from '@dealdesk/engine-core';
import { InvalidProposalError } from '../errors.js';
import { UcpEmbeddingSchema, formatIssues } from '../protocol/ucp.js';
import type { Proposal } from './types.js';

const OptionalId = z.string().min(1).optional();

export const BuyerIdentitySchema = z.object({
  seatId: OptionalId,
  seatName: z.string().optional(),
  dspPlatform: z.string().optional(),
  agencyId: OptionalId,
  agencyName: z.string().optional(),
  agencyHoldingCompany: z.string().optional(),
  advertiserId: OptionalId,
  advertiserName: z.string().optional(),
});

export const BuyerContextSchema = z.object({
  identity: BuyerIdentitySchema.default({}),
  isAuthenticated: z.boolean().default(false),
  authenticationMethod: z.enum(['oauth', 'api_key', 'a2a']).optional(),
});

export const RequestedCapabilitySchema = z.object({
  tag: z.string().min(1),
  weight: z.number().positive().finite().optional(),
});

export const TargetingSchema = z.object({
  embedding: UcpEmbeddingSchema,
  capabilities: z.array(RequestedCapabilitySchema).default([]),
});

export const ProposalSchema = z.object({
  proposalId: z.string().min(1),
  productId: z.string().min(1),
  buyer: BuyerContextSchema.default({}),
  volume: z.number().int().nonnegative(),
  targeting: TargetingSchema.optional(),
  proposedPriceCpm: z.number().positive().finite().optional(),
  submittedAt: z.number().int().nonnegative().optional(),
});

export type ProposalInput = z.input<typeof ProposalSchema>;

/**
 * Validate an incoming proposal at the boundary.
 * Buyer identity and targeting are frozen; `submittedAt` defaults to `now`.
 */
export function parseProposal(raw: unknown, now: number = Date.now()): Proposal {
  const parsed = ProposalSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidProposalError(formatIssues(parsed.error));
  }
  const data = parsed.data;

  const buyer: BuyerContext = Object.freeze({
    identity: Object.freeze({ ...data.buyer.identity }),
    isAuthenticated: data.buyer.isAuthenticated,
    ...(data.buyer.authenticationMethod ? { authenticationMethod: data.buyer.authenticationMethod } : {}),
  });

  let targeting: CoverageRequest | undefined;
  if (data.targeting) {
    const { embeddingType, dimension, vector } = data.targeting.embedding;
    targeting = Object.freeze({
      embedding: Object.freeze({ embeddingType, dimension, vector: Object.freeze([...vector]) }),
      capabilities: data.targeting.capabilities.map((c) => Object.freeze({ ...c })),
    });
  }

  return Object.freeze({
    proposalId: data.proposalId,
    productId: data.productId,
    buyer,
    volume: data.volume,
    ...(targeting ? { targeting } : {}),
    ...(data.proposedPriceCpm !== undefined ? { proposedPriceCpm: data.proposedPriceCpm } : {}),
    submittedAt: data.submittedAt ?? now,
  });
}
