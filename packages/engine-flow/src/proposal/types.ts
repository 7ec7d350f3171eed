import type { BuyerContext, CoverageRequest, CoverageResult, PricingResult } from '@dealdesk/engine-core';

/** Flow lifecycle status. */
export type ProposalStatus =
  | 'SUBMITTED'
  | 'AUDIENCE_VALIDATING'
  | 'PRICING_EVALUATING'
  | 'ACCEPTED'
  | 'COUNTERED'
  | 'REJECTED'
  | 'WITHDRAWN';

/** A buyer's request for a deal on one product. Immutable once parsed. */
export interface Proposal {
  readonly proposalId: string;
  readonly productId: string;
  readonly buyer: BuyerContext;
  /** Requested impressions. */
  readonly volume: number;
  readonly targeting?: CoverageRequest;
  readonly proposedPriceCpm?: number;
  /** Epoch ms. */
  readonly submittedAt: number;
}

export type CoverageSkipReason = 'no_targeting' | 'timeout' | 'dimension_mismatch' | 'lookup_failed';

/** Sentinel used when no coverage verdict exists. Never blocks a decision. */
export interface CoverageNotRequested {
  readonly validationStatus: 'not_requested';
  readonly reason: CoverageSkipReason;
}

export type CoverageAssessment = CoverageResult | CoverageNotRequested;

export type DecisionOutcome = 'accepted' | 'countered' | 'rejected';

export interface DealTerms {
  priceCpm: number;
  volume: number;
  currency: string;
}

export interface CounterTerms {
  priceCpm: number;
  volume: number;
  note: string;
}

/** Next volume step the buyer could reach, with the impressions still needed. */
export interface UpsellSuggestion {
  minImpressions: number;
  discount: number;
  additionalImpressions: number;
}

/** Terminal verdict on a proposal. */
export interface Decision {
  proposalId: string;
  outcome: DecisionOutcome;
  reasons: string[];
  dealId?: string;
  /** What the seller commits to (accepted) or would commit to (countered). */
  terms?: DealTerms;
  counterTerms?: CounterTerms;
  pricing?: PricingResult;
  coverage?: CoverageAssessment;
  upsell?: UpsellSuggestion;
  decidedAt: number;
}

export type WithdrawResult =
  | { withdrawn: true }
  | { withdrawn: false; reason: 'ALREADY_TERMINAL' | 'UNKNOWN_PROPOSAL' };

/** Everything a finished flow produced. */
export type FlowOutcome =
  | { status: 'ACCEPTED' | 'COUNTERED' | 'REJECTED'; decision: Decision }
  | { status: 'WITHDRAWN'; decision: null };

export function isCoverageResult(coverage: CoverageAssessment | undefined): coverage is CoverageResult {
  return coverage !== undefined && coverage.validationStatus !== 'not_requested';
}
