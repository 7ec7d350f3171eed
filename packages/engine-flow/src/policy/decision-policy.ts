import type { InventoryType, PricingResult } from '@dealdesk/engine-core';
import type { CounterTerms, CoverageAssessment, Proposal } from '../proposal/types.js';

/**
 * Decision policy variant, chosen per inventory channel.
 * `coverage_gated` rejects partial audience matches below a channel minimum
 * instead of countering them.
 */
export type DecisionPolicy =
  | { kind: 'standard' }
  | { kind: 'coverage_gated'; minCoveragePercentage: number };

export type ChannelPolicies = Partial<Record<InventoryType, DecisionPolicy>>;

export const STANDARD_POLICY: DecisionPolicy = { kind: 'standard' };

export function policyFor(policies: ChannelPolicies, inventoryType: InventoryType): DecisionPolicy {
  return policies[inventoryType] ?? STANDARD_POLICY;
}

/** Input to the decision step. Everything is already computed; no I/O. */
export interface PolicyInput {
  proposal: Proposal;
  pricing: PricingResult;
  coverage: CoverageAssessment;
  policy: DecisionPolicy;
  negotiationEnabled: boolean;
}

export type PolicyVerdict =
  | { action: 'reject'; reasons: string[] }
  | { action: 'counter'; reasons: string[]; counterTerms: CounterTerms }
  | { action: 'accept'; reasons: string[]; priceCpm: number };

function money(value: number): string {
  return `$${value.toFixed(2)}`;
}

/**
 * Apply the decision rules in priority order:
 * 1. no_match with no alternatives → reject
 * 2. coverage_gated, audience short of the channel minimum → reject
 * 3. proposed price below the floor → counter at the computed price
 * 4. proposed price below the tier price, tier not negotiable → counter at the tier price
 * 5. partial match, or no match with alternatives → counter at the original terms,
 *    gaps and alternatives noted
 * 6. otherwise accept
 */
export function applyPolicy(input: PolicyInput): PolicyVerdict {
  const { proposal, pricing, coverage, policy } = input;
  const proposed = proposal.proposedPriceCpm;

  // 1. Audience cannot be served at all
  if (coverage.validationStatus === 'no_match' && coverage.alternatives.length === 0) {
    return {
      action: 'reject',
      reasons: [
        `Audience cannot be fulfilled: similarity ${coverage.similarityScore.toFixed(2)}, no alternative capabilities`,
      ],
    };
  }

  // 2. Channel-specific coverage gate
  if (
    policy.kind === 'coverage_gated' &&
    (coverage.validationStatus === 'partial_match' || coverage.validationStatus === 'no_match') &&
    coverage.coveragePercentage < policy.minCoveragePercentage
  ) {
    return {
      action: 'reject',
      reasons: [
        `Audience coverage ${coverage.coveragePercentage.toFixed(1)}% is below the channel minimum of ${policy.minCoveragePercentage.toFixed(1)}%`,
      ],
    };
  }

  // 3. Below floor
  if (proposed !== undefined && proposed < pricing.floorCpm) {
    return {
      action: 'counter',
      reasons: [`Proposed ${money(proposed)} CPM is below the floor of ${money(pricing.floorCpm)} CPM`],
      counterTerms: {
        priceCpm: pricing.finalPrice,
        volume: proposal.volume,
        note: `Counter at ${money(pricing.finalPrice)} CPM`,
      },
    };
  }

  // 4. Below tier price without negotiation rights
  if (proposed !== undefined && proposed < pricing.finalPrice && !input.negotiationEnabled) {
    return {
      action: 'counter',
      reasons: [
        `Proposed ${money(proposed)} CPM is below the ${pricing.tier} tier price of ${money(pricing.finalPrice)} CPM and the tier is not negotiable`,
      ],
      counterTerms: {
        priceCpm: pricing.finalPrice,
        volume: proposal.volume,
        note: `Counter at tier price ${money(pricing.finalPrice)} CPM`,
      },
    };
  }

  const priceCpm = proposed ?? pricing.finalPrice;

  // 5. Partial audience match (or no match with alternatives): same terms, surface the gaps
  if (coverage.validationStatus === 'partial_match' || coverage.validationStatus === 'no_match') {
    const alternatives = coverage.alternatives.length > 0 ? coverage.alternatives.join(', ') : 'none';
    return {
      action: 'counter',
      reasons: [
        coverage.validationStatus === 'partial_match'
          ? `Partial audience match: ${coverage.coveragePercentage.toFixed(1)}% coverage`
          : 'Requested audience not available; alternatives offered',
      ],
      counterTerms: {
        priceCpm,
        volume: proposal.volume,
        note: `Gaps: ${coverage.gaps.join(', ')}; alternatives: ${alternatives}`,
      },
    };
  }

  // 6. Accept
  return { action: 'accept', reasons: ['Terms acceptable'], priceCpm };
}
