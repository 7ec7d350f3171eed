import {
  DimensionMismatchError,
  InvalidEmbeddingError,
  validateProduct,
  type CapabilityEmbedding,
  type CoverageRequest,
  type CoverageValidator,
  type PricingEngine,
  type PricingResult,
  type Product,
} from '@dealdesk/engine-core';
import type { Logger } from 'pino';
import type { DealIdGenerator } from '../deal/deal-id.js';
import { TimeoutError } from '../errors.js';
import { applyPolicy, policyFor, type ChannelPolicies, type PolicyVerdict } from '../policy/decision-policy.js';
import type { AllocationLedger, ProductCatalog } from '../ports/types.js';
import { transition, type ProposalEvent } from '../proposal/state-machine.js';
import type {
  CoverageAssessment,
  CoverageNotRequested,
  CoverageSkipReason,
  Decision,
  FlowOutcome,
  Proposal,
  ProposalStatus,
  UpsellSuggestion,
  WithdrawResult,
} from '../proposal/types.js';
import { DEFAULT_LOOKUP_TIMEOUT_MS, withTimeout } from './with-timeout.js';

export interface ProposalFlowDeps {
  catalog: ProductCatalog;
  ledger: AllocationLedger;
  pricing: PricingEngine;
  coverage: CoverageValidator;
  dealIds: DealIdGenerator;
  sellerOrgId: string;
  logger: Logger;
  policies?: ChannelPolicies;
  lookupTimeoutMs?: number;
  clock?: () => number;
}

function notRequested(reason: CoverageSkipReason): CoverageNotRequested {
  return Object.freeze({ validationStatus: 'not_requested', reason });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * One negotiation for one proposal.
 *
 * Pipeline:
 * 1. Look up the product (bounded by the lookup timeout)
 * 2. Start audience validation when the proposal carries targeting
 * 3. Price the proposal while coverage is in flight
 * 4. Apply the channel's decision policy
 * 5. On accept, reserve avails and attach a deal id; downgrade to counter if avails are gone
 * 6. Return the terminal Decision
 *
 * Withdrawal aborts pending lookups and releases a reservation taken in step 5.
 */
export class ProposalFlow {
  private status: ProposalStatus = 'SUBMITTED';
  private readonly controller = new AbortController();
  private readonly log: Logger;
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private running: Promise<FlowOutcome> | null = null;

  constructor(
    readonly proposal: Proposal,
    private readonly deps: ProposalFlowDeps,
  ) {
    this.log = deps.logger.child({ proposalId: proposal.proposalId });
    this.timeoutMs = deps.lookupTimeoutMs ?? DEFAULT_LOOKUP_TIMEOUT_MS;
    this.now = deps.clock ?? Date.now;
  }

  get state(): ProposalStatus {
    return this.status;
  }

  /** Drive the flow to a terminal state. Repeated calls share one run. */
  run(): Promise<FlowOutcome> {
    this.running ??= this.execute();
    return this.running;
  }

  /** Withdraw before a terminal state. After one, a no-op reporting ALREADY_TERMINAL. */
  withdraw(): WithdrawResult {
    const from = this.status;
    const next = transition(from, 'withdraw');
    if (next === null) {
      return { withdrawn: false, reason: 'ALREADY_TERMINAL' };
    }
    this.status = next;
    this.log.debug({ from, to: next, event: 'withdraw' }, 'transition');
    this.controller.abort();
    this.log.info('proposal withdrawn');
    return { withdrawn: true };
  }

  private async execute(): Promise<FlowOutcome> {
    try {
      return await this.pipeline();
    } catch (err) {
      if (this.isWithdrawn()) return { status: 'WITHDRAWN', decision: null };
      if (transition(this.status, 'reject') === null) throw err;
      this.log.error({ err }, 'proposal flow failed');
      return this.finish('reject', this.reject([`Internal error: ${errorMessage(err)}`]));
    }
  }

  private async pipeline(): Promise<FlowOutcome> {
    const { proposal, deps } = this;
    if (this.isWithdrawn()) return { status: 'WITHDRAWN', decision: null };

    // 1. Product lookup
    let product: Product | null;
    try {
      product = await this.lookup('product lookup', (signal) => deps.catalog.getProduct(proposal.productId, signal));
    } catch (err) {
      if (this.isWithdrawn()) return { status: 'WITHDRAWN', decision: null };
      this.log.warn({ err: errorMessage(err) }, 'product lookup failed');
      return this.finish('reject', this.reject([`Product lookup failed: ${errorMessage(err)}`]));
    }
    if (this.isWithdrawn()) return { status: 'WITHDRAWN', decision: null };
    if (!product) {
      return this.finish('reject', this.reject([`Product not found: ${proposal.productId}`]));
    }
    const productError = validateProduct(product);
    if (productError) {
      this.log.warn({ productId: product.id, code: productError }, 'product misconfigured');
      return this.finish('reject', this.reject([`Product ${product.id} is misconfigured: ${productError}`]));
    }

    // 2. Audience validation (concurrent with pricing)
    let coverageTask: Promise<CoverageAssessment>;
    if (proposal.targeting) {
      this.advance('validate_audience');
      coverageTask = this.assessCoverage(product, proposal.targeting);
    } else {
      coverageTask = Promise.resolve(notRequested('no_targeting'));
    }

    // 3. Pricing
    const pricing = deps.pricing.calculatePrice({
      productId: product.id,
      basePrice: product.baseCpm,
      volume: proposal.volume,
      buyerContext: proposal.buyer,
      floorCpm: product.floorCpm,
      inventoryType: product.inventoryType,
    });
    const coverage = await coverageTask;
    if (this.isWithdrawn()) return { status: 'WITHDRAWN', decision: null };
    this.advance('evaluate_pricing');

    // 4. Decision policy
    const verdict = applyPolicy({
      proposal,
      pricing,
      coverage,
      policy: policyFor(deps.policies ?? {}, product.inventoryType),
      negotiationEnabled: deps.pricing.isNegotiationEligible(proposal.buyer),
    });

    if (verdict.action === 'reject') {
      return this.finish('reject', this.reject(verdict.reasons, pricing, coverage));
    }
    if (verdict.action === 'counter') {
      return this.finish('counter', this.counter(verdict, pricing, coverage));
    }

    // 5. Reserve avails, then attach a deal id
    return this.commit(product, verdict.priceCpm, verdict.reasons, pricing, coverage);
  }

  private async commit(
    product: Product,
    priceCpm: number,
    reasons: string[],
    pricing: PricingResult,
    coverage: CoverageAssessment,
  ): Promise<FlowOutcome> {
    const { proposal, deps } = this;
    const reservation = deps.ledger.reserve(product.id, proposal.volume);
    let reserved: boolean;
    try {
      reserved = await this.lookup('avails reservation', () => reservation);
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, 'avails reservation failed');
      reserved = false;
      if (err instanceof TimeoutError) {
        // A reservation that lands after the timeout belongs to nobody.
        void reservation
          .then((late) => (late ? deps.ledger.release(product.id, proposal.volume) : undefined))
          .catch((lateErr: unknown) => {
            this.log.error({ err: errorMessage(lateErr) }, 'late reservation cleanup failed');
          });
      }
    }

    if (this.isWithdrawn()) {
      if (reserved) {
        try {
          await deps.ledger.release(product.id, proposal.volume);
          this.log.debug({ productId: product.id, volume: proposal.volume }, 'reservation released after withdrawal');
        } catch (err) {
          this.log.error({ err: errorMessage(err) }, 'release after withdrawal failed');
        }
      }
      return { status: 'WITHDRAWN', decision: null };
    }

    if (!reserved) {
      const available = await this.remainingAvails(product.id);
      this.log.warn({ productId: product.id, requested: proposal.volume, available }, 'avails unavailable');
      // After a timeout the ledger may still report the full volume; never offer more than was asked.
      const shortfall = available !== null && available < proposal.volume ? available : null;
      const volume = shortfall ?? proposal.volume;
      const note =
        shortfall === null
          ? `Requested ${proposal.volume} impressions are not available`
          : `Only ${shortfall} impressions available`;
      return this.finish(
        'counter',
        this.counter(
          { action: 'counter', reasons: ['Requested volume is not available'], counterTerms: { priceCpm, volume, note } },
          pricing,
          coverage,
        ),
      );
    }

    const dealId = deps.dealIds.generate(deps.sellerOrgId, product.id, proposal.submittedAt);
    const decision: Decision = {
      proposalId: proposal.proposalId,
      outcome: 'accepted',
      reasons,
      dealId,
      terms: { priceCpm, volume: proposal.volume, currency: pricing.currency },
      pricing,
      coverage,
      decidedAt: this.now(),
      ...this.upsell(),
    };
    return this.finish('accept', decision);
  }

  private async assessCoverage(product: Product, targeting: CoverageRequest): Promise<CoverageAssessment> {
    let embeddings: CapabilityEmbedding[];
    try {
      embeddings = await this.lookup('capability lookup', (signal) =>
        this.deps.catalog.getCapabilityEmbeddings(product.id, signal),
      );
    } catch (err) {
      if (this.isWithdrawn()) return notRequested('lookup_failed');
      const reason: CoverageSkipReason = err instanceof TimeoutError ? 'timeout' : 'lookup_failed';
      this.log.warn({ reason, err: errorMessage(err) }, 'audience validation degraded');
      return notRequested(reason);
    }

    try {
      return this.deps.coverage.validate(targeting, { supportedTags: product.audienceCapabilities, embeddings });
    } catch (err) {
      if (err instanceof DimensionMismatchError) {
        this.log.warn(
          { reason: 'dimension_mismatch', buyerDimension: err.buyerDimension, sellerDimension: err.sellerDimension },
          'audience validation degraded',
        );
        return notRequested('dimension_mismatch');
      }
      if (err instanceof InvalidEmbeddingError) {
        this.log.warn({ reason: 'lookup_failed', err: err.message }, 'audience validation degraded');
        return notRequested('lookup_failed');
      }
      throw err;
    }
  }

  private async remainingAvails(productId: string): Promise<number | null> {
    const { ledger } = this.deps;
    if (!ledger.available) return null;
    try {
      return await ledger.available(productId);
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, 'avails lookup failed');
      return null;
    }
  }

  private lookup<T>(label: string, operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return withTimeout(operation, { timeoutMs: this.timeoutMs, label, parent: this.controller.signal });
  }

  private upsell(): { upsell?: UpsellSuggestion } {
    const next = this.deps.pricing.nextVolumeBreakpoint(this.proposal.buyer, this.proposal.volume);
    if (!next) return {};
    return {
      upsell: {
        minImpressions: next.minImpressions,
        discount: next.discount,
        additionalImpressions: next.minImpressions - this.proposal.volume,
      },
    };
  }

  private reject(reasons: string[], pricing?: PricingResult, coverage?: CoverageAssessment): Decision {
    return {
      proposalId: this.proposal.proposalId,
      outcome: 'rejected',
      reasons,
      ...(pricing ? { pricing } : {}),
      ...(coverage ? { coverage } : {}),
      decidedAt: this.now(),
    };
  }

  private counter(
    verdict: Extract<PolicyVerdict, { action: 'counter' }>,
    pricing: PricingResult,
    coverage: CoverageAssessment,
  ): Decision {
    const { counterTerms } = verdict;
    return {
      proposalId: this.proposal.proposalId,
      outcome: 'countered',
      reasons: verdict.reasons,
      terms: { priceCpm: counterTerms.priceCpm, volume: counterTerms.volume, currency: pricing.currency },
      counterTerms,
      pricing,
      coverage,
      decidedAt: this.now(),
      ...this.upsell(),
    };
  }

  private finish(event: 'accept' | 'counter' | 'reject', decision: Decision): FlowOutcome {
    const status = this.advance(event);
    if (status !== 'ACCEPTED' && status !== 'COUNTERED' && status !== 'REJECTED') {
      throw new Error(`Flow ended in non-decided status ${status}`);
    }
    this.log.info(
      { outcome: decision.outcome, dealId: decision.dealId, priceCpm: decision.terms?.priceCpm },
      'proposal decided',
    );
    return { status, decision };
  }

  private advance(event: ProposalEvent): ProposalStatus {
    const from = this.status;
    const to = transition(from, event);
    if (to === null) {
      throw new Error(`Illegal transition ${from} + ${event}`);
    }
    this.status = to;
    this.log.debug({ from, to, event }, 'transition');
    return to;
  }

  private isWithdrawn(): boolean {
    return this.status === 'WITHDRAWN';
  }
}
