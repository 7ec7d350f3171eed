import { z } from 'zod';
import { EmbeddingCoverageValidator, TieredPricingEngine } from '@dealdesk/engine-core';
import type { Logger } from 'pino';
import type { AppConfig } from './config.js';
import { DealIdGenerator } from './deal/deal-id.js';
import { InvalidProposalError } from './errors.js';
import { ProposalFlow, type ProposalFlowDeps } from './flow/proposal-flow.js';
import type { AllocationLedger, ProductCatalog } from './ports/types.js';
import { parseProposal } from './proposal/intake.js';
import type { FlowOutcome, ProposalStatus, WithdrawResult } from './proposal/types.js';

const ProposalIdSchema = z.object({ proposalId: z.string().min(1) });

/**
 * Runs one ProposalFlow per proposal id. A proposal id is decided at most
 * once: re-submitting it returns the first outcome.
 *
 * Flows are held only while running; afterwards the desk keeps the outcome
 * and the terminal status.
 */
export class ProposalDesk {
  private flows: Map<string, ProposalFlow> = new Map();
  private settled: Map<string, ProposalStatus> = new Map();
  private outcomes: Map<string, Promise<FlowOutcome>> = new Map();
  private readonly now: () => number;

  constructor(private readonly deps: ProposalFlowDeps) {
    this.now = deps.clock ?? Date.now;
  }

  submit(raw: unknown): Promise<FlowOutcome> {
    const id = ProposalIdSchema.safeParse(raw);
    const proposalId = id.success ? id.data.proposalId : '';

    const existing = this.outcomes.get(proposalId);
    if (existing) {
      this.deps.logger.debug({ proposalId }, 'duplicate proposal, returning first outcome');
      return existing;
    }

    let outcome: Promise<FlowOutcome>;
    try {
      const proposal = parseProposal(raw, this.now());
      const flow = new ProposalFlow(proposal, this.deps);
      this.flows.set(proposal.proposalId, flow);
      outcome = flow.run().finally(() => {
        this.settled.set(proposal.proposalId, flow.state);
        this.flows.delete(proposal.proposalId);
      });
    } catch (err) {
      if (!(err instanceof InvalidProposalError)) throw err;
      this.deps.logger.info({ proposalId, issues: err.issues }, 'proposal rejected at intake');
      if (proposalId) this.settled.set(proposalId, 'REJECTED');
      outcome = Promise.resolve<FlowOutcome>({
        status: 'REJECTED',
        decision: { proposalId, outcome: 'rejected', reasons: [...err.issues], decidedAt: this.now() },
      });
    }

    // Without an id there is nothing to deduplicate against.
    if (proposalId) this.outcomes.set(proposalId, outcome);
    return outcome;
  }

  /** Number of proposals still being decided. */
  get inFlight(): number {
    return this.flows.size;
  }

  /** Current status, or null for an id never submitted. */
  status(proposalId: string): ProposalStatus | null {
    return this.flows.get(proposalId)?.state ?? this.settled.get(proposalId) ?? null;
  }

  withdraw(proposalId: string): WithdrawResult {
    const flow = this.flows.get(proposalId);
    if (flow) return flow.withdraw();
    if (this.settled.has(proposalId)) return { withdrawn: false, reason: 'ALREADY_TERMINAL' };
    return { withdrawn: false, reason: 'UNKNOWN_PROPOSAL' };
  }
}

/** Wire a desk from loaded configuration and the deployment's collaborators. */
export function createDesk(
  config: AppConfig,
  collaborators: { catalog: ProductCatalog; ledger: AllocationLedger; logger: Logger; clock?: () => number },
): ProposalDesk {
  return new ProposalDesk({
    ...collaborators,
    pricing: new TieredPricingEngine(config.pricing),
    coverage: new EmbeddingCoverageValidator(config.coverageThresholds),
    dealIds: new DealIdGenerator(),
    sellerOrgId: config.sellerOrgId,
    policies: config.channelPolicies,
    lookupTimeoutMs: config.lookupTimeoutMs,
  });
}
