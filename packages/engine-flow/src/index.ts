// Proposal types
export type {
  ProposalStatus,
  Proposal,
  CoverageSkipReason,
  CoverageNotRequested,
  CoverageAssessment,
  DecisionOutcome,
  DealTerms,
  CounterTerms,
  UpsellSuggestion,
  Decision,
  WithdrawResult,
  FlowOutcome,
} from './proposal/types.js';
export { isCoverageResult } from './proposal/types.js';

// Errors
export { InvalidProposalError, TimeoutError } from './errors.js';

// Proposal
export { transition, isTerminal, TERMINAL_STATES } from './proposal/state-machine.js';
export type { ProposalEvent } from './proposal/state-machine.js';
export { parseProposal, ProposalSchema } from './proposal/intake.js';
export type { ProposalInput } from './proposal/intake.js';

// Protocol
export { parseUcpEmbedding, UcpEmbeddingSchema } from './protocol/ucp.js';
export type { UcpEmbedding } from './protocol/ucp.js';

// Policy
export { applyPolicy, policyFor, STANDARD_POLICY } from './policy/decision-policy.js';
export type { DecisionPolicy, ChannelPolicies, PolicyInput, PolicyVerdict } from './policy/decision-policy.js';

// Deal ids
export { DealIdGenerator, parseDealId, sellerTag, DEAL_ID_LENGTH } from './deal/deal-id.js';
export type { ParsedDealId } from './deal/deal-id.js';

// Ports & in-memory stand-ins
export type { ProductCatalog, AllocationLedger } from './ports/types.js';
export { InMemoryProductCatalog } from './memory/catalog.js';
export type { InMemoryCatalogOptions } from './memory/catalog.js';
export { InMemoryAllocationLedger } from './memory/ledger.js';

// Flow
export { ProposalFlow } from './flow/proposal-flow.js';
export type { ProposalFlowDeps } from './flow/proposal-flow.js';
export { withTimeout, DEFAULT_LOOKUP_TIMEOUT_MS } from './flow/with-timeout.js';
export { ProposalDesk, createDesk } from './desk.js';

// Ambient
export { loadConfig, EnvSchema, PricingFileSchema } from './config.js';
export type { AppConfig, LoadConfigOptions, PricingFile } from './config.js';
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
