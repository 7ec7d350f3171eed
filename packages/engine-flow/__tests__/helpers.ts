import { pino, type Logger } from 'pino';
import {
  EmbeddingCoverageValidator,
  TieredPricingEngine,
  defaultPricingConfig,
  type AudienceEmbedding,
  type CapabilityEmbedding,
  type Product,
} from '@dealdesk/engine-core';
import { DealIdGenerator } from '../src/deal/deal-id.js';
import { InMemoryProductCatalog } from '../src/memory/catalog.js';
import { InMemoryAllocationLedger } from '../src/memory/ledger.js';
import type { ProposalFlowDeps } from '../src/flow/proposal-flow.js';
import type { ChannelPolicies } from '../src/policy/decision-policy.js';
import type { AllocationLedger, ProductCatalog } from '../src/ports/types.js';
import type { ProposalInput } from '../src/proposal/intake.js';

export const DIM = 256;
export const FIXED_NOW = 1_760_000_000_000;
export const SELLER = 'seller-test';

export function vec(entries: Record<number, number>, dimension = DIM): number[] {
  const v = new Array<number>(dimension).fill(0);
  for (const [i, value] of Object.entries(entries)) v[Number(i)] = value;
  return v;
}

export function embedding(entries: Record<number, number>, dimension = DIM): AudienceEmbedding {
  return { embeddingType: 'inventory', dimension, vector: vec(entries, dimension) };
}

/** Buyer-side wire embedding, as it arrives in a proposal. */
export function wireEmbedding(entries: Record<number, number>, dimension = DIM) {
  return { embeddingType: 'query' as const, dimension, vector: vec(entries, dimension) };
}

export function makeProduct(overrides?: Partial<Product>): Product {
  return {
    id: 'ctv-premium',
    name: 'CTV Premium',
    baseCpm: 20,
    floorCpm: 12,
    inventoryType: 'ctv',
    audienceCapabilities: ['sports', 'outdoor', 'news'],
    ...overrides,
  };
}

/** sports = e0, outdoor = 0.6·e0 + 0.8·e3, news = e5. */
export function defaultEmbeddings(): CapabilityEmbedding[] {
  return [
    { tag: 'sports', embedding: embedding({ 0: 1 }) },
    { tag: 'outdoor', embedding: embedding({ 0: 0.6, 3: 0.8 }) },
    { tag: 'news', embedding: embedding({ 5: 1 }) },
  ];
}

export const advertiserBuyer = {
  identity: { seatId: 'seat-1', agencyId: 'ag-1', advertiserId: 'adv-1' },
  isAuthenticated: true,
};
export const agencyBuyer = { identity: { seatId: 'seat-1', agencyId: 'ag-1' }, isAuthenticated: true };
export const seatBuyer = { identity: { seatId: 'seat-1' }, isAuthenticated: true };

export function proposalInput(overrides?: Partial<ProposalInput>): ProposalInput {
  return {
    proposalId: 'p-1',
    productId: 'ctv-premium',
    buyer: advertiserBuyer,
    volume: 10_000_000,
    submittedAt: FIXED_NOW,
    ...overrides,
  };
}

export const silentLogger: Logger = pino({ level: 'silent' });

/** Logger that keeps every JSON line it writes. */
export function captureLogs(): { logger: Logger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { logger, lines };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export interface SetupOptions {
  product?: Product;
  avails?: number;
  policies?: ChannelPolicies;
  catalog?: ProductCatalog;
  ledger?: AllocationLedger;
  logger?: Logger;
  lookupTimeoutMs?: number;
  catalogDelayMs?: number;
}

export interface Setup {
  deps: ProposalFlowDeps;
  catalog: InMemoryProductCatalog;
  ledger: InMemoryAllocationLedger;
}

export function setup(options: SetupOptions = {}): Setup {
  const product = options.product ?? makeProduct();
  const catalog = new InMemoryProductCatalog([], { delayMs: options.catalogDelayMs });
  catalog.addProduct(product, defaultEmbeddings());
  const ledger = new InMemoryAllocationLedger({ [product.id]: options.avails ?? 50_000_000 });

  const deps: ProposalFlowDeps = {
    catalog: options.catalog ?? catalog,
    ledger: options.ledger ?? ledger,
    pricing: new TieredPricingEngine(defaultPricingConfig()),
    coverage: new EmbeddingCoverageValidator(),
    dealIds: new DealIdGenerator({ nonce: 'test-nonce' }),
    sellerOrgId: SELLER,
    logger: options.logger ?? silentLogger,
    policies: options.policies,
    lookupTimeoutMs: options.lookupTimeoutMs,
    clock: () => FIXED_NOW,
  };
  return { deps, catalog, ledger };
}
