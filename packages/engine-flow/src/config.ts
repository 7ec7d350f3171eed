import { readFileSync } from 'node:fs';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import {
  ConfigurationError,
  EngineError,
  assertPricingConfig,
  defaultPricingConfig,
  type AccessTier,
  type CoverageThresholds,
  type PricingTierConfig,
} from '@dealdesk/engine-core';
import { formatIssues } from './protocol/ucp.js';
import type { ChannelPolicies } from './policy/decision-policy.js';
import { DEFAULT_LOOKUP_TIMEOUT_MS } from './flow/with-timeout.js';

// ─── Environment ───────────────────────────────────────────

const Fraction = z.coerce.number().min(0).lt(1);
const UnitInterval = z.coerce.number().min(0).max(1);

export const EnvSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  SELLER_ORG_ID: z.string().min(1),
  DEAL_CURRENCY: z.string().regex(/^[A-Z]{3}$/, 'must be an ISO 4217 code').default('USD'),
  GLOBAL_FLOOR_CPM: z.coerce.number().nonnegative().default(1),
  GLOBAL_CEILING_CPM: z.coerce.number().positive().optional(),
  PRICE_RANGE_SPREAD: Fraction.default(0.2),
  LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_LOOKUP_TIMEOUT_MS),
  COVERAGE_VALID_THRESHOLD: UnitInterval.default(0.5),
  COVERAGE_PARTIAL_THRESHOLD: UnitInterval.default(0.3),
  PRICING_CONFIG_PATH: z.string().min(1).optional(),
});

// ─── Pricing file ──────────────────────────────────────────

const InventoryTypeSchema = z.enum(['display', 'video', 'ctv', 'mobile_app', 'native']);
const AccessTierSchema = z.enum(['public', 'seat', 'agency', 'advertiser']);

const TierOverrideSchema = z
  .object({
    label: z.string().min(1),
    discount: z.number(),
    showExactPrice: z.boolean(),
    rangeSpread: z.number(),
    negotiationEnabled: z.boolean(),
    volumeDiscountsEnabled: z.boolean(),
  })
  .partial();

const PricingRuleSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  discount: z.number(),
  active: z.boolean().default(true),
  tier: AccessTierSchema.optional(),
  agencyIds: z.array(z.string()).optional(),
  advertiserIds: z.array(z.string()).optional(),
  holdingCompanies: z.array(z.string()).optional(),
  productIds: z.array(z.string()).optional(),
  inventoryTypes: z.array(InventoryTypeSchema).optional(),
});

const DecisionPolicySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('standard') }),
  z.object({ kind: z.literal('coverage_gated'), minCoveragePercentage: z.number().min(0).max(100) }),
]);

export const PricingFileSchema = z.object({
  tiers: z
    .object({
      public: TierOverrideSchema.optional(),
      seat: TierOverrideSchema.optional(),
      agency: TierOverrideSchema.optional(),
      advertiser: TierOverrideSchema.optional(),
    })
    .default({}),
  volumeBreakpoints: z.array(z.object({ minImpressions: z.number(), discount: z.number() })).optional(),
  rules: z.array(PricingRuleSchema).default([]),
  channelPolicies: z
    .object({
      display: DecisionPolicySchema.optional(),
      video: DecisionPolicySchema.optional(),
      ctv: DecisionPolicySchema.optional(),
      mobile_app: DecisionPolicySchema.optional(),
      native: DecisionPolicySchema.optional(),
    })
    .default({}),
});

export type PricingFile = z.infer<typeof PricingFileSchema>;

// ─── Assembled configuration ───────────────────────────────

export interface AppConfig {
  logLevel: string;
  sellerOrgId: string;
  lookupTimeoutMs: number;
  pricing: PricingTierConfig;
  coverageThresholds: Partial<CoverageThresholds>;
  channelPolicies: ChannelPolicies;
}

export interface LoadConfigOptions {
  /** Variables to read. Defaults to process.env. */
  env?: Record<string, string | undefined>;
  /** .env file merged underneath `env`; explicit variables win. */
  dotenvPath?: string;
}

const TIERS: readonly AccessTier[] = ['public', 'seat', 'agency', 'advertiser'];

function readPricingFile(path: string): PricingFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(EngineError.INVALID_PRICING_FILE, `Cannot read pricing config ${path}: ${reason}`);
  }
  const parsed = PricingFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      EngineError.INVALID_PRICING_FILE,
      `Invalid pricing config ${path}: ${formatIssues(parsed.error).join('; ')}`,
    );
  }
  return parsed.data;
}

/**
 * Read and validate configuration once at startup. Throws ConfigurationError;
 * nothing downstream reads the environment again.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const fromFile: Record<string, string> = {};
  if (options.dotenvPath) {
    const result = loadDotenv({ path: options.dotenvPath, processEnv: fromFile });
    if (result.error) {
      throw new ConfigurationError(
        EngineError.INVALID_ENVIRONMENT,
        `Cannot load ${options.dotenvPath}: ${result.error.message}`,
      );
    }
  }

  const parsed = EnvSchema.safeParse({ ...fromFile, ...(options.env ?? process.env) });
  if (!parsed.success) {
    throw new ConfigurationError(
      EngineError.INVALID_ENVIRONMENT,
      `Invalid environment: ${formatIssues(parsed.error).join('; ')}`,
    );
  }
  const env = parsed.data;

  const pricing = defaultPricingConfig();
  pricing.currency = env.DEAL_CURRENCY;
  pricing.globalFloorCpm = env.GLOBAL_FLOOR_CPM;
  if (env.GLOBAL_CEILING_CPM !== undefined) pricing.globalCeilingCpm = env.GLOBAL_CEILING_CPM;
  for (const tier of TIERS) pricing.tiers[tier].rangeSpread = env.PRICE_RANGE_SPREAD;

  let channelPolicies: ChannelPolicies = {};
  if (env.PRICING_CONFIG_PATH) {
    const file = readPricingFile(env.PRICING_CONFIG_PATH);
    for (const tier of TIERS) {
      pricing.tiers[tier] = { ...pricing.tiers[tier], ...file.tiers[tier] };
    }
    if (file.volumeBreakpoints) pricing.volumeBreakpoints = file.volumeBreakpoints;
    pricing.rules = file.rules;
    channelPolicies = file.channelPolicies;
  }
  assertPricingConfig(pricing);

  return {
    logLevel: env.LOG_LEVEL,
    sellerOrgId: env.SELLER_ORG_ID,
    lookupTimeoutMs: env.LOOKUP_TIMEOUT_MS,
    pricing,
    coverageThresholds: {
      validThreshold: env.COVERAGE_VALID_THRESHOLD,
      partialThreshold: env.COVERAGE_PARTIAL_THRESHOLD,
    },
    channelPolicies,
  };
}
