/** Buyer access tier, ordered from least to most identity revealed. */
export type AccessTier = 'public' | 'seat' | 'agency' | 'advertiser';

/** Inventory channels a product can belong to. */
export type InventoryType = 'display' | 'video' | 'ctv' | 'mobile_app' | 'native';

/**
 * Buyer identity. Advertiser implies agency implies seat implies public.
 * Built once at intake and never mutated afterwards.
 */
export interface BuyerIdentity {
  readonly seatId?: string;
  readonly seatName?: string;
  readonly dspPlatform?: string;
  readonly agencyId?: string;
  readonly agencyName?: string;
  readonly agencyHoldingCompany?: string;
  readonly advertiserId?: string;
  readonly advertiserName?: string;
}

/** Identity plus authentication state. Tiers above public require authentication. */
export interface BuyerContext {
  readonly identity: BuyerIdentity;
  readonly isAuthenticated: boolean;
  readonly authenticationMethod?: 'oauth' | 'api_key' | 'a2a';
}

/** Sellable product. Invariant: floorCpm <= baseCpm. */
export interface Product {
  id: string;
  name: string;
  baseCpm: number;
  floorCpm: number;
  inventoryType: InventoryType;
  audienceCapabilities: string[];
}

/** Engine validation errors. */
export enum EngineError {
  INVALID_TIER_DISCOUNT = 'INVALID_TIER_DISCOUNT',
  INVALID_RANGE_SPREAD = 'INVALID_RANGE_SPREAD',
  INVALID_BREAKPOINTS = 'INVALID_BREAKPOINTS',
  INVALID_RULE = 'INVALID_RULE',
  INVALID_FLOOR = 'INVALID_FLOOR',
  INVALID_CEILING = 'INVALID_CEILING',
  INVALID_THRESHOLDS = 'INVALID_THRESHOLDS',
  INVALID_PRODUCT = 'INVALID_PRODUCT',
  INVALID_EMBEDDING = 'INVALID_EMBEDDING',
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  INVALID_CAPABILITY_WEIGHT = 'INVALID_CAPABILITY_WEIGHT',
  INVALID_ENVIRONMENT = 'INVALID_ENVIRONMENT',
  INVALID_PRICING_FILE = 'INVALID_PRICING_FILE',
}
