import type { AccessTier, BuyerContext, InventoryType } from '../types.js';

/** Per-tier pricing behaviour. */
export interface TierSettings {
  label: string;
  /** Fraction off the base price, in [0, 1). */
  discount: number;
  /** false → buyers see a price range instead of a point price. */
  showExactPrice: boolean;
  /** Half-width of the displayed range as a fraction of base price, in [0, 1). */
  rangeSpread: number;
  negotiationEnabled: boolean;
  volumeDiscountsEnabled: boolean;
}

/** Step of the volume discount function. */
export interface VolumeBreakpoint {
  minImpressions: number;
  discount: number;
}

/** Seller-defined discount for a subset of buyers or products. Empty matchers match everything. */
export interface PricingRule {
  id: string;
  name: string;
  discount: number;
  active: boolean;
  tier?: AccessTier;
  agencyIds?: string[];
  advertiserIds?: string[];
  holdingCompanies?: string[];
  productIds?: string[];
  inventoryTypes?: InventoryType[];
}

/**
 * Per-deployment pricing table.
 * Breakpoints strictly increasing with non-decreasing discounts; every discount in [0, 1).
 */
export interface PricingTierConfig {
  tiers: Record<AccessTier, TierSettings>;
  volumeBreakpoints: VolumeBreakpoint[];
  rules: PricingRule[];
  currency: string;
  globalFloorCpm: number;
  globalCeilingCpm?: number;
}

/** Input to PricingEngine.calculatePrice. */
export interface PriceRequest {
  productId: string;
  basePrice: number;
  volume: number;
  buyerContext?: BuyerContext;
  /** Product floor; the effective floor is the larger of this and the global floor. */
  floorCpm?: number;
  inventoryType?: InventoryType;
  /** Explicit authorization to price below the floor. */
  allowBelowFloor?: boolean;
}

export interface PricingResult {
  productId: string;
  tier: AccessTier;
  pricingKey: string;
  basePrice: number;
  tierDiscount: number;
  ruleDiscount: number;
  volumeDiscount: number;
  finalPrice: number;
  floorCpm: number;
  flooredApplied: boolean;
  ceilingApplied: boolean;
  currency: string;
  rationale: string;
  appliedRules: string[];
}

export type PriceDisplay =
  | { type: 'range'; low: number; high: number; currency: string; display: string }
  | { type: 'exact'; price: number; currency: string; negotiationEnabled: boolean };

export interface OfferEvaluation {
  acceptable: boolean;
  reason: string;
}

/** Closed set of pricing operations. Callers depend on this, not on a concrete engine. */
export interface PricingEngine {
  calculatePrice(request: PriceRequest): PricingResult;
  getPriceDisplay(basePrice: number, buyerContext?: BuyerContext): PriceDisplay;
  evaluateOffer(offeredPrice: number, floorCpm: number): OfferEvaluation;
  nextVolumeBreakpoint(buyerContext: BuyerContext | undefined, volume: number): VolumeBreakpoint | null;
  isNegotiationEligible(buyerContext: BuyerContext | undefined): boolean;
}
