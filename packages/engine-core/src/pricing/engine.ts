import type { BuyerContext } from '../types.js';
import { pricingKey, resolveTier } from '../identity/resolver.js';
import { assertPricingConfig } from '../validation.js';
import { formatMoney, formatPercent, roundTo } from '../utils.js';
import { nextBreakpoint, resolveVolumeDiscount } from './volume.js';
import type {
  OfferEvaluation,
  PriceDisplay,
  PriceRequest,
  PricingEngine,
  PricingResult,
  PricingRule,
  PricingTierConfig,
  VolumeBreakpoint,
} from './types.js';

const PRICE_DECIMALS = 2;

/**
 * Tiered pricing by buyer identity.
 *
 * Discounts compose multiplicatively in a fixed order:
 *   final = base * (1 - tier) * (1 - rule) * (1 - volume)
 * then ceiling and floor clamps. The volume discount applies to the
 * tier-adjusted price so volume incentives scale with negotiated pricing.
 * Rounding happens once, on the final price.
 */
export class TieredPricingEngine implements PricingEngine {
  private readonly config: PricingTierConfig;

  constructor(config: PricingTierConfig) {
    assertPricingConfig(config);
    this.config = {
      ...config,
      volumeBreakpoints: [...config.volumeBreakpoints],
      rules: [...config.rules],
    };
  }

  calculatePrice(request: PriceRequest): PricingResult {
    const { productId, basePrice, buyerContext, volume } = request;
    const tier = resolveTier(buyerContext);
    const settings = this.config.tiers[tier];
    const floorCpm = Math.max(this.config.globalFloorCpm, request.floorCpm ?? 0);

    const steps = [`Base price: ${formatMoney(basePrice)} CPM`];
    const appliedRules: string[] = [];
    let price = basePrice;

    const tierDiscount = settings.discount;
    if (tierDiscount > 0) {
      price *= 1 - tierDiscount;
      steps.push(`${settings.label} tier: -${formatPercent(tierDiscount)}% (${formatMoney(price)})`);
    }

    let ruleDiscount = 0;
    let bestRule: PricingRule | undefined;
    for (const rule of this.matchingRules(request)) {
      appliedRules.push(rule.id);
      if (rule.discount > ruleDiscount) {
        ruleDiscount = rule.discount;
        bestRule = rule;
      }
    }
    if (bestRule) {
      price *= 1 - ruleDiscount;
      steps.push(`Rule '${bestRule.name}': -${formatPercent(ruleDiscount)}% (${formatMoney(price)})`);
    }

    let volumeDiscount = 0;
    if (settings.volumeDiscountsEnabled && volume > 0) {
      volumeDiscount = resolveVolumeDiscount(this.config.volumeBreakpoints, volume);
      if (volumeDiscount > 0) {
        price *= 1 - volumeDiscount;
        steps.push(`Volume discount: -${formatPercent(volumeDiscount)}% (${formatMoney(price)})`);
      }
    }

    let ceilingApplied = false;
    const ceiling = this.config.globalCeilingCpm;
    if (ceiling !== undefined && price > ceiling) {
      price = ceiling;
      ceilingApplied = true;
      steps.push(`Ceiling enforced: ${formatMoney(ceiling)}`);
    }

    let flooredApplied = false;
    if (price < floorCpm && !request.allowBelowFloor) {
      price = floorCpm;
      flooredApplied = true;
      steps.push(`Floor enforced: ${formatMoney(floorCpm)}`);
    }

    let finalPrice = roundTo(price, PRICE_DECIMALS);
    if (finalPrice < floorCpm && !request.allowBelowFloor) {
      // Rounding must not undercut the floor.
      finalPrice = Math.ceil(floorCpm * 10 ** PRICE_DECIMALS) / 10 ** PRICE_DECIMALS;
    }
    steps.push(`Final price: ${formatMoney(finalPrice)} CPM`);

    return {
      productId,
      tier,
      pricingKey: pricingKey(buyerContext),
      basePrice,
      tierDiscount,
      ruleDiscount,
      volumeDiscount,
      finalPrice,
      floorCpm,
      flooredApplied,
      ceilingApplied,
      currency: this.config.currency,
      rationale: steps.join(' | '),
      appliedRules,
    };
  }

  /** Public tier sees a range around base price; authenticated tiers see their exact tier price. */
  getPriceDisplay(basePrice: number, buyerContext?: BuyerContext): PriceDisplay {
    const settings = this.config.tiers[resolveTier(buyerContext)];
    const currency = this.config.currency;

    if (settings.showExactPrice) {
      return {
        type: 'exact',
        price: roundTo(basePrice * (1 - settings.discount), PRICE_DECIMALS),
        currency,
        negotiationEnabled: settings.negotiationEnabled,
      };
    }

    const low = roundTo(basePrice * (1 - settings.rangeSpread), PRICE_DECIMALS);
    const high = roundTo(basePrice * (1 + settings.rangeSpread), PRICE_DECIMALS);
    return {
      type: 'range',
      low,
      high,
      currency,
      display: `${formatMoney(low)}-${formatMoney(high)} CPM`,
    };
  }

  evaluateOffer(offeredPrice: number, floorCpm: number): OfferEvaluation {
    if (offeredPrice < this.config.globalFloorCpm) {
      return { acceptable: false, reason: `Below global floor (${formatMoney(this.config.globalFloorCpm)} CPM)` };
    }
    if (offeredPrice < floorCpm) {
      return { acceptable: false, reason: `Below product floor (${formatMoney(floorCpm)} CPM)` };
    }
    return { acceptable: true, reason: 'Price acceptable' };
  }

  nextVolumeBreakpoint(buyerContext: BuyerContext | undefined, volume: number): VolumeBreakpoint | null {
    const settings = this.config.tiers[resolveTier(buyerContext)];
    if (!settings.volumeDiscountsEnabled) return null;
    return nextBreakpoint(this.config.volumeBreakpoints, volume);
  }

  isNegotiationEligible(buyerContext: BuyerContext | undefined): boolean {
    return this.config.tiers[resolveTier(buyerContext)].negotiationEnabled;
  }

  private matchingRules(request: PriceRequest): PricingRule[] {
    const tier = resolveTier(request.buyerContext);
    const identity = request.buyerContext?.isAuthenticated ? request.buyerContext.identity : undefined;

    return this.config.rules.filter((rule) => {
      if (!rule.active) return false;
      if (rule.tier && rule.tier !== tier) return false;
      if (!matchesList(rule.agencyIds, identity?.agencyId)) return false;
      if (!matchesList(rule.advertiserIds, identity?.advertiserId)) return false;
      if (!matchesList(rule.holdingCompanies, identity?.agencyHoldingCompany)) return false;
      if (!matchesList(rule.productIds, request.productId)) return false;
      if (!matchesList(rule.inventoryTypes, request.inventoryType)) return false;
      return true;
    });
  }
}

function matchesList<T extends string>(allowed: readonly T[] | undefined, value: T | undefined): boolean {
  if (!allowed || allowed.length === 0) return true;
  return value !== undefined && allowed.includes(value);
}
