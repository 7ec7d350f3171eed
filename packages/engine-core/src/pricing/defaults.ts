import type { PricingTierConfig } from './types.js';

export const DEFAULT_RANGE_SPREAD = 0.2;

/** Public sees ranges; each revealed identity level unlocks a deeper discount. */
export function defaultPricingConfig(): PricingTierConfig {
  return {
    tiers: {
      public: {
        label: 'Public',
        discount: 0,
        showExactPrice: false,
        rangeSpread: DEFAULT_RANGE_SPREAD,
        negotiationEnabled: false,
        volumeDiscountsEnabled: false,
      },
      seat: {
        label: 'Seat',
        discount: 0.05,
        showExactPrice: true,
        rangeSpread: DEFAULT_RANGE_SPREAD,
        negotiationEnabled: false,
        volumeDiscountsEnabled: false,
      },
      agency: {
        label: 'Agency',
        discount: 0.1,
        showExactPrice: true,
        rangeSpread: DEFAULT_RANGE_SPREAD,
        negotiationEnabled: true,
        volumeDiscountsEnabled: true,
      },
      advertiser: {
        label: 'Advertiser',
        discount: 0.15,
        showExactPrice: true,
        rangeSpread: DEFAULT_RANGE_SPREAD,
        negotiationEnabled: true,
        volumeDiscountsEnabled: true,
      },
    },
    volumeBreakpoints: [
      { minImpressions: 5_000_000, discount: 0.05 },
      { minImpressions: 10_000_000, discount: 0.1 },
      { minImpressions: 20_000_000, discount: 0.15 },
      { minImpressions: 50_000_000, discount: 0.2 },
    ],
    rules: [],
    currency: 'USD',
    globalFloorCpm: 1.0,
  };
}
