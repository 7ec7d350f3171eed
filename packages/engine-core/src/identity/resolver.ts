import type { AccessTier, BuyerContext } from '../types.js';

/**
 * Resolve the pricing tier for a buyer.
 *
 * Unauthenticated buyers are always public, whatever identity they claim.
 * Otherwise the most specific identifier wins:
 * advertiserId → advertiser, agencyId → agency, seatId → seat, none → public.
 *
 * Pure and total: no error path.
 */
export function resolveTier(context: BuyerContext | undefined): AccessTier {
  if (!context || !context.isAuthenticated) return 'public';
  const { identity } = context;
  if (identity.advertiserId) return 'advertiser';
  if (identity.agencyId) return 'agency';
  if (identity.seatId) return 'seat';
  return 'public';
}

/**
 * Key used to look up negotiated pricing for a buyer. The same advertiser buying
 * through different agencies shares one key.
 */
export function pricingKey(context: BuyerContext | undefined): string {
  const tier = resolveTier(context);
  if (!context || tier === 'public') return 'public';
  const { identity } = context;
  switch (tier) {
    case 'advertiser': return `advertiser:${identity.advertiserId}`;
    case 'agency': return `agency:${identity.agencyId}`;
    case 'seat': return `seat:${identity.seatId}`;
  }
}
