import type { VolumeBreakpoint } from './types.js';

/**
 * Volume discount as a step function: the discount of the largest breakpoint
 * whose minImpressions <= volume. No interpolation between steps.
 *
 * Expects breakpoints sorted ascending (enforced by config validation).
 */
export function resolveVolumeDiscount(breakpoints: readonly VolumeBreakpoint[], volume: number): number {
  let discount = 0;
  for (const bp of breakpoints) {
    if (bp.minImpressions > volume) break;
    discount = bp.discount;
  }
  return discount;
}

/** First breakpoint strictly above the current volume, or null at the top step. */
export function nextBreakpoint(
  breakpoints: readonly VolumeBreakpoint[],
  volume: number,
): VolumeBreakpoint | null {
  return breakpoints.find((bp) => bp.minImpressions > volume) ?? null;
}
