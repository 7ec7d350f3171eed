import { describe, expect, it } from 'vitest';
import { nextBreakpoint, resolveVolumeDiscount } from '../src/pricing/volume.js';
import { defaultPricingConfig } from '../src/pricing/defaults.js';

const breakpoints = defaultPricingConfig().volumeBreakpoints;

describe('resolveVolumeDiscount', () => {
  it.each([
    [0, 0],
    [4_999_999, 0],
    [5_000_000, 0.05],
    [9_999_999, 0.05],
    [10_000_000, 0.1],
    [20_000_000, 0.15],
    [49_999_999, 0.15],
    [50_000_000, 0.2],
    [1_000_000_000, 0.2],
  ])('volume %i → %d', (volume, expected) => {
    expect(resolveVolumeDiscount(breakpoints, volume)).toBe(expected);
  });

  it('is 0 without breakpoints', () => {
    expect(resolveVolumeDiscount([], 100_000_000)).toBe(0);
  });
});

describe('nextBreakpoint', () => {
  it('returns the first breakpoint strictly above the volume', () => {
    expect(nextBreakpoint(breakpoints, 5_000_000)).toEqual({ minImpressions: 10_000_000, discount: 0.1 });
    expect(nextBreakpoint(breakpoints, 0)).toEqual({ minImpressions: 5_000_000, discount: 0.05 });
  });

  it('returns null at the top step', () => {
    expect(nextBreakpoint(breakpoints, 50_000_000)).toBeNull();
  });
});
