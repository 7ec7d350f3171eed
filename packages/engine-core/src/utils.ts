export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Round half away from zero to a fixed number of decimal places. */
export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

/** Render a fraction as a percentage without trailing zeros: 0.15 → "15", 0.125 → "12.5". */
export function formatPercent(fraction: number): string {
  return String(roundTo(fraction * 100, 2));
}

export function formatMoney(value: number): string {
  return `$${value.toFixed(2)}`;
}
