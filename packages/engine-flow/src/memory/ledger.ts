import type { AllocationLedger } from '../ports/types.js';

/**
 * Map-backed AllocationLedger. Check and decrement happen in one synchronous
 * step, so concurrent reservations against one product never oversell.
 */
export class InMemoryAllocationLedger implements AllocationLedger {
  private remaining: Map<string, number> = new Map();

  constructor(avails: Record<string, number> = {}) {
    for (const [productId, volume] of Object.entries(avails)) {
      this.remaining.set(productId, volume);
    }
  }

  setAvails(productId: string, volume: number): void {
    this.remaining.set(productId, volume);
  }

  /** Unknown products have no avails. */
  async reserve(productId: string, volume: number): Promise<boolean> {
    const left = this.remaining.get(productId);
    if (left === undefined || left < volume) return false;
    this.remaining.set(productId, left - volume);
    return true;
  }

  async release(productId: string, volume: number): Promise<void> {
    const left = this.remaining.get(productId);
    if (left === undefined) return;
    this.remaining.set(productId, left + volume);
  }

  async available(productId: string): Promise<number | null> {
    return this.remaining.get(productId) ?? null;
  }
}
