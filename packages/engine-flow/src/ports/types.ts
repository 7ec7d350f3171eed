import type { CapabilityEmbedding, Product } from '@dealdesk/engine-core';

/**
 * Read side of the product catalog. Implementations honour `signal` where
 * their transport can; results are never cached across proposals.
 */
export interface ProductCatalog {
  getProduct(productId: string, signal?: AbortSignal): Promise<Product | null>;
  getCapabilityEmbeddings(productId: string, signal?: AbortSignal): Promise<CapabilityEmbedding[]>;
}

/**
 * Shared avails for every product. `reserve` is atomic: it either takes the
 * whole volume or nothing.
 */
export interface AllocationLedger {
  reserve(productId: string, volume: number): Promise<boolean>;
  release(productId: string, volume: number): Promise<void>;
  available?(productId: string): Promise<number | null>;
}
