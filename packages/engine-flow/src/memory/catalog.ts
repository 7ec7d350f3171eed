import { setTimeout as delay } from 'node:timers/promises';
import type { CapabilityEmbedding, Product } from '@dealdesk/engine-core';
import type { ProductCatalog } from '../ports/types.js';

export interface InMemoryCatalogOptions {
  /** Artificial latency per lookup, aborted through the caller's signal. */
  delayMs?: number;
}

/**
 * Map-backed ProductCatalog for tests and local runs.
 */
export class InMemoryProductCatalog implements ProductCatalog {
  private products: Map<string, Product> = new Map();
  private embeddings: Map<string, CapabilityEmbedding[]> = new Map();
  private readonly delayMs: number;

  constructor(products: Product[] = [], options: InMemoryCatalogOptions = {}) {
    for (const product of products) this.products.set(product.id, product);
    this.delayMs = options.delayMs ?? 0;
  }

  addProduct(product: Product, embeddings?: CapabilityEmbedding[]): void {
    this.products.set(product.id, product);
    if (embeddings) this.embeddings.set(product.id, embeddings);
  }

  setCapabilityEmbeddings(productId: string, embeddings: CapabilityEmbedding[]): void {
    this.embeddings.set(productId, embeddings);
  }

  async getProduct(productId: string, signal?: AbortSignal): Promise<Product | null> {
    await this.wait(signal);
    return this.products.get(productId) ?? null;
  }

  async getCapabilityEmbeddings(productId: string, signal?: AbortSignal): Promise<CapabilityEmbedding[]> {
    await this.wait(signal);
    return [...(this.embeddings.get(productId) ?? [])];
  }

  private async wait(signal: AbortSignal | undefined): Promise<void> {
    signal?.throwIfAborted();
    if (this.delayMs > 0) {
      await delay(this.delayMs, undefined, { signal });
    }
  }
}
