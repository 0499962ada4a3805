/**
 * Storefront matching: links products that have a sku to their WooCommerce
 * product, creating a draft when the storefront has none.
 *
 * A fixed number of workers pull from one shared queue. Each worker writes
 * only the row of the product it is handling, so results may land in any
 * order.
 */

import type { Product } from "@shared/schema";
import type { IStorage } from "../storage";
import type { StorefrontClient } from "../woocommerce";
import { errorMessage } from "../errors";

type Storage = Pick<IStorage, "getAllProducts" | "updateProduct">;

export const STATUS_MATCHED_STOREFRONT = "Matched in WooCommerce";
export const STATUS_CREATED_STOREFRONT = "Created as draft in WooCommerce";

export interface StorefrontMatchSummary {
  candidates: number;
  matched: number;
  created: number;
  errors: number;
}

export interface StorefrontMatchOptions {
  concurrency: number;
  signal?: AbortSignal;
}

type Outcome = "matched" | "created" | "error" | "aborted";

class StorefrontMatchingService {
  constructor(private readonly storage: Storage) {}

  async matchStore(storeId: number, client: StorefrontClient, opts: StorefrontMatchOptions): Promise<StorefrontMatchSummary> {
    const products = await this.storage.getAllProducts(storeId);
    const queue = products.filter((p) => p.sku !== "" && p.storefrontId === "");
    const summary: StorefrontMatchSummary = { candidates: queue.length, matched: 0, created: 0, errors: 0 };
    if (queue.length === 0) return summary;

    const concurrency = Math.max(1, Math.min(opts.concurrency, queue.length));
    console.log(`[StorefrontMatching] Store ${storeId}: ${queue.length} products to match with ${concurrency} workers`);

    const workers = Array.from({ length: concurrency }, () =>
      (async () => {
        while (queue.length > 0 && !opts.signal?.aborted) {
          const product = queue.shift();
          if (!product) break;
          const outcome = await this.matchOne(storeId, client, product, opts.signal);
          if (outcome === "matched") summary.matched++;
          else if (outcome === "created") summary.created++;
          else if (outcome === "error") summary.errors++;
        }
      })(),
    );
    await Promise.all(workers);

    console.log(
      `[StorefrontMatching] Store ${storeId}: ${summary.matched} matched, ${summary.created} created, ${summary.errors} errors`,
    );
    return summary;
  }

  private async matchOne(
    storeId: number,
    client: StorefrontClient,
    product: Product,
    signal: AbortSignal | undefined,
  ): Promise<Outcome> {
    try {
      const existing = await client.findBySku(product.sku, signal);
      if (existing) {
        await this.storage.updateProduct(product.id, {
          storefrontId: existing.id,
          lastSyncStatus: STATUS_MATCHED_STOREFRONT,
        });
        return "matched";
      }

      const created = await client.create(product.name || `Product ${product.sku}`, product.sku, product.retailPrice, signal);
      await this.storage.updateProduct(product.id, {
        storefrontId: created.id,
        lastSyncStatus: STATUS_CREATED_STOREFRONT,
      });
      return "created";
    } catch (error) {
      if (signal?.aborted) return "aborted";
      const message = errorMessage(error);
      console.error(`[StorefrontMatching] Store ${storeId}: product ${product.id} (${product.sku}) failed: ${message}`);
      try {
        await this.storage.updateProduct(product.id, {
          lastSyncStatus: `Error - ${message}`.slice(0, 200),
          lastSyncError: message,
        });
      } catch (writeError) {
        console.error(`[StorefrontMatching] Store ${storeId}: could not record error on product ${product.id}: ${errorMessage(writeError)}`);
      }
      return "error";
    }
  }
}

export type StorefrontMatching = StorefrontMatchingService;

export function createStorefrontMatchingService(storage: Storage): StorefrontMatching {
  return new StorefrontMatchingService(storage);
}
