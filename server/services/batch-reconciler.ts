/**
 * Batch Response Reconciler
 *
 * Applies an ATUM batch response back onto local products. Create results
 * are joined to the request by the echoed client reference when present,
 * else by display name; update results by ATUM id. Successful items record
 * the quantity that was sent, so the next plan sees no delta for them.
 * Failed or uncorrelated items leave the product untouched and are retried
 * by the next pass.
 */

import type { Product } from "@shared/schema";
import type { IStorage } from "../storage";
import { errorMessage } from "../errors";
import { isValidExtensionId, targetQuantity, type BatchSubmission, type PlannedCreate } from "./batch-planner";

type Storage = Pick<IStorage, "getProductsByName" | "updateProduct">;

export const STATUS_SYNCED = "Synced";

export interface BatchCreateResult {
  id?: string;
  name: string;
  productIdEcho?: number;
  error?: string;
}

export interface BatchUpdateResult {
  id: string;
  error?: string;
}

export interface BatchResponse {
  create: BatchCreateResult[];
  update: BatchUpdateResult[];
}

export interface ReconcileCounts {
  created: number;
  updated: number;
  errors: number;
}

type Correlation =
  | { ok: true; productId: number; stockQuantity: number }
  | { ok: false; reason: string };

class BatchReconcilerService {
  constructor(private readonly storage: Storage) {}

  async applyBatchResponse(storeId: number, plan: BatchSubmission, response: BatchResponse): Promise<ReconcileCounts> {
    const counts: ReconcileCounts = { created: 0, updated: 0, errors: 0 };

    const createsById = new Map<number, PlannedCreate>();
    const createsByName = new Map<string, PlannedCreate[]>();
    for (const item of plan.create) {
      createsById.set(item.productId, item);
      const sameName = createsByName.get(item.name) ?? [];
      sameName.push(item);
      createsByName.set(item.name, sameName);
    }
    const updatesById = new Map(plan.update.map((item) => [item.id, item]));

    for (const result of response.create) {
      if (result.error) {
        console.error(`[BatchReconciler] Store ${storeId}: create failed for "${result.name}": ${result.error}`);
        counts.errors++;
        continue;
      }
      if (!result.id || !isValidExtensionId(result.id)) {
        console.error(`[BatchReconciler] Store ${storeId}: create for "${result.name}" returned invalid id "${result.id ?? ""}"`);
        counts.errors++;
        continue;
      }

      try {
        const match = await this.correlateCreate(storeId, result, createsById, createsByName);
        if (!match.ok) {
          console.error(`[BatchReconciler] Store ${storeId}: ${match.reason}`);
          counts.errors++;
          continue;
        }
        const saved = await this.markSynced(match.productId, match.stockQuantity, result.id);
        if (saved) counts.created++;
        else counts.errors++;
      } catch (error) {
        console.error(`[BatchReconciler] Store ${storeId}: failed to apply create "${result.name}": ${errorMessage(error)}`);
        counts.errors++;
      }
    }

    for (const result of response.update) {
      if (result.error) {
        console.error(`[BatchReconciler] Store ${storeId}: update failed for ATUM id ${result.id}: ${result.error}`);
        counts.errors++;
        continue;
      }
      const request = updatesById.get(result.id);
      if (!request) {
        console.error(`[BatchReconciler] Store ${storeId}: update result for unknown ATUM id "${result.id}"`);
        counts.errors++;
        continue;
      }

      try {
        const saved = await this.markSynced(request.productId, request.stockQuantity);
        if (saved) counts.updated++;
        else counts.errors++;
      } catch (error) {
        console.error(`[BatchReconciler] Store ${storeId}: failed to apply update ${result.id}: ${errorMessage(error)}`);
        counts.errors++;
      }
    }

    return counts;
  }

  /**
   * Records a chunk-level failure on every product in the chunk. Status and
   * quantities stay as they were so the items are planned again next pass.
   * Returns the number of items counted as errors.
   */
  async markChunkFailed(storeId: number, plan: BatchSubmission, error: unknown): Promise<number> {
    const message = `ATUM batch failed: ${errorMessage(error)}`;
    const productIds = [...plan.create.map((i) => i.productId), ...plan.update.map((i) => i.productId)];

    for (const productId of productIds) {
      try {
        await this.storage.updateProduct(productId, { lastSyncError: message });
      } catch (err) {
        console.error(`[BatchReconciler] Store ${storeId}: could not record failure on product ${productId}: ${errorMessage(err)}`);
      }
    }
    return productIds.length;
  }

  private async correlateCreate(
    storeId: number,
    result: BatchCreateResult,
    byId: Map<number, PlannedCreate>,
    byName: Map<string, PlannedCreate[]>,
  ): Promise<Correlation> {
    if (result.productIdEcho !== undefined) {
      const request = byId.get(result.productIdEcho);
      if (!request) return { ok: false, reason: `echoed product ${result.productIdEcho} is not in this batch` };
      return { ok: true, productId: request.productId, stockQuantity: request.stockQuantity };
    }

    const named = byName.get(result.name) ?? [];
    if (named.length > 1) {
      return { ok: false, reason: `ambiguous create result: ${named.length} batch items named "${result.name}"` };
    }
    if (named.length === 1) {
      return { ok: true, productId: named[0].productId, stockQuantity: named[0].stockQuantity };
    }

    const stored: Product[] = await this.storage.getProductsByName(storeId, result.name);
    if (stored.length === 1) {
      return { ok: true, productId: stored[0].id, stockQuantity: targetQuantity(stored[0]) };
    }
    return {
      ok: false,
      reason: stored.length > 1
        ? `ambiguous create result: ${stored.length} products named "${result.name}"`
        : `no product found for create result "${result.name}"`,
    };
  }

  private async markSynced(productId: number, stockQuantity: number, inventoryExtId?: string): Promise<boolean> {
    const updated = await this.storage.updateProduct(productId, {
      ...(inventoryExtId !== undefined ? { inventoryExtId } : {}),
      extQuantity: stockQuantity,
      lastSyncedAt: new Date(),
      lastSyncStatus: STATUS_SYNCED,
      lastSyncError: null,
    });
    return updated !== undefined;
  }
}

export type BatchReconciler = BatchReconcilerService;

export function createBatchReconcilerService(storage: Storage): BatchReconciler {
  return new BatchReconcilerService(storage);
}
