/**
 * Batch Delta Planner
 *
 * Computes the create/update operations that bring ATUM stock in line with
 * ERP stock for one store. Reads the full product set, writes only the
 * data-quality gate statuses, and returns a plan for the orchestrator to
 * submit.
 *
 * Rules:
 * - create: ERP identity, sourceQuantity > 0, no ATUM id yet, sku required
 * - update: ATUM id present and a positive integer; queued only on a delta
 * - target stock is max(0, floor(sourceQuantity)), or 0 once the product
 *   no longer has ERP identity
 * - over the size limit, updates go first and the rest is deferred
 */

import type { Product } from "@shared/schema";
import type { IStorage } from "../storage";

type Storage = Pick<IStorage, "getAllProducts" | "updateProduct">;

export const STATUS_NO_SKU = "Error - No SKU";
export const STATUS_INVALID_ATUM_ID = "Error - Invalid ATUM ID";

export interface PlannedCreate {
  productId: number;
  name: string;
  sku: string;
  barcode: string;
  storefrontId: string;
  stockQuantity: number;
}

export interface PlannedUpdate {
  productId: number;
  /** ATUM inventory id */
  id: string;
  stockQuantity: number;
}

export interface BatchSubmission {
  create: PlannedCreate[];
  update: PlannedUpdate[];
}

export interface BatchPlan extends BatchSubmission {
  /** Candidates left for the next pass because of the size limit */
  deferred: number;
  limited: boolean;
  /** Products excluded this pass by a data-quality gate */
  gated: number;
}

export interface SyncStatistics {
  totalProducts: number;
  withExtensionId: number;
  pendingCreates: number;
  differences: number;
  needsSync: number;
  gated: number;
}

export function hasErpIdentity(product: Pick<Product, "internalId" | "legacySourceId">): boolean {
  return product.internalId !== "" || product.legacySourceId !== "";
}

export function isValidExtensionId(id: string): boolean {
  return /^\d+$/.test(id) && Number(id) > 0;
}

export function targetQuantity(product: Pick<Product, "internalId" | "legacySourceId" | "sourceQuantity">): number {
  if (!hasErpIdentity(product)) return 0;
  return Math.max(0, Math.floor(product.sourceQuantity));
}

interface Classified {
  create: PlannedCreate[];
  update: PlannedUpdate[];
  gates: Array<{ product: Product; status: string }>;
  withExtensionId: number;
}

function classify(products: Product[]): Classified {
  const result: Classified = { create: [], update: [], gates: [], withExtensionId: 0 };

  for (const product of products) {
    if (product.inventoryExtId !== "") {
      result.withExtensionId++;
      if (!isValidExtensionId(product.inventoryExtId)) {
        result.gates.push({ product, status: STATUS_INVALID_ATUM_ID });
        continue;
      }
      const target = targetQuantity(product);
      if (product.extQuantity !== target) {
        result.update.push({ productId: product.id, id: product.inventoryExtId, stockQuantity: target });
      }
      continue;
    }

    if (!hasErpIdentity(product) || product.sourceQuantity <= 0) continue;

    if (product.sku === "") {
      result.gates.push({ product, status: STATUS_NO_SKU });
      continue;
    }

    result.create.push({
      productId: product.id,
      name: product.name || `Product ${product.sku}`,
      sku: product.sku,
      barcode: product.barcode,
      storefrontId: product.storefrontId,
      stockQuantity: targetQuantity(product),
    });
  }

  return result;
}

class BatchPlannerService {
  constructor(private readonly storage: Storage) {}

  /**
   * Builds the next batch for a store. With `dryRun` the gate statuses are
   * reported in `gated` but not written.
   */
  async planBatch(storeId: number, maxBatchSize: number, opts: { dryRun?: boolean } = {}): Promise<BatchPlan> {
    const products = await this.storage.getAllProducts(storeId);
    const { create, update, gates } = classify(products);

    if (!opts.dryRun) {
      for (const { product, status } of gates) {
        if (product.lastSyncStatus === status) continue;
        await this.storage.updateProduct(product.id, { lastSyncStatus: status });
      }
    }

    const total = create.length + update.length;
    if (total <= maxBatchSize) {
      return { create, update, deferred: 0, limited: false, gated: gates.length };
    }

    const takenUpdates = update.slice(0, maxBatchSize);
    const takenCreates = create.slice(0, maxBatchSize - takenUpdates.length);
    const deferred = total - takenUpdates.length - takenCreates.length;

    console.log(
      `[BatchPlanner] Store ${storeId}: ${total} candidates over limit ${maxBatchSize}, ` +
      `taking ${takenUpdates.length} updates + ${takenCreates.length} creates, deferring ${deferred}`,
    );

    return { create: takenCreates, update: takenUpdates, deferred, limited: true, gated: gates.length };
  }

  async getSyncStatistics(storeId: number): Promise<SyncStatistics> {
    const products = await this.storage.getAllProducts(storeId);
    const { create, update, gates, withExtensionId } = classify(products);
    return {
      totalProducts: products.length,
      withExtensionId,
      pendingCreates: create.length,
      differences: update.length,
      needsSync: create.length + update.length,
      gated: gates.length,
    };
  }
}

export type BatchPlanner = BatchPlannerService;

export function createBatchPlannerService(storage: Storage): BatchPlanner {
  return new BatchPlannerService(storage);
}
