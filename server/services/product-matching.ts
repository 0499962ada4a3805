/**
 * Matching Engine
 *
 * Merges ERP items and ATUM inventories into the local product table.
 *
 * ERP items try an ordered list of strategies (internal id, then primary
 * code, then secondary code). Code strategies only consider products that
 * have no internal id yet, so an identified product is never captured by a
 * sku/barcode collision. ATUM items match by inventory id, then sku.
 *
 * Calls touching the same identity keys within a store are serialized
 * in-process; the unique (store, sku) index backs this up in storage.
 */

import type { Product, InsertProduct, UpdateProduct, MatchingSettings, MatchCodeField } from "@shared/schema";
import type { IStorage } from "../storage";
import type { ExtensionItem } from "../atum";
import type { ErpItem } from "./field-extractor";
import { errorMessage } from "../errors";

type Storage = Pick<
  IStorage,
  | "getProductByInternalId"
  | "findUnidentifiedProductByCode"
  | "getProductByExtensionId"
  | "getProductBySku"
  | "createProduct"
  | "updateProduct"
>;

export const STATUS_CREATED = "Created";
export const STATUS_UPDATED = "Updated";

export type MatchAction = "created" | "updated" | "skipped";
export type ErpMatchType = "internalId" | "primaryCode" | "secondaryCode" | "none";
export type ExtensionMatchType = "extensionId" | "sku" | "none";

export interface MatchResult {
  product?: Product;
  action: MatchAction;
  matchType: ErpMatchType | ExtensionMatchType;
  success: boolean;
  error?: string;
}

export type MatchOptions = Pick<
  MatchingSettings,
  "primaryField" | "secondaryField" | "createMissingProducts" | "updateExistingProducts"
>;

// ---------------------------------------------------------------------------
// ERP strategies
// ---------------------------------------------------------------------------

export interface ErpMatchStrategy {
  matchType: Exclude<ErpMatchType, "none">;
  find(storage: Storage, storeId: number, item: ErpItem, options: MatchOptions): Promise<Product | undefined>;
}

function byCode(field: (options: MatchOptions) => MatchCodeField): ErpMatchStrategy["find"] {
  return async (storage, storeId, item, options) => {
    const code = item[field(options)];
    if (!code) return undefined;
    return storage.findUnidentifiedProductByCode(storeId, code);
  };
}

export const erpMatchStrategies: readonly ErpMatchStrategy[] = [
  {
    matchType: "internalId",
    find: async (storage, storeId, item) =>
      item.internalId ? storage.getProductByInternalId(storeId, item.internalId) : undefined,
  },
  { matchType: "primaryCode", find: byCode((o) => o.primaryField) },
  { matchType: "secondaryCode", find: byCode((o) => o.secondaryField) },
];

// ---------------------------------------------------------------------------
// Identity locks
// ---------------------------------------------------------------------------

/**
 * FIFO lock over a set of string keys. All keys are claimed synchronously,
 * so two holders can never wait on each other.
 */
class IdentityLocks {
  private tails = new Map<string, Promise<void>>();

  async run<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
    const unique = Array.from(new Set(keys));
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = unique.map((key) => this.tails.get(key) ?? Promise.resolve());
    for (const key of unique) this.tails.set(key, gate);

    await Promise.all(previous);
    try {
      return await fn();
    } finally {
      release();
      for (const key of unique) {
        if (this.tails.get(key) === gate) this.tails.delete(key);
      }
    }
  }

  get size(): number {
    return this.tails.size;
  }
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

class ProductMatchingService {
  private readonly locks = new IdentityLocks();

  constructor(
    private readonly storage: Storage,
    private readonly strategies: readonly ErpMatchStrategy[] = erpMatchStrategies,
  ) {}

  async matchErpItem(storeId: number, item: ErpItem, options: MatchOptions): Promise<MatchResult> {
    const keys = [
      item.internalId && `${storeId}:internal:${item.internalId}`,
      item.sku && `${storeId}:code:${item.sku}`,
      item.barcode && `${storeId}:code:${item.barcode}`,
    ].filter((k): k is string => !!k);

    return this.locks.run<MatchResult>(keys, async () => {
      let matchType: ErpMatchType = "none";
      try {
        let existing: Product | undefined;
        for (const strategy of this.strategies) {
          existing = await strategy.find(this.storage, storeId, item, options);
          if (existing) {
            matchType = strategy.matchType;
            break;
          }
        }

        if (!existing) {
          if (!options.createMissingProducts) {
            return { action: "skipped", matchType, success: true };
          }
          const product = await this.createFromErp(storeId, item);
          return { product, action: "created", matchType, success: true };
        }

        if (!options.updateExistingProducts) {
          return { product: existing, action: "skipped", matchType, success: true };
        }
        const product = await this.updateFromErp(storeId, existing, item);
        return { product, action: "updated", matchType, success: true };
      } catch (error) {
        const message = errorMessage(error);
        console.error(`[ProductMatching] Store ${storeId}: ERP item ${item.internalId || item.sku} failed: ${message}`);
        return { action: "skipped", matchType, success: false, error: message };
      }
    });
  }

  async matchExtensionItem(storeId: number, item: ExtensionItem): Promise<MatchResult> {
    const keys = [
      item.id && `${storeId}:ext:${item.id}`,
      item.sku && `${storeId}:code:${item.sku}`,
    ].filter((k): k is string => !!k);

    return this.locks.run<MatchResult>(keys, async () => {
      let matchType: ExtensionMatchType = "none";
      try {
        let existing = item.id ? await this.storage.getProductByExtensionId(storeId, item.id) : undefined;
        if (existing) {
          matchType = "extensionId";
        } else if (item.sku) {
          existing = await this.storage.getProductBySku(storeId, item.sku);
          if (existing) matchType = "sku";
        }

        if (!existing) {
          const product = await this.storage.createProduct({
            storeId,
            inventoryExtId: item.id,
            sku: item.sku,
            name: item.name,
            extQuantity: item.stockQuantity,
            sourceQuantity: 0,
            lastSyncedAt: new Date(),
            lastSyncStatus: STATUS_CREATED,
          });
          return { product, action: "created", matchType, success: true };
        }

        const updates: UpdateProduct = {
          inventoryExtId: item.id,
          extQuantity: item.stockQuantity,
          lastSyncedAt: new Date(),
          lastSyncStatus: STATUS_UPDATED,
        };
        // ERP data is never overwritten from ATUM
        if (!existing.name && item.name) updates.name = item.name;
        if (!existing.sku && item.sku && !(await this.skuHolder(storeId, item.sku, existing.id))) {
          updates.sku = item.sku;
        }

        const product = await this.storage.updateProduct(existing.id, updates);
        if (!product) throw new Error(`Product ${existing.id} disappeared during update`);
        return { product, action: "updated", matchType, success: true };
      } catch (error) {
        const message = errorMessage(error);
        console.error(`[ProductMatching] Store ${storeId}: ATUM item ${item.id} failed: ${message}`);
        return { action: "skipped", matchType, success: false, error: message };
      }
    });
  }

  /** Number of identity keys currently held or awaited. */
  get pendingLocks(): number {
    return this.locks.size;
  }

  // ---------------------------------------------------------------------------
  // PRIVATE HELPERS
  // ---------------------------------------------------------------------------

  private async createFromErp(storeId: number, item: ErpItem): Promise<Product> {
    const conflict = item.sku ? await this.storage.getProductBySku(storeId, item.sku) : undefined;

    const insert: InsertProduct = {
      storeId,
      internalId: item.internalId,
      legacySourceId: item.sku,
      sku: conflict ? "" : item.sku,
      barcode: item.barcode,
      name: item.name,
      category: item.category,
      unit: item.unit,
      group: item.group,
      vat: item.vat,
      sourceQuantity: item.quantity ?? 0,
      retailPrice: item.retailPrice ?? null,
      wholesalePrice: item.wholesalePrice ?? null,
      salePrice: item.salePrice ?? null,
      purchasePrice: item.purchasePrice ?? null,
      discount: item.discount ?? null,
      lastSyncedAt: new Date(),
      lastSyncStatus: STATUS_CREATED,
      lastSyncError: conflict ? skuConflictMessage(item.sku, conflict.id) : null,
    };
    if (conflict) {
      console.warn(`[ProductMatching] Store ${storeId}: ${skuConflictMessage(item.sku, conflict.id)}, creating without sku`);
    }
    return this.storage.createProduct(insert);
  }

  private async updateFromErp(storeId: number, existing: Product, item: ErpItem): Promise<Product> {
    const updates: UpdateProduct = {
      name: item.name,
      category: item.category,
      unit: item.unit,
      group: item.group,
      vat: item.vat,
      lastSyncedAt: new Date(),
      lastSyncStatus: STATUS_UPDATED,
    };
    if (item.internalId) updates.internalId = item.internalId;
    if (item.barcode) updates.barcode = item.barcode;
    if (item.sku && !existing.legacySourceId) updates.legacySourceId = item.sku;

    if (item.sku && item.sku !== existing.sku) {
      const holder = await this.skuHolder(storeId, item.sku, existing.id);
      if (holder) {
        updates.lastSyncError = skuConflictMessage(item.sku, holder.id);
        console.warn(`[ProductMatching] Store ${storeId}: ${updates.lastSyncError}, keeping sku "${existing.sku}"`);
      } else {
        updates.sku = item.sku;
      }
    }

    // Unreported numerics keep the stored value
    if (item.quantity !== undefined) updates.sourceQuantity = item.quantity;
    if (item.retailPrice !== undefined) updates.retailPrice = item.retailPrice;
    if (item.wholesalePrice !== undefined) updates.wholesalePrice = item.wholesalePrice;
    if (item.salePrice !== undefined) updates.salePrice = item.salePrice;
    if (item.purchasePrice !== undefined) updates.purchasePrice = item.purchasePrice;
    if (item.discount !== undefined) updates.discount = item.discount;

    const product = await this.storage.updateProduct(existing.id, updates);
    if (!product) throw new Error(`Product ${existing.id} disappeared during update`);
    return product;
  }

  /** Another product of the store already holding `sku`, if any. */
  private async skuHolder(storeId: number, sku: string, selfId: number): Promise<Product | undefined> {
    const holder = await this.storage.getProductBySku(storeId, sku);
    return holder && holder.id !== selfId ? holder : undefined;
  }
}

function skuConflictMessage(sku: string, holderId: number): string {
  return `SKU ${sku} already assigned to product ${holderId}`;
}

export type ProductMatching = ProductMatchingService;

export function createProductMatchingService(
  storage: Storage,
  strategies: readonly ErpMatchStrategy[] = erpMatchStrategies,
): ProductMatching {
  return new ProductMatchingService(storage, strategies);
}
