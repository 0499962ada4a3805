import type {
  Store,
  InsertStore,
  Product,
  InsertProduct,
  UpdateProduct,
  SyncRun,
  InsertSyncRun,
  FinalizeSyncRun,
} from "@shared/schema";
import type { IStorage, ProductsPage, UpdateStore } from "./storage";

/**
 * In-memory IStorage used by the test suites and local dry runs.
 *
 * Mirrors the constraints the Postgres schema enforces: SKUs are unique per
 * store once non-empty, and a finalized sync run cannot be finalized again.
 */
export class MemStorage implements IStorage {
  private stores = new Map<number, Store>();
  private products = new Map<number, Product>();
  private syncRuns = new Map<number, SyncRun>();
  private nextStoreId = 1;
  private nextProductId = 1;
  private nextSyncRunId = 1;

  // Store methods
  async getAllStores(): Promise<Store[]> {
    return Array.from(this.stores.values()).sort((a, b) => a.id - b.id).map((s) => ({ ...s }));
  }

  async getStoreById(id: number): Promise<Store | undefined> {
    const store = this.stores.get(id);
    return store ? { ...store } : undefined;
  }

  async createStore(store: InsertStore): Promise<Store> {
    const now = new Date();
    const created: Store = {
      id: this.nextStoreId++,
      name: store.name,
      enabled: store.enabled ?? true,
      erpBaseUrl: store.erpBaseUrl ?? "https://go.s1cloud.net/s1services",
      erpAppId: store.erpAppId ?? "",
      erpToken: store.erpToken ?? "",
      erpS1Code: store.erpS1Code ?? "",
      erpFilters: store.erpFilters ?? "",
      storefrontUrl: store.storefrontUrl ?? "",
      storefrontKey: store.storefrontKey ?? "",
      storefrontSecret: store.storefrontSecret ?? "",
      atumLocationId: store.atumLocationId ?? 0,
      atumLocationName: store.atumLocationName ?? "",
      settings: store.settings ?? {},
      lastSyncAt: store.lastSyncAt ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.stores.set(created.id, created);
    return { ...created };
  }

  async updateStore(id: number, updates: UpdateStore): Promise<Store | undefined> {
    const existing = this.stores.get(id);
    if (!existing) return undefined;
    const updated: Store = { ...mergeDefined(existing, updates), updatedAt: new Date() };
    this.stores.set(id, updated);
    return { ...updated };
  }

  // Product methods
  async getProductById(id: number): Promise<Product | undefined> {
    const product = this.products.get(id);
    return product ? { ...product } : undefined;
  }

  async getProductByInternalId(storeId: number, internalId: string): Promise<Product | undefined> {
    return this.storeProducts(storeId).find((p) => p.internalId === internalId);
  }

  async findUnidentifiedProductByCode(storeId: number, code: string): Promise<Product | undefined> {
    return this.storeProducts(storeId).find(
      (p) => p.internalId === "" && (p.sku === code || p.barcode === code || p.legacySourceId === code),
    );
  }

  async getProductByExtensionId(storeId: number, inventoryExtId: string): Promise<Product | undefined> {
    return this.storeProducts(storeId).find((p) => p.inventoryExtId === inventoryExtId);
  }

  async getProductBySku(storeId: number, sku: string): Promise<Product | undefined> {
    return this.storeProducts(storeId).find((p) => p.sku === sku);
  }

  async getProductsByName(storeId: number, name: string): Promise<Product[]> {
    return this.storeProducts(storeId).filter((p) => p.name === name);
  }

  async getAllProducts(storeId: number): Promise<Product[]> {
    return this.storeProducts(storeId);
  }

  async getProductsPage(storeId: number, page: number, pageSize: number): Promise<ProductsPage> {
    const all = this.storeProducts(storeId);
    return {
      products: all.slice((page - 1) * pageSize, page * pageSize),
      total: all.length,
      page,
      pageSize,
      totalPages: Math.ceil(all.length / pageSize),
    };
  }

  async createProduct(product: InsertProduct): Promise<Product> {
    const now = new Date();
    const created: Product = {
      id: this.nextProductId++,
      storeId: product.storeId,
      internalId: product.internalId ?? "",
      legacySourceId: product.legacySourceId ?? "",
      sku: product.sku ?? "",
      barcode: product.barcode ?? "",
      storefrontId: product.storefrontId ?? "",
      inventoryExtId: product.inventoryExtId ?? "",
      name: product.name ?? "",
      category: product.category ?? "",
      unit: product.unit ?? "",
      group: product.group ?? "",
      vat: product.vat ?? "",
      sourceQuantity: product.sourceQuantity ?? 0,
      extQuantity: product.extQuantity ?? 0,
      retailPrice: product.retailPrice ?? null,
      wholesalePrice: product.wholesalePrice ?? null,
      salePrice: product.salePrice ?? null,
      purchasePrice: product.purchasePrice ?? null,
      discount: product.discount ?? null,
      lastSyncedAt: product.lastSyncedAt ?? null,
      lastSyncStatus: product.lastSyncStatus ?? "",
      lastSyncError: product.lastSyncError ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.assertSkuAvailable(created.storeId, created.sku, created.id);
    this.products.set(created.id, created);
    return { ...created };
  }

  async updateProduct(id: number, updates: UpdateProduct): Promise<Product | undefined> {
    const existing = this.products.get(id);
    if (!existing) return undefined;
    const updated: Product = { ...mergeDefined<Product>(existing, updates), updatedAt: new Date() };
    this.assertSkuAvailable(updated.storeId, updated.sku, id);
    this.products.set(id, updated);
    return { ...updated };
  }

  // Sync run methods
  async createSyncRun(run: InsertSyncRun): Promise<SyncRun> {
    const created: SyncRun = {
      id: this.nextSyncRunId++,
      storeId: run.storeId,
      trigger: run.trigger ?? "manual",
      status: run.status ?? "running",
      processed: run.processed ?? 0,
      created: run.created ?? 0,
      updated: run.updated ?? 0,
      skipped: run.skipped ?? 0,
      errors: run.errors ?? 0,
      errorDetails: run.errorDetails ?? null,
      startedAt: new Date(),
      completedAt: null,
    };
    this.syncRuns.set(created.id, created);
    return { ...created };
  }

  async finalizeSyncRun(id: number, result: FinalizeSyncRun): Promise<SyncRun | undefined> {
    const existing = this.syncRuns.get(id);
    if (!existing || existing.status !== "running") return undefined;
    const finalized: SyncRun = { ...existing, ...result, completedAt: new Date() };
    this.syncRuns.set(id, finalized);
    return { ...finalized };
  }

  async getSyncRunById(id: number): Promise<SyncRun | undefined> {
    const run = this.syncRuns.get(id);
    return run ? { ...run } : undefined;
  }

  async getSyncRuns(opts?: { storeId?: number; limit?: number }): Promise<SyncRun[]> {
    return Array.from(this.syncRuns.values())
      .filter((r) => opts?.storeId == null || r.storeId === opts.storeId)
      .sort((a, b) => b.id - a.id)
      .slice(0, opts?.limit ?? 50)
      .map((r) => ({ ...r }));
  }

  private storeProducts(storeId: number): Product[] {
    return Array.from(this.products.values())
      .filter((p) => p.storeId === storeId)
      .sort((a, b) => a.id - b.id)
      .map((p) => ({ ...p }));
  }

  private assertSkuAvailable(storeId: number, sku: string, selfId: number): void {
    if (sku === "") return;
    for (const p of this.products.values()) {
      if (p.id !== selfId && p.storeId === storeId && p.sku === sku) {
        throw new Error(`duplicate key value violates unique constraint "products_store_sku_idx"`);
      }
    }
  }
}

// Undefined keys leave the stored value alone, like drizzle's .set()
function mergeDefined<T extends object>(base: T, updates: Partial<T>): T {
  const out = { ...base };
  for (const key in updates) {
    const value = updates[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}
