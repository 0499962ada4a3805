import {
  type Store,
  type InsertStore,
  type Product,
  type InsertProduct,
  type UpdateProduct,
  type SyncRun,
  type InsertSyncRun,
  type FinalizeSyncRun,
  stores,
  products,
  syncRuns,
} from "@shared/schema";
import type { Database } from "./db";
import { eq, and, or, sql, desc, asc } from "drizzle-orm";

export type UpdateStore = Partial<InsertStore> & { lastSyncAt?: Date | null };

export interface ProductsPage {
  products: Product[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}

export interface IStorage {
  // Stores
  getAllStores(): Promise<Store[]>;
  getStoreById(id: number): Promise<Store | undefined>;
  createStore(store: InsertStore): Promise<Store>;
  updateStore(id: number, updates: UpdateStore): Promise<Store | undefined>;

  // Products: the lookups the matching engine and planner need
  getProductById(id: number): Promise<Product | undefined>;
  getProductByInternalId(storeId: number, internalId: string): Promise<Product | undefined>;
  /** Product without an internal id whose sku, barcode or legacy ERP code equals `code`. */
  findUnidentifiedProductByCode(storeId: number, code: string): Promise<Product | undefined>;
  getProductByExtensionId(storeId: number, inventoryExtId: string): Promise<Product | undefined>;
  getProductBySku(storeId: number, sku: string): Promise<Product | undefined>;
  getProductsByName(storeId: number, name: string): Promise<Product[]>;
  getAllProducts(storeId: number): Promise<Product[]>;
  getProductsPage(storeId: number, page: number, pageSize: number): Promise<ProductsPage>;
  createProduct(product: InsertProduct): Promise<Product>;
  updateProduct(id: number, updates: UpdateProduct): Promise<Product | undefined>;

  // Sync runs
  createSyncRun(run: InsertSyncRun): Promise<SyncRun>;
  finalizeSyncRun(id: number, result: FinalizeSyncRun): Promise<SyncRun | undefined>;
  getSyncRunById(id: number): Promise<SyncRun | undefined>;
  getSyncRuns(opts?: { storeId?: number; limit?: number }): Promise<SyncRun[]>;
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  // Store methods
  async getAllStores(): Promise<Store[]> {
    return await this.db.select().from(stores).orderBy(asc(stores.id));
  }

  async getStoreById(id: number): Promise<Store | undefined> {
    const result = await this.db.select().from(stores).where(eq(stores.id, id));
    return result[0];
  }

  async createStore(store: InsertStore): Promise<Store> {
    const result = await this.db.insert(stores).values(store).returning();
    return result[0];
  }

  async updateStore(id: number, updates: UpdateStore): Promise<Store | undefined> {
    const result = await this.db
      .update(stores)
      .set({ ...updates, updatedAt: new Date() })
      .where(eq(stores.id, id))
      .returning();
    return result[0];
  }

  // Product methods
  async getProductById(id: number): Promise<Product | undefined> {
    const result = await this.db.select().from(products).where(eq(products.id, id));
    return result[0];
  }

  async getProductByInternalId(storeId: number, internalId: string): Promise<Product | undefined> {
    const result = await this.db
      .select()
      .from(products)
      .where(and(eq(products.storeId, storeId), eq(products.internalId, internalId)))
      .orderBy(asc(products.id))
      .limit(1);
    return result[0];
  }

  async findUnidentifiedProductByCode(storeId: number, code: string): Promise<Product | undefined> {
    const result = await this.db
      .select()
      .from(products)
      .where(and(
        eq(products.storeId, storeId),
        eq(products.internalId, ""),
        or(eq(products.sku, code), eq(products.barcode, code), eq(products.legacySourceId, code)),
      ))
      .orderBy(asc(products.id))
      .limit(1);
    return result[0];
  }

  async getProductByExtensionId(storeId: number, inventoryExtId: string): Promise<Product | undefined> {
    const result = await this.db
      .select()
      .from(products)
      .where(and(eq(products.storeId, storeId), eq(products.inventoryExtId, inventoryExtId)))
      .orderBy(asc(products.id))
      .limit(1);
    return result[0];
  }

  async getProductBySku(storeId: number, sku: string): Promise<Product | undefined> {
    const result = await this.db
      .select()
      .from(products)
      .where(and(eq(products.storeId, storeId), eq(products.sku, sku)))
      .limit(1);
    return result[0];
  }

  async getProductsByName(storeId: number, name: string): Promise<Product[]> {
    return await this.db
      .select()
      .from(products)
      .where(and(eq(products.storeId, storeId), eq(products.name, name)))
      .orderBy(asc(products.id));
  }

  async getAllProducts(storeId: number): Promise<Product[]> {
    return await this.db
      .select()
      .from(products)
      .where(eq(products.storeId, storeId))
      .orderBy(asc(products.id));
  }

  async getProductsPage(storeId: number, page: number, pageSize: number): Promise<ProductsPage> {
    const [{ count }] = await this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(products)
      .where(eq(products.storeId, storeId));

    const rows = await this.db
      .select()
      .from(products)
      .where(eq(products.storeId, storeId))
      .orderBy(asc(products.id))
      .limit(pageSize)
      .offset((page - 1) * pageSize);

    return {
      products: rows,
      total: count,
      page,
      pageSize,
      totalPages: Math.ceil(count / pageSize),
    };
  }

  async createProduct(product: InsertProduct): Promise<Product> {
    const result = await this.db.insert(products).values(product).returning();
    return result[0];
  }

  async updateProduct(id: number, updates: UpdateProduct): Promise<Product | undefined> {
    const result = await this.db
      .update(products)
      .set({ ...updates, updatedAt: new Date() })
      .where(eq(products.id, id))
      .returning();
    return result[0];
  }

  // Sync run methods
  async createSyncRun(run: InsertSyncRun): Promise<SyncRun> {
    const result = await this.db.insert(syncRuns).values(run).returning();
    return result[0];
  }

  async finalizeSyncRun(id: number, result: FinalizeSyncRun): Promise<SyncRun | undefined> {
    // Only a running row can be finalized; finalized runs are immutable
    const rows = await this.db
      .update(syncRuns)
      .set({ ...result, completedAt: new Date() })
      .where(and(eq(syncRuns.id, id), eq(syncRuns.status, "running")))
      .returning();
    return rows[0];
  }

  async getSyncRunById(id: number): Promise<SyncRun | undefined> {
    const result = await this.db.select().from(syncRuns).where(eq(syncRuns.id, id));
    return result[0];
  }

  async getSyncRuns(opts?: { storeId?: number; limit?: number }): Promise<SyncRun[]> {
    return await this.db
      .select()
      .from(syncRuns)
      .where(opts?.storeId != null ? eq(syncRuns.storeId, opts.storeId) : undefined)
      .orderBy(desc(syncRuns.startedAt), desc(syncRuns.id))
      .limit(opts?.limit ?? 50);
  }
}
