import { matchingSettingsSchema, type InsertProduct, type Product, type StoreSettingsInput } from "@shared/schema";
import { MemStorage } from "../../mem-storage";
import type { ErpClient } from "../../softone";
import type { ExtensionItem, InventoryClient } from "../../atum";
import type { StorefrontClient, StorefrontProduct } from "../../woocommerce";
import type { ErpItem, ErpListResponse } from "../field-extractor";
import type { BatchSubmission } from "../batch-planner";
import type { BatchResponse } from "../batch-reconciler";

export const defaultMatching = matchingSettingsSchema.parse({});

export function erpItem(overrides: Partial<ErpItem> = {}): ErpItem {
  return {
    internalId: "",
    sku: "",
    barcode: "",
    name: "",
    category: "",
    unit: "",
    group: "",
    vat: "",
    ...overrides,
  };
}

export async function setupStore(settings: StoreSettingsInput = {}, name = "Test Store") {
  const storage = new MemStorage();
  const store = await storage.createStore({ name, settings });
  return { storage, store };
}

export async function seedProduct(
  storage: MemStorage,
  storeId: number,
  fields: Omit<InsertProduct, "storeId"> = {},
): Promise<Product> {
  return storage.createProduct({ storeId, ...fields });
}

/** ERP list response with MTRL, CODE, NAME and QTY1 columns. */
export function erpResponse(rows: Array<[string, string, string, string]>): ErpListResponse {
  return {
    fields: [
      { name: "ITEM.MTRL", type: "int" },
      { name: "ITEM.CODE", type: "string" },
      { name: "ITEM.NAME", type: "string" },
      { name: "ITEM.MTRL_ITEMTRDATA_QTY1", type: "float" },
    ],
    rows,
  };
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export class FakeErpClient implements ErpClient {
  calls = 0;
  constructor(private readonly source: ErpListResponse | (() => Promise<ErpListResponse>)) {}

  async fetchItems(): Promise<ErpListResponse> {
    this.calls++;
    return typeof this.source === "function" ? this.source() : this.source;
  }
}

/** Accepts everything: creates get ids from 1000 up and echo the client reference. */
export function acceptAll(): (batch: BatchSubmission) => BatchResponse {
  let nextId = 1000;
  return (batch) => ({
    create: batch.create.map((item) => ({ id: String(nextId++), name: item.name, productIdEcho: item.productId })),
    update: batch.update.map((item) => ({ id: item.id })),
  });
}

export class FakeInventoryClient implements InventoryClient {
  inventories: ExtensionItem[] = [];
  submitted: BatchSubmission[] = [];

  constructor(
    private readonly respond: (batch: BatchSubmission, call: number) => BatchResponse | Promise<BatchResponse> = acceptAll(),
  ) {}

  async fetchInventories(): Promise<ExtensionItem[]> {
    return this.inventories;
  }

  async submitBatch(batch: BatchSubmission): Promise<BatchResponse> {
    this.submitted.push(batch);
    return this.respond(batch, this.submitted.length);
  }
}

export class FakeStorefrontClient implements StorefrontClient {
  created: Array<{ name: string; sku: string; price: number | null }> = [];
  inFlight = 0;
  maxInFlight = 0;
  private nextId = 1;

  constructor(
    private readonly existing: Map<string, StorefrontProduct> = new Map(),
    private readonly failingSkus: Set<string> = new Set(),
  ) {}

  async findBySku(sku: string): Promise<StorefrontProduct | null> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise((resolve) => setTimeout(resolve, 1));
      if (this.failingSkus.has(sku)) throw new Error("HTTP 500");
      return this.existing.get(sku) ?? null;
    } finally {
      this.inFlight--;
    }
  }

  async create(name: string, sku: string, price: number | null): Promise<StorefrontProduct> {
    this.created.push({ name, sku, price });
    return { id: `new-${this.nextId++}`, name, sku, status: "draft" };
  }
}
