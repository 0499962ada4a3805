import { describe, it, expect, beforeEach } from "vitest";
import { MemStorage } from "../mem-storage";

describe("MemStorage", () => {
  let storage: MemStorage;

  beforeEach(() => {
    storage = new MemStorage();
  });

  it("keeps skus unique per store but allows any number of empty ones", async () => {
    const a = await storage.createStore({ name: "A" });
    const b = await storage.createStore({ name: "B" });

    await storage.createProduct({ storeId: a.id, sku: "S1" });
    await storage.createProduct({ storeId: a.id });
    await storage.createProduct({ storeId: a.id });
    await storage.createProduct({ storeId: b.id, sku: "S1" });

    await expect(storage.createProduct({ storeId: a.id, sku: "S1" })).rejects.toThrow("products_store_sku_idx");
    expect(await storage.getAllProducts(a.id)).toHaveLength(3);
  });

  it("rejects an update that would duplicate a sku", async () => {
    const store = await storage.createStore({ name: "A" });
    await storage.createProduct({ storeId: store.id, sku: "S1" });
    const other = await storage.createProduct({ storeId: store.id, sku: "S2" });

    await expect(storage.updateProduct(other.id, { sku: "S1" })).rejects.toThrow("products_store_sku_idx");
    expect((await storage.getProductById(other.id))?.sku).toBe("S2");
  });

  it("leaves fields alone when the update leaves them undefined", async () => {
    const store = await storage.createStore({ name: "A" });
    const product = await storage.createProduct({ storeId: store.id, sku: "S1", name: "Kept", retailPrice: 4 });

    const updated = await storage.updateProduct(product.id, { name: undefined, retailPrice: null });

    expect(updated?.name).toBe("Kept");
    expect(updated?.retailPrice).toBeNull();
    expect(await storage.updateProduct(999, { name: "x" })).toBeUndefined();
  });

  it("hands out copies", async () => {
    const store = await storage.createStore({ name: "A" });
    const product = await storage.createProduct({ storeId: store.id, name: "Original" });

    product.name = "Mutated";
    const [listed] = await storage.getAllProducts(store.id);
    listed.name = "Mutated again";

    expect((await storage.getProductById(product.id))?.name).toBe("Original");
  });

  it("only finds unidentified products by code", async () => {
    const store = await storage.createStore({ name: "A" });
    await storage.createProduct({ storeId: store.id, internalId: "1", sku: "S1" });
    const open = await storage.createProduct({ storeId: store.id, barcode: "B2" });
    const legacy = await storage.createProduct({ storeId: store.id, legacySourceId: "L3" });

    expect(await storage.findUnidentifiedProductByCode(store.id, "S1")).toBeUndefined();
    expect((await storage.findUnidentifiedProductByCode(store.id, "B2"))?.id).toBe(open.id);
    expect((await storage.findUnidentifiedProductByCode(store.id, "L3"))?.id).toBe(legacy.id);
  });

  it("finalizes a sync run exactly once", async () => {
    const store = await storage.createStore({ name: "A" });
    const run = await storage.createSyncRun({ storeId: store.id, trigger: "manual", status: "running" });
    const result = { processed: 1, created: 1, updated: 0, skipped: 0, errors: 0, errorDetails: null };

    const first = await storage.finalizeSyncRun(run.id, { ...result, status: "completed" });
    const second = await storage.finalizeSyncRun(run.id, { ...result, status: "failed" });

    expect(first?.status).toBe("completed");
    expect(first?.completedAt).toBeInstanceOf(Date);
    expect(second).toBeUndefined();
    expect((await storage.getSyncRunById(run.id))?.status).toBe("completed");
  });

  it("lists sync runs newest first, filtered and limited", async () => {
    const a = await storage.createStore({ name: "A" });
    const b = await storage.createStore({ name: "B" });
    const r1 = await storage.createSyncRun({ storeId: a.id });
    await storage.createSyncRun({ storeId: b.id });
    const r3 = await storage.createSyncRun({ storeId: a.id });

    expect((await storage.getSyncRuns({ storeId: a.id })).map((r) => r.id)).toEqual([r3.id, r1.id]);
    expect((await storage.getSyncRuns({ limit: 1 })).map((r) => r.id)).toEqual([r3.id]);
  });

  it("pages products", async () => {
    const store = await storage.createStore({ name: "A" });
    for (let i = 1; i <= 5; i++) {
      await storage.createProduct({ storeId: store.id, sku: `S${i}` });
    }

    const page = await storage.getProductsPage(store.id, 2, 2);

    expect(page.products.map((p) => p.sku)).toEqual(["S3", "S4"]);
    expect(page).toMatchObject({ total: 5, page: 2, pageSize: 2, totalPages: 3 });
  });
});
