import { describe, it, expect, beforeEach } from "vitest";
import type { InsertProduct, Product } from "@shared/schema";
import { MemStorage } from "../../mem-storage";
import { createProductMatchingService, erpMatchStrategies, type ProductMatching } from "../product-matching";
import { defaultMatching, erpItem, seedProduct, setupStore } from "./helpers";

describe("ProductMatchingService", () => {
  let storage: MemStorage;
  let storeId: number;
  let matching: ProductMatching;

  beforeEach(async () => {
    const setup = await setupStore();
    storage = setup.storage;
    storeId = setup.store.id;
    matching = createProductMatchingService(storage);
  });

  it("tries internal id, primary code, then secondary code", () => {
    expect(erpMatchStrategies.map((s) => s.matchType)).toEqual(["internalId", "primaryCode", "secondaryCode"]);
  });

  describe("matchErpItem", () => {
    it("creates a product when nothing matches", async () => {
      const result = await matching.matchErpItem(
        storeId,
        erpItem({ internalId: "100", sku: "ABC", name: "Widget", quantity: 5.5 }),
        defaultMatching,
      );

      expect(result.success).toBe(true);
      expect(result.action).toBe("created");
      expect(result.matchType).toBe("none");
      expect(result.product).toMatchObject({
        storeId,
        internalId: "100",
        legacySourceId: "ABC",
        sku: "ABC",
        name: "Widget",
        sourceQuantity: 5.5,
        extQuantity: 0,
        inventoryExtId: "",
        retailPrice: null,
        lastSyncStatus: "Created",
        lastSyncError: null,
      });
    });

    it("updates the product with the same internal id", async () => {
      const first = await matching.matchErpItem(storeId, erpItem({ internalId: "100", sku: "ABC", name: "Old" }), defaultMatching);
      const second = await matching.matchErpItem(storeId, erpItem({ internalId: "100", sku: "ABC", name: "New" }), defaultMatching);

      expect(second.action).toBe("updated");
      expect(second.matchType).toBe("internalId");
      expect(second.product?.id).toBe(first.product?.id);
      expect(second.product?.name).toBe("New");
      expect(second.product?.lastSyncStatus).toBe("Updated");
      expect(await storage.getAllProducts(storeId)).toHaveLength(1);
    });

    it("never captures an identified product by sku", async () => {
      const a = await seedProduct(storage, storeId, { internalId: "X", sku: "S", name: "Product A", sourceQuantity: 2 });

      const result = await matching.matchErpItem(storeId, erpItem({ internalId: "Y", sku: "S", name: "Product B" }), defaultMatching);

      expect(result.action).toBe("created");
      expect(result.matchType).toBe("none");
      expect(result.product?.id).not.toBe(a.id);
      expect(result.product?.internalId).toBe("Y");
      expect(result.product?.sku).toBe("");
      expect(result.product?.lastSyncError).toBe(`SKU S already assigned to product ${a.id}`);
      expect(await storage.getProductById(a.id)).toEqual(a);
    });

    it("finds a product created without its sku again on later cycles", async () => {
      const holder = await seedProduct(storage, storeId, { internalId: "X", sku: "S", name: "Product A" });
      const item = erpItem({ sku: "S", name: "Product B", quantity: 2 });

      const first = await matching.matchErpItem(storeId, item, defaultMatching);
      const second = await matching.matchErpItem(storeId, item, defaultMatching);
      const third = await matching.matchErpItem(storeId, item, defaultMatching);

      expect(first).toMatchObject({ action: "created", matchType: "none" });
      expect(first.product).toMatchObject({ sku: "", legacySourceId: "S" });
      expect(second).toMatchObject({ action: "updated", matchType: "primaryCode" });
      expect(third).toMatchObject({ action: "updated", matchType: "primaryCode" });
      expect(third.product?.id).toBe(first.product?.id);
      expect(third.product?.sku).toBe("");
      expect(third.product?.lastSyncError).toBe(`SKU S already assigned to product ${holder.id}`);
      expect(await storage.getAllProducts(storeId)).toHaveLength(2);
    });

    it("claims an extension-only product by sku and keeps its ATUM link", async () => {
      const ext = await matching.matchExtensionItem(storeId, { id: "900", sku: "Z1", name: "From ATUM", stockQuantity: 7 });
      expect(ext.action).toBe("created");
      expect(ext.product?.sourceQuantity).toBe(0);

      const result = await matching.matchErpItem(
        storeId,
        erpItem({ internalId: "55", sku: "Z1", name: "From ERP", category: "Cards", quantity: 3 }),
        defaultMatching,
      );

      expect(result.action).toBe("updated");
      expect(result.matchType).toBe("primaryCode");
      expect(result.product).toMatchObject({
        id: ext.product?.id,
        internalId: "55",
        name: "From ERP",
        category: "Cards",
        sourceQuantity: 3,
        inventoryExtId: "900",
        extQuantity: 7,
      });
    });

    it("falls back to the secondary code", async () => {
      const seeded = await seedProduct(storage, storeId, { sku: "OLD", barcode: "B-1" });

      const result = await matching.matchErpItem(
        storeId,
        erpItem({ internalId: "77", sku: "NOPE", barcode: "B-1", name: "Found by barcode" }),
        defaultMatching,
      );

      expect(result.matchType).toBe("secondaryCode");
      expect(result.product?.id).toBe(seeded.id);
      expect(result.product?.sku).toBe("NOPE");
      expect(result.product?.internalId).toBe("77");
    });

    it("uses the configured primary field", async () => {
      const seeded = await seedProduct(storage, storeId, { sku: "SKU-9", barcode: "BC-9" });
      const options = { ...defaultMatching, primaryField: "barcode" as const, secondaryField: "barcode" as const };

      const result = await matching.matchErpItem(storeId, erpItem({ internalId: "9", sku: "OTHER", barcode: "BC-9" }), options);

      expect(result.matchType).toBe("primaryCode");
      expect(result.product?.id).toBe(seeded.id);
    });

    it("keeps stored numbers the item does not report", async () => {
      await matching.matchErpItem(storeId, erpItem({ internalId: "1", sku: "N1", quantity: 4, retailPrice: 10 }), defaultMatching);

      const result = await matching.matchErpItem(storeId, erpItem({ internalId: "1", sku: "N1", retailPrice: 12 }), defaultMatching);

      expect(result.product?.sourceQuantity).toBe(4);
      expect(result.product?.retailPrice).toBe(12);
    });

    it("keeps the old sku when the new one belongs to another product", async () => {
      const holder = await seedProduct(storage, storeId, { internalId: "2", sku: "TAKEN" });
      await matching.matchErpItem(storeId, erpItem({ internalId: "1", sku: "MINE" }), defaultMatching);

      const result = await matching.matchErpItem(storeId, erpItem({ internalId: "1", sku: "TAKEN" }), defaultMatching);

      expect(result.success).toBe(true);
      expect(result.product?.sku).toBe("MINE");
      expect(result.product?.lastSyncError).toBe(`SKU TAKEN already assigned to product ${holder.id}`);
    });

    it("skips creates when creating is disabled", async () => {
      const result = await matching.matchErpItem(
        storeId,
        erpItem({ internalId: "100", sku: "ABC" }),
        { ...defaultMatching, createMissingProducts: false },
      );

      expect(result).toEqual({ action: "skipped", matchType: "none", success: true });
      expect(await storage.getAllProducts(storeId)).toHaveLength(0);
    });

    it("skips updates when updating is disabled", async () => {
      const seeded = await seedProduct(storage, storeId, { internalId: "100", sku: "ABC", name: "Original" });

      const result = await matching.matchErpItem(
        storeId,
        erpItem({ internalId: "100", sku: "ABC", name: "Changed" }),
        { ...defaultMatching, updateExistingProducts: false },
      );

      expect(result.action).toBe("skipped");
      expect(result.matchType).toBe("internalId");
      expect(result.product).toEqual(seeded);
      expect((await storage.getProductById(seeded.id))?.name).toBe("Original");
    });

    it("returns a failure result instead of throwing", async () => {
      class BrokenStorage extends MemStorage {
        override async createProduct(_product: InsertProduct): Promise<Product> {
          throw new Error("db down");
        }
      }
      const broken = createProductMatchingService(new BrokenStorage());

      const result = await broken.matchErpItem(storeId, erpItem({ internalId: "1", sku: "A" }), defaultMatching);

      expect(result).toEqual({ action: "skipped", matchType: "none", success: false, error: "db down" });
    });

    it("serializes concurrent calls for the same identity", async () => {
      const item = erpItem({ internalId: "500", sku: "DUP", name: "Same" });

      const results = await Promise.all([
        matching.matchErpItem(storeId, item, defaultMatching),
        matching.matchErpItem(storeId, item, defaultMatching),
      ]);

      expect(results.map((r) => r.action)).toEqual(["created", "updated"]);
      expect(results.every((r) => r.success)).toBe(true);
      expect(await storage.getAllProducts(storeId)).toHaveLength(1);
      expect(matching.pendingLocks).toBe(0);
    });
  });

  describe("matchExtensionItem", () => {
    it("creates an extension-only product", async () => {
      const result = await matching.matchExtensionItem(storeId, { id: "900", sku: "Z1", name: "Ext", stockQuantity: 4 });

      expect(result.action).toBe("created");
      expect(result.matchType).toBe("none");
      expect(result.product).toMatchObject({
        inventoryExtId: "900",
        sku: "Z1",
        name: "Ext",
        extQuantity: 4,
        sourceQuantity: 0,
        internalId: "",
      });
    });

    it("matches by sku without overwriting ERP data", async () => {
      const seeded = await seedProduct(storage, storeId, { internalId: "1", sku: "S1", name: "ERP Name" });

      const bySku = await matching.matchExtensionItem(storeId, { id: "901", sku: "S1", name: "ATUM Name", stockQuantity: 4 });
      expect(bySku.matchType).toBe("sku");
      expect(bySku.product).toMatchObject({ id: seeded.id, name: "ERP Name", inventoryExtId: "901", extQuantity: 4 });

      const byId = await matching.matchExtensionItem(storeId, { id: "901", sku: "S1", name: "ATUM Name", stockQuantity: 6 });
      expect(byId.matchType).toBe("extensionId");
      expect(byId.product?.extQuantity).toBe(6);
    });

    it("records negative ATUM stock as reported", async () => {
      const result = await matching.matchExtensionItem(storeId, { id: "904", sku: "", name: "Oversold", stockQuantity: -3 });

      expect(result.product?.extQuantity).toBe(-3);
    });

    it("backfills name and sku only when empty", async () => {
      const seeded = await seedProduct(storage, storeId, { inventoryExtId: "903" });

      const result = await matching.matchExtensionItem(storeId, { id: "903", sku: "S3", name: "Filled", stockQuantity: 1 });

      expect(result.product).toMatchObject({ id: seeded.id, name: "Filled", sku: "S3" });
    });
  });
});
