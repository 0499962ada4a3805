import { sql } from "drizzle-orm";
import { pgTable, text, varchar, integer, timestamp, jsonb, uniqueIndex, index, boolean, doublePrecision } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============================================================================
// STORE SETTINGS - per-store sync configuration (stored as JSON on the store)
// ============================================================================

// Attributes the field extractor can populate on an ERP item
export const erpStringFields = ["internalId", "sku", "barcode", "name", "category", "unit", "group", "vat"] as const;
export const erpNumericFields = ["quantity", "retailPrice", "wholesalePrice", "salePrice", "purchasePrice", "discount"] as const;
export type ErpStringField = typeof erpStringFields[number];
export type ErpNumericField = typeof erpNumericFields[number];

export const matchCodeFieldEnum = ["sku", "barcode"] as const;
export type MatchCodeField = typeof matchCodeFieldEnum[number];

export const fieldMappingSchema = z.object({
  internalId: z.string().default("ITEM.MTRL"),
  sku: z.string().default("ITEM.CODE"),
  barcode: z.string().default("ITEM.CODE1"),
  name: z.string().default("ITEM.NAME"),
  category: z.string().default("ITEM.MTRCATEGORY"),
  unit: z.string().default("ITEM.MTRUNIT1"),
  group: z.string().default("ITEM.MTRGROUP"),
  vat: z.string().default("ITEM.VAT"),
  quantity: z.string().default("ITEM.MTRL_ITEMTRDATA_QTY1"),
  retailPrice: z.string().default("ITEM.PRICER"),
  wholesalePrice: z.string().default("ITEM.PRICEW"),
  salePrice: z.string().default("ITEM.MTRL_ITEMTRDATA_SALLPRICE"),
  purchasePrice: z.string().default("ITEM.MTRL_ITEMTRDATA_PURLPRICE"),
  discount: z.string().default("ITEM.SODISCOUNT"),
});
export type FieldMapping = z.infer<typeof fieldMappingSchema>;

export const matchingSettingsSchema = z.object({
  primaryField: z.enum(matchCodeFieldEnum).default("sku"),
  secondaryField: z.enum(matchCodeFieldEnum).default("barcode"),
  createMissingProducts: z.boolean().default(true),
  updateExistingProducts: z.boolean().default(true),
});
export type MatchingSettings = z.infer<typeof matchingSettingsSchema>;

export const syncSettingsSchema = z.object({
  maxBatchSize: z.number().int().positive().default(50),
  chunkSize: z.number().int().positive().default(50),
  interBatchDelayMs: z.number().int().nonnegative().default(1000),
  storefrontConcurrency: z.number().int().positive().default(10),
  emailNotifications: z.boolean().default(true),
  notifyEmail: z.string().default(""),
});

export const storeSettingsSchema = z.object({
  fieldMapping: fieldMappingSchema.default({}),
  matching: matchingSettingsSchema.default({}),
  sync: syncSettingsSchema.default({}),
});
export type StoreSettings = z.infer<typeof storeSettingsSchema>;
export type StoreSettingsInput = z.input<typeof storeSettingsSchema>;

// ============================================================================
// STORES - one ERP company + one storefront + one ATUM location each
// ============================================================================
export const stores = pgTable("stores", {
  id: integer("id").primaryKey().generatedAlwaysAsIdentity(),
  name: varchar("name", { length: 200 }).notNull(),
  enabled: boolean("enabled").notNull().default(true),

  // SoftOne Go (ERP)
  erpBaseUrl: text("erp_base_url").notNull().default("https://go.s1cloud.net/s1services"),
  erpAppId: varchar("erp_app_id", { length: 50 }).notNull().default(""),
  erpToken: text("erp_token").notNull().default(""),
  erpS1Code: varchar("erp_s1_code", { length: 100 }).notNull().default(""),
  erpFilters: text("erp_filters").notNull().default("ITEM.MTRL_ITEMTRDATA_QTY1=1&ITEM.MTRL_ITEMTRDATA_QTY1_TO=9999"),

  // WooCommerce (storefront) + ATUM (inventory extension, same WordPress site)
  storefrontUrl: text("storefront_url").notNull().default(""),
  storefrontKey: text("storefront_key").notNull().default(""),
  storefrontSecret: text("storefront_secret").notNull().default(""),
  atumLocationId: integer("atum_location_id").notNull().default(0),
  atumLocationName: varchar("atum_location_name", { length: 200 }).notNull().default(""),

  settings: jsonb("settings").$type<StoreSettingsInput>().notNull().default({}),
  lastSyncAt: timestamp("last_sync_at"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// Identity columns are already left out of the insert schema
export const insertStoreSchema = createInsertSchema(stores).omit({
  lastSyncAt: true,
  createdAt: true,
  updatedAt: true,
});

// jsonb settings keep their typed shape here; the zod schema only sees Json
export type InsertStore = typeof stores.$inferInsert;
export type Store = typeof stores.$inferSelect;

// ============================================================================
// PRODUCTS - merged view of one item across ERP, storefront and ATUM
// ============================================================================
export const products = pgTable("products", {
  id: integer("id").primaryKey().generatedAlwaysAsIdentity(),
  storeId: integer("store_id").notNull().references(() => stores.id, { onDelete: "cascade" }),

  // Identity (empty string until learned)
  internalId: varchar("internal_id", { length: 50 }).notNull().default(""), // ERP primary key (MTRL)
  legacySourceId: varchar("legacy_source_id", { length: 100 }).notNull().default(""), // ERP code, pre-internalId imports
  sku: varchar("sku", { length: 100 }).notNull().default(""),
  barcode: varchar("barcode", { length: 100 }).notNull().default(""),
  storefrontId: varchar("storefront_id", { length: 50 }).notNull().default(""),
  inventoryExtId: varchar("inventory_ext_id", { length: 50 }).notNull().default(""),

  // Descriptive (ERP, last write wins)
  name: text("name").notNull().default(""),
  category: varchar("category", { length: 100 }).notNull().default(""),
  unit: varchar("unit", { length: 50 }).notNull().default(""),
  group: varchar("product_group", { length: 100 }).notNull().default(""),
  vat: varchar("vat", { length: 50 }).notNull().default(""),

  // Quantities
  sourceQuantity: doublePrecision("source_quantity").notNull().default(0), // ERP stock, stored unrounded
  extQuantity: integer("ext_quantity").notNull().default(0), // last quantity ATUM confirmed

  // Pricing (null = never learned)
  retailPrice: doublePrecision("retail_price"),
  wholesalePrice: doublePrecision("wholesale_price"),
  salePrice: doublePrecision("sale_price"),
  purchasePrice: doublePrecision("purchase_price"),
  discount: doublePrecision("discount"),

  // Sync bookkeeping
  lastSyncedAt: timestamp("last_synced_at"),
  lastSyncStatus: varchar("last_sync_status", { length: 200 }).notNull().default(""),
  lastSyncError: text("last_sync_error"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  uniqueIndex("products_store_sku_idx").on(table.storeId, table.sku).where(sql`${table.sku} <> ''`),
  index("products_store_internal_id_idx").on(table.storeId, table.internalId),
  index("products_store_inventory_ext_id_idx").on(table.storeId, table.inventoryExtId),
]);

export type InsertProduct = Omit<typeof products.$inferInsert, "createdAt" | "updatedAt">;
export type Product = typeof products.$inferSelect;
export type UpdateProduct = Partial<Omit<InsertProduct, "storeId">>;

// ============================================================================
// SYNC RUNS - audit record of one reconciliation cycle for one store
// ============================================================================
export const syncRunStatusEnum = ["running", "completed", "failed", "cancelled"] as const;
export type SyncRunStatus = typeof syncRunStatusEnum[number];

export const syncTriggerEnum = ["scheduled", "manual"] as const;
export type SyncTrigger = typeof syncTriggerEnum[number];

export const syncRuns = pgTable("sync_runs", {
  id: integer("id").primaryKey().generatedAlwaysAsIdentity(),
  storeId: integer("store_id").notNull().references(() => stores.id, { onDelete: "cascade" }),
  trigger: varchar("trigger", { length: 20 }).notNull().default("manual"),
  status: varchar("status", { length: 20 }).notNull().default("running"),
  processed: integer("processed").notNull().default(0),
  created: integer("created").notNull().default(0),
  updated: integer("updated").notNull().default(0),
  skipped: integer("skipped").notNull().default(0),
  errors: integer("errors").notNull().default(0),
  errorDetails: text("error_details"),
  startedAt: timestamp("started_at").defaultNow().notNull(),
  completedAt: timestamp("completed_at"),
}, (table) => [
  index("sync_runs_store_started_idx").on(table.storeId, table.startedAt),
]);

export type InsertSyncRun = Omit<typeof syncRuns.$inferInsert, "startedAt" | "completedAt">;
export type SyncRun = typeof syncRuns.$inferSelect;

export interface SyncRunCounts {
  processed: number;
  created: number;
  updated: number;
  skipped: number;
  errors: number;
}

export interface FinalizeSyncRun extends SyncRunCounts {
  status: Exclude<SyncRunStatus, "running">;
  errorDetails: string | null;
}
