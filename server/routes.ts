import type { Express, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import { insertStoreSchema, storeSettingsSchema, type Store } from "@shared/schema";
import type { Services } from "./services";
import { SyncError, errorMessage } from "./errors";
import { isErpConfigured } from "./softone";
import { isStorefrontConfigured } from "./woocommerce";

const idParam = z.coerce.number().int().positive();

const runsQuerySchema = z.object({
  storeId: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

const productsQuerySchema = z.object({
  storeId: z.coerce.number().int().positive(),
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(500).default(50),
});

const statisticsQuerySchema = z.object({
  storeId: z.coerce.number().int().positive(),
});

const storeBodySchema = insertStoreSchema.omit({ settings: true }).extend({
  settings: storeSettingsSchema.optional(),
});

// Credentials never leave the server
function publicStore(store: Store) {
  const { erpToken, storefrontSecret, ...rest } = store;
  return {
    ...rest,
    hasErpToken: erpToken !== "",
    hasStorefrontSecret: storefrontSecret !== "",
    erpConfigured: isErpConfigured(store),
    storefrontConfigured: isStorefrontConfigured(store),
  };
}

function sendError(res: Response, error: unknown, fallback: string) {
  if (error instanceof SyncError) {
    return res.status(error.statusCode).json({ error: error.message });
  }
  console.error(`${fallback}:`, error);
  return res.status(500).json({ error: fallback });
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  services: Services,
): Promise<Server> {
  const { storage, orchestrator, planner, autoSync } = services;

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", autoSync: autoSync.getAutoSyncHealth().status });
  });

  // ===== STORES =====

  app.get("/api/stores", async (_req, res) => {
    try {
      const stores = await storage.getAllStores();
      res.json(stores.map(publicStore));
    } catch (error) {
      sendError(res, error, "Failed to fetch stores");
    }
  });

  app.post("/api/stores", async (req, res) => {
    try {
      const parsed = storeBodySchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request data", details: parsed.error.issues });
      }
      const store = await storage.createStore(parsed.data);
      res.status(201).json(publicStore(store));
    } catch (error) {
      sendError(res, error, "Failed to create store");
    }
  });

  app.patch("/api/stores/:storeId", async (req, res) => {
    try {
      const storeId = idParam.safeParse(req.params.storeId);
      const parsed = storeBodySchema.partial().safeParse(req.body);
      if (!storeId.success || !parsed.success) {
        return res.status(400).json({ error: "Invalid request data", details: parsed.error?.issues });
      }
      const store = await storage.updateStore(storeId.data, parsed.data);
      if (!store) return res.status(404).json({ error: "Store not found" });
      res.json(publicStore(store));
    } catch (error) {
      sendError(res, error, "Failed to update store");
    }
  });

  // ===== SYNC =====

  app.post("/api/sync/stores/:storeId/run", async (req, res) => {
    try {
      const storeId = idParam.safeParse(req.params.storeId);
      if (!storeId.success) return res.status(400).json({ error: "Invalid store id" });

      const { run, completion } = await orchestrator.startStoreSync(storeId.data, { trigger: "manual" });
      completion.catch((error: unknown) => {
        console.error(`[Routes] Sync run ${run.id} for store ${storeId.data} could not be finalized:`, errorMessage(error));
      });
      res.status(202).json({ runId: run.id, run });
    } catch (error) {
      sendError(res, error, "Failed to start sync");
    }
  });

  app.post("/api/sync/runs/:storeId/cancel", (req, res) => {
    const storeId = idParam.safeParse(req.params.storeId);
    if (!storeId.success) return res.status(400).json({ error: "Invalid store id" });
    if (!orchestrator.cancelStoreSync(storeId.data)) {
      return res.status(404).json({ error: "No sync running for this store" });
    }
    res.json({ cancelled: true, storeId: storeId.data });
  });

  app.get("/api/sync/runs", async (req, res) => {
    try {
      const parsed = runsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid query", details: parsed.error.issues });
      }
      res.json(await storage.getSyncRuns(parsed.data));
    } catch (error) {
      sendError(res, error, "Failed to fetch sync runs");
    }
  });

  app.get("/api/sync/runs/:id", async (req, res) => {
    try {
      const id = idParam.safeParse(req.params.id);
      if (!id.success) return res.status(400).json({ error: "Invalid run id" });
      const run = await storage.getSyncRunById(id.data);
      if (!run) return res.status(404).json({ error: "Sync run not found" });
      res.json(run);
    } catch (error) {
      sendError(res, error, "Failed to fetch sync run");
    }
  });

  app.get("/api/sync/status", (_req, res) => {
    res.json({
      autoSync: autoSync.getAutoSyncHealth(),
      runningStores: orchestrator.getRunningStoreIds(),
    });
  });

  app.post("/api/sync/stores/:storeId/plan", async (req, res) => {
    try {
      const storeId = idParam.safeParse(req.params.storeId);
      if (!storeId.success) return res.status(400).json({ error: "Invalid store id" });
      const store = await storage.getStoreById(storeId.data);
      if (!store) return res.status(404).json({ error: "Store not found" });

      const settings = storeSettingsSchema.safeParse(store.settings);
      if (!settings.success) {
        return res.status(422).json({ error: "Store settings are invalid", details: settings.error.issues });
      }
      const plan = await planner.planBatch(store.id, settings.data.sync.maxBatchSize, { dryRun: true });
      res.json(plan);
    } catch (error) {
      sendError(res, error, "Failed to plan batch");
    }
  });

  // ===== PRODUCTS =====

  app.get("/api/products", async (req, res) => {
    try {
      const parsed = productsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid query", details: parsed.error.issues });
      }
      const { storeId, page, pageSize } = parsed.data;
      res.json(await storage.getProductsPage(storeId, page, pageSize));
    } catch (error) {
      sendError(res, error, "Failed to fetch products");
    }
  });

  app.get("/api/products/statistics", async (req, res) => {
    try {
      const parsed = statisticsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid query", details: parsed.error.issues });
      }
      res.json(await planner.getSyncStatistics(parsed.data.storeId));
    } catch (error) {
      sendError(res, error, "Failed to fetch statistics");
    }
  });

  return httpServer;
}
