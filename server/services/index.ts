/**
 * Service wiring.
 *
 * Creates every sync service with its dependencies injected and returns
 * them as one container. The entry point builds it once with the
 * database-backed storage; tests build it with MemStorage and fake clients.
 *
 * ```ts
 * const services = createServices(new DatabaseStorage(db));
 * await services.orchestrator.runStoreSync(storeId, { trigger: "manual" });
 * ```
 *
 * Dependency graph:
 *   product-matching, batch-planner, batch-reconciler, storefront-matching (storage only)
 *     └── sync-orchestrator (all of the above + client factory + email)
 *           └── auto-sync
 */

import type { Store } from "@shared/schema";
import type { IStorage } from "../storage";
import { config } from "../config";
import { SoftOneClient } from "../softone";
import { AtumClient } from "../atum";
import { WooCommerceClient, isStorefrontConfigured } from "../woocommerce";
import { createProductMatchingService } from "./product-matching";
import { createBatchPlannerService } from "./batch-planner";
import { createBatchReconcilerService } from "./batch-reconciler";
import { createStorefrontMatchingService } from "./storefront-matching";
import { createSyncOrchestratorService, type ClientFactory, type SyncNotifier } from "./sync-orchestrator";
import { createAutoSyncScheduler } from "./auto-sync";
import { sendSyncReport } from "./email";

export function createStoreClients(store: Store): ReturnType<ClientFactory> {
  return {
    erp: new SoftOneClient(store),
    inventory: new AtumClient(store),
    storefront: isStorefrontConfigured(store) ? new WooCommerceClient(store) : null,
  };
}

const emailReport: SyncNotifier = (store, run, recipient) => sendSyncReport(store, run, recipient);

export interface ServiceOverrides {
  clients?: ClientFactory;
  notify?: SyncNotifier;
  storeDelayMs?: number;
}

export function createServices(storage: IStorage, overrides: ServiceOverrides = {}) {
  const matching = createProductMatchingService(storage);
  const planner = createBatchPlannerService(storage);
  const reconciler = createBatchReconcilerService(storage);
  const storefront = createStorefrontMatchingService(storage);

  const orchestrator = createSyncOrchestratorService({
    storage,
    matching,
    planner,
    reconciler,
    storefront,
    clients: overrides.clients ?? createStoreClients,
    notify: overrides.notify ?? emailReport,
    storeDelayMs: overrides.storeDelayMs ?? config.autoSync.storeDelayMs,
  });

  const autoSync = createAutoSyncScheduler(orchestrator, {
    startupDelayMs: config.autoSync.startupDelayMs,
    getIntervalMinutes: () => config.autoSync.intervalMinutes,
  });

  return {
    storage,
    matching,
    planner,
    reconciler,
    storefront,
    orchestrator,
    autoSync,
  };
}

export type Services = ReturnType<typeof createServices>;
