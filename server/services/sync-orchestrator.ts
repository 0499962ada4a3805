/**
 * Sync Orchestrator
 *
 * Runs one reconciliation cycle per store:
 *
 *   ERP fetch → extract → match items
 *   → ATUM fetch → match inventories
 *   → storefront matching (when configured)
 *   → plan → submit chunks → reconcile each chunk
 *
 * Every cycle is bracketed by a SyncRun row: created `running` before the
 * first step and finalized exactly once as completed, failed or cancelled.
 * A store can only have one cycle in flight; a second start is rejected
 * with a 409 SyncError.
 */

import {
  storeSettingsSchema,
  type Store,
  type StoreSettings,
  type SyncRun,
  type SyncRunCounts,
  type SyncTrigger,
  type FinalizeSyncRun,
} from "@shared/schema";
import type { IStorage } from "../storage";
import type { ErpClient } from "../softone";
import type { InventoryClient } from "../atum";
import type { StorefrontClient } from "../woocommerce";
import { SyncError, errorMessage } from "../errors";
import { delay } from "../http-client";
import { extractErpItems } from "./field-extractor";
import type { ProductMatching, MatchResult } from "./product-matching";
import type { BatchPlanner, BatchPlan, BatchSubmission } from "./batch-planner";
import type { BatchReconciler } from "./batch-reconciler";
import type { StorefrontMatching } from "./storefront-matching";

type Storage = Pick<IStorage, "getStoreById" | "getAllStores" | "updateStore" | "createSyncRun" | "finalizeSyncRun">;

export interface StoreClients {
  erp: ErpClient;
  inventory: InventoryClient;
  /** null when the store has no storefront credentials */
  storefront: StorefrontClient | null;
}

export type ClientFactory = (store: Store) => StoreClients;

export type SyncNotifier = (store: Store, run: SyncRun, recipient: string) => Promise<unknown>;

export interface SyncOrchestratorDeps {
  storage: Storage;
  matching: ProductMatching;
  planner: BatchPlanner;
  reconciler: BatchReconciler;
  storefront: StorefrontMatching;
  clients: ClientFactory;
  notify?: SyncNotifier;
  /** Pause between stores in runAllStores */
  storeDelayMs?: number;
}

export interface RunOptions {
  trigger?: SyncTrigger;
  signal?: AbortSignal;
}

export interface StartedSync {
  run: SyncRun;
  /** Settles with the finalized run */
  completion: Promise<SyncRun>;
}

export interface StoreSyncOutcome {
  storeId: number;
  storeName: string;
  run?: SyncRun;
  error?: string;
}

const MAX_ERROR_DETAILS = 20;

class SyncCancelledError extends Error {
  constructor() {
    super("Sync cancelled");
    this.name = "SyncCancelledError";
  }
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) throw new SyncCancelledError();
}

/**
 * Splits a plan into sequential submissions of at most `size` items,
 * updates first.
 */
export function chunkPlan(plan: BatchSubmission, size: number): BatchSubmission[] {
  const ops = [
    ...plan.update.map((item) => ({ kind: "update" as const, item })),
    ...plan.create.map((item) => ({ kind: "create" as const, item })),
  ];
  const chunks: BatchSubmission[] = [];
  for (let i = 0; i < ops.length; i += size) {
    const chunk: BatchSubmission = { create: [], update: [] };
    for (const op of ops.slice(i, i + size)) {
      if (op.kind === "update") chunk.update.push(op.item);
      else chunk.create.push(op.item);
    }
    chunks.push(chunk);
  }
  return chunks;
}

class RunTally {
  readonly counts: SyncRunCounts = { processed: 0, created: 0, updated: 0, skipped: 0, errors: 0 };
  private readonly details: string[] = [];

  recordMatch(result: MatchResult, label: string): void {
    if (!result.success) {
      this.error(`${label}: ${result.error ?? "unknown error"}`);
    } else if (result.action === "created") {
      this.counts.created++;
    } else if (result.action === "updated") {
      this.counts.updated++;
    } else {
      this.counts.skipped++;
    }
  }

  error(detail: string, count = 1): void {
    this.counts.errors += count;
    this.details.push(detail);
  }

  get errorDetails(): string | null {
    if (this.details.length === 0) return null;
    const shown = this.details.slice(0, MAX_ERROR_DETAILS);
    const hidden = this.details.length - shown.length;
    return hidden > 0 ? `${shown.join("\n")}\n... and ${hidden} more` : shown.join("\n");
  }
}

class SyncOrchestratorService {
  private readonly running = new Map<number, AbortController>();

  constructor(private readonly deps: SyncOrchestratorDeps) {}

  isRunning(storeId: number): boolean {
    return this.running.has(storeId);
  }

  getRunningStoreIds(): number[] {
    return Array.from(this.running.keys());
  }

  /** Signals the in-flight run of a store to stop. Returns false when none is running. */
  cancelStoreSync(storeId: number): boolean {
    const controller = this.running.get(storeId);
    if (!controller) return false;
    console.log(`[SyncOrchestrator] Cancel requested for store ${storeId}`);
    controller.abort();
    return true;
  }

  /**
   * Claims the store, records the SyncRun and starts the cycle in the
   * background. Resolves as soon as the run row exists.
   */
  async startStoreSync(storeId: number, opts: RunOptions = {}): Promise<StartedSync> {
    if (this.running.has(storeId)) {
      throw new SyncError(`Sync already running for store ${storeId}`, 409);
    }
    const controller = new AbortController();
    this.running.set(storeId, controller);

    const forwardAbort = () => controller.abort();
    if (opts.signal?.aborted) controller.abort();
    else opts.signal?.addEventListener("abort", forwardAbort, { once: true });

    const release = () => {
      opts.signal?.removeEventListener("abort", forwardAbort);
      if (this.running.get(storeId) === controller) this.running.delete(storeId);
    };

    let opened: { store: Store; run: SyncRun };
    try {
      opened = await this.openRun(storeId, opts.trigger ?? "manual");
    } catch (error) {
      release();
      throw error;
    }

    const { store, run } = opened;
    console.log(`[SyncOrchestrator] Store ${storeId} (${store.name}): run ${run.id} started (${run.trigger})`);
    const completion = this.execute(store, run, controller.signal).finally(release);
    return { run, completion };
  }

  async runStoreSync(storeId: number, opts: RunOptions = {}): Promise<SyncRun> {
    const { completion } = await this.startStoreSync(storeId, opts);
    return completion;
  }

  /**
   * Runs every enabled store in turn. A store that fails or is already
   * running is reported in its outcome and the loop moves on.
   */
  async runAllStores(opts: RunOptions = {}): Promise<StoreSyncOutcome[]> {
    const stores = (await this.deps.storage.getAllStores()).filter((s) => s.enabled);
    const outcomes: StoreSyncOutcome[] = [];

    for (let i = 0; i < stores.length; i++) {
      if (opts.signal?.aborted) break;
      const store = stores[i];
      if (i > 0 && this.deps.storeDelayMs) await delay(this.deps.storeDelayMs);

      try {
        const run = await this.runStoreSync(store.id, opts);
        outcomes.push({ storeId: store.id, storeName: store.name, run });
      } catch (error) {
        const message = errorMessage(error);
        console.warn(`[SyncOrchestrator] Store ${store.id} (${store.name}) skipped: ${message}`);
        outcomes.push({ storeId: store.id, storeName: store.name, error: message });
      }
    }
    return outcomes;
  }

  // ---------------------------------------------------------------------------
  // PRIVATE HELPERS
  // ---------------------------------------------------------------------------

  private async openRun(storeId: number, trigger: SyncTrigger): Promise<{ store: Store; run: SyncRun }> {
    const store = await this.deps.storage.getStoreById(storeId);
    if (!store) throw new SyncError(`Store ${storeId} not found`, 404);
    const run = await this.deps.storage.createSyncRun({ storeId, trigger, status: "running" });
    return { store, run };
  }

  private async execute(store: Store, run: SyncRun, signal: AbortSignal): Promise<SyncRun> {
    const tally = new RunTally();
    let status: FinalizeSyncRun["status"] = "completed";
    let settings: StoreSettings | undefined;

    try {
      const parsed = storeSettingsSchema.safeParse(store.settings);
      if (!parsed.success) {
        throw new Error(`Invalid store settings: ${parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ")}`);
      }
      settings = parsed.data;
      await this.pipeline(store, settings, tally, signal);
    } catch (error) {
      if (signal.aborted) {
        status = "cancelled";
        console.log(`[SyncOrchestrator] Store ${store.id}: run ${run.id} cancelled`);
      } else {
        status = "failed";
        tally.error(`Run failed: ${errorMessage(error)}`, 0);
        console.error(`[SyncOrchestrator] Store ${store.id}: run ${run.id} failed:`, errorMessage(error));
      }
    }

    const finalized = await this.deps.storage.finalizeSyncRun(run.id, {
      ...tally.counts,
      status,
      errorDetails: tally.errorDetails,
    });
    if (!finalized) throw new Error(`Sync run ${run.id} was already finalized`);

    if (status === "completed") {
      await this.deps.storage.updateStore(store.id, { lastSyncAt: finalized.completedAt ?? new Date() });
    }

    console.log(
      `[SyncOrchestrator] Store ${store.id}: run ${run.id} ${status} ` +
      `(processed ${finalized.processed}, created ${finalized.created}, updated ${finalized.updated}, ` +
      `skipped ${finalized.skipped}, errors ${finalized.errors})`,
    );

    if (settings?.sync.emailNotifications && settings.sync.notifyEmail && this.deps.notify) {
      try {
        await this.deps.notify(store, finalized, settings.sync.notifyEmail);
      } catch (error) {
        console.error(`[SyncOrchestrator] Store ${store.id}: report email failed: ${errorMessage(error)}`);
      }
    }

    return finalized;
  }

  private async pipeline(store: Store, settings: StoreSettings, tally: RunTally, signal: AbortSignal): Promise<void> {
    const { matching, planner, reconciler, storefront } = this.deps;
    const clients = this.deps.clients(store);
    throwIfAborted(signal);

    // 1. ERP → local products
    const erpResponse = await clients.erp.fetchItems(signal);
    const items = extractErpItems(erpResponse, settings.fieldMapping);
    console.log(`[SyncOrchestrator] Store ${store.id}: matching ${items.length} ERP items`);
    for (const item of items) {
      throwIfAborted(signal);
      tally.counts.processed++;
      const result = await matching.matchErpItem(store.id, item, settings.matching);
      tally.recordMatch(result, `ERP item ${item.internalId || item.sku}`);
    }

    // 2. ATUM → local products (links inventory ids, learns current stock)
    throwIfAborted(signal);
    const inventories = await clients.inventory.fetchInventories(signal);
    for (const inventory of inventories) {
      throwIfAborted(signal);
      const result = await matching.matchExtensionItem(store.id, inventory);
      if (!result.success) tally.error(`ATUM inventory ${inventory.id}: ${result.error ?? "unknown error"}`);
    }

    // 3. Storefront links
    throwIfAborted(signal);
    if (clients.storefront) {
      const summary = await storefront.matchStore(store.id, clients.storefront, {
        concurrency: settings.sync.storefrontConcurrency,
        signal,
      });
      if (summary.errors > 0) tally.error(`Storefront matching: ${summary.errors} products failed`, summary.errors);
    }

    // 4. Plan and submit
    throwIfAborted(signal);
    const plan: BatchPlan = await planner.planBatch(store.id, settings.sync.maxBatchSize);
    const chunks = chunkPlan(plan, settings.sync.chunkSize);
    console.log(
      `[SyncOrchestrator] Store ${store.id}: plan ${plan.create.length} creates, ${plan.update.length} updates ` +
      `in ${chunks.length} chunks (${plan.deferred} deferred, ${plan.gated} gated)`,
    );

    for (let i = 0; i < chunks.length; i++) {
      throwIfAborted(signal);
      if (i > 0 && settings.sync.interBatchDelayMs > 0) await delay(settings.sync.interBatchDelayMs);
      const chunk = chunks[i];

      try {
        const response = await clients.inventory.submitBatch(chunk, signal);
        const result = await reconciler.applyBatchResponse(store.id, chunk, response);
        console.log(
          `[SyncOrchestrator] Store ${store.id}: chunk ${i + 1}/${chunks.length} ` +
          `created ${result.created}, updated ${result.updated}, errors ${result.errors}`,
        );
        if (result.errors > 0) tally.error(`ATUM chunk ${i + 1}: ${result.errors} items not applied`, result.errors);
      } catch (error) {
        if (signal.aborted) throw error;
        const failed = await reconciler.markChunkFailed(store.id, chunk, error);
        console.error(`[SyncOrchestrator] Store ${store.id}: chunk ${i + 1}/${chunks.length} failed: ${errorMessage(error)}`);
        tally.error(`ATUM chunk ${i + 1} failed: ${errorMessage(error)}`, failed);
      }
    }
  }
}

export type SyncOrchestrator = SyncOrchestratorService;

export function createSyncOrchestratorService(deps: SyncOrchestratorDeps): SyncOrchestrator {
  return new SyncOrchestratorService(deps);
}
