/**
 * Auto-sync scheduler: one timer loop per process that runs every enabled
 * store after a startup delay, then again after each interval.
 *
 * The interval is read at the end of each pass, never mid-run. A store that
 * is still running from a manual trigger is rejected by the orchestrator
 * lock and simply logged.
 */

import type { SyncOrchestrator, StoreSyncOutcome } from "./sync-orchestrator";
import { errorMessage } from "../errors";

export interface AutoSyncOptions {
  startupDelayMs: number;
  /** Re-read between passes */
  getIntervalMinutes: () => number;
}

export type AutoSyncStatus = "healthy" | "stale" | "error";

export interface AutoSyncHealth {
  running: boolean;
  inProgress: boolean;
  lastSuccessfulSync: string | null;
  lastSyncAttempt: string | null;
  lastSyncError: string | null;
  consecutiveErrors: number;
  minutesSinceLastSync: number | null;
  nextRunAt: string | null;
  status: AutoSyncStatus;
}

class AutoSyncScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private controller: AbortController | null = null;
  private isBatchProcessing = false;
  private nextRunAt: Date | null = null;

  private lastSuccessfulSync: Date | null = null;
  private lastSyncAttempt: Date | null = null;
  private lastSyncError: string | null = null;
  private consecutiveErrors = 0;

  constructor(
    private readonly orchestrator: Pick<SyncOrchestrator, "runAllStores">,
    private readonly options: AutoSyncOptions,
  ) {}

  startAutoSync(): void {
    if (this.controller) return;
    this.controller = new AbortController();
    console.log(`[AutoSync] Starting, first pass in ${Math.round(this.options.startupDelayMs / 1000)}s`);
    this.schedule(this.options.startupDelayMs);
  }

  stopAutoSync(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.nextRunAt = null;
    this.controller?.abort();
    this.controller = null;
    console.log("[AutoSync] Stopped");
  }

  /** One pass over all stores. Skipped when the previous pass is still going. */
  async tick(): Promise<StoreSyncOutcome[]> {
    if (this.isBatchProcessing) {
      console.log("[AutoSync] Previous pass still running, skipping");
      return [];
    }
    this.isBatchProcessing = true;
    this.lastSyncAttempt = new Date();

    try {
      const outcomes = await this.orchestrator.runAllStores({
        trigger: "scheduled",
        signal: this.controller?.signal,
      });

      const failures = outcomes
        .filter((o) => o.run?.status === "failed")
        .map((o) => `${o.storeName}: ${o.run?.errorDetails ?? "failed"}`);

      if (failures.length > 0) {
        this.consecutiveErrors++;
        this.lastSyncError = failures.join("; ");
        console.error(`[AutoSync] Pass finished with ${failures.length} failed stores (${this.consecutiveErrors} consecutive)`);
      } else {
        this.lastSuccessfulSync = new Date();
        this.lastSyncError = null;
        this.consecutiveErrors = 0;
        console.log(`[AutoSync] Pass finished for ${outcomes.length} stores`);
      }
      return outcomes;
    } catch (error) {
      this.consecutiveErrors++;
      this.lastSyncError = errorMessage(error);
      console.error(`[AutoSync] Pass failed (${this.consecutiveErrors} consecutive):`, this.lastSyncError);
      return [];
    } finally {
      this.isBatchProcessing = false;
    }
  }

  getAutoSyncHealth(now: Date = new Date()): AutoSyncHealth {
    const minutesSinceLastSync = this.lastSuccessfulSync
      ? Math.floor((now.getTime() - this.lastSuccessfulSync.getTime()) / 60000)
      : null;

    // Stale once two intervals pass without a clean pass
    const isStale = minutesSinceLastSync !== null && minutesSinceLastSync > this.options.getIntervalMinutes() * 2;
    const hasError = this.consecutiveErrors > 0;

    return {
      running: this.controller !== null,
      inProgress: this.isBatchProcessing,
      lastSuccessfulSync: this.lastSuccessfulSync?.toISOString() ?? null,
      lastSyncAttempt: this.lastSyncAttempt?.toISOString() ?? null,
      lastSyncError: this.lastSyncError,
      consecutiveErrors: this.consecutiveErrors,
      minutesSinceLastSync,
      nextRunAt: this.nextRunAt?.toISOString() ?? null,
      status: hasError ? "error" : isStale ? "stale" : "healthy",
    };
  }

  private schedule(delayMs: number): void {
    // A loop only reschedules itself while the start that created it is current
    const controller = this.controller;
    this.nextRunAt = new Date(Date.now() + delayMs);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick().then(() => {
        if (controller !== null && controller === this.controller) {
          this.schedule(this.options.getIntervalMinutes() * 60_000);
        }
      });
    }, delayMs);
  }
}

export type AutoSync = AutoSyncScheduler;

export function createAutoSyncScheduler(
  orchestrator: Pick<SyncOrchestrator, "runAllStores">,
  options: AutoSyncOptions,
): AutoSync {
  return new AutoSyncScheduler(orchestrator, options);
}
