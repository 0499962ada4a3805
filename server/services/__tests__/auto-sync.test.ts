import { describe, it, expect, vi, afterEach } from "vitest";
import type { SyncRun } from "@shared/schema";
import { createAutoSyncScheduler } from "../auto-sync";
import type { StoreSyncOutcome, SyncOrchestrator } from "../sync-orchestrator";
import { deferred } from "./helpers";

function finishedRun(overrides: Partial<SyncRun> = {}): SyncRun {
  return {
    id: 1,
    storeId: 1,
    trigger: "scheduled",
    status: "completed",
    processed: 0,
    created: 0,
    updated: 0,
    skipped: 0,
    errors: 0,
    errorDetails: null,
    startedAt: new Date("2026-03-02T10:00:00Z"),
    completedAt: new Date("2026-03-02T10:00:05Z"),
    ...overrides,
  };
}

function schedulerWith(runAllStores: SyncOrchestrator["runAllStores"]) {
  const orchestrator = { runAllStores: vi.fn<SyncOrchestrator["runAllStores"]>(runAllStores) };
  const scheduler = createAutoSyncScheduler(orchestrator, {
    startupDelayMs: 1000,
    getIntervalMinutes: () => 15,
  });
  return { orchestrator, scheduler };
}

describe("AutoSyncScheduler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts out healthy with no history", () => {
    const { scheduler } = schedulerWith(async () => []);

    expect(scheduler.getAutoSyncHealth()).toEqual({
      running: false,
      inProgress: false,
      lastSuccessfulSync: null,
      lastSyncAttempt: null,
      lastSyncError: null,
      consecutiveErrors: 0,
      minutesSinceLastSync: null,
      nextRunAt: null,
      status: "healthy",
    });
  });

  it("records a clean pass", async () => {
    const outcome: StoreSyncOutcome = { storeId: 1, storeName: "Main", run: finishedRun() };
    const { orchestrator, scheduler } = schedulerWith(async () => [outcome]);

    const outcomes = await scheduler.tick();

    expect(outcomes).toEqual([outcome]);
    expect(orchestrator.runAllStores).toHaveBeenCalledWith({ trigger: "scheduled", signal: undefined });
    const health = scheduler.getAutoSyncHealth();
    expect(health.status).toBe("healthy");
    expect(health.consecutiveErrors).toBe(0);
    expect(health.minutesSinceLastSync).toBe(0);
    expect(health.lastSuccessfulSync).not.toBeNull();
  });

  it("reports failed stores as an error state", async () => {
    const { scheduler } = schedulerWith(async () => [
      { storeId: 1, storeName: "Main", run: finishedRun({ status: "failed", errorDetails: "Run failed: boom" }) },
      { storeId: 2, storeName: "Outlet", run: finishedRun({ id: 2, storeId: 2 }) },
    ]);

    await scheduler.tick();
    await scheduler.tick();

    const health = scheduler.getAutoSyncHealth();
    expect(health.status).toBe("error");
    expect(health.consecutiveErrors).toBe(2);
    expect(health.lastSyncError).toBe("Main: Run failed: boom");
    expect(health.lastSuccessfulSync).toBeNull();
  });

  it("contains a pass that throws and recovers on the next clean one", async () => {
    let calls = 0;
    const { scheduler } = schedulerWith(async () => {
      calls++;
      if (calls === 1) throw new Error("database unavailable");
      return [];
    });

    expect(await scheduler.tick()).toEqual([]);
    expect(scheduler.getAutoSyncHealth()).toMatchObject({
      status: "error",
      consecutiveErrors: 1,
      lastSyncError: "database unavailable",
    });

    await scheduler.tick();
    expect(scheduler.getAutoSyncHealth()).toMatchObject({ status: "healthy", consecutiveErrors: 0, lastSyncError: null });
  });

  it("goes stale after two intervals without a clean pass", async () => {
    const { scheduler } = schedulerWith(async () => []);
    await scheduler.tick();

    const later = new Date(Date.now() + 31 * 60_000);
    const health = scheduler.getAutoSyncHealth(later);

    expect(health.minutesSinceLastSync).toBe(31);
    expect(health.status).toBe("stale");
  });

  it("skips a pass while the previous one is still running", async () => {
    const gate = deferred<StoreSyncOutcome[]>();
    const { orchestrator, scheduler } = schedulerWith(() => gate.promise);

    const first = scheduler.tick();
    expect(scheduler.getAutoSyncHealth().inProgress).toBe(true);
    expect(await scheduler.tick()).toEqual([]);
    expect(orchestrator.runAllStores).toHaveBeenCalledTimes(1);

    gate.resolve([]);
    await first;
    expect(scheduler.getAutoSyncHealth().inProgress).toBe(false);
  });

  it("runs after the startup delay, then every interval until stopped", async () => {
    vi.useFakeTimers();
    const { orchestrator, scheduler } = schedulerWith(async () => []);

    scheduler.startAutoSync();
    expect(scheduler.getAutoSyncHealth().running).toBe(true);
    expect(scheduler.getAutoSyncHealth().nextRunAt).not.toBeNull();

    await vi.advanceTimersByTimeAsync(999);
    expect(orchestrator.runAllStores).toHaveBeenCalledTimes(0);
    await vi.advanceTimersByTimeAsync(1);
    expect(orchestrator.runAllStores).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(15 * 60_000);
    expect(orchestrator.runAllStores).toHaveBeenCalledTimes(2);

    const signal = orchestrator.runAllStores.mock.calls[0][0]?.signal;
    scheduler.stopAutoSync();
    expect(signal?.aborted).toBe(true);
    expect(scheduler.getAutoSyncHealth()).toMatchObject({ running: false, nextRunAt: null });

    await vi.advanceTimersByTimeAsync(60 * 60_000);
    expect(orchestrator.runAllStores).toHaveBeenCalledTimes(2);
  });

  it("keeps a single loop when restarted during a pass", async () => {
    vi.useFakeTimers();
    const gate = deferred<StoreSyncOutcome[]>();
    let calls = 0;
    const { orchestrator, scheduler } = schedulerWith(() => (++calls === 1 ? gate.promise : Promise.resolve([])));

    scheduler.startAutoSync();
    await vi.advanceTimersByTimeAsync(1000);
    expect(orchestrator.runAllStores).toHaveBeenCalledTimes(1);

    scheduler.stopAutoSync();
    scheduler.startAutoSync();
    gate.resolve([]);
    await vi.advanceTimersByTimeAsync(1000);
    expect(orchestrator.runAllStores).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(15 * 60_000);
    expect(orchestrator.runAllStores).toHaveBeenCalledTimes(3);

    scheduler.stopAutoSync();
  });

  it("ignores a second start", async () => {
    vi.useFakeTimers();
    const { orchestrator, scheduler } = schedulerWith(async () => []);

    scheduler.startAutoSync();
    scheduler.startAutoSync();
    await vi.advanceTimersByTimeAsync(1000);

    expect(orchestrator.runAllStores).toHaveBeenCalledTimes(1);
    scheduler.stopAutoSync();
  });
});
