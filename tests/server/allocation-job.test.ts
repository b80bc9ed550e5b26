// @vitest-environment node
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { AllocationRun, TimeRange } from '../../src/shared/costAllocation.js';
import { CostCollector } from '../../src/server/collectors/costCollector.js';
import { StaticCostSource, StaticTelemetrySource } from '../../src/server/collectors/inMemorySources.js';
import type { CostSource, SourceBatch, TelemetrySource } from '../../src/server/collectors/interfaces.js';
import { TelemetryCollector } from '../../src/server/collectors/telemetryCollector.js';
import { InMemoryAllocationStore } from '../../src/server/dal/inMemoryAllocationStore.js';
import type { AllocationBatch } from '../../src/server/dal/interfaces.js';
import { AllocationEngine } from '../../src/server/engine/allocationEngine.js';
import { SourceError } from '../../src/server/errors.js';
import { metricsRegistry } from '../../src/server/observability/metrics.js';
import { AllocationJob } from '../../src/server/services/allocationJob.js';
import { AllocationScheduler } from '../../src/server/services/scheduler.js';
import { allocationRun } from './helpers/fixtures.js';

const NOW = '2025-03-03T11:00:00.000Z';
const RANGE: TimeRange = { start: '2025-03-03T10:00:00.000Z', end: NOW };
const OPTIONS = { maxRetryAttempts: 1, retryBaseDelayMs: 0 };

const TELEMETRY_ROWS = [
  { timestamp: '2025-03-03T10:15:00Z', deviceId: 'pos-01', storeNumber: 'store-101', resourceId: 'retail-openai', tokensUsed: 600 },
  { timestamp: '2025-03-03T10:30:00Z', deviceId: 'pos-02', storeNumber: 'store-101', resourceId: 'retail-openai', tokensUsed: 400 },
  { timestamp: '2025-03-03T09:30:00Z', deviceId: 'pos-03', storeNumber: 'store-101', resourceId: 'retail-openai', tokensUsed: 999 }
];
const COST_ROWS = [{ usageTimestamp: '2025-03-03T10:00:00Z', resourceId: 'retail-openai', cost: 10, meterName: 'gpt-4o input tokens' }];

class FailingStore extends InMemoryAllocationStore {
  override async writeRun(_batch: AllocationBatch): Promise<void> {
    throw new Error('disk full');
  }
}

interface JobSetup {
  telemetrySource?: TelemetrySource;
  costSource?: CostSource;
  repository?: InMemoryAllocationStore;
}

function createJob(setup: JobSetup = {}) {
  const repository = setup.repository ?? new InMemoryAllocationStore();
  const job = new AllocationJob({
    telemetryCollector: new TelemetryCollector(setup.telemetrySource ?? new StaticTelemetrySource([...TELEMETRY_ROWS]), OPTIONS),
    costCollector: new CostCollector(setup.costSource ?? new StaticCostSource([...COST_ROWS]), OPTIONS),
    engine: new AllocationEngine(),
    repository,
    lookbackHours: 1,
    now: () => new Date(NOW),
    createRunId: () => 'run-1'
  });
  return { job, repository };
}

function gatedTelemetrySource(): { source: TelemetrySource; release: () => void } {
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const inner = new StaticTelemetrySource([...TELEMETRY_ROWS]);
  return {
    source: {
      name: 'gated',
      fetchTelemetry: async (range: TimeRange): Promise<SourceBatch> => {
        await gate;
        return inner.fetchTelemetry(range);
      }
    },
    release: () => release()
  };
}

beforeEach(() => {
  metricsRegistry.reset();
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.useRealTimers();
});

describe('allocation job', () => {
  it('collects the lookback window, allocates and persists the batch', async () => {
    const { job, repository } = createJob();

    const run = await job.runOnce();

    expect(run).toEqual<AllocationRun>({
      runId: 'run-1',
      startedAtUtc: NOW,
      completedAtUtc: NOW,
      status: 'ok',
      allocationMethod: 'proportional',
      telemetryCount: 2,
      costCount: 1,
      allocatedCount: 2,
      totalCost: 10,
      allocatedCost: 10,
      conservationViolations: 0,
      rejectedRecords: 0,
      errorMessage: null
    });
    expect((await repository.getAllocations({})).map((record) => [record.deviceId, record.allocatedCost])).toEqual([
      ['pos-01', 6],
      ['pos-02', 4]
    ]);
    expect(await repository.getTelemetry(RANGE)).toHaveLength(2);
    expect(await repository.listRuns(10)).toEqual([run]);
    expect(metricsRegistry.getRunOutcomes()).toEqual([{ key: 'ok', value: 1 }]);
  });

  it('applies a method override and an explicit range', async () => {
    const { job } = createJob();

    const run = await job.runOnce({
      method: 'equal',
      range: { start: '2025-03-03T09:00:00.000Z', end: NOW }
    });

    expect(run.allocationMethod).toBe('equal');
    expect(run.telemetryCount).toBe(3);
    expect(run.allocatedCount).toBe(2);
  });

  it('skips the run when the cost source is throttled', async () => {
    const { job, repository } = createJob({
      costSource: {
        name: 'busy',
        fetchCosts: async () => {
          throw new SourceError('throttled', 'slow down', 429);
        }
      }
    });

    const run = await job.runOnce();

    expect(run).toMatchObject({ status: 'skipped', errorMessage: 'Cost source throttled', allocatedCount: 0, completedAtUtc: NOW });
    expect(await repository.getAllocations({})).toEqual([]);
    expect(await repository.getTelemetry(RANGE)).toEqual([]);
    expect(await repository.listRuns(10)).toEqual([run]);
    expect(metricsRegistry.getRunOutcomes()).toEqual([{ key: 'skipped', value: 1 }]);
  });

  it('marks the run as failed on a permission error and writes nothing else', async () => {
    const { job, repository } = createJob({
      telemetrySource: {
        name: 'locked',
        fetchTelemetry: async () => {
          throw new SourceError('permission', 'forbidden', 403);
        }
      }
    });

    const run = await job.runOnce();

    expect(run).toMatchObject({ status: 'error', errorMessage: 'forbidden' });
    expect(await repository.getAllocations({})).toEqual([]);
    expect((await repository.getLatestRun())?.status).toBe('error');
  });

  it('records a failed run when the batch write fails', async () => {
    const { job, repository } = createJob({ repository: new FailingStore() });

    const run = await job.runOnce();

    expect(run).toMatchObject({ status: 'error', errorMessage: 'disk full', telemetryCount: 2, allocatedCount: 0 });
    expect(await repository.getAllocations({})).toEqual([]);
    expect(await repository.listRuns(10)).toEqual([run]);
  });

  it('rejects a second run while one is in flight', async () => {
    const gated = gatedTelemetrySource();
    const { job } = createJob({ telemetrySource: gated.source });

    const first = job.runOnce();
    expect(job.isRunning).toBe(true);
    await expect(job.runOnce()).rejects.toMatchObject({ code: 'RUN_IN_PROGRESS', statusCode: 409 });

    gated.release();
    await expect(first).resolves.toMatchObject({ status: 'ok' });
    expect(job.isRunning).toBe(false);
  });
});

describe('allocation scheduler', () => {
  it('runs the job on every interval until stopped', async () => {
    vi.useFakeTimers();
    const { job } = createJob();
    const runOnce = vi.spyOn(job, 'runOnce');
    const scheduler = new AllocationScheduler(job, { intervalMinutes: 6, runOnStartup: false });

    const stop = scheduler.start();
    expect(scheduler.status()).toMatchObject({ active: true, intervalMinutes: 6, lastTickAtUtc: null });

    await vi.advanceTimersByTimeAsync(6 * 60_000);
    expect(runOnce).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(6 * 60_000);
    expect(runOnce).toHaveBeenCalledTimes(2);

    stop();
    await vi.advanceTimersByTimeAsync(12 * 60_000);
    expect(runOnce).toHaveBeenCalledTimes(2);
    expect(scheduler.status().active).toBe(false);
  });

  it('runs once on startup when configured', () => {
    vi.useFakeTimers();
    const { job } = createJob();
    const runOnce = vi.spyOn(job, 'runOnce').mockResolvedValue(allocationRun());
    const scheduler = new AllocationScheduler(job, { intervalMinutes: 6, runOnStartup: true });

    scheduler.start();
    scheduler.start();

    expect(runOnce).toHaveBeenCalledTimes(1);
    scheduler.stop();
  });

  it('skips a tick while the previous run is still in flight', async () => {
    const gated = gatedTelemetrySource();
    const { job } = createJob({ telemetrySource: gated.source });
    const scheduler = new AllocationScheduler(job, { intervalMinutes: 6, runOnStartup: false });

    scheduler.tick();
    scheduler.tick();

    expect(scheduler.status().skippedTicks).toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('"message":"allocation_tick_skipped"'));

    gated.release();
    await vi.waitFor(() => expect(job.isRunning).toBe(false));
    expect(scheduler.status().lastTickAtUtc).not.toBeNull();
  });
});
