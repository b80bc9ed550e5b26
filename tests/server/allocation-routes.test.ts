// @vitest-environment node
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { InMemoryAllocationStore } from '../../src/server/dal/inMemoryAllocationStore.js';
import { createAllocationRouter } from '../../src/server/routes/allocationRoutes.js';
import { allocatedRecord, allocationRun } from './helpers/fixtures.js';
import { invokeRoute } from './helpers/routeHarness.js';

async function seededRouter() {
  const repository = new InMemoryAllocationStore();
  await repository.writeRun({
    run: allocationRun(),
    records: [
      allocatedRecord(),
      allocatedRecord({ deviceId: 'pos-02', allocatedCost: 4, tokensUsed: 400, apiCalls: 1 }),
      allocatedRecord({ deviceId: 'pos-03', windowStartUtc: '2025-03-04T10:00:00.000Z', allocatedCost: 5 })
    ],
    telemetry: [],
    costs: []
  });
  return createAllocationRouter(repository, 'usage-based');
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('allocation routes', () => {
  it('lists all allocations', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/', 'get', {});

    expect(outcome.body).toMatchObject({ data: { total: 3 } });
  });

  it('filters by partition date', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/', 'get', { query: { date: '2025-03-04' } });

    expect(outcome.body).toMatchObject({ data: { items: [{ deviceId: 'pos-03', allocatedCost: 5 }], total: 1 } });
  });

  it('matches resource ids case-insensitively', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/', 'get', { query: { resourceId: 'RETAIL-OPENAI' } });

    expect(outcome.body).toMatchObject({ data: { total: 3 } });
  });

  it('truncates items to the limit but reports the full total', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/', 'get', { query: { limit: '1' } });

    expect(outcome.body).toMatchObject({ data: { items: [{ deviceId: 'pos-01' }], total: 3 } });
  });

  it('rejects malformed dates', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/', 'get', { query: { date: '2025-3-4' } });

    expect(outcome.error).toMatchObject({ statusCode: 422, code: 'VALIDATION_ERROR' });
  });

  it('summarises one day of allocations', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/summary', 'get', { query: { date: '2025-03-03' } });

    expect(outcome.body).toMatchObject({
      data: {
        date: '2025-03-03',
        summary: {
          totalRecords: 2,
          totalAllocatedCost: 10,
          allocationMethod: 'proportional',
          costByDevice: { 'pos-01': 6, 'pos-02': 4 }
        },
        analytics: {
          devices: [{ deviceId: 'pos-01' }, { deviceId: 'pos-02' }],
          businessHoursSplit: { businessHours: 10, nonBusinessHours: 0 }
        }
      }
    });
  });

  it('falls back to the configured method for an empty day', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/summary', 'get', { query: { date: '2025-01-01' } });

    expect(outcome.body).toMatchObject({
      data: { summary: { totalRecords: 0, totalAllocatedCost: 0, allocationMethod: 'usage-based' } }
    });
  });

  it('rejects an unknown method', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/summary', 'get', { query: { method: 'weighted' } });

    expect(outcome.error).toMatchObject({ statusCode: 422 });
  });
});
