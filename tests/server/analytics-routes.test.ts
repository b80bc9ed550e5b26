// @vitest-environment node
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_ANALYTICS_CONFIG } from '../../src/server/config.js';
import { InMemoryAllocationStore } from '../../src/server/dal/inMemoryAllocationStore.js';
import { createAnalyticsRouter } from '../../src/server/routes/analyticsRoutes.js';
import { allocatedRecord, allocationRun, costEvent, eventsInHour } from './helpers/fixtures.js';
import { invokeRoute } from './helpers/routeHarness.js';

const NOW = new Date('2025-03-03T11:00:00.000Z');

// Two quiet hours the day before, then one busy hour ending at NOW.
async function seededRouter() {
  const repository = new InMemoryAllocationStore();
  await repository.writeRun({
    run: allocationRun(),
    records: [1, 2, 3, 4, 5].map((cost, index) =>
      allocatedRecord({
        windowStartUtc: new Date(Date.UTC(2025, 2, 2, index)).toISOString(),
        allocatedCost: cost,
        tokensUsed: cost * 100,
        apiCalls: 1
      })
    ),
    telemetry: [
      ...eventsInHour('2025-03-02T08:00:00.000Z', 10, { tokensUsed: 100 }),
      ...eventsInHour('2025-03-02T09:00:00.000Z', 10, { tokensUsed: 100 }),
      ...eventsInHour('2025-03-03T10:00:00.000Z', 10, { tokensUsed: 300 })
    ],
    costs: [costEvent()]
  });
  return createAnalyticsRouter({ repository, config: DEFAULT_ANALYTICS_CONFIG, now: () => NOW });
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('analytics routes', () => {
  it('learns usage patterns over the lookback', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/patterns', 'get', { query: { lookbackDays: '7' } });

    expect(outcome.body).toMatchObject({
      data: {
        range: { start: '2025-02-24T11:00:00.000Z', end: '2025-03-03T11:00:00.000Z' },
        lookbackDays: 7,
        items: [{ deviceId: 'pos-01', storeNumber: 'store-101', peakHours: [10] }]
      }
    });
  });

  it('flags the busy hour against the learned history', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/anomalies', 'get', {});

    expect(outcome.body).toMatchObject({
      data: {
        current: { start: '2025-03-03T10:00:00.000Z', end: '2025-03-03T11:00:00.000Z' },
        history: { start: '2025-02-24T10:00:00.000Z', end: '2025-03-03T10:00:00.000Z' },
        patternsLearned: 1,
        items: [
          {
            deviceId: 'pos-01',
            anomalyType: 'spike',
            currentTokensPerHour: 3000,
            expectedTokensPerHour: 1000,
            tokenDeviationRatio: 2,
            severity: 'medium'
          }
        ]
      }
    });
  });

  it('rejects a current window that ends before it starts', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/anomalies', 'get', {
      query: { currentStart: '2025-03-03T12:00:00Z', end: '2025-03-03T11:00:00Z' }
    });

    expect(outcome.error).toMatchObject({ statusCode: 422, code: 'VALIDATION_ERROR' });
  });

  it('predicts cost from the token-correlated history', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/predictions', 'get', {});

    expect(outcome.body).toMatchObject({
      data: {
        items: [{ deviceId: 'pos-01', storeNumber: 'store-101', basis: 'tokens', predictedCost: expect.closeTo(30, 10) }]
      }
    });
  });

  it('finds no spillover for a single device store', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/spillover', 'get', {
      query: { end: '2025-03-10T00:00:00Z' }
    });

    expect(outcome.body).toEqual({
      data: { range: { start: '2025-03-03T00:00:00.000Z', end: '2025-03-10T00:00:00.000Z' }, items: [] }
    });
  });

  it('recommends an allocation method for the last day', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/allocation-method', 'get', {});

    expect(outcome.body).toMatchObject({
      data: {
        range: { start: '2025-03-02T11:00:00.000Z', end: '2025-03-03T11:00:00.000Z' },
        method: 'proportional',
        reason: 'Balanced usage patterns',
        stats: { distinctDevices: 1 }
      }
    });
  });

  it('computes decay weighted shares relative to the range end', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/decay-weighted', 'get', {});

    expect(outcome.body).toMatchObject({
      data: {
        decayHours: 2,
        items: [{ deviceId: 'pos-01', weightedShare: 1, costWeight: expect.closeTo(Math.exp(-0.5), 10) }]
      }
    });
  });

  it('rejects a non-positive decay constant', async () => {
    const outcome = await invokeRoute(await seededRouter(), '/decay-weighted', 'get', { query: { decayHours: '-1' } });

    expect(outcome.error).toMatchObject({ statusCode: 422 });
  });
});
