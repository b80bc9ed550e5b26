// @vitest-environment node
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AllocationEngine } from '../../src/server/engine/allocationEngine.js';
import { analyzeDevices, summarizeAllocations } from '../../src/server/engine/summary.js';
import { metricsRegistry } from '../../src/server/observability/metrics.js';
import { allocatedRecord, costEvent, telemetryEvent } from './helpers/fixtures.js';

const ENDPOINT = 'https://retail-openai.openai.azure.com/openai/deployments/gpt-4o/chat/completions';
const RESOURCE_PATH =
  '/SUBSCRIPTIONS/TEST-SUB/RESOURCEGROUPS/RETAIL/PROVIDERS/MICROSOFT.COGNITIVESERVICES/ACCOUNTS/RETAIL-OPENAI';

function busyHour() {
  return {
    telemetry: [
      telemetryEvent({ timestamp: '2025-03-03T10:15:00.000Z', resourceId: ENDPOINT, tokensUsed: 400 }),
      telemetryEvent({ timestamp: '2025-03-03T10:30:00.000Z', resourceId: ENDPOINT, tokensUsed: 400, deviceId: 'pos-02' }),
      telemetryEvent({ timestamp: '2025-03-03T10:45:00.000Z', resourceId: ENDPOINT, tokensUsed: 200 })
    ],
    costs: [costEvent({ resourceId: RESOURCE_PATH })]
  };
}

describe('allocation engine', () => {
  beforeEach(() => {
    metricsRegistry.reset();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('joins endpoint telemetry with resource path costs and splits by tokens', () => {
    const { telemetry, costs } = busyHour();
    const result = new AllocationEngine().run(telemetry, costs);

    expect(result.allocationMethod).toBe('proportional');
    expect(result.records.map((record) => [record.deviceId, record.resourceId, record.allocatedCost])).toEqual([
      ['pos-01', 'retail-openai', 6],
      ['pos-02', 'retail-openai', 4]
    ]);
    expect(result.records[0]).toMatchObject({ tokensUsed: 600, apiCalls: 2, avgResponseTimeMs: 250 });
    expect(result.totals).toEqual({ groups: 1, totalCost: 10, allocatedCost: 10 });
    expect(result.violations).toEqual([]);
  });

  it('produces identical output for identical input', () => {
    const { telemetry, costs } = busyHour();
    const engine = new AllocationEngine();

    expect(engine.run(telemetry, costs)).toEqual(engine.run(telemetry, costs));
  });

  it('honours a per-run method override', () => {
    const { telemetry, costs } = busyHour();
    const result = new AllocationEngine().run(telemetry, costs, 'equal');

    expect(result.allocationMethod).toBe('equal');
    expect(result.records.map((record) => record.allocatedCost)).toEqual([5, 5]);
    expect(result.records.every((record) => record.allocationMethod === 'equal' && record.accuracy === 0.7)).toBe(true);
  });

  it('uses the configured default method', () => {
    const engine = new AllocationEngine({ windowMinutes: 60, allocationMethod: 'usage-based', conservationTolerance: 0.01 });
    const { telemetry, costs } = busyHour();

    expect(engine.defaultMethod).toBe('usage-based');
    expect(engine.run(telemetry, costs).records.map((record) => record.allocatedCost)).toEqual([
      (2 / 3) * 10,
      (1 / 3) * 10
    ]);
  });

  it('reports groups that violate conservation', () => {
    const telemetry = [
      telemetryEvent({ tokensUsed: 600 }),
      telemetryEvent({ tokensUsed: 0, deviceId: 'pos-02', timestamp: '2025-03-03T10:20:00.000Z' })
    ];
    const result = new AllocationEngine().run(telemetry, [costEvent()]);

    expect(result.violations).toHaveLength(1);
    expect(result.violations[0]).toMatchObject({ totalCost: 10, allocatedCost: 15, valid: false });
    expect(metricsRegistry.getConservationViolations()).toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('"message":"conservation_violation"'));
  });

  it('returns nothing when no cost window matches', () => {
    const result = new AllocationEngine().run([telemetryEvent()], [costEvent({ resourceId: 'other-resource' })]);

    expect(result.records).toEqual([]);
    expect(result.totals).toEqual({ groups: 0, totalCost: 0, allocatedCost: 0 });
    expect(metricsRegistry.getUncorrelatedBatches()).toBe(1);
  });
});

describe('allocation summaries', () => {
  const records = [
    allocatedRecord(),
    allocatedRecord({ deviceId: 'pos-02', allocatedCost: 4, tokensUsed: 400, apiCalls: 1, tokenShare: 0.4, apiCallShare: 0.25 })
  ];

  it('rolls allocations up by device, shift and model', () => {
    const summary = summarizeAllocations(records, 'proportional');

    expect(summary).toMatchObject({
      totalRecords: 2,
      totalAllocatedCost: 10,
      uniqueDevices: 2,
      uniqueStores: 1,
      uniqueDeviceStoreCombinations: 2,
      unknownDevicePercentage: 0,
      unknownStorePercentage: 0,
      avgConfidence: 1,
      avgAccuracy: 0.9,
      allocationMethod: 'proportional',
      costByDevice: { 'pos-01': 6, 'pos-02': 4 },
      costByStore: { 'store-101': 10 },
      costByModel: { 'GPT-4o': 10 },
      costByShift: { Morning: 10 }
    });
    expect(summary.topDevicesByCost).toEqual([
      { deviceId: 'pos-01', cost: 6 },
      { deviceId: 'pos-02', cost: 4 }
    ]);
  });

  it('reports unknown attribution as a percentage', () => {
    const summary = summarizeAllocations([...records, allocatedRecord({ deviceId: 'unknown' }), allocatedRecord({ storeNumber: 'unknown' })], 'equal');

    expect(summary.unknownDevicePercentage).toBe(25);
    expect(summary.unknownStorePercentage).toBe(25);
  });

  it('summarises an empty batch as zeros', () => {
    const summary = summarizeAllocations([], 'equal');

    expect(summary).toMatchObject({
      totalRecords: 0,
      totalAllocatedCost: 0,
      avgConfidence: 0,
      unknownDevicePercentage: 0,
      topDevicesByCost: []
    });
  });

  it('ranks devices and stores by cost', () => {
    const analytics = analyzeDevices(records);

    expect(analytics.devices.map((device) => [device.deviceId, device.totalCost])).toEqual([
      ['pos-01', 6],
      ['pos-02', 4]
    ]);
    expect(analytics.stores).toHaveLength(1);
    expect(analytics.stores[0]).toMatchObject({ storeNumber: 'store-101', distinctDevices: 2, totalCost: 10, totalTokens: 1000 });
    expect(analytics.businessHoursSplit).toEqual({ businessHours: 10, nonBusinessHours: 0 });
  });
});
