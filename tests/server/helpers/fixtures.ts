import type {
  AllocatedRecord,
  AllocationDraft,
  AllocationRun,
  CostEvent,
  JoinedGroup,
  TelemetryAggregate,
  TelemetryEvent
} from '../../../src/shared/costAllocation.js';
import { categorizeMeter } from '../../../src/server/engine/normalizer.js';
import { enrich } from '../../../src/server/engine/enricher.js';

// 2025-03-03 is a Monday.
export const MONDAY_10_UTC = '2025-03-03T10:00:00.000Z';

export function telemetryEvent(overrides: Partial<TelemetryEvent> = {}): TelemetryEvent {
  return {
    timestamp: '2025-03-03T10:15:00.000Z',
    deviceId: 'pos-01',
    storeNumber: 'store-101',
    resourceId: 'retail-openai',
    tokensUsed: 100,
    statusCode: 200,
    responseTimeMs: 250,
    ...overrides
  };
}

export function costEvent(overrides: Partial<CostEvent> = {}): CostEvent {
  return {
    resourceId: 'retail-openai',
    usageTimestamp: MONDAY_10_UTC,
    cost: 10,
    usageQuantity: 1,
    currency: 'USD',
    meterName: 'gpt-4o input tokens',
    serviceName: 'Cognitive Services',
    ...overrides
  };
}

export function member(deviceId: string, storeNumber: string, totalTokens: number, apiCallCount: number): TelemetryAggregate {
  return {
    windowStartUtc: MONDAY_10_UTC,
    resourceId: 'retail-openai',
    deviceId,
    storeNumber,
    totalTokens,
    apiCallCount,
    avgResponseTimeMs: 200
  };
}

export function joinedGroup(members: TelemetryAggregate[], cost = 10): JoinedGroup {
  return {
    windowStartUtc: MONDAY_10_UTC,
    resourceId: 'retail-openai',
    cost: {
      windowStartUtc: MONDAY_10_UTC,
      resourceId: 'retail-openai',
      cost,
      usageQuantity: 1,
      currency: 'USD',
      meterName: 'gpt-4o input tokens',
      serviceName: 'Cognitive Services',
      sourceRowCount: 1,
      ...categorizeMeter('gpt-4o input tokens')
    },
    members
  };
}

export function allocationDraft(overrides: Partial<AllocationDraft> = {}): AllocationDraft {
  const deviceId = overrides.deviceId ?? 'pos-01';
  const storeNumber = overrides.storeNumber ?? 'store-101';
  return {
    windowStartUtc: MONDAY_10_UTC,
    resourceId: 'retail-openai',
    deviceId,
    storeNumber,
    deviceStoreKey: `${deviceId}_${storeNumber}`,
    allocatedCost: 6,
    totalCost: 10,
    allocationMethod: 'proportional',
    tokensUsed: 600,
    apiCalls: 3,
    avgResponseTimeMs: 200,
    tokenShare: 0.6,
    apiCallShare: 0.75,
    costType: 'Input Tokens',
    modelFamily: 'GPT-4o',
    meterName: 'gpt-4o input tokens',
    currency: 'USD',
    ...overrides
  };
}

export function allocatedRecord(overrides: Partial<AllocationDraft> = {}): AllocatedRecord {
  return enrich(allocationDraft(overrides));
}

export function allocationRun(overrides: Partial<AllocationRun> = {}): AllocationRun {
  return {
    runId: 'run-1',
    startedAtUtc: '2025-03-03T11:00:00.000Z',
    completedAtUtc: '2025-03-03T11:00:01.000Z',
    status: 'ok',
    allocationMethod: 'proportional',
    telemetryCount: 0,
    costCount: 0,
    allocatedCount: 0,
    totalCost: 0,
    allocatedCost: 0,
    conservationViolations: 0,
    rejectedRecords: 0,
    errorMessage: null,
    ...overrides
  };
}

/** Telemetry events spaced one minute apart inside the given hour. */
export function eventsInHour(hourStartUtc: string, count: number, overrides: Partial<TelemetryEvent> = {}): TelemetryEvent[] {
  const startMs = new Date(hourStartUtc).getTime();
  return Array.from({ length: count }, (_, index) =>
    telemetryEvent({ ...overrides, timestamp: new Date(startMs + index * 60_000).toISOString() })
  );
}
