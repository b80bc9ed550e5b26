import type { CostEvent, CostWindowRecord, TelemetryAggregate, TelemetryEvent } from '../../shared/costAllocation.js';
import { categorizeMeter, normalizeResourceId } from './normalizer.js';

export const HOUR_MS = 60 * 60 * 1000;

export function toMillis(value: string): number {
  return new Date(value).getTime();
}

export function windowWidthMs(windowMinutes: number): number {
  return windowMinutes * 60 * 1000;
}

export function floorToWindow(timestamp: string, widthMs: number): string {
  const ms = toMillis(timestamp);
  return new Date(Math.floor(ms / widthMs) * widthMs).toISOString();
}

export function groupKey(...parts: string[]): string {
  return parts.join('\u0000');
}

interface AggregateAccumulator {
  windowStartUtc: string;
  resourceId: string;
  deviceId: string;
  storeNumber: string;
  totalTokens: number;
  apiCallCount: number;
  responseTimeTotal: number;
}

export function aggregateTelemetry(events: TelemetryEvent[], windowMinutes: number): TelemetryAggregate[] {
  const widthMs = windowWidthMs(windowMinutes);
  const grouped = new Map<string, AggregateAccumulator>();

  events.forEach((event) => {
    const windowStartUtc = floorToWindow(event.timestamp, widthMs);
    const resourceId = normalizeResourceId(event.resourceId);
    const key = groupKey(windowStartUtc, resourceId, event.deviceId, event.storeNumber);
    const current = grouped.get(key) ?? {
      windowStartUtc,
      resourceId,
      deviceId: event.deviceId,
      storeNumber: event.storeNumber,
      totalTokens: 0,
      apiCallCount: 0,
      responseTimeTotal: 0
    };

    current.totalTokens += event.tokensUsed;
    current.apiCallCount += 1;
    current.responseTimeTotal += event.responseTimeMs;
    grouped.set(key, current);
  });

  return [...grouped.values()].map(({ responseTimeTotal, ...aggregate }) => ({
    ...aggregate,
    avgResponseTimeMs: aggregate.apiCallCount > 0 ? responseTimeTotal / aggregate.apiCallCount : 0
  }));
}

export function windowCosts(events: CostEvent[], windowMinutes: number): CostWindowRecord[] {
  const widthMs = windowWidthMs(windowMinutes);
  const grouped = new Map<string, CostWindowRecord>();

  events.forEach((event) => {
    const windowStartUtc = floorToWindow(event.usageTimestamp, widthMs);
    const resourceId = normalizeResourceId(event.resourceId);
    const key = groupKey(windowStartUtc, resourceId);
    const existing = grouped.get(key);

    if (existing) {
      existing.cost += event.cost;
      existing.usageQuantity += event.usageQuantity;
      existing.sourceRowCount += 1;
      return;
    }

    grouped.set(key, {
      windowStartUtc,
      resourceId,
      cost: event.cost,
      usageQuantity: event.usageQuantity,
      currency: event.currency,
      meterName: event.meterName,
      serviceName: event.serviceName,
      sourceRowCount: 1,
      ...categorizeMeter(event.meterName)
    });
  });

  return [...grouped.values()];
}
