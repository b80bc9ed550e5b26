import { UNKNOWN_ATTRIBUTION, type DeviceUsagePattern, type TelemetryEvent } from '../../shared/costAllocation.js';
import { floorToWindow, groupKey, HOUR_MS, toMillis } from '../engine/windower.js';
import { logger } from '../observability/logger.js';
import { coefficientOfVariation, quantile } from './statistics.js';

const DAY_MS = 24 * HOUR_MS;
const PEAK_QUANTILE = 0.8;

export interface UsagePatternOptions {
  lookbackDays: number;
  now?: Date;
}

export function groupByDeviceStore<T extends { deviceId: string; storeNumber: string }>(items: T[]): Map<string, T[]> {
  const grouped = new Map<string, T[]>();
  items.forEach((item) => {
    const key = groupKey(item.deviceId, item.storeNumber);
    grouped.set(key, [...(grouped.get(key) ?? []), item]);
  });
  return grouped;
}

export function distinctClockHours(events: TelemetryEvent[]): number {
  return new Set(events.map((event) => floorToWindow(event.timestamp, HOUR_MS))).size;
}

function patternOf(deviceId: string, storeNumber: string, events: TelemetryEvent[]): DeviceUsagePattern {
  const tokensByHourOfDay = new Map<number, number>();
  events.forEach((event) => {
    const hour = new Date(event.timestamp).getUTCHours();
    tokensByHourOfDay.set(hour, (tokensByHourOfDay.get(hour) ?? 0) + event.tokensUsed);
  });

  const hourlyTotals = [...tokensByHourOfDay.values()];
  const peakThreshold = quantile(hourlyTotals, PEAK_QUANTILE);
  const totalTokens = events.reduce((sum, event) => sum + event.tokensUsed, 0);
  const clockHours = Math.max(distinctClockHours(events), 1);

  return {
    deviceId,
    storeNumber,
    avgTokensPerHour: totalTokens / clockHours,
    avgApiCallsPerHour: events.length / clockHours,
    peakHours: [...tokensByHourOfDay.entries()]
      .filter(([, total]) => total >= peakThreshold)
      .map(([hour]) => hour)
      .sort((left, right) => left - right),
    usageConsistencyScore: Math.max(0, 1 - coefficientOfVariation(hourlyTotals)),
    costEfficiencyScore: Math.min(totalTokens / Math.max(events.length, 1) / 1000, 1)
  };
}

export function analyzeUsagePatterns(
  telemetry: TelemetryEvent[],
  { lookbackDays, now = new Date() }: UsagePatternOptions
): DeviceUsagePattern[] {
  const cutoffMs = now.getTime() - lookbackDays * DAY_MS;
  const recent = telemetry.filter((event) => toMillis(event.timestamp) >= cutoffMs);

  const patterns = [...groupByDeviceStore(recent).values()]
    .flatMap((events) => {
      const first = events[0];
      if (!first || first.deviceId === UNKNOWN_ATTRIBUTION || first.storeNumber === UNKNOWN_ATTRIBUTION) {
        return [];
      }
      return [patternOf(first.deviceId, first.storeNumber, events)];
    })
    .sort(
      (left, right) => left.deviceId.localeCompare(right.deviceId) || left.storeNumber.localeCompare(right.storeNumber)
    );

  logger.info('usage_patterns_analyzed', { lookbackDays, events: recent.length, devices: patterns.length });
  return patterns;
}
