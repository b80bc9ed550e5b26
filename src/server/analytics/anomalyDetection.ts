import type { AnomalyRecord, DeviceUsagePattern, TelemetryEvent } from '../../shared/costAllocation.js';
import { groupKey } from '../engine/windower.js';
import { logger } from '../observability/logger.js';
import { distinctClockHours, groupByDeviceStore } from './usagePatterns.js';

export interface AnomalyThresholds {
  deviationThreshold: number;
  highSeverityThreshold: number;
}

export function deviationRatio(current: number, expected: number): number {
  return Math.abs(current - expected) / Math.max(expected, 1);
}

export function detectAnomalies(
  current: TelemetryEvent[],
  patterns: DeviceUsagePattern[],
  { deviationThreshold, highSeverityThreshold }: AnomalyThresholds
): AnomalyRecord[] {
  const patternsByKey = new Map(patterns.map((pattern) => [groupKey(pattern.deviceId, pattern.storeNumber), pattern]));
  const anomalies: AnomalyRecord[] = [];

  groupByDeviceStore(current).forEach((events, key) => {
    const pattern = patternsByKey.get(key);
    if (!pattern) {
      return;
    }

    const clockHours = Math.max(distinctClockHours(events), 1);
    const currentTokensPerHour = events.reduce((sum, event) => sum + event.tokensUsed, 0) / clockHours;
    const currentCallsPerHour = events.length / clockHours;
    const tokenDeviationRatio = deviationRatio(currentTokensPerHour, pattern.avgTokensPerHour);
    const callDeviationRatio = deviationRatio(currentCallsPerHour, pattern.avgApiCallsPerHour);

    if (tokenDeviationRatio < deviationThreshold && callDeviationRatio < deviationThreshold) {
      return;
    }

    anomalies.push({
      deviceId: pattern.deviceId,
      storeNumber: pattern.storeNumber,
      anomalyType: currentTokensPerHour > pattern.avgTokensPerHour ? 'spike' : 'drop',
      tokenDeviationRatio,
      callDeviationRatio,
      currentTokensPerHour,
      expectedTokensPerHour: pattern.avgTokensPerHour,
      severity: Math.max(tokenDeviationRatio, callDeviationRatio) > highSeverityThreshold ? 'high' : 'medium'
    });
  });

  logger.info('usage_anomalies_detected', { devices: patterns.length, anomalies: anomalies.length });
  return anomalies;
}
