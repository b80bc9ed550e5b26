import {
  UNKNOWN_ATTRIBUTION,
  type AllocationMethod,
  type AllocationMethodRecommendation,
  type CostEvent,
  type TelemetryEvent
} from '../../shared/costAllocation.js';
import { logger } from '../observability/logger.js';
import { coefficientOfVariation } from './statistics.js';
import { groupByDeviceStore } from './usagePatterns.js';

type SelectionStats = AllocationMethodRecommendation['stats'];

interface SelectionRule {
  applies: (stats: SelectionStats) => boolean;
  method: AllocationMethod;
  reason: string;
}

// First match wins.
const SELECTION_RULES: SelectionRule[] = [
  { applies: (stats) => stats.unknownDeviceRatio > 0.5, method: 'equal', reason: 'High ratio of unknown devices' },
  {
    applies: (stats) => stats.tokenCoefficientOfVariation > 2,
    method: 'token-based',
    reason: 'High token usage variance between devices'
  },
  {
    applies: (stats) => stats.callCoefficientOfVariation > 1.5,
    method: 'usage-based',
    reason: 'High API call variance between devices'
  },
  {
    applies: (stats) => stats.distinctDevices > 10,
    method: 'proportional',
    reason: 'Large number of devices with moderate variance'
  }
];

export function recommendAllocationMethod(
  telemetry: TelemetryEvent[],
  costs: CostEvent[]
): AllocationMethodRecommendation {
  if (!telemetry.length || !costs.length) {
    return {
      method: 'equal',
      reason: 'No telemetry or cost data',
      stats: { unknownDeviceRatio: 0, tokenCoefficientOfVariation: 0, callCoefficientOfVariation: 0, distinctDevices: 0 }
    };
  }

  const stats: SelectionStats = {
    unknownDeviceRatio: telemetry.filter((event) => event.deviceId === UNKNOWN_ATTRIBUTION).length / telemetry.length,
    // Zero when mean usage is zero, so an all-zero batch never selects token-based.
    tokenCoefficientOfVariation: coefficientOfVariation(telemetry.map((event) => event.tokensUsed)),
    callCoefficientOfVariation: coefficientOfVariation(
      [...groupByDeviceStore(telemetry).values()].map((events) => events.length)
    ),
    distinctDevices: new Set(telemetry.map((event) => event.deviceId)).size
  };

  const rule = SELECTION_RULES.find((candidate) => candidate.applies(stats));
  const recommendation = {
    method: rule?.method ?? 'proportional',
    reason: rule?.reason ?? 'Balanced usage patterns',
    stats
  };

  logger.info('allocation_method_recommended', { method: recommendation.method, reason: recommendation.reason, ...stats });
  return recommendation;
}
