import type { CostEvent, DecayWeightedRecord, TelemetryEvent } from '../../shared/costAllocation.js';
import { normalizeResourceId } from '../engine/normalizer.js';
import { floorToWindow, groupKey, HOUR_MS, toMillis } from '../engine/windower.js';
import { logger } from '../observability/logger.js';

export interface DecayWeightingOptions {
  decayHours: number;
  referenceTime?: Date;
}

interface WeightedTelemetry {
  windowStartUtc: string;
  resourceId: string;
  deviceId: string;
  storeNumber: string;
  weightedTokens: number;
  weightedApiCalls: number;
  telemetryWeight: number;
  latestMs: number;
}

interface WeightedCost {
  weightedCost: number;
  weightedUsage: number;
  costWeight: number;
}

/** exp(-Δt / decayHours), with Δt in hours measured back from the reference time. */
export function decayWeight(timestampMs: number, referenceMs: number, decayHours: number): number {
  const ageHours = Math.max(referenceMs - timestampMs, 0) / HOUR_MS;
  return Math.exp(-ageHours / decayHours);
}

export function decayWeightedCorrelation(
  telemetry: TelemetryEvent[],
  costs: CostEvent[],
  { decayHours, referenceTime = new Date() }: DecayWeightingOptions
): DecayWeightedRecord[] {
  if (!telemetry.length || !costs.length) {
    return [];
  }

  const referenceMs = referenceTime.getTime();
  const members = new Map<string, WeightedTelemetry>();
  const weightedCosts = new Map<string, WeightedCost>();

  telemetry.forEach((event) => {
    const timestampMs = toMillis(event.timestamp);
    const weight = decayWeight(timestampMs, referenceMs, decayHours);
    const windowStartUtc = floorToWindow(event.timestamp, HOUR_MS);
    const resourceId = normalizeResourceId(event.resourceId);
    const key = groupKey(windowStartUtc, resourceId, event.deviceId, event.storeNumber);
    const current = members.get(key) ?? {
      windowStartUtc,
      resourceId,
      deviceId: event.deviceId,
      storeNumber: event.storeNumber,
      weightedTokens: 0,
      weightedApiCalls: 0,
      telemetryWeight: 0,
      latestMs: timestampMs
    };

    current.weightedTokens += event.tokensUsed * weight;
    current.weightedApiCalls += weight;
    current.telemetryWeight += weight;
    current.latestMs = Math.max(current.latestMs, timestampMs);
    members.set(key, current);
  });

  costs.forEach((event) => {
    const weight = decayWeight(toMillis(event.usageTimestamp), referenceMs, decayHours);
    const key = groupKey(floorToWindow(event.usageTimestamp, HOUR_MS), normalizeResourceId(event.resourceId));
    const current = weightedCosts.get(key) ?? { weightedCost: 0, weightedUsage: 0, costWeight: 0 };
    current.weightedCost += event.cost * weight;
    current.weightedUsage += event.usageQuantity * weight;
    current.costWeight += weight;
    weightedCosts.set(key, current);
  });

  const groups = new Map<string, WeightedTelemetry[]>();
  members.forEach((member) => {
    const key = groupKey(member.windowStartUtc, member.resourceId);
    if (weightedCosts.has(key)) {
      groups.set(key, [...(groups.get(key) ?? []), member]);
    }
  });

  const records: DecayWeightedRecord[] = [];
  groups.forEach((groupMembers, key) => {
    const cost = weightedCosts.get(key);
    if (!cost) {
      return;
    }
    const tokenTotal = groupMembers.reduce((sum, member) => sum + member.weightedTokens, 0);

    groupMembers.forEach(({ latestMs, ...member }) => {
      const weightedShare = tokenTotal > 0 ? member.weightedTokens / tokenTotal : 1 / groupMembers.length;
      records.push({
        ...member,
        ...cost,
        weightedShare,
        allocatedWeightedCost: weightedShare * cost.weightedCost,
        latestTimestamp: new Date(latestMs).toISOString()
      });
    });
  });

  logger.info('decay_weighted_correlation_complete', { decayHours, records: records.length });

  return records.sort(
    (left, right) =>
      left.windowStartUtc.localeCompare(right.windowStartUtc) ||
      left.resourceId.localeCompare(right.resourceId) ||
      left.deviceId.localeCompare(right.deviceId) ||
      left.storeNumber.localeCompare(right.storeNumber)
  );
}
