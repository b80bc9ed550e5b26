import {
  UNKNOWN_ATTRIBUTION,
  type AllocatedRecord,
  type AllocationMethod,
  type AllocationSummary,
  type DeviceAnalytics,
  type DevicePerformance,
  type StorePerformance
} from '../../shared/costAllocation.js';

const TOP_N = 10;

function sumBy<T>(items: T[], pick: (item: T) => number): number {
  return items.reduce((sum, item) => sum + pick(item), 0);
}

function meanBy<T>(items: T[], pick: (item: T) => number): number {
  return items.length ? sumBy(items, pick) / items.length : 0;
}

function costBy(records: AllocatedRecord[], keyOf: (record: AllocatedRecord) => string): Record<string, number> {
  return records.reduce<Record<string, number>>((totals, record) => {
    const key = keyOf(record);
    totals[key] = (totals[key] ?? 0) + record.allocatedCost;
    return totals;
  }, {});
}

function groupBy<T>(items: T[], keyOf: (item: T) => string): Map<string, T[]> {
  const grouped = new Map<string, T[]>();
  items.forEach((item) => {
    const key = keyOf(item);
    grouped.set(key, [...(grouped.get(key) ?? []), item]);
  });
  return grouped;
}

function topByCost(totals: Record<string, number>): Array<[string, number]> {
  return Object.entries(totals)
    .sort(([leftKey, left], [rightKey, right]) => right - left || leftKey.localeCompare(rightKey))
    .slice(0, TOP_N);
}

export function summarizeAllocations(records: AllocatedRecord[], method: AllocationMethod): AllocationSummary {
  const costByDevice = costBy(records, (record) => record.deviceId);
  const costByStore = costBy(records, (record) => record.storeNumber);
  const percentage = (count: number): number => (records.length ? (count / records.length) * 100 : 0);

  return {
    totalRecords: records.length,
    totalAllocatedCost: sumBy(records, (record) => record.allocatedCost),
    uniqueDevices: new Set(records.map((record) => record.deviceId)).size,
    uniqueStores: new Set(records.map((record) => record.storeNumber)).size,
    uniqueDeviceStoreCombinations: new Set(records.map((record) => record.deviceStoreKey)).size,
    unknownDevicePercentage: percentage(records.filter((record) => record.deviceId === UNKNOWN_ATTRIBUTION).length),
    unknownStorePercentage: percentage(records.filter((record) => record.storeNumber === UNKNOWN_ATTRIBUTION).length),
    avgConfidence: meanBy(records, (record) => record.confidence),
    avgAccuracy: meanBy(records, (record) => record.accuracy),
    avgUtilization: meanBy(records, (record) => record.utilization),
    allocationMethod: method,
    costByDevice,
    costByStore,
    costByModel: costBy(records, (record) => record.modelFamily),
    costByShift: costBy(records, (record) => record.shiftCategory),
    topDevicesByCost: topByCost(costByDevice).map(([deviceId, cost]) => ({ deviceId, cost })),
    topStoresByCost: topByCost(costByStore).map(([storeNumber, cost]) => ({ storeNumber, cost }))
  };
}

function devicePerformance(deviceId: string, records: AllocatedRecord[]): DevicePerformance {
  return {
    deviceId,
    // A device reporting from several stores is listed under the first one seen.
    storeNumber: records[0]?.storeNumber ?? UNKNOWN_ATTRIBUTION,
    records: records.length,
    totalCost: sumBy(records, (record) => record.allocatedCost),
    meanCost: meanBy(records, (record) => record.allocatedCost),
    totalTokens: sumBy(records, (record) => record.tokensUsed),
    meanTokens: meanBy(records, (record) => record.tokensUsed),
    totalApiCalls: sumBy(records, (record) => record.apiCalls),
    meanApiCalls: meanBy(records, (record) => record.apiCalls),
    meanResponseTimeMs: meanBy(records, (record) => record.avgResponseTimeMs),
    meanUtilization: meanBy(records, (record) => record.utilization)
  };
}

function storePerformance(storeNumber: string, records: AllocatedRecord[]): StorePerformance {
  return {
    storeNumber,
    records: records.length,
    totalCost: sumBy(records, (record) => record.allocatedCost),
    meanCost: meanBy(records, (record) => record.allocatedCost),
    totalTokens: sumBy(records, (record) => record.tokensUsed),
    totalApiCalls: sumBy(records, (record) => record.apiCalls),
    distinctDevices: new Set(records.map((record) => record.deviceId)).size,
    meanUtilization: meanBy(records, (record) => record.utilization)
  };
}

export function analyzeDevices(records: AllocatedRecord[]): DeviceAnalytics {
  const devices = [...groupBy(records, (record) => record.deviceId)]
    .map(([deviceId, deviceRecords]) => devicePerformance(deviceId, deviceRecords))
    .sort((left, right) => right.totalCost - left.totalCost || left.deviceId.localeCompare(right.deviceId));

  const stores = [...groupBy(records, (record) => record.storeNumber)]
    .map(([storeNumber, storeRecords]) => storePerformance(storeNumber, storeRecords))
    .sort((left, right) => right.totalCost - left.totalCost || left.storeNumber.localeCompare(right.storeNumber));

  const businessHours = sumBy(
    records.filter((record) => record.isBusinessHours),
    (record) => record.allocatedCost
  );

  return {
    devices,
    stores,
    costByShift: costBy(records, (record) => record.shiftCategory),
    businessHoursSplit: {
      businessHours,
      nonBusinessHours: sumBy(records, (record) => record.allocatedCost) - businessHours
    }
  };
}
