export const UNKNOWN_ATTRIBUTION = 'unknown';

export const ALLOCATION_METHODS = ['equal', 'proportional', 'usage-based', 'token-based'] as const;
export type AllocationMethod = (typeof ALLOCATION_METHODS)[number];

export type ShiftCategory = 'Morning' | 'Evening' | 'Night';
export type RunStatus = 'ok' | 'skipped' | 'error';

export interface TimeRange {
  start: string;
  end: string;
}

export interface TelemetryEvent {
  timestamp: string;
  deviceId: string;
  storeNumber: string;
  resourceId: string;
  tokensUsed: number;
  statusCode: number;
  responseTimeMs: number;
}

export interface CostEvent {
  resourceId: string;
  usageTimestamp: string;
  cost: number;
  usageQuantity: number;
  currency: string;
  meterName: string;
  serviceName: string;
}

export interface MeterCategory {
  costType: string;
  modelFamily: string;
  isTokenBased: boolean;
}

export interface TelemetryAggregate {
  windowStartUtc: string;
  resourceId: string;
  deviceId: string;
  storeNumber: string;
  totalTokens: number;
  apiCallCount: number;
  avgResponseTimeMs: number;
}

export interface CostWindowRecord extends MeterCategory {
  windowStartUtc: string;
  resourceId: string;
  cost: number;
  usageQuantity: number;
  currency: string;
  meterName: string;
  serviceName: string;
  sourceRowCount: number;
}

export interface JoinedGroup {
  windowStartUtc: string;
  resourceId: string;
  cost: CostWindowRecord;
  members: TelemetryAggregate[];
}

export interface AllocationDraft {
  windowStartUtc: string;
  resourceId: string;
  deviceId: string;
  storeNumber: string;
  deviceStoreKey: string;
  allocatedCost: number;
  totalCost: number;
  allocationMethod: AllocationMethod;
  tokensUsed: number;
  apiCalls: number;
  avgResponseTimeMs: number;
  tokenShare: number;
  apiCallShare: number;
  costType: string;
  modelFamily: string;
  meterName: string;
  currency: string;
}

export interface AllocatedRecord extends AllocationDraft {
  isUnknownDevice: boolean;
  isUnknownStore: boolean;
  hasCompleteAttribution: boolean;
  costPerToken: number;
  costPerApiCall: number;
  hour: number;
  dayOfWeek: string;
  isBusinessHours: boolean;
  isWeekday: boolean;
  shiftCategory: ShiftCategory;
  confidence: number;
  accuracy: number;
  utilization: number;
}

export interface ConservationCheck {
  windowStartUtc: string;
  resourceId: string;
  totalCost: number;
  allocatedCost: number;
  variance: number;
  valid: boolean;
}

export interface DeviceUsagePattern {
  deviceId: string;
  storeNumber: string;
  avgTokensPerHour: number;
  avgApiCallsPerHour: number;
  peakHours: number[];
  usageConsistencyScore: number;
  costEfficiencyScore: number;
}

export interface AnomalyRecord {
  deviceId: string;
  storeNumber: string;
  anomalyType: 'spike' | 'drop';
  tokenDeviationRatio: number;
  callDeviationRatio: number;
  currentTokensPerHour: number;
  expectedTokensPerHour: number;
  severity: 'medium' | 'high';
}

export interface CostPrediction {
  deviceId: string;
  storeNumber: string;
  predictedCost: number;
  basis: 'tokens' | 'calls' | 'historical-average';
}

export interface SpilloverPair {
  deviceA: string;
  deviceB: string;
  correlation: number;
  relationship: 'positive' | 'negative';
}

export interface SpilloverReport {
  storeNumber: string;
  deviceCount: number;
  pairs: SpilloverPair[];
  totalStoreCost: number;
  avgDeviceCost: number;
}

export interface AllocationMethodRecommendation {
  method: AllocationMethod;
  reason: string;
  stats: {
    unknownDeviceRatio: number;
    tokenCoefficientOfVariation: number;
    callCoefficientOfVariation: number;
    distinctDevices: number;
  };
}

export interface DecayWeightedRecord {
  windowStartUtc: string;
  resourceId: string;
  deviceId: string;
  storeNumber: string;
  weightedTokens: number;
  weightedApiCalls: number;
  telemetryWeight: number;
  weightedCost: number;
  weightedUsage: number;
  costWeight: number;
  weightedShare: number;
  allocatedWeightedCost: number;
  latestTimestamp: string;
}

export interface AllocationSummary {
  totalRecords: number;
  totalAllocatedCost: number;
  uniqueDevices: number;
  uniqueStores: number;
  uniqueDeviceStoreCombinations: number;
  unknownDevicePercentage: number;
  unknownStorePercentage: number;
  avgConfidence: number;
  avgAccuracy: number;
  avgUtilization: number;
  allocationMethod: AllocationMethod;
  costByDevice: Record<string, number>;
  costByStore: Record<string, number>;
  costByModel: Record<string, number>;
  costByShift: Record<string, number>;
  topDevicesByCost: Array<{ deviceId: string; cost: number }>;
  topStoresByCost: Array<{ storeNumber: string; cost: number }>;
}

export interface DevicePerformance {
  deviceId: string;
  storeNumber: string;
  records: number;
  totalCost: number;
  meanCost: number;
  totalTokens: number;
  meanTokens: number;
  totalApiCalls: number;
  meanApiCalls: number;
  meanResponseTimeMs: number;
  meanUtilization: number;
}

export interface StorePerformance {
  storeNumber: string;
  records: number;
  totalCost: number;
  meanCost: number;
  totalTokens: number;
  totalApiCalls: number;
  distinctDevices: number;
  meanUtilization: number;
}

export interface DeviceAnalytics {
  devices: DevicePerformance[];
  stores: StorePerformance[];
  costByShift: Record<string, number>;
  businessHoursSplit: {
    businessHours: number;
    nonBusinessHours: number;
  };
}

export interface AllocationRun {
  runId: string;
  startedAtUtc: string;
  completedAtUtc: string | null;
  status: RunStatus;
  allocationMethod: AllocationMethod;
  telemetryCount: number;
  costCount: number;
  allocatedCount: number;
  totalCost: number;
  allocatedCost: number;
  conservationViolations: number;
  rejectedRecords: number;
  errorMessage: string | null;
}
