import {
  UNKNOWN_ATTRIBUTION,
  type AllocatedRecord,
  type AllocationDraft,
  type AllocationMethod,
  type ShiftCategory
} from '../../shared/costAllocation.js';

const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

type AttributedDraft = AllocationDraft & Pick<AllocatedRecord, 'isUnknownDevice' | 'isUnknownStore' | 'hasCompleteAttribution'>;

interface ScoreFactor {
  applies: (record: AttributedDraft) => boolean;
  factor: number;
}

// Applied in order; clamping happens once, after the last factor.
const CONFIDENCE_FACTORS: ScoreFactor[] = [
  { applies: (record) => record.isUnknownDevice, factor: 0.6 },
  { applies: (record) => record.isUnknownStore, factor: 0.8 },
  { applies: (record) => record.tokensUsed === 0, factor: 0.5 },
  { applies: (record) => record.hasCompleteAttribution, factor: 1.1 },
  { applies: (record) => record.tokensUsed > 100, factor: 1.05 }
];

const ACCURACY_FACTORS: ScoreFactor[] = [
  { applies: (record) => record.isUnknownDevice, factor: 0.7 },
  { applies: (record) => record.isUnknownStore, factor: 0.9 }
];

function applyFactors(start: number, factors: ScoreFactor[], record: AttributedDraft): number {
  return factors.reduce((score, { applies, factor }) => (applies(record) ? score * factor : score), start);
}

export function shiftCategoryOf(hour: number): ShiftCategory {
  if (hour >= 6 && hour < 14) {
    return 'Morning';
  }
  if (hour >= 14 && hour < 22) {
    return 'Evening';
  }
  return 'Night';
}

export function correlationConfidence(record: AttributedDraft): number {
  return Math.min(applyFactors(1, CONFIDENCE_FACTORS, record), 1);
}

function accuracyBase(method: AllocationMethod, tokensUsed: number): number {
  switch (method) {
    case 'token-based':
      return tokensUsed > 0 ? 0.95 : 1;
    case 'proportional':
      return 0.9;
    case 'usage-based':
      return 0.8;
    case 'equal':
      return 0.7;
  }
}

export function allocationAccuracy(record: AttributedDraft, method: AllocationMethod): number {
  return applyFactors(accuracyBase(method, record.tokensUsed), ACCURACY_FACTORS, record);
}

export function utilizationScore(apiCalls: number, tokensUsed: number): number {
  const callFactor = Math.min(apiCalls / 10, 1);
  const tokenFactor = Math.min(tokensUsed / 1000, 1);
  return (callFactor + tokenFactor) / 2;
}

export function enrich(draft: AllocationDraft, method: AllocationMethod = draft.allocationMethod): AllocatedRecord {
  const isUnknownDevice = draft.deviceId === UNKNOWN_ATTRIBUTION;
  const isUnknownStore = draft.storeNumber === UNKNOWN_ATTRIBUTION;
  const attributed: AttributedDraft = {
    ...draft,
    isUnknownDevice,
    isUnknownStore,
    hasCompleteAttribution: !(isUnknownDevice || isUnknownStore)
  };

  const windowStart = new Date(draft.windowStartUtc);
  const hour = windowStart.getUTCHours();
  const weekday = windowStart.getUTCDay();

  return {
    ...attributed,
    costPerToken: draft.tokensUsed > 0 ? draft.allocatedCost / draft.tokensUsed : 0,
    costPerApiCall: draft.apiCalls > 0 ? draft.allocatedCost / draft.apiCalls : 0,
    hour,
    dayOfWeek: DAY_NAMES[weekday] ?? 'Unknown',
    isBusinessHours: hour >= 9 && hour <= 17,
    isWeekday: weekday >= 1 && weekday <= 5,
    shiftCategory: shiftCategoryOf(hour),
    confidence: correlationConfidence(attributed),
    accuracy: allocationAccuracy(attributed, method),
    utilization: utilizationScore(draft.apiCalls, draft.tokensUsed)
  };
}
