import type {
  AllocationDraft,
  AllocationMethod,
  ConservationCheck,
  JoinedGroup,
  TelemetryAggregate
} from '../../shared/costAllocation.js';

interface GroupTotals {
  totalTokens: number;
  totalApiCalls: number;
  memberCount: number;
}

type ShareFunction = (member: TelemetryAggregate, totals: GroupTotals) => number;

const equalShare: ShareFunction = (_member, totals) => (totals.memberCount > 0 ? 1 / totals.memberCount : 0);

// The equal fallback is decided per member: one zero-token member falls back to 1/N
// while its peers keep their proportional share.
const tokenShare: ShareFunction = (member, totals) =>
  totals.totalTokens > 0 && member.totalTokens > 0 ? member.totalTokens / totals.totalTokens : equalShare(member, totals);

const callShare: ShareFunction = (member, totals) =>
  totals.totalApiCalls > 0 && member.apiCallCount > 0
    ? member.apiCallCount / totals.totalApiCalls
    : equalShare(member, totals);

const SHARE_FUNCTIONS: Record<AllocationMethod, ShareFunction> = {
  equal: equalShare,
  proportional: tokenShare,
  'token-based': tokenShare,
  'usage-based': callShare
};

function totalsOf(members: TelemetryAggregate[]): GroupTotals {
  return {
    totalTokens: members.reduce((sum, member) => sum + member.totalTokens, 0),
    totalApiCalls: members.reduce((sum, member) => sum + member.apiCallCount, 0),
    memberCount: members.length
  };
}

export function allocate(group: JoinedGroup, method: AllocationMethod): AllocationDraft[] {
  const totals = totalsOf(group.members);
  const totalCost = group.cost.cost;
  const shareOf = SHARE_FUNCTIONS[method];

  return group.members.map((member) => ({
    windowStartUtc: group.windowStartUtc,
    resourceId: group.resourceId,
    deviceId: member.deviceId,
    storeNumber: member.storeNumber,
    deviceStoreKey: `${member.deviceId}_${member.storeNumber}`,
    allocatedCost: totalCost > 0 ? shareOf(member, totals) * totalCost : 0,
    totalCost,
    allocationMethod: method,
    tokensUsed: member.totalTokens,
    apiCalls: member.apiCallCount,
    avgResponseTimeMs: member.avgResponseTimeMs,
    tokenShare: totals.totalTokens > 0 ? member.totalTokens / totals.totalTokens : 0,
    apiCallShare: totals.totalApiCalls > 0 ? member.apiCallCount / totals.totalApiCalls : 0,
    costType: group.cost.costType,
    modelFamily: group.cost.modelFamily,
    meterName: group.cost.meterName,
    currency: group.cost.currency
  }));
}

export function conservationVariance(totalCost: number, allocatedCost: number): number {
  if (totalCost === 0) {
    return allocatedCost === 0 ? 0 : Number.POSITIVE_INFINITY;
  }
  return Math.abs(totalCost - allocatedCost) / Math.abs(totalCost);
}

export function validateConservation(totalCost: number, allocatedCost: number, tolerance = 0.01): boolean {
  return conservationVariance(totalCost, allocatedCost) <= tolerance;
}

export function checkGroupConservation(
  group: JoinedGroup,
  drafts: AllocationDraft[],
  tolerance: number
): ConservationCheck {
  // A non-positive bill allocates nothing, so the expected sum is zero.
  const totalCost = Math.max(group.cost.cost, 0);
  const allocatedCost = drafts.reduce((sum, draft) => sum + draft.allocatedCost, 0);
  const variance = conservationVariance(totalCost, allocatedCost);

  return {
    windowStartUtc: group.windowStartUtc,
    resourceId: group.resourceId,
    totalCost,
    allocatedCost,
    variance,
    valid: variance <= tolerance
  };
}
