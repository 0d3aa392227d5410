import { AllocationCandidate } from "../models/AssetClass";
import { RiskBand } from "../models/FinancialMetrics";
import { getRiskBand } from "./metrics";
import { getHorizonBand, HorizonBand } from "../utils/time";

/**
 * Fixed allocation per risk band and horizon band.
 *
 * Each cell sums to 100. Low and medium cells stay within the conservative
 * ceilings and high cells within the moderate ceilings, which covers every tier
 * whose risk scores can land in that band (a conservative profile scores at most 38.5).
 */
export const FALLBACK_ALLOCATIONS: Readonly<Record<RiskBand, Readonly<Record<HorizonBand, Readonly<AllocationCandidate>>>>> = {
  low: {
    short: { equities: 15, bonds: 45, realEstate: 5, cashEquivalents: 35, alternatives: 0 },
    medium: { equities: 30, bonds: 45, realEstate: 10, cashEquivalents: 10, alternatives: 5 },
    long: { equities: 40, bonds: 40, realEstate: 10, cashEquivalents: 5, alternatives: 5 },
  },
  medium: {
    short: { equities: 25, bonds: 45, realEstate: 10, cashEquivalents: 15, alternatives: 5 },
    medium: { equities: 45, bonds: 35, realEstate: 10, cashEquivalents: 5, alternatives: 5 },
    long: { equities: 50, bonds: 30, realEstate: 10, cashEquivalents: 5, alternatives: 5 },
  },
  high: {
    short: { equities: 40, bonds: 35, realEstate: 10, cashEquivalents: 10, alternatives: 5 },
    medium: { equities: 60, bonds: 20, realEstate: 10, cashEquivalents: 5, alternatives: 5 },
    long: { equities: 75, bonds: 10, realEstate: 7, cashEquivalents: 3, alternatives: 5 },
  },
};

export interface FallbackAllocation {
  allocation: AllocationCandidate;
  riskBand: RiskBand;
  horizonBand: HorizonBand;
}

/**
 * Look up the rule-based allocation for a risk score and horizon.
 * Deterministic and independent of the completion service; returns a fresh copy.
 */
export function getFallbackAllocation(riskScore: number, horizonYears: number): FallbackAllocation {
  const riskBand = getRiskBand(riskScore);
  const horizonBand = getHorizonBand(horizonYears);
  return {
    allocation: { ...FALLBACK_ALLOCATIONS[riskBand][horizonBand] },
    riskBand,
    horizonBand,
  };
}
