import { AllocationCandidate } from "./AssetClass";
import { FinancialMetrics, RiskLevel } from "./FinancialMetrics";
import { GoalCategory, GoalRecord } from "./Goal";

/**
 * Portfolio recommendation data structures
 */

export type Provenance = "ai-generated" | "fallback-rule-based";

/**
 * Breakdowns of the top-level allocation. Every value is a percentage of the whole
 * portfolio, so each group sums to its parent asset class weight.
 */
export interface SubAllocations {
  readonly equityStyle: {
    readonly largeCap: number;
    readonly midCap: number;
    readonly smallCap: number;
  };
  readonly equityGeography: {
    readonly domestic: number;
    readonly international: number;
  };
  readonly bonds: {
    readonly government: number;
    readonly corporate: number;
  };
}

/**
 * Value of investing the monthly capacity at the expected return for the horizon.
 */
export interface Projection {
  readonly horizonYears: number;
  readonly monthlyContribution: number;
  readonly totalContributed: number;
  readonly nominalValue: number;
  readonly inflationAdjustedValue: number;
}

/**
 * Savings plan for one goal: how long to save and how much to put in each month.
 */
export interface GoalPlan {
  readonly category: Extract<GoalCategory, "retirement" | "home" | "education">;
  readonly goal: string;
  readonly rawText: string;
  readonly timelineYears: number;
  readonly monthlyInvestment: number;
  readonly strategy: string;
}

export interface Portfolio {
  readonly allocation: Readonly<AllocationCandidate>;
  readonly subAllocations: SubAllocations;
  readonly expectedAnnualReturnPct: number;
  readonly projection: Projection;
  readonly rationale: string;
  readonly nextSteps: readonly string[];
  readonly goalPlans: readonly GoalPlan[];
  readonly riskLevel: RiskLevel;
  readonly provenance: Provenance;
  readonly metrics: FinancialMetrics;
  readonly goals: readonly Readonly<GoalRecord>[];
  readonly generatedAt: string;
}
