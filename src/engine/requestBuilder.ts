import { AllocationCandidate, ASSET_CLASSES, AssetClass } from "../models/AssetClass";
import { FinancialMetrics } from "../models/FinancialMetrics";
import { GoalRecord } from "../models/Goal";
import { RiskTolerance, UserProfile } from "../models/UserProfile";
import { RISK_TIER_CEILINGS } from "../utils/constants";
import { RequestConstructionError } from "../utils/errors";

/**
 * Structured payload handed to the completion service.
 * The provider serializes it as JSON; nothing here depends on the transport.
 */
export interface AllocationRequest {
  task: "portfolio_allocation";
  profile: {
    age: number;
    monthlyIncome: number;
    monthlyExpenses: number;
    monthlyDebtPayment: number;
    savings: number;
    existingInvestments: number;
  };
  metrics: FinancialMetrics;
  riskTolerance: RiskTolerance;
  timeHorizonYears: number;
  goals: Array<{ category: string; priority: number; text: string }>;
  assetClasses: readonly AssetClass[];
  ceilings: AllocationCandidate;
  outputSchema: {
    allocation: Record<AssetClass, string>;
    rationale: string;
    nextSteps: string;
  };
  hardRequirements: string[];
}

export interface AllocationRequestInput {
  profile: UserProfile;
  metrics: FinancialMetrics;
  goals: GoalRecord[];
}

const OUTPUT_WEIGHT_DESCRIPTION = "number[0,100]";

/**
 * Assemble the completion payload from the profile, its metrics and ordered goals.
 * Pure data transformation.
 *
 * @throws RequestConstructionError when a required field is missing
 */
export function buildAllocationRequest(input: AllocationRequestInput): AllocationRequest {
  const { profile, metrics, goals } = input;

  const missing: string[] = [];
  if (!profile) missing.push("profile");
  if (!metrics) missing.push("metrics");
  if (!goals) missing.push("goals");
  if (profile && !profile.riskTolerance) missing.push("profile.riskTolerance");
  if (profile && !(profile.timeHorizonYears > 0)) missing.push("profile.timeHorizonYears");
  if (missing.length > 0) {
    throw new RequestConstructionError(missing);
  }

  return {
    task: "portfolio_allocation",
    profile: {
      age: profile.age,
      monthlyIncome: metrics.totalMonthlyIncome,
      monthlyExpenses: metrics.totalMonthlyExpenses,
      monthlyDebtPayment: metrics.totalMonthlyDebtPayment,
      savings: profile.assets.savings,
      existingInvestments: profile.assets.existingInvestments,
    },
    metrics,
    riskTolerance: profile.riskTolerance,
    timeHorizonYears: profile.timeHorizonYears,
    goals: goals.map((goal) => ({
      category: goal.category,
      priority: goal.priority,
      text: goal.rawText,
    })),
    assetClasses: ASSET_CLASSES,
    ceilings: { ...RISK_TIER_CEILINGS[profile.riskTolerance] },
    outputSchema: {
      allocation: {
        equities: OUTPUT_WEIGHT_DESCRIPTION,
        bonds: OUTPUT_WEIGHT_DESCRIPTION,
        realEstate: OUTPUT_WEIGHT_DESCRIPTION,
        cashEquivalents: OUTPUT_WEIGHT_DESCRIPTION,
        alternatives: OUTPUT_WEIGHT_DESCRIPTION,
      },
      rationale: "string",
      nextSteps: "string[]",
    },
    hardRequirements: [
      "Return one JSON object with an \"allocation\" map, a \"rationale\" and \"nextSteps\".",
      `Use exactly these allocation keys: ${ASSET_CLASSES.join(", ")}.`,
      "Weights are percentages that sum to 100.",
      "Keep every weight at or below its ceiling.",
      "Do not recommend individual securities.",
    ],
  };
}
