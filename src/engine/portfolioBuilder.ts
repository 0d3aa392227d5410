import { AllocationCandidate, ASSET_CLASSES, AssetClass } from "../models/AssetClass";
import { FinancialMetrics } from "../models/FinancialMetrics";
import { getPrimaryGoal, GoalRecord } from "../models/Goal";
import { Portfolio, Projection, Provenance, SubAllocations } from "../models/Portfolio";
import { RiskTolerance } from "../models/UserProfile";
import {
  EMERGENCY_FUND_MONTHS,
  HIGH_DEBT_RATIO,
  HISTORICAL_RETURNS_PCT,
  INFLATION_RATE,
} from "../utils/constants";
import { formatCurrency, formatPercent } from "../utils/format";
import {
  annualToMonthlyReturn,
  futureValueOfAnnuity,
  inflationAdjusted,
  roundTo,
} from "../utils/math";
import { getHorizonBand, yearsToMonths } from "../utils/time";
import { planGoals } from "./goalPlanner";

/** Share (percent) of the equity weight per market-cap style. */
const EQUITY_STYLE_SPLIT: Record<RiskTolerance, [largeCap: number, midCap: number, smallCap: number]> = {
  conservative: [70, 20, 10],
  moderate: [60, 25, 15],
  aggressive: [45, 30, 25],
};

/** Share (percent) of the equity weight invested at home and abroad. */
const EQUITY_GEOGRAPHY_SPLIT: Record<RiskTolerance, [domestic: number, international: number]> = {
  conservative: [85, 15],
  moderate: [75, 25],
  aggressive: [65, 35],
};

/** Share (percent) of the bond weight in government and corporate debt. */
const BOND_SPLIT: Record<RiskTolerance, [government: number, corporate: number]> = {
  conservative: [70, 30],
  moderate: [60, 40],
  aggressive: [50, 50],
};

const ASSET_CLASS_LABELS: Record<AssetClass, string> = {
  equities: "equities",
  bonds: "bonds",
  realEstate: "real estate",
  cashEquivalents: "cash equivalents",
  alternatives: "alternatives",
};

/**
 * Weighted average of long-run historical returns, in percent, to 2 decimals.
 * A 50/30/10/5/5 portfolio earns 5.5 + 1.95 + 0.8 + 0.2 + 0.375 = 8.825 before rounding.
 */
export function calculateExpectedReturn(allocation: AllocationCandidate): number {
  const weighted = ASSET_CLASSES.reduce(
    (total, assetClass) => total + (allocation[assetClass] / 100) * HISTORICAL_RETURNS_PCT[assetClass],
    0
  );
  return roundTo(weighted, 2);
}

/**
 * Split a parent weight by percentage shares. The last part takes the rounding
 * residual so the parts always add back to the parent.
 */
function splitWeight(parent: number, shares: readonly number[]): number[] {
  const parts = shares.slice(0, -1).map((share) => roundTo((parent * share) / 100, 1));
  const assigned = parts.reduce((total, part) => total + part, 0);
  return [...parts, roundTo(parent - assigned, 1)];
}

/**
 * Break equities and bonds down by style, geography and issuer for the risk tier.
 * Values are percentages of the whole portfolio.
 */
export function deriveSubAllocations(
  allocation: AllocationCandidate,
  riskTolerance: RiskTolerance
): SubAllocations {
  const [largeCap, midCap, smallCap] = splitWeight(allocation.equities, EQUITY_STYLE_SPLIT[riskTolerance]);
  const [domestic, international] = splitWeight(allocation.equities, EQUITY_GEOGRAPHY_SPLIT[riskTolerance]);
  const [government, corporate] = splitWeight(allocation.bonds, BOND_SPLIT[riskTolerance]);

  return {
    equityStyle: { largeCap, midCap, smallCap },
    equityGeography: { domestic, international },
    bonds: { government, corporate },
  };
}

/**
 * Project the monthly investment capacity forward at the expected return,
 * compounding monthly, and discount the result for inflation.
 */
export function buildProjection(
  monthlyContribution: number,
  expectedAnnualReturnPct: number,
  horizonYears: number
): Projection {
  const months = yearsToMonths(horizonYears);
  const nominalValue = futureValueOfAnnuity(
    monthlyContribution,
    annualToMonthlyReturn(expectedAnnualReturnPct / 100),
    months
  );

  return {
    horizonYears,
    monthlyContribution,
    totalContributed: Math.round(monthlyContribution * months),
    nominalValue: Math.round(nominalValue),
    inflationAdjustedValue: Math.round(inflationAdjusted(nominalValue, INFLATION_RATE, horizonYears)),
  };
}

function describeAllocation(allocation: AllocationCandidate): string {
  return ASSET_CLASSES.map(
    (assetClass) => `${ASSET_CLASS_LABELS[assetClass]} ${formatPercent(allocation[assetClass])}`
  ).join(", ");
}

/**
 * Explanatory text for an allocation that did not come with its own rationale.
 *
 * @param fallbackReason - Why the AI proposal was not used, when the allocation is rule-based
 */
export function synthesizeRationale(
  allocation: AllocationCandidate,
  metrics: FinancialMetrics,
  horizonYears: number,
  fallbackReason?: string
): string {
  const expectedReturn = calculateExpectedReturn(allocation);
  const sentences = [
    `${metrics.riskLevel} allocation for a risk score of ${metrics.riskScore} ` +
      `(${metrics.riskBand} risk band) over ${horizonYears} years (${getHorizonBand(horizonYears)} horizon).`,
    `Portfolio: ${describeAllocation(allocation)}.`,
    `The expected annual return of ${formatPercent(expectedReturn, 2)} is a weighted average of long-run historical returns per asset class.`,
  ];
  if (fallbackReason !== undefined) {
    sentences.push(`This allocation comes from fixed rules because the AI recommendation was not usable (${fallbackReason}).`);
  }
  return sentences.join(" ");
}

/**
 * Sentence recording that a proposal was changed by constraint repair.
 */
export function describeAdjustment(proposed: AllocationCandidate, riskTolerance: RiskTolerance): string {
  return `The proposed weights (${describeAllocation(proposed)}) were adjusted to fit the ${riskTolerance} risk-tier limits.`;
}

/**
 * Practical actions that follow from the metrics and the highest-priority goal.
 * The annual review is always last.
 */
export function synthesizeNextSteps(metrics: FinancialMetrics, goals: readonly GoalRecord[]): string[] {
  const steps: string[] = [];

  if (metrics.emergencyFundMonths < EMERGENCY_FUND_MONTHS) {
    steps.push(
      `Build an emergency fund of ${formatCurrency(metrics.emergencyFundTarget)} ` +
        `(${EMERGENCY_FUND_MONTHS} months of expenses) before adding to riskier assets.`
    );
  }
  if (metrics.isDebtRatioHigh) {
    steps.push(
      `Bring debt payments below ${Math.round(HIGH_DEBT_RATIO * 100)}% of income, paying off high-interest loans first.`
    );
  }
  if (metrics.investmentCapacity > 0) {
    steps.push(`Invest ${formatCurrency(metrics.investmentCapacity)} each month according to this allocation.`);
  } else {
    steps.push("Free up monthly cash flow before starting regular investments; expenses and debt payments use all income.");
  }

  const primaryGoal = getPrimaryGoal([...goals]);
  if (primaryGoal && primaryGoal.category !== "other") {
    steps.push(`Direct new savings to your highest-priority goal first: "${primaryGoal.rawText}".`);
  }

  steps.push("Review and rebalance the portfolio once a year.");
  return steps;
}

export interface PortfolioInput {
  allocation: AllocationCandidate;
  provenance: Provenance;
  riskTolerance: RiskTolerance;
  horizonYears: number;
  age: number;
  metrics: FinancialMetrics;
  goals: readonly GoalRecord[];
  rationale: string;
  nextSteps: readonly string[];
  generatedAt?: Date;
}

function deepFreeze<T extends object>(value: T): T {
  const nested: unknown[] = Object.values(value);
  for (const child of nested) {
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
  return value;
}

/**
 * Assemble the immutable portfolio returned to the caller.
 * The allocation must already satisfy the portfolio invariants.
 */
export function buildPortfolio(input: PortfolioInput): Portfolio {
  const expectedAnnualReturnPct = calculateExpectedReturn(input.allocation);

  return deepFreeze({
    allocation: { ...input.allocation },
    subAllocations: deriveSubAllocations(input.allocation, input.riskTolerance),
    expectedAnnualReturnPct,
    projection: buildProjection(input.metrics.investmentCapacity, expectedAnnualReturnPct, input.horizonYears),
    rationale: input.rationale,
    nextSteps: [...input.nextSteps],
    goalPlans: planGoals({
      goals: input.goals,
      metrics: input.metrics,
      age: input.age,
      expectedAnnualReturnPct,
    }),
    riskLevel: input.metrics.riskLevel,
    provenance: input.provenance,
    metrics: { ...input.metrics },
    goals: input.goals.map((goal) => ({ ...goal })),
    generatedAt: (input.generatedAt ?? new Date()).toISOString(),
  });
}
