import {
  UserProfile,
  RiskTolerance,
  getTotalMonthlyIncome,
  getTotalMonthlyExpenses,
  getTotalMonthlyDebtPayment,
  getOutstandingPrincipal,
} from "../models/UserProfile";
import {
  FinancialMetrics,
  LifecycleStage,
  RiskBand,
  RiskCapacity,
  RiskLevel,
} from "../models/FinancialMetrics";
import {
  CAPACITY_HIGH_AGE_BELOW,
  CAPACITY_HIGH_INCOME,
  CAPACITY_HIGH_OUTGOINGS_BELOW,
  CAPACITY_MEDIUM_AGE_BELOW,
  CAPACITY_MEDIUM_INCOME,
  CAPACITY_MEDIUM_OUTGOINGS_BELOW,
  EMERGENCY_FUND_MONTHS,
  HEALTH_DEBT_FREE_POINTS,
  HEALTH_EMERGENCY_POINTS,
  HEALTH_GOAL_DETAIL_POINTS,
  HEALTH_INVESTABLE_SHARE_POINTS,
  HEALTH_MANAGEABLE_DEBT_POINTS,
  HEALTH_SUITED_RISK_POINTS,
  HEALTH_UNSUITED_RISK_POINTS,
  HIGH_DEBT_RATIO,
  RISK_AGE_ADJUSTMENT_MAX,
  RISK_AGE_ADJUSTMENT_MIN,
  RISK_AGE_PIVOT,
  RISK_AGE_POINTS_PER_YEAR,
  RISK_BAND_HIGH_MIN,
  RISK_BAND_MEDIUM_MIN,
  RISK_BASE_POINTS,
  RISK_DEBT_PENALTY_WEIGHT,
  RISK_HORIZON_ADJUSTMENT_MAX,
  RISK_HORIZON_ADJUSTMENT_MIN,
  RISK_HORIZON_PIVOT_YEARS,
  RISK_HORIZON_POINTS_PER_YEAR,
} from "../utils/constants";
import { clamp, roundTo } from "../utils/math";

/**
 * Monthly amount left for investing after expenses and minimum debt payments.
 * Never negative: a profile whose outgoings exceed income has zero capacity.
 */
export function calculateInvestmentCapacity(
  income: number,
  expenses: number,
  debtPayments: number
): number {
  return Math.max(0, income - (expenses + debtPayments));
}

/**
 * Total monthly debt payment as a fraction of gross monthly income.
 * With no income the ratio is 0 when nothing is owed and 1 (fully burdened) otherwise.
 */
export function calculateDebtToIncomeRatio(debtPayments: number, income: number): number {
  if (income <= 0) {
    return debtPayments > 0 ? 1 : 0;
  }
  return debtPayments / income;
}

/**
 * Share of income not spent on expenses. Reported as 0 when income is 0.
 */
export function calculateSavingsRate(income: number, expenses: number): number {
  if (income <= 0) {
    return 0;
  }
  return (income - expenses) / income;
}

/**
 * Blends stated tolerance, age, horizon and debt burden into a 0-100 score.
 *
 * score = base(tolerance) + ageAdjustment + horizonAdjustment - debtPenalty
 *
 * @example
 * ```ts
 * calculateRiskScore("moderate", 30, 15, 0) // 50 + 2.5 + 5 - 0 = 57.5
 * ```
 */
export function calculateRiskScore(
  riskTolerance: RiskTolerance,
  age: number,
  horizonYears: number,
  debtToIncomeRatio: number
): number {
  const base = RISK_BASE_POINTS[riskTolerance];
  const ageAdjustment = clamp(
    (RISK_AGE_PIVOT - age) * RISK_AGE_POINTS_PER_YEAR,
    RISK_AGE_ADJUSTMENT_MIN,
    RISK_AGE_ADJUSTMENT_MAX
  );
  const horizonAdjustment = clamp(
    (horizonYears - RISK_HORIZON_PIVOT_YEARS) * RISK_HORIZON_POINTS_PER_YEAR,
    RISK_HORIZON_ADJUSTMENT_MIN,
    RISK_HORIZON_ADJUSTMENT_MAX
  );
  const debtPenalty = clamp(debtToIncomeRatio, 0, 1) * RISK_DEBT_PENALTY_WEIGHT;

  return roundTo(clamp(base + ageAdjustment + horizonAdjustment - debtPenalty, 0, 100), 1);
}

export function getRiskBand(riskScore: number): RiskBand {
  if (riskScore < RISK_BAND_MEDIUM_MIN) {
    return "low";
  } else if (riskScore < RISK_BAND_HIGH_MIN) {
    return "medium";
  } else {
    return "high";
  }
}

export function getRiskLevel(riskScore: number): RiskLevel {
  if (riskScore < 20) return "Very Conservative";
  if (riskScore < 35) return "Conservative";
  if (riskScore < 50) return "Moderately Conservative";
  if (riskScore < 65) return "Moderate";
  if (riskScore < 80) return "Moderately Aggressive";
  return "Aggressive";
}

export function getLifecycleStage(age: number): LifecycleStage {
  if (age < 25) return "early_career";
  if (age < 35) return "wealth_building";
  if (age < 45) return "wealth_accumulation";
  if (age < 55) return "pre_retirement";
  return "retirement_planning";
}

/**
 * Whether the stated tolerance suits the age: under 30 moderate or aggressive,
 * under 50 conservative or moderate, otherwise conservative only.
 */
export function isAgeAppropriateRisk(age: number, riskTolerance: RiskTolerance): boolean {
  if (age < 30) return riskTolerance !== "conservative";
  if (age < 50) return riskTolerance !== "aggressive";
  return riskTolerance === "conservative";
}

function pointsFor(value: number, table: ReadonlyArray<[threshold: number, points: number]>): number {
  return table.find(([threshold]) => value >= threshold)?.[1] ?? 0;
}

export interface HealthScoreInput {
  emergencyFundMonths: number;
  /** Investment capacity as a fraction of income */
  investableShare: number;
  hasDebt: boolean;
  isDebtRatioHigh: boolean;
  age: number;
  riskTolerance: RiskTolerance;
  goals: readonly string[];
}

/**
 * Financial health score from 0 to 100.
 *
 * Emergency fund up to 25 points, investable share of income up to 30, debt 20
 * (10 while payments stay under the high-ratio threshold), age-suited tolerance
 * 15 (8 otherwise) and goal detail up to 10.
 */
export function calculateFinancialHealthScore(input: HealthScoreInput): number {
  const debtPoints = !input.hasDebt
    ? HEALTH_DEBT_FREE_POINTS
    : input.isDebtRatioHigh
      ? 0
      : HEALTH_MANAGEABLE_DEBT_POINTS;
  const riskPoints = isAgeAppropriateRisk(input.age, input.riskTolerance)
    ? HEALTH_SUITED_RISK_POINTS
    : HEALTH_UNSUITED_RISK_POINTS;
  const goalTextLength = input.goals.map((goal) => goal.trim()).join(" ").trim().length;

  const score =
    pointsFor(input.emergencyFundMonths, HEALTH_EMERGENCY_POINTS) +
    pointsFor(input.investableShare, HEALTH_INVESTABLE_SHARE_POINTS) +
    debtPoints +
    riskPoints +
    pointsFor(goalTextLength, HEALTH_GOAL_DETAIL_POINTS);
  return Math.min(100, score);
}

/**
 * Rate income level, age and outgoings as high, medium or low; two highs make
 * the capacity high, two at medium or better make it medium.
 */
export function assessRiskCapacity(income: number, age: number, outgoings: number): RiskCapacity {
  const outgoingsRatio = income > 0 ? outgoings / income : 1;
  const factors: RiskCapacity[] = [
    income > CAPACITY_HIGH_INCOME ? "high" : income > CAPACITY_MEDIUM_INCOME ? "medium" : "low",
    age < CAPACITY_HIGH_AGE_BELOW ? "high" : age < CAPACITY_MEDIUM_AGE_BELOW ? "medium" : "low",
    outgoingsRatio < CAPACITY_HIGH_OUTGOINGS_BELOW
      ? "high"
      : outgoingsRatio < CAPACITY_MEDIUM_OUTGOINGS_BELOW
        ? "medium"
        : "low",
  ];

  const high = factors.filter((factor) => factor === "high").length;
  const medium = factors.filter((factor) => factor === "medium").length;
  if (high >= 2) return "high";
  if (high + medium >= 2) return "medium";
  return "low";
}

/**
 * Derive the full metrics snapshot for a validated profile.
 * Pure: the same profile always yields the same metrics.
 */
export function calculateFinancialMetrics(profile: UserProfile): FinancialMetrics {
  const income = getTotalMonthlyIncome(profile);
  const expenses = getTotalMonthlyExpenses(profile);
  const debtPayments = getTotalMonthlyDebtPayment(profile);

  const debtToIncomeRatio = calculateDebtToIncomeRatio(debtPayments, income);
  const investmentCapacity = calculateInvestmentCapacity(income, expenses, debtPayments);
  const isDebtRatioHigh = debtToIncomeRatio > HIGH_DEBT_RATIO;
  const emergencyFundMonths = expenses > 0 ? roundTo(profile.assets.savings / expenses, 1) : 0;
  const riskScore = calculateRiskScore(
    profile.riskTolerance,
    profile.age,
    profile.timeHorizonYears,
    debtToIncomeRatio
  );

  return {
    totalMonthlyIncome: income,
    totalMonthlyExpenses: expenses,
    totalMonthlyDebtPayment: debtPayments,
    investmentCapacity,
    debtToIncomeRatio: roundTo(debtToIncomeRatio, 4),
    isDebtRatioHigh,
    savingsRate: roundTo(calculateSavingsRate(income, expenses), 4),
    riskScore,
    riskBand: getRiskBand(riskScore),
    riskLevel: getRiskLevel(riskScore),
    emergencyFundTarget: expenses * EMERGENCY_FUND_MONTHS,
    emergencyFundMonths,
    netWorth:
      profile.assets.savings + profile.assets.existingInvestments - getOutstandingPrincipal(profile),
    lifecycleStage: getLifecycleStage(profile.age),
    financialHealthScore: calculateFinancialHealthScore({
      emergencyFundMonths,
      investableShare: income > 0 ? investmentCapacity / income : 0,
      hasDebt: debtPayments > 0 || getOutstandingPrincipal(profile) > 0,
      isDebtRatioHigh,
      age: profile.age,
      riskTolerance: profile.riskTolerance,
      goals: profile.goals,
    }),
    riskCapacity: assessRiskCapacity(income, profile.age, expenses + debtPayments),
  };
}
