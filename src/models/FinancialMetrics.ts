/**
 * Financial metrics derived from a user profile
 */

export type RiskBand = "low" | "medium" | "high";

export type RiskLevel =
  | "Very Conservative"
  | "Conservative"
  | "Moderately Conservative"
  | "Moderate"
  | "Moderately Aggressive"
  | "Aggressive";

export type LifecycleStage =
  | "early_career"
  | "wealth_building"
  | "wealth_accumulation"
  | "pre_retirement"
  | "retirement_planning";

/** Financial room to absorb losses, from income level, age and outgoings. */
export type RiskCapacity = "high" | "medium" | "low";

/**
 * Read-only snapshot computed once per request.
 * Ratios are fractions (0.375 means 37.5%); amounts are monthly currency values
 * unless the name says otherwise.
 */
export interface FinancialMetrics {
  readonly totalMonthlyIncome: number;
  readonly totalMonthlyExpenses: number;
  readonly totalMonthlyDebtPayment: number;
  readonly investmentCapacity: number;
  readonly debtToIncomeRatio: number;
  readonly isDebtRatioHigh: boolean;
  readonly savingsRate: number;
  readonly riskScore: number;
  readonly riskBand: RiskBand;
  readonly riskLevel: RiskLevel;
  readonly emergencyFundTarget: number;
  readonly emergencyFundMonths: number;
  readonly netWorth: number;
  readonly lifecycleStage: LifecycleStage;
  /** 0-100: emergency fund, investable share of income, debt load, age-suited tolerance, goal detail */
  readonly financialHealthScore: number;
  readonly riskCapacity: RiskCapacity;
}
