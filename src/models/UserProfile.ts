/**
 * User profile data structure
 */

export const RISK_TOLERANCES = ["conservative", "moderate", "aggressive"] as const;

export type RiskTolerance = (typeof RISK_TOLERANCES)[number];

export interface Debt {
  principal: number;
  interestRatePct: number;
  monthlyPayment: number;
}

export interface UserProfile {
  income: {
    monthlySalary: number;
    additionalIncome: number;
  };
  expenses: {
    fixed: number;
    variable: number;
  };
  debts: Debt[];
  assets: {
    savings: number;
    existingInvestments: number;
  };
  age: number;
  riskTolerance: RiskTolerance;
  timeHorizonYears: number;
  goals: string[];
}

/**
 * Get gross monthly income
 */
export function getTotalMonthlyIncome(profile: UserProfile): number {
  return profile.income.monthlySalary + profile.income.additionalIncome;
}

/**
 * Get monthly expenses excluding debt service
 */
export function getTotalMonthlyExpenses(profile: UserProfile): number {
  return profile.expenses.fixed + profile.expenses.variable;
}

/**
 * Get total minimum monthly debt payment
 */
export function getTotalMonthlyDebtPayment(profile: UserProfile): number {
  return profile.debts.reduce((sum, debt) => sum + debt.monthlyPayment, 0);
}

/**
 * Get total outstanding principal across all debts
 */
export function getOutstandingPrincipal(profile: UserProfile): number {
  return profile.debts.reduce((sum, debt) => sum + debt.principal, 0);
}
