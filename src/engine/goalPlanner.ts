import { FinancialMetrics } from "../models/FinancialMetrics";
import { GoalRecord } from "../models/Goal";
import { GoalPlan } from "../models/Portfolio";
import {
  EDUCATION_GOAL_CAPACITY_SHARE,
  HOME_GOAL_CAPACITY_SHARE,
  MIN_YEARS_TO_RETIREMENT,
  RETIREMENT_AGE,
  RETIREMENT_CORPUS_MULTIPLE,
  RETIREMENT_INCOME_REPLACEMENT,
} from "../utils/constants";
import { annualToMonthlyReturn, futureValueOfAnnuity } from "../utils/math";
import { yearsToMonths } from "../utils/time";

export interface GoalPlanInput {
  goals: readonly GoalRecord[];
  metrics: FinancialMetrics;
  age: number;
  expectedAnnualReturnPct: number;
}

/**
 * Monthly contribution that grows to the retirement corpus by retirement age.
 *
 * The corpus covers RETIREMENT_CORPUS_MULTIPLE years of RETIREMENT_INCOME_REPLACEMENT
 * of today's income, compounded monthly at the portfolio's expected return.
 *
 * @example
 * ```ts
 * // 80,000 income, 30 years at 12%: corpus 16,800,000
 * calculateRetirementContribution(80000, 30, 12) // 4807
 * ```
 */
export function calculateRetirementContribution(
  monthlyIncome: number,
  yearsToRetirement: number,
  expectedAnnualReturnPct: number
): number {
  const corpus = monthlyIncome * RETIREMENT_INCOME_REPLACEMENT * 12 * RETIREMENT_CORPUS_MULTIPLE;
  const growthPerUnit = futureValueOfAnnuity(
    1,
    annualToMonthlyReturn(expectedAnnualReturnPct / 100),
    yearsToMonths(yearsToRetirement)
  );
  return Math.round(corpus / growthPerUnit);
}

/**
 * One plan per planned category (retirement, home, education), taken from the
 * highest-priority goal of that category. Other categories get no plan.
 */
export function planGoals({ goals, metrics, age, expectedAnnualReturnPct }: GoalPlanInput): GoalPlan[] {
  const plans: GoalPlan[] = [];
  const planned = new Set<GoalPlan["category"]>();
  const hasChildrenGoal = goals.some((goal) => goal.category === "children");

  for (const goal of goals) {
    const { category, rawText } = goal;
    if ((category !== "retirement" && category !== "home" && category !== "education") || planned.has(category)) {
      continue;
    }
    planned.add(category);

    switch (category) {
      case "retirement": {
        const years = Math.max(MIN_YEARS_TO_RETIREMENT, RETIREMENT_AGE - age);
        plans.push({
          category,
          goal: "Retirement Planning",
          rawText,
          timelineYears: years,
          monthlyInvestment: calculateRetirementContribution(
            metrics.totalMonthlyIncome,
            years,
            expectedAnnualReturnPct
          ),
          strategy: "Balanced growth portfolio with a gradual shift to conservative assets",
        });
        break;
      }
      case "home":
        plans.push({
          category,
          goal: "Home Purchase",
          rawText,
          timelineYears: age < 35 ? 5 : 3,
          monthlyInvestment: Math.round(metrics.investmentCapacity * HOME_GOAL_CAPACITY_SHARE),
          strategy: "Conservative growth with liquid funds",
        });
        break;
      case "education":
        // A child's education is further away than the investor's own.
        plans.push({
          category,
          goal: "Education Fund",
          rawText,
          timelineYears: hasChildrenGoal ? 10 : 2,
          monthlyInvestment: Math.round(metrics.investmentCapacity * EDUCATION_GOAL_CAPACITY_SHARE),
          strategy: "Moderate growth with education-focused funds",
        });
        break;
    }
  }

  return plans;
}
