/**
 * Numeric helpers for metrics and projections.
 * Projections use monthly compounding periods.
 */

/**
 * Converts an annual return to an equivalent monthly return.
 *
 * @param annualReturn - Annual return as a decimal (e.g., 0.12 for 12%)
 * @returns Monthly return as a decimal
 *
 * @example
 * ```ts
 * annualToMonthlyReturn(0.12) // returns 0.01 (1% per month)
 * ```
 */
export function annualToMonthlyReturn(annualReturn: number): number {
  return annualReturn / 12;
}

/**
 * Calculates the future value of an annuity (regular monthly contributions).
 * Formula: FV = PMT × [(1 + r)^n - 1] / r
 *
 * @param monthlyPayment - Monthly contribution amount
 * @param monthlyReturn - Monthly return rate as a decimal
 * @param periods - Number of monthly periods
 * @returns Future value of all contributions
 */
export function futureValueOfAnnuity(
  monthlyPayment: number,
  monthlyReturn: number,
  periods: number
): number {
  if (monthlyReturn === 0) {
    return monthlyPayment * periods;
  }
  return monthlyPayment * ((Math.pow(1 + monthlyReturn, periods) - 1) / monthlyReturn);
}

/**
 * Discounts a nominal amount by annual inflation over a number of years.
 * Formula: PV = FV / (1 + i)^years
 */
export function inflationAdjusted(
  nominalValue: number,
  annualInflation: number,
  years: number
): number {
  return nominalValue / Math.pow(1 + annualInflation, years);
}

/**
 * Restricts a value to the closed range [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Rounds to a fixed number of decimal places.
 *
 * @example
 * ```ts
 * roundTo(33.3333, 1) // returns 33.3
 * roundTo(0.37512, 4) // returns 0.3751
 * ```
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Sums a list of numbers.
 */
export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
