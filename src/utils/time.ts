import { LONG_HORIZON_YEARS, SHORT_HORIZON_YEARS } from "./constants";

/**
 * Time conversion and horizon utilities.
 */

export type HorizonBand = "short" | "medium" | "long";

/**
 * Converts years to months, rounding to the nearest month.
 *
 * @param years - Number of years
 * @returns Number of months (rounded)
 */
export function yearsToMonths(years: number): number {
  return Math.round(years * 12);
}

/**
 * Determines the horizon band used by the rule-based allocator.
 *
 * @param horizonYears - Investment horizon in years
 * @returns "short" below 3 years, "long" above 10 years, "medium" otherwise
 */
export function getHorizonBand(horizonYears: number): HorizonBand {
  if (horizonYears < SHORT_HORIZON_YEARS) {
    return "short";
  } else if (horizonYears <= LONG_HORIZON_YEARS) {
    return "medium";
  } else {
    return "long";
  }
}
