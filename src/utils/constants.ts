import { AllocationCandidate } from "../models/AssetClass";
import { RiskTolerance } from "../models/UserProfile";

/**
 * Shared constants for recommendation synthesis.
 */

/** Allocation weights may drift from 100 by at most this much (percentage points). */
export const SUM_TOLERANCE = 0.5;

/** Debt-to-income ratio strictly above this is flagged as high. */
export const HIGH_DEBT_RATIO = 0.43;

/** Months of expenses an emergency fund should cover. */
export const EMERGENCY_FUND_MONTHS = 6;

/** Annual inflation assumed for real-value projections (decimal). */
export const INFLATION_RATE = 0.06;

/** Risk score base points per stated tolerance. */
export const RISK_BASE_POINTS: Record<RiskTolerance, number> = {
  conservative: 20,
  moderate: 50,
  aggressive: 80,
};

/** Age at which the age adjustment is zero; younger adds points, older removes them. */
export const RISK_AGE_PIVOT = 35;
export const RISK_AGE_POINTS_PER_YEAR = 0.5;
export const RISK_AGE_ADJUSTMENT_MIN = -15;
export const RISK_AGE_ADJUSTMENT_MAX = 10;

/** Horizon (years) at which the horizon adjustment is zero. */
export const RISK_HORIZON_PIVOT_YEARS = 10;
export const RISK_HORIZON_POINTS_PER_YEAR = 1;
export const RISK_HORIZON_ADJUSTMENT_MIN = -10;
export const RISK_HORIZON_ADJUSTMENT_MAX = 10;

/** Points removed per unit of debt-to-income ratio (ratio capped at 1). */
export const RISK_DEBT_PENALTY_WEIGHT = 40;

/** Risk scores below this fall in the low band. */
export const RISK_BAND_MEDIUM_MIN = 34;

/** Risk scores at or above this fall in the high band. */
export const RISK_BAND_HIGH_MIN = 67;

/** Horizons strictly below this (years) are short-term. */
export const SHORT_HORIZON_YEARS = 3;

/** Horizons strictly above this (years) are long-term. */
export const LONG_HORIZON_YEARS = 10;

/**
 * Maximum weight per asset class for each risk tier (percent).
 * Every tier's ceilings sum well above 100 so a clipped excess can always land somewhere.
 */
export const RISK_TIER_CEILINGS: Record<RiskTolerance, AllocationCandidate> = {
  conservative: {
    equities: 50,
    bonds: 80,
    realEstate: 20,
    cashEquivalents: 60,
    alternatives: 10,
  },
  moderate: {
    equities: 75,
    bonds: 70,
    realEstate: 25,
    cashEquivalents: 50,
    alternatives: 15,
  },
  aggressive: {
    equities: 90,
    bonds: 60,
    realEstate: 30,
    cashEquivalents: 40,
    alternatives: 20,
  },
};

/** Largest total excess (percentage points) the adjuster may clip before giving up on a proposal. */
export const MAX_CEILING_EXCESS = 25;

/** Long-run average annual return per asset class (percent). */
export const HISTORICAL_RETURNS_PCT: AllocationCandidate = {
  equities: 11,
  bonds: 6.5,
  realEstate: 8,
  cashEquivalents: 4,
  alternatives: 7.5,
};

/** Financial health score points, highest threshold first. Ratios are fractions. */
export const HEALTH_EMERGENCY_POINTS: ReadonlyArray<[minMonths: number, points: number]> = [
  [6, 25],
  [3, 15],
  [1, 8],
];
export const HEALTH_INVESTABLE_SHARE_POINTS: ReadonlyArray<[minShare: number, points: number]> = [
  [0.3, 30],
  [0.2, 25],
  [0.1, 15],
  [0.05, 8],
];
export const HEALTH_DEBT_FREE_POINTS = 20;
export const HEALTH_MANAGEABLE_DEBT_POINTS = 10;
export const HEALTH_SUITED_RISK_POINTS = 15;
export const HEALTH_UNSUITED_RISK_POINTS = 8;
/** Goal text longer than the first length earns the first score, longer than the second the second. */
export const HEALTH_GOAL_DETAIL_POINTS: ReadonlyArray<[minLength: number, points: number]> = [
  [21, 10],
  [6, 5],
];

/** Monthly income strictly above these counts as high / medium for risk capacity. */
export const CAPACITY_HIGH_INCOME = 100000;
export const CAPACITY_MEDIUM_INCOME = 50000;
/** Ages strictly below these count as high / medium for risk capacity. */
export const CAPACITY_HIGH_AGE_BELOW = 35;
export const CAPACITY_MEDIUM_AGE_BELOW = 50;
/** Outgoings (expenses plus debt payments) to income strictly below these count as high / medium. */
export const CAPACITY_HIGH_OUTGOINGS_BELOW = 0.6;
export const CAPACITY_MEDIUM_OUTGOINGS_BELOW = 0.8;

/** Retirement plans target this age, with at least the minimum number of years to save. */
export const RETIREMENT_AGE = 60;
export const MIN_YEARS_TO_RETIREMENT = 5;
/** Share of current monthly income needed in retirement. */
export const RETIREMENT_INCOME_REPLACEMENT = 0.7;
/** Retirement corpus as a multiple of the annual need. */
export const RETIREMENT_CORPUS_MULTIPLE = 25;

/** Share of monthly investment capacity set aside per goal. */
export const HOME_GOAL_CAPACITY_SHARE = 0.3;
export const EDUCATION_GOAL_CAPACITY_SHARE = 0.25;
