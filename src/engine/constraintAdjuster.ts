import {
  AllocationCandidate,
  ASSET_CLASSES,
  AssetClass,
  getAllocationTotal,
  mapAllocation,
} from "../models/AssetClass";
import { ConstraintRepairFailure, fail, ok, Result } from "../models/PipelineResult";
import { MAX_CEILING_EXCESS, SUM_TOLERANCE } from "../utils/constants";
import { roundTo } from "../utils/math";

/**
 * Options for constraint repair.
 *
 * @property maxClippedExcess - Total percentage points ceiling clipping may move before the proposal is rejected
 * @property decimals - Decimal places kept in the final weights
 */
export interface AdjustmentOptions {
  maxClippedExcess: number;
  decimals: number;
}

const DEFAULT_OPTIONS: AdjustmentOptions = {
  maxClippedExcess: MAX_CEILING_EXCESS,
  decimals: 1,
};

/** Weights closer than this are treated as equal during redistribution. */
const EPSILON = 1e-9;

/**
 * Lists every way an allocation breaks the portfolio invariants; empty when it is valid.
 */
export function findInvariantViolations(
  allocation: AllocationCandidate,
  ceilings: AllocationCandidate
): string[] {
  const violations: string[] = [];
  const total = getAllocationTotal(allocation);

  if (Math.abs(total - 100) > SUM_TOLERANCE) {
    violations.push(`Weights sum to ${roundTo(total, 2)}, expected 100 ± ${SUM_TOLERANCE}`);
  }
  for (const assetClass of ASSET_CLASSES) {
    const weight = allocation[assetClass];
    if (!Number.isFinite(weight) || weight < 0) {
      violations.push(`${assetClass} weight ${weight} is negative or not a number`);
    } else if (weight > ceilings[assetClass] + EPSILON) {
      violations.push(`${assetClass} weight ${weight} exceeds ceiling ${ceilings[assetClass]}`);
    }
  }
  return violations;
}

/**
 * Rescale weights proportionally so they sum to exactly 100.
 * Returns null when the weights sum to zero and there is nothing to scale.
 */
export function normalizeToHundred(allocation: AllocationCandidate): AllocationCandidate | null {
  const total = getAllocationTotal(allocation);
  if (total <= 0) {
    return null;
  }
  return mapAllocation((assetClass) => (allocation[assetClass] * 100) / total);
}

/**
 * Clip weights above their ceiling and hand the excess to classes with room,
 * proportionally to their current weight (equally when they are all at zero).
 * Repeats until nothing is above its ceiling or nothing can absorb the excess.
 *
 * @returns The redistributed weights, the total clipped and any excess left unplaced
 */
export function redistributeExcess(
  allocation: AllocationCandidate,
  ceilings: AllocationCandidate
): { allocation: AllocationCandidate; clippedExcess: number; unplacedExcess: number } {
  const weights = { ...allocation };
  let excess = 0;

  for (const assetClass of ASSET_CLASSES) {
    if (weights[assetClass] > ceilings[assetClass]) {
      excess += weights[assetClass] - ceilings[assetClass];
      weights[assetClass] = ceilings[assetClass];
    }
  }
  const clippedExcess = excess;

  // Each pass with overflow fills at least one receiver to its ceiling, so this ends.
  while (excess > EPSILON) {
    const receivers = ASSET_CLASSES.filter(
      (assetClass) => ceilings[assetClass] - weights[assetClass] > EPSILON
    );
    if (receivers.length === 0) {
      break;
    }

    const receiverTotal = receivers.reduce((total, assetClass) => total + weights[assetClass], 0);
    const share = (assetClass: AssetClass) =>
      receiverTotal > EPSILON ? weights[assetClass] / receiverTotal : 1 / receivers.length;

    let overflow = 0;
    for (const assetClass of receivers) {
      const target = weights[assetClass] + excess * share(assetClass);
      if (target > ceilings[assetClass]) {
        overflow += target - ceilings[assetClass];
        weights[assetClass] = ceilings[assetClass];
      } else {
        weights[assetClass] = target;
      }
    }
    excess = overflow;
  }

  return { allocation: weights, clippedExcess, unplacedExcess: excess > EPSILON ? excess : 0 };
}

/**
 * Round every weight and give the rounding residual to the largest class that can take it.
 */
export function roundAllocation(
  allocation: AllocationCandidate,
  ceilings: AllocationCandidate,
  decimals: number
): AllocationCandidate {
  const rounded = mapAllocation((assetClass) => roundTo(allocation[assetClass], decimals));
  const residual = roundTo(100 - getAllocationTotal(rounded), decimals);
  if (residual === 0) {
    return rounded;
  }

  const byWeight = [...ASSET_CLASSES].sort((a, b) => rounded[b] - rounded[a]);
  for (const assetClass of byWeight) {
    const candidate = roundTo(rounded[assetClass] + residual, decimals);
    if (candidate >= 0 && candidate <= ceilings[assetClass]) {
      rounded[assetClass] = candidate;
      break;
    }
  }
  return rounded;
}

/**
 * Repair a structurally valid allocation so it satisfies every portfolio invariant.
 *
 * 1. Rescale to 100.
 * 2. Clip to the risk-tier ceilings and redistribute the excess.
 * 3. Round, then re-check the invariants; anything left unsatisfied is a failure.
 */
export function adjustAllocation(
  candidate: AllocationCandidate,
  ceilings: AllocationCandidate,
  options: Partial<AdjustmentOptions> = {}
): Result<AllocationCandidate, ConstraintRepairFailure> {
  const { maxClippedExcess, decimals } = { ...DEFAULT_OPTIONS, ...options };
  const repairFailure = (message: string, clippedExcess: number) =>
    fail<ConstraintRepairFailure>({
      type: "constraint-repair",
      message,
      clippedExcess: roundTo(clippedExcess, 2),
    });

  const normalized = normalizeToHundred(candidate);
  if (!normalized) {
    return repairFailure("All weights are zero; nothing to rescale", 0);
  }

  const redistributed = redistributeExcess(normalized, ceilings);
  if (redistributed.unplacedExcess > 0) {
    return repairFailure(
      `Other asset classes cannot absorb ${roundTo(redistributed.unplacedExcess, 2)} points above their ceilings`,
      redistributed.clippedExcess
    );
  }
  if (redistributed.clippedExcess > maxClippedExcess) {
    return repairFailure(
      `Clipping to ceilings moves ${roundTo(redistributed.clippedExcess, 2)} points, above the limit of ${maxClippedExcess}`,
      redistributed.clippedExcess
    );
  }

  const adjusted = roundAllocation(redistributed.allocation, ceilings, decimals);
  const violations = findInvariantViolations(adjusted, ceilings);
  if (violations.length > 0) {
    return repairFailure(violations.join("; "), redistributed.clippedExcess);
  }

  return ok(adjusted);
}
