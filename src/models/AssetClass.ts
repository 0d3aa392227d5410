/**
 * Asset class data structures
 */

export const ASSET_CLASSES = [
  "equities",
  "bonds",
  "realEstate",
  "cashEquivalents",
  "alternatives",
] as const;

export type AssetClass = (typeof ASSET_CLASSES)[number];

/**
 * Percentage weight (0-100) for every asset class.
 * Produced by the completion service (untrusted until validated) or by the rule-based allocator.
 */
export type AllocationCandidate = Record<AssetClass, number>;

/**
 * Flat allocation entry, convenient for display and iteration in a fixed order.
 *
 * @property assetClass - Asset class identifier
 * @property percentage - Allocation percentage (0-100)
 */
export interface AssetAllocation {
  assetClass: AssetClass;
  percentage: number;
}

export function isAssetClass(value: string): value is AssetClass {
  return (ASSET_CLASSES as readonly string[]).includes(value);
}

/**
 * Get total weight of an allocation
 */
export function getAllocationTotal(allocation: AllocationCandidate): number {
  return ASSET_CLASSES.reduce((total, assetClass) => total + allocation[assetClass], 0);
}

/**
 * Whether two allocations give every asset class the same weight
 */
export function isSameAllocation(a: AllocationCandidate, b: AllocationCandidate): boolean {
  return ASSET_CLASSES.every((assetClass) => a[assetClass] === b[assetClass]);
}

/**
 * Convert an allocation map into an ordered list of entries
 */
export function toAssetAllocations(allocation: AllocationCandidate): AssetAllocation[] {
  return ASSET_CLASSES.map((assetClass) => ({
    assetClass,
    percentage: allocation[assetClass],
  }));
}

/**
 * Build an allocation by computing each asset class's weight
 */
export function mapAllocation(
  compute: (assetClass: AssetClass) => number
): AllocationCandidate {
  return {
    equities: compute("equities"),
    bonds: compute("bonds"),
    realEstate: compute("realEstate"),
    cashEquivalents: compute("cashEquivalents"),
    alternatives: compute("alternatives"),
  };
}
