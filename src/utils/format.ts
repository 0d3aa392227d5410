/**
 * Display formatting for rationale and next-step text.
 */

/**
 * Formats an amount as whole rupees with Indian digit grouping.
 *
 * @example
 * ```ts
 * formatCurrency(1250000) // returns "₹12,50,000"
 * ```
 */
export function formatCurrency(amount: number): string {
  return `₹${Math.round(amount).toLocaleString("en-IN")}`;
}

/**
 * Formats a percentage value (already in percent) with a fixed number of decimals.
 */
export function formatPercent(value: number, decimals = 1): string {
  return `${value.toFixed(decimals)}%`;
}
