/** Fixed presentational price, not configurable. */
export const COST_PER_MILLION_TOKENS_USD = 3;

const countFormatter = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** `1234567` → `1,234,567` */
export function formatCount(count: number): string {
  return countFormatter.format(count);
}

export function estimateCostUsd(tokens: number): number {
  return (tokens / 1_000_000) * COST_PER_MILLION_TOKENS_USD;
}

/**
 * Cost rendered to two decimals, without the currency sign.
 *
 * `toFixed` rounds an exact halfway value away from zero; exact halves are
 * rounded to even instead (`1.125` → `1.12`, `1.375` → `1.38`). A cent value
 * can only sit exactly halfway when the estimate is an odd multiple of 1/8.
 */
export function formatCost(tokens: number): string {
  const cost = estimateCostUsd(tokens);
  const eighths = cost * 8;
  if (!Number.isInteger(eighths) || eighths % 2 === 0) {
    return cost.toFixed(2);
  }
  const lower = Math.floor(cost * 100);
  const cents = lower % 2 === 0 ? lower : lower + 1;
  return `${Math.floor(cents / 100)}.${String(cents % 100).padStart(2, '0')}`;
}

/**
 * `1,234 tokens (≈$0.00 at $3/1M tokens)`
 */
export function formatTokenCount(tokens: number): string {
  return `${formatCount(tokens)} tokens (≈$${formatCost(tokens)} at $${COST_PER_MILLION_TOKENS_USD}/1M tokens)`;
}
