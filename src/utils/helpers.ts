export function formatCurrency(n: number, currency = 'USD'): string {
  return new Intl.NumberFormat('en-US', { style: 'currency', currency }).format(n);
}

/** Format a value already expressed in percentage points. */
export function formatPercent(n: number): string {
  return `${n.toFixed(2)}%`;
}

/** Ratios may be +Infinity (e.g. profit factor with no losing trades). */
export function formatRatio(n: number): string {
  if (n === Number.POSITIVE_INFINITY) return '∞';
  return n.toFixed(2);
}

export function round(n: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(n * factor) / factor;
}
