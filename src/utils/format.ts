const formatters = new Map<number, Intl.NumberFormat>();

/** Comma-grouped number with a fixed count of decimals, halves to even, e.g. 10,258.27 */
export function formatAmount(value: number, decimals = 2): string {
  let formatter = formatters.get(decimals);
  if (!formatter) {
    formatter = new Intl.NumberFormat('en-US', {
      minimumFractionDigits: decimals,
      maximumFractionDigits: decimals,
      roundingMode: 'halfEven',
    });
    formatters.set(decimals, formatter);
  }
  return formatter.format(value);
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
