const CENTS = 100;

/** Rounds a monetary amount to cents. */
export function roundCurrency(value: number): number {
  const rounded = Math.round(value * CENTS) / CENTS;
  return Object.is(rounded, -0) ? 0 : rounded;
}

/**
 * Formats an amount with the configured symbol and two decimals, e.g. `€7.00` or `-€3.50`.
 */
export function formatCurrency(value: number, symbol: string): string {
  const rounded = roundCurrency(value);
  const sign = rounded < 0 ? "-" : "";
  return `${sign}${symbol}${Math.abs(rounded).toFixed(2)}`;
}
