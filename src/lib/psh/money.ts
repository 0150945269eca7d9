// /src/lib/psh/money.ts
// Integer-cent helpers. All engine arithmetic happens on whole cents so repeated
// additions never drift; dollars only appear at the input and output edges.

export type Cents = number;

/** Dollars (at most two decimals after validation) to whole cents. */
export function toCents(dollars: number): Cents {
  return Math.round(dollars * 100);
}

export function fromCents(cents: Cents): number {
  return cents / 100;
}

export function maxCents(a: Cents, b: Cents): Cents {
  return a > b ? a : b;
}

export function minCents(a: Cents, b: Cents): Cents {
  return a < b ? a : b;
}

/**
 * cents * numerator / denominator, rounded half away from zero to a whole cent.
 * Integer-only: 2·|x|·n + d over 2·d, floored.
 */
export function mulDivRoundHalfUp(cents: Cents, numerator: number, denominator: number): Cents {
  if (denominator <= 0) {
    throw new Error(`mulDivRoundHalfUp: denominator must be positive (got ${denominator})`);
  }
  const sign = cents < 0 ? -1 : 1;
  const magnitude = Math.abs(cents) * numerator;
  const rounded = Math.floor((2 * magnitude + denominator) / (2 * denominator));
  return rounded === 0 ? 0 : sign * rounded;
}

const USD = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** $1,234.50 */
export function formatUsd(dollars: number): string {
  return USD.format(dollars);
}

/** Whole-dollar figures print without cents ($2,977); others keep them ($650.50). */
export function formatUsdCompact(dollars: number): string {
  if (Number.isInteger(dollars)) {
    return `${dollars < 0 ? "-" : ""}$${Math.abs(dollars).toLocaleString("en-US")}`;
  }
  return formatUsd(dollars);
}

/** 0.5 -> "50.0%" */
export function formatPercent(ratio: number, digits = 1): string {
  return `${(ratio * 100).toFixed(digits)}%`;
}
