/**
 * Exact decimal arithmetic for prices and revenue.
 *
 * Values are stored as an integer count of the smallest unit plus the
 * number of fraction digits (value = units / 10^exponent), so sums and
 * products never drift. Rounding to cents happens only when rendering.
 */

export interface Decimal {
  readonly units: bigint;
  readonly exponent: number;
}

export const ZERO: Decimal = { units: 0n, exponent: 0 };

const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:[.,](\d*))?$/;

/**
 * Parse a decimal written with either `.` or `,` as the separator.
 * No thousands grouping and no exponent notation.
 */
export function parseDecimal(text: string): Decimal | undefined {
  const match = DECIMAL_PATTERN.exec(text.trim());
  if (!match) return undefined;

  const [, sign, whole = '', fraction = ''] = match;
  if (whole.length === 0 && fraction.length === 0) return undefined;

  const magnitude = BigInt(`${whole}${fraction}` || '0');
  return {
    units: sign === '-' ? -magnitude : magnitude,
    exponent: fraction.length,
  };
}

function pow10(n: number): bigint {
  return 10n ** BigInt(n);
}

function rescale(value: Decimal, exponent: number): bigint {
  return value.units * pow10(exponent - value.exponent);
}

export function addDecimal(a: Decimal, b: Decimal): Decimal {
  const exponent = Math.max(a.exponent, b.exponent);
  return { units: rescale(a, exponent) + rescale(b, exponent), exponent };
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = addDecimal(total, value);
  }
  return total;
}

export function multiplyDecimal(value: Decimal, factor: number | bigint): Decimal {
  return { units: value.units * BigInt(factor), exponent: value.exponent };
}

/** Negative, zero or positive, like a sort comparator. */
export function compareDecimal(a: Decimal, b: Decimal): number {
  const exponent = Math.max(a.exponent, b.exponent);
  const diff = rescale(a, exponent) - rescale(b, exponent);
  if (diff === 0n) return 0;
  return diff < 0n ? -1 : 1;
}

export function isPositiveDecimal(value: Decimal): boolean {
  return value.units > 0n;
}

/**
 * Round to whole cents, half away from zero.
 */
export function toCents(value: Decimal): bigint {
  if (value.exponent <= 2) {
    return value.units * pow10(2 - value.exponent);
  }
  const divisor = pow10(value.exponent - 2);
  const negative = value.units < 0n;
  const magnitude = negative ? -value.units : value.units;
  let cents = magnitude / divisor;
  if ((magnitude % divisor) * 2n >= divisor) cents += 1n;
  return negative ? -cents : cents;
}

/** Render with exactly two fraction digits, e.g. `149.70`. */
export function formatDecimal(value: Decimal): string {
  const cents = toCents(value);
  const negative = cents < 0n;
  const magnitude = negative ? -cents : cents;
  const whole = magnitude / 100n;
  const fraction = String(magnitude % 100n).padStart(2, '0');
  return `${negative ? '-' : ''}${whole}.${fraction}`;
}

/** Cent-rounded JavaScript number, for JSON-shaped output. */
export function decimalToNumber(value: Decimal): number {
  return Number(formatDecimal(value));
}
