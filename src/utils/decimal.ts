import Decimal from 'decimal.js';

/**
 * Parses a money-like value into a finite Decimal, or null when it cannot be
 * read as one. Blank strings are not treated as zero.
 */
export function parseDecimal(value: unknown): Decimal | null {
  if (value instanceof Decimal) {
    return value.isFinite() ? value : null;
  }

  let candidate: string | number;
  if (typeof value === 'string') {
    candidate = value.trim();
    if (!candidate) {
      return null;
    }
  } else if (typeof value === 'number') {
    candidate = value;
  } else {
    return null;
  }

  try {
    const parsed = new Decimal(candidate);
    return parsed.isFinite() ? parsed : null;
  } catch {
    return null;
  }
}

export function roundMoney(value: Decimal): Decimal {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}
