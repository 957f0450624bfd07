import Decimal from 'decimal.js';
import { roundMoney } from './decimal';

export interface GstBreakdown {
  unitInclusive: Decimal;
  unitBase: Decimal;
  unitGst: Decimal;
  lineBase: Decimal;
  lineGst: Decimal;
  lineTotal: Decimal;
}

/**
 * Splits a GST-inclusive unit price into base and tax at the given rate.
 * Per-unit figures are rounded half-up to paise before being multiplied out,
 * so line GST is always unit GST times quantity.
 */
export function calculateInclusiveGst(
  inclusiveUnitPrice: Decimal,
  gstRatePercentage: Decimal,
  quantity: number = 1,
): GstBreakdown {
  const unitInclusive = roundMoney(inclusiveUnitPrice);

  let unitBase = unitInclusive;
  let unitGst = new Decimal(0);

  if (gstRatePercentage.greaterThan(0)) {
    const denominator = new Decimal(1).plus(gstRatePercentage.dividedBy(100));
    unitBase = roundMoney(unitInclusive.dividedBy(denominator));
    unitGst = roundMoney(unitInclusive.minus(unitBase));
  }

  return {
    unitInclusive,
    unitBase,
    unitGst,
    lineBase: unitBase.times(quantity),
    lineGst: unitGst.times(quantity),
    lineTotal: roundMoney(unitInclusive.times(quantity)),
  };
}
