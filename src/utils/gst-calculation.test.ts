import Decimal from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { calculateInclusiveGst } from './gst-calculation';

describe('calculateInclusiveGst', () => {
  it('backs the base price out of an inclusive price', () => {
    const result = calculateInclusiveGst(new Decimal('118'), new Decimal('18'));

    expect(result.unitBase.toFixed(2)).toBe('100.00');
    expect(result.unitGst.toFixed(2)).toBe('18.00');
    expect(result.lineTotal.toFixed(2)).toBe('118.00');
  });

  it('rounds the base half-up to two places and gives the remainder to GST', () => {
    const result = calculateInclusiveGst(new Decimal('99.99'), new Decimal('12'));

    expect(result.unitBase.toFixed(2)).toBe('89.28');
    expect(result.unitGst.toFixed(2)).toBe('10.71');
  });

  it('multiplies the rounded unit figures by quantity', () => {
    const result = calculateInclusiveGst(new Decimal('1000'), new Decimal('5'), 3);

    expect(result.unitBase.toFixed(2)).toBe('952.38');
    expect(result.unitGst.toFixed(2)).toBe('47.62');
    expect(result.lineBase.toFixed(2)).toBe('2857.14');
    expect(result.lineGst.toFixed(2)).toBe('142.86');
    expect(result.lineTotal.toFixed(2)).toBe('3000.00');
  });

  it('leaves the whole price as base at a zero rate', () => {
    const result = calculateInclusiveGst(new Decimal('49.50'), new Decimal('0'), 2);

    expect(result.unitBase.toFixed(2)).toBe('49.50');
    expect(result.unitGst.isZero()).toBe(true);
    expect(result.lineBase.toFixed(2)).toBe('99.00');
    expect(result.lineGst.toFixed(2)).toBe('0.00');
  });
});
