import type Decimal from 'decimal.js';
import type { PriceConditionType, ShopGstRule } from '../models/gst-rule';
import { parseDecimal } from './decimal';

export type ThresholdConditionType = Exclude<PriceConditionType, 'ANY'>;

type ThresholdCondition = {
  [K in ThresholdConditionType]: { kind: K; threshold: Decimal };
}[ThresholdConditionType];

export type PriceCondition = { kind: 'ANY' } | ThresholdCondition;

/**
 * Reads a rule's condition columns. Returns null when a threshold condition
 * has no usable value; such a rule never matches a price.
 */
export function toPriceCondition(
  rule: Pick<ShopGstRule, 'price_condition_type' | 'price_condition_value'>,
): PriceCondition | null {
  if (rule.price_condition_type === 'ANY') {
    return { kind: 'ANY' };
  }

  const threshold = parseDecimal(rule.price_condition_value);
  if (!threshold) {
    return null;
  }

  return { kind: rule.price_condition_type, threshold };
}

export function matchesPriceCondition(condition: PriceCondition | null, price: Decimal): boolean {
  if (!condition) {
    return false;
  }

  switch (condition.kind) {
    case 'ANY':
      return true;
    case 'LESS_THAN':
      return price.lessThan(condition.threshold);
    case 'LESS_THAN_OR_EQUAL':
      return price.lessThanOrEqualTo(condition.threshold);
    case 'GREATER_THAN':
      return price.greaterThan(condition.threshold);
    case 'GREATER_THAN_OR_EQUAL':
      return price.greaterThanOrEqualTo(condition.threshold);
    case 'EQUAL':
      return price.equals(condition.threshold);
    default: {
      const unreachable: never = condition;
      throw new Error(`Unhandled price condition: ${JSON.stringify(unreachable)}`);
    }
  }
}
