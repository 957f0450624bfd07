import { PRICE_CONDITION_TYPES } from '../models/gst-rule';
import type {
  CreateShopGstRuleDTO,
  PriceConditionType,
  ResolveGstRequest,
  UpdateShopGstRuleDTO,
} from '../models/gst-rule';
import type { ValidationResult } from './validation';
import {
  hasField,
  isRecord,
  readBoolean,
  readDecimalString,
  readId,
  readNullableDate,
  readString,
} from './validation';

const NAME_MAX_LENGTH = 100;
const MAX_QUANTITY = 10000;
// price_condition_value is NUMERIC(10,2)
const MAX_CONDITION_VALUE = '99999999.99';

function isPriceConditionType(value: unknown): value is PriceConditionType {
  return typeof value === 'string' && PRICE_CONDITION_TYPES.some(type => type === value);
}

function readConditionType(value: unknown, errors: string[]): PriceConditionType | undefined {
  if (!isPriceConditionType(value)) {
    errors.push(`price_condition_type must be one of: ${PRICE_CONDITION_TYPES.join(', ')}`);
    return undefined;
  }
  return value;
}

function readConditionValue(value: unknown, errors: string[]): string | null | undefined {
  if (value === null || value === '') return null;
  return readDecimalString(value, 'price_condition_value', errors, { min: 0, max: MAX_CONDITION_VALUE, places: 2 });
}

function readRate(value: unknown, errors: string[]): string | undefined {
  return readDecimalString(value, 'gst_rate_percentage', errors, { min: 0, max: 100, places: 2 });
}

/**
 * Cross-field rules that must hold for a complete rule record, whether it
 * comes from a create payload or from an update merged onto a stored rule.
 */
export function checkGstRuleConsistency(
  rule: Pick<CreateShopGstRuleDTO, 'price_condition_type' | 'price_condition_value' | 'start_date' | 'end_date'>,
): string[] {
  const errors: string[] = [];

  if (rule.price_condition_type !== 'ANY' && rule.price_condition_value === null) {
    errors.push(`price_condition_value is required when price_condition_type is ${rule.price_condition_type}`);
  }

  if (rule.start_date && rule.end_date && rule.start_date > rule.end_date) {
    errors.push('start_date cannot be after end_date');
  }

  return errors;
}

/**
 * A threshold on an ANY rule has no meaning; it is dropped so stored rules
 * never carry one.
 */
export function normalizeConditionValue(type: PriceConditionType, value: string | null): string | null {
  return type === 'ANY' ? null : value;
}

export function validateCreateGstRule(input: unknown): ValidationResult<CreateShopGstRuleDTO> {
  if (!isRecord(input)) {
    return { valid: false, errors: ['request body must be an object'] };
  }

  const errors: string[] = [];
  const name = readString(input.name, 'name', errors, NAME_MAX_LENGTH);
  const shopId = readId(input.shop_id, 'shop_id', errors);
  const categoryId = readId(input.category_id, 'category_id', errors);
  const conditionType = readConditionType(input.price_condition_type, errors);
  const conditionValue = hasField(input, 'price_condition_value')
    ? readConditionValue(input.price_condition_value, errors)
    : null;
  const rate = readRate(input.gst_rate_percentage, errors);
  const isActive = hasField(input, 'is_active') ? readBoolean(input.is_active, 'is_active', errors) : true;
  const startDate = hasField(input, 'start_date') ? readNullableDate(input.start_date, 'start_date', errors) : null;
  const endDate = hasField(input, 'end_date') ? readNullableDate(input.end_date, 'end_date', errors) : null;

  if (
    name === undefined ||
    shopId === undefined ||
    categoryId === undefined ||
    conditionType === undefined ||
    conditionValue === undefined ||
    rate === undefined ||
    isActive === undefined ||
    startDate === undefined ||
    endDate === undefined
  ) {
    return { valid: false, errors };
  }

  const data: CreateShopGstRuleDTO = {
    name,
    shop_id: shopId,
    category_id: categoryId,
    price_condition_type: conditionType,
    price_condition_value: normalizeConditionValue(conditionType, conditionValue),
    gst_rate_percentage: rate,
    is_active: isActive,
    start_date: startDate,
    end_date: endDate,
  };

  const consistencyErrors = checkGstRuleConsistency(data);
  if (consistencyErrors.length > 0) {
    return { valid: false, errors: consistencyErrors };
  }

  return { valid: true, data };
}

export function validateUpdateGstRule(input: unknown): ValidationResult<UpdateShopGstRuleDTO> {
  if (!isRecord(input)) {
    return { valid: false, errors: ['request body must be an object'] };
  }

  const errors: string[] = [];
  const data: UpdateShopGstRuleDTO = {};

  if (hasField(input, 'name')) {
    data.name = readString(input.name, 'name', errors, NAME_MAX_LENGTH);
  }
  if (hasField(input, 'shop_id')) {
    data.shop_id = readId(input.shop_id, 'shop_id', errors);
  }
  if (hasField(input, 'category_id')) {
    data.category_id = readId(input.category_id, 'category_id', errors);
  }
  if (hasField(input, 'price_condition_type')) {
    data.price_condition_type = readConditionType(input.price_condition_type, errors);
  }
  if (hasField(input, 'price_condition_value')) {
    data.price_condition_value = readConditionValue(input.price_condition_value, errors);
  }
  if (hasField(input, 'gst_rate_percentage')) {
    data.gst_rate_percentage = readRate(input.gst_rate_percentage, errors);
  }
  if (hasField(input, 'is_active')) {
    data.is_active = readBoolean(input.is_active, 'is_active', errors);
  }
  if (hasField(input, 'start_date')) {
    data.start_date = readNullableDate(input.start_date, 'start_date', errors);
  }
  if (hasField(input, 'end_date')) {
    data.end_date = readNullableDate(input.end_date, 'end_date', errors);
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  return { valid: true, data };
}

export function validateResolveRequest(input: unknown): ValidationResult<ResolveGstRequest> {
  if (!isRecord(input)) {
    return { valid: false, errors: ['request body must be an object'] };
  }

  const errors: string[] = [];
  const shopId = readId(input.shop_id, 'shop_id', errors);
  const categoryId = readId(input.category_id, 'category_id', errors);
  const price = readDecimalString(input.price, 'price', errors, { min: 0, places: 2 });

  let quantity: number | undefined = 1;
  if (hasField(input, 'quantity')) {
    const value = input.quantity;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > MAX_QUANTITY) {
      errors.push(`quantity must be an integer between 1 and ${MAX_QUANTITY}`);
      quantity = undefined;
    } else {
      quantity = value;
    }
  }

  if (shopId === undefined || categoryId === undefined || price === undefined || quantity === undefined) {
    return { valid: false, errors };
  }

  return { valid: true, data: { shop_id: shopId, category_id: categoryId, price, quantity } };
}
