import { describe, expect, it } from 'vitest';

import { validateCreateGstRule, validateResolveRequest, validateUpdateGstRule } from './gst-rule-validation';

const validRule = {
  name: 'Premium phones',
  shop_id: 1,
  category_id: 2,
  price_condition_type: 'GREATER_THAN',
  price_condition_value: 50000,
  gst_rate_percentage: '28',
};

describe('validateCreateGstRule', () => {
  it('normalizes money and applies defaults', () => {
    expect(validateCreateGstRule(validRule)).toEqual({
      valid: true,
      data: {
        name: 'Premium phones',
        shop_id: 1,
        category_id: 2,
        price_condition_type: 'GREATER_THAN',
        price_condition_value: '50000.00',
        gst_rate_percentage: '28.00',
        is_active: true,
        start_date: null,
        end_date: null,
      },
    });
  });

  it('drops the threshold of an ANY rule', () => {
    const result = validateCreateGstRule({ ...validRule, price_condition_type: 'ANY' });

    expect(result.valid && result.data.price_condition_value).toBeNull();
  });

  it('collects every field error', () => {
    const result = validateCreateGstRule({
      name: ' ',
      shop_id: 0,
      category_id: 'x',
      price_condition_type: 'BETWEEN',
      gst_rate_percentage: '100.5',
    });

    expect(result).toEqual({
      valid: false,
      errors: [
        'name is required',
        'shop_id must be a positive integer',
        'category_id must be a positive integer',
        'price_condition_type must be one of: ANY, LESS_THAN, LESS_THAN_OR_EQUAL, GREATER_THAN, GREATER_THAN_OR_EQUAL, EQUAL',
        'gst_rate_percentage must be at most 100',
      ],
    });
  });

  it('rejects too many decimal places and negative thresholds', () => {
    expect(validateCreateGstRule({ ...validRule, gst_rate_percentage: '18.125' })).toEqual({
      valid: false,
      errors: ['gst_rate_percentage must have at most 2 decimal places'],
    });
    expect(validateCreateGstRule({ ...validRule, price_condition_value: -1 })).toEqual({
      valid: false,
      errors: ['price_condition_value must be at least 0'],
    });
  });

  it('rejects values too large for the rule columns', () => {
    expect(validateCreateGstRule({ ...validRule, price_condition_value: '123456789012.00' })).toEqual({
      valid: false,
      errors: ['price_condition_value must be at most 99999999.99'],
    });
    expect(validateCreateGstRule({ ...validRule, price_condition_value: '99999999.99' })).toMatchObject({ valid: true });
    expect(validateCreateGstRule({ ...validRule, shop_id: 2147483648, category_id: '5000000000' })).toEqual({
      valid: false,
      errors: ['shop_id must be a positive integer', 'category_id must be a positive integer'],
    });
  });

  it('requires a threshold for comparison conditions', () => {
    expect(validateCreateGstRule({ ...validRule, price_condition_value: null })).toEqual({
      valid: false,
      errors: ['price_condition_value is required when price_condition_type is GREATER_THAN'],
    });
  });

  it('checks the date window', () => {
    expect(validateCreateGstRule({ ...validRule, start_date: '2025-02-30' })).toEqual({
      valid: false,
      errors: ['start_date must be a date in YYYY-MM-DD format'],
    });
    expect(validateCreateGstRule({ ...validRule, start_date: '2025-07-01', end_date: '2025-06-30' })).toEqual({
      valid: false,
      errors: ['start_date cannot be after end_date'],
    });
  });

  it('rejects a non-object body', () => {
    expect(validateCreateGstRule([])).toEqual({ valid: false, errors: ['request body must be an object'] });
  });
});

describe('validateUpdateGstRule', () => {
  it('keeps only the fields that were sent', () => {
    expect(validateUpdateGstRule({ gst_rate_percentage: 12, end_date: '' })).toEqual({
      valid: true,
      data: { gst_rate_percentage: '12.00', end_date: null },
    });
  });

  it('reports invalid fields', () => {
    expect(validateUpdateGstRule({ is_active: 'yes' })).toEqual({
      valid: false,
      errors: ['is_active must be a boolean'],
    });
  });
});

describe('validateResolveRequest', () => {
  it('defaults quantity to one', () => {
    expect(validateResolveRequest({ shop_id: '1', category_id: 3, price: 60000 })).toEqual({
      valid: true,
      data: { shop_id: 1, category_id: 3, price: '60000.00', quantity: 1 },
    });
  });

  it('bounds quantity', () => {
    expect(validateResolveRequest({ shop_id: 1, category_id: 3, price: '10', quantity: 0 })).toEqual({
      valid: false,
      errors: ['quantity must be an integer between 1 and 10000'],
    });
  });

  it('rejects a negative or missing price', () => {
    expect(validateResolveRequest({ shop_id: 1, category_id: 3, price: '-5' })).toEqual({
      valid: false,
      errors: ['price must be at least 0'],
    });
    expect(validateResolveRequest({ shop_id: 1, category_id: 3 })).toEqual({
      valid: false,
      errors: ['price must be a decimal number'],
    });
  });
});
