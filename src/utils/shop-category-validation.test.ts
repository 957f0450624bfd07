import { describe, expect, it } from 'vitest';

import { generateSlug, validateCreateShopCategory, validateUpdateShopCategory } from './shop-category-validation';

describe('generateSlug', () => {
  it('lowercases and hyphenates', () => {
    expect(generateSlug('  Home & Kitchen_Tools ')).toBe('home-kitchen-tools');
  });
});

describe('validateCreateShopCategory', () => {
  it('accepts the largest INTEGER values', () => {
    expect(
      validateCreateShopCategory({ name: 'Phones', parent_id: 2147483647, sort_order: -2147483648 }),
    ).toEqual({
      valid: true,
      data: { name: 'Phones', slug: 'phones', parent_id: 2147483647, sort_order: -2147483648 },
    });
  });

  it('rejects ids and sort orders outside the INTEGER range', () => {
    expect(validateCreateShopCategory({ name: 'Phones', sort_order: 9999999999, parent_id: 5000000000 })).toEqual({
      valid: false,
      errors: ['parent_id must be a positive integer', 'sort_order must be between -2147483648 and 2147483647'],
    });
  });

  it('needs a name that yields a slug', () => {
    expect(validateCreateShopCategory({ name: '&&&' })).toEqual({
      valid: false,
      errors: ['name must contain at least one letter or digit'],
    });
  });
});

describe('validateUpdateShopCategory', () => {
  it('rejects an oversized sort order', () => {
    expect(validateUpdateShopCategory({ sort_order: 2147483648 })).toEqual({
      valid: false,
      errors: ['sort_order must be between -2147483648 and 2147483647'],
    });
  });
});
