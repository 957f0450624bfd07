import type { CreateShopDTO } from '../models/shop';
import type { CreateShopCategoryDTO, UpdateShopCategoryDTO } from '../models/shop-category';
import type { ValidationResult } from './validation';
import {
  hasField,
  isRecord,
  readBoolean,
  readInteger,
  readNullableId,
  readNullableString,
  readString,
} from './validation';

const NAME_MAX_LENGTH = 100;
const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export function generateSlug(name: string): string {
  return name
    .toLowerCase()
    .trim()
    .replace(/[^\w\s-]/g, '')
    .replace(/[\s_-]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

function readSlug(value: unknown, errors: string[]): string | undefined {
  const slug = readString(value, 'slug', errors, NAME_MAX_LENGTH);
  if (slug !== undefined && !SLUG_PATTERN.test(slug)) {
    errors.push('slug may only contain lowercase letters, digits and single hyphens');
    return undefined;
  }
  return slug;
}

export function validateCreateShop(input: unknown): ValidationResult<CreateShopDTO> {
  if (!isRecord(input)) {
    return { valid: false, errors: ['request body must be an object'] };
  }

  const errors: string[] = [];
  const name = readString(input.name, 'name', errors, NAME_MAX_LENGTH);
  const isActive = hasField(input, 'is_active') ? readBoolean(input.is_active, 'is_active', errors) : true;

  if (name === undefined || isActive === undefined) {
    return { valid: false, errors };
  }

  return { valid: true, data: { name, is_active: isActive } };
}

export function validateCreateShopCategory(input: unknown): ValidationResult<CreateShopCategoryDTO> {
  if (!isRecord(input)) {
    return { valid: false, errors: ['request body must be an object'] };
  }

  const errors: string[] = [];
  const data: CreateShopCategoryDTO = {
    name: readString(input.name, 'name', errors, NAME_MAX_LENGTH) ?? '',
  };

  if (hasField(input, 'slug')) data.slug = readSlug(input.slug, errors);
  if (hasField(input, 'parent_id')) data.parent_id = readNullableId(input.parent_id, 'parent_id', errors);
  if (hasField(input, 'description')) data.description = readNullableString(input.description, 'description', errors);
  if (hasField(input, 'sort_order')) data.sort_order = readInteger(input.sort_order, 'sort_order', errors);
  if (hasField(input, 'is_active')) data.is_active = readBoolean(input.is_active, 'is_active', errors);

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  if (!data.slug) {
    data.slug = generateSlug(data.name);
    if (!data.slug) {
      return { valid: false, errors: ['name must contain at least one letter or digit'] };
    }
  }

  return { valid: true, data };
}

export function validateUpdateShopCategory(input: unknown): ValidationResult<UpdateShopCategoryDTO> {
  if (!isRecord(input)) {
    return { valid: false, errors: ['request body must be an object'] };
  }

  const errors: string[] = [];
  const data: UpdateShopCategoryDTO = {};

  if (hasField(input, 'name')) data.name = readString(input.name, 'name', errors, NAME_MAX_LENGTH);
  if (hasField(input, 'slug')) data.slug = readSlug(input.slug, errors);
  if (hasField(input, 'parent_id')) data.parent_id = readNullableId(input.parent_id, 'parent_id', errors);
  if (hasField(input, 'description')) data.description = readNullableString(input.description, 'description', errors);
  if (hasField(input, 'sort_order')) data.sort_order = readInteger(input.sort_order, 'sort_order', errors);
  if (hasField(input, 'is_active')) data.is_active = readBoolean(input.is_active, 'is_active', errors);

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  return { valid: true, data };
}
