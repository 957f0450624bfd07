import { getDatabase } from '../database';
import { getStorageType } from '../config/env';
import type { ShopRepository } from './shop.repository';
import { InMemoryShopRepository } from './in-memory-shop.repository';
import { PostgreSQLShopRepository } from './postgresql-shop.repository';
import type { ShopCategoryRepository } from './shop-category.repository';
import { InMemoryShopCategoryRepository } from './in-memory-shop-category.repository';
import { PostgreSQLShopCategoryRepository } from './postgresql-shop-category.repository';
import type { GstRuleRepository } from './gst-rule.repository';
import { InMemoryGstRuleRepository } from './in-memory-gst-rule.repository';
import { PostgreSQLGstRuleRepository } from './postgresql-gst-rule.repository';

let shopRepository: ShopRepository | null = null;
let shopCategoryRepository: ShopCategoryRepository | null = null;
let gstRuleRepository: GstRuleRepository | null = null;

export function getShopRepository(): ShopRepository {
  if (!shopRepository) {
    shopRepository =
      getStorageType() === 'memory' ? new InMemoryShopRepository() : new PostgreSQLShopRepository(getDatabase());
  }
  return shopRepository;
}

export function getShopCategoryRepository(): ShopCategoryRepository {
  if (!shopCategoryRepository) {
    shopCategoryRepository =
      getStorageType() === 'memory'
        ? new InMemoryShopCategoryRepository()
        : new PostgreSQLShopCategoryRepository(getDatabase());
  }
  return shopCategoryRepository;
}

export function getGstRuleRepository(): GstRuleRepository {
  if (!gstRuleRepository) {
    gstRuleRepository =
      getStorageType() === 'memory' ? new InMemoryGstRuleRepository() : new PostgreSQLGstRuleRepository(getDatabase());
  }
  return gstRuleRepository;
}
