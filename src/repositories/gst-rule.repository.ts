import type {
  NewShopGstRule,
  ShopGstRule,
  ShopGstRuleChanges,
  ShopGstRuleListResponse,
  ShopGstRuleSearchParams,
} from '../models/gst-rule';

export interface GstRuleRepository {
  create(rule: NewShopGstRule): Promise<ShopGstRule>;
  findById(id: number): Promise<ShopGstRule | null>;
  findAll(params: ShopGstRuleSearchParams): Promise<ShopGstRuleListResponse>;
  findByShop(shopId: number): Promise<ShopGstRule[]>;
  findByShopAndName(shopId: number, name: string): Promise<ShopGstRule | null>;
  /**
   * Active rules of a shop attached to any of `categoryIds` whose validity
   * window contains `onDate` (YYYY-MM-DD, open where a bound is null),
   * newest id first.
   */
  findActiveForCategories(shopId: number, categoryIds: number[], onDate: string): Promise<ShopGstRule[]>;
  countByCategory(categoryId: number): Promise<number>;
  update(id: number, changes: ShopGstRuleChanges): Promise<ShopGstRule | null>;
  delete(id: number): Promise<boolean>;
}
