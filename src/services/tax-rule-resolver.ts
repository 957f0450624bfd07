import type Decimal from 'decimal.js';
import type { ShopGstRule } from '../models/gst-rule';
import type { ShopCategoryRepository } from '../repositories/shop-category.repository';
import type { GstRuleRepository } from '../repositories/gst-rule.repository';
import { getGstRuleRepository, getShopCategoryRepository } from '../repositories';
import { parseDecimal } from '../utils/decimal';
import { formatLocalDate } from '../utils/date';
import { matchesPriceCondition, toPriceCondition } from '../utils/price-condition';
import { Logger } from '../utils/logger';

export type CategoryLookup = Pick<ShopCategoryRepository, 'findById'>;
export type RuleLookup = Pick<GstRuleRepository, 'findActiveForCategories'>;

/**
 * Picks the GST rule that governs a product of a shop.
 *
 * Rules are searched from the product's own category up through its
 * ancestors. The first level that has any candidate rule decides the
 * outcome: the newest rule there whose price condition accepts the price
 * wins, and if none accepts it the result is null. Ancestors above a level
 * with rules are never consulted.
 *
 * Bad input (unparseable or negative price, unknown category) yields null.
 * Storage errors propagate to the caller.
 */
export class TaxRuleResolver {
  constructor(
    private readonly categories: CategoryLookup = getShopCategoryRepository(),
    private readonly rules: RuleLookup = getGstRuleRepository(),
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Category ids from `categoryId` up to its root, most specific first.
   * Empty when the category itself does not exist.
   */
  async getCategoryLineage(categoryId: number): Promise<number[]> {
    const category = await this.categories.findById(categoryId);
    if (!category) {
      return [];
    }

    const lineage = [category.id];
    const seen = new Set(lineage);
    let parentId = category.parent_id;

    while (parentId !== null) {
      if (seen.has(parentId)) {
        Logger.warn('Category parent chain loops back on itself', { categoryId, parentId, lineage });
        break;
      }

      const parent = await this.categories.findById(parentId);
      if (!parent) {
        break;
      }

      lineage.push(parent.id);
      seen.add(parent.id);
      parentId = parent.parent_id;
    }

    return lineage;
  }

  async findApplicableRule(
    shopId: number,
    productCategoryId: number,
    productInclusivePrice: Decimal.Value,
  ): Promise<ShopGstRule | null> {
    const price = parseDecimal(productInclusivePrice);
    if (!price || price.lessThan(0)) {
      return null;
    }

    const lineage = await this.getCategoryLineage(productCategoryId);
    if (lineage.length === 0) {
      return null;
    }

    const today = formatLocalDate(this.clock());
    const candidates = await this.rules.findActiveForCategories(shopId, lineage, today);
    if (candidates.length === 0) {
      return null;
    }

    for (const categoryId of lineage) {
      const rulesAtLevel = candidates.filter(rule => rule.category_id === categoryId);
      if (rulesAtLevel.length === 0) {
        continue;
      }

      let best: ShopGstRule | null = null;
      for (const rule of rulesAtLevel) {
        if (matchesPriceCondition(toPriceCondition(rule), price) && (!best || rule.id > best.id)) {
          best = rule;
        }
      }
      return best;
    }

    return null;
  }
}
