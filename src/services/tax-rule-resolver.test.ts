import { beforeEach, describe, expect, it } from 'vitest';
import type { NewShopGstRule, ShopGstRule } from '../models/gst-rule';
import type { ShopCategory } from '../models/shop-category';
import { InMemoryShopCategoryRepository } from '../repositories/in-memory-shop-category.repository';
import { InMemoryGstRuleRepository } from '../repositories/in-memory-gst-rule.repository';
import { TaxRuleResolver } from './tax-rule-resolver';

const TODAY = new Date(2025, 5, 15, 12, 0, 0);

describe('TaxRuleResolver', () => {
  let categories: InMemoryShopCategoryRepository;
  let rules: InMemoryGstRuleRepository;
  let resolver: TaxRuleResolver;

  const addCategory = (shopId: number, name: string, parentId: number | null = null): Promise<ShopCategory> =>
    categories.create({
      shop_id: shopId,
      parent_id: parentId,
      name,
      slug: name.toLowerCase(),
      description: null,
      sort_order: 0,
      is_active: true,
    });

  const addRule = (overrides: Partial<NewShopGstRule> & Pick<NewShopGstRule, 'name' | 'category_id'>): Promise<ShopGstRule> =>
    rules.create({
      shop_id: 1,
      price_condition_type: 'ANY',
      price_condition_value: null,
      gst_rate_percentage: '18.00',
      is_active: true,
      start_date: null,
      end_date: null,
      created_by: null,
      updated_by: null,
      ...overrides,
    });

  beforeEach(() => {
    categories = new InMemoryShopCategoryRepository();
    rules = new InMemoryGstRuleRepository();
    resolver = new TaxRuleResolver(categories, rules, () => TODAY);
  });

  describe('getCategoryLineage', () => {
    it('lists the category and its ancestors, most specific first', async () => {
      const root = await addCategory(1, 'Root');
      const mid = await addCategory(1, 'Mid', root.id);
      const leaf = await addCategory(1, 'Leaf', mid.id);

      expect(await resolver.getCategoryLineage(leaf.id)).toEqual([leaf.id, mid.id, root.id]);
    });

    it('is empty for an unknown category', async () => {
      expect(await resolver.getCategoryLineage(999)).toEqual([]);
    });

    it('stops when a parent chain loops back on itself', async () => {
      const a = await addCategory(1, 'A');
      const b = await addCategory(1, 'B', a.id);
      await categories.update(a.id, { parent_id: b.id });

      expect(await resolver.getCategoryLineage(b.id)).toEqual([b.id, a.id]);
    });
  });

  describe('findApplicableRule', () => {
    let root: ShopCategory;
    let mid: ShopCategory;
    let leaf: ShopCategory;

    beforeEach(async () => {
      root = await addCategory(1, 'Root');
      mid = await addCategory(1, 'Mid', root.id);
      leaf = await addCategory(1, 'Leaf', mid.id);
    });

    it('prefers a matching rule on the product category over newer ancestor rules', async () => {
      const leafRule = await addRule({ name: 'leaf', category_id: leaf.id, gst_rate_percentage: '5.00' });
      await addRule({ name: 'mid', category_id: mid.id });
      await addRule({ name: 'root', category_id: root.id });

      const rule = await resolver.findApplicableRule(1, leaf.id, '100.00');

      expect(rule?.id).toBe(leafRule.id);
    });

    it('moves up to the parent and then the root when lower levels have no rules', async () => {
      const rootRule = await addRule({ name: 'root', category_id: root.id });

      expect((await resolver.findApplicableRule(1, leaf.id, '100.00'))?.id).toBe(rootRule.id);

      const midRule = await addRule({ name: 'mid', category_id: mid.id });

      expect((await resolver.findApplicableRule(1, leaf.id, '100.00'))?.id).toBe(midRule.id);
    });

    it('returns null when the nearest level with rules has no match, even if an ancestor would match', async () => {
      await addRule({ name: 'root any', category_id: root.id });
      await addRule({
        name: 'leaf premium',
        category_id: leaf.id,
        price_condition_type: 'GREATER_THAN',
        price_condition_value: '5000.00',
      });

      expect(await resolver.findApplicableRule(1, leaf.id, '100.00')).toBeNull();
    });

    it('picks the rule with the higher id when several match at one level', async () => {
      await addRule({ name: 'older', category_id: leaf.id });
      const newer = await addRule({ name: 'newer', category_id: leaf.id, gst_rate_percentage: '12.00' });

      expect((await resolver.findApplicableRule(1, leaf.id, '100.00'))?.id).toBe(newer.id);
    });

    it('skips non-matching rules at the deciding level in favour of an older match', async () => {
      const older = await addRule({ name: 'any', category_id: leaf.id });
      await addRule({
        name: 'cheap only',
        category_id: leaf.id,
        price_condition_type: 'LESS_THAN',
        price_condition_value: '50.00',
      });

      expect((await resolver.findApplicableRule(1, leaf.id, '100.00'))?.id).toBe(older.id);
    });

    it('ignores rules outside their date window', async () => {
      await addRule({ name: 'expired', category_id: leaf.id, end_date: '2025-06-14' });
      await addRule({ name: 'future', category_id: leaf.id, start_date: '2025-06-16' });

      expect(await resolver.findApplicableRule(1, leaf.id, '100.00')).toBeNull();
    });

    it('treats both date bounds as inclusive', async () => {
      const rule = await addRule({
        name: 'today only',
        category_id: leaf.id,
        start_date: '2025-06-15',
        end_date: '2025-06-15',
      });

      expect((await resolver.findApplicableRule(1, leaf.id, '100.00'))?.id).toBe(rule.id);
    });

    it('lets an ancestor decide when the only leaf rules are out of their window', async () => {
      await addRule({ name: 'expired leaf', category_id: leaf.id, end_date: '2024-12-31' });
      const rootRule = await addRule({ name: 'root', category_id: root.id });

      expect((await resolver.findApplicableRule(1, leaf.id, '100.00'))?.id).toBe(rootRule.id);
    });

    it('ignores inactive rules', async () => {
      await addRule({ name: 'inactive', category_id: leaf.id, is_active: false });

      expect(await resolver.findApplicableRule(1, leaf.id, '100.00')).toBeNull();
    });

    it('never selects a rule belonging to another shop', async () => {
      await addRule({ name: 'other shop', shop_id: 2, category_id: leaf.id });

      expect(await resolver.findApplicableRule(1, leaf.id, '100.00')).toBeNull();
      expect((await resolver.findApplicableRule(2, leaf.id, '100.00'))?.shop_id).toBe(2);
    });

    it('compares thresholds exactly', async () => {
      const rule = await addRule({
        name: 'up to 1000',
        category_id: leaf.id,
        price_condition_type: 'LESS_THAN_OR_EQUAL',
        price_condition_value: '1000.00',
      });

      expect((await resolver.findApplicableRule(1, leaf.id, '1000.00'))?.id).toBe(rule.id);
      expect(await resolver.findApplicableRule(1, leaf.id, '1000.01')).toBeNull();
    });

    it('returns null for an unparseable or negative price', async () => {
      await addRule({ name: 'any', category_id: leaf.id });

      expect(await resolver.findApplicableRule(1, leaf.id, 'abc')).toBeNull();
      expect(await resolver.findApplicableRule(1, leaf.id, '-1')).toBeNull();
    });

    it('returns null for an unknown category', async () => {
      await addRule({ name: 'any', category_id: leaf.id });

      expect(await resolver.findApplicableRule(1, 999, '100.00')).toBeNull();
    });

    it('gives the same answer when asked twice', async () => {
      await addRule({ name: 'a', category_id: mid.id });
      await addRule({ name: 'b', category_id: mid.id });

      const first = await resolver.findApplicableRule(1, leaf.id, '250.00');
      const second = await resolver.findApplicableRule(1, leaf.id, '250.00');

      expect(second).toEqual(first);
    });
  });

  describe('electronics and phones', () => {
    let phones: ShopCategory;
    let phoneRule: ShopGstRule;

    beforeEach(async () => {
      const electronics = await addCategory(1, 'Electronics');
      phones = await addCategory(1, 'Phones', electronics.id);
      await addRule({ name: 'Electronics standard', category_id: electronics.id, gst_rate_percentage: '18.00' });
      phoneRule = await addRule({
        name: 'Premium phones',
        category_id: phones.id,
        price_condition_type: 'GREATER_THAN',
        price_condition_value: '50000.00',
        gst_rate_percentage: '28.00',
      });
    });

    it('applies the premium phone rule above the threshold', async () => {
      const rule = await resolver.findApplicableRule(1, phones.id, '60000');

      expect(rule?.id).toBe(phoneRule.id);
      expect(rule?.gst_rate_percentage).toBe('28.00');
    });

    it('does not fall back to the electronics rule below the threshold', async () => {
      expect(await resolver.findApplicableRule(1, phones.id, '20000')).toBeNull();
    });
  });
});
