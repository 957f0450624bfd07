import type {
  NewShopGstRule,
  ShopGstRule,
  ShopGstRuleChanges,
  ShopGstRuleListResponse,
  ShopGstRuleSearchParams,
} from '../models/gst-rule';
import type { GstRuleRepository } from './gst-rule.repository';
import { ConflictError } from '../utils/errors';

export class InMemoryGstRuleRepository implements GstRuleRepository {
  private rules: ShopGstRule[] = [];
  private nextId: number = 1;

  private assertUniqueName(shopId: number, name: string, excludeId?: number): void {
    if (this.rules.some(r => r.shop_id === shopId && r.name === name && r.id !== excludeId)) {
      throw new ConflictError(`A GST rule with the name '${name}' already exists for this shop.`);
    }
  }

  async create(ruleData: NewShopGstRule): Promise<ShopGstRule> {
    this.assertUniqueName(ruleData.shop_id, ruleData.name);

    const now = new Date();
    const newRule: ShopGstRule = {
      id: this.nextId++,
      ...ruleData,
      created_at: now,
      updated_at: now,
    };

    this.rules.push(newRule);
    return { ...newRule };
  }

  async findById(id: number): Promise<ShopGstRule | null> {
    const rule = this.rules.find(r => r.id === id);
    return rule ? { ...rule } : null;
  }

  async findAll(params: ShopGstRuleSearchParams): Promise<ShopGstRuleListResponse> {
    let filtered = [...this.rules];

    if (params.shop_id !== undefined) {
      filtered = filtered.filter(r => r.shop_id === params.shop_id);
    }

    if (params.category_id !== undefined) {
      filtered = filtered.filter(r => r.category_id === params.category_id);
    }

    if (params.is_active !== undefined) {
      filtered = filtered.filter(r => r.is_active === params.is_active);
    }

    filtered.sort((a, b) => a.shop_id - b.shop_id || a.name.localeCompare(b.name));

    const total = filtered.length;
    const limit = params.limit || 20;
    const page = params.page || 1;
    const offset = (page - 1) * limit;

    return {
      gst_rules: filtered.slice(offset, offset + limit).map(r => ({ ...r })),
      total,
      page,
      limit,
    };
  }

  async findByShop(shopId: number): Promise<ShopGstRule[]> {
    return this.rules
      .filter(r => r.shop_id === shopId)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(r => ({ ...r }));
  }

  async findByShopAndName(shopId: number, name: string): Promise<ShopGstRule | null> {
    const rule = this.rules.find(r => r.shop_id === shopId && r.name === name);
    return rule ? { ...rule } : null;
  }

  async findActiveForCategories(shopId: number, categoryIds: number[], onDate: string): Promise<ShopGstRule[]> {
    return this.rules
      .filter(
        r =>
          r.is_active &&
          r.shop_id === shopId &&
          categoryIds.includes(r.category_id) &&
          (r.start_date === null || r.start_date <= onDate) &&
          (r.end_date === null || r.end_date >= onDate),
      )
      .sort((a, b) => b.id - a.id)
      .map(r => ({ ...r }));
  }

  async countByCategory(categoryId: number): Promise<number> {
    return this.rules.filter(r => r.category_id === categoryId).length;
  }

  async update(id: number, changes: ShopGstRuleChanges): Promise<ShopGstRule | null> {
    const index = this.rules.findIndex(r => r.id === id);
    if (index === -1) return null;

    const updated: ShopGstRule = {
      ...this.rules[index],
      ...changes,
      updated_at: new Date(),
    };
    this.assertUniqueName(updated.shop_id, updated.name, id);

    this.rules[index] = updated;
    return { ...updated };
  }

  async delete(id: number): Promise<boolean> {
    const index = this.rules.findIndex(r => r.id === id);
    if (index === -1) return false;

    this.rules.splice(index, 1);
    return true;
  }
}
