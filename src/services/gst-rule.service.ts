import Decimal from 'decimal.js';
import type {
  GstResolution,
  ShopGstRule,
  ShopGstRuleListResponse,
  ShopGstRuleSearchParams,
} from '../models/gst-rule';
import type { GstRuleRepository } from '../repositories/gst-rule.repository';
import type { ShopCategoryRepository } from '../repositories/shop-category.repository';
import type { ShopRepository } from '../repositories/shop.repository';
import { getGstRuleRepository, getShopCategoryRepository, getShopRepository } from '../repositories';
import { TaxRuleResolver } from './tax-rule-resolver';
import {
  checkGstRuleConsistency,
  normalizeConditionValue,
  validateCreateGstRule,
  validateResolveRequest,
  validateUpdateGstRule,
} from '../utils/gst-rule-validation';
import { calculateInclusiveGst } from '../utils/gst-calculation';
import { BadRequestError, ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { Logger } from '../utils/logger';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export class GstRuleService {
  private readonly resolver: TaxRuleResolver;

  constructor(
    private readonly repository: GstRuleRepository = getGstRuleRepository(),
    private readonly shopRepository: ShopRepository = getShopRepository(),
    private readonly categoryRepository: ShopCategoryRepository = getShopCategoryRepository(),
    resolver?: TaxRuleResolver,
  ) {
    this.resolver = resolver ?? new TaxRuleResolver(categoryRepository, repository);
  }

  private async validateShop(shopId: number): Promise<void> {
    const shop = await this.shopRepository.findById(shopId);
    if (!shop) {
      throw new BadRequestError(`Shop with ID ${shopId} not found.`);
    }
  }

  private async validateCategory(shopId: number, categoryId: number): Promise<void> {
    const category = await this.categoryRepository.findById(categoryId);
    if (!category || category.shop_id !== shopId) {
      throw new BadRequestError(`Category with ID ${categoryId} not found in shop ${shopId}.`);
    }
  }

  private async validateUniqueName(shopId: number, name: string, excludeId?: number): Promise<void> {
    const existing = await this.repository.findByShopAndName(shopId, name);
    if (existing && existing.id !== excludeId) {
      throw new ConflictError(`A GST rule with the name '${name}' already exists for this shop.`);
    }
  }

  async listRules(params: ShopGstRuleSearchParams): Promise<ShopGstRuleListResponse> {
    const page = params.page && params.page > 0 ? params.page : 1;
    const limit = Math.min(params.limit && params.limit > 0 ? params.limit : DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
    return this.repository.findAll({ ...params, page, limit });
  }

  async listRulesByShop(shopId: number): Promise<ShopGstRule[]> {
    const shop = await this.shopRepository.findById(shopId);
    if (!shop) {
      throw new NotFoundError(`Shop with ID ${shopId} not found.`);
    }
    return this.repository.findByShop(shopId);
  }

  async getRule(id: number): Promise<ShopGstRule> {
    const rule = await this.repository.findById(id);
    if (!rule) {
      throw new NotFoundError(`Shop GST rule with ID ${id} not found.`);
    }
    return rule;
  }

  async createRule(input: unknown, adminId: number | null): Promise<ShopGstRule> {
    const validation = validateCreateGstRule(input);
    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }
    const data = validation.data;

    await this.validateShop(data.shop_id);
    await this.validateCategory(data.shop_id, data.category_id);
    await this.validateUniqueName(data.shop_id, data.name);

    const rule = await this.repository.create({ ...data, created_by: adminId, updated_by: adminId });
    Logger.info(`Shop GST rule '${rule.name}' created`, { ruleId: rule.id, shopId: rule.shop_id, adminId });
    return rule;
  }

  async updateRule(id: number, input: unknown, adminId: number | null): Promise<ShopGstRule> {
    const existing = await this.getRule(id);

    const validation = validateUpdateGstRule(input);
    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }
    const changes = validation.data;
    const merged = { ...existing, ...changes };
    merged.price_condition_value = normalizeConditionValue(merged.price_condition_type, merged.price_condition_value);

    const consistencyErrors = checkGstRuleConsistency(merged);
    if (consistencyErrors.length > 0) {
      throw new ValidationError(consistencyErrors);
    }

    const shopChanged = merged.shop_id !== existing.shop_id;
    if (shopChanged) {
      await this.validateShop(merged.shop_id);
    }
    if (shopChanged || merged.category_id !== existing.category_id) {
      await this.validateCategory(merged.shop_id, merged.category_id);
    }
    if (shopChanged || merged.name !== existing.name) {
      await this.validateUniqueName(merged.shop_id, merged.name, id);
    }

    const updated = await this.repository.update(id, {
      ...changes,
      price_condition_value: merged.price_condition_value,
      updated_by: adminId,
    });
    if (!updated) {
      throw new NotFoundError(`Shop GST rule with ID ${id} not found.`);
    }

    Logger.info(`Shop GST rule ID ${id} updated`, { ruleId: id, adminId });
    return updated;
  }

  async deleteRule(id: number, adminId: number | null): Promise<{ message: string }> {
    const rule = await this.getRule(id);

    const deleted = await this.repository.delete(id);
    if (!deleted) {
      throw new NotFoundError(`Shop GST rule with ID ${id} not found.`);
    }

    Logger.info(`Shop GST rule '${rule.name}' deleted`, { ruleId: id, shopId: rule.shop_id, adminId });
    return { message: `Shop GST rule '${rule.name}' deleted successfully.` };
  }

  /**
   * Finds the governing rule for a product and splits its inclusive price
   * into base and GST. With no applicable rule the rate is 0.00.
   */
  async resolve(input: unknown): Promise<GstResolution> {
    const validation = validateResolveRequest(input);
    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }
    const { shop_id, category_id, price, quantity } = validation.data;

    const rule = await this.resolver.findApplicableRule(shop_id, category_id, price);
    const rate = new Decimal(rule ? rule.gst_rate_percentage : 0);
    const breakdown = calculateInclusiveGst(new Decimal(price), rate, quantity);

    Logger.debug('GST resolved', { shopId: shop_id, categoryId: category_id, price, ruleId: rule?.id ?? null });

    return {
      rule,
      gst_rate_percentage: rate.toFixed(2),
      quantity,
      unit_price_inclusive_gst: breakdown.unitInclusive.toFixed(2),
      unit_base_price: breakdown.unitBase.toFixed(2),
      unit_gst_amount: breakdown.unitGst.toFixed(2),
      line_base_price: breakdown.lineBase.toFixed(2),
      line_gst_amount: breakdown.lineGst.toFixed(2),
      line_total_inclusive_gst: breakdown.lineTotal.toFixed(2),
    };
  }
}
