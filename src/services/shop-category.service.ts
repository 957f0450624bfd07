import type { ShopCategory, UpdateShopCategoryDTO } from '../models/shop-category';
import type { ShopCategoryRepository } from '../repositories/shop-category.repository';
import type { ShopRepository } from '../repositories/shop.repository';
import type { GstRuleRepository } from '../repositories/gst-rule.repository';
import { getGstRuleRepository, getShopCategoryRepository, getShopRepository } from '../repositories';
import { validateCreateShopCategory, validateUpdateShopCategory } from '../utils/shop-category-validation';
import { BadRequestError, ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { Logger } from '../utils/logger';

export class ShopCategoryService {
  constructor(
    private readonly repository: ShopCategoryRepository = getShopCategoryRepository(),
    private readonly shopRepository: ShopRepository = getShopRepository(),
    private readonly gstRuleRepository: GstRuleRepository = getGstRuleRepository(),
  ) {}

  private async requireShop(shopId: number): Promise<void> {
    const shop = await this.shopRepository.findById(shopId);
    if (!shop) {
      throw new NotFoundError(`Shop with ID ${shopId} not found.`);
    }
  }

  /**
   * A parent must live in the same shop and, when moving an existing
   * category, must not be that category or one of its descendants.
   */
  private async validateParent(shopId: number, parentId: number, categoryId?: number): Promise<void> {
    const parent = await this.repository.findById(parentId);
    if (!parent || parent.shop_id !== shopId) {
      throw new BadRequestError(`Parent category with ID ${parentId} not found in shop ${shopId}.`);
    }

    if (categoryId === undefined) return;

    const seen = new Set<number>();
    let current: ShopCategory | null = parent;
    while (current && !seen.has(current.id)) {
      if (current.id === categoryId) {
        throw new BadRequestError('A category cannot be moved under itself or one of its subcategories.');
      }
      seen.add(current.id);
      current = current.parent_id === null ? null : await this.repository.findById(current.parent_id);
    }
  }

  private async ensureUnique(shopId: number, name: string | undefined, slug: string | undefined, excludeId?: number): Promise<void> {
    if (name !== undefined) {
      const existing = await this.repository.findByShopAndName(shopId, name);
      if (existing && existing.id !== excludeId) {
        throw new ConflictError(`A category named '${name}' already exists in this shop.`);
      }
    }
    if (slug !== undefined) {
      const existing = await this.repository.findByShopAndSlug(shopId, slug);
      if (existing && existing.id !== excludeId) {
        throw new ConflictError(`A category with slug '${slug}' already exists in this shop.`);
      }
    }
  }

  async createCategory(shopId: number, input: unknown): Promise<ShopCategory> {
    await this.requireShop(shopId);

    const validation = validateCreateShopCategory(input);
    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }
    const data = validation.data;
    const slug = data.slug ?? '';
    const parentId = data.parent_id ?? null;

    if (parentId !== null) {
      await this.validateParent(shopId, parentId);
    }
    await this.ensureUnique(shopId, data.name, slug);

    const category = await this.repository.create({
      shop_id: shopId,
      parent_id: parentId,
      name: data.name,
      slug,
      description: data.description ?? null,
      sort_order: data.sort_order ?? 0,
      is_active: data.is_active ?? true,
    });

    Logger.info('Shop category created', { shopId, categoryId: category.id, parentId });
    return category;
  }

  async listCategories(shopId: number): Promise<ShopCategory[]> {
    await this.requireShop(shopId);
    return this.repository.findByShop(shopId);
  }

  async getCategoryById(id: number): Promise<ShopCategory> {
    const category = await this.repository.findById(id);
    if (!category) {
      throw new NotFoundError(`Category with ID ${id} not found.`);
    }
    return category;
  }

  async updateCategory(id: number, input: unknown): Promise<ShopCategory> {
    const existing = await this.getCategoryById(id);

    const validation = validateUpdateShopCategory(input);
    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }
    const changes: UpdateShopCategoryDTO = validation.data;

    if (changes.parent_id !== undefined && changes.parent_id !== null && changes.parent_id !== existing.parent_id) {
      await this.validateParent(existing.shop_id, changes.parent_id, id);
    }
    await this.ensureUnique(
      existing.shop_id,
      changes.name !== existing.name ? changes.name : undefined,
      changes.slug !== existing.slug ? changes.slug : undefined,
      id,
    );

    const updated = await this.repository.update(id, changes);
    if (!updated) {
      throw new NotFoundError(`Category with ID ${id} not found.`);
    }
    return updated;
  }

  async deleteCategory(id: number): Promise<{ message: string }> {
    const category = await this.getCategoryById(id);

    if ((await this.repository.countChildren(id)) > 0) {
      throw new ConflictError(`Category '${category.name}' has subcategories and cannot be deleted.`);
    }
    if ((await this.gstRuleRepository.countByCategory(id)) > 0) {
      throw new ConflictError(`Category '${category.name}' is referenced by GST rules and cannot be deleted.`);
    }

    await this.repository.delete(id);
    Logger.info('Shop category deleted', { categoryId: id, shopId: category.shop_id });
    return { message: `Category '${category.name}' deleted successfully.` };
  }
}
