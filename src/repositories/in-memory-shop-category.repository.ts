import type { ShopCategory, NewShopCategory, UpdateShopCategoryDTO } from '../models/shop-category';
import type { ShopCategoryRepository } from './shop-category.repository';
import { ConflictError } from '../utils/errors';

export class InMemoryShopCategoryRepository implements ShopCategoryRepository {
  private categories: ShopCategory[] = [];
  private nextId: number = 1;

  private assertUnique(shopId: number, name: string, slug: string, excludeId?: number): void {
    const clash = this.categories.find(
      c => c.shop_id === shopId && c.id !== excludeId && (c.name === name || c.slug === slug),
    );
    if (clash) {
      throw new ConflictError(`Category "${clash.name === name ? name : slug}" already exists in shop ${shopId}`);
    }
  }

  async create(categoryData: NewShopCategory): Promise<ShopCategory> {
    this.assertUnique(categoryData.shop_id, categoryData.name, categoryData.slug);

    const now = new Date();
    const newCategory: ShopCategory = {
      id: this.nextId++,
      ...categoryData,
      created_at: now,
      updated_at: now,
    };

    this.categories.push(newCategory);
    return { ...newCategory };
  }

  async findById(id: number): Promise<ShopCategory | null> {
    const category = this.categories.find(c => c.id === id);
    return category ? { ...category } : null;
  }

  async findByShop(shopId: number): Promise<ShopCategory[]> {
    return this.categories
      .filter(c => c.shop_id === shopId)
      .sort((a, b) => a.sort_order - b.sort_order || a.name.localeCompare(b.name))
      .map(c => ({ ...c }));
  }

  async findByShopAndName(shopId: number, name: string): Promise<ShopCategory | null> {
    const category = this.categories.find(c => c.shop_id === shopId && c.name === name);
    return category ? { ...category } : null;
  }

  async findByShopAndSlug(shopId: number, slug: string): Promise<ShopCategory | null> {
    const category = this.categories.find(c => c.shop_id === shopId && c.slug === slug);
    return category ? { ...category } : null;
  }

  async countChildren(id: number): Promise<number> {
    return this.categories.filter(c => c.parent_id === id).length;
  }

  async update(id: number, categoryData: UpdateShopCategoryDTO): Promise<ShopCategory | null> {
    const index = this.categories.findIndex(c => c.id === id);
    if (index === -1) return null;

    const existing = this.categories[index];
    const updated: ShopCategory = {
      ...existing,
      ...categoryData,
      updated_at: new Date(),
    };
    this.assertUnique(updated.shop_id, updated.name, updated.slug, id);

    this.categories[index] = updated;
    return { ...updated };
  }

  async delete(id: number): Promise<boolean> {
    const index = this.categories.findIndex(c => c.id === id);
    if (index === -1) return false;

    this.categories.splice(index, 1);
    return true;
  }
}
