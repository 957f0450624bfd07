import type { ShopCategory, NewShopCategory, UpdateShopCategoryDTO } from '../models/shop-category';

export interface ShopCategoryRepository {
  create(category: NewShopCategory): Promise<ShopCategory>;
  findById(id: number): Promise<ShopCategory | null>;
  findByShop(shopId: number): Promise<ShopCategory[]>;
  findByShopAndName(shopId: number, name: string): Promise<ShopCategory | null>;
  findByShopAndSlug(shopId: number, slug: string): Promise<ShopCategory | null>;
  countChildren(id: number): Promise<number>;
  update(id: number, category: UpdateShopCategoryDTO): Promise<ShopCategory | null>;
  delete(id: number): Promise<boolean>;
}
