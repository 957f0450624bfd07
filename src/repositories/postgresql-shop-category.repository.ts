import type { DatabaseAdapter } from '../database/adapter';
import type { ShopCategory, NewShopCategory, UpdateShopCategoryDTO } from '../models/shop-category';
import type { ShopCategoryRepository } from './shop-category.repository';
import { rethrowUniqueViolation } from './postgresql-errors';

const UPDATABLE_COLUMNS = ['name', 'slug', 'parent_id', 'description', 'sort_order', 'is_active'] as const;

export class PostgreSQLShopCategoryRepository implements ShopCategoryRepository {
  constructor(private db: DatabaseAdapter) {}

  async create(categoryData: NewShopCategory): Promise<ShopCategory> {
    const query = `
      INSERT INTO shop_categories (
        shop_id, parent_id, name, slug, description, sort_order, is_active, created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, NOW(), NOW())
      RETURNING *
    `;

    try {
      const result = await this.db.query<ShopCategory>(query, [
        categoryData.shop_id,
        categoryData.parent_id,
        categoryData.name,
        categoryData.slug,
        categoryData.description,
        categoryData.sort_order,
        categoryData.is_active,
      ]);
      return result.rows[0];
    } catch (error) {
      return rethrowUniqueViolation(error, `Category "${categoryData.name}" already exists in shop ${categoryData.shop_id}`);
    }
  }

  async findById(id: number): Promise<ShopCategory | null> {
    const result = await this.db.query<ShopCategory>('SELECT * FROM shop_categories WHERE id = $1', [id]);
    return result.rows[0] ?? null;
  }

  async findByShop(shopId: number): Promise<ShopCategory[]> {
    const result = await this.db.query<ShopCategory>(
      'SELECT * FROM shop_categories WHERE shop_id = $1 ORDER BY sort_order ASC, name ASC',
      [shopId],
    );
    return result.rows;
  }

  async findByShopAndName(shopId: number, name: string): Promise<ShopCategory | null> {
    const result = await this.db.query<ShopCategory>(
      'SELECT * FROM shop_categories WHERE shop_id = $1 AND name = $2',
      [shopId, name],
    );
    return result.rows[0] ?? null;
  }

  async findByShopAndSlug(shopId: number, slug: string): Promise<ShopCategory | null> {
    const result = await this.db.query<ShopCategory>(
      'SELECT * FROM shop_categories WHERE shop_id = $1 AND slug = $2',
      [shopId, slug],
    );
    return result.rows[0] ?? null;
  }

  async countChildren(id: number): Promise<number> {
    const result = await this.db.query<{ total: string }>(
      'SELECT COUNT(*) AS total FROM shop_categories WHERE parent_id = $1',
      [id],
    );
    return parseInt(result.rows[0].total, 10);
  }

  async update(id: number, categoryData: UpdateShopCategoryDTO): Promise<ShopCategory | null> {
    const updates: string[] = [];
    const values: unknown[] = [];
    let paramIndex = 1;

    for (const column of UPDATABLE_COLUMNS) {
      const value = categoryData[column];
      if (value !== undefined) {
        updates.push(`${column} = $${paramIndex++}`);
        values.push(value);
      }
    }

    if (updates.length === 0) {
      return this.findById(id);
    }

    updates.push('updated_at = NOW()');
    values.push(id);

    const query = `
      UPDATE shop_categories
      SET ${updates.join(', ')}
      WHERE id = $${paramIndex}
      RETURNING *
    `;

    try {
      const result = await this.db.query<ShopCategory>(query, values);
      return result.rows[0] ?? null;
    } catch (error) {
      return rethrowUniqueViolation(error, 'A category with this name or slug already exists in the shop');
    }
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM shop_categories WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
