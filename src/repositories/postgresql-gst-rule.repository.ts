import type { DatabaseAdapter } from '../database/adapter';
import type {
  NewShopGstRule,
  ShopGstRule,
  ShopGstRuleChanges,
  ShopGstRuleListResponse,
  ShopGstRuleSearchParams,
} from '../models/gst-rule';
import type { GstRuleRepository } from './gst-rule.repository';
import { rethrowUniqueViolation } from './postgresql-errors';

const UPDATABLE_COLUMNS = [
  'name',
  'shop_id',
  'category_id',
  'price_condition_type',
  'price_condition_value',
  'gst_rate_percentage',
  'is_active',
  'start_date',
  'end_date',
  'updated_by',
] as const;

const DUPLICATE_NAME_MESSAGE = 'A GST rule with this name already exists for this shop.';

export class PostgreSQLGstRuleRepository implements GstRuleRepository {
  constructor(private db: DatabaseAdapter) {}

  async create(ruleData: NewShopGstRule): Promise<ShopGstRule> {
    const query = `
      INSERT INTO shop_gst_rules (
        name, shop_id, category_id, price_condition_type, price_condition_value,
        gst_rate_percentage, is_active, start_date, end_date, created_by, updated_by,
        created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, NOW(), NOW())
      RETURNING *
    `;

    try {
      const result = await this.db.query<ShopGstRule>(query, [
        ruleData.name,
        ruleData.shop_id,
        ruleData.category_id,
        ruleData.price_condition_type,
        ruleData.price_condition_value,
        ruleData.gst_rate_percentage,
        ruleData.is_active,
        ruleData.start_date,
        ruleData.end_date,
        ruleData.created_by,
        ruleData.updated_by,
      ]);
      return result.rows[0];
    } catch (error) {
      return rethrowUniqueViolation(error, DUPLICATE_NAME_MESSAGE);
    }
  }

  async findById(id: number): Promise<ShopGstRule | null> {
    const result = await this.db.query<ShopGstRule>('SELECT * FROM shop_gst_rules WHERE id = $1', [id]);
    return result.rows[0] ?? null;
  }

  async findAll(params: ShopGstRuleSearchParams): Promise<ShopGstRuleListResponse> {
    const limit = params.limit || 20;
    const page = params.page || 1;
    const offset = (page - 1) * limit;

    const whereConditions: string[] = [];
    const queryParams: unknown[] = [];
    let paramIndex = 1;

    if (params.shop_id !== undefined) {
      whereConditions.push(`shop_id = $${paramIndex++}`);
      queryParams.push(params.shop_id);
    }

    if (params.category_id !== undefined) {
      whereConditions.push(`category_id = $${paramIndex++}`);
      queryParams.push(params.category_id);
    }

    if (params.is_active !== undefined) {
      whereConditions.push(`is_active = $${paramIndex++}`);
      queryParams.push(params.is_active);
    }

    const whereClause = whereConditions.length > 0 ? `WHERE ${whereConditions.join(' AND ')}` : '';

    const countResult = await this.db.query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM shop_gst_rules ${whereClause}`,
      queryParams,
    );
    const total = parseInt(countResult.rows[0].total, 10);

    const dataQuery = `
      SELECT * FROM shop_gst_rules
      ${whereClause}
      ORDER BY shop_id ASC, name ASC
      LIMIT $${paramIndex} OFFSET $${paramIndex + 1}
    `;
    const result = await this.db.query<ShopGstRule>(dataQuery, [...queryParams, limit, offset]);

    return {
      gst_rules: result.rows,
      total,
      page,
      limit,
    };
  }

  async findByShop(shopId: number): Promise<ShopGstRule[]> {
    const result = await this.db.query<ShopGstRule>(
      'SELECT * FROM shop_gst_rules WHERE shop_id = $1 ORDER BY name ASC',
      [shopId],
    );
    return result.rows;
  }

  async findByShopAndName(shopId: number, name: string): Promise<ShopGstRule | null> {
    const result = await this.db.query<ShopGstRule>(
      'SELECT * FROM shop_gst_rules WHERE shop_id = $1 AND name = $2',
      [shopId, name],
    );
    return result.rows[0] ?? null;
  }

  async findActiveForCategories(shopId: number, categoryIds: number[], onDate: string): Promise<ShopGstRule[]> {
    if (categoryIds.length === 0) return [];

    const query = `
      SELECT * FROM shop_gst_rules
      WHERE is_active = true
        AND shop_id = $1
        AND category_id = ANY($2::int[])
        AND (start_date IS NULL OR start_date <= $3::date)
        AND (end_date IS NULL OR end_date >= $3::date)
      ORDER BY id DESC
    `;
    const result = await this.db.query<ShopGstRule>(query, [shopId, categoryIds, onDate]);
    return result.rows;
  }

  async countByCategory(categoryId: number): Promise<number> {
    const result = await this.db.query<{ total: string }>(
      'SELECT COUNT(*) AS total FROM shop_gst_rules WHERE category_id = $1',
      [categoryId],
    );
    return parseInt(result.rows[0].total, 10);
  }

  async update(id: number, changes: ShopGstRuleChanges): Promise<ShopGstRule | null> {
    const updates: string[] = [];
    const values: unknown[] = [];
    let paramIndex = 1;

    for (const column of UPDATABLE_COLUMNS) {
      const value = changes[column];
      if (value !== undefined) {
        updates.push(`${column} = $${paramIndex++}`);
        values.push(value);
      }
    }

    updates.push('updated_at = NOW()');
    values.push(id);

    const query = `
      UPDATE shop_gst_rules
      SET ${updates.join(', ')}
      WHERE id = $${paramIndex}
      RETURNING *
    `;

    try {
      const result = await this.db.query<ShopGstRule>(query, values);
      return result.rows[0] ?? null;
    } catch (error) {
      return rethrowUniqueViolation(error, DUPLICATE_NAME_MESSAGE);
    }
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM shop_gst_rules WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
