import type { DatabaseAdapter } from '../database/adapter';
import type { Shop, CreateShopDTO } from '../models/shop';
import type { ShopRepository } from './shop.repository';

export class PostgreSQLShopRepository implements ShopRepository {
  constructor(private db: DatabaseAdapter) {}

  async create(shopData: Required<CreateShopDTO>): Promise<Shop> {
    const query = `
      INSERT INTO shops (name, is_active, created_at, updated_at)
      VALUES ($1, $2, NOW(), NOW())
      RETURNING *
    `;
    const result = await this.db.query<Shop>(query, [shopData.name, shopData.is_active]);
    return result.rows[0];
  }

  async findById(id: number): Promise<Shop | null> {
    const result = await this.db.query<Shop>('SELECT * FROM shops WHERE id = $1', [id]);
    return result.rows[0] ?? null;
  }

  async findActive(): Promise<Shop[]> {
    const result = await this.db.query<Shop>('SELECT * FROM shops WHERE is_active = true ORDER BY name ASC');
    return result.rows;
  }
}
