import type { Shop, CreateShopDTO } from '../models/shop';
import type { ShopRepository } from './shop.repository';

export class InMemoryShopRepository implements ShopRepository {
  private shops: Shop[] = [];
  private nextId: number = 1;

  async create(shopData: Required<CreateShopDTO>): Promise<Shop> {
    const now = new Date();

    const newShop: Shop = {
      id: this.nextId++,
      name: shopData.name,
      is_active: shopData.is_active,
      created_at: now,
      updated_at: now,
    };

    this.shops.push(newShop);
    return { ...newShop };
  }

  async findById(id: number): Promise<Shop | null> {
    const shop = this.shops.find(s => s.id === id);
    return shop ? { ...shop } : null;
  }

  async findActive(): Promise<Shop[]> {
    return this.shops
      .filter(s => s.is_active)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(s => ({ ...s }));
  }
}
