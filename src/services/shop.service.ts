import type { Shop } from '../models/shop';
import type { ShopRepository } from '../repositories/shop.repository';
import { getShopRepository } from '../repositories';
import { validateCreateShop } from '../utils/shop-category-validation';
import { NotFoundError, ValidationError } from '../utils/errors';
import { Logger } from '../utils/logger';

export class ShopService {
  constructor(private readonly repository: ShopRepository = getShopRepository()) {}

  async createShop(input: unknown): Promise<Shop> {
    const validation = validateCreateShop(input);
    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }

    const shop = await this.repository.create({
      name: validation.data.name,
      is_active: validation.data.is_active ?? true,
    });
    Logger.info('Shop created', { shopId: shop.id, name: shop.name });
    return shop;
  }

  async listActiveShops(): Promise<Shop[]> {
    return this.repository.findActive();
  }

  async getShopById(id: number): Promise<Shop> {
    const shop = await this.repository.findById(id);
    if (!shop) {
      throw new NotFoundError(`Shop with ID ${id} not found.`);
    }
    return shop;
  }
}
