import type { Shop, CreateShopDTO } from '../models/shop';

export interface ShopRepository {
  create(shop: Required<CreateShopDTO>): Promise<Shop>;
  findById(id: number): Promise<Shop | null>;
  findActive(): Promise<Shop[]>;
}
