export interface Shop {
  id: number;
  name: string;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface CreateShopDTO {
  name: string;
  is_active?: boolean;
}
