export interface ShopCategory {
  id: number;
  shop_id: number;
  parent_id: number | null;
  name: string;
  slug: string;
  description: string | null;
  sort_order: number;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface CreateShopCategoryDTO {
  name: string;
  slug?: string; // Auto-generated if not provided
  parent_id?: number | null;
  description?: string | null;
  sort_order?: number;
  is_active?: boolean;
}

export interface UpdateShopCategoryDTO {
  name?: string;
  slug?: string;
  parent_id?: number | null;
  description?: string | null;
  sort_order?: number;
  is_active?: boolean;
}

/**
 * Fully resolved category row as handed to a repository.
 */
export interface NewShopCategory {
  shop_id: number;
  parent_id: number | null;
  name: string;
  slug: string;
  description: string | null;
  sort_order: number;
  is_active: boolean;
}
