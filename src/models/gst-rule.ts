export const PRICE_CONDITION_TYPES = [
  'ANY',
  'LESS_THAN',
  'LESS_THAN_OR_EQUAL',
  'GREATER_THAN',
  'GREATER_THAN_OR_EQUAL',
  'EQUAL',
] as const;

export type PriceConditionType = (typeof PRICE_CONDITION_TYPES)[number];

/**
 * A shop-scoped GST rule. Money and rate columns are NUMERIC in the
 * database and are carried as fixed-point strings ("1000.00", "18.00").
 * Dates are calendar dates in YYYY-MM-DD form; a null bound is open.
 */
export interface ShopGstRule {
  id: number;
  name: string;
  shop_id: number;
  category_id: number;
  price_condition_type: PriceConditionType;
  price_condition_value: string | null;
  gst_rate_percentage: string;
  is_active: boolean;
  start_date: string | null;
  end_date: string | null;
  created_by: number | null;
  updated_by: number | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateShopGstRuleDTO {
  name: string;
  shop_id: number;
  category_id: number;
  price_condition_type: PriceConditionType;
  price_condition_value: string | null;
  gst_rate_percentage: string;
  is_active: boolean;
  start_date: string | null;
  end_date: string | null;
}

export type UpdateShopGstRuleDTO = Partial<CreateShopGstRuleDTO>;

export interface NewShopGstRule extends CreateShopGstRuleDTO {
  created_by: number | null;
  updated_by: number | null;
}

export interface ShopGstRuleChanges extends UpdateShopGstRuleDTO {
  updated_by: number | null;
}

export interface ShopGstRuleSearchParams {
  shop_id?: number;
  category_id?: number;
  is_active?: boolean;
  page?: number;
  limit?: number;
}

export interface ShopGstRuleListResponse {
  gst_rules: ShopGstRule[];
  total: number;
  page: number;
  limit: number;
}

export interface ResolveGstRequest {
  shop_id: number;
  category_id: number;
  price: string;
  quantity: number;
}

export interface GstResolution {
  rule: ShopGstRule | null;
  gst_rate_percentage: string;
  quantity: number;
  unit_price_inclusive_gst: string;
  unit_base_price: string;
  unit_gst_amount: string;
  line_base_price: string;
  line_gst_amount: string;
  line_total_inclusive_gst: string;
}
