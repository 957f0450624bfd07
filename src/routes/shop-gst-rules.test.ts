import request from 'supertest';
import type { Express } from 'express';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createApp } from '../app';
import { InMemoryAdapter } from '../database/in-memory';
import { InMemoryShopRepository } from '../repositories/in-memory-shop.repository';
import { InMemoryShopCategoryRepository } from '../repositories/in-memory-shop-category.repository';
import { InMemoryGstRuleRepository } from '../repositories/in-memory-gst-rule.repository';
import { ShopService } from '../services/shop.service';
import { ShopCategoryService } from '../services/shop-category.service';
import { GstRuleService } from '../services/gst-rule.service';
import { Logger } from '../utils/logger';

describe('shop GST rule routes', () => {
  let app: Express;

  beforeEach(async () => {
    const shops = new InMemoryShopRepository();
    const categories = new InMemoryShopCategoryRepository();
    const rules = new InMemoryGstRuleRepository();
    const database = new InMemoryAdapter();
    await database.connect();

    app = createApp({
      docs: false,
      database: () => database,
      services: {
        shopService: new ShopService(shops),
        categoryService: new ShopCategoryService(categories, shops, rules),
        gstRuleService: new GstRuleService(rules, shops, categories),
      },
    });

    await request(app).post('/shops').send({ name: 'Gadget Hub' }).expect(201);
    await request(app).post('/shops/1/categories').send({ name: 'Electronics' }).expect(201);
    await request(app).post('/shops/1/categories').send({ name: 'Phones', parent_id: 1 }).expect(201);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const createRule = (body: Record<string, unknown>, adminId?: string) => {
    const req = request(app).post('/shop-gst-rules');
    return (adminId ? req.set('X-Admin-Id', adminId) : req).send(body);
  };

  it('reports health', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  it('creates a rule and records the admin from the header', async () => {
    const res = await createRule(
      { name: 'Electronics standard', shop_id: 1, category_id: 1, price_condition_type: 'ANY', gst_rate_percentage: 18 },
      '12',
    );

    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({
      id: 1,
      name: 'Electronics standard',
      gst_rate_percentage: '18.00',
      price_condition_value: null,
      created_by: 12,
    });
  });

  it('returns validation details', async () => {
    const res = await createRule({ name: 'No rate', shop_id: 1, category_id: 1, price_condition_type: 'ANY' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: 'Validation failed: gst_rate_percentage must be a decimal number',
      details: ['gst_rate_percentage must be a decimal number'],
    });
  });

  it('rejects a malformed admin header', async () => {
    const res = await createRule(
      { name: 'Electronics standard', shop_id: 1, category_id: 1, price_condition_type: 'ANY', gst_rate_percentage: 18 },
      'root',
    );

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('x-admin-id header must be a positive integer');
  });

  it('answers 409 for a duplicate rule name', async () => {
    const body = { name: 'Dup', shop_id: 1, category_id: 1, price_condition_type: 'ANY', gst_rate_percentage: 5 };
    await createRule(body).expect(201);

    const res = await createRule(body);

    expect(res.status).toBe(409);
    expect(res.body.error).toBe("A GST rule with the name 'Dup' already exists for this shop.");
  });

  it('resolves the premium phone rate and does not fall back below the threshold', async () => {
    await createRule({ name: 'Electronics standard', shop_id: 1, category_id: 1, price_condition_type: 'ANY', gst_rate_percentage: 18 }).expect(201);
    await createRule({
      name: 'Premium phones',
      shop_id: 1,
      category_id: 2,
      price_condition_type: 'GREATER_THAN',
      price_condition_value: 50000,
      gst_rate_percentage: 28,
    }).expect(201);

    const premium = await request(app).post('/shop-gst-rules/resolve').send({ shop_id: 1, category_id: 2, price: '60000' });

    expect(premium.status).toBe(200);
    expect(premium.body.rule.name).toBe('Premium phones');
    expect(premium.body.gst_rate_percentage).toBe('28.00');
    expect(premium.body.unit_base_price).toBe('46875.00');
    expect(premium.body.unit_gst_amount).toBe('13125.00');

    const budget = await request(app).post('/shop-gst-rules/resolve').send({ shop_id: 1, category_id: 2, price: '20000' });

    expect(budget.status).toBe(200);
    expect(budget.body.rule).toBeNull();
    expect(budget.body.gst_rate_percentage).toBe('0.00');
  });

  it('lists, fetches, updates and deletes rules', async () => {
    await createRule({ name: 'B rule', shop_id: 1, category_id: 1, price_condition_type: 'ANY', gst_rate_percentage: 5 }).expect(201);
    await createRule({ name: 'A rule', shop_id: 1, category_id: 2, price_condition_type: 'ANY', gst_rate_percentage: 12 }).expect(201);

    const list = await request(app).get('/shop-gst-rules').query({ shop_id: 1, limit: 1 });
    expect(list.body.total).toBe(2);
    expect(list.body.gst_rules.map((r: { name: string }) => r.name)).toEqual(['A rule']);

    const byShop = await request(app).get('/shop-gst-rules/shop/1');
    expect(byShop.body.map((r: { name: string }) => r.name)).toEqual(['A rule', 'B rule']);

    const updated = await request(app).put('/shop-gst-rules/1').set('X-Admin-Id', '3').send({ is_active: false });
    expect(updated.status).toBe(200);
    expect(updated.body).toMatchObject({ is_active: false, updated_by: 3 });

    const deleted = await request(app).delete('/shop-gst-rules/1');
    expect(deleted.body).toEqual({ message: "Shop GST rule 'B rule' deleted successfully." });

    const missing = await request(app).get('/shop-gst-rules/1');
    expect(missing.status).toBe(404);
    expect(missing.body.error).toBe('Shop GST rule with ID 1 not found.');
  });

  it('rejects a non-numeric id', async () => {
    const res = await request(app).get('/shop-gst-rules/abc');

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Invalid GST rule id: abc');
  });

  it('rejects ids beyond the INTEGER range with 400', async () => {
    const rule = await request(app).get('/shop-gst-rules/3000000000');
    const category = await request(app).get('/shop-categories/3000000000');

    expect(rule.status).toBe(400);
    expect(rule.body.error).toBe('Invalid GST rule id: 3000000000');
    expect(category.status).toBe(400);
    expect(category.body.error).toBe('Invalid category id: 3000000000');
  });

  it('rejects an admin id beyond the INTEGER range', async () => {
    const res = await createRule(
      { name: 'Electronics standard', shop_id: 1, category_id: 1, price_condition_type: 'ANY', gst_rate_percentage: 18 },
      '2147483648',
    );

    expect(res.status).toBe(400);
  });

  it('logs the parsed request body of a rejected request', async () => {
    const warn = vi.spyOn(Logger, 'warn');

    await createRule({ name: 'No rate', shop_id: 1, category_id: 1, price_condition_type: 'ANY' }).expect(400);

    await vi.waitFor(() => {
      expect(warn).toHaveBeenCalledWith(
        '⚠️  400 Client Error',
        expect.objectContaining({
          method: 'POST',
          url: '/shop-gst-rules',
          requestBody: { name: 'No rate', shop_id: 1, category_id: 1, price_condition_type: 'ANY' },
        }),
      );
    });
  });

  it('answers 404 for rules of an unknown shop', async () => {
    const res = await request(app).get('/shop-gst-rules/shop/99');

    expect(res.status).toBe(404);
  });
});
