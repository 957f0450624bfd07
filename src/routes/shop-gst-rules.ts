import { Router } from 'express';
import type { Request, Response } from 'express';
import { GstRuleService } from '../services/gst-rule.service';
import type { ShopGstRuleSearchParams } from '../models/gst-rule';
import { getAdminId } from '../middleware/actor';
import { parseIdParam, parseQueryBoolean, parseQueryId } from '../utils/validation';
import { sendError } from '../utils/errors';
import { Logger } from '../utils/logger';

/**
 * @swagger
 * components:
 *   schemas:
 *     ShopGstRule:
 *       type: object
 *       properties:
 *         id: { type: integer }
 *         name: { type: string, example: "Premium phones" }
 *         shop_id: { type: integer }
 *         category_id: { type: integer }
 *         price_condition_type:
 *           type: string
 *           enum: [ANY, LESS_THAN, LESS_THAN_OR_EQUAL, GREATER_THAN, GREATER_THAN_OR_EQUAL, EQUAL]
 *         price_condition_value: { type: string, nullable: true, example: "50000.00" }
 *         gst_rate_percentage: { type: string, example: "28.00" }
 *         is_active: { type: boolean }
 *         start_date: { type: string, format: date, nullable: true }
 *         end_date: { type: string, format: date, nullable: true }
 *         created_by: { type: integer, nullable: true }
 *         updated_by: { type: integer, nullable: true }
 */
export function createGstRuleRouter(gstRuleService: GstRuleService = new GstRuleService()): Router {
  const gstRuleRouter = Router();

  /**
   * @swagger
   * /shop-gst-rules:
   *   get:
   *     summary: List shop GST rules
   *     tags: [Shop GST Rules]
   *     parameters:
   *       - { in: query, name: shop_id, schema: { type: integer } }
   *       - { in: query, name: category_id, schema: { type: integer } }
   *       - { in: query, name: is_active, schema: { type: boolean } }
   *       - { in: query, name: page, schema: { type: integer, default: 1 } }
   *       - { in: query, name: limit, schema: { type: integer, default: 20, maximum: 100 } }
   */
  gstRuleRouter.get('/', async (req: Request, res: Response) => {
    try {
      const params: ShopGstRuleSearchParams = {
        shop_id: parseQueryId(req.query.shop_id, 'shop_id'),
        category_id: parseQueryId(req.query.category_id, 'category_id'),
        is_active: parseQueryBoolean(req.query.is_active),
        page: parseQueryId(req.query.page, 'page'),
        limit: parseQueryId(req.query.limit, 'limit'),
      };
      res.json(await gstRuleService.listRules(params));
    } catch (error) {
      Logger.error('Failed to list shop GST rules', error, { method: 'GET', url: '/shop-gst-rules' });
      sendError(res, error);
    }
  });

  /**
   * @swagger
   * /shop-gst-rules/shop/{shopId}:
   *   get:
   *     summary: List the GST rules of one shop ordered by name
   *     tags: [Shop GST Rules]
   */
  gstRuleRouter.get('/shop/:shopId', async (req: Request, res: Response) => {
    try {
      res.json(await gstRuleService.listRulesByShop(parseIdParam(req.params.shopId, 'shop')));
    } catch (error) {
      Logger.error('Failed to list GST rules for shop', error, { method: 'GET', url: `/shop-gst-rules/shop/${req.params.shopId}` });
      sendError(res, error);
    }
  });

  /**
   * @swagger
   * /shop-gst-rules/resolve:
   *   post:
   *     summary: Resolve the applicable GST rule and split an inclusive price
   *     tags: [Shop GST Rules]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [shop_id, category_id, price]
   *             properties:
   *               shop_id: { type: integer }
   *               category_id: { type: integer }
   *               price: { type: string, example: "60000.00" }
   *               quantity: { type: integer, default: 1 }
   *     responses:
   *       200:
   *         description: Applicable rule (or null) with base price and GST amounts
   */
  gstRuleRouter.post('/resolve', async (req: Request, res: Response) => {
    try {
      res.json(await gstRuleService.resolve(req.body));
    } catch (error) {
      Logger.error('Failed to resolve GST rule', error, { method: 'POST', url: '/shop-gst-rules/resolve' });
      sendError(res, error);
    }
  });

  /**
   * @swagger
   * /shop-gst-rules:
   *   post:
   *     summary: Create a shop GST rule
   *     tags: [Shop GST Rules]
   *     parameters:
   *       - { in: header, name: X-Admin-Id, schema: { type: integer } }
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/ShopGstRule'
   *     responses:
   *       201:
   *         description: Rule created
   *       400:
   *         description: Validation failed or shop/category not found
   *       409:
   *         description: Rule name already used in the shop
   */
  gstRuleRouter.post('/', async (req: Request, res: Response) => {
    try {
      const rule = await gstRuleService.createRule(req.body, getAdminId(req));
      res.status(201).json(rule);
    } catch (error) {
      Logger.error('Failed to create shop GST rule', error, { method: 'POST', url: '/shop-gst-rules' });
      sendError(res, error);
    }
  });

  /**
   * @swagger
   * /shop-gst-rules/{id}:
   *   get:
   *     summary: Get a shop GST rule by ID
   *     tags: [Shop GST Rules]
   */
  gstRuleRouter.get('/:id', async (req: Request, res: Response) => {
    try {
      res.json(await gstRuleService.getRule(parseIdParam(req.params.id, 'GST rule')));
    } catch (error) {
      Logger.error('Failed to get shop GST rule', error, { method: 'GET', url: `/shop-gst-rules/${req.params.id}` });
      sendError(res, error);
    }
  });

  /**
   * @swagger
   * /shop-gst-rules/{id}:
   *   put:
   *     summary: Update a shop GST rule
   *     tags: [Shop GST Rules]
   */
  gstRuleRouter.put('/:id', async (req: Request, res: Response) => {
    try {
      const rule = await gstRuleService.updateRule(parseIdParam(req.params.id, 'GST rule'), req.body, getAdminId(req));
      res.json(rule);
    } catch (error) {
      Logger.error('Failed to update shop GST rule', error, { method: 'PUT', url: `/shop-gst-rules/${req.params.id}` });
      sendError(res, error);
    }
  });

  /**
   * @swagger
   * /shop-gst-rules/{id}:
   *   delete:
   *     summary: Delete a shop GST rule
   *     tags: [Shop GST Rules]
   */
  gstRuleRouter.delete('/:id', async (req: Request, res: Response) => {
    try {
      res.json(await gstRuleService.deleteRule(parseIdParam(req.params.id, 'GST rule'), getAdminId(req)));
    } catch (error) {
      Logger.error('Failed to delete shop GST rule', error, { method: 'DELETE', url: `/shop-gst-rules/${req.params.id}` });
      sendError(res, error);
    }
  });

  return gstRuleRouter;
}
