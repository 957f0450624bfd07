import { Router } from 'express';
import type { Request, Response } from 'express';
import { ShopService } from '../services/shop.service';
import { ShopCategoryService } from '../services/shop-category.service';
import { parseIdParam } from '../utils/validation';
import { sendError } from '../utils/errors';
import { Logger } from '../utils/logger';

export function createShopRouter(
  shopService: ShopService = new ShopService(),
  categoryService: ShopCategoryService = new ShopCategoryService(),
): Router {
  const shopRouter = Router();

  /**
   * @swagger
   * /shops:
   *   post:
   *     summary: Create a shop
   *     tags: [Shops]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [name]
   *             properties:
   *               name: { type: string, example: "Gadget Hub" }
   *               is_active: { type: boolean, default: true }
   *     responses:
   *       201:
   *         description: Shop created
   *       400:
   *         description: Validation failed
   */
  shopRouter.post('/', async (req: Request, res: Response) => {
    try {
      const shop = await shopService.createShop(req.body);
      res.status(201).json(shop);
    } catch (error) {
      Logger.error('Failed to create shop', error, { method: 'POST', url: '/shops' });
      sendError(res, error);
    }
  });

  /**
   * @swagger
   * /shops:
   *   get:
   *     summary: List active shops ordered by name
   *     tags: [Shops]
   */
  shopRouter.get('/', async (req: Request, res: Response) => {
    try {
      res.json(await shopService.listActiveShops());
    } catch (error) {
      Logger.error('Failed to list shops', error, { method: 'GET', url: '/shops' });
      sendError(res, error);
    }
  });

  /**
   * @swagger
   * /shops/{id}:
   *   get:
   *     summary: Get a shop by ID
   *     tags: [Shops]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema: { type: integer }
   */
  shopRouter.get('/:id', async (req: Request, res: Response) => {
    try {
      const shop = await shopService.getShopById(parseIdParam(req.params.id, 'shop'));
      res.json(shop);
    } catch (error) {
      Logger.error('Failed to get shop', error, { method: 'GET', url: `/shops/${req.params.id}` });
      sendError(res, error);
    }
  });

  /**
   * @swagger
   * /shops/{id}/categories:
   *   get:
   *     summary: List the categories of a shop
   *     tags: [Shop Categories]
   */
  shopRouter.get('/:id/categories', async (req: Request, res: Response) => {
    try {
      const categories = await categoryService.listCategories(parseIdParam(req.params.id, 'shop'));
      res.json(categories);
    } catch (error) {
      Logger.error('Failed to list shop categories', error, { method: 'GET', url: `/shops/${req.params.id}/categories` });
      sendError(res, error);
    }
  });

  /**
   * @swagger
   * /shops/{id}/categories:
   *   post:
   *     summary: Create a category in a shop
   *     tags: [Shop Categories]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [name]
   *             properties:
   *               name: { type: string, example: "Phones" }
   *               slug: { type: string, example: "phones" }
   *               parent_id: { type: integer, nullable: true }
   *               description: { type: string, nullable: true }
   *               sort_order: { type: integer, default: 0 }
   *               is_active: { type: boolean, default: true }
   */
  shopRouter.post('/:id/categories', async (req: Request, res: Response) => {
    try {
      const category = await categoryService.createCategory(parseIdParam(req.params.id, 'shop'), req.body);
      res.status(201).json(category);
    } catch (error) {
      Logger.error('Failed to create shop category', error, { method: 'POST', url: `/shops/${req.params.id}/categories` });
      sendError(res, error);
    }
  });

  return shopRouter;
}
