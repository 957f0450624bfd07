import { Router } from 'express';
import type { Request, Response } from 'express';
import { ShopCategoryService } from '../services/shop-category.service';
import { parseIdParam } from '../utils/validation';
import { sendError } from '../utils/errors';
import { Logger } from '../utils/logger';

export function createShopCategoryRouter(categoryService: ShopCategoryService = new ShopCategoryService()): Router {
  const shopCategoryRouter = Router();

  /**
   * @swagger
   * /shop-categories/{id}:
   *   get:
   *     summary: Get a shop category by ID
   *     tags: [Shop Categories]
   */
  shopCategoryRouter.get('/:id', async (req: Request, res: Response) => {
    try {
      res.json(await categoryService.getCategoryById(parseIdParam(req.params.id, 'category')));
    } catch (error) {
      Logger.error('Failed to get shop category', error, { method: 'GET', url: `/shop-categories/${req.params.id}` });
      sendError(res, error);
    }
  });

  /**
   * @swagger
   * /shop-categories/{id}:
   *   put:
   *     summary: Update a shop category (rename, re-parent, reorder)
   *     tags: [Shop Categories]
   */
  shopCategoryRouter.put('/:id', async (req: Request, res: Response) => {
    try {
      res.json(await categoryService.updateCategory(parseIdParam(req.params.id, 'category'), req.body));
    } catch (error) {
      Logger.error('Failed to update shop category', error, { method: 'PUT', url: `/shop-categories/${req.params.id}` });
      sendError(res, error);
    }
  });

  /**
   * @swagger
   * /shop-categories/{id}:
   *   delete:
   *     summary: Delete a shop category without subcategories or GST rules
   *     tags: [Shop Categories]
   */
  shopCategoryRouter.delete('/:id', async (req: Request, res: Response) => {
    try {
      res.json(await categoryService.deleteCategory(parseIdParam(req.params.id, 'category')));
    } catch (error) {
      Logger.error('Failed to delete shop category', error, { method: 'DELETE', url: `/shop-categories/${req.params.id}` });
      sendError(res, error);
    }
  });

  return shopCategoryRouter;
}
