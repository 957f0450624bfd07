import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { setupSwagger } from './config/swagger';
import type { DatabaseAdapter } from './database/adapter';
import { getDatabase } from './database';
import { requestLogger, errorLogger } from './middleware/logger.middleware';
import { createHealthRouter } from './routes/health';
import { createShopRouter } from './routes/shops';
import { createShopCategoryRouter } from './routes/shop-categories';
import { createGstRuleRouter } from './routes/shop-gst-rules';
import { ShopService } from './services/shop.service';
import { ShopCategoryService } from './services/shop-category.service';
import { GstRuleService } from './services/gst-rule.service';
import { HttpError, sendError } from './utils/errors';
import { Logger } from './utils/logger';

export interface AppServices {
  shopService: ShopService;
  categoryService: ShopCategoryService;
  gstRuleService: GstRuleService;
}

export interface AppOptions {
  services?: Partial<AppServices>;
  database?: () => DatabaseAdapter;
  /** Serve the OpenAPI document and Swagger UI under /api-docs. */
  docs?: boolean;
}

/**
 * Builds the Express application. Services default to the configured
 * repositories, so the database must be initialized before this is called
 * unless every service is supplied.
 */
export function createApp(options: AppOptions = {}): Express {
  const shopService = options.services?.shopService ?? new ShopService();
  const categoryService = options.services?.categoryService ?? new ShopCategoryService();
  const gstRuleService = options.services?.gstRuleService ?? new GstRuleService();

  const app = express();

  // Request logging must run before the body parsers see the request
  app.use(requestLogger);

  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  if (options.docs ?? true) {
    const swaggerSpec = setupSwagger();
    app.get('/api-docs/swagger.json', (req: Request, res: Response) => {
      res.setHeader('Content-Type', 'application/json');
      res.send(swaggerSpec);
    });
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(undefined, { swaggerUrl: '/api-docs/swagger.json' }));
  }

  app.use('/health', createHealthRouter(options.database ?? getDatabase));
  app.use('/shops', createShopRouter(shopService, categoryService));
  app.use('/shop-categories', createShopCategoryRouter(categoryService));
  app.use('/shop-gst-rules', createGstRuleRouter(gstRuleService));

  app.get('/', (req: Request, res: Response) => {
    res.json({
      message: 'Welcome to the Shop GST API',
      documentation: '/api-docs',
      health: '/health',
      shops: '/shops',
      shopCategories: '/shop-categories',
      shopGstRules: '/shop-gst-rules',
    });
  });

  app.use(errorLogger);

  // Body parser failures arrive here as errors carrying a status
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof HttpError) {
      sendError(res, err);
      return;
    }
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status < 500) {
      res.status(status).json({ error: err.message });
      return;
    }

    Logger.error('Unhandled application error', err, {
      method: req.method,
      url: req.originalUrl,
      ip: req.ip || req.socket.remoteAddress,
    });

    res.status(500).json({
      error: process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  return app;
}
