import { Router } from 'express';
import { Container } from '../container';
import { authenticate } from '../middleware/auth.middleware';
import { ItemController } from '../controllers/item.controller';
import { RequestController } from '../controllers/request.controller';
import { UserController } from '../controllers/user.controller';
import { AuthController } from '../controllers/auth.controller';
import { CatalogController } from '../controllers/catalog.controller';
import { createItemRoutes } from './v1/items.routes';
import { createRequestRoutes } from './v1/requests.routes';
import { createUserRoutes } from './v1/users.routes';
import { createAuthRoutes } from './v1/auth.routes';
import { createCatalogRoutes } from './v1/catalog.routes';
import { HealthCheckResponse } from '../types/api.types';
import { testConnection } from '../config/database';
import { asyncHandler } from '../utils/async-handler';

/**
 * API Routes Aggregator
 */
export const createRoutes = (container: Container): Router => {
  const router = Router();
  const requireAuth = authenticate(container.identity);

  const itemController = new ItemController(container.itemService);

  // v1 routes
  router.use('/v1/auth', createAuthRoutes(new AuthController(container.authService, container.userService), requireAuth));
  router.use('/v1/items', createItemRoutes(itemController, requireAuth));
  router.use('/v1/requests', createRequestRoutes(new RequestController(container.requestService), requireAuth));
  router.use('/v1/users', createUserRoutes(new UserController(container.userService), requireAuth));
  router.use('/v1/categories', createCatalogRoutes(new CatalogController(container.categoryService), requireAuth));
  router.use('/v1/locations', createCatalogRoutes(new CatalogController(container.locationService), requireAuth));

  /**
   * @swagger
   * /v1/stats:
   *   get:
   *     summary: Inventory totals and per-category counts
   *     tags: [Items]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Inventory statistics
   */
  router.get('/v1/stats', requireAuth, itemController.getStats);

  // Health check endpoint
  router.get(
    '/health',
    asyncHandler(async (_req, res) => {
      const connected = await testConnection(container.gateway);
      const body: HealthCheckResponse = {
        status: connected ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        database: connected ? 'connected' : 'disconnected',
        uptime: process.uptime(),
      };
      res.status(connected ? 200 : 503).json(body);
    })
  );

  // API version info
  router.get('/v1', (_req, res) => {
    res.status(200).json({
      version: '1.0.0',
      api: 'Custody Inventory API',
    });
  });

  return router;
};
