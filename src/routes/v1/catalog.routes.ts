import { RequestHandler, Router } from 'express';
import { CatalogController } from '../../controllers/catalog.controller';

/**
 * Category and location routes (v1); both lists share one shape.
 *
 * @swagger
 * /v1/categories:
 *   get:
 *     summary: List categories
 *     tags: [Catalog]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Categories, by name
 *   post:
 *     summary: Add a category (quartermaster)
 *     tags: [Catalog]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       201:
 *         description: Category created
 *       409:
 *         description: Name already in use
 * /v1/categories/{id}:
 *   patch:
 *     summary: Rename a category (quartermaster)
 *     tags: [Catalog]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema:
 *           type: integer
 *     responses:
 *       200:
 *         description: Category renamed
 *   delete:
 *     summary: Remove a category (quartermaster)
 *     tags: [Catalog]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema:
 *           type: integer
 *     responses:
 *       200:
 *         description: Category removed
 * /v1/locations:
 *   get:
 *     summary: List storage locations
 *     tags: [Catalog]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Locations, by name
 *   post:
 *     summary: Add a storage location (quartermaster)
 *     tags: [Catalog]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       201:
 *         description: Location created
 */
export const createCatalogRoutes = (
  catalogController: CatalogController,
  authenticate: RequestHandler
): Router => {
  const router = Router();

  router.use(authenticate);

  router.get('/', catalogController.list);
  router.post('/', catalogController.create);
  router.patch('/:id', catalogController.rename);
  router.delete('/:id', catalogController.remove);

  return router;
};
