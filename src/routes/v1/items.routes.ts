import { RequestHandler, Router } from 'express';
import { ItemController } from '../../controllers/item.controller';

/**
 * Item routes (v1)
 */
export const createItemRoutes = (itemController: ItemController, authenticate: RequestHandler): Router => {
  const router = Router();

  router.use(authenticate);

  /**
   * @swagger
   * /v1/items:
   *   get:
   *     summary: List all items, ordered by name
   *     tags: [Items]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Items retrieved successfully
   *       401:
   *         description: Missing or invalid token
   */
  router.get('/', itemController.listItems);

  /**
   * @swagger
   * /v1/items/search:
   *   get:
   *     summary: Case-insensitive search over name, description and barcode
   *     tags: [Items]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: q
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Matching items
   */
  router.get('/search', itemController.searchItems);

  /**
   * @swagger
   * /v1/items:
   *   post:
   *     summary: Create a new item (quartermaster)
   *     tags: [Items]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - name
   *             properties:
   *               name:
   *                 type: string
   *               description:
   *                 type: string
   *               category:
   *                 type: string
   *               barcode:
   *                 type: string
   *               serial_number:
   *                 type: string
   *               storage_location:
   *                 type: string
   *               image_url:
   *                 type: string
   *               notes:
   *                 type: string
   *     responses:
   *       201:
   *         description: Item created successfully
   *       403:
   *         description: Role not permitted
   *       409:
   *         description: Barcode already in use
   */
  router.post('/', itemController.createItem);

  /**
   * @swagger
   * /v1/items/{id}:
   *   get:
   *     summary: Get an item with its custody state
   *     tags: [Items]
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
   *         description: Item retrieved successfully
   *       404:
   *         description: Item not found
   */
  router.get('/:id', itemController.getItem);

  /**
   * @swagger
   * /v1/items/{id}:
   *   patch:
   *     summary: Update descriptive fields (quartermaster)
   *     tags: [Items]
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
   *         description: Item updated
   *       404:
   *         description: Item not found
   *       409:
   *         description: Barcode already in use
   */
  router.patch('/:id', itemController.updateItem);

  /**
   * @swagger
   * /v1/items/{id}:
   *   delete:
   *     summary: Delete an item and its custody history (quartermaster)
   *     tags: [Items]
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
   *         description: Item deleted
   *       404:
   *         description: Item not found
   */
  router.delete('/:id', itemController.deleteItem);

  /**
   * @swagger
   * /v1/items/{id}/checkout:
   *   post:
   *     summary: Hand an available item to a person
   *     tags: [Custody]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - person_name
   *             properties:
   *               person_name:
   *                 type: string
   *               notes:
   *                 type: string
   *     responses:
   *       200:
   *         description: Item checked out
   *       409:
   *         description: Item is already checked out (details.checkedOutBy names the holder)
   */
  router.post('/:id/checkout', itemController.checkoutItem);

  /**
   * @swagger
   * /v1/items/{id}/checkin:
   *   post:
   *     summary: Return a checked-out item
   *     tags: [Custody]
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
   *         description: Item checked in
   *       409:
   *         description: Item is not checked out
   */
  router.post('/:id/checkin', itemController.checkinItem);

  /**
   * @swagger
   * /v1/items/{id}/history:
   *   get:
   *     summary: Custody history, newest first
   *     tags: [Custody]
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
   *         description: History entries
   *       404:
   *         description: Item not found
   */
  router.get('/:id/history', itemController.getHistory);

  return router;
};
