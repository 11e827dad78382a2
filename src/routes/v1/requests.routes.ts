import { RequestHandler, Router } from 'express';
import { RequestController } from '../../controllers/request.controller';

/**
 * Item request routes (v1)
 *
 * Static paths are registered before /:id.
 */
export const createRequestRoutes = (
  requestController: RequestController,
  authenticate: RequestHandler
): Router => {
  const router = Router();

  router.use(authenticate);

  /**
   * @swagger
   * /v1/requests:
   *   post:
   *     summary: Propose adding or removing an item (admin)
   *     tags: [Requests]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - request_type
   *               - description
   *             properties:
   *               request_type:
   *                 type: string
   *                 enum: [add_item, remove_item]
   *               item_name:
   *                 type: string
   *               item_id:
   *                 type: integer
   *                 description: Required for remove_item, rejected for add_item
   *               description:
   *                 type: string
   *                 description: Justification
   *     responses:
   *       201:
   *         description: Request submitted, pending review
   *       400:
   *         description: Invalid request shape
   */
  router.post('/', requestController.submitRequest);

  /**
   * @swagger
   * /v1/requests:
   *   get:
   *     summary: List every request, newest first (quartermaster)
   *     tags: [Requests]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Requests
   */
  router.get('/', requestController.listAll);

  /**
   * @swagger
   * /v1/requests/pending:
   *   get:
   *     summary: List pending requests (quartermaster)
   *     tags: [Requests]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Pending requests
   */
  router.get('/pending', requestController.listPending);

  /**
   * @swagger
   * /v1/requests/mine:
   *   get:
   *     summary: List the caller's own requests
   *     tags: [Requests]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Requests submitted by the caller
   */
  router.get('/mine', requestController.listMine);

  /**
   * @swagger
   * /v1/requests/user/{userId}:
   *   get:
   *     summary: List requests by requester
   *     tags: [Requests]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: userId
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Requests submitted by the user
   *       403:
   *         description: Admins may only list their own requests
   */
  router.get('/user/:userId', requestController.listByRequester);

  /**
   * @swagger
   * /v1/requests/{id}:
   *   get:
   *     summary: Get one request (quartermaster)
   *     tags: [Requests]
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
   *         description: Request retrieved
   *       404:
   *         description: Request not found
   */
  router.get('/:id', requestController.getRequest);

  /**
   * @swagger
   * /v1/requests/{id}/review:
   *   post:
   *     summary: Approve or deny a pending request (quartermaster)
   *     tags: [Requests]
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
   *               - decision
   *             properties:
   *               decision:
   *                 type: string
   *                 enum: [approve, deny]
   *               denial_reason:
   *                 type: string
   *                 description: Required when denying
   *     responses:
   *       200:
   *         description: Review stored; sideEffect reports the inventory change
   *       400:
   *         description: Denial reason missing
   *       409:
   *         description: Request already reviewed
   */
  router.post('/:id/review', requestController.reviewRequest);

  return router;
};
