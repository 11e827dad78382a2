import { RequestHandler, Router } from 'express';
import { UserController } from '../../controllers/user.controller';

/**
 * User management routes (v1), quartermaster only
 */
export const createUserRoutes = (userController: UserController, authenticate: RequestHandler): Router => {
  const router = Router();

  router.use(authenticate);

  /**
   * @swagger
   * /v1/users:
   *   get:
   *     summary: List accounts
   *     tags: [Users]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Accounts, newest first
   */
  router.get('/', userController.listUsers);

  /**
   * @swagger
   * /v1/users:
   *   post:
   *     summary: Create an account
   *     tags: [Users]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [username, password, full_name, role]
   *             properties:
   *               username:
   *                 type: string
   *               password:
   *                 type: string
   *               full_name:
   *                 type: string
   *               role:
   *                 type: string
   *                 enum: [member, admin, quartermaster]
   *     responses:
   *       201:
   *         description: Account created
   *       409:
   *         description: Username taken
   */
  router.post('/', userController.createUser);

  /**
   * @swagger
   * /v1/users/{id}:
   *   get:
   *     summary: Get an account
   *     tags: [Users]
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
   *         description: Account
   *       404:
   *         description: User not found
   */
  router.get('/:id', userController.getUser);

  /**
   * @swagger
   * /v1/users/{id}:
   *   patch:
   *     summary: Update username, name, role or active flag
   *     tags: [Users]
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
   *         description: Account updated
   */
  router.patch('/:id', userController.updateUser);

  /**
   * @swagger
   * /v1/users/{id}/deactivate:
   *   post:
   *     summary: Deactivate an account
   *     tags: [Users]
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
   *         description: Account deactivated
   *       403:
   *         description: Cannot deactivate your own account
   */
  router.post('/:id/deactivate', userController.deactivateUser);

  /**
   * @swagger
   * /v1/users/{id}/reset-password:
   *   post:
   *     summary: Set a new password for an account
   *     tags: [Users]
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
   *         description: Password reset
   */
  router.post('/:id/reset-password', userController.resetPassword);

  return router;
};
