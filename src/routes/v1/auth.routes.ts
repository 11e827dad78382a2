import { RequestHandler, Router } from 'express';
import { AuthController } from '../../controllers/auth.controller';

/**
 * Authentication routes (v1)
 */
export const createAuthRoutes = (authController: AuthController, authenticate: RequestHandler): Router => {
  const router = Router();

  /**
   * @swagger
   * /v1/auth/login:
   *   post:
   *     summary: Exchange username and password for a bearer token
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [username, password]
   *             properties:
   *               username:
   *                 type: string
   *               password:
   *                 type: string
   *     responses:
   *       200:
   *         description: Token issued
   *       401:
   *         description: Invalid username or password
   *       403:
   *         description: Account inactive
   */
  router.post('/login', authController.login);

  /**
   * @swagger
   * /v1/auth/me:
   *   get:
   *     summary: The authenticated account
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Current user
   */
  router.get('/me', authenticate, authController.me);

  /**
   * @swagger
   * /v1/auth/change-password:
   *   post:
   *     summary: Change the caller's password
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Password changed
   *       401:
   *         description: Current password is incorrect
   */
  router.post('/change-password', authenticate, authController.changePassword);

  return router;
};
