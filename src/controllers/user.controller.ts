import { Request, Response } from 'express';
import { UserService } from '../services/user.service';
import { createMessageResponse, createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../middleware/validation.middleware';
import { requireSubject } from '../middleware/auth.middleware';
import {
  createUserSchema,
  resetPasswordSchema,
  updateUserSchema,
  userIdSchema,
} from '../validators/user.validator';

/**
 * User Controller
 *
 * Account management, quartermaster only
 */
export class UserController {
  constructor(private userService: UserService) {}

  /**
   * GET /v1/users
   */
  listUsers = asyncHandler(async (req: Request, res: Response) => {
    const users = await this.userService.listUsers(requireSubject(req));
    res.status(200).json(createSuccessResponse(users));
  });

  /**
   * GET /v1/users/:id
   */
  getUser = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(userIdSchema, req);

    const user = await this.userService.getUser(requireSubject(req), params.id);

    res.status(200).json(createSuccessResponse(user));
  });

  /**
   * POST /v1/users
   */
  createUser = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(createUserSchema, req);

    const user = await this.userService.createUser(requireSubject(req), {
      username: body.username,
      password: body.password,
      fullName: body.full_name,
      role: body.role,
    });

    res.status(201).json(createSuccessResponse(user));
  });

  /**
   * PATCH /v1/users/:id
   */
  updateUser = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(updateUserSchema, req);

    const user = await this.userService.updateUser(requireSubject(req), params.id, {
      username: body.username,
      fullName: body.full_name,
      role: body.role,
      isActive: body.is_active,
    });

    res.status(200).json(createSuccessResponse(user));
  });

  /**
   * POST /v1/users/:id/deactivate
   */
  deactivateUser = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(userIdSchema, req);

    const user = await this.userService.deactivateUser(requireSubject(req), params.id);

    res.status(200).json(createSuccessResponse(user, 'User deactivated'));
  });

  /**
   * POST /v1/users/:id/reset-password
   */
  resetPassword = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(resetPasswordSchema, req);

    await this.userService.resetPassword(requireSubject(req), params.id, body.new_password);

    res.status(200).json(createMessageResponse('Password reset successfully'));
  });
}
