import { Request, Response } from 'express';
import { AuthService } from '../services/auth.service';
import { UserService } from '../services/user.service';
import { createMessageResponse, createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../middleware/validation.middleware';
import { requireSubject } from '../middleware/auth.middleware';
import { changePasswordSchema, loginSchema } from '../validators/user.validator';

/**
 * Auth Controller
 */
export class AuthController {
  constructor(
    private authService: AuthService,
    private userService: UserService
  ) {}

  /**
   * POST /v1/auth/login
   */
  login = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(loginSchema, req);

    const result = await this.authService.login(body.username, body.password);

    res.status(200).json(createSuccessResponse(result));
  });

  /**
   * GET /v1/auth/me
   */
  me = asyncHandler(async (req: Request, res: Response) => {
    const user = await this.authService.currentUser(requireSubject(req));
    res.status(200).json(createSuccessResponse(user));
  });

  /**
   * POST /v1/auth/change-password
   */
  changePassword = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(changePasswordSchema, req);

    await this.userService.changePassword(requireSubject(req), body.current_password, body.new_password);

    res.status(200).json(createMessageResponse('Password changed successfully'));
  });
}
