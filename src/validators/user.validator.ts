import { z } from 'zod';
import { UserRole } from '../types/user.types';
import { idParams } from './common.validator';

/**
 * User and authentication validation schemas
 */

const username = z
  .string({ required_error: 'Username is required' })
  .trim()
  .min(3, 'Username must be at least 3 characters')
  .max(64, 'Username must be at most 64 characters');

const password = z
  .string({ required_error: 'Password is required' })
  .min(8, 'Password must be at least 8 characters')
  .max(256, 'Password must be at most 256 characters');

const fullName = z.string().trim().min(1, 'Full name is required').max(255);

export const loginSchema = z.object({
  body: z.object({
    username: z.string().trim().min(1, 'Username is required'),
    password: z.string().min(1, 'Password is required'),
  }),
});

export const changePasswordSchema = z.object({
  body: z.object({
    current_password: z.string().min(1, 'Current password is required'),
    new_password: password,
  }),
});

export const createUserSchema = z.object({
  body: z.object({
    username,
    password,
    full_name: fullName,
    role: z.nativeEnum(UserRole),
  }),
});

export const updateUserSchema = z.object({
  params: idParams,
  body: z
    .object({
      username: username.optional(),
      full_name: fullName.optional(),
      role: z.nativeEnum(UserRole).optional(),
      is_active: z.boolean().optional(),
    })
    .strict('Unknown field'),
});

export const resetPasswordSchema = z.object({
  params: idParams,
  body: z.object({
    new_password: password,
  }),
});

export const userIdSchema = z.object({
  params: idParams,
});
