import { z } from 'zod';

/**
 * Shared validation pieces
 */

export const idParams = z.object({
  id: z.coerce
    .number({ invalid_type_error: 'ID must be a number' })
    .int('ID must be an integer')
    .positive('ID must be positive'),
});

export const optionalText = (max: number) =>
  z.string().max(max, `Must be at most ${max} characters`).nullable().optional();

export const personName = z
  .string({ required_error: 'Person name is required' })
  .trim()
  .min(1, 'Person name is required')
  .max(255, 'Person name must be at most 255 characters');
