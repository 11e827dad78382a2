import { z } from 'zod';
import { idParams } from './common.validator';

/**
 * Category and location validation schemas
 */

const name = z
  .string({ required_error: 'Name is required' })
  .trim()
  .min(1, 'Name is required')
  .max(255, 'Name must be at most 255 characters');

export const createCatalogEntrySchema = z.object({
  body: z.object({ name }),
});

export const renameCatalogEntrySchema = z.object({
  params: idParams,
  body: z.object({ name }),
});

export const catalogEntryIdSchema = z.object({
  params: idParams,
});
