import { z } from 'zod';
import { idParams, optionalText, personName } from './common.validator';

/**
 * Item validation schemas
 */

const itemName = z
  .string({ required_error: 'Name is required' })
  .trim()
  .min(1, 'Name is required')
  .max(255, 'Name must be at most 255 characters');

const itemFields = {
  description: optionalText(2000),
  category: optionalText(255),
  barcode: optionalText(255),
  serial_number: optionalText(255),
  storage_location: optionalText(255),
  image_url: z.string().url('Invalid image URL').nullable().optional(),
  notes: optionalText(2000),
};

// Create item request schema
export const createItemSchema = z.object({
  body: z.object({
    name: itemName,
    ...itemFields,
  }),
});

// Partial update; checkout state is not accepted here
export const updateItemSchema = z.object({
  params: idParams,
  body: z
    .object({
      name: itemName.optional(),
      ...itemFields,
    })
    .strict('Unknown or read-only field'),
});

// Get / delete / history by ID schema
export const itemIdSchema = z.object({
  params: idParams,
});

// Checkout and checkin share a body
export const custodySchema = z.object({
  params: idParams,
  body: z.object({
    person_name: personName,
    notes: z.string().max(2000, 'Notes must be at most 2000 characters').optional(),
  }),
});

export const searchItemsSchema = z.object({
  query: z.object({
    q: z.string({ required_error: 'Search query is required' }).trim().min(1, 'Search query is required'),
  }),
});

// Infer TypeScript types from schemas
export type CreateItemRequest = z.infer<typeof createItemSchema>;
export type UpdateItemRequest = z.infer<typeof updateItemSchema>;
export type CustodyRequest = z.infer<typeof custodySchema>;
