import { z } from 'zod';
import { RequestType, ReviewDecision } from '../types/request.types';
import { idParams } from './common.validator';

/**
 * Item request validation schemas
 *
 * A missing item_id on a remove request passes validation here; the service
 * rejects it with INVALID_REQUEST_SHAPE.
 */

const justification = z
  .string({ required_error: 'Justification is required' })
  .trim()
  .min(1, 'Justification is required')
  .max(2000, 'Justification must be at most 2000 characters');

const itemId = z.number().int('Item ID must be an integer').positive('Item ID must be positive');

export const submitRequestSchema = z.object({
  body: z.discriminatedUnion('request_type', [
    z.object({
      request_type: z.literal(RequestType.ADD_ITEM),
      item_name: z.string({ required_error: 'Item name is required' }).trim().min(1).max(255),
      description: justification,
      item_id: itemId.optional(),
    }),
    z.object({
      request_type: z.literal(RequestType.REMOVE_ITEM),
      item_name: z.string().trim().max(255).optional(),
      description: justification,
      item_id: itemId.optional(),
    }),
  ]),
});

// The denial reason is checked by the service so a blank one reports MISSING_REASON
export const reviewRequestSchema = z.object({
  params: idParams,
  body: z.object({
    decision: z.nativeEnum(ReviewDecision, {
      errorMap: () => ({ message: `Decision must be ${ReviewDecision.APPROVE} or ${ReviewDecision.DENY}` }),
    }),
    denial_reason: z.string().max(2000).optional(),
  }),
});

export const requestIdSchema = z.object({
  params: idParams,
});

export const requesterSchema = z.object({
  params: z.object({ userId: idParams.shape.id }),
});

export type SubmitItemRequest = z.infer<typeof submitRequestSchema>;
export type ReviewItemRequest = z.infer<typeof reviewRequestSchema>;
