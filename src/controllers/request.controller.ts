import { Request, Response } from 'express';
import { RequestService } from '../services/request.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../middleware/validation.middleware';
import { requireSubject } from '../middleware/auth.middleware';
import { RequestType, SubmitRequestInput } from '../types/request.types';
import {
  requesterSchema,
  requestIdSchema,
  reviewRequestSchema,
  submitRequestSchema,
  SubmitItemRequest,
} from '../validators/request.validator';

const toSubmitInput = (body: SubmitItemRequest['body']): SubmitRequestInput =>
  body.request_type === RequestType.ADD_ITEM
    ? {
        requestType: RequestType.ADD_ITEM,
        itemName: body.item_name,
        description: body.description,
        itemId: body.item_id,
      }
    : {
        requestType: RequestType.REMOVE_ITEM,
        itemName: body.item_name,
        description: body.description,
        itemId: body.item_id,
      };

/**
 * Request Controller
 *
 * HTTP request handlers for the add/remove approval workflow
 */
export class RequestController {
  constructor(private requestService: RequestService) {}

  /**
   * POST /v1/requests
   */
  submitRequest = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(submitRequestSchema, req);

    const request = await this.requestService.submitRequest(requireSubject(req), toSubmitInput(body));

    res.status(201).json(createSuccessResponse(request));
  });

  /**
   * POST /v1/requests/:id/review
   *
   * The outcome carries the stored review and what the approval did to the
   * inventory, including a side effect that failed.
   */
  reviewRequest = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(reviewRequestSchema, req);

    const outcome = await this.requestService.reviewRequest(requireSubject(req), params.id, {
      decision: body.decision,
      denialReason: body.denial_reason,
    });

    res.status(200).json(createSuccessResponse(outcome));
  });

  /**
   * GET /v1/requests
   */
  listAll = asyncHandler(async (req: Request, res: Response) => {
    const requests = await this.requestService.listAll(requireSubject(req));
    res.status(200).json(createSuccessResponse(requests));
  });

  /**
   * GET /v1/requests/pending
   */
  listPending = asyncHandler(async (req: Request, res: Response) => {
    const requests = await this.requestService.listPending(requireSubject(req));
    res.status(200).json(createSuccessResponse(requests));
  });

  /**
   * GET /v1/requests/mine
   */
  listMine = asyncHandler(async (req: Request, res: Response) => {
    const subject = requireSubject(req);
    const requests = await this.requestService.listByRequester(subject, subject.id);
    res.status(200).json(createSuccessResponse(requests));
  });

  /**
   * GET /v1/requests/user/:userId
   */
  listByRequester = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(requesterSchema, req);

    const requests = await this.requestService.listByRequester(requireSubject(req), params.userId);

    res.status(200).json(createSuccessResponse(requests));
  });

  /**
   * GET /v1/requests/:id
   */
  getRequest = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(requestIdSchema, req);

    const request = await this.requestService.getRequest(requireSubject(req), params.id);

    res.status(200).json(createSuccessResponse(request));
  });
}
