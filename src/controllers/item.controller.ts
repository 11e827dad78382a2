import { Request, Response } from 'express';
import { ItemService } from '../services/item.service';
import { createMessageResponse, createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../middleware/validation.middleware';
import { requireSubject } from '../middleware/auth.middleware';
import {
  createItemSchema,
  custodySchema,
  itemIdSchema,
  searchItemsSchema,
  updateItemSchema,
} from '../validators/item.validator';

/**
 * Item Controller
 *
 * HTTP request handlers for item endpoints
 */
export class ItemController {
  constructor(private itemService: ItemService) {}

  /**
   * GET /v1/items
   */
  listItems = asyncHandler(async (req: Request, res: Response) => {
    const items = await this.itemService.listItems(requireSubject(req));

    res.status(200).json(createSuccessResponse(items));
  });

  /**
   * GET /v1/items/search?q=
   */
  searchItems = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(searchItemsSchema, req);

    const items = await this.itemService.searchItems(requireSubject(req), query.q);

    res.status(200).json(createSuccessResponse(items));
  });

  /**
   * GET /v1/items/:id
   */
  getItem = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(itemIdSchema, req);

    const item = await this.itemService.getItem(requireSubject(req), params.id);

    res.status(200).json(createSuccessResponse(item));
  });

  /**
   * POST /v1/items
   * Create a new item (quartermaster)
   */
  createItem = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(createItemSchema, req);

    const item = await this.itemService.createItem(requireSubject(req), {
      name: body.name,
      description: body.description,
      category: body.category,
      barcode: body.barcode,
      serialNumber: body.serial_number,
      storageLocation: body.storage_location,
      imageUrl: body.image_url,
      notes: body.notes,
    });

    res.status(201).json(createSuccessResponse(item));
  });

  /**
   * PATCH /v1/items/:id
   * Update the provided fields only
   */
  updateItem = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(updateItemSchema, req);

    const item = await this.itemService.updateItem(requireSubject(req), params.id, {
      ...(body.name !== undefined && { name: body.name }),
      ...(body.description !== undefined && { description: body.description }),
      ...(body.category !== undefined && { category: body.category }),
      ...(body.barcode !== undefined && { barcode: body.barcode }),
      ...(body.serial_number !== undefined && { serialNumber: body.serial_number }),
      ...(body.storage_location !== undefined && { storageLocation: body.storage_location }),
      ...(body.image_url !== undefined && { imageUrl: body.image_url }),
      ...(body.notes !== undefined && { notes: body.notes }),
    });

    res.status(200).json(createSuccessResponse(item));
  });

  /**
   * DELETE /v1/items/:id
   */
  deleteItem = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(itemIdSchema, req);

    await this.itemService.deleteItem(requireSubject(req), params.id);

    res.status(200).json(createMessageResponse('Item deleted successfully'));
  });

  /**
   * POST /v1/items/:id/checkout
   */
  checkoutItem = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(custodySchema, req);

    const item = await this.itemService.checkoutItem(requireSubject(req), params.id, {
      personName: body.person_name,
      notes: body.notes,
    });

    res.status(200).json(createSuccessResponse(item, `Item checked out to ${body.person_name}`));
  });

  /**
   * POST /v1/items/:id/checkin
   */
  checkinItem = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(custodySchema, req);

    const item = await this.itemService.checkinItem(requireSubject(req), params.id, {
      personName: body.person_name,
      notes: body.notes,
    });

    res.status(200).json(createSuccessResponse(item, 'Item checked in successfully'));
  });

  /**
   * GET /v1/items/:id/history
   */
  getHistory = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(itemIdSchema, req);

    const history = await this.itemService.getHistory(requireSubject(req), params.id);

    res.status(200).json(createSuccessResponse(history));
  });

  /**
   * GET /v1/stats
   */
  getStats = asyncHandler(async (req: Request, res: Response) => {
    const stats = await this.itemService.getStats(requireSubject(req));

    res.status(200).json(createSuccessResponse(stats));
  });
}
