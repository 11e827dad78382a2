import { Request, Response } from 'express';
import { CatalogService } from '../services/catalog.service';
import { createMessageResponse, createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../middleware/validation.middleware';
import { requireSubject } from '../middleware/auth.middleware';
import {
  catalogEntryIdSchema,
  createCatalogEntrySchema,
  renameCatalogEntrySchema,
} from '../validators/catalog.validator';

/**
 * Catalog Controller
 *
 * Serves both /v1/categories and /v1/locations; one instance per list.
 */
export class CatalogController {
  constructor(private catalogService: CatalogService) {}

  list = asyncHandler(async (req: Request, res: Response) => {
    const entries = await this.catalogService.list(requireSubject(req));
    res.status(200).json(createSuccessResponse(entries));
  });

  create = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(createCatalogEntrySchema, req);

    const entry = await this.catalogService.create(requireSubject(req), body.name);

    res.status(201).json(createSuccessResponse(entry));
  });

  rename = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(renameCatalogEntrySchema, req);

    const entry = await this.catalogService.rename(requireSubject(req), params.id, body.name);

    res.status(200).json(createSuccessResponse(entry));
  });

  remove = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(catalogEntryIdSchema, req);

    await this.catalogService.remove(requireSubject(req), params.id);

    res.status(200).json(createMessageResponse('Entry deleted successfully'));
  });
}
