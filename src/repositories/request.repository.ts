import { PersistenceGateway, RowFilter, Stored, TableGateway } from '../persistence/gateway';
import {
  ItemRequest,
  ItemRequestFields,
  RequestStatus,
  RequestType,
  ReviewState,
} from '../types/request.types';
import { AppError, ErrorCode } from '../types/error.types';
import { moduleLogger } from '../config/logger';
import { parseStoredEnum } from '../utils/enum-parser';

const logger = moduleLogger('request-repository');

export interface NewItemRequestRecord {
  requesterId: number;
  requestType: RequestType;
  itemName: string;
  description: string;
  itemId: number | null;
}

export type ReviewRecord =
  | { status: RequestStatus.APPROVED; reviewerId: number }
  | { status: RequestStatus.DENIED; reviewerId: number; denialReason: string };

/**
 * Item Request Repository
 *
 * Handles all storage operations for the item_requests table
 */
export class RequestRepository {
  private requests: TableGateway<ItemRequestFields>;

  constructor(gateway: PersistenceGateway) {
    this.requests = gateway.table('item_requests');
  }

  async create(record: NewItemRequestRecord): Promise<ItemRequest> {
    logger.debug('Creating item request', { ...record });

    const row = await this.requests.insert({
      requester_id: record.requesterId,
      request_type: record.requestType,
      item_name: record.itemName,
      description: record.description,
      item_id: record.itemId,
      status: RequestStatus.PENDING,
      denial_reason: null,
      created_date: new Date().toISOString(),
      reviewed_date: null,
      reviewed_by_id: null,
    });

    return this.mapToRequest(row);
  }

  async findById(id: number): Promise<ItemRequest | null> {
    const row = await this.requests.get(id);
    return row ? this.mapToRequest(row) : null;
  }

  /**
   * Requests matching the filter, newest first
   */
  async findMany(filter: RowFilter<ItemRequestFields> = {}): Promise<ItemRequest[]> {
    const rows = await this.requests.scan(filter, {
      orderBy: [
        { column: 'created_date', ascending: false },
        { column: 'id', ascending: false },
      ],
    });
    return rows.map((row) => this.mapToRequest(row));
  }

  /**
   * Record a review decision (atomic)
   *
   * Only updates while status is still pending, so a request can be reviewed
   * once. Returns null when the request is missing or was already reviewed.
   */
  async markReviewed(id: number, review: ReviewRecord): Promise<ItemRequest | null> {
    const row = await this.requests.updateIf(
      id,
      { status: RequestStatus.PENDING },
      {
        status: review.status,
        reviewed_by_id: review.reviewerId,
        reviewed_date: new Date().toISOString(),
        denial_reason: review.status === RequestStatus.DENIED ? review.denialReason : null,
      }
    );

    if (!row) {
      logger.debug('Review not recorded - request missing or not pending', { id });
      return null;
    }

    logger.info('Request reviewed', { id, status: review.status });
    return this.mapToRequest(row);
  }

  /**
   * Map database row to domain model
   */
  private mapToRequest(row: Stored<ItemRequestFields>): ItemRequest {
    return {
      id: row.id,
      requesterId: row.requester_id,
      requestType: parseStoredEnum(RequestType, row.request_type, 'item_requests.request_type'),
      itemName: row.item_name,
      description: row.description,
      itemId: row.item_id,
      createdAt: new Date(row.created_date),
      ...this.mapReviewState(row),
    };
  }

  private mapReviewState(row: Stored<ItemRequestFields>): ReviewState {
    const status = parseStoredEnum(RequestStatus, row.status, 'item_requests.status');

    switch (status) {
      case RequestStatus.PENDING:
        return { status, reviewedAt: null, reviewedById: null, denialReason: null };
      case RequestStatus.APPROVED:
        return {
          status,
          reviewedAt: this.requireReviewDate(row),
          reviewedById: this.requireReviewer(row),
          denialReason: null,
        };
      case RequestStatus.DENIED:
        return {
          status,
          reviewedAt: this.requireReviewDate(row),
          reviewedById: this.requireReviewer(row),
          denialReason: row.denial_reason ?? '',
        };
    }
  }

  private requireReviewDate(row: Stored<ItemRequestFields>): Date {
    if (row.reviewed_date === null) {
      throw new AppError(ErrorCode.INTERNAL_ERROR, `Request ${row.id} is reviewed without a date`, 500);
    }
    return new Date(row.reviewed_date);
  }

  private requireReviewer(row: Stored<ItemRequestFields>): number {
    if (row.reviewed_by_id === null) {
      throw new AppError(ErrorCode.INTERNAL_ERROR, `Request ${row.id} is reviewed without a reviewer`, 500);
    }
    return row.reviewed_by_id;
  }
}
