import {
  NewItemRequestRecord,
  RequestRepository,
  ReviewRecord,
} from '../repositories/request.repository';
import { UserRepository } from '../repositories/user.repository';
import { ItemRepository } from '../repositories/item.repository';
import { ItemService } from './item.service';
import {
  ItemRequest,
  ItemRequestView,
  RequestStatus,
  RequestType,
  ReviewDecision,
  ReviewInput,
  ReviewOutcome,
  ReviewSideEffect,
  SubmitRequestInput,
} from '../types/request.types';
import { Subject } from '../types/user.types';
import { Operation } from '../types/authorization.types';
import { AppError, ErrorCode, Errors, isAppError } from '../types/error.types';
import { assertAuthorized, authorize } from './authorization.service';
import { moduleLogger } from '../config/logger';

const logger = moduleLogger('request-service');

/**
 * Request Service
 *
 * Two-phase workflow for inventory changes proposed by admins:
 * PENDING → APPROVED | DENIED, each request reviewed exactly once.
 *
 * Approval side effects run through ItemService after the review is stored.
 * A side effect that fails is reported in the outcome; the review stands.
 */
export class RequestService {
  constructor(
    private requestRepo: RequestRepository,
    private userRepo: UserRepository,
    private itemRepo: ItemRepository,
    private itemService: ItemService
  ) {}

  async submitRequest(subject: Subject, input: SubmitRequestInput): Promise<ItemRequestView> {
    assertAuthorized(subject, Operation.SUBMIT_REQUEST);
    logger.info('Submitting item request', { requestType: input.requestType, by: subject.id });

    const request = await this.requestRepo.create(await this.toRequestRecord(subject, input));

    logger.info('Item request submitted', { requestId: request.id });
    const [view] = await this.enrich([request]);
    return view ?? this.withoutNames(request);
  }

  /**
   * Approve or deny a pending request
   *
   * Concurrency approach:
   * The status change is a conditional UPDATE gated on status = pending. Of
   * two reviewers racing on one request exactly one gets the row back; the
   * other receives ALREADY_REVIEWED and no side effect runs for it.
   */
  async reviewRequest(subject: Subject, id: number, input: ReviewInput): Promise<ReviewOutcome> {
    assertAuthorized(subject, Operation.REVIEW_REQUEST);
    logger.info('Reviewing item request', { id, decision: input.decision, by: subject.id });

    const existing = await this.requestRepo.findById(id);
    if (!existing) {
      throw Errors.notFound('Request', id);
    }

    if (existing.status !== RequestStatus.PENDING) {
      throw Errors.alreadyReviewed(id, existing.status);
    }

    const reviewed = await this.requestRepo.markReviewed(id, toReviewRecord(subject, input));

    if (!reviewed) {
      // Lost the race: re-read to report the state another reviewer left it in
      const current = await this.requestRepo.findById(id);
      if (!current) {
        throw Errors.notFound('Request', id);
      }
      throw Errors.alreadyReviewed(id, current.status);
    }

    const sideEffect = await this.applySideEffect(subject, reviewed);
    const [view] = await this.enrich([reviewed]);

    return { request: view ?? this.withoutNames(reviewed), sideEffect };
  }

  async getRequest(subject: Subject, id: number): Promise<ItemRequestView> {
    assertAuthorized(subject, Operation.REVIEW_REQUEST);

    const request = await this.requestRepo.findById(id);
    if (!request) {
      throw Errors.notFound('Request', id);
    }

    const [view] = await this.enrich([request]);
    return view ?? this.withoutNames(request);
  }

  async listAll(subject: Subject): Promise<ItemRequestView[]> {
    assertAuthorized(subject, Operation.REVIEW_REQUEST);
    return this.enrich(await this.requestRepo.findMany());
  }

  async listPending(subject: Subject): Promise<ItemRequestView[]> {
    assertAuthorized(subject, Operation.REVIEW_REQUEST);
    return this.enrich(await this.requestRepo.findMany({ status: RequestStatus.PENDING }));
  }

  /**
   * Requests submitted by one user. Reviewers may list anyone's; an admin only
   * their own.
   */
  async listByRequester(subject: Subject, userId: number): Promise<ItemRequestView[]> {
    if (!authorize(subject, Operation.REVIEW_REQUEST).allowed) {
      assertAuthorized(subject, Operation.SUBMIT_REQUEST);
      if (subject.id !== userId) {
        throw new AppError(
          ErrorCode.PERMISSION_DENIED,
          'Access denied. Admins can only list their own requests',
          403,
          { operation: Operation.REVIEW_REQUEST }
        );
      }
    }

    return this.enrich(await this.requestRepo.findMany({ requester_id: userId }));
  }

  /**
   * Validate the proposal's shape: a remove request names an existing target,
   * an add request names no target.
   */
  private async toRequestRecord(
    subject: Subject,
    input: SubmitRequestInput
  ): Promise<NewItemRequestRecord> {
    const description = input.description.trim();

    switch (input.requestType) {
      case RequestType.ADD_ITEM: {
        if (input.itemId !== undefined) {
          throw Errors.invalidRequestShape('An add_item request cannot reference an existing item');
        }
        const itemName = input.itemName.trim();
        if (!itemName) {
          throw Errors.invalidRequestShape('An add_item request needs an item name');
        }

        return {
          requesterId: subject.id,
          requestType: input.requestType,
          itemName,
          description,
          itemId: null,
        };
      }
      case RequestType.REMOVE_ITEM: {
        if (input.itemId === undefined) {
          throw Errors.invalidRequestShape('A remove_item request must reference the item to remove');
        }
        const target = await this.itemRepo.findById(input.itemId);
        if (!target) {
          throw Errors.notFound('Item', input.itemId);
        }

        return {
          requesterId: subject.id,
          requestType: input.requestType,
          itemName: input.itemName?.trim() || target.name,
          description,
          itemId: target.id,
        };
      }
    }
  }

  private async applySideEffect(reviewer: Subject, request: ItemRequest): Promise<ReviewSideEffect> {
    if (request.status !== RequestStatus.APPROVED) {
      return { kind: 'none' };
    }

    try {
      switch (request.requestType) {
        case RequestType.ADD_ITEM: {
          if (!request.itemName.trim()) {
            throw Errors.invalidRequestShape(`Request ${request.id} has no item name`);
          }

          const item = await this.itemService.createItem(reviewer, {
            name: request.itemName,
            description: request.description,
          });

          logger.info('Approved add request created item', { requestId: request.id, itemId: item.id });
          return { kind: 'item_created', item };
        }
        case RequestType.REMOVE_ITEM: {
          if (request.itemId === null) {
            throw Errors.invalidRequestShape(`Request ${request.id} has no target item`);
          }

          try {
            await this.itemService.deleteItem(reviewer, request.itemId);
          } catch (error) {
            if (isAppError(error, ErrorCode.NOT_FOUND)) {
              logger.info('Approved remove request target already gone', {
                requestId: request.id,
                itemId: request.itemId,
              });
              return { kind: 'target_already_absent', itemId: request.itemId };
            }
            throw error;
          }

          logger.info('Approved remove request deleted item', {
            requestId: request.id,
            itemId: request.itemId,
          });
          return { kind: 'item_removed', itemId: request.itemId };
        }
      }
    } catch (error) {
      const code = error instanceof AppError ? error.code : ErrorCode.INTERNAL_ERROR;
      const message = error instanceof Error ? error.message : String(error);

      logger.error('Side effect of approved request failed', { requestId: request.id, code, message });
      return { kind: 'failed', code, message };
    }
  }

  /**
   * Join requester, reviewer and target item names. The references are
   * non-owning; a name that no longer resolves is reported as null.
   */
  private async enrich(requests: ItemRequest[]): Promise<ItemRequestView[]> {
    if (requests.length === 0) return [];

    const users = await this.userRepo.findAll();
    const userNames = new Map(users.map((user) => [user.id, user.fullName]));

    const targetIds = [
      ...new Set(requests.flatMap((request) => (request.itemId === null ? [] : [request.itemId]))),
    ];
    const targets = await Promise.all(targetIds.map((itemId) => this.itemRepo.findById(itemId)));
    const itemNames = new Map(
      targets.flatMap((item) => (item ? [[item.id, item.name] as const] : []))
    );

    return requests.map((request) => ({
      ...request,
      requesterName: userNames.get(request.requesterId) ?? null,
      reviewedByName:
        request.reviewedById === null ? null : (userNames.get(request.reviewedById) ?? null),
      targetItemName: request.itemId === null ? null : (itemNames.get(request.itemId) ?? null),
    }));
  }

  private withoutNames(request: ItemRequest): ItemRequestView {
    return { ...request, requesterName: null, reviewedByName: null, targetItemName: null };
  }
}

function toReviewRecord(reviewer: Subject, input: ReviewInput): ReviewRecord {
  switch (input.decision) {
    case ReviewDecision.APPROVE:
      return { status: RequestStatus.APPROVED, reviewerId: reviewer.id };
    case ReviewDecision.DENY: {
      const denialReason = input.denialReason?.trim();
      if (!denialReason) {
        throw Errors.missingReason();
      }
      return { status: RequestStatus.DENIED, reviewerId: reviewer.id, denialReason };
    }
  }
}
