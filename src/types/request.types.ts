/**
 * Item request (add/remove proposal) domain types
 */

import { Item } from './item.types';

export enum RequestType {
  ADD_ITEM = 'add_item',
  REMOVE_ITEM = 'remove_item',
}

export enum RequestStatus {
  PENDING = 'pending',
  APPROVED = 'approved',
  DENIED = 'denied',
}

export enum ReviewDecision {
  APPROVE = 'approve',
  DENY = 'deny',
}

/**
 * Review fields exist exactly when the request has left the pending state,
 * and a denial always carries its reason.
 */
export type ReviewState =
  | { status: RequestStatus.PENDING; reviewedAt: null; reviewedById: null; denialReason: null }
  | { status: RequestStatus.APPROVED; reviewedAt: Date; reviewedById: number; denialReason: null }
  | { status: RequestStatus.DENIED; reviewedAt: Date; reviewedById: number; denialReason: string };

export type ItemRequest = ReviewState & {
  id: number;
  requesterId: number;
  requestType: RequestType;
  itemName: string;
  description: string;
  // Target of a remove request; may point at an item that no longer exists
  itemId: number | null;
  createdAt: Date;
};

export type ItemRequestView = ItemRequest & {
  requesterName: string | null;
  reviewedByName: string | null;
  targetItemName: string | null;
};

// Database row type (snake_case from PostgreSQL)
export interface ItemRequestFields {
  requester_id: number;
  request_type: string;
  item_name: string;
  description: string;
  item_id: number | null;
  status: string;
  denial_reason: string | null;
  created_date: string;
  reviewed_date: string | null;
  reviewed_by_id: number | null;
}

export type SubmitRequestInput =
  | { requestType: RequestType.ADD_ITEM; itemName: string; description: string; itemId?: number }
  | { requestType: RequestType.REMOVE_ITEM; itemName?: string; description: string; itemId?: number };

export interface ReviewInput {
  decision: ReviewDecision;
  denialReason?: string;
}

/**
 * What the approval did to the inventory. A failed side effect never undoes
 * the review itself.
 */
export type ReviewSideEffect =
  | { kind: 'none' }
  | { kind: 'item_created'; item: Item }
  | { kind: 'item_removed'; itemId: number }
  | { kind: 'target_already_absent'; itemId: number }
  | { kind: 'failed'; code: string; message: string };

export interface ReviewOutcome {
  request: ItemRequestView;
  sideEffect: ReviewSideEffect;
}
