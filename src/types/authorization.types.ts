/**
 * Authorization domain types
 */

import { UserRole } from './user.types';

export enum Operation {
  READ_ITEMS = 'read_items',
  CREATE_ITEM = 'create_item',
  UPDATE_ITEM = 'update_item',
  DELETE_ITEM = 'delete_item',
  CHECKOUT_CHECKIN = 'checkout_checkin',
  VIEW_STATS = 'view_stats',
  SUBMIT_REQUEST = 'submit_request',
  REVIEW_REQUEST = 'review_request',
  MANAGE_USERS = 'manage_users',
  READ_CATALOG = 'read_catalog',
  MANAGE_CATALOG = 'manage_catalog',
}

export enum DenialReason {
  ACCOUNT_INACTIVE = 'account_inactive',
  ROLE_NOT_ALLOWED = 'role_not_allowed',
}

export type AuthorizationDecision =
  | { allowed: true }
  | { allowed: false; reason: DenialReason; requiredRoles: readonly UserRole[] };
