import { Subject, UserRole } from '../types/user.types';
import { AuthorizationDecision, DenialReason, Operation } from '../types/authorization.types';
import { AppError, ErrorCode } from '../types/error.types';

const ALL_ROLES = [UserRole.MEMBER, UserRole.ADMIN, UserRole.QUARTERMASTER] as const;

/**
 * Roles allowed to perform each operation. Typed as a full record so a new
 * operation does not compile until it is given a rule.
 */
export const ROLE_POLICY: Readonly<Record<Operation, readonly UserRole[]>> = {
  [Operation.READ_ITEMS]: ALL_ROLES,
  [Operation.CREATE_ITEM]: [UserRole.QUARTERMASTER],
  [Operation.UPDATE_ITEM]: [UserRole.ADMIN, UserRole.QUARTERMASTER],
  [Operation.DELETE_ITEM]: [UserRole.QUARTERMASTER],
  [Operation.CHECKOUT_CHECKIN]: ALL_ROLES,
  [Operation.VIEW_STATS]: [UserRole.ADMIN, UserRole.QUARTERMASTER],
  [Operation.SUBMIT_REQUEST]: [UserRole.ADMIN],
  [Operation.REVIEW_REQUEST]: [UserRole.QUARTERMASTER],
  [Operation.MANAGE_USERS]: [UserRole.QUARTERMASTER],
  [Operation.READ_CATALOG]: ALL_ROLES,
  [Operation.MANAGE_CATALOG]: [UserRole.QUARTERMASTER],
};

/**
 * Decide whether a subject may perform an operation. The active flag is
 * checked before the role, so a disabled account is always reported as such.
 */
export function authorize(subject: Subject, operation: Operation): AuthorizationDecision {
  const requiredRoles = ROLE_POLICY[operation];

  if (!subject.isActive) {
    return { allowed: false, reason: DenialReason.ACCOUNT_INACTIVE, requiredRoles };
  }

  if (!requiredRoles.includes(subject.role)) {
    return { allowed: false, reason: DenialReason.ROLE_NOT_ALLOWED, requiredRoles };
  }

  return { allowed: true };
}

/**
 * Throwing form of `authorize`, called by every service operation before it
 * touches storage.
 */
export function assertAuthorized(subject: Subject, operation: Operation): void {
  const decision = authorize(subject, operation);
  if (decision.allowed) return;

  switch (decision.reason) {
    case DenialReason.ACCOUNT_INACTIVE:
      throw new AppError(ErrorCode.ACCOUNT_INACTIVE, 'User account is inactive', 403, {
        operation,
      });
    case DenialReason.ROLE_NOT_ALLOWED:
      throw new AppError(
        ErrorCode.PERMISSION_DENIED,
        `Access denied. Required roles: ${decision.requiredRoles.join(', ')}`,
        403,
        { operation, role: subject.role, requiredRoles: [...decision.requiredRoles] }
      );
  }
}
