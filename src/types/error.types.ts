/**
 * Error types and codes
 */

// Standard error codes
export enum ErrorCode {
  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_REQUEST_SHAPE = 'INVALID_REQUEST_SHAPE',
  MISSING_REASON = 'MISSING_REASON',

  // Authentication errors (401)
  UNAUTHENTICATED = 'UNAUTHENTICATED',
  INVALID_CREDENTIALS = 'INVALID_CREDENTIALS',

  // Authorization errors (403)
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  ACCOUNT_INACTIVE = 'ACCOUNT_INACTIVE',
  CANNOT_DEACTIVATE_SELF = 'CANNOT_DEACTIVATE_SELF',

  // Not found errors (404)
  NOT_FOUND = 'NOT_FOUND',

  // Conflict errors (409)
  ALREADY_CHECKED_OUT = 'ALREADY_CHECKED_OUT',
  NOT_CHECKED_OUT = 'NOT_CHECKED_OUT',
  DUPLICATE_BARCODE = 'DUPLICATE_BARCODE',
  DUPLICATE_LOGIN = 'DUPLICATE_LOGIN',
  DUPLICATE_NAME = 'DUPLICATE_NAME',
  ALREADY_REVIEWED = 'ALREADY_REVIEWED',
  CONSTRAINT_VIOLATION = 'CONSTRAINT_VIOLATION',

  // Server errors (5xx)
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  UNAVAILABLE = 'UNAVAILABLE',
}

// Custom application error class
export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export const isAppError = (error: unknown, code?: ErrorCode): error is AppError =>
  error instanceof AppError && (code === undefined || error.code === code);

/**
 * Factories for the failures the services raise, so status codes and details
 * stay consistent across the codebase.
 */
export const Errors = {
  notFound: (entity: string, id: number | string) =>
    new AppError(ErrorCode.NOT_FOUND, `${entity} with ID ${id} not found`, 404, { entity, id }),

  alreadyCheckedOut: (checkedOutBy: string) =>
    new AppError(
      ErrorCode.ALREADY_CHECKED_OUT,
      `Item is already checked out to ${checkedOutBy}`,
      409,
      { checkedOutBy }
    ),

  notCheckedOut: () => new AppError(ErrorCode.NOT_CHECKED_OUT, 'Item is not checked out', 409),

  duplicateBarcode: (barcode: string) =>
    new AppError(ErrorCode.DUPLICATE_BARCODE, `Barcode ${barcode} is already in use`, 409, {
      barcode,
    }),

  duplicateLogin: (username: string) =>
    new AppError(ErrorCode.DUPLICATE_LOGIN, `Username ${username} is already taken`, 409, {
      username,
    }),

  duplicateName: (entity: string, name: string) =>
    new AppError(ErrorCode.DUPLICATE_NAME, `${entity} named ${name} already exists`, 409, {
      entity,
      name,
    }),

  alreadyReviewed: (id: number, status: string) =>
    new AppError(ErrorCode.ALREADY_REVIEWED, `Request ${id} has already been ${status}`, 409, {
      currentStatus: status,
    }),

  missingReason: () =>
    new AppError(ErrorCode.MISSING_REASON, 'A denial reason is required to deny a request', 400, {
      field: 'denial_reason',
    }),

  invalidRequestShape: (message: string) =>
    new AppError(ErrorCode.INVALID_REQUEST_SHAPE, message, 400),

  cannotDeactivateSelf: () =>
    new AppError(ErrorCode.CANNOT_DEACTIVATE_SELF, 'You cannot deactivate your own account', 403),

  unauthenticated: (message = 'Access token required') =>
    new AppError(ErrorCode.UNAUTHENTICATED, message, 401),

  invalidCredentials: () =>
    new AppError(ErrorCode.INVALID_CREDENTIALS, 'Incorrect username or password', 401),

  unavailable: (operation: string, cause: string) =>
    new AppError(ErrorCode.UNAVAILABLE, `Storage unavailable during ${operation}`, 503, { cause }),
};
