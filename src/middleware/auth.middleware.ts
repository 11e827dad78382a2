import { Request, RequestHandler } from 'express';
import { IdentityProvider } from '../services/identity.service';
import { Subject } from '../types/user.types';
import { Errors } from '../types/error.types';
import { asyncHandler } from '../utils/async-handler';

declare global {
  namespace Express {
    interface Request {
      subject?: Subject;
    }
  }
}

const BEARER_PREFIX = 'Bearer ';

/**
 * Resolve the bearer token to the acting subject. Authorization itself is
 * decided by the services, per operation.
 */
export const authenticate = (identity: IdentityProvider): RequestHandler =>
  asyncHandler(async (req, _res, next) => {
    const header = req.headers.authorization;

    if (!header || !header.startsWith(BEARER_PREFIX)) {
      throw Errors.unauthenticated();
    }

    req.subject = await identity.resolve(header.slice(BEARER_PREFIX.length).trim());
    next();
  });

export const requireSubject = (req: Request): Subject => {
  if (!req.subject) {
    throw Errors.unauthenticated();
  }
  return req.subject;
};
