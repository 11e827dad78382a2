import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';

const SECRET_FIELDS = new Set(['password', 'current_password', 'new_password']);

// Request bodies are logged without credentials
const redact = (body: unknown): unknown => {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return body;

  return Object.fromEntries(
    Object.entries(body).map(([key, value]) => [key, SECRET_FIELDS.has(key) ? '[redacted]' : value])
  );
};

/**
 * Request logging middleware
 *
 * Logs incoming requests and outgoing responses
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();

  logger.info('Incoming request', {
    method: req.method,
    path: req.path,
    query: req.query,
    body: redact(req.body),
    ip: req.ip,
  });

  res.on('finish', () => {
    const duration = Date.now() - startTime;

    logger.info('Outgoing response', {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      subject: req.subject?.id,
      duration: `${duration}ms`,
    });
  });

  next();
};
