/**
 * Structured Logging Middleware
 *
 * Provides request-scoped logging with:
 * - Unique request IDs (UUID v4)
 * - Request/response logging with latency
 * - Ledger username context when the route carries one
 */

import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import pino from 'pino';

/**
 * Extended Request with logging context
 */
export interface LoggedRequest extends Request {
  id: string;
  startTime: number;
  log: pino.Logger;
}

/**
 * Create Pino logger instance
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: process.env.NODE_ENV === 'development'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
});

function isLoggedRequest(req: Request): req is LoggedRequest {
  return 'log' in req && 'id' in req;
}

/**
 * Logging middleware
 *
 * Attaches unique request ID and logger to each request.
 * Logs request start and completion with latency.
 */
export function loggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const id = randomUUID();
  const startTime = Date.now();

  // Create request-scoped logger
  const log = logger.child({
    reqId: id,
    method: req.method,
    path: req.path,
    ip: req.ip,
  });

  Object.assign(req, { id, startTime, log });
  res.setHeader('X-Request-Id', id);

  // Log request start
  log.info({
    event: 'request_start',
    method: req.method,
    url: req.url,
    userAgent: req.get('user-agent'),
  });

  res.on('finish', () => {
    const latency = Date.now() - startTime;

    const logContext: Record<string, unknown> = {
      event: 'request_finish',
      method: req.method,
      path: req.path,
      status: res.statusCode,
      latency,
    };

    // req.params is only populated once a router matched
    if (typeof req.params?.username === 'string') {
      logContext.username = req.params.username;
    }

    // Log with appropriate level based on status code
    if (res.statusCode >= 500) {
      log.error(logContext);
    } else if (res.statusCode >= 400) {
      log.warn(logContext);
    } else {
      log.info(logContext);
    }
  });

  next();
}

/**
 * Get logger from request
 */
export function getLogger(req: Request): pino.Logger {
  return isLoggedRequest(req) ? req.log : logger;
}
