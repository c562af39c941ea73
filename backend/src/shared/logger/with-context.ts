/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Request-scoped log lines carry requestId, host, method and url, so one request
 *   can be followed from the `request` line through to its `response` line.
 *
 * HOW TO USE:
 * - In a hook or handler: `withRequestContext(req).info('msg', { flow: '...' })`
 * - Services get a plain requestId through their call context instead.
 */

import type { FastifyRequest } from 'fastify';
import { logger, type Logger } from './logger';

export function withRequestContext(req: FastifyRequest): Logger {
  return logger.child({
    requestId: req.requestContext?.requestId,
    host: req.requestContext?.host,
    method: req.method,
    url: req.url,
  });
}
