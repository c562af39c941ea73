/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .message to the error body (+ field errors on 400).
 * - Fastify client errors (bad JSON, unsupported media type) → keep their 4xx status.
 * - Unknown routes → 404 in the same body shape.
 * - Unexpected errors → 500 with generic message.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 */

import { STATUS_CODES } from 'node:http';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { AppError } from './errors';
import { toFieldErrorMap } from './validate';
import { withRequestContext } from '../logger/with-context';

export type ErrorResponseBody = {
  timestamp: string;
  status: number;
  error: string;
  message: string;
  errors?: Record<string, string>;
};

const SENSITIVE_META_KEYS = new Set(['password', 'passwordHash', 'hash', 'token', 'secret']);

function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

export function buildErrorBody(
  status: number,
  message: string,
  errors?: Record<string, string>,
): ErrorResponseBody {
  return {
    timestamp: new Date().toISOString(),
    status,
    error: STATUS_CODES[status] ?? 'Error',
    message,
    ...(errors ? { errors } : {}),
  };
}

function clientErrorStatus(err: Error): number | null {
  if (!('statusCode' in err) || typeof err.statusCode !== 'number') return null;
  return err.statusCode >= 400 && err.statusCode < 500 ? err.statusCode : null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      const meta = {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      };

      if (err.status >= 500) log.error('app_error', meta);
      else log.warn('app_error', meta);

      const errors = err.fieldErrors ? toFieldErrorMap(err.fieldErrors) : undefined;
      return reply.status(err.status).send(buildErrorBody(err.status, err.message, errors));
    }

    // 2) Framework-level client errors (malformed JSON, bad content type, body too large)
    const status = clientErrorStatus(err);
    if (status !== null) {
      log.warn('client_error', { flow: 'http.error', status, message: err.message });
      return reply.status(status).send(buildErrorBody(status, err.message));
    }

    // 3) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildErrorBody(500, 'Internal server error'));
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    withRequestContext(req).warn('route_not_found', { flow: 'http.error' });
    return reply.status(404).send(buildErrorBody(404, `Route ${req.method} ${req.url} not found`));
  });
}
