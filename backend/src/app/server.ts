/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts
 * - Global request context (requestId) is attached here.
 * - Module routes are registered via app/routes.ts.
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';

import type { AppConfig } from './config';
import { withRequestContext } from '../shared/logger/with-context';
import { registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';

function corsOrigin(raw: string): boolean | string[] {
  if (raw.trim() === '*') return true;
  return raw
    .split(',')
    .map((o) => o.trim())
    .filter((o) => o.length > 0);
}

export async function buildServer(opts: { config: AppConfig }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  // Request context first: CORS preflight replies short-circuit later onRequest hooks.
  registerRequestContext(app);
  registerErrorHandler(app);

  await app.register(cors, { origin: corsOrigin(opts.config.corsOrigin) });

  app.addHook('onRequest', (req, _reply, done) => {
    withRequestContext(req).info('request', { flow: 'http' });
    done();
  });

  app.addHook('onResponse', (req, reply, done) => {
    withRequestContext(req).info('response', {
      flow: 'http',
      statusCode: reply.statusCode,
      durationMs: Date.now() - (req.requestContext?.startedAtMs ?? Date.now()),
    });
    done();
  });

  return app;
}
