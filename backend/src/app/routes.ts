/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/health)
 *   - module routes (users)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring: app.get/post + handler functions.
 */

import type { FastifyInstance } from 'fastify';

import type { AppDeps } from './di';

export const HEALTH_TEXT = 'OK';

export function registerRoutes(app: FastifyInstance, opts: { deps: AppDeps }) {
  // Liveness probe: fixed text, no dependency checks.
  app.get('/health', (_req, reply) => {
    return reply.type('text/plain; charset=utf-8').send(HEALTH_TEXT);
  });

  // Module routes
  opts.deps.users.registerRoutes(app);
}
