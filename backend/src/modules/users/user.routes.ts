/**
 * backend/src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares Users module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - Static segments (/search, /email/...) are registered alongside /:id;
 *   Fastify's router prefers static matches, so order does not matter.
 */

import type { FastifyInstance } from 'fastify';
import type { UserController } from './user.controller';

export function registerUserRoutes(app: FastifyInstance, controller: UserController) {
  app.post('/users', controller.create.bind(controller));
  app.get('/users', controller.list.bind(controller));
  app.get('/users/search', controller.search.bind(controller));
  app.get('/users/email/:email', controller.getByEmail.bind(controller));
  app.get('/users/email-exists/:email', controller.emailExists.bind(controller));
  app.get('/users/:id', controller.getById.bind(controller));
  app.put('/users/:id', controller.update.bind(controller));
  app.delete('/users/:id', controller.deactivate.bind(controller));
  app.patch('/users/:id/reactivate', controller.reactivate.bind(controller));
}
