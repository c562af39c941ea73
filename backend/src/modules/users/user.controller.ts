/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for all /users endpoints.
 * - Validates params/query/body and returns responses.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod (validateInput) and throw AppError.validationError.
 * - Service Result errors are mapped with toAppError and thrown to the error handler.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { z } from 'zod';

import { AppError } from '../../shared/http/errors';
import { validateInput } from '../../shared/http/validate';
import type { Result } from '../../shared/result';

import {
  createUserSchema,
  emailExistsQuerySchema,
  emailParamsSchema,
  searchQuerySchema,
  updateUserSchema,
  userIdParamsSchema,
} from './user.schemas';
import { toAppError, type UserError } from './user.errors';
import type { UserService } from './user.service';

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const outcome = validateInput(schema, input);
  if (!outcome.ok) throw AppError.validationError(outcome.errors);
  return outcome.data;
}

function unwrap<T>(result: Result<T, UserError>): T {
  if (!result.ok) throw toAppError(result.error);
  return result.value;
}

export class UserController {
  constructor(private readonly userService: UserService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(createUserSchema, req.body);

    const user = unwrap(
      await this.userService.create(body, { requestId: req.requestContext.requestId }),
    );

    return reply.status(201).header('location', `/users/${user.id}`).send(user);
  }

  async getById(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(userIdParamsSchema, req.params);

    const user = unwrap(
      await this.userService.getById(id, { requestId: req.requestContext.requestId }),
    );

    return reply.status(200).send(user);
  }

  async getByEmail(req: FastifyRequest, reply: FastifyReply) {
    const { email } = parseOrThrow(emailParamsSchema, req.params);

    const user = unwrap(
      await this.userService.getByEmail(email, { requestId: req.requestContext.requestId }),
    );

    return reply.status(200).send(user);
  }

  async list(_req: FastifyRequest, reply: FastifyReply) {
    return reply.status(200).send(await this.userService.listAll());
  }

  async search(req: FastifyRequest, reply: FastifyReply) {
    const { name } = parseOrThrow(searchQuerySchema, req.query);

    return reply.status(200).send(await this.userService.searchByName(name));
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(userIdParamsSchema, req.params);
    const body = parseOrThrow(updateUserSchema, req.body);

    const user = unwrap(
      await this.userService.update(id, body, { requestId: req.requestContext.requestId }),
    );

    return reply.status(200).send(user);
  }

  async deactivate(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(userIdParamsSchema, req.params);

    unwrap(await this.userService.deactivate(id, { requestId: req.requestContext.requestId }));

    return reply.status(204).send();
  }

  async reactivate(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(userIdParamsSchema, req.params);

    const user = unwrap(
      await this.userService.reactivate(id, { requestId: req.requestContext.requestId }),
    );

    return reply.status(200).send(user);
  }

  async emailExists(req: FastifyRequest, reply: FastifyReply) {
    const { email } = parseOrThrow(emailParamsSchema, req.params);
    const { excludeId } = parseOrThrow(emailExistsQuerySchema, req.query);

    const exists =
      excludeId === undefined
        ? await this.userService.emailExists(email)
        : await this.userService.emailExistsForOtherUser(email, excludeId);

    return reply.status(200).send({ exists });
  }
}
