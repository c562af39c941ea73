/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Orchestrates every user use-case: uniqueness, soft-delete lifecycle,
 *   password hashing before persistence, record <-> response mapping.
 * - Business failures are returned as Result errors; the controller maps them to HTTP.
 *
 * RULES:
 * - No HTTP concerns here.
 * - No raw DB access (UserStore only).
 * - Inputs are already structurally validated by the controller.
 * - Never log passwords or hashes; log the email domain, not the address.
 * - Unexpected failures (store down) are thrown, not wrapped.
 */

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import { err, ok, type Err, type Result } from '../../shared/result';

import { UniqueEmailViolation, type UserStore } from './dal/user.store';
import { UserErrors, type UserError } from './user.errors';
import {
  applyUpdate,
  fromCreateInput,
  normalizeEmail,
  toUserResponse,
  toUserResponseList,
} from './user.mapper';
import {
  checkCanDeactivate,
  checkCanReactivate,
  emailChanges,
} from './policies/user-lifecycle.policy';
import type {
  CreateUserInput,
  UnsavedUser,
  UpdateUserInput,
  UserId,
  UserRecord,
  UserResponse,
} from './user.types';

export type UserResult<T> = Result<T, UserError>;

/** Per-call context carried into logs. */
export type CallContext = {
  requestId?: string;
};

// ── PII-safe helpers ─────────────────────────────────────────
function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}

export class UserService {
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      store: UserStore;
      passwordHasher: PasswordHasher;
      logger: Logger;
      now?: () => Date;
    },
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async create(input: CreateUserInput, ctx: CallContext = {}): Promise<UserResult<UserResponse>> {
    const draft = fromCreateInput(input, this.now());
    const flow = 'users.create';

    this.deps.logger.info({
      msg: 'users.create.start',
      flow,
      requestId: ctx.requestId,
      emailDomain: emailDomain(draft.email),
    });

    if (await this.deps.store.existsByEmail(draft.email)) {
      return this.reject(flow, ctx, UserErrors.emailAlreadyExists(draft.email));
    }

    const passwordHash = await this.deps.passwordHasher.hash(input.password);

    const saved = await this.saveUnique({ ...draft, passwordHash });
    if (!saved.ok) return this.reject(flow, ctx, saved.error);

    this.deps.logger.info({
      msg: 'users.create.success',
      flow,
      requestId: ctx.requestId,
      userId: saved.value.id,
    });

    return ok(toUserResponse(saved.value));
  }

  async getById(id: UserId, ctx: CallContext = {}): Promise<UserResult<UserResponse>> {
    const user = await this.deps.store.findByIdActiveOnly(id);
    if (!user) return this.reject('users.get_by_id', ctx, UserErrors.userNotFound({ id }));

    return ok(toUserResponse(user));
  }

  async getByEmail(email: string, ctx: CallContext = {}): Promise<UserResult<UserResponse>> {
    const normalized = normalizeEmail(email);

    const user = await this.deps.store.findByEmail(normalized);
    if (!user || !user.active) {
      const notFound = UserErrors.userNotFound({ email: normalized });
      return this.reject('users.get_by_email', ctx, notFound);
    }

    return ok(toUserResponse(user));
  }

  async listAll(): Promise<UserResponse[]> {
    return toUserResponseList(await this.deps.store.listActive());
  }

  async searchByName(fragment: string): Promise<UserResponse[]> {
    const matches = await this.deps.store.findByNameContains(fragment.trim());
    return toUserResponseList(matches.filter((u) => u.active));
  }

  async update(
    id: UserId,
    input: UpdateUserInput,
    ctx: CallContext = {},
  ): Promise<UserResult<UserResponse>> {
    const flow = 'users.update';

    this.deps.logger.info({
      msg: 'users.update.start',
      flow,
      requestId: ctx.requestId,
      userId: id,
      fields: Object.keys(input),
    });

    const user = await this.deps.store.findByIdActiveOnly(id);
    if (!user) return this.reject(flow, ctx, UserErrors.userNotFound({ id }));

    const rawEmail = input.email ?? '';
    const nextEmail = rawEmail.trim() ? normalizeEmail(rawEmail) : null;
    if (
      nextEmail !== null &&
      emailChanges(user, nextEmail) &&
      (await this.deps.store.existsByEmailExcludingId(nextEmail, id))
    ) {
      return this.reject(flow, ctx, UserErrors.emailAlreadyExists(nextEmail));
    }

    const saved = await this.saveUnique({ ...applyUpdate(user, input), updatedAt: this.now() });
    if (!saved.ok) return this.reject(flow, ctx, saved.error);

    this.deps.logger.info({
      msg: 'users.update.success',
      flow,
      requestId: ctx.requestId,
      userId: id,
    });

    return ok(toUserResponse(saved.value));
  }

  async deactivate(id: UserId, ctx: CallContext = {}): Promise<UserResult<void>> {
    const flow = 'users.deactivate';

    const allowed = checkCanDeactivate(await this.deps.store.findById(id), id);
    if (!allowed.ok) return this.reject(flow, ctx, allowed.error);

    await this.deps.store.save({ ...allowed.value, active: false, updatedAt: this.now() });

    this.deps.logger.info({
      msg: 'users.deactivate.success',
      flow,
      requestId: ctx.requestId,
      userId: id,
    });

    return ok(undefined);
  }

  async reactivate(id: UserId, ctx: CallContext = {}): Promise<UserResult<UserResponse>> {
    const flow = 'users.reactivate';

    const allowed = checkCanReactivate(await this.deps.store.findById(id), id);
    if (!allowed.ok) return this.reject(flow, ctx, allowed.error);

    const saved = await this.deps.store.save({
      ...allowed.value,
      active: true,
      updatedAt: this.now(),
    });

    this.deps.logger.info({
      msg: 'users.reactivate.success',
      flow,
      requestId: ctx.requestId,
      userId: id,
    });

    return ok(toUserResponse(saved));
  }

  async emailExists(email: string): Promise<boolean> {
    return this.deps.store.existsByEmail(normalizeEmail(email));
  }

  async emailExistsForOtherUser(email: string, id: UserId): Promise<boolean> {
    return this.deps.store.existsByEmailExcludingId(normalizeEmail(email), id);
  }

  // The store's unique constraint is the final word on email ownership.
  private async saveUnique(record: UserRecord | UnsavedUser): Promise<UserResult<UserRecord>> {
    try {
      return ok(await this.deps.store.save(record));
    } catch (e: unknown) {
      if (e instanceof UniqueEmailViolation) return err(UserErrors.emailAlreadyExists(e.email));
      throw e;
    }
  }

  private reject(flow: string, ctx: CallContext, error: UserError): Err<UserError> {
    this.deps.logger.warn({
      msg: `${flow}.rejected`,
      flow,
      requestId: ctx.requestId,
      kind: error.kind,
    });
    return err(error);
  }
}
