/**
 * backend/src/modules/users/user.mapper.ts
 *
 * WHY:
 * - Single place that shapes records into responses and inputs into records.
 * - Pure functions: time comes in as a parameter, nothing is persisted here.
 *
 * RULES:
 * - passwordHash is never copied into a response.
 * - applyUpdate never touches passwordHash, active, createdAt or updatedAt
 *   (the service stamps updatedAt at the transition).
 */

import type {
  CreateUserInput,
  UpdateUserInput,
  UserDraft,
  UserRecord,
  UserResponse,
} from './user.types';

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function nonBlank(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function toUserResponse(record: UserRecord): UserResponse;
export function toUserResponse(record: UserRecord | null | undefined): UserResponse | null;
export function toUserResponse(record: UserRecord | null | undefined): UserResponse | null {
  if (!record) return null;

  return {
    id: record.id,
    name: record.name,
    email: record.email,
    active: record.active,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}

export function toUserResponseList(records: readonly UserRecord[]): UserResponse[] {
  return records.map((r) => toUserResponse(r));
}

export function fromCreateInput(input: CreateUserInput, now: Date): UserDraft {
  return {
    id: null,
    name: input.name.trim(),
    email: normalizeEmail(input.email),
    active: true,
    createdAt: now,
    updatedAt: null,
  };
}

export function applyUpdate(record: UserRecord, input: UpdateUserInput): UserRecord {
  const name = nonBlank(input.name);
  const email = nonBlank(input.email);

  return {
    ...record,
    name: name ?? record.name,
    email: email !== null ? email.toLowerCase() : record.email,
  };
}
