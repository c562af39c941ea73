/**
 * backend/src/modules/users/dal/inmem-user.store.ts
 *
 * WHY:
 * - Allows tests (and local dev without Postgres, USER_STORE=memory) to run
 *   without external infra.
 * - Mirrors the Postgres behavior that matters: serial ids, unique email,
 *   password hash and createdAt frozen after insert.
 *
 * HOW TO USE:
 * - const store = new InMemUserStore()
 */

import type { UnsavedUser, UserId, UserRecord } from '../user.types';
import { UniqueEmailViolation, isUnsaved, type UserStore } from './user.store';

export class InMemUserStore implements UserStore {
  private readonly rows = new Map<UserId, UserRecord>();
  private nextId = 1;

  // Copies on the way in and out, so callers can't mutate stored state.
  private clone(record: UserRecord): UserRecord {
    return { ...record };
  }

  private emailHeldByOther(email: string, id: UserId | null): boolean {
    for (const row of this.rows.values()) {
      if (row.email === email && row.id !== id) return true;
    }
    return false;
  }

  private sorted(rows: Iterable<UserRecord>): UserRecord[] {
    return Array.from(rows)
      .sort((a, b) => a.id - b.id)
      .map((r) => this.clone(r));
  }

  save(record: UserRecord | UnsavedUser): Promise<UserRecord> {
    if (this.emailHeldByOther(record.email, record.id)) {
      return Promise.reject(new UniqueEmailViolation(record.email));
    }

    if (isUnsaved(record)) {
      const stored: UserRecord = { ...record, id: this.nextId++ };
      this.rows.set(stored.id, stored);
      return Promise.resolve(this.clone(stored));
    }

    const existing = this.rows.get(record.id);
    if (!existing) {
      return Promise.reject(new Error(`Cannot save user ${record.id}: no such row`));
    }

    const stored: UserRecord = {
      ...existing,
      name: record.name,
      email: record.email,
      active: record.active,
      updatedAt: record.updatedAt,
    };
    this.rows.set(stored.id, stored);
    return Promise.resolve(this.clone(stored));
  }

  findById(id: UserId): Promise<UserRecord | undefined> {
    const row = this.rows.get(id);
    return Promise.resolve(row ? this.clone(row) : undefined);
  }

  findByIdActiveOnly(id: UserId): Promise<UserRecord | undefined> {
    const row = this.rows.get(id);
    return Promise.resolve(row?.active ? this.clone(row) : undefined);
  }

  findByEmail(email: string): Promise<UserRecord | undefined> {
    for (const row of this.rows.values()) {
      if (row.email === email) return Promise.resolve(this.clone(row));
    }
    return Promise.resolve(undefined);
  }

  existsByEmail(email: string): Promise<boolean> {
    return Promise.resolve(this.emailHeldByOther(email, null));
  }

  existsByEmailExcludingId(email: string, id: UserId): Promise<boolean> {
    return Promise.resolve(this.emailHeldByOther(email, id));
  }

  listActive(): Promise<UserRecord[]> {
    return Promise.resolve(this.sorted(Array.from(this.rows.values()).filter((r) => r.active)));
  }

  findByNameContains(fragment: string): Promise<UserRecord[]> {
    const needle = fragment.toLowerCase();
    return Promise.resolve(
      this.sorted(
        Array.from(this.rows.values()).filter((r) => r.name.toLowerCase().includes(needle)),
      ),
    );
  }
}
