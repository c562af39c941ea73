import { describe, it, expect } from 'vitest';
import { KyselyUserStore, toUserRecord } from '../../src/modules/users/dal/kysely-user.store';
import { UniqueEmailViolation } from '../../src/modules/users/dal/user.store';
import { isUniqueViolation } from '../../src/shared/db/db';
import { createScriptedPg, pgUniqueViolation } from '../helpers/scripted-pg';
import { makeUserRecord } from '../helpers/users';

const CREATED_AT = new Date('2024-01-01T00:00:00.000Z');

describe('KyselyUserStore', () => {
  it('toUserRecord maps snake_case columns', () => {
    expect(
      toUserRecord({
        id: 3,
        name: 'Ann',
        email: 'ann@x.com',
        password_hash: 'hashed:secret-pass',
        active: false,
        created_at: CREATED_AT,
        updated_at: null,
      }),
    ).toEqual({
      id: 3,
      name: 'Ann',
      email: 'ann@x.com',
      passwordHash: 'hashed:secret-pass',
      active: false,
      createdAt: CREATED_AT,
      updatedAt: null,
    });
  });

  it('findByIdActiveOnly filters on id and active flag', async () => {
    const pg = createScriptedPg();
    const store = new KyselyUserStore(pg.db);

    expect(await store.findByIdActiveOnly(7)).toBeUndefined();

    expect(pg.queries).toHaveLength(1);
    expect(pg.queries[0]?.sql).toBe('select * from "users" where "id" = $1 and "active" = $2');
    expect(pg.queries[0]?.parameters).toEqual([7, true]);
  });

  it('existsByEmailExcludingId excludes the given id', async () => {
    const pg = createScriptedPg();
    const store = new KyselyUserStore(pg.db);

    expect(await store.existsByEmailExcludingId('joe@x.com', 4)).toBe(false);

    expect(pg.queries[0]?.sql).toBe(
      'select "id" from "users" where "email" = $1 and "id" <> $2 limit $3',
    );
    expect(pg.queries[0]?.parameters).toEqual(['joe@x.com', 4, 1]);
  });

  it('findByNameContains escapes LIKE wildcards in the fragment', async () => {
    const pg = createScriptedPg();
    const store = new KyselyUserStore(pg.db);

    expect(await store.findByNameContains('50%_off')).toEqual([]);

    expect(pg.queries[0]?.sql).toBe('select * from "users" where "name" ilike $1 order by "id"');
    expect(pg.queries[0]?.parameters).toEqual(['%50\\%\\_off%']);
  });

  it('save() on an existing record never writes password_hash or created_at', async () => {
    const pg = createScriptedPg();
    const store = new KyselyUserStore(pg.db);

    // The scripted driver returns no rows, so the overwrite reports a missing row.
    await expect(store.save(makeUserRecord({ id: 9 }))).rejects.toThrow(
      'Cannot save user 9: no such row',
    );

    expect(pg.queries[0]?.sql).toBe(
      'update "users" set "name" = $1, "email" = $2, "active" = $3, "updated_at" = $4 where "id" = $5 returning *',
    );
    expect(pg.queries[0]?.parameters).toEqual(['Joe', 'joe@x.com', true, null, 9]);
  });

  it('save() translates the email unique violation', async () => {
    const pg = createScriptedPg();
    const store = new KyselyUserStore(pg.db);
    pg.failNextWith(pgUniqueViolation('users_email_key'));

    const attempt = store.save({ ...makeUserRecord(), id: null });

    await expect(attempt).rejects.toBeInstanceOf(UniqueEmailViolation);
    await expect(attempt).rejects.toMatchObject({ email: 'joe@x.com' });
  });

  it('save() rethrows other database errors unchanged', async () => {
    const pg = createScriptedPg();
    const store = new KyselyUserStore(pg.db);
    const failure = new Error('connection terminated');
    pg.failNextWith(failure);

    await expect(store.save(makeUserRecord())).rejects.toBe(failure);
  });
});

describe('isUniqueViolation', () => {
  it('matches the pg error code, optionally by constraint', () => {
    const err = pgUniqueViolation('users_email_key');

    expect(isUniqueViolation(err)).toBe(true);
    expect(isUniqueViolation(err, 'users_email_key')).toBe(true);
    expect(isUniqueViolation(err, 'other_key')).toBe(false);
    expect(isUniqueViolation(new Error('boom'))).toBe(false);
    expect(isUniqueViolation('23505')).toBe(false);
  });
});
