import winston from 'winston';

import type { PasswordHasher } from '../../src/shared/security/password-hasher';
import type { UserRecord } from '../../src/modules/users/user.types';

/**
 * Test-only fakes for the users module.
 * - FakePasswordHasher: deterministic and instant, never equal to the plaintext.
 * - fixedClock: every call returns the next second after `start`.
 */

export class FakePasswordHasher implements PasswordHasher {
  hash(plain: string): Promise<string> {
    return Promise.resolve(`hashed:${plain}`);
  }

  verify(plain: string, hash: string): Promise<boolean> {
    return Promise.resolve(hash === `hashed:${plain}`);
  }
}

export function fixedClock(start = '2024-01-01T00:00:00.000Z'): () => Date {
  let tick = 0;
  const base = new Date(start).getTime();
  return () => new Date(base + 1000 * tick++);
}

export const silentLogger = winston.createLogger({ silent: true });

export function makeUserRecord(overrides: Partial<UserRecord> = {}): UserRecord {
  return {
    id: 1,
    name: 'Joe',
    email: 'joe@x.com',
    passwordHash: 'hashed:12345678',
    active: true,
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    updatedAt: null,
    ...overrides,
  };
}
