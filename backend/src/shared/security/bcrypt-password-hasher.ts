/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt salts every hash and has a tunable work factor (cost).
 * - Encapsulated behind PasswordHasher so the users module stays clean.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const hash = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', hash)
 *
 * NOTE:
 * - Tests use cost 4 (bcrypt's minimum) to keep the suite fast.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

const MIN_COST = 4;
const MAX_COST = 31;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    const cost = opts?.cost ?? 12;
    if (!Number.isInteger(cost) || cost < MIN_COST || cost > MAX_COST) {
      throw new RangeError(`bcrypt cost must be an integer in [${MIN_COST}, ${MAX_COST}]`);
    }
    this.cost = cost;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }
}
