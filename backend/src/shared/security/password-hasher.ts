/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be one-way, salted, slow, and easy to swap.
 * - The users service depends on this interface, not on bcrypt directly (DIP).
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 *
 * RULES:
 * - verify() must re-run the algorithm against the stored salt;
 *   never compare two hashes for equality.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
