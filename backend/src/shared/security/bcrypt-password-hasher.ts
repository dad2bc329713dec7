/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * PasswordHasher over bcryptjs (pure JS bcrypt; digests are `$2a$<cost>$...`).
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const hash = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', hash)
 */

import bcrypt from 'bcryptjs';
import type { PasswordHasher } from './password-hasher';
import { HashingError } from './security.errors';

export const DEFAULT_BCRYPT_COST = 12;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? DEFAULT_BCRYPT_COST;
  }

  async hash(plain: string): Promise<string> {
    if (!plain) {
      throw new HashingError('Cannot hash an empty password');
    }

    try {
      return await bcrypt.hash(plain, this.cost);
    } catch (err) {
      throw new HashingError('Password hashing failed', { cause: err });
    }
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    if (!plain || !hash) return false;

    try {
      return await bcrypt.compare(plain, hash);
    } catch {
      // unreadable digest counts as a mismatch
      return false;
    }
  }
}
