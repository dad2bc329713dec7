/**
 * backend/src/shared/security/password-hasher.ts
 *
 * Port for password digests. Auth and users depend on this; bcrypt stays behind
 * BcryptPasswordHasher.
 *
 * - hash(): fresh salt per call; the digest embeds salt and cost, so raising the
 *   cost leaves stored digests verifiable. Empty input rejects with HashingError.
 * - verify(): resolves false for a wrong password or an unreadable digest; never rejects.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, digest: string): Promise<boolean>;
}
