/**
 * src/modules/_shared/use-cases/provision-user.usecase.ts
 *
 * WHY:
 * - "Validate credentials + check uniqueness + hash + write the full user document"
 *   is shared by public registration (POST /auth/register) and admin creation
 *   (POST /users). Defining it once keeps the two paths' error codes identical.
 *
 * WHAT IT DOES (in order):
 * 1. email, username, password present        → else MISSING_REQUIRED_FIELDS
 * 2. email syntax                              → else INVALID_EMAIL_FORMAT
 * 3. password length 8..128                    → else INVALID_PASSWORD
 * 4. email unused                              → else EMAIL_ALREADY_EXISTS
 * 5. username unused                           → else USERNAME_ALREADY_EXISTS
 * 6. hash password, build document, insert
 *
 * RULES:
 * - Throws AppError (callers are services, not the Result-based auth core).
 * - Never logs the password or its hash.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';

import type { DocumentStore } from '../../../shared/store/document-store';
import { DuplicateDocumentError } from '../../../shared/store/store.errors';
import type { PasswordHasher } from '../../../shared/security/password-hasher';
import { HashingError } from '../../../shared/security/security.errors';
import type { Clock } from '../../../shared/time/clock';

import type { UserRepo } from '../../users/dal/user.repo';
import { getUserByEmail, getUserByUsername } from '../../users/queries/user.queries';
import { buildUserDocument } from '../../users/helpers/build-user-document';
import type { CreateUserInput } from '../../users/user.schemas';
import type { UserDocument } from '../../users/user.types';
import { UserErrors } from '../../users/user.errors';

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 128;

const emailSchema = z.string().email();

export type ProvisionUserParams = {
  store: DocumentStore;
  userRepo: UserRepo;
  passwordHasher: PasswordHasher;
  clock: Clock;
  input: CreateUserInput;
  /** Organization the new user belongs to (admin create defaults it to the caller's). */
  orgId: string | null;
  registration: {
    source: string;
    ip: string | null;
    userAgent: string | null;
  };
};

export async function provisionUser(params: ProvisionUserParams): Promise<UserDocument> {
  const email = params.input.email?.trim().toLowerCase() ?? '';
  const username = params.input.username?.trim() ?? '';
  const password = params.input.password ?? '';

  if (!email || !username || !password) {
    throw UserErrors.missingRequiredFields();
  }

  if (!emailSchema.safeParse(email).success) {
    throw UserErrors.invalidEmailFormat();
  }

  if (password.length < PASSWORD_MIN_LENGTH || password.length > PASSWORD_MAX_LENGTH) {
    throw UserErrors.invalidPassword();
  }

  if (await getUserByEmail(params.store, email)) {
    throw UserErrors.emailAlreadyExists();
  }

  if (await getUserByUsername(params.store, username)) {
    throw UserErrors.usernameAlreadyExists();
  }

  let passwordHash: string;
  try {
    passwordHash = await params.passwordHasher.hash(password);
  } catch (error) {
    if (error instanceof HashingError) throw UserErrors.passwordHashingFailed();
    throw error;
  }

  const user = buildUserDocument({
    userId: randomUUID(),
    email,
    username,
    passwordHash,
    orgId: params.orgId,
    now: params.clock().toISOString(),
    input: params.input,
    registration: params.registration,
  });

  try {
    await params.userRepo.insertUser(user);
  } catch (error) {
    if (error instanceof DuplicateDocumentError) throw UserErrors.userIdAlreadyExists();
    throw error;
  }

  return user;
}
