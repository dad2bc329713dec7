/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 *
 * RULES:
 * - Only export contracts other modules (auth) need.
 */

export { getUserById, getUserByEmail, parseUserDocument } from './queries/user.queries';
export type { UserRepo } from './dal/user.repo';
export { UserErrors } from './user.errors';
export { registerUserSchema } from './user.schemas';
export type { RegisterUserInput } from './user.schemas';
export { toPublicUser } from './user.types';
export type { PublicUser, UserDocument } from './user.types';
