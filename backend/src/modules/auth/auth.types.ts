/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Response shapes of the token endpoints.
 *
 * RULES:
 * - Field names are the wire contract (snake_case).
 */

/** Roles carried by tokens when the user record has none. */
export const DEFAULT_ROLES: readonly string[] = ['user'];

export type TokenType = 'Bearer';

export type LoginTokens = {
  access_token: string;
  refresh_token: string;
  token_type: TokenType;
  expires_in: number;
};

export type RefreshedAccess = {
  access_token: string;
  token_type: TokenType;
  expires_in: number;
};
