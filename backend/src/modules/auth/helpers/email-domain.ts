/**
 * backend/src/modules/auth/helpers/email-domain.ts
 *
 * Login and register log the domain of the submitted address, never the address itself.
 */

/** `Ana@Example.com` → `example.com`; an input without `@` gives ''. */
export function emailDomain(email: string): string {
  const [, domain = ''] = email.trim().split(/@(?=[^@]*$)/);
  return domain.toLowerCase();
}
