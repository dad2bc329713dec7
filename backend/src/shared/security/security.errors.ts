/**
 * backend/src/shared/security/security.errors.ts
 *
 * Infrastructure failures raised by the security primitives.
 * These never reach clients as-is: flows map them to 500 envelopes and log the cause.
 */

export class HashingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HashingError';
  }
}

export class TokenIssuanceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TokenIssuanceError';
  }
}
