/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across controllers/services.
 * - Keeps API error envelopes consistent: every AppError carries the HTTP status,
 *   a machine code, a human message and the per-field `errors` list.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. organizations/organization.errors.ts).
 * - `meta` is for logs only. It is never serialized into a response.
 */

export type ErrorDetail = {
  code: string;
  message: string;
  field: string | null;
};

export type AppErrorMeta = Record<string, unknown>;

export type AppErrorOptions = {
  /** Field the single error detail points at (defaults to null). */
  field?: string;
  /** Detail message when it differs from the envelope message. */
  detail?: string;
  /** Full detail list; overrides field/detail when given. */
  errors?: ErrorDetail[];
  /** Envelope `data` for error responses (rare; e.g. the rejected org id). */
  data?: Record<string, unknown>;
  meta?: AppErrorMeta;
};

export class AppError extends Error {
  readonly status: number;
  readonly code: string;
  readonly errors: ErrorDetail[];
  readonly data: Record<string, unknown> | null;
  readonly meta?: AppErrorMeta;

  constructor(opts: { status: number; code: string; message: string } & AppErrorOptions) {
    super(opts.message);
    this.name = 'AppError';
    this.status = opts.status;
    this.code = opts.code;
    this.errors = opts.errors ?? [
      { code: opts.code, message: opts.detail ?? opts.message, field: opts.field ?? null },
    ];
    this.data = opts.data ?? null;
    this.meta = opts.meta;
  }

  static badRequest(code: string, message: string, opts: AppErrorOptions = {}) {
    return new AppError({ status: 400, code, message, ...opts });
  }

  static unauthorized(code: string, message: string, opts: AppErrorOptions = {}) {
    return new AppError({ status: 401, code, message, ...opts });
  }

  static forbidden(code: string, message: string, opts: AppErrorOptions = {}) {
    return new AppError({ status: 403, code, message, ...opts });
  }

  static notFound(code: string, message: string, opts: AppErrorOptions = {}) {
    return new AppError({ status: 404, code, message, ...opts });
  }

  static validationError(message = 'Invalid request body', errors: ErrorDetail[] = []) {
    return new AppError({ status: 400, code: 'VALIDATION_ERROR', message, errors });
  }

  static internal(code = 'INTERNAL_ERROR', message = 'Internal server error', opts: AppErrorOptions = {}) {
    return new AppError({ status: 500, code, message, ...opts });
  }
}
