/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Every failure must leave as the standard envelope; no exception reaches the transport.
 * - Internal details (meta, causes, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → its status + envelope.
 * - StoreUnavailableError → 500 DATABASE_ERROR.
 * - Zod validation errors → 400 (safety net if a controller misses one).
 * - Fastify body parse errors → 400 INVALID_REQUEST_BODY.
 * - Unknown routes → 404 ROUTE_NOT_FOUND.
 * - Unexpected errors → 500 with generic message.
 *
 * RULES:
 * - No business logic here.
 * - Log full error details (with REDACTED meta) for observability.
 * - Always use withRequestContext(req) so requestId and principal are included.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from './errors';
import { errorEnvelope } from './envelope';
import { toValidationError } from './validation';
import { StoreUnavailableError } from '../store/store.errors';
import { withRequestContext } from '../logger/with-context';

const SENSITIVE_META_KEYS = new Set([
  'token',
  'accessToken',
  'access_token',
  'refreshToken',
  'refresh_token',
  'authorization',
  'password',
  'passwordHash',
  'password_hash',
  'secret',
  'recoveryCodes',
  'recovery_codes',
]);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function statusCodeOf(err: Error): number | null {
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  return null;
}

function send(reply: FastifyReply, err: AppError) {
  return reply.status(err.status).send(errorEnvelope(err));
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return send(reply, err);
    }

    // 2) Store unreachable / driver failure
    if (err instanceof StoreUnavailableError) {
      log.error('store_unavailable', {
        flow: 'http.error',
        operation: err.operation,
        collection: err.collection,
        cause: err.cause instanceof Error ? err.cause.message : String(err.cause),
      });

      return send(
        reply,
        AppError.internal('DATABASE_ERROR', 'Database connection error', { field: 'system' }),
      );
    }

    // 3) Zod safety net
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues.length });
      return send(reply, toValidationError(err));
    }

    // 4) Framework client errors (malformed JSON, wrong content type, body too large)
    const statusCode = statusCodeOf(err);
    if (statusCode !== null && statusCode >= 400 && statusCode < 500) {
      log.warn('request_error', { flow: 'http.error', status: statusCode, message: err.message });
      return send(
        reply,
        new AppError({
          status: statusCode,
          code: 'INVALID_REQUEST_BODY',
          message: 'Invalid request body',
          detail: err.message,
        }),
      );
    }

    // 5) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return send(reply, AppError.internal());
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    return send(
      reply,
      AppError.notFound('ROUTE_NOT_FOUND', `Route ${req.method} ${req.url} not found`),
    );
  });
}
