/**
 * backend/src/shared/http/envelope.ts
 *
 * WHY:
 * - Every response (success or failure) shares one JSON shape:
 *     { success, status_code, message, data, errors: [{ code, message, field }] }
 * - Controllers call sendSuccess(); the error handler calls errorEnvelope().
 *
 * RULES:
 * - 204 responses carry no body (sendNoContent).
 */

import type { FastifyReply } from 'fastify';
import type { AppError, ErrorDetail } from './errors';

export type Envelope<T> = {
  success: boolean;
  status_code: number;
  message: string;
  data: T | null;
  errors: ErrorDetail[];
};

export function successEnvelope<T>(statusCode: number, message: string, data: T): Envelope<T> {
  return {
    success: true,
    status_code: statusCode,
    message,
    data,
    errors: [],
  };
}

export function errorEnvelope(err: AppError): Envelope<Record<string, unknown>> {
  return {
    success: false,
    status_code: err.status,
    message: err.message,
    data: err.data,
    errors: err.errors,
  };
}

export function sendSuccess<T>(reply: FastifyReply, statusCode: number, message: string, data: T) {
  return reply.status(statusCode).send(successEnvelope(statusCode, message, data));
}

export function sendNoContent(reply: FastifyReply) {
  return reply.status(204).send();
}
