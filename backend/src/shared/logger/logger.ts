/**
 * backend/src/shared/logger/logger.ts
 *
 * Structured JSON logging (winston). One process-wide instance; modules receive it
 * through deps (app/di.ts) and request handlers go through withRequestContext(req).
 *
 * Event style: `logger.info({ msg: 'auth.login.success', flow, requestId, userId })`.
 *
 * RULES:
 * - Never log passwords, password hashes, raw tokens or recovery codes.
 * - Pass errors as `{ err }` so the stack survives serialization.
 */

import winston from 'winston';

export type Logger = winston.Logger;

export type LoggerOptions = Readonly<{
  level: string;
  service: string;
  env: string;
}>;

export function createLogger(opts: LoggerOptions): Logger {
  // test runs stay quiet unless someone asks for debug output
  const silent = opts.env === 'test' && opts.level !== 'debug';

  return winston.createLogger({
    level: opts.level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    defaultMeta: { service: opts.service, env: opts.env },
    transports: [new winston.transports.Console({ silent })],
  });
}

/**
 * Built before config parsing so a fatal config error can still be logged;
 * reads the same env keys config.ts validates.
 */
export const logger: Logger = createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  service: process.env.SERVICE_NAME ?? 'tenant-admin-backend',
  env: process.env.NODE_ENV ?? 'development',
});
