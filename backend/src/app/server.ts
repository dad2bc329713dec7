/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts; module routes are added afterwards by app/routes.ts.
 */

import Fastify from 'fastify';

import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { withRequestContext } from '../shared/logger/with-context';

export function buildServer() {
  const app = Fastify({
    logger: false, // winston is the only logger
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerErrorHandler(app);

  app.addHook('onResponse', (req, reply, done) => {
    withRequestContext(req).info('request', {
      method: req.method,
      url: req.url,
      status: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
    });
    done();
  });

  return app;
}
