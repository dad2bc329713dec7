/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 *
 * SECURITY:
 * - login and register are public; everything else needs a bearer access token.
 * - Tokens only travel in the Authorization header or the POST body, never the URL.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthGuard } from '../../shared/http/auth-guard';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(app: FastifyInstance, controller: AuthController, guard: AuthGuard) {
  const authenticated = { preHandler: [guard.authenticate] };

  app.post('/auth/login', controller.login.bind(controller));
  app.post('/auth/register', controller.register.bind(controller));

  app.post('/auth/refresh', authenticated, controller.refresh.bind(controller));
  app.delete('/auth/logout', authenticated, controller.logout.bind(controller));
  app.get('/auth/me', authenticated, controller.me.bind(controller));
}
