import type { FastifyInstance } from 'fastify';
import { AuthenticationError } from '../auth/errors.js';
import { secondsUntilExpiry } from '../auth/principal.js';
import { requireRolesHook } from '../rbac/index.js';

export async function registerAuthRoutes(app: FastifyInstance) {
  app.get('/me', async (request) => {
    const principal = request.principal;
    if (!principal) {
      throw new AuthenticationError('Authentication required');
    }
    return {
      id: principal.id,
      username: principal.username,
      roles: principal.roles,
      tokenExpiresIn: secondsUntilExpiry(principal),
    };
  });

  app.get('/admin', { preHandler: requireRolesHook('admin') }, async (request) => ({
    message: `Welcome, admin ${request.principal?.username ?? ''}!`,
  }));

  app.get('/reports', { preHandler: requireRolesHook('admin', 'reports') }, async (request) => ({
    message: `Reports for ${request.principal?.username ?? ''}`,
  }));
}
