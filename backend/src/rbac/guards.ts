import type { FastifyRequest } from 'fastify';
import defaultLogger from '../logger.js';
import { AuthenticationError, PermissionDeniedError } from '../auth/errors.js';
import type { Principal } from '../auth/principal.js';
import { hasRoles } from './policyEngine.js';

const log = defaultLogger.child({ component: 'rbac' });

/** What a guard sees of the incoming request. */
export interface AuthState {
  /** Absent for unauthenticated or exempt connections. */
  principal?: Principal;
  method?: string;
  path?: string;
}

export type RoleGuard = (state: AuthState) => void;

/**
 * Builds a reusable check bound to a fixed role set. Throws
 * AuthenticationError without a principal and PermissionDeniedError when
 * roles are missing; returns nothing otherwise.
 */
export function requireRoles(...roles: string[]): RoleGuard {
  const required = [...roles];
  return function checkRoles(state: AuthState): void {
    const { principal } = state;
    if (!principal) {
      throw new AuthenticationError('Authentication required');
    }

    const { granted, missing } = hasRoles(principal, required);
    if (!granted) {
      log.info(
        {
          requiredRoles: required,
          userRoles: principal.roles,
          missingRoles: missing,
          httpMethod: state.method,
          endpoint: state.path,
        },
        `HTTP permission denied for user ${principal.username} on ${state.method ?? '-'} ${state.path ?? '-'}`,
      );
      throw new PermissionDeniedError(missing);
    }
  };
}

type PreHandler = (request: FastifyRequest) => Promise<void>;

/** Fastify `preHandler` form of {@link requireRoles}. */
export function requireRolesHook(...roles: string[]): PreHandler {
  const guard = requireRoles(...roles);
  return async function rolesPreHandler(request: FastifyRequest) {
    guard({
      principal: request.principal,
      method: request.method,
      path: request.url.split('?')[0],
    });
  };
}
