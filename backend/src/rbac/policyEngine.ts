import type { Logger } from 'pino';
import defaultLogger from '../logger.js';
import type { Principal } from '../auth/principal.js';

export interface RoleCheck {
  granted: boolean;
  /** Required roles the principal lacks, in the order they were requested. */
  missing: string[];
}

/**
 * Grants when the principal holds every required role. Matching is exact:
 * no hierarchy, wildcards or case folding.
 */
export function hasRoles(principal: Principal, required: Iterable<string>): RoleCheck {
  const held = new Set(principal.roles);
  const missing: string[] = [];
  for (const role of required) {
    if (!held.has(role)) {
      missing.push(role);
    }
  }
  return { granted: missing.length === 0, missing };
}

/** Required roles per stream handler id; handlers without an entry require none. */
export type StreamPermissionRegistry = ReadonlyMap<string | number, readonly string[]>;

export function checkStreamPermission(
  handlerId: string | number,
  principal: Principal,
  registry: StreamPermissionRegistry,
  log: Logger = defaultLogger,
): boolean {
  const requiredRoles = registry.get(handlerId) ?? [];
  const { granted, missing } = hasRoles(principal, requiredRoles);
  if (!granted) {
    log.info(
      {
        handlerId,
        requiredRoles,
        userRoles: principal.roles,
        missingRoles: missing,
      },
      `Permission denied for user ${principal.username} on stream handler ${String(handlerId)}`,
    );
  }
  return granted;
}
