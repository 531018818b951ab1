export type { RoleCheck, StreamPermissionRegistry } from './policyEngine.js';
export { hasRoles, checkStreamPermission } from './policyEngine.js';
export type { AuthState, RoleGuard } from './guards.js';
export { requireRoles, requireRolesHook } from './guards.js';
