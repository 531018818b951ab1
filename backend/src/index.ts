export { Authenticator, extractToken, outcomeToError, splitAuthorization } from './auth/authenticator.js';
export type {
  AuthConnection,
  AuthOutcome,
  AuthenticatorOptions,
  HttpConnection,
  StreamConnection,
} from './auth/authenticator.js';
export {
  AuthenticationError,
  AuthorizationError,
  InvalidTokenError,
  PermissionDeniedError,
  TokenDecodeError,
  TokenExpiredError,
  authFailureToError,
} from './auth/errors.js';
export type { AuthFailureKind } from './auth/errors.js';
export { KeycloakClient } from './auth/keycloak.js';
export type { IdentityProviderClient, KeycloakClientOptions, TokenSet } from './auth/keycloak.js';
export { extractRoles, isSamePrincipal, parsePrincipal, secondsUntilExpiry } from './auth/principal.js';
export type { Principal, RawClaims } from './auth/principal.js';
export { TokenValidator } from './auth/tokenValidator.js';
export type { ValidationResult } from './auth/tokenValidator.js';
export { buildServer } from './app.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { PrometheusAuthMetrics, noopAuthMetrics } from './metrics/prometheus.js';
export type { AuthMetrics } from './metrics/prometheus.js';
export { buildAuthHook, decodeRequestPath, toAuthConnection } from './middleware/auth.js';
export * from './rbac/index.js';
export {
  KeyValueClaimsCache,
  cacheKeyFor,
  computeTtlSeconds,
  createRedisClaimsCache,
  fingerprintToken,
  redisCacheBackend,
} from './storage/claimsCache.js';
export type { CacheBackend, ClaimsCache, RedisCommands } from './storage/claimsCache.js';
