import type { Logger } from 'pino';
import defaultLogger from '../logger.js';
import {
  noopAuthMetrics,
  recordSafely,
  type AuthAttemptStatus,
  type AuthMetrics,
} from '../metrics/prometheus.js';
import type { ClaimsCache } from '../storage/claimsCache.js';
import { authFailureToError, type AuthFailureKind, type AuthenticationError } from './errors.js';
import { parsePrincipal, type Principal, type RawClaims } from './principal.js';
import type { TokenValidator } from './tokenValidator.js';

/** Request/response connection, e.g. a plain HTTP request. */
export interface HttpConnection {
  kind: 'http';
  path: string;
  header(name: string): string | undefined;
}

/** Long-lived connection such as a WebSocket; the token travels in the opening query string. */
export interface StreamConnection {
  kind: 'stream';
  queryString: string;
}

export type AuthConnection = HttpConnection | StreamConnection;

export type AuthOutcome =
  | { type: 'authenticated'; principal: Principal }
  | { type: 'exempt' }
  | { type: 'failed'; kind: AuthFailureKind; detail: string };

export interface AuthenticatorOptions {
  validator: TokenValidator;
  /** Paths that skip authentication; must match from the start of the path. */
  excludedPathsPattern: RegExp;
  cache?: ClaimsCache;
  metrics?: AuthMetrics;
  logger?: Logger;
}

const attemptStatusByKind: Record<AuthFailureKind, AuthAttemptStatus> = {
  expired: 'expired',
  invalid_credentials: 'invalid',
  decode_error: 'error',
};

const QUERY_AUTHORIZATION_KEY = 'Authorization';

/**
 * Splits an `Authorization` value into scheme and credential at the first
 * space. A value without a space yields an empty credential.
 */
export function splitAuthorization(value: string | undefined): { scheme: string; credential: string } {
  if (!value) {
    return { scheme: '', credential: '' };
  }
  const separator = value.indexOf(' ');
  if (separator === -1) {
    return { scheme: value, credential: '' };
  }
  return { scheme: value.slice(0, separator), credential: value.slice(separator + 1) };
}

export function extractToken(connection: AuthConnection): string {
  if (connection.kind === 'stream') {
    const params = new URLSearchParams(connection.queryString.replace(/^\?/, ''));
    // A repeated key resolves to its last value.
    return splitAuthorization(params.getAll(QUERY_AUTHORIZATION_KEY).at(-1) ?? '').credential;
  }
  return splitAuthorization(connection.header('authorization') ?? '').credential;
}

export function outcomeToError(outcome: AuthOutcome): AuthenticationError | undefined {
  return outcome.type === 'failed' ? authFailureToError(outcome.kind, outcome.detail) : undefined;
}

/**
 * Per-connection authentication: exemption check, token extraction, cache,
 * validation, principal construction. Holds no per-connection state.
 */
export class Authenticator {
  private readonly validator: TokenValidator;
  private readonly excludedPaths: RegExp;
  private readonly cache: ClaimsCache | undefined;
  private readonly metrics: AuthMetrics;
  private readonly log: Logger;

  constructor(options: AuthenticatorOptions) {
    this.validator = options.validator;
    const flags = options.excludedPathsPattern.flags.replace(/[gy]/g, '');
    this.excludedPaths = new RegExp(options.excludedPathsPattern.source, flags);
    this.cache = options.cache;
    this.metrics = options.metrics ?? noopAuthMetrics;
    this.log = options.logger ?? defaultLogger.child({ component: 'Authenticator' });
  }

  isExempt(connection: AuthConnection): boolean {
    if (connection.kind !== 'http') {
      return false;
    }
    // Leftmost match, so a match exists at index 0 iff one starts the path.
    const match = this.excludedPaths.exec(connection.path);
    return match !== null && match.index === 0;
  }

  async authenticate(connection: AuthConnection): Promise<AuthOutcome> {
    this.log.debug({ kind: connection.kind }, 'Authenticating connection');

    if (this.isExempt(connection)) {
      return { type: 'exempt' };
    }

    const token = extractToken(connection);

    if (this.cache) {
      const cached = await this.cache.lookup(token);
      if (cached !== undefined) {
        this.record((metrics) => metrics.recordCacheHit());
        return this.buildOutcome(cached);
      }
      this.record((metrics) => metrics.recordCacheMiss());
    }

    const result = await this.validator.validate(token);
    if (!result.ok) {
      this.record((metrics) => metrics.recordAuthAttempt(attemptStatusByKind[result.kind]));
      this.log.error({ kind: result.kind }, `Authentication failed: ${authFailureToError(result.kind, result.detail).message}`);
      return { type: 'failed', kind: result.kind, detail: result.detail };
    }

    const outcome = this.buildOutcome(result.claims);
    if (this.cache && outcome.type === 'authenticated') {
      await this.cache.store(token, result.claims);
    }
    return outcome;
  }

  private buildOutcome(claims: RawClaims): AuthOutcome {
    const parsed = parsePrincipal(claims);
    if (!parsed.ok) {
      this.record((metrics) => metrics.recordAuthAttempt('error'));
      this.log.error({ reason: parsed.reason }, 'Validated token carries unusable claims');
      return { type: 'failed', kind: 'decode_error', detail: parsed.reason };
    }
    this.record((metrics) => metrics.recordAuthAttempt('success'));
    return { type: 'authenticated', principal: parsed.principal };
  }

  private record(fn: (metrics: AuthMetrics) => void): void {
    recordSafely(this.log, () => fn(this.metrics));
  }
}
