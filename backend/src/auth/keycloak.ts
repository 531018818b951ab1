import { createRemoteJWKSet, errors, jwtVerify, type JWTVerifyGetKey } from 'jose';
import type { Logger } from 'pino';
import { z } from 'zod';
import defaultLogger from '../logger.js';
import { noopAuthMetrics, recordSafely, type AuthMetrics } from '../metrics/prometheus.js';
import {
  AuthenticationError,
  InvalidTokenError,
  TokenDecodeError,
  TokenExpiredError,
  errorMessage,
} from './errors.js';
import type { RawClaims } from './principal.js';

const acceptedAlgorithms = ['RS256', 'RS384', 'RS512', 'PS256', 'PS384', 'PS512'] as const;

const TokenSetSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().int().nonnegative(),
  refresh_token: z.string().optional(),
  refresh_expires_in: z.number().int().nonnegative().optional(),
  token_type: z.string().default('Bearer'),
  scope: z.string().optional(),
});

export type TokenSet = z.infer<typeof TokenSetSchema>;

/**
 * Identity-provider operations the gateway relies on. `decodeToken` rejects
 * with TokenExpiredError, InvalidTokenError or TokenDecodeError.
 */
export interface IdentityProviderClient {
  decodeToken(token: string): Promise<RawClaims>;
  login(username: string, password: string): Promise<TokenSet>;
}

export interface KeycloakClientOptions {
  /** Realm issuer, e.g. `http://keycloak:8080/realms/myrealm`. */
  issuer: string;
  clientId: string;
  clientSecret?: string;
  /** Expected `aud`; skipped when unset. */
  audience?: string;
  jwksCacheMs?: number;
  clockSkewMs?: number;
  /** Overrides the remote JWKS, e.g. with a local key set. */
  keySet?: JWTVerifyGetKey;
  fetch?: typeof fetch;
  metrics?: AuthMetrics;
  logger?: Logger;
}

function normaliseIssuer(issuer: string): string {
  return issuer.endsWith('/') ? issuer.slice(0, -1) : issuer;
}

function parseAudience(raw: string | undefined): string | string[] | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return undefined;
  }
  if (!trimmed.includes(',')) {
    return trimmed;
  }
  return trimmed
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

/** Maps a jose verification failure onto the gateway's error taxonomy. */
export function toAuthenticationError(error: unknown): AuthenticationError {
  if (error instanceof AuthenticationError) {
    return error;
  }
  if (error instanceof errors.JWTExpired) {
    return new TokenExpiredError(error.message);
  }
  if (error instanceof errors.JWSInvalid || error instanceof errors.JWTInvalid) {
    return new TokenDecodeError(error.message);
  }
  return new InvalidTokenError(errorMessage(error));
}

export class KeycloakClient implements IdentityProviderClient {
  private readonly issuer: string;
  private readonly keySet: JWTVerifyGetKey;
  private readonly fetchImpl: typeof fetch;
  private readonly metrics: AuthMetrics;
  private readonly log: Logger;

  constructor(private readonly options: KeycloakClientOptions) {
    this.issuer = normaliseIssuer(options.issuer);
    this.keySet =
      options.keySet ??
      createRemoteJWKSet(new URL(`${this.issuer}/protocol/openid-connect/certs`), {
        cacheMaxAge: options.jwksCacheMs ?? 600_000,
        cooldownDuration: 30_000,
      });
    this.fetchImpl = options.fetch ?? fetch;
    this.metrics = options.metrics ?? noopAuthMetrics;
    this.log = options.logger ?? defaultLogger.child({ component: 'KeycloakClient' });
    this.log.info({ issuer: this.issuer, clientId: options.clientId }, 'KeycloakClient initialised');
  }

  async decodeToken(token: string): Promise<RawClaims> {
    try {
      const { payload } = await jwtVerify(token, this.keySet, {
        issuer: this.issuer,
        audience: parseAudience(this.options.audience),
        algorithms: [...acceptedAlgorithms],
        clockTolerance: (this.options.clockSkewMs ?? 0) / 1000,
      });
      return payload;
    } catch (error) {
      throw toAuthenticationError(error);
    }
  }

  /** Resource-owner password grant against the realm token endpoint. */
  async login(username: string, password: string): Promise<TokenSet> {
    const body = new URLSearchParams({
      grant_type: 'password',
      client_id: this.options.clientId,
      username,
      password,
    });
    if (this.options.clientSecret) {
      body.set('client_secret', this.options.clientSecret);
    }

    const startedAt = performance.now();
    try {
      const response = await this.fetchImpl(`${this.issuer}/protocol/openid-connect/token`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body,
      });
      if (!response.ok) {
        const text = await response.text();
        throw new InvalidTokenError(`login rejected with status ${response.status}${text ? `: ${text}` : ''}`);
      }
      const parsed = TokenSetSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new TokenDecodeError('token endpoint returned an unexpected payload');
      }
      return parsed.data;
    } finally {
      const seconds = (performance.now() - startedAt) / 1000;
      recordSafely(this.log, () => this.metrics.recordProviderDuration('login', seconds));
    }
  }
}
