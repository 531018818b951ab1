import pino from 'pino';
import { TokenDecodeError } from '../src/auth/errors.js';
import type { IdentityProviderClient, TokenSet } from '../src/auth/keycloak.js';
import type { RawClaims } from '../src/auth/principal.js';
import type { CacheBackend } from '../src/storage/claimsCache.js';
import type { AuthMetrics } from '../src/metrics/prometheus.js';

export const silentLogger = pino({ level: 'silent' });

export const NOW_MS = 1_700_000_000_000;
export const NOW_SECONDS = NOW_MS / 1000;

export function sampleClaims(overrides: RawClaims = {}): RawClaims {
  return {
    sub: 'u1',
    exp: NOW_SECONDS + 3600,
    preferred_username: 'alice',
    azp: 'app',
    resource_access: { app: { roles: ['admin', 'viewer'] } },
    ...overrides,
  };
}

/** In-process stand-in for the Redis backend. */
export class InMemoryCacheBackend implements CacheBackend {
  readonly entries = new Map<string, { value: string; ttlSeconds: number }>();
  calls = 0;

  async get(key: string): Promise<string | null> {
    this.calls += 1;
    return this.entries.get(key)?.value ?? null;
  }

  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.calls += 1;
    this.entries.set(key, { value, ttlSeconds });
  }

  async delete(key: string): Promise<void> {
    this.calls += 1;
    this.entries.delete(key);
  }

  async close(): Promise<void> {}
}

/** Backend whose every operation fails, as an unreachable Redis would. */
export class FailingCacheBackend implements CacheBackend {
  calls = 0;

  private fail(): never {
    this.calls += 1;
    throw new Error('ECONNREFUSED');
  }

  async get(): Promise<string | null> {
    return this.fail();
  }

  async setWithTtl(): Promise<void> {
    this.fail();
  }

  async delete(): Promise<void> {
    this.fail();
  }

  async close(): Promise<void> {
    this.fail();
  }
}

type DecodeBehaviour = (token: string) => Promise<RawClaims>;

export class FakeIdentityProvider implements IdentityProviderClient {
  readonly decodedTokens: string[] = [];

  constructor(private readonly behaviour: DecodeBehaviour) {}

  async decodeToken(token: string): Promise<RawClaims> {
    this.decodedTokens.push(token);
    return this.behaviour(token);
  }

  async login(): Promise<TokenSet> {
    throw new TokenDecodeError('login is not supported by the fake provider');
  }
}

export function providerReturning(claims: RawClaims): FakeIdentityProvider {
  return new FakeIdentityProvider(async () => claims);
}

export function providerThrowing(error: unknown): FakeIdentityProvider {
  return new FakeIdentityProvider(async () => {
    throw error;
  });
}

export const throwingMetrics: AuthMetrics = {
  recordCacheHit() {
    throw new Error('metrics sink unavailable');
  },
  recordCacheMiss() {
    throw new Error('metrics sink unavailable');
  },
  recordAuthAttempt() {
    throw new Error('metrics sink unavailable');
  },
  recordTokenValidation() {
    throw new Error('metrics sink unavailable');
  },
  recordProviderDuration() {
    throw new Error('metrics sink unavailable');
  },
};
