import { createHash } from 'node:crypto';
import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import defaultLogger from '../logger.js';
import type { RawClaims } from '../auth/principal.js';

const CACHE_KEY_PREFIX = 'token:claims:';
const MIN_TTL_SECONDS = 1;

/** Caches decoded claims per token. Never a source of request failure. */
export interface ClaimsCache {
  lookup(token: string): Promise<RawClaims | undefined>;
  store(token: string, claims: RawClaims): Promise<void>;
  invalidate(token: string): Promise<void>;
  close(): Promise<void>;
}

/** Minimal key-value port the cache needs from its backing store. */
export interface CacheBackend {
  get(key: string): Promise<string | null>;
  setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  close(): Promise<void>;
}

export interface ClaimsCacheOptions {
  /** Seconds subtracted from the token expiry when computing the entry TTL. */
  ttlBuffer?: number;
  now?: () => number;
  logger?: Logger;
}

/** SHA-256 hex digest of the token; raw tokens are never used as keys. */
export function fingerprintToken(token: string): string {
  return createHash('sha256').update(token, 'utf8').digest('hex');
}

export function cacheKeyFor(token: string): string {
  return `${CACHE_KEY_PREFIX}${fingerprintToken(token)}`;
}

/**
 * TTL for a claims entry: `exp - now - ttlBuffer`, floored at one second.
 * Undefined when `exp` is absent or not a number.
 */
export function computeTtlSeconds(claims: RawClaims, nowMs: number, ttlBuffer: number): number | undefined {
  const exp = claims.exp;
  if (typeof exp !== 'number' || !Number.isFinite(exp)) {
    return undefined;
  }
  return Math.max(Math.trunc(exp - nowMs / 1000) - ttlBuffer, MIN_TTL_SECONDS);
}

function isClaimsObject(value: unknown): value is RawClaims {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class KeyValueClaimsCache implements ClaimsCache {
  private readonly ttlBuffer: number;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    private readonly backend: CacheBackend,
    options: ClaimsCacheOptions = {},
  ) {
    this.ttlBuffer = options.ttlBuffer ?? 30;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? defaultLogger.child({ component: 'ClaimsCache' });
  }

  async lookup(token: string): Promise<RawClaims | undefined> {
    try {
      const raw = await this.backend.get(cacheKeyFor(token));
      if (raw === null) {
        this.log.debug('Token cache miss');
        return undefined;
      }
      const parsed: unknown = JSON.parse(raw);
      if (!isClaimsObject(parsed)) {
        this.log.warn('Cached claims are not an object; treating as miss');
        return undefined;
      }
      this.log.debug('Token cache hit');
      return parsed;
    } catch (error) {
      this.log.warn({ err: error }, 'Token cache lookup failed (fail-open)');
      return undefined;
    }
  }

  async store(token: string, claims: RawClaims): Promise<void> {
    const ttl = computeTtlSeconds(claims, this.now(), this.ttlBuffer);
    if (ttl === undefined) {
      this.log.debug('Token has no exp claim, skipping cache');
      return;
    }
    try {
      await this.backend.setWithTtl(cacheKeyFor(token), JSON.stringify(claims), ttl);
      this.log.debug({ ttl }, 'Token claims cached');
    } catch (error) {
      this.log.warn({ err: error }, 'Token cache store failed (fail-open)');
    }
  }

  async invalidate(token: string): Promise<void> {
    try {
      await this.backend.delete(cacheKeyFor(token));
      this.log.debug('Token cache entry invalidated');
    } catch (error) {
      this.log.warn({ err: error }, 'Token cache invalidation failed (fail-open)');
    }
  }

  async close(): Promise<void> {
    try {
      await this.backend.close();
    } catch (error) {
      this.log.warn({ err: error }, 'Token cache close failed');
    }
  }
}

/** The ioredis commands the cache issues. */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<unknown>;
  quit(): Promise<unknown>;
}

export function createRedisBackend(redisUrl: string, log: Logger = defaultLogger): CacheBackend {
  const redis = new Redis(redisUrl, {
    maxRetriesPerRequest: 1,
    lazyConnect: true,
  });
  redis.on('error', (error: Error) => {
    log.warn({ err: error }, 'Redis connection error');
  });
  return redisCacheBackend(redis);
}

export function redisCacheBackend(redis: RedisCommands): CacheBackend {
  return {
    async get(key) {
      return redis.get(key);
    },
    async setWithTtl(key, value, ttlSeconds) {
      await redis.setex(key, ttlSeconds, value);
    },
    async delete(key) {
      await redis.del(key);
    },
    async close() {
      await redis.quit();
    },
  };
}

export function createRedisClaimsCache(
  redisUrl: string,
  options: Omit<ClaimsCacheOptions, 'now'> = {},
): ClaimsCache {
  const log = options.logger ?? defaultLogger.child({ component: 'ClaimsCache' });
  log.info({ url: redisUrl.replace(/\/\/[^@/]*@/, '//***@') }, 'Redis claims cache enabled');
  return new KeyValueClaimsCache(createRedisBackend(redisUrl, log), { ...options, logger: log });
}
