import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

type Env = Record<string, string | undefined>;

const DEFAULT_EXCLUDED_PATHS = '^(/docs|/openapi.json|/health|/metrics)$';

function parseFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw.trim().length === 0) {
    return undefined;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function emptyToUndefined(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

function normaliseServerUrl(serverUrl: string): string {
  return serverUrl.endsWith('/') ? serverUrl.slice(0, -1) : serverUrl;
}

const ExcludedPathsSchema = z
  .string()
  .default(DEFAULT_EXCLUDED_PATHS)
  .transform((pattern, ctx) => {
    try {
      return { source: pattern, pattern: new RegExp(pattern) };
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `KEYCLOAK_AUTH_EXCLUDED_PATHS is not a valid regular expression: ${
          error instanceof Error ? error.message : String(error)
        }`,
      });
      return z.NEVER;
    }
  });

const ConfigSchema = z.object({
  nodeEnv: z.string().default('development'),
  port: z.coerce.number().int().positive().default(4030),
  logLevel: z.string().default('info'),
  auth: z
    .object({
      serverUrl: z.string().url().default('http://localhost:8080/'),
      realm: z.string().min(1).default('master'),
      clientId: z.string().default(''),
      clientSecret: z.string().optional(),
      audience: z.string().optional(),
      jwksCacheMs: z.coerce.number().int().positive().default(600_000),
      clockSkewMs: z.coerce.number().int().nonnegative().default(0),
      excludedPaths: ExcludedPathsSchema,
    })
    .transform(({ excludedPaths, ...rest }) => ({
      ...rest,
      issuer: `${normaliseServerUrl(rest.serverUrl)}/realms/${rest.realm}`,
      excludedPaths: excludedPaths.source,
      excludedPathsPattern: excludedPaths.pattern,
    })),
  cache: z.object({
    url: z.string().optional(),
    ttlBuffer: z.coerce.number().int().nonnegative().default(30),
  }),
  metricsEnabled: z.boolean().default(false),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Builds the application configuration from an environment record.
 * Throws a ZodError when a value is malformed, including an excluded-paths
 * pattern that does not compile.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return ConfigSchema.parse({
    nodeEnv: emptyToUndefined(env.NODE_ENV),
    port: emptyToUndefined(env.PORT),
    logLevel: emptyToUndefined(env.LOG_LEVEL),
    auth: {
      serverUrl: emptyToUndefined(env.KEYCLOAK_AUTH_SERVER_URL),
      realm: emptyToUndefined(env.KEYCLOAK_AUTH_REALM),
      clientId: env.KEYCLOAK_AUTH_CLIENT_ID?.trim(),
      clientSecret: emptyToUndefined(env.KEYCLOAK_AUTH_CLIENT_SECRET),
      audience: emptyToUndefined(env.KEYCLOAK_AUTH_AUDIENCE),
      jwksCacheMs: emptyToUndefined(env.KEYCLOAK_AUTH_JWKS_CACHE_MS),
      clockSkewMs: emptyToUndefined(env.KEYCLOAK_AUTH_CLOCK_SKEW_MS),
      excludedPaths: env.KEYCLOAK_AUTH_EXCLUDED_PATHS,
    },
    cache: {
      url: emptyToUndefined(env.KEYCLOAK_AUTH_REDIS_URL),
      ttlBuffer: emptyToUndefined(env.KEYCLOAK_AUTH_REDIS_CACHE_TTL_BUFFER),
    },
    metricsEnabled: parseFlag(env.KEYCLOAK_AUTH_METRICS_ENABLED),
  });
}

export const config: AppConfig = loadConfig();
