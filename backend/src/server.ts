import { buildServer } from './app.js';
import { Authenticator } from './auth/authenticator.js';
import { KeycloakClient } from './auth/keycloak.js';
import { TokenValidator } from './auth/tokenValidator.js';
import { config } from './config.js';
import logger from './logger.js';
import { logAuthStartupDetails } from './middleware/auth.js';
import { PrometheusAuthMetrics, noopAuthMetrics } from './metrics/prometheus.js';
import { createRedisClaimsCache } from './storage/claimsCache.js';

async function bootstrap() {
  const prometheus = config.metricsEnabled ? new PrometheusAuthMetrics() : undefined;
  const metrics = prometheus ?? noopAuthMetrics;

  const keycloak = new KeycloakClient({
    issuer: config.auth.issuer,
    clientId: config.auth.clientId,
    clientSecret: config.auth.clientSecret,
    audience: config.auth.audience,
    jwksCacheMs: config.auth.jwksCacheMs,
    clockSkewMs: config.auth.clockSkewMs,
    metrics,
  });

  const cache = config.cache.url
    ? createRedisClaimsCache(config.cache.url, { ttlBuffer: config.cache.ttlBuffer })
    : undefined;

  const authenticator = new Authenticator({
    validator: new TokenValidator(keycloak, { metrics }),
    excludedPathsPattern: config.auth.excludedPathsPattern,
    cache,
    metrics,
  });

  logAuthStartupDetails(config);

  const app = await buildServer({ authenticator, metrics: prometheus, cache });

  try {
    await app.listen({ port: config.port, host: '0.0.0.0' });
    logger.info({ port: config.port }, 'gateway-auth listening');
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

bootstrap().catch((error: unknown) => {
  logger.error({ err: error }, 'Bootstrap failed');
  process.exit(1);
});
