import { afterEach, describe, test } from 'node:test';
import assert from 'node:assert/strict';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../src/app.js';
import { Authenticator } from '../src/auth/authenticator.js';
import { TokenDecodeError, TokenExpiredError } from '../src/auth/errors.js';
import { TokenValidator } from '../src/auth/tokenValidator.js';
import { PrometheusAuthMetrics } from '../src/metrics/prometheus.js';
import { decodeRequestPath } from '../src/middleware/auth.js';
import { FakeIdentityProvider, sampleClaims, silentLogger } from './helpers.js';

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function createProvider() {
  return new FakeIdentityProvider(async (token) => {
    switch (token) {
      case 'admin-token':
        return sampleClaims({ exp: nowSeconds() + 600 });
      case 'reporter-token':
        return sampleClaims({
          sub: 'u2',
          preferred_username: 'bob',
          exp: nowSeconds() + 600,
          resource_access: { app: { roles: ['admin', 'reports'] } },
        });
      case 'expired-token':
        throw new TokenExpiredError('jwt expired');
      default:
        throw new TokenDecodeError('Invalid Compact JWS');
    }
  });
}

let app: FastifyInstance | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

async function createApp(provider = createProvider(), metrics?: PrometheusAuthMetrics) {
  const authenticator = new Authenticator({
    validator: new TokenValidator(provider, { metrics, logger: silentLogger }),
    excludedPathsPattern: /^(\/health|\/metrics)$/,
    metrics,
    logger: silentLogger,
  });
  app = await buildServer({ authenticator, metrics });
  return app;
}

describe('HTTP surface', () => {
  test('serves excluded paths without authentication', async () => {
    const provider = createProvider();
    const server = await createApp(provider);

    const response = await server.inject({ method: 'GET', url: '/health' });

    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.json(), { status: 'ok' });
    assert.deepEqual(provider.decodedTokens, []);
  });

  test('matches excluded paths after percent-decoding', async () => {
    const provider = createProvider();
    const server = await createApp(provider);

    const response = await server.inject({ method: 'GET', url: '/%68ealth' });

    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.json(), { status: 'ok' });
    assert.deepEqual(provider.decodedTokens, []);
  });

  test('returns the authenticated principal', async () => {
    const server = await createApp();

    const response = await server.inject({
      method: 'GET',
      url: '/me',
      headers: { authorization: 'Bearer admin-token' },
    });

    assert.equal(response.statusCode, 200);
    const body = response.json();
    assert.equal(body.id, 'u1');
    assert.equal(body.username, 'alice');
    assert.deepEqual(body.roles, ['admin', 'viewer']);
    assert.ok(body.tokenExpiresIn > 0 && body.tokenExpiresIn <= 600);
  });

  test('answers 401 with the failure kind when no token is sent', async () => {
    const server = await createApp();

    const response = await server.inject({ method: 'GET', url: '/me' });

    assert.equal(response.statusCode, 401);
    assert.deepEqual(response.json(), {
      error: 'token_decode_error: Invalid Compact JWS',
      code: 'token_decode_error',
    });
  });

  test('answers 401 for an expired token', async () => {
    const server = await createApp();

    const response = await server.inject({
      method: 'GET',
      url: '/admin',
      headers: { authorization: 'Bearer expired-token' },
    });

    assert.equal(response.statusCode, 401);
    assert.deepEqual(response.json(), { error: 'token_expired: jwt expired', code: 'token_expired' });
  });

  test('answers 403 listing the missing roles', async () => {
    const server = await createApp();

    const response = await server.inject({
      method: 'GET',
      url: '/reports',
      headers: { authorization: 'Bearer admin-token' },
    });

    assert.equal(response.statusCode, 403);
    assert.deepEqual(response.json(), {
      error: 'Missing required roles: reports',
      code: 'forbidden',
      details: { missingRoles: ['reports'] },
    });
  });

  test('lets principals with every required role through', async () => {
    const server = await createApp();

    const admin = await server.inject({
      method: 'GET',
      url: '/admin',
      headers: { authorization: 'Bearer admin-token' },
    });
    const reports = await server.inject({
      method: 'GET',
      url: '/reports',
      headers: { authorization: 'Bearer reporter-token' },
    });

    assert.equal(admin.statusCode, 200);
    assert.deepEqual(admin.json(), { message: 'Welcome, admin alice!' });
    assert.equal(reports.statusCode, 200);
    assert.deepEqual(reports.json(), { message: 'Reports for bob' });
  });

  test('authenticates WebSocket upgrades from the query string', async () => {
    const provider = createProvider();
    const server = await createApp(provider);

    const response = await server.inject({
      method: 'GET',
      url: '/me?Authorization=Bearer+reporter-token',
      headers: { upgrade: 'websocket', connection: 'Upgrade' },
    });

    assert.equal(response.statusCode, 200);
    assert.equal(response.json().username, 'bob');
    assert.deepEqual(provider.decodedTokens, ['reporter-token']);
  });

  test('exposes authentication metrics when enabled', async () => {
    const metrics = new PrometheusAuthMetrics();
    const server = await createApp(createProvider(), metrics);

    await server.inject({ method: 'GET', url: '/me', headers: { authorization: 'Bearer admin-token' } });
    await server.inject({ method: 'GET', url: '/me', headers: { authorization: 'Bearer expired-token' } });
    const response = await server.inject({ method: 'GET', url: '/metrics' });

    assert.equal(response.statusCode, 200);
    const lines = response.body.split('\n');
    assert.ok(lines.includes('gateway_auth_attempts_total{status="success"} 1'));
    assert.ok(lines.includes('gateway_auth_attempts_total{status="expired"} 1'));
    assert.ok(lines.includes('gateway_auth_token_validations_total{status="valid"} 1'));
  });

  test('does not register /metrics when metrics are disabled', async () => {
    const server = await createApp();
    const response = await server.inject({ method: 'GET', url: '/metrics' });
    assert.equal(response.statusCode, 404);
  });
});

describe('decodeRequestPath', () => {
  test('decodes percent escapes', () => {
    assert.equal(decodeRequestPath('/%68ealth'), '/health');
    assert.equal(decodeRequestPath('/a%20b'), '/a b');
  });

  test('leaves a malformed escape as sent', () => {
    assert.equal(decodeRequestPath('/bad%zz'), '/bad%zz');
  });
});
