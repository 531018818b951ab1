import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { AuthenticationError, PermissionDeniedError } from '../src/auth/errors.js';
import type { Principal } from '../src/auth/principal.js';
import { checkStreamPermission, hasRoles, requireRoles } from '../src/rbac/index.js';
import { silentLogger } from './helpers.js';

function principalWithRoles(...roles: string[]): Principal {
  return { id: 'u1', username: 'alice', expiresAt: 2_000_000_000, roles };
}

describe('hasRoles', () => {
  test('grants when the required roles are a subset of the principal roles', () => {
    assert.deepEqual(hasRoles(principalWithRoles('admin', 'viewer'), ['viewer', 'admin']), {
      granted: true,
      missing: [],
    });
  });

  test('always grants an empty requirement', () => {
    assert.deepEqual(hasRoles(principalWithRoles(), []), { granted: true, missing: [] });
  });

  test('lists missing roles in request order without deduplicating', () => {
    assert.deepEqual(hasRoles(principalWithRoles('a'), ['c', 'a', 'b', 'c']), {
      granted: false,
      missing: ['c', 'b', 'c'],
    });
  });

  test('matches role names exactly', () => {
    assert.deepEqual(hasRoles(principalWithRoles('admin'), ['Admin', 'admin*']), {
      granted: false,
      missing: ['Admin', 'admin*'],
    });
  });

  test('accepts any iterable of required roles', () => {
    assert.deepEqual(hasRoles(principalWithRoles('admin'), new Set(['admin', 'reports'])), {
      granted: false,
      missing: ['reports'],
    });
  });
});

describe('requireRoles', () => {
  test('rejects a principal missing one of the roles with the missing list', () => {
    const guard = requireRoles('admin', 'reports');
    assert.throws(
      () => guard({ principal: principalWithRoles('admin'), method: 'GET', path: '/reports' }),
      (error: unknown) =>
        error instanceof PermissionDeniedError &&
        error.statusCode === 403 &&
        error.message === 'Missing required roles: reports' &&
        error.missingRoles.length === 1 &&
        error.missingRoles[0] === 'reports',
    );
  });

  test('rejects a request without a principal as unauthenticated', () => {
    const guard = requireRoles('admin');
    assert.throws(
      () => guard({}),
      (error: unknown) =>
        error instanceof AuthenticationError &&
        error.statusCode === 401 &&
        error.message === 'Authentication required',
    );
  });

  test('requires authentication even when no roles are required', () => {
    assert.throws(() => requireRoles()({}), AuthenticationError);
  });

  test('passes silently when every role is held', () => {
    const guard = requireRoles('admin', 'reports');
    assert.equal(guard({ principal: principalWithRoles('reports', 'admin', 'viewer') }), undefined);
    assert.equal(guard({ principal: principalWithRoles('reports', 'admin') }), undefined);
  });
});

describe('checkStreamPermission', () => {
  const registry = new Map<string | number, readonly string[]>([
    ['reports-feed', ['reports']],
    [7, ['admin']],
  ]);

  test('denies a handler whose roles the principal lacks', () => {
    assert.equal(checkStreamPermission('reports-feed', principalWithRoles('admin'), registry, silentLogger), false);
  });

  test('allows a handler whose roles the principal holds', () => {
    assert.equal(checkStreamPermission(7, principalWithRoles('admin'), registry, silentLogger), true);
  });

  test('allows handlers without a registry entry', () => {
    assert.equal(checkStreamPermission('chat', principalWithRoles(), registry, silentLogger), true);
  });
});
