import type { FastifyReply, FastifyRequest } from 'fastify';
import type { AuthConnection, Authenticator } from '../auth/authenticator.js';
import { authFailureToError } from '../auth/errors.js';
import type { AppConfig } from '../config.js';
import logger from '../logger.js';
import { sendError } from '../utils/errors.js';

type OnRequestHook = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

function isWebSocketUpgrade(request: FastifyRequest): boolean {
  return headerValue(request, 'upgrade')?.toLowerCase() === 'websocket';
}

/** Percent-decodes a request path the way the router does; malformed escapes leave it as sent. */
export function decodeRequestPath(rawPath: string): string {
  try {
    return decodeURIComponent(rawPath);
  } catch {
    return rawPath;
  }
}

/** Adapts a Fastify request to the connection shape the Authenticator reads. */
export function toAuthConnection(request: FastifyRequest): AuthConnection {
  const rawUrl = request.raw.url ?? '';
  const queryStart = rawUrl.indexOf('?');

  if (isWebSocketUpgrade(request)) {
    return { kind: 'stream', queryString: queryStart === -1 ? '' : rawUrl.slice(queryStart + 1) };
  }

  return {
    kind: 'http',
    path: decodeRequestPath(queryStart === -1 ? rawUrl : rawUrl.slice(0, queryStart)),
    header: (name) => headerValue(request, name),
  };
}

export function buildAuthHook(authenticator: Authenticator): OnRequestHook {
  return async function authHook(request: FastifyRequest, reply: FastifyReply) {
    const outcome = await authenticator.authenticate(toAuthConnection(request));

    switch (outcome.type) {
      case 'exempt':
        return;
      case 'authenticated':
        request.principal = outcome.principal;
        return;
      case 'failed': {
        const error = authFailureToError(outcome.kind, outcome.detail);
        request.log.warn({ kind: outcome.kind }, 'Rejected unauthenticated request');
        return reply.send(sendError(reply, error.statusCode, error.code, error.message));
      }
    }
  };
}

export function logAuthStartupDetails(appConfig: AppConfig): void {
  logger.info(
    {
      issuer: appConfig.auth.issuer,
      clientId: appConfig.auth.clientId,
      audience: appConfig.auth.audience ?? null,
      excludedPaths: appConfig.auth.excludedPaths,
      cache: appConfig.cache.url ? 'redis' : 'disabled',
      metricsEnabled: appConfig.metricsEnabled,
    },
    'Keycloak authentication enabled',
  );
}
