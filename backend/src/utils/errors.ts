import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { AuthenticationError, AuthorizationError, PermissionDeniedError } from '../auth/errors.js';

export interface ErrorPayload {
  error: string;
  code: string;
  details?: unknown;
}

export function sendError(
  reply: FastifyReply,
  status: number,
  code: string,
  message: string,
  details?: unknown,
): ErrorPayload {
  reply.status(status);
  const payload: ErrorPayload = { error: message, code };
  if (details !== undefined) payload.details = details;
  return payload;
}

/** Fastify error handler mapping the auth error taxonomy onto 401/403 bodies. */
export function authErrorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) {
  if (error instanceof AuthenticationError) {
    return reply.send(sendError(reply, error.statusCode, error.code, error.message));
  }
  if (error instanceof PermissionDeniedError) {
    return reply.send(
      sendError(reply, error.statusCode, error.code, error.message, { missingRoles: error.missingRoles }),
    );
  }
  if (error instanceof AuthorizationError) {
    return reply.send(sendError(reply, error.statusCode, error.code, error.message));
  }
  const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;
  if (statusCode >= 500) {
    request.log.error({ err: error }, 'Unhandled error');
    return reply.send(sendError(reply, 500, 'internal_error', 'Internal Server Error'));
  }
  return reply.send(sendError(reply, statusCode, 'request_error', error.message));
}
