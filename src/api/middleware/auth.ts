import crypto from 'crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { createError } from './errorHandler';

function digest(value: string): Buffer {
  return crypto.createHash('sha256').update(value, 'utf8').digest();
}

/** Constant-time comparison; hashing first keeps the buffers the same length. */
export function tokensMatch(provided: string, expected: string): boolean {
  return crypto.timingSafeEqual(digest(provided), digest(expected));
}

export function readBearerToken(request: FastifyRequest): string | undefined {
  const header = request.headers.authorization;
  if (!header) return undefined;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match?.[1];
}

/**
 * Bearer-token guard. With no key configured, authentication is disabled;
 * otherwise a missing token is 401 and a wrong one 403.
 */
export function createBearerAuth(expectedKey: string | undefined) {
  return async function requireBearerToken(request: FastifyRequest, _reply: FastifyReply) {
    if (!expectedKey) return;

    const token = readBearerToken(request);
    if (!token) {
      throw createError('Missing authentication', 401, 'AUTH_REQUIRED');
    }
    if (!tokensMatch(token, expectedKey)) {
      throw createError('Invalid API key', 403, 'INVALID_API_KEY');
    }
  };
}
