/**
 * Bearer token check for the consumer API
 *
 * The token is a shared secret from API_TOKEN; without one the API is open
 * (meant for a host on the same machine).
 */

import crypto from 'node:crypto';
import type { FastifyReply, FastifyRequest, onRequestHookHandler } from 'fastify';

function tokensMatch(expected: string, presented: string): boolean {
  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(presented, 'utf8');
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export function requireApiToken(apiToken: string | null): onRequestHookHandler {
  return async function authenticate(request: FastifyRequest, reply: FastifyReply) {
    if (!apiToken) {
      return;
    }

    const authHeader = request.headers.authorization;

    if (!authHeader) {
      return reply.code(401).send({
        error: 'Unauthorized',
        message: 'Missing authorization header',
      });
    }

    if (!authHeader.startsWith('Bearer ')) {
      return reply.code(401).send({
        error: 'Unauthorized',
        message: 'Invalid authorization format. Use: Bearer <token>',
      });
    }

    if (!tokensMatch(apiToken, authHeader.substring(7))) {
      return reply.code(401).send({
        error: 'Unauthorized',
        message: 'Invalid token',
      });
    }
  };
}
