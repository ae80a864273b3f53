import type { FastifyReply, FastifyRequest } from 'fastify';
import { timingSafeEqual } from 'crypto';

/**
 * Constant-time string comparison to prevent timing attacks
 */
export function safeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

/**
 * onRequest hook checking `x-api-key` against `apiKey`. Without a configured
 * key every request is allowed (development mode).
 */
export function apiKeyHook(apiKey: string | undefined) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!apiKey) return;

    const provided = request.headers['x-api-key'];
    if (typeof provided !== 'string' || !safeCompare(provided, apiKey)) {
      return reply.code(401).send({ error: 'Unauthorized' });
    }
  };
}
