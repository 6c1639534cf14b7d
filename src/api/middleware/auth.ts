import { timingSafeEqual } from 'crypto';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { createError } from './errorHandler';

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Checks `x-api-key` against `API_KEY`; with no key configured only production refuses. */
export async function requireApiKey(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
  const expected = process.env.API_KEY;
  if (!expected) {
    if (process.env.NODE_ENV === 'production') {
      throw createError('API key authentication required', 401, 'AUTH_REQUIRED');
    }
    return;
  }

  const provided = headerValue(request, 'x-api-key');
  if (!provided || !keysMatch(provided, expected)) {
    throw createError('Invalid or missing API key', 401, 'INVALID_API_KEY');
  }
}
