/**
 * Private adapter authentication
 */

import { timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { PrivateAdapterConfig } from '../config';
import { sendProblem } from '../problem';

function safeEqual(actual: string, expected: string): boolean {
  const a = Buffer.from(actual);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Check request credentials against the configured scheme.
 * With BEARER or API_KEY and no configured token, every request is refused.
 */
export function isAuthorized(
  config: Pick<PrivateAdapterConfig, 'authScheme' | 'authToken'>,
  headers: FastifyRequest['headers']
): boolean {
  switch (config.authScheme) {
    case 'NONE':
      return true;
    case 'BEARER': {
      const header = headerValue(headers.authorization);
      return Boolean(config.authToken) && header !== undefined && safeEqual(header, `Bearer ${config.authToken}`);
    }
    case 'API_KEY': {
      const header = headerValue(headers['x-api-key']);
      return Boolean(config.authToken) && header !== undefined && safeEqual(header, config.authToken);
    }
  }
}

/**
 * onRequest hook guarding the private adapter route
 */
export function privateAdapterAuth(config: PrivateAdapterConfig) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (isAuthorized(config, request.headers)) {
      return;
    }
    request.log.warn({ scheme: config.authScheme }, 'Private adapter authentication failed');
    return sendProblem(request, reply, 401, 'Invalid or missing credentials');
  };
}
