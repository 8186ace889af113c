/**
 * Authentication Plugin
 *
 * Both protocols authenticate with a shared API key sent as the
 * `apikey` query parameter (or the `X-Api-Key` header). Each protocol
 * renders a rejected key in its own error format, so this plugin only
 * decorates the check.
 */

import { timingSafeEqual } from 'node:crypto';
import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

export interface AuthenticateOptions {
  apiKey: string;
}

declare module 'fastify' {
  interface FastifyInstance {
    hasApiKey: (request: FastifyRequest) => boolean;
  }
}

const keyQuerySchema = z.object({ apikey: z.string().optional() }).passthrough();

export function presentedKey(request: FastifyRequest): string | undefined {
  const query = keyQuerySchema.safeParse(request.query);
  if (query.success && query.data.apikey) {
    return query.data.apikey;
  }
  const header = request.headers['x-api-key'];
  return typeof header === 'string' ? header : undefined;
}

function sameKey(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

const authenticatePlugin: FastifyPluginAsync<AuthenticateOptions> = async (fastify, options) => {
  fastify.decorate('hasApiKey', (request: FastifyRequest): boolean => {
    const presented = presentedKey(request);
    if (presented !== undefined && sameKey(presented, options.apiKey)) {
      return true;
    }

    request.log.warn({ url: request.routeOptions.url }, 'Rejected API key');
    return false;
  });
};

export const authenticate = fp(authenticatePlugin, {
  name: 'authenticate',
});
