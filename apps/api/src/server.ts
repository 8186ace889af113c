/**
 * Fastify Server Factory
 *
 * Creates and configures the Fastify instance with all plugins. The
 * engine services are passed in so tests can build a server over fakes.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { HealthMonitor, JobRegistry } from '@relayarr/core';
import type { SearchService } from '@relayarr/indexer';

import type { Config } from './config/index.js';
import { serverLoggerOptions } from './lib/logger.js';
import { errorHandler } from './plugins/errorHandler.js';
import { authenticate, presentedKey } from './plugins/authenticate.js';
import type { QueueService } from './services/queueService.js';

// Routes
import { healthRoutes } from './routes/health.js';
import { createSabnzbdHandler, newznabRoutes, sabnzbdRoutes } from './routes/index.js';

export const VERSION = '1.0.0';

/** uploads read as text; NZB stubs are scanned for their reference */
const RAW_BODY_TYPES = [
  'multipart/form-data',
  'application/x-nzb',
  'application/xml',
  'text/xml',
  'application/x-www-form-urlencoded',
];

export interface ServerDeps {
  config: Config;
  search: SearchService;
  queue: QueueService;
  health: HealthMonitor;
  registry: JobRegistry;
  poller?: { isRunning(): boolean };
}

export async function createServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { config } = deps;

  const server = Fastify({
    logger: config.logLevel === 'silent' ? false : serverLoggerOptions(config),
    trustProxy: config.trustProxy,
    requestTimeout: 30000,
    bodyLimit: 10 * 1024 * 1024, // 10MB
  });

  server.addContentTypeParser(RAW_BODY_TYPES, { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  // ============================================
  // Security plugins
  // ============================================

  // responses are XML and JSON only
  await server.register(helmet, { contentSecurityPolicy: false });

  await server.register(cors, {
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
  });

  // ============================================
  // Rate limiting
  // ============================================

  await server.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindow,
    keyGenerator: (request) => presentedKey(request) ?? request.ip,
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      error: 'Too Many Requests',
      message: `Rate limit exceeded. Retry in ${Math.ceil(context.ttl / 1000)} seconds`,
      retryAfter: Math.ceil(context.ttl / 1000),
    }),
  });

  // ============================================
  // Error handling and authentication
  // ============================================

  await server.register(errorHandler);
  await server.register(authenticate, { apiKey: config.apiKey });

  // ============================================
  // Routes
  // ============================================

  // Root route - API info
  server.get('/', async () => ({
    name: 'relayarr',
    version: VERSION,
    status: 'running',
    newznab: '/api',
    sabnzbd: '/sabnzbd/api',
    health: '/health',
  }));

  const sabnzbd = createSabnzbdHandler({
    queue: deps.queue,
    labels: config.labels,
    downloadRoot: config.downloadRoot,
  });

  await server.register(healthRoutes, {
    prefix: '/health',
    health: deps.health,
    registry: deps.registry,
    poller: deps.poller,
    version: VERSION,
  });
  await server.register(newznabRoutes, {
    search: deps.search,
    sabnzbd,
    apiKey: config.apiKey,
    publicUrl: config.publicUrl,
  });
  await server.register(sabnzbdRoutes, { prefix: '/sabnzbd', handler: sabnzbd });

  return server;
}
