/**
 * Health Routes
 *
 * Liveness and readiness probes. Readiness reports the provider and
 * engine status; it fails while either is blocked on credentials.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { ComponentHealth, HealthMonitor, JobRegistry } from '@relayarr/core';

export interface HealthRouteOptions {
  health: HealthMonitor;
  registry: JobRegistry;
  poller?: { isRunning(): boolean };
  version: string;
}

interface CheckResult {
  status: ComponentHealth['status'];
  reason?: string;
  since: string;
}

function check(component: ComponentHealth): CheckResult {
  return {
    status: component.status,
    reason: component.reason,
    since: component.since.toISOString(),
  };
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (fastify, options) => {
  const { health, registry, poller, version } = options;

  // Basic liveness probe (fast, always returns 200 if running)
  fastify.get('/', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
  }));

  fastify.get('/live', async () => ({ status: 'alive' }));

  fastify.get('/ready', async (_request, reply) => {
    const snapshot = health.snapshot();
    const healthy = snapshot.provider.status === 'ok' && snapshot.engine.status === 'ok';

    const body = {
      status: health.isDegraded() ? 'unhealthy' : healthy ? 'healthy' : 'degraded',
      version,
      uptime: Math.floor(process.uptime()),
      timestamp: new Date().toISOString(),
      poller: poller?.isRunning() ?? false,
      jobs: {
        queue: registry.list({ view: 'queue' }).length,
        history: registry.list({ view: 'history', includeDeleted: false }).length,
      },
      checks: {
        provider: check(snapshot.provider),
        engine: check(snapshot.engine),
      },
    };

    return reply.status(health.isDegraded() ? 503 : 200).send(body);
  });
};
