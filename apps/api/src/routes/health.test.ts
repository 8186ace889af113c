import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildHarness, type Harness } from '../testing/harness.js';

describe('health routes', () => {
  let h: Harness;

  beforeEach(async () => {
    h = await buildHarness();
  });

  afterEach(async () => {
    await h.server.close();
  });

  it('answers liveness probes', async () => {
    const response = await h.server.inject({ method: 'GET', url: '/health/live' });
    expect(response.json()).toEqual({ status: 'alive' });
  });

  it('is ready while every component is ok', async () => {
    const response = await h.server.inject({ method: 'GET', url: '/health/ready' });
    const body = response.json();

    expect(response.statusCode).toBe(200);
    expect(body.status).toBe('healthy');
    expect(body.jobs).toEqual({ queue: 0, history: 0 });
    expect(body.checks.provider.status).toBe('ok');
    expect(body.checks.engine.status).toBe('ok');
  });

  it('stays ready but degraded while the provider is unreachable', async () => {
    h.health.report('provider', 'unavailable', 'timeout');
    const response = await h.server.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('degraded');
  });

  it('is not ready while engine credentials are rejected', async () => {
    h.health.report('engine', 'auth', 'bad password');
    const response = await h.server.inject({ method: 'GET', url: '/health/ready' });
    const body = response.json();

    expect(response.statusCode).toBe(503);
    expect(body.status).toBe('unhealthy');
    expect(body.checks.engine).toMatchObject({ status: 'auth', reason: 'bad password' });
  });

  it('describes the service on the root route', async () => {
    const response = await h.server.inject({ method: 'GET', url: '/' });
    expect(response.json()).toEqual({
      name: 'relayarr',
      version: '1.0.0',
      status: 'running',
      newznab: '/api',
      sabnzbd: '/sabnzbd/api',
      health: '/health',
    });
  });
});
