import { describe, it, expect, vi } from 'vitest';
import { HealthMonitor } from './healthMonitor.js';
import { AuthenticationError } from '../errors/index.js';

describe('HealthMonitor', () => {
  it('starts healthy', () => {
    const health = new HealthMonitor();
    expect(health.isDegraded()).toBe(false);
    expect(health.snapshot().engine.status).toBe('ok');
  });

  it('fails fast while a component is blocked on credentials', () => {
    const health = new HealthMonitor();
    health.report('provider', 'auth', 'cookie expired');

    expect(health.isDegraded()).toBe(true);
    expect(() => health.assertUsable('provider')).toThrow(AuthenticationError);
    expect(() => health.assertUsable('provider')).toThrow('Authentication failed for provider: cookie expired');
    expect(() => health.assertUsable('engine')).not.toThrow();
  });

  it('does not block callers of an unavailable component', () => {
    const health = new HealthMonitor();
    health.report('engine', 'unavailable', 'timeout');

    expect(health.isDegraded()).toBe(false);
    expect(() => health.assertUsable('engine')).not.toThrow();
  });

  it('clears a component once its recovery probe succeeds', async () => {
    const health = new HealthMonitor();
    const probe = vi.fn()
      .mockRejectedValueOnce(new Error('still bad'))
      .mockResolvedValueOnce(undefined);
    health.registerRecovery('engine', probe);
    health.report('engine', 'auth', 'bad password');

    expect(await health.attemptRecovery()).toEqual([]);
    expect(health.status('engine')).toBe('auth');

    expect(await health.attemptRecovery()).toEqual(['engine']);
    expect(health.status('engine')).toBe('ok');

    expect(await health.attemptRecovery()).toEqual([]);
    expect(probe).toHaveBeenCalledTimes(2);
  });
});
