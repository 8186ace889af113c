/**
 * Health Monitor
 * 
 * Process-level health of the two external collaborators. Authentication
 * failures put a component into `auth` state, which makes every caller
 * fail fast until a registered recovery succeeds. `unavailable` is
 * informational: callers keep trying.
 */

import { createLogger, errorMessage, type Logger } from '@relayarr/utils';
import { AuthenticationError } from '../errors/index.js';

export type HealthComponent = 'provider' | 'engine';

export type ComponentStatus = 'ok' | 'unavailable' | 'auth';

export interface ComponentHealth {
  status: ComponentStatus;
  reason?: string;
  since: Date;
}

export type RecoveryProbe = () => Promise<void>;

export class HealthMonitor {
  private readonly components: Record<HealthComponent, ComponentHealth>;
  private readonly recoveries = new Map<HealthComponent, RecoveryProbe>();
  private readonly logger: Logger;

  constructor(
    private readonly clock: () => Date = () => new Date(),
    logger?: Logger
  ) {
    const now = this.clock();
    this.components = {
      provider: { status: 'ok', since: now },
      engine: { status: 'ok', since: now },
    };
    this.logger = logger ?? createLogger({ component: 'health' });
  }

  /**
   * Record a component's status. Only changes are logged.
   */
  report(component: HealthComponent, status: ComponentStatus, reason?: string): void {
    const current = this.components[component];
    if (current.status === status && current.reason === reason) {
      return;
    }

    this.components[component] = { status, reason, since: this.clock() };

    if (status === 'ok') {
      this.logger.info({ component, previous: current.status }, 'Component healthy');
    } else if (status === 'auth') {
      this.logger.error({ component, reason }, 'Component degraded: authentication failed');
    } else {
      this.logger.warn({ component, reason }, 'Component unavailable');
    }
  }

  clear(component: HealthComponent): void {
    this.report(component, 'ok');
  }

  status(component: HealthComponent): ComponentStatus {
    return this.components[component].status;
  }

  /** True while any component is blocked on credentials */
  isDegraded(): boolean {
    return Object.values(this.components).some(c => c.status === 'auth');
  }

  /**
   * Throw the cached authentication failure for `component`, if any
   */
  assertUsable(component: HealthComponent): void {
    const current = this.components[component];
    if (current.status === 'auth') {
      throw new AuthenticationError(component, current.reason ?? 'credentials rejected');
    }
  }

  registerRecovery(component: HealthComponent, probe: RecoveryProbe): void {
    this.recoveries.set(component, probe);
  }

  /**
   * Run the recovery probe of every component stuck in `auth` state
   */
  async attemptRecovery(): Promise<HealthComponent[]> {
    const recovered: HealthComponent[] = [];

    for (const [component, probe] of this.recoveries) {
      if (this.components[component].status !== 'auth') {
        continue;
      }

      try {
        await probe();
        this.clear(component);
        recovered.push(component);
      } catch (error) {
        this.logger.warn({ component, error: errorMessage(error) }, 'Recovery attempt failed');
      }
    }

    return recovered;
  }

  snapshot(): Record<HealthComponent, ComponentHealth> {
    return {
      provider: { ...this.components.provider },
      engine: { ...this.components.engine },
    };
  }
}
