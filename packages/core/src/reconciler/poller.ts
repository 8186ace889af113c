/**
 * Reconciler Poller
 * 
 * Background loop driving the State Reconciler over every live job on a
 * fixed interval, independent of request traffic. Each tick:
 * 
 * 1. runs recovery probes for components degraded by authentication
 * 2. reconciles the current snapshot of live jobs, a few at a time
 * 3. prunes deleted jobs, expired failures and imported completions
 * 
 * A tick never overlaps the previous one; the next is scheduled once the
 * current one settles.
 */

import pLimit from 'p-limit';
import { createLogger, errorMessage, type Logger } from '@relayarr/utils';
import type { JobRegistry } from '../services/jobRegistry.js';
import type { HealthMonitor } from '../services/healthMonitor.js';
import type { ReconcileOutcome, StateReconciler } from './stateReconciler.js';

export interface PollerOptions {
  reconciler: StateReconciler;
  registry: JobRegistry;
  health: HealthMonitor;
  intervalMs: number;
  concurrency: number;
  retentionMs: number;
  logger?: Logger;
}

export interface TickSummary {
  jobs: number;
  outcomes: Record<ReconcileOutcome | 'error', number>;
  pruned: number;
  recovered: string[];
}

export class ReconcilerPoller {
  private readonly options: PollerOptions;
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<TickSummary> | null = null;
  private loop: Promise<void> | null = null;
  private started = false;

  constructor(options: PollerOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger({ component: 'poller' });
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.logger.info({ intervalMs: this.options.intervalMs }, 'Reconciler poller started');
    this.schedule();
  }

  /**
   * Stop scheduling and wait for an in-flight tick to finish
   */
  async stop(): Promise<void> {
    this.started = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    this.logger.info('Reconciler poller stopped');
  }

  isRunning(): boolean {
    return this.started;
  }

  /**
   * Run one reconciliation pass. Joins the in-flight pass if there is one.
   */
  async tick(): Promise<TickSummary> {
    if (this.running) {
      return this.running;
    }

    this.running = this.runTick();
    try {
      return await this.running;
    } finally {
      this.running = null;
    }
  }

  private schedule(): void {
    if (!this.started) return;

    this.timer = setTimeout(() => {
      this.timer = null;
      this.loop = this.tick()
        .then(
          () => undefined,
          (error: unknown) => {
            this.logger.error({ error: errorMessage(error) }, 'Reconciler tick failed');
          }
        )
        .finally(() => this.schedule());
    }, this.options.intervalMs);
  }

  private async runTick(): Promise<TickSummary> {
    const { registry, reconciler, health } = this.options;
    const outcomes: TickSummary['outcomes'] = {
      updated: 0,
      unchanged: 0,
      held: 0,
      skipped: 0,
      submitted: 0,
      awaiting: 0,
      error: 0,
    };

    const recovered = await health.attemptRecovery();

    const jobs = registry.list({ view: 'queue' });
    const limit = pLimit(Math.max(1, this.options.concurrency));

    await Promise.all(jobs.map(job => limit(async () => {
      try {
        const outcome = await reconciler.reconcile(job.id);
        outcomes[outcome]++;
      } catch (error) {
        outcomes.error++;
        this.logger.error({ jobId: job.id, error: errorMessage(error) }, 'Reconcile failed');
      }
    })));

    const pruned = await registry.prune(this.options.retentionMs);

    const summary: TickSummary = { jobs: jobs.length, outcomes, pruned, recovered };
    if (jobs.length > 0 || pruned > 0) {
      this.logger.debug(summary, 'Reconciler tick');
    }
    return summary;
  }
}
