/**
 * State Reconciler
 * 
 * Turns engine observations into protocol states. One call reconciles
 * one job: poll its handles, normalize, aggregate, write if changed.
 * Polling happens outside the job lock; the write re-checks the job so
 * a concurrent delete always wins.
 */

import { createLogger, type Logger } from '@relayarr/utils';
import { isTerminal } from '../stateMachine.js';
import { aggregateLinkStates } from './aggregate.js';
import type { JobRegistry } from '../services/jobRegistry.js';
import type { DownloadBridge } from '../types/bridge.js';
import type { ExternalHandle, ExternalLinkState, JobProgress, LinkStateClass } from '../types/job.js';

export type ReconcileOutcome =
  | 'updated'
  | 'unchanged'
  | 'held'
  | 'skipped'
  | 'submitted'
  | 'awaiting';

export interface StateReconcilerOptions {
  registry: JobRegistry;
  bridge: DownloadBridge;
  logger?: Logger;
}

export class StateReconciler {
  private readonly registry: JobRegistry;
  private readonly bridge: DownloadBridge;
  private readonly logger: Logger;

  constructor(options: StateReconcilerOptions) {
    this.registry = options.registry;
    this.bridge = options.bridge;
    this.logger = options.logger ?? createLogger({ component: 'reconciler' });
  }

  async reconcile(jobId: string): Promise<ReconcileOutcome> {
    const snapshot = this.registry.get(jobId);
    if (!snapshot || isTerminal(snapshot.state)) {
      return 'skipped';
    }

    if (snapshot.awaitingSubmission) {
      const job = await this.registry.completeSubmission(jobId);
      return job && !job.awaitingSubmission ? 'submitted' : 'awaiting';
    }

    const observations = await this.bridge.poll(snapshot.handles);

    const stale = observations.filter(o => o.kind === 'stale');
    if (stale.length > 0 || observations.length !== snapshot.handles.length) {
      this.logger.debug({ jobId, stale: stale.length }, 'Engine state stale, holding');
      return 'held';
    }

    const classes: LinkStateClass[] = [];
    for (const observation of observations) {
      if (observation.kind === 'observed') {
        classes.push(observation.state);
      }
    }

    const state = aggregateLinkStates(classes);
    const result = await this.registry.commitObservation(snapshot, {
      state,
      progress: sumProgress(observations),
      storagePath: firstSaveTo(observations),
      reason: state === 'failed' ? describeFailure(observations) : undefined,
      handles: reboundHandles(snapshot.handles, observations),
    });

    switch (result.status) {
      case 'updated':
        return 'updated';
      case 'unchanged':
        return 'unchanged';
      case 'discarded':
        this.logger.debug({ jobId }, 'Observation discarded, job changed meanwhile');
        return 'skipped';
    }
  }
}

function sumProgress(observations: readonly ExternalLinkState[]): JobProgress | undefined {
  let seen = false;
  const total: JobProgress = { bytesLoaded: 0, bytesTotal: 0, speed: 0, eta: 0 };

  for (const observation of observations) {
    if (observation.kind !== 'observed' || !observation.progress) continue;
    seen = true;
    total.bytesLoaded += observation.progress.bytesLoaded;
    total.bytesTotal += observation.progress.bytesTotal;
    total.speed += observation.progress.speed;
    total.eta = Math.max(total.eta, observation.progress.eta);
  }

  return seen ? total : undefined;
}

/**
 * The observed handles, when the engine resolved any to a new id
 */
function reboundHandles(
  handles: readonly ExternalHandle[],
  observations: readonly ExternalLinkState[]
): ExternalHandle[] | undefined {
  const observed = observations.map(o => o.handle);
  return observed.some((handle, i) => handle.id !== handles[i]?.id) ? observed : undefined;
}

function firstSaveTo(observations: readonly ExternalLinkState[]): string | undefined {
  for (const observation of observations) {
    if (observation.kind === 'observed' && observation.progress?.saveTo) {
      return observation.progress.saveTo;
    }
  }
  return undefined;
}

function describeFailure(observations: readonly ExternalLinkState[]): string {
  const natives = observations
    .filter(o => o.kind === 'observed' && o.state === 'failure')
    .map(o => (o.kind === 'observed' ? o.native : ''))
    .filter(n => n.length > 0);

  return natives.length > 0
    ? `download failed: ${Array.from(new Set(natives)).join(', ')}`
    : 'download failed';
}
