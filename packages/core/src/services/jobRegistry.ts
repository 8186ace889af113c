/**
 * Job Registry
 * 
 * Authoritative record of submitted jobs. All writes for a job id run
 * under that id's lock; reads return immutable snapshots without locking.
 */

import { readdir, stat } from 'node:fs/promises';
import { KeyedLock, createLogger, errorMessage, type Logger } from '@relayarr/utils';
import {
  AuthenticationError,
  ExternalEngineUnavailableError,
  InvalidRequestError,
  NoValidLinksError,
  NotFoundError,
} from '../errors/index.js';
import { deriveReleaseId, normalizeLinks } from '../identity.js';
import { isTerminal, transitionJob } from '../stateMachine.js';
import type { JobStore } from '../db/jobStore.js';
import type { DownloadBridge } from '../types/bridge.js';
import type { HealthMonitor } from './healthMonitor.js';
import {
  EMPTY_PROGRESS,
  type ExternalHandle,
  type Job,
  type JobFilter,
  type JobProgress,
  type ProtocolState,
  type SubmissionRequest,
  type SubmissionResult,
} from '../types/job.js';

export interface JobRegistryOptions {
  store: JobStore;
  bridge: DownloadBridge;
  health: HealthMonitor;
  /** jobs land in `<destinationRoot>/<label>/<title>` */
  destinationRoot: string;
  /** whether a completed job's files are still on disk; defaults to hasOutput */
  outputExists?: (path: string) => Promise<boolean>;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * What the reconciler wants written after one poll
 */
export interface Observation {
  state: ProtocolState;
  progress?: JobProgress;
  storagePath?: string;
  reason?: string;
  /** handles the engine re-identified, in the job's handle order */
  handles?: readonly ExternalHandle[];
}

export type CommitResult =
  | { status: 'updated'; job: Job; previous: ProtocolState }
  | { status: 'unchanged'; job: Job }
  | { status: 'discarded'; job: Job | undefined };

interface DeleteStep {
  job: Job;
  toCancel: readonly ExternalHandle[];
}

export class JobRegistry {
  private readonly store: JobStore;
  private readonly bridge: DownloadBridge;
  private readonly health: HealthMonitor;
  private readonly destinationRoot: string;
  private readonly outputExists: (path: string) => Promise<boolean>;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly lock = new KeyedLock();

  constructor(options: JobRegistryOptions) {
    this.store = options.store;
    this.bridge = options.bridge;
    this.health = options.health;
    this.destinationRoot = options.destinationRoot.replace(/\/+$/, '');
    this.outputExists = options.outputExists ?? hasOutput;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger({ component: 'job-registry' });
  }

  /**
   * Load persisted jobs
   */
  async load(): Promise<number> {
    return this.store.load();
  }

  /**
   * Submit a release for download.
   * 
   * A live or completed job with the same id is returned untouched, so
   * repeated grabs never reach the engine twice. A failed or deleted job
   * is replaced by a fresh one.
   */
  async submit(request: SubmissionRequest): Promise<SubmissionResult> {
    const links = normalizeLinks(request.links);
    if (links.length === 0) {
      throw new NoValidLinksError(request.releaseId, request.links.length);
    }

    const jobId = deriveReleaseId(links);
    if (request.releaseId !== jobId) {
      throw new InvalidRequestError('releaseId', `does not match link set (expected ${jobId})`);
    }

    return this.lock.run<SubmissionResult>(jobId, async () => {
      const existing = this.store.get(jobId);
      if (existing && existing.state !== 'failed' && existing.state !== 'deleted') {
        this.logger.info({ jobId, state: existing.state }, 'Submission matches existing job');
        return { job: existing, outcome: 'existing' };
      }

      this.health.assertUsable('engine');

      const now = this.clock();
      let job: Job = {
        id: jobId,
        title: request.title,
        label: request.label,
        links,
        destination: this.destinationFor(request.label, request.title),
        handles: [],
        state: 'queued',
        awaitingSubmission: true,
        sizeHint: request.sizeHint ?? 0,
        progress: EMPTY_PROGRESS,
        createdAt: now,
        updatedAt: now,
        history: [],
      };
      await this.store.put(job);

      job = await this.handOff(job, true);

      this.logger.info({ jobId, label: job.label, links: links.length, state: job.state }, 'Job created');
      return { job, outcome: existing ? 'resubmitted' : 'created' };
    });
  }

  /**
   * Retry the engine hand-off of a job created while the engine was down
   */
  async completeSubmission(jobId: string): Promise<Job | undefined> {
    return this.lock.run(jobId, async () => {
      const job = this.store.get(jobId);
      if (!job || !job.awaitingSubmission || isTerminal(job.state)) {
        return job;
      }
      if (this.health.status('engine') === 'auth') {
        return job;
      }
      return this.handOff(job, false);
    });
  }

  get(jobId: string): Job | undefined {
    return this.store.get(jobId);
  }

  /**
   * Get a job or throw NotFoundError
   */
  require(jobId: string): Job {
    const job = this.store.get(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    return job;
  }

  /**
   * Jobs matching `filter`, most recently updated first
   */
  list(filter: JobFilter = {}): Job[] {
    return this.store.all()
      .filter(job => {
        if (filter.view === 'queue' && isTerminal(job.state)) return false;
        if (filter.view === 'history' && !isTerminal(job.state)) return false;
        if (filter.includeDeleted === false && job.state === 'deleted') return false;
        if (filter.label && job.label !== filter.label) return false;
        return true;
      })
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime() || a.id.localeCompare(b.id));
  }

  /**
   * Mark a job deleted and cancel its engine packages if it was still
   * live. Resolves once the job is deleted; cancels run on in the
   * background and their failures are only logged.
   */
  async delete(jobId: string): Promise<Job> {
    const { job, toCancel } = await this.lock.run<DeleteStep>(jobId, async () => {
      const current = this.require(jobId);
      if (current.state === 'deleted') {
        return { job: current, toCancel: [] };
      }

      const deleted = transitionJob(current, 'deleted', this.clock(), 'removed by client');
      await this.store.put(deleted);
      this.logger.info({ jobId, previous: current.state }, 'Job deleted');

      return {
        job: deleted,
        toCancel: isTerminal(current.state) ? [] : current.handles,
      };
    });

    for (const handle of toCancel) {
      void this.cancelHandle(jobId, handle);
    }
    return job;
  }

  /**
   * Delete every job that is not deleted yet
   */
  async deleteAll(): Promise<number> {
    const ids = this.store.all()
      .filter(job => job.state !== 'deleted')
      .map(job => job.id);

    for (const id of ids) {
      await this.delete(id);
    }
    return ids.length;
  }

  /**
   * Drop deleted jobs, failed jobs older than the retention window, and
   * completed jobs whose files were moved away by the media manager
   */
  async prune(retentionMs: number): Promise<number> {
    const cutoff = this.clock().getTime() - retentionMs;
    let removed = 0;

    for (const candidate of this.store.all()) {
      const imported = candidate.state === 'completed' && !(await this.hasLeftovers(candidate));

      const pruned = await this.lock.run(candidate.id, async () => {
        const job = this.store.get(candidate.id);
        if (!job) return false;

        const expired = job.updatedAt.getTime() < cutoff;
        if (
          job.state === 'deleted'
          || (job.state === 'failed' && expired)
          || (job.state === 'completed' && imported)
        ) {
          return this.store.remove(job.id);
        }
        return false;
      });

      if (pruned) removed++;
    }

    if (removed > 0) {
      this.logger.info({ removed }, 'Pruned jobs');
    }
    return removed;
  }

  /**
   * Write a reconciler observation.
   * 
   * `expected` is the snapshot the observation was taken from. The write
   * is discarded when the job has moved on since: it was deleted, reached
   * another terminal state, or got new handles.
   */
  async commitObservation(expected: Job, observation: Observation): Promise<CommitResult> {
    return this.lock.run<CommitResult>(expected.id, async () => {
      const current = this.store.get(expected.id);
      if (!current || isTerminal(current.state) || current.handles !== expected.handles) {
        return { status: 'discarded', job: current };
      }

      let next: Job = current;
      let changed = false;

      if (observation.progress && !sameProgress(current.progress, observation.progress)) {
        next = { ...next, progress: observation.progress };
        changed = true;
      }
      if (observation.storagePath && observation.storagePath !== current.storagePath) {
        next = { ...next, storagePath: observation.storagePath };
        changed = true;
      }
      if (observation.handles && observation.handles.length === current.handles.length) {
        next = { ...next, handles: observation.handles };
        changed = true;
      }

      if (observation.state !== current.state) {
        next = transitionJob(next, observation.state, this.clock(), observation.reason);
        if (observation.state === 'failed' && observation.reason) {
          next = { ...next, error: observation.reason };
        }
        await this.store.put(next);
        this.logger.info(
          { jobId: current.id, from: current.state, to: observation.state },
          'Job state changed'
        );
        return { status: 'updated', job: next, previous: current.state };
      }

      if (changed) {
        await this.store.put(next);
      }
      return { status: 'unchanged', job: next };
    });
  }

  private async handOff(job: Job, initial: boolean): Promise<Job> {
    try {
      const handles = await this.bridge.submit({
        jobId: job.id,
        title: job.title,
        label: job.label,
        links: job.links,
        destination: job.destination,
      });

      const submitted: Job = {
        ...job,
        handles,
        awaitingSubmission: false,
        updatedAt: this.clock(),
      };
      await this.store.put(submitted);
      return submitted;
    } catch (error) {
      if (error instanceof ExternalEngineUnavailableError) {
        this.logger.warn({ jobId: job.id, error: error.message }, 'Engine unavailable, submission deferred');
        return job;
      }

      if (error instanceof AuthenticationError && !initial) {
        this.logger.warn({ jobId: job.id }, 'Engine credentials rejected, submission deferred');
        return job;
      }

      const failed: Job = {
        ...transitionJob(job, 'failed', this.clock(), 'submission rejected'),
        awaitingSubmission: false,
        error: errorMessage(error),
      };
      await this.store.put(failed);
      this.logger.error({ jobId: job.id, error: errorMessage(error) }, 'Submission failed');

      if (error instanceof AuthenticationError) {
        throw error;
      }
      return failed;
    }
  }

  private async hasLeftovers(job: Job): Promise<boolean> {
    const path = job.storagePath ?? job.destination;
    try {
      return await this.outputExists(path);
    } catch (error) {
      this.logger.warn({ jobId: job.id, path, error: errorMessage(error) }, 'Output check failed, keeping job');
      return true;
    }
  }

  private async cancelHandle(jobId: string, handle: ExternalHandle): Promise<void> {
    try {
      await this.bridge.cancel(handle);
    } catch (error) {
      this.logger.warn({ jobId, handle: handle.id, error: errorMessage(error) }, 'Cancel failed');
    }
  }

  private destinationFor(label: string, title: string): string {
    return label
      ? `${this.destinationRoot}/${label}/${title}`
      : `${this.destinationRoot}/${title}`;
  }
}

function sameProgress(a: JobProgress, b: JobProgress): boolean {
  return a.bytesLoaded === b.bytesLoaded
    && a.bytesTotal === b.bytesTotal
    && a.speed === b.speed
    && a.eta === b.eta;
}

/**
 * True when `path` is a file, or a directory with at least one
 * non-hidden entry
 */
export async function hasOutput(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    if (!info.isDirectory()) {
      return true;
    }
    const entries = await readdir(path);
    return entries.some(entry => !entry.startsWith('.'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
