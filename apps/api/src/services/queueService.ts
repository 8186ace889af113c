/**
 * Queue Service
 *
 * The download-queue surface behind the SABnzbd routes. A grab arrives as
 * a retrieval reference; links are re-verified when their search-time
 * verdict is stale, and the surviving set is handed to the Job Registry.
 *
 * Repeated grabs of a release that is already tracked return the
 * existing job without touching the engine or probing links again.
 */

import {
  NoValidLinksError,
  NotFoundError,
  deriveReleaseId,
  type CandidateLink,
  type Job,
  type JobRegistry,
  type SubmissionOutcome,
} from '@relayarr/core';
import type { CandidateVerifier, RetrievalReference } from '@relayarr/indexer';
import { createLogger, type Logger } from '@relayarr/utils';

export interface QueueServiceOptions {
  registry: JobRegistry;
  verifier: CandidateVerifier;
  /** probe links again before creating a job */
  verifyOnSubmit: boolean;
  logger?: Logger;
}

export interface AddDownloadResult {
  jobId: string;
  /** false when the engine refused the submission outright */
  accepted: boolean;
  outcome: SubmissionOutcome;
}

export interface QueueQuery {
  label?: string;
}

export class QueueService {
  private readonly registry: JobRegistry;
  private readonly verifier: CandidateVerifier;
  private readonly verifyOnSubmit: boolean;
  private readonly logger: Logger;

  constructor(options: QueueServiceOptions) {
    this.registry = options.registry;
    this.verifier = options.verifier;
    this.verifyOnSubmit = options.verifyOnSubmit;
    this.logger = options.logger ?? createLogger({ component: 'queue' });
  }

  async addDownload(reference: RetrievalReference, label: string): Promise<AddDownloadResult> {
    const existing = this.registry.get(reference.id);
    if (existing && existing.state !== 'failed' && existing.state !== 'deleted') {
      this.logger.debug({ jobId: existing.id }, 'Release already queued');
      return { jobId: existing.id, accepted: true, outcome: 'existing' };
    }

    const links = this.verifyOnSubmit ? await this.liveLinks(reference) : reference.links;

    // a partial link set is a different release
    const releaseId = links.length === reference.links.length ? reference.id : deriveReleaseId(links);

    const { job, outcome } = await this.registry.submit({
      releaseId,
      title: reference.title,
      label,
      links,
      sizeHint: reference.size,
    });

    this.logger.info(
      { jobId: job.id, label, outcome, state: job.state, dropped: reference.links.length - links.length },
      'Download added'
    );
    return { jobId: job.id, accepted: job.state !== 'failed', outcome };
  }

  /** Live jobs, most recently updated first */
  queueStatus(query: QueueQuery = {}): Job[] {
    return this.registry.list({ view: 'queue', label: query.label || undefined });
  }

  /** Finished jobs; deleted ones are not shown */
  historyStatus(query: QueueQuery = {}): Job[] {
    return this.registry.list({ view: 'history', label: query.label || undefined, includeDeleted: false });
  }

  /**
   * Delete a job. Unknown ids are acknowledged too, so clients cleaning
   * up after a restart do not retry forever.
   */
  async removeJob(jobId: string): Promise<boolean> {
    try {
      await this.registry.delete(jobId);
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.warn({ jobId }, 'Delete requested for unknown job');
        return false;
      }
      throw error;
    }
  }

  async removeAll(): Promise<number> {
    const removed = await this.registry.deleteAll();
    this.logger.info({ removed }, 'All jobs deleted');
    return removed;
  }

  private async liveLinks(reference: RetrievalReference): Promise<string[]> {
    const candidates = reference.links.map((url): CandidateLink => ({
      url,
      releaseKey: reference.id,
      source: reference.source ?? 'DDL',
      title: reference.title,
      quality: '',
      audioLanguages: [],
      subtitles: [],
      sizeEstimate: reference.size,
    }));

    const verified = await this.verifier.verifyAll(candidates);
    const live = verified.filter(vc => vc.verdict === 'live').map(vc => vc.candidate.url);

    if (live.length === 0) {
      throw new NoValidLinksError(reference.id, verified.length);
    }
    return live;
  }
}
