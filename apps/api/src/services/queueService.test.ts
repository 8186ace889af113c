import { describe, it, expect, beforeEach } from 'vitest';
import {
  AuthenticationError,
  ExternalEngineUnavailableError,
  HealthMonitor,
  JobRegistry,
  MemoryJobStore,
  NoValidLinksError,
  deriveReleaseId,
} from '@relayarr/core';
import { FakeBridge } from '@relayarr/core/testing';
import type { RetrievalReference } from '@relayarr/indexer';
import { StubVerifier } from '../testing/harness.js';
import { QueueService } from './queueService.js';

const LINKS = ['https://hosta.test/p1', 'https://hosta.test/p2'];

const reference: RetrievalReference = {
  id: deriveReleaseId(LINKS),
  title: 'Show S01 WEBDL-1080p',
  links: LINKS,
  size: 4096,
  source: 'hosta',
};

describe('QueueService', () => {
  let bridge: FakeBridge;
  let registry: JobRegistry;
  let verifier: StubVerifier;
  let queue: QueueService;

  const build = (verifyOnSubmit: boolean) => {
    queue = new QueueService({ registry, verifier, verifyOnSubmit });
  };

  beforeEach(() => {
    bridge = new FakeBridge();
    registry = new JobRegistry({
      store: new MemoryJobStore(),
      bridge,
      health: new HealthMonitor(),
      destinationRoot: '/downloads',
    });
    verifier = new StubVerifier();
    build(true);
  });

  it('creates a job under the reference id', async () => {
    const result = await queue.addDownload(reference, 'sonarr');

    expect(result).toEqual({ jobId: reference.id, accepted: true, outcome: 'created' });
    expect(registry.require(reference.id)).toMatchObject({
      title: 'Show S01 WEBDL-1080p',
      label: 'sonarr',
      links: LINKS,
      sizeHint: 4096,
      destination: '/downloads/sonarr/Show S01 WEBDL-1080p',
    });
  });

  it('probes every link of the reference before submitting', async () => {
    await queue.addDownload(reference, 'sonarr');
    expect(verifier.calls).toEqual([LINKS]);
  });

  it('skips verification when disabled', async () => {
    build(false);
    await queue.addDownload(reference, 'sonarr');
    expect(verifier.calls).toEqual([]);
  });

  it('returns a tracked job without probing or resubmitting', async () => {
    await queue.addDownload(reference, 'sonarr');
    const again = await queue.addDownload(reference, 'sonarr');

    expect(again).toEqual({ jobId: reference.id, accepted: true, outcome: 'existing' });
    expect(verifier.calls).toHaveLength(1);
    expect(bridge.submissions).toHaveLength(1);
  });

  it('submits the live subset under its own id', async () => {
    verifier.dead.add('https://hosta.test/p2');
    const result = await queue.addDownload(reference, 'sonarr');

    const partialId = deriveReleaseId(['https://hosta.test/p1']);
    expect(result.jobId).toBe(partialId);
    expect(registry.require(partialId).links).toEqual(['https://hosta.test/p1']);
    expect(registry.get(reference.id)).toBeUndefined();
  });

  it('refuses a reference with no live link', async () => {
    LINKS.forEach(link => verifier.dead.add(link));

    await expect(queue.addDownload(reference, 'sonarr')).rejects.toBeInstanceOf(NoValidLinksError);
    expect(bridge.submissions).toEqual([]);
  });

  it('keeps the job queued while the engine is unreachable', async () => {
    bridge.submitError = new ExternalEngineUnavailableError('submit');
    const result = await queue.addDownload(reference, 'sonarr');

    expect(result.accepted).toBe(true);
    expect(registry.require(reference.id)).toMatchObject({ state: 'queued', awaitingSubmission: true });
  });

  it('reports a job the engine refused as not accepted', async () => {
    bridge.submitError = new Error('package rejected');
    const result = await queue.addDownload(reference, 'sonarr');

    expect(result).toEqual({ jobId: reference.id, accepted: false, outcome: 'created' });
    expect(registry.require(reference.id).error).toBe('package rejected');
  });

  it('replaces a failed job on the next grab', async () => {
    bridge.submitError = new Error('package rejected');
    await queue.addDownload(reference, 'sonarr');

    bridge.submitError = null;
    const result = await queue.addDownload(reference, 'sonarr');

    expect(result).toEqual({ jobId: reference.id, accepted: true, outcome: 'resubmitted' });
    expect(verifier.calls).toHaveLength(2);
  });

  it('propagates rejected engine credentials', async () => {
    bridge.submitError = new AuthenticationError('engine', 'bad credentials');

    await expect(queue.addDownload(reference, 'sonarr')).rejects.toBeInstanceOf(AuthenticationError);
    expect(registry.require(reference.id).state).toBe('failed');
  });

  it('filters queue and history views by label', async () => {
    await queue.addDownload(reference, 'sonarr');

    expect(queue.queueStatus({ label: 'radarr' })).toEqual([]);
    expect(queue.queueStatus({ label: 'sonarr' }).map(job => job.id)).toEqual([reference.id]);
    expect(queue.queueStatus({ label: '' })).toHaveLength(1);
    expect(queue.historyStatus()).toEqual([]);
  });

  it('hides deleted jobs from history', async () => {
    await queue.addDownload(reference, 'sonarr');

    expect(await queue.removeJob(reference.id)).toBe(true);
    expect(queue.queueStatus()).toEqual([]);
    expect(queue.historyStatus()).toEqual([]);
  });

  it('reports unknown ids on removal', async () => {
    expect(await queue.removeJob('rly_missing')).toBe(false);
  });

  it('removes every job', async () => {
    await queue.addDownload(reference, 'sonarr');
    await queue.addDownload({ ...reference, id: deriveReleaseId(['https://hosta.test/p9']), links: ['https://hosta.test/p9'] }, 'radarr');

    expect(await queue.removeAll()).toBe(2);
    expect(registry.list({ includeDeleted: false })).toEqual([]);
  });
});
