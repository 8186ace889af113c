import { describe, it, expect, beforeEach } from 'vitest';
import { StateReconciler } from './stateReconciler.js';
import { JobRegistry } from '../services/jobRegistry.js';
import { HealthMonitor } from '../services/healthMonitor.js';
import { MemoryJobStore } from '../db/jobStore.js';
import { FakeBridge } from '../testing/fakeBridge.js';
import { deriveReleaseId } from '../identity.js';
import { ExternalEngineUnavailableError } from '../errors/index.js';
import type { Job } from '../types/job.js';

const LINKS = ['https://host.example/file/a', 'https://host.example/file/b'];

describe('StateReconciler', () => {
  let bridge: FakeBridge;
  let registry: JobRegistry;
  let reconciler: StateReconciler;

  async function submit(): Promise<Job> {
    const { job } = await registry.submit({
      releaseId: deriveReleaseId(LINKS),
      title: 'Show S01E02 WEBDL-1080p',
      label: 'sonarr',
      links: LINKS,
    });
    return job;
  }

  beforeEach(() => {
    bridge = new FakeBridge();
    bridge.handlesPerSubmit = 2;
    registry = new JobRegistry({
      store: new MemoryJobStore(),
      bridge,
      health: new HealthMonitor(),
      destinationRoot: '/output',
    });
    reconciler = new StateReconciler({ registry, bridge });
  });

  it('reports downloading while one link is active, then completed', async () => {
    const job = await submit();
    bridge.setState(`${job.id}-0`, 'active');
    bridge.setState(`${job.id}-1`, 'pending');

    expect(await reconciler.reconcile(job.id)).toBe('updated');
    expect(registry.require(job.id).state).toBe('downloading');

    bridge.setState(`${job.id}-0`, 'success');
    bridge.setState(`${job.id}-1`, 'success');

    expect(await reconciler.reconcile(job.id)).toBe('updated');
    const done = registry.require(job.id);
    expect(done.state).toBe('completed');
    expect(done.completedAt).toEqual(done.updatedAt);
  });

  it('stops polling once the job is terminal', async () => {
    const job = await submit();
    bridge.setState(`${job.id}-0`, 'success');
    bridge.setState(`${job.id}-1`, 'success');
    await reconciler.reconcile(job.id);
    const polls = bridge.pollCount;

    expect(await reconciler.reconcile(job.id)).toBe('skipped');
    expect(bridge.pollCount).toBe(polls);
  });

  it('fails a job once no link can still progress', async () => {
    const job = await submit();
    bridge.setState(`${job.id}-0`, 'failure');
    bridge.setState(`${job.id}-1`, 'success');

    await reconciler.reconcile(job.id);

    const failed = registry.require(job.id);
    expect(failed.state).toBe('failed');
    expect(failed.error).toBe('download failed: failure');
  });

  it('waits while a failed link sits next to a pending one', async () => {
    const job = await submit();
    bridge.setState(`${job.id}-0`, 'failure');
    bridge.setState(`${job.id}-1`, 'pending');

    expect(await reconciler.reconcile(job.id)).toBe('unchanged');
    expect(registry.require(job.id).state).toBe('queued');
  });

  it('holds the last known state while the engine is unreachable', async () => {
    const job = await submit();
    bridge.setState(`${job.id}-0`, 'active');
    await reconciler.reconcile(job.id);
    const before = registry.require(job.id);

    bridge.setState(`${job.id}-0`, 'stale');
    bridge.setState(`${job.id}-1`, 'stale');
    for (let i = 0; i < 3; i++) {
      expect(await reconciler.reconcile(job.id)).toBe('held');
    }

    const after = registry.require(job.id);
    expect(after.state).toBe('downloading');
    expect(after.updatedAt).toEqual(before.updatedAt);
  });

  it('lets a delete win over an in-flight poll', async () => {
    const job = await submit();
    bridge.setState(`${job.id}-0`, 'success');
    bridge.setState(`${job.id}-1`, 'success');

    let release: () => void = () => undefined;
    bridge.pollGate = new Promise<void>(resolve => {
      release = resolve;
    });

    const pending = reconciler.reconcile(job.id);
    await registry.delete(job.id);
    release();

    expect(await pending).toBe('skipped');
    expect(registry.require(job.id).state).toBe('deleted');
    expect(await reconciler.reconcile(job.id)).toBe('skipped');
  });

  it('retries a deferred submission', async () => {
    bridge.submitError = new ExternalEngineUnavailableError('submit');
    const job = await submit();
    expect(job.awaitingSubmission).toBe(true);

    expect(await reconciler.reconcile(job.id)).toBe('awaiting');

    bridge.submitError = null;
    expect(await reconciler.reconcile(job.id)).toBe('submitted');
    expect(registry.require(job.id).handles).toHaveLength(2);
  });

  it('sums progress across handles', async () => {
    const job = await submit();
    bridge.setState(`${job.id}-0`, 'active');
    bridge.setState(`${job.id}-1`, 'active');
    bridge.setProgress(`${job.id}-0`, { bytesLoaded: 100, bytesTotal: 400, speed: 10, eta: 30, saveTo: '/output/sonarr/Show' });
    bridge.setProgress(`${job.id}-1`, { bytesLoaded: 50, bytesTotal: 600, speed: 20, eta: 60 });

    await reconciler.reconcile(job.id);

    const updated = registry.require(job.id);
    expect(updated.progress).toEqual({ bytesLoaded: 150, bytesTotal: 1000, speed: 30, eta: 60 });
    expect(updated.storagePath).toBe('/output/sonarr/Show');
  });
});
