import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StateReconciler, deriveReleaseId } from '@relayarr/core';
import { encodeReference, renderNzb, type RetrievalReference } from '@relayarr/indexer';
import { GIB, MIB } from '@relayarr/utils';
import { TEST_API_KEY, buildHarness, type Harness } from '../testing/harness.js';

const LINK = 'https://hosta.test/f1';
const JOB_ID = deriveReleaseId([LINK]);

const reference: RetrievalReference = {
  id: JOB_ID,
  title: 'Movie (2020) WEBDL-1080p',
  links: [LINK],
  size: 2 * GIB,
  source: 'host',
};

describe('SABnzbd routes', () => {
  let h: Harness;

  const sab = async (query: Record<string, string>) => {
    const response = await h.server.inject({
      method: 'GET',
      url: '/sabnzbd/api',
      query: { apikey: TEST_API_KEY, ...query },
    });
    return { statusCode: response.statusCode, body: response.json() };
  };

  const addUrl = (label = 'radarr') =>
    sab({
      mode: 'addurl',
      name: `http://relay.test/api?t=get&id=${encodeReference(reference)}&apikey=${TEST_API_KEY}`,
      cat: label,
    });

  const observe = async (state: 'active' | 'success', progress: { bytesLoaded: number; saveTo?: string }) => {
    h.bridge.setState(`${JOB_ID}-0`, state);
    h.bridge.setProgress(`${JOB_ID}-0`, {
      bytesLoaded: progress.bytesLoaded,
      bytesTotal: 2 * GIB,
      speed: state === 'active' ? 2 * MIB : 0,
      eta: state === 'active' ? 754 : 0,
      saveTo: progress.saveTo,
    });
    await new StateReconciler({ registry: h.registry, bridge: h.bridge }).reconcile(JOB_ID);
  };

  beforeEach(async () => {
    h = await buildHarness();
  });

  afterEach(async () => {
    await h.server.close();
  });

  it('reports its version without an API key', async () => {
    const response = await h.server.inject({ method: 'GET', url: '/sabnzbd/api?mode=version' });
    expect(response.json()).toEqual({ version: '4.2.1' });
  });

  it('rejects a wrong API key in SABnzbd format', async () => {
    const { statusCode, body } = await sab({ mode: 'queue', apikey: 'wrong' });
    expect(statusCode).toBe(200);
    expect(body).toEqual({ status: false, error: 'API Key Incorrect' });
  });

  it('creates a job from an addurl grab link', async () => {
    const { body } = await addUrl();

    expect(body).toEqual({ status: true, nzo_ids: [JOB_ID] });
    expect(h.bridge.submissions).toHaveLength(1);
    expect(h.bridge.submissions[0]).toMatchObject({
      jobId: JOB_ID,
      label: 'radarr',
      links: [LINK],
      destination: '/downloads/radarr/Movie (2020) WEBDL-1080p',
    });
  });

  it('returns the same id for a repeated grab without resubmitting', async () => {
    await addUrl();
    const { body } = await addUrl();

    expect(body).toEqual({ status: true, nzo_ids: [JOB_ID] });
    expect(h.bridge.submissions).toHaveLength(1);
    expect(h.verifier.calls).toHaveLength(1);
  });

  it('refuses a grab whose links are all dead', async () => {
    h.verifier.dead.add(LINK);
    const { body } = await addUrl();

    expect(body).toEqual({ status: false, error: `No valid links for ${JOB_ID} (1 checked)` });
    expect(h.registry.list()).toEqual([]);
  });

  it('refuses a reference it did not issue', async () => {
    const { body } = await sab({ mode: 'addurl', name: 'garbage' });
    expect(body).toEqual({
      status: false,
      error: 'Invalid request (reference): not a base64url JSON document',
    });
  });

  it('creates a job from an uploaded NZB stub', async () => {
    const response = await h.server.inject({
      method: 'POST',
      url: '/sabnzbd/api',
      query: { apikey: TEST_API_KEY, mode: 'addfile', cat: 'sonarr' },
      headers: { 'content-type': 'application/x-nzb' },
      payload: renderNzb(encodeReference(reference), reference.title),
    });

    expect(response.json()).toEqual({ status: true, nzo_ids: [JOB_ID] });
    expect(h.registry.get(JOB_ID)?.label).toBe('sonarr');
  });

  it('lists a queued job with its size hint', async () => {
    await addUrl();
    const { body } = await sab({ mode: 'queue' });

    expect(body.queue).toMatchObject({
      status: 'Idle',
      paused: false,
      speed: '0 B/s',
      kbpersec: '0',
      mb: '2048.00',
      mbleft: '2048.00',
      sizeleft: '2.00 GB',
      noofslots_total: 1,
      noofslots: 1,
    });
    expect(body.queue.slots).toEqual([
      {
        index: 0,
        nzo_id: JOB_ID,
        filename: 'Movie (2020) WEBDL-1080p',
        cat: 'radarr',
        status: 'Queued',
        percentage: '0',
        mb: '2048.00',
        mbleft: '2048.00',
        size: '2.00 GB',
        sizeleft: '2.00 GB',
        timeleft: '0:00:00',
        eta: '0:00:00',
      },
    ]);
  });

  it('shows download progress after reconciliation', async () => {
    await addUrl();
    await observe('active', { bytesLoaded: 512 * MIB });

    const { body } = await sab({ mode: 'queue' });

    expect(body.queue.status).toBe('Downloading');
    expect(body.queue.speed).toBe('2.00 MB/s');
    expect(body.queue.kbpersec).toBe('2048.00');
    expect(body.queue.sizeleft).toBe('1.50 GB');
    expect(body.queue.slots[0]).toMatchObject({
      status: 'Downloading',
      percentage: '25',
      mbleft: '1536.00',
      timeleft: '0:12:34',
    });
  });

  it('filters the queue by category', async () => {
    await addUrl('sonarr');

    expect((await sab({ mode: 'queue', cat: 'radarr' })).body.queue.noofslots_total).toBe(0);
    expect((await sab({ mode: 'queue', category: 'sonarr' })).body.queue.noofslots_total).toBe(1);
  });

  it('moves a completed job to history with its storage path', async () => {
    await addUrl();
    await observe('success', { bytesLoaded: 2 * GIB, saveTo: '/downloads/radarr/Movie' });

    expect((await sab({ mode: 'queue' })).body.queue.slots).toEqual([]);

    const { body } = await sab({ mode: 'history' });
    expect(body.history.noofslots).toBe(1);
    expect(body.history.slots[0]).toMatchObject({
      nzo_id: JOB_ID,
      name: 'Movie (2020) WEBDL-1080p',
      category: 'radarr',
      status: 'Completed',
      bytes: 2 * GIB,
      size: '2.00 GB',
      storage: '/downloads/radarr/Movie',
      fail_message: '',
    });
  });

  it('deletes a live job and cancels its packages', async () => {
    await addUrl();
    const { body } = await sab({ mode: 'queue', name: 'delete', value: JOB_ID });

    expect(body).toEqual({ status: true, nzo_ids: [JOB_ID] });
    expect(h.registry.get(JOB_ID)?.state).toBe('deleted');
    expect(h.bridge.cancelled).toEqual([{ id: `${JOB_ID}-0`, name: '[radarr] Movie (2020) WEBDL-1080p' }]);
    expect((await sab({ mode: 'history' })).body.history.slots).toEqual([]);
  });

  it('acknowledges deleting an unknown job', async () => {
    const { body } = await sab({ mode: 'history', name: 'delete', value: 'rly_unknown' });
    expect(body).toEqual({ status: true, nzo_ids: ['rly_unknown'] });
  });

  it('deletes everything with value=all', async () => {
    await addUrl();
    const { body } = await sab({ mode: 'queue', name: 'delete', value: 'all' });

    expect(body).toEqual({ status: true });
    expect(h.registry.get(JOB_ID)?.state).toBe('deleted');
  });

  it('serves the client configuration with the configured labels', async () => {
    const { body } = await sab({ mode: 'get_config' });

    expect(body.config.misc.complete_dir).toBe('/downloads');
    expect(body.config.categories).toEqual([
      { name: '*', order: 0, pp: '', script: 'None', dir: '', priority: -100 },
      { name: 'radarr', order: 1, pp: '', script: 'None', dir: 'radarr', priority: -100 },
      { name: 'sonarr', order: 2, pp: '', script: 'None', dir: 'sonarr', priority: -100 },
    ]);
  });

  it('acknowledges unsupported modes', async () => {
    expect((await sab({ mode: 'pause' })).body).toEqual({ status: true });
  });

  it('answers queue calls made on the indexer endpoint', async () => {
    await addUrl();
    const response = await h.server.inject({
      method: 'GET',
      url: '/api',
      query: { apikey: TEST_API_KEY, mode: 'queue' },
    });

    expect(response.json().queue.slots[0].nzo_id).toBe(JOB_ID);
  });
});
