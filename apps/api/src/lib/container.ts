/**
 * Service Container
 *
 * Builds the engine from configuration: health monitor, job store,
 * JDownloader bridge, registry, reconciler and poller on the queue side;
 * provider session, catalog, title resolver, verifier and search service
 * on the search side.
 */

import { join } from 'node:path';
import {
  HealthMonitor,
  JobRegistry,
  JsonFileJobStore,
  ReconcilerPoller,
  StateReconciler,
} from '@relayarr/core';
import {
  HttpLinkProbe,
  JDownloaderBridge,
  JDownloaderClient,
  LinkVerifier,
} from '@relayarr/acquisition';
import {
  CatalogClient,
  CookieSessionSupplier,
  ResultSynthesizer,
  SearchService,
  TmdbTitleResolver,
} from '@relayarr/indexer';
import { createLogger } from '@relayarr/utils';
import type { Config } from '../config/index.js';
import { QueueService } from '../services/queueService.js';

export interface Container {
  health: HealthMonitor;
  registry: JobRegistry;
  bridge: JDownloaderBridge;
  poller: ReconcilerPoller;
  search: SearchService;
  queue: QueueService;
}

export function buildContainer(config: Config): Container {
  const health = new HealthMonitor();

  // ============================================
  // Queue side
  // ============================================

  const engine = new JDownloaderClient(config.jdownloader);
  const bridge = new JDownloaderBridge({
    client: engine,
    health,
    retryAttempts: config.bridge.retryAttempts,
    retryBaseMs: config.bridge.retryBaseMs,
    retryMaxMs: config.bridge.retryMaxMs,
  });

  const registry = new JobRegistry({
    store: new JsonFileJobStore(join(config.dataPath, 'jobs.json')),
    bridge,
    health,
    destinationRoot: config.downloadRoot,
  });

  const poller = new ReconcilerPoller({
    reconciler: new StateReconciler({ registry, bridge }),
    registry,
    health,
    intervalMs: config.poller.intervalMs,
    concurrency: config.poller.concurrency,
    retentionMs: config.poller.retentionMs,
  });

  // ============================================
  // Search side
  // ============================================

  const sessions = new CookieSessionSupplier({
    baseUrl: config.provider.baseUrl,
    cookieName: config.provider.cookieName,
    cookieValue: config.provider.cookieValue,
  });

  const verifier = new LinkVerifier({
    probe: new HttpLinkProbe(),
    timeoutMs: config.verifier.timeoutMs,
    freshnessMs: config.verifier.freshnessMs,
    concurrency: config.verifier.concurrency,
  });

  const search = new SearchService({
    discovery: new CatalogClient(
      {
        baseUrl: config.provider.baseUrl,
        maxTitles: config.provider.maxTitles,
        maxLinksPerTitle: config.provider.maxLinksPerTitle,
        preferredHosts: config.provider.preferredHosts,
      },
      sessions
    ),
    resolver: config.tmdb.apiKey ? new TmdbTitleResolver(config.tmdb) : undefined,
    verifier,
    synthesizer: new ResultSynthesizer(),
    health,
  });

  const queue = new QueueService({
    registry,
    verifier,
    verifyOnSubmit: config.verifier.verifyOnSubmit,
  });

  // ============================================
  // Recovery probes (run by the poller)
  // ============================================

  const logger = createLogger({ component: 'container' });

  health.registerRecovery('provider', async () => {
    sessions.invalidate();
    await sessions.session();
    logger.info('Provider session re-established');
  });
  health.registerRecovery('engine', () => bridge.reconnect());

  return { health, registry, bridge, poller, search, queue };
}
