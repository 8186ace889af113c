/**
 * JDownloader Download Bridge
 * 
 * Implements the engine-neutral bridge contract on top of a JDownloader
 * client. One submission becomes one package; its handle carries the
 * crawler id returned by addLinks and the package name, since the crawler
 * id rarely matches the package uuid once links move to the download list.
 * Package names carry a per-submission tag so a resubmitted job never
 * matches the package left behind by its previous attempt. Once a package
 * is found by name, the observed handle carries its uuid instead.
 * 
 * Transient failures are retried with exponential backoff and then
 * surfaced as ExternalEngineUnavailableError. Rejected credentials are
 * never retried and put the engine into `auth` state.
 */

import {
  AuthenticationError,
  ExternalEngineUnavailableError,
  type BridgeSubmission,
  type DownloadBridge,
  type ExternalHandle,
  type ExternalLinkState,
  type HealthMonitor,
} from '@relayarr/core';
import { createLogger, errorMessage, retry, type Logger } from '@relayarr/utils';
import type { JdEngineClient, JdPackage, PackageList } from '../clients/jdownloader.js';
import { classifyPackage, normalizePackageName } from './normalize.js';

export interface JDownloaderBridgeOptions {
  client: JdEngineClient;
  health: HealthMonitor;
  /** retries after the first failed call */
  retryAttempts?: number;
  retryBaseMs?: number;
  retryMaxMs?: number;
  /** polls within this window share one package listing */
  snapshotTtlMs?: number;
  clock?: () => Date;
  logger?: Logger;
}

interface PackageSnapshot {
  takenAt: number;
  downloads: JdPackage[];
  linkgrabber: JdPackage[];
}

interface LocatedPackage {
  list: PackageList;
  pkg: JdPackage;
}

export function packageNameFor(title: string, label: string, tag?: string): string {
  const name = label ? `[${label.toUpperCase()}] ${title}` : title;
  return tag ? `${name} {${tag}}` : name;
}

export class JDownloaderBridge implements DownloadBridge {
  private readonly client: JdEngineClient;
  private readonly health: HealthMonitor;
  private readonly retryAttempts: number;
  private readonly retryBaseMs: number;
  private readonly retryMaxMs: number;
  private readonly snapshotTtlMs: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  private snapshot: PackageSnapshot | null = null;
  private inflight: Promise<PackageSnapshot> | null = null;
  private lastTagTime = 0;

  constructor(options: JDownloaderBridgeOptions) {
    this.client = options.client;
    this.health = options.health;
    this.retryAttempts = options.retryAttempts ?? 5;
    this.retryBaseMs = options.retryBaseMs ?? 5000;
    this.retryMaxMs = options.retryMaxMs ?? 60000;
    this.snapshotTtlMs = options.snapshotTtlMs ?? 2000;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger({ component: 'jdownloader-bridge' });
  }

  async submit(submission: BridgeSubmission): Promise<ExternalHandle[]> {
    const packageName = packageNameFor(submission.title, submission.label, this.nextTag());

    const id = await this.withRetry('submit', () =>
      this.client.addLinks({
        links: submission.links,
        packageName,
        destinationFolder: submission.destination,
        autostart: true,
      })
    );

    this.snapshot = null;
    this.logger.info({ jobId: submission.jobId, id, packageName }, 'Submitted to engine');
    return [{ id, name: packageName }];
  }

  async poll(handles: readonly ExternalHandle[]): Promise<ExternalLinkState[]> {
    if (handles.length === 0) {
      return [];
    }

    let snapshot: PackageSnapshot;
    try {
      snapshot = await this.takeSnapshot();
    } catch (error) {
      const reason = errorMessage(error);
      return handles.map((handle): ExternalLinkState => ({ kind: 'stale', handle, reason }));
    }

    return handles.map((handle): ExternalLinkState => {
      const located = this.locate(snapshot, handle);
      if (!located) {
        return { kind: 'observed', handle, native: 'Not found', state: 'unknown' };
      }

      const { native, state } = classifyPackage(located.pkg, located.list);
      const { pkg } = located;
      return {
        kind: 'observed',
        handle: pkg.uuid === handle.id ? handle : { id: pkg.uuid, name: handle.name },
        native,
        state,
        progress: {
          bytesLoaded: pkg.bytesLoaded ?? 0,
          bytesTotal: pkg.bytesTotal ?? 0,
          speed: pkg.speed ?? 0,
          eta: pkg.eta !== undefined && pkg.eta > 0 ? pkg.eta : 0,
          saveTo: pkg.saveTo,
        },
      };
    });
  }

  async cancel(handle: ExternalHandle): Promise<void> {
    this.snapshot = null;
    const snapshot = await this.takeSnapshot();
    const located = this.locate(snapshot, handle);

    if (!located) {
      this.logger.debug({ handle }, 'Package already gone from engine');
      return;
    }

    await this.withRetry('cancel', () => this.client.removePackages(located.list, [located.pkg.uuid]));
    this.snapshot = null;
  }

  /**
   * Recovery probe for the health monitor: re-authenticate from scratch
   */
  async reconnect(): Promise<void> {
    await this.client.connect();
    this.health.clear('engine');
  }

  private locate(snapshot: PackageSnapshot, handle: ExternalHandle): LocatedPackage | null {
    const name = normalizePackageName(handle.name);
    const lists: PackageList[] = ['downloads', 'linkgrabber'];

    for (const list of lists) {
      const pkg = snapshot[list].find(p => p.uuid === handle.id);
      if (pkg) return { list, pkg };
    }
    for (const list of lists) {
      const pkg = snapshot[list].find(p => normalizePackageName(p.name) === name);
      if (pkg) return { list, pkg };
    }
    return null;
  }

  /**
   * Base-36 submission time, bumped when two submissions share a millisecond
   */
  private nextTag(): string {
    this.lastTagTime = Math.max(this.clock().getTime(), this.lastTagTime + 1);
    return this.lastTagTime.toString(36);
  }

  private async takeSnapshot(): Promise<PackageSnapshot> {
    const now = this.clock().getTime();
    if (this.snapshot && now - this.snapshot.takenAt < this.snapshotTtlMs) {
      return this.snapshot;
    }
    if (this.inflight) {
      return this.inflight;
    }

    this.inflight = this.withRetry('poll', async () => ({
      takenAt: this.clock().getTime(),
      downloads: await this.client.queryPackages('downloads'),
      linkgrabber: await this.client.queryPackages('linkgrabber'),
    }));

    try {
      this.snapshot = await this.inflight;
      return this.snapshot;
    } finally {
      this.inflight = null;
    }
  }

  private async withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    this.health.assertUsable('engine');

    try {
      const result = await retry(fn, {
        maxAttempts: this.retryAttempts + 1,
        initialDelay: this.retryBaseMs,
        maxDelay: this.retryMaxMs,
        backoffMultiplier: 2,
        retryIf: error => !(error instanceof AuthenticationError),
        onRetry: (error, attempt, delay) => {
          this.logger.warn({ operation, attempt, delay, error: errorMessage(error) }, 'Engine call failed, retrying');
        },
      });
      if (this.health.status('engine') === 'unavailable') {
        this.health.clear('engine');
      }
      return result;
    } catch (error) {
      if (error instanceof AuthenticationError) {
        this.health.report('engine', 'auth', error.message);
        throw error;
      }
      const cause = errorMessage(error);
      this.health.report('engine', 'unavailable', cause);
      throw new ExternalEngineUnavailableError(operation, cause);
    }
  }
}
