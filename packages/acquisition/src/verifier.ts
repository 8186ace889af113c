/**
 * Link Verifier
 * 
 * Checks that candidate links still resolve at their host before they are
 * offered in search results or handed to the download engine.
 * 
 * Verdicts:
 * - live: the host answered with a success or redirect status
 * - dead: the host says the file is gone (404, 410)
 * - unknown: anything else, including timeouts and network errors,
 *   once the retry is spent
 * 
 * Verdicts are cached per URL for a freshness window; expired entries are
 * dropped on read and swept on every batch.
 */

import pLimit from 'p-limit';
import {
  TransientProviderError,
  type CandidateLink,
  type LinkVerdict,
  type VerifiedCandidate,
} from '@relayarr/core';
import { createLogger, errorMessage, retry, type Logger } from '@relayarr/utils';

export interface LinkProbe {
  /**
   * Probe one URL. Throws TransientProviderError (or any network error)
   * when no verdict could be reached.
   */
  probe(url: string, signal: AbortSignal): Promise<LinkVerdict>;
}

export interface LinkVerifierOptions {
  probe?: LinkProbe;
  timeoutMs?: number;
  freshnessMs?: number;
  concurrency?: number;
  /** extra attempts after a probe that reached no verdict */
  retries?: number;
  /** delay before the first retry, doubled for each one after */
  retryDelayMs?: number;
  clock?: () => Date;
  logger?: Logger;
}

const DEAD_STATUSES = new Set([404, 410]);

export function verdictForStatus(status: number): LinkVerdict {
  if (status >= 200 && status < 400) {
    return 'live';
  }
  if (DEAD_STATUSES.has(status)) {
    return 'dead';
  }
  return 'unknown';
}

/**
 * HEAD probe, falling back to a one-byte ranged GET for hosts that
 * refuse HEAD
 */
export class HttpLinkProbe implements LinkProbe {
  constructor(private readonly userAgent: string = 'relayarr/1.0') {}

  async probe(url: string, signal: AbortSignal): Promise<LinkVerdict> {
    let response = await fetch(url, {
      method: 'HEAD',
      redirect: 'follow',
      headers: { 'User-Agent': this.userAgent },
      signal,
    });

    if (response.status === 405 || response.status === 501) {
      response = await fetch(url, {
        method: 'GET',
        redirect: 'follow',
        headers: { 'User-Agent': this.userAgent, Range: 'bytes=0-0' },
        signal,
      });
      await response.body?.cancel();
    }

    if (response.status >= 500 || response.status === 429) {
      throw new TransientProviderError('probe', `HTTP ${response.status}`);
    }

    return verdictForStatus(response.status);
  }
}

export class LinkVerifier {
  private readonly probe: LinkProbe;
  private readonly timeoutMs: number;
  private readonly freshnessMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly cache = new Map<string, { verdict: LinkVerdict; verifiedAt: Date }>();

  constructor(options: LinkVerifierOptions = {}) {
    this.probe = options.probe ?? new HttpLinkProbe();
    this.timeoutMs = options.timeoutMs ?? 8000;
    this.freshnessMs = options.freshnessMs ?? 10 * 60 * 1000;
    this.retries = options.retries ?? 1;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger({ component: 'link-verifier' });
    this.limit = pLimit(Math.max(1, options.concurrency ?? 5));
  }

  /**
   * Verify one candidate, reusing a fresh cached verdict
   */
  async verify(candidate: CandidateLink): Promise<VerifiedCandidate> {
    const cached = this.cache.get(candidate.url);
    if (cached) {
      if (this.isFreshAt(cached.verifiedAt)) {
        return { candidate, verdict: cached.verdict, verifiedAt: cached.verifiedAt };
      }
      this.cache.delete(candidate.url);
    }
    return this.limit(() => this.probeCandidate(candidate));
  }

  async verifyAll(candidates: readonly CandidateLink[]): Promise<VerifiedCandidate[]> {
    this.evictExpired();
    const results = await Promise.all(candidates.map(candidate => this.verify(candidate)));

    const counts = { live: 0, dead: 0, unknown: 0 };
    for (const result of results) counts[result.verdict]++;
    this.logger.debug({ checked: results.length, cached: this.cache.size, ...counts }, 'Links verified');

    return results;
  }

  isFresh(verified: VerifiedCandidate): boolean {
    return this.isFreshAt(verified.verifiedAt);
  }

  /**
   * Re-probe every candidate whose verdict is past the freshness window
   */
  async refresh(verified: readonly VerifiedCandidate[]): Promise<VerifiedCandidate[]> {
    return Promise.all(verified.map(vc => {
      if (this.isFresh(vc)) {
        return vc;
      }
      this.cache.delete(vc.candidate.url);
      return this.verify(vc.candidate);
    }));
  }

  private isFreshAt(verifiedAt: Date): boolean {
    return this.clock().getTime() - verifiedAt.getTime() < this.freshnessMs;
  }

  private evictExpired(): void {
    for (const [url, entry] of this.cache) {
      if (!this.isFreshAt(entry.verifiedAt)) {
        this.cache.delete(url);
      }
    }
  }

  private async probeCandidate(candidate: CandidateLink): Promise<VerifiedCandidate> {
    let verdict: LinkVerdict;
    try {
      verdict = await retry(
        () => this.probe.probe(candidate.url, AbortSignal.timeout(this.timeoutMs)),
        {
          maxAttempts: this.retries + 1,
          initialDelay: this.retryDelayMs,
          maxDelay: this.retryDelayMs * 8,
          backoffMultiplier: 2,
          onRetry: (error, attempt, delay) => {
            this.logger.debug({ url: candidate.url, attempt, delay, error: errorMessage(error) }, 'Probe failed, retrying');
          },
        }
      );
    } catch (error) {
      this.logger.debug({ url: candidate.url, error: errorMessage(error) }, 'No verdict for link');
      verdict = 'unknown';
    }

    const verifiedAt = this.clock();
    this.cache.set(candidate.url, { verdict, verifiedAt });
    return { candidate, verdict, verifiedAt };
  }
}

/**
 * Keep the live ones
 */
export function liveOnly(verified: readonly VerifiedCandidate[]): VerifiedCandidate[] {
  return verified.filter(vc => vc.verdict === 'live');
}
