/**
 * Cookie Session Supplier
 * 
 * Turns a long-lived remember-me cookie into a provider session: one
 * request to the site root collects the session cookies and the XSRF
 * token the JSON API expects. Sessions are reused for an hour.
 */

import { AuthenticationError, TransientProviderError } from '@relayarr/core';
import { createLogger, errorMessage } from '@relayarr/utils';
import type { ProviderSession, SessionSupplier } from '../collaborators.js';

const logger = createLogger({ component: 'provider-session' });

export interface CookieSessionConfig {
  baseUrl: string;
  cookieName: string;
  cookieValue: string;
  ttlMs?: number;
  timeoutMs?: number;
  userAgent?: string;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/**
 * name/value pairs out of Set-Cookie headers
 */
export function parseSetCookies(headers: readonly string[]): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const header of headers) {
    const [pair = ''] = header.split(';');
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    pairs.push([pair.slice(0, eq).trim(), pair.slice(eq + 1).trim()]);
  }
  return pairs;
}

export class CookieSessionSupplier implements SessionSupplier {
  private readonly config: Required<CookieSessionConfig>;
  private current: ProviderSession | null = null;
  private pending: Promise<ProviderSession> | null = null;

  constructor(
    config: CookieSessionConfig,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.config = {
      ttlMs: 60 * 60 * 1000,
      timeoutMs: 30000,
      userAgent: DEFAULT_USER_AGENT,
      ...config,
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
    };
  }

  async session(): Promise<ProviderSession> {
    if (this.current && this.clock() < this.current.expiresAt) {
      return this.current;
    }
    if (this.pending) {
      return this.pending;
    }

    this.pending = this.establish();
    try {
      this.current = await this.pending;
      return this.current;
    } finally {
      this.pending = null;
    }
  }

  invalidate(): void {
    this.current = null;
  }

  private async establish(): Promise<ProviderSession> {
    const { baseUrl, cookieName, cookieValue } = this.config;
    if (!cookieName || !cookieValue) {
      throw new AuthenticationError('provider', 'remember-me cookie not configured');
    }

    logger.info('Establishing provider session');

    let response: Response;
    try {
      response = await fetch(`${baseUrl}/`, {
        headers: {
          Cookie: `${cookieName}=${cookieValue}`,
          'User-Agent': this.config.userAgent,
          Accept: 'text/html,application/json',
        },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new TransientProviderError('session', errorMessage(error));
    }
    await response.body?.cancel();

    if (response.status === 401 || response.status === 403) {
      throw new AuthenticationError('provider', `remember-me cookie rejected (HTTP ${response.status})`);
    }
    if (!response.ok) {
      throw new TransientProviderError('session', `HTTP ${response.status}`);
    }

    const cookies = new Map<string, string>([[cookieName, cookieValue]]);
    for (const [name, value] of parseSetCookies(response.headers.getSetCookie())) {
      cookies.set(name, value);
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
      Referer: `${baseUrl}/`,
      'X-Requested-With': 'XMLHttpRequest',
      'User-Agent': this.config.userAgent,
    };
    const xsrf = [...cookies].find(([name]) => name.toLowerCase().includes('xsrf'));
    if (xsrf) {
      headers['X-XSRF-TOKEN'] = decodeURIComponent(xsrf[1]);
    }

    logger.info({ cookies: cookies.size, xsrf: Boolean(xsrf) }, 'Provider session established');

    return {
      cookieHeader: [...cookies].map(([name, value]) => `${name}=${value}`).join('; '),
      headers,
      expiresAt: new Date(this.clock().getTime() + this.config.ttlMs),
    };
  }
}
