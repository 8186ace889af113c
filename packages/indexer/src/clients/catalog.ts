/**
 * Catalog Client
 * 
 * Content discovery against the provider's JSON API:
 *   GET  /api/v1/search/{query}         titles
 *   GET  /api/v1/liens?title_id&season  paginated download links
 *   POST /api/v1/liens/{id}/download    resolves a link to its hoster URL
 * 
 * Links are ranked so every episode gets a slot before any episode gets
 * a second one, then resolved with bounded concurrency. Resolution
 * failures drop the link; only authentication failures abort discovery.
 */

import pLimit from 'p-limit';
import { z } from 'zod';
import {
  AuthenticationError,
  TransientProviderError,
  type CandidateLink,
  type MediaKind,
  type QueryContext,
} from '@relayarr/core';
import { createLogger, errorMessage } from '@relayarr/utils';
import type { ContentDiscoveryClient, SessionSupplier } from '../collaborators.js';
import { qualityRank } from '../quality.js';

const logger = createLogger({ component: 'catalog' });

export interface CatalogConfig {
  baseUrl: string;
  maxTitles?: number;
  maxLinksPerTitle?: number;
  resolveConcurrency?: number;
  /** hosts ranked first, in order, among links of equal quality */
  preferredHosts?: readonly string[];
  timeoutMs?: number;
}

/** the API never returns more than this per page, whatever perPage says */
const PAGE_SIZE = 42;
const MAX_PAGES = 50;
const SESSION_STATUSES = new Set([401, 403, 419]);

const titleSchema = z.object({
  id: z.number(),
  name: z.string().default(''),
  year: z.coerce.number().nullish(),
  type: z.string().default('movie'),
  have_link: z.union([z.number(), z.boolean()]).nullish(),
});

const searchSchema = z.object({
  results: z.array(titleSchema).default([]),
});

const namedSchema = z.object({ name: z.string() });

const linkSchema = z.object({
  id: z.number(),
  qual: z.object({ qual: z.string() }).nullish(),
  host: namedSchema.nullish(),
  langues_compact: z.array(namedSchema).nullish(),
  subs_compact: z.array(namedSchema).nullish(),
  taille: z.coerce.number().nullish(),
  nfo: z.array(z.object({ nfo: z.string().nullish() })).nullish(),
  saison: z.coerce.number().nullish(),
  episode: z.coerce.number().nullish(),
  created_at: z.string().nullish(),
});

const linksPageSchema = z.object({
  status: z.string(),
  pagination: z.object({ data: z.array(linkSchema).default([]) }).default({}),
  title: z.object({
    name: z.string().nullish(),
    year: z.coerce.number().nullish(),
  }).nullish(),
});

const downloadSchema = z.object({
  lien: z.object({
    lien: z.string().nullish(),
    directDL: z.string().nullish(),
    active: z.coerce.number().nullish(),
    deleted_at: z.string().nullish(),
  }).nullish(),
});

export type CatalogTitle = z.infer<typeof titleSchema>;
export type CatalogLink = z.infer<typeof linkSchema>;

interface TitleLinks {
  name?: string;
  year?: number;
  links: CatalogLink[];
}

const KIND_TYPES: Record<MediaKind, readonly string[]> = {
  movie: ['movie'],
  tv: ['series', 'tv', 'animes'],
  music: ['music'],
};

/**
 * One link per episode first (best quality, then preferred host), then
 * the rest in provider order
 */
export function rankLinks(links: readonly CatalogLink[], preferredHosts: readonly string[] = []): CatalogLink[] {
  const hostRank = (link: CatalogLink): number => {
    const host = (link.host?.name ?? '').toLowerCase();
    const index = preferredHosts.findIndex(h => host.includes(h.toLowerCase()));
    return index === -1 ? preferredHosts.length : index;
  };

  const byEpisode = new Map<number, CatalogLink[]>();
  for (const link of links) {
    const episode = link.episode ?? 0;
    const bucket = byEpisode.get(episode) ?? [];
    bucket.push(link);
    byEpisode.set(episode, bucket);
  }

  const leaders: CatalogLink[] = [];
  for (const episode of [...byEpisode.keys()].sort((a, b) => a - b)) {
    const [best] = [...(byEpisode.get(episode) ?? [])].sort((a, b) =>
      qualityRank(a.qual?.qual) - qualityRank(b.qual?.qual) || hostRank(a) - hostRank(b)
    );
    if (best) leaders.push(best);
  }

  const chosen = new Set(leaders.map(link => link.id));
  return [...leaders, ...links.filter(link => !chosen.has(link.id))];
}

export class CatalogClient implements ContentDiscoveryClient {
  private readonly config: Required<CatalogConfig>;
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(
    config: CatalogConfig,
    private readonly sessions: SessionSupplier
  ) {
    this.config = {
      maxTitles: 10,
      maxLinksPerTitle: 15,
      resolveConcurrency: 5,
      preferredHosts: [],
      timeoutMs: 30000,
      ...config,
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
    };
    this.limit = pLimit(this.config.resolveConcurrency);
  }

  async discover(context: QueryContext): Promise<CandidateLink[]> {
    const titles = await this.searchTitles(context.query, context.mediaKind);
    const season = context.season ?? 1;
    const candidates: CandidateLink[] = [];

    for (const title of titles) {
      let page: TitleLinks;
      try {
        page = await this.titleLinks(title.id, season);
      } catch (error) {
        if (error instanceof AuthenticationError) throw error;
        logger.warn({ titleId: title.id, error: errorMessage(error) }, 'Could not list links, skipping title');
        continue;
      }

      const wanted = context.mediaKind === 'tv' && context.episode !== undefined
        ? page.links.filter(link => !link.episode || link.episode === context.episode)
        : page.links;

      const ranked = rankLinks(wanted, this.config.preferredHosts).slice(0, this.config.maxLinksPerTitle);
      const resolved = await Promise.all(ranked.map(link => this.limit(() => this.resolveLink(link))));

      ranked.forEach((link, i) => {
        const url = resolved[i];
        if (url) {
          candidates.push(this.toCandidate(link, url, title, page, context));
        }
      });

      logger.debug({ titleId: title.id, links: page.links.length, resolved: candidates.length }, 'Title links resolved');
    }

    logger.info({ query: context.query, titles: titles.length, candidates: candidates.length }, 'Discovery finished');
    return candidates;
  }

  async searchTitles(query: string, kind: MediaKind): Promise<CatalogTitle[]> {
    const data = searchSchema.parse(
      await this.request(`/api/v1/search/${encodeURIComponent(query)}`, {
        query: { loader: 'searchPage', limit: String(this.config.maxTitles * 2) },
      })
    );

    return data.results
      .filter(title => KIND_TYPES[kind].includes(title.type))
      .filter(title => Boolean(title.have_link))
      .slice(0, this.config.maxTitles);
  }

  async titleLinks(titleId: number, season: number): Promise<TitleLinks> {
    const result: TitleLinks = { links: [] };

    for (let page = 1; page <= MAX_PAGES; page++) {
      const data = linksPageSchema.parse(
        await this.request('/api/v1/liens', {
          query: {
            perPage: '100',
            page: String(page),
            title_id: String(titleId),
            loader: 'linksdl',
            season: String(season),
            filters: '',
            paginate: 'preferLengthAware',
          },
        })
      );

      if (data.status !== 'success') {
        throw new TransientProviderError('links', `status ${data.status}`);
      }
      if (page === 1) {
        result.name = data.title?.name ?? undefined;
        result.year = data.title?.year ?? undefined;
      }

      const links = data.pagination.data;
      result.links.push(...links);
      if (links.length < PAGE_SIZE) {
        return result;
      }
    }

    logger.warn({ titleId, pages: MAX_PAGES }, 'Pagination limit reached');
    return result;
  }

  /**
   * Hoster URL for an active link, null when the link is gone
   */
  async resolveLink(link: CatalogLink): Promise<string | null> {
    try {
      const data = downloadSchema.parse(
        await this.request(`/api/v1/liens/${link.id}/download`, { method: 'POST', body: {} })
      );
      const lien = data.lien;
      if (!lien || lien.deleted_at || lien.active !== 1) {
        return null;
      }
      return lien.directDL || lien.lien || null;
    } catch (error) {
      if (error instanceof AuthenticationError) throw error;
      logger.debug({ linkId: link.id, error: errorMessage(error) }, 'Link resolution failed');
      return null;
    }
  }

  private toCandidate(
    link: CatalogLink,
    url: string,
    title: CatalogTitle,
    page: TitleLinks,
    context: QueryContext
  ): CandidateLink {
    const publishedAt = link.created_at ? new Date(link.created_at) : undefined;
    const isTv = context.mediaKind === 'tv';

    return {
      url,
      releaseKey: `${title.id}:${link.id}`,
      source: link.host?.name ?? 'DDL',
      title: page.name || title.name,
      year: page.year ?? title.year ?? undefined,
      quality: link.qual?.qual ?? 'Unknown',
      audioLanguages: (link.langues_compact ?? []).map(l => l.name),
      subtitles: (link.subs_compact ?? []).map(s => s.name),
      sizeEstimate: link.taille ?? 0,
      nfo: link.nfo?.[0]?.nfo ?? undefined,
      season: isTv ? link.saison ?? context.season ?? 1 : undefined,
      episode: isTv ? link.episode ?? undefined : undefined,
      publishedAt: publishedAt && !Number.isNaN(publishedAt.getTime()) ? publishedAt : undefined,
      providerLinkId: String(link.id),
    };
  }

  /**
   * Authenticated API call. A session-class status drops the session and
   * retries once with a fresh one.
   */
  private async request(
    path: string,
    options: { method?: 'GET' | 'POST'; query?: Record<string, string>; body?: unknown },
    retried = false
  ): Promise<unknown> {
    const session = await this.sessions.session();
    const url = new URL(`${this.config.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = { ...session.headers, Cookie: session.cookieHeader };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method: options.method ?? 'GET',
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new TransientProviderError(path, errorMessage(error));
    }

    if (SESSION_STATUSES.has(response.status)) {
      this.sessions.invalidate();
      if (!retried) {
        return this.request(path, options, true);
      }
      throw new AuthenticationError('provider', `HTTP ${response.status} on ${path}`);
    }
    if (!response.ok) {
      throw new TransientProviderError(path, `HTTP ${response.status}`);
    }

    return response.json();
  }
}
