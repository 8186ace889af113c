/**
 * Search Service
 * 
 * The search-protocol surface: resolves identifiers to titles, asks the
 * provider for candidates, verifies them and synthesizes releases.
 * 
 * Provider network trouble yields an empty result set. Rejected
 * provider credentials put the provider into `auth` state and every
 * search fails fast until the session recovers.
 */

import {
  AuthenticationError,
  TransientProviderError,
  type CandidateLink,
  type HealthMonitor,
  type QueryContext,
  type SyntheticRelease,
} from '@relayarr/core';
import { createLogger, errorMessage, type Logger } from '@relayarr/utils';
import { CATEGORY_TABLE, kindForCategories } from './categories.js';
import type {
  CandidateVerifier,
  ContentDiscoveryClient,
  TitleIdentifier,
  TitleResolver,
} from './collaborators.js';
import type { Capabilities } from './newznab.js';
import type { ResultSynthesizer } from './synthesizer.js';

export interface MovieQuery {
  q?: string;
  imdbId?: string;
  tmdbId?: string;
  categories?: readonly number[];
}

export interface TvQuery {
  q?: string;
  tvdbId?: string;
  imdbId?: string;
  tmdbId?: string;
  season?: number;
  episode?: number;
  categories?: readonly number[];
}

export interface MusicQuery {
  q?: string;
  artist?: string;
  album?: string;
  categories?: readonly number[];
}

export interface SearchServiceOptions {
  discovery: ContentDiscoveryClient;
  resolver?: TitleResolver;
  verifier: CandidateVerifier;
  synthesizer: ResultSynthesizer;
  health: HealthMonitor;
  serverTitle?: string;
  logger?: Logger;
}

/**
 * Keep the requested episode and season packs
 */
export function matchesEpisode(candidate: CandidateLink, episode: number | undefined): boolean {
  if (episode === undefined) {
    return true;
  }
  return candidate.episode === undefined || candidate.episode === 0 || candidate.episode === episode;
}

export class SearchService {
  private readonly options: SearchServiceOptions;
  private readonly logger: Logger;

  constructor(options: SearchServiceOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger({ component: 'search' });
  }

  /**
   * Free-text search; the media kind follows the requested categories
   */
  async search(query?: string, categories: readonly number[] = []): Promise<SyntheticRelease[]> {
    const text = query?.trim();
    if (!text) {
      return [];
    }
    return this.run({ mediaKind: kindForCategories(categories), query: text, categories });
  }

  async movieSearch(identifier: MovieQuery): Promise<SyntheticRelease[]> {
    const query = identifier.q?.trim()
      || (identifier.imdbId && await this.resolveImdb(identifier.imdbId))
      || (identifier.tmdbId && await this.resolve({ kind: 'tmdb', id: identifier.tmdbId, mediaKind: 'movie' }));

    if (!query) {
      return [];
    }
    return this.run({ mediaKind: 'movie', query, categories: identifier.categories });
  }

  async tvSearch(request: TvQuery): Promise<SyntheticRelease[]> {
    const query = request.q?.trim()
      || (request.tvdbId && await this.resolve({ kind: 'tvdb', id: request.tvdbId }))
      || (request.imdbId && await this.resolveImdb(request.imdbId))
      || (request.tmdbId && await this.resolve({ kind: 'tmdb', id: request.tmdbId, mediaKind: 'tv' }));

    if (!query) {
      return [];
    }
    return this.run({
      mediaKind: 'tv',
      query,
      season: request.season,
      episode: request.episode,
      categories: request.categories,
    });
  }

  async musicSearch(request: MusicQuery): Promise<SyntheticRelease[]> {
    const query = request.q?.trim()
      || [request.artist, request.album].filter(Boolean).join(' ').trim();

    if (!query) {
      return [];
    }
    return this.run({ mediaKind: 'music', query, categories: request.categories });
  }

  capabilities(): Capabilities {
    return {
      serverTitle: this.options.serverTitle ?? 'relayarr',
      limits: { default: 100, max: 500 },
      retentionDays: 9999,
      searchModes: [
        { name: 'search', supportedParams: ['q'] },
        { name: 'movie-search', supportedParams: ['q', 'imdbid', 'tmdbid'] },
        { name: 'tv-search', supportedParams: ['q', 'tvdbid', 'imdbid', 'season', 'ep'] },
        { name: 'music-search', supportedParams: ['q', 'artist', 'album'] },
      ],
      categories: CATEGORY_TABLE,
    };
  }

  /** unresolvable IMDb ids are searched as they are */
  private async resolveImdb(id: string): Promise<string> {
    return (await this.resolve({ kind: 'imdb', id })) ?? id;
  }

  private async resolve(identifier: TitleIdentifier): Promise<string | null> {
    const resolver = this.options.resolver;
    if (!resolver) {
      this.logger.warn({ identifier }, 'No title resolver configured');
      return null;
    }

    const title = await resolver.resolve(identifier);
    if (!title) {
      this.logger.warn({ identifier }, 'Identifier did not resolve to a title');
    }
    return title;
  }

  private async run(context: QueryContext): Promise<SyntheticRelease[]> {
    const { discovery, verifier, synthesizer, health } = this.options;
    health.assertUsable('provider');

    let candidates: CandidateLink[];
    try {
      candidates = await discovery.discover(context);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        health.report('provider', 'auth', error.message);
        throw error;
      }
      if (error instanceof TransientProviderError) {
        health.report('provider', 'unavailable', error.message);
        this.logger.warn({ query: context.query, error: errorMessage(error) }, 'Provider unavailable, returning no results');
        return [];
      }
      throw error;
    }

    if (health.status('provider') === 'unavailable') {
      health.clear('provider');
    }

    const relevant = candidates.filter(c => matchesEpisode(c, context.mediaKind === 'tv' ? context.episode : undefined));
    const verified = await verifier.verifyAll(relevant);
    const releases = synthesizer.synthesize(context, verified);

    this.logger.info(
      {
        kind: context.mediaKind,
        query: context.query,
        season: context.season,
        episode: context.episode,
        candidates: candidates.length,
        releases: releases.length,
      },
      'Search completed'
    );
    return releases;
  }
}
