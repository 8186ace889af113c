/**
 * TMDB Title Resolver
 * 
 * Resolves IMDb, TMDB and TVDB identifiers to the original title through
 * The Movie Database API. Lookup failures resolve to null; search then
 * proceeds without that identifier.
 */

import { z } from 'zod';
import { TransientProviderError } from '@relayarr/core';
import { createLogger, errorMessage } from '@relayarr/utils';
import type { TitleIdentifier, TitleResolver } from '../collaborators.js';

const logger = createLogger({ component: 'tmdb' });

export interface TmdbConfig {
  apiKey: string;
  language: string;
  baseUrl?: string;
  timeoutMs?: number;
}

const movieSchema = z.object({
  title: z.string().nullish(),
  original_title: z.string().nullish(),
});

const showSchema = z.object({
  name: z.string().nullish(),
  original_name: z.string().nullish(),
});

const findSchema = z.object({
  movie_results: z.array(movieSchema).default([]),
  tv_results: z.array(showSchema).default([]),
});

type Movie = z.infer<typeof movieSchema>;
type Show = z.infer<typeof showSchema>;

const movieTitle = (movie: Movie | undefined): string | null =>
  movie?.original_title || movie?.title || null;

const showTitle = (show: Show | undefined): string | null =>
  show?.original_name || show?.name || null;

export class TmdbTitleResolver implements TitleResolver {
  private readonly config: Required<TmdbConfig>;

  constructor(config: TmdbConfig) {
    this.config = {
      baseUrl: 'https://api.themoviedb.org',
      timeoutMs: 10000,
      ...config,
    };
  }

  async resolve(identifier: TitleIdentifier): Promise<string | null> {
    if (!this.config.apiKey) {
      logger.warn({ identifier }, 'TMDB API key not configured, cannot resolve identifier');
      return null;
    }

    try {
      const title = await this.lookup(identifier);
      if (title) {
        logger.info({ identifier, title }, 'Identifier resolved');
      }
      return title;
    } catch (error) {
      logger.error({ identifier, error: errorMessage(error) }, 'Identifier resolution failed');
      return null;
    }
  }

  private async lookup(identifier: TitleIdentifier): Promise<string | null> {
    switch (identifier.kind) {
      case 'imdb': {
        const id = identifier.id.startsWith('tt') ? identifier.id : `tt${identifier.id}`;
        const found = findSchema.parse(await this.get(`/3/find/${id}`, { external_source: 'imdb_id' }));
        return movieTitle(found.movie_results[0]) ?? showTitle(found.tv_results[0]);
      }
      case 'tvdb': {
        const found = findSchema.parse(await this.get(`/3/find/${identifier.id}`, { external_source: 'tvdb_id' }));
        return showTitle(found.tv_results[0]);
      }
      case 'tmdb': {
        const data = await this.get(`/3/${identifier.mediaKind}/${identifier.id}`);
        return identifier.mediaKind === 'movie'
          ? movieTitle(movieSchema.parse(data))
          : showTitle(showSchema.parse(data));
      }
    }
  }

  private async get(path: string, params: Record<string, string> = {}): Promise<unknown> {
    const url = new URL(path, this.config.baseUrl);
    url.searchParams.set('api_key', this.config.apiKey);
    url.searchParams.set('language', this.config.language);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    const response = await fetch(url, { signal: AbortSignal.timeout(this.config.timeoutMs) });
    if (!response.ok) {
      throw new TransientProviderError(`tmdb ${path}`, `HTTP ${response.status}`);
    }
    return response.json();
  }
}
