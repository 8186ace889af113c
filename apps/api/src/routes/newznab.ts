/**
 * Newznab Routes
 *
 * Indexer emulation. `/api` answers caps, search, movie, tvsearch,
 * music and get; a request carrying `mode` is a queue-protocol call and
 * is handed to the SABnzbd handler. `/nzb` serves the NZB stub for a
 * retrieval reference.
 *
 * Every reply is XML, errors included, except where the queue handler
 * takes over.
 */

import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AuthenticationError, InvalidRequestError, type SyntheticRelease } from '@relayarr/core';
import {
  NewznabErrorCode,
  decodeReference,
  encodeReference,
  parseCategories,
  referenceFor,
  renderCaps,
  renderError,
  renderFeed,
  renderNzb,
  type SearchService,
} from '@relayarr/indexer';
import type { SabnzbdHandler } from './sabnzbd.js';

export interface NewznabRouteOptions {
  search: SearchService;
  sabnzbd: SabnzbdHandler;
  apiKey: string;
  publicUrl: string;
}

const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 500;

const optionalInt = z.coerce.number().int().min(0).optional();

const newznabQuerySchema = z.object({
  t: z.string().default('caps'),
  mode: z.string().optional(),
  q: z.string().optional(),
  cat: z.string().optional(),
  imdbid: z.string().optional(),
  tmdbid: z.string().optional(),
  tvdbid: z.string().optional(),
  season: optionalInt,
  ep: optionalInt,
  artist: z.string().optional(),
  album: z.string().optional(),
  id: z.string().optional(),
  offset: optionalInt,
  limit: optionalInt,
}).passthrough();

type NewznabQuery = z.infer<typeof newznabQuerySchema>;

const XML_TYPE = 'application/xml; charset=utf-8';

function sendXml(reply: FastifyReply, body: string, statusCode = 200): FastifyReply {
  return reply.status(statusCode).type(XML_TYPE).send(body);
}

function sendError(reply: FastifyReply, code: NewznabErrorCode, description: string, statusCode = 200): FastifyReply {
  return sendXml(reply, renderError(code, description), statusCode);
}

/** IMDb ids arrive with or without the tt prefix */
function imdbId(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  return raw.startsWith('tt') ? raw : `tt${raw}`;
}

function attachmentName(title: string): string {
  return `${title.replace(/["\\/\r\n]/g, '_')}.nzb`;
}

export const newznabRoutes: FastifyPluginAsync<NewznabRouteOptions> = async (fastify, options) => {
  const { search, sabnzbd, apiKey, publicUrl } = options;

  const grabLink = (release: SyntheticRelease): string => {
    const id = encodeReference(referenceFor(release));
    return `${publicUrl}/api?t=get&id=${id}&apikey=${encodeURIComponent(apiKey)}`;
  };

  const sendNzb = (reply: FastifyReply, id: string | undefined) => {
    if (!id) {
      return sendError(reply, NewznabErrorCode.MISSING_PARAMETER, 'Missing parameter: id');
    }

    let title: string;
    try {
      title = decodeReference(id).title;
    } catch (error) {
      if (error instanceof InvalidRequestError) {
        return sendError(reply, NewznabErrorCode.INCORRECT_PARAMETER, 'Incorrect parameter: id');
      }
      throw error;
    }

    return reply
      .type('application/x-nzb')
      .header('Content-Disposition', `attachment; filename="${attachmentName(title)}"`)
      .send(renderNzb(id, title));
  };

  const runSearch = (params: NewznabQuery): Promise<SyntheticRelease[]> | null => {
    const categories = parseCategories(params.cat);

    switch (params.t) {
      case 'search':
        return search.search(params.q, categories);
      case 'movie':
        return search.movieSearch({
          q: params.q,
          imdbId: imdbId(params.imdbid),
          tmdbId: params.tmdbid,
          categories,
        });
      case 'tvsearch':
        return search.tvSearch({
          q: params.q,
          tvdbId: params.tvdbid,
          imdbId: imdbId(params.imdbid),
          tmdbId: params.tmdbid,
          season: params.season,
          episode: params.ep,
          categories,
        });
      case 'music':
      case 'audio':
        return search.musicSearch({
          q: params.q,
          artist: params.artist,
          album: params.album,
          categories,
        });
      default:
        return null;
    }
  };

  const handler = async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = newznabQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      const field = parsed.error.issues[0]?.path.join('.') ?? 'query';
      return sendError(reply, NewznabErrorCode.INCORRECT_PARAMETER, `Incorrect parameter: ${field}`);
    }
    const params = parsed.data;

    if (params.mode) {
      return sabnzbd(request, reply);
    }
    if (params.t === 'caps') {
      return sendXml(reply, renderCaps(search.capabilities()));
    }
    if (!request.server.hasApiKey(request)) {
      return sendError(reply, NewznabErrorCode.INCORRECT_CREDENTIALS, 'Incorrect user credentials');
    }
    if (params.t === 'get') {
      return sendNzb(reply, params.id);
    }

    const pending = runSearch(params);
    if (!pending) {
      return sendError(reply, NewznabErrorCode.NO_SUCH_FUNCTION, `Function not available: ${params.t}`);
    }

    let releases: SyntheticRelease[];
    try {
      releases = await pending;
    } catch (error) {
      if (error instanceof AuthenticationError) {
        request.log.warn({ t: params.t, err: error }, 'Search refused, provider credentials rejected');
        return sendError(reply, NewznabErrorCode.UNKNOWN, 'Content provider unavailable', 503);
      }
      throw error;
    }

    const offset = params.offset ?? 0;
    const limit = Math.min(params.limit || DEFAULT_LIMIT, MAX_LIMIT);
    const items = releases.slice(offset, offset + limit).map(release => ({
      title: release.title,
      guid: release.id,
      link: grabLink(release),
      publishedAt: release.publishedAt,
      size: release.size,
      category: release.category,
    }));

    return sendXml(reply, renderFeed({
      title: search.capabilities().serverTitle,
      description: 'relayarr search results',
      link: publicUrl,
      offset,
      total: releases.length,
      items,
    }));
  };

  fastify.route({ method: ['GET', 'POST'], url: '/api', handler });

  fastify.get('/nzb', async (request, reply) => {
    if (!request.server.hasApiKey(request)) {
      return sendError(reply, NewznabErrorCode.INCORRECT_CREDENTIALS, 'Incorrect user credentials', 401);
    }
    const params = z.object({ id: z.string().optional() }).passthrough().parse(request.query);
    return sendNzb(reply, params.id);
  });
};
