/**
 * Quality normalization
 * 
 * Provider quality labels are mapped onto the quality names media
 * managers parse (WEBDL-1080p, Bluray-2160p Remux, ...). Known labels
 * come from a lookup table; anything else goes through a resolution and
 * source heuristic.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const DEFAULT_QUALITY = 'WEBDL-1080p';

const qualityTable: ReadonlyMap<string, string> = new Map(
  Object.entries(
    z.record(z.string()).parse(
      JSON.parse(readFileSync(new URL('./data/qualities.json', import.meta.url), 'utf8'))
    )
  )
);

function resolutionOf(q: string): string {
  if (q.includes('2160') || q.includes('4k') || q.includes('uhd') || q.includes('ultra hd')) return '2160p';
  if (q.includes('1080')) return '1080p';
  if (q.includes('720')) return '720p';
  if (q.includes('480') || q.includes('sd')) return '480p';
  return '1080p';
}

function sourceOf(q: string): string | null {
  if (q.includes('remux')) return 'Remux';
  if (q.includes('bluray') || q.includes('bdrip') || q.includes('brrip')) return 'Bluray';
  if (q.includes('webrip')) return 'WEBRip';
  if (q.includes('hdlight') || q.includes('web-dl') || q.includes('webdl') || q.includes('web ')) return 'WEBDL';
  if (q.includes('hdtv')) return 'HDTV';
  // DVD carries no resolution
  if (q.includes('dvd')) return null;
  return 'WEBDL';
}

export function normalizeQuality(raw: string | undefined): string {
  if (!raw || raw === 'Unknown') {
    return DEFAULT_QUALITY;
  }

  const known = qualityTable.get(raw);
  if (known) {
    return known;
  }

  const q = raw.toLowerCase();
  const source = sourceOf(q);
  return source === null ? 'DVD' : `${source}-${resolutionOf(q)}`;
}

/**
 * Rank used to order candidates before discovery limits apply; lower is
 * better
 */
export function qualityRank(raw: string | undefined): number {
  const q = (raw ?? '').toUpperCase();
  if (q.includes('ULTRA HD') && !q.includes('LIGHT')) return 0;
  if (q.includes('ULTRA') || q.includes('UHD') || q.includes('2160') || q.includes('4K')) return 1;
  if (q.includes('REMUX')) return 2;
  if (q.includes('BLURAY') && q.includes('1080')) return 3;
  if (q.includes('1080')) return 4;
  if (q.includes('720')) return 5;
  return 6;
}
