/**
 * Newznab category table
 * 
 * Client-facing category codes. The table is part of the wire contract
 * and must not drift: movies 2000, TV 5000, audio 3000.
 */

import type { MediaKind } from '@relayarr/core';
import { normalizeQuality } from './quality.js';

export interface Category {
  id: number;
  name: string;
}

export interface CategoryGroup extends Category {
  kind: MediaKind;
  subcategories: readonly Category[];
}

export const CATEGORY_TABLE: readonly CategoryGroup[] = [
  {
    id: 2000,
    name: 'Movies',
    kind: 'movie',
    subcategories: [
      { id: 2010, name: 'Movies/Foreign' },
      { id: 2020, name: 'Movies/Other' },
      { id: 2030, name: 'Movies/SD' },
      { id: 2040, name: 'Movies/HD' },
      { id: 2045, name: 'Movies/UHD' },
      { id: 2050, name: 'Movies/BluRay' },
      { id: 2060, name: 'Movies/3D' },
    ],
  },
  {
    id: 5000,
    name: 'TV',
    kind: 'tv',
    subcategories: [
      { id: 5010, name: 'TV/WEB-DL' },
      { id: 5020, name: 'TV/Foreign' },
      { id: 5030, name: 'TV/SD' },
      { id: 5040, name: 'TV/HD' },
      { id: 5045, name: 'TV/UHD' },
      { id: 5070, name: 'TV/Anime' },
    ],
  },
  {
    id: 3000,
    name: 'Audio',
    kind: 'music',
    subcategories: [
      { id: 3010, name: 'Audio/MP3' },
      { id: 3040, name: 'Audio/Lossless' },
    ],
  },
];

const includesAny = (text: string, needles: readonly string[]): boolean =>
  needles.some(needle => text.includes(needle));

/**
 * Sub-category for a normalized quality string
 */
export function categoryFor(quality: string, kind: MediaKind): number {
  const q = quality.toLowerCase();

  switch (kind) {
    case 'movie':
      if (includesAny(q, ['2160', 'uhd'])) return 2045;
      if (includesAny(q, ['remux', 'bluray'])) return 2050;
      if (includesAny(q, ['1080', '720'])) return 2040;
      if (includesAny(q, ['sd', 'dvd', '480'])) return 2030;
      return 2040;
    case 'tv':
      if (includesAny(q, ['2160', 'uhd'])) return 5045;
      if (includesAny(q, ['1080', '720'])) return 5040;
      if (q.includes('web')) return 5010;
      return 5040;
    case 'music':
      return includesAny(q, ['flac', 'lossless']) ? 3040 : 3010;
  }
}

/**
 * Category for a provider quality label, matched against both the label
 * and its normalized form
 */
export function releaseCategory(rawQuality: string, kind: MediaKind): number {
  return categoryFor(`${rawQuality} ${normalizeQuality(rawQuality)}`, kind);
}

/**
 * Media kind implied by requested categories; movies when nothing else
 * matches
 */
export function kindForCategories(categories: readonly number[] = []): MediaKind {
  if (categories.some(c => c >= 3000 && c < 4000)) return 'music';
  if (categories.some(c => c >= 5000 && c < 6000)) return 'tv';
  return 'movie';
}

/**
 * Parse a comma-separated `cat` parameter, ignoring anything non-numeric
 */
export function parseCategories(raw: string | undefined): number[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(',')
    .map(part => part.trim())
    .filter(part => /^\d+$/.test(part))
    .map(Number);
}
