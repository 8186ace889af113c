/**
 * Release size heuristics
 * 
 * Order of preference:
 *   1. size declared in the NFO (trusted from 100 MB up)
 *   2. provider-reported size above 100 MB
 *   3. estimate from the quality tier and media kind
 */

import type { CandidateLink, MediaKind } from '@relayarr/core';
import { GIB, MIB } from '@relayarr/utils';

const MIN_TRUSTED_SIZE = 100_000_000;

const NFO_SIZE_PATTERNS = [
  /File\s*size\s*:\s*([\d.,]+)\s*(GiB|GB|MiB|MB)/i,
  /Size\s*:\s*([\d.,]+)\s*(GiB|GB|MiB|MB)/i,
];

/** [marker, episode GB, movie GB]; the first marker found wins */
const SIZE_TIERS: ReadonlyArray<readonly [string, number, number]> = [
  ['REMUX UHD', 50, 70],
  ['REMUX 4K', 50, 70],
  ['ULTRA HD', 7, 15],
  ['UHD', 7, 15],
  ['2160', 6, 12],
  ['REMUX', 25, 40],
  ['BLURAY 1080', 4, 10],
  ['1080', 2, 5],
  ['HDLIGHT 1080', 1.5, 4],
  ['720', 1, 2.5],
  ['HDLIGHT 720', 0.8, 2],
  ['DVD', 0.7, 1.5],
  ['480', 0.5, 1.2],
];

const SEASON_PACK_EPISODES = 10;
const ALBUM_GB = 0.5;

export function extractNfoSize(nfo: string | undefined): number | null {
  if (!nfo) {
    return null;
  }

  for (const pattern of NFO_SIZE_PATTERNS) {
    const match = pattern.exec(nfo);
    if (!match?.[1] || !match[2]) {
      continue;
    }

    const value = Number(match[1].replace(/,/g, '.'));
    if (Number.isNaN(value)) {
      continue;
    }

    const unit = match[2].toUpperCase();
    return Math.floor(value * (unit === 'GIB' || unit === 'GB' ? GIB : MIB));
  }

  return null;
}

export function estimateSize(quality: string, kind: MediaKind, seasonPack = false): number {
  const q = quality.toUpperCase();
  const tier = SIZE_TIERS.find(([marker]) => q.includes(marker));
  const episodeGb = tier?.[1] ?? 1.5;
  const movieGb = tier?.[2] ?? 4;

  let gb: number;
  if (kind === 'tv') {
    gb = seasonPack ? episodeGb * SEASON_PACK_EPISODES : episodeGb;
  } else if (kind === 'music') {
    gb = ALBUM_GB;
  } else {
    gb = movieGb;
  }

  return Math.floor(gb * GIB);
}

export function isSeasonPack(candidate: CandidateLink): boolean {
  return candidate.episode === undefined || candidate.episode === 0;
}

export function releaseSize(candidate: CandidateLink, kind: MediaKind): number {
  const declared = extractNfoSize(candidate.nfo);
  if (declared !== null && declared >= MIN_TRUSTED_SIZE) {
    return declared;
  }
  if (candidate.sizeEstimate > MIN_TRUSTED_SIZE) {
    return candidate.sizeEstimate;
  }
  return estimateSize(candidate.quality, kind, isSeasonPack(candidate));
}
