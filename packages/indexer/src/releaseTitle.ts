/**
 * Release titles
 * 
 * Builds scene-style titles media managers can parse:
 *   Movie (2021) EXTENDED MULTI WEBDL-1080p [Subs: ENGLISH]
 *   Show S02E05 TRUEFRENCH WEBDL-720p
 *   Show S02 FRENCH+ENGLISH Bluray-1080p
 */

import type { CandidateLink, MediaKind } from '@relayarr/core';
import { normalizeQuality } from './quality.js';

const LANGUAGE_TAGS: Readonly<Record<string, string>> = {
  French: 'FRENCH',
  TrueFrench: 'TRUEFRENCH',
  VFF: 'VFF',
  VFQ: 'VFQ',
  VFI: 'VFI',
  VF2: 'VF2',
  English: 'ENGLISH',
  German: 'GERMAN',
  Spanish: 'SPANISH',
  Italian: 'ITALIAN',
  Portuguese: 'PORTUGUESE',
  Russian: 'RUSSIAN',
  Japanese: 'JAPANESE',
  Korean: 'KOREAN',
  Chinese: 'CHINESE',
  Arabic: 'ARABIC',
  Hindi: 'HINDI',
  'French (Canada)': 'VFQ',
  MULTI: 'MULTI',
  MULTi: 'MULTI',
};

const EDITION_PATTERNS = [
  /\b(EXTENDED)\b/i,
  /\b(THEATRICAL)\b/i,
  /\b(UNRATED)\b/i,
  /\b(UNCUT)\b/i,
  /\b(DIRECTOR'?S?\.?CUT)\b/i,
  /\b(FINAL\.?CUT)\b/i,
  /\b(SPECIAL\.?EDITION)\b/i,
  /\b(REMASTERED)\b/i,
  /\b(ANNIVERSARY)\b/i,
  /\b(COLLECTORS?\.?EDITION)\b/i,
  /\b(CRITERION)\b/i,
  /\b(IMAX)\b/i,
  /\b(3D)\b/i,
  /\b(DC)\b/i,
];

const MAX_AUDIO_LANGUAGES = 3;
const MAX_SUBTITLES = 2;

/** a lone FRENCH track is the norm and stays implicit */
const IMPLICIT_AUDIO = 'FRENCH';

export interface ReleaseTitle {
  /** parsed by clients and used as the job title */
  title: string;
  /** title followed by the hosting service */
  displayTitle: string;
}

export function normalizeLanguage(language: string): string {
  return LANGUAGE_TAGS[language] ?? language.toUpperCase().replace(/ /g, '');
}

export function extractEdition(nfo: string | undefined): string | null {
  if (!nfo) {
    return null;
  }

  for (const pattern of EDITION_PATTERNS) {
    const match = pattern.exec(nfo);
    if (match?.[1]) {
      return match[1]
        .toUpperCase()
        .replace(/\./g, ' ')
        .replace(/'/g, '')
        .replace('DIRECTORS CUT', "DIRECTOR'S CUT")
        .replace('DIRECTORSCUT', "DIRECTOR'S CUT");
    }
  }
  return null;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

function audioTag(languages: readonly string[]): string | null {
  const tags = languages.slice(0, MAX_AUDIO_LANGUAGES).map(normalizeLanguage);
  const [only] = tags;

  if (tags.length > 1) {
    return tags.join('+');
  }
  if (only === undefined || only === IMPLICIT_AUDIO) {
    return null;
  }
  return only;
}

export function buildReleaseTitle(candidate: CandidateLink, kind: MediaKind): ReleaseTitle {
  const parts: string[] = [candidate.title || 'Unknown'];

  if (kind === 'tv' && candidate.season !== undefined) {
    const episode = candidate.episode ?? 0;
    parts.push(episode > 0 ? `S${pad(candidate.season)}E${pad(episode)}` : `S${pad(candidate.season)}`);
  } else if (candidate.year) {
    parts.push(`(${candidate.year})`);
  }

  if (kind !== 'tv') {
    const edition = extractEdition(candidate.nfo);
    if (edition) parts.push(edition);
  }

  const audio = audioTag(candidate.audioLanguages);
  if (audio) parts.push(audio);

  // audio formats are already what clients parse
  parts.push(kind === 'music' ? candidate.quality || 'MP3' : normalizeQuality(candidate.quality));

  if (candidate.subtitles.length > 0) {
    const subs = candidate.subtitles.slice(0, MAX_SUBTITLES).map(normalizeLanguage);
    parts.push(`[Subs: ${subs.join('+')}]`);
  }

  const title = parts.join(' ');
  return { title, displayTitle: `${title} [${candidate.source || 'DDL'}]` };
}
