import { describe, it, expect } from 'vitest';
import type { CandidateLink } from '@relayarr/core';
import { buildReleaseTitle, extractEdition, normalizeLanguage } from './releaseTitle.js';

function candidate(fields: Partial<CandidateLink>): CandidateLink {
  return {
    url: 'https://host.test/a',
    releaseKey: 'k',
    source: '1fichier',
    title: 'Le Film',
    quality: 'HDLight 1080p',
    audioLanguages: [],
    subtitles: [],
    sizeEstimate: 0,
    ...fields,
  };
}

describe('normalizeLanguage', () => {
  it('maps known languages to scene tags', () => {
    expect(normalizeLanguage('TrueFrench')).toBe('TRUEFRENCH');
    expect(normalizeLanguage('French (Canada)')).toBe('VFQ');
    expect(normalizeLanguage('MULTi')).toBe('MULTI');
  });

  it('upper-cases unknown languages without spaces', () => {
    expect(normalizeLanguage('Brazilian Portuguese')).toBe('BRAZILIANPORTUGUESE');
  });
});

describe('extractEdition', () => {
  it('finds editions in release names', () => {
    expect(extractEdition('Movie.2019.EXTENDED.1080p')).toBe('EXTENDED');
    expect(extractEdition('Movie.Special.Edition.720p')).toBe('SPECIAL EDITION');
    expect(extractEdition('Movie.Directors.Cut.1080p')).toBe("DIRECTOR'S CUT");
  });

  it('returns null when nothing matches', () => {
    expect(extractEdition('Video: HEVC 10 bits')).toBeNull();
    expect(extractEdition(undefined)).toBeNull();
  });
});

describe('buildReleaseTitle', () => {
  it('builds movie titles with year and edition, leaving a lone FRENCH implicit', () => {
    const title = buildReleaseTitle(
      candidate({ year: 2021, audioLanguages: ['French'], nfo: 'Movie.EXTENDED.1080p' }),
      'movie'
    );

    expect(title).toEqual({
      title: 'Le Film (2021) EXTENDED WEBDL-1080p',
      displayTitle: 'Le Film (2021) EXTENDED WEBDL-1080p [1fichier]',
    });
  });

  it('caps audio languages at three and subtitles at two', () => {
    const { title } = buildReleaseTitle(
      candidate({
        title: 'Film',
        year: 2020,
        quality: 'ULTRA HD (x265)',
        audioLanguages: ['French', 'English', 'German', 'Spanish'],
        subtitles: ['French', 'English', 'Spanish'],
      }),
      'movie'
    );

    expect(title).toBe('Film (2020) FRENCH+ENGLISH+GERMAN Bluray-2160p [Subs: FRENCH+ENGLISH]');
  });

  it('builds episode titles without edition', () => {
    const { title } = buildReleaseTitle(
      candidate({
        title: 'Show',
        season: 2,
        episode: 5,
        audioLanguages: ['TrueFrench'],
        quality: 'WEB 720p',
        nfo: 'Show.EXTENDED',
      }),
      'tv'
    );

    expect(title).toBe('Show S02E05 TRUEFRENCH WEBDL-720p');
  });

  it('builds season pack titles', () => {
    const { title } = buildReleaseTitle(
      candidate({ title: 'Show', season: 1, audioLanguages: ['VFF'], quality: '1080p' }),
      'tv'
    );

    expect(title).toBe('Show S01 VFF WEBDL-1080p');
  });

  it('keeps the audio format for music and defaults the host', () => {
    const result = buildReleaseTitle(
      candidate({ title: 'Album', year: 2020, quality: 'FLAC', source: '' }),
      'music'
    );

    expect(result).toEqual({ title: 'Album (2020) FLAC', displayTitle: 'Album (2020) FLAC [DDL]' });
  });
});
