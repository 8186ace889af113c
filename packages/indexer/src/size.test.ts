import { describe, it, expect } from 'vitest';
import type { CandidateLink } from '@relayarr/core';
import { estimateSize, extractNfoSize, releaseSize } from './size.js';

const GIB = 1024 * 1024 * 1024;

function candidate(fields: Partial<CandidateLink>): CandidateLink {
  return {
    url: 'https://host.test/a',
    releaseKey: 'k',
    source: 'host',
    title: 'Title',
    quality: 'WEB 720p',
    audioLanguages: [],
    subtitles: [],
    sizeEstimate: 0,
    ...fields,
  };
}

describe('extractNfoSize', () => {
  it('reads the declared file size', () => {
    expect(extractNfoSize('General\nFile size : 6.75 GiB\n')).toBe(7247757312);
    expect(extractNfoSize('Size: 700 MiB')).toBe(734003200);
    expect(extractNfoSize('File size: 2,5 GB')).toBe(2684354560);
  });

  it('returns null without a size line', () => {
    expect(extractNfoSize('Duration: 1h 50min')).toBeNull();
    expect(extractNfoSize(undefined)).toBeNull();
  });
});

describe('estimateSize', () => {
  it('uses the first matching quality tier', () => {
    expect(estimateSize('WEB 1080p', 'movie')).toBe(5 * GIB);
    // the plain 1080 tier comes before the HDLight one
    expect(estimateSize('HDLight 1080p', 'movie')).toBe(5 * GIB);
    expect(estimateSize('ULTRA HD (x265)', 'tv')).toBe(7 * GIB);
  });

  it('multiplies season packs', () => {
    expect(estimateSize('REMUX UHD', 'tv', true)).toBe(500 * GIB);
  });

  it('falls back to defaults', () => {
    expect(estimateSize('whatever', 'movie')).toBe(4 * GIB);
    expect(estimateSize('whatever', 'tv')).toBe(1610612736);
    expect(estimateSize('FLAC', 'music')).toBe(536870912);
  });
});

describe('releaseSize', () => {
  it('prefers a plausible NFO size', () => {
    expect(releaseSize(candidate({ nfo: 'File size: 1.5 GiB', sizeEstimate: 3 * GIB }), 'movie')).toBe(1610612736);
  });

  it('falls back to the provider size above 100 MB', () => {
    expect(releaseSize(candidate({ nfo: 'File size: 50 MiB', sizeEstimate: 2_000_000_000 }), 'movie')).toBe(2_000_000_000);
  });

  it('estimates when neither is usable', () => {
    expect(releaseSize(candidate({ sizeEstimate: 100_000_000 }), 'movie')).toBe(2684354560);
    expect(releaseSize(candidate({ episode: 3 }), 'tv')).toBe(GIB);
    expect(releaseSize(candidate({}), 'tv')).toBe(10 * GIB);
  });
});
