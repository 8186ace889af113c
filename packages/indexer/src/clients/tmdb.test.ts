import { describe, it, expect, vi, afterEach } from 'vitest';
import { TmdbTitleResolver } from './tmdb.js';

function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('TmdbTitleResolver', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const resolver = new TmdbTitleResolver({ apiKey: 'test-key', language: 'fr-FR', baseUrl: 'https://tmdb.test' });

  it('resolves IMDb ids through the find endpoint', async () => {
    const urls: URL[] = [];
    vi.stubGlobal('fetch', vi.fn(async (input: string | URL | Request) => {
      urls.push(new URL(String(input)));
      return json({ movie_results: [{ title: 'Le Titre', original_title: 'The Title' }], tv_results: [] });
    }));

    expect(await resolver.resolve({ kind: 'imdb', id: '123' })).toBe('The Title');
    expect(urls[0]?.pathname).toBe('/3/find/tt123');
    expect(urls[0]?.searchParams.get('external_source')).toBe('imdb_id');
    expect(urls[0]?.searchParams.get('language')).toBe('fr-FR');
    expect(urls[0]?.searchParams.get('api_key')).toBe('test-key');
  });

  it('falls back to the localized name', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => json({ name: 'Nom', original_name: '' })));

    expect(await resolver.resolve({ kind: 'tmdb', id: '42', mediaKind: 'tv' })).toBe('Nom');
  });

  it('resolves to null on API errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => json({}, 500)));

    expect(await resolver.resolve({ kind: 'tvdb', id: '7' })).toBeNull();
  });

  it('does not call the API without a key', async () => {
    const fetchMock = vi.fn(async () => json({}));
    vi.stubGlobal('fetch', fetchMock);

    const unkeyed = new TmdbTitleResolver({ apiKey: '', language: 'en-US' });

    expect(await unkeyed.resolve({ kind: 'imdb', id: 'tt1' })).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
