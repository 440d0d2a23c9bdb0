import { describe, it, expect, vi } from 'vitest';
import { SpotifyPlugin } from './index';
import { artworkRequest, json, png, requestUrl, routeFetch } from '../test-helpers';

const SONG = { media_title: 'Song A', media_artist: 'Artist B' };

describe('SpotifyPlugin', () => {
  it('names the first missing credential', async () => {
    expect(await new SpotifyPlugin({}).attempt(artworkRequest(SONG)))
      .toEqual({ status: 'skipped', reason: 'credentials missing: spotify.clientId' });
    expect(await new SpotifyPlugin({ clientId: 'test-id' }).attempt(artworkRequest(SONG)))
      .toEqual({ status: 'skipped', reason: 'credentials missing: spotify.clientSecret' });
  });

  it('caches the access token between lookups', async () => {
    const fetchMock = routeFetch([
      [/accounts\.spotify\.com/, () => json({ access_token: 'test-token', expires_in: 3600 })],
      [/api\.spotify\.com\/v1\/search/, () => json({
        tracks: { items: [{ album: { images: [{ url: 'http://img.test/album.jpg' }] } }] }
      })],
      [/img\.test\/album\.jpg/, () => png()]
    ]);
    vi.stubGlobal('fetch', fetchMock);

    const plugin = new SpotifyPlugin({ clientId: 'test-id', clientSecret: 'test-secret' });
    const first = await plugin.attempt(artworkRequest(SONG));
    const second = await plugin.attempt(artworkRequest(SONG));

    expect(first.status).toBe('found');
    expect(second.status).toBe('found');

    const tokenCalls = fetchMock.mock.calls.filter(([input]) => requestUrl(input).includes('accounts.spotify.com'));
    expect(tokenCalls).toHaveLength(1);

    const searchCall = fetchMock.mock.calls.find(([input]) => requestUrl(input).includes('/v1/search'));
    const searchUrl = new URL(requestUrl(searchCall ? searchCall[0] : ''));
    expect(searchUrl.searchParams.get('q')).toBe('artist:Artist B track:Song A');
    expect(searchCall?.[1]?.headers).toMatchObject({ Authorization: 'Bearer test-token' });
  });

  it('falls back to the artist picture when the album has none', async () => {
    vi.stubGlobal('fetch', routeFetch([
      [/accounts\.spotify\.com/, () => json({ access_token: 'test-token', expires_in: 3600 })],
      [/\/v1\/search/, () => json({
        tracks: { items: [{ album: { images: [] }, artists: [{ id: 'artist-1' }] }] }
      })],
      [/\/v1\/artists\/artist-1/, () => json({ images: [{ url: 'http://img.test/artist.jpg' }] })],
      [/img\.test\/artist\.jpg/, () => png()]
    ]));

    const result = await new SpotifyPlugin({ clientId: 'test-id', clientSecret: 'test-secret' })
      .attempt(artworkRequest(SONG));

    expect(result.status).toBe('found');
    if (result.status === 'found') {
      expect(result.artwork.url).toBe('http://img.test/artist.jpg');
    }
  });

  it('fails when the token request is rejected', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('denied', { status: 401 })));

    const result = await new SpotifyPlugin({ clientId: 'test-id', clientSecret: 'test-secret' })
      .attempt(artworkRequest(SONG));

    expect(result).toEqual({ status: 'failed', reason: 'token request failed: HTTP 401' });
  });
});
