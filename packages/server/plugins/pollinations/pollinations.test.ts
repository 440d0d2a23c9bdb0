import { describe, it, expect, vi } from 'vitest';
import { PollinationsPlugin, buildPollinationsUrl } from './index';
import { artworkRequest, png, requestUrl, routeFetch } from '../test-helpers';

describe('buildPollinationsUrl', () => {
  it('encodes the prompt and requests a 64px image', () => {
    expect(buildPollinationsUrl('Artist - Song, art', 'flux')).toBe(
      'https://image.pollinations.ai/prompt/Artist%20-%20Song%2C%20art?model=flux&width=64&height=64&nologo=true'
    );
  });
});

describe('PollinationsPlugin', () => {
  it('generates artwork for any media kind', async () => {
    const fetchMock = routeFetch([[/image\.pollinations\.ai/, () => png([7, 7])]]);
    vi.stubGlobal('fetch', fetchMock);

    const request = artworkRequest({ media_title: 'Dune', media_content_type: 'movie' });
    const result = await new PollinationsPlugin().attempt({ ...request, aiModel: 'flux' });

    expect(requestUrl(fetchMock.mock.calls[0][0])).toBe(
      buildPollinationsUrl('Dune, movie poster style, cinematic lighting, high detail', 'flux')
    );
    expect(result.status).toBe('found');
    if (result.status === 'found') {
      expect(result.artwork.source).toBe('ai-generated');
    }
  });
});
