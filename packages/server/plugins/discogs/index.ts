/**
 * Discogs Plugin
 *
 * Searches Discogs releases by artist and album (or title) and uses the
 * first result's cover image.
 */

import { BaseArtworkProvider, getArray, getString, type ArtworkImage } from '@pixsync/sdk';
import type { ArtworkRequest, ArtworkSource } from '@pixsync/core';

const SEARCH_URL = 'https://api.discogs.com/database/search';

export interface DiscogsOptions {
  token?: string;
}

export class DiscogsPlugin extends BaseArtworkProvider {
  readonly id = 'discogs';
  readonly name = 'Discogs';
  readonly source: ArtworkSource = 'discogs';

  constructor(private options: DiscogsOptions) {
    super();
  }

  protected missingCredentials(): string | null {
    return this.options.token ? null : 'discogs.token';
  }

  protected async findArtwork({ snapshot, signal }: ArtworkRequest): Promise<ArtworkImage | null> {
    const params = new URLSearchParams({
      type: 'release',
      artist: snapshot.artist ?? '',
      release_title: snapshot.album ?? snapshot.cleanedTitle ?? snapshot.title ?? '',
      format: 'album',
      per_page: '5'
    });

    const auth = { 'Authorization': `Discogs token=${this.options.token ?? ''}` };
    const body = await this.fetchJson(`${SEARCH_URL}?${params.toString()}`, signal, auth);

    const coverUrl = getArray(body, 'results')
      .map(result => getString(result, 'cover_image'))
      .find((url): url is string => url !== null && !url.endsWith('spacer.gif'));

    return coverUrl ? this.fetchImage(coverUrl, signal, auth) : null;
  }
}
