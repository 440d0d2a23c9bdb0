/**
 * Last.fm Plugin
 *
 * Album artwork from `album.getinfo`, or from `track.getInfo` when the
 * player reports no album. Picks the largest image size available.
 */

import { BaseArtworkProvider, getArray, getRecord, getString, type ArtworkImage } from '@pixsync/sdk';
import type { ArtworkRequest, ArtworkSource } from '@pixsync/core';

const API_URL = 'https://ws.audioscrobbler.com/2.0/';
const SIZE_PREFERENCE = ['mega', 'extralarge', 'large', 'medium'];

export interface LastfmOptions {
  apiKey?: string;
}

/**
 * Largest usable image URL in a Last.fm `image` array
 */
export function pickLastfmImage(images: unknown[]): string | null {
  for (const size of SIZE_PREFERENCE) {
    const match = images.find(image => getString(image, 'size') === size);
    const url = getString(match, '#text');
    if (url) return url;
  }
  return null;
}

export class LastfmPlugin extends BaseArtworkProvider {
  readonly id = 'lastfm';
  readonly name = 'Last.fm';
  readonly source: ArtworkSource = 'lastfm';

  constructor(private options: LastfmOptions) {
    super();
  }

  protected missingCredentials(): string | null {
    return this.options.apiKey ? null : 'lastfm.apiKey';
  }

  protected async findArtwork({ snapshot, signal }: ArtworkRequest): Promise<ArtworkImage | null> {
    const params = new URLSearchParams({
      api_key: this.options.apiKey ?? '',
      artist: snapshot.artist ?? '',
      format: 'json'
    });

    let images: unknown[];
    if (snapshot.album) {
      params.set('method', 'album.getinfo');
      params.set('album', snapshot.album);
      const body = await this.fetchJson(`${API_URL}?${params.toString()}`, signal);
      images = getArray(getRecord(body, 'album'), 'image');
    } else {
      params.set('method', 'track.getInfo');
      params.set('track', snapshot.cleanedTitle ?? snapshot.title ?? '');
      const body = await this.fetchJson(`${API_URL}?${params.toString()}`, signal);
      images = getArray(getRecord(getRecord(body, 'track'), 'album'), 'image');
    }

    const url = pickLastfmImage(images);
    return url ? this.fetchImage(url, signal) : null;
  }
}
