/**
 * MusicBrainz Plugin
 *
 * Finds the release group for artist + album (or title) and downloads its
 * front cover from the Cover Art Archive. Needs no credentials but can be
 * switched off per entry.
 */

import { BaseArtworkProvider, getArray, getString, isRecord, type ArtworkImage } from '@pixsync/sdk';
import type { ArtworkRequest, ArtworkSource, MediaSnapshot } from '@pixsync/core';

const SEARCH_URL = 'https://musicbrainz.org/ws/2/release-group';
const COVER_ART_URL = 'https://coverartarchive.org/release-group';

export interface MusicBrainzOptions {
  enabled: boolean;
}

/** Quote a Lucene phrase */
function phrase(value: string): string {
  return `"${value.replace(/["\\]/g, '\\$&')}"`;
}

export class MusicBrainzPlugin extends BaseArtworkProvider {
  readonly id = 'musicbrainz';
  readonly name = 'MusicBrainz / Cover Art Archive';
  readonly source: ArtworkSource = 'musicbrainz';

  constructor(private options: MusicBrainzOptions) {
    super();
  }

  protected checkSnapshot(snapshot: MediaSnapshot): string | null {
    if (!this.options.enabled) return 'disabled';
    return super.checkSnapshot(snapshot);
  }

  protected async findArtwork({ snapshot, signal }: ArtworkRequest): Promise<ArtworkImage | null> {
    const artist = snapshot.artist ?? '';
    const release = snapshot.album ?? snapshot.cleanedTitle ?? snapshot.title ?? '';

    const params = new URLSearchParams({
      query: `artist:${phrase(artist)} AND releasegroup:${phrase(release)}`,
      fmt: 'json',
      limit: '1'
    });
    const search = await this.fetchJson(`${SEARCH_URL}?${params.toString()}`, signal);
    const groupId = getString(getArray(search, 'release-groups')[0], 'id');
    if (!groupId) return null;

    const cover = await this.fetchJson(`${COVER_ART_URL}/${encodeURIComponent(groupId)}`, signal);
    const front = getArray(cover, 'images').find(image => isRecord(image) && image.front === true);
    const imageUrl = getString(front, 'image');
    return imageUrl ? this.fetchImage(imageUrl, signal) : null;
  }
}
