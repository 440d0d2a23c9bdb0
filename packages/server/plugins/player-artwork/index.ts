/**
 * Player Artwork Plugin
 *
 * Downloads the artwork the media player itself reports (`entity_picture`).
 * Relative proxy paths are resolved against the host platform's base URL
 * and fetched with its access token.
 */

import { BaseArtworkProvider, type ArtworkImage } from '@pixsync/sdk';
import type { ArtworkRequest, ArtworkSource, MediaSnapshot } from '@pixsync/core';

export interface PlayerArtworkOptions {
  /** Turn a possibly relative artwork path into an absolute URL */
  resolveUrl: (path: string) => string;
  /** Extra headers for host-relative URLs (e.g. Authorization) */
  hostHeaders?: () => Record<string, string>;
}

export class PlayerArtworkPlugin extends BaseArtworkProvider {
  readonly id = 'player-artwork';
  readonly name = 'Media Player Artwork';
  readonly source: ArtworkSource = 'player';

  constructor(private options: PlayerArtworkOptions) {
    super();
  }

  protected checkSnapshot(snapshot: MediaSnapshot): string | null {
    return snapshot.artworkUrl ? null : 'player reported no artwork';
  }

  protected async findArtwork({ snapshot, signal }: ArtworkRequest): Promise<ArtworkImage | null> {
    if (!snapshot.artworkUrl) return null;

    const isRelative = snapshot.artworkUrl.startsWith('/');
    const url = this.options.resolveUrl(snapshot.artworkUrl);
    const headers = isRelative && this.options.hostHeaders ? this.options.hostHeaders() : {};
    return this.fetchImage(url, signal, headers);
  }
}
