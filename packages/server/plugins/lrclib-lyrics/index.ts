/**
 * LRCLIB Lyrics Plugin
 *
 * Synced lyrics from lrclib.net, used when Textyl has nothing.
 */

import { BaseLyricsProvider, getString } from '@pixsync/sdk';
import type { LyricsQuery, LyricsSearchOptions, LyricsTrack } from '@pixsync/core';

const API_URL = 'https://lrclib.net/api/get';

export class LrclibLyricsPlugin extends BaseLyricsProvider {
  readonly id = 'lrclib';
  readonly name = 'LRCLIB';
  readonly priority = 40;

  buildUrl(query: LyricsQuery): string {
    const params = new URLSearchParams({
      artist_name: query.artist,
      track_name: query.title
    });
    if (query.album) params.set('album_name', query.album);
    if (query.durationSec) params.set('duration', String(Math.round(query.durationSec)));
    return `${API_URL}?${params.toString()}`;
  }

  async getLyrics(query: LyricsQuery, options?: LyricsSearchOptions): Promise<LyricsTrack | null> {
    const response = await this.fetchText(this.buildUrl(query), options?.signal);
    if (!response) return null;

    const body: unknown = JSON.parse(response.body);
    const synced = getString(body, 'syncedLyrics');
    if (!synced) return null;

    const lines = this.parseLrc(synced);
    if (lines.length === 0) return null;

    return { artist: query.artist, title: query.title, source: this.id, lines };
  }
}
