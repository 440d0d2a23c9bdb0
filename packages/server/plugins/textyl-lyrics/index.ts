/**
 * Textyl Lyrics Plugin
 *
 * Timed lyrics from api.textyl.co. The API answers with an HTML page
 * instead of JSON when it has nothing for the track.
 */

import { BaseLyricsProvider, getNumber, getString } from '@pixsync/sdk';
import type { LyricsLine, LyricsQuery, LyricsSearchOptions, LyricsTrack } from '@pixsync/core';

const API_URL = 'https://api.textyl.co/api/lyrics';

export class TextylLyricsPlugin extends BaseLyricsProvider {
  readonly id = 'textyl';
  readonly name = 'Textyl';
  readonly priority = 60;

  buildUrl(query: LyricsQuery): string {
    return `${API_URL}/${encodeURIComponent(this.slugify(query.artist))}/${encodeURIComponent(this.slugify(query.title))}`;
  }

  async getLyrics(query: LyricsQuery, options?: LyricsSearchOptions): Promise<LyricsTrack | null> {
    const response = await this.fetchText(this.buildUrl(query), options?.signal);
    if (!response) return null;

    const body = response.body.trim();
    if (body.startsWith('<') || response.contentType.includes('text/html')) {
      return null;
    }

    const lines = this.parseTimedJson(JSON.parse(body));
    if (lines.length === 0) return null;

    return { artist: query.artist, title: query.title, source: this.id, lines };
  }

  /**
   * `[{ seconds, lyrics }]` to millisecond lines. Entries without a
   * timestamp mean the track has no timing, so the whole list is discarded.
   */
  protected parseTimedJson(data: unknown): LyricsLine[] {
    if (!Array.isArray(data)) return [];

    const lines: LyricsLine[] = [];
    for (const item of data) {
      const seconds = getNumber(item, 'seconds');
      const text = getString(item, 'lyrics')?.trim();
      if (seconds === null) return [];
      if (text) {
        lines.push({ time: Math.round(seconds * 1000), text });
      }
    }

    return lines.sort((a, b) => a.time - b.time);
  }
}
