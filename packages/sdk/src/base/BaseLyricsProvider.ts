/**
 * Base class for lyrics providers with helper methods
 */

import type {
  AddonManifest,
  LyricsLine,
  LyricsProvider,
  LyricsQuery,
  LyricsSearchOptions,
  LyricsTrack
} from '@pixsync/core';
import { DEFAULT_USER_AGENT } from './BaseArtworkProvider';

export abstract class BaseLyricsProvider implements LyricsProvider {
  abstract readonly id: string;
  abstract readonly name: string;
  readonly priority: number = 50;

  get manifest(): AddonManifest {
    return {
      id: this.id,
      name: this.name,
      version: '1.0.0',
      roles: ['lyrics-provider']
    };
  }

  async initialize(): Promise<void> {
    // Override in subclass if needed
  }

  async dispose(): Promise<void> {
    // Override in subclass if needed
  }

  abstract getLyrics(query: LyricsQuery, options?: LyricsSearchOptions): Promise<LyricsTrack | null>;

  /**
   * Helper: GET a response body, returning null on 404
   */
  protected async fetchText(url: string, signal?: AbortSignal): Promise<{ body: string; contentType: string } | null> {
    const response = await fetch(url, {
      headers: { 'User-Agent': DEFAULT_USER_AGENT },
      signal
    });

    if (response.status === 404) return null;
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }

    return {
      body: await response.text(),
      contentType: response.headers.get('content-type') ?? ''
    };
  }

  /**
   * Helper: Parse LRC format to synced lyrics
   */
  protected parseLrc(lrc: string): LyricsLine[] {
    const lines: LyricsLine[] = [];
    const regex = /\[(\d{2}):(\d{2})\.(\d{2,3})\](.*)/g;
    let match: RegExpExecArray | null;

    while ((match = regex.exec(lrc)) !== null) {
      const [, minutes = '0', seconds = '0', fraction = '0', rest = ''] = match;
      const ms = parseInt(fraction.padEnd(3, '0'), 10);
      const time = (parseInt(minutes, 10) * 60 * 1000) + (parseInt(seconds, 10) * 1000) + ms;
      const text = rest.trim();

      if (text) {
        lines.push({ time, text });
      }
    }

    return lines.sort((a, b) => a.time - b.time);
  }

  /**
   * Helper: Slug used in path-based lyrics APIs ("Don't Stop" -> "Dont-Stop")
   */
  protected slugify(value: string): string {
    return value
      .replace(/[^\w\s-]/g, '')
      .trim()
      .replace(/\s+/g, '-');
  }
}
