import { describe, it, expect, vi } from 'vitest';
import { LrclibLyricsPlugin } from './index';
import { json } from '../test-helpers';

describe('LrclibLyricsPlugin', () => {
  const plugin = new LrclibLyricsPlugin();

  it('includes album and rounded duration when known', () => {
    expect(plugin.buildUrl({ artist: 'Artist B', title: 'Song A', album: 'Album C', durationSec: 201.6 })).toBe(
      'https://lrclib.net/api/get?artist_name=Artist+B&track_name=Song+A&album_name=Album+C&duration=202'
    );
    expect(plugin.buildUrl({ artist: 'Artist B', title: 'Song A' })).toBe(
      'https://lrclib.net/api/get?artist_name=Artist+B&track_name=Song+A'
    );
  });

  it('parses synced lyrics', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => json({
      plainLyrics: 'Hello\nWorld',
      syncedLyrics: '[00:01.00] Hello\n[00:04.50] World'
    })));

    const track = await plugin.getLyrics({ artist: 'Artist B', title: 'Song A' });

    expect(track?.source).toBe('lrclib');
    expect(track?.lines).toEqual([
      { time: 1000, text: 'Hello' },
      { time: 4500, text: 'World' }
    ]);
  });

  it('ignores plain-only lyrics', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => json({ plainLyrics: 'Hello', syncedLyrics: null })));

    expect(await plugin.getLyrics({ artist: 'Artist B', title: 'Song A' })).toBeNull();
  });
});
