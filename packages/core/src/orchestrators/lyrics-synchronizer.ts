/**
 * LyricsSynchronizer - Keeps the displayed lyric line in step with playback
 *
 * Lyrics are fetched once per track from the registered lyrics providers
 * (highest priority first). A polling timer estimates the playback
 * position, applies the user offset and pushes line changes to a sink.
 * Missing lyrics and sink failures never reach the display pipeline.
 */

import type { AddonRegistry } from '../registry/addon-registry';
import type { LyricsLine, LyricsTrack, MediaSnapshot } from '../types/index';
import { EventEmitter } from '../utils/event-emitter';
import { scopedSignal } from '../utils/abort';
import { errorMessage } from '../errors';
import { estimatePositionSec } from '../services/media-snapshot';

export const LYRICS_OFFSET_MIN = -10;
export const LYRICS_OFFSET_MAX = 10;

/** Longest a line stays up before it is cleared */
const MAX_LINE_DURATION_MS = 15000;
const LAST_LINE_DURATION_MS = 10000;

/**
 * Clamp an offset to [-10, 10] whole seconds. Non-numbers become 0.
 */
export function clampLyricsOffset(value: number): number {
  if (!Number.isFinite(value)) return 0;
  const rounded = Math.round(value);
  // Avoid -0
  return Math.min(LYRICS_OFFSET_MAX, Math.max(LYRICS_OFFSET_MIN, rounded)) || 0;
}

/**
 * Index of the last line whose time is at or before position + offset,
 * or -1 before the first line.
 */
export function findLineIndex(lines: LyricsLine[], positionMs: number, offsetSec: number): number {
  const target = positionMs + offsetSec * 1000;
  let index = -1;
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line && line.time <= target) {
      index = i;
    } else {
      break;
    }
  }
  return index;
}

/**
 * How long a line stays on screen before it is cleared
 */
export function lineDisplayDuration(lines: LyricsLine[], index: number): number {
  const current = lines[index];
  const next = lines[index + 1];
  if (!current || !next) return LAST_LINE_DURATION_MS;
  return Math.min(Math.max(0, next.time - current.time), MAX_LINE_DURATION_MS);
}

export interface LyricsSink {
  show(line: LyricsLine): Promise<void>;
  clear(): Promise<void>;
}

export type LyricsEvents = {
  'lyrics-loaded': { track: LyricsTrack | null };
  'line-change': { index: number; line: LyricsLine | null };
  'error': { message: string };
};

export interface LyricsSynchronizerOptions {
  pollIntervalMs?: number;
  fetchTimeoutMs?: number;
  now?: () => number;
}

export class LyricsSynchronizer extends EventEmitter<LyricsEvents> {
  private track: LyricsTrack | null = null;
  private trackKey: string | null = null;
  private snapshot: MediaSnapshot | null = null;
  private offsetSec = 0;
  private currentIndex = -1;
  private loadToken = 0;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private clearTimer: ReturnType<typeof setTimeout> | null = null;
  /** Set while a tick is waiting on the sink */
  private ticking = false;

  private pollIntervalMs: number;
  private fetchTimeoutMs: number;
  private now: () => number;

  constructor(
    private registry: AddonRegistry,
    private sink: LyricsSink,
    options: LyricsSynchronizerOptions = {}
  ) {
    super();
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 10000;
    this.now = options.now ?? Date.now;
  }

  // ========================================
  // Offset
  // ========================================

  getOffset(): number {
    return this.offsetSec;
  }

  /**
   * Returns the offset actually applied
   */
  setOffset(value: number): number {
    this.offsetSec = clampLyricsOffset(value);
    // Re-evaluate on the next tick
    this.currentIndex = -1;
    return this.offsetSec;
  }

  // ========================================
  // Track loading
  // ========================================

  getTrack(): LyricsTrack | null {
    return this.track;
  }

  getCurrentIndex(): number {
    return this.currentIndex;
  }

  updateSnapshot(snapshot: MediaSnapshot): void {
    this.snapshot = snapshot;
  }

  /**
   * Fetch lyrics for the snapshot's track unless they are already loaded
   */
  async load(snapshot: MediaSnapshot, signal?: AbortSignal): Promise<LyricsTrack | null> {
    this.snapshot = snapshot;
    const { artist, title } = snapshot;

    if (!artist || !title) {
      this.setTrack(null, null);
      return null;
    }

    const key = `${artist.toLowerCase()}\u0000${title.toLowerCase()}`;
    if (key === this.trackKey) {
      return this.track;
    }

    this.setTrack(key, null);
    const token = ++this.loadToken;

    for (const provider of this.registry.getLyricsProviders()) {
      const scoped = scopedSignal(this.fetchTimeoutMs, signal);
      let result: LyricsTrack | null = null;

      try {
        result = await provider.getLyrics(
          {
            artist,
            title,
            album: snapshot.album ?? undefined,
            durationSec: snapshot.durationSec ?? undefined
          },
          { signal: scoped.signal }
        );
      } catch (error) {
        console.warn(`[LyricsSynchronizer] ${provider.id} failed:`, errorMessage(error));
        continue;
      } finally {
        scoped.dispose();
      }

      // A newer track started loading meanwhile
      if (token !== this.loadToken) return null;

      if (result && result.lines.length > 0) {
        this.track = result;
        this.emit('lyrics-loaded', { track: result });
        return result;
      }
    }

    if (token !== this.loadToken) return null;
    this.emit('lyrics-loaded', { track: null });
    return null;
  }

  private setTrack(key: string | null, track: LyricsTrack | null): void {
    this.trackKey = key;
    this.track = track;
    this.currentIndex = -1;
    this.cancelClearTimer();
  }

  // ========================================
  // Polling
  // ========================================

  start(): void {
    if (this.pollTimer) return;
    this.pollTimer = setInterval(() => {
      this.tick().catch(error => {
        console.error('[LyricsSynchronizer] Tick failed:', error);
      });
    }, this.pollIntervalMs);
  }

  stop(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    this.cancelClearTimer();
    this.currentIndex = -1;
  }

  isRunning(): boolean {
    return this.pollTimer !== null;
  }

  /**
   * Re-evaluate the current line and push a change to the sink. A tick
   * that starts while another is still drawing is skipped.
   */
  async tick(): Promise<void> {
    if (this.ticking) return;
    this.ticking = true;
    try {
      await this.evaluate();
    } finally {
      this.ticking = false;
    }
  }

  private async evaluate(): Promise<void> {
    const track = this.track;
    const snapshot = this.snapshot;
    if (!track || !snapshot || snapshot.state !== 'playing') return;

    const positionSec = estimatePositionSec(snapshot, this.now());
    if (positionSec === null) return;

    const index = findLineIndex(track.lines, positionSec * 1000, this.offsetSec);
    if (index === this.currentIndex) return;

    this.currentIndex = index;
    this.cancelClearTimer();

    const line = track.lines[index];
    if (!line) {
      this.emit('line-change', { index, line: null });
      return;
    }

    try {
      await this.sink.clear();
      await this.sink.show(line);
      this.emit('line-change', { index, line });
    } catch (error) {
      this.emit('error', { message: errorMessage(error) });
      return;
    }

    // Offset change, stop or new track while drawing
    if (index !== this.currentIndex || track !== this.track) return;

    this.cancelClearTimer();
    this.clearTimer = setTimeout(() => {
      this.clearTimer = null;
      this.sink.clear().catch(error => {
        this.emit('error', { message: errorMessage(error) });
      });
    }, lineDisplayDuration(track.lines, index));
  }

  private cancelClearTimer(): void {
    if (this.clearTimer) {
      clearTimeout(this.clearTimer);
      this.clearTimer = null;
    }
  }

  dispose(): void {
    this.stop();
    this.setTrack(null, null);
    this.snapshot = null;
    this.removeAllListeners();
  }
}
