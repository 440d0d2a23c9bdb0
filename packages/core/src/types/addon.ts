/**
 * Provider contracts for artwork and lyrics sources
 */

import type {
  AiModel,
  ArtworkSource,
  LyricsTrack,
  MediaSnapshot,
  ResolvedArtwork
} from './index';

export type AddonRole = 'artwork-provider' | 'lyrics-provider';

export interface AddonManifest {
  id: string;
  name: string;
  version: string;
  description?: string;
  roles: AddonRole[];
}

export interface BaseAddon {
  readonly manifest: AddonManifest;
  initialize(): Promise<void>;
  dispose(): Promise<void>;
}

// ========================================
// Artwork
// ========================================

export interface ArtworkRequest {
  snapshot: MediaSnapshot;
  aiModel: AiModel;
  /** Aborted when the attempt times out or the run is superseded */
  signal: AbortSignal;
}

/**
 * Result of a single provider attempt. `skipped` covers missing
 * credentials and inapplicable media and is never counted as a failure.
 */
export type ArtworkAttemptResult =
  | { status: 'found'; artwork: ResolvedArtwork }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; reason: string };

export interface ArtworkProvider extends BaseAddon {
  readonly id: string;
  readonly source: ArtworkSource;
  attempt(request: ArtworkRequest): Promise<ArtworkAttemptResult>;
}

// ========================================
// Lyrics
// ========================================

export interface LyricsQuery {
  artist: string;
  title: string;
  album?: string;
  durationSec?: number;
}

export interface LyricsSearchOptions {
  signal?: AbortSignal;
}

export interface LyricsProvider extends BaseAddon {
  readonly id: string;
  /** Higher is tried first */
  readonly priority: number;
  getLyrics(query: LyricsQuery, options?: LyricsSearchOptions): Promise<LyricsTrack | null>;
}
