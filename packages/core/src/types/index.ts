/**
 * Core domain types shared by the resolver, synchronizer and server
 */

// ========================================
// Media
// ========================================

export type MediaState =
  | 'playing'
  | 'paused'
  | 'buffering'
  | 'idle'
  | 'off'
  | 'standby'
  | 'on'
  | 'unavailable'
  | 'unknown';

export type MediaKind = 'music' | 'tv' | 'radio';

/**
 * Raw entity state as reported by the host platform
 */
export interface HostEntityState {
  entityId: string;
  state: string;
  attributes: Record<string, unknown>;
  lastUpdated?: string;
}

/**
 * What a media player is doing at one instant. Frozen once captured.
 */
export interface MediaSnapshot {
  readonly entityId: string;
  readonly state: MediaState;
  readonly title: string | null;
  readonly artist: string | null;
  readonly album: string | null;
  readonly kind: MediaKind;
  readonly appName: string | null;
  readonly contentType: string | null;
  readonly isSpotify: boolean;
  /** Player-supplied artwork, possibly relative to the host (e.g. /api/media_player_proxy/...) */
  readonly artworkUrl: string | null;
  readonly positionSec: number | null;
  readonly durationSec: number | null;
  /** Epoch ms at which positionSec was sampled */
  readonly positionUpdatedAt: number | null;
  readonly cleanedTitle: string | null;
  readonly aiPrompt: string;
  readonly capturedAt: number;
}

// ========================================
// Artwork
// ========================================

export type ArtworkSource =
  | 'player'
  | 'spotify'
  | 'musicbrainz'
  | 'lastfm'
  | 'discogs'
  | 'tidal'
  | 'ai-generated';

export interface ResolvedArtwork {
  source: ArtworkSource;
  data: Uint8Array;
  contentType?: string;
  url?: string;
  resolvedAt: number;
}

export type AttemptOutcome = 'found' | 'skipped' | 'failed';

export interface ResolutionAttempt {
  source: ArtworkSource;
  outcome: AttemptOutcome;
  reason?: string;
  durationMs: number;
}

export type AiModel = 'turbo' | 'flux';

// ========================================
// Frames
// ========================================

export type Rgb = [number, number, number];

export interface Palette {
  average: Rgb;
  /** Mean of the average colour's channels, 0-255 */
  brightness: number;
  /** One to three dominant colours, most frequent first */
  colors: Rgb[];
}

export interface ProcessedFrame {
  /** Row-major RGB, width * height * 3 bytes */
  pixels: Uint8Array;
  width: number;
  height: number;
  palette: Palette;
  cropMode: CropMode;
  textColor: Rgb;
}

// ========================================
// Lyrics
// ========================================

export interface LyricsLine {
  /** Milliseconds from track start */
  time: number;
  text: string;
}

export interface LyricsTrack {
  artist: string;
  title: string;
  source: string;
  lines: LyricsLine[];
}

// ========================================
// Modes
// ========================================

export const DISPLAY_MODES = [
  'Default',
  'Clean',
  'AI Generation (Flux)',
  'AI Generation (Turbo)',
  'Burned',
  'Burned | Clock',
  'Burned | Clock (Background)',
  'Burned | Temperature',
  'Burned | Temperature (Background)',
  'Burned | Clock & Temperature (Background)',
  'Text',
  'Text (Background)',
  'Clock',
  'Clock (Background)',
  'Clock | Temperature',
  'Clock | Temperature (Background)',
  'Clock | Temperature | Text',
  'Clock | Temperature | Text (Background)',
  'Lyrics',
  'Lyrics (Background)',
  'Temperature',
  'Temperature (Background)',
  'Temperature | Text',
  'Temperature | Text (Background)',
  'Special Mode',
  'Special Mode | Text',
  'Album Art Only',
  'Lyrics Only'
] as const;

export type DisplayMode = typeof DISPLAY_MODES[number];

export const CROP_MODES = ['Default', 'No Crop', 'Crop', 'Extra Crop'] as const;

export type CropMode = typeof CROP_MODES[number];

/**
 * Feature flags a display mode switches on
 */
export interface DisplayFeatures {
  showLyrics: boolean;
  showClock: boolean;
  showTemperature: boolean;
  showText: boolean;
  textBackground: boolean;
  specialMode: boolean;
  burned: boolean;
  forceAi: boolean;
  aiModel: AiModel;
}

export interface CropPolicy {
  enabled: boolean;
  extra: boolean;
}
