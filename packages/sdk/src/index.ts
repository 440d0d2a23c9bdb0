/**
 * @pixsync/sdk - SDK for building pixsync providers
 */

// Re-export core types
export type {
  // Domain types
  MediaSnapshot,
  ArtworkSource,
  ResolvedArtwork,
  AiModel,
  LyricsLine,
  LyricsTrack,

  // Addon types
  AddonRole,
  AddonManifest,
  BaseAddon,
  ArtworkRequest,
  ArtworkAttemptResult,
  ArtworkProvider,
  LyricsQuery,
  LyricsSearchOptions,
  LyricsProvider
} from '@pixsync/core';

// Base classes
export { BaseArtworkProvider, DEFAULT_USER_AGENT, type ArtworkImage } from './base/BaseArtworkProvider';
export { BaseLyricsProvider } from './base/BaseLyricsProvider';

// Helpers
export { isRecord, getRecord, getArray, getString, getNumber } from './utils/json';
