/**
 * @pixsync/core - Core types and orchestrators for pixsync
 */

// Types
export type {
  MediaState,
  MediaKind,
  HostEntityState,
  MediaSnapshot,
  ArtworkSource,
  ResolvedArtwork,
  AttemptOutcome,
  ResolutionAttempt,
  AiModel,
  Rgb,
  Palette,
  ProcessedFrame,
  LyricsLine,
  LyricsTrack,
  DisplayMode,
  CropMode,
  DisplayFeatures,
  CropPolicy
} from './types/index';
export { DISPLAY_MODES, CROP_MODES } from './types/index';

export type {
  AddonRole,
  AddonManifest,
  BaseAddon,
  ArtworkRequest,
  ArtworkAttemptResult,
  ArtworkProvider,
  LyricsQuery,
  LyricsSearchOptions,
  LyricsProvider
} from './types/addon';

// Errors
export {
  NoArtworkError,
  DeviceUnreachableError,
  LightUpdateError,
  RunSupersededError,
  errorMessage
} from './errors';

// Registry
export {
  AddonRegistry,
  isArtworkProvider,
  isLyricsProvider,
  type RegistrableAddon
} from './registry/addon-registry';

// Orchestrators
export {
  ArtworkResolver,
  FALLBACK_ORDER,
  type ArtworkResolverOptions,
  type ResolveOptions,
  type ArtworkResolution
} from './orchestrators/artwork-resolver';
export {
  LyricsSynchronizer,
  LYRICS_OFFSET_MIN,
  LYRICS_OFFSET_MAX,
  clampLyricsOffset,
  findLineIndex,
  lineDisplayDuration,
  type LyricsSink,
  type LyricsEvents,
  type LyricsSynchronizerOptions
} from './orchestrators/lyrics-synchronizer';

// Services
export {
  captureSnapshot,
  cleanTitle,
  classifyMedia,
  buildAiPrompt,
  estimatePositionSec,
  trackKey,
  isOffState,
  OFF_STATES
} from './services/media-snapshot';
export {
  resolveDisplayFeatures,
  resolveCropPolicy,
  isDisplayMode,
  isCropMode
} from './services/display-mode';

// Utils
export { EventEmitter } from './utils/event-emitter';
export { scopedSignal, whenAborted, abortMessage, type ScopedSignal } from './utils/abort';
export {
  FONT_COLOR_PRESETS,
  BLACK,
  WHITE,
  isValidHexColor,
  hexToRgb,
  rgbToHex,
  resolveFontColor,
  contrastTextColor,
  brightnessToPercent,
  colorDistance,
  type FontColorResolution
} from './utils/color';
