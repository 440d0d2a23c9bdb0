/**
 * Media snapshot capture
 *
 * Turns a media player's raw host state into a frozen MediaSnapshot:
 * classifies the content (music / TV / radio), cleans the title, builds
 * the prompt used for generated artwork and records the playback position
 * so the lyrics synchronizer can extrapolate it.
 */

import type { HostEntityState, MediaKind, MediaSnapshot, MediaState } from '../types/index';

const KNOWN_STATES: readonly MediaState[] = [
  'playing', 'paused', 'buffering', 'idle', 'off', 'standby', 'on', 'unavailable', 'unknown'
];

const TV_CONTENT_TYPES = ['tvshow', 'movie', 'episode', 'channel'];
const TV_APPS = ['netflix', 'plex', 'hbo', 'disney', 'youtube', 'tvheadend'];
const RADIO_CONTENT_TYPES = ['radio', 'music'];
const RADIO_TITLE_PATTERN = /\b(radio|fm|am)\b/i;

/** States in which the display should be released */
export const OFF_STATES: readonly MediaState[] = ['off', 'idle', 'standby', 'unavailable', 'unknown'];

// ========================================
// Attribute helpers
// ========================================

function stringAttr(attributes: Record<string, unknown>, key: string): string | null {
  const value = attributes[key];
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  return null;
}

function numberAttr(attributes: Record<string, unknown>, key: string): number | null {
  const value = attributes[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function normalizeState(state: string): MediaState {
  const lower = state.toLowerCase();
  return KNOWN_STATES.find(known => known === lower) ?? 'unknown';
}

// ========================================
// Classification
// ========================================

/**
 * Strip bracketed and parenthesised suffixes ("(Remastered 2011)",
 * "[Live]") and collapse whitespace.
 */
export function cleanTitle(title: string): string {
  return title
    .replace(/\s*\[.*?\]|\s*\(.*?\)/g, '')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');
}

export function classifyMedia(
  contentType: string | null,
  appName: string | null,
  title: string | null
): MediaKind {
  const app = appName?.toLowerCase() ?? '';
  const isTv = (contentType !== null && TV_CONTENT_TYPES.includes(contentType))
    || TV_APPS.some(tvApp => app.includes(tvApp));

  const isRadio = contentType !== null
    && RADIO_CONTENT_TYPES.includes(contentType)
    && ((title !== null && RADIO_TITLE_PATTERN.test(title)) || app.includes('tunein'));

  // TV apps can play radio; TuneIn is the only app that keeps it radio
  if (isTv && isRadio) {
    return app.includes('tunein') ? 'radio' : 'tv';
  }
  if (isTv) return 'tv';
  if (isRadio) return 'radio';
  return 'music';
}

export function buildAiPrompt(input: {
  kind: MediaKind;
  title: string | null;
  artist: string | null;
  album: string | null;
  appName: string | null;
}): string {
  const { kind, title, artist, album, appName } = input;

  if (kind === 'tv' && title) {
    const app = appName && !title.includes(appName) ? `, ${appName}` : '';
    return `${title}${app}, movie poster style, cinematic lighting, high detail`;
  }
  if (kind === 'radio' && title) {
    return `${title}, radio, music broadcast, vibrant colors`;
  }
  if (artist && title) {
    const albumPart = album && !title.includes(album) ? `, ${album}` : '';
    return `${artist} - ${title}, album cover art, high detail, iconic${albumPart}`;
  }
  if (title) {
    return `${title}, abstract art, music visualization`;
  }
  return 'abstract colorful music visualization';
}

// ========================================
// Capture
// ========================================

export function captureSnapshot(entity: HostEntityState, now: number = Date.now()): MediaSnapshot {
  const { attributes } = entity;

  const title = stringAttr(attributes, 'media_title');
  const artist = stringAttr(attributes, 'media_artist') ?? stringAttr(attributes, 'media_album_artist');
  const album = stringAttr(attributes, 'media_album_name');
  const appName = stringAttr(attributes, 'app_name');
  const contentType = stringAttr(attributes, 'media_content_type');
  const contentId = stringAttr(attributes, 'media_content_id') ?? '';
  const kind = classifyMedia(contentType, appName, title);

  const updatedAtRaw = stringAttr(attributes, 'media_position_updated_at');
  const updatedAt = updatedAtRaw ? Date.parse(updatedAtRaw) : NaN;

  return Object.freeze({
    entityId: entity.entityId,
    state: normalizeState(entity.state),
    title,
    artist,
    album,
    kind,
    appName,
    contentType,
    isSpotify: contentId.toLowerCase().includes('spotify')
      || (appName?.toLowerCase().includes('spotify') ?? false),
    artworkUrl: stringAttr(attributes, 'entity_picture'),
    positionSec: numberAttr(attributes, 'media_position'),
    durationSec: numberAttr(attributes, 'media_duration'),
    positionUpdatedAt: Number.isNaN(updatedAt) ? null : updatedAt,
    cleanedTitle: title ? cleanTitle(title) : null,
    aiPrompt: buildAiPrompt({ kind, title, artist, album, appName }),
    capturedAt: now
  });
}

/**
 * Estimated playback position in seconds. Extrapolates from the last
 * reported position while playing.
 */
export function estimatePositionSec(snapshot: MediaSnapshot, now: number = Date.now()): number | null {
  if (snapshot.positionSec === null) return null;
  if (snapshot.state !== 'playing') return snapshot.positionSec;

  const sampledAt = snapshot.positionUpdatedAt ?? snapshot.capturedAt;
  const elapsed = Math.max(0, (now - sampledAt) / 1000);
  const estimate = snapshot.positionSec + elapsed;
  return snapshot.durationSec !== null ? Math.min(estimate, snapshot.durationSec) : estimate;
}

/**
 * Identity of the playing item; a change means new artwork and lyrics
 */
export function trackKey(snapshot: MediaSnapshot): string {
  return [snapshot.artist ?? '', snapshot.title ?? '', snapshot.album ?? ''].join('\u0000');
}

export function isOffState(state: MediaState): boolean {
  return OFF_STATES.includes(state);
}
