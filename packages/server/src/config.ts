/**
 * Configuration loader for the pixsync server
 *
 * Supports (in order of precedence):
 * 1. Environment variables (PIXSYNC_*)
 * 2. Config file (config.yml or config.json)
 * 3. Default values
 *
 * Each entry pairs one media player with one Pixoo64 and is normalised into
 * an EntryConfig value object that the runtime passes to every pipeline run.
 */

import * as fs from 'fs';
import * as path from 'path';
import YAML from 'yaml';
import {
  isCropMode,
  isDisplayMode,
  resolveFontColor,
  type AiModel,
  type CropMode,
  type CropPolicy,
  type DisplayFeatures,
  type DisplayMode
} from '@pixsync/core';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type ClockAlign = 'Left' | 'Right';

export const LYRICS_FONTS = [2, 4, 32, 52, 58, 62, 48, 80, 158, 186, 190, 590];
export const DEFAULT_LYRICS_FONT = 190;

const IPV4_PATTERN = /^\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}$/;

// ========================================
// Types
// ========================================

export interface EntryCredentials {
  spotifyClientId?: string;
  spotifyClientSecret?: string;
  tidalClientId?: string;
  tidalClientSecret?: string;
  lastfmApiKey?: string;
  discogsToken?: string;
}

export interface EntryDisplayConfig {
  mode: DisplayMode;
  cropMode: CropMode;
  /** Features "Default" display mode restores */
  features: DisplayFeatures;
  /** Crop policy "Default" crop mode restores */
  crop: CropPolicy;
  fullControl: boolean;
  contrast: boolean;
  sharpness: boolean;
  colorsEnhanced: boolean;
  kernelEffect: boolean;
  infoFallback: boolean;
  tvIcon: boolean;
  clockAlign: ClockAlign;
  cleanTitle: boolean;
  /** Forced #RRGGBB text colour, or null for contrast-derived */
  fontColor: string | null;
  lyricsFont: number;
  lyricsOffset: number;
  limitColors: number | false;
  imagesCacheSize: number;
}

export interface WledConfig {
  ips: string[];
  brightness: number;
  effect: number;
  speed: number;
  intensity: number;
  palette: number;
  onlyAtNight: boolean;
}

export interface EntryConfig {
  id: string;
  title: string;
  mediaPlayer: string;
  pixooIp: string;
  temperatureSensor?: string;
  lights: string[];
  credentials: EntryCredentials;
  musicbrainzEnabled: boolean;
  display: EntryDisplayConfig;
  wled: WledConfig;
}

export interface ServerConfig {
  server: {
    port: number;
    host: string;
  };
  homeAssistant: {
    url: string;
    token: string;
  };
  storage: {
    database: string;
  };
  logging: {
    level: LogLevel;
  };
  timeouts: {
    artworkMs: number;
    lyricsMs: number;
    deviceMs: number;
    lightMs: number;
  };
  entries: EntryConfig[];
}

type RawObject = Record<string, unknown>;

const DEFAULT_CONFIG: RawObject = {
  server: {
    port: 8686,
    host: '0.0.0.0'
  },
  homeAssistant: {
    url: 'http://homeassistant.local:8123',
    token: ''
  },
  storage: {
    database: './data/pixsync.db'
  },
  logging: {
    level: 'info'
  },
  timeouts: {
    artworkMs: 10000,
    lyricsMs: 10000,
    deviceMs: 5000,
    lightMs: 5000
  },
  entries: []
};

// ========================================
// Raw value helpers
// ========================================

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawObject, key: string): RawObject {
  const value = raw[key];
  return isObject(value) ? value : {};
}

function str(raw: RawObject, key: string): string | undefined {
  const value = raw[key];
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function bool(raw: RawObject, key: string, fallback: boolean): boolean {
  const value = raw[key];
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return fallback;
}

function int(raw: RawObject, key: string, fallback: number): number {
  const value = raw[key];
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  return Number.isFinite(parsed) ? Math.trunc(parsed) : fallback;
}

function clampInt(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// ========================================
// Entry normalisation
// ========================================

export type ConfigWarn = (message: string) => void;

/**
 * Split a comma-separated WLED list, trimming whitespace and dropping
 * anything that is not a dotted IPv4 address.
 */
export function parseWledIps(value: unknown, warn: ConfigWarn = () => {}): string[] {
  const candidates = Array.isArray(value)
    ? value.map(item => String(item))
    : typeof value === 'string' ? value.split(',') : [];

  const ips: string[] = [];
  for (const candidate of candidates) {
    const ip = candidate.trim();
    if (!ip) continue;
    if (IPV4_PATTERN.test(ip)) {
      ips.push(ip);
    } else {
      warn(`Invalid WLED IP address format ignored: '${ip}'`);
    }
  }
  return ips;
}

/**
 * "false" or anything unparsable disables colour limiting
 */
export function parseLimitColors(value: unknown): number | false {
  if (value === undefined || value === null || value === false || value === '') return false;
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(parsed) || parsed <= 0) return false;
  return Math.max(2, parsed);
}

function slugify(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '') || 'entry';
}

function parseLights(value: unknown): string[] {
  if (typeof value === 'string') return value.trim() ? [value.trim()] : [];
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string' && item.trim() !== '')
      .map(item => item.trim());
  }
  return [];
}

export function normalizeEntry(raw: unknown, index: number, warn: ConfigWarn = () => {}): EntryConfig {
  if (!isObject(raw)) {
    throw new Error(`entries[${index}] must be an object`);
  }

  const mediaPlayer = str(raw, 'mediaPlayer');
  const pixooIp = str(raw, 'pixooIp');
  if (!mediaPlayer) throw new Error(`entries[${index}].mediaPlayer is required`);
  if (!pixooIp) throw new Error(`entries[${index}].pixooIp is required`);

  const title = str(raw, 'title') ?? mediaPlayer;
  const spotify = section(raw, 'spotify');
  const tidal = section(raw, 'tidal');
  const ai = section(raw, 'ai');
  const display = section(raw, 'display');
  const wled = section(raw, 'wled');

  const aiModelRaw = str(ai, 'model');
  const aiModel: AiModel = aiModelRaw === 'flux' ? 'flux' : 'turbo';

  const clockAlign: ClockAlign = str(display, 'clockAlign') === 'Left' ? 'Left' : 'Right';

  const lyricsFontRaw = int(display, 'lyricsFont', DEFAULT_LYRICS_FONT);
  const lyricsFont = LYRICS_FONTS.includes(lyricsFontRaw) ? lyricsFontRaw : DEFAULT_LYRICS_FONT;

  const fontColor = resolveFontColor(str(display, 'fontColorPreset'), str(display, 'fontColor'));
  if (fontColor.rejectedCustom) {
    warn(`Invalid custom hex color string: '${fontColor.rejectedCustom}'`);
  }

  const modeRaw = str(display, 'mode') ?? 'Default';
  const mode: DisplayMode = isDisplayMode(modeRaw) ? modeRaw : 'Default';
  if (mode !== modeRaw) warn(`Unknown display mode '${modeRaw}', using Default`);

  const cropRaw = str(display, 'cropMode') ?? 'Default';
  const cropMode: CropMode = isCropMode(cropRaw) ? cropRaw : 'Default';
  if (cropMode !== cropRaw) warn(`Unknown crop mode '${cropRaw}', using Default`);

  return {
    id: slugify(title),
    title,
    mediaPlayer,
    pixooIp,
    temperatureSensor: str(raw, 'temperatureSensor'),
    lights: parseLights(raw.lights),
    credentials: {
      spotifyClientId: str(spotify, 'clientId'),
      spotifyClientSecret: str(spotify, 'clientSecret'),
      tidalClientId: str(tidal, 'clientId'),
      tidalClientSecret: str(tidal, 'clientSecret'),
      lastfmApiKey: str(section(raw, 'lastfm'), 'apiKey'),
      discogsToken: str(section(raw, 'discogs'), 'token')
    },
    musicbrainzEnabled: bool(section(raw, 'musicbrainz'), 'enabled', true),
    display: {
      mode,
      cropMode,
      features: {
        showLyrics: bool(display, 'showLyrics', false),
        showClock: bool(display, 'showClock', false),
        showTemperature: bool(display, 'showTemperature', false),
        showText: bool(display, 'showText', false),
        textBackground: bool(display, 'textBackground', true),
        specialMode: bool(display, 'specialMode', false),
        burned: false,
        forceAi: bool(ai, 'force', false),
        aiModel
      },
      crop: {
        enabled: bool(display, 'cropBorders', false),
        extra: bool(display, 'extraCrop', false)
      },
      fullControl: bool(display, 'fullControl', true),
      contrast: bool(display, 'contrast', false),
      sharpness: bool(display, 'sharpness', false),
      colorsEnhanced: bool(display, 'colorsEnhanced', false),
      kernelEffect: bool(display, 'kernelEffect', false),
      infoFallback: bool(display, 'infoFallback', false),
      tvIcon: bool(display, 'tvIcon', true),
      clockAlign,
      cleanTitle: bool(display, 'cleanTitle', true),
      fontColor: fontColor.color,
      lyricsFont,
      lyricsOffset: clampInt(int(display, 'lyricsOffset', 0), -10, 10),
      limitColors: parseLimitColors(display.limitColors),
      imagesCacheSize: Math.max(0, int(display, 'imagesCacheSize', 25))
    },
    wled: {
      ips: parseWledIps(wled.ips, warn),
      brightness: clampInt(int(wled, 'brightness', 255), 0, 255),
      effect: int(wled, 'effect', 38),
      speed: clampInt(int(wled, 'speed', 60), 0, 255),
      intensity: clampInt(int(wled, 'intensity', 128), 0, 255),
      palette: int(wled, 'palette', 0),
      onlyAtNight: bool(wled, 'onlyAtNight', false)
    }
  };
}

// ========================================
// Loading
// ========================================

/**
 * Load configuration from environment variables
 */
function loadFromEnv(env: NodeJS.ProcessEnv): RawObject {
  const config: RawObject = {};
  const set = (group: string, key: string, value: unknown) => {
    config[group] = { ...section(config, group), [key]: value };
  };

  if (env.PIXSYNC_PORT) set('server', 'port', parseInt(env.PIXSYNC_PORT, 10));
  if (env.PIXSYNC_HOST) set('server', 'host', env.PIXSYNC_HOST);
  if (env.PIXSYNC_HA_URL) set('homeAssistant', 'url', env.PIXSYNC_HA_URL);
  if (env.PIXSYNC_HA_TOKEN) set('homeAssistant', 'token', env.PIXSYNC_HA_TOKEN);
  if (env.PIXSYNC_DATABASE) set('storage', 'database', env.PIXSYNC_DATABASE);
  if (env.PIXSYNC_LOG_LEVEL) set('logging', 'level', env.PIXSYNC_LOG_LEVEL);

  return config;
}

/**
 * Load configuration from file
 */
function loadFromFile(configPath?: string): RawObject {
  const searchPaths = configPath
    ? [configPath]
    : [
        path.join(process.cwd(), 'config.yml'),
        path.join(process.cwd(), 'config.yaml'),
        path.join(process.cwd(), 'config.json')
      ];

  for (const filePath of searchPaths) {
    if (fs.existsSync(filePath)) {
      console.log(`[Config] Loading from: ${filePath}`);
      const content = fs.readFileSync(filePath, 'utf-8');
      const parsed: unknown = filePath.endsWith('.json') ? JSON.parse(content) : YAML.parse(content);
      if (parsed === null || parsed === undefined) return {};
      if (!isObject(parsed)) {
        throw new Error(`Config file ${filePath} must contain a mapping`);
      }
      return parsed;
    }
  }

  if (configPath) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  return {};
}

/**
 * Deep merge two objects. Arrays and scalars from `source` replace.
 */
export function deepMerge(target: RawObject, source: RawObject): RawObject {
  const result: RawObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (sourceValue === undefined) continue;
    if (isObject(sourceValue) && isObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

function normalizeLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return 'info';
  }
}

/**
 * Turn merged raw layers into a validated ServerConfig
 */
export function normalizeConfig(raw: RawObject, basePath: string, warn: ConfigWarn = () => {}): ServerConfig {
  const server = section(raw, 'server');
  const homeAssistant = section(raw, 'homeAssistant');
  const storage = section(raw, 'storage');
  const timeouts = section(raw, 'timeouts');

  const database = str(storage, 'database') ?? './data/pixsync.db';
  const rawEntries = Array.isArray(raw.entries) ? raw.entries : [];
  const entries = rawEntries.map((entry, index) => normalizeEntry(entry, index, warn));

  // Entry ids key persisted state and API routes
  const seen = new Map<string, number>();
  for (const entry of entries) {
    const count = seen.get(entry.id) ?? 0;
    seen.set(entry.id, count + 1);
    if (count > 0) entry.id = `${entry.id}-${count + 1}`;
  }

  return {
    server: {
      port: int(server, 'port', 8686),
      host: str(server, 'host') ?? '0.0.0.0'
    },
    homeAssistant: {
      url: (str(homeAssistant, 'url') ?? 'http://homeassistant.local:8123').replace(/\/+$/, ''),
      token: str(homeAssistant, 'token') ?? ''
    },
    storage: {
      database: database === ':memory:' || path.isAbsolute(database)
        ? database
        : path.resolve(basePath, database)
    },
    logging: {
      level: normalizeLevel(str(section(raw, 'logging'), 'level'))
    },
    timeouts: {
      artworkMs: int(timeouts, 'artworkMs', 10000),
      lyricsMs: int(timeouts, 'lyricsMs', 10000),
      deviceMs: int(timeouts, 'deviceMs', 5000),
      lightMs: int(timeouts, 'lightMs', 5000)
    },
    entries
  };
}

export interface LoadConfigOptions {
  configPath?: string;
  basePath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and merge configuration from all sources
 */
export function loadConfig(options: LoadConfigOptions = {}): ServerConfig {
  const basePath = options.basePath || process.cwd();

  const fileConfig = loadFromFile(options.configPath);
  const envConfig = loadFromEnv(options.env ?? process.env);

  // Merge: defaults <- file <- env
  const merged = deepMerge(deepMerge(DEFAULT_CONFIG, fileConfig), envConfig);

  return normalizeConfig(merged, basePath, message => console.warn(`[Config] ${message}`));
}

/**
 * Generate example config file
 */
export function generateExampleConfig(): string {
  return YAML.stringify({
    server: {
      port: 8686,
      host: '0.0.0.0'
    },
    homeAssistant: {
      url: 'http://homeassistant.local:8123',
      token: 'your-long-lived-access-token'
    },
    storage: {
      database: './data/pixsync.db'
    },
    logging: {
      level: 'info'
    },
    entries: [
      {
        title: 'Living Room',
        mediaPlayer: 'media_player.living_room',
        pixooIp: '192.168.1.50',
        temperatureSensor: 'sensor.outdoor_temperature',
        lights: ['light.living_room_lamp'],
        spotify: { clientId: '', clientSecret: '' },
        lastfm: { apiKey: '' },
        discogs: { token: '' },
        tidal: { clientId: '', clientSecret: '' },
        musicbrainz: { enabled: true },
        ai: { model: 'turbo', force: false },
        display: {
          mode: 'Default',
          cropMode: 'Default',
          fullControl: true,
          showClock: true,
          clockAlign: 'Right',
          showTemperature: false,
          showLyrics: false,
          lyricsFont: 190,
          lyricsOffset: 0,
          fontColorPreset: 'Automatic',
          fontColor: '',
          cleanTitle: true,
          tvIcon: true,
          imagesCacheSize: 25,
          limitColors: false
        },
        wled: {
          ips: '192.168.1.100, 192.168.1.101',
          brightness: 255,
          effect: 38,
          speed: 60,
          intensity: 128,
          palette: 0,
          onlyAtNight: false
        }
      }
    ]
  });
}
