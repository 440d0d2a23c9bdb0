/**
 * Entity state persistence
 *
 * Each entry exposes a status sensor plus user-adjustable selects, a
 * number and switches. Adjustable values survive restarts in SQLite;
 * the status sensor lives in memory only.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import {
  CROP_MODES,
  DISPLAY_MODES,
  LYRICS_OFFSET_MAX,
  LYRICS_OFFSET_MIN,
  clampLyricsOffset,
  isCropMode,
  isDisplayMode,
  type CropMode,
  type DisplayMode,
  type ResolutionAttempt
} from '@pixsync/core';

export interface EntryEntities {
  displayMode: DisplayMode;
  cropMode: CropMode;
  lyricsOffset: number;
  enabled: boolean;
  fullControl: boolean;
}

export type EntityKey = keyof EntryEntities;

export const ENTITY_KEYS: readonly EntityKey[] = ['displayMode', 'cropMode', 'lyricsOffset', 'enabled', 'fullControl'];

export interface EntryStatus {
  /** Media player state, or "disabled" */
  state: string;
  title: string | null;
  artist: string | null;
  artworkSource: string | null;
  attempts: ResolutionAttempt[];
  lyricsLines: number;
  lastError: string | null;
  updatedAt: number;
}

/**
 * What an entry runtime publishes and reads back
 */
export interface EntityRegistry {
  load(entryId: string, defaults: EntryEntities): EntryEntities;
  set<K extends EntityKey>(entryId: string, key: K, value: EntryEntities[K]): void;
  publishStatus(entryId: string, status: EntryStatus): void;
  getStatus(entryId: string): EntryStatus | null;
  /** Forget an entry's status sensor when its runtime stops */
  release(entryId: string): void;
}

export function isEntityKey(value: string): value is EntityKey {
  return ENTITY_KEYS.some(key => key === value);
}

export type EntityValueResult<K extends EntityKey> =
  | { ok: true; value: EntryEntities[K] }
  | { ok: false; error: string };

function parseBoolean(raw: unknown): boolean | null {
  if (typeof raw === 'boolean') return raw;
  if (raw === 'on' || raw === 'true') return true;
  if (raw === 'off' || raw === 'false') return false;
  return null;
}

function invalid(message: string): { ok: false; error: string } {
  return { ok: false, error: message };
}

/**
 * Validate a value written to one of the adjustable entities
 */
export function parseEntityValue<K extends EntityKey>(key: K, raw: unknown): EntityValueResult<K>;
export function parseEntityValue(key: EntityKey, raw: unknown): EntityValueResult<EntityKey> {
  switch (key) {
    case 'displayMode':
      return typeof raw === 'string' && isDisplayMode(raw)
        ? { ok: true, value: raw }
        : invalid(`displayMode must be one of: ${DISPLAY_MODES.join(', ')}`);
    case 'cropMode':
      return typeof raw === 'string' && isCropMode(raw)
        ? { ok: true, value: raw }
        : invalid(`cropMode must be one of: ${CROP_MODES.join(', ')}`);
    case 'lyricsOffset': {
      const value = typeof raw === 'string' ? Number(raw) : raw;
      return typeof value === 'number' && Number.isFinite(value)
        ? { ok: true, value: clampLyricsOffset(value) }
        : invalid(`lyricsOffset must be a number between ${LYRICS_OFFSET_MIN} and ${LYRICS_OFFSET_MAX}`);
    }
    case 'enabled':
    case 'fullControl': {
      const value = parseBoolean(raw);
      return value === null ? invalid(`${key} must be on or off`) : { ok: true, value };
    }
  }
}

/**
 * Entity ids the way the host would name them, namespaced by entry title
 */
export function entityIds(title: string): Record<EntityKey | 'status', string> {
  const slug = title.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '') || 'pixoo';
  return {
    status: `sensor.${slug}_status`,
    displayMode: `select.${slug}_display_mode`,
    cropMode: `select.${slug}_crop_mode`,
    lyricsOffset: `number.${slug}_lyrics_sync`,
    enabled: `switch.${slug}_enabled`,
    fullControl: `switch.${slug}_full_control`
  };
}

interface EntityRow {
  key: string;
  value: string;
}

export class SqliteEntityStore implements EntityRegistry {
  readonly db: Database.Database;
  private statuses = new Map<string, EntryStatus>();

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS entity_state (
        entry_id TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY (entry_id, key)
      )
    `);
  }

  /**
   * Stored values over the defaults. Rows that no longer validate are
   * ignored.
   */
  load(entryId: string, defaults: EntryEntities): EntryEntities {
    const rows = this.db
      .prepare('SELECT key, value FROM entity_state WHERE entry_id = ?')
      .all(entryId) as EntityRow[];

    const values: EntryEntities = { ...defaults };
    for (const row of rows) {
      if (!isEntityKey(row.key)) continue;
      let stored: unknown;
      try {
        stored = JSON.parse(row.value);
      } catch {
        continue;
      }
      this.assign(values, row.key, stored);
    }
    return values;
  }

  set<K extends EntityKey>(entryId: string, key: K, value: EntryEntities[K]): void {
    this.db.prepare(`
      INSERT INTO entity_state (entry_id, key, value, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(entry_id, key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
    `).run(entryId, key, JSON.stringify(value), Date.now());
  }

  publishStatus(entryId: string, status: EntryStatus): void {
    this.statuses.set(entryId, status);
  }

  getStatus(entryId: string): EntryStatus | null {
    return this.statuses.get(entryId) ?? null;
  }

  release(entryId: string): void {
    this.statuses.delete(entryId);
  }

  close(): void {
    this.db.close();
  }

  private assign<K extends EntityKey>(values: EntryEntities, key: K, stored: unknown): void {
    const parsed = parseEntityValue(key, stored);
    if (parsed.ok) {
      values[key] = parsed.value;
    }
  }
}
