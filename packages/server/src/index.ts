/**
 * pixsync server - Library Entry Point
 *
 * For CLI usage, see ./cli.ts
 */

export { StandaloneServer, SERVER_VERSION } from './standalone-server';
export { loadConfig, normalizeConfig, normalizeEntry, generateExampleConfig } from './config';

// Services
export { HomeAssistantSocket } from './services/home-assistant-client';
export { SqliteEntityStore, entityIds, parseEntityValue } from './services/entity-store';
export { EntryRuntime } from './services/entry-runtime';
export { PixooDevice } from './services/pixoo-device';
export { ImageProcessor } from './services/image-processor';
export { LightSync } from './services/light-sync';
export { logService, log } from './services/log-service';
export { createEntryRegistry } from '../plugins';

// Types
export type { ServerConfig, EntryConfig } from './config';
export type { ServerInfo, StandaloneServerOptions } from './standalone-server';
export type { HomeAssistantClient } from './services/home-assistant-client';
export type { EntityRegistry, EntryEntities, EntryStatus } from './services/entity-store';
export type { EntrySummary } from './services/entry-runtime';
