/**
 * pixsync server
 *
 * Owns the Home Assistant connection, the entity store and one runtime per
 * configured entry, and exposes them over a small HTTP API.
 */

import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import websocket from '@fastify/websocket';
import rateLimit from '@fastify/rate-limit';
import { networkInterfaces } from 'os';
import { errorMessage } from '@pixsync/core';

import type { ServerConfig } from './config';
import { logService, log, isLogLevel, type LogEntry } from './services/log-service';
import { HomeAssistantSocket, type HomeAssistantClient } from './services/home-assistant-client';
import {
  SqliteEntityStore,
  entityIds,
  isEntityKey,
  parseEntityValue,
  type EntityRegistry
} from './services/entity-store';
import { EntryRuntime } from './services/entry-runtime';

export const SERVER_VERSION = '0.1.0';

export interface StandaloneServerOptions {
  config: ServerConfig;
  onReady?: (info: ServerInfo) => void;
  /** Host connection; a WebSocket client for the configured URL when omitted */
  client?: HomeAssistantClient;
  /** Entity persistence; SQLite at storage.database when omitted */
  entities?: EntityRegistry;
  /** Delay before a paused player is treated as off */
  pausedDelayMs?: number;
}

export interface ServerInfo {
  localUrl: string;
  port: number;
  entries: number;
}

interface EntryParams {
  id: string;
}

interface EntityParams extends EntryParams {
  key: string;
}

interface LogsQuery {
  count?: string;
  level?: string;
  service?: string;
}

export class StandaloneServer {
  readonly fastify: FastifyInstance;
  private config: ServerConfig;
  private isRunning = false;
  private initialized = false;

  private client: HomeAssistantClient;
  private socket: HomeAssistantSocket | null = null;
  private entities: EntityRegistry;
  private store: SqliteEntityStore | null = null;
  private runtimes = new Map<string, EntryRuntime>();

  constructor(private options: StandaloneServerOptions) {
    this.config = options.config;
    this.fastify = Fastify({
      logger: this.config.logging.level === 'debug'
    });
    logService.setLevel(this.config.logging.level);

    if (options.client) {
      this.client = options.client;
    } else {
      this.socket = new HomeAssistantSocket({
        url: this.config.homeAssistant.url,
        token: this.config.homeAssistant.token
      });
      this.client = this.socket;
    }

    if (options.entities) {
      this.entities = options.entities;
    } else {
      this.store = new SqliteEntityStore(this.config.storage.database);
      this.entities = this.store;
    }

    for (const entry of this.config.entries) {
      this.runtimes.set(entry.id, new EntryRuntime({
        entry,
        client: this.client,
        entities: this.entities,
        timeouts: this.config.timeouts,
        pausedDelayMs: options.pausedDelayMs
      }));
    }
  }

  /**
   * Connect to the host, start every entry and register routes. Called by
   * start(); requests can be injected once it resolves.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    this.initialized = true;

    if (this.socket) {
      await this.socket.connect();
    }

    for (const runtime of this.runtimes.values()) {
      try {
        await runtime.start();
      } catch (error) {
        log.error('Server', `Failed to start entry ${runtime.entry.title}`, { error: errorMessage(error) });
      }
    }

    await this.registerPlugins();
    this.registerRoutes();
  }

  /**
   * Start the server
   */
  async start(): Promise<ServerInfo> {
    if (this.isRunning) {
      throw new Error('Server is already running');
    }

    log.info('Server', 'Starting pixsync server...');
    await this.initialize();

    let actualPort = this.config.server.port;
    const maxAttempts = 10;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        await this.fastify.listen({
          port: actualPort,
          host: this.config.server.host
        });
        break;
      } catch (err) {
        const code = err instanceof Error && 'code' in err ? err.code : undefined;
        if (code === 'EADDRINUSE' && attempt < maxAttempts - 1) {
          log.warn('Server', `Port ${actualPort} in use, trying ${actualPort + 1}...`);
          actualPort++;
        } else {
          throw err;
        }
      }
    }

    this.isRunning = true;

    const info: ServerInfo = {
      localUrl: `http://${getLocalIP()}:${actualPort}`,
      port: actualPort,
      entries: this.runtimes.size
    };

    console.log('\n========================================');
    console.log('pixsync ready');
    console.log('========================================');
    console.log(`Local:          ${info.localUrl}`);
    console.log(`Home Assistant: ${this.config.homeAssistant.url}`);
    console.log(`Database:       ${this.config.storage.database}`);
    for (const runtime of this.runtimes.values()) {
      console.log(`Entry:          ${runtime.entry.title} (${runtime.entry.mediaPlayer} -> ${runtime.entry.pixooIp})`);
    }
    console.log('========================================\n');

    this.options.onReady?.(info);

    return info;
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    log.info('Server', 'Stopping...');

    for (const runtime of this.runtimes.values()) {
      await runtime.stop();
    }

    await this.fastify.close();
    this.socket?.disconnect();
    this.store?.close();
    this.isRunning = false;

    log.info('Server', 'Stopped');
  }

  getRuntime(id: string): EntryRuntime | null {
    return this.runtimes.get(id) ?? null;
  }

  /**
   * Register Fastify plugins
   */
  private async registerPlugins(): Promise<void> {
    await this.fastify.register(cors, {
      origin: '*',
      credentials: false,
      methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'Accept', 'Origin', 'X-Requested-With']
    });

    await this.fastify.register(rateLimit, {
      max: 300,
      timeWindow: '1 minute'
    });

    await this.fastify.register(websocket);
  }

  /**
   * Register API routes
   */
  private registerRoutes(): void {
    this.fastify.get('/health', async () => ({
      status: 'ok',
      version: SERVER_VERSION,
      uptime: process.uptime()
    }));

    this.fastify.get('/api/info', async () => ({
      name: 'pixsync',
      version: SERVER_VERSION,
      homeAssistant: {
        url: this.config.homeAssistant.url,
        connected: this.socket ? this.socket.isConnected() : null
      },
      entries: this.runtimes.size
    }));

    // ========================================
    // Entries API
    // ========================================

    this.fastify.get('/api/entries', async () => ({
      entries: [...this.runtimes.values()].map(runtime => runtime.summary())
    }));

    this.fastify.get<{ Params: EntryParams }>('/api/entries/:id', async (request, reply) => {
      const runtime = this.runtimes.get(request.params.id);
      if (!runtime) {
        return reply.code(404).send({ error: 'Entry not found' });
      }
      return runtime.summary();
    });

    this.fastify.get<{ Params: EntryParams }>('/api/entries/:id/entities', async (request, reply) => {
      const runtime = this.runtimes.get(request.params.id);
      if (!runtime) {
        return reply.code(404).send({ error: 'Entry not found' });
      }
      return {
        entityIds: entityIds(runtime.entry.title),
        values: runtime.getValues(),
        status: runtime.getStatus()
      };
    });

    // Write one of the adjustable entities (select, number or switch)
    this.fastify.put<{ Params: EntityParams; Body: { value?: unknown } | null }>(
      '/api/entries/:id/entities/:key',
      async (request, reply) => {
        const runtime = this.runtimes.get(request.params.id);
        if (!runtime) {
          return reply.code(404).send({ error: 'Entry not found' });
        }

        const { key } = request.params;
        if (!isEntityKey(key)) {
          return reply.code(400).send({ error: `Unknown entity: ${key}` });
        }

        const parsed = parseEntityValue(key, request.body?.value);
        if (!parsed.ok) {
          return reply.code(400).send({ error: parsed.error });
        }

        const values = await runtime.setEntity(key, parsed.value);
        return { success: true, values, status: runtime.getStatus() };
      }
    );

    this.fastify.post<{ Params: EntryParams }>('/api/entries/:id/refresh', async (request, reply) => {
      const runtime = this.runtimes.get(request.params.id);
      if (!runtime) {
        return reply.code(404).send({ error: 'Entry not found' });
      }
      await runtime.refresh();
      return { success: true, status: runtime.getStatus() };
    });

    // ========================================
    // Logs API
    // ========================================

    this.fastify.get<{ Querystring: LogsQuery }>('/api/logs', async (request) => {
      const { count, level, service } = request.query;

      const logs = logService.getRecent(
        parseInt(count || '100', 10) || 100,
        {
          level: isLogLevel(level) ? level : undefined,
          service
        }
      );

      return {
        logs,
        stats: logService.getStats()
      };
    });

    this.fastify.post('/api/logs/clear', async () => {
      logService.clear();
      return { success: true };
    });

    // Real-time log streaming
    this.fastify.get('/api/logs/stream', { websocket: true }, (socket) => {
      const send = (payload: unknown) => {
        if (socket.readyState === socket.OPEN) {
          socket.send(JSON.stringify(payload));
        }
      };
      const handler = (entry: LogEntry) => send({ type: 'log', data: entry });
      const clearHandler = () => send({ type: 'clear' });

      logService.on('log', handler);
      logService.on('clear', clearHandler);

      socket.on('close', () => {
        logService.off('log', handler);
        logService.off('clear', clearHandler);
      });

      send({ type: 'initial', data: logService.getRecent(50) });
    });
  }
}

/**
 * First external IPv4 address, or localhost
 */
function getLocalIP(): string {
  const interfaces = networkInterfaces();
  for (const addresses of Object.values(interfaces)) {
    for (const address of addresses ?? []) {
      if (address.family === 'IPv4' && !address.internal) {
        return address.address;
      }
    }
  }
  return 'localhost';
}
