/**
 * Home Assistant client
 *
 * The runtime only needs four things from the host: current entity state,
 * state-change notifications, service calls and a base URL for
 * host-relative media. HomeAssistantSocket provides them over the
 * WebSocket API and reconnects after a drop.
 */

import WebSocket from 'ws';
import { EventEmitter, errorMessage, type HostEntityState } from '@pixsync/core';
import { getRecord, getString, isRecord } from '@pixsync/sdk';
import { log } from './log-service';

export type StateListener = (state: HostEntityState | null) => void;

export interface HomeAssistantClient {
  getState(entityId: string): Promise<HostEntityState | null>;
  /** Returns an unsubscribe function */
  onStateChange(entityId: string, listener: StateListener): () => void;
  callService(domain: string, service: string, data: Record<string, unknown>): Promise<void>;
  /** Absolute URL for a host-relative path such as /api/media_player_proxy/... */
  resolveUrl(path: string): string;
  authHeaders(): Record<string, string>;
}

export interface HomeAssistantSocketOptions {
  url: string;
  token: string;
  reconnectDelayMs?: number;
  requestTimeoutMs?: number;
}

type ConnectionEvents = {
  'connected': { haVersion: string | null };
  'disconnected': { reason: string };
};

interface PendingRequest {
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Convert a raw `state` object from the WebSocket API
 */
export function toEntityState(raw: unknown): HostEntityState | null {
  const entityId = getString(raw, 'entity_id');
  const state = getString(raw, 'state');
  if (!entityId || state === null) return null;
  return {
    entityId,
    state,
    attributes: getRecord(raw, 'attributes') ?? {},
    lastUpdated: getString(raw, 'last_updated') ?? undefined
  };
}

export class HomeAssistantSocket extends EventEmitter<ConnectionEvents> implements HomeAssistantClient {
  private ws: WebSocket | null = null;
  private nextId = 1;
  private pending = new Map<number, PendingRequest>();
  private listeners = new Map<string, Set<StateListener>>();
  private states = new Map<string, HostEntityState>();
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private authenticated = false;
  private closing = false;

  private readonly baseUrl: string;
  private readonly reconnectDelayMs: number;
  private readonly requestTimeoutMs: number;

  constructor(private options: HomeAssistantSocketOptions) {
    super();
    this.baseUrl = options.url.replace(/\/+$/, '');
    this.reconnectDelayMs = options.reconnectDelayMs ?? 5000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10000;
  }

  isConnected(): boolean {
    return this.authenticated;
  }

  /**
   * Open the socket and wait for authentication
   */
  connect(): Promise<void> {
    this.closing = false;
    const wsUrl = `${this.baseUrl.replace(/^http/, 'ws')}/api/websocket`;

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(wsUrl);
      this.ws = ws;
      let settled = false;

      ws.on('message', (raw) => {
        let message: unknown;
        try {
          message = JSON.parse(raw.toString());
        } catch (error) {
          log.warn('HomeAssistant', 'Ignoring malformed message', { error: errorMessage(error) });
          return;
        }

        const type = getString(message, 'type');
        if (type === 'auth_required') {
          ws.send(JSON.stringify({ type: 'auth', access_token: this.options.token }));
        } else if (type === 'auth_ok') {
          this.authenticated = true;
          log.info('HomeAssistant', 'Connected', { url: this.baseUrl });
          this.emit('connected', { haVersion: getString(message, 'ha_version') });
          this.onAuthenticated().then(() => {
            if (!settled) {
              settled = true;
              resolve();
            }
          }, (error: unknown) => {
            log.error('HomeAssistant', 'Initial sync failed', { error: errorMessage(error) });
            if (!settled) {
              settled = true;
              reject(error instanceof Error ? error : new Error(errorMessage(error)));
            }
          });
        } else if (type === 'auth_invalid') {
          this.closing = true;
          const reason = getString(message, 'message') ?? 'authentication rejected';
          ws.close();
          if (!settled) {
            settled = true;
            reject(new Error(`Home Assistant auth failed: ${reason}`));
          }
        } else {
          this.handleMessage(message);
        }
      });

      ws.on('error', (error) => {
        log.warn('HomeAssistant', 'Socket error', { error: error.message });
        if (!settled) {
          settled = true;
          reject(error);
        }
      });

      ws.on('close', () => {
        this.authenticated = false;
        this.rejectPending('connection closed');
        this.emit('disconnected', { reason: 'closed' });
        if (!this.closing) {
          this.scheduleReconnect();
        }
      });
    });
  }

  disconnect(): void {
    this.closing = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.ws?.close();
    this.ws = null;
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;
    log.info('HomeAssistant', `Reconnecting in ${this.reconnectDelayMs}ms`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch((error: unknown) => {
        log.warn('HomeAssistant', 'Reconnect failed', { error: errorMessage(error) });
        this.scheduleReconnect();
      });
    }, this.reconnectDelayMs);
  }

  private async onAuthenticated(): Promise<void> {
    await this.request({ type: 'subscribe_events', event_type: 'state_changed' });

    const states = await this.request({ type: 'get_states' });
    if (Array.isArray(states)) {
      for (const raw of states) {
        const state = toEntityState(raw);
        if (state) this.updateState(state.entityId, state);
      }
    }
  }

  private handleMessage(message: unknown): void {
    const type = getString(message, 'type');

    if (type === 'result' && isRecord(message)) {
      const id = typeof message.id === 'number' ? message.id : -1;
      const pending = this.pending.get(id);
      if (!pending) return;
      this.pending.delete(id);
      clearTimeout(pending.timer);

      if (message.success === true) {
        pending.resolve(message.result);
      } else {
        const reason = getString(getRecord(message, 'error'), 'message') ?? 'request failed';
        pending.reject(new Error(reason));
      }
      return;
    }

    if (type === 'event') {
      const data = getRecord(getRecord(message, 'event'), 'data');
      const entityId = getString(data, 'entity_id');
      if (!entityId) return;
      this.updateState(entityId, toEntityState(data?.new_state));
    }
  }

  private updateState(entityId: string, state: HostEntityState | null): void {
    if (state) {
      this.states.set(entityId, state);
    } else {
      this.states.delete(entityId);
    }

    for (const listener of this.listeners.get(entityId) ?? []) {
      try {
        listener(state);
      } catch (error) {
        log.error('HomeAssistant', `State listener for ${entityId} failed`, { error: errorMessage(error) });
      }
    }
  }

  private request(payload: Record<string, unknown>): Promise<unknown> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error('Home Assistant is not connected'));
    }

    const id = this.nextId++;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new Error(`Home Assistant request timed out after ${this.requestTimeoutMs}ms`));
      }, this.requestTimeoutMs);

      this.pending.set(id, { resolve, reject, timer });
      ws.send(JSON.stringify({ id, ...payload }));
    });
  }

  private rejectPending(reason: string): void {
    for (const [id, pending] of this.pending) {
      clearTimeout(pending.timer);
      pending.reject(new Error(reason));
      this.pending.delete(id);
    }
  }

  // ========================================
  // HomeAssistantClient
  // ========================================

  async getState(entityId: string): Promise<HostEntityState | null> {
    return this.states.get(entityId) ?? null;
  }

  onStateChange(entityId: string, listener: StateListener): () => void {
    const set = this.listeners.get(entityId) ?? new Set<StateListener>();
    set.add(listener);
    this.listeners.set(entityId, set);
    return () => {
      set.delete(listener);
    };
  }

  async callService(domain: string, service: string, data: Record<string, unknown>): Promise<void> {
    await this.request({ type: 'call_service', domain, service, service_data: data });
  }

  resolveUrl(path: string): string {
    if (/^https?:\/\//i.test(path)) return path;
    return `${this.baseUrl}${path.startsWith('/') ? '' : '/'}${path}`;
  }

  authHeaders(): Record<string, string> {
    return { 'Authorization': `Bearer ${this.options.token}` };
  }
}
