/**
 * In-process stand-ins for server tests
 */

import { vi } from 'vitest';
import type { HostEntityState } from '@pixsync/core';
import type { HomeAssistantClient, StateListener } from './services/home-assistant-client';
import { normalizeEntry, type EntryConfig, type ServerConfig } from './config';

export interface ServiceCall {
  domain: string;
  service: string;
  data: Record<string, unknown>;
}

export class FakeHomeAssistant implements HomeAssistantClient {
  readonly calls: ServiceCall[] = [];
  private states = new Map<string, HostEntityState>();
  private listeners = new Map<string, Set<StateListener>>();

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
    this.calls.push({ domain, service, data });
  }

  resolveUrl(path: string): string {
    return `http://ha.test${path}`;
  }

  authHeaders(): Record<string, string> {
    return { Authorization: 'Bearer test-token' };
  }

  /** Store a state without notifying */
  setState(entityId: string, state: string, attributes: Record<string, unknown> = {}): HostEntityState {
    const entity = { entityId, state, attributes };
    this.states.set(entityId, entity);
    return entity;
  }

  /** Store a state and notify listeners */
  push(entityId: string, state: string, attributes: Record<string, unknown> = {}): void {
    const entity = this.setState(entityId, state, attributes);
    for (const listener of this.listeners.get(entityId) ?? []) {
      listener(entity);
    }
  }

  listenerCount(entityId: string): number {
    return this.listeners.get(entityId)?.size ?? 0;
  }
}

export const TEST_TIMEOUTS: ServerConfig['timeouts'] = {
  artworkMs: 1000,
  lyricsMs: 1000,
  deviceMs: 1000,
  lightMs: 1000
};

export function testEntry(overrides: Record<string, unknown> = {}): EntryConfig {
  return normalizeEntry({
    title: 'Living Room',
    mediaPlayer: 'media_player.living_room',
    pixooIp: '10.0.0.5',
    lights: ['light.desk'],
    ...overrides
  }, 0);
}

/**
 * A Pixoo64 that accepts every command. Draw commands are recorded as
 * parsed bodies; channel reads only bump a counter.
 */
export function fakePixoo(selectIndex = 0) {
  const commands: Array<Record<string, unknown>> = [];
  const state = { channelReads: 0 };
  const fetchMock = vi.fn(async (_input: string | URL | Request, init?: RequestInit) => {
    const body: unknown = JSON.parse(String(init?.body));
    const command = typeof body === 'object' && body !== null ? { ...body } : {};
    if ('Command' in command && command.Command === 'Channel/GetIndex') {
      state.channelReads++;
      return new Response(JSON.stringify({ error_code: 0, SelectIndex: selectIndex }));
    }
    commands.push(command);
    return new Response('{"error_code":0}');
  });
  return { commands, state, fetchMock };
}
