import { describe, it, expect, vi } from 'vitest';
import type { Palette } from '@pixsync/core';
import { LightSync, buildWledState, isNightTime } from './light-sync';
import type { WledConfig } from '../config';
import { requestUrl } from '../../plugins/test-helpers';

const palette: Palette = {
  average: [100, 50, 25],
  brightness: 102,
  colors: [[200, 0, 0], [0, 200, 0]]
};

function wled(overrides: Partial<WledConfig> = {}): WledConfig {
  return {
    ips: [],
    brightness: 255,
    effect: 38,
    speed: 60,
    intensity: 128,
    palette: 0,
    onlyAtNight: false,
    ...overrides
  };
}

describe('isNightTime', () => {
  it('covers 18:00 to 06:00', () => {
    expect(isNightTime(new Date(2026, 0, 1, 18, 0))).toBe(true);
    expect(isNightTime(new Date(2026, 0, 1, 5, 59))).toBe(true);
    expect(isNightTime(new Date(2026, 0, 1, 6, 0))).toBe(false);
    expect(isNightTime(new Date(2026, 0, 1, 17, 59))).toBe(false);
  });
});

describe('buildWledState', () => {
  it('pads the segment colours and scales brightness', () => {
    expect(buildWledState(palette, wled())).toEqual({
      on: true,
      bri: 102,
      seg: [{
        id: 0,
        col: [[200, 0, 0], [0, 200, 0], [0, 200, 0]],
        fx: 38,
        pal: 0,
        sx: 60,
        ix: 128
      }]
    });
  });

  it('uses the average colour when no dominant colours were found', () => {
    const state = buildWledState({ ...palette, colors: [] }, wled({ brightness: 128 }));
    expect(state.bri).toBe(51);
    expect(state.seg).toEqual([expect.objectContaining({ col: [[100, 50, 25], [100, 50, 25], [100, 50, 25]] })]);
  });
});

describe('LightSync', () => {
  it('updates the remaining lights when one fails', async () => {
    const callService = vi.fn(async (_domain: string, _service: string, data: Record<string, unknown>) => {
      if (data.entity_id === 'light.b') throw new Error('unavailable');
    });

    const sync = new LightSync({
      lights: ['light.a', 'light.b', 'light.c'],
      wled: wled(),
      timeoutMs: 1000,
      callService
    });

    const results = await sync.apply(palette);

    expect(callService).toHaveBeenCalledTimes(3);
    expect(callService).toHaveBeenCalledWith('light', 'turn_on', {
      entity_id: 'light.a',
      rgb_color: [200, 0, 0],
      brightness_pct: 40
    });
    expect(results).toEqual([
      { target: 'light.a', ok: true },
      { target: 'light.b', ok: false, error: 'Light light.b update failed: unavailable' },
      { target: 'light.c', ok: true }
    ]);
  });

  it('posts to every WLED controller', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response('{}'));
    vi.stubGlobal('fetch', fetchMock);

    const sync = new LightSync({
      lights: [],
      wled: wled({ ips: ['192.168.1.100', '192.168.1.101'] }),
      timeoutMs: 1000,
      callService: vi.fn(async () => undefined)
    });

    const results = await sync.apply(palette);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls.map(([input]) => requestUrl(input))).toEqual([
      'http://192.168.1.100/json/state',
      'http://192.168.1.101/json/state'
    ]);
    expect(results.map(r => r.target)).toEqual(['wled:192.168.1.100', 'wled:192.168.1.101']);
  });

  it('switches WLED off during the day when restricted to night', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response('{}'));
    vi.stubGlobal('fetch', fetchMock);

    const sync = new LightSync({
      lights: [],
      wled: wled({ ips: ['192.168.1.100'], onlyAtNight: true }),
      timeoutMs: 1000,
      callService: vi.fn(async () => undefined),
      now: () => new Date(2026, 0, 1, 12, 0)
    });

    await sync.apply(palette);

    expect(fetchMock.mock.calls[0]?.[1]?.body).toBe('{"on":false}');
  });

  it('reports a WLED error status', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('busy', { status: 503 })));

    const sync = new LightSync({
      lights: [],
      wled: wled({ ips: ['192.168.1.100'] }),
      timeoutMs: 1000,
      callService: vi.fn(async () => undefined)
    });

    expect(await sync.turnOff()).toEqual([
      { target: 'wled:192.168.1.100', ok: false, error: 'Light wled:192.168.1.100 update failed: HTTP 503' }
    ]);
  });

  it('bounds a hanging light call by the timeout', async () => {
    const sync = new LightSync({
      lights: ['light.slow'],
      wled: wled(),
      timeoutMs: 20,
      callService: () => new Promise<void>(() => undefined)
    });

    expect(await sync.turnOff()).toEqual([
      { target: 'light.slow', ok: false, error: 'Light light.slow update failed: timed out after 20ms' }
    ]);
  });

  it('turns lights off with turn_off', async () => {
    const callService = vi.fn(async () => undefined);
    const sync = new LightSync({ lights: ['light.a'], wled: wled(), timeoutMs: 1000, callService });

    await sync.turnOff();

    expect(callService).toHaveBeenCalledWith('light', 'turn_off', { entity_id: 'light.a' });
  });
});
