/**
 * Light sync
 *
 * Pushes the artwork palette to Home Assistant lights and WLED controllers.
 * Targets are updated concurrently; one failing target never blocks the
 * others and is reported in the result list.
 */

import {
  LightUpdateError,
  abortMessage,
  brightnessToPercent,
  errorMessage,
  scopedSignal,
  whenAborted,
  type Palette,
  type Rgb
} from '@pixsync/core';
import type { WledConfig } from '../config';
import type { HomeAssistantClient } from './home-assistant-client';
import { log } from './log-service';

export interface LightSyncOptions {
  lights: string[];
  wled: WledConfig;
  timeoutMs: number;
  callService: HomeAssistantClient['callService'];
  now?: () => Date;
}

export interface LightTargetResult {
  target: string;
  ok: boolean;
  error?: string;
}

/**
 * WLED "only at night" window: 18:00 to 06:00 local time
 */
export function isNightTime(date: Date): boolean {
  const hour = date.getHours();
  return hour >= 18 || hour < 6;
}

/**
 * Body for `POST /json/state`. Segment colours repeat the last palette
 * entry when fewer than three were found.
 */
export function buildWledState(palette: Palette, wled: WledConfig): Record<string, unknown> {
  const colors: Rgb[] = palette.colors.length > 0 ? [...palette.colors] : [palette.average];
  while (colors.length < 3) {
    colors.push(colors[colors.length - 1] ?? palette.average);
  }

  const percent = brightnessToPercent(palette.brightness);
  return {
    on: true,
    bri: Math.round((wled.brightness * percent) / 100),
    seg: [{
      id: 0,
      col: colors.slice(0, 3),
      fx: wled.effect,
      pal: wled.palette,
      sx: wled.speed,
      ix: wled.intensity
    }]
  };
}

async function withTimeout(timeoutMs: number, run: (signal: AbortSignal) => Promise<void>): Promise<void> {
  const scoped = scopedSignal(timeoutMs);
  try {
    const outcome = await Promise.race([
      run(scoped.signal).then(() => 'done' as const),
      whenAborted(scoped.signal, () => 'timeout' as const)
    ]);
    if (outcome === 'timeout') {
      throw new Error(abortMessage(scoped.signal));
    }
  } finally {
    scoped.dispose();
  }
}

export class LightSync {
  private readonly now: () => Date;

  constructor(private options: LightSyncOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Colour every target from the palette
   */
  async apply(palette: Palette): Promise<LightTargetResult[]> {
    const [r, g, b] = palette.colors[0] ?? palette.average;
    const brightnessPct = brightnessToPercent(palette.brightness);

    const wledOn = !this.options.wled.onlyAtNight || isNightTime(this.now());
    const wledBody = wledOn ? buildWledState(palette, this.options.wled) : { on: false };

    return this.run(
      entityId => this.options.callService('light', 'turn_on', {
        entity_id: entityId,
        rgb_color: [r, g, b],
        brightness_pct: brightnessPct
      }),
      wledBody
    );
  }

  /**
   * Switch every target off
   */
  async turnOff(): Promise<LightTargetResult[]> {
    return this.run(
      entityId => this.options.callService('light', 'turn_off', { entity_id: entityId }),
      { on: false }
    );
  }

  private async run(
    updateLight: (entityId: string) => Promise<void>,
    wledBody: Record<string, unknown>
  ): Promise<LightTargetResult[]> {
    const targets: Array<{ target: string; update: (signal: AbortSignal) => Promise<void> }> = [
      ...this.options.lights.map(entityId => ({
        target: entityId,
        update: () => updateLight(entityId)
      })),
      ...this.options.wled.ips.map(ip => ({
        target: `wled:${ip}`,
        update: (signal: AbortSignal) => this.postWled(ip, wledBody, signal)
      }))
    ];

    const settled = await Promise.allSettled(
      targets.map(({ target, update }) => withTimeout(this.options.timeoutMs, update).catch((error: unknown) => {
        throw new LightUpdateError(target, errorMessage(error));
      }))
    );

    return settled.map((outcome, index) => {
      const target = targets[index]?.target ?? 'unknown';
      if (outcome.status === 'fulfilled') {
        return { target, ok: true };
      }
      const message = errorMessage(outcome.reason);
      log.warn('LightSync', message);
      return { target, ok: false, error: message };
    });
  }

  private async postWled(ip: string, body: Record<string, unknown>, signal: AbortSignal): Promise<void> {
    const response = await fetch(`http://${ip}/json/state`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
  }
}
