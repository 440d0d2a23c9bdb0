/**
 * Pixoo64 device client
 *
 * Every command is a JSON `POST http://<ip>:80/post` bounded by a timeout.
 * Transport failures, non-200 answers and non-zero `error_code` replies
 * all surface as DeviceUnreachableError.
 */

import {
  DeviceUnreachableError,
  abortMessage,
  errorMessage,
  scopedSignal,
  type LyricsLine,
  type LyricsSink,
  type ProcessedFrame
} from '@pixsync/core';
import { isRecord } from '@pixsync/sdk';
import type { ClockAlign } from '../config';
import { visualOrder } from './bidi-text';

/** Firmware refuses higher GIF ids; the counter is reset past this */
export const MAX_PIC_ID = 32;

/** Characters per lyrics line for each device font */
export const LYRICS_CHAR_LIMITS: Record<number, number> = {
  2: 12, 4: 10, 32: 12, 52: 10, 58: 8, 62: 7, 48: 12, 80: 10, 158: 8, 186: 7, 190: 10, 590: 8
};

export type PixooCommand = { Command: string } & Record<string, unknown>;

export interface PixooItem {
  TextId: string;
  type: number;
  x: number;
  y: number;
  font: number;
  color: string;
  TextString?: string;
}

export interface PixooText {
  text: string;
  x: number;
  y: number;
  font?: number;
  color?: string;
  textId?: number;
  align?: 1 | 2 | 3;
}

export interface PixooDeviceOptions {
  host: string;
  timeoutMs?: number;
}

// ========================================
// Payload builders
// ========================================

export interface OverlayOptions {
  showClock: boolean;
  showTemperature: boolean;
  clockAlign: ClockAlign;
  /** Forced colour, white when null */
  color: string | null;
  /** Rendered reading such as "21°C"; the device's own sensor is used when absent */
  temperature?: string | null;
  /** "Title - Artist" line drawn above the bottom row */
  text?: string | null;
  /** First TextId is baseId + 1 */
  baseId?: number;
}

/**
 * Clock (type 3) and temperature (type 17 device sensor, or type 22 text)
 * items along the bottom row, plus an optional type 22 text line
 */
export function buildItemList(options: OverlayOptions): PixooItem[] {
  const color = options.color ?? '#FFFFFF';
  let textId = options.baseId ?? 100;
  const items: PixooItem[] = [];

  if (options.showClock) {
    items.push({
      TextId: String(++textId),
      type: 3,
      x: options.clockAlign === 'Right' ? 34 : 2,
      y: 57,
      font: 2,
      color
    });
  }

  if (options.showTemperature) {
    const item: PixooItem = {
      TextId: String(++textId),
      type: 17,
      x: options.clockAlign === 'Left' && options.showClock ? 34 : 2,
      y: 57,
      font: 2,
      color
    };
    if (options.temperature) {
      item.type = 22;
      item.TextString = options.temperature;
    }
    items.push(item);
  }

  if (options.text) {
    items.push({
      TextId: String(++textId),
      type: 22,
      x: 0,
      y: options.showClock || options.showTemperature ? 48 : 57,
      font: 2,
      color,
      TextString: visualOrder(options.text)
    });
  }

  return items;
}

/**
 * Split a lyric into at most two device lines. A word that does not fit
 * the second line is still appended to it and ends the wrap.
 */
export function wrapLyric(text: string, font: number): string[] {
  const maxChars = LYRICS_CHAR_LIMITS[font] ?? 10;
  let line1 = '';
  let line2 = '';

  for (const word of text.split(' ').filter(Boolean)) {
    const fitsLine1 = line1.length + word.length + (line1 ? 1 : 0) <= maxChars;
    if (!line2 && fitsLine1) {
      line1 = line1 ? `${line1} ${word}` : word;
      continue;
    }

    line2 = line2 ? `${line2} ${word}` : word;
    if (line2.length > maxChars) break;
  }

  return line2 ? [line1, line2] : [line1];
}

// ========================================
// Device
// ========================================

export class PixooDevice {
  private readonly url: string;
  private readonly timeoutMs: number;
  private picId = 0;

  constructor(private options: PixooDeviceOptions) {
    this.url = `http://${options.host}:80/post`;
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  get host(): string {
    return this.options.host;
  }

  async sendCommand(payload: PixooCommand): Promise<Record<string, unknown>> {
    const scoped = scopedSignal(this.timeoutMs);

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: scoped.signal
      });

      if (!response.ok) {
        throw new DeviceUnreachableError(this.options.host, `HTTP ${response.status}`);
      }

      // Some firmware answers with text/html content type
      const body: unknown = JSON.parse(await response.text());
      const reply = isRecord(body) ? body : {};
      const errorCode = reply.error_code;
      if (typeof errorCode === 'number' && errorCode !== 0) {
        throw new DeviceUnreachableError(this.options.host, `${payload.Command} returned error_code ${errorCode}`);
      }
      return reply;
    } catch (error) {
      if (error instanceof DeviceUnreachableError) throw error;
      const reason = scoped.signal.aborted ? abortMessage(scoped.signal) : errorMessage(error);
      throw new DeviceUnreachableError(this.options.host, reason);
    } finally {
      scoped.dispose();
    }
  }

  /**
   * Push a single-frame animation. The GIF id counter is reset on first
   * use and whenever it passes MAX_PIC_ID.
   */
  async sendFrame(frame: Pick<ProcessedFrame, 'pixels' | 'width'>): Promise<void> {
    if (this.picId === 0 || this.picId >= MAX_PIC_ID) {
      await this.resetGifId();
    }
    this.picId += 1;

    await this.sendCommand({
      Command: 'Draw/SendHttpGif',
      PicNum: 1,
      PicWidth: frame.width,
      PicOffset: 0,
      PicID: this.picId,
      PicSpeed: 1000,
      PicData: Buffer.from(frame.pixels).toString('base64')
    });
  }

  async resetGifId(): Promise<void> {
    await this.sendCommand({ Command: 'Draw/ResetHttpGifId' });
    this.picId = 0;
  }

  async sendItemList(items: PixooItem[]): Promise<void> {
    await this.sendCommand({ Command: 'Draw/SendHttpItemList', ItemList: items });
  }

  async sendText(options: PixooText): Promise<void> {
    await this.sendCommand({
      Command: 'Draw/SendHttpText',
      TextId: options.textId ?? 1,
      x: options.x,
      y: options.y,
      dir: 0,
      font: options.font ?? 2,
      TextWidth: 64,
      speed: 10,
      TextString: visualOrder(options.text),
      color: options.color ?? '#FFFFFF',
      align: options.align ?? 1
    });
  }

  async clearText(): Promise<void> {
    await this.sendCommand({ Command: 'Draw/ClearHttpText' });
  }

  async getChannelIndex(): Promise<number> {
    const reply = await this.sendCommand({ Command: 'Channel/GetIndex' });
    const index = reply.SelectIndex;
    if (typeof index !== 'number') {
      throw new DeviceUnreachableError(this.options.host, 'Channel/GetIndex reply without SelectIndex');
    }
    return index;
  }
}

// ========================================
// Lyrics sink
// ========================================

export interface PixooLyricsSinkOptions {
  font: () => number;
  color: () => string | null;
}

/**
 * Draws lyric lines along the bottom of the panel, centred
 */
export class PixooLyricsSink implements LyricsSink {
  constructor(private device: PixooDevice, private options: PixooLyricsSinkOptions) {}

  async show(line: LyricsLine): Promise<void> {
    const font = this.options.font();
    const color = this.options.color() ?? '#FFFFFF';
    const lines = wrapLyric(line.text, font);
    const baseY = lines.length === 1 ? 58 : 56;

    for (const [index, text] of lines.entries()) {
      await this.device.sendText({
        text,
        x: 0,
        y: Math.min(baseY + index * 8, 59),
        font,
        color,
        textId: index + 1,
        align: 1
      });
    }
  }

  async clear(): Promise<void> {
    await this.device.clearText();
  }
}
