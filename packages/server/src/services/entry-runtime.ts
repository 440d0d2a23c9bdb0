/**
 * EntryRuntime - one media player driving one Pixoo64
 *
 * Watches the player's state and runs the display pipeline: resolve
 * artwork, render the frame, push it to the device and the lights, and keep
 * the lyrics synchronizer fed. At most one run is active per entry; a newer
 * state change aborts the one in flight.
 */

import {
  ArtworkResolver,
  LyricsSynchronizer,
  NoArtworkError,
  RunSupersededError,
  captureSnapshot,
  errorMessage,
  isOffState,
  resolveCropPolicy,
  resolveDisplayFeatures,
  rgbToHex,
  trackKey,
  type AddonRegistry,
  type DisplayFeatures,
  type HostEntityState,
  type MediaSnapshot,
  type MediaState,
  type ProcessedFrame,
  type ResolutionAttempt
} from '@pixsync/core';
import { createEntryRegistry } from '../../plugins';
import type { EntryConfig, ServerConfig } from '../config';
import type { EntityRegistry, EntryEntities, EntryStatus, EntityKey } from './entity-store';
import type { HomeAssistantClient } from './home-assistant-client';
import { ImageProcessor, solidFrame, tvIconFrame, type FrameOptions } from './image-processor';
import { LightSync } from './light-sync';
import { log } from './log-service';
import { PixooDevice, PixooLyricsSink, buildItemList } from './pixoo-device';

const INFO_TEXT_COLOR = '#646464';
const SEARCHING_TEXT = 'Searching...';

export interface EntryRuntimeOptions {
  entry: EntryConfig;
  client: HomeAssistantClient;
  entities: EntityRegistry;
  timeouts: ServerConfig['timeouts'];
  /** Provider registry; built from the entry when omitted */
  registry?: AddonRegistry;
  /** How long a pause lasts before the display goes to its off state */
  pausedDelayMs?: number;
  lyricsPollMs?: number;
  now?: () => number;
}

export interface EntrySummary {
  id: string;
  title: string;
  mediaPlayer: string;
  pixooIp: string;
  values: EntryEntities;
  status: EntryStatus;
}

/**
 * Burned/item-list text, "Title - Artist"
 */
export function displayText(snapshot: MediaSnapshot, clean: boolean): string | null {
  const title = clean ? snapshot.cleanedTitle : snapshot.title;
  if (!title) return null;
  return snapshot.artist ? `${title} - ${snapshot.artist}` : title;
}

/**
 * Sensor reading as the device should print it, e.g. "21°C"
 */
export function formatTemperature(state: HostEntityState | null): string | null {
  if (!state) return null;
  const value = Number.parseFloat(state.state);
  if (!Number.isFinite(value)) return null;
  const unit = state.attributes.unit_of_measurement;
  return `${Math.trunc(value)}${typeof unit === 'string' ? unit : ''}`;
}

function throwIfSuperseded(signal: AbortSignal): void {
  if (signal.aborted) throw new RunSupersededError();
}

export class EntryRuntime {
  readonly entry: EntryConfig;

  private client: HomeAssistantClient;
  private entities: EntityRegistry;
  private registry: AddonRegistry;
  private resolver: ArtworkResolver;
  private processor: ImageProcessor;
  private device: PixooDevice;
  private lyrics: LyricsSynchronizer;
  private lights: LightSync;

  private values: EntryEntities;
  private status: EntryStatus;
  private textColor: string | null = null;
  /** An info line is on the panel and must go before the next frame */
  private infoShown = false;

  private controller: AbortController | null = null;
  private current: Promise<void> = Promise.resolve();
  private pausedTimer: ReturnType<typeof setTimeout> | null = null;
  private unsubscribe: (() => void) | null = null;
  private lastState: MediaState | null = null;
  private lastTrack: string | null = null;
  private lastArtworkUrl: string | null = null;

  private readonly pausedDelayMs: number;
  private readonly now: () => number;

  constructor(options: EntryRuntimeOptions) {
    const { entry, client, timeouts } = options;
    this.entry = entry;
    this.client = client;
    this.entities = options.entities;
    this.pausedDelayMs = options.pausedDelayMs ?? 5000;
    this.now = options.now ?? Date.now;

    this.registry = options.registry ?? createEntryRegistry(entry, client);
    this.resolver = new ArtworkResolver(this.registry, { attemptTimeoutMs: timeouts.artworkMs });
    this.processor = new ImageProcessor(entry.display.imagesCacheSize);
    this.device = new PixooDevice({ host: entry.pixooIp, timeoutMs: timeouts.deviceMs });

    const sink = new PixooLyricsSink(this.device, {
      font: () => entry.display.lyricsFont,
      color: () => entry.display.fontColor ?? this.textColor
    });
    this.lyrics = new LyricsSynchronizer(this.registry, sink, {
      pollIntervalMs: options.lyricsPollMs,
      fetchTimeoutMs: timeouts.lyricsMs,
      now: this.now
    });
    this.lyrics.on('lyrics-loaded', ({ track }) => {
      this.publish({ lyricsLines: track?.lines.length ?? 0 });
    });
    this.lyrics.on('error', ({ message }) => {
      log.warn('EntryRuntime', `[${entry.title}] Lyrics display failed: ${message}`);
    });

    this.lights = new LightSync({
      lights: entry.lights,
      wled: entry.wled,
      timeoutMs: timeouts.lightMs,
      callService: (domain, service, data) => client.callService(domain, service, data),
      now: () => new Date(this.now())
    });

    this.values = this.entities.load(entry.id, {
      displayMode: entry.display.mode,
      cropMode: entry.display.cropMode,
      lyricsOffset: entry.display.lyricsOffset,
      enabled: true,
      fullControl: entry.display.fullControl
    });
    this.lyrics.setOffset(this.values.lyricsOffset);

    this.status = {
      state: this.values.enabled ? 'unknown' : 'disabled',
      title: null,
      artist: null,
      artworkSource: null,
      attempts: [],
      lyricsLines: 0,
      lastError: null,
      updatedAt: this.now()
    };
  }

  // ========================================
  // Lifecycle
  // ========================================

  async start(): Promise<void> {
    await this.registry.initializeAll();
    await this.checkDevice();
    this.entities.publishStatus(this.entry.id, this.status);

    this.unsubscribe = this.client.onStateChange(this.entry.mediaPlayer, state => {
      this.handleState(state).catch((error: unknown) => {
        log.error('EntryRuntime', `[${this.entry.title}] State handling failed`, { error: errorMessage(error) });
      });
    });

    log.info('EntryRuntime', `[${this.entry.title}] Watching ${this.entry.mediaPlayer} for ${this.entry.pixooIp}`);
    await this.handleState(await this.client.getState(this.entry.mediaPlayer));
  }

  /**
   * Startup reachability check; an offline panel is logged, not fatal
   */
  private async checkDevice(): Promise<void> {
    try {
      const channel = await this.device.getChannelIndex();
      log.info('EntryRuntime', `[${this.entry.title}] Connected to ${this.entry.pixooIp}, channel ${channel}`);
    } catch (error) {
      log.warn('EntryRuntime', `[${this.entry.title}] Pixoo not reachable at startup: ${errorMessage(error)}`);
    }
  }

  async stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.cancelPausedTimer();
    this.controller?.abort(new RunSupersededError());
    await this.current;

    this.lyrics.dispose();
    this.processor.clearCache();
    await this.registry.disposeAll();
    this.entities.release(this.entry.id);
  }

  /** Resolves when the run in flight, if any, has finished */
  whenIdle(): Promise<void> {
    return this.current;
  }

  getValues(): EntryEntities {
    return { ...this.values };
  }

  getStatus(): EntryStatus {
    return { ...this.status };
  }

  summary(): EntrySummary {
    return {
      id: this.entry.id,
      title: this.entry.title,
      mediaPlayer: this.entry.mediaPlayer,
      pixooIp: this.entry.pixooIp,
      values: this.getValues(),
      status: this.getStatus()
    };
  }

  /**
   * Persist a user-adjustable value and apply it
   */
  async setEntity<K extends EntityKey>(key: K, value: EntryEntities[K]): Promise<EntryEntities> {
    this.values[key] = value;
    if (key === 'lyricsOffset') {
      this.values.lyricsOffset = this.lyrics.setOffset(this.values.lyricsOffset);
    }
    this.entities.set(this.entry.id, key, this.values[key]);
    log.info('EntryRuntime', `[${this.entry.title}] ${key} set to ${String(this.values[key])}`);

    if (key === 'enabled' && !this.values.enabled) {
      this.disable();
    } else if (key !== 'lyricsOffset') {
      await this.refresh();
    }
    return this.getValues();
  }

  /**
   * Re-run the pipeline against the player's current state
   */
  async refresh(): Promise<void> {
    await this.handleState(await this.client.getState(this.entry.mediaPlayer), true);
  }

  private disable(): void {
    this.cancelPausedTimer();
    this.controller?.abort(new RunSupersededError());
    this.lyrics.stop();
    this.publish({ state: 'disabled' });
  }

  // ========================================
  // State handling
  // ========================================

  /**
   * Entry point for every state change of the media player
   */
  async handleState(entity: HostEntityState | null, force = false): Promise<void> {
    if (!this.values.enabled) {
      log.debug('EntryRuntime', `[${this.entry.title}] Disabled, ignoring state change`);
      return;
    }

    this.cancelPausedTimer();

    const snapshot = captureSnapshot(
      entity ?? { entityId: this.entry.mediaPlayer, state: 'unavailable', attributes: {} },
      this.now()
    );
    this.lyrics.updateSnapshot(snapshot);

    const previous = this.lastState;
    this.lastState = snapshot.state;

    if (isOffState(snapshot.state)) {
      if (!force && previous !== null && isOffState(previous)) return;
      this.lastTrack = null;
      await this.schedule(signal => this.runOff(snapshot, signal));
      return;
    }

    if (snapshot.state === 'paused') {
      this.pausedTimer = setTimeout(() => {
        this.pausedTimer = null;
        this.lastTrack = null;
        this.schedule(signal => this.runOff(snapshot, signal)).catch((error: unknown) => {
          log.error('EntryRuntime', `[${this.entry.title}] Paused handling failed`, { error: errorMessage(error) });
        });
      }, this.pausedDelayMs);
      return;
    }

    const wasInactive = previous === null || previous === 'paused' || isOffState(previous);
    if (wasInactive && snapshot.state === 'playing') {
      log.info('EntryRuntime', `[${this.entry.title}] Playback started, clearing image cache`);
      this.processor.clearCache();
    }

    const key = trackKey(snapshot);
    const changed = force
      || wasInactive
      || key !== this.lastTrack
      || snapshot.artworkUrl !== this.lastArtworkUrl;
    if (!changed) return;

    this.lastTrack = key;
    this.lastArtworkUrl = snapshot.artworkUrl;
    await this.schedule(signal => this.runActive(snapshot, signal));
  }

  /**
   * Supersede the run in flight and start a new one. Errors end up on the
   * status sensor; nothing propagates.
   */
  private schedule(work: (signal: AbortSignal) => Promise<void>): Promise<void> {
    this.controller?.abort(new RunSupersededError());
    const controller = new AbortController();
    this.controller = controller;

    const previous = this.current;
    const run = previous
      .then(() => {
        throwIfSuperseded(controller.signal);
        return work(controller.signal);
      })
      .catch((error: unknown) => {
        if (error instanceof RunSupersededError || controller.signal.aborted) {
          log.debug('EntryRuntime', `[${this.entry.title}] Run superseded`);
          return;
        }
        log.error('EntryRuntime', `[${this.entry.title}] Display update failed`, { error: errorMessage(error) });
        this.publish({ lastError: errorMessage(error) });
      })
      .finally(() => {
        if (this.controller === controller) this.controller = null;
      });

    this.current = run;
    return run;
  }

  private cancelPausedTimer(): void {
    if (this.pausedTimer) {
      clearTimeout(this.pausedTimer);
      this.pausedTimer = null;
    }
  }

  // ========================================
  // Runs
  // ========================================

  private async runOff(snapshot: MediaSnapshot, signal: AbortSignal): Promise<void> {
    log.info('EntryRuntime', `[${this.entry.title}] Player is ${snapshot.state}`);
    this.lyrics.stop();
    let lastError: string | null = null;

    if (this.values.fullControl) {
      const features = this.features();
      try {
        await this.device.sendFrame(solidFrame());
        throwIfSuperseded(signal);
        await this.device.sendItemList(buildItemList({
          showClock: features.showClock,
          showTemperature: features.showTemperature,
          clockAlign: this.entry.display.clockAlign,
          color: this.entry.display.fontColor,
          temperature: await this.readTemperature(features),
          baseId: 200
        }));
      } catch (error) {
        if (signal.aborted) throw error;
        lastError = errorMessage(error);
        log.warn('EntryRuntime', `[${this.entry.title}] ${lastError}`);
      }
    }

    throwIfSuperseded(signal);
    await this.lights.turnOff();

    this.publish({
      state: snapshot.state,
      title: null,
      artist: null,
      artworkSource: null,
      attempts: [],
      lyricsLines: 0,
      lastError
    });
  }

  private async runActive(snapshot: MediaSnapshot, signal: AbortSignal): Promise<void> {
    const features = this.features();
    const title = this.entry.title;
    log.info('EntryRuntime', `[${title}] ${snapshot.state}: ${snapshot.artist ?? '?'} - ${snapshot.title ?? '?'}`);

    this.publish({
      state: snapshot.state,
      title: snapshot.title,
      artist: snapshot.artist,
      artworkSource: null,
      attempts: [],
      lastError: null
    });

    if (features.showLyrics && snapshot.kind === 'music') {
      this.loadLyrics(snapshot);
    } else {
      this.lyrics.stop();
    }

    if (snapshot.kind === 'tv' && this.entry.display.tvIcon && !snapshot.artworkUrl) {
      await this.present(tvIconFrame(), features, snapshot, signal, false);
      return;
    }

    if (!snapshot.artworkUrl || features.forceAi) {
      await this.sendInfo(SEARCHING_TEXT, signal);
    }

    let frame: ProcessedFrame;
    try {
      const resolution = await this.resolver.resolve(snapshot, {
        forceAi: features.forceAi,
        aiModel: features.aiModel,
        signal
      });
      this.publish({ artworkSource: resolution.artwork.source, attempts: resolution.attempts });
      frame = await this.processor.process(resolution.artwork, this.frameOptions(features, snapshot));
    } catch (error) {
      if (error instanceof RunSupersededError || signal.aborted) throw error;
      const attempts: ResolutionAttempt[] = error instanceof NoArtworkError ? error.attempts : this.status.attempts;
      log.warn('EntryRuntime', `[${title}] ${errorMessage(error)}`);
      this.publish({ attempts, lastError: errorMessage(error) });
      await this.presentFallback(snapshot, features, signal);
      return;
    }

    throwIfSuperseded(signal);
    await this.present(frame, features, snapshot, signal, true);
  }

  /**
   * Push a frame and its overlays, and colour or switch off the lights
   */
  private async present(
    frame: ProcessedFrame,
    features: DisplayFeatures,
    snapshot: MediaSnapshot,
    signal: AbortSignal,
    lightsOn: boolean
  ): Promise<void> {
    this.textColor = rgbToHex(frame.textColor);

    const render = async () => {
      try {
        if (features.showLyrics || this.infoShown) {
          await this.clearText();
        }
        await this.device.sendFrame(frame);
        throwIfSuperseded(signal);
        await this.device.sendItemList(buildItemList({
          showClock: features.showClock,
          showTemperature: features.showTemperature,
          clockAlign: this.entry.display.clockAlign,
          color: this.entry.display.fontColor ?? this.textColor,
          temperature: await this.readTemperature(features),
          text: features.showText && !features.burned
            ? displayText(snapshot, this.entry.display.cleanTitle)
            : null
        }));
      } catch (error) {
        if (signal.aborted) throw error;
        log.warn('EntryRuntime', `[${this.entry.title}] ${errorMessage(error)}`);
        this.publish({ lastError: errorMessage(error) });
      }
    };

    await Promise.all([
      render(),
      lightsOn ? this.lights.apply(frame.palette) : this.lights.turnOff()
    ]);
  }

  /**
   * No artwork: info text on black when enabled, otherwise a black frame
   */
  private async presentFallback(snapshot: MediaSnapshot, features: DisplayFeatures, signal: AbortSignal): Promise<void> {
    const info = this.entry.display.infoFallback ? displayText(snapshot, this.entry.display.cleanTitle) : null;

    const render = async () => {
      try {
        if (this.infoShown) {
          await this.clearText();
        }
        await this.device.sendFrame(solidFrame());
        throwIfSuperseded(signal);
        if (info) {
          await this.device.sendText({ text: info, x: 0, y: 56, font: 2, color: INFO_TEXT_COLOR });
          this.infoShown = true;
        }
      } catch (error) {
        if (signal.aborted) throw error;
        log.warn('EntryRuntime', `[${this.entry.title}] ${errorMessage(error)}`);
      }
    };

    await Promise.all([render(), this.lights.turnOff()]);
    log.debug('EntryRuntime', `[${this.entry.title}] Fallback shown`, { info, lyrics: features.showLyrics });
  }

  /**
   * Grey status line at the bottom of the panel, over whatever is showing
   */
  private async sendInfo(text: string, signal: AbortSignal): Promise<void> {
    try {
      await this.device.sendText({ text, x: 0, y: 56, font: 2, color: INFO_TEXT_COLOR });
      this.infoShown = true;
    } catch (error) {
      if (signal.aborted) throw error;
      log.warn('EntryRuntime', `[${this.entry.title}] ${errorMessage(error)}`);
    }
  }

  private async clearText(): Promise<void> {
    await this.device.clearText();
    this.infoShown = false;
  }

  /**
   * Not bound to the run's signal: a refresh of the same track must not
   * cancel a fetch it would otherwise wait on.
   */
  private loadLyrics(snapshot: MediaSnapshot): void {
    const key = trackKey(snapshot);
    this.lyrics.load(snapshot).then(track => {
      if (track && this.lastTrack === key) {
        this.lyrics.start();
      }
    }, (error: unknown) => {
      log.warn('EntryRuntime', `[${this.entry.title}] Lyrics unavailable: ${errorMessage(error)}`);
    });
  }

  // ========================================
  // Helpers
  // ========================================

  private features(): DisplayFeatures {
    return resolveDisplayFeatures(this.values.displayMode, this.entry.display.features);
  }

  private frameOptions(features: DisplayFeatures, snapshot: MediaSnapshot): FrameOptions {
    const { display } = this.entry;
    return {
      cropMode: this.values.cropMode,
      crop: resolveCropPolicy(this.values.cropMode, display.crop),
      features,
      enhance: {
        contrast: display.contrast,
        sharpness: display.sharpness,
        colorsEnhanced: display.colorsEnhanced,
        kernelEffect: display.kernelEffect,
        limitColors: display.limitColors
      },
      burnedText: features.burned ? displayText(snapshot, display.cleanTitle) : null,
      fontColor: display.fontColor
    };
  }

  private async readTemperature(features: DisplayFeatures): Promise<string | null> {
    const sensor = this.entry.temperatureSensor;
    if (!features.showTemperature || !sensor) return null;
    return formatTemperature(await this.client.getState(sensor));
  }

  private publish(update: Partial<EntryStatus>): void {
    this.status = { ...this.status, ...update, updatedAt: this.now() };
    this.entities.publishStatus(this.entry.id, this.status);
  }
}
