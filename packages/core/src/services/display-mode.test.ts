import { describe, it, expect } from 'vitest';
import { isCropMode, isDisplayMode, resolveCropPolicy, resolveDisplayFeatures } from './display-mode';
import type { DisplayFeatures } from '../types/index';

const DEFAULTS: DisplayFeatures = {
  showLyrics: false,
  showClock: true,
  showTemperature: false,
  showText: false,
  textBackground: true,
  specialMode: false,
  burned: false,
  forceAi: false,
  aiModel: 'turbo'
};

describe('resolveDisplayFeatures', () => {
  it('restores the configured features for Default', () => {
    expect(resolveDisplayFeatures('Default', DEFAULTS)).toEqual(DEFAULTS);
  });

  it('switches everything off for Clean', () => {
    expect(resolveDisplayFeatures('Clean', DEFAULTS)).toEqual({
      ...DEFAULTS,
      showClock: false,
      textBackground: false
    });
  });

  it('parses combined keywords', () => {
    expect(resolveDisplayFeatures('Burned | Clock (Background)', DEFAULTS)).toEqual({
      ...DEFAULTS,
      burned: true,
      showClock: true,
      textBackground: true
    });
  });

  it('picks the AI model from the mode', () => {
    const flux = resolveDisplayFeatures('AI Generation (Flux)', DEFAULTS);
    expect(flux.forceAi).toBe(true);
    expect(flux.aiModel).toBe('flux');

    const turbo = resolveDisplayFeatures('AI Generation (Turbo)', { ...DEFAULTS, aiModel: 'flux' });
    expect(turbo.aiModel).toBe('turbo');
  });

  it('drops the text background when no item text is drawn', () => {
    expect(resolveDisplayFeatures('Lyrics (Background)', DEFAULTS).textBackground).toBe(false);
    expect(resolveDisplayFeatures('Text (Background)', DEFAULTS).textBackground).toBe(true);
  });

  it('keeps only lyrics for Lyrics Only', () => {
    expect(resolveDisplayFeatures('Lyrics Only', { ...DEFAULTS, burned: true })).toEqual({
      ...DEFAULTS,
      showLyrics: true,
      showClock: false,
      textBackground: false
    });
  });

  it('switches nothing on for unknown keywords', () => {
    expect(resolveDisplayFeatures('Spotify Slider', DEFAULTS)).toEqual({
      ...DEFAULTS,
      showClock: false,
      textBackground: false
    });
  });

  it('enables special mode with text', () => {
    const features = resolveDisplayFeatures('Special Mode | Text', DEFAULTS);
    expect(features.specialMode).toBe(true);
    expect(features.showText).toBe(true);
  });
});

describe('resolveCropPolicy', () => {
  const defaults = { enabled: true, extra: false };

  it('maps each crop mode', () => {
    expect(resolveCropPolicy('No Crop', defaults)).toEqual({ enabled: false, extra: false });
    expect(resolveCropPolicy('Crop', defaults)).toEqual({ enabled: true, extra: false });
    expect(resolveCropPolicy('Extra Crop', defaults)).toEqual({ enabled: true, extra: true });
    expect(resolveCropPolicy('Default', { enabled: false, extra: true })).toEqual({ enabled: false, extra: true });
  });

  it('treats unknown modes as Default', () => {
    expect(resolveCropPolicy('Zoom', defaults)).toEqual(defaults);
  });
});

describe('mode guards', () => {
  it('accepts only listed modes', () => {
    expect(isDisplayMode('Clock | Temperature | Text (Background)')).toBe(true);
    expect(isDisplayMode('Karaoke')).toBe(false);
    expect(isCropMode('Extra Crop')).toBe(true);
    expect(isCropMode('extra crop')).toBe(false);
  });
});
