/**
 * Display and crop mode resolution
 *
 * Modes are parsed by keyword, so "Burned | Clock (Background)" switches on
 * burned text, the clock and the text background. "Default" restores the
 * entry's configured features.
 */

import {
  CROP_MODES,
  DISPLAY_MODES,
  type CropMode,
  type CropPolicy,
  type DisplayFeatures,
  type DisplayMode
} from '../types/index';

export function isDisplayMode(value: string): value is DisplayMode {
  return DISPLAY_MODES.some(mode => mode === value);
}

export function isCropMode(value: string): value is CropMode {
  return CROP_MODES.some(mode => mode === value);
}

export function resolveDisplayFeatures(mode: string, defaults: DisplayFeatures): DisplayFeatures {
  const m = mode.trim().toLowerCase();

  if (m === 'default') {
    return finalize({ ...defaults }, m);
  }

  const features: DisplayFeatures = {
    showLyrics: m.includes('lyrics'),
    showClock: m.includes('clock'),
    showTemperature: m.includes('temperature'),
    showText: m.includes('text'),
    textBackground: m.includes('background'),
    specialMode: m.includes('special mode'),
    burned: m.includes('burned'),
    forceAi: m.includes('ai generation'),
    aiModel: defaults.aiModel
  };

  if (features.forceAi) {
    if (m.includes('flux')) features.aiModel = 'flux';
    else if (m.includes('turbo')) features.aiModel = 'turbo';
  }

  if (m === 'album art only') {
    return finalize({ ...allOff(defaults) }, m);
  }
  if (m === 'lyrics only') {
    return finalize({ ...allOff(defaults), showLyrics: true }, m);
  }

  return finalize(features, m);
}

function allOff(defaults: DisplayFeatures): DisplayFeatures {
  return {
    showLyrics: false,
    showClock: false,
    showTemperature: false,
    showText: false,
    textBackground: false,
    specialMode: false,
    burned: false,
    forceAi: false,
    aiModel: defaults.aiModel
  };
}

/** Text background only makes sense when some item-list text is drawn */
function finalize(features: DisplayFeatures, m: string): DisplayFeatures {
  const itemText = features.showText && m !== 'lyrics only' && m !== 'album art only';
  if (!(features.showClock || features.showTemperature || itemText)) {
    features.textBackground = false;
  }
  return features;
}

export function resolveCropPolicy(mode: string, defaults: CropPolicy): CropPolicy {
  switch (mode.trim().toLowerCase()) {
    case 'no crop':
      return { enabled: false, extra: false };
    case 'crop':
      return { enabled: true, extra: false };
    case 'extra crop':
      return { enabled: true, extra: true };
    default:
      return { ...defaults };
  }
}
