/**
 * Colour helpers shared by the image processor and light sync
 */

import type { Rgb } from '../types/index';

const HEX_COLOR_PATTERN = /^#[0-9a-fA-F]{6}$/;

/** Preset name -> hex. `null` means contrast-derived, `'custom'` defers to the custom value. */
export const FONT_COLOR_PRESETS: Record<string, string | null> = {
  'Automatic': null,
  'White': '#FFFFFF',
  'Bright Yellow': '#FFFF00',
  'Gold': '#FFD700',
  'Light Cyan': '#E0FFFF',
  'Cyan / Aqua': '#00FFFF',
  'Bright Magenta': '#FF00FF',
  'Pink': '#FFC0CB',
  'Lime Green': '#32CD32',
  'Light Green': '#90EE90',
  'Orange': '#FFA500',
  'Red': '#FF0000',
  'Sky Blue': '#87CEEB',
  'Deep Sky Blue': '#00BFFF',
  'Spring Green': '#00FF7F',
  'Chartreuse': '#7FFF00',
  'Hot Pink': '#FF69B4',
  'Violet': '#EE82EE',
  'Turquoise': '#40E0D0',
  'Light Salmon': '#FFA07A',
  'Custom': 'custom'
};

export const BLACK: Rgb = [0, 0, 0];
export const WHITE: Rgb = [255, 255, 255];

export function isValidHexColor(value: string): boolean {
  return HEX_COLOR_PATTERN.test(value);
}

export function hexToRgb(hex: string): Rgb | null {
  if (!isValidHexColor(hex)) return null;
  return [
    parseInt(hex.slice(1, 3), 16),
    parseInt(hex.slice(3, 5), 16),
    parseInt(hex.slice(5, 7), 16)
  ];
}

export function rgbToHex(rgb: Rgb): string {
  return '#' + rgb
    .map(channel => Math.max(0, Math.min(255, Math.round(channel))).toString(16).padStart(2, '0'))
    .join('')
    .toUpperCase();
}

export interface FontColorResolution {
  /** Uppercase #RRGGBB, or null for automatic */
  color: string | null;
  /** Set when a custom value was given but rejected */
  rejectedCustom?: string;
}

/**
 * Pick the forced text colour. A valid custom hex wins; otherwise the
 * preset applies, with Automatic and unknown presets meaning contrast-derived.
 */
export function resolveFontColor(preset: string | undefined, custom: string | undefined): FontColorResolution {
  const trimmed = custom?.trim() ?? '';
  let rejectedCustom: string | undefined;

  if (trimmed) {
    if (isValidHexColor(trimmed)) {
      return { color: trimmed.toUpperCase() };
    }
    rejectedCustom = trimmed;
  }

  const presetValue = preset && Object.hasOwn(FONT_COLOR_PRESETS, preset) ? FONT_COLOR_PRESETS[preset] : null;
  const color = presetValue && presetValue !== 'custom' ? presetValue : null;
  return rejectedCustom ? { color, rejectedCustom } : { color };
}

/**
 * Black text on bright artwork, white otherwise
 */
export function contrastTextColor(brightness: number): Rgb {
  return brightness > 128 ? [...BLACK] : [...WHITE];
}

/**
 * Scale a 0-255 brightness into a light brightness percentage (10-100)
 */
export function brightnessToPercent(brightness: number): number {
  const percent = Math.round((brightness / 255) * 100);
  return Math.max(10, Math.min(100, percent));
}

export function colorDistance(a: Rgb, b: Rgb): number {
  return Math.abs(a[0] - b[0]) + Math.abs(a[1] - b[1]) + Math.abs(a[2] - b[2]);
}
