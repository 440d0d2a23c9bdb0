import { describe, it, expect } from 'vitest';
import {
  brightnessToPercent,
  contrastTextColor,
  hexToRgb,
  isValidHexColor,
  resolveFontColor,
  rgbToHex
} from './color';

describe('hex colours', () => {
  it('accepts only six-digit hex', () => {
    expect(isValidHexColor('#1A2b3C')).toBe(true);
    expect(isValidHexColor('#FFF')).toBe(false);
    expect(isValidHexColor('FFFFFF')).toBe(false);
    expect(isValidHexColor('#GG0000')).toBe(false);
  });

  it('converts between hex and rgb', () => {
    expect(hexToRgb('#FF8000')).toEqual([255, 128, 0]);
    expect(hexToRgb('#FF80')).toBeNull();
    expect(rgbToHex([255, 128, 0])).toBe('#FF8000');
    expect(rgbToHex([300, -4, 15.6])).toBe('#FF0010');
  });
});

describe('resolveFontColor', () => {
  it('prefers a valid custom colour', () => {
    expect(resolveFontColor('Gold', '#00ff00')).toEqual({ color: '#00FF00' });
  });

  it('falls back to the preset when the custom value is invalid', () => {
    expect(resolveFontColor('Gold', 'green')).toEqual({ color: '#FFD700', rejectedCustom: 'green' });
  });

  it('means contrast-derived for Automatic, Custom without a value and unknown presets', () => {
    expect(resolveFontColor('Automatic', '')).toEqual({ color: null });
    expect(resolveFontColor('Custom', undefined)).toEqual({ color: null });
    expect(resolveFontColor('Plaid', undefined)).toEqual({ color: null });
  });

  it('ignores names inherited from Object.prototype', () => {
    expect(resolveFontColor('constructor', undefined)).toEqual({ color: null });
    expect(resolveFontColor('toString', undefined)).toEqual({ color: null });
  });
});

describe('contrast and brightness', () => {
  it('uses black text on bright artwork', () => {
    expect(contrastTextColor(200)).toEqual([0, 0, 0]);
    expect(contrastTextColor(128)).toEqual([255, 255, 255]);
  });

  it('scales brightness into 10-100 percent', () => {
    expect(brightnessToPercent(255)).toBe(100);
    expect(brightnessToPercent(128)).toBe(50);
    expect(brightnessToPercent(5)).toBe(10);
  });
});
