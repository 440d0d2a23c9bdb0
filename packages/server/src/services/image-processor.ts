/**
 * Image Processor - turns resolved artwork into a 64x64 RGB frame
 *
 * Decoding, cropping, scaling and the enhancement filters run through
 * sharp; special-mode composition, palette extraction and the built-in
 * icon frames work directly on raw RGB buffers. The same bytes and the
 * same options always give the same frame.
 */

import { createHash } from 'crypto';
import sharp from 'sharp';
import {
  colorDistance,
  contrastTextColor,
  hexToRgb,
  type CropMode,
  type CropPolicy,
  type DisplayFeatures,
  type Palette,
  type ProcessedFrame,
  type ResolvedArtwork,
  type Rgb
} from '@pixsync/core';
import { visualOrder } from './bidi-text';

export const FRAME_SIZE = 64;

const CHANNELS = 3;
const BORDER_RATIO = 0.05;
const EXTRA_BORDER_PX = 5;

export interface EnhancementOptions {
  contrast: boolean;
  sharpness: boolean;
  colorsEnhanced: boolean;
  kernelEffect: boolean;
  limitColors: number | false;
}

export interface FrameOptions {
  cropMode: CropMode;
  /** Crop policy the crop mode resolved to */
  crop: CropPolicy;
  features: DisplayFeatures;
  enhance: EnhancementOptions;
  /** "Title - Artist" drawn along the bottom when the burned feature is on */
  burnedText: string | null;
  /** Forced #RRGGBB text colour */
  fontColor: string | null;
}

interface RawImage {
  data: Buffer;
  width: number;
  height: number;
}

// ========================================
// Geometry
// ========================================

/**
 * Border trimmed from each side: 5% of the shorter side, plus 5 px for
 * extra crop, never more than half the image minus one pixel
 */
export function cropBorder(width: number, height: number, policy: CropPolicy): number {
  if (!policy.enabled) return 0;
  let border = Math.min(Math.floor(width * BORDER_RATIO), Math.floor(height * BORDER_RATIO));
  if (policy.extra) border += EXTRA_BORDER_PX;
  border = Math.min(border, Math.floor(width / 2) - 1, Math.floor(height / 2) - 1);
  return Math.max(0, border);
}

function pixelAt(image: RawImage, x: number, y: number): Rgb {
  const offset = (y * image.width + x) * CHANNELS;
  return [image.data[offset] ?? 0, image.data[offset + 1] ?? 0, image.data[offset + 2] ?? 0];
}

function fillRect(pixels: Uint8Array, x0: number, y0: number, x1: number, y1: number, color: Rgb): void {
  for (let y = Math.max(0, y0); y <= Math.min(FRAME_SIZE - 1, y1); y++) {
    for (let x = Math.max(0, x0); x <= Math.min(FRAME_SIZE - 1, x1); x++) {
      pixels.set(color, (y * FRAME_SIZE + x) * CHANNELS);
    }
  }
}

// ========================================
// Palette
// ========================================

function isNearBlackOrWhite([r, g, b]: Rgb): boolean {
  return Math.max(r, g, b) < 24 || Math.min(r, g, b) > 231;
}

/**
 * Average colour, its brightness and up to three dominant colours. Colours
 * are bucketed at 3 bits per channel; buckets are ranked by pixel count.
 */
export function extractPalette(pixels: Uint8Array): Palette {
  const count = Math.floor(pixels.length / CHANNELS);
  if (count === 0) {
    return { average: [0, 0, 0], brightness: 0, colors: [[0, 0, 0]] };
  }

  const sum = [0, 0, 0];
  const buckets = new Map<number, { key: number; count: number; sum: [number, number, number] }>();

  for (let i = 0; i < count; i++) {
    const r = pixels[i * CHANNELS] ?? 0;
    const g = pixels[i * CHANNELS + 1] ?? 0;
    const b = pixels[i * CHANNELS + 2] ?? 0;
    sum[0] += r;
    sum[1] += g;
    sum[2] += b;

    const key = ((r >> 5) << 6) | ((g >> 5) << 3) | (b >> 5);
    const bucket = buckets.get(key) ?? { key, count: 0, sum: [0, 0, 0] };
    bucket.count += 1;
    bucket.sum[0] += r;
    bucket.sum[1] += g;
    bucket.sum[2] += b;
    buckets.set(key, bucket);
  }

  const average: Rgb = [
    Math.round((sum[0] ?? 0) / count),
    Math.round((sum[1] ?? 0) / count),
    Math.round((sum[2] ?? 0) / count)
  ];
  const brightness = (average[0] + average[1] + average[2]) / 3;

  const ranked = Array.from(buckets.values())
    .sort((a, b) => b.count - a.count || a.key - b.key)
    .map((bucket): Rgb => [
      Math.round(bucket.sum[0] / bucket.count),
      Math.round(bucket.sum[1] / bucket.count),
      Math.round(bucket.sum[2] / bucket.count)
    ]);

  const preferred = ranked.filter(color => !isNearBlackOrWhite(color));
  const candidates = preferred.length > 0 ? preferred : ranked;

  const colors: Rgb[] = [];
  for (const color of candidates) {
    if (colors.every(existing => colorDistance(existing, color) > 0)) {
      colors.push(color);
    }
    if (colors.length === 3) break;
  }

  return { average, brightness, colors: colors.length > 0 ? colors : [average] };
}

// ========================================
// Rendering
// ========================================

async function decode(data: Uint8Array): Promise<RawImage> {
  const { data: pixels, info } = await sharp(Buffer.from(data))
    .toColourspace('srgb')
    .removeAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels !== CHANNELS) {
    throw new Error(`unsupported channel count ${info.channels}`);
  }
  return { data: pixels, width: info.width, height: info.height };
}

/**
 * Crop, scale to `size` and apply the enhancement filters
 */
async function scale(image: RawImage, size: number, border: number, enhance: EnhancementOptions): Promise<RawImage> {
  let pipeline = sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: CHANNELS }
  });

  if (border > 0) {
    pipeline = pipeline.extract({
      left: border,
      top: border,
      width: image.width - border * 2,
      height: image.height - border * 2
    });
  }

  pipeline = pipeline.resize(size, size, { fit: 'fill', kernel: 'lanczos3' });

  if (enhance.kernelEffect) {
    pipeline = pipeline.convolve({ width: 3, height: 3, kernel: [-1, -1, -1, -1, 9, -1, -1, -1, -1] });
  }
  if (enhance.colorsEnhanced) {
    pipeline = pipeline.modulate({ saturation: 1.2 });
  }
  if (enhance.contrast) {
    pipeline = pipeline.linear(1.2, -(128 * 0.2));
  }
  if (enhance.sharpness) {
    pipeline = pipeline.sharpen();
  }

  const { data, info } = await pipeline.removeAlpha().raw().toBuffer({ resolveWithObject: true });
  let scaled: RawImage = { data, width: info.width, height: info.height };

  if (enhance.limitColors !== false) {
    scaled = await limitColors(scaled, enhance.limitColors);
  }
  return scaled;
}

async function limitColors(image: RawImage, colors: number): Promise<RawImage> {
  const quantized = await sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: CHANNELS }
  })
    .png({ palette: true, colors: Math.max(2, Math.min(256, colors)), dither: 0 })
    .toBuffer();

  return decode(quantized);
}

/**
 * Album scaled down and centred 8 px from the top. With clock or
 * temperature shown it is 34 px on black with edge-colour gradients,
 * otherwise 56 px on a darkened average of the edge colours.
 */
async function renderSpecialMode(image: RawImage, features: DisplayFeatures, enhance: EnhancementOptions): Promise<Uint8Array> {
  const withText = features.showClock || features.showTemperature;
  const albumSize = withText ? 34 : 56;
  const full = await scale(image, FRAME_SIZE, 0, enhance);
  const album = await scale(image, albumSize, 0, enhance);

  const middle = Math.floor(full.height / 2);
  const left = pixelAt(full, 0, middle);
  const right = pixelAt(full, full.width - 1, middle);

  const background: Rgb = withText
    ? [0, 0, 0]
    : [
        Math.floor(Math.floor((left[0] + right[0]) / 2) / 3),
        Math.floor(Math.floor((left[1] + right[1]) / 2) / 3),
        Math.floor(Math.floor((left[2] + right[2]) / 2) / 3)
      ];

  const pixels = new Uint8Array(FRAME_SIZE * FRAME_SIZE * CHANNELS);
  fillRect(pixels, 0, 0, FRAME_SIZE - 1, FRAME_SIZE - 1, background);

  const pasteX = Math.floor((FRAME_SIZE - albumSize) / 2);
  const pasteY = 8;

  if (withText) {
    const gradientWidth = pasteX - 2;
    const lerp = (from: Rgb, to: Rgb, ratio: number): Rgb => [
      Math.trunc(from[0] * (1 - ratio) + to[0] * ratio),
      Math.trunc(from[1] * (1 - ratio) + to[1] * ratio),
      Math.trunc(from[2] * (1 - ratio) + to[2] * ratio)
    ];
    for (let x = 0; x < gradientWidth; x++) {
      const ratio = x / gradientWidth;
      const rightX = pasteX + albumSize + x + 2;
      fillRect(pixels, x, pasteY, x, pasteY + albumSize - 1, lerp(left, background, ratio));
      fillRect(pixels, rightX, pasteY, rightX, pasteY + albumSize - 1, lerp(background, right, ratio));
    }
  }

  for (let y = 0; y < albumSize; y++) {
    const rowStart = y * albumSize * CHANNELS;
    const row = album.data.subarray(rowStart, rowStart + albumSize * CHANNELS);
    pixels.set(row, ((pasteY + y) * FRAME_SIZE + pasteX) * CHANNELS);
  }

  return pixels;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * SVG overlay for burned text. The text is already in display order, so
 * the renderer is told not to reorder it again.
 */
export function textOverlaySvg(text: string, color: Rgb, background: boolean): string {
  const fill = `rgb(${color[0]},${color[1]},${color[2]})`;
  const band = background
    ? `<rect x="0" y="54" width="${FRAME_SIZE}" height="10" fill="black" fill-opacity="0.6"/>`
    : '';
  return `<svg xmlns="http://www.w3.org/2000/svg" width="${FRAME_SIZE}" height="${FRAME_SIZE}">`
    + band
    + `<text x="32" y="62" font-family="sans-serif" font-size="8" fill="${fill}" text-anchor="middle"`
    + ` direction="ltr" unicode-bidi="bidi-override">${escapeXml(visualOrder(text))}</text>`
    + '</svg>';
}

/**
 * Draw text along the bottom rows, optionally over a 60% black band
 */
async function burnText(pixels: Uint8Array, text: string, color: Rgb, background: boolean): Promise<Uint8Array> {
  const svg = textOverlaySvg(text, color, background);

  const { data } = await sharp(Buffer.from(pixels), {
    raw: { width: FRAME_SIZE, height: FRAME_SIZE, channels: CHANNELS }
  })
    .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
    .removeAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  return new Uint8Array(data);
}

/**
 * Render artwork bytes into a device frame
 */
export async function renderFrame(data: Uint8Array, options: FrameOptions): Promise<ProcessedFrame> {
  const image = await decode(data);
  const { features, enhance } = options;

  let pixels: Uint8Array;
  if (features.specialMode) {
    pixels = await renderSpecialMode(image, features, enhance);
  } else {
    const border = cropBorder(image.width, image.height, options.crop);
    const scaled = await scale(image, FRAME_SIZE, border, enhance);
    pixels = new Uint8Array(scaled.data);
  }

  const palette = extractPalette(pixels);
  const forced = options.fontColor ? hexToRgb(options.fontColor) : null;
  const textColor = forced ?? contrastTextColor(palette.brightness);

  if (!features.specialMode) {
    if (features.burned && options.burnedText) {
      pixels = await burnText(pixels, options.burnedText, textColor, features.textBackground);
    } else if (features.textBackground) {
      // Band behind the device-drawn clock/temperature/text items
      pixels = await burnText(pixels, '', textColor, true);
    }
  }

  return {
    pixels,
    width: FRAME_SIZE,
    height: FRAME_SIZE,
    palette,
    cropMode: options.cropMode,
    textColor
  };
}

// ========================================
// Built-in frames
// ========================================

export function solidFrame(color: Rgb = [0, 0, 0]): ProcessedFrame {
  const pixels = new Uint8Array(FRAME_SIZE * FRAME_SIZE * CHANNELS);
  fillRect(pixels, 0, 0, FRAME_SIZE - 1, FRAME_SIZE - 1, color);
  return {
    pixels,
    width: FRAME_SIZE,
    height: FRAME_SIZE,
    palette: extractPalette(pixels),
    cropMode: 'No Crop',
    textColor: contrastTextColor((color[0] + color[1] + color[2]) / 3)
  };
}

// 5x7 glyphs, one string per row
const TV_GLYPHS = [
  ['#####', '..#..', '..#..', '..#..', '..#..', '..#..', '..#..'],
  ['#...#', '#...#', '#...#', '#...#', '.#.#.', '.#.#.', '..#..']
];

/**
 * White television outline with legs and "TV" on black
 */
export function tvIconFrame(): ProcessedFrame {
  const frame = solidFrame();
  const white: Rgb = [255, 255, 255];
  const { pixels } = frame;

  // Screen outline, 2 px wide
  fillRect(pixels, 10, 15, 54, 16, white);
  fillRect(pixels, 10, 49, 54, 50, white);
  fillRect(pixels, 10, 15, 11, 50, white);
  fillRect(pixels, 53, 15, 54, 50, white);

  // Legs
  fillRect(pixels, 20, 51, 21, 55, white);
  fillRect(pixels, 44, 51, 45, 55, white);

  TV_GLYPHS.forEach((glyph, index) => {
    const originX = 26 + index * 7;
    glyph.forEach((row, y) => {
      for (let x = 0; x < row.length; x++) {
        if (row[x] === '#') fillRect(pixels, originX + x, 29 + y, originX + x, 29 + y, white);
      }
    });
  });

  return { ...frame, palette: extractPalette(pixels) };
}

// ========================================
// Processor with cache
// ========================================

export class ImageProcessor {
  private cache = new Map<string, ProcessedFrame>();

  constructor(private maxEntries: number = 25) {}

  /**
   * Render artwork, reusing a cached frame for the same image and options
   */
  async process(artwork: ResolvedArtwork, options: FrameOptions): Promise<ProcessedFrame> {
    const key = this.cacheKey(artwork, options);
    const cached = this.cache.get(key);
    if (cached) {
      // Refresh recency
      this.cache.delete(key);
      this.cache.set(key, cached);
      return cached;
    }

    const frame = await renderFrame(artwork.data, options);

    if (this.maxEntries > 0) {
      this.cache.set(key, frame);
      while (this.cache.size > this.maxEntries) {
        const oldest = this.cache.keys().next();
        if (oldest.done) break;
        this.cache.delete(oldest.value);
      }
    }
    return frame;
  }

  clearCache(): void {
    this.cache.clear();
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private cacheKey(artwork: ResolvedArtwork, options: FrameOptions): string {
    const hash = createHash('sha1');
    if (artwork.url) {
      hash.update(artwork.url);
    } else {
      hash.update(artwork.data);
    }
    hash.update(JSON.stringify(options));
    return hash.digest('hex');
  }
}
