import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import type { DisplayFeatures, ProcessedFrame, ResolvedArtwork, Rgb } from '@pixsync/core';
import {
  FRAME_SIZE,
  ImageProcessor,
  cropBorder,
  extractPalette,
  renderFrame,
  solidFrame,
  textOverlaySvg,
  tvIconFrame,
  type FrameOptions
} from './image-processor';

function features(overrides: Partial<DisplayFeatures> = {}): DisplayFeatures {
  return {
    showLyrics: false,
    showClock: false,
    showTemperature: false,
    showText: false,
    textBackground: false,
    specialMode: false,
    burned: false,
    forceAi: false,
    aiModel: 'turbo',
    ...overrides
  };
}

function options(overrides: Partial<FrameOptions> = {}): FrameOptions {
  return {
    cropMode: 'No Crop',
    crop: { enabled: false, extra: false },
    features: features(),
    enhance: { contrast: false, sharpness: false, colorsEnhanced: false, kernelEffect: false, limitColors: false },
    burnedText: null,
    fontColor: null,
    ...overrides
  };
}

async function solidPng(size: number, [r, g, b]: Rgb): Promise<Uint8Array> {
  return sharp({ create: { width: size, height: size, channels: 3, background: { r, g, b } } }).png().toBuffer();
}

/** Red square with a 10 px black border */
async function borderedPng(): Promise<Uint8Array> {
  const inner = await solidPng(80, [255, 0, 0]);
  return sharp({ create: { width: 100, height: 100, channels: 3, background: { r: 0, g: 0, b: 0 } } })
    .composite([{ input: Buffer.from(inner), top: 10, left: 10 }])
    .png()
    .toBuffer();
}

function pixel(frame: ProcessedFrame, x: number, y: number): Rgb {
  const offset = (y * FRAME_SIZE + x) * 3;
  return [frame.pixels[offset] ?? -1, frame.pixels[offset + 1] ?? -1, frame.pixels[offset + 2] ?? -1];
}

function artwork(data: Uint8Array, url = 'http://img.test/a.png'): ResolvedArtwork {
  return { source: 'player', url, data, contentType: 'image/png', resolvedAt: 0 };
}

describe('cropBorder', () => {
  it('trims 5% of the shorter side', () => {
    expect(cropBorder(100, 100, { enabled: true, extra: false })).toBe(5);
    expect(cropBorder(640, 480, { enabled: true, extra: false })).toBe(24);
  });

  it('adds 5 px for extra crop', () => {
    expect(cropBorder(100, 100, { enabled: true, extra: true })).toBe(10);
  });

  it('never removes the whole image', () => {
    expect(cropBorder(6, 6, { enabled: true, extra: true })).toBe(2);
  });

  it('is zero when cropping is off', () => {
    expect(cropBorder(640, 480, { enabled: false, extra: true })).toBe(0);
  });
});

describe('extractPalette', () => {
  it('ranks dominant colours by frequency', () => {
    const pixels = new Uint8Array([
      200, 0, 0,
      200, 0, 0,
      200, 0, 0,
      0, 0, 200
    ]);

    expect(extractPalette(pixels)).toEqual({
      average: [150, 0, 50],
      brightness: 200 / 3,
      colors: [[200, 0, 0], [0, 0, 200]]
    });
  });

  it('keeps black when nothing else is present', () => {
    expect(extractPalette(new Uint8Array(12)).colors).toEqual([[0, 0, 0]]);
  });

  it('skips near-black colours when others exist', () => {
    const pixels = new Uint8Array([
      0, 0, 0,
      0, 0, 0,
      0, 120, 0
    ]);
    expect(extractPalette(pixels).colors).toEqual([[0, 120, 0]]);
  });
});

describe('renderFrame', () => {
  it('produces a 64x64 RGB frame', async () => {
    const frame = await renderFrame(await solidPng(32, [255, 0, 0]), options());

    expect(frame.width).toBe(64);
    expect(frame.height).toBe(64);
    expect(frame.pixels.length).toBe(64 * 64 * 3);
    expect(frame.cropMode).toBe('No Crop');
  });

  it('is deterministic', async () => {
    const data = await borderedPng();
    const first = await renderFrame(data, options({ enhance: {
      contrast: true, sharpness: true, colorsEnhanced: true, kernelEffect: true, limitColors: false
    } }));
    const second = await renderFrame(data, options({ enhance: {
      contrast: true, sharpness: true, colorsEnhanced: true, kernelEffect: true, limitColors: false
    } }));

    expect(Buffer.from(first.pixels).equals(Buffer.from(second.pixels))).toBe(true);
  });

  it('removes a border with extra crop', async () => {
    const data = await borderedPng();

    const uncropped = await renderFrame(data, options());
    const cropped = await renderFrame(data, options({ cropMode: 'Extra Crop', crop: { enabled: true, extra: true } }));

    expect(pixel(uncropped, 0, 0)[0]).toBeLessThan(60);
    const [r, g, b] = pixel(cropped, 0, 0);
    expect(r).toBeGreaterThan(240);
    expect(g).toBeLessThan(15);
    expect(b).toBeLessThan(15);
  });

  it('picks white text on dark art and black text on bright art', async () => {
    const dark = await renderFrame(await solidPng(16, [20, 20, 20]), options());
    const bright = await renderFrame(await solidPng(16, [240, 240, 240]), options());

    expect(dark.textColor).toEqual([255, 255, 255]);
    expect(bright.textColor).toEqual([0, 0, 0]);
  });

  it('uses a forced font colour', async () => {
    const frame = await renderFrame(await solidPng(16, [20, 20, 20]), options({ fontColor: '#00FF00' }));
    expect(frame.textColor).toEqual([0, 255, 0]);
  });

  it('centres a smaller album on a darkened edge colour in special mode', async () => {
    const frame = await renderFrame(
      await solidPng(100, [90, 150, 210]),
      options({ features: features({ specialMode: true }) })
    );

    const [r, g, b] = pixel(frame, 0, 0);
    expect(Math.abs(r - 30)).toBeLessThanOrEqual(2);
    expect(Math.abs(g - 50)).toBeLessThanOrEqual(2);
    expect(Math.abs(b - 70)).toBeLessThanOrEqual(2);

    const [ar, ag, ab] = pixel(frame, 32, 30);
    expect(Math.abs(ar - 90)).toBeLessThanOrEqual(3);
    expect(Math.abs(ag - 150)).toBeLessThanOrEqual(3);
    expect(Math.abs(ab - 210)).toBeLessThanOrEqual(3);
  });

  it('keeps the area above the album black when the clock is shown', async () => {
    const frame = await renderFrame(
      await solidPng(100, [90, 150, 210]),
      options({ features: features({ specialMode: true, showClock: true }) })
    );

    expect(pixel(frame, 0, 0)).toEqual([0, 0, 0]);
    expect(pixel(frame, 32, 60)).toEqual([0, 0, 0]);
  });

  it('darkens the bottom band behind burned text', async () => {
    const frame = await renderFrame(
      await solidPng(64, [255, 255, 255]),
      options({ features: features({ burned: true, textBackground: true }), burnedText: 'A' })
    );

    const [r] = pixel(frame, 0, 60);
    expect(r).toBeGreaterThanOrEqual(90);
    expect(r).toBeLessThanOrEqual(115);
    expect(pixel(frame, 0, 10)).toEqual([255, 255, 255]);
  });
});

describe('built-in frames', () => {
  it('fills a solid frame', () => {
    const frame = solidFrame([10, 20, 30]);
    expect(pixel(frame, 0, 0)).toEqual([10, 20, 30]);
    expect(pixel(frame, 63, 63)).toEqual([10, 20, 30]);
    expect(frame.palette.average).toEqual([10, 20, 30]);
  });

  it('draws the TV icon', () => {
    const frame = tvIconFrame();
    expect(pixel(frame, 0, 0)).toEqual([0, 0, 0]);
    expect(pixel(frame, 10, 15)).toEqual([255, 255, 255]);
    expect(pixel(frame, 54, 50)).toEqual([255, 255, 255]);
    expect(pixel(frame, 20, 55)).toEqual([255, 255, 255]);
    expect(pixel(frame, 26, 29)).toEqual([255, 255, 255]);
    expect(pixel(frame, 33, 29)).toEqual([255, 255, 255]);
    expect(pixel(frame, 35, 29)).toEqual([0, 0, 0]);
    expect(pixel(frame, 32, 40)).toEqual([0, 0, 0]);
  });
});

describe('ImageProcessor', () => {
  it('reuses frames for the same artwork and options', async () => {
    const processor = new ImageProcessor(2);
    const art = artwork(await solidPng(16, [50, 60, 70]));

    const first = await processor.process(art, options());
    const second = await processor.process(art, options());

    expect(second).toBe(first);
    expect(processor.cacheSize).toBe(1);

    const cropped = await processor.process(art, options({ cropMode: 'Crop', crop: { enabled: true, extra: false } }));
    expect(cropped).not.toBe(first);
    expect(processor.cacheSize).toBe(2);

    processor.clearCache();
    expect(processor.cacheSize).toBe(0);
  });

  it('evicts the least recently used frame', async () => {
    const processor = new ImageProcessor(1);
    const data = await solidPng(16, [50, 60, 70]);

    const first = await processor.process(artwork(data, 'http://img.test/1.png'), options());
    await processor.process(artwork(data, 'http://img.test/2.png'), options());
    const again = await processor.process(artwork(data, 'http://img.test/1.png'), options());

    expect(processor.cacheSize).toBe(1);
    expect(again).not.toBe(first);
  });
});

describe('textOverlaySvg', () => {
  it('burns right-to-left text in display order without a second reorder', () => {
    const svg = textOverlaySvg('שלום עולם & more', [255, 255, 255], false);

    expect(svg).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="64" height="64">'
      + '<text x="32" y="62" font-family="sans-serif" font-size="8" fill="rgb(255,255,255)" text-anchor="middle"'
      + ' direction="ltr" unicode-bidi="bidi-override">םלוע םולש &amp; more</text>'
      + '</svg>'
    );
  });

  it('adds the band behind the text', () => {
    expect(textOverlaySvg('', [0, 0, 0], true)).toContain('<rect x="0" y="54" width="64" height="10" fill="black" fill-opacity="0.6"/>');
  });
});
