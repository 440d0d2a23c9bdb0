import { describe, it, expect, vi } from 'vitest';
import { DeviceUnreachableError } from '@pixsync/core';
import { MAX_PIC_ID, PixooDevice, PixooLyricsSink, buildItemList, wrapLyric } from './pixoo-device';

function deviceFetch(reply: () => Response = () => new Response('{"error_code":0}')) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => reply());
}

function sentCommands(fetchMock: ReturnType<typeof deviceFetch>): Array<Record<string, unknown>> {
  return fetchMock.mock.calls.map(([, init]) => {
    const body: unknown = JSON.parse(String(init?.body));
    return typeof body === 'object' && body !== null ? { ...body } : {};
  });
}

const frame = { pixels: new Uint8Array([1, 2, 3]), width: 64 };

describe('buildItemList', () => {
  it('reorders a right-to-left text line', () => {
    expect(buildItemList({ showClock: false, showTemperature: false, clockAlign: 'Right', color: null, text: 'Song - שלום עולם' }))
      .toEqual([{ TextId: '101', type: 22, x: 0, y: 57, font: 2, color: '#FFFFFF', TextString: 'Song - םלוע םולש' }]);
  });

  it('places the clock left and the device temperature right', () => {
    expect(buildItemList({ showClock: true, showTemperature: true, clockAlign: 'Left', color: null })).toEqual([
      { TextId: '101', type: 3, x: 2, y: 57, font: 2, color: '#FFFFFF' },
      { TextId: '102', type: 17, x: 34, y: 57, font: 2, color: '#FFFFFF' }
    ]);
  });

  it('moves the clock right and renders a sensor reading as text', () => {
    expect(buildItemList({
      showClock: true,
      showTemperature: true,
      clockAlign: 'Right',
      color: '#FF0000',
      temperature: '21°C',
      baseId: 200
    })).toEqual([
      { TextId: '201', type: 3, x: 34, y: 57, font: 2, color: '#FF0000' },
      { TextId: '202', type: 22, x: 2, y: 57, font: 2, color: '#FF0000', TextString: '21°C' }
    ]);
  });

  it('adds a text line above the clock', () => {
    expect(buildItemList({
      showClock: true,
      showTemperature: false,
      clockAlign: 'Right',
      color: null,
      text: 'Song A - Artist B'
    })).toEqual([
      { TextId: '101', type: 3, x: 34, y: 57, font: 2, color: '#FFFFFF' },
      { TextId: '102', type: 22, x: 0, y: 48, font: 2, color: '#FFFFFF', TextString: 'Song A - Artist B' }
    ]);
  });

  it('is empty when neither overlay is shown', () => {
    expect(buildItemList({ showClock: false, showTemperature: false, clockAlign: 'Left', color: null })).toEqual([]);
  });
});

describe('wrapLyric', () => {
  it('splits long lines in two', () => {
    expect(wrapLyric('Hello darkness my old friend', 190)).toEqual(['Hello', 'darkness my']);
  });

  it('keeps short lines whole', () => {
    expect(wrapLyric('Hi there', 190)).toEqual(['Hi there']);
  });
});

describe('PixooDevice', () => {
  it('resets the GIF id on the first frame and counts up', async () => {
    const fetchMock = deviceFetch();
    vi.stubGlobal('fetch', fetchMock);
    const device = new PixooDevice({ host: '10.0.0.5' });

    await device.sendFrame(frame);
    await device.sendFrame(frame);

    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://10.0.0.5:80/post');
    const commands = sentCommands(fetchMock);
    expect(commands.map(c => c.Command)).toEqual(['Draw/ResetHttpGifId', 'Draw/SendHttpGif', 'Draw/SendHttpGif']);
    expect(commands[1]).toEqual({
      Command: 'Draw/SendHttpGif',
      PicNum: 1,
      PicWidth: 64,
      PicOffset: 0,
      PicID: 1,
      PicSpeed: 1000,
      PicData: 'AQID'
    });
    expect(commands[2]?.PicID).toBe(2);
  });

  it('resets again once the id reaches the limit', async () => {
    const fetchMock = deviceFetch();
    vi.stubGlobal('fetch', fetchMock);
    const device = new PixooDevice({ host: '10.0.0.5' });

    for (let i = 0; i < MAX_PIC_ID + 1; i++) {
      await device.sendFrame(frame);
    }

    const commands = sentCommands(fetchMock);
    expect(commands.filter(c => c.Command === 'Draw/ResetHttpGifId')).toHaveLength(2);
    expect(commands[commands.length - 1]?.PicID).toBe(1);
  });

  it('fails on an HTTP error status', async () => {
    vi.stubGlobal('fetch', deviceFetch(() => new Response('oops', { status: 500 })));
    const device = new PixooDevice({ host: '10.0.0.5' });

    await expect(device.clearText()).rejects.toThrow(new DeviceUnreachableError('10.0.0.5', 'HTTP 500'));
  });

  it('fails on a non-zero error_code', async () => {
    vi.stubGlobal('fetch', deviceFetch(() => new Response('{"error_code":1}')));
    const device = new PixooDevice({ host: '10.0.0.5' });

    await expect(device.clearText()).rejects.toThrow('Device 10.0.0.5 unreachable: Draw/ClearHttpText returned error_code 1');
  });

  it('fails when the device cannot be reached', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed');
    }));
    const device = new PixooDevice({ host: '10.0.0.5' });

    await expect(device.getChannelIndex()).rejects.toBeInstanceOf(DeviceUnreachableError);
    await expect(device.getChannelIndex()).rejects.toThrow('Device 10.0.0.5 unreachable: fetch failed');
  });

  it('reads the channel index', async () => {
    vi.stubGlobal('fetch', deviceFetch(() => new Response('{"error_code":0,"SelectIndex":3}')));
    const device = new PixooDevice({ host: '10.0.0.5' });

    expect(await device.getChannelIndex()).toBe(3);
  });

  it('rejects a channel reply without an index', async () => {
    vi.stubGlobal('fetch', deviceFetch());

    await expect(new PixooDevice({ host: '10.0.0.5' }).getChannelIndex())
      .rejects.toThrow('Device 10.0.0.5 unreachable: Channel/GetIndex reply without SelectIndex');
  });
});

describe('PixooLyricsSink', () => {
  it('draws a wrapped line as two text items', async () => {
    const fetchMock = deviceFetch();
    vi.stubGlobal('fetch', fetchMock);
    const sink = new PixooLyricsSink(new PixooDevice({ host: '10.0.0.5' }), {
      font: () => 190,
      color: () => null
    });

    await sink.show({ time: 1000, text: 'Hello darkness my old friend' });

    const commands = sentCommands(fetchMock);
    expect(commands.map(c => [c.TextId, c.y, c.TextString, c.color])).toEqual([
      [1, 56, 'Hello', '#FFFFFF'],
      [2, 59, 'darkness my', '#FFFFFF']
    ]);
  });

  it('sends right-to-left lyrics in display order', async () => {
    const fetchMock = deviceFetch();
    vi.stubGlobal('fetch', fetchMock);
    const sink = new PixooLyricsSink(new PixooDevice({ host: '10.0.0.5' }), {
      font: () => 190,
      color: () => null
    });

    await sink.show({ time: 1000, text: 'שלום עולם' });

    expect(sentCommands(fetchMock).map(c => [c.y, c.TextString])).toEqual([[58, 'םלוע םולש']]);
  });

  it('draws a short line at the bottom', async () => {
    const fetchMock = deviceFetch();
    vi.stubGlobal('fetch', fetchMock);
    const sink = new PixooLyricsSink(new PixooDevice({ host: '10.0.0.5' }), {
      font: () => 2,
      color: () => '#00FF00'
    });

    await sink.show({ time: 1000, text: 'Hi' });
    await sink.clear();

    const commands = sentCommands(fetchMock);
    expect(commands[0]).toMatchObject({ Command: 'Draw/SendHttpText', TextId: 1, y: 58, font: 2, color: '#00FF00' });
    expect(commands[1]).toEqual({ Command: 'Draw/ClearHttpText' });
  });
});
