import { describe, it, expect, vi } from 'vitest';
import { AddonRegistry } from '../registry/addon-registry';
import { ArtworkResolver } from './artwork-resolver';
import { NoArtworkError, RunSupersededError } from '../errors';
import { captureSnapshot } from '../services/media-snapshot';
import type { AddonManifest, ArtworkAttemptResult, ArtworkProvider, ArtworkRequest } from '../types/addon';
import type { ArtworkSource, MediaSnapshot } from '../types/index';

type Behavior = (request: ArtworkRequest) => Promise<ArtworkAttemptResult>;

class FakeArtworkProvider implements ArtworkProvider {
  readonly id: string;
  readonly manifest: AddonManifest;
  readonly attempt = vi.fn((request: ArtworkRequest) => {
    this.callLog.push(this.source);
    return this.behavior(request);
  });

  constructor(
    readonly source: ArtworkSource,
    private behavior: Behavior,
    private callLog: string[] = []
  ) {
    this.id = source;
    this.manifest = { id: source, name: source, version: '1.0.0', roles: ['artwork-provider'] };
  }

  async initialize(): Promise<void> {}
  async dispose(): Promise<void> {}
}

const found = (source: ArtworkSource): Behavior => async () => ({
  status: 'found',
  artwork: { source, data: new Uint8Array([1, 2, 3]), resolvedAt: 0 }
});
const skipped = (reason: string): Behavior => async () => ({ status: 'skipped', reason });
const failed = (reason: string): Behavior => async () => ({ status: 'failed', reason });

function snapshot(attributes: Record<string, unknown> = {}): MediaSnapshot {
  return captureSnapshot({
    entityId: 'media_player.living_room',
    state: 'playing',
    attributes: { media_title: 'Song A', media_artist: 'Artist B', ...attributes }
  }, 0);
}

function setup(behaviors: Partial<Record<ArtworkSource, Behavior>>) {
  const registry = new AddonRegistry();
  const callLog: string[] = [];
  const providers = new Map<ArtworkSource, FakeArtworkProvider>();

  for (const [source, behavior] of Object.entries(behaviors)) {
    const typedSource = (['player', 'spotify', 'musicbrainz', 'lastfm', 'discogs', 'tidal', 'ai-generated'] as const)
      .find(s => s === source);
    if (!typedSource || !behavior) continue;
    const provider = new FakeArtworkProvider(typedSource, behavior, callLog);
    providers.set(typedSource, provider);
    registry.register(provider);
  }

  return { registry, callLog, providers, resolver: new ArtworkResolver(registry, { attemptTimeoutMs: 50 }) };
}

describe('ArtworkResolver', () => {
  it('uses player artwork without calling any fallback source', async () => {
    const { resolver, callLog, providers } = setup({
      'player': found('player'),
      'spotify': found('spotify'),
      'lastfm': found('lastfm'),
      'ai-generated': found('ai-generated')
    });

    const result = await resolver.resolve(snapshot({ entity_picture: '/api/media_player_proxy/x' }));

    expect(result.artwork.source).toBe('player');
    expect(callLog).toEqual(['player']);
    expect(providers.get('spotify')?.attempt).not.toHaveBeenCalled();
    expect(providers.get('ai-generated')?.attempt).not.toHaveBeenCalled();
  });

  it('fails without falling back when player artwork cannot be fetched', async () => {
    const { resolver, callLog } = setup({
      'player': failed('HTTP 500'),
      'spotify': found('spotify')
    });

    await expect(resolver.resolve(snapshot({ entity_picture: 'http://host/art.jpg' })))
      .rejects.toBeInstanceOf(NoArtworkError);
    expect(callLog).toEqual(['player']);
  });

  it('falls through to lastfm when spotify lacks credentials and musicbrainz 404s', async () => {
    const { resolver, callLog } = setup({
      'spotify': skipped('credentials missing'),
      'musicbrainz': failed('HTTP 404'),
      'lastfm': found('lastfm'),
      'discogs': found('discogs'),
      'ai-generated': found('ai-generated')
    });

    const result = await resolver.resolve(snapshot());

    expect(result.artwork.source).toBe('lastfm');
    expect(callLog).toEqual(['spotify', 'musicbrainz', 'lastfm']);
    expect(result.attempts.map(a => [a.source, a.outcome])).toEqual([
      ['spotify', 'skipped'],
      ['musicbrainz', 'failed'],
      ['lastfm', 'found']
    ]);
  });

  it('attempts every source in the declared order', async () => {
    const { resolver, callLog } = setup({
      'ai-generated': found('ai-generated'),
      'tidal': skipped('credentials missing'),
      'discogs': failed('HTTP 500'),
      'lastfm': skipped('credentials missing'),
      'musicbrainz': failed('no match'),
      'spotify': failed('no match')
    });

    const result = await resolver.resolve(snapshot());

    expect(callLog).toEqual(['spotify', 'musicbrainz', 'lastfm', 'discogs', 'tidal', 'ai-generated']);
    expect(result.artwork.source).toBe('ai-generated');
  });

  it('never counts skipped sources as failures', async () => {
    const { resolver } = setup({
      'spotify': skipped('credentials missing'),
      'musicbrainz': skipped('disabled'),
      'lastfm': skipped('credentials missing'),
      'discogs': skipped('credentials missing'),
      'tidal': skipped('credentials missing'),
      'ai-generated': failed('HTTP 502')
    });

    const error = await resolver.resolve(snapshot()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NoArtworkError);
    const attempts = error instanceof NoArtworkError ? error.attempts : [];
    expect(attempts.filter(a => a.outcome === 'failed').map(a => a.source)).toEqual(['ai-generated']);
    expect(attempts.filter(a => a.outcome === 'skipped')).toHaveLength(5);
  });

  it('records unregistered sources as skipped', async () => {
    const { resolver } = setup({ 'lastfm': found('lastfm') });

    const result = await resolver.resolve(snapshot());

    expect(result.attempts).toEqual([
      { source: 'spotify', outcome: 'skipped', reason: 'no provider registered', durationMs: 0 },
      { source: 'musicbrainz', outcome: 'skipped', reason: 'no provider registered', durationMs: 0 },
      expect.objectContaining({ source: 'lastfm', outcome: 'found' })
    ]);
  });

  it('times out a slow source and moves on', async () => {
    const { resolver, callLog } = setup({
      'spotify': () => new Promise<ArtworkAttemptResult>(() => {}),
      'musicbrainz': found('musicbrainz')
    });

    const result = await resolver.resolve(snapshot());

    expect(callLog).toEqual(['spotify', 'musicbrainz']);
    expect(result.attempts[0]).toEqual(expect.objectContaining({
      source: 'spotify',
      outcome: 'failed',
      reason: 'timed out after 50ms'
    }));
    expect(result.artwork.source).toBe('musicbrainz');
  });

  it('treats a throwing provider as a failed attempt', async () => {
    const { resolver } = setup({
      'spotify': async () => { throw new Error('boom'); },
      'musicbrainz': found('musicbrainz')
    });

    const result = await resolver.resolve(snapshot());

    expect(result.attempts[0]).toEqual(expect.objectContaining({ outcome: 'failed', reason: 'boom' }));
  });

  it('goes straight to generated artwork when AI is forced', async () => {
    const { resolver, callLog } = setup({
      'player': found('player'),
      'spotify': found('spotify'),
      'ai-generated': found('ai-generated')
    });

    const result = await resolver.resolve(
      snapshot({ entity_picture: '/art.jpg' }),
      { forceAi: true, aiModel: 'flux' }
    );

    expect(result.artwork.source).toBe('ai-generated');
    expect(callLog).toEqual(['ai-generated']);
  });

  it('passes the AI model through to providers', async () => {
    const { resolver, providers } = setup({ 'ai-generated': found('ai-generated') });

    await resolver.resolve(snapshot(), { forceAi: true, aiModel: 'flux' });

    expect(providers.get('ai-generated')?.attempt).toHaveBeenCalledWith(
      expect.objectContaining({ aiModel: 'flux' })
    );
  });

  it('stops when the run is superseded', async () => {
    const { resolver, callLog } = setup({ 'spotify': found('spotify') });
    const controller = new AbortController();
    controller.abort();

    await expect(resolver.resolve(snapshot(), { signal: controller.signal }))
      .rejects.toBeInstanceOf(RunSupersededError);
    expect(callLog).toEqual([]);
  });
});
