/**
 * ArtworkResolver - Walks the artwork fallback chain
 *
 * Player artwork is used on its own when present. Otherwise sources are
 * tried in a fixed order, each with its own timeout and no retries. A
 * skipped source (missing credentials, unsuitable media) is recorded but
 * never counted as a failure. Generated artwork is the terminal source;
 * when it fails too the resolution fails with NoArtworkError.
 */

import type { AddonRegistry } from '../registry/addon-registry';
import type { ArtworkAttemptResult } from '../types/addon';
import type {
  AiModel,
  ArtworkSource,
  MediaSnapshot,
  ResolutionAttempt,
  ResolvedArtwork
} from '../types/index';
import { NoArtworkError, RunSupersededError, errorMessage } from '../errors';
import { abortMessage, scopedSignal, whenAborted } from '../utils/abort';

export const FALLBACK_ORDER: readonly ArtworkSource[] = [
  'spotify',
  'musicbrainz',
  'lastfm',
  'discogs',
  'tidal',
  'ai-generated'
];

export interface ArtworkResolverOptions {
  /** Per-source timeout */
  attemptTimeoutMs?: number;
}

export interface ResolveOptions {
  /** Skip straight to generated artwork */
  forceAi?: boolean;
  aiModel?: AiModel;
  /** Aborted when a newer state change supersedes this run */
  signal?: AbortSignal;
}

export interface ArtworkResolution {
  artwork: ResolvedArtwork;
  attempts: ResolutionAttempt[];
}

export class ArtworkResolver {
  private attemptTimeoutMs: number;

  constructor(private registry: AddonRegistry, options: ArtworkResolverOptions = {}) {
    this.attemptTimeoutMs = options.attemptTimeoutMs ?? 10000;
  }

  /**
   * Sources that will be considered for a snapshot, in order
   */
  planSources(snapshot: MediaSnapshot, options: ResolveOptions = {}): ArtworkSource[] {
    if (options.forceAi) return ['ai-generated'];
    if (snapshot.artworkUrl) return ['player'];
    return [...FALLBACK_ORDER];
  }

  async resolve(snapshot: MediaSnapshot, options: ResolveOptions = {}): Promise<ArtworkResolution> {
    const attempts: ResolutionAttempt[] = [];
    const aiModel = options.aiModel ?? 'turbo';

    for (const source of this.planSources(snapshot, options)) {
      if (options.signal?.aborted) {
        throw new RunSupersededError();
      }

      const provider = this.registry.getArtworkProvider(source);
      if (!provider) {
        attempts.push({ source, outcome: 'skipped', reason: 'no provider registered', durationMs: 0 });
        continue;
      }

      const startedAt = Date.now();
      const scoped = scopedSignal(this.attemptTimeoutMs, options.signal);
      let result: ArtworkAttemptResult;

      try {
        result = await Promise.race([
          provider.attempt({ snapshot, aiModel, signal: scoped.signal }),
          whenAborted(scoped.signal, (): ArtworkAttemptResult => ({
            status: 'failed',
            reason: abortMessage(scoped.signal)
          }))
        ]);
      } catch (error) {
        result = { status: 'failed', reason: errorMessage(error) };
      } finally {
        scoped.dispose();
      }

      const durationMs = Date.now() - startedAt;

      if (result.status === 'found') {
        attempts.push({ source, outcome: 'found', durationMs });
        return { artwork: result.artwork, attempts };
      }

      if (options.signal?.aborted) {
        throw new RunSupersededError();
      }

      if (result.status === 'skipped') {
        attempts.push({ source, outcome: 'skipped', reason: result.reason, durationMs });
      } else {
        console.warn(`[ArtworkResolver] ${source} failed: ${result.reason}`);
        attempts.push({ source, outcome: 'failed', reason: result.reason, durationMs });
      }
    }

    throw new NoArtworkError(attempts);
  }
}
