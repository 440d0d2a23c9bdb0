/**
 * Base class for artwork providers with helper methods
 *
 * Subclasses implement `findArtwork` and, when they need credentials,
 * `missingCredentials`. The base turns both into attempt results: absent
 * credentials and unsuitable media become `skipped`, thrown errors and
 * empty results become `failed`.
 */

import type {
  AddonManifest,
  ArtworkAttemptResult,
  ArtworkProvider,
  ArtworkRequest,
  ArtworkSource,
  MediaSnapshot
} from '@pixsync/core';
import { errorMessage } from '@pixsync/core';

export interface ArtworkImage {
  data: Uint8Array;
  contentType?: string;
  url?: string;
}

export const DEFAULT_USER_AGENT = 'pixsync/0.1.0';

export abstract class BaseArtworkProvider implements ArtworkProvider {
  abstract readonly id: string;
  abstract readonly name: string;
  abstract readonly source: ArtworkSource;

  get manifest(): AddonManifest {
    return {
      id: this.id,
      name: this.name,
      version: '1.0.0',
      roles: ['artwork-provider']
    };
  }

  async initialize(): Promise<void> {
    // Override in subclass if needed
  }

  async dispose(): Promise<void> {
    // Override in subclass if needed
  }

  async attempt(request: ArtworkRequest): Promise<ArtworkAttemptResult> {
    const missing = this.missingCredentials();
    if (missing) {
      return { status: 'skipped', reason: `credentials missing: ${missing}` };
    }

    const unsuitable = this.checkSnapshot(request.snapshot);
    if (unsuitable) {
      return { status: 'skipped', reason: unsuitable };
    }

    try {
      const image = await this.findArtwork(request);
      if (!image) {
        return { status: 'failed', reason: 'no match' };
      }
      return {
        status: 'found',
        artwork: {
          source: this.source,
          data: image.data,
          contentType: image.contentType,
          url: image.url,
          resolvedAt: Date.now()
        }
      };
    } catch (error) {
      return { status: 'failed', reason: errorMessage(error) };
    }
  }

  /**
   * Name of the first missing credential, or null when the provider can run
   */
  protected missingCredentials(): string | null {
    return null;
  }

  /**
   * Reason the snapshot cannot be served, or null. Catalogue lookups need
   * an artist and a title and only make sense for music.
   */
  protected checkSnapshot(snapshot: MediaSnapshot): string | null {
    if (snapshot.kind !== 'music') return `not music (${snapshot.kind})`;
    if (!snapshot.artist || !snapshot.title) return 'artist and title required';
    return null;
  }

  protected abstract findArtwork(request: ArtworkRequest): Promise<ArtworkImage | null>;

  /**
   * Helper: GET a JSON document, throwing on non-2xx
   */
  protected async fetchJson(url: string, signal: AbortSignal, headers: Record<string, string> = {}): Promise<unknown> {
    const response = await fetch(url, {
      headers: { 'Accept': 'application/json', 'User-Agent': DEFAULT_USER_AGENT, ...headers },
      signal
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }

    const json: unknown = await response.json();
    return json;
  }

  /**
   * Helper: download an image, rejecting non-image and empty bodies
   */
  protected async fetchImage(url: string, signal: AbortSignal, headers: Record<string, string> = {}): Promise<ArtworkImage> {
    const response = await fetch(url, {
      headers: { 'User-Agent': DEFAULT_USER_AGENT, ...headers },
      signal
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }

    const contentType = response.headers.get('content-type') ?? undefined;
    if (contentType && !contentType.startsWith('image/')) {
      throw new Error(`unexpected content type ${contentType}`);
    }

    const data = new Uint8Array(await response.arrayBuffer());
    if (data.length === 0) {
      throw new Error('empty image');
    }

    return { data, contentType, url };
  }
}
