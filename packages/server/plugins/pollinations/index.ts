/**
 * Pollinations Plugin
 *
 * Generates artwork from the snapshot's prompt. Terminal source of the
 * fallback chain, so it serves every kind of media.
 */

import { BaseArtworkProvider, type ArtworkImage } from '@pixsync/sdk';
import type { ArtworkRequest, ArtworkSource, MediaSnapshot } from '@pixsync/core';

const BASE_URL = 'https://image.pollinations.ai/prompt';

export function buildPollinationsUrl(prompt: string, model: string, size = 64): string {
  const params = new URLSearchParams({
    model,
    width: String(size),
    height: String(size),
    nologo: 'true'
  });
  return `${BASE_URL}/${encodeURIComponent(prompt)}?${params.toString()}`;
}

export class PollinationsPlugin extends BaseArtworkProvider {
  readonly id = 'pollinations';
  readonly name = 'Pollinations.ai';
  readonly source: ArtworkSource = 'ai-generated';

  protected checkSnapshot(_snapshot: MediaSnapshot): string | null {
    return null;
  }

  protected async findArtwork({ snapshot, aiModel, signal }: ArtworkRequest): Promise<ArtworkImage | null> {
    return this.fetchImage(buildPollinationsUrl(snapshot.aiPrompt, aiModel), signal);
  }
}
