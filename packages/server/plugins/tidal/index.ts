/**
 * TIDAL Plugin
 *
 * Placeholder in the fallback chain. Entries without TIDAL credentials skip
 * it; with credentials it reports the catalogue as unavailable so the chain
 * moves on.
 */

import { BaseArtworkProvider, type ArtworkImage } from '@pixsync/sdk';
import type { ArtworkSource } from '@pixsync/core';

export interface TidalOptions {
  clientId?: string;
  clientSecret?: string;
}

export class TidalPlugin extends BaseArtworkProvider {
  readonly id = 'tidal';
  readonly name = 'TIDAL';
  readonly source: ArtworkSource = 'tidal';

  constructor(private options: TidalOptions) {
    super();
  }

  protected missingCredentials(): string | null {
    if (!this.options.clientId) return 'tidal.clientId';
    if (!this.options.clientSecret) return 'tidal.clientSecret';
    return null;
  }

  protected async findArtwork(): Promise<ArtworkImage | null> {
    // TODO: switch to the TIDAL OpenAPI album search once client-credentials access covers artwork
    throw new Error('TIDAL catalogue lookup is not available');
  }
}
