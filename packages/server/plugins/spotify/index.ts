/**
 * Spotify Plugin
 *
 * Looks the track up in the Spotify catalogue with the client-credentials
 * flow and uses the album cover, or the artist picture when the album has
 * none. The access token is cached until shortly before it expires.
 */

import { BaseArtworkProvider, getArray, getRecord, getString, getNumber, type ArtworkImage } from '@pixsync/sdk';
import type { ArtworkRequest, ArtworkSource } from '@pixsync/core';

const TOKEN_URL = 'https://accounts.spotify.com/api/token';
const API_URL = 'https://api.spotify.com/v1';

/** Refresh this long before the token actually expires */
const TOKEN_EXPIRY_MARGIN_MS = 60 * 1000;

export interface SpotifyOptions {
  clientId?: string;
  clientSecret?: string;
}

interface CachedToken {
  value: string;
  expiresAt: number;
}

export class SpotifyPlugin extends BaseArtworkProvider {
  readonly id = 'spotify';
  readonly name = 'Spotify';
  readonly source: ArtworkSource = 'spotify';

  private token: CachedToken | null = null;

  constructor(private options: SpotifyOptions) {
    super();
  }

  protected missingCredentials(): string | null {
    if (!this.options.clientId) return 'spotify.clientId';
    if (!this.options.clientSecret) return 'spotify.clientSecret';
    return null;
  }

  async dispose(): Promise<void> {
    this.token = null;
  }

  protected async findArtwork({ snapshot, signal }: ArtworkRequest): Promise<ArtworkImage | null> {
    const artist = snapshot.artist ?? '';
    const title = snapshot.cleanedTitle ?? snapshot.title ?? '';
    const token = await this.getAccessToken(signal);
    const auth = { 'Authorization': `Bearer ${token}` };

    let query = `artist:${artist} track:${title}`;
    if (snapshot.album) {
      query += ` album:${snapshot.album}`;
    }

    const params = new URLSearchParams({ q: query, type: 'track', limit: '1' });
    const search = await this.fetchJson(`${API_URL}/search?${params.toString()}`, signal, auth);
    const track = getArray(getRecord(search, 'tracks'), 'items')[0];
    if (!track) return null;

    const albumImage = firstImageUrl(getRecord(track, 'album'));
    if (albumImage) {
      return this.fetchImage(albumImage, signal);
    }

    // Album without a cover: try the artist picture
    const artistId = getString(getArray(track, 'artists')[0], 'id');
    if (!artistId) return null;

    const artistInfo = await this.fetchJson(`${API_URL}/artists/${encodeURIComponent(artistId)}`, signal, auth);
    const artistImage = firstImageUrl(artistInfo);
    return artistImage ? this.fetchImage(artistImage, signal) : null;
  }

  /**
   * Client-credentials token, cached until shortly before expiry
   */
  async getAccessToken(signal?: AbortSignal): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt) {
      return this.token.value;
    }

    const basic = Buffer.from(`${this.options.clientId}:${this.options.clientSecret}`).toString('base64');
    const response = await fetch(TOKEN_URL, {
      method: 'POST',
      headers: {
        'Authorization': `Basic ${basic}`,
        'Content-Type': 'application/x-www-form-urlencoded'
      },
      body: 'grant_type=client_credentials',
      signal
    });

    if (!response.ok) {
      throw new Error(`token request failed: HTTP ${response.status}`);
    }

    const body: unknown = await response.json();
    const value = getString(body, 'access_token');
    if (!value) {
      throw new Error('token response without access_token');
    }

    const expiresIn = getNumber(body, 'expires_in') ?? 3600;
    this.token = { value, expiresAt: Date.now() + expiresIn * 1000 - TOKEN_EXPIRY_MARGIN_MS };
    return value;
  }
}

/** Spotify lists images largest first */
function firstImageUrl(owner: unknown): string | null {
  return getString(getArray(owner, 'images')[0], 'url');
}
