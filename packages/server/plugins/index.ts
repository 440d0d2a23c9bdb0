/**
 * Built-in providers, instantiated per entry so that entries share no
 * caches or tokens.
 */

import { AddonRegistry } from '@pixsync/core';
import type { EntryConfig } from '../src/config';
import { PlayerArtworkPlugin } from './player-artwork';
import { SpotifyPlugin } from './spotify';
import { MusicBrainzPlugin } from './musicbrainz';
import { LastfmPlugin } from './lastfm';
import { DiscogsPlugin } from './discogs';
import { TidalPlugin } from './tidal';
import { PollinationsPlugin } from './pollinations';
import { TextylLyricsPlugin } from './textyl-lyrics';
import { LrclibLyricsPlugin } from './lrclib-lyrics';

export {
  PlayerArtworkPlugin,
  SpotifyPlugin,
  MusicBrainzPlugin,
  LastfmPlugin,
  DiscogsPlugin,
  TidalPlugin,
  PollinationsPlugin,
  TextylLyricsPlugin,
  LrclibLyricsPlugin
};

/**
 * How providers reach media the host serves itself
 */
export interface HostMediaAccess {
  resolveUrl(path: string): string;
  authHeaders(): Record<string, string>;
}

export function createEntryRegistry(entry: EntryConfig, host: HostMediaAccess): AddonRegistry {
  const registry = new AddonRegistry();
  const { credentials } = entry;

  registry.register(new PlayerArtworkPlugin({
    resolveUrl: path => host.resolveUrl(path),
    hostHeaders: () => host.authHeaders()
  }));
  registry.register(new SpotifyPlugin({
    clientId: credentials.spotifyClientId,
    clientSecret: credentials.spotifyClientSecret
  }));
  registry.register(new MusicBrainzPlugin({ enabled: entry.musicbrainzEnabled }));
  registry.register(new LastfmPlugin({ apiKey: credentials.lastfmApiKey }));
  registry.register(new DiscogsPlugin({ token: credentials.discogsToken }));
  registry.register(new TidalPlugin({
    clientId: credentials.tidalClientId,
    clientSecret: credentials.tidalClientSecret
  }));
  registry.register(new PollinationsPlugin());

  registry.register(new TextylLyricsPlugin());
  registry.register(new LrclibLyricsPlugin());

  return registry;
}
