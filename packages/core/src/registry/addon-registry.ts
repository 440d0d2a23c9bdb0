/**
 * Registry for managing artwork and lyrics providers
 */

import type {
  AddonRole,
  ArtworkProvider,
  LyricsProvider
} from '../types/addon';
import type { ArtworkSource } from '../types/index';

export type RegistrableAddon = ArtworkProvider | LyricsProvider;

interface RegisteredAddon {
  addon: RegistrableAddon;
  /** Cleared when initialization fails */
  enabled: boolean;
}

export function isArtworkProvider(addon: RegistrableAddon): addon is ArtworkProvider {
  return 'attempt' in addon && 'source' in addon;
}

export function isLyricsProvider(addon: RegistrableAddon): addon is LyricsProvider {
  return 'getLyrics' in addon;
}

export class AddonRegistry {
  private addons = new Map<string, RegisteredAddon>();
  private roleIndex = new Map<AddonRole, Set<string>>();

  /**
   * Register an addon
   */
  register(addon: RegistrableAddon): void {
    const { id, roles } = addon.manifest;

    if (this.addons.has(id)) {
      throw new Error(`Addon "${id}" is already registered`);
    }

    this.addons.set(id, { addon, enabled: true });

    // Index by role
    for (const role of roles) {
      const ids = this.roleIndex.get(role) ?? new Set<string>();
      ids.add(id);
      this.roleIndex.set(role, ids);
    }
  }

  private getEnabledByRole(role: AddonRole): RegisteredAddon[] {
    const ids = this.roleIndex.get(role);
    if (!ids) return [];

    const result: RegisteredAddon[] = [];
    for (const id of ids) {
      const registered = this.addons.get(id);
      if (registered?.enabled) {
        result.push(registered);
      }
    }
    return result;
  }

  /**
   * The enabled provider serving an artwork source, if any
   */
  getArtworkProvider(source: ArtworkSource): ArtworkProvider | null {
    for (const { addon } of this.getEnabledByRole('artwork-provider')) {
      if (isArtworkProvider(addon) && addon.source === source) {
        return addon;
      }
    }
    return null;
  }

  /**
   * Lyrics providers, highest priority first
   */
  getLyricsProviders(): LyricsProvider[] {
    return this.getEnabledByRole('lyrics-provider')
      .map(registered => registered.addon)
      .filter(isLyricsProvider)
      .sort((a, b) => b.priority - a.priority);
  }

  async initializeAll(): Promise<void> {
    for (const { addon } of this.addons.values()) {
      try {
        await addon.initialize();
      } catch (error) {
        console.error(`[Registry] Failed to initialize ${addon.manifest.id}:`, error);
        const registered = this.addons.get(addon.manifest.id);
        if (registered) registered.enabled = false;
      }
    }
  }

  async disposeAll(): Promise<void> {
    for (const { addon } of this.addons.values()) {
      try {
        await addon.dispose();
      } catch (error) {
        console.error(`[Registry] Failed to dispose ${addon.manifest.id}:`, error);
      }
    }
  }
}
