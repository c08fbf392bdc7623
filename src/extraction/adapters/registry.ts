import { createLogger } from '../../utils/logger';
import type { ModelProfile } from '../types';
import type { Adapter } from './base';
import type { AdapterFactory } from './factory';

const logger = createLogger('adapters/registry');

/**
 * Adapter instances keyed by profile name. One instance per profile for the
 * lifetime of the registry (or until it is unloaded); callers construct and
 * inject it.
 */
export class AdapterRegistry {
  private readonly adapters = new Map<string, Adapter>();

  constructor(private readonly factory: AdapterFactory) {}

  get(profileName: string, profile: ModelProfile): Adapter {
    const existing = this.adapters.get(profileName);
    if (existing) return existing;

    const adapter = this.factory.create(profile.backend, {
      profileName,
      params: profile.params,
    });
    this.adapters.set(profileName, adapter);
    logger.debug({ profile: profileName, backend: profile.backend }, 'Adapter created');
    return adapter;
  }

  has(profileName: string): boolean {
    return this.adapters.has(profileName);
  }

  async unload(profileName: string): Promise<void> {
    const adapter = this.adapters.get(profileName);
    if (!adapter) return;
    this.adapters.delete(profileName);
    await adapter.unload();
  }

  async unloadAll(): Promise<void> {
    const names = [...this.adapters.keys()];
    for (const name of names) {
      await this.unload(name);
    }
  }

  /** Cached profile names in insertion order. */
  listLoaded(): string[] {
    return [...this.adapters.keys()];
  }
}
