import {
  loadExtractionConfig,
  loadModelProfiles,
  type ExtractionConfig,
  type ModelProfileRegistry,
} from '../config/extractionConfig';
import { createTraitStore, type TraitStore } from '../db/client';
import { AdapterFactory, createBackendRuntimes, type BackendRuntimes } from './adapters/factory';
import { AdapterRegistry } from './adapters/registry';
import { RemoteExtractionClient } from './remoteClient';
import { TraitExtractionService } from './service';
import { ExtractionWorker } from './worker';

export interface ExtractionContext {
  config: ExtractionConfig;
  profiles: ModelProfileRegistry;
  registry: AdapterRegistry;
  worker: ExtractionWorker;
  store: TraitStore;
  remote?: RemoteExtractionClient;
  service: TraitExtractionService;
}

export interface ContextOverrides {
  config?: ExtractionConfig;
  profiles?: ModelProfileRegistry;
  store?: TraitStore;
  runtimes?: BackendRuntimes;
  remote?: RemoteExtractionClient;
}

/**
 * Wires config, registry, worker, store and service together. Anything not
 * overridden is built from the environment.
 */
export function createExtractionContext(overrides: ContextOverrides = {}): ExtractionContext {
  const config = overrides.config ?? loadExtractionConfig();
  const profiles = overrides.profiles ?? loadModelProfiles(config.profilesPath);
  const registry = new AdapterRegistry(
    new AdapterFactory(overrides.runtimes ?? createBackendRuntimes(config.backends))
  );
  const worker = new ExtractionWorker(config.maxConcurrentJobs);
  const store = overrides.store ?? createTraitStore();
  const remote =
    overrides.remote ??
    (config.localMode
      ? undefined
      : new RemoteExtractionClient({
          baseUrl: config.remoteUrl,
          apiKey: config.apiKey,
          connectTimeoutMs: config.connectTimeoutMs,
          readTimeoutMs: config.readTimeoutMs,
        }));

  const service = new TraitExtractionService({ store, profiles, registry, config, remote, worker });
  return { config, profiles, registry, worker, store, remote, service };
}
