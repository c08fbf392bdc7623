import type { z } from 'zod';
import type { Logger } from '../../utils/logger';
import { ConfigurationError, ExtractionRuntimeError, ModelLoadError, errorMessage } from '../errors';
import type {
  BackendTag,
  NormalizedTriple,
  RawTriple,
  TrainingExample,
  TrainingOptions,
  TrainingResult,
} from '../types';
import {
  canonicalEntityType,
  canonicalRelation,
  clampConfidence,
  type CanonicalEntityType,
} from '../vocabulary';

export interface AdapterConfig {
  profileName: string;
  params: Record<string, unknown>;
}

export interface Adapter {
  readonly backend: BackendTag;
  readonly profileName: string;
  readonly isLoaded: boolean;
  load(): Promise<void>;
  extract(texts: readonly string[]): Promise<RawTriple[][]>;
  train(examples: readonly TrainingExample[], options?: TrainingOptions): Promise<TrainingResult>;
  normalize(raw: RawTriple): NormalizedTriple;
  unload(): Promise<void>;
  getModelInfo(): ModelInfo;
}

export interface ModelInfo {
  backend: BackendTag;
  profile: string;
  is_loaded: boolean;
  params: Record<string, unknown>;
}

export function parseParams<S extends z.ZodTypeAny>(
  schema: S,
  config: AdapterConfig,
  backend: BackendTag
): z.output<S> {
  const parsed = schema.safeParse(config.params);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid ${backend} params for profile ${config.profileName}: ${parsed.error.message}`
    );
  }
  return parsed.data;
}

/**
 * Shared lifecycle for every backend: lazy, idempotent loading, implicit load
 * before extraction or training, and normalization into the canonical
 * vocabulary. Subclasses supply the backend calls and their label mapping.
 */
export abstract class BaseAdapter<P extends Record<string, unknown>> implements Adapter {
  abstract readonly backend: BackendTag;
  readonly profileName: string;

  protected abstract readonly entityTypes: Readonly<Record<string, CanonicalEntityType>>;

  private loaded = false;
  private loading: Promise<void> | null = null;

  protected constructor(
    config: AdapterConfig,
    protected readonly params: P,
    protected readonly logger: Logger
  ) {
    this.profileName = config.profileName;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  async load(): Promise<void> {
    if (this.loaded) return;
    if (!this.loading) {
      this.loading = this.loadModel()
        .then(() => {
          this.loaded = true;
          this.logger.info({ profile: this.profileName }, 'Model loaded');
        })
        .catch((error: unknown) => {
          throw error instanceof ModelLoadError
            ? error
            : new ModelLoadError(this.profileName, errorMessage(error), { cause: error });
        })
        .finally(() => {
          this.loading = null;
        });
    }
    return this.loading;
  }

  async extract(texts: readonly string[]): Promise<RawTriple[][]> {
    await this.load();
    let results: RawTriple[][];
    try {
      results = await this.extractTriples(texts);
    } catch (error) {
      if (error instanceof ExtractionRuntimeError) throw error;
      throw new ExtractionRuntimeError(
        `${this.backend} extraction failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    if (results.length !== texts.length) {
      throw new ExtractionRuntimeError(
        `${this.backend} returned ${results.length} results for ${texts.length} texts`
      );
    }
    return results;
  }

  async train(
    examples: readonly TrainingExample[],
    options: TrainingOptions = {}
  ): Promise<TrainingResult> {
    if (!this.trainModel) {
      this.logger.warn({ profile: this.profileName }, 'Training not implemented for backend');
      return {
        status: 'not_implemented',
        metrics: {},
        error: `Training is not supported by the ${this.backend} backend`,
      };
    }
    try {
      await this.load();
      return await this.trainModel(examples, options);
    } catch (error) {
      this.logger.error({ err: error, profile: this.profileName }, 'Training failed');
      return { status: 'failed', metrics: {}, error: errorMessage(error) };
    }
  }

  normalize(raw: RawTriple): NormalizedTriple {
    return {
      source_entity_name: raw.subject,
      source_entity_attr: canonicalEntityType(raw.subject_type, this.entityTypes),
      relation_type: canonicalRelation(raw.predicate),
      sink_entity_name: raw.object,
      sink_entity_attr: canonicalEntityType(raw.object_type, this.entityTypes),
      confidence: clampConfidence(raw.confidence),
      trait_name: raw.trait_name ?? null,
      trait_value: raw.trait_value ?? null,
      unit: raw.unit ?? null,
    };
  }

  async unload(): Promise<void> {
    if (this.loading) {
      await this.loading.catch((error: unknown) => {
        this.logger.warn({ err: error, profile: this.profileName }, 'Pending load failed before unload');
      });
    }
    if (!this.loaded) return;
    await this.releaseModel();
    this.loaded = false;
    this.logger.info({ profile: this.profileName }, 'Model unloaded');
  }

  getModelInfo(): ModelInfo {
    return {
      backend: this.backend,
      profile: this.profileName,
      is_loaded: this.loaded,
      params: { ...this.params },
    };
  }

  protected abstract loadModel(): Promise<void>;

  protected abstract extractTriples(texts: readonly string[]): Promise<RawTriple[][]>;

  protected trainModel?(
    examples: readonly TrainingExample[],
    options: TrainingOptions
  ): Promise<TrainingResult>;

  protected async releaseModel(): Promise<void> {}
}
