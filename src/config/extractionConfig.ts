import fs from 'fs';
import path from 'path';
import { ConfigurationError, errorMessage } from '../extraction/errors';
import { ModelProfilesFileSchema } from '../extraction/schemas';
import type { ModelProfile, ModelProfileSummary } from '../extraction/types';

type Env = Record<string, string | undefined>;

export interface BackendEndpoints {
  spacyServerUrl: string;
  spacyApiKey?: string;
  allenNlpServerUrl: string;
  allenNlpApiKey?: string;
  hfInferenceUrl: string;
  hfApiToken?: string;
  hfTrainingUrl?: string;
  lasuiePath: string;
  lasuiePython: string;
  /** Per-request timeout for model server calls. */
  requestTimeoutMs: number;
}

export interface ExtractionConfig {
  localMode: boolean;
  remoteUrl: string;
  apiKey?: string;
  readTimeoutMs: number;
  connectTimeoutMs: number;
  profilesPath: string;
  modelsCacheDir: string;
  enableTraining: boolean;
  trainingEpochs: number;
  trainingBatchSize: number;
  minConfidence: number;
  maxConcurrentJobs: number;
  backends: BackendEndpoints;
}

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigin: string;
}

export const DEFAULT_PROFILES_PATH = path.join('config', 'model-profiles.json');

function parseBool(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  const lowered = value.toLowerCase();
  if (['true', '1', 'yes'].includes(lowered)) return true;
  if (['false', '0', 'no'].includes(lowered)) return false;
  throw new ConfigurationError(`${name} must be a boolean, got "${value}"`);
}

function parseNumber(
  name: string,
  value: string | undefined,
  fallback: number,
  { integer = false, min = 0 }: { integer?: boolean; min?: number } = {}
): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < min || (integer && !Number.isInteger(parsed))) {
    throw new ConfigurationError(`${name} must be ${integer ? 'an integer' : 'a number'} >= ${min}, got "${value}"`);
  }
  return parsed;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export function loadExtractionConfig(env: Env = process.env): ExtractionConfig {
  const readTimeoutSec = parseNumber('TRAIT_EXTRACTION_TIMEOUT', env.TRAIT_EXTRACTION_TIMEOUT, 300, { min: 1 });

  return {
    localMode: parseBool('TRAIT_EXTRACTION_LOCAL_MODE', env.TRAIT_EXTRACTION_LOCAL_MODE, true),
    remoteUrl: stripTrailingSlash(env.TRAIT_EXTRACTION_URL || 'http://localhost:8000'),
    apiKey: env.TRAIT_EXTRACTION_API_KEY || undefined,
    readTimeoutMs: readTimeoutSec * 1000,
    connectTimeoutMs:
      parseNumber('TRAIT_EXTRACTION_CONNECTION_TIMEOUT', env.TRAIT_EXTRACTION_CONNECTION_TIMEOUT, 30, { min: 1 }) * 1000,
    profilesPath: env.TRAIT_EXTRACTION_PROFILES || DEFAULT_PROFILES_PATH,
    modelsCacheDir: env.TRAIT_EXTRACTION_MODELS_CACHE || 'models_cache',
    enableTraining: parseBool('TRAIT_EXTRACTION_ENABLE_TRAINING', env.TRAIT_EXTRACTION_ENABLE_TRAINING, true),
    trainingEpochs: parseNumber('TRAIT_EXTRACTION_TRAINING_EPOCHS', env.TRAIT_EXTRACTION_TRAINING_EPOCHS, 3, { integer: true, min: 1 }),
    trainingBatchSize: parseNumber('TRAIT_EXTRACTION_TRAINING_BATCH_SIZE', env.TRAIT_EXTRACTION_TRAINING_BATCH_SIZE, 4, { integer: true, min: 1 }),
    minConfidence: parseNumber('TRAIT_EXTRACTION_MIN_CONFIDENCE', env.TRAIT_EXTRACTION_MIN_CONFIDENCE, 0),
    maxConcurrentJobs: parseNumber('TRAIT_EXTRACTION_MAX_CONCURRENT_JOBS', env.TRAIT_EXTRACTION_MAX_CONCURRENT_JOBS, 2, { integer: true, min: 1 }),
    backends: {
      spacyServerUrl: stripTrailingSlash(env.SPACY_SERVER_URL || 'http://localhost:8080'),
      spacyApiKey: env.SPACY_API_KEY || undefined,
      allenNlpServerUrl: stripTrailingSlash(env.ALLENNLP_SERVER_URL || 'http://localhost:8001'),
      allenNlpApiKey: env.ALLENNLP_API_KEY || undefined,
      hfInferenceUrl: stripTrailingSlash(env.HF_INFERENCE_URL || 'https://api-inference.huggingface.co'),
      hfApiToken: env.HF_API_TOKEN || undefined,
      hfTrainingUrl: env.HF_TRAINING_URL ? stripTrailingSlash(env.HF_TRAINING_URL) : undefined,
      lasuiePath: env.LASUIE_PATH || './LasUIE',
      lasuiePython: env.LASUIE_PYTHON || 'python',
      requestTimeoutMs: readTimeoutSec * 1000,
    },
  };
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    // PORT is set by hosting platforms, API_PORT for local runs
    port: parseNumber('PORT', env.PORT || env.API_PORT, 8000, { integer: true }),
    host: env.API_HOST || '0.0.0.0',
    corsOrigin: env.CORS_ORIGIN || '*',
  };
}

/** `device: "auto"` picks CUDA only when GPUs are visible to the process. */
export function resolveDevice(params: Record<string, unknown>, env: Env): Record<string, unknown> {
  if (params.device !== 'auto') return params;
  return { ...params, device: env.CUDA_VISIBLE_DEVICES ? 'cuda' : 'cpu' };
}

export class ModelProfileRegistry {
  private readonly profiles: ReadonlyMap<string, ModelProfile>;

  constructor(profiles: Record<string, ModelProfile>) {
    this.profiles = new Map(Object.entries(profiles));
  }

  get(profileName: string): ModelProfile | undefined {
    return this.profiles.get(profileName);
  }

  has(profileName: string): boolean {
    return this.profiles.has(profileName);
  }

  /** Throws `ConfigurationError` naming the unknown profile. */
  require(profileName: string): ModelProfile {
    const profile = this.profiles.get(profileName);
    if (!profile) {
      throw new ConfigurationError(
        `Unknown model profile: ${profileName} (available: ${[...this.profiles.keys()].join(', ')})`
      );
    }
    return profile;
  }

  list(): ModelProfileSummary[] {
    return [...this.profiles].map(([id, profile]) => ({
      id,
      name: profile.name,
      description: profile.description,
      backend: profile.backend,
    }));
  }
}

export function parseModelProfiles(raw: unknown, env: Env = process.env): ModelProfileRegistry {
  const parsed = ModelProfilesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid model profiles: ${parsed.error.message}`);
  }

  const profiles: Record<string, ModelProfile> = {};
  for (const [id, profile] of Object.entries(parsed.data.profiles)) {
    profiles[id] = { ...profile, params: resolveDevice(profile.params, env) };
  }
  return new ModelProfileRegistry(profiles);
}

export function loadModelProfiles(
  profilesPath: string = DEFAULT_PROFILES_PATH,
  env: Env = process.env
): ModelProfileRegistry {
  const resolved = path.resolve(profilesPath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read model profiles from ${resolved}: ${errorMessage(error)}`);
  }
  return parseModelProfiles(raw, env);
}
