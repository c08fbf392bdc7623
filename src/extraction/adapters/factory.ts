import type { BackendEndpoints } from '../../config/extractionConfig';
import { ConfigurationError } from '../errors';
import { BACKEND_TAGS, isBackendTag, type BackendTag } from '../types';
import { AllenNlpAdapter, HttpAllenNlpRuntime, type AllenNlpRuntime } from './allenNlpAdapter';
import type { Adapter, AdapterConfig } from './base';
import { HttpHuggingFaceRuntime, HuggingFaceAdapter, type HuggingFaceRuntime } from './huggingFaceAdapter';
import { LasUIEAdapter, SubprocessLasUIERuntime, type LasUIERuntime } from './lasuieAdapter';
import { HttpSpacyRuntime, SpacyAdapter, type SpacyRuntime } from './spacyAdapter';

/** The backend runtimes adapters are built over. */
export interface BackendRuntimes {
  spacy: SpacyRuntime;
  huggingface: HuggingFaceRuntime;
  lasuie: LasUIERuntime;
  allennlp: AllenNlpRuntime;
}

export function createBackendRuntimes(endpoints: BackendEndpoints): BackendRuntimes {
  return {
    spacy: new HttpSpacyRuntime(
      endpoints.spacyServerUrl,
      endpoints.requestTimeoutMs,
      endpoints.spacyApiKey
    ),
    huggingface: new HttpHuggingFaceRuntime(
      endpoints.hfInferenceUrl,
      endpoints.requestTimeoutMs,
      endpoints.hfApiToken,
      endpoints.hfTrainingUrl
    ),
    lasuie: new SubprocessLasUIERuntime(endpoints.lasuiePath, endpoints.lasuiePython),
    allennlp: new HttpAllenNlpRuntime(
      endpoints.allenNlpServerUrl,
      endpoints.requestTimeoutMs,
      endpoints.allenNlpApiKey
    ),
  };
}

export class AdapterFactory {
  constructor(private readonly runtimes: BackendRuntimes) {}

  listBackends(): BackendTag[] {
    return [...BACKEND_TAGS];
  }

  /**
   * Builds an unloaded adapter. Unknown backend tags and params the backend
   * rejects both raise `ConfigurationError`.
   */
  create(backendTag: string, config: AdapterConfig): Adapter {
    if (!isBackendTag(backendTag)) {
      throw new ConfigurationError(
        `Unknown backend: ${backendTag}. Supported: ${BACKEND_TAGS.join(', ')}`
      );
    }

    switch (backendTag) {
      case 'spacy':
        return new SpacyAdapter(config, this.runtimes.spacy);
      case 'huggingface':
        return new HuggingFaceAdapter(config, this.runtimes.huggingface);
      case 'lasuie':
        return new LasUIEAdapter(config, this.runtimes.lasuie);
      case 'allennlp':
        return new AllenNlpAdapter(config, this.runtimes.allennlp);
      default: {
        const unreachable: never = backendTag;
        throw new ConfigurationError(`Unknown backend: ${String(unreachable)}`);
      }
    }
  }
}
