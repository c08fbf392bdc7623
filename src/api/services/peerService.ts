import path from 'path';
import type { ExtractionConfig, ModelProfileRegistry } from '../../config/extractionConfig';
import { ConfigurationError } from '../../extraction/errors';
import type { AdapterRegistry } from '../../extraction/adapters/registry';
import type {
  ExtractTriplesRequest,
  ExtractTriplesResponse,
  TrainModelRequest,
  TrainModelResponse,
  WireTriple,
} from '../../extraction/schemas';
import type { ModelProfileSummary } from '../../extraction/types';
import type { ExtractionWorker } from '../../extraction/worker';
import { createLogger } from '../../utils/logger';
import type { HealthResponse, ServiceInfo } from '../types/api';

const logger = createLogger('api/peer');

export const SERVICE_NAME = 'Trait Extraction Server';
export const SERVICE_VERSION = '1.0.0';

export type PeerConfig = Pick<ExtractionConfig, 'enableTraining' | 'modelsCacheDir'>;

/**
 * Runs extraction, training and unload requests from orchestrators on this
 * process's adapters, whatever mode the local service is in. Nothing is
 * persisted here; the caller stores the returned triples.
 */
export class PeerService {
  constructor(
    private readonly profiles: ModelProfileRegistry,
    private readonly registry: AdapterRegistry,
    private readonly worker: ExtractionWorker,
    private readonly config: PeerConfig
  ) {}

  info(): ServiceInfo {
    return { service: SERVICE_NAME, version: SERVICE_VERSION, status: 'running' };
  }

  health(): HealthResponse {
    return { status: 'healthy', loaded_adapters: this.registry.listLoaded() };
  }

  listModels(): ModelProfileSummary[] {
    return this.profiles.list();
  }

  async extractTriples(request: ExtractTriplesRequest): Promise<ExtractTriplesResponse> {
    const profile = this.profiles.require(request.model_profile);
    logger.info(
      { documents: request.documents.length, profile: request.model_profile, jobId: request.job_id },
      'Extraction request'
    );

    const adapter = this.registry.get(request.model_profile, profile);
    const triples = await this.worker.enqueue(request.model_profile, async () => {
      const results = await adapter.extract(request.documents.map((doc) => doc.text));
      return request.documents.flatMap((doc, i) =>
        (results[i] ?? []).map(
          (raw): WireTriple => ({
            ...adapter.normalize(raw),
            document_id: doc.id,
            model_profile: request.model_profile,
            job_id: request.job_id ?? null,
            project_id: doc.metadata.project_id ?? null,
            doi: doc.metadata.doi ?? null,
            sentence: raw.sentence ?? '',
          })
        )
      );
    });

    logger.info({ triples: triples.length, jobId: request.job_id }, 'Extraction complete');
    return {
      job_id: request.job_id ?? null,
      status: 'completed',
      total_documents: request.documents.length,
      total_triples: triples.length,
      triples,
    };
  }

  async trainModel(request: TrainModelRequest): Promise<TrainModelResponse> {
    if (!this.config.enableTraining) {
      throw new ConfigurationError('Training is disabled');
    }
    const profile = this.profiles.require(request.model_profile);
    logger.info(
      { profile: request.model_profile, examples: request.training_data.length },
      'Training request'
    );

    const adapter = this.registry.get(request.model_profile, profile);
    const result = await this.worker.enqueue(request.model_profile, () =>
      adapter.train(request.training_data, {
        numEpochs: request.num_epochs,
        batchSize: request.batch_size,
        outputDir:
          request.output_dir ?? path.join(this.config.modelsCacheDir, request.model_profile),
      })
    );
    return {
      status: result.status,
      model_path: result.artifact_path ?? null,
      metrics: result.metrics,
      error: result.error ?? null,
    };
  }

  async unloadModel(profileName: string): Promise<{ status: string; message: string }> {
    await this.worker.enqueue(profileName, () => this.registry.unload(profileName));
    return { status: 'success', message: `Model ${profileName} unloaded` };
  }

  async unloadAll(): Promise<{ status: string; message: string }> {
    await Promise.all(
      this.registry
        .listLoaded()
        .map((name) => this.worker.enqueue(name, () => this.registry.unload(name)))
    );
    return { status: 'success', message: 'All models unloaded' };
  }
}
