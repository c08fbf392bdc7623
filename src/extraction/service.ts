import path from 'path';
import type { ExtractionConfig, ModelProfileRegistry } from '../config/extractionConfig';
import type {
  DocumentFilters,
  InsertDocument,
  JobFilters,
  PageParams,
  PageResult,
  TraitStore,
  TripleFilters,
} from '../db/client';
import { createLogger, type Logger } from '../utils/logger';
import type { Adapter } from './adapters/base';
import type { AdapterRegistry } from './adapters/registry';
import { ConfigurationError, JobStateError, RemoteServiceError, errorMessage } from './errors';
import { assertTransition, JobRun } from './job';
import type { RemoteExtractionClient } from './remoteClient';
import type { ExtractDocument, TripleEdits, WireTriple } from './schemas';
import type {
  Document,
  ExtractedTriple,
  ExtractionJob,
  ExtractionMode,
  InsertTriple,
  JobResult,
  ModelProfile,
  ModelProfileSummary,
  RawTriple,
  SkippedDocument,
  TrainingExample,
  TrainingOptions,
  TrainingResult,
  TripleStatus,
} from './types';
import { ExtractionWorker } from './worker';

export interface ExtractionRequest {
  documentIds: number[];
  modelProfile: string;
  projectId?: number | null;
  createdBy?: string | null;
  mode?: ExtractionMode;
}

export interface ExtractOptions {
  /** Resolve with the terminal result instead of returning once the job is queued. */
  wait?: boolean;
}

export interface TripleReview {
  status?: TripleStatus;
  edits?: TripleEdits;
}

export interface TraitExtractionServiceDeps {
  store: TraitStore;
  profiles: ModelProfileRegistry;
  registry: AdapterRegistry;
  config: Pick<
    ExtractionConfig,
    | 'localMode'
    | 'enableTraining'
    | 'trainingEpochs'
    | 'trainingBatchSize'
    | 'modelsCacheDir'
    | 'minConfidence'
    | 'maxConcurrentJobs'
  >;
  /** Required when `config.localMode` is false. */
  remote?: RemoteExtractionClient;
  worker?: ExtractionWorker;
  now?: () => Date;
  logger?: Logger;
}

const SENTENCE_FALLBACK_LENGTH = 200;
const REMOTE_ERROR_PREFIX = 'Remote server error: ';

export class TraitExtractionService {
  private readonly store: TraitStore;
  private readonly profiles: ModelProfileRegistry;
  private readonly registry: AdapterRegistry;
  private readonly config: TraitExtractionServiceDeps['config'];
  private readonly remote?: RemoteExtractionClient;
  private readonly worker: ExtractionWorker;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(deps: TraitExtractionServiceDeps) {
    if (!deps.config.localMode && !deps.remote) {
      throw new ConfigurationError('Remote mode requires a RemoteExtractionClient');
    }
    this.store = deps.store;
    this.profiles = deps.profiles;
    this.registry = deps.registry;
    this.config = deps.config;
    this.remote = deps.remote;
    this.worker = deps.worker ?? new ExtractionWorker(deps.config.maxConcurrentJobs);
    this.now = deps.now ?? (() => new Date());
    this.logger = deps.logger ?? createLogger('extraction/service');
  }

  get localMode(): boolean {
    return this.config.localMode;
  }

  /**
   * Creates a pending job and queues it on the lane of its profile. Unknown
   * profiles (and, in local mode, params the backend rejects) fail before any
   * job exists.
   */
  async extractFromDocuments(
    request: ExtractionRequest,
    { wait = true }: ExtractOptions = {}
  ): Promise<JobResult> {
    const profile = this.profiles.require(request.modelProfile);
    if (this.config.localMode) {
      this.registry.get(request.modelProfile, profile);
    }

    const job = await this.store.createJob({
      project_id: request.projectId ?? null,
      document_ids: [...request.documentIds],
      model_profile: request.modelProfile,
      mode: request.mode ?? 'no_training',
      created_by: request.createdBy ?? null,
    });
    this.logger.info(
      { jobId: job.id, documents: job.total, profile: job.model_profile },
      'Created extraction job'
    );

    const done = this.worker.enqueue(job.model_profile, () => this.runJob(job, profile));
    if (!wait) {
      done.catch((error: unknown) => {
        this.logger.error({ err: error, jobId: job.id }, 'Extraction job crashed');
      });
      return { job_id: job.id, status: 'pending' };
    }
    return done;
  }

  async getJobStatus(jobId: number): Promise<ExtractionJob | null> {
    return this.store.getJob(jobId);
  }

  listModelProfiles(): ModelProfileSummary[] {
    return this.profiles.list();
  }

  /** Only pending jobs can be cancelled; a running job is never preempted. */
  async cancelJob(jobId: number): Promise<ExtractionJob | null> {
    const job = await this.store.getJob(jobId);
    if (!job) return null;
    assertTransition(job, 'cancelled');

    const cancelled = await this.store.updateJob(
      jobId,
      { status: 'cancelled', completed_at: this.now().toISOString() },
      'pending'
    );
    if (!cancelled) {
      const current = await this.store.getJob(jobId);
      throw new JobStateError(jobId, `Job ${jobId} is ${current?.status ?? 'gone'}, not pending`);
    }
    this.logger.info({ jobId }, 'Extraction job cancelled');
    return cancelled;
  }

  async listJobs(filters: JobFilters, page: PageParams): Promise<PageResult<ExtractionJob>> {
    return this.store.listJobs(filters, page);
  }

  async listTriples(filters: TripleFilters, page: PageParams): Promise<PageResult<ExtractedTriple>> {
    return this.store.listTriples(
      { ...filters, min_confidence: filters.min_confidence ?? this.config.minConfidence },
      page
    );
  }

  /** Edits without an explicit status mark the triple `edited`. */
  async reviewTriple(tripleId: number, review: TripleReview): Promise<ExtractedTriple | null> {
    const status: TripleStatus = review.status ?? 'edited';
    return this.store.updateTriple(tripleId, { status, edits: review.edits });
  }

  async createDocument(document: InsertDocument): Promise<Document> {
    return this.store.createDocument(document);
  }

  async listDocuments(filters: DocumentFilters, page: PageParams): Promise<PageResult<Document>> {
    return this.store.listDocuments(filters, page);
  }

  async trainModel(
    profileName: string,
    examples: readonly TrainingExample[],
    options: TrainingOptions = {}
  ): Promise<TrainingResult> {
    if (!this.config.enableTraining) {
      throw new ConfigurationError('Training is disabled');
    }
    const profile = this.profiles.require(profileName);
    const resolved: Required<TrainingOptions> = {
      numEpochs: options.numEpochs ?? this.config.trainingEpochs,
      batchSize: options.batchSize ?? this.config.trainingBatchSize,
      outputDir: options.outputDir ?? path.join(this.config.modelsCacheDir, profileName),
    };

    if (!this.config.localMode) {
      const res = await this.requireRemote().trainModel({
        model_profile: profileName,
        training_data: [...examples],
        output_dir: resolved.outputDir,
        num_epochs: resolved.numEpochs,
        batch_size: resolved.batchSize,
      });
      return {
        status: res.status,
        artifact_path: res.model_path ?? undefined,
        metrics: res.metrics,
        error: res.error ?? undefined,
      };
    }

    const adapter = this.registry.get(profileName, profile);
    return this.worker.enqueue(profileName, () => adapter.train(examples, resolved));
  }

  async unloadModel(profileName: string): Promise<void> {
    if (!this.config.localMode) {
      await this.requireRemote().unloadModel(profileName);
      return;
    }
    await this.worker.enqueue(profileName, () => this.registry.unload(profileName));
  }

  async unloadAll(): Promise<void> {
    if (!this.config.localMode) {
      await this.requireRemote().unloadAll();
      return;
    }
    await Promise.all(this.registry.listLoaded().map((name) => this.unloadModel(name)));
  }

  /** Lets queued jobs finish, then releases every local adapter. */
  async shutdown(): Promise<void> {
    await this.worker.onIdle();
    await this.registry.unloadAll();
  }

  private async runJob(job: ExtractionJob, profile: ModelProfile): Promise<JobResult> {
    const run = new JobRun(this.store, job, this.now);
    if (!(await run.start())) {
      const current = await this.store.getJob(job.id);
      const status = current?.status ?? 'cancelled';
      this.logger.info({ jobId: job.id, status }, 'Job left pending before it ran, skipping');
      return { job_id: job.id, status };
    }

    try {
      return this.config.localMode
        ? await this.runLocal(run, profile)
        : await this.runRemote(run);
    } catch (error) {
      const message =
        error instanceof RemoteServiceError
          ? `${REMOTE_ERROR_PREFIX}${error.message}`
          : errorMessage(error);
      this.logger.error({ err: error, jobId: job.id }, 'Extraction job failed');
      await run.fail(message);
      return { job_id: job.id, status: 'failed', error: message };
    }
  }

  private async runLocal(run: JobRun, profile: ModelProfile): Promise<JobResult> {
    const job = run.job;
    const adapter = this.registry.get(job.model_profile, profile);
    await adapter.load();

    const buffer: InsertTriple[] = [];
    const skipped: SkippedDocument[] = [];
    for (const [index, documentId] of job.document_ids.entries()) {
      const document = await this.store.getDocument(documentId);
      const skip = this.skipReason(document);
      if (!document || skip) {
        this.logger.warn({ jobId: job.id, documentId, reason: skip }, 'Skipping document');
        skipped.push({ document_id: documentId, reason: skip ?? 'not_found' });
      } else {
        this.logger.info(
          { jobId: job.id, documentId, position: index + 1, total: job.total },
          'Extracting from document'
        );
        const [raw = []] = await adapter.extract([document.text_content]);
        for (const triple of raw) {
          buffer.push(this.localTriple(adapter, triple, job, document));
        }
      }
      await run.advance();
    }

    const inserted = await this.store.insertTriples(buffer);
    await run.complete({ total_triples: inserted, skipped_documents: skipped });
    this.logger.info({ jobId: job.id, triples: inserted, skipped: skipped.length }, 'Job completed');
    return { job_id: job.id, status: 'completed', total_triples: inserted };
  }

  private async runRemote(run: JobRun): Promise<JobResult> {
    const job = run.job;
    const remote = this.requireRemote();

    const documents = new Map<number, Document>();
    const payload: ExtractDocument[] = [];
    const skipped: SkippedDocument[] = [];
    for (const documentId of job.document_ids) {
      const document = await this.store.getDocument(documentId);
      const skip = this.skipReason(document);
      // Same skips as local mode: empty documents are recorded here and never sent to the peer.
      if (!document || skip) {
        this.logger.warn({ jobId: job.id, documentId, reason: skip }, 'Skipping document');
        skipped.push({ document_id: documentId, reason: skip ?? 'not_found' });
        continue;
      }
      documents.set(documentId, document);
      payload.push({
        id: documentId,
        text: document.text_content,
        metadata: { project_id: document.project_id, doi: document.doi },
      });
    }

    const response = await remote.extractTriples({
      documents: payload,
      model_profile: job.model_profile,
      job_id: job.id,
    });

    const triples = response.triples.map((triple) =>
      this.remoteTriple(triple, job, documents)
    );
    const inserted = await this.store.insertTriples(triples);
    await run.complete({ total_triples: inserted, skipped_documents: skipped });
    this.logger.info({ jobId: job.id, triples: inserted }, 'Remote job completed');
    return { job_id: job.id, status: 'completed', total_triples: inserted };
  }

  private skipReason(document: Document | null): SkippedDocument['reason'] | undefined {
    if (!document) return 'not_found';
    if (!document.text_content || document.text_content.trim().length === 0) return 'empty_text';
    return undefined;
  }

  private localTriple(
    adapter: Adapter,
    raw: RawTriple,
    job: ExtractionJob,
    document: Document
  ): InsertTriple {
    return {
      ...adapter.normalize(raw),
      job_id: job.id,
      document_id: document.id,
      project_id: document.project_id,
      model_profile: job.model_profile,
      sentence: raw.sentence ?? document.text_content.slice(0, SENTENCE_FALLBACK_LENGTH),
      doi_hash: document.doi_hash,
      status: 'raw',
      contributor_email: job.created_by,
    };
  }

  private remoteTriple(
    triple: WireTriple,
    job: ExtractionJob,
    documents: ReadonlyMap<number, Document>
  ): InsertTriple {
    const document = triple.document_id === null ? undefined : documents.get(triple.document_id);
    if (triple.document_id !== null && !document) {
      throw new RemoteServiceError(
        `triple references document ${triple.document_id}, which was not sent for job ${job.id}`
      );
    }
    return {
      source_entity_name: triple.source_entity_name,
      source_entity_attr: triple.source_entity_attr,
      relation_type: triple.relation_type,
      sink_entity_name: triple.sink_entity_name,
      sink_entity_attr: triple.sink_entity_attr,
      confidence: triple.confidence,
      trait_name: triple.trait_name,
      trait_value: triple.trait_value,
      unit: triple.unit,
      job_id: job.id,
      document_id: triple.document_id,
      project_id: document?.project_id ?? job.project_id,
      model_profile: job.model_profile,
      sentence: triple.sentence,
      doi_hash: document?.doi_hash ?? null,
      status: 'raw',
      contributor_email: job.created_by,
    };
  }

  private requireRemote(): RemoteExtractionClient {
    if (!this.remote) {
      throw new ConfigurationError('Remote mode requires a RemoteExtractionClient');
    }
    return this.remote;
  }
}
