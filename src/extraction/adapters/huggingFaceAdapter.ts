import { z } from 'zod';
import { bearerHeaders, requestJson } from '../../utils/http';
import { createLogger, type Logger } from '../../utils/logger';
import type { RawTriple, TrainingExample, TrainingOptions, TrainingResult } from '../types';
import { DEFAULT_RELATION, type CanonicalEntityType, type CanonicalRelation } from '../vocabulary';
import { BaseAdapter, parseParams, type AdapterConfig } from './base';

export const HuggingFaceParamsSchema = z.object({
  model_name: z.string().default('dbmdz/bert-large-cased-finetuned-conll03-english'),
  task: z.enum(['ner', 'token-classification']).default('ner'),
  batch_size: z.number().int().positive().default(16),
});

export type HuggingFaceParams = z.infer<typeof HuggingFaceParamsSchema>;

const EntitySchema = z.object({
  entity_group: z.string(),
  score: z.number(),
  word: z.string(),
  start: z.number().int(),
  end: z.number().int(),
});

export type HuggingFaceEntity = z.infer<typeof EntitySchema>;

export interface HuggingFaceTrainRequest {
  examples: readonly TrainingExample[];
  numEpochs: number;
  batchSize: number;
  outputDir: string;
}

export interface HuggingFaceTrainResponse {
  modelPath: string;
  trainLoss: number;
  metrics: Record<string, number>;
}

export interface HuggingFaceRuntime {
  load(model: string): Promise<void>;
  classify(model: string, texts: readonly string[]): Promise<HuggingFaceEntity[][]>;
  train(model: string, request: HuggingFaceTrainRequest): Promise<HuggingFaceTrainResponse>;
}

const StatusSchema = z.object({ loaded: z.boolean().optional(), state: z.string().optional() });
const ClassifyResponseSchema = z.array(z.array(EntitySchema));
const TrainResponseSchema = z.object({
  model_path: z.string(),
  train_loss: z.number(),
  metrics: z.record(z.string(), z.number()).default({}),
});

/**
 * Token classification through the Hugging Face Inference API (or a
 * self-hosted endpoint speaking the same protocol). Fine-tuning needs a
 * separate training service.
 */
export class HttpHuggingFaceRuntime implements HuggingFaceRuntime {
  constructor(
    private readonly inferenceUrl: string,
    private readonly timeoutMs: number,
    private readonly apiToken?: string,
    private readonly trainingUrl?: string
  ) {}

  async load(model: string): Promise<void> {
    await requestJson(`${this.inferenceUrl}/status/${model}`, StatusSchema, {
      headers: bearerHeaders(this.apiToken),
      timeoutMs: this.timeoutMs,
    });
  }

  async classify(model: string, texts: readonly string[]): Promise<HuggingFaceEntity[][]> {
    return requestJson(`${this.inferenceUrl}/models/${model}`, ClassifyResponseSchema, {
      method: 'POST',
      body: {
        inputs: texts,
        parameters: { aggregation_strategy: 'simple' },
        options: { wait_for_model: true },
      },
      headers: bearerHeaders(this.apiToken),
      timeoutMs: this.timeoutMs,
    });
  }

  async train(model: string, request: HuggingFaceTrainRequest): Promise<HuggingFaceTrainResponse> {
    if (!this.trainingUrl) {
      throw new Error('HF_TRAINING_URL is not configured');
    }
    const res = await requestJson(`${this.trainingUrl}/train`, TrainResponseSchema, {
      method: 'POST',
      body: {
        model,
        examples: request.examples,
        num_train_epochs: request.numEpochs,
        per_device_train_batch_size: request.batchSize,
        output_dir: request.outputDir,
      },
      headers: bearerHeaders(this.apiToken),
      timeoutMs: this.timeoutMs,
    });
    return { modelPath: res.model_path, trainLoss: res.train_loss, metrics: res.metrics };
  }
}

const HF_ENTITY_TYPES: Readonly<Record<string, CanonicalEntityType>> = {
  PER: 'Factor',
  ORG: 'Factor',
  LOC: 'Factor',
  MISC: 'Factor',
};

const TYPE_PAIR_RELATIONS: Readonly<Record<string, CanonicalRelation>> = {
  'PER|ORG': 'associated_with',
  'ORG|LOC': 'localizes_to',
  'MISC|MISC': 'is_related_to',
};

const CONTEXT_WINDOW = 50;
const DEFAULT_EPOCHS = 3;
const DEFAULT_BATCH_SIZE = 4;
const DEFAULT_OUTPUT_DIR = './tmp/fine_tuned_model';

export class HuggingFaceAdapter extends BaseAdapter<HuggingFaceParams> {
  readonly backend = 'huggingface' as const;
  protected readonly entityTypes = HF_ENTITY_TYPES;

  constructor(
    config: AdapterConfig,
    private readonly runtime: HuggingFaceRuntime,
    logger: Logger = createLogger('adapters/huggingface')
  ) {
    super(config, parseParams(HuggingFaceParamsSchema, config, 'huggingface'), logger);
  }

  protected async loadModel(): Promise<void> {
    this.logger.info(
      { model: this.params.model_name, task: this.params.task },
      'Loading Hugging Face model'
    );
    await this.runtime.load(this.params.model_name);
  }

  protected async extractTriples(texts: readonly string[]): Promise<RawTriple[][]> {
    const results: RawTriple[][] = [];
    for (let offset = 0; offset < texts.length; offset += this.params.batch_size) {
      const batch = texts.slice(offset, offset + this.params.batch_size);
      const entities = await this.runtime.classify(this.params.model_name, batch);
      if (entities.length !== batch.length) {
        throw new Error(`Expected ${batch.length} entity lists, got ${entities.length}`);
      }
      batch.forEach((text, i) => results.push(pairEntities(text, entities[i]!)));
    }
    return results;
  }

  protected async trainModel(
    examples: readonly TrainingExample[],
    options: TrainingOptions
  ): Promise<TrainingResult> {
    const res = await this.runtime.train(this.params.model_name, {
      examples,
      numEpochs: options.numEpochs ?? DEFAULT_EPOCHS,
      batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
      outputDir: options.outputDir ?? DEFAULT_OUTPUT_DIR,
    });
    return {
      status: 'completed',
      artifact_path: res.modelPath,
      metrics: { ...res.metrics, train_loss: res.trainLoss },
    };
  }
}

function pairEntities(text: string, entities: readonly HuggingFaceEntity[]): RawTriple[] {
  const triples: RawTriple[] = [];
  for (let i = 0; i < entities.length - 1; i++) {
    const source = entities[i]!;
    const target = entities[i + 1]!;
    triples.push({
      subject: source.word,
      subject_type: source.entity_group,
      predicate:
        TYPE_PAIR_RELATIONS[`${source.entity_group}|${target.entity_group}`] ?? DEFAULT_RELATION,
      object: target.word,
      object_type: target.entity_group,
      confidence: (source.score + target.score) / 2,
      sentence: text.slice(
        Math.max(0, source.start - CONTEXT_WINDOW),
        Math.min(text.length, target.end + CONTEXT_WINDOW)
      ),
    });
  }
  return triples;
}
