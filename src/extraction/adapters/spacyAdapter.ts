import { z } from 'zod';
import { bearerHeaders, requestJson } from '../../utils/http';
import { createLogger, type Logger } from '../../utils/logger';
import type { RawTriple, TrainingExample, TrainingOptions, TrainingResult } from '../types';
import {
  DEFAULT_RELATION,
  relationFromVerb,
  type CanonicalEntityType,
  type CanonicalRelation,
} from '../vocabulary';
import { BaseAdapter, parseParams, type AdapterConfig } from './base';

export const SpacyParamsSchema = z.object({
  model_name: z.string().default('en_core_web_sm'),
  custom_rules: z.boolean().default(false),
  confidence_threshold: z.number().min(0).max(1).default(0.7),
});

export type SpacyParams = z.infer<typeof SpacyParamsSchema>;

const SpacyEntitySchema = z.object({
  text: z.string(),
  label: z.string(),
  start: z.number().int(),
  end: z.number().int(),
});

const SpacyTokenSchema = z.object({
  text: z.string(),
  pos: z.string(),
  lemma: z.string(),
});

const SpacySentenceSchema = z.object({
  text: z.string(),
  ents: z.array(SpacyEntitySchema),
  tokens: z.array(SpacyTokenSchema),
});

export type SpacySentence = z.infer<typeof SpacySentenceSchema>;

/** An EntityRuler pattern, as the spaCy server adds it before the `ner` pipe. */
export interface EntityPattern {
  label: string;
  pattern: Array<Record<string, unknown>>;
}

export const BIOLOGICAL_PATTERNS: readonly EntityPattern[] = [
  { label: 'GENE', pattern: [{ TEXT: { REGEX: '^[A-Z][A-Z0-9]+[a-z]?$' } }] },
  { label: 'PROTEIN', pattern: [{ TEXT: { REGEX: '^[A-Z][A-Za-z0-9\\-]+$' } }] },
  {
    label: 'TRAIT',
    pattern: [{ LOWER: { IN: ['yield', 'height', 'weight', 'resistance', 'tolerance'] } }],
  },
  {
    label: 'METABOLITE',
    pattern: [{ LOWER: { IN: ['glucose', 'sucrose', 'starch', 'cellulose', 'lignin'] } }],
  },
];

export interface SpacyTrainRequest {
  examples: Array<{ text: string; entities: Array<[number, number, string]> }>;
  iterations: number;
  batchSize: number;
  outputDir?: string;
}

export interface SpacyRuntime {
  load(model: string, patterns: readonly EntityPattern[]): Promise<void>;
  parse(model: string, text: string): Promise<SpacySentence[]>;
  train(model: string, request: SpacyTrainRequest): Promise<{ loss: number; modelPath?: string }>;
  unload(model: string): Promise<void>;
}

const ParseResponseSchema = z.object({ sents: z.array(SpacySentenceSchema) });
const StatusResponseSchema = z.object({ status: z.string() }).passthrough();
const TrainResponseSchema = z.object({
  losses: z.record(z.string(), z.number()),
  model_path: z.string().optional(),
});

/** Talks to a spaCy model server that keeps pipelines resident between calls. */
export class HttpSpacyRuntime implements SpacyRuntime {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
    private readonly apiKey?: string
  ) {}

  async load(model: string, patterns: readonly EntityPattern[]): Promise<void> {
    await requestJson(`${this.baseUrl}/models/load`, StatusResponseSchema, {
      method: 'POST',
      body: { model, patterns },
      headers: bearerHeaders(this.apiKey),
      timeoutMs: this.timeoutMs,
    });
  }

  async parse(model: string, text: string): Promise<SpacySentence[]> {
    const res = await requestJson(`${this.baseUrl}/parse`, ParseResponseSchema, {
      method: 'POST',
      body: { model, text },
      headers: bearerHeaders(this.apiKey),
      timeoutMs: this.timeoutMs,
    });
    return res.sents;
  }

  async train(model: string, request: SpacyTrainRequest): Promise<{ loss: number; modelPath?: string }> {
    const res = await requestJson(`${this.baseUrl}/train`, TrainResponseSchema, {
      method: 'POST',
      body: {
        model,
        examples: request.examples,
        n_iter: request.iterations,
        batch_size: request.batchSize,
        output_dir: request.outputDir,
      },
      headers: bearerHeaders(this.apiKey),
      timeoutMs: this.timeoutMs,
    });
    return { loss: res.losses.ner ?? 0, modelPath: res.model_path };
  }

  async unload(model: string): Promise<void> {
    await requestJson(`${this.baseUrl}/models/unload`, StatusResponseSchema, {
      method: 'POST',
      body: { model },
      headers: bearerHeaders(this.apiKey),
      timeoutMs: this.timeoutMs,
    });
  }
}

const SPACY_ENTITY_TYPES: Readonly<Record<string, CanonicalEntityType>> = {
  GENE: 'Gene',
  PROTEIN: 'Protein',
  TRAIT: 'Trait',
  METABOLITE: 'Metabolite',
  ORG: 'Factor',
  PERSON: 'Factor',
  GPE: 'Factor',
  NORP: 'Factor',
  FAC: 'Factor',
};

const SpacyTrainingExampleSchema = z.object({
  text: z.string(),
  entities: z.array(z.tuple([z.number().int(), z.number().int(), z.string()])).default([]),
});

const DEFAULT_TRAIN_ITERATIONS = 10;
const DEFAULT_TRAIN_BATCH_SIZE = 8;

export class SpacyAdapter extends BaseAdapter<SpacyParams> {
  readonly backend = 'spacy' as const;
  protected readonly entityTypes = SPACY_ENTITY_TYPES;

  constructor(
    config: AdapterConfig,
    private readonly runtime: SpacyRuntime,
    logger: Logger = createLogger('adapters/spacy')
  ) {
    super(config, parseParams(SpacyParamsSchema, config, 'spacy'), logger);
  }

  protected async loadModel(): Promise<void> {
    this.logger.info({ model: this.params.model_name }, 'Loading spaCy model');
    await this.runtime.load(
      this.params.model_name,
      this.params.custom_rules ? BIOLOGICAL_PATTERNS : []
    );
  }

  protected async extractTriples(texts: readonly string[]): Promise<RawTriple[][]> {
    const results: RawTriple[][] = [];
    for (const text of texts) {
      const sentences = await this.runtime.parse(this.params.model_name, text);
      results.push(sentences.flatMap((sent) => this.sentenceTriples(sent)));
    }
    return results;
  }

  // Pairs each entity with the next one in the same sentence.
  private sentenceTriples(sent: SpacySentence): RawTriple[] {
    const triples: RawTriple[] = [];
    const relation = inferRelation(sent);
    for (let i = 0; i < sent.ents.length - 1; i++) {
      const source = sent.ents[i]!;
      const target = sent.ents[i + 1]!;
      triples.push({
        subject: source.text,
        subject_type: source.label,
        predicate: relation,
        object: target.text,
        object_type: target.label,
        confidence: this.params.confidence_threshold,
        sentence: sent.text,
      });
    }
    return triples;
  }

  protected async trainModel(
    examples: readonly TrainingExample[],
    options: TrainingOptions
  ): Promise<TrainingResult> {
    const parsed = z.array(SpacyTrainingExampleSchema).safeParse(examples);
    if (!parsed.success) {
      return {
        status: 'failed',
        metrics: {},
        error: `Invalid spaCy training data: ${parsed.error.message}`,
      };
    }

    const iterations = options.numEpochs ?? DEFAULT_TRAIN_ITERATIONS;
    const { loss, modelPath } = await this.runtime.train(this.params.model_name, {
      examples: parsed.data,
      iterations,
      batchSize: options.batchSize ?? DEFAULT_TRAIN_BATCH_SIZE,
      outputDir: options.outputDir,
    });

    return {
      status: 'completed',
      artifact_path: modelPath,
      metrics: { iterations, final_loss: loss },
    };
  }

  protected async releaseModel(): Promise<void> {
    await this.runtime.unload(this.params.model_name);
  }
}

export function inferRelation(sent: SpacySentence): CanonicalRelation {
  for (const token of sent.tokens) {
    if (token.pos !== 'VERB') continue;
    const relation = relationFromVerb(token.lemma);
    if (relation) return relation;
  }
  return DEFAULT_RELATION;
}
