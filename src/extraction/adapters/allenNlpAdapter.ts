import { z } from 'zod';
import { bearerHeaders, requestJson } from '../../utils/http';
import { createLogger, type Logger } from '../../utils/logger';
import type { RawTriple } from '../types';
import { DEFAULT_RELATION, relationFromVerb, type CanonicalEntityType } from '../vocabulary';
import { BaseAdapter, parseParams, type AdapterConfig } from './base';

export const AllenNlpParamsSchema = z.object({
  model_name: z.string().default('structured-prediction-srl-bert'),
});

export type AllenNlpParams = z.infer<typeof AllenNlpParamsSchema>;

const VerbFrameSchema = z.object({
  verb: z.string(),
  description: z.string().default(''),
  tags: z.array(z.string()),
});

const PredictionSchema = z.object({
  verbs: z.array(VerbFrameSchema).default([]),
  words: z.array(z.string()).optional(),
});

export type VerbFrame = z.infer<typeof VerbFrameSchema>;
export type SrlPrediction = z.infer<typeof PredictionSchema>;

export interface AllenNlpRuntime {
  load(model: string): Promise<void>;
  predict(model: string, sentence: string): Promise<SrlPrediction>;
}

const LoadResponseSchema = z.object({ status: z.string() }).passthrough();

/** Semantic role labelling through an AllenNLP predictor server. */
export class HttpAllenNlpRuntime implements AllenNlpRuntime {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
    private readonly apiKey?: string
  ) {}

  async load(model: string): Promise<void> {
    await requestJson(`${this.baseUrl}/models/load`, LoadResponseSchema, {
      method: 'POST',
      body: {
        model,
        archive: `https://storage.googleapis.com/allennlp-public-models/${model}.tar.gz`,
      },
      headers: bearerHeaders(this.apiKey),
      timeoutMs: this.timeoutMs,
    });
  }

  async predict(model: string, sentence: string): Promise<SrlPrediction> {
    return requestJson(`${this.baseUrl}/predict`, PredictionSchema, {
      method: 'POST',
      body: { model, sentence },
      headers: bearerHeaders(this.apiKey),
      timeoutMs: this.timeoutMs,
    });
  }
}

const ALLENNLP_ENTITY_TYPES: Readonly<Record<string, CanonicalEntityType>> = {
  Factor: 'Factor',
};

const SRL_CONFIDENCE = 0.8;

export class AllenNlpAdapter extends BaseAdapter<AllenNlpParams> {
  readonly backend = 'allennlp' as const;
  protected readonly entityTypes = ALLENNLP_ENTITY_TYPES;

  constructor(
    config: AdapterConfig,
    private readonly runtime: AllenNlpRuntime,
    logger: Logger = createLogger('adapters/allennlp')
  ) {
    super(config, parseParams(AllenNlpParamsSchema, config, 'allennlp'), logger);
  }

  protected async loadModel(): Promise<void> {
    this.logger.info({ model: this.params.model_name }, 'Loading AllenNLP predictor');
    await this.runtime.load(this.params.model_name);
  }

  protected async extractTriples(texts: readonly string[]): Promise<RawTriple[][]> {
    const results: RawTriple[][] = [];
    for (const text of texts) {
      const prediction = await this.runtime.predict(this.params.model_name, text);
      const words = prediction.words ?? text.split(/\s+/).filter(Boolean);
      const triples: RawTriple[] = [];
      for (const frame of prediction.verbs) {
        const triple = parseFrame(frame, words, text);
        if (triple) triples.push(triple);
      }
      results.push(triples);
    }
    return results;
  }
}

/**
 * Reads the ARG0 (agent) and ARG1 (patient) spans of a BIO-tagged verb frame.
 * Frames missing either argument yield nothing.
 */
export function parseFrame(
  frame: VerbFrame,
  words: readonly string[],
  sentence: string
): RawTriple | null {
  const args: Record<'ARG0' | 'ARG1', string[]> = { ARG0: [], ARG1: [] };
  let current: 'ARG0' | 'ARG1' | null = null;

  const limit = Math.min(frame.tags.length, words.length);
  for (let i = 0; i < limit; i++) {
    const tag = frame.tags[i]!;
    const word = words[i]!;
    if (tag === 'B-ARG0' || tag === 'B-ARG1') {
      current = tag === 'B-ARG0' ? 'ARG0' : 'ARG1';
      args[current].push(word);
    } else if (current && tag === `I-${current}`) {
      args[current].push(word);
    } else {
      current = null;
    }
  }

  if (args.ARG0.length === 0 || args.ARG1.length === 0 || !frame.verb) return null;

  return {
    subject: args.ARG0.join(' '),
    subject_type: 'Factor',
    predicate: relationFromVerb(frame.verb) ?? DEFAULT_RELATION,
    object: args.ARG1.join(' '),
    object_type: 'Factor',
    confidence: SRL_CONFIDENCE,
    sentence,
  };
}
