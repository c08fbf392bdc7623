import { ModelProfileRegistry } from '../../src/config/extractionConfig';
import type { AllenNlpRuntime, SrlPrediction } from '../../src/extraction/adapters/allenNlpAdapter';
import type { BackendRuntimes } from '../../src/extraction/adapters/factory';
import type {
  HuggingFaceEntity,
  HuggingFaceRuntime,
  HuggingFaceTrainRequest,
  HuggingFaceTrainResponse,
} from '../../src/extraction/adapters/huggingFaceAdapter';
import type {
  LasUIEFinetuneOptions,
  LasUIEInput,
  LasUIEOutput,
  LasUIERunOptions,
  LasUIERuntime,
} from '../../src/extraction/adapters/lasuieAdapter';
import type {
  EntityPattern,
  SpacyRuntime,
  SpacySentence,
  SpacyTrainRequest,
} from '../../src/extraction/adapters/spacyAdapter';
import type { TrainingExample } from '../../src/extraction/types';

/** A promise the test resolves by hand, to hold a backend call open. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * One sentence per text: "<first word> increases yield", tagged GENE and
 * TRAIT, so every non-empty text yields exactly one triple.
 */
export function geneSentence(text: string): SpacySentence {
  const gene = text.split(/\s+/)[0] ?? text;
  return {
    text,
    ents: [
      { text: gene, label: 'GENE', start: 0, end: gene.length },
      { text: 'yield', label: 'TRAIT', start: 0, end: 5 },
    ],
    tokens: [
      { text: gene, pos: 'PROPN', lemma: gene },
      { text: 'increases', pos: 'VERB', lemma: 'increase' },
      { text: 'yield', pos: 'NOUN', lemma: 'yield' },
    ],
  };
}

export class StubSpacyRuntime implements SpacyRuntime {
  loads: Array<{ model: string; patterns: readonly EntityPattern[] }> = [];
  unloads: string[] = [];
  parsed: string[] = [];
  trainRequests: SpacyTrainRequest[] = [];
  loadError?: Error;
  /** Texts that make `parse` throw. */
  failOn = new Set<string>();
  /** While set, `parse` waits on it before answering. */
  gate?: Promise<void>;
  inFlight = 0;
  maxInFlight = 0;
  sentences: (text: string) => SpacySentence[] = (text) => [geneSentence(text)];

  async load(model: string, patterns: readonly EntityPattern[]): Promise<void> {
    if (this.loadError) throw this.loadError;
    this.loads.push({ model, patterns });
  }

  async parse(_model: string, text: string): Promise<SpacySentence[]> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.gate) await this.gate;
      this.parsed.push(text);
      if (this.failOn.has(text)) throw new Error(`parser crashed on "${text}"`);
      return this.sentences(text);
    } finally {
      this.inFlight--;
    }
  }

  async train(_model: string, request: SpacyTrainRequest): Promise<{ loss: number; modelPath?: string }> {
    this.trainRequests.push(request);
    return { loss: 0.25, modelPath: request.outputDir };
  }

  async unload(model: string): Promise<void> {
    this.unloads.push(model);
  }
}

export class StubHuggingFaceRuntime implements HuggingFaceRuntime {
  loads: string[] = [];
  batches: string[][] = [];
  trainRequests: HuggingFaceTrainRequest[] = [];
  entities: (text: string) => HuggingFaceEntity[] = () => [];

  async load(model: string): Promise<void> {
    this.loads.push(model);
  }

  async classify(_model: string, texts: readonly string[]): Promise<HuggingFaceEntity[][]> {
    this.batches.push([...texts]);
    return texts.map((text) => this.entities(text));
  }

  async train(_model: string, request: HuggingFaceTrainRequest): Promise<HuggingFaceTrainResponse> {
    this.trainRequests.push(request);
    return { modelPath: request.outputDir, trainLoss: 0.5, metrics: { eval_f1: 0.9 } };
  }
}

export class StubLasUIERuntime implements LasUIERuntime {
  checks = 0;
  checkError?: Error;
  inferCalls: Array<{ inputs: LasUIEInput[]; opts: LasUIERunOptions }> = [];
  finetuneCalls: Array<{ examples: readonly TrainingExample[]; opts: LasUIEFinetuneOptions }> = [];
  finetuneError?: Error;
  outputs: (input: LasUIEInput) => LasUIEOutput = (input) => ({ text: input.text, relations: [] });

  async check(): Promise<void> {
    this.checks++;
    if (this.checkError) throw this.checkError;
  }

  async infer(inputs: readonly LasUIEInput[], opts: LasUIERunOptions): Promise<LasUIEOutput[]> {
    this.inferCalls.push({ inputs: [...inputs], opts });
    return inputs.map((input) => this.outputs(input));
  }

  async finetune(
    examples: readonly TrainingExample[],
    opts: LasUIEFinetuneOptions
  ): Promise<{ stdout: string }> {
    this.finetuneCalls.push({ examples, opts });
    if (this.finetuneError) throw this.finetuneError;
    return { stdout: 'done' };
  }
}

export class StubAllenNlpRuntime implements AllenNlpRuntime {
  loads: string[] = [];
  predictions: (sentence: string) => SrlPrediction = () => ({ verbs: [] });

  async load(model: string): Promise<void> {
    this.loads.push(model);
  }

  async predict(_model: string, sentence: string): Promise<SrlPrediction> {
    return this.predictions(sentence);
  }
}

export interface StubRuntimes extends BackendRuntimes {
  spacy: StubSpacyRuntime;
  huggingface: StubHuggingFaceRuntime;
  lasuie: StubLasUIERuntime;
  allennlp: StubAllenNlpRuntime;
}

export function createStubRuntimes(): StubRuntimes {
  return {
    spacy: new StubSpacyRuntime(),
    huggingface: new StubHuggingFaceRuntime(),
    lasuie: new StubLasUIERuntime(),
    allennlp: new StubAllenNlpRuntime(),
  };
}

export function createTestProfiles(): ModelProfileRegistry {
  return new ModelProfileRegistry({
    spacy_bio: {
      name: 'spaCy biological',
      description: 'spaCy with biological entity rules',
      backend: 'spacy',
      params: { model_name: 'en_core_web_sm', custom_rules: true, confidence_threshold: 0.9 },
    },
    spacy_plain: {
      name: 'spaCy plain',
      description: 'spaCy without custom rules',
      backend: 'spacy',
      params: {},
    },
    huggingface_ner: {
      name: 'Hugging Face NER',
      description: 'Token classification',
      backend: 'huggingface',
      params: { batch_size: 2 },
    },
    lasuie: {
      name: 'LasUIE',
      description: 'Generative universal IE',
      backend: 'lasuie',
      params: { device: 'cpu', batch_size: 2 },
    },
    allennlp_srl: {
      name: 'AllenNLP SRL',
      description: 'Semantic role labelling',
      backend: 'allennlp',
      params: {},
    },
    broken_spacy: {
      name: 'Broken spaCy',
      description: 'Rejected params',
      backend: 'spacy',
      params: { confidence_threshold: 'high' },
    },
  });
}
