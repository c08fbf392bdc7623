import { describe, it, expect, beforeEach } from '@jest/globals';
import { AllenNlpAdapter, parseFrame } from '../src/extraction/adapters/allenNlpAdapter';
import { HuggingFaceAdapter } from '../src/extraction/adapters/huggingFaceAdapter';
import { LasUIEAdapter, parseOutput } from '../src/extraction/adapters/lasuieAdapter';
import {
  BIOLOGICAL_PATTERNS,
  inferRelation,
  SpacyAdapter,
} from '../src/extraction/adapters/spacyAdapter';
import {
  ConfigurationError,
  ExtractionRuntimeError,
  ModelLoadError,
} from '../src/extraction/errors';
import {
  StubAllenNlpRuntime,
  StubHuggingFaceRuntime,
  StubLasUIERuntime,
  StubSpacyRuntime,
} from './utils/stubRuntimes';

const NORMALIZED_KEYS = [
  'confidence',
  'relation_type',
  'sink_entity_attr',
  'sink_entity_name',
  'source_entity_attr',
  'source_entity_name',
  'trait_name',
  'trait_value',
  'unit',
];

describe('SpacyAdapter', () => {
  let runtime: StubSpacyRuntime;
  let adapter: SpacyAdapter;

  beforeEach(() => {
    runtime = new StubSpacyRuntime();
    adapter = new SpacyAdapter(
      { profileName: 'spacy_bio', params: { custom_rules: true, confidence_threshold: 0.9 } },
      runtime
    );
  });

  it('rejects params of the wrong type', () => {
    expect(
      () => new SpacyAdapter({ profileName: 'bad', params: { confidence_threshold: 'high' } }, runtime)
    ).toThrow(ConfigurationError);
  });

  it('loads once with the biological patterns when custom rules are on', async () => {
    await Promise.all([adapter.load(), adapter.load()]);
    await adapter.load();

    expect(runtime.loads).toHaveLength(1);
    expect(runtime.loads[0]?.model).toBe('en_core_web_sm');
    expect(runtime.loads[0]?.patterns).toBe(BIOLOGICAL_PATTERNS);
    expect(adapter.isLoaded).toBe(true);
  });

  it('loads without patterns when custom rules are off', async () => {
    const plain = new SpacyAdapter({ profileName: 'spacy_plain', params: {} }, runtime);
    await plain.load();
    expect(runtime.loads[0]?.patterns).toEqual([]);
  });

  it('wraps load failures as ModelLoadError and stays unloaded', async () => {
    runtime.loadError = new Error('model not installed');

    await expect(adapter.load()).rejects.toThrow(ModelLoadError);
    await expect(adapter.load()).rejects.toThrow(
      'Failed to load model for profile spacy_bio: model not installed'
    );
    expect(adapter.isLoaded).toBe(false);
  });

  it('loads implicitly and pairs consecutive entities within a sentence', async () => {
    const [triples] = await adapter.extract(['ABC1 increases yield']);

    expect(runtime.loads).toHaveLength(1);
    expect(triples).toEqual([
      {
        subject: 'ABC1',
        subject_type: 'GENE',
        predicate: 'increases',
        object: 'yield',
        object_type: 'TRAIT',
        confidence: 0.9,
        sentence: 'ABC1 increases yield',
      },
    ]);
  });

  it('returns one result list per input text', async () => {
    runtime.sentences = (text) => (text === 'nothing here' ? [] : [{ text, ents: [], tokens: [] }]);
    const results = await adapter.extract(['nothing here', 'still nothing']);
    expect(results).toEqual([[], []]);
  });

  it('wraps backend failures as ExtractionRuntimeError', async () => {
    runtime.failOn.add('boom');
    await expect(adapter.extract(['boom'])).rejects.toThrow(ExtractionRuntimeError);
    await expect(adapter.extract(['boom'])).rejects.toThrow(
      'spacy extraction failed: parser crashed on "boom"'
    );
  });

  it('normalizes into exactly the nine canonical fields', () => {
    const normalized = adapter.normalize({
      subject: 'ABC1',
      subject_type: 'GENE',
      predicate: 'increases',
      object: 'yield',
      object_type: 'TRAIT',
      confidence: 0.9,
      sentence: 'ABC1 increases yield',
    });

    expect(Object.keys(normalized).sort()).toEqual(NORMALIZED_KEYS);
    expect(normalized).toEqual({
      source_entity_name: 'ABC1',
      source_entity_attr: 'Gene',
      relation_type: 'increases',
      sink_entity_name: 'yield',
      sink_entity_attr: 'Trait',
      confidence: 0.9,
      trait_name: null,
      trait_value: null,
      unit: null,
    });
  });

  it('maps unknown labels to Factor and unknown relations to is_related_to', () => {
    const normalized = adapter.normalize({
      subject: 'ethylene',
      subject_type: 'CHEMICAL',
      predicate: 'binds',
      object: 'ETR1',
      object_type: 'WORK_OF_ART',
      confidence: 1.4,
      trait_name: 'height',
      trait_value: '12',
      unit: 'cm',
    });

    expect(normalized.source_entity_attr).toBe('Factor');
    expect(normalized.sink_entity_attr).toBe('Factor');
    expect(normalized.relation_type).toBe('is_related_to');
    expect(normalized.confidence).toBe(1);
    expect(normalized.trait_name).toBe('height');
    expect(normalized.trait_value).toBe('12');
    expect(normalized.unit).toBe('cm');
  });

  it('infers the relation from the first mapped verb lemma', () => {
    expect(
      inferRelation({
        text: 'X reduces Y',
        ents: [],
        tokens: [
          { text: 'is', pos: 'AUX', lemma: 'be' },
          { text: 'seems', pos: 'VERB', lemma: 'seem' },
          { text: 'reduces', pos: 'VERB', lemma: 'reduce' },
        ],
      })
    ).toBe('decreases');
    expect(inferRelation({ text: 'X and Y', ents: [], tokens: [] })).toBe('is_related_to');
  });

  it('trains with the requested iterations and reports the final loss', async () => {
    const result = await adapter.train([{ text: 'ABC1 gene', entities: [[0, 4, 'GENE']] }], {
      numEpochs: 5,
      outputDir: '/tmp/spacy-out',
    });

    expect(runtime.trainRequests[0]).toEqual({
      examples: [{ text: 'ABC1 gene', entities: [[0, 4, 'GENE']] }],
      iterations: 5,
      batchSize: 8,
      outputDir: '/tmp/spacy-out',
    });
    expect(result).toEqual({
      status: 'completed',
      artifact_path: '/tmp/spacy-out',
      metrics: { iterations: 5, final_loss: 0.25 },
    });
  });

  it('reports malformed training data as a failed result', async () => {
    const result = await adapter.train([{ sentence: 'no text field' }]);
    expect(result.status).toBe('failed');
    expect(result.error).toMatch(/^Invalid spaCy training data/);
    expect(runtime.trainRequests).toHaveLength(0);
  });

  it('unloads only when loaded', async () => {
    await adapter.unload();
    expect(runtime.unloads).toEqual([]);

    await adapter.load();
    await adapter.unload();
    expect(runtime.unloads).toEqual(['en_core_web_sm']);
    expect(adapter.isLoaded).toBe(false);
  });

  it('describes itself with its resolved params', () => {
    expect(adapter.getModelInfo()).toEqual({
      backend: 'spacy',
      profile: 'spacy_bio',
      is_loaded: false,
      params: { model_name: 'en_core_web_sm', custom_rules: true, confidence_threshold: 0.9 },
    });
  });
});

describe('HuggingFaceAdapter', () => {
  let runtime: StubHuggingFaceRuntime;
  let adapter: HuggingFaceAdapter;

  beforeEach(() => {
    runtime = new StubHuggingFaceRuntime();
    runtime.entities = (text) =>
      text.startsWith('Alice')
        ? [
            { entity_group: 'PER', score: 0.8, word: 'Alice', start: 0, end: 5 },
            { entity_group: 'ORG', score: 0.6, word: 'Acme', start: 15, end: 19 },
          ]
        : [];
    adapter = new HuggingFaceAdapter({ profileName: 'huggingface_ner', params: { batch_size: 2 } }, runtime);
  });

  it('classifies texts in batches of batch_size', async () => {
    const results = await adapter.extract(['Alice works at Acme labs', 'plain', 'text']);

    expect(runtime.batches).toEqual([['Alice works at Acme labs', 'plain'], ['text']]);
    expect(results).toHaveLength(3);
    expect(results[1]).toEqual([]);
    expect(results[2]).toEqual([]);
  });

  it('pairs adjacent entities with a type-pair relation and averaged score', async () => {
    const [triples = []] = await adapter.extract(['Alice works at Acme labs']);

    expect(triples).toHaveLength(1);
    const [triple] = triples;
    expect(triple?.subject).toBe('Alice');
    expect(triple?.object).toBe('Acme');
    expect(triple?.predicate).toBe('associated_with');
    expect(triple?.confidence).toBeCloseTo(0.7);
    expect(triple?.sentence).toBe('Alice works at Acme labs');
  });

  it('maps CoNLL labels to Factor', async () => {
    const [triples = []] = await adapter.extract(['Alice works at Acme labs']);
    const normalized = adapter.normalize(triples[0]!);
    expect(normalized.source_entity_attr).toBe('Factor');
    expect(normalized.sink_entity_attr).toBe('Factor');
    expect(normalized.relation_type).toBe('associated_with');
  });

  it('fine-tunes with default options', async () => {
    const result = await adapter.train([{ tokens: ['a'], ner_tags: [0] }]);

    expect(runtime.trainRequests[0]).toEqual({
      examples: [{ tokens: ['a'], ner_tags: [0] }],
      numEpochs: 3,
      batchSize: 4,
      outputDir: './tmp/fine_tuned_model',
    });
    expect(result).toEqual({
      status: 'completed',
      artifact_path: './tmp/fine_tuned_model',
      metrics: { eval_f1: 0.9, train_loss: 0.5 },
    });
  });
});

describe('LasUIEAdapter', () => {
  let runtime: StubLasUIERuntime;
  let adapter: LasUIEAdapter;

  beforeEach(() => {
    runtime = new StubLasUIERuntime();
    runtime.outputs = (input) => ({
      text: input.text,
      relations: [
        {
          head: { text: 'DRO1', type: 'Gene' },
          tail: { text: 'drought tolerance', type: 'Phenotype' },
          type: 'regulates',
          score: 0.95,
        },
      ],
    });
    adapter = new LasUIEAdapter({ profileName: 'lasuie', params: { device: 'cpu', batch_size: 2 } }, runtime);
  });

  it('rejects an unknown device', () => {
    expect(
      () => new LasUIEAdapter({ profileName: 'lasuie', params: { device: 'tpu' } }, runtime)
    ).toThrow(ConfigurationError);
  });

  it('fails to load when the checkout is missing', async () => {
    runtime.checkError = new Error('LasUIE repository not found at ./LasUIE');
    await expect(adapter.extract(['x'])).rejects.toThrow(ModelLoadError);
  });

  it('runs inference in batches with the profile settings', async () => {
    const results = await adapter.extract(['a', 'b', 'c']);

    expect(runtime.checks).toBe(1);
    expect(runtime.inferCalls.map((call) => call.inputs.map((input) => input.id))).toEqual([
      ['doc_0', 'doc_1'],
      ['doc_2'],
    ]);
    expect(runtime.inferCalls[0]?.opts).toEqual({ device: 'cpu', configName: 'default', maxLength: 512 });
    expect(results).toHaveLength(3);
    expect(results[2]).toEqual([
      {
        subject: 'DRO1',
        subject_type: 'gene',
        predicate: 'regulates',
        object: 'drought tolerance',
        object_type: 'phenotype',
        confidence: 0.95,
        sentence: 'c',
      },
    ]);
  });

  it('maps phenotypes onto Trait', () => {
    const [raw] = parseOutput({
      text: 'DRO1 regulates drought tolerance',
      relations: [
        {
          head: { text: 'DRO1', type: 'Gene' },
          tail: { text: 'drought tolerance', type: 'Phenotype' },
          type: 'regulates',
          score: 0.95,
        },
      ],
    });
    const normalized = adapter.normalize(raw!);
    expect(normalized.source_entity_attr).toBe('Gene');
    expect(normalized.sink_entity_attr).toBe('Trait');
    expect(normalized.relation_type).toBe('regulates');
  });

  it('fine-tunes into the default output directory', async () => {
    const result = await adapter.train([{ text: 'x', relations: [] }]);

    expect(runtime.finetuneCalls[0]?.opts).toEqual({
      device: 'cpu',
      outputDir: './tmp/lasuie_finetuned',
      numEpochs: 3,
      batchSize: 4,
    });
    expect(result).toEqual({
      status: 'completed',
      artifact_path: './tmp/lasuie_finetuned',
      metrics: { num_epochs: 3 },
    });
  });

  it('reports fine-tuning failures without throwing', async () => {
    runtime.finetuneError = new Error('LasUIE training failed (exit 1): CUDA out of memory');
    const result = await adapter.train([{ text: 'x' }], { numEpochs: 1 });
    expect(result).toEqual({
      status: 'failed',
      metrics: {},
      error: 'LasUIE training failed (exit 1): CUDA out of memory',
    });
  });
});

describe('AllenNlpAdapter', () => {
  const words = ['The', 'gene', 'regulates', 'drought', 'tolerance'];

  it('reads ARG0 and ARG1 spans from a verb frame', () => {
    const triple = parseFrame(
      { verb: 'regulates', description: '', tags: ['B-ARG0', 'I-ARG0', 'B-V', 'B-ARG1', 'I-ARG1'] },
      words,
      'The gene regulates drought tolerance'
    );

    expect(triple).toEqual({
      subject: 'The gene',
      subject_type: 'Factor',
      predicate: 'regulates',
      object: 'drought tolerance',
      object_type: 'Factor',
      confidence: 0.8,
      sentence: 'The gene regulates drought tolerance',
    });
  });

  it('skips frames missing an argument', () => {
    expect(
      parseFrame({ verb: 'regulates', description: '', tags: ['B-ARG0', 'I-ARG0', 'B-V', 'O', 'O'] }, words, '')
    ).toBeNull();
  });

  it('falls back to is_related_to for unmapped verbs', () => {
    const triple = parseFrame(
      { verb: 'binds', description: '', tags: ['B-ARG0', 'I-ARG0', 'B-V', 'B-ARG1', 'I-ARG1'] },
      words,
      ''
    );
    expect(triple?.predicate).toBe('is_related_to');
  });

  it('splits the text into words when the predictor omits them', async () => {
    const runtime = new StubAllenNlpRuntime();
    runtime.predictions = () => ({
      verbs: [
        { verb: 'regulates', description: '', tags: ['B-ARG0', 'I-ARG0', 'B-V', 'B-ARG1', 'I-ARG1'] },
        { verb: 'is', description: '', tags: ['O', 'O', 'O', 'O', 'O'] },
      ],
    });
    const adapter = new AllenNlpAdapter({ profileName: 'allennlp_srl', params: {} }, runtime);

    const [triples = []] = await adapter.extract(['The gene  regulates drought tolerance']);

    expect(runtime.loads).toEqual(['structured-prediction-srl-bert']);
    expect(triples).toHaveLength(1);
    expect(triples[0]?.subject).toBe('The gene');
    expect(triples[0]?.object).toBe('drought tolerance');
  });

  it('does not support training', async () => {
    const runtime = new StubAllenNlpRuntime();
    const adapter = new AllenNlpAdapter({ profileName: 'allennlp_srl', params: {} }, runtime);

    const result = await adapter.train([{ text: 'x' }]);

    expect(result).toEqual({
      status: 'not_implemented',
      metrics: {},
      error: 'Training is not supported by the allennlp backend',
    });
    expect(runtime.loads).toEqual([]);
  });
});
