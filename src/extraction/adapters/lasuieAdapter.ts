import { execFile } from 'child_process';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { createLogger, type Logger } from '../../utils/logger';
import type { RawTriple, TrainingExample, TrainingOptions, TrainingResult } from '../types';
import type { CanonicalEntityType } from '../vocabulary';
import { BaseAdapter, parseParams, type AdapterConfig } from './base';

export const LasUIEParamsSchema = z.object({
  config_name: z.string().default('default'),
  device: z.enum(['cpu', 'cuda']).default('cpu'),
  batch_size: z.number().int().positive().default(8),
  max_length: z.number().int().positive().default(512),
});

export type LasUIEParams = z.infer<typeof LasUIEParamsSchema>;

const SpanSchema = z.object({
  text: z.string().default(''),
  type: z.string().default(''),
});

const RelationSchema = z.object({
  head: SpanSchema.default({}),
  tail: SpanSchema.default({}),
  type: z.string().default('is_related_to'),
  score: z.number().default(0.8),
});

const OutputRecordSchema = z.object({
  text: z.string().default(''),
  relations: z.array(RelationSchema).default([]),
});

export type LasUIEOutput = z.infer<typeof OutputRecordSchema>;

export interface LasUIEInput {
  id: string;
  text: string;
  entities: [];
  relations: [];
}

export interface LasUIERunOptions {
  device: LasUIEParams['device'];
  configName: string;
  maxLength: number;
}

export interface LasUIEFinetuneOptions {
  device: LasUIEParams['device'];
  outputDir: string;
  numEpochs: number;
  batchSize: number;
}

export interface LasUIERuntime {
  check(): Promise<void>;
  infer(inputs: readonly LasUIEInput[], opts: LasUIERunOptions): Promise<LasUIEOutput[]>;
  finetune(
    examples: readonly TrainingExample[],
    opts: LasUIEFinetuneOptions
  ): Promise<{ stdout: string }>;
}

interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

function runProcess(
  command: string,
  args: string[],
  cwd: string,
  timeoutMs: number
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { cwd, timeout: timeoutMs, maxBuffer: 16 * 1024 * 1024 },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        if (error.killed) {
          reject(new Error(`${path.basename(args[0] ?? command)} timed out after ${timeoutMs}ms`));
          return;
        }
        if (typeof error.code === 'number') {
          resolve({ exitCode: error.code, stdout, stderr });
          return;
        }
        reject(error);
      }
    );
  });
}

const INFERENCE_TIMEOUT_MS = 300_000;
const FINETUNE_TIMEOUT_MS = 3_600_000;

/**
 * Runs the LasUIE inference and fine-tuning scripts of a local checkout.
 * Inputs and outputs are exchanged through JSON files in a scratch directory.
 */
export class SubprocessLasUIERuntime implements LasUIERuntime {
  constructor(
    private readonly repoPath: string,
    private readonly python = 'python'
  ) {}

  async check(): Promise<void> {
    try {
      await fs.access(this.repoPath);
    } catch {
      throw new Error(
        `LasUIE repository not found at ${this.repoPath} (clone https://github.com/ChocoWu/LasUIE.git)`
      );
    }
    const script = path.join(this.repoPath, 'run_inference.py');
    try {
      await fs.access(script);
    } catch {
      throw new Error(`LasUIE inference script not found: ${script}`);
    }
  }

  async infer(inputs: readonly LasUIEInput[], opts: LasUIERunOptions): Promise<LasUIEOutput[]> {
    return this.withScratchDir(async (dir) => {
      const inputFile = path.join(dir, 'input.json');
      const outputFile = path.join(dir, 'output.json');
      await fs.writeFile(inputFile, JSON.stringify(inputs));

      const result = await runProcess(
        this.python,
        [
          path.join(this.repoPath, 'run_inference.py'),
          '--input', inputFile,
          '--output', outputFile,
          '--device', opts.device,
          '--config', opts.configName,
          '--max_length', String(opts.maxLength),
        ],
        this.repoPath,
        INFERENCE_TIMEOUT_MS
      );
      if (result.exitCode !== 0) {
        throw new Error(`LasUIE inference failed (exit ${result.exitCode}): ${result.stderr.trim()}`);
      }

      const parsed = z
        .array(OutputRecordSchema)
        .safeParse(JSON.parse(await fs.readFile(outputFile, 'utf8')));
      if (!parsed.success) {
        throw new Error(`Unexpected LasUIE output: ${parsed.error.message}`);
      }
      return parsed.data;
    });
  }

  async finetune(
    examples: readonly TrainingExample[],
    opts: LasUIEFinetuneOptions
  ): Promise<{ stdout: string }> {
    return this.withScratchDir(async (dir) => {
      const trainFile = path.join(dir, 'train.json');
      await fs.writeFile(trainFile, JSON.stringify(examples));

      const result = await runProcess(
        this.python,
        [
          path.join(this.repoPath, 'run_finetune.py'),
          '--train_file', trainFile,
          '--output_dir', opts.outputDir,
          '--num_epochs', String(opts.numEpochs),
          '--batch_size', String(opts.batchSize),
          '--device', opts.device,
        ],
        this.repoPath,
        FINETUNE_TIMEOUT_MS
      );
      if (result.exitCode !== 0) {
        throw new Error(`LasUIE training failed (exit ${result.exitCode}): ${result.stderr.trim()}`);
      }
      return { stdout: result.stdout };
    });
  }

  private async withScratchDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lasuie-'));
    try {
      return await fn(dir);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}

const LASUIE_ENTITY_TYPES: Readonly<Record<string, CanonicalEntityType>> = {
  gene: 'Gene',
  protein: 'Protein',
  trait: 'Trait',
  phenotype: 'Trait',
  metabolite: 'Metabolite',
  enzyme: 'Enzyme',
};

const DEFAULT_EPOCHS = 3;
const DEFAULT_BATCH_SIZE = 4;
const DEFAULT_OUTPUT_DIR = './tmp/lasuie_finetuned';

export class LasUIEAdapter extends BaseAdapter<LasUIEParams> {
  readonly backend = 'lasuie' as const;
  protected readonly entityTypes = LASUIE_ENTITY_TYPES;

  constructor(
    config: AdapterConfig,
    private readonly runtime: LasUIERuntime,
    logger: Logger = createLogger('adapters/lasuie')
  ) {
    super(config, parseParams(LasUIEParamsSchema, config, 'lasuie'), logger);
  }

  // LasUIE loads its weights inside each inference run; loading only checks the checkout.
  protected async loadModel(): Promise<void> {
    await this.runtime.check();
  }

  protected async extractTriples(texts: readonly string[]): Promise<RawTriple[][]> {
    const results: RawTriple[][] = [];
    for (let offset = 0; offset < texts.length; offset += this.params.batch_size) {
      const inputs: LasUIEInput[] = texts
        .slice(offset, offset + this.params.batch_size)
        .map((text, i) => ({ id: `doc_${offset + i}`, text, entities: [], relations: [] }));

      const outputs = await this.runtime.infer(inputs, {
        device: this.params.device,
        configName: this.params.config_name,
        maxLength: this.params.max_length,
      });
      if (outputs.length !== inputs.length) {
        throw new Error(`LasUIE returned ${outputs.length} records for ${inputs.length} inputs`);
      }
      results.push(...outputs.map(parseOutput));
    }
    return results;
  }

  protected async trainModel(
    examples: readonly TrainingExample[],
    options: TrainingOptions
  ): Promise<TrainingResult> {
    const outputDir = options.outputDir ?? DEFAULT_OUTPUT_DIR;
    const numEpochs = options.numEpochs ?? DEFAULT_EPOCHS;
    await this.runtime.finetune(examples, {
      device: this.params.device,
      outputDir,
      numEpochs,
      batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
    });
    return { status: 'completed', artifact_path: outputDir, metrics: { num_epochs: numEpochs } };
  }
}

export function parseOutput(output: LasUIEOutput): RawTriple[] {
  return output.relations.map((relation) => ({
    subject: relation.head.text,
    subject_type: relation.head.type.toLowerCase(),
    predicate: relation.type,
    object: relation.tail.text,
    object_type: relation.tail.type.toLowerCase(),
    confidence: relation.score,
    sentence: output.text,
  }));
}
