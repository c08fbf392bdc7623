export const BACKEND_TAGS = ['spacy', 'huggingface', 'lasuie', 'allennlp'] as const;
export type BackendTag = (typeof BACKEND_TAGS)[number];

export function isBackendTag(value: string): value is BackendTag {
  return (BACKEND_TAGS as readonly string[]).includes(value);
}

export const JOB_STATUSES = ['pending', 'running', 'completed', 'failed', 'cancelled'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const EXTRACTION_MODES = ['no_training', 'training_assisted', 'warm_start'] as const;
export type ExtractionMode = (typeof EXTRACTION_MODES)[number];

export const TRIPLE_STATUSES = ['raw', 'accepted', 'rejected', 'edited'] as const;
export type TripleStatus = (typeof TRIPLE_STATUSES)[number];

export interface ModelProfile {
  name: string;
  description: string;
  backend: BackendTag;
  params: Record<string, unknown>;
}

export interface ModelProfileSummary {
  id: string;
  name: string;
  description: string;
  backend: BackendTag;
}

export interface Document {
  id: number;
  project_id: number | null;
  file_path: string;
  text_content: string;
  doi: string | null;
  doi_hash: string | null;
  status: string;
  created_at: string;
  updated_at: string;
}

export interface SkippedDocument {
  document_id: number;
  reason: 'not_found' | 'empty_text';
}

export interface JobResults {
  total_triples: number;
  skipped_documents: SkippedDocument[];
}

export interface ExtractionJob {
  id: number;
  project_id: number | null;
  document_ids: number[];
  model_profile: string;
  mode: ExtractionMode;
  status: JobStatus;
  progress: number;
  total: number;
  error_message: string | null;
  results: JobResults | null;
  created_by: string | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
}

/**
 * Output of an adapter before normalization. Entity and relation labels are
 * still in the backend's own vocabulary.
 */
export interface RawTriple {
  subject: string;
  subject_type: string;
  predicate: string;
  object: string;
  object_type: string;
  confidence: number;
  sentence?: string;
  trait_name?: string | null;
  trait_value?: string | null;
  unit?: string | null;
}

export interface NormalizedTriple {
  source_entity_name: string;
  source_entity_attr: string;
  relation_type: string;
  sink_entity_name: string;
  sink_entity_attr: string;
  confidence: number;
  trait_name: string | null;
  trait_value: string | null;
  unit: string | null;
}

export interface InsertTriple extends NormalizedTriple {
  model_profile: string;
  status: TripleStatus;
  sentence: string;
  sentence_id?: number | null;
  project_id: number | null;
  document_id: number | null;
  job_id: number;
  doi_hash: string | null;
  contributor_email: string | null;
}

export interface ExtractedTriple extends InsertTriple {
  id: number;
  sentence_id: number;
  created_at: string;
  updated_at: string;
}

export type TrainingStatus = 'completed' | 'failed' | 'not_implemented';

export interface TrainingResult {
  status: TrainingStatus;
  artifact_path?: string;
  metrics: Record<string, number | string>;
  error?: string;
}

export type TrainingExample = Record<string, unknown>;

export interface TrainingOptions {
  numEpochs?: number;
  batchSize?: number;
  outputDir?: string;
}

export interface JobResult {
  job_id: number;
  status: JobStatus;
  total_triples?: number;
  error?: string;
}
