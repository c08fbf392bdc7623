import { z } from 'zod';
import { BACKEND_TAGS, EXTRACTION_MODES, TRIPLE_STATUSES } from './types';

// Profile file (config/model-profiles.json)

export const ModelProfileSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  backend: z.enum(BACKEND_TAGS),
  params: z.record(z.string(), z.unknown()).default({}),
});

export const ModelProfilesFileSchema = z.object({
  profiles: z
    .record(z.string(), ModelProfileSchema)
    .refine((profiles) => Object.keys(profiles).length > 0, 'at least one profile is required'),
});

// Peer extraction API

export const ModelProfileSummarySchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  backend: z.enum(BACKEND_TAGS),
});

export const HealthResponseSchema = z.object({
  status: z.string(),
  loaded_adapters: z.array(z.string()),
});

export const ExtractDocumentSchema = z.object({
  id: z.number().int(),
  text: z.string(),
  metadata: z
    .object({
      project_id: z.number().int().nullable().optional(),
      doi: z.string().nullable().optional(),
    })
    .default({}),
});

export const ExtractTriplesRequestSchema = z.object({
  documents: z.array(ExtractDocumentSchema),
  model_profile: z.string().min(1),
  job_id: z.number().int().nullable().optional(),
});

export const WireTripleSchema = z.object({
  source_entity_name: z.string(),
  source_entity_attr: z.string(),
  relation_type: z.string(),
  sink_entity_name: z.string(),
  sink_entity_attr: z.string(),
  confidence: z.number().min(0).max(1),
  trait_name: z.string().nullable().default(null),
  trait_value: z.string().nullable().default(null),
  unit: z.string().nullable().default(null),
  document_id: z.number().int().nullable().default(null),
  model_profile: z.string().optional(),
  job_id: z.number().int().nullable().optional(),
  project_id: z.number().int().nullable().optional(),
  doi: z.string().nullable().optional(),
  sentence: z.string().default(''),
});

export const ExtractTriplesResponseSchema = z.object({
  job_id: z.number().int().nullable().optional(),
  status: z.string(),
  total_documents: z.number().int().nonnegative(),
  total_triples: z.number().int().nonnegative(),
  triples: z.array(WireTripleSchema),
});

export const TrainModelRequestSchema = z.object({
  model_profile: z.string().min(1),
  training_data: z.array(z.record(z.string(), z.unknown())),
  output_dir: z.string().optional(),
  num_epochs: z.number().int().positive().default(3),
  batch_size: z.number().int().positive().default(4),
});

export const TrainModelResponseSchema = z.object({
  status: z.enum(['completed', 'failed', 'not_implemented']),
  model_path: z.string().nullable().optional(),
  metrics: z.record(z.string(), z.union([z.number(), z.string()])).default({}),
  error: z.string().nullable().optional(),
});

export const UnloadModelRequestSchema = z.object({
  model_profile: z.string().min(1),
});

export const StatusMessageSchema = z.object({
  status: z.string(),
  message: z.string(),
});

// Orchestration API

export const CreateJobBodySchema = z.object({
  document_ids: z.array(z.number().int().positive()).min(1),
  model_profile: z.string().min(1),
  project_id: z.number().int().positive().optional(),
  created_by: z.string().optional(),
  mode: z.enum(EXTRACTION_MODES).default('no_training'),
});

export const TripleEditsSchema = z
  .object({
    source_entity_name: z.string().min(1),
    source_entity_attr: z.string().min(1),
    relation_type: z.string().min(1),
    sink_entity_name: z.string().min(1),
    sink_entity_attr: z.string().min(1),
    trait_name: z.string().nullable(),
    trait_value: z.string().nullable(),
    unit: z.string().nullable(),
  })
  .partial();

export const ReviewTripleBodySchema = z
  .object({
    status: z.enum(TRIPLE_STATUSES).optional(),
    edits: TripleEditsSchema.optional(),
  })
  .refine((body) => body.status !== undefined || body.edits !== undefined, {
    message: 'status or edits is required',
  });

export const CreateDocumentBodySchema = z.object({
  project_id: z.number().int().positive().optional(),
  file_path: z.string().min(1),
  text_content: z.string(),
  doi: z.string().optional(),
});

export type ExtractDocument = z.infer<typeof ExtractDocumentSchema>;
export type ExtractTriplesRequest = z.infer<typeof ExtractTriplesRequestSchema>;
export type ExtractTriplesResponse = z.infer<typeof ExtractTriplesResponseSchema>;
export type WireTriple = z.infer<typeof WireTripleSchema>;
export type TrainModelRequest = z.infer<typeof TrainModelRequestSchema>;
export type TrainModelResponse = z.infer<typeof TrainModelResponseSchema>;
export type TripleEdits = z.infer<typeof TripleEditsSchema>;
export type CreateJobBody = z.infer<typeof CreateJobBodySchema>;
export type CreateDocumentBody = z.infer<typeof CreateDocumentBodySchema>;
