import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import {
  CreateDocumentBodySchema,
  CreateJobBodySchema,
  ReviewTripleBodySchema,
} from '../../extraction/schemas';
import type { TraitExtractionService } from '../../extraction/service';
import { JOB_STATUSES, TRIPLE_STATUSES } from '../../extraction/types';
import { createError } from '../middleware/errorHandler';
import { paginate, type JobAccepted } from '../types/api';
import { parseInput } from '../validation';

const IdParam = z.coerce.number().int().positive();

const PageQuerySchema = z.object({
  page: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().positive().optional(),
});

const JobsQuerySchema = PageQuerySchema.extend({
  project_id: z.coerce.number().int().positive().optional(),
  status: z.enum(JOB_STATUSES).optional(),
});

const TriplesQuerySchema = PageQuerySchema.extend({
  job_id: z.coerce.number().int().positive().optional(),
  document_id: z.coerce.number().int().positive().optional(),
  project_id: z.coerce.number().int().positive().optional(),
  status: z.enum(TRIPLE_STATUSES).optional(),
  min_confidence: z.coerce.number().min(0).max(1).optional(),
});

const DocumentsQuerySchema = PageQuerySchema.extend({
  project_id: z.coerce.number().int().positive().optional(),
});

interface JobParams {
  jobId: string;
}

interface TripleParams {
  tripleId: string;
}

export class ExtractionController {
  constructor(private extractionService: TraitExtractionService) {}

  async createJob(request: FastifyRequest, reply: FastifyReply) {
    const body = parseInput(CreateJobBodySchema, request.body, 'job request');
    const result = await this.extractionService.extractFromDocuments(
      {
        documentIds: body.document_ids,
        modelProfile: body.model_profile,
        projectId: body.project_id,
        createdBy: body.created_by,
        mode: body.mode,
      },
      { wait: false }
    );

    const data: JobAccepted = { job_id: result.job_id, status: 'pending' };
    reply.status(202).send({ data });
  }

  async getJob(request: FastifyRequest<{ Params: JobParams }>, reply: FastifyReply) {
    const jobId = parseInput(IdParam, request.params.jobId, 'jobId');
    const job = await this.extractionService.getJobStatus(jobId);

    if (!job) {
      throw createError('Job not found', 404, 'JOB_NOT_FOUND');
    }

    reply.send({ data: job });
  }

  async listJobs(request: FastifyRequest, reply: FastifyReply) {
    const { page, limit, ...filters } = parseInput(JobsQuerySchema, request.query, 'query');
    const result = await this.extractionService.listJobs(filters, { page, limit });
    reply.send(paginate(result, { page, limit }));
  }

  async cancelJob(request: FastifyRequest<{ Params: JobParams }>, reply: FastifyReply) {
    const jobId = parseInput(IdParam, request.params.jobId, 'jobId');
    const job = await this.extractionService.cancelJob(jobId);

    if (!job) {
      throw createError('Job not found', 404, 'JOB_NOT_FOUND');
    }

    reply.send({ data: job });
  }

  async listModels(_request: FastifyRequest, reply: FastifyReply) {
    reply.send({ data: this.extractionService.listModelProfiles() });
  }

  async listTriples(request: FastifyRequest, reply: FastifyReply) {
    const { page, limit, ...filters } = parseInput(TriplesQuerySchema, request.query, 'query');
    const result = await this.extractionService.listTriples(filters, { page, limit });
    reply.send(paginate(result, { page, limit }));
  }

  async reviewTriple(request: FastifyRequest<{ Params: TripleParams }>, reply: FastifyReply) {
    const tripleId = parseInput(IdParam, request.params.tripleId, 'tripleId');
    const body = parseInput(ReviewTripleBodySchema, request.body, 'review');
    const triple = await this.extractionService.reviewTriple(tripleId, body);

    if (!triple) {
      throw createError('Triple not found', 404, 'TRIPLE_NOT_FOUND');
    }

    reply.status(204).send();
  }

  async createDocument(request: FastifyRequest, reply: FastifyReply) {
    const body = parseInput(CreateDocumentBodySchema, request.body, 'document');
    const document = await this.extractionService.createDocument(body);
    reply.status(201).send({ data: document });
  }

  async listDocuments(request: FastifyRequest, reply: FastifyReply) {
    const { page, limit, ...filters } = parseInput(DocumentsQuerySchema, request.query, 'query');
    const result = await this.extractionService.listDocuments(filters, { page, limit });
    reply.send(paginate(result, { page, limit }));
  }
}
