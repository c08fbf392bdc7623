import type { FastifyInstance } from 'fastify';
import type { TraitExtractionService } from '../../extraction/service';
import { ExtractionController } from '../controllers/extractionController';
import { createBearerAuth } from '../middleware';

export function registerExtractionRoutes(
  fastify: FastifyInstance,
  extractionService: TraitExtractionService,
  apiKey: string | undefined
) {
  const controller = new ExtractionController(extractionService);
  const preHandler = createBearerAuth(apiKey);

  // POST /api/extraction/jobs
  fastify.post('/api/extraction/jobs', { preHandler }, async (request, reply) => {
    await controller.createJob(request, reply);
  });

  // GET /api/extraction/jobs
  fastify.get('/api/extraction/jobs', { preHandler }, async (request, reply) => {
    await controller.listJobs(request, reply);
  });

  // GET /api/extraction/jobs/:jobId
  fastify.get<{ Params: { jobId: string } }>(
    '/api/extraction/jobs/:jobId',
    { preHandler },
    async (request, reply) => {
      await controller.getJob(request, reply);
    }
  );

  // POST /api/extraction/jobs/:jobId/cancel
  fastify.post<{ Params: { jobId: string } }>(
    '/api/extraction/jobs/:jobId/cancel',
    { preHandler },
    async (request, reply) => {
      await controller.cancelJob(request, reply);
    }
  );

  // GET /api/extraction/models
  fastify.get('/api/extraction/models', { preHandler }, async (request, reply) => {
    await controller.listModels(request, reply);
  });

  // GET /api/extraction/triples
  fastify.get('/api/extraction/triples', { preHandler }, async (request, reply) => {
    await controller.listTriples(request, reply);
  });

  // PATCH /api/extraction/triples/:tripleId
  fastify.patch<{ Params: { tripleId: string } }>(
    '/api/extraction/triples/:tripleId',
    { preHandler },
    async (request, reply) => {
      await controller.reviewTriple(request, reply);
    }
  );

  // POST /api/extraction/documents
  fastify.post('/api/extraction/documents', { preHandler }, async (request, reply) => {
    await controller.createDocument(request, reply);
  });

  // GET /api/extraction/documents
  fastify.get('/api/extraction/documents', { preHandler }, async (request, reply) => {
    await controller.listDocuments(request, reply);
  });
}
