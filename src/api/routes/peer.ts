import type { FastifyInstance } from 'fastify';
import { PeerController } from '../controllers/peerController';
import { createBearerAuth } from '../middleware';
import type { PeerService } from '../services/peerService';

export function registerPeerRoutes(
  fastify: FastifyInstance,
  peerService: PeerService,
  apiKey: string | undefined
) {
  const controller = new PeerController(peerService);
  const requireToken = createBearerAuth(apiKey);

  // GET / and GET /health - no auth
  fastify.get('/', async (request, reply) => {
    await controller.info(request, reply);
  });

  fastify.get('/health', async (request, reply) => {
    await controller.health(request, reply);
  });

  // GET /models
  fastify.get('/models', { preHandler: requireToken }, async (request, reply) => {
    await controller.listModels(request, reply);
  });

  // POST /extract_triples
  fastify.post('/extract_triples', { preHandler: requireToken }, async (request, reply) => {
    await controller.extractTriples(request, reply);
  });

  // POST /train_model
  fastify.post('/train_model', { preHandler: requireToken }, async (request, reply) => {
    await controller.trainModel(request, reply);
  });

  // POST /unload_model
  fastify.post('/unload_model', { preHandler: requireToken }, async (request, reply) => {
    await controller.unloadModel(request, reply);
  });

  // POST /unload_all
  fastify.post('/unload_all', { preHandler: requireToken }, async (request, reply) => {
    await controller.unloadAll(request, reply);
  });
}
