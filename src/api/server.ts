import 'dotenv/config';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { loadServerConfig } from '../config/extractionConfig';
import { createExtractionContext, type ExtractionContext } from '../extraction/context';
import { createLogger, getLoggerOptions } from '../utils/logger';
import { errorHandler } from './middleware';
import { registerExtractionRoutes, registerPeerRoutes } from './routes';
import { PeerService } from './services/peerService';

const logger = createLogger('api/server');

export interface BuildServerOptions {
  corsOrigin?: string;
}

async function buildServer(
  context: ExtractionContext = createExtractionContext(),
  options: BuildServerOptions = {}
) {
  const fastify = Fastify({ logger: getLoggerOptions() });

  // Register CORS
  await fastify.register(cors, {
    origin: options.corsOrigin ?? loadServerConfig().corsOrigin,
    credentials: true,
  });

  // Register error handler
  fastify.setErrorHandler(errorHandler);

  const peerService = new PeerService(
    context.profiles,
    context.registry,
    context.worker,
    context.config
  );
  registerPeerRoutes(fastify, peerService, context.config.apiKey);
  registerExtractionRoutes(fastify, context.service, context.config.apiKey);

  // Drain queued jobs and release models before the process exits
  fastify.addHook('onClose', async () => {
    await context.service.shutdown();
  });

  return fastify;
}

async function start() {
  const { port, host } = loadServerConfig();
  const context = createExtractionContext();
  const server = await buildServer(context);

  await server.listen({ port, host });

  logger.info({ host, port, localMode: context.config.localMode }, 'API server listening');
  if (context.config.apiKey) {
    logger.info('API key authentication enabled');
  } else {
    logger.warn('API key authentication disabled - set TRAIT_EXTRACTION_API_KEY to enable');
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info({ signal }, 'Shutting down');
      server
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });
  }
}

if (require.main === module) {
  start().catch((err: unknown) => {
    logger.error({ err }, 'Error starting server');
    process.exit(1);
  });
}

export { buildServer, start };
