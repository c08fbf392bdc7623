import 'dotenv/config';
import { start } from '../src/api/server';
import { createLogger } from '../src/utils/logger';

const logger = createLogger('scripts/start-api');

start().catch((err: unknown) => {
  logger.error({ err }, 'Failed to start server');
  process.exit(1);
});
