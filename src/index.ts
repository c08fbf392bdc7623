import 'dotenv/config';
import { createExtractionContext } from './extraction/context';
import { errorMessage } from './extraction/errors';

const USAGE = [
  'Usage:',
  '  npm run extract -- extract <model-profile> <document-id...> [--no-wait]',
  '  npm run extract -- status <job-id>',
  '  npm run extract -- models',
].join('\n');

function parseIds(values: string[]): number[] {
  return values.map((value) => {
    const id = Number(value);
    if (!Number.isInteger(id) || id <= 0) {
      throw new Error(`Invalid id: ${value}`);
    }
    return id;
  });
}

async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2);

  if (!command) {
    console.error(USAGE);
    process.exit(1);
  }

  const context = createExtractionContext();
  const { service } = context;

  switch (command) {
    case 'models': {
      for (const profile of service.listModelProfiles()) {
        console.log(`${profile.id}\t${profile.backend}\t${profile.description}`);
      }
      return;
    }

    case 'status': {
      const [jobId] = parseIds(args.slice(0, 1));
      if (jobId === undefined) {
        console.error(USAGE);
        process.exit(1);
      }
      const job = await service.getJobStatus(jobId);
      if (!job) {
        console.error(`Job ${jobId} not found`);
        process.exit(1);
      }
      console.log(JSON.stringify(job, null, 2));
      return;
    }

    case 'extract': {
      const wait = !args.includes('--no-wait');
      const [modelProfile, ...ids] = args.filter((arg) => arg !== '--no-wait');
      if (!modelProfile || ids.length === 0) {
        console.error(USAGE);
        process.exit(1);
      }

      const result = await service.extractFromDocuments(
        { documentIds: parseIds(ids), modelProfile },
        { wait }
      );
      await service.shutdown();

      console.log(JSON.stringify(result, null, 2));
      if (result.status === 'failed') process.exit(1);
      return;
    }

    default:
      console.error(`Unknown command: ${command}\n${USAGE}`);
      process.exit(1);
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Fatal error:', errorMessage(error));
    process.exit(1);
  });
}

export { TraitExtractionService } from './extraction/service';
export { createExtractionContext } from './extraction/context';
export { AdapterFactory, createBackendRuntimes } from './extraction/adapters/factory';
export { AdapterRegistry } from './extraction/adapters/registry';
export { RemoteExtractionClient } from './extraction/remoteClient';
export { buildServer } from './api/server';
export * from './extraction/errors';
export * from './extraction/types';
