import 'dotenv/config';
import { loadExtractionConfig, loadModelProfiles, type ModelProfileRegistry } from '../config/extractionConfig';
import { createLogger } from '../utils/logger';
import { createTraitStore, SupabaseTraitStore } from './client';

const logger = createLogger('db/migrations');

/**
 * Seeds `trait_model_configs` from the profile file. The tables themselves are
 * created by the SQL files in ./migrations (see scripts/show_sql_migrations.ts).
 */
export async function runMigrations(
  store: SupabaseTraitStore,
  profiles: ModelProfileRegistry
): Promise<number> {
  logger.info('Seeding trait_model_configs');

  let seeded = 0;
  for (const summary of profiles.list()) {
    const profile = profiles.require(summary.id);
    const { error } = await store.client.from('trait_model_configs').upsert(
      {
        profile_name: summary.id,
        display_name: profile.name,
        description: profile.description,
        backend: profile.backend,
        params: profile.params,
        is_active: true,
        updated_at: new Date().toISOString(),
      },
      { onConflict: 'profile_name' }
    );

    if (error) {
      logger.warn({ profile: summary.id, err: error.message }, 'Failed to upsert model config');
      continue;
    }
    seeded++;
  }

  logger.info({ seeded, total: profiles.list().length }, 'Model configs seeded');
  return seeded;
}

async function main(): Promise<void> {
  try {
    const config = loadExtractionConfig();
    await runMigrations(createTraitStore(), loadModelProfiles(config.profilesPath));
    process.exit(0);
  } catch (error) {
    logger.error({ err: error }, 'Migration failed');
    process.exit(1);
  }
}

// Run if called directly
if (require.main === module) {
  void main();
}
