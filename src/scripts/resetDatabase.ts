import dotenv from 'dotenv';
import { loadConfig } from '../config';
import { closeDatabase, getDatabase } from '../config/database';
import { rollbackMigration, runMigrations } from '../database/migrations';

/**
 * Drop every table and re-apply all migrations. Destroys stored data.
 */
async function resetDatabase(): Promise<void> {
  dotenv.config();
  const config = loadConfig();

  console.log(`🔄 Resetting database at ${config.databasePath}`);
  const db = await getDatabase(config.databasePath);

  try {
    await runMigrations(db);
    await rollbackMigration(db, 0);
    await runMigrations(db);
    console.log('✅ Database reset complete');
  } finally {
    await closeDatabase();
  }
}

resetDatabase().catch(error => {
  console.error('❌ Database reset failed:', error);
  process.exit(1);
});
