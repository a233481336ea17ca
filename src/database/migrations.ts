import { Database } from 'sqlite';

/**
 * Database migration scripts for SQLite schema creation
 */

export interface Migration {
  version: number;
  name: string;
  up: (db: Database) => Promise<void>;
  down: (db: Database) => Promise<void>;
}

const MIGRATION_HISTORY_VERSION = 1;

export const migrations: Migration[] = [
  {
    version: MIGRATION_HISTORY_VERSION,
    name: 'create_migration_history_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS migration_history (
          version INTEGER PRIMARY KEY,
          name TEXT NOT NULL,
          applied_at TEXT NOT NULL
        );
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS migration_history;');
    }
  },
  {
    version: 2,
    name: 'create_classifications_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS classifications (
          cls_id TEXT PRIMARY KEY,
          msg_id TEXT NOT NULL,
          label TEXT NOT NULL CHECK (label IN ('todo', 'followup', 'noise')),
          priority INTEGER NOT NULL CHECK (priority BETWEEN 1 AND 10),
          created_at TEXT NOT NULL
        );
      `);

      // One classification per message
      await db.exec(`
        CREATE UNIQUE INDEX IF NOT EXISTS idx_classifications_msg_id ON classifications(msg_id);
        CREATE INDEX IF NOT EXISTS idx_classifications_label ON classifications(label);
        CREATE INDEX IF NOT EXISTS idx_classifications_created_at ON classifications(created_at);
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS classifications;');
    }
  },
  {
    version: 3,
    name: 'add_classification_user_id',
    up: async (db: Database) => {
      await db.exec('ALTER TABLE classifications ADD COLUMN user_id TEXT;');
      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_classifications_user_id ON classifications(user_id);
        CREATE INDEX IF NOT EXISTS idx_classifications_user_label ON classifications(user_id, label);
      `);
    },
    down: async (db: Database) => {
      await db.exec(`
        DROP INDEX IF EXISTS idx_classifications_user_label;
        DROP INDEX IF EXISTS idx_classifications_user_id;
      `);
      await db.exec('ALTER TABLE classifications DROP COLUMN user_id;');
    }
  },
  {
    version: 4,
    name: 'create_tasks_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS tasks (
          task_id TEXT PRIMARY KEY,
          user_id TEXT NOT NULL,
          source_message_id TEXT,
          source_classification_id TEXT,
          title TEXT NOT NULL,
          description TEXT,
          status TEXT NOT NULL DEFAULT 'open' CHECK (status IN ('open', 'done')),
          due_date TEXT,
          priority INTEGER NOT NULL CHECK (priority BETWEEN 1 AND 10),
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL,
          FOREIGN KEY (source_classification_id) REFERENCES classifications(cls_id) ON DELETE SET NULL
        );
      `);

      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_tasks_user_id ON tasks(user_id);
        CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
        CREATE INDEX IF NOT EXISTS idx_tasks_source_message_id ON tasks(source_message_id);
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS tasks;');
    }
  },
  {
    version: 5,
    name: 'create_briefs_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS briefs (
          brief_id TEXT PRIMARY KEY,
          user_id TEXT NOT NULL,
          brief_date TEXT NOT NULL,
          total_items INTEGER NOT NULL,
          high_priority_count INTEGER NOT NULL,
          todo_count INTEGER NOT NULL,
          followup_count INTEGER NOT NULL,
          items TEXT NOT NULL DEFAULT '[]', -- JSON array
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
      `);

      await db.exec(`
        CREATE UNIQUE INDEX IF NOT EXISTS idx_briefs_user_date ON briefs(user_id, brief_date);
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS briefs;');
    }
  }
];

async function getCurrentVersion(db: Database): Promise<number> {
  const currentVersionResult = await db.get<{ version: number | null }>(
    'SELECT MAX(version) as version FROM migration_history'
  );
  return currentVersionResult?.version || 0;
}

export async function runMigrations(db: Database): Promise<void> {
  console.log('🔄 Running database migrations...');

  // Ensure migration history table exists first
  const migrationHistoryMigration = migrations.find(m => m.name === 'create_migration_history_table');
  if (migrationHistoryMigration) {
    await migrationHistoryMigration.up(db);
  }

  const currentVersion = await getCurrentVersion(db);
  const pending = migrations
    .filter(m => m.version > currentVersion)
    .sort((a, b) => a.version - b.version);

  for (const migration of pending) {
    console.log(`🔄 Running migration ${migration.version}: ${migration.name}`);

    try {
      await db.exec('BEGIN TRANSACTION;');
      await migration.up(db);

      // Record migration in history
      await db.run(
        'INSERT INTO migration_history (version, name, applied_at) VALUES (?, ?, ?)',
        [migration.version, migration.name, new Date().toISOString()]
      );

      await db.exec('COMMIT;');
      console.log(`✅ Migration ${migration.version} completed successfully`);
    } catch (error) {
      await db.exec('ROLLBACK;');
      console.error(`❌ Migration ${migration.version} failed:`, error);
      throw error;
    }
  }

  console.log('✅ All migrations completed successfully');
}

export async function rollbackMigration(db: Database, targetVersion: number): Promise<void> {
  console.log(`🔄 Rolling back to migration version ${targetVersion}...`);

  const currentVersion = await getCurrentVersion(db);

  if (targetVersion >= currentVersion) {
    console.log('No rollback needed - target version is current or higher');
    return;
  }

  // The history table itself is never rolled back
  const migrationsToRollback = migrations
    .filter(m => m.version > targetVersion && m.version <= currentVersion && m.version !== MIGRATION_HISTORY_VERSION)
    .sort((a, b) => b.version - a.version);

  for (const migration of migrationsToRollback) {
    console.log(`🔄 Rolling back migration ${migration.version}: ${migration.name}`);

    try {
      await db.exec('BEGIN TRANSACTION;');
      await migration.down(db);

      // Remove migration from history
      await db.run(
        'DELETE FROM migration_history WHERE version = ?',
        [migration.version]
      );

      await db.exec('COMMIT;');
      console.log(`✅ Migration ${migration.version} rolled back successfully`);
    } catch (error) {
      await db.exec('ROLLBACK;');
      console.error(`❌ Rollback of migration ${migration.version} failed:`, error);
      throw error;
    }
  }

  console.log(`✅ Rollback to version ${targetVersion} completed successfully`);
}
