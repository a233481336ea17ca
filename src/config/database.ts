import { Database, open } from 'sqlite';
import sqlite3 from 'sqlite3';
import fs from 'fs';
import path from 'path';
import { runMigrations } from '../database/migrations';

let db: Database | null = null;

/**
 * Initialize database connection and run migrations
 */
export async function initializeDatabase(databasePath: string): Promise<Database> {
  const database = await getDatabase(databasePath);
  await runMigrations(database);
  console.log(`✅ Database initialized: ${databasePath}`);

  return database;
}

/**
 * Get or create database connection
 */
export async function getDatabase(databasePath: string): Promise<Database> {
  if (db) {
    return db;
  }

  if (databasePath !== ':memory:') {
    const dir = path.dirname(databasePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  db = await open({
    filename: databasePath,
    driver: sqlite3.Database
  });

  // Enable foreign keys
  await db.exec('PRAGMA foreign_keys = ON');

  return db;
}

/**
 * Lightweight liveness probe used by the health endpoint
 */
export async function pingDatabase(database: Database): Promise<boolean> {
  try {
    await database.get('SELECT 1 AS ok');
    return true;
  } catch (error) {
    console.error('Database connection test failed:', error);
    return false;
  }
}

/**
 * Close database connection
 */
export async function closeDatabase(): Promise<void> {
  if (db) {
    await db.close();
    db = null;
  }
}
