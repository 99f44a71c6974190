/**
 * Database Connection
 *
 * Opens the SQLite database at DATABASE_PATH on first use. `:memory:`
 * gives a private in-process database (used by the tests).
 */

import Database from 'better-sqlite3';
import { dirname, resolve } from 'path';
import { existsSync, mkdirSync } from 'fs';
import { env } from '../config';
import { logger } from '../utils';
import { initializeSchema } from './schema';

const IN_MEMORY = ':memory:';

let db: Database.Database | null = null;

/**
 * Opens a database and brings its schema up to date.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== IN_MEMORY) {
    const dataDir = dirname(resolve(path));
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  const database = new Database(path);
  database.pragma('foreign_keys = ON');
  if (path !== IN_MEMORY) {
    database.pragma('journal_mode = WAL');
  }

  initializeSchema(database);
  return database;
}

export function getDatabase(): Database.Database {
  if (!db) {
    db = openDatabase(env.DATABASE_PATH);
    logger.info(`SQLite database opened at ${env.DATABASE_PATH}`);
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Runs a trivial query to prove the connection works.
 */
export function checkDatabaseHealth(): { status: 'up' | 'down'; latencyMs: number; error?: string } {
  const startedAt = Date.now();

  try {
    getDatabase().prepare('SELECT 1').get();
    return { status: 'up', latencyMs: Date.now() - startedAt };
  } catch (error) {
    return {
      status: 'down',
      latencyMs: Date.now() - startedAt,
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}
