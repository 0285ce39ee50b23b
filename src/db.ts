import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { getDbPath, type AppConfig } from './config.js';
import { logger } from './logger.js';

export const IN_MEMORY = ':memory:';

/**
 * Open the knowledge base database, creating its data directory on first use.
 */
export function openDatabase(config: Pick<AppConfig, 'dataDir' | 'dbFile'>): Database.Database {
  const dbPath = config.dbFile === IN_MEMORY ? IN_MEMORY : getDbPath(config);

  if (dbPath !== IN_MEMORY) {
    const dataDir = dirname(dbPath);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
      logger.info(`Created data directory: ${dataDir}`);
    }
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  logger.debug(`Database initialized at: ${dbPath}`);
  return db;
}

export function closeDatabase(db: Database.Database): void {
  if (db.open) {
    db.close();
    logger.debug('Database closed');
  }
}
