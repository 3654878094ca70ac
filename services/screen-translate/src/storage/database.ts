import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { getLogger } from '@screenlingo/logger';
import { MIGRATIONS } from './migrations';
import { Migrator } from './migrator';

const logger = getLogger();

/**
 * Abre o banco SQLite e aplica migrations pendentes.
 * Use ':memory:' para um banco temporário.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  new Migrator(db, MIGRATIONS).migrate();
  logger.debug({ path }, 'Database opened');
  return db;
}
