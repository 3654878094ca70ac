import type { Migration } from './migrator';

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'credentials',
    up: (db) => {
      db.exec(`
        CREATE TABLE credentials (
          provider_id TEXT PRIMARY KEY,
          encrypted TEXT NOT NULL,
          last4 TEXT NOT NULL,
          has_app_id INTEGER NOT NULL DEFAULT 0,
          updated_at INTEGER NOT NULL
        );
      `);
    },
    down: (db) => {
      db.exec('DROP TABLE IF EXISTS credentials;');
    },
  },
  {
    version: 2,
    name: 'translation_history',
    up: (db) => {
      db.exec(`
        CREATE TABLE translation_history (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          created_at INTEGER NOT NULL,
          engine TEXT NOT NULL,
          source_language TEXT NOT NULL,
          target_language TEXT NOT NULL,
          source_text TEXT NOT NULL,
          translated_text TEXT NOT NULL,
          segments_json TEXT NOT NULL
        );
        CREATE INDEX idx_translation_history_created ON translation_history(created_at DESC);
      `);
    },
    down: (db) => {
      db.exec('DROP TABLE IF EXISTS translation_history;');
    },
  },
];
