import type Database from 'better-sqlite3';
import { getLogger } from '@screenlingo/logger';

const logger = getLogger();

/**
 * Interface para migrations
 */
export interface Migration {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
  down: (db: Database.Database) => void;
}

/**
 * Executor de migrations
 */
export class Migrator {
  private db: Database.Database;
  private migrations: Migration[];

  constructor(db: Database.Database, migrations: Migration[]) {
    this.db = db;
    this.migrations = [...migrations].sort((a, b) => a.version - b.version);
    this.initSchemaVersion();
  }

  /**
   * Inicializa a tabela de controle de versão
   */
  private initSchemaVersion(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER PRIMARY KEY,
        applied_at INTEGER NOT NULL
      );
    `);
  }

  /**
   * Obtém a versão atual do schema
   */
  getCurrentVersion(): number {
    const row = this.db.prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version').get();
    return row?.version ?? 0;
  }

  /**
   * Executa migrations pendentes
   */
  migrate(): void {
    const currentVersion = this.getCurrentVersion();
    const pending = this.migrations.filter((m) => m.version > currentVersion);

    if (pending.length === 0) {
      logger.debug({ version: currentVersion }, 'Database is up to date');
      return;
    }

    logger.info({ count: pending.length }, 'Running migrations');

    for (const migration of pending) {
      const transaction = this.db.transaction(() => {
        migration.up(this.db);
        this.db
          .prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)')
          .run(migration.version, Date.now());
      });

      try {
        transaction();
        logger.debug({ version: migration.version, name: migration.name }, 'Migration applied');
      } catch (error) {
        logger.error({ err: error, version: migration.version }, 'Failed to apply migration');
        throw error;
      }
    }

    logger.info({ version: this.getCurrentVersion() }, 'Database migrated');
  }

  /**
   * Reverte uma migration específica
   */
  rollback(version: number): void {
    const migration = this.migrations.find((m) => m.version === version);

    if (!migration) {
      throw new Error(`Migration ${version} not found`);
    }

    const transaction = this.db.transaction(() => {
      migration.down(this.db);
      this.db.prepare('DELETE FROM schema_version WHERE version = ?').run(version);
    });

    transaction();
    logger.info({ version }, 'Rolled back migration');
  }
}
