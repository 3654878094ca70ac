import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { StoredCredentials } from '@screenlingo/shared';
import { getLogger } from '@screenlingo/logger';
import { CredentialStoreError } from '../errors';
import { CredentialStore, CredentialSummary, last4 } from './CredentialStore';
import type { KeyStorage } from './KeyStorage';

const logger = getLogger();

const StoredCredentialsSchema = z.object({
  apiKey: z.string(),
  appId: z.string().optional(),
});

type CredentialRow = {
  provider_id: string;
  encrypted: string;
  last4: string;
  has_app_id: number;
  updated_at: number;
};

/**
 * Credenciais criptografadas (AES-256-GCM) numa tabela SQLite
 */
export class SqliteCredentialStore implements CredentialStore {
  constructor(
    private readonly db: Database.Database,
    private readonly keyStorage: KeyStorage
  ) {}

  async hasCredentials(providerId: string): Promise<boolean> {
    const row = this.db
      .prepare<[string], { found: number }>('SELECT 1 as found FROM credentials WHERE provider_id = ?')
      .get(providerId);
    return row !== undefined;
  }

  async getCredentials(providerId: string): Promise<StoredCredentials | null> {
    const row = this.db
      .prepare<[string], Pick<CredentialRow, 'encrypted'>>('SELECT encrypted FROM credentials WHERE provider_id = ?')
      .get(providerId);
    if (!row) {
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(this.keyStorage.decrypt(row.encrypted));
    } catch (error) {
      logger.error({ providerId }, 'Failed to read stored credentials');
      if (error instanceof CredentialStoreError) throw error;
      throw new CredentialStoreError(`Stored credentials for ${providerId} are corrupted`, { cause: error });
    }

    const parsed = StoredCredentialsSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new CredentialStoreError(`Stored credentials for ${providerId} are corrupted`);
    }
    return parsed.data;
  }

  async saveCredentials(providerId: string, credentials: StoredCredentials): Promise<void> {
    if (!credentials.apiKey.trim()) {
      throw new CredentialStoreError('API key must not be empty');
    }
    const payload: StoredCredentials = { apiKey: credentials.apiKey.trim() };
    if (credentials.appId?.trim()) {
      payload.appId = credentials.appId.trim();
    }

    this.db
      .prepare(
        `INSERT INTO credentials (provider_id, encrypted, last4, has_app_id, updated_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(provider_id) DO UPDATE SET
           encrypted = excluded.encrypted,
           last4 = excluded.last4,
           has_app_id = excluded.has_app_id,
           updated_at = excluded.updated_at`
      )
      .run(
        providerId,
        this.keyStorage.encrypt(JSON.stringify(payload)),
        last4(payload.apiKey),
        payload.appId ? 1 : 0,
        Date.now()
      );
    logger.info({ providerId }, 'Credentials saved');
  }

  async deleteCredentials(providerId: string): Promise<boolean> {
    const result = this.db.prepare('DELETE FROM credentials WHERE provider_id = ?').run(providerId);
    return result.changes > 0;
  }

  async listProviders(): Promise<CredentialSummary[]> {
    const rows = this.db
      .prepare<[], Omit<CredentialRow, 'encrypted'>>(
        'SELECT provider_id, last4, has_app_id, updated_at FROM credentials ORDER BY provider_id'
      )
      .all();
    return rows.map((row) => ({
      providerId: row.provider_id,
      last4: row.last4,
      hasAppId: row.has_app_id === 1,
      updatedAt: row.updated_at,
    }));
  }
}
