import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CredentialStoreError } from '../errors';
import { openDatabase } from './database';
import { KeyStorage } from './KeyStorage';
import { SqliteCredentialStore } from './SqliteCredentialStore';

describe('SqliteCredentialStore', () => {
  let db: Database.Database;
  let store: SqliteCredentialStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new SqliteCredentialStore(db, new KeyStorage({ secret: 'test-secret' }));
  });

  afterEach(() => {
    db.close();
  });

  it('saves, reads and deletes credentials', async () => {
    await store.saveCredentials('baidu', { apiKey: ' test-key-1234 ', appId: 'test-app' });

    expect(await store.hasCredentials('baidu')).toBe(true);
    expect(await store.getCredentials('baidu')).toEqual({ apiKey: 'test-key-1234', appId: 'test-app' });
    expect(await store.deleteCredentials('baidu')).toBe(true);
    expect(await store.deleteCredentials('baidu')).toBe(false);
    expect(await store.getCredentials('baidu')).toBeNull();
  });

  it('stores only ciphertext', async () => {
    await store.saveCredentials('openai', { apiKey: 'test-key-abcd' });

    const row = db
      .prepare<[string], { encrypted: string }>('SELECT encrypted FROM credentials WHERE provider_id = ?')
      .get('openai');
    expect(row?.encrypted).toBeDefined();
    expect(row?.encrypted).not.toContain('test-key-abcd');
  });

  it('overwrites existing credentials', async () => {
    await store.saveCredentials('deepl', { apiKey: 'first-key', appId: 'x' });
    await store.saveCredentials('deepl', { apiKey: 'second-key' });

    expect(await store.getCredentials('deepl')).toEqual({ apiKey: 'second-key' });
  });

  it('lists providers with the last four characters only', async () => {
    await store.saveCredentials('openai', { apiKey: 'test-key-abcd' });
    await store.saveCredentials('baidu', { apiKey: 'test-key-1234', appId: 'test-app' });

    const list = await store.listProviders();

    expect(list.map(({ providerId, last4, hasAppId }) => ({ providerId, last4, hasAppId }))).toEqual([
      { providerId: 'baidu', last4: '1234', hasAppId: true },
      { providerId: 'openai', last4: 'abcd', hasAppId: false },
    ]);
  });

  it('rejects an empty key', async () => {
    await expect(store.saveCredentials('google', { apiKey: '   ' })).rejects.toThrow('API key must not be empty');
  });

  it('fails loudly when the master key changed', async () => {
    await store.saveCredentials('google', { apiKey: 'test-key' });
    const other = new SqliteCredentialStore(db, new KeyStorage({ secret: 'other-secret' }));

    await expect(other.getCredentials('google')).rejects.toBeInstanceOf(CredentialStoreError);
  });
});
