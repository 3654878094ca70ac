import type { StoredCredentials } from '@screenlingo/shared';

export interface CredentialSummary {
  providerId: string;
  last4: string;
  hasAppId: boolean;
  updatedAt: number;
}

/**
 * Armazenamento seguro de credenciais, indexado pelo id do provider.
 * Leituras acontecem a cada requisição; nada descriptografado fica em cache.
 */
export interface CredentialStore {
  hasCredentials(providerId: string): Promise<boolean>;
  getCredentials(providerId: string): Promise<StoredCredentials | null>;
  saveCredentials(providerId: string, credentials: StoredCredentials): Promise<void>;
  deleteCredentials(providerId: string): Promise<boolean>;
  listProviders(): Promise<CredentialSummary[]>;
}

export function last4(value: string): string {
  if (value.length <= 4) {
    return value;
  }
  return value.slice(-4);
}

/**
 * Implementação em memória (uso embutido e testes)
 */
export class InMemoryCredentialStore implements CredentialStore {
  private entries = new Map<string, { credentials: StoredCredentials; updatedAt: number }>();

  constructor(initial: Record<string, StoredCredentials> = {}) {
    for (const [providerId, credentials] of Object.entries(initial)) {
      this.entries.set(providerId, { credentials: { ...credentials }, updatedAt: Date.now() });
    }
  }

  async hasCredentials(providerId: string): Promise<boolean> {
    return this.entries.has(providerId);
  }

  async getCredentials(providerId: string): Promise<StoredCredentials | null> {
    const entry = this.entries.get(providerId);
    return entry ? { ...entry.credentials } : null;
  }

  async saveCredentials(providerId: string, credentials: StoredCredentials): Promise<void> {
    this.entries.set(providerId, { credentials: { ...credentials }, updatedAt: Date.now() });
  }

  async deleteCredentials(providerId: string): Promise<boolean> {
    return this.entries.delete(providerId);
  }

  async listProviders(): Promise<CredentialSummary[]> {
    return [...this.entries.entries()]
      .map(([providerId, entry]) => ({
        providerId,
        last4: last4(entry.credentials.apiKey),
        hasAppId: Boolean(entry.credentials.appId),
        updatedAt: entry.updatedAt,
      }))
      .sort((a, b) => a.providerId.localeCompare(b.providerId));
  }
}
