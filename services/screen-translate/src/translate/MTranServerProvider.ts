import { z } from 'zod';
import type { ProviderConfig } from '@screenlingo/shared';
import { TranslationProviderError } from '../errors';
import { httpRequest, parseJson } from '../http';
import { BaseTranslationProvider, ProviderDeps } from './BaseTranslationProvider';
import type { TranslateOptions } from './TranslationProvider';

const HEALTH_PATHS = ['/health', '/'];
const HEALTH_TIMEOUT_MS = 3000;

const MTranResponseSchema = z.union([
  z.object({ translation: z.string() }),
  z.object({ result: z.string() }),
]);

/**
 * Servidor de tradução self-hosted (MTranServer).
 * POST {base}/translate {"text","source_lang","target_lang"} -> {"translation"}
 */
export class MTranServerProvider extends BaseTranslationProvider {
  constructor(config: Readonly<ProviderConfig>, deps: ProviderDeps) {
    super('mtran', config, deps);
  }

  async isAvailable(): Promise<boolean> {
    const baseUrl = this.config.baseUrl?.replace(/\/+$/, '');
    if (!baseUrl) return false;

    for (const path of HEALTH_PATHS) {
      try {
        const response = await httpRequest(`${baseUrl}${path}`, { method: 'GET' }, { timeoutMs: HEALTH_TIMEOUT_MS });
        if (response.status < 500) {
          return true;
        }
      } catch (error) {
        this.log.debug({ err: error, path }, 'MTranServer health probe failed');
      }
    }
    return false;
  }

  protected async translateText(
    text: string,
    fromLang: string | null,
    toLang: string,
    options: TranslateOptions
  ): Promise<string> {
    const baseUrl = this.requireBaseUrl();
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };

    // Segredo compartilhado opcional
    const credentials = await this.credentials.getCredentials(this.id);
    if (credentials?.apiKey) {
      headers.Authorization = `Bearer ${credentials.apiKey}`;
    }

    const response = await this.request(
      `${baseUrl}/translate`,
      {
        method: 'POST',
        headers,
        body: JSON.stringify({
          text,
          source_lang: fromLang ?? 'auto',
          target_lang: toLang,
        }),
      },
      options
    );

    if (!response.ok) {
      throw this.httpError(response);
    }

    const parsed = MTranResponseSchema.safeParse(parseJson(response.text));
    if (!parsed.success) {
      throw TranslationProviderError.translationFailed('Unexpected response from MTranServer');
    }
    return 'translation' in parsed.data ? parsed.data.translation : parsed.data.result;
  }
}
