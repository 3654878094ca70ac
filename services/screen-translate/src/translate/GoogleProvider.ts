import { z } from 'zod';
import type { ProviderConfig } from '@screenlingo/shared';
import { TranslationProviderError, sanitizeErrorMessage } from '../errors';
import { HttpResponse, extractApiMessage, parseJson } from '../http';
import { BaseTranslationProvider, ProviderDeps } from './BaseTranslationProvider';
import type { TranslateOptions } from './TranslationProvider';

const GoogleResponseSchema = z.object({
  data: z.object({
    translations: z.array(
      z.object({
        translatedText: z.string(),
        detectedSourceLanguage: z.string().optional(),
      })
    ),
  }),
});

/**
 * Google Cloud Translation v2: POST em lote com vários "q"
 */
export class GoogleProvider extends BaseTranslationProvider {
  constructor(config: Readonly<ProviderConfig>, deps: ProviderDeps) {
    super('google', config, deps);
  }

  protected async translateText(
    text: string,
    fromLang: string | null,
    toLang: string,
    options: TranslateOptions
  ): Promise<string> {
    const [translated] = await this.translateTexts([text], fromLang, toLang, options);
    if (translated === undefined) {
      throw TranslationProviderError.translationFailed('Google returned no translation');
    }
    return translated;
  }

  protected async translateTexts(
    texts: string[],
    fromLang: string | null,
    toLang: string,
    options: TranslateOptions
  ): Promise<string[]> {
    const baseUrl = this.requireBaseUrl();
    const { apiKey } = await this.requireCredentials();

    const body: Record<string, unknown> = { q: texts, target: toLang, format: 'text' };
    if (fromLang && fromLang !== 'auto') {
      body.source = fromLang;
    }

    const response = await this.request(
      `${baseUrl}?key=${encodeURIComponent(apiKey)}`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      },
      options
    );

    if (!response.ok) {
      throw this.googleError(response);
    }

    const parsed = GoogleResponseSchema.safeParse(parseJson(response.text));
    if (!parsed.success) {
      throw TranslationProviderError.translationFailed('Unexpected response from Google');
    }

    const translations = parsed.data.data.translations;
    if (translations.length !== texts.length) {
      throw TranslationProviderError.translationFailed(
        `expected ${texts.length} results, got ${translations.length}`
      );
    }
    return translations.map((item) => item.translatedText);
  }

  private googleError(response: HttpResponse): TranslationProviderError {
    const message = sanitizeErrorMessage(extractApiMessage(response.text));
    // Chave inválida chega como 400
    if (response.status === 400 && /api key/i.test(message)) {
      return TranslationProviderError.invalidConfiguration(`HTTP 400: ${message}`, 400);
    }
    return this.httpError(response);
  }
}
