import { z } from 'zod';
import { ENGINE_CATALOG, ProviderConfig } from '@screenlingo/shared';
import { TranslationProviderError } from '../errors';
import { HttpResponse, parseJson } from '../http';
import { BaseTranslationProvider, ProviderDeps } from './BaseTranslationProvider';
import type { TranslateOptions } from './TranslationProvider';

const FREE_API_URL = 'https://api-free.deepl.com/v2/translate';

const DeepLResponseSchema = z.object({
  translations: z.array(
    z.object({
      text: z.string(),
      detected_source_language: z.string().optional(),
    })
  ),
});

// Alvos que a DeepL exige com variante regional
const TARGET_VARIANTS: Record<string, string> = {
  EN: 'EN-US',
  PT: 'PT-BR',
  'ZH-HANS': 'ZH-HANS',
  'ZH-HANT': 'ZH-HANT',
};

export function toDeepLTarget(lang: string): string {
  const upper = lang.toUpperCase();
  return TARGET_VARIANTS[upper] ?? upper;
}

export function toDeepLSource(lang: string | null): string | undefined {
  if (!lang || lang === 'auto') {
    return undefined;
  }
  return lang.split('-')[0].toUpperCase();
}

/**
 * DeepL: POST em lote com text[]; chaves ":fx" usam a API gratuita
 */
export class DeepLProvider extends BaseTranslationProvider {
  constructor(config: Readonly<ProviderConfig>, deps: ProviderDeps) {
    super('deepl', config, deps);
  }

  protected async translateText(
    text: string,
    fromLang: string | null,
    toLang: string,
    options: TranslateOptions
  ): Promise<string> {
    const [translated] = await this.translateTexts([text], fromLang, toLang, options);
    if (translated === undefined) {
      throw TranslationProviderError.translationFailed('DeepL returned no translation');
    }
    return translated;
  }

  protected async translateTexts(
    texts: string[],
    fromLang: string | null,
    toLang: string,
    options: TranslateOptions
  ): Promise<string[]> {
    const { apiKey } = await this.requireCredentials();
    const url = this.endpointFor(apiKey);

    const body: Record<string, unknown> = { text: texts, target_lang: toDeepLTarget(toLang) };
    const source = toDeepLSource(fromLang);
    if (source) {
      body.source_lang = source;
    }

    const response = await this.request(
      url,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `DeepL-Auth-Key ${apiKey}`,
        },
        body: JSON.stringify(body),
      },
      options
    );

    if (!response.ok) {
      throw this.deeplError(response);
    }

    const parsed = DeepLResponseSchema.safeParse(parseJson(response.text));
    if (!parsed.success) {
      throw TranslationProviderError.translationFailed('Unexpected response from DeepL');
    }

    const translations = parsed.data.translations;
    if (translations.length !== texts.length) {
      throw TranslationProviderError.translationFailed(
        `expected ${texts.length} results, got ${translations.length}`
      );
    }
    return translations.map((item) => item.text);
  }

  private endpointFor(apiKey: string): string {
    const configured = this.requireBaseUrl();
    if (apiKey.endsWith(':fx') && configured === ENGINE_CATALOG.deepl.defaultBaseUrl) {
      return FREE_API_URL;
    }
    return configured;
  }

  private deeplError(response: HttpResponse): TranslationProviderError {
    if (response.status === 456) {
      return TranslationProviderError.translationFailed('DeepL quota exceeded', 456);
    }
    return this.httpError(response);
  }
}
