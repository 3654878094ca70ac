import {
  ENGINE_CATALOG,
  ProviderConfig,
  StoredCredentials,
  TranslationEngineType,
  TranslationResult,
} from '@screenlingo/shared';
import type { Logger } from 'pino';
import { createChildLogger, getLogger } from '@screenlingo/logger';
import {
  TranslationProviderError,
  errorMessage,
  isAbortError,
  sanitizeErrorMessage,
} from '../errors';
import {
  HttpNetworkError,
  HttpResponse,
  HttpTimeoutError,
  extractApiMessage,
  httpRequest,
  parseRetryAfter,
} from '../http';
import type { CredentialStore } from '../storage/CredentialStore';
import type { TranslateOptions, TranslationProvider } from './TranslationProvider';

export interface ProviderDeps {
  credentials: CredentialStore;
}

/**
 * Classe base abstrata para providers de tradução
 * Implementa lógica comum: validação, batch sequencial, mapeamento de erros HTTP
 */
export abstract class BaseTranslationProvider implements TranslationProvider {
  readonly name: string;
  protected readonly config: Readonly<ProviderConfig>;
  protected readonly credentials: CredentialStore;
  protected readonly log: Logger;

  constructor(
    readonly id: TranslationEngineType,
    config: Readonly<ProviderConfig>,
    deps: ProviderDeps
  ) {
    this.name = ENGINE_CATALOG[id].name;
    this.config = Object.isFrozen(config) ? config : Object.freeze({ ...config });
    this.credentials = deps.credentials;
    this.log = createChildLogger(getLogger(), { engine: id });
  }

  /**
   * Traduz um único texto (implementação específica do provider)
   */
  protected abstract translateText(
    text: string,
    fromLang: string | null,
    toLang: string,
    options: TranslateOptions
  ): Promise<string>;

  /**
   * Padrão: uma requisição por item, em ordem. Providers com batch nativo sobrescrevem.
   */
  protected async translateTexts(
    texts: string[],
    fromLang: string | null,
    toLang: string,
    options: TranslateOptions
  ): Promise<string[]> {
    const results: string[] = [];
    for (const text of texts) {
      results.push(await this.translateText(text, fromLang, toLang, options));
    }
    return results;
  }

  async isAvailable(): Promise<boolean> {
    if (!ENGINE_CATALOG[this.id].requiresApiKey) {
      return true;
    }
    return this.credentials.hasCredentials(this.id);
  }

  async translate(
    text: string,
    fromLang: string | null,
    toLang: string,
    options: TranslateOptions = {}
  ): Promise<TranslationResult> {
    if (!text.trim()) {
      throw TranslationProviderError.emptyInput();
    }
    const translated = await this.guard(() => this.translateText(text, fromLang, toLang, options));
    return this.toResult(text, translated, fromLang, toLang);
  }

  async translateBatch(
    texts: string[],
    fromLang: string | null,
    toLang: string,
    options: TranslateOptions = {}
  ): Promise<TranslationResult[]> {
    if (texts.length === 0) {
      return [];
    }
    if (texts.some((text) => !text.trim())) {
      throw TranslationProviderError.emptyInput();
    }

    const translated = await this.guard(() => this.translateTexts(texts, fromLang, toLang, options));
    if (translated.length !== texts.length) {
      throw TranslationProviderError.translationFailed(
        `expected ${texts.length} results, got ${translated.length}`
      );
    }
    return texts.map((text, index) => this.toResult(text, translated[index], fromLang, toLang));
  }

  async checkConnection(): Promise<boolean> {
    try {
      await this.translate('Hello', 'en', 'zh');
      return true;
    } catch (error) {
      this.log.warn({ err: error }, 'Connection check failed');
      return false;
    }
  }

  protected toResult(
    sourceText: string,
    translatedText: string,
    fromLang: string | null,
    toLang: string
  ): TranslationResult {
    return {
      sourceText,
      translatedText,
      sourceLanguage: fromLang ?? 'auto',
      targetLanguage: toLang,
    };
  }

  /**
   * Normaliza qualquer erro para TranslationProviderError (cancelamento passa intacto)
   */
  private async guard<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      const normalized =
        error instanceof TranslationProviderError
          ? error
          : TranslationProviderError.translationFailed(sanitizeErrorMessage(errorMessage(error)));
      this.log.error(
        { kind: normalized.kind, status: normalized.statusCode },
        'Translation request failed'
      );
      throw normalized;
    }
  }

  /**
   * Credenciais lidas a cada requisição
   */
  protected async requireCredentials(options: { appId?: boolean } = {}): Promise<StoredCredentials> {
    const credentials = await this.credentials.getCredentials(this.id);
    if (!credentials || !credentials.apiKey) {
      throw TranslationProviderError.invalidConfiguration(`API key for ${this.name} is not configured`);
    }
    if (options.appId && !credentials.appId) {
      throw TranslationProviderError.invalidConfiguration(`App ID for ${this.name} is not configured`);
    }
    return credentials;
  }

  protected requireBaseUrl(): string {
    const baseUrl = this.config.baseUrl;
    if (!baseUrl) {
      throw TranslationProviderError.invalidConfiguration(`Base URL for ${this.name} is not configured`);
    }
    return baseUrl.replace(/\/+$/, '');
  }

  /**
   * Executa a requisição mapeando timeout e falhas de rede para connectionFailed
   */
  protected async request(url: string, init: RequestInit, options: TranslateOptions): Promise<HttpResponse> {
    try {
      return await httpRequest(url, init, { timeoutMs: this.config.timeoutMs, signal: options.signal });
    } catch (error) {
      if (error instanceof HttpTimeoutError || error instanceof HttpNetworkError) {
        throw TranslationProviderError.connectionFailed(sanitizeErrorMessage(error.message), error);
      }
      throw error;
    }
  }

  /**
   * Mapeamento padrão de status HTTP não-2xx
   */
  protected httpError(response: HttpResponse): TranslationProviderError {
    const message = sanitizeErrorMessage(extractApiMessage(response.text));
    const reason = `HTTP ${response.status}: ${message}`;

    switch (response.status) {
      case 401:
      case 403:
        return TranslationProviderError.invalidConfiguration(reason, response.status);
      case 429:
        return TranslationProviderError.rateLimited(parseRetryAfter(response.headers.get('retry-after')));
      case 502:
      case 503:
      case 504:
        return new TranslationProviderError('connectionFailed', reason, { statusCode: response.status });
      default:
        return TranslationProviderError.translationFailed(reason, response.status);
    }
  }
}
