import type { TranslationEngineType, TranslationResult } from '@screenlingo/shared';

export interface TranslateOptions {
  signal?: AbortSignal;
}

export interface TranslationProvider {
  readonly id: TranslationEngineType;
  readonly name: string;
  isAvailable(): Promise<boolean>;
  translate(
    text: string,
    fromLang: string | null,
    toLang: string,
    options?: TranslateOptions
  ): Promise<TranslationResult>;
  /** Exatamente um resultado por texto, na mesma ordem, ou rejeita */
  translateBatch(
    texts: string[],
    fromLang: string | null,
    toLang: string,
    options?: TranslateOptions
  ): Promise<TranslationResult[]>;
  /** Traduz "Hello" (en -> zh); nunca rejeita */
  checkConnection(): Promise<boolean>;
}
