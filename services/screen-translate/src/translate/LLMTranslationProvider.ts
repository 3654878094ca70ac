import { z } from 'zod';
import {
  BATCH_DELIMITER,
  BATCH_HINT,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  DEFAULT_TRANSLATION_PROMPT,
  ENGINE_CATALOG,
  ProviderConfig,
  TranslationEngineType,
  renderPrompt,
} from '@screenlingo/shared';
import { TranslationProviderError } from '../errors';
import { HttpResponse, parseJson } from '../http';
import { BaseTranslationProvider, ProviderDeps } from './BaseTranslationProvider';
import type { TranslateOptions } from './TranslationProvider';

/** Formato de API do modelo */
export type LLMDialect = 'openai' | 'anthropic' | 'gemini';

const ANTHROPIC_VERSION = '2023-06-01';

/** Linha contendo apenas "---" */
const SPLIT_PATTERN = /\r?\n[ \t]*---[ \t]*\r?\n/;

const OpenAIResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })) }).optional(),
      })
    )
    .min(1),
});

/**
 * Divide a resposta de um batch unido; retorna null quando o número de partes não bate
 */
export function splitBatchResponse(response: string, expected: number): string[] | null {
  const parts = response.trim().split(SPLIT_PATTERN).map((part) => part.trim());
  return parts.length === expected ? parts : null;
}

export interface LLMProviderOptions {
  dialect: LLMDialect;
}

/**
 * Tradução via LLM. Batch: junta os textos com "\n---\n" numa única
 * chamada e divide a resposta; se a contagem não bater, traduz um a um.
 */
export class LLMTranslationProvider extends BaseTranslationProvider {
  protected readonly dialect: LLMDialect;

  constructor(
    id: TranslationEngineType,
    config: Readonly<ProviderConfig>,
    deps: ProviderDeps,
    options: LLMProviderOptions
  ) {
    super(id, config, deps);
    this.dialect = options.dialect;
  }

  protected async translateText(
    text: string,
    fromLang: string | null,
    toLang: string,
    options: TranslateOptions
  ): Promise<string> {
    return this.complete(this.buildPrompt(text, fromLang, toLang), options);
  }

  protected async translateTexts(
    texts: string[],
    fromLang: string | null,
    toLang: string,
    options: TranslateOptions
  ): Promise<string[]> {
    if (texts.length === 1) {
      return [await this.translateText(texts[0], fromLang, toLang, options)];
    }

    const prompt = `${BATCH_HINT}\n\n${this.buildPrompt(texts.join(BATCH_DELIMITER), fromLang, toLang)}`;
    const response = await this.complete(prompt, options);
    const parts = splitBatchResponse(response, texts.length);
    if (parts) {
      return parts;
    }

    this.log.warn(
      { expected: texts.length },
      'Batch response did not split into the expected parts, translating one by one'
    );
    return super.translateTexts(texts, fromLang, toLang, options);
  }

  async isAvailable(): Promise<boolean> {
    if (ENGINE_CATALOG[this.id].requiresApiKey) {
      return this.credentials.hasCredentials(this.id);
    }
    return Boolean(this.config.baseUrl && this.config.modelName);
  }

  protected buildPrompt(text: string, fromLang: string | null, toLang: string): string {
    return renderPrompt(this.config.promptTemplate ?? DEFAULT_TRANSLATION_PROMPT, {
      sourceLanguage: fromLang,
      targetLanguage: toLang,
      text,
    });
  }

  /**
   * Chave da API; opcional para motores que não exigem autenticação
   */
  protected async resolveApiKey(): Promise<string | null> {
    if (ENGINE_CATALOG[this.id].requiresApiKey) {
      return (await this.requireCredentials()).apiKey;
    }
    const credentials = await this.credentials.getCredentials(this.id);
    return credentials?.apiKey || null;
  }

  protected requireModel(): string {
    const model = this.config.modelName;
    if (!model) {
      throw TranslationProviderError.invalidConfiguration(`Model for ${this.name} is not configured`);
    }
    return model;
  }

  private async complete(prompt: string, options: TranslateOptions): Promise<string> {
    const baseUrl = this.requireBaseUrl();
    const model = this.requireModel();
    const apiKey = await this.resolveApiKey();
    const temperature = this.config.temperature ?? DEFAULT_TEMPERATURE;
    const maxTokens = this.config.maxTokens ?? DEFAULT_MAX_TOKENS;

    this.log.debug({ model, dialect: this.dialect }, 'Calling LLM translation API');

    const response = await this.send(prompt, { baseUrl, model, apiKey, temperature, maxTokens }, options);

    if (!response.ok) {
      throw this.httpError(response);
    }

    const content = this.extractContent(parseJson(response.text)).trim();
    if (!content) {
      throw TranslationProviderError.translationFailed(`${this.name} returned an empty response`);
    }
    return content;
  }

  private send(
    prompt: string,
    params: { baseUrl: string; model: string; apiKey: string | null; temperature: number; maxTokens: number },
    options: TranslateOptions
  ): Promise<HttpResponse> {
    const { baseUrl, model, apiKey, temperature, maxTokens } = params;
    switch (this.dialect) {
      case 'openai': {
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (apiKey) {
          headers.Authorization = `Bearer ${apiKey}`;
        }
        return this.request(
          `${baseUrl}/chat/completions`,
          {
            method: 'POST',
            headers,
            body: JSON.stringify({
              model,
              messages: [{ role: 'user', content: prompt }],
              temperature,
              max_tokens: maxTokens,
            }),
          },
          options
        );
      }
      case 'anthropic':
        return this.request(
          `${baseUrl}/messages`,
          {
            method: 'POST',
            headers: {
              'Content-Type': 'application/json',
              'x-api-key': apiKey ?? '',
              'anthropic-version': ANTHROPIC_VERSION,
            },
            body: JSON.stringify({
              model,
              max_tokens: maxTokens,
              temperature,
              messages: [{ role: 'user', content: prompt }],
            }),
          },
          options
        );
      case 'gemini':
        return this.request(
          `${baseUrl}/models/${encodeURIComponent(model)}:generateContent?key=${encodeURIComponent(apiKey ?? '')}`,
          {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({
              contents: [{ role: 'user', parts: [{ text: prompt }] }],
              generationConfig: { temperature, maxOutputTokens: maxTokens },
            }),
          },
          options
        );
    }
  }

  private extractContent(data: unknown): string {
    switch (this.dialect) {
      case 'openai': {
        const parsed = OpenAIResponseSchema.safeParse(data);
        if (!parsed.success) break;
        return parsed.data.choices[0].message.content ?? '';
      }
      case 'anthropic': {
        const parsed = AnthropicResponseSchema.safeParse(data);
        if (!parsed.success) break;
        return parsed.data.content
          .filter((block) => block.type === 'text')
          .map((block) => block.text ?? '')
          .join('');
      }
      case 'gemini': {
        const parsed = GeminiResponseSchema.safeParse(data);
        if (!parsed.success) break;
        return (parsed.data.candidates[0].content?.parts ?? []).map((part) => part.text ?? '').join('');
      }
    }
    throw TranslationProviderError.translationFailed(`Unexpected response from ${this.name}`);
  }
}

/**
 * Endpoint compatível com OpenAI configurado pelo usuário (URL e modelo próprios, chave opcional)
 */
export class CompatibleProvider extends LLMTranslationProvider {
  constructor(config: Readonly<ProviderConfig>, deps: ProviderDeps) {
    super('custom', config, deps, { dialect: 'openai' });
  }
}
