import { createHash, randomInt } from 'crypto';
import { z } from 'zod';
import type { ProviderConfig } from '@screenlingo/shared';
import { TranslationProviderError } from '../errors';
import { parseJson } from '../http';
import { BaseTranslationProvider, ProviderDeps } from './BaseTranslationProvider';
import type { TranslateOptions } from './TranslationProvider';

const BaiduResponseSchema = z.object({
  trans_result: z.array(z.object({ src: z.string(), dst: z.string() })).optional(),
  error_code: z.union([z.string(), z.number()]).optional(),
  error_msg: z.string().optional(),
});

const CONFIGURATION_ERRORS = new Set(['52003', '54001', '58000', '58001', '90107']);
const RATE_LIMIT_ERRORS = new Set(['54003', '54005']);

// Baidu usa códigos próprios para alguns idiomas
const LANGUAGE_CODES: Record<string, string> = {
  auto: 'auto',
  zh: 'zh',
  'zh-hans': 'zh',
  'zh-hant': 'cht',
  ja: 'jp',
  ko: 'kor',
  fr: 'fra',
  es: 'spa',
  ar: 'ara',
  vi: 'vie',
};

export function baiduSign(appId: string, text: string, salt: string, secret: string): string {
  return createHash('md5').update(`${appId}${text}${salt}${secret}`, 'utf8').digest('hex');
}

/**
 * Baidu Translate: GET assinado (sign = md5(appid + q + salt + key))
 */
export class BaiduProvider extends BaseTranslationProvider {
  constructor(config: Readonly<ProviderConfig>, deps: ProviderDeps) {
    super('baidu', config, deps);
  }

  async isAvailable(): Promise<boolean> {
    const credentials = await this.credentials.getCredentials(this.id);
    return Boolean(credentials?.apiKey && credentials.appId);
  }

  protected async translateText(
    text: string,
    fromLang: string | null,
    toLang: string,
    options: TranslateOptions
  ): Promise<string> {
    const baseUrl = this.requireBaseUrl();
    const { apiKey, appId = '' } = await this.requireCredentials({ appId: true });
    const salt = `${Date.now()}${randomInt(1000, 10000)}`;

    const params = new URLSearchParams({
      q: text,
      from: this.mapLang(fromLang ?? 'auto'),
      to: this.mapLang(toLang),
      appid: appId,
      salt,
      sign: baiduSign(appId, text, salt, apiKey),
    });

    const response = await this.request(`${baseUrl}?${params.toString()}`, { method: 'GET' }, options);
    if (!response.ok) {
      throw this.httpError(response);
    }

    const parsed = BaiduResponseSchema.safeParse(parseJson(response.text));
    if (!parsed.success) {
      throw TranslationProviderError.translationFailed('Unexpected response from Baidu');
    }

    const data = parsed.data;
    if (data.error_code !== undefined && String(data.error_code) !== '52000') {
      throw this.apiError(String(data.error_code), data.error_msg);
    }
    if (!data.trans_result || data.trans_result.length === 0) {
      throw TranslationProviderError.translationFailed('Baidu returned no translation');
    }
    // Texto com várias linhas volta como vários itens
    return data.trans_result.map((item) => item.dst).join('\n');
  }

  private apiError(code: string, message?: string): TranslationProviderError {
    const reason = `Baidu error ${code}${message ? `: ${message}` : ''}`;
    if (CONFIGURATION_ERRORS.has(code)) {
      return TranslationProviderError.invalidConfiguration(reason);
    }
    if (RATE_LIMIT_ERRORS.has(code)) {
      return TranslationProviderError.rateLimited();
    }
    return TranslationProviderError.translationFailed(reason);
  }

  private mapLang(lang: string): string {
    const normalized = lang.toLowerCase();
    return LANGUAGE_CODES[normalized] ?? normalized.split('-')[0];
  }
}
