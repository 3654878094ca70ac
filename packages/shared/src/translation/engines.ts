/**
 * Motores de tradução suportados.
 */
export const TRANSLATION_ENGINE_TYPES = [
  'local',
  'mtran',
  'baidu',
  'google',
  'deepl',
  'openai',
  'claude',
  'gemini',
  'ollama',
  'custom',
] as const;

export type TranslationEngineType = (typeof TRANSLATION_ENGINE_TYPES)[number];

export function isTranslationEngineType(value: string): value is TranslationEngineType {
  return TRANSLATION_ENGINE_TYPES.some((type) => type === value);
}

/**
 * Configuração de um provider, montada uma vez na criação e depois congelada.
 */
export type ProviderConfig = {
  baseUrl?: string;
  modelName?: string;
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
  promptTemplate?: string;
};

export type StoredCredentials = {
  apiKey: string;
  appId?: string;
};

export type EngineInfo = {
  id: TranslationEngineType;
  name: string;
  requiresApiKey: boolean;
  requiresAppId: boolean;
  /** Motores baseados em prompt (LLM) fazem batch por junção/divisão. */
  promptDriven: boolean;
  defaultBaseUrl?: string;
  defaultModel?: string;
  defaultTimeoutMs: number;
};

export const ENGINE_CATALOG: Record<TranslationEngineType, EngineInfo> = {
  local: {
    id: 'local',
    name: 'Argos Translate (offline)',
    requiresApiKey: false,
    requiresAppId: false,
    promptDriven: false,
    defaultTimeoutMs: 30000,
  },
  mtran: {
    id: 'mtran',
    name: 'MTranServer',
    requiresApiKey: false,
    requiresAppId: false,
    promptDriven: false,
    defaultBaseUrl: 'http://localhost:8989',
    defaultTimeoutMs: 10000,
  },
  baidu: {
    id: 'baidu',
    name: 'Baidu Translate',
    requiresApiKey: true,
    requiresAppId: true,
    promptDriven: false,
    defaultBaseUrl: 'https://fanyi-api.baidu.com/api/trans/vip/translate',
    defaultTimeoutMs: 30000,
  },
  google: {
    id: 'google',
    name: 'Google Cloud Translation',
    requiresApiKey: true,
    requiresAppId: false,
    promptDriven: false,
    defaultBaseUrl: 'https://translation.googleapis.com/language/translate/v2',
    defaultTimeoutMs: 30000,
  },
  deepl: {
    id: 'deepl',
    name: 'DeepL',
    requiresApiKey: true,
    requiresAppId: false,
    promptDriven: false,
    defaultBaseUrl: 'https://api.deepl.com/v2/translate',
    defaultTimeoutMs: 30000,
  },
  openai: {
    id: 'openai',
    name: 'OpenAI',
    requiresApiKey: true,
    requiresAppId: false,
    promptDriven: true,
    defaultBaseUrl: 'https://api.openai.com/v1',
    defaultModel: 'gpt-4o-mini',
    defaultTimeoutMs: 30000,
  },
  claude: {
    id: 'claude',
    name: 'Claude',
    requiresApiKey: true,
    requiresAppId: false,
    promptDriven: true,
    defaultBaseUrl: 'https://api.anthropic.com/v1',
    defaultModel: 'claude-sonnet-4-20250514',
    defaultTimeoutMs: 30000,
  },
  gemini: {
    id: 'gemini',
    name: 'Gemini',
    requiresApiKey: true,
    requiresAppId: false,
    promptDriven: true,
    defaultBaseUrl: 'https://generativelanguage.googleapis.com/v1beta',
    defaultModel: 'gemini-2.5-flash',
    defaultTimeoutMs: 30000,
  },
  ollama: {
    id: 'ollama',
    name: 'Ollama',
    requiresApiKey: false,
    requiresAppId: false,
    promptDriven: true,
    defaultBaseUrl: 'http://localhost:11434/v1',
    defaultModel: 'llama3.2',
    defaultTimeoutMs: 60000,
  },
  custom: {
    id: 'custom',
    name: 'OpenAI-compatible',
    requiresApiKey: false,
    requiresAppId: false,
    promptDriven: true,
    defaultTimeoutMs: 60000,
  },
};

export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_MAX_TOKENS = 2048;

/**
 * Monta a configuração efetiva de um motor a partir do catálogo e de overrides.
 */
export function resolveProviderConfig(
  engine: TranslationEngineType,
  overrides: Partial<ProviderConfig> = {}
): Readonly<ProviderConfig> {
  const info = ENGINE_CATALOG[engine];
  const config: ProviderConfig = {
    baseUrl: overrides.baseUrl ?? info.defaultBaseUrl,
    modelName: overrides.modelName ?? info.defaultModel,
    timeoutMs: overrides.timeoutMs ?? info.defaultTimeoutMs,
    temperature: overrides.temperature ?? (info.promptDriven ? DEFAULT_TEMPERATURE : undefined),
    maxTokens: overrides.maxTokens ?? (info.promptDriven ? DEFAULT_MAX_TOKENS : undefined),
    promptTemplate: overrides.promptTemplate,
  };
  return Object.freeze(config);
}
