/**
 * Tipos compartilhados para extração de texto via modelos de visão
 */

export const VISION_PROVIDER_IDS = ['openai', 'claude', 'gemini', 'ollama'] as const;

export type VisionProviderId = (typeof VISION_PROVIDER_IDS)[number];

export interface VisionModelInfo {
  id: VisionProviderId;
  name: string;
  defaultModel: string;
  defaultBaseUrl: string;
  requiresApiKey: boolean;
}

export const VISION_CATALOG: Record<VisionProviderId, VisionModelInfo> = {
  openai: {
    id: 'openai',
    name: 'OpenAI',
    defaultModel: 'gpt-4o',
    defaultBaseUrl: 'https://api.openai.com/v1',
    requiresApiKey: true,
  },
  claude: {
    id: 'claude',
    name: 'Claude',
    defaultModel: 'claude-sonnet-4-20250514',
    defaultBaseUrl: 'https://api.anthropic.com/v1',
    requiresApiKey: true,
  },
  gemini: {
    id: 'gemini',
    name: 'Gemini',
    defaultModel: 'gemini-2.5-flash',
    defaultBaseUrl: 'https://generativelanguage.googleapis.com/v1beta',
    requiresApiKey: true,
  },
  ollama: {
    id: 'ollama',
    name: 'Ollama',
    defaultModel: 'llava',
    defaultBaseUrl: 'http://localhost:11434',
    requiresApiKey: false,
  },
};

export interface VisionRequest {
  image: {
    base64Raw: string;
    mimeType: string;
  };
  prompt: string;
  options: {
    modelName: string;
    baseUrl: string;
    timeoutMs: number;
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
  };
}

export interface VisionResponse {
  answerText: string;
  usage?: {
    tokensIn?: number;
    tokensOut?: number;
  };
  modelUsed: string;
  providerUsed: VisionProviderId;
}
