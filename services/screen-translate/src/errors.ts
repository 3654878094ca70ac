import type { FlowErrorKind, TranslationEngineType } from '@screenlingo/shared';

export type ProviderErrorKind =
  | 'emptyInput'
  | 'invalidConfiguration'
  | 'connectionFailed'
  | 'translationFailed'
  | 'rateLimited';

const PROVIDER_ERROR_TITLES: Record<ProviderErrorKind, string> = {
  emptyInput: 'Input text is empty',
  invalidConfiguration: 'Invalid configuration',
  connectionFailed: 'Connection failed',
  translationFailed: 'Translation failed',
  rateLimited: 'Rate limited',
};

/**
 * Erro tipado de um provider de tradução
 */
export class TranslationProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly reason?: string;
  /** Segundos sugeridos pelo servidor (apenas rateLimited) */
  readonly retryAfter?: number;
  readonly statusCode?: number;

  constructor(
    kind: ProviderErrorKind,
    reason?: string,
    options: { retryAfter?: number; statusCode?: number; cause?: unknown } = {}
  ) {
    const title = PROVIDER_ERROR_TITLES[kind];
    let message = reason ? `${title}: ${reason}` : title;
    if (kind === 'rateLimited' && options.retryAfter !== undefined) {
      message = `${message} (retry after ${options.retryAfter}s)`;
    }
    super(message, { cause: options.cause });
    this.name = 'TranslationProviderError';
    this.kind = kind;
    this.reason = reason;
    this.retryAfter = options.retryAfter;
    this.statusCode = options.statusCode;
  }

  static emptyInput(): TranslationProviderError {
    return new TranslationProviderError('emptyInput');
  }

  static invalidConfiguration(reason: string, statusCode?: number): TranslationProviderError {
    return new TranslationProviderError('invalidConfiguration', reason, { statusCode });
  }

  static connectionFailed(reason: string, cause?: unknown): TranslationProviderError {
    return new TranslationProviderError('connectionFailed', reason, { cause });
  }

  static translationFailed(reason: string, statusCode?: number): TranslationProviderError {
    return new TranslationProviderError('translationFailed', reason, { statusCode });
  }

  static rateLimited(retryAfter?: number): TranslationProviderError {
    return new TranslationProviderError('rateLimited', undefined, { retryAfter, statusCode: 429 });
  }
}

export class AnalysisError extends Error {
  readonly statusCode?: number;

  constructor(reason: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(reason, { cause: options.cause });
    this.name = 'AnalysisError';
    this.statusCode = options.statusCode;
  }
}

export class AllEnginesFailedError extends Error {
  constructor(readonly failures: Array<{ engine: TranslationEngineType; error: unknown }>) {
    super(
      `All translation engines failed: ${failures
        .map((f) => `${f.engine} (${errorMessage(f.error)})`)
        .join(', ')}`
    );
    this.name = 'AllEnginesFailedError';
  }
}

export class CredentialStoreError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'CredentialStoreError';
  }
}

/** Cancelamento cooperativo (AbortSignal) */
export class AbortError extends Error {
  constructor(message = 'The operation was aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new AbortError();
  }
}

const FLOW_ERROR_TEXT: Record<FlowErrorKind, { description: string; recoverySuggestion?: string }> = {
  analysisFailure: {
    description: 'Could not analyze the screen image.',
    recoverySuggestion:
      'Check the vision provider settings and its API key, then try capturing again.',
  },
  translationFailure: {
    description: 'Could not translate the recognized text.',
    recoverySuggestion:
      'Check the translation engine configuration and API key, or configure a fallback engine.',
  },
  renderingFailure: {
    description: 'Could not compose the translated image.',
    recoverySuggestion: 'Try a smaller capture region or switch the overlay mode.',
  },
  cancelled: {
    description: 'The translation was cancelled.',
  },
  noTextFound: {
    description: 'No text was found in the captured region.',
    recoverySuggestion: 'Capture a region that contains readable text.',
  },
};

/**
 * Erro de uma fase do fluxo, com texto para o usuário
 */
export class FlowError extends Error {
  readonly kind: FlowErrorKind;
  readonly detail?: string;
  readonly description: string;
  readonly recoverySuggestion?: string;

  constructor(kind: FlowErrorKind, detail?: string, options: { cause?: unknown } = {}) {
    const text = FLOW_ERROR_TEXT[kind];
    super(detail ? `${text.description} ${detail}` : text.description, { cause: options.cause });
    this.name = 'FlowError';
    this.kind = kind;
    this.detail = detail;
    this.description = text.description;
    this.recoverySuggestion = text.recoverySuggestion;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Remove possíveis vazamentos de API keys de mensagens de erro
 */
export function sanitizeErrorMessage(message: string): string {
  return message
    .replace(/sk-[a-zA-Z0-9_-]{20,}/g, 'sk-***')
    .replace(/AIza[0-9A-Za-z_-]{35}/g, 'AIza***')
    .replace(/([?&]key=)[^&\s]+/g, '$1***')
    .replace(/(DeepL-Auth-Key\s+)\S+/g, '$1***')
    .replace(/(Bearer\s+)\S+/g, '$1***');
}
