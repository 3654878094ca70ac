import type {
  BilingualSegment,
  ProviderConfig,
  TextSegment,
  TranslationEngineType,
} from '@screenlingo/shared';
import { getLogger } from '@screenlingo/logger';
import {
  AllEnginesFailedError,
  TranslationProviderError,
  errorMessage,
  isAbortError,
  throwIfAborted,
} from '../errors';
import type { ProviderRegistry } from './ProviderRegistry';
import type { TranslationProvider } from './TranslationProvider';

const logger = getLogger();

export interface TranslateRequest {
  to: string;
  /** null ou 'auto' para detecção automática */
  from?: string | null;
  preferredEngine: TranslationEngineType;
  fallbackEngine?: TranslationEngineType | null;
  signal?: AbortSignal;
}

export interface EngineTranslation {
  engine: TranslationEngineType;
  segments: BilingualSegment[];
}

export interface EngineComparison {
  engine: TranslationEngineType;
  segments?: BilingualSegment[];
  error?: string;
  latencyMs: number;
}

/**
 * Traduz segmentos com o motor preferido e, se falhar, uma única vez com o reserva.
 * Sem novas tentativas no mesmo provider.
 */
export class TranslationOrchestrator {
  constructor(
    private readonly registry: ProviderRegistry,
    private readonly configFor: (type: TranslationEngineType) => Readonly<ProviderConfig>
  ) {}

  async translate(segments: TextSegment[], request: TranslateRequest): Promise<BilingualSegment[]> {
    return (await this.translateWithEngine(segments, request)).segments;
  }

  /**
   * Igual a translate(), informando qual motor produziu o resultado
   */
  async translateWithEngine(segments: TextSegment[], request: TranslateRequest): Promise<EngineTranslation> {
    if (segments.length === 0) {
      return { engine: request.preferredEngine, segments: [] };
    }

    try {
      const result = await this.attempt(request.preferredEngine, segments, request);
      return { engine: request.preferredEngine, segments: result };
    } catch (error) {
      const fallback = request.fallbackEngine;
      if (isAbortError(error) || !fallback || fallback === request.preferredEngine) {
        throw error;
      }

      logger.warn(
        { engine: request.preferredEngine, fallback, reason: errorMessage(error) },
        'Preferred engine failed, using fallback'
      );

      try {
        const result = await this.attempt(fallback, segments, request);
        return { engine: fallback, segments: result };
      } catch (fallbackError) {
        if (isAbortError(fallbackError)) {
          throw fallbackError;
        }
        throw new AllEnginesFailedError([
          { engine: request.preferredEngine, error },
          { engine: fallback, error: fallbackError },
        ]);
      }
    }
  }

  /**
   * Executa vários motores em paralelo sobre os mesmos segmentos
   */
  async compare(
    segments: TextSegment[],
    engines: TranslationEngineType[],
    request: Omit<TranslateRequest, 'preferredEngine' | 'fallbackEngine'>
  ): Promise<EngineComparison[]> {
    return Promise.all(
      engines.map(async (engine): Promise<EngineComparison> => {
        const startedAt = Date.now();
        try {
          const result = await this.attempt(engine, segments, { ...request, preferredEngine: engine });
          return { engine, segments: result, latencyMs: Date.now() - startedAt };
        } catch (error) {
          if (isAbortError(error)) {
            throw error;
          }
          return { engine, error: errorMessage(error), latencyMs: Date.now() - startedAt };
        }
      })
    );
  }

  async testConnection(engine: TranslationEngineType): Promise<boolean> {
    try {
      const provider = await this.resolve(engine);
      return await provider.checkConnection();
    } catch (error) {
      logger.warn({ err: error, engine }, 'Could not create provider for connection test');
      return false;
    }
  }

  private async resolve(engine: TranslationEngineType): Promise<TranslationProvider> {
    return this.registry.provider(engine) ?? this.registry.createProvider(engine, this.configFor(engine));
  }

  private async attempt(
    engine: TranslationEngineType,
    segments: TextSegment[],
    request: TranslateRequest
  ): Promise<BilingualSegment[]> {
    throwIfAborted(request.signal);
    const provider = await this.resolve(engine);
    const from = request.from && request.from !== 'auto' ? request.from : null;
    const startedAt = Date.now();

    const results = await provider.translateBatch(
      segments.map((segment) => segment.text),
      from,
      request.to,
      { signal: request.signal }
    );

    // Contagem diferente é defeito do provider: nunca zipar parcialmente
    if (results.length !== segments.length) {
      throw TranslationProviderError.translationFailed(
        `expected ${segments.length} results, got ${results.length}`
      );
    }

    logger.info(
      { engine, count: segments.length, latencyMs: Date.now() - startedAt },
      'Segments translated'
    );

    return segments.map((segment, index) => ({
      id: segment.id,
      original: segment,
      translated: results[index].translatedText,
      sourceLanguage: results[index].sourceLanguage,
      targetLanguage: results[index].targetLanguage,
    }));
  }
}
