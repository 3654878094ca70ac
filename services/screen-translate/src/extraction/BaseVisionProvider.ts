import type { VisionProviderId, VisionRequest, VisionResponse } from '@screenlingo/shared';
import { getLogger } from '@screenlingo/logger';
import { AnalysisError, errorMessage, isAbortError, sanitizeErrorMessage } from '../errors';
import {
  HttpNetworkError,
  HttpResponse,
  HttpTimeoutError,
  extractApiMessage,
  httpRequest,
  parseJson,
} from '../http';
import type { VisionProvider } from './VisionProvider';

const logger = getLogger();

/**
 * Classe base abstrata para providers de visão
 * Implementa lógica comum: timeout, error handling. Sem retries.
 */
export abstract class BaseVisionProvider implements VisionProvider {
  abstract id: VisionProviderId;

  /**
   * Analisa uma imagem (implementação específica do provider)
   */
  protected abstract analyzeImageInternal(req: VisionRequest, apiKey: string | null): Promise<VisionResponse>;

  async analyzeImage(req: VisionRequest, apiKey: string | null): Promise<VisionResponse> {
    try {
      return await this.analyzeImageInternal(req, apiKey);
    } catch (error) {
      if (isAbortError(error) || error instanceof AnalysisError) {
        throw error;
      }
      logger.error({ err: error, provider: this.id }, 'Image analysis failed');
      throw new AnalysisError(`${this.id} request failed: ${this.sanitizeError(error)}`, { cause: error });
    }
  }

  /**
   * POST JSON com timeout; status não-2xx vira AnalysisError
   */
  protected async postJson(
    url: string,
    headers: Record<string, string>,
    body: unknown,
    req: VisionRequest
  ): Promise<unknown> {
    let response: HttpResponse;
    try {
      response = await httpRequest(
        url,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', ...headers },
          body: JSON.stringify(body),
        },
        { timeoutMs: req.options.timeoutMs, signal: req.options.signal }
      );
    } catch (error) {
      if (error instanceof HttpTimeoutError || error instanceof HttpNetworkError) {
        throw new AnalysisError(`${this.id} request failed: ${this.sanitizeError(error)}`, { cause: error });
      }
      throw error;
    }

    if (!response.ok) {
      const message = sanitizeErrorMessage(extractApiMessage(response.text));
      logger.error({ status: response.status, provider: this.id }, 'Vision API error');

      if (response.status === 401 || response.status === 403) {
        throw new AnalysisError(`${this.id} authentication failed (HTTP ${response.status}): ${message}`, {
          statusCode: response.status,
        });
      }
      if (response.status === 429) {
        throw new AnalysisError(`${this.id} rate limited the request`, { statusCode: 429 });
      }
      throw new AnalysisError(`${this.id} API error (HTTP ${response.status}): ${message}`, {
        statusCode: response.status,
      });
    }

    return parseJson(response.text);
  }

  /**
   * Sanitiza mensagens de erro (remove informações sensíveis)
   */
  protected sanitizeError(error: unknown): string {
    return sanitizeErrorMessage(errorMessage(error));
  }

  protected unexpected(): AnalysisError {
    return new AnalysisError(`Unexpected response from ${this.id}`);
  }
}
