import { AbortError } from './errors';

export interface HttpRequestOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  headers: Headers;
  text: string;
}

export class HttpTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
  }
}

export class HttpNetworkError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = 'HttpNetworkError';
  }
}

/**
 * fetch com timeout próprio e cancelamento vindo de fora.
 * O corpo é lido dentro da mesma janela de timeout.
 */
export async function httpRequest(
  url: string,
  init: RequestInit,
  options: HttpRequestOptions
): Promise<HttpResponse> {
  if (options.signal?.aborted) {
    throw new AbortError();
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onAbort = () => controller.abort();
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    const text = await response.text();
    return { status: response.status, ok: response.ok, headers: response.headers, text };
  } catch (error) {
    if (options.signal?.aborted) {
      throw new AbortError();
    }
    if (timedOut) {
      throw new HttpTimeoutError(options.timeoutMs);
    }
    const cause = error instanceof Error && error.cause instanceof Error ? error.cause : error;
    const message = cause instanceof Error ? cause.message : String(cause);
    throw new HttpNetworkError(message, { cause: error });
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
  }
}

export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Lê o header Retry-After em segundos (aceita também data HTTP)
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.ceil(seconds);
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, Math.ceil((date - now) / 1000));
}

/**
 * Extrai a mensagem de erro mais provável de um corpo de resposta de API
 */
export function extractApiMessage(text: string): string {
  const data = parseJson(text);
  if (data && typeof data === 'object') {
    const record: Record<string, unknown> = { ...data };
    const error = record.error;
    if (typeof error === 'string') {
      return error;
    }
    if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
    if (typeof record.message === 'string') {
      return record.message;
    }
  }
  const trimmed = text.trim();
  return trimmed.length > 200 ? `${trimmed.slice(0, 200)}...` : trimmed || 'Unknown error';
}
