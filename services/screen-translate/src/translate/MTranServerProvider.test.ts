import pino from 'pino';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { setLogger } from '@screenlingo/logger';
import { resolveProviderConfig } from '@screenlingo/shared';
import { InMemoryCredentialStore } from '../storage/CredentialStore';
import { MTranServerProvider } from './MTranServerProvider';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('MTranServerProvider', () => {
  it('posts text and languages to /translate', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ translation: 'Olá' }));
    vi.stubGlobal('fetch', fetchMock);
    const provider = new MTranServerProvider(resolveProviderConfig('mtran'), {
      credentials: new InMemoryCredentialStore(),
    });

    const result = await provider.translate('Hello', null, 'pt');

    expect(result).toEqual({ sourceText: 'Hello', translatedText: 'Olá', sourceLanguage: 'auto', targetLanguage: 'pt' });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:8989/translate');
    expect(JSON.parse(String(init?.body))).toEqual({ text: 'Hello', source_lang: 'auto', target_lang: 'pt' });
    expect(new Headers(init?.headers).get('authorization')).toBeNull();
  });

  it('accepts the "result" field and sends the optional token', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ result: 'Bonjour' }));
    vi.stubGlobal('fetch', fetchMock);
    const provider = new MTranServerProvider(resolveProviderConfig('mtran', { baseUrl: 'http://mt.test/' }), {
      credentials: new InMemoryCredentialStore({ mtran: { apiKey: 'test-secret' } }),
    });

    const result = await provider.translate('Hello', 'en', 'fr');

    expect(result.translatedText).toBe('Bonjour');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://mt.test/translate');
    expect(new Headers(init?.headers).get('authorization')).toBe('Bearer test-secret');
  });

  it('maps an unreachable server to connectionFailed', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED') });
      })
    );
    const provider = new MTranServerProvider(resolveProviderConfig('mtran'), {
      credentials: new InMemoryCredentialStore(),
    });

    await expect(provider.translate('Hello', 'en', 'zh')).rejects.toMatchObject({
      kind: 'connectionFailed',
      message: 'Connection failed: connect ECONNREFUSED',
    });
  });

  it('rejects blank input without a request', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ translation: 'x' }));
    vi.stubGlobal('fetch', fetchMock);
    const provider = new MTranServerProvider(resolveProviderConfig('mtran'), {
      credentials: new InMemoryCredentialStore(),
    });

    await expect(provider.translate('   ', 'en', 'zh')).rejects.toMatchObject({ kind: 'emptyInput' });
    await expect(provider.translateBatch(['ok', ''], 'en', 'zh')).rejects.toMatchObject({ kind: 'emptyInput' });
    expect(await provider.translateBatch([], 'en', 'zh')).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('is available when the health probe answers below 500', async () => {
    const fetchMock = vi.fn(async (url: string) =>
      url.endsWith('/health') ? new Response('', { status: 404 }) : new Response('ok')
    );
    vi.stubGlobal('fetch', fetchMock);
    const provider = new MTranServerProvider(resolveProviderConfig('mtran'), {
      credentials: new InMemoryCredentialStore(),
    });

    expect(await provider.isAvailable()).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('is unavailable when every probe fails', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 503 })));
    const provider = new MTranServerProvider(resolveProviderConfig('mtran'), {
      credentials: new InMemoryCredentialStore(),
    });

    expect(await provider.isAvailable()).toBe(false);
  });

  describe('logging', () => {
    afterEach(() => {
      setLogger(pino({ level: 'silent' }));
    });

    it('tags log lines with the engine id', async () => {
      const lines: string[] = [];
      setLogger(pino({ level: 'warn' }, { write: (line: string) => lines.push(line) }));
      vi.stubGlobal('fetch', vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({}, 401)));
      const provider = new MTranServerProvider(resolveProviderConfig('mtran'), {
        credentials: new InMemoryCredentialStore(),
      });

      expect(await provider.checkConnection()).toBe(false);

      const entries = lines.map((line): { engine?: string; msg?: string } => JSON.parse(line));
      expect(entries.find((entry) => entry.msg === 'Connection check failed')?.engine).toBe('mtran');
      expect(entries.find((entry) => entry.msg === 'Translation request failed')?.engine).toBe('mtran');
    });
  });
});
