import { afterEach, describe, expect, it, vi } from 'vitest';
import { HttpNetworkError, HttpTimeoutError, extractApiMessage, httpRequest, parseJson, parseRetryAfter } from './http';

function hangingFetch() {
  return vi.fn(
    (_url: string, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
      })
  );
}

describe('httpRequest', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns status and body text', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('hello', { status: 201 })));

    const response = await httpRequest('https://api.test', { method: 'POST' }, { timeoutMs: 1000 });

    expect(response.status).toBe(201);
    expect(response.ok).toBe(true);
    expect(response.text).toBe('hello');
  });

  it('rejects before fetching when already aborted', async () => {
    const fetchMock = vi.fn(async () => new Response('x'));
    vi.stubGlobal('fetch', fetchMock);
    const controller = new AbortController();
    controller.abort();

    await expect(httpRequest('https://api.test', {}, { timeoutMs: 1000, signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('reports timeouts', async () => {
    vi.stubGlobal('fetch', hangingFetch());

    await expect(httpRequest('https://api.test', {}, { timeoutMs: 10 })).rejects.toBeInstanceOf(HttpTimeoutError);
  });

  it('reports caller cancellation as AbortError', async () => {
    vi.stubGlobal('fetch', hangingFetch());
    const controller = new AbortController();

    const pending = httpRequest('https://api.test', {}, { timeoutMs: 5000, signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
  });

  it('unwraps the network failure cause', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:8989') });
      })
    );

    const error = await httpRequest('http://localhost:8989', {}, { timeoutMs: 1000 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpNetworkError);
    expect(error).toMatchObject({ message: 'connect ECONNREFUSED 127.0.0.1:8989' });
  });
});

describe('parseRetryAfter', () => {
  it('reads delay seconds', () => {
    expect(parseRetryAfter('120')).toBe(120);
    expect(parseRetryAfter('1.5')).toBe(2);
  });

  it('reads HTTP dates relative to now', () => {
    const now = Date.parse('2026-01-01T00:00:00Z');
    expect(parseRetryAfter('Thu, 01 Jan 2026 00:00:30 GMT', now)).toBe(30);
  });

  it('ignores missing or unreadable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('extractApiMessage', () => {
  it('finds nested and flat messages', () => {
    expect(extractApiMessage('{"error":{"message":"bad key"}}')).toBe('bad key');
    expect(extractApiMessage('{"error":"nope"}')).toBe('nope');
    expect(extractApiMessage('{"message":"flat"}')).toBe('flat');
  });

  it('falls back to the trimmed body', () => {
    expect(extractApiMessage('  Bad Gateway  ')).toBe('Bad Gateway');
    expect(extractApiMessage('')).toBe('Unknown error');
    expect(extractApiMessage('x'.repeat(250))).toBe(`${'x'.repeat(200)}...`);
  });

  it('parseJson returns null for invalid JSON', () => {
    expect(parseJson('{')).toBeNull();
  });
});
