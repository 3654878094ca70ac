import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import sharp from 'sharp';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigManager, defaultConfig } from '@screenlingo/config';
import { ScreenTranslator, createScreenTranslator, engineConfig, flowSettings } from './app';
import type { ProcessRunner } from './translate/ArgosProvider';

const noPython: ProcessRunner = async () => ({ code: 127, stdout: '', stderr: 'not found', timedOut: false });

function createApp(): ScreenTranslator {
  const config = new ConfigManager({ cwd: mkdtempSync(join(tmpdir(), 'screenlingo-app-')) });
  return createScreenTranslator({
    config,
    databasePath: ':memory:',
    masterKey: 'test-secret',
    pythonRunner: noPython,
  });
}

describe('engineConfig', () => {
  it('merges user overrides over the catalog', () => {
    const config = {
      ...defaultConfig,
      translation: {
        ...defaultConfig.translation,
        engines: { custom: { baseUrl: 'http://llm.test/v1', modelName: 'local-model' } },
      },
    };

    expect(engineConfig(config, 'custom')).toMatchObject({
      baseUrl: 'http://llm.test/v1',
      modelName: 'local-model',
      timeoutMs: 60000,
    });
    expect(engineConfig(config, 'deepl').baseUrl).toBe('https://api.deepl.com/v2/translate');
  });
});

describe('flowSettings', () => {
  it('maps auto-detection to a null source', () => {
    expect(flowSettings(defaultConfig)).toEqual({
      sourceLanguage: null,
      targetLanguage: 'zh',
      preferredEngine: 'local',
      fallbackEngine: null,
      overlay: defaultConfig.overlay,
    });
  });
});

describe('createScreenTranslator', () => {
  let app: ScreenTranslator | null = null;

  afterEach(() => {
    app?.close();
    app = null;
  });

  it('stores credentials encrypted in the database', async () => {
    app = createApp();

    await app.credentials.saveCredentials('deepl', { apiKey: 'test-key-1234' });

    expect(await app.credentials.getCredentials('deepl')).toEqual({ apiKey: 'test-key-1234' });
    expect(await app.registry.isEngineConfigured('deepl')).toBe(true);
    expect(app.registry.registeredEngines()).toEqual(['local', 'mtran']);
  });

  it('translates a capture end to end and records history', async () => {
    app = createApp();
    app.config.update('translation', { preferredEngine: 'deepl', targetLanguage: 'de' });
    await app.credentials.saveCredentials('openai', { apiKey: 'test-secret' });
    await app.credentials.saveCredentials('deepl', { apiKey: 'test-secret' });

    const segmentsJson = JSON.stringify({ segments: [{ text: 'Hello', bbox: [0.1, 0.1, 0.4, 0.3], confidence: 0.9 }] });
    vi.stubGlobal(
      'fetch',
      vi.fn(async (url: string) => {
        if (url.startsWith('https://api.openai.com/')) {
          return new Response(JSON.stringify({ choices: [{ message: { content: segmentsJson } }] }));
        }
        if (url.startsWith('https://api.deepl.com/')) {
          return new Response(JSON.stringify({ translations: [{ text: 'Hallo' }] }));
        }
        return new Response('not found', { status: 404 });
      })
    );

    const data = await sharp({ create: { width: 200, height: 100, channels: 3, background: '#ffffff' } })
      .png()
      .toBuffer();
    const outcome = await app.controller.start({ data, width: 200, height: 100, scaleFactor: 1 });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.result.engine).toBe('deepl');
    expect(outcome.result.segments.map((s) => [s.original.text, s.translated])).toEqual([['Hello', 'Hallo']]);
    expect((await sharp(outcome.result.image).metadata()).width).toBe(200);

    const [entry] = app.history.list();
    expect(entry).toMatchObject({ engine: 'deepl', sourceText: 'Hello', translatedText: 'Hallo', targetLanguage: 'de' });
  });

  it('fails the flow when the local engine has no Python', async () => {
    app = createApp();
    await app.credentials.saveCredentials('openai', { apiKey: 'test-secret' });
    const segmentsJson = JSON.stringify({ segments: [{ text: 'Hello', bbox: [0.1, 0.1, 0.4, 0.3] }] });
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response(JSON.stringify({ choices: [{ message: { content: segmentsJson } }] })))
    );

    const data = await sharp({ create: { width: 50, height: 50, channels: 3, background: '#ffffff' } })
      .png()
      .toBuffer();
    const outcome = await app.controller.start({ data, width: 50, height: 50, scaleFactor: 1 });

    expect(outcome).toMatchObject({ ok: false, error: { kind: 'translationFailure' } });
    expect(app.history.list()).toEqual([]);
  });
});
