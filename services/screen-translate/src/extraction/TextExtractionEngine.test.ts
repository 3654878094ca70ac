import sharp from 'sharp';
import { describe, expect, it } from 'vitest';
import type { CapturedImage, VisionProviderId, VisionRequest, VisionResponse } from '@screenlingo/shared';
import { AbortError, AnalysisError } from '../errors';
import { InMemoryCredentialStore } from '../storage/CredentialStore';
import { EXTRACTION_PROMPT, TextExtractionEngine, VisionSettings, extractJsonPayload, parseSegments } from './TextExtractionEngine';
import type { VisionProvider } from './VisionProvider';

class FakeVisionProvider implements VisionProvider {
  requests: Array<{ req: VisionRequest; apiKey: string | null }> = [];

  constructor(
    readonly id: VisionProviderId,
    private readonly answerText: string
  ) {}

  async analyzeImage(req: VisionRequest, apiKey: string | null): Promise<VisionResponse> {
    this.requests.push({ req, apiKey });
    return { answerText: this.answerText, modelUsed: req.options.modelName, providerUsed: this.id };
  }
}

const ANSWER = JSON.stringify({
  segments: [
    { text: ' Settings ', bbox: [0.25, 0.125, 0.75, 0.375], confidence: 0.875 },
    { text: 'Overflow', bbox: [0.75, 0.75, 1.5, 1.25] },
  ],
});

async function whiteImage(width = 40, height = 20): Promise<CapturedImage> {
  const data = await sharp({ create: { width, height, channels: 3, background: '#ffffff' } })
    .png()
    .toBuffer();
  return { data, width, height, scaleFactor: 1 };
}

function settings(overrides: Partial<VisionSettings> = {}): () => VisionSettings {
  return () => ({
    provider: 'openai',
    timeoutMs: 1000,
    maxImageDimension: 2048,
    jpegQuality: 85,
    ...overrides,
  });
}

describe('extractJsonPayload', () => {
  it('parses bare JSON', () => {
    expect(extractJsonPayload('{"segments":[]}')).toEqual({ segments: [] });
  });

  it('parses a fenced block', () => {
    expect(extractJsonPayload('Here you go:\n```json\n{"segments":[]}\n```\nDone.')).toEqual({ segments: [] });
  });

  it('parses an object surrounded by prose', () => {
    expect(extractJsonPayload('Result: {"segments": []} hope it helps')).toEqual({ segments: [] });
  });

  it('throws when nothing parses', () => {
    expect(() => extractJsonPayload('no text here')).toThrow(AnalysisError);
  });
});

describe('parseSegments', () => {
  it('trims text, clamps boxes and confidence, numbers ids', () => {
    const segments = parseSegments(
      JSON.stringify({
        segments: [
          { text: ' Hello ', bbox: [0.25, 0.125, 0.75, 0.375], confidence: 1.3 },
          { text: 'Edge', bbox: [0.75, 0.75, 1.5, 1.25] },
        ],
      })
    );

    expect(segments).toEqual([
      { id: 'seg-1', text: 'Hello', bbox: { x: 0.25, y: 0.125, w: 0.5, h: 0.25 }, confidence: 1 },
      { id: 'seg-2', text: 'Edge', bbox: { x: 0.75, y: 0.75, w: 0.25, h: 0.25 }, confidence: 1 },
    ]);
  });

  it('drops blank, flat and malformed items', () => {
    const segments = parseSegments(
      JSON.stringify([
        { text: '   ', bbox: [0, 0, 0.5, 0.5] },
        { text: 'Flat', bbox: [0.5, 0.5, 0.5, 0.75] },
        { text: 'Outside', bbox: [1.25, 0.25, 1.5, 0.5] },
        { bbox: [0, 0, 0.5, 0.5] },
        { text: 'Short', bbox: [0, 0.5] },
        { text: 'Kept', bbox: [0, 0, 0.5, 0.5], confidence: -2 },
      ])
    );

    expect(segments).toEqual([{ id: 'seg-1', text: 'Kept', bbox: { x: 0, y: 0, w: 0.5, h: 0.5 }, confidence: 0 }]);
  });

  it('rejects JSON of another shape', () => {
    expect(() => parseSegments('{"text":"Hello"}')).toThrow('Vision model returned an unexpected JSON shape');
  });
});

describe('TextExtractionEngine', () => {
  it('sends a downscaled JPEG with the extraction prompt', async () => {
    const provider = new FakeVisionProvider('openai', ANSWER);
    const engine = new TextExtractionEngine({
      credentials: new InMemoryCredentialStore({ openai: { apiKey: 'test-secret' } }),
      settings: settings(),
    });
    engine.registerProvider(provider);

    const result = await engine.analyze(await whiteImage());

    expect(result.imageSize).toEqual({ width: 40, height: 20 });
    expect(result.segments.map((s) => s.text)).toEqual(['Settings', 'Overflow']);
    expect(result.segments[0].confidence).toBe(0.875);
    const [{ req, apiKey }] = provider.requests;
    expect(apiKey).toBe('test-secret');
    expect(req.prompt).toBe(EXTRACTION_PROMPT);
    expect(req.image.mimeType).toBe('image/jpeg');
    expect(req.options).toMatchObject({
      modelName: 'gpt-4o',
      baseUrl: 'https://api.openai.com/v1',
      timeoutMs: 1000,
      temperature: 0,
    });
    const sent = await sharp(Buffer.from(req.image.base64Raw, 'base64')).metadata();
    expect(sent.format).toBe('jpeg');
    expect(sent.width).toBe(40);
  });

  it('limits the longest side to the configured dimension', async () => {
    const provider = new FakeVisionProvider('openai', ANSWER);
    const engine = new TextExtractionEngine({
      credentials: new InMemoryCredentialStore({ openai: { apiKey: 'test-secret' } }),
      settings: settings({ maxImageDimension: 20 }),
    });
    engine.registerProvider(provider);

    await engine.analyze(await whiteImage(40, 20));

    const sent = await sharp(Buffer.from(provider.requests[0].req.image.base64Raw, 'base64')).metadata();
    expect(sent.width).toBe(20);
    expect(sent.height).toBe(10);
  });

  it('uses configured model and endpoint without a key for local models', async () => {
    const provider = new FakeVisionProvider('ollama', '{"segments":[]}');
    const engine = new TextExtractionEngine({
      credentials: new InMemoryCredentialStore(),
      settings: settings({ provider: 'ollama', modelName: 'llava:13b', baseUrl: 'http://gpu.test:11434/' }),
    });
    engine.registerProvider(provider);

    const result = await engine.analyze(await whiteImage());

    expect(result.segments).toEqual([]);
    expect(provider.requests[0].apiKey).toBeNull();
    expect(provider.requests[0].req.options).toMatchObject({ modelName: 'llava:13b', baseUrl: 'http://gpu.test:11434' });
  });

  it('fails without an API key', async () => {
    const provider = new FakeVisionProvider('openai', ANSWER);
    const engine = new TextExtractionEngine({ credentials: new InMemoryCredentialStore(), settings: settings() });
    engine.registerProvider(provider);

    await expect(engine.analyze(await whiteImage())).rejects.toThrow('No API key configured for OpenAI');
    expect(provider.requests).toHaveLength(0);
  });

  it('fails on undecodable image data', async () => {
    const engine = new TextExtractionEngine({
      credentials: new InMemoryCredentialStore({ openai: { apiKey: 'test-secret' } }),
      settings: settings(),
    });
    engine.registerProvider(new FakeVisionProvider('openai', ANSWER));

    const image: CapturedImage = { data: Buffer.from('not an image'), width: 10, height: 10, scaleFactor: 1 };

    await expect(engine.analyze(image)).rejects.toThrow(/^Could not decode the captured image/);
  });

  it('fails when the model answer is not JSON', async () => {
    const engine = new TextExtractionEngine({
      credentials: new InMemoryCredentialStore({ openai: { apiKey: 'test-secret' } }),
      settings: settings(),
    });
    engine.registerProvider(new FakeVisionProvider('openai', 'I cannot read this image.'));

    await expect(engine.analyze(await whiteImage())).rejects.toThrow('Vision model did not return JSON');
  });

  it('stops when the signal is already aborted', async () => {
    const provider = new FakeVisionProvider('openai', ANSWER);
    const engine = new TextExtractionEngine({
      credentials: new InMemoryCredentialStore({ openai: { apiKey: 'test-secret' } }),
      settings: settings(),
    });
    engine.registerProvider(provider);
    const controller = new AbortController();
    controller.abort();

    await expect(engine.analyze(await whiteImage(), controller.signal)).rejects.toBeInstanceOf(AbortError);
    expect(provider.requests).toHaveLength(0);
  });
});
