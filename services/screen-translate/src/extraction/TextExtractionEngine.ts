import { z } from 'zod';
import {
  CapturedImage,
  ScreenAnalysisResult,
  TextSegment,
  VISION_CATALOG,
  VisionProviderId,
  clampCorners,
} from '@screenlingo/shared';
import { getLogger } from '@screenlingo/logger';
import { AnalysisError, errorMessage, throwIfAborted } from '../errors';
import type { CredentialStore } from '../storage/CredentialStore';
import { PreparedImage, prepareForVision } from './imageProcessor';
import { createVisionProvider } from './providers';
import type { VisionProvider } from './VisionProvider';

const logger = getLogger();

export const EXTRACTION_PROMPT = [
  'You are a precise OCR engine. Find every piece of readable text in this screenshot.',
  'Group words that belong to the same line or short paragraph into one segment.',
  'Respond with JSON only, in exactly this shape:',
  '{"segments":[{"text":"...","bbox":[x1,y1,x2,y2],"confidence":0.95}]}',
  'bbox holds the top-left (x1,y1) and bottom-right (x2,y2) corners, normalized to 0..1',
  'relative to the image width and height. confidence is between 0 and 1.',
  'If there is no text, respond with {"segments":[]}.',
].join('\n');

const RawSegmentSchema = z.object({
  text: z.string(),
  bbox: z.tuple([z.number(), z.number(), z.number(), z.number()]),
  confidence: z.number().optional(),
});

const RawResponseSchema = z.union([
  z.object({ segments: z.array(z.unknown()) }),
  z.array(z.unknown()),
]);

export interface VisionSettings {
  provider: VisionProviderId;
  modelName?: string;
  baseUrl?: string;
  timeoutMs: number;
  maxImageDimension: number;
  jpegQuality: number;
}

export interface TextExtractionDeps {
  credentials: CredentialStore;
  settings: () => VisionSettings;
}

/**
 * Localiza o objeto JSON na resposta: puro, dentro de bloco ``` ou no meio de texto
 */
export function extractJsonPayload(answer: string): unknown {
  const trimmed = answer.trim();
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed);
  const candidates = [trimmed];
  if (fenced) {
    candidates.push(fenced[1].trim());
  }
  const firstBrace = trimmed.indexOf('{');
  const lastBrace = trimmed.lastIndexOf('}');
  if (firstBrace !== -1 && lastBrace > firstBrace) {
    candidates.push(trimmed.slice(firstBrace, lastBrace + 1));
  }

  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }
  throw new AnalysisError('Vision model did not return JSON');
}

/**
 * Converte a resposta do modelo em segmentos válidos.
 * Coordenadas são limitadas a [0,1]; caixas sem área e textos vazios são descartados.
 */
export function parseSegments(answer: string): TextSegment[] {
  const parsed = RawResponseSchema.safeParse(extractJsonPayload(answer));
  if (!parsed.success) {
    throw new AnalysisError('Vision model returned an unexpected JSON shape');
  }

  const items = Array.isArray(parsed.data) ? parsed.data : parsed.data.segments;
  const segments: TextSegment[] = [];
  let dropped = 0;

  for (const item of items) {
    const raw = RawSegmentSchema.safeParse(item);
    if (!raw.success) {
      dropped++;
      continue;
    }
    const text = raw.data.text.trim();
    const bbox = clampCorners(...raw.data.bbox);
    if (!text || !bbox) {
      dropped++;
      continue;
    }
    const confidence = raw.data.confidence ?? 1;
    segments.push({
      id: `seg-${segments.length + 1}`,
      text,
      bbox,
      confidence: Math.min(1, Math.max(0, confidence)),
    });
  }

  if (dropped > 0) {
    logger.debug({ dropped, kept: segments.length }, 'Dropped invalid segments');
  }
  return segments;
}

/**
 * Extrai segmentos de texto de uma captura usando um modelo de visão
 */
export class TextExtractionEngine {
  private providers = new Map<VisionProviderId, VisionProvider>();
  private readonly deps: TextExtractionDeps;

  constructor(deps: TextExtractionDeps) {
    this.deps = deps;
  }

  /**
   * Registra um provider (substitui o padrão para o mesmo id)
   */
  registerProvider(provider: VisionProvider): void {
    this.providers.set(provider.id, provider);
  }

  invalidateCache(): void {
    this.providers.clear();
  }

  async analyze(image: CapturedImage, signal?: AbortSignal): Promise<ScreenAnalysisResult> {
    throwIfAborted(signal);
    const settings = this.deps.settings();
    const info = VISION_CATALOG[settings.provider];
    const provider = this.getProvider(settings.provider);

    let apiKey: string | null = null;
    if (info.requiresApiKey) {
      const credentials = await this.deps.credentials.getCredentials(settings.provider);
      if (!credentials?.apiKey) {
        throw new AnalysisError(`No API key configured for ${info.name}`);
      }
      apiKey = credentials.apiKey;
    }

    let prepared: PreparedImage;
    try {
      prepared = await prepareForVision(image, {
        maxDimension: settings.maxImageDimension,
        quality: settings.jpegQuality,
      });
    } catch (error) {
      throw new AnalysisError(`Could not decode the captured image: ${errorMessage(error)}`, { cause: error });
    }
    throwIfAborted(signal);

    const startedAt = Date.now();
    const response = await provider.analyzeImage(
      {
        image: { base64Raw: prepared.base64Raw, mimeType: prepared.mimeType },
        prompt: EXTRACTION_PROMPT,
        options: {
          modelName: settings.modelName ?? info.defaultModel,
          baseUrl: (settings.baseUrl ?? info.defaultBaseUrl).replace(/\/+$/, ''),
          timeoutMs: settings.timeoutMs,
          temperature: 0,
          maxTokens: 4096,
          signal,
        },
      },
      apiKey
    );

    let segments: TextSegment[];
    try {
      segments = parseSegments(response.answerText);
    } catch (error) {
      logger.warn({ provider: settings.provider }, 'Could not parse vision model response');
      throw error;
    }

    logger.info(
      { provider: settings.provider, model: response.modelUsed, count: segments.length, latencyMs: Date.now() - startedAt },
      'Screen analyzed'
    );

    return {
      segments,
      imageSize: { width: image.width, height: image.height },
    };
  }

  private getProvider(id: VisionProviderId): VisionProvider {
    let provider = this.providers.get(id);
    if (!provider) {
      provider = createVisionProvider(id);
      this.providers.set(id, provider);
    }
    return provider;
  }
}
