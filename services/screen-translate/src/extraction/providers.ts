import { z } from 'zod';
import type { VisionProviderId, VisionRequest, VisionResponse } from '@screenlingo/shared';
import { getLogger } from '@screenlingo/logger';
import { AnalysisError } from '../errors';
import { BaseVisionProvider } from './BaseVisionProvider';

const logger = getLogger();

function requireKey(id: VisionProviderId, apiKey: string | null): string {
  if (!apiKey) {
    throw new AnalysisError(`No API key configured for ${id}`);
  }
  return apiKey;
}

const OpenAIVisionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1),
  usage: z.object({ prompt_tokens: z.number(), completion_tokens: z.number() }).optional(),
});

/**
 * Provider para OpenAI Vision API
 */
export class OpenAIVisionProvider extends BaseVisionProvider {
  id: VisionProviderId = 'openai';

  protected async analyzeImageInternal(req: VisionRequest, apiKey: string | null): Promise<VisionResponse> {
    const key = requireKey(this.id, apiKey);
    logger.debug({ model: req.options.modelName }, 'Calling OpenAI API');

    const data = await this.postJson(
      `${req.options.baseUrl}/chat/completions`,
      { Authorization: `Bearer ${key}` },
      {
        model: req.options.modelName,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'image_url', image_url: { url: `data:${req.image.mimeType};base64,${req.image.base64Raw}` } },
              { type: 'text', text: req.prompt },
            ],
          },
        ],
        temperature: req.options.temperature ?? 0,
        max_tokens: req.options.maxTokens,
      },
      req
    );

    const parsed = OpenAIVisionSchema.safeParse(data);
    if (!parsed.success) {
      throw this.unexpected();
    }
    return {
      answerText: parsed.data.choices[0].message.content ?? '',
      usage: {
        tokensIn: parsed.data.usage?.prompt_tokens,
        tokensOut: parsed.data.usage?.completion_tokens,
      },
      modelUsed: req.options.modelName,
      providerUsed: this.id,
    };
  }
}

const ClaudeVisionSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).optional(),
});

/**
 * Provider para Claude (Messages API)
 */
export class ClaudeVisionProvider extends BaseVisionProvider {
  id: VisionProviderId = 'claude';

  protected async analyzeImageInternal(req: VisionRequest, apiKey: string | null): Promise<VisionResponse> {
    const key = requireKey(this.id, apiKey);
    logger.debug({ model: req.options.modelName }, 'Calling Claude API');

    const data = await this.postJson(
      `${req.options.baseUrl}/messages`,
      { 'x-api-key': key, 'anthropic-version': '2023-06-01' },
      {
        model: req.options.modelName,
        max_tokens: req.options.maxTokens ?? 4096,
        temperature: req.options.temperature ?? 0,
        messages: [
          {
            role: 'user',
            content: [
              {
                type: 'image',
                source: { type: 'base64', media_type: req.image.mimeType, data: req.image.base64Raw },
              },
              { type: 'text', text: req.prompt },
            ],
          },
        ],
      },
      req
    );

    const parsed = ClaudeVisionSchema.safeParse(data);
    if (!parsed.success) {
      throw this.unexpected();
    }
    return {
      answerText: parsed.data.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join(''),
      usage: {
        tokensIn: parsed.data.usage?.input_tokens,
        tokensOut: parsed.data.usage?.output_tokens,
      },
      modelUsed: req.options.modelName,
      providerUsed: this.id,
    };
  }
}

const GeminiVisionSchema = z.object({
  candidates: z
    .array(z.object({ content: z.object({ parts: z.array(z.object({ text: z.string().optional() })) }).optional() }))
    .min(1),
  usageMetadata: z
    .object({ promptTokenCount: z.number().optional(), candidatesTokenCount: z.number().optional() })
    .optional(),
});

/**
 * Provider para Google Gemini Vision API
 */
export class GeminiVisionProvider extends BaseVisionProvider {
  id: VisionProviderId = 'gemini';

  protected async analyzeImageInternal(req: VisionRequest, apiKey: string | null): Promise<VisionResponse> {
    const key = requireKey(this.id, apiKey);
    const modelName = req.options.modelName.replace('-vision', '');
    logger.debug({ model: modelName }, 'Calling Gemini API');

    const data = await this.postJson(
      `${req.options.baseUrl}/models/${encodeURIComponent(modelName)}:generateContent?key=${encodeURIComponent(key)}`,
      {},
      {
        contents: [
          {
            role: 'user',
            parts: [
              { inline_data: { mime_type: req.image.mimeType, data: req.image.base64Raw } },
              { text: req.prompt },
            ],
          },
        ],
        generationConfig: {
          temperature: req.options.temperature ?? 0,
          maxOutputTokens: req.options.maxTokens,
          responseMimeType: 'application/json',
        },
      },
      req
    );

    const parsed = GeminiVisionSchema.safeParse(data);
    if (!parsed.success) {
      throw this.unexpected();
    }
    return {
      answerText: (parsed.data.candidates[0].content?.parts ?? []).map((part) => part.text ?? '').join(''),
      usage: {
        tokensIn: parsed.data.usageMetadata?.promptTokenCount,
        tokensOut: parsed.data.usageMetadata?.candidatesTokenCount,
      },
      modelUsed: modelName,
      providerUsed: this.id,
    };
  }
}

const OllamaVisionSchema = z.object({
  message: z.object({ content: z.string() }),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

/**
 * Provider para modelos de visão locais via Ollama (/api/chat)
 */
export class OllamaVisionProvider extends BaseVisionProvider {
  id: VisionProviderId = 'ollama';

  protected async analyzeImageInternal(req: VisionRequest): Promise<VisionResponse> {
    logger.debug({ model: req.options.modelName }, 'Calling Ollama API');

    const data = await this.postJson(
      `${req.options.baseUrl}/api/chat`,
      {},
      {
        model: req.options.modelName,
        stream: false,
        format: 'json',
        options: { temperature: req.options.temperature ?? 0 },
        messages: [{ role: 'user', content: req.prompt, images: [req.image.base64Raw] }],
      },
      req
    );

    const parsed = OllamaVisionSchema.safeParse(data);
    if (!parsed.success) {
      throw this.unexpected();
    }
    return {
      answerText: parsed.data.message.content,
      usage: { tokensIn: parsed.data.prompt_eval_count, tokensOut: parsed.data.eval_count },
      modelUsed: req.options.modelName,
      providerUsed: this.id,
    };
  }
}

export function createVisionProvider(id: VisionProviderId): BaseVisionProvider {
  switch (id) {
    case 'openai':
      return new OpenAIVisionProvider();
    case 'claude':
      return new ClaudeVisionProvider();
    case 'gemini':
      return new GeminiVisionProvider();
    case 'ollama':
      return new OllamaVisionProvider();
  }
}
