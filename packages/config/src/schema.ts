import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { TRANSLATION_ENGINE_TYPES, VISION_PROVIDER_IDS } from '@screenlingo/shared';

/**
 * Schema de validação para configurações do aplicativo
 */
const ProviderOverrideSchema = z.object({
  baseUrl: z.string().url().optional(),
  modelName: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  promptTemplate: z.string().min(1).optional(),
});

const HexColorSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'expected a #rrggbb color');

export const AppConfigSchema = z.object({
  vision: z
    .object({
      provider: z.enum(VISION_PROVIDER_IDS).default('openai'),
      modelName: z.string().min(1).optional(),
      baseUrl: z.string().url().optional(),
      timeoutMs: z.number().int().positive().default(60000),
      maxImageDimension: z.number().int().min(256).max(8192).default(2048),
      jpegQuality: z.number().int().min(1).max(100).default(85),
    })
    .default({}),
  translation: z
    .object({
      preferredEngine: z.enum(TRANSLATION_ENGINE_TYPES).default('local'),
      fallbackEngine: z.enum(TRANSLATION_ENGINE_TYPES).nullable().default(null),
      sourceLanguage: z.string().min(1).default('auto'),
      targetLanguage: z.string().min(1).default('zh'),
      engines: z.record(z.enum(TRANSLATION_ENGINE_TYPES), ProviderOverrideSchema).default({}),
      argosPython: z.string().min(1).optional(),
    })
    .default({}),
  overlay: z
    .object({
      mode: z.enum(['below', 'replace']).default('below'),
      fontSize: z.number().int().min(8).max(72).default(16),
      fontFamily: z.string().min(1).default('sans-serif'),
      textColor: HexColorSchema.default('#ffffff'),
      backgroundColor: HexColorSchema.default('#000000'),
      backgroundOpacity: z.number().min(0).max(1).default(0.75),
      padding: z.number().int().min(0).max(32).default(4),
    })
    .default({}),
  storage: z
    .object({
      dataDir: z.string().min(1).default(join(homedir(), '.local', 'share', 'screenlingo')),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ProviderOverride = z.infer<typeof ProviderOverrideSchema>;

/**
 * Valores padrão para configuração
 */
export const defaultConfig: AppConfig = AppConfigSchema.parse({});
