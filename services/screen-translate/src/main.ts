#!/usr/bin/env node

/**
 * CLI do screenlingo: traduz capturas, lista motores, gerencia credenciais e histórico.
 */

import { writeFile } from 'fs/promises';
import { basename, dirname, extname, join } from 'path';
import { parseArgs } from 'util';
import { getConfigManager } from '@screenlingo/config';
import { createLogger, getLogger, setLogger } from '@screenlingo/logger';
import {
  ENGINE_CATALOG,
  RenderMode,
  TRANSLATION_ENGINE_TYPES,
  TranslationEngineType,
  isTranslationEngineType,
  toPlainText,
} from '@screenlingo/shared';
import type { ScreenTranslator } from './app';
import { describeError, setupErrorHandlers } from './error-handler';
import type { FlowPhase } from './flow/FlowController';

const USAGE = `Usage: screenlingo <command> [options]

Commands:
  translate <image>                 Translate the text in an image file
      --to <lang>                   Target language (default from config)
      --from <lang>                 Source language, or "auto"
      --engine <engine>             Preferred translation engine
      --fallback <engine>           Fallback translation engine
      --mode <below|replace>        Overlay mode
      --out <file>                  Output PNG (default: <image>.translated.png)
  engines                           List engines and their state
  check <engine>                    Test an engine with a sample translation
  credentials set <provider> --key <key> [--app-id <id>]
  credentials delete <provider>
  credentials list
  history [--limit <n>] [--search <text>]

Engines: ${TRANSLATION_ENGINE_TYPES.join(', ')}`;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function engineArg(value: string | undefined, flag: string): TranslationEngineType | undefined {
  if (value === undefined) return undefined;
  if (!isTranslationEngineType(value)) {
    throw new UsageError(`Unknown engine for ${flag}: ${value}`);
  }
  return value;
}

function modeArg(value: string | undefined): RenderMode | undefined {
  if (value === undefined) return undefined;
  if (value !== 'below' && value !== 'replace') {
    throw new UsageError(`Unknown mode: ${value}`);
  }
  return value;
}

async function translateCommand(app: ScreenTranslator, args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      to: { type: 'string' },
      from: { type: 'string' },
      engine: { type: 'string' },
      fallback: { type: 'string' },
      mode: { type: 'string' },
      out: { type: 'string' },
    },
  });

  const imagePath = positionals[0];
  if (!imagePath) {
    throw new UsageError('translate needs an image path');
  }

  const base = app.config.getAll();
  const mode = modeArg(values.mode);
  const { loadCapturedImage } = await import('./extraction/imageProcessor');
  const image = await loadCapturedImage(imagePath);

  app.controller.on('phase', ({ progress, phase }: { progress: number; phase: FlowPhase }) => {
    process.stderr.write(`[${Math.round(progress * 100)}%] ${phase.stage}\n`);
  });

  const from = values.from ?? base.translation.sourceLanguage;
  const outcome = await app.controller.start(image, {
    targetLanguage: values.to ?? base.translation.targetLanguage,
    sourceLanguage: from === 'auto' ? null : from,
    preferredEngine: engineArg(values.engine, '--engine') ?? base.translation.preferredEngine,
    fallbackEngine: engineArg(values.fallback, '--fallback') ?? base.translation.fallbackEngine,
    overlay: mode ? { ...base.overlay, mode } : base.overlay,
  });

  if (!outcome.ok) {
    throw outcome.error;
  }

  const out =
    values.out ?? join(dirname(imagePath), `${basename(imagePath, extname(imagePath))}.translated.png`);
  await writeFile(out, outcome.result.image);

  process.stdout.write(`${toPlainText(outcome.result.segments)}\n`);
  process.stderr.write(`Engine: ${outcome.result.engine}\nSaved: ${out}\n`);
}

async function enginesCommand(app: ScreenTranslator): Promise<void> {
  const available = new Set(await app.registry.availableEngines());
  const registered = new Set(app.registry.registeredEngines());

  for (const engine of TRANSLATION_ENGINE_TYPES) {
    const configured = await app.registry.isEngineConfigured(engine);
    const flags = [
      configured ? 'configured' : 'not configured',
      registered.has(engine) ? (available.has(engine) ? 'available' : 'unavailable') : 'lazy',
    ];
    process.stdout.write(`${engine.padEnd(8)} ${ENGINE_CATALOG[engine].name.padEnd(28)} ${flags.join(', ')}\n`);
  }
}

async function checkCommand(app: ScreenTranslator, args: string[]): Promise<void> {
  const engine = engineArg(args[0], 'check');
  if (!engine) {
    throw new UsageError('check needs an engine');
  }
  const ok = await app.orchestrator.testConnection(engine);
  process.stdout.write(`${engine}: ${ok ? 'ok' : 'failed'}\n`);
  if (!ok) {
    process.exitCode = 1;
  }
}

async function credentialsCommand(app: ScreenTranslator, args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      key: { type: 'string' },
      'app-id': { type: 'string' },
    },
  });
  const [action, provider] = positionals;

  switch (action) {
    case 'list': {
      const entries = await app.credentials.listProviders();
      for (const entry of entries) {
        const appId = entry.hasAppId ? ' (+app id)' : '';
        process.stdout.write(`${entry.providerId.padEnd(8)} ****${entry.last4}${appId}\n`);
      }
      return;
    }
    case 'set': {
      if (!provider || !values.key) {
        throw new UsageError('credentials set needs a provider and --key');
      }
      await app.credentials.saveCredentials(provider, { apiKey: values.key, appId: values['app-id'] });
      process.stdout.write(`Saved credentials for ${provider}\n`);
      return;
    }
    case 'delete': {
      if (!provider) {
        throw new UsageError('credentials delete needs a provider');
      }
      const removed = await app.credentials.deleteCredentials(provider);
      process.stdout.write(removed ? `Deleted credentials for ${provider}\n` : `No credentials for ${provider}\n`);
      return;
    }
    default:
      throw new UsageError(`Unknown credentials action: ${action ?? '(none)'}`);
  }
}

function historyCommand(app: ScreenTranslator, args: string[]): void {
  const { values } = parseArgs({
    args,
    options: {
      limit: { type: 'string' },
      search: { type: 'string' },
    },
  });
  const limit = values.limit ? Number.parseInt(values.limit, 10) : 20;
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new UsageError(`Invalid --limit: ${values.limit}`);
  }

  const entries = values.search ? app.history.search(values.search, limit) : app.history.list(limit);
  for (const entry of entries) {
    const when = new Date(entry.createdAt).toISOString();
    process.stdout.write(`#${entry.id} ${when} ${entry.engine} ${entry.sourceLanguage}->${entry.targetLanguage}\n`);
    process.stdout.write(`${entry.translatedText}\n\n`);
  }
}

async function main(): Promise<void> {
  const [command, ...rest] = process.argv.slice(2);
  if (!command || command === 'help' || command === '--help') {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  const config = getConfigManager();
  const logging = config.get('logging');
  const logger = createLogger({
    level: process.env.LOG_LEVEL || logging.level,
    pretty: logging.pretty || process.env.NODE_ENV === 'development',
    logDir: join(config.get('storage').dataDir, 'logs'),
  });
  setLogger(logger);

  // Módulos do pipeline capturam o logger ao carregar
  const { createScreenTranslator } = await import('./app');
  setupErrorHandlers();

  const app = createScreenTranslator({ config });

  process.on('SIGINT', () => {
    logger.info('SIGINT received, cancelling...');
    app.controller.cancel();
  });

  try {
    switch (command) {
      case 'translate':
        await translateCommand(app, rest);
        break;
      case 'engines':
        await enginesCommand(app);
        break;
      case 'check':
        await checkCommand(app, rest);
        break;
      case 'credentials':
        await credentialsCommand(app, rest);
        break;
      case 'history':
        historyCommand(app, rest);
        break;
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } finally {
    app.close();
  }
}

main().catch((error: unknown) => {
  process.exitCode = 1;
  if (error instanceof UsageError) {
    process.stderr.write(`${error.message}\n\n${USAGE}\n`);
    return;
  }
  getLogger().fatal({ err: error }, 'Command failed');
  process.stderr.write(`${describeError(error)}\n`);
});
