import { join } from 'path';
import type Database from 'better-sqlite3';
import { AppConfig, ConfigManager, getConfigManager } from '@screenlingo/config';
import { ProviderConfig, TranslationEngineType, resolveProviderConfig } from '@screenlingo/shared';
import { getLogger } from '@screenlingo/logger';
import { TextExtractionEngine } from './extraction/TextExtractionEngine';
import { FlowController, FlowSettings } from './flow/FlowController';
import { OverlayRenderer } from './render/OverlayRenderer';
import type { CredentialStore } from './storage/CredentialStore';
import { openDatabase } from './storage/database';
import { HistoryStore } from './storage/HistoryStore';
import { KeyStorage } from './storage/KeyStorage';
import { SqliteCredentialStore } from './storage/SqliteCredentialStore';
import type { ProcessRunner } from './translate/ArgosProvider';
import { ProviderRegistry } from './translate/ProviderRegistry';
import { TranslationOrchestrator } from './translate/TranslationOrchestrator';

const logger = getLogger();

export interface ScreenTranslatorOptions {
  config?: ConfigManager;
  /** Sobrescreve o banco padrão (dataDir/screenlingo.db); ':memory:' em testes */
  databasePath?: string;
  /** Substitui o armazenamento SQLite de credenciais */
  credentials?: CredentialStore;
  /** Segredo mestre; padrão: SCREENLINGO_MASTER_KEY ou arquivo de chave no dataDir */
  masterKey?: string;
  pythonRunner?: ProcessRunner;
}

export interface ScreenTranslator {
  config: ConfigManager;
  credentials: CredentialStore;
  history: HistoryStore;
  registry: ProviderRegistry;
  orchestrator: TranslationOrchestrator;
  extractor: TextExtractionEngine;
  renderer: OverlayRenderer;
  controller: FlowController;
  close(): void;
}

export function engineConfig(config: AppConfig, type: TranslationEngineType): Readonly<ProviderConfig> {
  return resolveProviderConfig(type, config.translation.engines[type] ?? {});
}

export function flowSettings(config: AppConfig): FlowSettings {
  const source = config.translation.sourceLanguage;
  return {
    sourceLanguage: source === 'auto' ? null : source,
    targetLanguage: config.translation.targetLanguage,
    preferredEngine: config.translation.preferredEngine,
    fallbackEngine: config.translation.fallbackEngine,
    overlay: config.overlay,
  };
}

/**
 * Raiz de composição: monta o pipeline e passa as dependências por referência
 */
export function createScreenTranslator(options: ScreenTranslatorOptions = {}): ScreenTranslator {
  const config = options.config ?? getConfigManager();
  const initial = config.getAll();
  const dataDir = initial.storage.dataDir;

  const db: Database.Database = openDatabase(options.databasePath ?? join(dataDir, 'screenlingo.db'));
  const credentials =
    options.credentials ??
    new SqliteCredentialStore(
      db,
      new KeyStorage({
        secret: options.masterKey ?? process.env.SCREENLINGO_MASTER_KEY,
        keyPath: join(dataDir, '.encryption_key'),
      })
    );
  const history = new HistoryStore(db);

  const configFor = (type: TranslationEngineType) => engineConfig(config.getAll(), type);

  const registry = new ProviderRegistry({
    credentials,
    configFor,
    argos: { pythonPath: initial.translation.argosPython, runner: options.pythonRunner },
  });
  const orchestrator = new TranslationOrchestrator(registry, configFor);
  const extractor = new TextExtractionEngine({
    credentials,
    settings: () => config.get('vision'),
  });
  const renderer = new OverlayRenderer();
  const controller = new FlowController({
    extractor,
    orchestrator,
    renderer,
    settings: () => flowSettings(config.getAll()),
    history,
  });

  logger.debug({ dataDir }, 'Screen translator ready');

  return {
    config,
    credentials,
    history,
    registry,
    orchestrator,
    extractor,
    renderer,
    controller,
    close: () => {
      controller.reset();
      db.close();
    },
  };
}
