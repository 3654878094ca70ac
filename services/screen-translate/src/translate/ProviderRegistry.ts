import {
  ENGINE_CATALOG,
  ProviderConfig,
  TRANSLATION_ENGINE_TYPES,
  TranslationEngineType,
} from '@screenlingo/shared';
import { getLogger } from '@screenlingo/logger';
import type { CredentialStore } from '../storage/CredentialStore';
import { ArgosOptions, ArgosProvider } from './ArgosProvider';
import { BaiduProvider } from './BaiduProvider';
import { DeepLProvider } from './DeepLProvider';
import { GoogleProvider } from './GoogleProvider';
import { CompatibleProvider, LLMTranslationProvider } from './LLMTranslationProvider';
import { MTranServerProvider } from './MTranServerProvider';
import type { TranslationProvider } from './TranslationProvider';

const logger = getLogger();

export interface ProviderRegistryDeps {
  credentials: CredentialStore;
  /** Configuração efetiva de cada motor (catálogo + config do usuário) */
  configFor: (type: TranslationEngineType) => Readonly<ProviderConfig>;
  argos?: ArgosOptions;
}

/**
 * Gerenciador de providers de tradução
 * `local` e `mtran` são registrados na construção; os demais sob demanda.
 * Mutações passam por um lock serial; consultas não.
 */
export class ProviderRegistry {
  private providers = new Map<TranslationEngineType, TranslationProvider>();
  private lock: Promise<void> = Promise.resolve();
  private readonly deps: ProviderRegistryDeps;

  constructor(deps: ProviderRegistryDeps) {
    this.deps = deps;
    this.providers.set('local', this.construct('local', deps.configFor('local')));
    this.providers.set('mtran', this.construct('mtran', deps.configFor('mtran')));
  }

  register(provider: TranslationProvider, type: TranslationEngineType): Promise<void> {
    return this.withLock(() => {
      this.providers.set(type, provider);
      logger.debug({ engine: type }, 'Translation provider registered');
    });
  }

  unregister(type: TranslationEngineType): Promise<boolean> {
    return this.withLock(() => this.providers.delete(type));
  }

  provider(type: TranslationEngineType): TranslationProvider | undefined {
    return this.providers.get(type);
  }

  registeredEngines(): TranslationEngineType[] {
    return TRANSLATION_ENGINE_TYPES.filter((type) => this.providers.has(type));
  }

  /**
   * Consulta isAvailable() de todos os registrados em paralelo
   */
  async availableEngines(): Promise<TranslationEngineType[]> {
    const entries = [...this.providers.entries()];
    const checks = await Promise.all(
      entries.map(async ([type, provider]) => {
        try {
          return (await provider.isAvailable()) ? type : null;
        } catch (error) {
          logger.warn({ err: error, engine: type }, 'Availability check failed');
          return null;
        }
      })
    );
    return TRANSLATION_ENGINE_TYPES.filter((type) => checks.includes(type));
  }

  /**
   * Verifica configuração sem abrir conexão
   */
  async isEngineConfigured(type: TranslationEngineType): Promise<boolean> {
    const info = ENGINE_CATALOG[type];
    if (info.requiresAppId) {
      const credentials = await this.deps.credentials.getCredentials(type);
      return Boolean(credentials?.apiKey && credentials.appId);
    }
    if (info.requiresApiKey) {
      return this.deps.credentials.hasCredentials(type);
    }
    const config = this.deps.configFor(type);
    if (type === 'local') {
      return true;
    }
    return Boolean(config.baseUrl && (!info.promptDriven || config.modelName));
  }

  /**
   * Retorna o provider registrado ou cria, registra e retorna um novo.
   * `forceRefresh` reconstrói a instância com a configuração atual.
   */
  createProvider(
    type: TranslationEngineType,
    config: Readonly<ProviderConfig> = this.deps.configFor(type),
    options: { forceRefresh?: boolean } = {}
  ): Promise<TranslationProvider> {
    return this.withLock(() => {
      const existing = this.providers.get(type);
      if (existing && !options.forceRefresh) {
        return existing;
      }
      const provider = this.construct(type, config);
      this.providers.set(type, provider);
      logger.info({ engine: type, refreshed: Boolean(existing) }, 'Translation provider created');
      return provider;
    });
  }

  private construct(type: TranslationEngineType, config: Readonly<ProviderConfig>): TranslationProvider {
    const deps = { credentials: this.deps.credentials };
    switch (type) {
      case 'local':
        return new ArgosProvider(config, deps, this.deps.argos);
      case 'mtran':
        return new MTranServerProvider(config, deps);
      case 'baidu':
        return new BaiduProvider(config, deps);
      case 'google':
        return new GoogleProvider(config, deps);
      case 'deepl':
        return new DeepLProvider(config, deps);
      case 'openai':
      case 'ollama':
        return new LLMTranslationProvider(type, config, deps, { dialect: 'openai' });
      case 'claude':
        return new LLMTranslationProvider(type, config, deps, { dialect: 'anthropic' });
      case 'gemini':
        return new LLMTranslationProvider(type, config, deps, { dialect: 'gemini' });
      case 'custom':
        return new CompatibleProvider(config, deps);
    }
  }

  private withLock<T>(fn: () => T): Promise<T> {
    const run = this.lock.then(fn);
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
