import Conf from 'conf';
import { z } from 'zod';
import { AppConfig, AppConfigSchema, defaultConfig } from './schema';

export { AppConfigSchema, defaultConfig } from './schema';
export type { AppConfig, ProviderOverride } from './schema';

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface ConfigManagerOptions {
  /** Diretório do arquivo (padrão: diretório de config da plataforma) */
  cwd?: string;
  configName?: string;
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

/**
 * Gerenciador de configurações usando conf
 *
 * Garante type-safety e validação de schema usando Zod
 */
export class ConfigManager {
  private store: Conf<AppConfig>;

  constructor(options: ConfigManagerOptions = {}) {
    this.store = new Conf<AppConfig>({
      projectName: 'screenlingo',
      projectSuffix: '',
      configName: options.configName ?? 'config',
      cwd: options.cwd,
      defaults: defaultConfig,
    });
  }

  /**
   * Obtém toda a configuração, validada e com defaults para valores faltantes
   */
  getAll(): AppConfig {
    const result = AppConfigSchema.safeParse(this.store.store);
    if (!result.success) {
      const issues = formatIssues(result.error);
      throw new ConfigError(`Invalid configuration at ${this.getPath()}`, issues);
    }
    return result.data;
  }

  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.getAll()[key];
  }

  /**
   * Substitui uma seção inteira, validando antes de gravar
   */
  set<K extends keyof AppConfig>(key: K, value: AppConfig[K]): void {
    const result = AppConfigSchema.safeParse({ ...this.store.store, [key]: value });
    if (!result.success) {
      throw new ConfigError(`Invalid value for "${String(key)}"`, formatIssues(result.error));
    }
    this.store.set(key, result.data[key]);
  }

  /**
   * Atualiza parcialmente uma seção
   * Exemplo: update('translation', { targetLanguage: 'ja' })
   */
  update<K extends keyof AppConfig>(key: K, patch: Partial<AppConfig[K]>): void {
    this.set(key, { ...this.get(key), ...patch });
  }

  /**
   * Reseta configuração para valores padrão
   */
  reset(): void {
    this.store.clear();
    this.store.store = defaultConfig;
  }

  /**
   * Valida a configuração atual contra o schema
   */
  validate(): { valid: boolean; errors?: string[] } {
    const result = AppConfigSchema.safeParse(this.store.store);
    if (result.success) {
      return { valid: true };
    }
    return { valid: false, errors: formatIssues(result.error) };
  }

  /**
   * Obtém o caminho do arquivo de configuração
   */
  getPath(): string {
    return this.store.path;
  }
}

// Singleton para uso no processo principal
let configManager: ConfigManager | null = null;

/**
 * Obtém instância singleton do ConfigManager
 */
export function getConfigManager(): ConfigManager {
  if (!configManager) {
    configManager = new ConfigManager();
  }
  return configManager;
}
