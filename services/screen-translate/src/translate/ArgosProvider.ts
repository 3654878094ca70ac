import { spawn } from 'child_process';
import { existsSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { ProviderConfig } from '@screenlingo/shared';
import { AbortError, TranslationProviderError } from '../errors';
import { BaseTranslationProvider, ProviderDeps } from './BaseTranslationProvider';
import type { TranslateOptions } from './TranslationProvider';

export interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export type ProcessRunner = (
  command: string,
  args: string[],
  options: { input?: string; timeoutMs: number; signal?: AbortSignal }
) => Promise<ProcessResult>;

/**
 * Executa um processo coletando stdout/stderr. Rejeita apenas quando o
 * executável não pode ser iniciado ou quando o sinal externo aborta.
 */
export const spawnProcess: ProcessRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { timeout: options.timeoutMs });
    let stdout = '';
    let stderr = '';

    const onAbort = () => child.kill('SIGTERM');
    options.signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });
    child.on('error', (error) => {
      options.signal?.removeEventListener('abort', onAbort);
      reject(error);
    });
    child.on('close', (code, signal) => {
      options.signal?.removeEventListener('abort', onAbort);
      if (options.signal?.aborted) {
        reject(new AbortError());
        return;
      }
      resolve({ code, stdout, stderr, timedOut: code === null && signal === 'SIGTERM' });
    });

    if (options.input !== undefined) {
      child.stdin.write(options.input);
    }
    child.stdin.end();
  });

const ARGOS_SCRIPT = `
import sys, json
from argostranslate import translate
data = json.loads(sys.stdin.read())
texts = data.get("texts", [])
src = data.get("from")
tgt = data.get("to")
out = []
for text in texts:
    out.append(translate.translate(text, src, tgt))
sys.stdout.write(json.dumps(out, ensure_ascii=False))
`;

const ArgosOutputSchema = z.array(z.string());

export interface ArgosOptions {
  /** Interpretador Python configurado explicitamente */
  pythonPath?: string;
  runner?: ProcessRunner;
}

/**
 * Motor offline: Argos Translate executado num processo Python.
 * Um único processo traduz o batch inteiro.
 */
export class ArgosProvider extends BaseTranslationProvider {
  private pythonPath: string | null = null;
  private readonly configuredPython?: string;
  private readonly runner: ProcessRunner;

  constructor(config: Readonly<ProviderConfig>, deps: ProviderDeps, options: ArgosOptions = {}) {
    super('local', config, deps);
    this.configuredPython = options.pythonPath;
    this.runner = options.runner ?? spawnProcess;
  }

  async isAvailable(): Promise<boolean> {
    const python = await this.findPython();
    if (!python) return false;
    return this.hasArgos(python);
  }

  protected async translateText(
    text: string,
    fromLang: string | null,
    toLang: string,
    options: TranslateOptions
  ): Promise<string> {
    const [translated] = await this.translateTexts([text], fromLang, toLang, options);
    return translated ?? '';
  }

  protected async translateTexts(
    texts: string[],
    fromLang: string | null,
    toLang: string,
    options: TranslateOptions
  ): Promise<string[]> {
    const python = await this.findPython();
    if (!python) {
      throw TranslationProviderError.invalidConfiguration(
        'Python not found. Set SCREENLINGO_ARGOS_PYTHON or translation.argosPython'
      );
    }

    const hasArgos = await this.hasArgos(python);
    if (!hasArgos) {
      throw TranslationProviderError.invalidConfiguration(
        'Argos Translate is not installed. Run: pip install argostranslate'
      );
    }

    const payload = JSON.stringify({
      texts,
      from: this.normalizeLang(fromLang),
      to: this.normalizeLang(toLang),
    });

    const result = await this.runner(python, ['-c', ARGOS_SCRIPT], {
      input: payload,
      timeoutMs: this.config.timeoutMs,
      signal: options.signal,
    });

    if (result.timedOut) {
      throw TranslationProviderError.connectionFailed(`Argos timed out after ${this.config.timeoutMs}ms`);
    }
    if (result.code !== 0) {
      const detail = (result.stderr || result.stdout || 'unknown error').trim().split('\n').pop();
      throw TranslationProviderError.translationFailed(`Argos exited with code ${result.code}: ${detail}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(result.stdout);
    } catch {
      throw TranslationProviderError.translationFailed('Argos returned invalid output');
    }
    const output = ArgosOutputSchema.safeParse(parsed);
    if (!output.success) {
      throw TranslationProviderError.translationFailed('Argos returned invalid output');
    }
    return output.data;
  }

  private normalizeLang(lang: string | null): string {
    const normalized = (lang ?? 'auto').toLowerCase();
    if (normalized === 'auto') return 'en';
    if (normalized.startsWith('zh')) return 'zh';
    if (normalized.startsWith('pt')) return 'pt';
    if (normalized.startsWith('en')) return 'en';
    if (normalized.startsWith('es')) return 'es';
    return normalized;
  }

  private async findPython(): Promise<string | null> {
    if (this.pythonPath) return this.pythonPath;
    const candidates: string[] = [];
    const envOverride = process.env.SCREENLINGO_ARGOS_PYTHON;
    if (envOverride) {
      candidates.push(envOverride);
    }
    if (this.configuredPython) {
      candidates.push(this.configuredPython);
    }

    const cwdVenv = path.join(process.cwd(), '.venv', 'bin', 'python');
    if (existsSync(cwdVenv)) {
      candidates.push(cwdVenv);
    }

    candidates.push('python3', 'python');
    for (const candidate of candidates) {
      const ok = await this.probe(candidate, ['--version']);
      if (ok) {
        this.log.debug({ python: candidate }, 'Python found for Argos Translate');
        this.pythonPath = candidate;
        return candidate;
      }
    }
    return null;
  }

  private hasArgos(python: string): Promise<boolean> {
    return this.probe(python, ['-c', 'import argostranslate']);
  }

  private async probe(command: string, args: string[]): Promise<boolean> {
    try {
      const result = await this.runner(command, args, { timeoutMs: 10000 });
      return result.code === 0;
    } catch (error) {
      this.log.debug({ err: error, command }, 'Process probe failed');
      return false;
    }
  }
}
