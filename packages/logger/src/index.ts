import pino from 'pino';
import { join } from 'path';
import { homedir } from 'os';
import { mkdirSync } from 'fs';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LoggerConfig {
  level?: LogLevel | string;
  /** Saída colorida no console via pino-pretty */
  pretty?: boolean;
  /** Diretório do arquivo diário `<appName>-YYYY-MM-DD.log` */
  logDir?: string;
  appName?: string;
}

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

const DEFAULT_LOG_DIR = join(homedir(), '.local', 'share', 'screenlingo', 'logs');

function normalizeLevel(level: string): LogLevel {
  return LEVELS.find((candidate) => candidate === level.toLowerCase()) ?? 'info';
}

function dailyFile(logDir: string, appName: string, now: Date = new Date()): string {
  const day = now.toISOString().slice(0, 10);
  return join(logDir, `${appName}-${day}.log`);
}

function fileStream(logDir: string, appName: string, level: LogLevel): pino.StreamEntry {
  mkdirSync(logDir, { recursive: true });
  return {
    level,
    stream: pino.destination({ dest: dailyFile(logDir, appName), sync: false, mkdir: true }),
  };
}

function consoleStream(level: LogLevel): pino.StreamEntry {
  return {
    level,
    stream: pino.transport({
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'HH:MM:ss.l', ignore: 'pid,hostname' },
    }),
  };
}

/**
 * Logger pino com arquivo diário e, opcionalmente, console legível.
 * Sem config explícita: LOG_LEVEL, NODE_ENV=development e SCREENLINGO_LOG_DIR.
 */
export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const level = normalizeLevel(config.level ?? (process.env.LOG_LEVEL || 'info'));
  const pretty = config.pretty ?? process.env.NODE_ENV === 'development';
  const logDir = config.logDir ?? (process.env.SCREENLINGO_LOG_DIR || DEFAULT_LOG_DIR);
  const appName = config.appName ?? 'screenlingo';

  const streams = [fileStream(logDir, appName, level)];
  if (pretty) {
    streams.push(consoleStream(level));
  }

  return pino(
    {
      level,
      base: { pid: process.pid, app: appName },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams)
  );
}

let globalLogger: pino.Logger | null = null;

/**
 * Logger do processo, criado na primeira chamada
 */
export function getLogger(config?: LoggerConfig): pino.Logger {
  if (!globalLogger) {
    globalLogger = createLogger(config);
  }
  return globalLogger;
}

/**
 * Troca o logger do processo (config carregada, testes)
 */
export function setLogger(logger: pino.Logger): void {
  globalLogger = logger;
}

/**
 * Logger filho com campos fixos, ex.: `{ engine: 'deepl' }` por provider
 */
export function createChildLogger(parent: pino.Logger, bindings: pino.Bindings): pino.Logger {
  return parent.child(bindings);
}
