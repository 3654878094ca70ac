import { mkdtempSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import pino from 'pino';
import { describe, expect, it } from 'vitest';
import { createChildLogger, createLogger, getLogger, setLogger } from './index';

describe('logger', () => {
  it('returns the logger installed with setLogger', () => {
    const silent = pino({ level: 'silent' });
    setLogger(silent);
    expect(getLogger()).toBe(silent);
  });

  it('creates the log directory and honours the configured level', () => {
    const root = mkdtempSync(join(tmpdir(), 'screenlingo-log-'));
    const logDir = join(root, 'nested', 'logs');

    const logger = createLogger({ logDir, level: 'warn', pretty: false, appName: 'test-app' });

    expect(existsSync(logDir)).toBe(true);
    expect(logger.level).toBe('warn');
  });

  it('falls back to info for unknown levels', () => {
    const root = mkdtempSync(join(tmpdir(), 'screenlingo-log-'));
    const logger = createLogger({ logDir: root, level: 'verbose', pretty: false });
    expect(logger.level).toBe('info');
  });

  it('binds context on child loggers', () => {
    const child = createChildLogger(pino({ level: 'silent' }), { engine: 'deepl' });
    expect(child.bindings()).toEqual({ engine: 'deepl' });
  });
});
