import { getLogger } from '@screenlingo/logger';
import { ConfigError } from '@screenlingo/config';
import { FlowError, errorMessage, sanitizeErrorMessage } from './errors';

/**
 * Configura error handlers globais do processo
 */
export function setupErrorHandlers(): void {
  const logger = getLogger();

  process.on('uncaughtException', (error: Error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    process.exitCode = 1;
  });

  process.on('unhandledRejection', (reason: unknown) => {
    if (reason instanceof Error) {
      logger.error({ err: reason }, 'Unhandled promise rejection');
    } else {
      logger.error({ reason: String(reason) }, 'Unhandled promise rejection');
    }
  });

  process.on('warning', (warning: Error) => {
    logger.warn({ warning: warning.message }, 'Process warning');
  });
}

/**
 * Texto para o usuário (descrição + sugestão), sem segredos
 */
export function describeError(error: unknown): string {
  if (error instanceof FlowError) {
    const lines = [error.description];
    if (error.detail) lines.push(sanitizeErrorMessage(error.detail));
    if (error.recoverySuggestion) lines.push(error.recoverySuggestion);
    return lines.join('\n');
  }
  if (error instanceof ConfigError) {
    return [error.message, ...error.issues.map((issue) => `  - ${issue}`)].join('\n');
  }
  return sanitizeErrorMessage(errorMessage(error));
}
