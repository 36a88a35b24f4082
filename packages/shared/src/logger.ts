/**
 * Structured Logging with Correlation IDs
 *
 * One JSON line per entry. Every entry carries the correlation ID and the
 * document of the current AsyncLocalStorage context.
 *
 * LOG_LEVEL selects the threshold: debug | info | warn | error | silent.
 * Without it, debug lines are printed everywhere except production.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function threshold(): number {
  const level = process.env.LOG_LEVEL;
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error' || level === 'silent') {
    return LEVEL_RANK[level];
  }
  return process.env.NODE_ENV === 'production' ? LEVEL_RANK.info : LEVEL_RANK.debug;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= threshold();
}

function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const reqContext = getContext();

  const logEntry = {
    timestamp: new Date().toISOString(),
    level: level.toUpperCase(),
    correlationId: getCorrelationId(),
    documentId: reqContext?.documentId,
    sourceFilename: reqContext?.sourceFilename,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export function serializeError(error: unknown): LogContext | string {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
      name: error.name,
    };
  }
  return String(error);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (enabled('info')) console.log(formatLog('info', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('warn')) console.warn(formatLog('warn', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (!enabled('error')) return;
    console.error(formatLog('error', message, { ...context, error: serializeError(error) }));
  },

  debug: (message: string, context?: LogContext) => {
    if (enabled('debug')) console.debug(formatLog('debug', message, context));
  },
};
