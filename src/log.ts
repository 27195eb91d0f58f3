// src/log.ts

import { appendFileSync } from 'node:fs';
import type { Logger, LogLevel } from './types';

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const CONSOLE: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export type LoggerOptions = {
  level?: LogLevel;
  file?: string;
};

const appendLine = (file: string, line: string): void => {
  try {
    appendFileSync(file, `${line}\n`, { encoding: 'utf8' });
  } catch (e) {
    console.warn(`⚠️ [log] cannot write to ${file}: ${String(e)}`);
  }
};

export const createLogger = ({ level = 'info', file }: LoggerOptions = {}): Logger => {
  const emit =
    (severity: LogLevel) =>
    (message: string): void => {
      if (RANK[severity] < RANK[level]) return;
      const line = `[${new Date().toISOString()}] [${severity.toUpperCase()}] ${message}`;
      CONSOLE[severity](line);
      if (file) appendLine(file, line);
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

const log =
  (logger: Logger, level: LogLevel, emoji: string, tag: string, msg: string) =>
  <T>(value: T): T => {
    logger[level](`${emoji} [${tag}] ${msg}`);
    return value;
  };

export const logProcessing = (logger: Logger, name: string) =>
  log(logger, 'info', '📄', name, 'processing');

export const logMoved = (logger: Logger, name: string, destination: string) =>
  log(logger, 'info', '📦', name, `moved -> ${destination}`);

export const logDuplicate = (logger: Logger, name: string) =>
  log(logger, 'info', '♻️', name, 'duplicate found, deleting source');

export const logDryRun = (logger: Logger, source: string, destination: string) =>
  log(logger, 'info', '🧪', 'dry-run', `would move ${source} -> ${destination}`);

export const logQuarantine = (logger: Logger, name: string, target: string) =>
  log(logger, 'warn', '🔒', name, `locked source moved to ${target}`);

export const logFailed = (logger: Logger, name: string, reason: string) =>
  log(logger, 'error', '💥', name, reason);

export const logCleanup = (logger: Logger, type: string) =>
  log(logger, 'debug', '🧹', type, 'cleanup executed');

export const logCleanupReg = (logger: Logger, type: string) =>
  log(logger, 'debug', '📋', type, 'cleanup registered');

export const logCleanupClear = (logger: Logger, type: string) =>
  log(logger, 'debug', '✓', type, 'cleanup cleared');

export const logRecovery = (logger: Logger, id: string, count: number) =>
  log(logger, 'warn', '🔧', id, `recovering ${count} pending cleanups`);

export type LogRecord = { level: LogLevel; message: string };

// Keeps every line in memory; used by tests and embedders that inspect output.
export const collectingLogger = (): Logger & { records: LogRecord[] } => {
  const records: LogRecord[] = [];
  const keep =
    (level: LogLevel) =>
    (message: string): void => {
      records.push({ level, message });
    };
  return { records, debug: keep('debug'), info: keep('info'), warn: keep('warn'), error: keep('error') };
};
