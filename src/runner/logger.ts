/**
 * JSON-lines diagnostics for the toolkit itself.
 *
 * The sink and the OIDC client record what they did under dotted action
 * names: `file_command.write` (target variable and bytes appended),
 * `oidc.request` (audience and timeout) and `oidc.response` (status). The CLI
 * points `filePath` at `--log-file` and turns on `json` and debug level with
 * `--verbose`.
 *
 * Lines never reach stdout, where the orchestrator would read them as
 * workflow commands. The request token and minted ID tokens pass through the
 * same code, so every data record is redacted before it is kept.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { redactRecord } from './redact.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  action: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface StructuredLogger {
  debug(action: string, message: string, data?: Record<string, unknown>): void;
  info(action: string, message: string, data?: Record<string, unknown>): void;
  warn(action: string, message: string, data?: Record<string, unknown>): void;
  error(action: string, message: string, data?: Record<string, unknown>): void;
  /** Entries recorded so far, oldest first. */
  entries(): readonly LogEntry[];
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEcho {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  module: string;
  filePath?: string;
  minLevel?: LogLevel;
  /** Echo every entry to stderr; otherwise only `error` entries are echoed. */
  json?: boolean;
  /** Echo target; the CLI passes its own stderr so tests can capture it. */
  stderr?: LogEcho;
  now?: () => Date;
}

export function createLogger(opts: LoggerOptions): StructuredLogger {
  const buffer: LogEntry[] = [];
  const minPriority = LEVEL_PRIORITY[opts.minLevel ?? 'info'];
  const stderr = opts.stderr ?? process.stderr;
  const now = opts.now ?? ((): Date => new Date());
  let logDirReady = false;

  function append(filePath: string, line: string): void {
    if (!logDirReady) {
      mkdirSync(dirname(filePath), { recursive: true });
      logDirReady = true;
    }
    appendFileSync(filePath, line, 'utf-8');
  }

  function emit(level: LogLevel, action: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const entry: LogEntry = {
      timestamp: now().toISOString(),
      level,
      module: opts.module,
      action,
      message,
      ...(data && { data: redactRecord(data) }),
    };

    buffer.push(entry);

    const line = JSON.stringify(entry) + '\n';
    if (opts.filePath) append(opts.filePath, line);
    if (opts.json || level === 'error') stderr.write(line);
  }

  return {
    debug: (action, message, data) => emit('debug', action, message, data),
    info: (action, message, data) => emit('info', action, message, data),
    warn: (action, message, data) => emit('warn', action, message, data),
    error: (action, message, data) => emit('error', action, message, data),
    entries: (): readonly LogEntry[] => buffer,
  };
}
