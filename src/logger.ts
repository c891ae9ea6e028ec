// src/logger.ts: Unified pino-based logger
//
// Single logger with two transports:
//   1. Console: pino-pretty on a TTY, JSON lines otherwise
//   2. File: JSONL to ~/.fmgw/data/fmgw.log (always debug level)
//
// Call sites use our Logger interface, never import pino directly.

import pino from 'pino';
import type { Logger as PinoLogger, DestinationStream } from 'pino';
import { mkdirSync } from 'node:fs';
import { dataDir, logPath } from './paths.js';

// ═══════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
  debug(msg: string, details?: Record<string, unknown>): void;
  info(msg: string, details?: Record<string, unknown>): void;
  warn(msg: string, details?: Record<string, unknown>): void;
  error(msg: string, details?: Record<string, unknown>): void;
  fatal(msg: string, details?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  /** Console log level. Default: 'info'. Use 'silent' to disable console. */
  level?: LogLevel;
  /** Override console output stream (for testing). */
  stream?: DestinationStream;
  /** Enable file transport to ~/.fmgw/data/fmgw.log. Default: true unless FMGW_LOG_FILE=0. */
  file?: boolean;
  /** Pretty print to console. Default: true when stdout is a TTY. */
  pretty?: boolean;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(l => l === value);
}

function envLevel(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL;
  return isLogLevel(raw) ? raw : undefined;
}

// ═══════════════════════════════════════════════════════
// Logger Factory
// ═══════════════════════════════════════════════════════

function wrapPino(p: PinoLogger): Logger {
  return {
    debug(msg, details) { details ? p.debug(details, msg) : p.debug(msg); },
    info(msg, details) { details ? p.info(details, msg) : p.info(msg); },
    warn(msg, details) { details ? p.warn(details, msg) : p.warn(msg); },
    error(msg, details) { details ? p.error(details, msg) : p.error(msg); },
    fatal(msg, details) { details ? p.fatal(details, msg) : p.fatal(msg); },
    child(bindings) { return wrapPino(p.child(bindings)); },
  };
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? envLevel() ?? 'info';

  // If a test stream is provided, use it directly (no transports)
  if (opts.stream) {
    return wrapPino(pino({ level }, opts.stream));
  }

  const usePretty = opts.pretty ?? process.stdout.isTTY ?? false;
  const useFile = opts.file ?? process.env.FMGW_LOG_FILE !== '0';

  const targets: pino.TransportTargetOptions[] = [];

  if (useFile) {
    try { mkdirSync(dataDir(), { recursive: true }); } catch { /* pino/file mkdir retries */ }
    targets.push({
      target: 'pino/file',
      options: { destination: logPath(), mkdir: true },
      level: 'debug', // file always captures everything
    });
  }

  if (level === 'silent') {
    // Console disabled; nothing to spin a transport up for without the file.
    if (!useFile) return wrapPino(pino({ level: 'silent' }));
  } else if (usePretty) {
    targets.push({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
      level,
    });
  } else {
    // JSON to stdout for production/piping
    targets.push({
      target: 'pino/file',
      options: { destination: 1 }, // fd 1 = stdout
      level,
    });
  }

  const transport = pino.transport({ targets });
  // Root level must admit the file transport's debug lines.
  const rootLevel = useFile ? 'debug' : level;
  return wrapPino(pino({ level: rootLevel }, transport));
}

// ═══════════════════════════════════════════════════════
// Singleton & Convenience
// ═══════════════════════════════════════════════════════

let _defaultLogger: Logger | null = null;

/** Get or create the default singleton logger. */
export function getLogger(): Logger {
  if (!_defaultLogger) {
    _defaultLogger = createLogger();
  }
  return _defaultLogger;
}

/** Initialize the singleton logger with specific options. Call once at startup. */
export function initLogger(opts: LoggerOptions): Logger {
  _defaultLogger = createLogger(opts);
  return _defaultLogger;
}

/** Reset singleton (for tests). */
export function resetLogger(): void {
  _defaultLogger = null;
}

// ═══════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════

/** Truncate a string for logging (avoids massive payloads). */
export function truncate(s: string, maxLen = 500): string {
  return s.length > maxLen ? s.slice(0, maxLen) + `...[${s.length} total]` : s;
}

/** First `maxLen` characters followed by an ellipsis, for prompt/response previews. */
export function preview(s: string, maxLen = 50): string {
  return s.length > maxLen ? `${s.slice(0, maxLen)}...` : s;
}
