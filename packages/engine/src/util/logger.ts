/**
 * pianolog logger
 *
 * Centralized logging utility shared by the engine and the CLI daemon.
 *
 * Features:
 * - Runtime configurable log levels
 * - Module namespaces (queue, shortcuts, session, recorder, loop, alsa, ...)
 * - Optional append-only file sink next to the console output
 * - Structured logging support (objects are passed through untouched)
 *
 * Usage:
 * ```typescript
 * import { createLogger } from '@pianolog/engine/util/logger';
 *
 * const log = createLogger('session');
 *
 * log.debug('Opening track');
 * log.info({ event: 'saved', events: 120 });
 * log.warn('Power request failed');
 * log.error('Failed to write session', error);
 * ```
 */
import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { format } from 'util';

export type LogLevel = 'none' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['none', 'error', 'warn', 'info', 'debug'];

export interface LoggerConfig {
  level: LogLevel;
  modules?: string[];
  timestamps?: boolean;
  /** Append every emitted line to this file as well. Empty or undefined disables the sink. */
  file?: string;
}

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

// ---------- State ----------
let config: LoggerConfig = {
  level: 'error', // Safe default for library use; the daemon raises it
  modules: undefined,
  timestamps: true,
  file: undefined,
};

const moduleSet = new Set<string>();

let fileSinkReady = false;

// ---------- Configuration ----------

/**
 * Configure global logging settings.
 *
 * @example
 * ```typescript
 * configureLogging({
 *   level: 'debug',
 *   modules: ['session', 'shortcuts'],
 *   file: '/var/log/pianolog/pianolog.log'
 * });
 * ```
 */
export function configureLogging(opts: Partial<LoggerConfig>): void {
  config = { ...config, ...opts };
  if (opts.modules) {
    moduleSet.clear();
    opts.modules.forEach(m => moduleSet.add(m));
  }
  if ('file' in opts) fileSinkReady = false;

  // Console only: the file sink may be what was just reconfigured
  if (shouldLog('debug')) {
    console.log('[pianolog] Logging configured:', config);
  }
}

/**
 * Get current logging configuration.
 */
export function getLoggingConfig(): Readonly<LoggerConfig> {
  return { ...config };
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// ---------- Helpers ----------

function shouldLog(level: LogLevel, module?: string): boolean {
  const levelIndex = LOG_LEVELS.indexOf(level);
  const configIndex = LOG_LEVELS.indexOf(config.level);

  if (levelIndex > configIndex) return false;
  if (module && moduleSet.size > 0 && !moduleSet.has(module)) return false;

  return true;
}

function formatTimestamp(): string {
  if (!config.timestamps) return '';
  return `${new Date().toISOString()} `;
}

function writeToFile(line: string): void {
  const file = config.file;
  if (!file) return;
  try {
    if (!fileSinkReady) {
      mkdirSync(dirname(file), { recursive: true });
      fileSinkReady = true;
    }
    appendFileSync(file, line + '\n');
  } catch (err) {
    // Drop the sink so a read-only log directory does not fail every line
    config = { ...config, file: undefined };
    console.warn(`[logger] File logging disabled for ${file}:`, err instanceof Error ? err.message : err);
  }
}

function output(level: LogLevel, module: string | undefined, args: unknown[]): void {
  const prefix = `${formatTimestamp()}[${module ?? 'pianolog'}]`;

  switch (level) {
    case 'error': console.error(prefix, ...args); break;
    case 'warn': console.warn(prefix, ...args); break;
    case 'info': console.info(prefix, ...args); break;
    default: console.log(prefix, ...args);
  }

  if (config.file) {
    writeToFile(`${prefix} ${level.toUpperCase()} ${format(...args)}`);
  }
}

// ---------- Public Logger Factory ----------

/**
 * Create a namespaced logger for a specific module.
 *
 * @param module - Module name (e.g., 'session', 'shortcuts', 'alsa')
 */
export function createLogger(module: string): Logger {
  return {
    error: (...args: unknown[]) => {
      if (shouldLog('error', module)) {
        output('error', module, args);
      }
    },
    warn: (...args: unknown[]) => {
      if (shouldLog('warn', module)) {
        output('warn', module, args);
      }
    },
    info: (...args: unknown[]) => {
      if (shouldLog('info', module)) {
        output('info', module, args);
      }
    },
    debug: (...args: unknown[]) => {
      if (shouldLog('debug', module)) {
        output('debug', module, args);
      }
    },
  };
}

export default createLogger;
