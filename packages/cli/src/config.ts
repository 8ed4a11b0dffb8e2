/**
 * Recorder configuration.
 *
 * Sources, later overriding earlier: built-in defaults, a JSON file
 * (`--config` or `PIANOLOG_CONFIG`), `PIANOLOG_*` environment variables,
 * then command-line flags. Every value is validated once, after merging.
 */
import { readFileSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { DEFAULT_ENGINE_CONFIG, MAX_VLQ, isLogLevel, ticksBetween } from '@pianolog/engine';
import type { EngineConfig, LogLevel } from '@pianolog/engine';
import { createLogger } from '@pianolog/engine/util/logger';

const log = createLogger('config');

export interface RecorderConfig extends EngineConfig {
  /** Root of the YYYY/MM-Month/DD recording tree. */
  baseDir: string;
  /** Case-insensitive substring that selects the preferred input port. */
  portMatch: string;
  portScanInterval: number;
  portErrorBackoff: number;
  /** Empty string disables the file sink. */
  logFile: string;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<RecorderConfig> = Object.freeze({
  ...DEFAULT_ENGINE_CONFIG,
  baseDir: join(homedir(), 'midi_recordings'),
  portMatch: 'pia',
  portScanInterval: 1,
  portErrorBackoff: 2,
  logFile: '/var/log/pianolog/pianolog.log',
  logLevel: 'info',
});

export type ConfigKey = keyof RecorderConfig;

/** One source of settings before validation. */
export type ConfigLayer = Partial<Record<ConfigKey, unknown>>;

export class ConfigError extends Error {
  constructor(readonly key: string, detail: string) {
    super(`Invalid configuration '${key}': ${detail}`);
    this.name = 'ConfigError';
  }
}

// ---------- Validators ----------

function toNumber(value: unknown, key: string): number {
  const n = typeof value === 'number'
    ? value
    : typeof value === 'string' && value.trim() !== '' ? Number(value) : Number.NaN;
  if (!Number.isFinite(n)) throw new ConfigError(key, `expected a number, got ${JSON.stringify(value)}`);
  return n;
}

function duration(value: unknown, key: string): number {
  const n = toNumber(value, key);
  if (n <= 0) throw new ConfigError(key, `must be greater than 0, got ${n}`);
  return n;
}

function integer(min: number, max: number) {
  return (value: unknown, key: string): number => {
    const n = toNumber(value, key);
    if (!Number.isInteger(n) || n < min || n > max) {
      throw new ConfigError(key, `expected an integer in ${min}-${max}, got ${n}`);
    }
    return n;
  };
}

function text(value: unknown, key: string): string {
  if (typeof value !== 'string') throw new ConfigError(key, `expected a string, got ${JSON.stringify(value)}`);
  return value;
}

function directory(value: unknown, key: string): string {
  const dir = text(value, key).trim();
  if (dir === '') throw new ConfigError(key, 'must not be empty');
  if (dir === '~' || dir.startsWith('~/')) return join(homedir(), dir.slice(1));
  return resolve(dir);
}

function level(value: unknown, key: string): LogLevel {
  const name = text(value, key).toLowerCase();
  if (!isLogLevel(name)) throw new ConfigError(key, `unknown log level '${name}'`);
  return name;
}

type Validators = { [K in ConfigKey]: (value: unknown, key: K) => RecorderConfig[K] };

const VALIDATORS: Validators = {
  baseDir: directory,
  sessionTimeout: duration,
  checkInterval: duration,
  idleCheckInterval: duration,
  activeSleep: duration,
  errorBackoff: duration,
  shortcutTimeout: duration,
  lowNote: integer(0, 127),
  highNote: integer(0, 127),
  ticksPerBeat: integer(1, 0x7fff),
  tempo: integer(1, 0xffffff),
  stopSuffix: text,
  bookmarkSuffix: text,
  portMatch: text,
  portScanInterval: duration,
  portErrorBackoff: duration,
  logFile: text,
  logLevel: level,
};

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(VALIDATORS, key);
}

const CONFIG_KEYS: readonly ConfigKey[] = Object.keys(VALIDATORS).filter(isConfigKey);

function applyKey<K extends ConfigKey>(target: RecorderConfig, key: K, value: unknown): void {
  target[key] = VALIDATORS[key](value, key);
}

// ---------- Sources ----------

const ENV_VARS: ReadonlyArray<readonly [string, ConfigKey]> = [
  ['PIANOLOG_BASE_DIR', 'baseDir'],
  ['PIANOLOG_SESSION_TIMEOUT', 'sessionTimeout'],
  ['PIANOLOG_SHORTCUT_TIMEOUT', 'shortcutTimeout'],
  ['PIANOLOG_LOW_NOTE', 'lowNote'],
  ['PIANOLOG_HIGH_NOTE', 'highNote'],
  ['PIANOLOG_TICKS_PER_BEAT', 'ticksPerBeat'],
  ['PIANOLOG_TEMPO', 'tempo'],
  ['PIANOLOG_PORT', 'portMatch'],
  ['PIANOLOG_LOG_FILE', 'logFile'],
  ['PIANOLOG_LOG_LEVEL', 'logLevel'],
];

/** Settings from `PIANOLOG_*` variables. Empty values are ignored, except the log file. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const layer: ConfigLayer = {};
  for (const [name, key] of ENV_VARS) {
    const value = env[name];
    if (value === undefined || (value === '' && key !== 'logFile')) continue;
    layer[key] = value;
  }
  return layer;
}

/** Read a JSON configuration file; unknown keys are rejected. */
export function loadConfigFile(path: string): ConfigLayer {
  let source: string;
  try {
    source = readFileSync(path, 'utf8');
  } catch (err) {
    throw new ConfigError('config', `cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(source);
  } catch (err) {
    throw new ConfigError('config', `${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ConfigError('config', `${path} must contain a JSON object`);
  }

  const layer: ConfigLayer = {};
  for (const [key, value] of Object.entries(data)) {
    if (!isConfigKey(key)) throw new ConfigError(key, `unknown key in ${path}`);
    layer[key] = value;
  }
  return layer;
}

/** Merge layers over the defaults and validate the result. */
export function resolveConfig(...layers: ConfigLayer[]): RecorderConfig {
  const config: RecorderConfig = { ...DEFAULT_CONFIG };
  for (const key of CONFIG_KEYS) {
    let value: unknown = DEFAULT_CONFIG[key];
    for (const layer of layers) {
      if (layer[key] !== undefined) value = layer[key];
    }
    applyKey(config, key, value);
  }
  if (config.lowNote === config.highNote) {
    throw new ConfigError('highNote', `must differ from lowNote (${config.lowNote})`);
  }
  // A session never goes quieter than this before it is closed
  const gap = config.sessionTimeout + config.checkInterval;
  if (ticksBetween(0, gap, config.ticksPerBeat, config.tempo) > MAX_VLQ) {
    throw new ConfigError('tempo', `${config.tempo} us/beat at ${config.ticksPerBeat} ticks per beat overflows a MIDI delta within ${gap} s`);
  }
  return config;
}

export interface LoadConfigOptions {
  /** JSON file; falls back to `PIANOLOG_CONFIG`. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Command-line values, highest precedence. */
  overrides?: ConfigLayer;
}

export function loadConfig(opts: LoadConfigOptions = {}): RecorderConfig {
  const env = opts.env ?? process.env;
  const path = opts.configPath ?? (env.PIANOLOG_CONFIG || undefined);
  const fileLayer = path ? loadConfigFile(path) : {};
  const config = resolveConfig(fileLayer, configFromEnv(env), opts.overrides ?? {});
  log.debug('Resolved configuration', path ? `(file ${path})` : '(no file)', config);
  return config;
}
