import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { homedir, tmpdir } from 'os';
import { join } from 'path';
import {
  ConfigError,
  DEFAULT_CONFIG,
  configFromEnv,
  loadConfig,
  loadConfigFile,
  resolveConfig,
} from '../src/config';
import type { ConfigLayer } from '../src/config';

describe('resolveConfig', () => {
  it('returns the defaults when nothing is set', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.baseDir).toBe(join(homedir(), 'midi_recordings'));
    expect(DEFAULT_CONFIG.lowNote).toBe(22);
    expect(DEFAULT_CONFIG.highNote).toBe(106);
  });

  it('lets later layers override earlier ones and parses numeric strings', () => {
    const config = resolveConfig({ sessionTimeout: 10, portMatch: 'yamaha' }, { sessionTimeout: '2.5' });
    expect(config.sessionTimeout).toBe(2.5);
    expect(config.portMatch).toBe('yamaha');
  });

  it('expands a leading ~ in the base directory', () => {
    expect(resolveConfig({ baseDir: '~/rec' }).baseDir).toBe(join(homedir(), 'rec'));
    expect(resolveConfig({ baseDir: '/srv/midi' }).baseDir).toBe('/srv/midi');
  });

  it('normalizes the log level', () => {
    expect(resolveConfig({ logLevel: 'DEBUG' }).logLevel).toBe('debug');
  });

  const invalid: Array<[ConfigLayer, string]> = [
    [{ lowNote: 128 }, "Invalid configuration 'lowNote': expected an integer in 0-127, got 128"],
    [{ highNote: 60.5 }, "Invalid configuration 'highNote': expected an integer in 0-127, got 60.5"],
    [{ sessionTimeout: '0' }, "Invalid configuration 'sessionTimeout': must be greater than 0, got 0"],
    [{ sessionTimeout: 'soon' }, 'Invalid configuration \'sessionTimeout\': expected a number, got "soon"'],
    [{ ticksPerBeat: 32768 }, "Invalid configuration 'ticksPerBeat': expected an integer in 1-32767, got 32768"],
    [{ tempo: 0 }, "Invalid configuration 'tempo': expected an integer in 1-16777215, got 0"],
    [{ logLevel: 'loud' }, "Invalid configuration 'logLevel': unknown log level 'loud'"],
    [{ baseDir: '  ' }, "Invalid configuration 'baseDir': must not be empty"],
    [{ lowNote: 60, highNote: 60 }, "Invalid configuration 'highNote': must differ from lowNote (60)"],
    [
      { ticksPerBeat: 32767, tempo: 1 },
      "Invalid configuration 'tempo': 1 us/beat at 32767 ticks per beat overflows a MIDI delta within 6 s",
    ],
  ];

  it.each(invalid)('rejects %j', (layer, message) => {
    expect(() => resolveConfig(layer)).toThrow(ConfigError);
    expect(() => resolveConfig(layer)).toThrow(message);
  });
});

describe('configFromEnv', () => {
  it('maps PIANOLOG_* variables and skips empty values except the log file', () => {
    const layer = configFromEnv({
      PIANOLOG_BASE_DIR: '/srv/midi',
      PIANOLOG_LOW_NOTE: '21',
      PIANOLOG_TEMPO: '',
      PIANOLOG_LOG_FILE: '',
      HOME: '/home/player',
    });
    expect(layer).toEqual({ baseDir: '/srv/midi', lowNote: '21', logFile: '' });
  });
});

describe('config files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pianolog-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeJson(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  }

  it('reads known keys', () => {
    const path = writeJson('ok.json', '{ "sessionTimeout": 8, "portMatch": "roland" }');
    expect(loadConfigFile(path)).toEqual({ sessionTimeout: 8, portMatch: 'roland' });
  });

  it('rejects unknown keys by name', () => {
    const path = writeJson('bad.json', '{ "timeout": 3 }');
    expect(() => loadConfigFile(path)).toThrow(`Invalid configuration 'timeout': unknown key in ${path}`);
  });

  it('rejects invalid JSON and non-object documents', () => {
    expect(() => loadConfigFile(writeJson('broken.json', '{ sessionTimeout'))).toThrow(ConfigError);
    const list = writeJson('list.json', '[1, 2]');
    expect(() => loadConfigFile(list)).toThrow(`Invalid configuration 'config': ${list} must contain a JSON object`);
  });

  it('reports a missing file as a configuration error', () => {
    expect(() => loadConfigFile(join(dir, 'missing.json'))).toThrow(ConfigError);
  });

  it('applies file, then environment, then overrides', () => {
    const path = writeJson('layered.json', '{ "sessionTimeout": 8, "portMatch": "roland" }');
    const env = { PIANOLOG_CONFIG: path, PIANOLOG_SESSION_TIMEOUT: '6' };

    const fromEnv = loadConfig({ env });
    expect(fromEnv.sessionTimeout).toBe(6);
    expect(fromEnv.portMatch).toBe('roland');

    const overridden = loadConfig({ env, overrides: { sessionTimeout: '7' } });
    expect(overridden.sessionTimeout).toBe(7);
  });

  it('prefers an explicit config path over PIANOLOG_CONFIG', () => {
    const a = writeJson('a.json', '{ "portMatch": "casio" }');
    const b = writeJson('b.json', '{ "portMatch": "korg" }');
    expect(loadConfig({ configPath: b, env: { PIANOLOG_CONFIG: a } }).portMatch).toBe('korg');
  });
});
