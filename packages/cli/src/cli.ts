import { Command } from 'commander';
import { readdirSync, existsSync } from 'fs';
import { join, relative } from 'path';
import {
  SmfParseError,
  describeMessage,
  microsToBpm,
  readSmfFile,
  summarizeSmf,
} from '@pianolog/engine';
import type { LogLevel, SmfEvent, SmfSummary } from '@pianolog/engine';
import { configureLogging, createLogger } from '@pianolog/engine/util/logger';
import { AlsaRawMidiSource } from './alsaSource.js';
import { ConfigError, loadConfig } from './config.js';
import type { ConfigLayer } from './config.js';
import { Daemon } from './daemon.js';
import type { DaemonDeps } from './daemon.js';
import { selectPort } from './portMonitor.js';
import type { EventSource } from './portMonitor.js';

const log = createLogger('cli');

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliDeps {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  /** Port enumeration for `ports`; the daemon takes its own from `daemon`. */
  source?: EventSource;
  daemon?: DaemonDeps;
}

type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
  debug?: boolean;
  config?: string;
};

interface RecordOptions {
  baseDir?: string;
  port?: string;
  sessionTimeout?: string;
  logFile?: string;
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
};

// ---------- Formatting ----------

export function formatSummary(file: string, s: SmfSummary): string[] {
  return [
    `File: ${file}`,
    `Format ${s.format}, ${s.tracks} track(s), ${s.ticksPerBeat} ticks per beat`,
    `Tempo: ${s.tempo} us/beat (${microsToBpm(s.tempo).toFixed(1)} BPM)`,
    `Messages: ${s.messages} (${s.notes} notes)`,
    `Duration: ${s.durationSeconds.toFixed(2)} s (${s.totalTicks} ticks)`,
  ];
}

export function formatEvent(ev: SmfEvent): string {
  let text: string;
  switch (ev.type) {
    case 'tempo':
      text = `tempo ${ev.microsecondsPerBeat}`;
      break;
    case 'meta':
      text = `meta 0x${ev.metaType.toString(16).padStart(2, '0')} (${ev.data.length} bytes)`;
      break;
    default:
      text = describeMessage(ev.message);
  }
  return `  +${String(ev.delta).padEnd(6)} ${text}`;
}

/** Every `.mid` file below `dir`, sorted by path. */
export function findSessionFiles(dir: string): string[] {
  if (!existsSync(dir)) return [];
  const files: string[] = [];
  const walk = (current: string) => {
    for (const entry of readdirSync(current, { withFileTypes: true })) {
      const path = join(current, entry.name);
      if (entry.isDirectory()) walk(path);
      else if (entry.isFile() && entry.name.endsWith('.mid')) files.push(path);
    }
  };
  walk(dir);
  return files.sort();
}

// ---------- Program ----------

export function createProgram(deps: CliDeps = {}): Command {
  const io = deps.io ?? consoleIO;
  const env = deps.env ?? process.env;
  const program = new Command();

  program
    .name('pianolog')
    .description('Always-on MIDI recorder: every silence-bounded session becomes a MIDI file')
    .version('0.1.0');

  // Global options
  program
    .option('-v, --verbose', 'Enable debug logging')
    .option('-q, --quiet', 'Only log errors')
    .option('--debug', 'Print stack traces on failure')
    .option('-c, --config <file>', 'JSON configuration file');

  const globals = () => program.opts<GlobalOptions>();

  const logLevel = (fallback: LogLevel): LogLevel => {
    const g = globals();
    if (g.verbose) return 'debug';
    if (g.quiet) return 'error';
    return fallback;
  };

  const fail = (context: string, err: unknown) => {
    const showStack = globals().debug === true;
    const detail = err instanceof Error ? (showStack && err.stack ? err.stack : err.message) : String(err);
    io.err(`${context}: ${detail}`);
    process.exitCode = err instanceof ConfigError || err instanceof SmfParseError ? 2 : 1;
  };

  const toolLogging = () => configureLogging({ level: logLevel('warn'), file: '' });

  program
    .command('record', { isDefault: true })
    .description('Run the recorder until interrupted')
    .option('--base-dir <dir>', 'Directory that receives the recordings')
    .option('--port <match>', 'Prefer the input port whose name contains this text')
    .option('--session-timeout <seconds>', 'Silence that ends a session')
    .option('--log-file <path>', 'Log file (empty to disable)')
    .action(async (options: RecordOptions) => {
      const overrides: ConfigLayer = {
        baseDir: options.baseDir,
        portMatch: options.port,
        sessionTimeout: options.sessionTimeout,
        logFile: options.logFile,
      };
      let daemon: Daemon;
      try {
        const config = loadConfig({ configPath: globals().config, env, overrides });
        configureLogging({ level: logLevel(config.logLevel), file: config.logFile });
        daemon = new Daemon(config, deps.daemon);
      } catch (err) {
        fail('Cannot start recorder', err);
        return;
      }

      const onSignal = (signal: NodeJS.Signals) => {
        log.info(`Received ${signal}, shutting down`);
        void daemon.stop().then(
          () => process.exit(0),
          (err: unknown) => {
            log.error('Shutdown failed:', err);
            process.exit(1);
          },
        );
      };
      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);

      await daemon.start();
    });

  program
    .command('ports')
    .description('List MIDI input ports and mark the one the recorder would use')
    .action(() => {
      toolLogging();
      try {
        const config = loadConfig({ configPath: globals().config, env });
        const source = deps.source ?? new AlsaRawMidiSource();
        const ports = source.list();
        if (ports.length === 0) {
          io.out('No MIDI input ports found');
          return;
        }
        const chosen = selectPort(ports, config.portMatch);
        for (const name of ports) io.out(`${name === chosen ? '*' : ' '} ${name}`);
      } catch (err) {
        fail('Failed to list ports', err);
      }
    });

  program
    .command('inspect')
    .description('Print the header, tempo and length of a MIDI file')
    .argument('<file>', 'Path to the .mid file')
    .option('-e, --events', 'Also print every event with its delta')
    .action((file: string, options: { events?: boolean }) => {
      toolLogging();
      try {
        const smf = readSmfFile(file);
        for (const line of formatSummary(file, summarizeSmf(smf))) io.out(line);
        if (options.events) {
          smf.tracks.forEach((track, i) => {
            io.out(`Track ${i + 1}:`);
            for (const ev of track) io.out(formatEvent(ev));
          });
        }
      } catch (err) {
        fail(`Failed to inspect ${file}`, err);
      }
    });

  program
    .command('sessions')
    .description('List recorded sessions with their message counts and durations')
    .argument('[dir]', 'Recording directory (defaults to the configured base directory)')
    .action((dir: string | undefined) => {
      toolLogging();
      try {
        const root = dir ?? loadConfig({ configPath: globals().config, env }).baseDir;
        const files = findSessionFiles(root);
        if (files.length === 0) {
          io.out(`No sessions found in ${root}`);
          return;
        }
        let messages = 0;
        let seconds = 0;
        for (const file of files) {
          const name = relative(root, file);
          try {
            const s = summarizeSmf(readSmfFile(file));
            messages += s.messages;
            seconds += s.durationSeconds;
            io.out(`${name}  ${s.messages} messages  ${s.durationSeconds.toFixed(1)} s`);
          } catch (err) {
            io.out(`${name}  unreadable: ${err instanceof Error ? err.message : String(err)}`);
          }
        }
        io.out(`${files.length} session(s), ${messages} messages, ${seconds.toFixed(1)} s`);
      } catch (err) {
        fail('Failed to list sessions', err);
      }
    });

  return program;
}
