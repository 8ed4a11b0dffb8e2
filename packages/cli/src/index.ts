// Building blocks of the daemon, for scripts that embed the recorder.
export { createProgram, findSessionFiles, formatEvent, formatSummary, type CliDeps, type CliIO } from './cli.js';
export { Daemon, type DaemonDeps } from './daemon.js';
export {
  ConfigError,
  DEFAULT_CONFIG,
  configFromEnv,
  loadConfig,
  loadConfigFile,
  resolveConfig,
  type ConfigLayer,
  type RecorderConfig,
} from './config.js';
export { AlsaRawMidiSource, parseCards, type AlsaSourceOptions } from './alsaSource.js';
export { PortMonitor, selectPort, type EventSource, type PortHandle, type PortMonitorOptions } from './portMonitor.js';
export { createPathBuilder, sessionPath } from './pathBuilder.js';
export { CpuGovernorPower } from './power.js';
export { SystemdNotifier, type Notifier } from './notifier.js';
export { runCommand, type CommandRunner } from './command.js';
