/**
 * The long-running recorder: port monitor, recorder and control loop wired
 * together from a resolved configuration.
 */
import { ControlLoop, Recorder } from '@pianolog/engine';
import type { Clock, PowerManager, SessionSummary } from '@pianolog/engine';
import { createLogger } from '@pianolog/engine/util/logger';
import { AlsaRawMidiSource } from './alsaSource.js';
import type { RecorderConfig } from './config.js';
import { createPathBuilder } from './pathBuilder.js';
import { type EventSource, PortMonitor } from './portMonitor.js';
import { CpuGovernorPower } from './power.js';
import { type Notifier, SystemdNotifier } from './notifier.js';

const log = createLogger('cli');

export interface DaemonDeps {
  source?: EventSource;
  power?: PowerManager;
  notifier?: Notifier;
  clock?: Clock;
  wallClock?: () => Date;
  onSessionEnd?: (summary: SessionSummary) => void;
}

export class Daemon {
  readonly recorder: Recorder;
  readonly loop: ControlLoop;
  readonly monitor: PortMonitor;
  private readonly notifier: Notifier;
  private stopping: Promise<SessionSummary | undefined> | null = null;

  constructor(readonly config: RecorderConfig, deps: DaemonDeps = {}) {
    this.notifier = deps.notifier ?? new SystemdNotifier();
    this.recorder = new Recorder({
      pathBuilder: createPathBuilder(config.baseDir),
      config,
      clock: deps.clock,
      wallClock: deps.wallClock,
      power: deps.power ?? new CpuGovernorPower(),
      onSessionEnd: deps.onSessionEnd,
    });
    this.loop = new ControlLoop(this.recorder, { clock: deps.clock, heartbeat: this.notifier });
    this.monitor = new PortMonitor({
      source: deps.source ?? new AlsaRawMidiSource({ clock: deps.clock }),
      queue: this.recorder.queue,
      match: config.portMatch,
      scanInterval: config.portScanInterval,
      errorBackoff: config.portErrorBackoff,
      clock: deps.clock,
    });
  }

  /** Resolves once the control loop has exited after {@link stop}. */
  start(): Promise<void> {
    log.info(`Recording to ${this.config.baseDir}`);
    this.monitor.start();
    const finished = this.loop.start();
    this.notifier.ready();
    return finished;
  }

  /** Flush the open session, then release the port. Safe to call twice. */
  stop(): Promise<SessionSummary | undefined> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  private async shutdown(): Promise<SessionSummary | undefined> {
    this.notifier.stopping();
    try {
      return await this.loop.stop();
    } finally {
      this.monitor.stop();
    }
  }
}
