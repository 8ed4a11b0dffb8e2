/**
 * Input port supervision.
 *
 * Owns the open port handle. Every `portScanInterval` seconds it checks that
 * the port is still listed and open, and otherwise closes it and connects to
 * the best available one. The recorder only learns about changes through
 * `port` notices on its queue.
 */
import type { Clock, IngestionQueue, MidiMessage, QueueItem } from '@pianolog/engine';
import { monotonicClock } from '@pianolog/engine';
import { createLogger } from '@pianolog/engine/util/logger';

const log = createLogger('ports');

export interface PortHandle {
  readonly name: string;
  /** True once the port was closed or failed. */
  readonly closed: boolean;
  close(): void;
}

export interface EventSource {
  list(): string[];
  open(name: string, onMessage: (message: MidiMessage, timestamp: number) => void): PortHandle;
}

/**
 * First port whose name contains `match` (case-insensitive), else the first
 * port. Undefined when nothing is connected.
 */
export function selectPort(ports: readonly string[], match: string): string | undefined {
  const needle = match.toLowerCase();
  const preferred = needle ? ports.find(p => p.toLowerCase().includes(needle)) : undefined;
  return preferred ?? ports[0];
}

export interface PortMonitorOptions {
  source: EventSource;
  queue: IngestionQueue<QueueItem>;
  match: string;
  /** Seconds between scans. */
  scanInterval: number;
  /** Seconds before the next scan after a failed one. */
  errorBackoff: number;
  clock?: Clock;
}

export class PortMonitor {
  private handle: PortHandle | null = null;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private readonly clock: Clock;

  constructor(private readonly opts: PortMonitorOptions) {
    this.clock = opts.clock ?? monotonicClock;
  }

  get currentPort(): string | null {
    return this.handle?.name ?? null;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.tick();
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.release();
  }

  /** One supervision pass. Throws when listing or opening fails. */
  scan(): void {
    const ports = this.opts.source.list();
    const handle = this.handle;
    if (handle && !handle.closed && ports.includes(handle.name)) return;

    if (handle) {
      this.release();
      log.info(`MIDI port lost: ${handle.name}`);
      this.notify(null);
    }

    const name = selectPort(ports, this.opts.match);
    if (!name) return;

    const { queue } = this.opts;
    this.handle = this.opts.source.open(name, (message, timestamp) => {
      queue.push({ type: 'midi', message, timestamp });
    });
    log.info(`Connected to ${name}`);
    this.notify(name);
  }

  private tick(): void {
    let delay = this.opts.scanInterval;
    try {
      this.scan();
    } catch (err) {
      log.error('Port monitor error:', err instanceof Error ? err.message : err);
      delay = this.opts.errorBackoff;
    }
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick();
    }, delay * 1000);
  }

  private release(): void {
    const handle = this.handle;
    this.handle = null;
    if (!handle) return;
    try {
      handle.close();
    } catch (err) {
      log.warn(`Error closing ${handle.name}:`, err);
    }
  }

  private notify(name: string | null): void {
    this.opts.queue.push({ type: 'port', name, timestamp: this.clock.now() });
  }
}
