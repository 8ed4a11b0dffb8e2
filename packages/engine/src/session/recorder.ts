/**
 * Session state machine.
 *
 * The Recorder owns all mutable capture state: the pending queue, the open
 * session (if any), the shortcut watchers and the low-power flag. Only the
 * control loop calls into it; input callbacks reach it through `queue`.
 *
 *   idle --(musical event)--> recording
 *   recording --(silence > sessionTimeout | gesture | shutdown)--> idle
 */
import { createLogger } from '../util/logger.js';
import { DEFAULT_ENGINE_CONFIG, EngineConfig } from '../config.js';
import type { MidiMessage } from '../midi/message.js';
import { IngestionQueue } from '../capture/queue.js';
import { ReservedNoteWatcher, ShortcutDetector, ShortcutHost } from '../capture/shortcuts.js';
import { monotonicClock } from '../capture/clock.js';
import type { Clock, PathBuilder, PowerManager, QueueItem, QueuedMessage } from '../capture/types.js';
import { SessionSummary, SessionWriter } from './sessionWriter.js';

const log = createLogger('recorder');

export type RecorderState = 'idle' | 'recording';

export interface RecorderOptions {
  pathBuilder: PathBuilder;
  config?: Partial<EngineConfig>;
  clock?: Clock;
  /** Calendar time of a session start, used for its file name. */
  wallClock?: () => Date;
  power?: PowerManager;
  queue?: IngestionQueue<QueueItem>;
  onSessionEnd?: (summary: SessionSummary) => void;
}

export interface StopOptions {
  suffix?: string;
  /** Discard queued input instead of writing it to the session. */
  skipQueue?: boolean;
  /** Discard events held by the shortcut watchers instead of writing them. */
  skipBuffer?: boolean;
}

interface ActiveSession {
  writer: SessionWriter;
  startInstant: number;
  firstEventTime: number;
}

export class Recorder implements ShortcutHost {
  readonly config: Readonly<EngineConfig>;
  readonly queue: IngestionQueue<QueueItem>;
  readonly shortcuts: ShortcutDetector;

  private readonly clock: Clock;
  private readonly wallClock: () => Date;
  private session: ActiveSession | null = null;
  private lowPower = false;
  private lastActivity: number;
  private port: string | null = null;
  private backlog: QueueItem[] = [];

  constructor(private readonly opts: RecorderOptions) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...opts.config };
    this.queue = opts.queue ?? new IngestionQueue<QueueItem>();
    this.clock = opts.clock ?? monotonicClock;
    this.wallClock = opts.wallClock ?? (() => new Date());
    this.shortcuts = new ShortcutDetector({
      lowNote: this.config.lowNote,
      highNote: this.config.highNote,
      timeout: this.config.shortcutTimeout,
      stopSuffix: this.config.stopSuffix,
      bookmarkSuffix: this.config.bookmarkSuffix,
    });
    this.lastActivity = this.clock.now();
  }

  get state(): RecorderState {
    return this.session ? 'recording' : 'idle';
  }

  get isRecording(): boolean {
    return this.session !== null;
  }

  get inLowPower(): boolean {
    return this.lowPower;
  }

  get lastActivityInstant(): number {
    return this.lastActivity;
  }

  get currentPort(): string | null {
    return this.port;
  }

  /** Events written to the open session so far, or undefined when idle. */
  get sessionEvents(): number | undefined {
    return this.session?.writer.eventCount;
  }

  get sessionStartInstant(): number | undefined {
    return this.session?.startInstant;
  }

  get firstEventTime(): number | undefined {
    return this.session?.firstEventTime;
  }

  /** Producer side: stamp-and-push, safe to call from any input callback. */
  enqueue(message: MidiMessage, timestamp: number = this.clock.now()): void {
    this.queue.push({ type: 'midi', message, timestamp });
  }

  /**
   * Process everything queued so far, in order. Returns the number of items
   * handled. A gesture that clears the queue also abandons the rest of the
   * batch being processed.
   */
  processPending(): number {
    const batch = this.backlog.length > 0 ? [...this.backlog, ...this.queue.drain()] : this.queue.drain();
    this.backlog = [];
    const epoch = this.queue.epoch;
    let handled = 0;
    for (let i = 0; i < batch.length; i++) {
      if (this.queue.epoch !== epoch) break;
      try {
        this.processItem(batch[i]);
      } catch (err) {
        // Keep the rest for the next pass; the failing item is dropped
        this.backlog = batch.slice(i + 1);
        throw err;
      }
      handled++;
    }
    return handled;
  }

  processItem(item: QueueItem): void {
    if (item.type === 'port') {
      if (item.name !== this.port) {
        log.info(item.name ? `Input port: ${item.name}` : 'Input port lost');
      }
      this.port = item.name;
      return;
    }
    this.processMessage(item);
  }

  processMessage(entry: QueuedMessage): void {
    const { message, timestamp } = entry;
    if (message.kind === 'clock' || message.kind === 'active_sensing') return;

    if (this.shortcuts.consumeTrailingRelease(message)) {
      log.debug(`Dropped release of gesture note ${message.note}`);
      return;
    }

    this.lastActivity = this.clock.now();
    if (this.lowPower) this.exitLowPower();

    const session = this.session ?? this.startSession(timestamp);
    if (!this.shortcuts.handle(entry, this)) {
      session.writer.write(message, timestamp);
    }
  }

  /** Close the session when it has been silent for longer than `sessionTimeout`. */
  checkTimeout(): SessionSummary | undefined {
    if (this.clock.now() - this.lastActivity <= this.config.sessionTimeout) return undefined;

    let summary: SessionSummary | undefined;
    if (this.session) {
      log.info('Session timeout - stopping recording');
      summary = this.stop();
    }
    this.enterLowPower();
    return summary;
  }

  stop(opts: StopOptions = {}): SessionSummary | undefined {
    const session = this.session;
    if (!session) return undefined;
    const suffix = opts.suffix ?? '';

    if (opts.skipQueue) {
      this.discardQueued();
    } else {
      try {
        this.processPending();
      } catch (err) {
        log.error('Error processing queued input while closing session:', err);
      }
      // A queued gesture may have closed the session already
      if (this.session !== session) return undefined;
    }

    if (opts.skipBuffer) {
      this.shortcuts.reset();
    } else {
      this.shortcuts.flushAll(this);
    }
    this.session = null;

    let summary = session.writer.summary(suffix);
    try {
      summary = session.writer.save(suffix);
      if (summary.path) {
        log.info(`Saved recording to ${summary.path}`);
        log.info(`Session duration: ${summary.durationSeconds.toFixed(1)} seconds, Messages: ${summary.events}`);
      } else {
        log.info('Session ended with nothing to save');
      }
    } catch (err) {
      log.error(`Failed to save session started ${session.writer.startedAt.toISOString()} (${summary.events} messages):`, err);
    }

    this.opts.onSessionEnd?.(summary);
    return summary;
  }

  /** Flush and close the open session; used on process termination. */
  shutdown(): SessionSummary | undefined {
    // Input queued before the first pass may still open a session
    try {
      this.processPending();
    } catch (err) {
      log.error('Error processing queued input during shutdown:', err);
    }
    if (this.session) log.info('Shutting down - closing open session');
    return this.stop();
  }

  // ---------- ShortcutHost ----------

  commit(entry: QueuedMessage): void {
    if (!this.session) {
      log.warn('Dropping held event with no open session');
      return;
    }
    this.session.writer.write(entry.message, entry.timestamp);
  }

  trigger(watcher: ReservedNoteWatcher): void {
    this.discardQueued();
    this.stop({ suffix: watcher.suffix, skipQueue: true, skipBuffer: true });
  }

  // ---------- Internals ----------

  private startSession(firstEventTime: number): ActiveSession {
    const writer = new SessionWriter(this.wallClock(), {
      ticksPerBeat: this.config.ticksPerBeat,
      tempo: this.config.tempo,
      pathBuilder: this.opts.pathBuilder,
    });
    this.shortcuts.reset();
    this.session = { writer, startInstant: this.clock.now(), firstEventTime };
    log.info('Started new recording session');
    return this.session;
  }

  private discardQueued(): void {
    const dropped = this.queue.clear() + this.backlog.length;
    this.backlog = [];
    if (dropped > 0) log.debug(`Discarded ${dropped} queued item(s)`);
  }

  private enterLowPower(): void {
    if (this.lowPower) return;
    this.lowPower = true;
    log.info('Entering low power mode');
    this.requestPowerSaving(true);
  }

  private exitLowPower(): void {
    if (!this.lowPower) return;
    this.lowPower = false;
    log.info('Exiting low power mode');
    this.requestPowerSaving(false);
  }

  private requestPowerSaving(saving: boolean): void {
    const power = this.opts.power;
    if (!power) return;
    void Promise.resolve()
      .then(() => power.setPowerSaving(saving))
      .catch((err: unknown) => log.warn(`Power mode request (${saving ? 'powersave' : 'normal'}) failed:`, err));
  }
}
