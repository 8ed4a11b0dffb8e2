/**
 * Reserved-note gestures.
 *
 * Striking a reserved note three times within the shortcut timeout is a
 * command rather than music: the low note ends the session, the high note
 * ends it and tags the file as a bookmark. Presses are held back in a buffer
 * until it is clear which one they are; if the gesture does not complete the
 * buffered notes are committed to the track as ordinary events.
 */
import { createLogger } from '../util/logger.js';
import { MidiMessage, isNoteMessage } from '../midi/message.js';
import type { QueuedMessage } from './types.js';

const log = createLogger('shortcuts');

export const TAPS_TO_TRIGGER = 3;

/** What the detector needs from the session it is guarding. */
export interface ShortcutHost {
  /** Write a held-back event to the track as ordinary content. */
  commit(entry: QueuedMessage): void;
  /** A gesture completed: drop everything pending and close the session. */
  trigger(watcher: ReservedNoteWatcher): void;
}

export interface ReservedNoteOptions {
  note: number;
  /** Inserted before the file extension of a session closed by this gesture. */
  suffix: string;
  /** Maximum gap between taps, in seconds. */
  timeout: number;
  label?: string;
}

export class ReservedNoteWatcher {
  readonly note: number;
  readonly suffix: string;
  readonly timeout: number;
  readonly label: string;

  private tapCount = 0;
  private buffer: QueuedMessage[] = [];
  private lastTap = 0;
  private awaitingRelease = false;

  constructor(opts: ReservedNoteOptions) {
    this.note = opts.note;
    this.suffix = opts.suffix;
    this.timeout = opts.timeout;
    this.label = opts.label ?? `note ${opts.note}`;
  }

  get taps(): number {
    return this.tapCount;
  }

  get pending(): readonly QueuedMessage[] {
    return this.buffer;
  }

  /** Handle a note message for this watcher's note. Always reports handled. */
  handle(entry: QueuedMessage, host: ShortcutHost): boolean {
    const { message, timestamp } = entry;

    if (message.kind === 'note_on') {
      this.awaitingRelease = false;
      if (this.tapCount > 0 && timestamp - this.lastTap > this.timeout) {
        log.debug(`${this.label}: gap of ${(timestamp - this.lastTap).toFixed(3)}s, committing ${this.buffer.length} held event(s)`);
        this.flush(host);
      }
      this.buffer.push(entry);
      this.tapCount++;
      this.lastTap = timestamp;
      if (this.tapCount >= TAPS_TO_TRIGGER) {
        log.info(`${this.label} gesture triggered`);
        this.reset();
        this.awaitingRelease = true;
        host.trigger(this);
      }
      return true;
    }

    this.buffer.push(entry);
    return true;
  }

  /** Commit held events in arrival order and start over. */
  flush(host: ShortcutHost): void {
    const held = this.buffer;
    this.reset();
    for (const entry of held) host.commit(entry);
  }

  /** Forget held events without committing them. */
  reset(): void {
    this.buffer = [];
    this.tapCount = 0;
    this.lastTap = 0;
  }

  /**
   * The release of the tap that completed a gesture normally arrives after
   * the session has closed. Swallow it so it does not open a new one.
   */
  consumeTrailingRelease(message: MidiMessage): boolean {
    if (!this.awaitingRelease || message.kind !== 'note_off' || message.note !== this.note) return false;
    this.awaitingRelease = false;
    return true;
  }
}

export interface ShortcutDetectorOptions {
  lowNote: number;
  highNote: number;
  timeout: number;
  stopSuffix?: string;
  bookmarkSuffix?: string;
}

export class ShortcutDetector {
  readonly low: ReservedNoteWatcher;
  readonly high: ReservedNoteWatcher;
  private readonly watchers: readonly ReservedNoteWatcher[];

  constructor(opts: ShortcutDetectorOptions) {
    if (opts.lowNote === opts.highNote) {
      throw new RangeError(`Reserved notes must differ (both are ${opts.lowNote})`);
    }
    this.low = new ReservedNoteWatcher({
      note: opts.lowNote,
      suffix: opts.stopSuffix ?? '',
      timeout: opts.timeout,
      label: 'stop',
    });
    this.high = new ReservedNoteWatcher({
      note: opts.highNote,
      suffix: opts.bookmarkSuffix ?? '-bookmark',
      timeout: opts.timeout,
      label: 'bookmark',
    });
    this.watchers = [this.low, this.high];
  }

  /**
   * Route a message through the watchers. Returns true when the message was
   * taken (held back or consumed by a gesture); false means the caller writes
   * it as usual.
   */
  handle(entry: QueuedMessage, host: ShortcutHost): boolean {
    const { message } = entry;
    if (isNoteMessage(message)) {
      const watcher = this.watchers.find(w => w.note === message.note);
      if (watcher) return watcher.handle(entry, host);
    }
    // Anything else interrupts a pending gesture
    this.flushAll(host);
    return false;
  }

  /** Commit every held event from both watchers, oldest first. */
  flushAll(host: ShortcutHost): void {
    const held = this.watchers.flatMap(w => w.pending);
    if (held.length === 0) return;
    for (const w of this.watchers) w.reset();
    held
      .map((entry, index) => ({ entry, index }))
      .sort((a, b) => a.entry.timestamp - b.entry.timestamp || a.index - b.index)
      .forEach(({ entry }) => host.commit(entry));
  }

  reset(): void {
    for (const w of this.watchers) w.reset();
  }

  consumeTrailingRelease(message: MidiMessage): boolean {
    return this.watchers.some(w => w.consumeTrailingRelease(message));
  }

  hasPending(): boolean {
    return this.watchers.some(w => w.pending.length > 0);
  }
}
