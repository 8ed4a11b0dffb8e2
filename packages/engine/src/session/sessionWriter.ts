/**
 * In-memory track for one recording session.
 *
 * Events are appended with tick deltas computed from their arrival times; the
 * file is only created on {@link SessionWriter.save}, in a single write to a
 * temporary sibling that is then renamed into place. An existing file is never
 * replaced: a second session started in the same second gets `-1`, `-2`, ...
 */
import { existsSync, renameSync, rmSync, writeFileSync } from 'fs';
import { format, parse } from 'path';
import type { MidiMessage } from '../midi/message.js';
import { MAX_VLQ, encodeSmf } from '../smf/smfWriter.js';
import type { SmfEvent, SmfFile } from '../smf/types.js';
import { ticksBetween } from '../timing/ticks.js';
import type { PathBuilder } from '../capture/types.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('session');

export interface SessionWriterOptions {
  ticksPerBeat: number;
  tempo: number;
  pathBuilder: PathBuilder;
}

export interface SessionSummary {
  startedAt: Date;
  /** Set when a file was written. */
  path?: string;
  suffix: string;
  /** Messages in the track, the tempo entry excluded. */
  events: number;
  ticks: number;
  /** Seconds between the first and last written message. */
  durationSeconds: number;
}

/** `/a/session_101500.mid` + `-bookmark` -> `/a/session_101500-bookmark.mid` */
export function withSuffix(path: string, suffix: string): string {
  if (!suffix) return path;
  const p = parse(path);
  return format({ dir: p.dir, name: p.name + suffix, ext: p.ext });
}

/** `path` if nothing is there yet, else the first free `name-N.ext`. */
export function availablePath(path: string): string {
  if (!existsSync(path)) return path;
  for (let n = 1; ; n++) {
    const candidate = withSuffix(path, `-${n}`);
    if (!existsSync(candidate)) return candidate;
  }
}

export class SessionWriter {
  private readonly track: SmfEvent[];
  private firstTimestamp: number | undefined;
  private lastTimestamp: number | undefined;
  private ticks = 0;

  constructor(readonly startedAt: Date, private readonly opts: SessionWriterOptions) {
    this.track = [{ type: 'tempo', delta: 0, microsecondsPerBeat: opts.tempo }];
  }

  /**
   * Append a message; returns the delta it was written with. A gap too long
   * for one variable-length quantity is shortened to the largest delta.
   */
  write(message: MidiMessage, timestamp: number): number {
    let delta = ticksBetween(this.lastTimestamp, timestamp, this.opts.ticksPerBeat, this.opts.tempo);
    if (delta > MAX_VLQ) {
      log.warn(`Gap of ${delta} ticks exceeds the largest MIDI delta, writing ${MAX_VLQ}`);
      delta = MAX_VLQ;
    }
    this.track.push({ type: 'midi', delta, message });
    this.firstTimestamp ??= timestamp;
    this.lastTimestamp = timestamp;
    this.ticks += delta;
    return delta;
  }

  get eventCount(): number {
    return this.track.length - 1;
  }

  get hasContent(): boolean {
    return this.track.length > 1;
  }

  get lastEventTime(): number | undefined {
    return this.lastTimestamp;
  }

  get events(): readonly SmfEvent[] {
    return this.track;
  }

  toSmf(): SmfFile {
    return { format: 1, ticksPerBeat: this.opts.ticksPerBeat, tracks: [this.track] };
  }

  summary(suffix: string, path?: string): SessionSummary {
    const duration = this.firstTimestamp !== undefined && this.lastTimestamp !== undefined
      ? this.lastTimestamp - this.firstTimestamp
      : 0;
    return {
      startedAt: this.startedAt,
      path,
      suffix,
      events: this.eventCount,
      ticks: this.ticks,
      durationSeconds: duration,
    };
  }

  /**
   * Write the session if it holds any message. Throws on I/O failure; no
   * partial file is left behind.
   */
  save(suffix = ''): SessionSummary {
    if (!this.hasContent) return this.summary(suffix);

    const path = availablePath(withSuffix(this.opts.pathBuilder(this.startedAt), suffix));
    const data = encodeSmf(this.toSmf());
    const tmp = `${path}.tmp`;
    try {
      writeFileSync(tmp, data);
      renameSync(tmp, path);
    } catch (err) {
      rmSync(tmp, { force: true });
      throw err;
    }
    return this.summary(suffix, path);
  }
}
