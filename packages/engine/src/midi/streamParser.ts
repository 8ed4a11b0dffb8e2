/*
 * Incremental MIDI byte-stream parser.
 * - Accepts arbitrary chunks as read from a raw MIDI device.
 * - Handles running status, real-time bytes interleaved anywhere (even
 *   inside another message), system common messages and system exclusive.
 * - Stray data bytes with no status to attach to are dropped.
 */
import {
  MidiMessage,
  STATUS,
  channelDataLength,
  decodeMessage,
  isRealtimeStatus,
  systemCommonDataLength,
} from './message.js';

export class MidiStreamParser {
  private runningStatus: number | null = null;
  private pending: number[] = [];
  private expected = 0;
  private inSysex = false;
  private dropped = 0;

  constructor(private readonly onMessage: (msg: MidiMessage) => void) {}

  /** Bytes discarded so far because they could not be attached to a status. */
  get droppedBytes(): number {
    return this.dropped;
  }

  feed(chunk: Uint8Array | readonly number[]): void {
    for (let i = 0; i < chunk.length; i++) {
      this.feedByte(chunk[i] & 0xff);
    }
  }

  reset(): void {
    this.runningStatus = null;
    this.pending = [];
    this.expected = 0;
    this.inSysex = false;
  }

  private feedByte(byte: number): void {
    if (isRealtimeStatus(byte)) {
      // Real-time bytes never disturb running status or a message in progress
      this.onMessage(decodeMessage([byte]));
      return;
    }

    if (this.inSysex) {
      if (byte === STATUS.SYSEX_END) {
        this.pending.push(byte);
        this.emit();
        this.inSysex = false;
        return;
      }
      if (byte < 0x80) {
        this.pending.push(byte);
        return;
      }
      // Unterminated sysex: close it and treat the byte as a new status
      this.pending.push(STATUS.SYSEX_END);
      this.emit();
      this.inSysex = false;
    }

    if (byte >= 0x80) {
      this.startStatus(byte);
      return;
    }

    // Data byte
    if (this.pending.length === 0) {
      if (this.runningStatus === null) {
        this.dropped++;
        return;
      }
      this.pending = [this.runningStatus];
      this.expected = channelDataLength(this.runningStatus);
    }
    this.pending.push(byte);
    if (this.pending.length - 1 >= this.expected) this.emit();
  }

  private startStatus(status: number): void {
    if (this.pending.length > 0) {
      // Previous message was cut short
      this.dropped += this.pending.length;
      this.pending = [];
    }

    if (status < 0xf0) {
      this.runningStatus = status;
      this.pending = [status];
      this.expected = channelDataLength(status);
      return;
    }

    // System common cancels running status
    this.runningStatus = null;
    if (status === STATUS.SYSEX) {
      this.pending = [status];
      this.inSysex = true;
      return;
    }
    if (status === STATUS.SYSEX_END) {
      this.dropped++;
      return;
    }
    const len = systemCommonDataLength(status);
    this.pending = [status];
    this.expected = len;
    if (len === 0) this.emit();
  }

  private emit(): void {
    const bytes = this.pending;
    this.pending = [];
    this.expected = 0;
    this.onMessage(decodeMessage(bytes));
  }
}

/** Parse a complete buffer in one go. */
export function parseMidiBytes(bytes: Uint8Array | readonly number[]): MidiMessage[] {
  const out: MidiMessage[] = [];
  new MidiStreamParser(m => out.push(m)).feed(bytes);
  return out;
}
