/**
 * Standard MIDI File reader.
 *
 * Reads what {@link encodeSmf} writes and the usual variations found in files
 * from other tools (running status, format 0, unknown chunks, extra meta
 * events). End-of-track is consumed, not returned.
 */
import { readFileSync } from 'fs';
import { decodeMessage, channelDataLength, STATUS } from '../midi/message.js';
import type { SmfEvent, SmfFile } from './types.js';

export class SmfParseError extends Error {
  constructor(message: string, readonly offset: number) {
    super(`${message} (at byte ${offset})`);
    this.name = 'SmfParseError';
  }
}

class ByteCursor {
  pos: number;

  constructor(private readonly buf: Buffer, start = 0, private readonly end = buf.length) {
    this.pos = start;
  }

  get done(): boolean {
    return this.pos >= this.end;
  }

  u8(): number {
    if (this.pos >= this.end) throw new SmfParseError('Unexpected end of data', this.pos);
    return this.buf[this.pos++];
  }

  bytes(n: number): number[] {
    if (this.pos + n > this.end) throw new SmfParseError(`Need ${n} bytes, only ${this.end - this.pos} left`, this.pos);
    const out = Array.from(this.buf.subarray(this.pos, this.pos + n));
    this.pos += n;
    return out;
  }

  vlq(): number {
    let value = 0;
    for (let i = 0; i < 4; i++) {
      const b = this.u8();
      value = (value << 7) | (b & 0x7f);
      if ((b & 0x80) === 0) return value;
    }
    throw new SmfParseError('Variable-length quantity longer than 4 bytes', this.pos);
  }
}

function readTrack(buf: Buffer, start: number, end: number): SmfEvent[] {
  const cur = new ByteCursor(buf, start, end);
  const events: SmfEvent[] = [];
  let running: number | null = null;
  let carried = 0;

  while (!cur.done) {
    const delta = cur.vlq() + carried;
    carried = 0;
    const first = cur.u8();

    if (first === 0xff) {
      const metaType = cur.u8();
      const data = cur.bytes(cur.vlq());
      if (metaType === 0x2f) return events;
      if (metaType === 0x51 && data.length === 3) {
        events.push({ type: 'tempo', delta, microsecondsPerBeat: (data[0] << 16) | (data[1] << 8) | data[2] });
      } else {
        events.push({ type: 'meta', delta, metaType, data });
      }
      continue;
    }

    if (first === STATUS.SYSEX || first === STATUS.SYSEX_END) {
      running = null;
      const body = cur.bytes(cur.vlq());
      const bytes = first === STATUS.SYSEX ? [STATUS.SYSEX, ...body] : body;
      if (bytes.length === 0) {
        carried = delta;
        continue;
      }
      events.push({ type: 'midi', delta, message: decodeMessage(bytes) });
      continue;
    }

    let status: number;
    const data: number[] = [];
    if (first & 0x80) {
      status = first;
      running = status;
    } else {
      if (running === null) throw new SmfParseError('Data byte without running status', cur.pos - 1);
      status = running;
      data.push(first);
    }
    while (data.length < channelDataLength(status)) data.push(cur.u8());
    events.push({ type: 'midi', delta, message: decodeMessage([status, ...data]) });
  }

  return events;
}

export function parseSmf(buf: Buffer): SmfFile {
  if (buf.length < 14 || buf.toString('ascii', 0, 4) !== 'MThd') {
    throw new SmfParseError('Missing MThd header', 0);
  }
  const headerLen = buf.readUInt32BE(4);
  const format = buf.readUInt16BE(8);
  const ntracks = buf.readUInt16BE(10);
  const division = buf.readUInt16BE(12);
  if (format > 1) throw new SmfParseError(`Unsupported SMF format ${format}`, 8);
  if (division & 0x8000) throw new SmfParseError('SMPTE time division is not supported', 12);
  if (division === 0) throw new SmfParseError('Time division must be at least 1 tick per beat', 12);

  const tracks: SmfEvent[][] = [];
  let pos = 8 + headerLen;
  while (pos + 8 <= buf.length && tracks.length < ntracks) {
    const id = buf.toString('ascii', pos, pos + 4);
    const len = buf.readUInt32BE(pos + 4);
    const start = pos + 8;
    const end = start + len;
    if (end > buf.length) throw new SmfParseError(`Chunk ${id} runs past end of file`, pos);
    if (id === 'MTrk') tracks.push(readTrack(buf, start, end));
    pos = end;
  }
  if (tracks.length < ntracks) {
    throw new SmfParseError(`Header declares ${ntracks} track(s), found ${tracks.length}`, pos);
  }

  return { format: format === 0 ? 0 : 1, ticksPerBeat: division, tracks };
}

export function readSmfFile(path: string): SmfFile {
  return parseSmf(readFileSync(path));
}
