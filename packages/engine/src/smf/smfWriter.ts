/*
 * Standard MIDI File writer.
 * - Writes format 1 with one track per entry of `tracks` (the recorder uses
 *   a single track).
 * - Channel messages are written as-is; sysex as F0 events; any other system
 *   message as an F7 escape so it survives the round trip byte for byte.
 * - An end-of-track meta event is appended to every track.
 */
import { STATUS } from '../midi/message.js';
import type { SmfEvent, SmfFile } from './types.js';

/** Largest value a four-byte variable-length quantity holds. */
export const MAX_VLQ = 0x0fffffff;

export function vlq(n: number): number[] {
	if (!Number.isInteger(n) || n < 0 || n > MAX_VLQ) {
		throw new RangeError(`Delta time out of range for a variable-length quantity: ${n}`);
	}
	const parts: number[] = [];
	let v = n;
	parts.push(v & 0x7f);
	v >>= 7;
	while (v > 0) {
		parts.push((v & 0x7f) | 0x80);
		v >>= 7;
	}
	return parts.reverse();
}

function writeChunk(id: string, data: number[]) {
	const header = Buffer.from(id, 'ascii');
	const len = Buffer.alloc(4);
	len.writeUInt32BE(data.length, 0);
	const body = Buffer.from(data);
	return Buffer.concat([header, len, body]);
}

function encodeEvent(ev: SmfEvent, data: number[]): void {
	for (const b of vlq(ev.delta)) data.push(b);

	switch (ev.type) {
		case 'tempo': {
			const mpq = ev.microsecondsPerBeat;
			data.push(0xff, 0x51, 0x03, (mpq >> 16) & 0xff, (mpq >> 8) & 0xff, mpq & 0xff);
			return;
		}
		case 'meta':
			data.push(0xff, ev.metaType & 0x7f, ...vlq(ev.data.length), ...ev.data);
			return;
		case 'midi': {
			const bytes = ev.message.bytes;
			const status = bytes[0];
			if (status < 0xf0) {
				data.push(...bytes);
			} else if (status === STATUS.SYSEX) {
				const body = bytes.slice(1);
				data.push(STATUS.SYSEX, ...vlq(body.length), ...body);
			} else {
				data.push(STATUS.SYSEX_END, ...vlq(bytes.length), ...bytes);
			}
			return;
		}
	}
}

export function encodeTrack(events: readonly SmfEvent[]): Buffer {
	const data: number[] = [];
	for (const ev of events) encodeEvent(ev, data);
	// end of track
	data.push(0x00, 0xff, 0x2f, 0x00);
	return writeChunk('MTrk', data);
}

/** Serialize a whole file in memory. */
export function encodeSmf(file: SmfFile): Buffer {
	if (!Number.isInteger(file.ticksPerBeat) || file.ticksPerBeat < 1 || file.ticksPerBeat > 0x7fff) {
		throw new RangeError(`ticksPerBeat must be 1-32767, got ${file.ticksPerBeat}`);
	}
	const ntracks = file.tracks.length;
	const header = Buffer.alloc(14);
	header.write('MThd', 0, 4, 'ascii');
	header.writeUInt32BE(6, 4);
	header.writeUInt16BE(file.format ?? 1, 8);
	header.writeUInt16BE(ntracks, 10);
	header.writeUInt16BE(file.ticksPerBeat, 12);

	return Buffer.concat([header, ...file.tracks.map(t => encodeTrack(t))]);
}
