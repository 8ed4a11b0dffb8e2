/**
 * MIDI message model.
 *
 * A message keeps the bytes it arrived as (`bytes`) next to the decoded
 * fields the engine cares about, so anything we do not interpret is still
 * written back out unchanged.
 */

export type MessageKind =
  | 'note_on'
  | 'note_off'
  | 'control_change'
  | 'clock'
  | 'active_sensing'
  | 'other';

export interface MidiMessage {
  readonly kind: MessageKind;
  /** 0-15 for channel voice messages. */
  readonly channel?: number;
  readonly note?: number;
  readonly velocity?: number;
  readonly control?: number;
  readonly value?: number;
  /** Raw wire bytes, status byte first. */
  readonly bytes: readonly number[];
}

export const STATUS = {
  NOTE_OFF: 0x80,
  NOTE_ON: 0x90,
  POLY_AFTERTOUCH: 0xa0,
  CONTROL_CHANGE: 0xb0,
  PROGRAM_CHANGE: 0xc0,
  CHANNEL_AFTERTOUCH: 0xd0,
  PITCH_BEND: 0xe0,
  SYSEX: 0xf0,
  MTC_QUARTER_FRAME: 0xf1,
  SONG_POSITION: 0xf2,
  SONG_SELECT: 0xf3,
  TUNE_REQUEST: 0xf6,
  SYSEX_END: 0xf7,
  CLOCK: 0xf8,
  ACTIVE_SENSING: 0xfe,
} as const;

/** Number of data bytes that follow a channel voice status (by high nibble). */
export function channelDataLength(status: number): number {
  const type = status & 0xf0;
  return type === STATUS.PROGRAM_CHANGE || type === STATUS.CHANNEL_AFTERTOUCH ? 1 : 2;
}

/** Number of data bytes that follow a system common status, or -1 for sysex. */
export function systemCommonDataLength(status: number): number {
  switch (status) {
    case STATUS.SYSEX: return -1;
    case STATUS.MTC_QUARTER_FRAME:
    case STATUS.SONG_SELECT: return 1;
    case STATUS.SONG_POSITION: return 2;
    default: return 0;
  }
}

export function isRealtimeStatus(byte: number): boolean {
  return byte >= 0xf8;
}

/**
 * Decode a complete message from its wire bytes.
 *
 * Note-on with velocity 0 stays a `note_on`: the shortcut detector counts it
 * as a tap, and the file keeps it as sent.
 */
export function decodeMessage(bytes: readonly number[]): MidiMessage {
  if (bytes.length === 0) throw new RangeError('Cannot decode an empty MIDI message');
  const frozen = Object.freeze([...bytes]);
  const status = frozen[0];

  if (status === STATUS.CLOCK) return { kind: 'clock', bytes: frozen };
  if (status === STATUS.ACTIVE_SENSING) return { kind: 'active_sensing', bytes: frozen };
  if (status >= 0xf0) return { kind: 'other', bytes: frozen };

  const channel = status & 0x0f;
  switch (status & 0xf0) {
    case STATUS.NOTE_ON:
      return { kind: 'note_on', channel, note: frozen[1], velocity: frozen[2], bytes: frozen };
    case STATUS.NOTE_OFF:
      return { kind: 'note_off', channel, note: frozen[1], velocity: frozen[2], bytes: frozen };
    case STATUS.CONTROL_CHANGE:
      return { kind: 'control_change', channel, control: frozen[1], value: frozen[2], bytes: frozen };
    default:
      return { kind: 'other', channel, bytes: frozen };
  }
}

function data7(n: number, what: string): number {
  if (!Number.isInteger(n) || n < 0 || n > 127) {
    throw new RangeError(`${what} must be an integer 0-127, got ${n}`);
  }
  return n;
}

function channel4(ch: number): number {
  if (!Number.isInteger(ch) || ch < 0 || ch > 15) {
    throw new RangeError(`channel must be an integer 0-15, got ${ch}`);
  }
  return ch;
}

export function noteOn(note: number, velocity = 64, channel = 0): MidiMessage {
  return decodeMessage([STATUS.NOTE_ON | channel4(channel), data7(note, 'note'), data7(velocity, 'velocity')]);
}

export function noteOff(note: number, velocity = 64, channel = 0): MidiMessage {
  return decodeMessage([STATUS.NOTE_OFF | channel4(channel), data7(note, 'note'), data7(velocity, 'velocity')]);
}

export function controlChange(control: number, value: number, channel = 0): MidiMessage {
  return decodeMessage([STATUS.CONTROL_CHANGE | channel4(channel), data7(control, 'control'), data7(value, 'value')]);
}

export function clock(): MidiMessage {
  return decodeMessage([STATUS.CLOCK]);
}

export function activeSensing(): MidiMessage {
  return decodeMessage([STATUS.ACTIVE_SENSING]);
}

export function isNoteMessage(msg: MidiMessage): msg is MidiMessage & { kind: 'note_on' | 'note_off'; note: number } {
  return (msg.kind === 'note_on' || msg.kind === 'note_off') && typeof msg.note === 'number';
}

/** Short human readable form used by logs and `pianolog inspect`. */
export function describeMessage(msg: MidiMessage): string {
  switch (msg.kind) {
    case 'note_on':
    case 'note_off':
      return `${msg.kind} ch=${msg.channel} note=${msg.note} velocity=${msg.velocity}`;
    case 'control_change':
      return `control_change ch=${msg.channel} control=${msg.control} value=${msg.value}`;
    case 'clock':
    case 'active_sensing':
      return msg.kind;
    default:
      return `other ${msg.bytes.map(b => b.toString(16).padStart(2, '0')).join(' ')}`;
  }
}
