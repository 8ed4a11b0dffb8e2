import type { MidiMessage } from '../midi/message.js';

export interface SmfTempoEvent {
  type: 'tempo';
  delta: number;
  microsecondsPerBeat: number;
}

/** Meta event other than tempo and end-of-track. */
export interface SmfMetaEvent {
  type: 'meta';
  delta: number;
  metaType: number;
  data: readonly number[];
}

export interface SmfMidiEvent {
  type: 'midi';
  delta: number;
  message: MidiMessage;
}

export type SmfEvent = SmfTempoEvent | SmfMetaEvent | SmfMidiEvent;

export type SmfTrack = readonly SmfEvent[];

export interface SmfFile {
  format?: 0 | 1;
  ticksPerBeat: number;
  tracks: readonly SmfTrack[];
}
