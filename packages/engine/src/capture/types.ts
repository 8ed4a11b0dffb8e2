import type { MidiMessage } from '../midi/message.js';

/** A message stamped with its monotonic arrival time, in seconds. */
export interface QueuedMessage {
  type: 'midi';
  message: MidiMessage;
  timestamp: number;
}

/**
 * Sent by the port monitor when the open input changes. `name` is null when
 * the port was lost and nothing replaced it.
 */
export interface PortNotice {
  type: 'port';
  name: string | null;
  timestamp: number;
}

export type QueueItem = QueuedMessage | PortNotice;

/** Monotonic time source in seconds. */
export interface Clock {
  now(): number;
}

export interface PowerManager {
  setPowerSaving(saving: boolean): Promise<void>;
}

/** Liveness ping sent by the control loop on its check cadence. */
export interface Heartbeat {
  alive(): void;
}

/** Maps a session start date to the path of its file (without suffix). */
export type PathBuilder = (start: Date) => string;
