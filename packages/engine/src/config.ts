import { DEFAULT_TEMPO, DEFAULT_TICKS_PER_BEAT } from './timing/ticks.js';

/** Timing and note settings of the capture engine. Durations are in seconds. */
export interface EngineConfig {
  /** Silence after which a session is closed. */
  sessionTimeout: number;
  /** Cadence of the timeout check and liveness ping. */
  checkInterval: number;
  /** Loop sleep while in low-power mode. */
  idleCheckInterval: number;
  /** Loop sleep while active. */
  activeSleep: number;
  /** Sleep after an unexpected error in the loop. */
  errorBackoff: number;
  /** Maximum gap between taps of a reserved-note gesture. */
  shortcutTimeout: number;
  /** Reserved note that ends the session (A#0 by default). */
  lowNote: number;
  /** Reserved note that ends the session as a bookmark (A#7 by default). */
  highNote: number;
  ticksPerBeat: number;
  /** Microseconds per beat. */
  tempo: number;
  stopSuffix: string;
  bookmarkSuffix: string;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  sessionTimeout: 5,
  checkInterval: 1,
  idleCheckInterval: 5,
  activeSleep: 0.001,
  errorBackoff: 1,
  shortcutTimeout: 1,
  lowNote: 22,
  highNote: 106,
  ticksPerBeat: DEFAULT_TICKS_PER_BEAT,
  tempo: DEFAULT_TEMPO,
  stopSuffix: '',
  bookmarkSuffix: '-bookmark',
});
