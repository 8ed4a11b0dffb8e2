/**
 * Conversion between monotonic arrival times (seconds) and musical ticks.
 *
 * The tempo is fixed for the life of the recorder, so a delta in seconds maps
 * to ticks by a single multiplication.
 */

export const DEFAULT_TICKS_PER_BEAT = 480;
/** Microseconds per beat, 120 BPM. */
export const DEFAULT_TEMPO = 500000;

/**
 * Ticks elapsed between two arrival times.
 *
 * Returns 0 when there is no previous event, and never returns a negative
 * value even if the timestamps arrive out of order.
 */
export function ticksBetween(
  prev: number | undefined,
  cur: number,
  ticksPerBeat: number = DEFAULT_TICKS_PER_BEAT,
  tempo: number = DEFAULT_TEMPO,
): number {
  if (prev === undefined) return 0;
  const beatsPerSecond = 1_000_000 / tempo;
  const ticks = Math.floor((cur - prev) * ticksPerBeat * beatsPerSecond);
  return Math.max(0, ticks);
}

/** Inverse of {@link ticksBetween}: duration in seconds of a tick count. */
export function ticksToSeconds(ticks: number, ticksPerBeat: number = DEFAULT_TICKS_PER_BEAT, tempo: number = DEFAULT_TEMPO): number {
  return (ticks * tempo) / (ticksPerBeat * 1_000_000);
}

export function bpmToMicros(bpm: number): number {
  return Math.round(60_000_000 / bpm);
}

export function microsToBpm(tempo: number): number {
  return 60_000_000 / tempo;
}
