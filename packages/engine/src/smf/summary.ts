import { DEFAULT_TEMPO, ticksToSeconds } from '../timing/ticks.js';
import type { SmfFile } from './types.js';

export interface SmfSummary {
  format: 0 | 1;
  ticksPerBeat: number;
  tracks: number;
  /** First tempo found, or the SMF default of 120 BPM. */
  tempo: number;
  /** Channel and system messages, meta events excluded. */
  messages: number;
  notes: number;
  totalTicks: number;
  durationSeconds: number;
}

export function summarizeSmf(file: SmfFile): SmfSummary {
  let tempo: number | undefined;
  let messages = 0;
  let notes = 0;
  let totalTicks = 0;

  for (const track of file.tracks) {
    let ticks = 0;
    for (const ev of track) {
      ticks += ev.delta;
      if (ev.type === 'tempo') {
        tempo ??= ev.microsecondsPerBeat;
      } else if (ev.type === 'midi') {
        messages++;
        if (ev.message.kind === 'note_on' && (ev.message.velocity ?? 0) > 0) notes++;
      }
    }
    totalTicks = Math.max(totalTicks, ticks);
  }

  const effectiveTempo = tempo ?? DEFAULT_TEMPO;
  return {
    format: file.format ?? 1,
    ticksPerBeat: file.ticksPerBeat,
    tracks: file.tracks.length,
    tempo: effectiveTempo,
    messages,
    notes,
    totalTicks,
    durationSeconds: ticksToSeconds(totalTicks, file.ticksPerBeat, effectiveTempo),
  };
}
