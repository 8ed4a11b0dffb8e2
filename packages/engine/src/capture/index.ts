export { IngestionQueue } from './queue.js';
export { ManualClock, monotonicClock } from './clock.js';
export {
  ReservedNoteWatcher,
  ShortcutDetector,
  TAPS_TO_TRIGGER,
  type ReservedNoteOptions,
  type ShortcutDetectorOptions,
  type ShortcutHost,
} from './shortcuts.js';
export type { Clock, Heartbeat, PathBuilder, PortNotice, PowerManager, QueueItem, QueuedMessage } from './types.js';
