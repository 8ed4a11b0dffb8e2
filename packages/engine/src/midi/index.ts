export {
  decodeMessage,
  describeMessage,
  isNoteMessage,
  isRealtimeStatus,
  channelDataLength,
  systemCommonDataLength,
  noteOn,
  noteOff,
  controlChange,
  clock,
  activeSensing,
  STATUS,
  type MessageKind,
  type MidiMessage,
} from './message.js';

export { MidiStreamParser, parseMidiBytes } from './streamParser.js';
