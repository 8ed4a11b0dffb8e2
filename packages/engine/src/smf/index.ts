export { encodeSmf, encodeTrack, MAX_VLQ, vlq } from './smfWriter.js';
export { parseSmf, readSmfFile, SmfParseError } from './smfReader.js';
export { summarizeSmf, type SmfSummary } from './summary.js';
export type { SmfEvent, SmfFile, SmfMetaEvent, SmfMidiEvent, SmfTempoEvent, SmfTrack } from './types.js';
