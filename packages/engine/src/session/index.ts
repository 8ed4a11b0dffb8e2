export { Recorder, type RecorderOptions, type RecorderState, type StopOptions } from './recorder.js';
export { ControlLoop, type ControlLoopOptions } from './controlLoop.js';
export { SessionWriter, availablePath, withSuffix, type SessionSummary, type SessionWriterOptions } from './sessionWriter.js';
