/**
 * @pianolog/engine
 *
 * Capture and session engine: turns a live MIDI message stream into
 * silence-bounded sessions saved as Standard MIDI Files.
 */
export * from './midi/index.js';
export * from './capture/index.js';
export * from './session/index.js';
export * from './smf/index.js';
export { ticksBetween, ticksToSeconds, bpmToMicros, microsToBpm, DEFAULT_TEMPO, DEFAULT_TICKS_PER_BEAT } from './timing/ticks.js';
export { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config.js';
export { createLogger, configureLogging, getLoggingConfig, isLogLevel, LOG_LEVELS, type Logger, type LogLevel, type LoggerConfig } from './util/index.js';
