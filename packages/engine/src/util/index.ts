/**
 * Utility modules for the pianolog engine.
 */

// Logger - centralized logging system
export {
  createLogger,
  configureLogging,
  getLoggingConfig,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
