/**
 * Utility modules for the codec engine.
 */

// Logger - centralized logging system
export {
  createLogger,
  configureLogging,
  loadLoggingFromEnv,
  getLoggingConfig,
  resetLogging,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';

// Diagnostics - structured error/warning reporting
export {
  formatDiagnostic,
  describeError,
  warn,
  error,
  type DiagLevel,
  type DiagMeta,
} from './diag.js';
