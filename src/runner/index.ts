/**
 * Runner infrastructure shared by the library and the CLI: structured
 * logging, error envelopes and redaction.
 */

// Logger
export {
  createLogger,
  type StructuredLogger,
  type LoggerOptions,
  type LogEcho,
  type LogEntry,
  type LogLevel,
} from './logger.js';

// Errors
export {
  ToolkitError,
  isToolkitError,
  createErrorEnvelope,
  wrapError,
  exitCodeFor,
  EXIT_SUCCESS,
  EXIT_FAILURE,
  EXIT_VALIDATION,
  EXIT_DEPENDENCY,
  EXIT_BUG,
  type ErrorEnvelope,
  type ErrorCode,
} from './errors.js';

// Redaction
export {
  redact,
  redactRecord,
  redactString,
  REDACT_DENYLIST_KEYS,
} from './redact.js';
