/**
 * workflow-commands
 *
 * Talks to a CI orchestrator through workflow commands on stdout and records
 * appended to the environment files it publishes, and mints OIDC ID tokens.
 */

// Command wire format
export {
  formatCommand,
  formatProperties,
  escapeMessage,
  escapeProperty,
  toCommandValue,
  MISSING_COMMAND_NAME,
  type Command,
  type CommandProperties,
  type CommandValue,
} from './command/index.js';

// Delivery
export {
  createCommandSink,
  fileCommandEnvName,
  formatKeyValueMessage,
  FILE_COMMAND_DELIMITER,
  type CommandSink,
  type CommandSinkOptions,
  type GetenvFunc,
  type OutputSink,
} from './sink/index.js';

// Façade
export {
  createAction,
  parseFieldPairs,
  inputEnvName,
  ActionConfigSchema,
  ProtocolSchema,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_MAX_TOKEN_RESPONSE_BYTES,
  MAX_HTTP_TIMEOUT_MS,
  processGetenv,
  resolveActionConfig,
  type Action,
  type ActionConfig,
  type ActionOptions,
  type ExitFunc,
  type FetchFunc,
  type Protocol,
} from './action/index.js';

// OIDC
export {
  requestIdToken,
  buildIdTokenUrl,
  IdTokenResponseSchema,
  ID_TOKEN_REQUEST_URL_ENV,
  ID_TOKEN_REQUEST_TOKEN_ENV,
  type IdTokenRequestOptions,
  type IdTokenResponse,
} from './oidc/index.js';

// Job summary templates
export { renderSummaryTemplate } from './summary/index.js';

// Workflow context
export {
  loadWorkflowContext,
  formatContextLines,
  repoOf,
  WorkflowContextSchema,
  CONTEXT_ENV,
  type WorkflowContext,
  type EventPayload,
  type RepoRef,
} from './context/index.js';

// Errors and diagnostics
export {
  ToolkitError,
  isToolkitError,
  createErrorEnvelope,
  wrapError,
  exitCodeFor,
  createLogger,
  redact,
  redactString,
  EXIT_SUCCESS,
  EXIT_FAILURE,
  EXIT_VALIDATION,
  EXIT_DEPENDENCY,
  EXIT_BUG,
  type ErrorCode,
  type ErrorEnvelope,
  type StructuredLogger,
  type LoggerOptions,
  type LogEcho,
  type LogEntry,
  type LogLevel,
} from './runner/index.js';
