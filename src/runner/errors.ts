/**
 * Shared error type and envelope for the toolkit and its CLI.
 *
 * Library calls throw `ToolkitError`; the CLI turns anything thrown into a
 * `ErrorEnvelope` so stderr output and exit codes always have the same shape.
 */

import { redactString } from './redact.js';

// ---- Exit codes ------------------------------------------------------
export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_VALIDATION = 2;
export const EXIT_DEPENDENCY = 3;
export const EXIT_BUG = 4;

// ---- Error codes -----------------------------------------------------

export type ErrorCode =
  | 'INVALID_FIELD_PAIR'
  | 'MISSING_FILE_COMMAND_TARGET'
  | 'FILE_COMMAND_WRITE_FAILED'
  | 'STREAM_WRITE_FAILED'
  | 'MISSING_OIDC_CONFIG'
  | 'OIDC_REQUEST_FAILED'
  | 'OIDC_NON_SUCCESS_STATUS'
  | 'OIDC_MALFORMED_RESPONSE'
  | 'INVALID_CONFIG'
  | 'CONTEXT_LOAD_FAILED'
  | 'SUMMARY_TEMPLATE_FAILED'
  | 'INTERNAL_ERROR';

const CODE_TO_EXIT: Record<ErrorCode, number> = {
  INVALID_FIELD_PAIR: EXIT_VALIDATION,
  MISSING_FILE_COMMAND_TARGET: EXIT_VALIDATION,
  FILE_COMMAND_WRITE_FAILED: EXIT_DEPENDENCY,
  STREAM_WRITE_FAILED: EXIT_DEPENDENCY,
  MISSING_OIDC_CONFIG: EXIT_VALIDATION,
  OIDC_REQUEST_FAILED: EXIT_DEPENDENCY,
  OIDC_NON_SUCCESS_STATUS: EXIT_DEPENDENCY,
  OIDC_MALFORMED_RESPONSE: EXIT_DEPENDENCY,
  INVALID_CONFIG: EXIT_VALIDATION,
  CONTEXT_LOAD_FAILED: EXIT_DEPENDENCY,
  SUMMARY_TEMPLATE_FAILED: EXIT_VALIDATION,
  INTERNAL_ERROR: EXIT_BUG,
};

export function exitCodeFor(code: ErrorCode): number {
  return CODE_TO_EXIT[code];
}

export class ToolkitError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    opts: { cause?: unknown; context?: Record<string, unknown> } = {},
  ) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'ToolkitError';
    this.code = code;
    this.context = opts.context;
  }
}

export function isToolkitError(err: unknown): err is ToolkitError {
  return err instanceof ToolkitError;
}

// ---- Error envelope --------------------------------------------------

export interface ErrorEnvelope {
  code: ErrorCode;
  message: string;
  userMessage: string;
  cause?: string;
  context?: Record<string, unknown>;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  opts: { cause?: unknown; context?: Record<string, unknown> } = {},
): ErrorEnvelope {
  const causeMsg = opts.cause instanceof Error
    ? opts.cause.message
    : opts.cause != null
      ? String(opts.cause)
      : undefined;

  return {
    code,
    message,
    userMessage: redactString(message),
    cause: causeMsg ? redactString(causeMsg) : undefined,
    context: opts.context,
  };
}

/**
 * Wrap an unknown thrown value into an ErrorEnvelope. Toolkit errors keep
 * their code; everything else is reported as a bug.
 */
export function wrapError(err: unknown): ErrorEnvelope {
  if (err instanceof ToolkitError) {
    return createErrorEnvelope(err.code, err.message, { cause: err.cause, context: err.context });
  }
  if (err instanceof Error) {
    return createErrorEnvelope('INTERNAL_ERROR', err.message, { cause: err });
  }
  return createErrorEnvelope('INTERNAL_ERROR', String(err));
}
