/**
 * Action façade: the named workflow operations a step calls.
 *
 * Create one with `createAction()` at process start and pass it where it is
 * needed. `withFields()` derives instances that share the same output,
 * environment and HTTP client but carry their own immutable property bag for
 * leveled log commands.
 */

import { format } from 'util';
import type { Command, CommandProperties, CommandValue } from '../command/index.js';
import { loadWorkflowContext, type WorkflowContext } from '../context/index.js';
import { requestIdToken } from '../oidc/index.js';
import { renderSummaryTemplate } from '../summary/index.js';
import { EXIT_FAILURE, ToolkitError, type StructuredLogger } from '../runner/index.js';
import { createCommandSink, formatKeyValueMessage, type CommandSink, type GetenvFunc } from '../sink/index.js';
import {
  processGetenv,
  resolveActionConfig,
  type ActionConfig,
  type ActionOptions,
  type ExitFunc,
  type FetchFunc,
  type Protocol,
} from './options.js';

export {
  ActionConfigSchema,
  ProtocolSchema,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_MAX_TOKEN_RESPONSE_BYTES,
  MAX_HTTP_TIMEOUT_MS,
  processGetenv,
  resolveActionConfig,
  type ActionConfig,
  type ActionOptions,
  type ExitFunc,
  type FetchFunc,
  type Protocol,
} from './options.js';

// Stream commands
const ADD_MASK_CMD = 'add-mask';
const ADD_MATCHER_CMD = 'add-matcher';
const REMOVE_MATCHER_CMD = 'remove-matcher';
const GROUP_CMD = 'group';
const END_GROUP_CMD = 'endgroup';
const DEBUG_CMD = 'debug';
const NOTICE_CMD = 'notice';
const WARNING_CMD = 'warning';
const ERROR_CMD = 'error';

// File commands
const ENV_CMD = 'env';
const OUTPUT_CMD = 'output';
const PATH_CMD = 'path';
const STATE_CMD = 'state';
const STEP_SUMMARY_CMD = 'step-summary';

// Legacy stream forms of the file commands
const LEGACY_SET_ENV_CMD = 'set-env';
const LEGACY_SET_OUTPUT_CMD = 'set-output';
const LEGACY_SAVE_STATE_CMD = 'save-state';
const LEGACY_ADD_PATH_CMD = 'add-path';

export interface Action {
  readonly protocol: Protocol;
  /** Properties attached to leveled log commands. */
  readonly fields: CommandProperties;

  issueCommand(command: Command): void;
  issueFileCommand(command: Command): void;

  /** Mask `value` in all later log output. */
  addMask(value: string): void;
  addMatcher(path: string): void;
  removeMatcher(owner: string): void;
  group(title: string): void;
  endGroup(): void;

  debug(message: string, ...args: unknown[]): void;
  notice(message: string, ...args: unknown[]): void;
  warning(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** `error`, then exit with status 1. */
  fatal(message: string, ...args: unknown[]): void;
  /** Plain output line, no command framing. */
  info(message: string, ...args: unknown[]): void;

  setEnv(key: string, value: CommandValue): void;
  setOutput(key: string, value: CommandValue): void;
  saveState(key: string, value: CommandValue): void;
  addPath(path: string): void;
  /** Append markdown to the job summary. */
  addStepSummary(markdown: string): void;
  /** Render a mustache template with HTML-escaped `data`, then append it to the job summary. */
  addStepSummaryTemplate(template: string, data: unknown): void;

  getInput(name: string): string;
  getenv(key: string): string;
  getContext(): WorkflowContext;
  getIDToken(audience?: string, signal?: AbortSignal): Promise<string>;

  withFields(fields: CommandProperties | readonly string[]): Action;
}

interface Shared {
  sink: CommandSink;
  getenv: GetenvFunc;
  fetch: FetchFunc;
  exit: ExitFunc;
  config: ActionConfig;
  logger?: StructuredLogger;
}

/**
 * Parse `k=v` strings into properties. Only the first '=' splits, so values
 * may contain '='. A string without '=' is a programming error.
 */
export function parseFieldPairs(pairs: readonly string[]): CommandProperties {
  const fields: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq === -1) {
      throw new ToolkitError('INVALID_FIELD_PAIR', `"${pair}" is not a proper k=v pair`, { context: { pair } });
    }
    fields[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return fields;
}

/** Environment variable holding the value of input `name`. */
export function inputEnvName(name: string): string {
  return 'INPUT_' + name.replace(/ /g, '_').toUpperCase();
}

function isPairList(fields: CommandProperties | readonly string[]): fields is readonly string[] {
  return Array.isArray(fields);
}

function buildAction(shared: Shared, fields: CommandProperties): Action {
  const { sink, config } = shared;
  const legacy = config.protocol === 'legacy';

  function log(name: string, message: string, args: unknown[]): void {
    sink.issueCommand({ name, message: format(message, ...args), properties: fields });
  }

  function assign(fileCmd: string, legacyCmd: string, key: string, value: CommandValue): void {
    if (legacy) {
      sink.issueCommand({ name: legacyCmd, message: value, properties: { name: key } });
      return;
    }
    sink.issueFileCommand({ name: fileCmd, message: formatKeyValueMessage(key, value) });
  }

  const action: Action = {
    protocol: config.protocol,
    fields,

    issueCommand: (command) => sink.issueCommand(command),
    issueFileCommand: (command) => sink.issueFileCommand(command),

    addMask: (value) => sink.issueCommand({ name: ADD_MASK_CMD, message: value }),
    addMatcher: (path) => sink.issueCommand({ name: ADD_MATCHER_CMD, message: path }),
    removeMatcher: (owner) => sink.issueCommand({ name: REMOVE_MATCHER_CMD, properties: { owner } }),
    group: (title) => sink.issueCommand({ name: GROUP_CMD, message: title }),
    endGroup: () => sink.issueCommand({ name: END_GROUP_CMD }),

    debug: (message, ...args) => log(DEBUG_CMD, message, args),
    notice: (message, ...args) => log(NOTICE_CMD, message, args),
    warning: (message, ...args) => log(WARNING_CMD, message, args),
    error: (message, ...args) => log(ERROR_CMD, message, args),
    fatal: (message, ...args) => {
      log(ERROR_CMD, message, args);
      shared.exit(EXIT_FAILURE);
    },
    info: (message, ...args) => sink.writeLine(format(message, ...args)),

    setEnv: (key, value) => assign(ENV_CMD, LEGACY_SET_ENV_CMD, key, value),
    setOutput: (key, value) => assign(OUTPUT_CMD, LEGACY_SET_OUTPUT_CMD, key, value),
    saveState: (key, value) => assign(STATE_CMD, LEGACY_SAVE_STATE_CMD, key, value),
    addPath: (path) => {
      if (legacy) {
        sink.issueCommand({ name: LEGACY_ADD_PATH_CMD, message: path });
        return;
      }
      sink.issueFileCommand({ name: PATH_CMD, message: path });
    },
    // No stream form exists for summaries, so this is a file command under
    // either protocol.
    addStepSummary: (markdown) => sink.issueFileCommand({ name: STEP_SUMMARY_CMD, message: markdown }),
    addStepSummaryTemplate: (template, data) => action.addStepSummary(renderSummaryTemplate(template, data)),

    getInput: (name) => shared.getenv(inputEnvName(name)).trim(),
    getenv: (key) => shared.getenv(key),
    getContext: () => loadWorkflowContext(shared.getenv),
    getIDToken: (audience = '', signal) =>
      requestIdToken(audience, {
        getenv: shared.getenv,
        fetch: shared.fetch,
        timeoutMs: config.httpTimeoutMs,
        maxResponseBytes: config.maxTokenResponseBytes,
        signal,
        logger: shared.logger,
      }),

    withFields: (next) => buildAction(shared, Object.freeze(isPairList(next) ? parseFieldPairs(next) : { ...next })),
  };

  return action;
}

export function createAction(opts: ActionOptions = {}): Action {
  const config = resolveActionConfig(opts);
  const getenv = opts.getenv ?? processGetenv;
  const shared: Shared = {
    sink: createCommandSink({ output: opts.output ?? process.stdout, getenv, logger: opts.logger }),
    getenv,
    fetch: opts.fetch ?? ((input, init) => fetch(input, init)),
    exit: opts.exit ?? ((code) => process.exit(code)),
    config,
    logger: opts.logger,
  };
  return buildAction(shared, Object.freeze({ ...(opts.fields ?? {}) }));
}
