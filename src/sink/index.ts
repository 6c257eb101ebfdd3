/**
 * Delivery of workflow commands to the orchestrator.
 *
 * Stream commands are single lines written to the output stream and parsed
 * live. File commands are records appended to a file whose path the
 * orchestrator publishes in a `GITHUB_<NAME>` environment variable; they are
 * read after the step finishes.
 */

import { closeSync, openSync, writeSync } from 'fs';
import { EOL } from 'os';
import { formatCommand, toCommandValue, type Command, type CommandValue } from '../command/index.js';
import { ToolkitError, type StructuredLogger } from '../runner/index.js';

/** Delimiter wrapped around multiline values in file commands. */
export const FILE_COMMAND_DELIMITER = '_GitHubActionsFileCommandDelimeter_';

const FILE_COMMAND_ENV_PREFIX = 'GITHUB_';

/**
 * Anything with a synchronous `write`, such as `process.stdout`. Only errors
 * thrown from `write` itself surface as STREAM_WRITE_FAILED; a Node stream
 * reports EPIPE later through its 'error' event, which the owner of the stream
 * has to listen for.
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

/** Environment lookup; returns '' when the variable is unset. */
export type GetenvFunc = (key: string) => string;

export interface CommandSink {
  /** Write `command` as one line to the output stream. */
  issueCommand(command: Command): void;
  /** Append the command's message as one record to its environment file. */
  issueFileCommand(command: Command): void;
  /** Write raw text as one line, without command framing. */
  writeLine(text: string): void;
}

export interface CommandSinkOptions {
  output: OutputSink;
  getenv: GetenvFunc;
  logger?: StructuredLogger;
  eol?: string;
}

/**
 * Environment variable that names the file for a file command:
 * `env` -> `GITHUB_ENV`, `step-summary` -> `GITHUB_STEP_SUMMARY`.
 */
export function fileCommandEnvName(name: string): string {
  return FILE_COMMAND_ENV_PREFIX + name.replace(/[-\s]/g, '_').toUpperCase();
}

/**
 * Wrap a key/value assignment so the value may contain line breaks:
 *
 *   key<<DELIM
 *   value
 *   DELIM
 *
 * The record terminator after the closing delimiter is added on write.
 */
export function formatKeyValueMessage(key: string, value: CommandValue, eol: string = EOL): string {
  return `${key}<<${FILE_COMMAND_DELIMITER}${eol}${toCommandValue(value)}${eol}${FILE_COMMAND_DELIMITER}`;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createCommandSink(opts: CommandSinkOptions): CommandSink {
  const eol = opts.eol ?? EOL;

  function writeLine(text: string): void {
    try {
      opts.output.write(text + eol);
    } catch (err) {
      throw new ToolkitError('STREAM_WRITE_FAILED', `failed to issue command: ${describe(err)}`, { cause: err });
    }
  }

  function writeFailed(err: unknown, envName: string): ToolkitError {
    return new ToolkitError(
      'FILE_COMMAND_WRITE_FAILED',
      `unable to write command to the environment file: ${describe(err)}`,
      { cause: err, context: { env: envName } },
    );
  }

  // Properties are not part of the file record format and are ignored here.
  function issueFileCommand(command: Command): void {
    const envName = fileCommandEnvName(command.name);
    const filePath = opts.getenv(envName);
    if (!filePath) {
      throw new ToolkitError('MISSING_FILE_COMMAND_TARGET', `missing ${envName} in environment`, {
        context: { command: command.name, env: envName },
      });
    }

    const record = toCommandValue(command.message) + eol;

    let fd: number;
    try {
      fd = openSync(filePath, 'a', 0o644);
    } catch (err) {
      throw writeFailed(err, envName);
    }

    let failure: { cause: unknown } | undefined;
    try {
      writeSync(fd, record);
    } catch (err) {
      failure = { cause: err };
    }
    try {
      closeSync(fd);
    } catch (err) {
      failure ??= { cause: err };
    }
    if (failure) throw writeFailed(failure.cause, envName);

    opts.logger?.debug('file_command.write', `Appended ${command.name} record`, {
      env: envName,
      bytes: Buffer.byteLength(record),
    });
  }

  return {
    issueCommand: (command) => writeLine(formatCommand(command)),
    issueFileCommand,
    writeLine,
  };
}
