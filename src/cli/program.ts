/**
 * workflow-commands CLI: exposes the action façade to shell steps.
 *
 * Commands:
 *   workflow-commands mask <value>
 *   workflow-commands group <title> / end-group
 *   workflow-commands debug|notice|warning|error|fatal <message...> [--field k=v]
 *   workflow-commands set-env|set-output|save-state <key> <value>
 *   workflow-commands add-path <path>
 *   workflow-commands summary [markdown...] [--file <path>] [--template <path> --data <json>]
 *   workflow-commands input <name> / id-token [--audience <aud>] / context [--json] / repo
 *
 * Exit codes:
 *   0  success
 *   1  `fatal` was issued
 *   2  validation error (bad field pair, missing file target or OIDC config)
 *   3  external dependency failure (file, stream, HTTP)
 *   4  unexpected bug
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { createAction, type Action, type ExitFunc, type FetchFunc } from '../action/index.js';
import { formatContextLines, repoOf } from '../context/index.js';
import { createLogger, exitCodeFor, ToolkitError, wrapError, type ErrorEnvelope } from '../runner/index.js';
import type { GetenvFunc, OutputSink } from '../sink/index.js';

export const CLI_NAME = 'workflow-commands';
export const CLI_VERSION = '0.1.0';

export interface CliIO {
  stdout: OutputSink;
  stderr: OutputSink;
  getenv: GetenvFunc;
  exit: ExitFunc;
  fetch?: FetchFunc;
}

interface GlobalOptions {
  legacy?: boolean;
  logFile?: string;
  verbose?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function reportTo(io: Pick<CliIO, 'stderr' | 'exit'>, envelope: ErrorEnvelope, verbose = false): void {
  io.stderr.write(`Error [${envelope.code}]: ${envelope.userMessage}\n`);
  if (verbose && envelope.cause) {
    io.stderr.write(`  cause: ${envelope.cause}\n`);
  }
  io.exit(exitCodeFor(envelope.code));
}

export interface ErrorEmitter {
  on(event: 'error', listener: (err: Error) => void): unknown;
}

/**
 * Report asynchronous write failures on the command stream (EPIPE once the
 * reader has gone) as STREAM_WRITE_FAILED.
 */
export function watchOutputErrors(stream: ErrorEmitter, io: Pick<CliIO, 'stderr' | 'exit'>): void {
  stream.on('error', (err) => {
    const failure = new ToolkitError('STREAM_WRITE_FAILED', `failed to issue command: ${err.message}`, { cause: err });
    reportTo(io, wrapError(failure));
  });
}

function parseTemplateData(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ToolkitError('SUMMARY_TEMPLATE_FAILED', `failed to parse template data: ${detail}`, { cause: err });
  }
}

export function createProgram(io: CliIO): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Issue workflow commands and environment-file records from shell steps')
    .version(CLI_VERSION)
    .option('--legacy', 'Use single-line commands instead of environment files for env/output/state/path')
    .option('--log-file <path>', 'Append diagnostics as JSON lines to this file')
    .option('--verbose', 'Echo debug diagnostics to stderr')
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    })
    .exitOverride((err) => {
      io.exit(err.exitCode);
      throw err;
    });

  function actionFor(): Action {
    const opts = program.opts<GlobalOptions>();
    const logger = createLogger({
      module: CLI_NAME,
      filePath: opts.logFile,
      minLevel: opts.verbose ? 'debug' : 'info',
      json: opts.verbose,
      stderr: io.stderr,
    });
    return createAction({
      output: io.stdout,
      getenv: io.getenv,
      fetch: io.fetch,
      exit: io.exit,
      protocol: opts.legacy ? 'legacy' : 'file',
      logger,
    });
  }

  function report(envelope: ErrorEnvelope): void {
    reportTo(io, envelope, program.opts<GlobalOptions>().verbose);
  }

  /** Run a command body, reporting any failure through the error envelope. */
  function run<A extends unknown[]>(fn: (action: Action, ...args: A) => void | Promise<void>) {
    return async (...args: A): Promise<void> => {
      try {
        await fn(actionFor(), ...args);
      } catch (err) {
        report(wrapError(err));
      }
    };
  }

  // -------------------------------------------------------------------------
  // Stream commands
  // -------------------------------------------------------------------------

  program
    .command('mask')
    .description('Mask a value in all later log output')
    .argument('<value>')
    .action(run((action, value: string) => action.addMask(value)));

  program
    .command('add-matcher')
    .description('Register a problem matcher file')
    .argument('<path>')
    .action(run((action, path: string) => action.addMatcher(path)));

  program
    .command('remove-matcher')
    .description('Remove a problem matcher by owner')
    .argument('<owner>')
    .action(run((action, owner: string) => action.removeMatcher(owner)));

  program
    .command('group')
    .description('Start a collapsible log group')
    .argument('<title...>')
    .action(run((action, title: string[]) => action.group(title.join(' '))));

  program
    .command('end-group')
    .description('End the current log group')
    .action(run((action) => action.endGroup()));

  const levels = ['debug', 'notice', 'warning', 'error', 'fatal'] as const;
  for (const level of levels) {
    program
      .command(level)
      .description(`Emit a ${level === 'fatal' ? 'error' : level} annotation${level === 'fatal' ? ' and exit 1' : ''}`)
      .argument('<message...>')
      .option('--field <pair>', 'Annotation property as k=v (repeatable)', collect, [])
      .action(run((action, message: string[], options: { field: string[] }) => {
        action.withFields(options.field)[level](message.join(' '));
      }));
  }

  program
    .command('info')
    .description('Write a plain log line')
    .argument('<message...>')
    .action(run((action, message: string[]) => action.info(message.join(' '))));

  // -------------------------------------------------------------------------
  // File commands
  // -------------------------------------------------------------------------

  program
    .command('set-env')
    .description('Set an environment variable for later steps')
    .argument('<key>')
    .argument('<value>')
    .action(run((action, key: string, value: string) => action.setEnv(key, value)));

  program
    .command('set-output')
    .description('Set a step output')
    .argument('<key>')
    .argument('<value>')
    .action(run((action, key: string, value: string) => action.setOutput(key, value)));

  program
    .command('save-state')
    .description('Save state for the post-job entry point')
    .argument('<key>')
    .argument('<value>')
    .action(run((action, key: string, value: string) => action.saveState(key, value)));

  program
    .command('add-path')
    .description('Prepend a directory to PATH for later steps')
    .argument('<path>')
    .action(run((action, path: string) => action.addPath(path)));

  program
    .command('summary')
    .description('Append markdown to the job summary')
    .argument('[markdown...]')
    .option('--file <path>', 'Read the markdown from a file')
    .option('--template <path>', 'Render a mustache template file instead')
    .option('--data <json>', 'JSON view for --template', '{}')
    .action(run((action, markdown: string[], options: { file?: string; template?: string; data: string }) => {
      if (options.template) {
        action.addStepSummaryTemplate(readFileSync(options.template, 'utf-8'), parseTemplateData(options.data));
        return;
      }
      const text = options.file ? readFileSync(options.file, 'utf-8') : markdown.join(' ');
      action.addStepSummary(text);
    }));

  // -------------------------------------------------------------------------
  // Lookups
  // -------------------------------------------------------------------------

  program
    .command('input')
    .description('Print the value of an action input')
    .argument('<name>')
    .action(run((action, name: string) => {
      io.stdout.write(action.getInput(name) + '\n');
    }));

  program
    .command('id-token')
    .description('Mint an OIDC ID token, mask it, and print it')
    .option('--audience <aud>', 'Audience claim for the token', '')
    .action(run(async (action, options: { audience: string }) => {
      const token = await action.getIDToken(options.audience);
      action.addMask(token);
      io.stdout.write(token + '\n');
    }));

  program
    .command('context')
    .description('Print the workflow context, one GITHUB_X=value line per variable')
    .option('--json', 'Print the whole context, event payload included, as JSON')
    .action(run((action, options: { json?: boolean }) => {
      const ctx = action.getContext();
      const text = options.json ? JSON.stringify(ctx, null, 2) : formatContextLines(ctx).join('\n');
      io.stdout.write(text + '\n');
    }));

  program
    .command('repo')
    .description('Print the repository as owner/name')
    .action(run((action) => {
      const { owner, repo } = repoOf(action.getContext());
      io.stdout.write(`${owner}/${repo}\n`);
    }));

  return program;
}
