import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { EventEmitter } from 'events';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { EOL, tmpdir } from 'os';
import { join } from 'path';
import { createProgram, watchOutputErrors, type CliIO } from '../cli/program.js';
import { FILE_COMMAND_DELIMITER } from '../sink/index.js';
import { envOf, memoryOutput, type MemoryOutput } from './helpers.js';

interface TestIO extends CliIO {
  stdout: MemoryOutput;
  stderr: MemoryOutput;
  exit: Mock<(code: number) => void>;
}

function testIO(vars: Record<string, string> = {}, fetch?: CliIO['fetch']): TestIO {
  return {
    stdout: memoryOutput(),
    stderr: memoryOutput(),
    getenv: envOf(vars),
    exit: vi.fn<(code: number) => void>(),
    fetch,
  };
}

async function runCli(io: TestIO, args: string[]): Promise<void> {
  await createProgram(io).parseAsync(args, { from: 'user' });
}

describe('CLI stream commands', () => {
  it('mask prints an add-mask command', async () => {
    const io = testIO();
    await runCli(io, ['mask', 'placeholder-value']);
    expect(io.stdout.chunks).toEqual([`::add-mask::placeholder-value${EOL}`]);
    expect(io.exit).not.toHaveBeenCalled();
  });

  it('group joins its words into one title', async () => {
    const io = testIO();
    await runCli(io, ['group', 'Build', 'step']);
    expect(io.stdout.text()).toBe(`::group::Build step${EOL}`);
  });

  it('warning attaches repeated --field pairs', async () => {
    const io = testIO();
    await runCli(io, ['warning', '--field', 'file=app.js', '--field', 'line=3', 'disk', 'full']);
    expect(io.stdout.text()).toBe(`::warning file=app.js,line=3::disk full${EOL}`);
  });

  it('rejects a malformed --field pair with exit code 2', async () => {
    const io = testIO();
    await runCli(io, ['notice', '--field', 'broken', 'hello']);
    expect(io.stdout.chunks).toEqual([]);
    expect(io.stderr.text()).toBe('Error [INVALID_FIELD_PAIR]: "broken" is not a proper k=v pair\n');
    expect(io.exit).toHaveBeenCalledWith(2);
  });

  it('fatal logs an error and exits 1', async () => {
    const io = testIO();
    await runCli(io, ['fatal', 'cannot', 'continue']);
    expect(io.stdout.text()).toBe(`::error::cannot continue${EOL}`);
    expect(io.exit).toHaveBeenCalledWith(1);
  });

  it('info prints the message verbatim', async () => {
    const io = testIO();
    await runCli(io, ['info', 'plain', 'line']);
    expect(io.stdout.text()).toBe(`plain line${EOL}`);
  });
});

describe('CLI file commands', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cli-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('set-env appends a delimited record', async () => {
    const file = join(dir, 'env');
    const io = testIO({ GITHUB_ENV: file });
    await runCli(io, ['set-env', 'MODE', 'release']);
    expect(readFileSync(file, 'utf-8')).toBe(
      `MODE<<${FILE_COMMAND_DELIMITER}${EOL}release${EOL}${FILE_COMMAND_DELIMITER}${EOL}`,
    );
    expect(io.stdout.chunks).toEqual([]);
  });

  it('summary appends markdown', async () => {
    const file = join(dir, 'summary.md');
    const io = testIO({ GITHUB_STEP_SUMMARY: file });
    await runCli(io, ['summary', '#', 'Report']);
    expect(readFileSync(file, 'utf-8')).toBe(`# Report${EOL}`);
  });

  it('summary --template renders escaped data into the summary', async () => {
    const file = join(dir, 'summary.md');
    const template = join(dir, 'report.mustache');
    writeFileSync(template, '## {{title}}');
    const io = testIO({ GITHUB_STEP_SUMMARY: file });
    await runCli(io, ['summary', '--template', template, '--data', '{"title":"a & b"}']);
    expect(readFileSync(file, 'utf-8')).toBe(`## a &amp; b${EOL}`);
    expect(io.exit).not.toHaveBeenCalled();
  });

  it('summary --template rejects data that is not JSON', async () => {
    const file = join(dir, 'summary.md');
    const template = join(dir, 'report.mustache');
    writeFileSync(template, '## {{title}}');
    const io = testIO({ GITHUB_STEP_SUMMARY: file });
    await runCli(io, ['summary', '--template', template, '--data', '{oops']);
    expect(io.stderr.text()).toMatch(/^Error \[SUMMARY_TEMPLATE_FAILED\]: failed to parse template data: /);
    expect(io.exit).toHaveBeenCalledWith(2);
  });

  it('reports a missing target with exit code 2', async () => {
    const io = testIO();
    await runCli(io, ['set-output', 'k', 'v']);
    expect(io.stderr.text()).toBe('Error [MISSING_FILE_COMMAND_TARGET]: missing GITHUB_OUTPUT in environment\n');
    expect(io.exit).toHaveBeenCalledWith(2);
  });

  it('--legacy switches to single-line commands', async () => {
    const io = testIO();
    await runCli(io, ['--legacy', 'set-output', 'k', 'v']);
    expect(io.stdout.text()).toBe(`::set-output name=k::v${EOL}`);
    expect(io.exit).not.toHaveBeenCalled();
  });
});

describe('CLI lookups', () => {
  it('input prints the trimmed value', async () => {
    const io = testIO({ INPUT_MY_VAL: '  hello  ' });
    await runCli(io, ['input', 'my val']);
    expect(io.stdout.text()).toBe('hello\n');
  });

  it('repo prints owner/name', async () => {
    const io = testIO({ GITHUB_REPOSITORY: 'octo-org/hello-world' });
    await runCli(io, ['repo']);
    expect(io.stdout.text()).toBe('octo-org/hello-world\n');
  });

  it('context prints one line per context variable', async () => {
    const io = testIO({ GITHUB_JOB: 'build', GITHUB_RUN_ID: '42' });
    await runCli(io, ['context']);
    const lines = io.stdout.text().split('\n');
    expect(lines).toHaveLength(30);
    expect(lines[0]).toBe('GITHUB_ACTION=');
    expect(lines).toContain('GITHUB_JOB=build');
    expect(lines).toContain('GITHUB_RUN_ID=42');
    expect(lines).toContain('GITHUB_ACTIONS=false');
    expect(lines).toContain('GITHUB_API_URL=https://api.github.com');
    expect(lines[29]).toBe('');
  });

  it('context --json prints the workflow context as JSON', async () => {
    const io = testIO({ GITHUB_JOB: 'build', GITHUB_RUN_ID: '42' });
    await runCli(io, ['context', '--json']);
    const printed = JSON.parse(io.stdout.text());
    expect(printed.job).toBe('build');
    expect(printed.runId).toBe(42);
    expect(io.exit).not.toHaveBeenCalled();
  });

  it('id-token masks the token before printing it', async () => {
    const fetch = vi.fn(async (_input: string, _init?: RequestInit) =>
      new Response(JSON.stringify({ value: 'test-id-token' }), { status: 200 }),
    );
    const io = testIO(
      {
        ACTIONS_ID_TOKEN_REQUEST_URL: 'https://token.example.test/mint',
        ACTIONS_ID_TOKEN_REQUEST_TOKEN: 'test-request-token',
      },
      fetch,
    );
    await runCli(io, ['id-token', '--audience', 'sts']);
    expect(io.stdout.chunks).toEqual([`::add-mask::test-id-token${EOL}`, 'test-id-token\n']);
    expect(fetch.mock.calls[0][0]).toBe('https://token.example.test/mint?audience=sts');
  });

  it('id-token reports missing configuration with exit code 2', async () => {
    const io = testIO();
    await runCli(io, ['id-token']);
    expect(io.stderr.text()).toBe('Error [MISSING_OIDC_CONFIG]: missing ACTIONS_ID_TOKEN_REQUEST_URL in environment\n');
    expect(io.exit).toHaveBeenCalledWith(2);
  });
});

describe('CLI usage errors', () => {
  it('exits through the injected exit on an unknown command', async () => {
    const io = testIO();
    await expect(runCli(io, ['nope'])).rejects.toThrow();
    expect(io.exit).toHaveBeenCalledWith(1);
    expect(io.stderr.text()).toContain("unknown command 'nope'");
  });
});

describe('watchOutputErrors', () => {
  it('reports an asynchronous stream error as STREAM_WRITE_FAILED', () => {
    const stream = new EventEmitter();
    const io = testIO();
    watchOutputErrors(stream, io);

    stream.emit('error', new Error('write EPIPE'));

    expect(io.stderr.text()).toBe('Error [STREAM_WRITE_FAILED]: failed to issue command: write EPIPE\n');
    expect(io.exit).toHaveBeenCalledWith(3);
  });
});
