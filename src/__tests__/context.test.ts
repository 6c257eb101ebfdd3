import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadWorkflowContext, repoOf, type WorkflowContext } from '../context/index.js';
import { createAction } from '../action/index.js';
import { captureToolkitError, envOf, memoryOutput } from './helpers.js';

describe('loadWorkflowContext', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'context-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('applies defaults when nothing is set', () => {
    const ctx = loadWorkflowContext(envOf({}));
    expect(ctx.apiUrl).toBe('https://api.github.com');
    expect(ctx.graphqlUrl).toBe('https://api.github.com/graphql');
    expect(ctx.serverUrl).toBe('https://github.com');
    expect(ctx.actions).toBe(false);
    expect(ctx.runId).toBe(0);
    expect(ctx.repository).toBe('');
    expect(ctx.event).toBeUndefined();
  });

  it('reads and converts variables', () => {
    const ctx = loadWorkflowContext(
      envOf({
        GITHUB_ACTIONS: 'true',
        GITHUB_ACTOR: 'octo-user',
        GITHUB_REF_PROTECTED: 'false',
        GITHUB_RUN_ID: '1658821493',
        GITHUB_RUN_NUMBER: '3',
        GITHUB_RUN_ATTEMPT: '2',
        GITHUB_RETENTION_DAYS: '90',
        GITHUB_SHA: 'ffac537e6cbbf934b08745a378932722df287a53',
        GITHUB_API_URL: 'https://ghe.example.test/api/v3',
        GITHUB_STEP_SUMMARY: '/tmp/summary.md',
      }),
    );
    expect(ctx.actions).toBe(true);
    expect(ctx.actor).toBe('octo-user');
    expect(ctx.refProtected).toBe(false);
    expect(ctx.runId).toBe(1658821493);
    expect(ctx.runNumber).toBe(3);
    expect(ctx.runAttempt).toBe(2);
    expect(ctx.retentionDays).toBe(90);
    expect(ctx.sha).toBe('ffac537e6cbbf934b08745a378932722df287a53');
    expect(ctx.apiUrl).toBe('https://ghe.example.test/api/v3');
    expect(ctx.stepSummary).toBe('/tmp/summary.md');
  });

  it('rejects malformed numbers and booleans', () => {
    const err = captureToolkitError(() =>
      loadWorkflowContext(envOf({ GITHUB_RUN_ID: 'abc', GITHUB_ACTIONS: 'maybe' })),
    );
    expect(err.code).toBe('CONTEXT_LOAD_FAILED');
    expect(err.message).toContain('GITHUB_RUN_ID: expected an integer, got "abc"');
    expect(err.message).toContain('GITHUB_ACTIONS: expected a boolean, got "maybe"');
  });

  it('loads the event payload', () => {
    const eventPath = join(dir, 'event.json');
    writeFileSync(eventPath, JSON.stringify({ action: 'opened', number: 7 }));
    const ctx = loadWorkflowContext(envOf({ GITHUB_EVENT_PATH: eventPath }));
    expect(ctx.event).toEqual({ action: 'opened', number: 7 });
  });

  it('ignores a missing event file', () => {
    const ctx = loadWorkflowContext(envOf({ GITHUB_EVENT_PATH: join(dir, 'absent.json') }));
    expect(ctx.event).toBeUndefined();
  });

  it('fails on an invalid event file', () => {
    const eventPath = join(dir, 'event.json');
    writeFileSync(eventPath, '{not json');
    const err = captureToolkitError(() => loadWorkflowContext(envOf({ GITHUB_EVENT_PATH: eventPath })));
    expect(err.code).toBe('CONTEXT_LOAD_FAILED');
    expect(err.message).toMatch(/^failed to parse event payload: /);
  });

  it('fails on an event payload that is not an object', () => {
    const eventPath = join(dir, 'event.json');
    writeFileSync(eventPath, '[1, 2]');
    const err = captureToolkitError(() => loadWorkflowContext(envOf({ GITHUB_EVENT_PATH: eventPath })));
    expect(err.code).toBe('CONTEXT_LOAD_FAILED');
    expect(err.message).toBe('event payload must be a JSON object');
  });

  it('fails when the event path cannot be read', () => {
    const eventPath = join(dir, 'event-dir');
    mkdirSync(eventPath);
    const err = captureToolkitError(() => loadWorkflowContext(envOf({ GITHUB_EVENT_PATH: eventPath })));
    expect(err.code).toBe('CONTEXT_LOAD_FAILED');
    expect(err.message).toMatch(/^could not read event file: /);
  });

  it('is available from the action', () => {
    const action = createAction({ output: memoryOutput(), getenv: envOf({ GITHUB_JOB: 'build' }) });
    expect(action.getContext().job).toBe('build');
  });
});

describe('repoOf', () => {
  function contextWith(overrides: Partial<WorkflowContext>): WorkflowContext {
    return { ...loadWorkflowContext(envOf({})), ...overrides };
  }

  it('splits repository into owner and name', () => {
    expect(repoOf(contextWith({ repository: 'octo-org/hello-world' }))).toEqual({ owner: 'octo-org', repo: 'hello-world' });
  });

  it('returns an empty name when repository has no slash', () => {
    expect(repoOf(contextWith({ repository: 'octo-org' }))).toEqual({ owner: 'octo-org', repo: '' });
  });

  it('falls back to the event payload', () => {
    const ctx = contextWith({
      repositoryOwner: 'fallback-owner',
      event: { repository: { name: 'from-event', owner: { name: 'event-owner' } } },
    });
    expect(repoOf(ctx)).toEqual({ owner: 'event-owner', repo: 'from-event' });
  });

  it('falls back to repositoryOwner when the event has no owner', () => {
    const ctx = contextWith({ repositoryOwner: 'fallback-owner', event: { repository: { name: 'from-event' } } });
    expect(repoOf(ctx)).toEqual({ owner: 'fallback-owner', repo: 'from-event' });
  });

  it('returns empty values with nothing to go on', () => {
    expect(repoOf(contextWith({}))).toEqual({ owner: '', repo: '' });
  });
});
