/**
 * Workflow context read from the orchestrator's `GITHUB_*` variables.
 *
 * Unset variables read as '' and fall back to the field's zero value or
 * documented default. When GITHUB_EVENT_PATH names an existing file its JSON
 * payload is attached as `event`.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ToolkitError } from '../runner/index.js';
import type { GetenvFunc } from '../sink/index.js';

// ============================================================================
// Field parsers
// ============================================================================

const TRUE_VALUES = new Set(['1', 't', 'T', 'true', 'TRUE', 'True']);
const FALSE_VALUES = new Set(['', '0', 'f', 'F', 'false', 'FALSE', 'False']);

function envString(fallback = ''): z.ZodEffects<z.ZodString, string, string> {
  return z.string().transform((v) => v || fallback);
}

const envBool = z.string().transform((v, ctx) => {
  if (TRUE_VALUES.has(v)) return true;
  if (FALSE_VALUES.has(v)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${v}"` });
  return z.NEVER;
});

const envInt = z.string().transform((v, ctx) => {
  if (v === '') return 0;
  if (!/^-?\d+$/.test(v)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected an integer, got "${v}"` });
    return z.NEVER;
  }
  return Number(v);
});

// ============================================================================
// Context schema
// ============================================================================

export const WorkflowContextSchema = z.object({
  action: envString(),
  actionPath: envString(),
  actionRepository: envString(),
  actions: envBool,
  actor: envString(),
  apiUrl: envString('https://api.github.com'),
  baseRef: envString(),
  env: envString(),
  eventName: envString(),
  eventPath: envString(),
  graphqlUrl: envString('https://api.github.com/graphql'),
  headRef: envString(),
  job: envString(),
  path: envString(),
  ref: envString(),
  refName: envString(),
  refProtected: envBool,
  refType: envString(),
  /** Owner and repository name, for example `octo-org/hello-world`. */
  repository: envString(),
  repositoryOwner: envString(),
  retentionDays: envInt,
  runAttempt: envInt,
  runId: envInt,
  runNumber: envInt,
  serverUrl: envString('https://github.com'),
  sha: envString(),
  stepSummary: envString(),
  workflow: envString(),
  workspace: envString(),
});

type ContextField = keyof z.input<typeof WorkflowContextSchema>;

export const CONTEXT_ENV: Readonly<Record<ContextField, string>> = {
  action: 'GITHUB_ACTION',
  actionPath: 'GITHUB_ACTION_PATH',
  actionRepository: 'GITHUB_ACTION_REPOSITORY',
  actions: 'GITHUB_ACTIONS',
  actor: 'GITHUB_ACTOR',
  apiUrl: 'GITHUB_API_URL',
  baseRef: 'GITHUB_BASE_REF',
  env: 'GITHUB_ENV',
  eventName: 'GITHUB_EVENT_NAME',
  eventPath: 'GITHUB_EVENT_PATH',
  graphqlUrl: 'GITHUB_GRAPHQL_URL',
  headRef: 'GITHUB_HEAD_REF',
  job: 'GITHUB_JOB',
  path: 'GITHUB_PATH',
  ref: 'GITHUB_REF',
  refName: 'GITHUB_REF_NAME',
  refProtected: 'GITHUB_REF_PROTECTED',
  refType: 'GITHUB_REF_TYPE',
  repository: 'GITHUB_REPOSITORY',
  repositoryOwner: 'GITHUB_REPOSITORY_OWNER',
  retentionDays: 'GITHUB_RETENTION_DAYS',
  runAttempt: 'GITHUB_RUN_ATTEMPT',
  runId: 'GITHUB_RUN_ID',
  runNumber: 'GITHUB_RUN_NUMBER',
  serverUrl: 'GITHUB_SERVER_URL',
  sha: 'GITHUB_SHA',
  stepSummary: 'GITHUB_STEP_SUMMARY',
  workflow: 'GITHUB_WORKFLOW',
  workspace: 'GITHUB_WORKSPACE',
};

const EventPayloadSchema = z.record(z.unknown());

export type EventPayload = z.infer<typeof EventPayloadSchema>;

export type WorkflowContext = z.infer<typeof WorkflowContextSchema> & {
  /** Parsed payload of the event that triggered the run. */
  event?: EventPayload;
};

// ============================================================================
// Loading
// ============================================================================

function isContextField(field: string): field is ContextField {
  return Object.hasOwn(CONTEXT_ENV, field);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function readEvent(eventPath: string): EventPayload | undefined {
  let raw: string;
  try {
    raw = readFileSync(eventPath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw new ToolkitError('CONTEXT_LOAD_FAILED', `could not read event file: ${describe(err)}`, {
      cause: err,
      context: { path: eventPath },
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ToolkitError('CONTEXT_LOAD_FAILED', `failed to parse event payload: ${describe(err)}`, {
      cause: err,
      context: { path: eventPath },
    });
  }

  const result = EventPayloadSchema.safeParse(parsed);
  if (!result.success) {
    throw new ToolkitError('CONTEXT_LOAD_FAILED', 'event payload must be a JSON object', {
      context: { path: eventPath },
    });
  }
  return result.data;
}

/** One `GITHUB_X=value` line per context variable, in schema order. The event payload is left out. */
export function formatContextLines(ctx: WorkflowContext): string[] {
  return Object.keys(CONTEXT_ENV)
    .filter(isContextField)
    .map((field) => `${CONTEXT_ENV[field]}=${String(ctx[field])}`);
}

export function loadWorkflowContext(getenv: GetenvFunc): WorkflowContext {
  const raw: Record<string, string> = {};
  for (const [field, envName] of Object.entries(CONTEXT_ENV)) {
    raw[field] = getenv(envName);
  }

  const parsed = WorkflowContextSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => {
      const field = String(i.path[0]);
      const envName = isContextField(field) ? CONTEXT_ENV[field] : field;
      return `${envName}: ${i.message}`;
    });
    throw new ToolkitError('CONTEXT_LOAD_FAILED', `could not process workflow context variables: ${issues.join('; ')}`, {
      context: { issues },
    });
  }

  const context: WorkflowContext = parsed.data;
  if (context.eventPath) {
    const event = readEvent(context.eventPath);
    if (event) context.event = event;
  }
  return context;
}

// ============================================================================
// Repository
// ============================================================================

export interface RepoRef {
  owner: string;
  repo: string;
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

/**
 * Owner and name of the repository the run belongs to. Falls back to the
 * event payload, then to `repositoryOwner`, when `repository` is unset.
 */
export function repoOf(context: WorkflowContext): RepoRef {
  if (context.repository) {
    const slash = context.repository.indexOf('/');
    if (slash === -1) return { owner: context.repository, repo: '' };
    return { owner: context.repository.slice(0, slash), repo: context.repository.slice(slash + 1) };
  }

  let owner = context.repositoryOwner;
  let repo = '';
  const repository = asRecord(context.event?.repository);
  if (repository) {
    if (typeof repository.name === 'string') repo = repository.name;
    const ownerRecord = asRecord(repository.owner);
    if (ownerRecord && typeof ownerRecord.name === 'string') owner = ownerRecord.name;
  }
  return { owner, repo };
}
