import { z } from 'zod';
import type { CommandProperties } from '../command/index.js';
import { ToolkitError, type StructuredLogger } from '../runner/index.js';
import type { GetenvFunc, OutputSink } from '../sink/index.js';

// ============================================================================
// Scalar configuration
// ============================================================================

/**
 * `file` writes env/output/state/path through environment files.
 * `legacy` emits the older single-line commands (`::set-env`, `::add-path`,
 * `::set-output`, `::save-state`) for runners that predate them.
 */
export const ProtocolSchema = z.enum(['file', 'legacy']);
export type Protocol = z.infer<typeof ProtocolSchema>;

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_TOKEN_RESPONSE_BYTES = 64_000;
/** Node clamps longer timer delays to 1 ms. */
export const MAX_HTTP_TIMEOUT_MS = 2_147_483_647;

export const ActionConfigSchema = z.object({
  protocol: ProtocolSchema.default('file'),
  httpTimeoutMs: z.number().int().positive().max(MAX_HTTP_TIMEOUT_MS).default(DEFAULT_HTTP_TIMEOUT_MS),
  maxTokenResponseBytes: z.number().int().positive().default(DEFAULT_MAX_TOKEN_RESPONSE_BYTES),
});

export type ActionConfig = z.infer<typeof ActionConfigSchema>;

// ============================================================================
// Capabilities
// ============================================================================

export type FetchFunc = (input: string, init?: RequestInit) => Promise<Response>;
export type ExitFunc = (code: number) => void;

export interface ActionOptions {
  /** Command stream; defaults to `process.stdout`. */
  output?: OutputSink;
  /** Environment lookup; defaults to `process.env`. */
  getenv?: GetenvFunc;
  /** HTTP client used for ID tokens; defaults to the global `fetch`. */
  fetch?: FetchFunc;
  /** Called by `fatal`; defaults to `process.exit`. */
  exit?: ExitFunc;
  /** Properties attached to every leveled log command. */
  fields?: CommandProperties;
  /** Receives the toolkit's own diagnostics. */
  logger?: StructuredLogger;
  protocol?: Protocol;
  httpTimeoutMs?: number;
  maxTokenResponseBytes?: number;
}

export function processGetenv(key: string): string {
  return process.env[key] ?? '';
}

export function resolveActionConfig(opts: ActionOptions): ActionConfig {
  const parsed = ActionConfigSchema.safeParse({
    protocol: opts.protocol,
    httpTimeoutMs: opts.httpTimeoutMs,
    maxTokenResponseBytes: opts.maxTokenResponseBytes,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ToolkitError('INVALID_CONFIG', `invalid action options: ${issues.join('; ')}`, {
      context: { issues },
    });
  }
  return parsed.data;
}
