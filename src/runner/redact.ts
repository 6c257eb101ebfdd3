/**
 * Denylist-based redaction for diagnostics and error output.
 *
 * Request tokens and minted ID tokens pass through the toolkit; nothing the
 * logger or the CLI's error envelope writes may carry them in clear text.
 */

/** Key patterns whose values never appear in output. */
export const REDACT_DENYLIST_KEYS: readonly string[] = [
  'password',
  'secret',
  'token',
  'authorization',
  'credential',
  'api_key',
  'apikey',
  'private_key',
];

/** Regex patterns that match sensitive values regardless of key name. */
const REDACT_VALUE_PATTERNS: readonly RegExp[] = [
  /-----BEGIN (?:RSA |EC )?PRIVATE KEY-----/,
  /gh[pousr]_[0-9a-zA-Z]{36}/,                  // GitHub tokens
  /\beyJ[\w-]+\.eyJ[\w-]+\.[\w-]+/,             // JWT
  /Bearer\s+\S+/,
];

const REDACTED = '[REDACTED]';

function keyMatchesDenylist(key: string): boolean {
  const lower = key.toLowerCase();
  return REDACT_DENYLIST_KEYS.some((dk) => lower.includes(dk));
}

function valueMatchesPattern(value: string): boolean {
  return REDACT_VALUE_PATTERNS.some((p) => p.test(value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-redact a value: any key on the denylist is replaced with
 * `[REDACTED]`, any string matching a sensitive pattern is replaced with
 * `[REDACTED]`. Returns a new value (never mutates).
 */
export function redact(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;

  if (typeof obj === 'string') {
    return valueMatchesPattern(obj) ? REDACTED : obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => redact(item));
  }

  if (!isRecord(obj)) return obj;

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key] = keyMatchesDenylist(key) ? REDACTED : redact(value);
  }
  return out;
}

/** Redact a record, keeping the record type for callers. */
export function redactRecord(data: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = keyMatchesDenylist(key) ? REDACTED : redact(value);
  }
  return out;
}

/**
 * Redact a string by replacing inline secret patterns.
 */
export function redactString(input: string): string {
  let result = input;
  result = result.replace(/-----BEGIN (?:RSA |EC )?PRIVATE KEY-----/g, REDACTED);
  result = result.replace(/gh[pousr]_[0-9a-zA-Z]{36}/g, REDACTED);
  result = result.replace(/\beyJ[\w-]+\.eyJ[\w-]+\.[\w-]+/g, REDACTED);
  result = result.replace(/Bearer\s+\S+/g, `Bearer ${REDACTED}`);
  result = result.replace(/[a-zA-Z0-9_]+_token\s*[:=]\s*['"]?[a-zA-Z0-9_-]{16,}['"]?/gi, REDACTED);
  result = result.replace(/[a-zA-Z0-9_]+_secret\s*[:=]\s*['"]?[a-zA-Z0-9_-]{16,}['"]?/gi, REDACTED);
  return result;
}
