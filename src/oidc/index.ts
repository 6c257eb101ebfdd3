/**
 * OIDC ID token minting against the orchestrator's token endpoint.
 *
 *   GET <ACTIONS_ID_TOKEN_REQUEST_URL>[?audience=<aud>]
 *   Authorization: Bearer <ACTIONS_ID_TOKEN_REQUEST_TOKEN>
 *
 * A 200 response carries `{"value": "<jwt>"}`.
 */

import { z } from 'zod';
import { ToolkitError, type StructuredLogger } from '../runner/index.js';
import type { GetenvFunc } from '../sink/index.js';
import type { FetchFunc } from '../action/options.js';

export const ID_TOKEN_REQUEST_URL_ENV = 'ACTIONS_ID_TOKEN_REQUEST_URL';
export const ID_TOKEN_REQUEST_TOKEN_ENV = 'ACTIONS_ID_TOKEN_REQUEST_TOKEN';

export const IdTokenResponseSchema = z.object({
  value: z.string(),
});

export type IdTokenResponse = z.infer<typeof IdTokenResponseSchema>;

export interface IdTokenRequestOptions {
  getenv: GetenvFunc;
  fetch: FetchFunc;
  timeoutMs: number;
  maxResponseBytes: number;
  /** Caller cancellation, combined with the client timeout. */
  signal?: AbortSignal;
  logger?: StructuredLogger;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function requireEnv(getenv: GetenvFunc, key: string): string {
  const value = getenv(key);
  if (!value) {
    throw new ToolkitError('MISSING_OIDC_CONFIG', `missing ${key} in environment`, { context: { env: key } });
  }
  return value;
}

/** Read at most `maxBytes` of the body; anything past the cap is dropped. */
async function readCapped(response: Response, maxBytes: number): Promise<string> {
  if (!response.body) return '';

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  while (total < maxBytes) {
    const { done, value } = await reader.read();
    if (done) break;
    const take = value.subarray(0, maxBytes - total);
    chunks.push(take);
    total += take.length;
  }
  if (total >= maxBytes) {
    await reader.cancel();
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export function buildIdTokenUrl(requestUrl: string, audience: string): string {
  let url: URL;
  try {
    url = new URL(requestUrl);
  } catch (err) {
    throw new ToolkitError('OIDC_REQUEST_FAILED', `failed to parse request URL: ${describe(err)}`, { cause: err });
  }
  if (audience) {
    url.searchParams.set('audience', audience);
  }
  return url.toString();
}

export async function requestIdToken(audience: string, opts: IdTokenRequestOptions): Promise<string> {
  const requestUrl = requireEnv(opts.getenv, ID_TOKEN_REQUEST_URL_ENV);
  const requestToken = requireEnv(opts.getenv, ID_TOKEN_REQUEST_TOKEN_ENV);
  const url = buildIdTokenUrl(requestUrl, audience);

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), opts.timeoutMs);
  const onAbort = (): void => controller.abort();
  if (opts.signal?.aborted) {
    controller.abort();
  } else {
    opts.signal?.addEventListener('abort', onAbort, { once: true });
  }

  opts.logger?.debug('oidc.request', 'Requesting ID token', { audience, timeout_ms: opts.timeoutMs });

  let status: number;
  let body: string;
  try {
    const response = await opts.fetch(url, {
      method: 'GET',
      headers: { Authorization: `Bearer ${requestToken}` },
      signal: controller.signal,
    });
    status = response.status;
    body = (await readCapped(response, opts.maxResponseBytes)).trim();
  } catch (err) {
    throw new ToolkitError('OIDC_REQUEST_FAILED', `failed to make HTTP request: ${describe(err)}`, { cause: err });
  } finally {
    clearTimeout(timeout);
    opts.signal?.removeEventListener('abort', onAbort);
  }

  opts.logger?.debug('oidc.response', `Token endpoint answered ${status}`, { status });

  if (status !== 200) {
    throw new ToolkitError('OIDC_NON_SUCCESS_STATUS', `non-successful response from minting OIDC token: ${body}`, {
      context: { status, body },
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new ToolkitError('OIDC_MALFORMED_RESPONSE', `failed to process response as JSON: ${describe(err)}`, {
      cause: err,
    });
  }

  const result = IdTokenResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new ToolkitError('OIDC_MALFORMED_RESPONSE', 'token response is missing a string "value" field');
  }
  return result.data.value;
}
