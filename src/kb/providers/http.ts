/**
 * JSON-over-HTTP plumbing shared by the model backends
 */

import type { z } from 'zod';
import { ProviderError, describeError, type ProviderErrorKind } from '../errors.js';
import { sleep } from '../async.js';
import type { Logger } from '../../logger.js';

export interface JsonRequest<T> {
  provider: string;
  url: string;
  body: unknown;
  headers?: Record<string, string>;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  timeoutMs: number;
  /** One entry per retry; empty disables retries. */
  retryDelaysMs: readonly number[];
  signal?: AbortSignal;
  logger: Logger;
}

/**
 * POST a JSON body and validate the JSON response.
 * Network failures are retried with backoff; caller aborts are rethrown as-is.
 */
export async function postJson<T>(req: JsonRequest<T>): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await postOnce(req);
    } catch (err) {
      const delay = req.retryDelaysMs[attempt];
      const retryable = err instanceof ProviderError && err.kind === 'unavailable';

      if (retryable && delay !== undefined && !req.signal?.aborted) {
        req.logger.debug('Retrying provider call', req.provider, attempt + 1, delay);
        await sleep(delay, req.signal);
        continue;
      }
      throw err;
    }
  }
}

async function postOnce<T>(req: JsonRequest<T>): Promise<T> {
  const { provider, signal } = req;
  const timeout = AbortSignal.timeout(req.timeoutMs);

  let res: Response;
  try {
    res = await fetch(req.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...req.headers },
      body: JSON.stringify(req.body),
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });
  } catch (err) {
    if (signal?.aborted) throw err;
    throw new ProviderError(provider, 'unavailable', `request failed: ${describeError(err)}`, { cause: err });
  }

  if (!res.ok) {
    const detail = await readErrorBody(res);
    throw new ProviderError(provider, kindForStatus(res.status), `HTTP ${res.status} ${detail}`.trim(), {
      status: res.status,
    });
  }

  let json: unknown;
  try {
    json = await res.json();
  } catch (err) {
    if (signal?.aborted) throw err;
    throw new ProviderError(provider, 'malformed', 'response is not valid JSON', { cause: err });
  }

  const parsed = req.schema.safeParse(json);
  if (!parsed.success) {
    throw new ProviderError(provider, 'malformed', `unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

export function kindForStatus(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return 'auth_error';
  if (status === 429) return 'quota_exceeded';
  if (status === 408 || status >= 500) return 'unavailable';
  return 'malformed';
}

async function readErrorBody(res: Response): Promise<string> {
  try {
    return (await res.text()).slice(0, 300);
  } catch (err) {
    return `(body unreadable: ${describeError(err)})`;
  }
}
