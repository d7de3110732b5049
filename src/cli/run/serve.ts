/* src/cli/run/serve.ts
 * Newline-delimited JSON request server over a readable stream.
 * - One request object per line; blank lines are ignored.
 * - Requests are handled concurrently; each response is one JSON line,
 *   carrying the request's `id` when it had one.
 * - Resolves after the input ends (or the signal fires) and every
 *   accepted request has been answered.
 */
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

import type { WireResult } from '@/installer/dispatch';
import { DBG_SCOPE_SERVE } from '@/installer/util/debug-scopes';
import type { Logger } from '@/installer/util/log';

export type RequestHandler = (
  request: Record<string, unknown>,
) => Promise<WireResult>;

export type ServeOptions = {
  input: Readable;
  /** Receives one serialized response (without the newline). */
  write: (line: string) => void;
  handle: RequestHandler;
  logger: Logger;
  signal?: AbortSignal;
};

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

/** Parse one request line into a request mapping or an error response. */
export const parseRequest = (
  line: string,
): { request: Record<string, unknown> } | { response: WireResult } => {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return { response: { error: `invalid JSON: ${msg}` } };
  }
  if (!isRecord(value)) {
    return { response: { error: 'request must be a JSON object' } };
  }
  return { request: value };
};

const withId = (
  request: Record<string, unknown>,
  result: WireResult,
): WireResult => {
  const id = request.id;
  return typeof id === 'string' || typeof id === 'number'
    ? { id, ...result }
    : result;
};

export const serveRequests = async (opts: ServeOptions): Promise<void> => {
  const { input, write, handle, logger, signal } = opts;
  const rl = createInterface({ input, crlfDelay: Infinity, signal });
  const pending = new Set<Promise<void>>();

  const emit = (result: WireResult): void => {
    write(JSON.stringify(result));
  };

  try {
    for await (const raw of rl) {
      const line = raw.trim();
      if (!line) continue;
      const parsed = parseRequest(line);
      if ('response' in parsed) {
        emit(parsed.response);
        continue;
      }
      const { request } = parsed;
      logger.debug(DBG_SCOPE_SERVE, `request ${String(request.command)}`);
      const p = handle(request)
        .then((result) => emit(withId(request, result)))
        .catch((e: unknown) => {
          const msg = e instanceof Error ? e.message : String(e);
          emit(withId(request, { error: msg }));
        })
        .finally(() => pending.delete(p));
      pending.add(p);
    }
  } catch (e) {
    // readline rejects the iterator with AbortError when the signal fires
    if (!signal?.aborted) throw e;
  } finally {
    rl.close();
  }
  await Promise.all([...pending]);
};
