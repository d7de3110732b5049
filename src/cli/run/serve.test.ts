import { PassThrough } from 'node:stream';

import { describe, expect, it } from 'vitest';

import type { WireResult } from '@/installer/dispatch';
import { createCapturingLogger } from '@/test';

import { parseRequest, serveRequests } from './serve';

const collect = () => {
  const lines: string[] = [];
  return {
    lines,
    write: (line: string) => {
      lines.push(line);
    },
    parsed: (): unknown[] => lines.map((l) => JSON.parse(l) as unknown),
  };
};

describe('serveRequests', () => {
  it('answers each request line and echoes ids', async () => {
    const input = new PassThrough();
    const out = collect();
    const serving = serveRequests({
      input,
      write: out.write,
      handle: (req) => Promise.resolve<WireResult>({ handled: String(req.command) }),
      logger: createCapturingLogger(),
    });
    input.end(
      '{"command":"check_status","id":1}\n\n  \n{"command":"get_config"}\n',
    );
    await serving;
    expect(out.parsed()).toEqual(
      expect.arrayContaining([
        { id: 1, handled: 'check_status' },
        { handled: 'get_config' },
      ]),
    );
    expect(out.lines).toHaveLength(2);
  });

  it('reports malformed lines without stopping', async () => {
    const input = new PassThrough();
    const out = collect();
    const serving = serveRequests({
      input,
      write: out.write,
      handle: () => Promise.resolve<WireResult>({ ok: true }),
      logger: createCapturingLogger(),
    });
    input.end('not json\n[1,2]\n{"command":"check_status"}\n');
    await serving;
    const [first, second, third] = out.parsed();
    expect(first).toEqual({ error: expect.stringMatching(/^invalid JSON: /) });
    expect(second).toEqual({ error: 'request must be a JSON object' });
    expect(third).toEqual({ ok: true });
  });

  it('turns a rejected handler into an error response', async () => {
    const input = new PassThrough();
    const out = collect();
    const serving = serveRequests({
      input,
      write: out.write,
      handle: () => Promise.reject(new Error('boom')),
      logger: createCapturingLogger(),
    });
    input.end('{"command":"health_check","id":"req-7"}\n');
    await serving;
    expect(out.parsed()).toEqual([{ id: 'req-7', error: 'boom' }]);
  });

  it('stops reading when the signal fires', async () => {
    const input = new PassThrough();
    const ac = new AbortController();
    const out = collect();
    const serving = serveRequests({
      input,
      write: out.write,
      handle: () => Promise.resolve<WireResult>({ ok: true }),
      logger: createCapturingLogger(),
      signal: ac.signal,
    });
    ac.abort();
    await expect(serving).resolves.toBeUndefined();
    expect(out.lines).toEqual([]);
  });
});

describe('parseRequest', () => {
  it('accepts JSON objects only', () => {
    expect(parseRequest('{"command":"get_config"}')).toEqual({
      request: { command: 'get_config' },
    });
    expect(parseRequest('"get_config"')).toEqual({
      response: { error: 'request must be a JSON object' },
    });
  });
});
