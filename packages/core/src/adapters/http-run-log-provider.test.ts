import { describe, it, expect, vi } from 'vitest';
import { fixedClock } from '../shared/clock.js';
import { UpstreamError } from '../shared/errors.js';
import { TtlCache } from '../shared/ttl-cache.js';
import { BASE_MS } from '../testing/builders.js';
import { HttpRunLogProvider, type FetchLike } from './http-run-log-provider.js';
import { MemoryKeyValueStore } from './memory-key-value-store.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const PAYLOAD = {
  runs: [{ run_id: 'r1', input: { content: 'hi' }, content: 'hello', status: 'COMPLETED', created_at: 1_700_000_000 }],
};

function provider(fetchFn: FetchLike, extra: { cache?: TtlCache; apiKey?: string } = {}) {
  const sleep = vi.fn(async (_ms: number) => {});
  const runLog = new HttpRunLogProvider({
    baseUrl: 'https://runs.example.test/api',
    fetch: fetchFn,
    sleep,
    ...extra,
  });
  return { runLog, sleep };
}

describe('HttpRunLogProvider', () => {
  it('should request the session runs with the bearer token and parse them', async () => {
    const fetchFn = vi.fn<FetchLike>(async () => jsonResponse(PAYLOAD));
    const { runLog } = provider(fetchFn, { apiKey: 'test-secret' });

    const runs = await runLog.fetchRuns('session 1');

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('https://runs.example.test/api/sessions/session%201/runs');
    expect(init?.headers).toEqual({ Accept: 'application/json', Authorization: 'Bearer test-secret' });
    expect(runs).toHaveLength(1);
    expect(runs[0]).toMatchObject({
      runId: 'r1',
      inputContent: 'hi',
      content: 'hello',
      status: 'completed',
      createdAtMs: BASE_MS,
    });
  });

  it('should leave out the authorization header without an api key', async () => {
    const fetchFn = vi.fn<FetchLike>(async () => jsonResponse([]));
    const { runLog } = provider(fetchFn);

    await runLog.fetchRuns('session-1');

    expect(fetchFn.mock.calls[0][1]?.headers).toEqual({ Accept: 'application/json' });
  });

  it('should retry a server error and return the later response', async () => {
    const fetchFn = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse({ error: 'busy' }, 503))
      .mockResolvedValueOnce(jsonResponse(PAYLOAD));
    const { runLog, sleep } = provider(fetchFn);

    const runs = await runLog.fetchRuns('session-1');

    expect(runs.map((run) => run.runId)).toEqual(['r1']);
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(500);
  });

  it('should retry when rate limited and report the last status', async () => {
    const fetchFn = vi.fn<FetchLike>(async () => jsonResponse({ detail: 'slow down' }, 429));
    const { runLog, sleep } = provider(fetchFn);

    const error = await runLog.fetchRuns('session-1').catch((err: unknown) => err);

    expect(error instanceof UpstreamError ? error.status : null).toBe(429);
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should give up after the configured retries on network errors', async () => {
    const fetchFn = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed');
    });
    const { runLog, sleep } = provider(fetchFn);

    await expect(runLog.fetchRuns('session-1')).rejects.toThrow('run log request failed: fetch failed');
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should treat 404 as a session without runs', async () => {
    const fetchFn = vi.fn<FetchLike>(async () => jsonResponse({ detail: 'not found' }, 404));
    const { runLog } = provider(fetchFn);

    await expect(runLog.fetchRuns('session-1')).resolves.toEqual([]);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should not retry a client error', async () => {
    const fetchFn = vi.fn<FetchLike>(async () => jsonResponse({ detail: 'unauthorized' }, 401));
    const { runLog } = provider(fetchFn);

    const error = await runLog.fetchRuns('session-1').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error instanceof UpstreamError ? error.status : null).toBe(401);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should reject a body that is not JSON', async () => {
    const fetchFn = vi.fn<FetchLike>(async () => new Response('<html>oops</html>', { status: 200 }));
    const { runLog } = provider(fetchFn);

    await expect(runLog.fetchRuns('session-1')).rejects.toBeInstanceOf(UpstreamError);
  });

  it('should skip malformed records and keep the rest', async () => {
    const fetchFn = vi.fn<FetchLike>(async () => jsonResponse([{ run_id: 'r1' }, { nope: true }, { run_id: 'r1' }]));
    const { runLog } = provider(fetchFn);

    const runs = await runLog.fetchRuns('session-1');

    expect(runs.map((run) => run.runId)).toEqual(['r1']);
  });

  it('should serve repeated reads from the cache until it expires', async () => {
    const clock = fixedClock(BASE_MS);
    const cache = new TtlCache(new MemoryKeyValueStore(clock), { ttlMs: 5_000, namespace: 'runs', clock });
    const fetchFn = vi.fn<FetchLike>(async () => jsonResponse(PAYLOAD));
    const { runLog } = provider(fetchFn, { cache });

    await runLog.fetchRuns('session-1');
    const cached = await runLog.fetchRuns('session-1');
    expect(cached.map((run) => run.runId)).toEqual(['r1']);
    expect(fetchFn).toHaveBeenCalledTimes(1);

    clock.advance(5_000);
    await runLog.fetchRuns('session-1');
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(cache.stats()).toEqual({ hits: 1, misses: 2, writes: 2 });
  });
});
