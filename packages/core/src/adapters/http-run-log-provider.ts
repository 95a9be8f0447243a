import { setTimeout as delay } from 'node:timers/promises';
import { parseRunLog, type RunRecord } from '../domain/run/run-record.js';
import type { RunLogProvider } from '../ports/run-log-provider.js';
import { UpstreamError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { TtlCache } from '../shared/ttl-cache.js';

const log = createLogger('http-run-log');

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpRunLogProviderOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  /** Caches raw responses per session; records are parsed on every read. */
  cache?: TtlCache | null;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

/** Reads a session's runs from the orchestration service: `GET {baseUrl}/sessions/{id}/runs`. */
export class HttpRunLogProvider implements RunLogProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: HttpRunLogProviderOptions) {
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.maxRetries = Math.max(0, options.maxRetries ?? 2);
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  async fetchRuns(sessionId: string): Promise<RunRecord[]> {
    const cached = await this.options.cache?.get(sessionId);
    if (cached !== undefined) {
      log.debug(`fetchRuns: cache hit for ${sessionId}`);
      return this.toRuns(sessionId, cached);
    }

    const payload = await this.request(sessionId);
    if (payload === null) return [];
    await this.options.cache?.set(sessionId, payload);
    return this.toRuns(sessionId, payload);
  }

  private toRuns(sessionId: string, payload: unknown): RunRecord[] {
    const { runs, skipped } = parseRunLog(payload);
    for (const error of skipped) {
      log.warn(`fetchRuns: skipped record in ${sessionId}: ${error.message}`);
    }
    return runs;
  }

  // Null when the service does not know the session.
  private async request(sessionId: string): Promise<unknown> {
    const url = new URL(`sessions/${encodeURIComponent(sessionId)}/runs`, this.baseUrl).toString();
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.options.apiKey) headers.Authorization = `Bearer ${this.options.apiKey}`;

    let lastError: UpstreamError | null = null;
    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        log.debug(`fetchRuns: retry ${attempt}/${this.maxRetries} for ${sessionId} in ${this.retryDelayMs}ms`);
        await this.sleep(this.retryDelayMs);
      }

      let response: Response;
      try {
        response = await this.fetchFn(url, { headers, signal: AbortSignal.timeout(this.timeoutMs) });
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        lastError = new UpstreamError(`run log request failed: ${reason}`);
        log.warn(`fetchRuns: ${lastError.message}`);
        continue;
      }

      if (response.status === 404) {
        log.debug(`fetchRuns: no run log for ${sessionId}`);
        return null;
      }
      // Rate limiting and server errors are transient
      if (response.status === 429 || response.status >= 500) {
        lastError = new UpstreamError(`run log responded HTTP ${response.status}`, response.status);
        log.warn(`fetchRuns: ${lastError.message}`);
        continue;
      }
      if (!response.ok) {
        throw new UpstreamError(`run log responded HTTP ${response.status}`, response.status);
      }

      try {
        return await response.json();
      } catch (err) {
        throw new UpstreamError(
          `run log body is not JSON: ${err instanceof Error ? err.message : String(err)}`,
          response.status,
        );
      }
    }

    throw lastError ?? new UpstreamError('run log request failed');
  }
}
