import { readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { parseRunLog, type RunRecord } from '../domain/run/run-record.js';
import type { RunLogProvider } from '../ports/run-log-provider.js';
import { UpstreamError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('json-run-log');

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Run-log snapshots on disk, one `<sessionId>.json` per session. */
export class JsonRunLogProvider implements RunLogProvider {
  constructor(private readonly runsDir: string) {}

  async fetchRuns(sessionId: string): Promise<RunRecord[]> {
    if (!sessionId || basename(sessionId) !== sessionId) {
      log.warn(`fetchRuns: refusing session id ${JSON.stringify(sessionId)}`);
      return [];
    }

    const filePath = join(this.runsDir, `${sessionId}.json`);
    let data: string;
    try {
      data = await readFile(filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        log.debug(`fetchRuns: no snapshot at ${filePath}`);
        return [];
      }
      throw err;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch (err) {
      throw new UpstreamError(`snapshot ${filePath} is not JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    const { runs, skipped } = parseRunLog(payload);
    for (const error of skipped) {
      log.warn(`fetchRuns: skipped record in ${filePath}: ${error.message}`);
    }
    return runs;
  }
}
