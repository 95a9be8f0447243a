export class ThreadmergeError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'ThreadmergeError';
  }
}

export class ConfigError extends ThreadmergeError {
  constructor(message: string, public readonly key?: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/** Run-log provider failure: network error, timeout, or a non-success HTTP status. */
export class UpstreamError extends ThreadmergeError {
  constructor(message: string, public readonly status?: number) {
    super(message, 'UPSTREAM_ERROR');
    this.name = 'UpstreamError';
  }
}

export class RecordParseError extends ThreadmergeError {
  constructor(message: string, public readonly index: number, public readonly runId?: string) {
    super(message, 'RECORD_PARSE_ERROR');
    this.name = 'RecordParseError';
  }
}
