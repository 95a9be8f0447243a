import { InvalidArgumentError } from 'commander';
import { ConfigError, setLogLevel, ThreadmergeError } from '@threadmerge/core';

export interface LogFlags {
  verbose?: boolean;
  quiet?: boolean;
}

export function applyLogFlags(opts: LogFlags): void {
  if (opts.verbose) setLogLevel('debug');
  if (opts.quiet) setLogLevel('error');
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

/** `name=value`; the value may itself contain `=`. */
export function parseKeyValue(value: string): [string, string] {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${value}".`);
  }
  return [value.slice(0, separator).trim(), value.slice(separator + 1).trim()];
}

/** Accumulator for repeatable `key=value` options. */
export function collectKeyValue(value: string, previous: Array<[string, string]> = []): Array<[string, string]> {
  return [...previous, parseKeyValue(value)];
}

export function describeError(err: unknown): string {
  if (err instanceof ConfigError) return `Configuration error: ${err.message}`;
  if (err instanceof ThreadmergeError) return err.message;
  return err instanceof Error ? err.message : String(err);
}

/** Print the failure and exit; in JSON mode the error goes to stderr as an object. */
export function fail(err: unknown, json = false): never {
  const message = describeError(err);
  console.error(json ? JSON.stringify({ error: message }) : `Error: ${message}`);
  process.exit(1);
}
