import { setTimeout as sleep } from 'node:timers/promises';
import React from 'react';
import { render as inkRender } from 'ink';
import type { Command } from 'commander';
import { setLogLevel, type TranscriptPage } from '@threadmerge/core';
import type { Engine } from '../index.js';
import { createFormatter, isOutputFormat, type OutputFormat } from '../formatters/index.js';
import { App } from '../ui/App.js';
import {
  hasStreamingReply,
  initialState,
  transcriptReducer,
  type Action,
  type TranscriptState,
} from '../ui/transcript-state.js';
import { applyLogFlags, describeError, fail, parseInteger } from './options.js';
import { withEngine } from './with-engine.js';

interface TranscriptOptions {
  user: string;
  limit?: number;
  before?: string;
  includeSystem?: boolean;
  runsDir?: string;
  db?: string;
  json?: boolean;
  format?: string;
  follow?: boolean;
  interval: number;
  verbose?: boolean;
  quiet?: boolean;
}

const DEFAULT_POLL_INTERVAL_MS = 2000;

function resolveFormat(opts: TranscriptOptions): OutputFormat | null {
  if (opts.json) return 'json';
  if (opts.format !== undefined) {
    if (isOutputFormat(opts.format)) return opts.format;
    fail(`unknown format "${opts.format}" (expected json, md or plain)`);
  }
  return process.stdout.isTTY ? null : 'plain';
}

function withSharedOptions(command: Command): Command {
  return command
    .option('-u, --user <id>', 'User whose ledger messages and feedback are read', 'local')
    .option('--runs-dir <path>', 'Read run-log snapshots from <path>/<session>.json')
    .option('--db <path>', 'Ledger database file')
    .option('--json', 'Output as JSON to stdout')
    .option('--format <type>', 'Output format: md, plain, json (default: interactive on a terminal)')
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Errors only');
}

async function loadPage(engine: Engine, sessionId: string, opts: TranscriptOptions): Promise<TranscriptPage> {
  return engine.transcripts.reconcile({
    sessionId,
    userId: opts.user,
    limit: opts.limit ?? null,
    beforeMessageId: opts.before ?? null,
    includeSystem: opts.includeSystem ?? false,
  });
}

async function runInteractive(engine: Engine, sessionId: string, opts: TranscriptOptions, showRuns: boolean) {
  // Info/debug lines would tear through Ink's frame
  if (!opts.verbose) setLogLevel('error');

  let state: TranscriptState = initialState(sessionId, opts.follow ?? false);
  const ink = inkRender(React.createElement(App, { state, showRuns }));
  const dispatch = (action: Action) => {
    state = transcriptReducer(state, action);
    ink.rerender(React.createElement(App, { state, showRuns }));
  };

  do {
    if (state.polls > 0) await sleep(opts.interval);
    try {
      dispatch({ type: 'PAGE_LOADED', page: await loadPage(engine, sessionId, opts) });
    } catch (err) {
      dispatch({ type: 'POLL_FAILED', error: describeError(err) });
    }
  } while (state.following);

  dispatch({ type: 'DONE' });
  ink.unmount();
  await ink.waitUntilExit();
  if (state.error) process.exitCode = 1;
}

async function runPlain(engine: Engine, sessionId: string, opts: TranscriptOptions, format: OutputFormat) {
  const formatter = createFormatter(format);
  let page = await loadPage(engine, sessionId, opts);
  console.log(formatter.renderPage(page));

  // Following in non-interactive mode prints each new state of the streaming reply
  while (opts.follow && hasStreamingReply(page)) {
    await sleep(opts.interval);
    page = await loadPage(engine, sessionId, opts);
    console.log(formatter.renderPage(page));
  }
}

export function registerTranscriptCommand(program: Command): void {
  withSharedOptions(
    program
      .command('transcript')
      .description('Show the reconciled transcript of a session')
      .argument('<session>', 'Session id'),
  )
    .option('-n, --limit <n>', 'Messages per page', parseInteger)
    .option('--before <messageId>', 'Page of messages older than <messageId>')
    .option('--include-system', 'Include system messages')
    .option('-f, --follow', 'Keep polling while a reply is streaming')
    .option('--interval <ms>', 'Poll interval for --follow', parseInteger, DEFAULT_POLL_INTERVAL_MS)
    .action(async (sessionId: string, opts: TranscriptOptions) => {
      applyLogFlags(opts);
      const format = resolveFormat(opts);

      await withEngine(
        { runsDir: opts.runsDir, dbPath: opts.db },
        async (engine) => {
          if (format === null) {
            await runInteractive(engine, sessionId, opts, false);
          } else {
            await runPlain(engine, sessionId, opts, format);
          }
        },
        format === 'json',
      );
    });
}

export function registerRunsCommand(program: Command): void {
  withSharedOptions(
    program
      .command('runs')
      .description('List the runs of a session with the agents each one involved')
      .argument('<session>', 'Session id'),
  ).action(async (sessionId: string, opts: TranscriptOptions) => {
    applyLogFlags(opts);
    const format = resolveFormat(opts);

    await withEngine(
      { runsDir: opts.runsDir, dbPath: opts.db },
      async (engine) => {
        if (format === null) {
          await runInteractive(engine, sessionId, { ...opts, follow: false }, true);
        } else {
          const page = await loadPage(engine, sessionId, opts);
          console.log(createFormatter(format).renderRuns(page.runSummaries));
        }
      },
      format === 'json',
    );
  });
}
