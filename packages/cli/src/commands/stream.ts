import type { Command } from 'commander';
import { formatStreamMarkerValue, STREAM_MARKER_TTL_MS, streamMarkerKey } from '@threadmerge/core';
import { parseInteger } from './options.js';
import { withEngine } from './with-engine.js';

interface StartOptions {
  user: string;
  run?: string;
  team?: string;
  status: string;
  ttl: number;
  db?: string;
}

/**
 * Stream markers normally come from the orchestration side while it writes a reply;
 * these commands set and clear them by hand against the local marker keyspace.
 */
export function registerStreamCommand(program: Command): void {
  const stream = program.command('stream').description('Mark a response stream as in flight');

  stream
    .command('start')
    .description('Record that a reply is streaming in a session')
    .argument('<session>', 'Session id')
    .argument('<streamId>', 'Stream id')
    .option('-u, --user <id>', 'User the reply is for', 'local')
    .option('--run <runId>', 'Run producing the reply')
    .option('--team <teamId>', 'Team producing the reply')
    .option('--status <status>', 'Marker status', 'streaming')
    .option('--ttl <ms>', 'Time before the marker expires', parseInteger, STREAM_MARKER_TTL_MS)
    .option('--db <path>', 'Ledger database file')
    .action(async (sessionId: string, streamId: string, opts: StartOptions) => {
      const value = formatStreamMarkerValue({
        userId: opts.user,
        teamId: opts.team ?? null,
        sessionId,
        runId: opts.run ?? null,
        status: opts.status,
      });
      await withEngine({ dbPath: opts.db }, async (engine) => {
        await engine.markers.set(streamMarkerKey(streamId), value, opts.ttl);
        console.log(`${streamMarkerKey(streamId)} = ${value}`);
      });
    });

  stream
    .command('end')
    .description('Clear the marker of a finished stream')
    .argument('<streamId>', 'Stream id')
    .option('--db <path>', 'Ledger database file')
    .action(async (streamId: string, opts: { db?: string }) => {
      await withEngine({ dbPath: opts.db }, async (engine) => {
        await engine.markers.delete(streamMarkerKey(streamId));
        console.log(`cleared ${streamMarkerKey(streamId)}`);
      });
    });
}
