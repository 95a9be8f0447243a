#!/usr/bin/env -S npx tsx

import 'dotenv/config';
import { createRequire } from 'node:module';
import { Command } from 'commander';
import { registerAgentsCommand } from '../src/commands/agents.js';
import { registerConfigCommand } from '../src/commands/config.js';
import { registerFeedbackCommand } from '../src/commands/feedback.js';
import { registerLedgerCommand } from '../src/commands/ledger.js';
import { registerStreamCommand } from '../src/commands/stream.js';
import { registerRunsCommand, registerTranscriptCommand } from '../src/commands/transcript.js';

const require = createRequire(import.meta.url);

function readVersion(): string {
  const pkg: unknown = require('../package.json');
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('threadmerge')
  .description('Reconcile agent run logs and the local message ledger into one transcript')
  .version(readVersion());

registerTranscriptCommand(program);
registerRunsCommand(program);
registerLedgerCommand(program);
registerStreamCommand(program);
registerFeedbackCommand(program);
registerAgentsCommand(program);
registerConfigCommand(program);

await program.parseAsync();
