import type { Command } from 'commander';
import { withEngine } from './with-engine.js';

export function registerAgentsCommand(program: Command): void {
  const agents = program.command('agents').description('Manage the agent directory used to name agents');

  agents
    .command('set')
    .description('Add or rename an agent')
    .argument('<id>', 'Agent id as it appears in run logs')
    .argument('<name>', 'Display name')
    .option('--public-id <id>', 'Public id of the agent')
    .option('--db <path>', 'Ledger database file')
    .action(async (id: string, name: string, opts: { publicId?: string; db?: string }) => {
      await withEngine({ dbPath: opts.db }, async (engine) => {
        await engine.agents.upsertAgent({ id, publicId: opts.publicId ?? null, name });
        console.log(`${id} -> ${name}`);
      });
    });

  agents
    .command('show')
    .description('Look up agents by id or public id')
    .argument('<ids...>', 'Agent ids')
    .option('--db <path>', 'Ledger database file')
    .action(async (ids: string[], opts: { db?: string }) => {
      await withEngine({ dbPath: opts.db }, async (engine) => {
        const found = await engine.agents.getAgents(ids);
        if (found.length === 0) {
          console.log('No matching agents.');
          return;
        }
        for (const agent of found) {
          console.log(`${agent.id}  ${agent.name}${agent.publicId ? `  (${agent.publicId})` : ''}`);
        }
      });
    });
}
