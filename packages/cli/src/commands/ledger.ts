import { randomUUID } from 'node:crypto';
import type { Command } from 'commander';
import { contentSignature, isMessageRole, MESSAGE_ROLES, type Attachment } from '@threadmerge/core';
import { applyLogFlags, collectKeyValue, fail, type LogFlags } from './options.js';
import { withEngine } from './with-engine.js';

interface AddOptions extends LogFlags {
  user: string;
  role: string;
  agent?: string;
  attach: Array<[string, string]>;
  field: Array<[string, string]>;
  stream?: string;
  db?: string;
  json?: boolean;
}

/** `--attach name=url` pairs as attachments with fresh ids. */
export function toAttachments(pairs: ReadonlyArray<[string, string]>): Attachment[] {
  return pairs.map(([filename, url]) => ({ attachmentId: randomUUID(), filename, url }));
}

export function registerLedgerCommand(program: Command): void {
  const ledger = program.command('ledger').description('Write to the local message ledger');

  ledger
    .command('add')
    .description('Record a message sent in a session')
    .argument('<session>', 'Session id')
    .argument('[content...]', 'Message text')
    .option('-u, --user <id>', 'Sending user', 'local')
    .option('--role <role>', `Message role (${MESSAGE_ROLES.join(', ')})`, 'user')
    .option('--agent <id>', 'Agent the message was addressed to')
    .option('--attach <name=url>', 'Attach a file (repeatable)', collectKeyValue, [])
    .option('--field <key=value>', 'Custom field (repeatable)', collectKeyValue, [])
    .option('--stream <streamId>', 'Response stream answering this message')
    .option('--db <path>', 'Ledger database file')
    .option('--json', 'Print the stored message as JSON')
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Errors only')
    .action(async (sessionId: string, contentParts: string[], opts: AddOptions) => {
      applyLogFlags(opts);
      if (!isMessageRole(opts.role)) {
        fail(`unknown role "${opts.role}" (expected ${MESSAGE_ROLES.join(', ')})`, opts.json);
      }
      const role = opts.role;
      const content = contentParts.join(' ');
      const attachments = toAttachments(opts.attach);

      await withEngine(
        { dbPath: opts.db },
        async (engine) => {
          const message = await engine.ledger.recordMessage({
            sessionId,
            userId: opts.user,
            role,
            content,
            agentId: opts.agent ?? null,
            attachments,
            customFields: Object.fromEntries(opts.field),
          });
          for (const attachment of attachments) {
            await engine.attachments.addAttachment({
              ...attachment,
              messageId: message.id,
              contentSignature: contentSignature(role, content),
            });
          }
          if (opts.stream) await engine.ledger.attachStream(message.id, opts.stream);

          if (opts.json) {
            console.log(JSON.stringify(message, null, 2));
          } else {
            console.log(message.id);
          }
        },
        opts.json,
      );
    });

  ledger
    .command('attach-stream')
    .description('Link a recorded message to the response stream answering it')
    .argument('<messageId>', 'Ledger message id')
    .argument('<streamId>', 'Stream id')
    .option('--db <path>', 'Ledger database file')
    .action(async (messageId: string, streamId: string, opts: { db?: string }) => {
      await withEngine({ dbPath: opts.db }, async (engine) => {
        await engine.ledger.attachStream(messageId, streamId);
        console.log(`${messageId} -> ${streamId}`);
      });
    });
}
