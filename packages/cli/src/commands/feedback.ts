import type { Command } from 'commander';
import type { FeedbackRating } from '@threadmerge/core';
import { fail } from './options.js';
import { withEngine } from './with-engine.js';

const RATINGS: Record<string, FeedbackRating> = {
  up: 'thumbs_up',
  down: 'thumbs_down',
  neutral: 'neutral',
};

export function parseRating(value: string): FeedbackRating | null {
  return RATINGS[value.toLowerCase()] ?? null;
}

export function registerFeedbackCommand(program: Command): void {
  program
    .command('feedback')
    .description('Rate an assistant message')
    .argument('<messageId>', 'Transcript message id')
    .argument('<rating>', 'up, down or neutral')
    .option('-u, --user <id>', 'Rating user', 'local')
    .option('--comment <text>', 'Comment stored with the rating')
    .option('--db <path>', 'Ledger database file')
    .action(async (messageId: string, ratingArg: string, opts: { user: string; comment?: string; db?: string }) => {
      const rating = parseRating(ratingArg);
      if (!rating) {
        fail(`unknown rating "${ratingArg}" (expected up, down or neutral)`);
      }

      await withEngine({ dbPath: opts.db }, async (engine) => {
        const id = await engine.feedback.recordFeedback({
          entityId: messageId,
          userId: opts.user,
          rating,
          comment: opts.comment ?? null,
        });
        console.log(id);
      });
    });
}
