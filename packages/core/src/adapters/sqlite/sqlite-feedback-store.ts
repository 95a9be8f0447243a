import { randomUUID } from 'node:crypto';
import { ratingToReaction, type FeedbackRating, type FeedbackRecord } from '../../domain/message/feedback.js';
import type { FeedbackStore } from '../../ports/feedback-store.js';
import { systemClock, type Clock } from '../../shared/clock.js';
import { placeholders, type SqliteDatabase } from './database.js';

interface FeedbackRow {
  id: string;
  entity_id: string;
  rating: string | null;
  comment: string | null;
  created_at: string;
}

export interface NewFeedback {
  entityId: string;
  userId: string;
  rating: FeedbackRating;
  comment?: string | null;
}

export class SqliteFeedbackStore implements FeedbackStore {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly clock: Clock = systemClock,
  ) {}

  /** One reaction per user per message: a new rating replaces the previous one. */
  async recordFeedback(feedback: NewFeedback): Promise<string> {
    const id = randomUUID();
    const replace = this.db.transaction(() => {
      this.db
        .prepare<[string, string]>('DELETE FROM feedback WHERE lower(entity_id) = ? AND user_id = ?')
        .run(feedback.entityId.toLowerCase(), feedback.userId);
      this.db
        .prepare<[string, string, string, string, string | null, string]>(
          `INSERT INTO feedback (id, entity_id, user_id, rating, comment, created_at)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(
          id,
          feedback.entityId,
          feedback.userId,
          feedback.rating,
          feedback.comment ?? null,
          new Date(this.clock.now()).toISOString(),
        );
    });
    replace();
    return id;
  }

  async getFeedback(messageIds: readonly string[], userId: string): Promise<FeedbackRecord[]> {
    const ids = [...new Set(messageIds.map((id) => id.toLowerCase()))];
    if (ids.length === 0) return [];

    const rows = this.db
      .prepare<string[], FeedbackRow>(
        `SELECT id, entity_id, rating, comment, created_at
         FROM feedback
         WHERE user_id = ? AND lower(entity_id) IN (${placeholders(ids.length)})
         ORDER BY created_at DESC, rowid DESC`,
      )
      .all(userId, ...ids);

    return rows.map((row) => ({
      feedbackId: row.id,
      entityId: row.entity_id,
      reaction: ratingToReaction(row.rating),
      comment: row.comment,
      createdAt: row.created_at,
    }));
  }
}
