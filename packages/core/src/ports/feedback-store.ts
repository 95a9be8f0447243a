import type { FeedbackRecord } from '../domain/message/feedback.js';

export interface FeedbackStore {
  getFeedback(messageIds: readonly string[], userId: string): Promise<FeedbackRecord[]>;
}
