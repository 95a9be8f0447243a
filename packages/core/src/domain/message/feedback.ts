export type Reaction = 'like' | 'dislike';

export type FeedbackRating = 'thumbs_up' | 'thumbs_down' | 'neutral';

export interface Feedback {
  feedbackId: string;
  reaction: Reaction | null;
  comment: string | null;
  createdAt: string | null;
}

/** A stored feedback row; `entityId` is the message id it was given against, in whatever case it was written. */
export interface FeedbackRecord extends Feedback {
  entityId: string;
}

export function ratingToReaction(rating: string | null | undefined): Reaction | null {
  switch ((rating ?? '').toLowerCase()) {
    case 'thumbs_up':
      return 'like';
    case 'thumbs_down':
      return 'dislike';
    default:
      return null;
  }
}
