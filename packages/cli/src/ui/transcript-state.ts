import type { TranscriptPage } from '@threadmerge/core';

export interface TranscriptState {
  sessionId: string;
  page: TranscriptPage | null;
  following: boolean;
  polls: number;
  error: string | null;
  done: boolean;
}

export type Action =
  | { type: 'PAGE_LOADED'; page: TranscriptPage }
  | { type: 'POLL_FAILED'; error: string }
  | { type: 'DONE' };

export function initialState(sessionId: string, following: boolean): TranscriptState {
  return { sessionId, page: null, following, polls: 0, error: null, done: false };
}

/** A reply is still being written somewhere on the page. */
export function hasStreamingReply(page: TranscriptPage | null): boolean {
  return page?.messages.some((message) => message.role === 'assistant' && message.status === 'streaming') ?? false;
}

export function transcriptReducer(state: TranscriptState, action: Action): TranscriptState {
  switch (action.type) {
    case 'PAGE_LOADED':
      return {
        ...state,
        page: action.page,
        polls: state.polls + 1,
        error: null,
        following: state.following && hasStreamingReply(action.page),
      };

    case 'POLL_FAILED':
      return { ...state, error: action.error, following: false };

    case 'DONE':
      return { ...state, following: false, done: true };

    default:
      return state;
  }
}
