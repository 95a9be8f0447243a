export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 20;

export interface PageRequest {
  limit?: number | null;
  beforeMessageId?: string | null;
}

export interface PageLimits {
  defaultPageSize: number;
  maxPageSize: number;
}

export interface Page<T> {
  items: T[];
  hasMore: boolean;
}

export function clampLimit(
  limit: number | null | undefined,
  limits: PageLimits = { defaultPageSize: DEFAULT_PAGE_SIZE, maxPageSize: MAX_PAGE_SIZE },
): number {
  if (limit === null || limit === undefined || !Number.isFinite(limit)) return limits.defaultPageSize;
  return Math.min(Math.max(Math.trunc(limit), 1), limits.maxPageSize);
}

/**
 * The newest `limit` items strictly before the cursor, oldest first. A cursor
 * that names no item gives an empty page.
 */
export function paginate<T extends { messageId: string }>(
  ordered: readonly T[],
  request: PageRequest,
  limits?: PageLimits,
): Page<T> {
  const limit = clampLimit(request.limit, limits);

  let end = ordered.length;
  if (request.beforeMessageId) {
    const cursor = request.beforeMessageId.toLowerCase();
    end = ordered.findIndex((item) => item.messageId.toLowerCase() === cursor);
    if (end === -1) return { items: [], hasMore: false };
  }

  const start = Math.max(0, end - limit);
  return { items: ordered.slice(start, end), hasMore: start > 0 };
}
