/**
 * Pagination Types
 * Cursor pagination shared by listing endpoints
 */

export interface PaginationParams {
  cursor?: string; // createdAt (ISO) of the last item on the previous page
  limit: number;
}

export interface PaginatedResult<T> {
  items: T[];
  nextCursor?: string; // Undefined if no more items
  hasMore: boolean;
}

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

/**
 * Normalize pagination params with defaults
 */
export function normalizePaginationParams(
  params: Partial<PaginationParams>
): PaginationParams {
  const requested =
    params.limit !== undefined && Number.isFinite(params.limit)
      ? Math.trunc(params.limit)
      : DEFAULT_PAGE_LIMIT;
  const limit = Math.min(Math.max(requested, 1), MAX_PAGE_LIMIT);
  const result: PaginationParams = { limit };
  if (params.cursor !== undefined && params.cursor !== '') {
    result.cursor = params.cursor;
  }
  return result;
}
