import { ValidationError } from "../../infra/app-error.js";
import type { Page, PageRequest } from "../../ports/pagination.js";

/** Slices an already sorted collection, using the id of the last row as the cursor. */
export function paginateById<T extends { id: string }>(
  items: T[],
  input: PageRequest,
): Page<T> {
  const limit = Math.max(1, input.limit);
  let startIndex = 0;

  if (input.cursor) {
    const cursorIndex = items.findIndex((item) => item.id === input.cursor);
    if (cursorIndex < 0) {
      throw new ValidationError("invalid_cursor", "cursor not found for current collection.");
    }
    startIndex = cursorIndex + 1;
  }

  const page = items.slice(startIndex, startIndex + limit);
  const hasMore = startIndex + page.length < items.length;
  const lastItem = page.at(-1);
  const nextCursor = hasMore && lastItem ? lastItem.id : undefined;

  return {
    data: page,
    hasMore,
    ...(nextCursor ? { nextCursor } : {}),
  };
}

export function newestFirst(a: { id: string; created_at: string }, b: { id: string; created_at: string }): number {
  const byCreatedAt = b.created_at.localeCompare(a.created_at);
  return byCreatedAt !== 0 ? byCreatedAt : b.id.localeCompare(a.id);
}

export function isWithinRange(timestamp: string, from?: string, to?: string): boolean {
  const valueMs = Date.parse(timestamp);
  if (!Number.isFinite(valueMs)) {
    return true;
  }
  if (from) {
    const fromMs = Date.parse(from);
    if (Number.isFinite(fromMs) && valueMs < fromMs) {
      return false;
    }
  }
  if (to) {
    const toMs = Date.parse(to);
    if (Number.isFinite(toMs) && valueMs > toMs) {
      return false;
    }
  }
  return true;
}
