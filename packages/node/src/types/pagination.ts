/**
 * Cursor-based pagination over positionally ordered items.
 *
 * Cursors are base64url-encoded JSON objects: { p } where p is the last
 * position returned. List endpoints return
 * { data, pagination: { cursor, hasMore } }.
 */

import { z } from "zod";

// =============================================================================
// Types
// =============================================================================

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

const CursorSchema = z.object({
  p: z.number().int().min(0),
});

export function encodeCursor(position: number): string {
  return Buffer.from(JSON.stringify({ p: position })).toString("base64url");
}

/**
 * @returns The position in the cursor, or undefined if the cursor is invalid.
 */
export function decodeCursor(cursor: string): number | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  const result = CursorSchema.safeParse(parsed);
  return result.success ? result.data.p : undefined;
}

/**
 * Apply cursor-based pagination to items sorted by ascending position.
 * An invalid cursor starts from the beginning.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  position: (item: T) => number,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const after = decodeCursor(query.cursor);
    if (after !== undefined) {
      filtered = filtered.filter((item) => position(item) > after);
    }
  }

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;

  const last = data[data.length - 1];
  const cursor = hasMore && last !== undefined ? encodeCursor(position(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
