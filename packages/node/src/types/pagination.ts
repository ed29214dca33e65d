/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { field, value }.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
 */

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

/** Numeric keys compare as numbers, string keys lexicographically */
export type CursorKey = string | number;

// =============================================================================
// Cursor Encoding
// =============================================================================

interface CursorData {
  readonly f: string; // field name (compact key)
  readonly v: string; // last seen value
}

/**
 * Encode a cursor from field name and last seen value.
 */
export function encodeCursor(field: string, value: string): string {
  const data: CursorData = { f: field, v: value };
  return Buffer.from(JSON.stringify(data)).toString("base64url");
}

/**
 * Decode a cursor into field name and last seen value.
 *
 * @returns Decoded cursor, or undefined if the cursor is invalid.
 */
export function decodeCursor(
  cursor: string,
): { field: string; value: string } | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (typeof data !== "object" || data === null) {
    return undefined;
  }
  const record = data as Record<string, unknown>;
  if (typeof record["f"] === "string" && typeof record["v"] === "string") {
    return { field: record["f"], value: record["v"] };
  }
  return undefined;
}

function isAfter(key: CursorKey, cursorValue: string): boolean {
  return typeof key === "number" ? key > Number(cursorValue) : key > cursorValue;
}

/**
 * Apply cursor-based pagination to a sorted array.
 *
 * Items must be sorted by their key in ascending order. A cursor
 * issued for a different field is ignored.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getKey: (item: T) => CursorKey,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === fieldName) {
      const cursorValue = decoded.value;
      filtered = filtered.filter((item) => isAfter(getKey(item), cursorValue));
    }
  }

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data[data.length - 1];

  const cursor =
    hasMore && last !== undefined
      ? encodeCursor(fieldName, String(getKey(last)))
      : null;

  return { data, pagination: { cursor, hasMore } };
}
