/**
 * Match positions of a query inside one rendered thread, plus a cursor
 * that walks them circularly. Values here are immutable; every move
 * returns a new cursor.
 */

export interface MatchCursor {
  readonly query: string;
  readonly offsets: readonly number[];
  /** Index into `offsets`; -1 when there are no matches. */
  readonly index: number;
}

export interface CursorStep {
  cursor: MatchCursor;
  offset: number;
  wrapped: boolean;
}

export const EMPTY_CURSOR: MatchCursor = { query: "", offsets: [], index: -1 };

/**
 * Start offsets of every occurrence of `query` in `text`, ignoring case.
 * Occurrences may overlap.
 */
export function findMatches(text: string, query: string): number[] {
  if (query.length === 0) return [];

  const needle = query.toLowerCase();
  const lowered = text.toLowerCase();
  const offsets: number[] = [];

  if (lowered.length === text.length) {
    let pos = lowered.indexOf(needle);
    while (pos !== -1) {
      offsets.push(pos);
      pos = lowered.indexOf(needle, pos + 1);
    }
    return offsets;
  }

  // Lowercasing changed the length, so offsets must be taken from `text`.
  for (let i = 0; i + query.length <= text.length; i++) {
    if (text.slice(i, i + query.length).toLowerCase() === needle) offsets.push(i);
  }
  return offsets;
}

/** Cursor over `text`, positioned on the first match. */
export function createCursor(text: string, query: string): MatchCursor {
  const offsets = findMatches(text, query);
  return { query, offsets, index: offsets.length > 0 ? 0 : -1 };
}

export function currentOffset(cursor: MatchCursor): number | null {
  return cursor.index >= 0 ? cursor.offsets[cursor.index] : null;
}

/** Advance; past the last match wraps to the first. Null when there are none. */
export function nextMatch(cursor: MatchCursor): CursorStep | null {
  const count = cursor.offsets.length;
  if (count === 0) return null;
  const wrapped = cursor.index >= count - 1;
  const index = wrapped ? 0 : cursor.index + 1;
  return step(cursor, index, wrapped);
}

/** Step back; before the first match wraps to the last. Null when there are none. */
export function previousMatch(cursor: MatchCursor): CursorStep | null {
  const count = cursor.offsets.length;
  if (count === 0) return null;
  const wrapped = cursor.index <= 0;
  const index = wrapped ? count - 1 : cursor.index - 1;
  return step(cursor, index, wrapped);
}

function step(cursor: MatchCursor, index: number, wrapped: boolean): CursorStep {
  return {
    cursor: { ...cursor, index },
    offset: cursor.offsets[index],
    wrapped,
  };
}
