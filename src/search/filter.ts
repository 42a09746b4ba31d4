import type { Logger } from "pino";
import type { SessionRecord } from "../sessions/record.js";

export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase();
}

/** Case-insensitive substring test. `needle` must already be normalized. */
export function contains(haystack: string | null | undefined, needle: string): boolean {
  return !!haystack && haystack.toLowerCase().includes(needle);
}

export interface FilterOptions {
  /** Also search the project path and every parsed message. Loads transcripts. */
  includeMessages?: boolean;
  log?: Logger;
}

export function matchesSession(
  record: SessionRecord,
  needle: string,
  options: FilterOptions = {},
): boolean {
  if (
    contains(record.id, needle) ||
    contains(record.tag, needle) ||
    contains(record.projectName, needle) ||
    contains(record.preview, needle)
  ) {
    return true;
  }
  if (!options.includeMessages) return false;

  return (
    contains(record.projectPath, needle) ||
    record.messages(options.log).some((m) => contains(m.text, needle))
  );
}

/**
 * Records matching `query`, in their original order. A blank query returns
 * the input itself. Never mutates its input.
 */
export function filterSessions(
  query: string,
  records: readonly SessionRecord[],
  options: FilterOptions = {},
): readonly SessionRecord[] {
  const needle = normalizeQuery(query);
  if (needle === "") return records;
  return records.filter((r) => matchesSession(r, needle, options));
}
