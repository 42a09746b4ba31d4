import { basename } from "node:path";
import type { Logger } from "pino";
import { readTranscriptMessages } from "./transcript.js";
import type {
  MessageCache,
  RawTimestamp,
  SessionRecordInit,
  ThreadMessage,
} from "./types.js";

/**
 * Normalize a CLI timestamp to a Date. Numbers are epoch milliseconds;
 * strings are ISO-8601. Anything unusable becomes null.
 */
export function normalizeTimestamp(raw: RawTimestamp | null | undefined): Date | null {
  if (raw === null || raw === undefined) return null;
  let date: Date;
  if (typeof raw === "number") {
    if (!Number.isFinite(raw) || raw <= 0) return null;
    date = new Date(raw);
  } else {
    const trimmed = raw.trim();
    if (trimmed.length === 0) return null;
    // Numeric strings are epoch milliseconds too.
    date = /^\d+$/.test(trimmed) ? new Date(Number(trimmed)) : new Date(trimmed);
  }
  return Number.isNaN(date.getTime()) ? null : date;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatDate(date: Date | null): string {
  if (!date) return "unknown";
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

export class SessionRecord {
  readonly id: string;
  readonly projectPath: string;
  readonly projectDir: string;
  readonly filePath: string;
  readonly timestamp: Date | null;
  readonly preview: string;
  readonly mtimeMs: number;
  readonly ambiguousPath: boolean;
  readonly readError: string | null;
  tag: string | null = null;

  private cache: MessageCache = { state: "unparsed" };
  private generation = 0;

  constructor(init: SessionRecordInit) {
    this.id = init.id;
    this.projectPath = init.projectPath;
    this.projectDir = init.projectDir;
    this.filePath = init.filePath;
    this.timestamp = normalizeTimestamp(init.timestamp);
    this.preview = init.preview;
    this.mtimeMs = init.mtimeMs;
    this.ambiguousPath = init.ambiguousPath ?? false;
    this.readError = init.readError ?? null;
  }

  get shortId(): string {
    return this.id.slice(0, 8);
  }

  get projectName(): string {
    return this.projectPath ? basename(this.projectPath) || this.projectPath : "unknown";
  }

  get displayName(): string {
    return this.tag ? `[${this.shortId}] ${this.tag}` : `[${this.shortId}]`;
  }

  get dateLabel(): string {
    return formatDate(this.timestamp);
  }

  get isParsed(): boolean {
    return this.cache.state === "parsed";
  }

  /** Bumped on every invalidation; lets callers cache derived text. */
  get version(): number {
    return this.generation;
  }

  /** Parsed messages, read from disk on first use and cached afterwards. */
  messages(log?: Logger): readonly ThreadMessage[] {
    if (this.cache.state === "parsed") return this.cache.messages;
    const messages = readTranscriptMessages(this.filePath, log);
    this.cache = { state: "parsed", messages };
    return messages;
  }

  /** Drop cached messages so the next access re-reads the file. */
  invalidate(): void {
    this.cache = { state: "unparsed" };
    this.generation++;
  }
}

/**
 * Collection order: newest first, ties by id. Records without a
 * timestamp go last.
 */
export function compareRecords(a: SessionRecord, b: SessionRecord): number {
  const ta = a.timestamp?.getTime();
  const tb = b.timestamp?.getTime();
  if (ta !== tb) {
    if (ta === undefined) return 1;
    if (tb === undefined) return -1;
    return tb - ta;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
