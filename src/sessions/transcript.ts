import { openSync, readSync, closeSync, readFileSync } from "node:fs";
import type { Logger } from "pino";
import { ParseError, describeError } from "../errors.js";
import type { JsonlMessageLine, RawTimestamp, ThreadMessage } from "./types.js";

const CHUNK_BYTES = 65536;

/**
 * Parse one transcript line. Returns null for blank lines; throws
 * ParseError for anything that is not a JSON object.
 */
export function parseLine(line: string): JsonlMessageLine | null {
  const trimmed = line.trim();
  if (trimmed.length === 0) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (err) {
    throw new ParseError("Malformed transcript line", { cause: err });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ParseError("Transcript line is not an object");
  }
  return parsed as JsonlMessageLine;
}

function rawTimestamp(entry: JsonlMessageLine): RawTimestamp | undefined {
  const ts = entry.timestamp;
  return typeof ts === "string" || typeof ts === "number" ? ts : undefined;
}

/**
 * Messages contributed by one line. Only text parts count: tool calls,
 * tool results and thinking blocks are dropped.
 */
export function messagesFromLine(entry: JsonlMessageLine): ThreadMessage[] {
  const content = entry.message?.content;
  if (content === undefined) return [];

  const ts = rawTimestamp(entry);
  const timestamp = ts === undefined ? undefined : String(ts);
  const texts: string[] = [];

  if (entry.type === "user") {
    if (typeof content === "string") {
      texts.push(content);
    } else if (Array.isArray(content)) {
      texts.push(...textParts(content));
    }
    return texts.map((text) => toMessage("user", text, timestamp));
  }

  if (entry.type === "assistant" && Array.isArray(content)) {
    texts.push(...textParts(content));
    return texts.map((text) => toMessage("assistant", text, timestamp));
  }

  return [];
}

function toMessage(
  role: "user" | "assistant",
  text: string,
  timestamp: string | undefined,
): ThreadMessage {
  return timestamp === undefined ? { role, text } : { role, text, timestamp };
}

function textParts(parts: Array<{ type?: string; text?: string }>): string[] {
  const out: string[] = [];
  for (const part of parts) {
    if (typeof part === "object" && part !== null && part.type === "text") {
      out.push(typeof part.text === "string" ? part.text : "");
    }
  }
  return out;
}

/**
 * Read every message of a transcript. Malformed lines are skipped; an
 * unreadable file yields a single error entry instead of throwing.
 */
export function readTranscriptMessages(
  filePath: string,
  log?: Logger,
): ThreadMessage[] {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (err) {
    log?.warn({ err, filePath }, "Failed to read transcript");
    return [{ role: "error", text: `Error loading messages: ${describeError(err)}` }];
  }

  const messages: ThreadMessage[] = [];
  const lines = raw.split("\n");
  for (let n = 0; n < lines.length; n++) {
    try {
      const entry = parseLine(lines[n]);
      if (entry) messages.push(...messagesFromLine(entry));
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      log?.debug({ filePath, line: n + 1 }, "Skipping malformed transcript line");
    }
  }
  return messages;
}

export interface TranscriptHead {
  preview: string;
  timestamp: RawTimestamp | null;
}

/**
 * Find the first user-authored text without reading the whole file.
 * The timestamp is that message's, or the first one seen before it.
 */
export function readTranscriptHead(
  filePath: string,
  previewLength: number,
): TranscriptHead {
  const seen: { head: TranscriptHead | null; firstTimestamp: RawTimestamp | null } = {
    head: null,
    firstTimestamp: null,
  };

  readLinesUntil(filePath, (line) => {
    let entry: JsonlMessageLine | null;
    try {
      entry = parseLine(line);
    } catch (err) {
      if (err instanceof ParseError) return false;
      throw err;
    }
    if (!entry) return false;

    const ts = rawTimestamp(entry) ?? null;
    if (seen.firstTimestamp === null) seen.firstTimestamp = ts;

    if (entry.type !== "user") return false;
    const first = messagesFromLine(entry).find((m) => m.role === "user");
    if (!first) return false;

    seen.head = {
      preview: first.text.slice(0, previewLength),
      timestamp: ts ?? seen.firstTimestamp,
    };
    return true;
  });

  return seen.head ?? { preview: "", timestamp: seen.firstTimestamp };
}

/**
 * Feed complete lines to `visit` until it returns true or the file ends.
 * Reads in fixed-size chunks so large transcripts are not loaded whole.
 */
export function readLinesUntil(
  filePath: string,
  visit: (line: string) => boolean,
): void {
  const fd = openSync(filePath, "r");
  try {
    const buf = Buffer.alloc(CHUNK_BYTES);
    let pending = Buffer.alloc(0);
    let position = 0;

    for (;;) {
      const bytesRead = readSync(fd, buf, 0, CHUNK_BYTES, position);
      if (bytesRead === 0) break;
      position += bytesRead;

      pending = Buffer.concat([pending, buf.subarray(0, bytesRead)]);
      let newline = pending.indexOf(0x0a);
      while (newline !== -1) {
        const line = pending.subarray(0, newline).toString("utf-8");
        pending = pending.subarray(newline + 1);
        if (visit(line)) return;
        newline = pending.indexOf(0x0a);
      }
    }

    if (pending.length > 0) {
      visit(pending.toString("utf-8"));
    }
  } finally {
    closeSync(fd);
  }
}
