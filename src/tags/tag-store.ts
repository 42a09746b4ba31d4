/**
 * TagStore - session id -> tag mapping persisted as a single JSON object.
 *
 * Every mutation is flushed synchronously (temp file + rename) before the
 * call returns. There is no coordination with other processes writing the
 * same file.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { IOFailureError, describeError } from "../errors.js";

export type TagMap = ReadonlyMap<string, string>;

/** Canonical file form: two-space indented JSON, keys in insertion order. */
export function serializeTags(tags: TagMap): string {
  return JSON.stringify(Object.fromEntries(tags), null, 2);
}

export function parseTags(raw: string): Map<string, string> {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("Tag file must contain a JSON object");
  }
  const tags = new Map<string, string>();
  for (const [id, tag] of Object.entries(parsed)) {
    if (typeof tag === "string") tags.set(id, tag);
  }
  return tags;
}

export class TagStore {
  private tags = new Map<string, string>();
  private log: Logger;
  readonly path: string;

  constructor(path: string, log: Logger) {
    this.path = path;
    this.log = log.child({ module: "tags" });
  }

  /** Load from disk. A missing or unreadable file leaves the store empty. */
  load(): this {
    this.tags = new Map();
    if (!existsSync(this.path)) return this;

    try {
      this.tags = parseTags(readFileSync(this.path, "utf-8"));
      this.log.debug({ count: this.tags.size }, "Loaded tags");
    } catch (err) {
      this.log.warn({ err, path: this.path }, "Failed to load tag file");
    }
    return this;
  }

  get(id: string): string | undefined {
    return this.tags.get(id);
  }

  entries(): TagMap {
    return this.tags;
  }

  /** Id of a session carrying exactly this tag. */
  findByTag(tag: string): string | undefined {
    for (const [id, value] of this.tags) {
      if (value === tag) return id;
    }
    return undefined;
  }

  set(id: string, tag: string): void {
    const previous = this.tags.get(id);
    this.tags.set(id, tag);
    try {
      this.save();
    } catch (err) {
      if (previous === undefined) this.tags.delete(id);
      else this.tags.set(id, previous);
      throw err;
    }
  }

  /** Remove an entry. Writes only when something was removed. */
  remove(id: string): boolean {
    const previous = this.tags.get(id);
    if (previous === undefined) return false;
    this.tags.delete(id);
    try {
      this.save();
    } catch (err) {
      this.tags.set(id, previous);
      throw err;
    }
    return true;
  }

  save(): void {
    const tmpPath = `${this.path}.tmp.${randomUUID().slice(0, 8)}`;
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(tmpPath, serializeTags(this.tags), "utf-8");
      renameSync(tmpPath, this.path);
    } catch (err) {
      this.log.error({ err, path: this.path }, "Failed to save tags");
      throw new IOFailureError(`Failed to save tags: ${describeError(err)}`, {
        cause: err,
      });
    }
  }
}
