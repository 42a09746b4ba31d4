import { existsSync, statSync } from "node:fs";
import { readdir } from "node:fs/promises";
import { join, basename } from "node:path";
import type { Logger } from "pino";
import { CollisionError, describeError } from "../errors.js";
import { decodeProjectPath } from "./path-codec.js";
import { SessionRecord, compareRecords } from "./record.js";
import { readTranscriptHead } from "./transcript.js";
import type { DiscoveryWarning, SessionRecordInit } from "./types.js";

export const TRANSCRIPT_EXT = ".jsonl";
export const AGENT_PREFIX = "agent-";

export interface DiscoveryOptions {
  previewLength: number;
  log: Logger;
  signal?: AbortSignal;
  exists?: (path: string) => boolean;
}

export interface DiscoveryResult {
  records: SessionRecord[];
  warnings: DiscoveryWarning[];
}

/**
 * Scan `<root>/<encoded-project>/<id>.jsonl`. A transcript that cannot be
 * read is still listed, flagged with `readError`. Duplicate ids keep the
 * most recently modified file.
 */
export async function discoverSessions(
  root: string,
  options: DiscoveryOptions,
): Promise<DiscoveryResult> {
  const log = options.log.child({ module: "discovery" });
  const exists = options.exists ?? existsSync;
  const warnings: DiscoveryWarning[] = [];
  const byId = new Map<string, SessionRecordInit>();

  const projectDirs = await listProjectDirs(root, warnings);

  for (const projectDir of projectDirs) {
    options.signal?.throwIfAborted();

    const dirName = basename(projectDir);
    const decoded = decodeProjectPath(dirName, exists);
    if (decoded.ambiguous) {
      log.debug({ dirName, projectPath: decoded.path }, "Ambiguous project path");
    }

    for (const filePath of await listTranscripts(projectDir)) {
      const id = basename(filePath, TRANSCRIPT_EXT);
      if (id.startsWith(AGENT_PREFIX)) continue;

      const init = readRecord(filePath, id, dirName, options.previewLength);
      init.projectPath = decoded.path;
      init.ambiguousPath = decoded.ambiguous;
      if (init.readError) {
        log.warn({ filePath, error: init.readError }, "Failed to read session file");
        warnings.push({ kind: "read", message: init.readError, path: filePath });
      }

      const existing = byId.get(id);
      if (existing) {
        const keep = preferred(existing, init);
        const drop = keep === existing ? init : existing;
        const collision = new CollisionError(id, keep.filePath, drop.filePath);
        log.warn({ err: collision }, "Duplicate session id");
        warnings.push({ kind: "collision", message: collision.message, path: drop.filePath });
        byId.set(id, keep);
      } else {
        byId.set(id, init);
      }
    }
  }

  const records = Array.from(byId.values(), (init) => new SessionRecord(init));
  records.sort(compareRecords);
  log.debug({ sessionCount: records.length, root }, "Discovery pass complete");
  return { records, warnings };
}

/** Newer modification time wins; on a tie the smaller path does. */
function preferred(a: SessionRecordInit, b: SessionRecordInit): SessionRecordInit {
  if (a.mtimeMs !== b.mtimeMs) return a.mtimeMs > b.mtimeMs ? a : b;
  return a.filePath <= b.filePath ? a : b;
}

function readRecord(
  filePath: string,
  id: string,
  projectDir: string,
  previewLength: number,
): SessionRecordInit {
  const init: SessionRecordInit = {
    id,
    projectPath: "",
    projectDir,
    filePath,
    timestamp: null,
    preview: "",
    mtimeMs: 0,
  };

  try {
    init.mtimeMs = statSync(filePath).mtimeMs;
    const head = readTranscriptHead(filePath, previewLength);
    init.preview = head.preview;
    init.timestamp = head.timestamp;
  } catch (err) {
    init.readError = describeError(err);
  }
  return init;
}

async function listProjectDirs(
  root: string,
  warnings: DiscoveryWarning[],
): Promise<string[]> {
  try {
    const entries = await readdir(root, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory())
      .map((e) => join(root, e.name))
      .sort();
  } catch (err) {
    warnings.push({ kind: "root", message: describeError(err), path: root });
    return [];
  }
}

async function listTranscripts(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && e.name.endsWith(TRANSCRIPT_EXT))
      .map((e) => join(dir, e.name))
      .sort();
  } catch {
    return [];
  }
}
