import { watch, type FSWatcher } from "chokidar";
import { existsSync, readdirSync, rmdirSync, statSync, unlinkSync } from "node:fs";
import { homedir } from "node:os";
import { basename, dirname, join } from "node:path";
import type { Logger } from "pino";
import { IOFailureError, NotFoundError, describeError } from "../errors.js";
import type { ProcessLauncher } from "../launcher/types.js";
import type { TagStore } from "../tags/tag-store.js";
import { discoverSessions, TRANSCRIPT_EXT } from "./discovery.js";
import { MutationLock } from "./mutation-lock.js";
import type { SessionRecord } from "./record.js";
import type { TemporarySessions } from "./temporary.js";
import type { DiscoveryWarning } from "./types.js";

const WATCH_DEBOUNCE_MS = 250;

export interface SessionIndexOptions {
  root: string;
  tagStore: TagStore;
  launcher: ProcessLauncher;
  log: Logger;
  previewLength: number;
  temporary?: TemporarySessions;
  exists?: (path: string) => boolean;
  homeDir?: string;
}

export interface CreateOptions {
  temporary: boolean;
  cwd: string;
}

type ChangeListener = (records: readonly SessionRecord[]) => void;

interface Pass {
  controller: AbortController;
  promise: Promise<readonly SessionRecord[]>;
}

/**
 * Authoritative session collection. Owns the tag store and is the only
 * component that deletes or creates transcripts.
 */
export class SessionIndex {
  private records: SessionRecord[] = [];
  private byId = new Map<string, SessionRecord>();
  private inFlight: Pass | null = null;
  private deletedDuringPass = new Set<string>();
  private listeners = new Set<ChangeListener>();
  private lock = new MutationLock();
  private watcher: FSWatcher | null = null;
  private watchTimer: ReturnType<typeof setTimeout> | null = null;
  private warnings: DiscoveryWarning[] = [];
  private log: Logger;
  private options: SessionIndexOptions;

  constructor(options: SessionIndexOptions) {
    this.options = options;
    this.log = options.log.child({ module: "index" });
  }

  /** Load tags and run the first discovery pass. */
  static async open(options: SessionIndexOptions): Promise<SessionIndex> {
    options.tagStore.load();
    const index = new SessionIndex(options);
    await index.refresh();
    index.log.info({ sessionCount: index.records.length }, "Session index ready");
    return index;
  }

  get root(): string {
    return this.options.root;
  }

  getSessions(): readonly SessionRecord[] {
    return this.records;
  }

  getSession(id: string): SessionRecord | undefined {
    return this.byId.get(id);
  }

  lastWarnings(): readonly DiscoveryWarning[] {
    return this.warnings;
  }

  get refreshing(): boolean {
    return this.inFlight !== null;
  }

  onChange(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Run a discovery pass. A call while a pass is in flight joins it. The
   * collection is swapped only when the pass completes.
   */
  refresh(): Promise<readonly SessionRecord[]> {
    if (this.inFlight) return this.inFlight.promise;

    const controller = new AbortController();
    const promise = this.runPass(controller.signal).finally(() => {
      if (this.inFlight?.controller === controller) this.inFlight = null;
    });
    this.inFlight = { controller, promise };
    return promise;
  }

  /** Abort the in-flight pass, if any. The current collection is kept. */
  cancelRefresh(): boolean {
    if (!this.inFlight) return false;
    this.inFlight.controller.abort();
    this.inFlight = null;
    this.log.debug("Discovery pass cancelled");
    return true;
  }

  private async runPass(signal: AbortSignal): Promise<readonly SessionRecord[]> {
    this.deletedDuringPass.clear();
    const result = await discoverSessions(this.options.root, {
      previewLength: this.options.previewLength,
      log: this.options.log,
      signal,
      exists: this.options.exists,
    });
    signal.throwIfAborted();

    this.swap(result.records.filter((r) => !this.deletedDuringPass.has(r.id)));
    this.warnings = result.warnings;
    return this.records;
  }

  /**
   * Install a new collection. Records whose file is unchanged keep their
   * previous instance, and with it any parsed messages.
   */
  private swap(fresh: SessionRecord[]): void {
    const next = fresh.map((record) => {
      const prev = this.byId.get(record.id);
      if (prev && prev.filePath === record.filePath && prev.mtimeMs === record.mtimeMs) {
        return prev;
      }
      return record;
    });

    for (const record of next) {
      record.tag = this.options.tagStore.get(record.id) ?? null;
    }

    this.records = next;
    this.byId = new Map(next.map((r) => [r.id, r]));
    this.notify();
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener(this.records);
    }
  }

  private require(id: string): SessionRecord {
    const record = this.byId.get(id);
    if (!record) throw new NotFoundError(id);
    return record;
  }

  /** Set or, with an empty value, clear a session's tag. */
  tag(id: string, value: string | null): void {
    const record = this.require(id);
    const tag = value?.trim() ?? "";

    if (tag === "") {
      this.options.tagStore.remove(id);
      record.tag = null;
    } else {
      this.options.tagStore.set(id, tag);
      record.tag = tag;
    }
    this.log.info({ sessionId: id, tag: record.tag }, "Session tagged");
    this.notify();
  }

  findByTag(tag: string): string | undefined {
    return this.options.tagStore.findByTag(tag);
  }

  /**
   * Remove a transcript and its tag. The in-memory record is dropped only
   * after the file is gone.
   */
  delete(id: string): void {
    const record = this.require(id);

    try {
      unlinkSync(record.filePath);
    } catch (err) {
      this.log.error({ err, sessionId: id }, "Failed to delete session file");
      throw new IOFailureError(
        `Failed to delete session ${record.shortId}: ${describeError(err)}`,
        { cause: err },
      );
    }

    this.records = this.records.filter((r) => r.id !== id);
    this.byId.delete(id);
    this.deletedDuringPass.add(id);
    this.log.info({ sessionId: id }, "Session deleted");

    try {
      this.options.tagStore.remove(id);
    } finally {
      this.notify();
    }
  }

  /**
   * Create a session through the launcher and tag it. Temporary sessions
   * are registered for removal at exit.
   */
  create(tag: string, options: CreateOptions): Promise<string> {
    return this.lock.run(async () => {
      const sessionId = await this.options.launcher.createSession(
        `Session: ${tag}`,
        options.cwd,
      );
      this.options.tagStore.set(sessionId, tag);
      if (options.temporary) {
        this.options.temporary?.register(sessionId);
      }
      this.log.info({ sessionId, tag, temporary: options.temporary }, "Session created");
      return sessionId;
    });
  }

  /**
   * Remove every transcript named `<id>.jsonl` under the root, an empty
   * `<id>/` directory beside it, and the tag. Works for sessions the index
   * has not discovered yet.
   */
  purgeSession(id: string): boolean {
    let removed = false;
    try {
      for (const filePath of this.findTranscripts(id)) {
        try {
          unlinkSync(filePath);
        } catch (err) {
          this.log.error({ err, sessionId: id, filePath }, "Failed to purge session file");
          throw new IOFailureError(
            `Failed to remove session ${id.slice(0, 8)}: ${describeError(err)}`,
            { cause: err },
          );
        }
        removed = true;
        const sidecar = join(dirname(filePath), id);
        try {
          rmdirSync(sidecar);
        } catch {
          // absent or not empty
        }
      }
    } finally {
      if (this.byId.delete(id)) {
        this.records = this.records.filter((r) => r.id !== id);
        this.notify();
      }
      this.options.tagStore.remove(id);
    }
    return removed;
  }

  private findTranscripts(id: string): string[] {
    const name = id + TRANSCRIPT_EXT;
    const found: string[] = [];
    let dirs: string[];
    try {
      dirs = readdirSync(this.options.root, { withFileTypes: true })
        .filter((e) => e.isDirectory())
        .map((e) => join(this.options.root, e.name));
    } catch {
      return found;
    }
    for (const dir of dirs) {
      const candidate = join(dir, name);
      if (existsSync(candidate)) found.push(candidate);
    }
    return found;
  }

  /**
   * Directory to resume a session in: the project path, else its parent,
   * else the home directory.
   */
  resolveLaunchDir(record: SessionRecord): string {
    if (record.projectPath) {
      for (const candidate of [record.projectPath, dirname(record.projectPath)]) {
        if (isDirectory(candidate)) return candidate;
      }
    }
    return this.options.homeDir ?? homedir();
  }

  /** Rediscover when transcripts appear or vanish; invalidate on change. */
  watch(): void {
    if (this.watcher) return;

    this.watcher = watch(this.options.root, {
      ignoreInitial: true,
      depth: 1,
      persistent: true,
      awaitWriteFinish: { stabilityThreshold: 500, pollInterval: 100 },
    });

    this.watcher.on("add", (path) => this.onFileListChange(path));
    this.watcher.on("unlink", (path) => this.onFileListChange(path));
    this.watcher.on("change", (path) => this.onFileChange(path));
    this.watcher.on("error", (err) => this.log.warn({ err }, "Watcher error"));
  }

  private onFileListChange(path: string): void {
    if (!path.endsWith(TRANSCRIPT_EXT)) return;
    if (this.watchTimer) clearTimeout(this.watchTimer);
    this.watchTimer = setTimeout(() => {
      this.watchTimer = null;
      this.refresh().catch((err: unknown) => {
        if (err instanceof Error && err.name === "AbortError") return;
        this.log.error({ err }, "Rescan failed");
      });
    }, WATCH_DEBOUNCE_MS);
  }

  private onFileChange(path: string): void {
    if (!path.endsWith(TRANSCRIPT_EXT)) return;
    const record = this.byId.get(basename(path, TRANSCRIPT_EXT));
    if (record && record.filePath === path) {
      record.invalidate();
      this.log.debug({ sessionId: record.id }, "Transcript changed");
      this.notify();
    }
  }

  async close(): Promise<void> {
    if (this.watchTimer) clearTimeout(this.watchTimer);
    this.watchTimer = null;
    this.cancelRefresh();
    await this.watcher?.close();
    this.watcher = null;
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}
