import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { EventEmitter } from "node:events";
import { existsSync, mkdirSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { LaunchError, ValidationError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { SessionIndex } from "./sessions/session-index.js";
import { TemporarySessions } from "./sessions/temporary.js";
import { TagStore } from "./tags/tag-store.js";
import { FakeLauncher, userLine, writeTranscript } from "./testing/fixtures.js";
import {
  createTaggedSession,
  parseExistingTagReply,
  parseStartupArg,
  type StartupContext,
} from "./startup.js";

describe("parseStartupArg", () => {
  it("browses without an argument", () => {
    expect(parseStartupArg(undefined, false)).toEqual({ kind: "browse", openAt: null });
  });

  it("opens at a session number with or without a plus", () => {
    expect(parseStartupArg("+3", false)).toEqual({ kind: "browse", openAt: 3 });
    expect(parseStartupArg("12", false)).toEqual({ kind: "browse", openAt: 12 });
  });

  it("treats anything else as a tag", () => {
    expect(parseStartupArg("bugfix", true)).toEqual({
      kind: "create",
      tag: "bugfix",
      temporary: true,
    });
    expect(parseStartupArg("+x", false)).toEqual({ kind: "create", tag: "+x", temporary: false });
  });

  it("requires a tag for temporary sessions", () => {
    expect(() => parseStartupArg(undefined, true)).toThrow(ValidationError);
    expect(() => parseStartupArg(undefined, true)).toThrow("-t requires a tag name");
  });
});

describe("parseExistingTagReply", () => {
  it("defaults to connect", () => {
    expect(parseExistingTagReply("")).toBe("connect");
    expect(parseExistingTagReply("y")).toBe("connect");
    expect(parseExistingTagReply(" N ")).toBe("abort");
    expect(parseExistingTagReply("O")).toBe("overwrite");
  });
});

describe("createTaggedSession", () => {
  let dir: string;
  let root: string;
  let launcher: FakeLauncher;
  let index: SessionIndex;
  let tagStore: TagStore;
  let lines: string[];
  let replies: string[];
  let ctx: StartupContext;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "claude-yelp-startup-test-"));
    root = join(dir, "projects");
    writeTranscript(root, "-yelp-absent-app", "s1", [userLine("hello", "2025-01-01T00:00:00.000Z")]);

    const log = silentLogger();
    launcher = new FakeLauncher();
    const proc = Object.assign(new EventEmitter(), { exit: () => undefined });
    const temporary = new TemporarySessions((id) => index.purgeSession(id), log, proc);
    tagStore = new TagStore(join(dir, "tags.json"), log);
    index = await SessionIndex.open({
      root,
      tagStore,
      launcher,
      log,
      previewLength: 100,
      temporary,
      exists: () => false,
      homeDir: "/home/tester",
    });

    lines = [];
    replies = [];
    ctx = {
      index,
      launcher,
      temporary,
      log,
      cwd: dir,
      ask: async () => replies.shift() ?? "",
      print: (line) => lines.push(line),
    };
  });

  afterEach(async () => {
    await index.close();
    await rm(dir, { recursive: true, force: true });
  });

  it("creates, tags and resumes a new session", async () => {
    launcher.exitCode = 3;

    expect(await createTaggedSession(ctx, "demo", false)).toBe(3);
    expect(lines).toEqual(["Created session new-sess with tag: demo"]);
    expect(launcher.created).toEqual([{ prompt: "Session: demo", cwd: dir }]);
    expect(launcher.resumed).toEqual([{ sessionId: "new-session-0001", cwd: dir }]);
    expect(index.findByTag("demo")).toBe("new-session-0001");
  });

  it("aborts when the tag exists and the user declines", async () => {
    index.tag("s1", "demo");
    replies.push("n");

    expect(await createTaggedSession(ctx, "demo", false)).toBe(0);
    expect(lines).toEqual(["Tag 'demo' already exists (session s1)", "Aborted."]);
    expect(launcher.created).toEqual([]);
    expect(launcher.resumed).toEqual([]);
  });

  it("connects to the existing session by default", async () => {
    index.tag("s1", "demo");

    expect(await createTaggedSession(ctx, "demo", false)).toBe(0);
    expect(lines).toEqual([
      "Tag 'demo' already exists (session s1)",
      "Connecting to existing session...",
    ]);
    expect(launcher.resumed).toEqual([{ sessionId: "s1", cwd: "/home/tester" }]);
  });

  it("replaces the existing session on overwrite", async () => {
    index.tag("s1", "demo");
    replies.push("o");

    expect(await createTaggedSession(ctx, "demo", false)).toBe(0);
    expect(lines).toEqual([
      "Tag 'demo' already exists (session s1)",
      "Removing old session and creating new...",
      "Removed old session s1",
      "Created session new-sess with tag: demo",
    ]);
    expect(existsSync(join(root, "-yelp-absent-app", "s1.jsonl"))).toBe(false);
    expect(index.getSession("s1")).toBeUndefined();
    expect(index.findByTag("demo")).toBe("new-session-0001");
  });

  it("still resumes the new session when the old one cannot be removed", async () => {
    mkdirSync(join(root, "-yelp-absent-app", "old.jsonl"));
    tagStore.set("old", "demo");
    replies.push("o");

    expect(await createTaggedSession(ctx, "demo", false)).toBe(0);
    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe("Tag 'demo' already exists (session old)");
    expect(lines[1]).toBe("Removing old session and creating new...");
    expect(lines[2]).toContain("Warning: could not remove old session old: Failed to remove session old: EISDIR");
    expect(lines[3]).toBe("Created session new-sess with tag: demo");
    expect(launcher.resumed).toEqual([{ sessionId: "new-session-0001", cwd: dir }]);
    expect(tagStore.get("old")).toBeUndefined();
    expect(index.findByTag("demo")).toBe("new-session-0001");
  });

  it("removes a temporary session once the CLI exits", async () => {
    const filePath = writeTranscript(root, "-yelp-absent-app", "new-session-0001", [
      userLine("scratch work"),
    ]);

    expect(await createTaggedSession(ctx, "scratch", true)).toBe(0);
    expect(lines).toEqual([
      "Created TEMP session new-sess with tag: scratch",
      "Cleaned up temp session new-sess",
    ]);
    expect(existsSync(filePath)).toBe(false);
    expect(index.findByTag("scratch")).toBeUndefined();
    expect(ctx.temporary.foreground).toBe(false);
  });

  it("reports a failed create", async () => {
    launcher.failWith = new LaunchError("Error creating session: boom");

    expect(await createTaggedSession(ctx, "demo", false)).toBe(1);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("Error creating session: boom");
    expect(launcher.resumed).toEqual([]);
  });
});
