import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { assistantLine, makeRecord, userLine } from "../testing/fixtures.js";
import { filterSessions, matchesSession, normalizeQuery } from "./filter.js";

function records() {
  const tagged = makeRecord({ id: "aaa11111", projectPath: "/work/web", preview: "fix login" });
  tagged.tag = "Release";
  return [
    tagged,
    makeRecord({ id: "bbb22222", projectPath: "/work/api", preview: "add endpoint" }),
    makeRecord({ id: "ccc33333", projectPath: "/home/me/notes", preview: "Release notes draft" }),
    makeRecord({ id: "ddd44444", projectPath: "", preview: "" }),
  ];
}

describe("filterSessions", () => {
  it("returns the input unchanged for a blank query", () => {
    const all = records();
    expect(filterSessions("", all)).toBe(all);
    expect(filterSessions("   ", all)).toBe(all);
  });

  it("matches tag and preview case-insensitively, keeping order", () => {
    expect(filterSessions("release", records()).map((r) => r.id)).toEqual([
      "aaa11111",
      "ccc33333",
    ]);
  });

  it("matches ids and project names", () => {
    expect(filterSessions("BBB2", records()).map((r) => r.id)).toEqual(["bbb22222"]);
    expect(filterSessions("notes", records()).map((r) => r.id)).toEqual(["ccc33333"]);
    expect(filterSessions("unknown", records()).map((r) => r.id)).toEqual(["ddd44444"]);
  });

  it("does not look at the full project path by default", () => {
    expect(filterSessions("work", records())).toEqual([]);
  });

  it("never mutates its input", () => {
    const all = records();
    const ids = all.map((r) => r.id);
    filterSessions("api", all);
    expect(all.map((r) => r.id)).toEqual(ids);
  });
});

describe("matchesSession with messages", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "claude-yelp-filter-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("searches message text and project paths when asked", async () => {
    const filePath = join(dir, "s1.jsonl");
    await writeFile(filePath, [userLine("hello"), assistantLine("Refactor the parser")].join("\n"));
    const record = makeRecord({ id: "s1", filePath, projectPath: "/work/web" });

    expect(matchesSession(record, normalizeQuery("PARSER"))).toBe(false);
    expect(matchesSession(record, "parser", { includeMessages: true })).toBe(true);
    expect(matchesSession(record, "/work", { includeMessages: true })).toBe(true);
  });
});
