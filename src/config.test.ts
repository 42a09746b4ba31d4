import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { defaults, loadConfig, mergeConfig } from "./config.js";

describe("mergeConfig", () => {
  it("returns defaults for anything that is not a mapping", () => {
    expect(mergeConfig(null)).toEqual(defaults());
    expect(mergeConfig("ui: 3")).toEqual(defaults());
  });

  it("derives tag and projects paths from the Claude dir", () => {
    const config = mergeConfig({ claude: { dir: "/data/claude" } });
    expect(config.claude.dir).toBe("/data/claude");
    expect(config.claude.projectsDir).toBe("/data/claude/projects");
    expect(config.tags.file).toBe("/data/claude/claude-yelp-tags.json");
  });

  it("keeps explicit paths over derived ones", () => {
    const config = mergeConfig({
      claude: { dir: "/data/claude", projectsDir: "/elsewhere" },
      tags: { file: "/tags.json" },
    });
    expect(config.claude.projectsDir).toBe("/elsewhere");
    expect(config.tags.file).toBe("/tags.json");
  });

  it("clamps the pane width", () => {
    expect(mergeConfig({ ui: { leftPaneWidth: 90 } }).ui.leftPaneWidth).toBe(70);
    expect(mergeConfig({ ui: { leftPaneWidth: 2 } }).ui.leftPaneWidth).toBe(15);
  });

  it("ignores values of the wrong type or out of range", () => {
    const config = mergeConfig({
      ui: { pageSize: "lots", doublePressMs: -5, previewLength: 40.7 },
      search: { includeMessages: "yes" },
      log: { level: 3, pretty: false },
    });
    expect(config.ui.pageSize).toBe(10);
    expect(config.ui.doublePressMs).toBe(500);
    expect(config.ui.previewLength).toBe(40);
    expect(config.search.includeMessages).toBe(false);
    expect(config.log.level).toBe("info");
    expect(config.log.pretty).toBe(false);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "claude-yelp-config-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("falls back to defaults when the file is missing", () => {
    expect(loadConfig(join(dir, "missing.yaml"))).toEqual(defaults());
  });

  it("reads YAML overrides", async () => {
    const path = join(dir, "config.yaml");
    await writeFile(path, "claude:\n  binary: /opt/claude\nsearch:\n  includeMessages: true\n");

    const config = loadConfig(path);
    expect(config.claude.binary).toBe("/opt/claude");
    expect(config.search.includeMessages).toBe(true);
  });

  it("reports malformed YAML", async () => {
    const path = join(dir, "config.yaml");
    await writeFile(path, "ui:\n  leftPaneWidth: [1, 2\n");
    expect(() => loadConfig(path)).toThrow(/^Failed to parse config at /);
  });
});
