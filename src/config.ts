import { readFileSync, existsSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";

export interface YelpConfig {
  claude: {
    binary: string;
    dir: string;
    projectsDir: string;
  };
  tags: {
    file: string;
  };
  ui: {
    leftPaneWidth: number;
    doublePressMs: number;
    pageSize: number;
    previewLength: number;
  };
  search: {
    includeMessages: boolean;
  };
  log: {
    level: string;
    file: string;
    pretty: boolean;
  };
}

const CONFIG_DIR = join(homedir(), ".config", "claude-yelp");
const CONFIG_PATH = join(CONFIG_DIR, "config.yaml");
const TAGS_FILE_NAME = "claude-yelp-tags.json";

export function defaults(claudeDir = join(homedir(), ".claude")): YelpConfig {
  return {
    claude: {
      binary: "claude",
      dir: claudeDir,
      projectsDir: join(claudeDir, "projects"),
    },
    tags: {
      file: join(claudeDir, TAGS_FILE_NAME),
    },
    ui: {
      leftPaneWidth: 30,
      doublePressMs: 500,
      pageSize: 10,
      previewLength: 100,
    },
    search: {
      includeMessages: false,
    },
    log: {
      level: "info",
      file: join(tmpdir(), "claude-yelp-debug.log"),
      pretty: true,
    },
  };
}

/**
 * Load the YAML config, falling back to defaults when the file is absent.
 * Unknown keys and values of the wrong type are ignored.
 */
export function loadConfig(path = CONFIG_PATH): YelpConfig {
  if (!existsSync(path)) {
    return defaults();
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new Error(`Failed to parse config at ${path}: ${String(err)}`);
  }

  return mergeConfig(parsed);
}

function section(value: unknown, key: string): Record<string, unknown> | undefined {
  if (!isRecord(value)) return undefined;
  const inner = value[key];
  return isRecord(inner) ? inner : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function mergeConfig(overrides: unknown): YelpConfig {
  const claude = section(overrides, "claude");

  // Paths under the Claude dir follow it unless set explicitly.
  const result =
    typeof claude?.dir === "string" ? defaults(claude.dir) : defaults();

  if (claude) {
    if (typeof claude.binary === "string") result.claude.binary = claude.binary;
    if (typeof claude.projectsDir === "string")
      result.claude.projectsDir = claude.projectsDir;
  }

  const tags = section(overrides, "tags");
  if (tags && typeof tags.file === "string") {
    result.tags.file = tags.file;
  }

  const ui = section(overrides, "ui");
  if (ui) {
    if (typeof ui.leftPaneWidth === "number")
      result.ui.leftPaneWidth = clamp(ui.leftPaneWidth, 15, 70);
    if (typeof ui.doublePressMs === "number" && ui.doublePressMs > 0)
      result.ui.doublePressMs = ui.doublePressMs;
    if (typeof ui.pageSize === "number" && ui.pageSize > 0)
      result.ui.pageSize = Math.floor(ui.pageSize);
    if (typeof ui.previewLength === "number" && ui.previewLength > 0)
      result.ui.previewLength = Math.floor(ui.previewLength);
  }

  const search = section(overrides, "search");
  if (search && typeof search.includeMessages === "boolean") {
    result.search.includeMessages = search.includeMessages;
  }

  const log = section(overrides, "log");
  if (log) {
    if (typeof log.level === "string") result.log.level = log.level;
    if (typeof log.file === "string") result.log.file = log.file;
    if (typeof log.pretty === "boolean") result.log.pretty = log.pretty;
  }

  return result;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export { CONFIG_DIR, CONFIG_PATH };
