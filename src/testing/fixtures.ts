import { mkdirSync, utimesSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { ClipboardSink } from "../clipboard/types.js";
import type { ProcessLauncher } from "../launcher/types.js";
import { SessionRecord } from "../sessions/record.js";
import type { SessionRecordInit } from "../sessions/types.js";

export function userLine(text: string, timestamp?: string): string {
  return JSON.stringify({ type: "user", message: { role: "user", content: text }, timestamp });
}

export function assistantLine(text: string, timestamp?: string): string {
  return JSON.stringify({
    type: "assistant",
    message: {
      role: "assistant",
      content: [
        { type: "text", text },
        { type: "tool_use", id: "tool-1", name: "Read", input: { path: "a.ts" } },
      ],
    },
    timestamp,
  });
}

/** Write `<root>/<projectDir>/<id>.jsonl`; returns its path. */
export function writeTranscript(
  root: string,
  projectDir: string,
  id: string,
  lines: readonly string[],
  mtime?: Date,
): string {
  const dir = join(root, projectDir);
  mkdirSync(dir, { recursive: true });
  const filePath = join(dir, `${id}.jsonl`);
  writeFileSync(filePath, lines.join("\n") + "\n", "utf-8");
  if (mtime) utimesSync(filePath, mtime, mtime);
  return filePath;
}

export function makeRecord(init: Partial<SessionRecordInit> & { id: string }): SessionRecord {
  return new SessionRecord({
    projectPath: "/work/app",
    projectDir: "-work-app",
    filePath: `/nonexistent/${init.id}.jsonl`,
    timestamp: null,
    preview: "",
    mtimeMs: 0,
    ...init,
  });
}

export class FakeLauncher implements ProcessLauncher {
  created: Array<{ prompt: string; cwd: string }> = [];
  resumed: Array<{ sessionId: string; cwd: string }> = [];
  nextId = "new-session-0001";
  exitCode = 0;
  failWith: Error | null = null;

  async createSession(prompt: string, cwd: string): Promise<string> {
    this.created.push({ prompt, cwd });
    if (this.failWith) throw this.failWith;
    return this.nextId;
  }

  async resume(sessionId: string, cwd: string): Promise<number> {
    this.resumed.push({ sessionId, cwd });
    return this.exitCode;
  }
}

export class FakeClipboard implements ClipboardSink {
  copied: string[] = [];
  selection: string | null = null;

  async copy(text: string): Promise<void> {
    this.copied.push(text);
  }

  async readSelection(): Promise<string | null> {
    return this.selection;
  }
}
