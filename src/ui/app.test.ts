import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { silentLogger } from "../logger.js";
import { ModalController, type ViewModel } from "../modal/controller.js";
import { SessionIndex } from "../sessions/session-index.js";
import { TagStore } from "../tags/tag-store.js";
import { FakeClipboard, FakeLauncher, userLine, writeTranscript } from "../testing/fixtures.js";
import { runApp, type Screen } from "./app.js";
import type { KeyPress } from "./keymap.js";

class RecordingScreen implements Screen {
  started = 0;
  stopped = 0;
  frames: ViewModel[] = [];
  keyListeners = new Set<(press: KeyPress) => void>();
  resizeListeners = new Set<() => void>();

  start(): void {
    this.started++;
  }

  stop(): void {
    this.stopped++;
  }

  render(vm: ViewModel): void {
    this.frames.push(vm);
  }

  onKey(listener: (press: KeyPress) => void): () => void {
    this.keyListeners.add(listener);
    return () => this.keyListeners.delete(listener);
  }

  onResize(listener: () => void): () => void {
    this.resizeListeners.add(listener);
    return () => this.resizeListeners.delete(listener);
  }

  press(press: KeyPress): void {
    for (const listener of this.keyListeners) listener(press);
  }

  resize(): void {
    for (const listener of this.resizeListeners) listener();
  }
}

describe("runApp", () => {
  let dir: string;
  let index: SessionIndex;
  let controller: ModalController;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "claude-yelp-app-test-"));
    const root = join(dir, "projects");
    writeTranscript(root, "-yelp-absent-app", "s1", [userLine("older", "2025-01-01T00:00:00.000Z")]);
    writeTranscript(root, "-yelp-absent-app", "s2", [userLine("newer", "2025-02-01T00:00:00.000Z")]);

    const log = silentLogger();
    index = await SessionIndex.open({
      root,
      tagStore: new TagStore(join(dir, "tags.json"), log),
      launcher: new FakeLauncher(),
      log,
      previewLength: 100,
      exists: () => false,
      homeDir: "/home/tester",
    });
    controller = new ModalController({
      index,
      clipboard: new FakeClipboard(),
      log,
      exportDir: dir,
      leftPaneWidth: 30,
      doublePressMs: 500,
      pageSize: 10,
      includeMessages: false,
    });
  });

  afterEach(async () => {
    controller.close();
    await index.close();
    await rm(dir, { recursive: true, force: true });
  });

  it("feeds keypresses to the controller until a session is picked", async () => {
    const screen = new RecordingScreen();

    const result = runApp({ controller, index, view: screen, log: silentLogger() });
    screen.press({ str: undefined, key: { name: "down" } });
    screen.press({ str: "s", key: { name: "s" } });

    expect(await result).toEqual({ action: "resume", sessionId: "s1", projectDir: "/home/tester" });
    expect(screen.started).toBe(1);
    expect(screen.stopped).toBe(1);
    expect(screen.frames.map((vm) => vm.selected)).toEqual([0, 1]);
    expect(screen.keyListeners.size).toBe(0);
    expect(screen.resizeListeners.size).toBe(0);
  });

  it("resolves with null on quit and redraws on resize", async () => {
    const screen = new RecordingScreen();

    const result = runApp({ controller, index, view: screen, log: silentLogger() });
    screen.resize();
    screen.press({ str: "q", key: { name: "q" } });

    expect(await result).toBeNull();
    expect(screen.frames).toHaveLength(2);
  });
});
