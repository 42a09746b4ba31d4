import blessed, { type Widgets } from "blessed";
import type { ViewModel } from "../modal/controller.js";
import type { Mode, ScrollTarget } from "../modal/types.js";
import type { SessionRecord } from "../sessions/record.js";
import type { Screen } from "./app.js";
import { KEY_BINDINGS, type KeyPress } from "./keymap.js";

/** Escape braces so blessed does not read them as tags. */
export function escapeMarkup(text: string): string {
  return text.replace(/[{}]/g, (brace) => (brace === "{" ? "{open}" : "{close}"));
}

/** One list row: `   1 2025-01-02 10:00 | [abcd1234] tag | project`. */
export function listRow(record: SessionRecord, position: number): string {
  const flag = record.readError ? " !" : record.ambiguousPath ? " ?" : "";
  return (
    `${String(position + 1).padStart(4)} ${record.dateLabel} | ` +
    `${record.displayName} | ${record.projectName}${flag}`
  );
}

export function listItem(record: SessionRecord, position: number): string {
  const row = escapeMarkup(listRow(record, position));
  return record.readError ? `{red-fg}${row}{/red-fg}` : row;
}

/**
 * Thread text with every match highlighted and the current one emphasised.
 * Overlapping matches are shown from the first one only.
 */
export function highlightMatches(
  text: string,
  matches: readonly number[],
  length: number,
  current: number | null,
): string {
  if (length === 0 || matches.length === 0) return escapeMarkup(text);

  let out = "";
  let cursor = 0;
  for (const offset of matches) {
    if (offset < cursor) continue;
    const bg = offset === current ? "yellow-bg" : "white-bg";
    out += escapeMarkup(text.slice(cursor, offset));
    out += `{black-fg}{${bg}}${escapeMarkup(text.slice(offset, offset + length))}{/${bg}}{/black-fg}`;
    cursor = offset + length;
  }
  return out + escapeMarkup(text.slice(cursor));
}

export function threadMarkup(vm: ViewModel): string {
  const { text, matches, query, current } = vm.thread;
  return highlightMatches(text, matches, query.length, current);
}

/** ` [query: 2/5]` while a thread search is active, else "". */
export function searchIndicator(vm: ViewModel): string {
  const { query, matches, current } = vm.thread;
  if (!query) return "";
  const position = current === null ? 0 : matches.indexOf(current) + 1;
  return ` [${query}: ${position}/${matches.length}]`;
}

export function headerText(vm: ViewModel): string {
  const shown = vm.rows.length === vm.total
    ? `${vm.total} sessions`
    : `${vm.rows.length}/${vm.total} sessions`;
  const filter = vm.query ? ` · filter: ${vm.query}` : "";
  const userOnly = vm.userOnly ? " · user messages only" : "";
  return `claude-yelp ${shown}${filter}${userOnly}`;
}

function withError(error: string | null): string {
  return error ? `  {red-fg}${escapeMarkup(error)}{/red-fg}` : "";
}

/** Prompt, confirmation, notice or key hint for the bottom line. */
export function statusMarkup(vm: ViewModel): string {
  const mode: Mode = vm.mode;
  switch (mode.kind) {
    case "filter": {
      const count = mode.target === "list"
        ? ` (${mode.liveView?.length ?? vm.rows.length} results)`
        : mode.liveCursor
          ? ` (${mode.liveCursor.offsets.length} matches)`
          : "";
      return `{cyan-fg}/{/cyan-fg}${escapeMarkup(mode.buffer)}{gray-fg}${count}{/gray-fg}`;
    }
    case "command":
      return `{cyan-fg}:{/cyan-fg}${escapeMarkup(mode.buffer)}${withError(mode.error)}`;
    case "tag": {
      const label = mode.purpose === "tag" ? "Tag: " : "New session: ";
      return `{cyan-fg}${label}{/cyan-fg}${escapeMarkup(mode.buffer)}${withError(mode.error)}`;
    }
    case "normal":
      break;
  }

  const pending = mode.confirmDelete;
  if (pending !== null) {
    const record = vm.rows.find((r) => r.id === pending);
    const name = escapeMarkup(record ? record.displayName : pending.slice(0, 8));
    return `{red-fg}{bold}Delete session ${name}? {/bold}{/red-fg}{gray-fg}(y/N){/gray-fg}`;
  }

  if (vm.notice) {
    const color = vm.notice.level === "error"
      ? "red"
      : vm.notice.level === "warning"
        ? "yellow"
        : "green";
    return `{${color}-fg}${escapeMarkup(vm.notice.title)}: {/${color}-fg}${escapeMarkup(vm.notice.message)}`;
  }

  return `{gray-fg}Ctrl+K help · q quit${escapeMarkup(searchIndicator(vm))}{/gray-fg}`;
}

export function helpMarkup(): string {
  return KEY_BINDINGS.map(
    (b) => `{bold}${escapeMarkup(b.keys.padEnd(12))}{/bold} ${escapeMarkup(b.description)}`,
  ).join("\n");
}

function threadLabel(vm: ViewModel): string {
  const name = vm.thread.record ? vm.thread.record.displayName : "Thread";
  return vm.userOnly ? ` ${name} [user only] ` : ` ${name} `;
}

interface Panes {
  screen: Widgets.Screen;
  header: Widgets.BoxElement;
  list: Widgets.ListElement;
  thread: Widgets.BoxElement;
  status: Widgets.BoxElement;
  help: Widgets.BoxElement;
}

/** Full-screen blessed renderer. Widgets exist only between start and stop. */
export class TerminalView implements Screen {
  private panes: Panes | null = null;
  private keyListeners = new Set<(press: KeyPress) => void>();
  private resizeListeners = new Set<() => void>();
  private items = "";
  private threadContent = "";
  private threadRecordId: string | null = null;

  start(): void {
    if (this.panes) return;

    const screen = blessed.screen({
      smartCSR: true,
      fullUnicode: true,
      title: "claude-yelp",
    });

    const header = blessed.box({
      parent: screen,
      top: 0,
      left: 0,
      width: "100%",
      height: 1,
      tags: true,
      style: { fg: "white" },
    });

    const list = blessed.list({
      parent: screen,
      top: 1,
      left: 0,
      width: "30%",
      height: "100%-2",
      border: "line",
      label: " Sessions ",
      tags: true,
      keys: false,
      vi: false,
      mouse: false,
      style: {
        border: { fg: "green" },
        selected: { bg: "blue", fg: "white", bold: true },
        item: { fg: "white" },
      },
      scrollbar: { ch: " ", style: { bg: "blue" } },
      items: [],
    });

    const thread = blessed.box({
      parent: screen,
      top: 1,
      left: "30%",
      width: "70%",
      height: "100%-2",
      border: "line",
      label: " Thread ",
      tags: true,
      scrollable: true,
      alwaysScroll: true,
      scrollbar: { ch: " ", style: { bg: "blue" } },
      style: { border: { fg: "blue" }, fg: "white" },
    });

    const status = blessed.box({
      parent: screen,
      bottom: 0,
      left: 0,
      width: "100%",
      height: 1,
      tags: true,
    });

    const help = blessed.box({
      parent: screen,
      top: "center",
      left: "center",
      width: "60%",
      height: KEY_BINDINGS.length + 2,
      border: "line",
      label: " Help (Ctrl+K or Esc to close) ",
      hidden: true,
      tags: true,
      style: { border: { fg: "cyan" }, fg: "white", bg: "black" },
      content: helpMarkup(),
    });

    screen.on("keypress", (ch: unknown, key: Widgets.Events.IKeyEventArg) => {
      const press: KeyPress = { str: typeof ch === "string" ? ch : undefined, key };
      for (const listener of this.keyListeners) listener(press);
    });
    screen.on("resize", () => {
      for (const listener of this.resizeListeners) listener();
    });

    this.panes = { screen, header, list, thread, status, help };
  }

  stop(): void {
    if (!this.panes) return;
    this.panes.screen.destroy();
    this.panes = null;
    this.items = "";
    this.threadContent = "";
    this.threadRecordId = null;
  }

  onKey(listener: (press: KeyPress) => void): () => void {
    this.keyListeners.add(listener);
    return () => {
      this.keyListeners.delete(listener);
    };
  }

  onResize(listener: () => void): () => void {
    this.resizeListeners.add(listener);
    return () => {
      this.resizeListeners.delete(listener);
    };
  }

  render(vm: ViewModel, scrolls: readonly ScrollTarget[]): void {
    const panes = this.panes;
    if (!panes) return;
    const { screen, header, list, thread, status, help } = panes;

    header.setContent(`{bold}${escapeMarkup(headerText(vm))}{/bold}`);

    list.width = `${vm.leftPaneWidth}%`;
    thread.left = `${vm.leftPaneWidth}%`;
    thread.width = `${100 - vm.leftPaneWidth}%`;
    list.style.border.fg = vm.focus === "list" ? "green" : "blue";
    thread.style.border.fg = vm.focus === "thread" ? "green" : "blue";

    const items = vm.rows.map((record, i) => listItem(record, i));
    const joined = items.join("\n");
    if (joined !== this.items) {
      list.setItems(items);
      this.items = joined;
    }
    if (vm.selected >= 0) list.select(vm.selected);

    const content = threadMarkup(vm);
    if (content !== this.threadContent) {
      thread.setContent(content);
      this.threadContent = content;
    }
    const recordId = vm.thread.record?.id ?? null;
    if (recordId !== this.threadRecordId) {
      thread.scrollTo(0);
      this.threadRecordId = recordId;
    }
    thread.setLabel(threadLabel(vm));
    for (const target of scrolls) {
      this.scrollThread(thread, target, vm.thread.text);
    }

    status.setContent(statusMarkup(vm));
    if (vm.help) {
      help.show();
      help.setFront();
    } else {
      help.hide();
    }
    screen.render();
  }

  private scrollThread(box: Widgets.BoxElement, target: ScrollTarget, text: string): void {
    switch (target.kind) {
      case "lines":
        box.scroll(target.delta);
        break;
      case "pages": {
        const page = typeof box.height === "number" ? Math.max(1, box.height - 2) : 1;
        box.scroll(target.delta * page);
        break;
      }
      case "top":
        box.setScrollPerc(0);
        break;
      case "bottom":
        box.setScrollPerc(100);
        break;
      case "offset":
        box.scrollTo(this.screenLineOf(box, text, target.offset));
        break;
    }
  }

  /**
   * Wrapped line holding `offset`, measured by letting blessed wrap the text
   * up to and including that character.
   */
  private screenLineOf(box: Widgets.BoxElement, text: string, offset: number): number {
    box.setContent(escapeMarkup(text.slice(0, offset + 1)));
    const line = box.getScreenLines().length - 1;
    box.setContent(this.threadContent);
    return Math.max(0, line);
  }
}
