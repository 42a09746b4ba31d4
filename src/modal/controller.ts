import type { Logger } from "pino";
import type { ClipboardSink } from "../clipboard/types.js";
import { NotFoundError, YelpError, describeError } from "../errors.js";
import type { LaunchRequest } from "../launcher/types.js";
import { filterSessions } from "../search/filter.js";
import { currentOffset, type MatchCursor } from "../search/thread-search.js";
import type { SessionIndex } from "../sessions/session-index.js";
import type { SessionRecord } from "../sessions/record.js";
import { exportSession } from "../thread/export.js";
import { renderThreadMarkdown, renderThreadText } from "../thread/render.js";
import { createInitialState, selectedRecord, syncRecords, transition } from "./transition.js";
import type {
  ControllerState,
  Effect,
  Intent,
  Mode,
  Notice,
  Pane,
  ScrollTarget,
  TransitionContext,
} from "./types.js";

export type DispatchOutcome =
  | { kind: "continue" }
  | { kind: "exit"; request: LaunchRequest | null };

export interface ModalControllerOptions {
  index: SessionIndex;
  clipboard: ClipboardSink;
  log: Logger;
  /** Directory that exports are written into. */
  exportDir: string;
  leftPaneWidth: number;
  doublePressMs: number;
  pageSize: number;
  includeMessages: boolean;
  now?: () => number;
}

export interface ThreadView {
  record: SessionRecord | null;
  text: string;
  query: string;
  matches: readonly number[];
  current: number | null;
}

/** Everything the renderer draws. */
export interface ViewModel {
  rows: readonly SessionRecord[];
  selected: number;
  total: number;
  query: string;
  mode: Mode;
  focus: Pane;
  userOnly: boolean;
  leftPaneWidth: number;
  help: boolean;
  notice: Notice | null;
  thread: ThreadView;
}

interface ThreadMemo {
  key: string;
  text: string;
}

const CONTINUE: DispatchOutcome = { kind: "continue" };

/**
 * Holds the browser state, feeds intents through `transition` and carries
 * out the resulting effects. Service errors become notices; nothing thrown
 * by an effect escapes `dispatch`.
 */
export class ModalController {
  private state: ControllerState;
  private scrolls: ScrollTarget[] = [];
  private memo = new WeakMap<SessionRecord, ThreadMemo>();
  private unsubscribe: () => void;
  private log: Logger;
  private options: ModalControllerOptions;
  private now: () => number;

  constructor(options: ModalControllerOptions) {
    this.options = options;
    this.log = options.log.child({ module: "controller" });
    this.now = options.now ?? Date.now;
    this.state = createInitialState(options.index.getSessions(), {
      leftPaneWidth: options.leftPaneWidth,
    });
    this.unsubscribe = options.index.onChange((records) => {
      this.state = syncRecords(this.state, records, this.context());
    });
  }

  get current(): ControllerState {
    return this.state;
  }

  private context(): TransitionContext {
    return {
      now: this.now(),
      doublePressMs: this.options.doublePressMs,
      pageSize: this.options.pageSize,
      threadText: (record, userOnly) => this.threadText(record, userOnly),
      filter: (query, records) =>
        filterSessions(query, records, {
          includeMessages: this.options.includeMessages,
          log: this.options.log,
        }),
    };
  }

  /** Rendered thread text, memoized per record until it changes. */
  threadText(record: SessionRecord, userOnly: boolean): string {
    const key = `${record.version}:${userOnly}:${record.tag ?? ""}`;
    const cached = this.memo.get(record);
    if (cached?.key === key) return cached.text;

    const text = renderThreadText(record, record.messages(this.options.log), userOnly);
    this.memo.set(record, { key, text });
    return text;
  }

  /** Select the 1-based visible index `n`, as `clod N` requests at startup. */
  openAt(n: number): boolean {
    if (!Number.isInteger(n) || n < 1 || n > this.state.view.length) {
      this.state = {
        ...this.state,
        notice: {
          level: "warning",
          title: "Goto",
          message: `Invalid session number: ${n} (range: 1-${this.state.view.length})`,
        },
      };
      return false;
    }
    this.state = { ...this.state, selected: n - 1 };
    return true;
  }

  async dispatch(intent: Intent): Promise<DispatchOutcome> {
    const result = transition(this.state, intent, this.context());
    this.state = result.state;

    for (const effect of result.effects) {
      const outcome = await this.run(effect);
      if (outcome.kind === "exit") return outcome;
    }
    return CONTINUE;
  }

  private async run(effect: Effect): Promise<DispatchOutcome> {
    try {
      return await this.execute(effect);
    } catch (err) {
      this.log.warn({ err, effect: effect.type }, "Action failed");
      this.notify({
        level: "error",
        title: "Error",
        message: err instanceof YelpError ? err.message : describeError(err),
      });
      return CONTINUE;
    }
  }

  private async execute(effect: Effect): Promise<DispatchOutcome> {
    const { index } = this.options;

    switch (effect.type) {
      case "tag":
        index.tag(effect.sessionId, effect.tag);
        this.notify(
          effect.tag === ""
            ? { level: "info", title: "Tag", message: "Tag removed" }
            : { level: "info", title: "Tag", message: `Tagged as '${effect.tag}'` },
        );
        return CONTINUE;

      case "delete": {
        const record = this.require(effect.sessionId);
        index.delete(effect.sessionId);
        this.notify({
          level: "info",
          title: "Deleted",
          message: `Session deleted: ${record.shortId}`,
        });
        return CONTINUE;
      }

      case "start": {
        const record = this.require(effect.sessionId);
        return {
          kind: "exit",
          request: {
            action: "resume",
            sessionId: record.id,
            projectDir: index.resolveLaunchDir(record),
          },
        };
      }

      case "create":
        return { kind: "exit", request: { action: "create", tag: effect.tag } };

      case "export": {
        const record = this.require(effect.sessionId);
        const filePath = exportSession(record, this.options.exportDir, this.options.log);
        this.notify({ level: "info", title: "Export Successful", message: `Exported to: ${filePath}` });
        return CONTINUE;
      }

      case "copyThread": {
        const record = this.require(effect.sessionId);
        const markdown = renderThreadMarkdown(record, record.messages(this.options.log));
        await this.options.clipboard.copy(markdown);
        this.notify({ level: "info", title: "Copied", message: "Thread copied to clipboard!" });
        return CONTINUE;
      }

      case "copySelection": {
        const text = await this.options.clipboard.readSelection();
        if (!text) {
          this.notify({ level: "warning", title: "Yank", message: "No text selected" });
          return CONTINUE;
        }
        await this.options.clipboard.copy(text);
        this.notify({ level: "info", title: "Yanked", message: `Yanked ${text.length} chars` });
        return CONTINUE;
      }

      case "scroll":
        this.scrolls.push(effect.target);
        return CONTINUE;

      case "quit":
        return { kind: "exit", request: null };
    }
  }

  private require(id: string): SessionRecord {
    const record = this.options.index.getSession(id);
    if (!record) throw new NotFoundError(id);
    return record;
  }

  private notify(notice: Notice): void {
    this.state = { ...this.state, notice };
  }

  /** Scroll requests queued since the last call, oldest first. */
  takeScrolls(): ScrollTarget[] {
    const taken = this.scrolls;
    this.scrolls = [];
    return taken;
  }

  viewModel(): ViewModel {
    const { state } = this;
    const live = state.mode.kind === "filter" ? state.mode : null;

    let rows = state.view;
    let selected = state.selected;
    if (live?.liveView) {
      rows = live.liveView;
      const record = selectedRecord(state);
      const index = record ? rows.indexOf(record) : -1;
      selected = index !== -1 ? index : rows.length > 0 ? 0 : -1;
    }

    const record = selected >= 0 ? rows[selected] ?? null : null;
    const cursor: MatchCursor = live?.liveCursor ?? state.search;
    const showCursor = record === selectedRecord(state);

    return {
      rows,
      selected,
      total: state.records.length,
      query: state.query,
      mode: state.mode,
      focus: state.focus,
      userOnly: state.userOnly,
      leftPaneWidth: state.leftPaneWidth,
      help: state.help,
      notice: state.notice,
      thread: {
        record,
        text: record ? this.threadText(record, state.userOnly) : "",
        query: showCursor ? cursor.query : "",
        matches: showCursor ? cursor.offsets : [],
        current: showCursor ? currentOffset(cursor) : null,
      },
    };
  }

  close(): void {
    this.unsubscribe();
  }
}
