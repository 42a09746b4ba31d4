import type { MatchCursor } from "../search/thread-search.js";
import type { SessionRecord } from "../sessions/record.js";

export type Pane = "list" | "thread";

export type TagPurpose = "tag" | "new-session";

export type Mode =
  | { kind: "normal"; confirmDelete: string | null }
  | {
      kind: "filter";
      buffer: string;
      target: Pane;
      /** Incremental results for the buffer as typed; dropped on cancel. */
      liveView: readonly SessionRecord[] | null;
      liveCursor: MatchCursor | null;
    }
  | { kind: "command"; buffer: string; error: string | null }
  | {
      kind: "tag";
      buffer: string;
      purpose: TagPurpose;
      sessionId: string | null;
      error: string | null;
    };

export type ModeKind = Mode["kind"];

export interface Notice {
  level: "info" | "warning" | "error";
  title: string;
  message: string;
}

export interface ControllerState {
  mode: Mode;
  /** Full collection, in index order. */
  records: readonly SessionRecord[];
  /** Applied list filter; "" when none. */
  query: string;
  /** Visible list: `records` narrowed by `query`. */
  view: readonly SessionRecord[];
  /** Index into `view`; -1 when it is empty. */
  selected: number;
  focus: Pane;
  userOnly: boolean;
  /** Thread search over the selected record; query "" when inactive. */
  search: MatchCursor;
  pendingFirstAt: number | null;
  leftPaneWidth: number;
  help: boolean;
  notice: Notice | null;
}

export type ScrollTarget =
  | { kind: "lines"; delta: number }
  | { kind: "pages"; delta: number }
  | { kind: "top" }
  | { kind: "bottom" }
  | { kind: "offset"; offset: number };

export type Intent =
  | { type: "beginFilter" }
  | { type: "beginJump" }
  | { type: "beginTag" }
  | { type: "beginNewSession" }
  | { type: "input"; text: string }
  | { type: "backspace" }
  | { type: "commit" }
  | { type: "cancel" }
  | { type: "confirm" }
  | { type: "moveUp" }
  | { type: "moveDown" }
  | { type: "pageUp" }
  | { type: "pageDown" }
  | { type: "goFirst" }
  | { type: "goLast" }
  | { type: "start" }
  | { type: "delete" }
  | { type: "export" }
  | { type: "copyThread" }
  | { type: "copySelection" }
  | { type: "toggleUserOnly" }
  | { type: "nextMatch" }
  | { type: "previousMatch" }
  | { type: "resize"; delta: number }
  | { type: "focus"; pane: Pane }
  | { type: "toggleHelp" }
  | { type: "quit" };

export type IntentType = Intent["type"];

export type Effect =
  | { type: "tag"; sessionId: string; tag: string }
  | { type: "delete"; sessionId: string }
  | { type: "start"; sessionId: string }
  | { type: "create"; tag: string }
  | { type: "export"; sessionId: string }
  | { type: "copyThread"; sessionId: string }
  | { type: "copySelection" }
  | { type: "scroll"; target: ScrollTarget }
  | { type: "quit" };

export interface TransitionContext {
  now: number;
  doublePressMs: number;
  pageSize: number;
  /** Rendered thread text of a record, as searched and displayed. */
  threadText: (record: SessionRecord, userOnly: boolean) => string;
  filter: (query: string, records: readonly SessionRecord[]) => readonly SessionRecord[];
}

export interface TransitionResult {
  state: ControllerState;
  effects: Effect[];
}
