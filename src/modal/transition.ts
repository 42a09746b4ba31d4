/**
 * Pure state machine for the browser. `transition(state, intent, ctx)`
 * returns the next state plus the effects the controller must carry out;
 * nothing here touches the filesystem except through `ctx.threadText`.
 *
 * Modes: normal (with an optional delete confirmation), filter, command
 * and tag. Every entry mode returns to normal on commit or cancel, except
 * that a rejected commit stays put with its buffer intact.
 */

import {
  EMPTY_CURSOR,
  createCursor,
  nextMatch,
  previousMatch,
  type CursorStep,
  type MatchCursor,
} from "../search/thread-search.js";
import type { SessionRecord } from "../sessions/record.js";
import type {
  ControllerState,
  Effect,
  Intent,
  Mode,
  Notice,
  Pane,
  TransitionContext,
  TransitionResult,
} from "./types.js";

export const MIN_PANE_WIDTH = 15;
export const MAX_PANE_WIDTH = 70;
export const PANE_STEP = 5;

const NORMAL: Mode = { kind: "normal", confirmDelete: null };

export interface InitialStateOptions {
  leftPaneWidth?: number;
}

export function createInitialState(
  records: readonly SessionRecord[],
  options: InitialStateOptions = {},
): ControllerState {
  return {
    mode: NORMAL,
    records,
    query: "",
    view: records,
    selected: records.length > 0 ? 0 : -1,
    focus: "list",
    userOnly: false,
    search: EMPTY_CURSOR,
    pendingFirstAt: null,
    leftPaneWidth: options.leftPaneWidth ?? 30,
    help: false,
    notice: null,
  };
}

export function selectedRecord(state: ControllerState): SessionRecord | null {
  return state.selected >= 0 ? state.view[state.selected] ?? null : null;
}

function info(title: string, message: string): Notice {
  return { level: "info", title, message };
}

function warning(title: string, message: string): Notice {
  return { level: "warning", title, message };
}

function done(state: ControllerState, effects: Effect[] = []): TransitionResult {
  return { state, effects };
}

/** Recompute the thread search for whatever record is now selected. */
function research(state: ControllerState, ctx: TransitionContext): ControllerState {
  if (state.search.query === "") return state;
  const record = selectedRecord(state);
  const text = record ? ctx.threadText(record, state.userOnly) : "";
  return { ...state, search: createCursor(text, state.search.query) };
}

/**
 * Move the selection. The thread search follows the selected session, so
 * it is recomputed whenever the selected record changes.
 */
function select(
  state: ControllerState,
  index: number,
  ctx: TransitionContext,
): ControllerState {
  const clamped = state.view.length === 0 ? -1 : clamp(index, 0, state.view.length - 1);
  if (clamped === state.selected) return state;
  const before = selectedRecord(state);
  const next = { ...state, selected: clamped };
  return selectedRecord(next) === before ? next : research(next, ctx);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Selection index in `view` for a record that was selected before the view
 * changed: the same record if still visible, otherwise `fallback`.
 */
function follow(
  view: readonly SessionRecord[],
  previous: SessionRecord | null,
  fallback: number,
): number {
  if (view.length === 0) return -1;
  if (previous) {
    const index = view.findIndex((r) => r.id === previous.id);
    if (index !== -1) return index;
  }
  return clamp(fallback, 0, view.length - 1);
}

function applyListFilter(
  state: ControllerState,
  query: string,
  ctx: TransitionContext,
): ControllerState {
  const previous = selectedRecord(state);
  const view = ctx.filter(query, state.records);
  const selected = follow(view, previous, 0);
  const next = { ...state, query, view, selected };
  return selectedRecord(next) === previous ? next : research(next, ctx);
}

/**
 * Install a new record collection, e.g. after a refresh, tag or delete.
 * The applied filter is re-run; the selection follows its record, or stays
 * at the same position when that record is gone.
 */
export function syncRecords(
  state: ControllerState,
  records: readonly SessionRecord[],
  ctx: TransitionContext,
): ControllerState {
  const previous = selectedRecord(state);
  const view = ctx.filter(state.query, records);
  const selected = follow(view, previous, state.selected);
  return research({ ...state, records, view, selected }, ctx);
}

export function transition(
  state: ControllerState,
  intent: Intent,
  ctx: TransitionContext,
): TransitionResult {
  // Notices last until the next intent.
  const base: ControllerState = state.notice ? { ...state, notice: null } : state;

  if (base.help) {
    if (intent.type === "toggleHelp" || intent.type === "cancel" || intent.type === "quit") {
      return done({ ...base, help: false });
    }
    return done(base);
  }

  switch (base.mode.kind) {
    case "normal":
      return normal(base, base.mode.confirmDelete, intent, ctx);
    case "filter":
      return filterMode(base, base.mode, intent, ctx);
    case "command":
      return commandMode(base, base.mode, intent, ctx);
    case "tag":
      return tagMode(base, base.mode, intent, ctx);
  }
}

function normal(
  state: ControllerState,
  confirmDelete: string | null,
  intent: Intent,
  ctx: TransitionContext,
): TransitionResult {
  if (confirmDelete !== null) {
    const next = { ...state, mode: NORMAL };
    return intent.type === "confirm"
      ? done(next, [{ type: "delete", sessionId: confirmDelete }])
      : done(next);
  }

  const s: ControllerState =
    intent.type !== "goFirst" && state.pendingFirstAt !== null
      ? { ...state, pendingFirstAt: null }
      : state;
  const record = selectedRecord(s);

  switch (intent.type) {
    case "beginFilter":
      return done({
        ...s,
        mode: { kind: "filter", buffer: "", target: s.focus, liveView: null, liveCursor: null },
      });

    case "beginJump":
      return done({ ...s, mode: { kind: "command", buffer: "", error: null } });

    case "beginTag":
      if (!record) return done({ ...s, notice: warning("Tag", "No session selected") });
      return done({
        ...s,
        mode: {
          kind: "tag",
          buffer: record.tag ?? "",
          purpose: "tag",
          sessionId: record.id,
          error: null,
        },
      });

    case "beginNewSession":
      return done({
        ...s,
        mode: { kind: "tag", buffer: "", purpose: "new-session", sessionId: null, error: null },
      });

    case "moveUp":
    case "moveDown": {
      const delta = intent.type === "moveUp" ? -1 : 1;
      if (s.focus === "thread") {
        return done(s, [{ type: "scroll", target: { kind: "lines", delta } }]);
      }
      return done(select(s, s.selected + delta, ctx));
    }

    case "pageUp":
    case "pageDown": {
      const delta = intent.type === "pageUp" ? -1 : 1;
      if (s.focus === "thread") {
        return done(s, [{ type: "scroll", target: { kind: "pages", delta } }]);
      }
      return done(select(s, s.selected + delta * ctx.pageSize, ctx));
    }

    case "goFirst": {
      const pending = s.pendingFirstAt;
      if (pending === null || ctx.now - pending >= ctx.doublePressMs) {
        return done({ ...s, pendingFirstAt: ctx.now });
      }
      const cleared = { ...s, pendingFirstAt: null };
      if (s.focus === "thread") {
        return done(cleared, [{ type: "scroll", target: { kind: "top" } }]);
      }
      return done(select(cleared, 0, ctx));
    }

    case "goLast":
      if (s.focus === "thread") {
        return done(s, [{ type: "scroll", target: { kind: "bottom" } }]);
      }
      return done(select(s, s.view.length - 1, ctx));

    case "start":
      if (!record) return done(s);
      return done(s, [{ type: "start", sessionId: record.id }]);

    case "delete":
      if (!record) return done(s);
      return done({ ...s, mode: { kind: "normal", confirmDelete: record.id } });

    case "export":
      if (!record) return done(s);
      return done(s, [{ type: "export", sessionId: record.id }]);

    case "copyThread":
      if (!record) return done(s);
      return done(s, [{ type: "copyThread", sessionId: record.id }]);

    case "copySelection":
      return done(s, [{ type: "copySelection" }]);

    case "toggleUserOnly": {
      const userOnly = !s.userOnly;
      const next = research({ ...s, userOnly }, ctx);
      const mode = userOnly ? "User messages only" : "All messages";
      return done({ ...next, notice: info("Filter Toggled", `Filter: ${mode}`) });
    }

    case "nextMatch":
    case "previousMatch":
      return moveMatch(s, intent.type === "nextMatch" ? nextMatch : previousMatch, intent.type);

    case "resize": {
      const width = clamp(s.leftPaneWidth + intent.delta * PANE_STEP, MIN_PANE_WIDTH, MAX_PANE_WIDTH);
      return done({ ...s, leftPaneWidth: width });
    }

    case "focus":
      return done({ ...s, focus: intent.pane });

    case "toggleHelp":
      return done({ ...s, help: true });

    case "quit":
      return done(s, [{ type: "quit" }]);

    case "input":
    case "backspace":
    case "commit":
    case "cancel":
    case "confirm":
      return done(s);
  }
}

function moveMatch(
  state: ControllerState,
  move: (cursor: MatchCursor) => CursorStep | null,
  direction: "nextMatch" | "previousMatch",
): TransitionResult {
  if (state.search.query === "") {
    return done({ ...state, notice: warning("Search", "No search active") });
  }
  const step = move(state.search);
  if (!step) {
    return done({
      ...state,
      notice: warning("Search", `No matches for '${state.search.query}'`),
    });
  }

  // The status line always shows the match position; the notice reports
  // wrapping when it happened.
  let message = `Match ${step.cursor.index + 1}/${step.cursor.offsets.length}`;
  if (step.wrapped) {
    message = direction === "nextMatch"
      ? "Search wrapped to beginning"
      : "Search wrapped to end";
  }
  return done(
    { ...state, search: step.cursor, notice: info("Search", message) },
    [{ type: "scroll", target: { kind: "offset", offset: step.offset } }],
  );
}

function editBuffer(buffer: string, intent: Intent): string | null {
  if (intent.type === "input") return buffer + intent.text;
  if (intent.type === "backspace") return Array.from(buffer).slice(0, -1).join("");
  return null;
}

function filterMode(
  state: ControllerState,
  mode: Extract<Mode, { kind: "filter" }>,
  intent: Intent,
  ctx: TransitionContext,
): TransitionResult {
  const edited = editBuffer(mode.buffer, intent);
  if (edited !== null) {
    return done({ ...state, mode: liveFilter(state, mode.target, edited, ctx) });
  }

  if (intent.type === "cancel") return done({ ...state, mode: NORMAL });
  if (intent.type !== "commit") return done(state);

  const query = mode.buffer.trim();
  const back = { ...state, mode: NORMAL };

  if (query === "") {
    const cleared = applyListFilter({ ...back, search: EMPTY_CURSOR }, "", ctx);
    return done({ ...cleared, notice: info("Search", "Search cleared") });
  }

  if (mode.target === "thread") {
    return searchThread(back, query, ctx);
  }

  const filtered = applyListFilter(back, query, ctx);
  return done({
    ...filtered,
    notice: info("Search", `Search: ${query} (${filtered.view.length} results)`),
  });
}

/** Incremental results while the filter buffer is being typed. */
function liveFilter(
  state: ControllerState,
  target: Pane,
  buffer: string,
  ctx: TransitionContext,
): Mode {
  const query = buffer.trim();
  if (target === "list") {
    return {
      kind: "filter",
      buffer,
      target,
      liveView: query === "" ? null : ctx.filter(query, state.records),
      liveCursor: null,
    };
  }
  const record = selectedRecord(state);
  const liveCursor =
    query === "" || !record ? null : createCursor(ctx.threadText(record, state.userOnly), query);
  return { kind: "filter", buffer, target, liveView: null, liveCursor };
}

function searchThread(
  state: ControllerState,
  query: string,
  ctx: TransitionContext,
): TransitionResult {
  const record = selectedRecord(state);
  const text = record ? ctx.threadText(record, state.userOnly) : "";
  const search = createCursor(text, query);

  if (search.offsets.length === 0) {
    return done({ ...state, search, notice: warning("Search", `No matches for '${query}'`) });
  }
  return done(
    {
      ...state,
      search,
      notice: info("Search", `Match 1/${search.offsets.length} for '${query}'`),
    },
    [{ type: "scroll", target: { kind: "offset", offset: search.offsets[0] } }],
  );
}

const JUMP_PATTERN = /^\+?(\d+)$/;

function commandMode(
  state: ControllerState,
  mode: Extract<Mode, { kind: "command" }>,
  intent: Intent,
  ctx: TransitionContext,
): TransitionResult {
  const edited = editBuffer(mode.buffer, intent);
  if (edited !== null) {
    return done({ ...state, mode: { kind: "command", buffer: edited, error: null } });
  }

  if (intent.type === "cancel") return done({ ...state, mode: NORMAL });
  if (intent.type !== "commit") return done(state);

  const reject = (error: string): TransitionResult =>
    done({ ...state, mode: { ...mode, error } });

  const match = JUMP_PATTERN.exec(mode.buffer.trim());
  if (!match) {
    return reject(`Unknown command: ${mode.buffer}`);
  }
  const number = Number(match[1]);
  if (number < 1 || number > state.view.length) {
    return reject(`Invalid session number: ${number} (range: 1-${state.view.length})`);
  }

  const moved = select({ ...state, mode: NORMAL, focus: "list" }, number - 1, ctx);
  return done({ ...moved, notice: info("Goto", `Jumped to session ${number}`) });
}

function tagMode(
  state: ControllerState,
  mode: Extract<Mode, { kind: "tag" }>,
  intent: Intent,
  _ctx: TransitionContext,
): TransitionResult {
  const edited = editBuffer(mode.buffer, intent);
  if (edited !== null) {
    return done({ ...state, mode: { ...mode, buffer: edited, error: null } });
  }

  if (intent.type === "cancel") return done({ ...state, mode: NORMAL });
  if (intent.type !== "commit") return done(state);

  const value = mode.buffer.trim();
  const back = { ...state, mode: NORMAL };

  if (mode.purpose === "new-session") {
    if (value === "") {
      return done({ ...state, mode: { ...mode, error: "Session name required" } });
    }
    return done(back, [{ type: "create", tag: value }]);
  }

  if (mode.sessionId === null) return done(back);
  return done(back, [{ type: "tag", sessionId: mode.sessionId, tag: value }]);
}
