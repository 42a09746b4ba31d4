import type { Intent, Mode } from "../modal/types.js";

/** The fields of a blessed key event that the keymap reads. */
export interface KeyInfo {
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export interface KeyPress {
  /** The typed character; undefined for special keys. */
  str: string | undefined;
  key: KeyInfo;
}

export interface KeyBinding {
  keys: string;
  description: string;
}

/** Shown in the help overlay, in this order. */
export const KEY_BINDINGS: readonly KeyBinding[] = [
  { keys: "↑/↓", description: "Move selection (or scroll thread)" },
  { keys: "PgUp/PgDn", description: "Page up / down" },
  { keys: "gg / G", description: "Go to top / bottom" },
  { keys: ":", description: "Jump to session number" },
  { keys: "/", description: "Search list or thread" },
  { keys: "n / N", description: "Next / previous match" },
  { keys: "s / Enter", description: "Start session" },
  { keys: "t", description: "Tag session" },
  { keys: "d", description: "Delete session" },
  { keys: "e", description: "Export to Markdown" },
  { keys: "Ctrl+N", description: "New tagged session" },
  { keys: "u", description: "Toggle user messages only" },
  { keys: "c", description: "Copy thread to clipboard" },
  { keys: "y", description: "Yank selected text" },
  { keys: "←/→", description: "Focus list / thread" },
  { keys: "Shift+←/→", description: "Resize panes" },
  { keys: "Ctrl+K", description: "Toggle this help" },
  { keys: "Esc", description: "Cancel" },
  { keys: "q", description: "Quit" },
];

const NORMAL_NAMED: ReadonlyMap<string, Intent> = new Map(Object.entries({
  up: { type: "moveUp" },
  down: { type: "moveDown" },
  pageup: { type: "pageUp" },
  pagedown: { type: "pageDown" },
  left: { type: "focus", pane: "list" },
  right: { type: "focus", pane: "thread" },
  return: { type: "start" },
  escape: { type: "cancel" },
} satisfies Record<string, Intent>));

const NORMAL_CHARS: ReadonlyMap<string, Intent> = new Map(Object.entries({
  g: { type: "goFirst" },
  G: { type: "goLast" },
  ":": { type: "beginJump" },
  "/": { type: "beginFilter" },
  s: { type: "start" },
  t: { type: "beginTag" },
  d: { type: "delete" },
  e: { type: "export" },
  u: { type: "toggleUserOnly" },
  c: { type: "copyThread" },
  y: { type: "copySelection" },
  n: { type: "nextMatch" },
  N: { type: "previousMatch" },
  q: { type: "quit" },
} satisfies Record<string, Intent>));

function isPrintable(str: string | undefined): str is string {
  return !!str && !/[\x00-\x1f\x7f]/.test(str);
}

/** Translate a keypress into an intent for the current mode, or null to ignore it. */
export function keyToIntent({ str, key }: KeyPress, mode: Mode): Intent | null {
  // blessed reports Enter twice, as "return" and then "enter"; only the first counts.
  if (key.name === "enter") return null;

  const entry = mode.kind !== "normal" || mode.confirmDelete !== null;
  if (key.ctrl && key.name === "c") return entry ? { type: "cancel" } : { type: "quit" };

  if (mode.kind === "normal" && mode.confirmDelete !== null) {
    return str === "y" || str === "Y" || key.name === "return"
      ? { type: "confirm" }
      : { type: "cancel" };
  }

  if (mode.kind !== "normal") {
    switch (key.name) {
      case "return":
        return { type: "commit" };
      case "escape":
        return { type: "cancel" };
      case "backspace":
        return { type: "backspace" };
    }
    if (key.ctrl || key.meta) return null;
    return isPrintable(str) ? { type: "input", text: str } : null;
  }

  if (key.ctrl) {
    if (key.name === "n") return { type: "beginNewSession" };
    if (key.name === "k") return { type: "toggleHelp" };
    return null;
  }
  if (key.shift && (key.name === "left" || key.name === "right")) {
    return { type: "resize", delta: key.name === "left" ? -1 : 1 };
  }
  const named = key.name && !isPrintable(str) ? NORMAL_NAMED.get(key.name) : undefined;
  if (named) return named;
  return (str !== undefined && NORMAL_CHARS.get(str)) || null;
}
