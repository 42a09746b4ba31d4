import chalk from "chalk";
import type { Logger } from "pino";
import { ValidationError, describeError } from "./errors.js";
import type { ProcessLauncher } from "./launcher/types.js";
import type { SessionIndex } from "./sessions/session-index.js";
import type { TemporarySessions } from "./sessions/temporary.js";

export type StartupAction =
  | { kind: "browse"; openAt: number | null }
  | { kind: "create"; tag: string; temporary: boolean };

export type ExistingTagChoice = "connect" | "abort" | "overwrite";

/**
 * `clod`, `clod +N` / `clod N` (open at session N) or `clod <tag>` (create
 * a tagged session). `-t` marks the new session temporary and needs a tag.
 */
export function parseStartupArg(arg: string | undefined, temporary: boolean): StartupAction {
  if (arg === undefined || arg === "") {
    if (temporary) throw new ValidationError("-t requires a tag name");
    return { kind: "browse", openAt: null };
  }
  const number = /^\+?(\d+)$/.exec(arg);
  if (number) {
    return { kind: "browse", openAt: Number(number[1]) };
  }
  return { kind: "create", tag: arg, temporary };
}

/** Answer to `[Y]connect / [n]abort / [o]verwrite`; anything unrecognised connects. */
export function parseExistingTagReply(reply: string): ExistingTagChoice {
  switch (reply.trim().toLowerCase()) {
    case "n":
      return "abort";
    case "o":
      return "overwrite";
    default:
      return "connect";
  }
}

export interface StartupContext {
  index: SessionIndex;
  launcher: ProcessLauncher;
  temporary: TemporarySessions;
  log: Logger;
  cwd: string;
  ask: (question: string) => Promise<string>;
  print: (line: string) => void;
}

/** Hand the terminal to the CLI for `sessionId`; resolves with its exit code. */
export async function resumeSession(
  ctx: StartupContext,
  sessionId: string,
  cwd: string,
): Promise<number> {
  ctx.temporary.foreground = true;
  try {
    return await ctx.launcher.resume(sessionId, cwd);
  } finally {
    ctx.temporary.foreground = false;
  }
}

/**
 * Create a session tagged `tag` and resume it. When the tag is already in
 * use the user may connect to the existing session, abort, or replace it.
 */
export async function createTaggedSession(
  ctx: StartupContext,
  tag: string,
  temporary: boolean,
): Promise<number> {
  const log = ctx.log.child({ module: "startup" });
  let replaced: string | null = null;

  const existing = ctx.index.findByTag(tag);
  if (existing) {
    ctx.print(`Tag '${tag}' already exists (session ${existing.slice(0, 8)})`);
    const choice = parseExistingTagReply(await ctx.ask("[Y]connect / [n]abort / [o]verwrite: "));
    log.debug({ tag, existing, choice }, "Existing tag");

    if (choice === "abort") {
      ctx.print("Aborted.");
      return 0;
    }
    if (choice === "connect") {
      ctx.print("Connecting to existing session...");
      const record = ctx.index.getSession(existing);
      const dir = record ? ctx.index.resolveLaunchDir(record) : ctx.cwd;
      return resumeSession(ctx, existing, dir);
    }
    ctx.print("Removing old session and creating new...");
    replaced = existing;
  }

  let sessionId: string;
  try {
    sessionId = await ctx.index.create(tag, { temporary, cwd: ctx.cwd });
  } catch (err) {
    log.error({ err, tag }, "Failed to create session");
    ctx.print(chalk.red(describeError(err)));
    return 1;
  }

  if (replaced) {
    try {
      if (ctx.index.purgeSession(replaced)) {
        ctx.print(`Removed old session ${replaced.slice(0, 8)}`);
      }
    } catch (err) {
      log.warn({ err, sessionId: replaced }, "Failed to remove replaced session");
      ctx.print(
        chalk.yellow(`Warning: could not remove old session ${replaced.slice(0, 8)}: ${describeError(err)}`),
      );
    }
  }

  const label = temporary ? "TEMP session" : "session";
  ctx.print(`Created ${label} ${sessionId.slice(0, 8)} with tag: ${tag}`);

  const code = await resumeSession(ctx, sessionId, ctx.cwd);
  if (temporary) {
    ctx.temporary.cleanupAll();
    ctx.print(`Cleaned up temp session ${sessionId.slice(0, 8)}`);
  }
  return code;
}
