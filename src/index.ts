#!/usr/bin/env node
/**
 * claude-yelp: browse, search, tag and resume Claude CLI sessions.
 *
 * Usage:
 *   clod             - browse sessions
 *   clod +10 | 10    - browse with session 10 selected
 *   clod <tag>       - create a session tagged <tag> and resume it
 *   clod -t <tag>    - same, deleted again on exit
 */

import chalk from "chalk";
import { Command } from "commander";
import { stdin, stdout } from "node:process";
import { createInterface } from "node:readline/promises";
import { SystemClipboard } from "./clipboard/system-clipboard.js";
import { loadConfig } from "./config.js";
import { describeError } from "./errors.js";
import { ClaudeLauncher } from "./launcher/claude-launcher.js";
import { createLogger, debugRequested } from "./logger.js";
import { ModalController } from "./modal/controller.js";
import { SessionIndex } from "./sessions/session-index.js";
import { TemporarySessions } from "./sessions/temporary.js";
import {
  createTaggedSession,
  parseStartupArg,
  resumeSession,
  type StartupAction,
  type StartupContext,
} from "./startup.js";
import { TagStore } from "./tags/tag-store.js";
import { runApp } from "./ui/app.js";
import { TerminalView } from "./ui/terminal-view.js";

interface CliOptions {
  temp?: boolean;
  debug?: boolean;
  config?: string;
}

async function ask(question: string): Promise<string> {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

async function main(argv: string[]): Promise<number> {
  const program = new Command()
    .name("clod")
    .description("Session manager for Claude CLI")
    .version("0.1.0")
    .argument("[arg]", "session number (+10 or 10) or tag name for a new session")
    .option("-t, --temp", "temporary session (deleted on exit)")
    .option("--debug", "write a debug log")
    .option("-c, --config <path>", "path to config.yaml")
    .addHelpText("after", "\nExamples: clod, clod +10, clod 'my-tag', clod -t 'temp-tag'");

  program.parse(argv);
  const opts = program.opts<CliOptions>();
  const [arg] = program.args;

  let action: StartupAction;
  try {
    action = parseStartupArg(arg, opts.temp ?? false);
  } catch (err) {
    console.error(chalk.red(`Error: ${describeError(err)}`));
    return 1;
  }

  const config = loadConfig(opts.config);
  const debug = debugRequested(opts.debug ?? false);
  const log = createLogger(config, debug);
  log.info({ source: opts.debug ? "--debug flag" : "CLAUDE_YELP_DEBUG env" }, "claude-yelp started");

  const launcher = new ClaudeLauncher(config.claude.binary, log);
  const temporary = new TemporarySessions((id) => index.purgeSession(id), log);
  const index = await SessionIndex.open({
    root: config.claude.projectsDir,
    tagStore: new TagStore(config.tags.file, log),
    launcher,
    log,
    previewLength: config.ui.previewLength,
    temporary,
  });

  for (const warning of index.lastWarnings()) {
    log.warn({ kind: warning.kind, path: warning.path }, warning.message);
  }

  const ctx: StartupContext = {
    index,
    launcher,
    temporary,
    log,
    cwd: process.cwd(),
    ask,
    print: (line) => console.log(line),
  };

  if (action.kind === "create") {
    return createTaggedSession(ctx, action.tag, action.temporary);
  }

  index.watch();
  const controller = new ModalController({
    index,
    clipboard: new SystemClipboard(log),
    log,
    exportDir: process.cwd(),
    leftPaneWidth: config.ui.leftPaneWidth,
    doublePressMs: config.ui.doublePressMs,
    pageSize: config.ui.pageSize,
    includeMessages: config.search.includeMessages,
  });
  if (action.openAt !== null) {
    controller.openAt(action.openAt);
  }

  const request = await runApp({ controller, index, view: new TerminalView(), log }).finally(() => {
    controller.close();
    return index.close();
  });
  log.info({ request }, "Browser closed");

  if (!request) return 0;
  if (request.action === "create") {
    return createTaggedSession(ctx, request.tag, false);
  }
  return resumeSession(ctx, request.sessionId, request.projectDir);
}

main(process.argv)
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
