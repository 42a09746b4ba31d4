import { execFile, spawn } from "node:child_process";
import { promisify } from "node:util";
import type { Logger } from "pino";
import { IOFailureError } from "../errors.js";
import type { ClipboardSink } from "./types.js";

const exec = promisify(execFile);

type Command = readonly [string, ...string[]];

const COPY_COMMANDS: Partial<Record<NodeJS.Platform, readonly Command[]>> = {
  darwin: [["pbcopy"]],
  win32: [["clip"]],
};

const UNIX_COPY_COMMANDS: readonly Command[] = [
  ["wl-copy"],
  ["xclip", "-selection", "clipboard"],
  ["xsel", "--clipboard", "--input"],
];

function pipeTo(command: Command, text: string): Promise<void> {
  const [bin, ...args] = command;
  return new Promise((resolve, reject) => {
    const child = spawn(bin, args, { stdio: ["pipe", "ignore", "ignore"] });
    child.once("error", reject);
    child.stdin.once("error", reject);
    child.once("exit", (code) => {
      if (code === 0) resolve();
      else reject(new Error(`${bin} exited with code ${code ?? "null"}`));
    });
    child.stdin.end(text);
  });
}

export class SystemClipboard implements ClipboardSink {
  private log: Logger;
  private platform: NodeJS.Platform;

  constructor(log: Logger, platform: NodeJS.Platform = process.platform) {
    this.log = log.child({ module: "clipboard" });
    this.platform = platform;
  }

  async copy(text: string): Promise<void> {
    const commands = COPY_COMMANDS[this.platform] ?? UNIX_COPY_COMMANDS;
    for (const command of commands) {
      try {
        await pipeTo(command, text);
        this.log.debug({ command: command[0], length: text.length }, "Copied to clipboard");
        return;
      } catch (err) {
        this.log.debug({ err, command: command[0] }, "Clipboard command failed");
      }
    }
    throw new IOFailureError("No clipboard mechanism available");
  }

  async readSelection(): Promise<string | null> {
    if (this.platform === "darwin" || this.platform === "win32") return null;
    try {
      const { stdout } = await exec("xclip", ["-selection", "primary", "-o"], {
        timeout: 2000,
      });
      return stdout.length > 0 ? stdout : null;
    } catch (err) {
      this.log.debug({ err }, "Primary selection unavailable");
      return null;
    }
  }
}
