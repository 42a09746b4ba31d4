import { execFile, spawn } from "node:child_process";
import { promisify } from "node:util";
import type { Logger } from "pino";
import { LaunchError, describeError } from "../errors.js";
import type { ProcessLauncher } from "./types.js";

const exec = promisify(execFile);

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

/**
 * Pull `session_id` out of `--output-format json` output. Control
 * characters other than whitespace are stripped first.
 */
export function parseCreateOutput(stdout: string): string {
  const cleaned = stdout.trim().replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f]/g, "");

  let data: unknown;
  try {
    data = JSON.parse(cleaned);
  } catch (err) {
    throw new LaunchError(`Error parsing JSON: ${cleaned.slice(0, 500)}`, { cause: err });
  }

  if (typeof data === "object" && data !== null && "session_id" in data) {
    const id = data.session_id;
    if (typeof id === "string" && id.length > 0) return id;
  }
  throw new LaunchError(`No session_id in response: ${cleaned.slice(0, 500)}`);
}

export class ClaudeLauncher implements ProcessLauncher {
  private log: Logger;
  private binary: string;

  constructor(binary: string, log: Logger) {
    this.binary = binary;
    this.log = log.child({ module: "launcher" });
  }

  async createSession(prompt: string, cwd: string): Promise<string> {
    let stdout: string;
    try {
      ({ stdout } = await exec(
        this.binary,
        ["-p", prompt, "--output-format", "json"],
        { cwd, maxBuffer: MAX_OUTPUT_BYTES },
      ));
    } catch (err) {
      this.log.error({ err, cwd }, "Session creation failed");
      throw new LaunchError(`Error creating session: ${describeError(err)}`, { cause: err });
    }

    const sessionId = parseCreateOutput(stdout);
    this.log.info({ sessionId, cwd }, "Created session");
    return sessionId;
  }

  resume(sessionId: string, cwd: string): Promise<number> {
    this.log.info({ sessionId, cwd }, "Resuming session");

    return new Promise((resolve, reject) => {
      const child = spawn(this.binary, ["--resume", sessionId], {
        cwd,
        stdio: "inherit",
        env: { ...process.env, CLAUDE_SESSION_ID: sessionId },
      });

      child.once("error", (err) => {
        reject(new LaunchError(`Failed to start ${this.binary}: ${err.message}`, { cause: err }));
      });
      child.once("exit", (code, signal) => {
        this.log.debug({ sessionId, code, signal }, "Session process exited");
        resolve(code ?? 1);
      });
    });
  }
}
