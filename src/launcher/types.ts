export interface ProcessLauncher {
  /** Start a new session non-interactively and return its id. */
  createSession(prompt: string, cwd: string): Promise<string>;
  /** Run the CLI in the foreground against an existing session; resolves with its exit code. */
  resume(sessionId: string, cwd: string): Promise<number>;
}

export type LaunchRequest =
  | { action: "resume"; sessionId: string; projectDir: string }
  | { action: "create"; tag: string };
