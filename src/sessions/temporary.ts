import type { Logger } from "pino";

type Purge = (sessionId: string) => void;

/** The parts of `process` used to hook exit and signals. */
export interface ExitHooks {
  on(event: string, listener: () => void): unknown;
  exit(code: number): void;
}

const EXIT_SIGNALS = ["SIGTERM", "SIGHUP"] as const;
const SIGNAL_CODES: Record<(typeof EXIT_SIGNALS)[number] | "SIGINT", number> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGTERM: 15,
};

/**
 * Sessions created with `--temp`. Their transcripts are removed when the
 * process exits, whether normally or through a terminating signal.
 *
 * While a foreground child owns the terminal, SIGINT belongs to the child
 * and is not treated as a request to exit.
 */
export class TemporarySessions {
  private ids = new Set<string>();
  private installed = false;
  private purge: Purge;
  private log: Logger;
  private proc: ExitHooks;
  foreground = false;

  constructor(purge: Purge, log: Logger, proc: ExitHooks = process) {
    this.purge = purge;
    this.log = log.child({ module: "temporary" });
    this.proc = proc;
  }

  register(sessionId: string): void {
    this.ids.add(sessionId);
    this.install();
  }

  has(sessionId: string): boolean {
    return this.ids.has(sessionId);
  }

  /** Remove every registered session. Synchronous so it can run inside `exit`. */
  cleanupAll(): void {
    for (const id of this.ids) {
      try {
        this.purge(id);
        this.log.info({ sessionId: id }, "Cleaned up temporary session");
      } catch (err) {
        this.log.error({ err, sessionId: id }, "Failed to clean up temporary session");
      }
    }
    this.ids.clear();
  }

  private install(): void {
    if (this.installed) return;
    this.installed = true;
    const { proc } = this;

    proc.on("exit", () => this.cleanupAll());
    for (const signal of EXIT_SIGNALS) {
      proc.on(signal, () => {
        this.cleanupAll();
        proc.exit(128 + SIGNAL_CODES[signal]);
      });
    }
    proc.on("SIGINT", () => {
      if (this.foreground) return;
      this.cleanupAll();
      proc.exit(128 + SIGNAL_CODES.SIGINT);
    });
  }
}
