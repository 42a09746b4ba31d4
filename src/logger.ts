import pino, { type Logger } from "pino";
import type { YelpConfig } from "./config.js";

export type { Logger };

const TRUTHY = new Set(["1", "true", "yes"]);

export function debugRequested(
  flag: boolean,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  return flag || TRUTHY.has((env.CLAUDE_YELP_DEBUG ?? "").toLowerCase());
}

/**
 * Root logger. The terminal belongs to the UI, so records go to the debug
 * log file, and nowhere at all unless debugging was requested.
 */
export function createLogger(
  config: YelpConfig,
  debug: boolean,
  env: NodeJS.ProcessEnv = process.env,
): Logger {
  if (!debug) {
    return pino({ level: "silent" });
  }

  const level = env.LOG_LEVEL ?? (config.log.level === "info" ? "debug" : config.log.level);

  if (config.log.pretty) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: false,
          destination: config.log.file,
          mkdir: true,
          append: false,
        },
      },
    });
  }

  return pino({ level }, pino.destination({ dest: config.log.file, mkdir: true, sync: true }));
}

/** Logger for tests and library use. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
