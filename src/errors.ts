export type YelpErrorCode =
  | "NOT_FOUND"
  | "PARSE_ERROR"
  | "IO_FAILURE"
  | "VALIDATION"
  | "COLLISION"
  | "LAUNCH_FAILED";

export class YelpError extends Error {
  code: YelpErrorCode;

  constructor(code: YelpErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.name = "YelpError";
  }
}

export class NotFoundError extends YelpError {
  constructor(sessionId: string) {
    super("NOT_FOUND", `Session not found: ${sessionId}`);
    this.name = "NotFoundError";
  }
}

/** Malformed transcript content. Recovered where it is raised. */
export class ParseError extends YelpError {
  constructor(message: string, options?: ErrorOptions) {
    super("PARSE_ERROR", message, options);
    this.name = "ParseError";
  }
}

export class IOFailureError extends YelpError {
  constructor(message: string, options?: ErrorOptions) {
    super("IO_FAILURE", message, options);
    this.name = "IOFailureError";
  }
}

export class ValidationError extends YelpError {
  constructor(message: string) {
    super("VALIDATION", message);
    this.name = "ValidationError";
  }
}

export class CollisionError extends YelpError {
  sessionId: string;
  kept: string;
  dropped: string;

  constructor(sessionId: string, kept: string, dropped: string) {
    super(
      "COLLISION",
      `Duplicate session id ${sessionId}: keeping ${kept}, dropping ${dropped}`,
    );
    this.name = "CollisionError";
    this.sessionId = sessionId;
    this.kept = kept;
    this.dropped = dropped;
  }
}

export class LaunchError extends YelpError {
  constructor(message: string, options?: ErrorOptions) {
    super("LAUNCH_FAILED", message, options);
    this.name = "LaunchError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
