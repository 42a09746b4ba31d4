export type ThreadMessage =
  | { role: "user"; text: string; timestamp?: string }
  | { role: "assistant"; text: string; timestamp?: string }
  | { role: "error"; text: string };

export type MessageRole = ThreadMessage["role"];

export type MessageCache =
  | { state: "unparsed" }
  | { state: "parsed"; messages: readonly ThreadMessage[] };

/** Raw timestamp as written by the CLI: ISO-8601 text or epoch milliseconds. */
export type RawTimestamp = string | number;

export interface SessionRecordInit {
  id: string;
  projectPath: string;
  projectDir: string;
  filePath: string;
  timestamp: RawTimestamp | null;
  preview: string;
  mtimeMs: number;
  ambiguousPath?: boolean;
  readError?: string | null;
}

export interface DiscoveryWarning {
  kind: "read" | "collision" | "root";
  message: string;
  path: string;
}

/** Shape of a transcript line that carries a conversation message. */
export interface JsonlMessageLine {
  type?: string;
  cwd?: string;
  sessionId?: string;
  message?: {
    role?: string;
    content?: string | Array<{ type?: string; text?: string }>;
  };
  timestamp?: RawTimestamp;
}
