import { writeFileSync } from "node:fs";
import { join } from "node:path";
import type { Logger } from "pino";
import { IOFailureError, describeError } from "../errors.js";
import type { SessionRecord } from "../sessions/record.js";
import { renderExportMarkdown } from "./render.js";

/** `<id>.md`, or `<id>-<tag>.md` with path separators in the tag replaced. */
export function exportFileName(record: SessionRecord): string {
  if (!record.tag) return `${record.id}.md`;
  return `${record.id}-${record.tag.replace(/[/\\]/g, "-")}.md`;
}

/** Write the session as Markdown into `dir`; returns the file path. */
export function exportSession(
  record: SessionRecord,
  dir: string,
  log?: Logger,
): string {
  const filePath = join(dir, exportFileName(record));
  const content = renderExportMarkdown(record, record.messages(log));
  try {
    writeFileSync(filePath, content, "utf-8");
  } catch (err) {
    log?.error({ err, filePath }, "Export failed");
    throw new IOFailureError(`Error exporting session: ${describeError(err)}`, { cause: err });
  }
  log?.info({ sessionId: record.id, filePath }, "Session exported");
  return filePath;
}
