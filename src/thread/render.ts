import type { SessionRecord } from "../sessions/record.js";
import type { MessageRole, ThreadMessage } from "../sessions/types.js";

export interface MessageGroup {
  role: MessageRole;
  text: string;
}

const ROLE_TITLES: Record<MessageRole, string> = {
  user: "User",
  assistant: "Assistant",
  error: "Error",
};

const EXPORT_HEADINGS: Record<MessageRole, string> = {
  user: "👤 User",
  assistant: "🤖 Assistant",
  error: "❌ Error",
};

const NO_MESSAGES = "*No messages found in this session.*\n";

/** Merge consecutive messages of the same role, joined by a blank line. */
export function groupMessages(messages: readonly ThreadMessage[]): MessageGroup[] {
  const groups: MessageGroup[] = [];
  for (const message of messages) {
    const last = groups[groups.length - 1];
    if (last && last.role === message.role) {
      last.text += "\n\n" + message.text;
    } else {
      groups.push({ role: message.role, text: message.text });
    }
  }
  return groups;
}

export function visibleMessages(
  messages: readonly ThreadMessage[],
  userOnly: boolean,
): readonly ThreadMessage[] {
  return userOnly ? messages.filter((m) => m.role === "user") : messages;
}

/**
 * Plain-text thread: what the thread pane shows and what thread search
 * runs over, so match offsets index straight into it.
 */
export function renderThreadText(
  record: SessionRecord,
  messages: readonly ThreadMessage[],
  userOnly = false,
): string {
  const parts: string[] = [
    `Session: ${record.id}\n`,
    `Project: ${record.projectPath}\n`,
    `Date: ${record.dateLabel}\n`,
  ];
  if (record.tag) parts.push(`Tag: ${record.tag}\n`);
  if (userOnly) parts.push("Filter: User messages only\n");
  parts.push("\n");

  const groups = groupMessages(visibleMessages(messages, userOnly));
  if (groups.length === 0) {
    parts.push("No messages found in this session.\n");
  }
  for (const group of groups) {
    parts.push(`${ROLE_TITLES[group.role]}:\n${group.text}\n\n`);
  }
  return parts.join("");
}

function markdownHeader(title: string, record: SessionRecord): string[] {
  const parts = [
    `# ${title}: ${record.id}\n\n`,
    `**Project:** \`${record.projectPath}\`\n\n`,
    `**Date:** ${record.dateLabel}\n\n`,
  ];
  if (record.tag) parts.push(`**Tag:** ${record.tag}\n\n`);
  parts.push("---\n\n");
  return parts;
}

/** Markdown for the clipboard: grouped by role, as the thread pane shows it. */
export function renderThreadMarkdown(
  record: SessionRecord,
  messages: readonly ThreadMessage[],
): string {
  const parts = markdownHeader("Session", record);
  const groups = groupMessages(messages);
  if (groups.length === 0) parts.push(NO_MESSAGES);
  for (const group of groups) {
    parts.push(`## ${ROLE_TITLES[group.role]}\n\n${group.text}\n\n`);
  }
  return parts.join("");
}

/** Markdown for export files: one section per message. */
export function renderExportMarkdown(
  record: SessionRecord,
  messages: readonly ThreadMessage[],
): string {
  const parts = markdownHeader("Claude Session", record);
  for (const message of messages) {
    parts.push(`## ${EXPORT_HEADINGS[message.role]}\n\n${message.text}\n\n`);
  }
  if (messages.length === 0) parts.push(NO_MESSAGES);
  return parts.join("");
}
