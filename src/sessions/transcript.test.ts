import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ParseError } from "../errors.js";
import { assistantLine, userLine } from "../testing/fixtures.js";
import {
  messagesFromLine,
  parseLine,
  readTranscriptHead,
  readTranscriptMessages,
} from "./transcript.js";

describe("transcript", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "claude-yelp-transcript-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("parseLine", () => {
    it("returns null for blank lines", () => {
      expect(parseLine("   ")).toBeNull();
    });

    it("rejects malformed JSON and non-objects", () => {
      expect(() => parseLine("{oops")).toThrow(ParseError);
      expect(() => parseLine("[1, 2]")).toThrow(ParseError);
    });
  });

  describe("messagesFromLine", () => {
    it("takes only text parts of user content lists", () => {
      const entry = {
        type: "user",
        message: {
          content: [
            { type: "tool_result", text: "ignored" },
            { type: "text", text: "follow up" },
          ],
        },
      };
      expect(messagesFromLine(entry)).toEqual([{ role: "user", text: "follow up" }]);
    });

    it("ignores assistant lines whose content is not a list", () => {
      expect(messagesFromLine({ type: "assistant", message: { content: "plain" } })).toEqual([]);
    });

    it("ignores other line types", () => {
      expect(messagesFromLine({ type: "summary", message: { content: "x" } })).toEqual([]);
    });
  });

  describe("readTranscriptMessages", () => {
    it("skips a malformed third line and keeps the rest", async () => {
      const filePath = join(dir, "s1.jsonl");
      await writeFile(
        filePath,
        [
          userLine("hello", "2025-01-02T10:00:00.000Z"),
          assistantLine("hi there", "2025-01-02T10:00:05.000Z"),
          "{not json",
          userLine("second question"),
          assistantLine("done"),
        ].join("\n"),
      );

      expect(readTranscriptMessages(filePath)).toEqual([
        { role: "user", text: "hello", timestamp: "2025-01-02T10:00:00.000Z" },
        { role: "assistant", text: "hi there", timestamp: "2025-01-02T10:00:05.000Z" },
        { role: "user", text: "second question" },
        { role: "assistant", text: "done" },
      ]);
    });

    it("returns a single error entry for an unreadable file", () => {
      const messages = readTranscriptMessages(join(dir, "missing.jsonl"));
      expect(messages).toHaveLength(1);
      expect(messages[0].role).toBe("error");
      expect(messages[0].text.startsWith("Error loading messages: ")).toBe(true);
    });
  });

  describe("readTranscriptHead", () => {
    it("uses the first user text and the earliest timestamp before it", async () => {
      const filePath = join(dir, "s2.jsonl");
      await writeFile(
        filePath,
        [
          JSON.stringify({ type: "summary", timestamp: "2025-01-01T00:00:00.000Z" }),
          "garbage",
          userLine("first question that is long"),
          userLine("second"),
        ].join("\n"),
      );

      expect(readTranscriptHead(filePath, 10)).toEqual({
        preview: "first ques",
        timestamp: "2025-01-01T00:00:00.000Z",
      });
    });

    it("returns an empty preview when there is no user message", async () => {
      const filePath = join(dir, "s3.jsonl");
      await writeFile(filePath, assistantLine("only me", "2025-05-05T05:05:05.000Z"));

      expect(readTranscriptHead(filePath, 100)).toEqual({
        preview: "",
        timestamp: "2025-05-05T05:05:05.000Z",
      });
    });
  });
});
