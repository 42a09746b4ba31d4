import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { LaunchError } from "../errors.js";
import { silentLogger } from "../logger.js";
import { ClaudeLauncher, parseCreateOutput } from "./claude-launcher.js";

describe("parseCreateOutput", () => {
  it("extracts the session id", () => {
    expect(parseCreateOutput('{"type":"result","session_id":"abc-123"}\n')).toBe("abc-123");
  });

  it("strips control characters before parsing", () => {
    expect(parseCreateOutput('\u0007{"session_id":"abc\u0001-123"}')).toBe("abc-123");
  });

  it("rejects output that is not JSON", () => {
    expect(() => parseCreateOutput("oops")).toThrow(LaunchError);
    expect(() => parseCreateOutput("oops")).toThrow("Error parsing JSON: oops");
  });

  it("rejects JSON without a usable session id", () => {
    expect(() => parseCreateOutput('{"result":"ok"}')).toThrow(
      'No session_id in response: {"result":"ok"}',
    );
    expect(() => parseCreateOutput('{"session_id":""}')).toThrow(LaunchError);
  });
});

describe("ClaudeLauncher", () => {
  const missing = join(tmpdir(), "claude-yelp-no-such-binary");
  const launcher = new ClaudeLauncher(missing, silentLogger());

  it("wraps a failed create in a LaunchError", async () => {
    await expect(launcher.createSession("Session: x", tmpdir())).rejects.toThrow(
      /^Error creating session: /,
    );
  });

  it("rejects resume when the binary cannot start", async () => {
    await expect(launcher.resume("abc", tmpdir())).rejects.toThrow(
      `Failed to start ${missing}: `,
    );
  });
});
