import { describe, it, expect } from "vitest";
import { silentLogger } from "../logger.js";
import { SystemClipboard } from "./system-clipboard.js";

describe("SystemClipboard", () => {
  it("has no primary selection on macOS or Windows", async () => {
    expect(await new SystemClipboard(silentLogger(), "darwin").readSelection()).toBeNull();
    expect(await new SystemClipboard(silentLogger(), "win32").readSelection()).toBeNull();
  });
});
