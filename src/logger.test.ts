import { describe, it, expect } from "vitest";
import { defaults } from "./config.js";
import { createLogger, debugRequested } from "./logger.js";

describe("debugRequested", () => {
  it("honours the flag", () => {
    expect(debugRequested(true, {})).toBe(true);
    expect(debugRequested(false, {})).toBe(false);
  });

  it("reads CLAUDE_YELP_DEBUG", () => {
    expect(debugRequested(false, { CLAUDE_YELP_DEBUG: "1" })).toBe(true);
    expect(debugRequested(false, { CLAUDE_YELP_DEBUG: "TRUE" })).toBe(true);
    expect(debugRequested(false, { CLAUDE_YELP_DEBUG: "0" })).toBe(false);
  });
});

describe("createLogger", () => {
  it("is silent unless debugging", () => {
    expect(createLogger(defaults(), false, {}).level).toBe("silent");
  });
});
