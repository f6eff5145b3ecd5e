// Tests for debug logging

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createLogger, isEnabled, matchPattern } from "./logging.ts";

describe("matchPattern", () => {
  it("matches wildcards", () => {
    expect(matchPattern("ffidl:driver", "*")).toBe(true);
    expect(matchPattern("ffidl:driver", "ffidl:*")).toBe(true);
    expect(matchPattern("ffidl:driver", "ffidl:driver")).toBe(true);
    expect(matchPattern("ffidl:driver", "ffidl:writer")).toBe(false);
    expect(matchPattern("ffidl:driver", "ffidl")).toBe(false);
  });

  it("treats regex characters literally", () => {
    expect(matchPattern("ffidl.driver", "ffidl.driver")).toBe(true);
    expect(matchPattern("ffidlxdriver", "ffidl.driver")).toBe(false);
  });
});

describe("isEnabled", () => {
  it("is off without patterns", () => {
    expect(isEnabled("ffidl:driver", undefined)).toBe(false);
    expect(isEnabled("ffidl:driver", "")).toBe(false);
  });

  it("applies exclusions after inclusions", () => {
    expect(isEnabled("ffidl:writer", "ffidl:*,-ffidl:writer")).toBe(false);
    expect(isEnabled("ffidl:driver", "ffidl:*,-ffidl:writer")).toBe(true);
    expect(isEnabled("ffidl:cli", "other ffidl:cli")).toBe(true);
  });
});

describe("createLogger", () => {
  let lines: Array<{ message: string; data: Record<string, unknown> }> = [];
  const sink = (message: string, data: Record<string, unknown>) => {
    lines.push({ message, data });
  };

  beforeEach(() => {
    lines = [];
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("writes prefixed structured lines when enabled", () => {
    const log = createLogger("ffidl:driver", { debug: "ffidl:*", sink });
    log("generated", { target: "rust" });
    log("done");
    expect(lines).toEqual([
      { message: "ffidl:driver generated", data: { target: "rust" } },
      { message: "ffidl:driver done", data: {} },
    ]);
  });

  it("stays quiet when the namespace is not enabled", () => {
    const log = createLogger("ffidl:writer", { debug: "ffidl:driver", sink });
    log("replaced");
    expect(lines).toEqual([]);
  });

  it("reads DEBUG from the environment at each call", () => {
    const log = createLogger("ffidl:cli", { sink });
    vi.stubEnv("DEBUG", "");
    log("first");
    vi.stubEnv("DEBUG", "ffidl:cli");
    log("second");
    expect(lines.map((line) => line.message)).toEqual(["ffidl:cli second"]);
  });

  it("defaults to the console", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    try {
      createLogger("ffidl:cli", { debug: "*" })("hello", { n: 1 });
      expect(error).toHaveBeenCalledWith("ffidl:cli hello", { n: 1 });
    } finally {
      error.mockRestore();
    }
  });
});
