import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, formatLine, parseLogLevel } from "./log";

describe("formatLine", () => {
  it("prefixes the tag and appends context pairs", () => {
    expect(formatLine("dock", "Panel removed", { panelId: "a", panelCount: 2 })).toBe(
      "[dock] Panel removed panelId=a panelCount=2",
    );
    expect(formatLine("server", "Ready")).toBe("[server] Ready");
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels in any case", () => {
    expect(parseLogLevel(" WARN ")).toBe("warn");
    expect(parseLogLevel("silent")).toBe("silent");
  });

  it("defaults to info", () => {
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("loud")).toBe("info");
    expect(parseLogLevel("toString")).toBe("info");
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes enabled levels to the matching console method", () => {
    const info = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = createLogger("test", "info");

    log.info("hello", { n: 1 });
    log.error("boom");
    log.debug("hidden");

    expect(info).toHaveBeenCalledWith("[test] hello n=1");
    expect(error).toHaveBeenCalledWith("[test] boom");
    expect(debug).not.toHaveBeenCalled();
  });

  it("follows LOG_LEVEL when no level is given", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.stubEnv("LOG_LEVEL", "error");
    try {
      createLogger("test").warn("quiet");
      expect(warn).not.toHaveBeenCalled();
      vi.stubEnv("LOG_LEVEL", "debug");
      createLogger("test").warn("loud");
      expect(warn).toHaveBeenCalledWith("[test] loud");
    } finally {
      vi.unstubAllEnvs();
    }
  });
});
