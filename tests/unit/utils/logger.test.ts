import { Logger, parseLevel } from "../../../src/utils/logger";

describe("parseLevel", () => {
  it("accepts known levels in any case", () => {
    expect(parseLevel(" DEBUG ")).toBe("debug");
    expect(parseLevel("warn")).toBe("warn");
  });

  it("falls back on anything else", () => {
    expect(parseLevel(undefined)).toBe("info");
    expect(parseLevel("verbose", "error")).toBe("error");
  });
});

describe("Logger", () => {
  let output: jest.SpyInstance;

  beforeEach(() => {
    output = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  function lastLine(): string {
    const calls = output.mock.calls;
    return String(calls[calls.length - 1][0]);
  }

  it("drops events below the threshold", () => {
    const log = new Logger({ level: "warn" });

    log.info("quiet");
    log.warn("loud");

    expect(output).toHaveBeenCalledTimes(1);
    expect(lastLine()).toContain("loud");
  });

  it("writes the message followed by JSON meta, with errors reduced to name and message", () => {
    const log = new Logger({ level: "debug" });

    log.error("call failed", { attempt: 2, error: new TypeError("fetch failed") });

    expect(lastLine()).toMatch(/ call failed /);
    expect(lastLine()).toContain('{"attempt":2,"error":{"name":"TypeError","message":"fetch failed"}}');
  });

  it("gives children a scope and bound meta", () => {
    const log = new Logger({ level: "debug" }).child("llm", { model: "m" }).child("chat", { requestId: "abc" });

    log.debug("request", { messages: 1 });

    expect(lastLine()).toContain("[llm:chat]");
    expect(lastLine()).toContain('{"model":"m","requestId":"abc","messages":1}');
  });

  it("shares the threshold with its children", () => {
    const root = new Logger({ level: "info" });
    const child = root.child("llm");

    child.debug("hidden");
    root.setLevel("debug");
    child.debug("shown");

    expect(output).toHaveBeenCalledTimes(1);
    expect(child.level).toBe("debug");
  });
});
