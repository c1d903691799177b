import { afterEach, describe, expect, it, vi } from "vitest";
import { RunLog, attachConsoleSink } from "../src/run_log.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("run log", () => {
  it("records events in order and notifies subscribers until they unsubscribe", () => {
    const log = new RunLog();
    const seen: string[] = [];
    const unsub = log.subscribe((event) => seen.push(`${event.level}:${event.message}`));

    log.log("one");
    log.warn("two");
    unsub();
    log.error("three");

    expect(seen).toEqual(["log:one", "warn:two"]);
    expect(log.events().map((e) => e.level)).toEqual(["log", "warn", "error"]);
  });

  it("console sink prints only errors outside debug mode", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const log = new RunLog();
    attachConsoleSink(log, { debug: false });

    log.log("quiet");
    log.warn("quiet too");
    log.error("loud");

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith("[error] loud");
  });

  it("console sink prints every level in debug mode", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const log = new RunLog();
    attachConsoleSink(log, { debug: true });

    log.progress("[1/2] a");
    log.warn("careful");

    expect(logSpy).toHaveBeenCalledWith("[progress] [1/2] a");
    expect(warnSpy).toHaveBeenCalledWith("[warn] careful");
  });
});
