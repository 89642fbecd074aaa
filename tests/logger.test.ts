// CHANGE: Verify logger respects configured log level.
// WHY: Progress lines stay at INFO, HTTP detail at DEBUG, and KEY=value lines are never filtered.
// SOURCE: internal reasoning

import { afterEach, describe, expect, it, vi } from "vitest";
import { debug, emitOutput, error, info, setLogLevel, warn } from "../src/logger.js";

describe("logger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("suppresses debug logs when level is info", () => {
    setLogLevel("info");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    debug("hidden");
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("emits debug logs when level is debug", () => {
    setLogLevel("debug");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    debug("visible");
    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  it("routes warnings and errors to stderr", () => {
    const errSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    warn("careful");
    error("broken");
    expect(errSpy).toHaveBeenCalledTimes(2);
  });

  it("drops info when level is error but still emits output lines", () => {
    setLogLevel("error");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    info("quiet");
    emitOutput("APK_PATH", "tmp/YouTube-19.45.38.apk");
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith("APK_PATH=tmp/YouTube-19.45.38.apk");
  });

  it("rejects unknown levels and keeps the active one", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    expect(() => setLogLevel("trace")).toThrow("Unsupported log level: trace");
    debug("hidden");
    info("shown");
    expect(logSpy).toHaveBeenCalledTimes(1);
  });
});
